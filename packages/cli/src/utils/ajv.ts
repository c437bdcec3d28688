// pattern: Functional Core
import { Ajv, type ErrorObject } from "ajv";

// Create singleton AJV instance configured for TypeBox schemas
const ajv = new Ajv({
  // Ignore TypeBox's custom attributes (Symbol keys)
  strict: false,
  // Enable schema compilation caching
  code: { optimize: true },
  allowUnionTypes: true,
  allErrors: true,
});

/**
 * Render Ajv errors as "path: message" strings
 */
export function formatAjvErrors(
  errors: ErrorObject[] | null | undefined
): string[] {
  return (errors ?? []).map(
    err => `${err.instancePath || "root"}: ${err.message ?? "invalid"}`
  );
}

export { ajv };
