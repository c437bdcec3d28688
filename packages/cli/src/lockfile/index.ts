// pattern: Functional Core
// uv.lock loading and dependency declaration resolution

import { canonicalizeName, type PackageName } from "../python/names.js";
import { parseRequirement } from "../python/requirement.js";
import { ajv, formatAjvErrors } from "../utils/ajv.js";
import { ConfigurationError } from "../utils/errors.js";
import { parseTomlFile, readProjectFile } from "../utils/project-files.js";

import {
  type DependencyDeclaration,
  Lockfile,
  type LockDependency,
} from "./types.js";

export * from "./types.js";

export const LOCKFILE_NAME = "uv.lock";

const validateLockfile = ajv.compile<Lockfile>(Lockfile);

/**
 * Validates parsed uv.lock content against the lockfile schema
 * @throws ConfigurationError naming the offending paths
 */
export function parseLockfile(content: string, filePath: string): Lockfile {
  const data = parseTomlFile(content, filePath);

  if (!validateLockfile(data)) {
    const errors = formatAjvErrors(validateLockfile.errors);
    throw new ConfigurationError(
      `Invalid ${LOCKFILE_NAME} at ${filePath}: ${errors.join(", ")}`,
      filePath
    );
  }

  return data;
}

/**
 * Reads and validates uv.lock from the project directory
 */
export async function loadLockfile(projectDir: string): Promise<Lockfile> {
  const { filePath, content } = await readProjectFile(
    projectDir,
    LOCKFILE_NAME
  );
  return parseLockfile(content, filePath);
}

export function toDeclaration(dependency: LockDependency): DependencyDeclaration {
  if (typeof dependency === "string") {
    return { kind: "bare", raw: dependency };
  }
  return {
    kind: "table",
    name: dependency.name,
    marker: dependency.marker ?? null,
    extras: dependency.extra ?? [],
  };
}

/**
 * Canonical name of the declared dependency, or null when the declaration names nothing
 */
export function resolveDeclaration(
  declaration: DependencyDeclaration
): PackageName | null {
  const name =
    declaration.kind === "bare"
      ? parseRequirement(declaration.raw).name
      : canonicalizeName(declaration.name);
  return name.length > 0 ? name : null;
}
