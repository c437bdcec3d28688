// pattern: Functional Core

import { ConfigurationError } from "../../utils/errors.js";

/**
 * Represents a categorized error with user-friendly messaging
 */
export interface AnalyzedError {
  category: "configuration" | "unknown";
  userMessage: string;
  technicalMessage: string;
  suggestions: string[];
}

const DEBUG_HINT = "Run with --log-level debug for more detailed information";

function analyzeConfigurationError(error: ConfigurationError): AnalyzedError {
  const errorMessage = error.message;
  const errorLower = errorMessage.toLowerCase();
  let suggestions = [
    "Check pyproject.toml and uv.lock for errors",
    "Regenerate the lockfile with: uv lock",
    DEBUG_HINT,
  ];

  if (errorLower.includes("pyproject.toml not found")) {
    suggestions = [
      "Run this command from the root of a uv project",
      "Point at the project with --dir <path>",
    ];
  } else if (errorLower.includes("uv.lock not found")) {
    suggestions = [
      "Create the lockfile with: uv lock",
      "Point at the project with --dir <path>",
    ];
  } else if (errorLower.startsWith("failed to read")) {
    suggestions = [
      "Check that you can read the project directory",
      "Verify the file or directory ownership is correct",
    ];
  }

  return {
    category: "configuration",
    userMessage: errorMessage,
    technicalMessage: errorMessage,
    suggestions,
  };
}

/**
 * Analyzes an error and provides structured information with user-friendly messages
 */
export function analyzeError(error: unknown): AnalyzedError {
  if (error instanceof ConfigurationError) {
    return analyzeConfigurationError(error);
  }

  const errorMessage = getErrorMessage(error);
  return {
    category: "unknown",
    userMessage: "An unexpected error occurred",
    technicalMessage: errorMessage,
    suggestions: [
      "Try the operation again",
      "Check the command syntax and arguments",
      DEBUG_HINT,
    ],
  };
}

/**
 * Extracts a string message from various error types
 */
function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (error && typeof error === "object" && "message" in error) {
    return String(error.message);
  }
  return String(error);
}
