// pattern: Functional Core

/**
 * Base class for lockdrift application errors
 */
export abstract class LockdriftError extends Error {
  public readonly category: string;

  protected constructor(category: string, message: string) {
    super(message);
    this.name = this.constructor.name;
    this.category = category;

    // Maintain proper stack trace for where our error was thrown
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Errors related to the project's required input files (pyproject.toml, uv.lock)
 */
export class ConfigurationError extends LockdriftError {
  public readonly filePath?: string;

  constructor(message: string, filePath?: string) {
    super("configuration", message);
    if (filePath) {
      this.filePath = filePath;
    }
  }
}

/**
 * Errors related to locating the project's Python environment
 */
export class PythonEnvironmentError extends LockdriftError {
  public readonly sitePackagesDir?: string;

  constructor(message: string, sitePackagesDir?: string) {
    super("environment", message);
    if (sitePackagesDir) {
      this.sitePackagesDir = sitePackagesDir;
    }
  }
}

/**
 * Errors related to external process execution
 */
export class ProcessError extends LockdriftError {
  public readonly processName?: string;
  public readonly exitCode?: number;

  constructor(message: string, processName?: string, exitCode?: number) {
    super("process", message);
    if (processName) {
      this.processName = processName;
    }
    if (exitCode !== undefined) {
      this.exitCode = exitCode;
    }
  }
}
