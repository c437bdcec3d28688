// pattern: Imperative Shell

import { statSync } from "fs";
import { resolve } from "path";

// Project directory override from --dir
let PROJECT_DIR: string | undefined;

// Colour and prompt-free output
let NON_INTERACTIVE = false;

/**
 * Set the project directory; defaults to the working directory
 * @throws Error when the path is not a directory
 */
export function setProjectDir(dir: string | undefined): void {
  const resolved = dir ? resolve(dir) : process.cwd();
  if (!statSync(resolved, { throwIfNoEntry: false })?.isDirectory()) {
    throw new Error(`Invalid project directory: ${resolved}`);
  }
  PROJECT_DIR = resolved;
}

export function getProjectDir(): string {
  return PROJECT_DIR ?? process.cwd();
}

export function setNonInteractive(nonInteractive: boolean): void {
  NON_INTERACTIVE = nonInteractive;
}

export function isNonInteractiveMode(): boolean {
  return NON_INTERACTIVE;
}
