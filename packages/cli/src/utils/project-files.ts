// pattern: Imperative Shell

import { parse as parseToml } from "@iarna/toml";
import { readFile } from "fs/promises";
import { join } from "path";

import { ConfigurationError } from "./errors.js";

/**
 * Reads a required file from the project directory
 * @param projectDir Absolute path to the project root directory
 * @param fileName File name relative to the project root
 * @returns Absolute path and file content
 * @throws ConfigurationError if the file is missing or cannot be read
 */
export async function readProjectFile(
  projectDir: string,
  fileName: string
): Promise<{ filePath: string; content: string }> {
  const filePath = join(projectDir, fileName);

  try {
    const content = await readFile(filePath, "utf8");
    return { filePath, content };
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new ConfigurationError(
        `${fileName} not found in ${projectDir}`,
        filePath
      );
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `Failed to read ${fileName}: ${reason}`,
      filePath
    );
  }
}

/**
 * Parses TOML text, reporting syntax errors as ConfigurationError against the file
 */
export function parseTomlFile(content: string, filePath: string): unknown {
  try {
    return parseToml(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `Failed to parse ${filePath}: ${reason}`,
      filePath
    );
  }
}
