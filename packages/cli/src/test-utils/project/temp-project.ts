// pattern: Imperative Shell

import { type JsonMap, stringify as stringifyToml } from "@iarna/toml";
import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join } from "path";

/**
 * Files for a temporary uv project; omitted files are not written
 */
export interface TempProjectConfig {
  /** Contents of pyproject.toml */
  pyproject?: JsonMap;
  /** Contents of uv.lock */
  lockfile?: JsonMap;
  /** Optional directory name prefix */
  prefix?: string;
}

/**
 * Result of creating a temporary project
 */
export interface TempProject {
  /** Path to the temporary project directory */
  path: string;
  /** Cleanup function to remove the temporary directory */
  cleanup: () => Promise<void>;
  /** Write a file to the temporary project directory */
  writeFile: (relativePath: string, content: string) => Promise<void>;
}

/**
 * Creates a temporary project directory with pyproject.toml and uv.lock
 * written as TOML, for testing purposes
 */
export async function createTempProject(
  config: TempProjectConfig
): Promise<TempProject> {
  const prefix = config.prefix ?? "lockdrift-test-";
  const tempDir = await mkdtemp(join(tmpdir(), prefix));

  const writeProjectFile = async (
    relativePath: string,
    content: string
  ): Promise<void> => {
    const filePath = join(tempDir, relativePath);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, content, "utf8");
  };

  if (config.pyproject) {
    await writeProjectFile("pyproject.toml", stringifyToml(config.pyproject));
  }
  if (config.lockfile) {
    await writeProjectFile("uv.lock", stringifyToml(config.lockfile));
  }

  return {
    path: tempDir,
    cleanup: async () => {
      await rm(tempDir, { recursive: true, force: true });
    },
    writeFile: writeProjectFile,
  };
}
