// pattern: Mixed (unavoidable)
// Command execution requires integration of pure logic with side effects
import { execa, type Options } from "execa";

import { ProcessError } from "../errors.js";

import type { Logger } from "pino";

/**
 * Outcome of a command run that does not throw on a nonzero exit
 */
export interface CommandOutcome {
  /** Exit code, or null when the process could not be spawned or was killed */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** True when the process failed to spawn or exited nonzero */
  failed: boolean;
}

/**
 * A command builder with a Rust Command-like API and logging integration.
 * stderr of every run is logged at DEBUG level through a child logger.
 */
export class CommandBuilder {
  private readonly command: string;
  private readonly args: string[];
  private readonly env: Record<string, string>;
  private readonly childLogger: Logger;
  private cwd?: string;

  constructor(command: string, logger: Logger) {
    this.command = command;
    this.args = [];
    this.env = {};

    // Extract process name (first part of command, without path or extension)
    const processName = command.split(/[/\\]/).pop()?.split(".")[0] ?? command;
    this.childLogger = logger.child({ process: processName });
  }

  /**
   * Add a command argument
   */
  arg(arg: string): this {
    this.args.push(arg);
    return this;
  }

  /**
   * Add multiple command arguments
   */
  addArgs(args: string[]): this {
    this.args.push(...args);
    return this;
  }

  /**
   * Set environment variables (merged with parent)
   */
  envs(envVars: Record<string, string>): this {
    Object.assign(this.env, envVars);
    return this;
  }

  /**
   * Set working directory
   */
  currentDir(path: string): this {
    this.cwd = path;
    return this;
  }

  /**
   * Run the command to completion without throwing on nonzero exit or spawn failure
   */
  async run(): Promise<CommandOutcome> {
    const options: Options = {
      env: { ...process.env, ...this.env },
      stdout: "pipe",
      stderr: "pipe",
      reject: false,
      ...(this.cwd !== undefined && { cwd: this.cwd }),
    };

    this.childLogger.debug(
      { command: this.command, args: this.args, cwd: this.cwd },
      "Executing command"
    );

    const result = await execa(this.command, this.args, options);
    const stdout = typeof result.stdout === "string" ? result.stdout : "";
    const stderr = typeof result.stderr === "string" ? result.stderr : "";

    if (stderr.trim()) {
      this.childLogger.debug({ stderr }, "Command stderr output");
    }

    const outcome: CommandOutcome = {
      exitCode: result.exitCode ?? null,
      stdout,
      stderr,
      failed: result.failed,
    };

    this.childLogger.debug(
      {
        exitCode: outcome.exitCode,
        failed: outcome.failed,
        duration: result.durationMs,
      },
      outcome.failed ? "Command failed" : "Command completed successfully"
    );

    return outcome;
  }

  /**
   * Execute the command and return trimmed stdout.
   * Throws a ProcessError when the command fails.
   */
  async output(): Promise<string> {
    const outcome = await this.run();
    if (outcome.failed) {
      const processName = this.command.split(/[/\\]/).pop() ?? this.command;
      const detail = outcome.stderr.trim() || "no output";
      throw new ProcessError(
        `${processName} ${this.args.join(" ")} failed: ${detail}`,
        processName,
        outcome.exitCode ?? undefined
      );
    }
    return outcome.stdout.trim();
  }
}

/**
 * Create a new command builder with the specified command and logger
 */
export function createCommand(command: string, logger: Logger): CommandBuilder {
  return new CommandBuilder(command, logger);
}
