// pattern: Mixed (unavoidable)
// Command execution requires integration of pure logic with side effects
import { execa, ExecaError, type Options } from "execa";

import type { Logger } from "pino";

/**
 * A command builder with logging integration. Runs the process once,
 * logs stderr at DEBUG level and returns trimmed stdout.
 */
export class CommandBuilder {
  private readonly command: string;
  private readonly args: string[];
  private readonly env: Record<string, string>;
  private readonly childLogger: Logger;
  private cwd?: string;
  private shell?: string | boolean;

  constructor(command: string, logger: Logger) {
    this.command = command;
    this.args = [];
    this.env = {};

    // Extract process name (first part of command, without path or extension)
    const processName = command.split(/[/\\]/).pop()?.split(".")[0] ?? command;
    this.childLogger = logger.child({ process: processName });
  }

  /**
   * Name the child logger binds, for diagnostics
   */
  get processName(): string {
    const bindings = this.childLogger.bindings();
    return typeof bindings["process"] === "string"
      ? bindings["process"]
      : this.command;
  }

  arg(arg: string): this {
    this.args.push(arg);
    return this;
  }

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

  currentDir(path: string): this {
    this.cwd = path;
    return this;
  }

  useShell(shell: string | boolean): this {
    this.shell = shell;
    return this;
  }

  /**
   * Execute the command and return stdout
   * stderr is automatically logged at DEBUG level
   */
  async output(): Promise<string> {
    this.childLogger.debug(
      {
        command: this.command,
        argCount: this.args.length,
        cwd: this.cwd,
      },
      "Executing command"
    );

    const options: Options = {
      env: this.env,
      extendEnv: true,
      stderr: "pipe",
      stdout: "pipe",
      ...(this.cwd !== undefined && { cwd: this.cwd }),
      ...(this.shell !== undefined && { shell: this.shell }),
    };

    try {
      const result = await execa(this.command, this.args, options);

      if (typeof result.stderr === "string" && result.stderr.trim()) {
        this.childLogger.debug(
          { stderr: result.stderr },
          "Command stderr output"
        );
      }

      this.childLogger.debug(
        {
          exitCode: result.exitCode,
          duration: result.durationMs,
        },
        "Command completed successfully"
      );

      return typeof result.stdout === "string" ? result.stdout.trim() : "";
    } catch (error) {
      if (error instanceof ExecaError) {
        this.childLogger.debug(
          {
            error: error.message,
            stderr: error.stderr,
            exitCode: error.exitCode,
          },
          "Command execution failed"
        );
      }

      throw error;
    }
  }
}

/**
 * Create a new command builder with the specified command and logger
 */
export function createCommand(command: string, logger: Logger): CommandBuilder {
  return new CommandBuilder(command, logger);
}
