// Command execution layer: every external tool invocation passes through this module.
// Executor is the seam handlers depend on; LocalExecutor is the only real implementation.
// Commands run without a shell: argv goes straight to the child, env is layered over process.env.
import execa from "execa";
import type { Command } from "../types/command.js";
import { announce, logger } from "../logger.js";

/** Exit status reported when the executable could not be started at all. */
export const SPAWN_FAILURE_EXIT = 127;

/** Exit status reported when the child was killed by a signal. */
export const SIGNAL_EXIT = 128;

/** Result of a command run with captured output. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
}

export interface Executor {
  /** Run with inherited stdio; resolves to the child's exit status. */
  run(command: Command): Promise<number>;
  /** Run with stdout/stderr captured. */
  capture(command: Command): Promise<ExecResult>;
}

/** Render a command the way a shell trace would print it. */
export function formatCommand(command: Command): string {
  const assignments = Object.entries(command.env ?? {}).map(([key, value]) => `${key}=${value}`);
  return [...assignments, ...command.argv].join(" ");
}

export interface LocalExecutorOptions {
  cwd: string;
  /** Echo `+ <command>` to stderr before each run, like `set -x`. */
  trace: boolean;
}

export class LocalExecutor implements Executor {
  constructor(private readonly options: LocalExecutorOptions) {}

  async run(command: Command): Promise<number> {
    if (this.options.trace) announce(`+ ${formatCommand(command)}`);
    const result = await this.spawn(command, "inherit");
    return result.exitCode;
  }

  async capture(command: Command): Promise<ExecResult> {
    return this.spawn(command, "pipe");
  }

  private async spawn(command: Command, stdio: "inherit" | "pipe"): Promise<ExecResult> {
    const [file, ...args] = command.argv;
    const result = await execa(file, args, {
      cwd: this.options.cwd,
      env: command.env,
      stdio,
      reject: false,
    });

    // execa leaves exitCode unset when the child never started or was signalled.
    let exitCode: number;
    if (typeof result.exitCode === "number") {
      exitCode = result.exitCode;
    } else if (result.signal) {
      exitCode = SIGNAL_EXIT;
    } else {
      exitCode = SPAWN_FAILURE_EXIT;
      logger.warn({ argv: command.argv }, "Command could not be started");
    }

    logger.debug({ argv: command.argv, exitCode }, "Command finished");
    return {
      stdout: typeof result.stdout === "string" ? result.stdout : "",
      stderr: typeof result.stderr === "string" ? result.stderr : "",
      exitCode,
    };
  }
}
