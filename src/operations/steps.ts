import type { Command } from "../types/command.js";
import type { Executor } from "../execution/executor.js";
import { formatCommand } from "../execution/executor.js";
import { BuildError, BuildErrorCode } from "../shared/errors.js";

/** Run one command; a non-zero exit becomes a COMMAND_FAILED error carrying that status. */
export async function runStep(executor: Executor, command: Command): Promise<void> {
  const exitCode = await executor.run(command);
  if (exitCode !== 0) {
    throw new BuildError(BuildErrorCode.COMMAND_FAILED, `Command exited with ${exitCode}: ${formatCommand(command)}`, exitCode, {
      argv: command.argv,
    });
  }
}

/** Run commands in order, stopping at the first failure. */
export async function runSequence(executor: Executor, commands: readonly Command[]): Promise<void> {
  for (const command of commands) {
    await runStep(executor, command);
  }
}
