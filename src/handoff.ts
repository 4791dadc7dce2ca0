import { promises as fs } from "fs";
import { ExecutionError, describeError } from "./errors.js";
import type { CommandExecutor } from "./executor.js";

export const HANDOFF_ENV = "SAYSO_HANDOFF_FILE";

/**
 * Used under the `--shell-init` wrapper: instead of spawning a subshell,
 * the approved command is written to the file the wrapper named, and the
 * wrapper evals it in the user's own shell (so it lands in history and
 * can change the shell's directory or environment).
 */
export class HandoffExecutor implements CommandExecutor {
  readonly handsOff = true;

  constructor(readonly file: string) {}

  async run(command: string): Promise<number> {
    try {
      await fs.writeFile(this.file, command, { mode: 0o600 });
    } catch (error) {
      throw new ExecutionError(
        `Could not hand the command to the shell wrapper: ${describeError(error)}`,
        command
      );
    }
    return 0;
  }
}

export function handoffFileFrom(env: NodeJS.ProcessEnv = process.env): string | undefined {
  const file = env[HANDOFF_ENV];
  return file ? file : undefined;
}
