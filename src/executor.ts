import { spawn, type ChildProcess, type SpawnOptions } from "child_process";
import { constants } from "os";
import { ExecutionError } from "./errors.js";

export interface CommandExecutor {
  // true when run() passes the command on instead of running it
  readonly handsOff?: boolean;
  run(command: string): Promise<number>;
}

export type SpawnFn = (command: string, options: SpawnOptions) => ChildProcess;

const defaultSpawn: SpawnFn = (command, options) => spawn(command, options);

// shells report a signal death as 128 + signal number
export function signalExitCode(signal: NodeJS.Signals | null): number {
  if (!signal) return 1;
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  return entry ? 128 + entry[1] : 1;
}

/**
 * Runs the command through the user's shell with the terminal attached,
 * so pipes, globs and redirection behave as if typed by hand.
 */
export class ShellExecutor implements CommandExecutor {
  constructor(
    private readonly shell: string | boolean = true,
    private readonly spawnFn: SpawnFn = defaultSpawn
  ) {}

  run(command: string): Promise<number> {
    return new Promise((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = this.spawnFn(command, { stdio: "inherit", shell: this.shell });
      } catch (error) {
        reject(toExecutionError(error, command, this.shell));
        return;
      }

      child.once("error", (error) => reject(toExecutionError(error, command, this.shell)));
      child.once("close", (code, signal) => {
        resolve(code ?? signalExitCode(signal));
      });
    });
  }
}

function toExecutionError(error: unknown, command: string, shell: string | boolean): ExecutionError {
  const interpreter = typeof shell === "string" ? shell : "the default shell";
  const reason = error instanceof Error ? error.message : String(error);
  return new ExecutionError(`Could not start ${interpreter}: ${reason}`, command, reason);
}
