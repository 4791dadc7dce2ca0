import chalk from "chalk";
import type { CommandEditor } from "./editor.js";
import type { Prompter } from "./prompter.js";

export type Answer = "approve" | "decline" | "edit" | "unknown";

export interface Confirmation {
  approved: boolean;
  command: string;
}

export interface Gate {
  confirm(command: string): Promise<Confirmation>;
}

export const RUN_QUESTION = "Run? (Y/n/e): ";
export const RETRY_HINT = "Please answer y, n, or e.";

/**
 * Empty input means yes. Anything that isn't y/n/e is reported as
 * `unknown` and the gate asks again.
 */
export function interpretAnswer(answer: string): Answer {
  const action = answer.trim().toLowerCase();
  if (action === "" || action.startsWith("y")) return "approve";
  if (action.startsWith("n")) return "decline";
  if (action.startsWith("e")) return "edit";
  return "unknown";
}

export function formatCommandBlock(command: string): string {
  const rule = chalk.dim("------------------------------------------");
  return [rule, `  ${chalk.green("$")} ${chalk.green.bold(command)}`, rule].join("\n");
}

export class ConfirmationGate implements Gate {
  constructor(
    private readonly prompter: Prompter,
    private readonly editor?: CommandEditor,
    private readonly print: (text: string) => void = (text) => console.log(text)
  ) {}

  async confirm(command: string): Promise<Confirmation> {
    let current = command;
    this.print(formatCommandBlock(current));

    for (;;) {
      const answer = await this.prompter.ask(RUN_QUESTION);
      // input closed before an answer: nothing runs
      if (answer === null) return { approved: false, command: current };

      switch (interpretAnswer(answer)) {
        case "approve":
          return { approved: true, command: current };
        case "decline":
          return { approved: false, command: current };
        case "edit":
          if (this.editor) {
            current = await this.editor.edit(current);
            this.print(formatCommandBlock(current));
          } else {
            this.print(RETRY_HINT);
          }
          break;
        case "unknown":
          this.print(RETRY_HINT);
          break;
      }
    }
  }
}
