import * as readline from "readline";
import { InterruptedError } from "./errors.js";

/**
 * Source of interactive answers. `null` means the input ended (EOF)
 * before a line was read.
 */
export interface Prompter {
  ask(question: string): Promise<string | null>;
}

/**
 * Asks on a terminal with a fresh interface per question, so the terminal
 * is back in cooked mode before a command inherits it. Piped input is read
 * through one interface for the prompter's lifetime; lines that arrive
 * together are queued for the questions that follow.
 */
export class ReadlinePrompter implements Prompter {
  private piped?: readline.Interface;
  private readonly lines: string[] = [];
  private ended = false;
  private waiter?: {
    resolve: (line: string | null) => void;
    reject: (error: Error) => void;
  };

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  ask(question: string): Promise<string | null> {
    return "isTTY" in this.input && this.input.isTTY === true
      ? this.askTerminal(question)
      : this.askPiped(question);
  }

  /** Releases the piped-input interface so the process can exit. */
  close(): void {
    this.piped?.close();
  }

  private askTerminal(question: string): Promise<string | null> {
    const rl = readline.createInterface({
      input: this.input,
      output: this.output,
    });

    return new Promise((resolve, reject) => {
      let settled = false;
      const settle = (fn: () => void) => {
        if (settled) return;
        settled = true;
        fn();
        rl.close();
      };

      rl.on("SIGINT", () => {
        this.output.write("\n");
        settle(() => reject(new InterruptedError()));
      });
      rl.on("close", () => settle(() => resolve(null)));
      rl.question(question, (answer) => settle(() => resolve(answer)));
    });
  }

  private askPiped(question: string): Promise<string | null> {
    this.output.write(question);
    const next = this.lines.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.ended) return Promise.resolve(null);

    this.listen();
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  private listen(): void {
    if (this.piped) return;
    const rl = readline.createInterface({ input: this.input, terminal: false });
    rl.on("line", (line) => {
      const waiter = this.take();
      if (waiter) waiter.resolve(line);
      else this.lines.push(line);
    });
    rl.on("close", () => {
      this.ended = true;
      this.take()?.resolve(null);
    });
    rl.on("SIGINT", () => {
      this.take()?.reject(new InterruptedError());
    });
    this.piped = rl;
  }

  private take() {
    const waiter = this.waiter;
    this.waiter = undefined;
    return waiter;
  }
}

/** Replays canned answers; `null` entries and running out both read as EOF. */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  private readonly answers: Array<string | null>;

  constructor(answers: Array<string | null>) {
    this.answers = [...answers];
  }

  async ask(question: string): Promise<string | null> {
    this.questions.push(question);
    const next = this.answers.shift();
    return next === undefined ? null : next;
  }
}
