import { PassThrough } from "stream";
import { describe, it, expect } from "vitest";
import { ReadlinePrompter, ScriptedPrompter } from "./prompter.js";

describe("ReadlinePrompter", () => {
  it("resolves with the typed line", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const pending = new ReadlinePrompter(input, output).ask("Run? ");
    input.write("yes\n");
    await expect(pending).resolves.toBe("yes");
  });

  it("resolves null when input ends", async () => {
    const input = new PassThrough();
    const pending = new ReadlinePrompter(input, new PassThrough()).ask("Run? ");
    input.end();
    await expect(pending).resolves.toBeNull();
  });

  it("keeps lines piped in together for the questions that follow", async () => {
    const input = new PassThrough();
    const prompter = new ReadlinePrompter(input, new PassThrough());
    const first = prompter.ask("Action? ");
    input.write("maybe\ny\n");
    await expect(first).resolves.toBe("maybe");
    await expect(prompter.ask("Action? ")).resolves.toBe("y");

    const third = prompter.ask("Action? ");
    input.end();
    await expect(third).resolves.toBeNull();
  });

  it("writes the question before reading piped input", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const prompter = new ReadlinePrompter(input, output);
    const pending = prompter.ask("Run? ");
    input.write("n\n");
    await pending;
    prompter.close();
    expect(String(output.read())).toBe("Run? ");
  });
});

describe("ScriptedPrompter", () => {
  it("replays answers and then reports EOF", async () => {
    const prompter = new ScriptedPrompter(["y"]);
    await expect(prompter.ask("first")).resolves.toBe("y");
    await expect(prompter.ask("second")).resolves.toBeNull();
    expect(prompter.questions).toEqual(["first", "second"]);
  });
});
