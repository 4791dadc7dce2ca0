#!/usr/bin/env node

import * as dotenv from "dotenv";
import { runCli } from "./cli.js";
import { ReadlinePrompter } from "./prompter.js";

dotenv.config();

async function main(): Promise<number> {
  // Ctrl-C aborts an in-flight request; a running child gets the signal
  // from the terminal itself and we report its exit status.
  const controller = new AbortController();
  process.on("SIGINT", () => controller.abort());

  const prompter = new ReadlinePrompter();
  try {
    return await runCli(process.argv, {
      env: process.env,
      prompter,
      interactive: Boolean(process.stdin.isTTY),
      signal: controller.signal,
    });
  } finally {
    prompter.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  })
  .finally(() => {
    process.removeAllListeners("SIGINT");
  });
