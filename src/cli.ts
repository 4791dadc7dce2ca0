import chalk from "chalk";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { CompletionClient } from "./client.js";
import {
  CONFIG_PATH,
  loadConfig,
  requireApiKey,
  resetConfig,
  resolveConfig,
  type ConfigOverrides,
  type ResolvedConfig,
} from "./config.js";
import { ConfirmationGate } from "./confirm.js";
import { probeContext, type ShellContext } from "./context.js";
import { TempFileEditor, resolveEditor, type CommandEditor } from "./editor.js";
import { ConfigError, describeError, isSaysoError } from "./errors.js";
import { ShellExecutor, type CommandExecutor } from "./executor.js";
import { HandoffExecutor, handoffFileFrom } from "./handoff.js";
import { ConsoleLogger, isLogLevel, type Logger } from "./logger.js";
import { runPipeline } from "./pipeline.js";
import type { Prompter } from "./prompter.js";
import { createProvider, type ProviderOverrides } from "./providers/index.js";
import { runSetup } from "./setup.js";
import { detectWrapperShell, shellInitScript } from "./shellInit.js";

export const VERSION = "1.0.0";

export interface CliOptions {
  setup?: boolean;
  reset?: boolean;
  shellInit?: string | boolean;
  provider?: string;
  model?: string;
  timeout?: number;
  verbose?: boolean;
}

export interface CliDeps {
  env: NodeJS.ProcessEnv;
  prompter: Prompter;
  interactive: boolean;
  configPath?: string;
  print?: (text: string) => void;
  printError?: (text: string) => void;
  probe?: () => ShellContext;
  executor?: CommandExecutor;
  editor?: CommandEditor;
  providers?: ProviderOverrides;
  signal?: AbortSignal;
  logger?: Logger;
}

function parseTimeout(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError("Timeout must be a positive number of seconds.");
  }
  return Math.round(seconds * 1000);
}

function createLogger(options: CliOptions, env: NodeJS.ProcessEnv): Logger {
  if (options.verbose) return new ConsoleLogger({ level: "debug" });
  const level = env.SAYSO_LOG_LEVEL;
  return new ConsoleLogger({ level: isLogLevel(level) ? level : "warn" });
}

async function resolveWithSetup(
  deps: CliDeps,
  overrides: ConfigOverrides,
  print: (text: string) => void
): Promise<ResolvedConfig> {
  const path = deps.configPath ?? CONFIG_PATH;
  const resolved = resolveConfig(await loadConfig(path), deps.env, overrides);
  if (resolved.apiKey || !deps.interactive) return resolved;

  print(chalk.yellow("First-time setup required.\n"));
  const saved = await runSetup(deps.prompter, { path, print });
  if (!saved) {
    throw new ConfigError("Setup incomplete.");
  }
  return resolveConfig(saved, deps.env, overrides);
}

async function translate(
  request: string[],
  options: CliOptions,
  deps: CliDeps,
  logger: Logger,
  print: (text: string) => void
): Promise<number> {
  const config = requireApiKey(
    await resolveWithSetup(deps, { provider: options.provider, model: options.model }, print)
  );
  logger.debug("using provider", { provider: config.provider, model: config.model });

  const context = (deps.probe ?? probeContext)();
  const handoff = handoffFileFrom(deps.env);
  const executor =
    deps.executor ?? (handoff ? new HandoffExecutor(handoff) : new ShellExecutor(context.shellPath));
  const editor = deps.editor ?? new TempFileEditor(resolveEditor(deps.env), logger);

  const client = new CompletionClient(createProvider(config, deps.providers), {
    timeoutMs: options.timeout,
    logger,
  });

  const outcome = await runPipeline(request.join(" "), {
    client,
    gate: new ConfirmationGate(deps.prompter, editor, print),
    executor,
    logger,
    probe: () => context,
    signal: deps.signal,
  });
  return outcome.exitCode;
}

/**
 * Parses argv, dispatches flags, and runs the request pipeline.
 * Resolves with the process exit code; never calls process.exit itself.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const print = deps.print ?? ((text: string) => console.log(text));
  const printError = deps.printError ?? ((text: string) => console.error(text));
  let exitCode = 0;

  const program = new Command();
  program
    .name("sayso")
    .version(VERSION, "-V, --version")
    .description("sayso: natural language to shell commands, confirmed before they run.")
    .argument("[request...]", "What you want to do, in plain words.")
    .option("--setup", "configure provider, API key and model")
    .option("--reset", "remove stored configuration")
    .option("--shell-init [shell]", "print the shell wrapper (add to .bashrc/.zshrc)")
    .option("--provider <id>", "provider for this run (groq, digitalocean_gradient, gemini)")
    .option("--model <name>", "model for this run")
    .option("--timeout <seconds>", "request timeout in seconds", parseTimeout)
    .option("--verbose", "log pipeline details to stderr")
    // flags go first; everything from the first request word on is the request
    .passThroughOptions()
    .allowUnknownOption()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => print(text.trimEnd()),
      writeErr: (text) => printError(text.trimEnd()),
    })
    .action(async (request: string[], options: CliOptions) => {
      const logger = deps.logger ?? createLogger(options, deps.env);
      const path = deps.configPath ?? CONFIG_PATH;

      if (options.shellInit) {
        const requested = typeof options.shellInit === "string" ? options.shellInit : undefined;
        print(shellInitScript(detectWrapperShell(requested, deps.env)));
        return;
      }

      if (options.reset) {
        const removed = await resetConfig(path);
        print(
          removed
            ? `${chalk.green("✓ Configuration reset.")} Run \`sayso --setup\` to reconfigure.`
            : chalk.dim("No configuration found.")
        );
        return;
      }

      if (options.setup) {
        const saved = await runSetup(deps.prompter, { path, print });
        exitCode = saved ? 0 : 1;
        return;
      }

      if (!request.join("").trim()) {
        program.outputHelp();
        return;
      }

      exitCode = await translate(request, options, deps, logger, print);
    });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (isSaysoError(error)) {
      printError(chalk.red(`⚠ ${error.kind}: ${error.message}`));
      return error.exitCode;
    }
    printError(chalk.red(`⚠ ${describeError(error)}`));
    return 1;
  }
  return exitCode;
}
