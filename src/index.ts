export { runCli, VERSION, type CliDeps, type CliOptions } from "./cli.js";
export {
  CompletionClient,
  cleanCommand,
  type CompletionClientOptions,
  type CompletionResult,
} from "./client.js";
export {
  CONFIG_PATH,
  loadConfig,
  resetConfig,
  resolveConfig,
  requireApiKey,
  saveConfig,
  type ResolvedConfig,
  type StoredConfig,
} from "./config.js";
export { ConfirmationGate, interpretAnswer, type Confirmation, type Gate } from "./confirm.js";
export { createRequest, probeContext, type Request, type ShellContext } from "./context.js";
export { TempFileEditor, type CommandEditor } from "./editor.js";
export * from "./errors.js";
export { ShellExecutor, type CommandExecutor } from "./executor.js";
export { HandoffExecutor } from "./handoff.js";
export { ConsoleLogger, type Logger, type LogLevel } from "./logger.js";
export { runPipeline, type ExecutionOutcome, type PipelineStage } from "./pipeline.js";
export { buildMessages, type ChatMessage } from "./prompt.js";
export { ReadlinePrompter, ScriptedPrompter, type Prompter } from "./prompter.js";
export * from "./providers/index.js";
export { runSetup } from "./setup.js";
export { shellInitScript } from "./shellInit.js";
