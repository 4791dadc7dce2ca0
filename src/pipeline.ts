import type { CompletionClient } from "./client.js";
import type { Gate } from "./confirm.js";
import { createRequest, probeContext, type ShellContext } from "./context.js";
import { isSaysoError } from "./errors.js";
import type { CommandExecutor } from "./executor.js";
import type { Logger } from "./logger.js";
import { buildMessages } from "./prompt.js";

export type PipelineStage =
  | "Start"
  | "ContextGathered"
  | "PromptBuilt"
  | "AwaitingCompletion"
  | "CommandReceived"
  | "AwaitingConfirmation"
  | "Executing"
  | "Declined"
  | "Done"
  | "Failed";

export interface ExecutionOutcome {
  exitCode: number;
  ran: boolean;
  command?: string;
  // set when the shell wrapper, not sayso, runs the command
  handedOff?: boolean;
}

export interface PipelineDeps {
  client: Pick<CompletionClient, "complete">;
  gate: Gate;
  executor: CommandExecutor;
  logger: Logger;
  probe?: () => ShellContext;
  signal?: AbortSignal;
  onStage?: (stage: PipelineStage) => void;
}

/**
 * Request in, exit code out: probe the environment, ask the model for a
 * command, confirm it with the user, and run it only when approved.
 */
export async function runPipeline(userText: string, deps: PipelineDeps): Promise<ExecutionOutcome> {
  const { client, gate, executor, logger } = deps;
  const enter = (stage: PipelineStage) => {
    logger.debug(`stage: ${stage}`);
    deps.onStage?.(stage);
  };

  enter("Start");
  try {
    const context = (deps.probe ?? probeContext)();
    const request = createRequest(userText, context);
    enter("ContextGathered");

    const messages = buildMessages(request);
    enter("PromptBuilt");

    enter("AwaitingCompletion");
    const { commandText } = await client.complete(messages, deps.signal);
    enter("CommandReceived");

    enter("AwaitingConfirmation");
    const { approved, command } = await gate.confirm(commandText);
    if (!approved) {
      enter("Declined");
      enter("Done");
      return { exitCode: 0, ran: false, command };
    }

    enter("Executing");
    const exitCode = await executor.run(command);
    enter("Done");
    if (executor.handsOff) {
      logger.debug("command handed to the shell wrapper");
      return { exitCode, ran: true, command, handedOff: true };
    }
    logger.debug("command finished", { exitCode });
    return { exitCode, ran: true, command };
  } catch (error) {
    enter("Failed");
    if (isSaysoError(error)) {
      logger.debug(`failed: ${error.kind}`, error.details);
    }
    throw error;
  }
}
