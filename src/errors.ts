/**
 * Error taxonomy for a single sayso run. Every failure is terminal: the CLI
 * prints `kind` and `message`, then exits with `exitCode`.
 */

export type ErrorKind =
  | "NetworkError"
  | "ProviderError"
  | "ParseError"
  | "EmptyResponseError"
  | "ExecutionError"
  | "ConfigError"
  | "InterruptedError";

export const EXIT_CODES: Record<ErrorKind, number> = {
  ParseError: 65,
  EmptyResponseError: 66,
  NetworkError: 69,
  ExecutionError: 71,
  ProviderError: 76,
  ConfigError: 78,
  InterruptedError: 130,
};

export class SaysoError extends Error {
  public readonly kind: ErrorKind;
  public readonly exitCode: number;
  public readonly details?: unknown;

  constructor(kind: ErrorKind, message: string, details?: unknown) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.exitCode = EXIT_CODES[kind];
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      kind: this.kind,
      message: this.message,
      exitCode: this.exitCode,
      details: this.details,
    };
  }
}

// connectivity failure or request timeout
export class NetworkError extends SaysoError {
  constructor(message: string, details?: unknown) {
    super("NetworkError", message, details);
  }
}

export class ProviderError extends SaysoError {
  public readonly status: number;
  public readonly body: string;

  constructor(message: string, status: number, body = "") {
    super("ProviderError", message, { status, body });
    this.status = status;
    this.body = body;
  }
}

export class ParseError extends SaysoError {
  constructor(message: string, details?: unknown) {
    super("ParseError", message, details);
  }
}

export class EmptyResponseError extends SaysoError {
  constructor(
    message = "Empty response from the model. Try rephrasing your request."
  ) {
    super("EmptyResponseError", message);
  }
}

export class ExecutionError extends SaysoError {
  public readonly command: string;

  constructor(message: string, command: string, details?: unknown) {
    super("ExecutionError", message, details);
    this.command = command;
  }
}

export class ConfigError extends SaysoError {
  constructor(message: string, details?: unknown) {
    super("ConfigError", message, details);
  }
}

export class InterruptedError extends SaysoError {
  constructor(message = "Interrupted.") {
    super("InterruptedError", message);
  }
}

export function isSaysoError(error: unknown): error is SaysoError {
  return error instanceof SaysoError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
