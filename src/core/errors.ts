/**
 * Error taxonomy. Every error a command can raise on purpose extends CliError,
 * which the dispatcher renders as a one-line message.
 */
export class CliError extends Error {
  readonly exitCode: number;

  constructor(message: string, options?: { cause?: unknown; exitCode?: number }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.exitCode = options?.exitCode ?? 1;
  }
}

/** Missing or invalid environment configuration */
export class ConfigError extends CliError {}

/** A required input file does not exist */
export class NotFoundError extends CliError {
  readonly path: string;

  constructor(path: string, what = "File") {
    super(`${what} ${path} does not exist`);
    this.path = path;
  }
}

/** Tabular input could not be parsed */
export class DataFormatError extends CliError {}

/** Workflow file is not valid JSON or lacks a steps array */
export class WorkflowParseError extends CliError {}

/** A single workflow step is malformed; the run continues without it */
export class StepValidationError extends CliError {
  readonly step: number;

  constructor(step: number, message: string) {
    super(`Invalid workflow step ${step}: ${message}`);
    this.step = step;
  }
}

export type RemoteFailureReason =
  | "network"
  | "timeout"
  | "auth"
  | "rate-limit"
  | "http"
  | "invalid-response";

/** The chat endpoint could not be reached or rejected the request */
export class RemoteCallError extends CliError {
  readonly reason: RemoteFailureReason;
  readonly status?: number;

  constructor(
    reason: RemoteFailureReason,
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super(`API Error: ${message}`, { cause: options?.cause });
    this.reason = reason;
    this.status = options?.status;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
