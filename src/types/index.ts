/**
 * Core type definitions for grok-cli
 */

// =============================================================================
// Configuration
// =============================================================================

export interface CliConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

// =============================================================================
// Remote Chat
// =============================================================================

export interface ChatClient {
  /** Send a prompt and resolve with the model's text response */
  send(prompt: string, model?: string): Promise<string>;
}

/**
 * Everything a command needs from the outside world.
 * Built once by the entry point and handed to each command.
 */
export interface CommandContext {
  client: ChatClient;
  defaultModel: string;
}

// =============================================================================
// Workflow Types
// =============================================================================

export type WorkflowActionName = "print" | "save";

/** Step as it appears in a workflow file */
export interface WorkflowStep {
  prompt: string;
  action: WorkflowActionName;
  /** Required when action is "save" */
  output_file?: string;
}

export interface Workflow {
  /** Raw steps; each one is validated when the runner reaches it */
  steps: unknown[];
}

export type StepAction =
  | { kind: "print" }
  | { kind: "save"; outputFile: string }
  | { kind: "unsupported"; action: string };

export type StepStatus = "printed" | "saved" | "skipped" | "failed";

export interface StepOutcome {
  /** 1-based position in the workflow */
  index: number;
  status: StepStatus;
  message?: string;
  outputFile?: string;
}

export interface WorkflowRunResult {
  outcomes: StepOutcome[];
}

// =============================================================================
// Tabular Data
// =============================================================================

export interface DataTable {
  columns: string[];
  rows: string[][];
}
