import pc from "picocolors";
import { z } from "zod";
import { CliError, StepValidationError, WorkflowParseError, errorMessage } from "./errors.js";
import { readText, resolvePath, writeText } from "./utils.js";
import type {
  ChatClient,
  StepAction,
  StepOutcome,
  Workflow,
  WorkflowActionName,
  WorkflowRunResult,
  WorkflowStep,
} from "../types/index.js";

// Only the envelope is validated up front; a bad step must not sink the file.
const WorkflowSchema = z.object({
  steps: z.array(z.unknown()),
});

const StepSchema = z.object({
  prompt: z.string().min(1),
  action: z.string().min(1),
  output_file: z.unknown(),
});

/** A step with prompt and action present; action not yet checked against the supported set */
export type RawStep = z.infer<typeof StepSchema>;

/**
 * Read and parse a workflow file
 */
export function loadWorkflow(filePath: string): Workflow {
  const text = readText(filePath, "Workflow file");

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new WorkflowParseError(`Workflow file ${filePath} is not valid JSON: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const parsed = WorkflowSchema.safeParse(data);
  if (!parsed.success) {
    throw new WorkflowParseError(`Workflow file ${filePath} must be an object with a "steps" array`);
  }
  return parsed.data;
}

/**
 * Validate one raw step. Throws StepValidationError when prompt or action is missing.
 */
export function parseStep(raw: unknown, index: number): RawStep {
  const parsed = StepSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StepValidationError(index, "Missing prompt or action");
  }
  return parsed.data;
}

const SUPPORTED_ACTIONS: readonly WorkflowActionName[] = ["print", "save"];

function isSupportedAction(action: string): action is WorkflowActionName {
  return SUPPORTED_ACTIONS.some((supported) => supported === action);
}

/**
 * Narrow a raw step to a WorkflowStep, or undefined when its action is not supported
 */
export function toWorkflowStep(step: RawStep): WorkflowStep | undefined {
  if (!isSupportedAction(step.action)) return undefined;
  const outputFile =
    typeof step.output_file === "string" && step.output_file.trim() !== "" ? step.output_file : undefined;
  return { prompt: step.prompt, action: step.action, output_file: outputFile };
}

/**
 * Map a step's action name onto the closed set of supported actions
 */
export function resolveAction(step: RawStep, index: number): StepAction {
  const supported = toWorkflowStep(step);
  if (!supported) {
    return { kind: "unsupported", action: step.action };
  }

  switch (supported.action) {
    case "print":
      return { kind: "print" };
    case "save":
      if (supported.output_file === undefined) {
        throw new StepValidationError(index, 'action "save" requires "output_file"');
      }
      return { kind: "save", outputFile: supported.output_file };
    default:
      return assertNever(supported.action);
  }
}

export interface RunWorkflowOptions {
  client: ChatClient;
  model?: string;
  /** Base directory for relative output_file paths (default: cwd) */
  root?: string;
}

/**
 * Execute workflow steps in order. A step that is malformed or whose
 * remote call fails is reported and skipped; the run always reaches the end.
 */
export async function runWorkflow(
  workflow: Workflow,
  options: RunWorkflowOptions
): Promise<WorkflowRunResult> {
  const outcomes: StepOutcome[] = [];

  for (const [i, raw] of workflow.steps.entries()) {
    outcomes.push(await runStep(raw, i + 1, options));
  }

  return { outcomes };
}

async function runStep(raw: unknown, index: number, options: RunWorkflowOptions): Promise<StepOutcome> {
  let step: RawStep;
  try {
    step = parseStep(raw, index);
  } catch (error) {
    if (!(error instanceof StepValidationError)) throw error;
    console.warn(pc.yellow(`⚠ ${error.message}`));
    return { index, status: "skipped", message: error.message };
  }

  // Resolved before the remote call: a step that cannot be dispatched sends no request.
  let action: StepAction;
  try {
    action = resolveAction(step, index);
  } catch (error) {
    if (!(error instanceof StepValidationError)) throw error;
    console.error(pc.red(`❌ ${error.message}`));
    return { index, status: "skipped", message: error.message };
  }

  if (action.kind === "unsupported") {
    const message = `Unsupported action: ${action.action}`;
    console.error(pc.red(`❌ ${message}`));
    return { index, status: "skipped", message };
  }

  let response: string;
  try {
    response = await options.client.send(step.prompt, options.model);
  } catch (error) {
    if (!(error instanceof CliError)) throw error;
    console.error(pc.red(`❌ Workflow step ${index} failed: ${error.message}`));
    return { index, status: "failed", message: error.message };
  }

  switch (action.kind) {
    case "print":
      console.log(pc.bold(pc.blue("Workflow Result")) + pc.dim(` (step ${index})`));
      console.log(response);
      return { index, status: "printed" };
    case "save":
      return saveResponse(action.outputFile, response, index, options.root);
    default:
      return assertNever(action);
  }
}

function saveResponse(target: string, response: string, index: number, root?: string): StepOutcome {
  const outputFile = resolvePath(target, root);
  try {
    writeText(outputFile, response);
  } catch (error) {
    const message = `Could not write ${outputFile}: ${errorMessage(error)}`;
    console.error(pc.red(`❌ Workflow step ${index} failed: ${message}`));
    return { index, status: "failed", message };
  }
  console.log(pc.green(`✅ Workflow step completed: Saved to ${outputFile}`));
  return { index, status: "saved", outputFile };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled step action: ${JSON.stringify(value)}`);
}
