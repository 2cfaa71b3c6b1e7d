/**
 * grok-cli - programmatic API
 *
 * @example
 * ```ts
 * import { XaiChatClient, loadConfig, loadWorkflow, runWorkflow } from 'grok-cli';
 *
 * const config = loadConfig();
 * const client = new XaiChatClient({ ...config, spinner: false });
 *
 * const workflow = loadWorkflow('workflow.json');
 * const { outcomes } = await runWorkflow(workflow, { client });
 * ```
 */

// Types
export * from "./types/index.js";

// Core - Errors
export {
  CliError,
  ConfigError,
  NotFoundError,
  DataFormatError,
  WorkflowParseError,
  StepValidationError,
  RemoteCallError,
  type RemoteFailureReason,
} from "./core/errors.js";

// Core - Config
export { loadConfig, loadApiKey, DEFAULT_BASE_URL, DEFAULT_MODEL, DEFAULT_TIMEOUT_MS } from "./core/config.js";

// Core - Remote client
export { XaiChatClient, extractResponseText, NO_RESPONSE, type XaiChatClientOptions } from "./core/client.js";

// Core - Workflow
export {
  loadWorkflow,
  parseStep,
  resolveAction,
  runWorkflow,
  toWorkflowStep,
  type RawStep,
  type RunWorkflowOptions,
} from "./core/workflow.js";

// Core - Tables
export { parseTable, renderTable } from "./core/table.js";

// Core - Utilities
export { exists, readText, writeText, ensureDir, resolvePath } from "./core/utils.js";

// Commands
export { createProgram } from "./program.js";
