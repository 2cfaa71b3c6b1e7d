import pc from "picocolors";
import { loadWorkflow, runWorkflow } from "../core/workflow.js";
import { resolvePath } from "../core/utils.js";
import type { CommandContext, WorkflowRunResult } from "../types/index.js";

export async function automateWorkflowCommand(
  workflowFile: string,
  ctx: CommandContext
): Promise<WorkflowRunResult> {
  const workflow = loadWorkflow(resolvePath(workflowFile));

  console.log(pc.cyan(`\n⚙️  Running workflow ${workflowFile}...`));
  console.log(pc.dim(`  Steps: ${workflow.steps.length}\n`));

  return runWorkflow(workflow, { client: ctx.client, model: ctx.defaultModel });
}
