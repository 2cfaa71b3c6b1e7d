import { Command } from "commander";
import pc from "picocolors";
import { chatCommand } from "./commands/chat.js";
import { editFileCommand } from "./commands/edit-file.js";
import { createFileCommand } from "./commands/create-file.js";
import { analyzeDataCommand, DEFAULT_ANALYSIS_OUTPUT } from "./commands/analyze-data.js";
import { nlpCommand } from "./commands/nlp.js";
import { automateWorkflowCommand } from "./commands/automate-workflow.js";
import { CliError, errorMessage } from "./core/errors.js";
import type { CommandContext } from "./types/index.js";

export const VERSION = "0.1.0";

/**
 * Render a thrown error as one line on stderr and flag the process as failed
 */
export function reportError(error: unknown): void {
  if (error instanceof CliError) {
    console.error(pc.red(`\n❌ ${error.message}`));
    process.exitCode = error.exitCode;
    return;
  }
  console.error(pc.red(`\n❌ Unexpected error: ${errorMessage(error)}`));
  process.exitCode = 1;
}

function guarded<A extends unknown[]>(action: (...args: A) => Promise<unknown>) {
  return async (...args: A): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      reportError(error);
    }
  };
}

export function createProgram(ctx: CommandContext): Command {
  const program = new Command();

  program
    .name("grok-cli")
    .description("Grok 4 CLI - chat, edit files, analyze data and run prompt workflows")
    .version(VERSION);

  // grok-cli chat
  program
    .command("chat")
    .description("Send a prompt to Grok 4, or start an interactive session when none is given")
    .argument("[prompt]", "Prompt text")
    .option("-m, --model <model>", `Model to use (default: ${ctx.defaultModel})`)
    .action(
      guarded((prompt: string | undefined, opts: { model?: string }) => chatCommand(prompt, opts, ctx))
    );

  // grok-cli edit-file
  program
    .command("edit-file")
    .description("Read a file, apply Grok 4 edits based on a prompt, and save the result")
    .argument("<filename>", "File to edit")
    .argument("<prompt>", "Edit instructions")
    .option("-o, --output <file>", "Output file (default: overwrite the input file)")
    .action(
      guarded((filename: string, prompt: string, opts: { output?: string }) =>
        editFileCommand(filename, prompt, opts, ctx)
      )
    );

  // grok-cli create-file
  program
    .command("create-file")
    .description("Create a file with the given content")
    .argument("<filename>", "File to create")
    .argument("<content>", "Content to write")
    .action(guarded((filename: string, content: string) => createFileCommand(filename, content)));

  // grok-cli analyze-data
  program
    .command("analyze-data")
    .description("Analyze a CSV file with Grok 4")
    .argument("<data_file>", "Delimited data file")
    .argument("<prompt>", "Analysis instructions")
    .option("-o, --output <file>", "Output file for the analysis", DEFAULT_ANALYSIS_OUTPUT)
    .option("-d, --delimiter <char>", "Field delimiter", ",")
    .action(
      guarded((dataFile: string, prompt: string, opts: { output?: string; delimiter?: string }) =>
        analyzeDataCommand(dataFile, prompt, opts, ctx)
      )
    );

  // grok-cli nlp
  program
    .command("nlp")
    .description("Run an NLP task (e.g. sentiment analysis, entity recognition) on a text")
    .argument("<text>", "Input text")
    .argument("<task>", "Task name")
    .action(guarded((text: string, task: string) => nlpCommand(text, task, ctx)));

  // grok-cli automate-workflow
  program
    .command("automate-workflow")
    .description("Execute the steps of a JSON workflow file")
    .argument("<workflow_file>", "Workflow JSON file")
    .action(guarded((workflowFile: string) => automateWorkflowCommand(workflowFile, ctx)));

  return program;
}
