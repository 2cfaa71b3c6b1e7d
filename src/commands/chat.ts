import pc from "picocolors";
import { input } from "@inquirer/prompts";
import { CliError } from "../core/errors.js";
import type { CommandContext } from "../types/index.js";

export interface ChatCommandOptions {
  model?: string;
}

function printReply(response: string): void {
  console.log(`${pc.bold(pc.blue("Grok"))}: ${response}`);
}

export async function chatCommand(
  prompt: string | undefined,
  options: ChatCommandOptions,
  ctx: CommandContext
): Promise<void> {
  const model = options.model ?? ctx.defaultModel;

  if (prompt !== undefined) {
    printReply(await ctx.client.send(prompt, model));
    return;
  }

  await interactiveChat(model, ctx);
}

async function interactiveChat(model: string, ctx: CommandContext): Promise<void> {
  console.log(pc.cyan("\n💬 Grok 4 Interactive Chat\n"));
  console.log(pc.dim(`  Model: ${model}`));
  console.log(pc.dim("  Type your message and press Enter. Type 'exit' to quit.\n"));

  for (;;) {
    let message: string;
    try {
      message = await input({ message: pc.green("You") });
    } catch (error) {
      // Ctrl+C closes the prompt
      if (error instanceof Error && error.name === "ExitPromptError") break;
      throw error;
    }

    if (message.trim().toLowerCase() === "exit") break;
    if (message.trim() === "") continue;

    try {
      printReply(await ctx.client.send(message, model));
    } catch (error) {
      if (!(error instanceof CliError)) throw error;
      console.error(pc.red(`❌ ${error.message}`));
    }
  }

  console.log(pc.cyan("Goodbye!"));
}
