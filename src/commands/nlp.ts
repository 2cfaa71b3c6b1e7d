import pc from "picocolors";
import { nlpPrompt } from "../core/prompts.js";
import type { CommandContext } from "../types/index.js";

export async function nlpCommand(text: string, task: string, ctx: CommandContext): Promise<void> {
  const response = await ctx.client.send(nlpPrompt(task, text), ctx.defaultModel);

  console.log(`${pc.bold(pc.blue("NLP Result"))} ${pc.dim(`(${task})`)}`);
  console.log(response);
}
