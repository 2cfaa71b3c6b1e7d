import pc from "picocolors";
import { editPrompt } from "../core/prompts.js";
import { readText, resolvePath, writeText } from "../core/utils.js";
import type { CommandContext } from "../types/index.js";

export interface EditFileCommandOptions {
  output?: string;
}

export async function editFileCommand(
  filename: string,
  prompt: string,
  options: EditFileCommandOptions,
  ctx: CommandContext
): Promise<void> {
  const inputPath = resolvePath(filename);
  const content = readText(inputPath);

  console.log(pc.cyan(`\n✏️  Editing ${filename}...\n`));

  const response = await ctx.client.send(editPrompt(prompt, content), ctx.defaultModel);

  const outputPath = options.output ? resolvePath(options.output) : inputPath;
  writeText(outputPath, response);

  console.log(pc.green(`✅ File edited and saved to ${outputPath}`));
}
