import pc from "picocolors";
import { analyzePrompt } from "../core/prompts.js";
import { parseTable, renderTable } from "../core/table.js";
import { readText, resolvePath, writeText } from "../core/utils.js";
import type { CommandContext } from "../types/index.js";

/** Kept for compatibility; the analysis written there is free-form text */
export const DEFAULT_ANALYSIS_OUTPUT = "output.csv";

export interface AnalyzeDataCommandOptions {
  output?: string;
  delimiter?: string;
}

export async function analyzeDataCommand(
  dataFile: string,
  prompt: string,
  options: AnalyzeDataCommandOptions,
  ctx: CommandContext
): Promise<void> {
  const dataPath = resolvePath(dataFile);
  const table = parseTable(readText(dataPath), { delimiter: options.delimiter });

  console.log(pc.cyan("\n📊 Analyzing data...\n"));
  console.log(pc.dim(`  File:    ${dataFile}`));
  console.log(pc.dim(`  Columns: ${table.columns.length}`));
  console.log(pc.dim(`  Rows:    ${table.rows.length}`));

  const response = await ctx.client.send(analyzePrompt(prompt, renderTable(table)), ctx.defaultModel);

  const outputPath = resolvePath(options.output ?? DEFAULT_ANALYSIS_OUTPUT);
  writeText(outputPath, response);

  console.log(pc.green(`\n✅ Analysis completed and saved to ${outputPath}`));
}
