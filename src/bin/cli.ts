#!/usr/bin/env node
import dotenv from "dotenv";
import { loadConfig } from "../core/config.js";
import { XaiChatClient } from "../core/client.js";
import { createProgram, reportError } from "../program.js";

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const client = new XaiChatClient({ ...config, spinner: Boolean(process.stderr.isTTY) });

  await createProgram({ client, defaultModel: config.model }).parseAsync();
}

main().catch(reportError);
