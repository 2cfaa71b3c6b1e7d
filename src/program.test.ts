import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { createProgram, reportError } from "./program.js";
import { ConfigError } from "./core/errors.js";
import type { CommandContext } from "./types/index.js";

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "grok-cli-program-"));
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
  process.exitCode = undefined;
});

function createContext() {
  const send = vi.fn(async (prompt: string) => `echo: ${prompt}`);
  const ctx: CommandContext = { client: { send }, defaultModel: "grok-test" };
  return { ctx, send };
}

async function run(ctx: CommandContext, ...args: string[]): Promise<void> {
  await createProgram(ctx).exitOverride().parseAsync(args, { from: "user" });
}

describe("createProgram", () => {
  it("create-file never reaches the client", async () => {
    const { ctx, send } = createContext();
    const file = path.join(tmpDir, "a.txt");

    await run(ctx, "create-file", file, "hello");

    expect(fs.readFileSync(file, "utf-8")).toBe("hello");
    expect(send).not.toHaveBeenCalled();
    expect(process.exitCode).toBeUndefined();
  });

  it("dispatches chat with its --model option", async () => {
    const { ctx, send } = createContext();

    await run(ctx, "chat", "hi there", "--model", "grok-mini");

    expect(send).toHaveBeenCalledWith("hi there", "grok-mini");
  });

  it("dispatches nlp with text and task", async () => {
    const { ctx, send } = createContext();

    await run(ctx, "nlp", "great product", "sentiment analysis");

    expect(send).toHaveBeenCalledWith("Perform NLP task: sentiment analysis\n\nText: great product", "grok-test");
  });

  it("renders a missing file as a message and a failing exit code", async () => {
    const { ctx, send } = createContext();
    const missing = path.join(tmpDir, "missing.txt");

    await run(ctx, "edit-file", missing, "fix it");

    expect(send).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
    expect(vi.mocked(console.error).mock.calls[0][0]).toContain(`File ${missing} does not exist`);
  });

  it("passes the analyze-data delimiter through", async () => {
    const { ctx, send } = createContext();
    const data = path.join(tmpDir, "data.csv");
    const output = path.join(tmpDir, "report.txt");
    fs.writeFileSync(data, "x;y\n1;2\n");

    await run(ctx, "analyze-data", data, "sum", "--delimiter", ";", "--output", output);

    expect(send).toHaveBeenCalledWith("Analyze this data: sum\n\nData:\n   x  y\n0  1  2", "grok-test");
    expect(fs.readFileSync(output, "utf-8")).toBe("echo: Analyze this data: sum\n\nData:\n   x  y\n0  1  2");
  });
});

describe("reportError", () => {
  it("prints CLI errors as a single line", () => {
    reportError(new ConfigError("missing API key: set XAI_API_KEY in the environment or a .env file"));

    expect(vi.mocked(console.error).mock.calls[0][0]).toContain(
      "❌ missing API key: set XAI_API_KEY in the environment or a .env file"
    );
    expect(process.exitCode).toBe(1);
  });

  it("does not leak anything but the message of an unexpected error", () => {
    reportError(new TypeError("boom"));

    expect(vi.mocked(console.error).mock.calls[0][0]).toContain("❌ Unexpected error: boom");
  });
});
