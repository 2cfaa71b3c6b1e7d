import ora from "ora";
import { RemoteCallError, errorMessage } from "./errors.js";
import type { ChatClient, CliConfig } from "../types/index.js";

export const NO_RESPONSE = "No response received";

export interface XaiChatClientOptions extends CliConfig {
  /** Show a spinner on stderr while a request is in flight (default: true) */
  spinner?: boolean;
}

/**
 * HTTP client for the xAI chat endpoint.
 *
 * One POST per call, never retried. Every failure is reported as a
 * RemoteCallError so callers never see a raw fetch exception.
 */
export class XaiChatClient implements ChatClient {
  private readonly options: XaiChatClientOptions;

  constructor(options: XaiChatClientOptions) {
    this.options = options;
  }

  async send(prompt: string, model: string = this.options.model): Promise<string> {
    const spinner =
      this.options.spinner === false
        ? undefined
        : ora({ text: "Processing with Grok 4...", stream: process.stderr }).start();

    try {
      return await this.post(prompt, model);
    } finally {
      spinner?.stop();
    }
  }

  private async post(prompt: string, model: string): Promise<string> {
    let response: Response;
    try {
      response = await fetch(`${this.options.baseUrl}/chat`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ prompt, model }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      if (isAbort(error)) {
        throw new RemoteCallError("timeout", `request timed out after ${this.options.timeoutMs}ms`, {
          cause: error,
        });
      }
      throw new RemoteCallError("network", errorMessage(error), { cause: error });
    }

    if (!response.ok) {
      const detail = `${response.status} ${response.statusText}`.trim();
      if (response.status === 401 || response.status === 403) {
        throw new RemoteCallError("auth", `authentication failed (${detail})`, {
          status: response.status,
        });
      }
      if (response.status === 429) {
        throw new RemoteCallError("rate-limit", `rate limit exceeded (${detail})`, {
          status: response.status,
        });
      }
      throw new RemoteCallError("http", `request failed (${detail})`, { status: response.status });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new RemoteCallError("invalid-response", "response body is not valid JSON", {
        status: response.status,
        cause: error,
      });
    }

    return extractResponseText(body);
  }
}

/**
 * Pull the text out of a chat response body
 */
export function extractResponseText(body: unknown): string {
  if (typeof body === "object" && body !== null && "response" in body) {
    const text = body.response;
    if (typeof text === "string") return text;
  }
  return NO_RESPONSE;
}

function isAbort(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("name" in error)) return false;
  return error.name === "TimeoutError" || error.name === "AbortError";
}
