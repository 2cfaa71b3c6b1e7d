import { describe, it, expect, vi, afterEach } from "vitest";
import { XaiChatClient, extractResponseText, NO_RESPONSE } from "./client.js";
import { RemoteCallError } from "./errors.js";

function createClient(): XaiChatClient {
  return new XaiChatClient({
    apiKey: "test-secret",
    baseUrl: "http://localhost:9999/v1",
    model: "grok-test",
    timeoutMs: 1000,
    spinner: false,
  });
}

function stubFetch(impl: (url: string, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("XaiChatClient", () => {
  it("posts prompt and model to the chat endpoint", async () => {
    const fetchMock = stubFetch(async () => jsonResponse({ response: "Hello there" }));

    const text = await createClient().send("Hi", "grok-other");

    expect(text).toBe("Hello there");
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://localhost:9999/v1/chat");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      Authorization: "Bearer test-secret",
      "Content-Type": "application/json",
    });
    expect(JSON.parse(String(init?.body))).toEqual({ prompt: "Hi", model: "grok-other" });
  });

  it("uses the configured model by default", async () => {
    const fetchMock = stubFetch(async () => jsonResponse({ response: "ok" }));

    await createClient().send("Hi");

    const [, init] = fetchMock.mock.calls[0];
    expect(JSON.parse(String(init?.body))).toEqual({ prompt: "Hi", model: "grok-test" });
  });

  it("falls back to a placeholder when the body has no response field", async () => {
    stubFetch(async () => jsonResponse({ choices: [] }));

    await expect(createClient().send("Hi")).resolves.toBe(NO_RESPONSE);
  });

  it("maps 401 to an auth failure", async () => {
    stubFetch(async () => new Response("nope", { status: 401, statusText: "Unauthorized" }));

    await expect(createClient().send("Hi")).rejects.toMatchObject({
      name: "RemoteCallError",
      reason: "auth",
      status: 401,
      message: "API Error: authentication failed (401 Unauthorized)",
    });
  });

  it("maps 429 to a rate-limit failure", async () => {
    stubFetch(async () => new Response("slow down", { status: 429, statusText: "Too Many Requests" }));

    await expect(createClient().send("Hi")).rejects.toMatchObject({ reason: "rate-limit", status: 429 });
  });

  it("maps other non-2xx statuses to an http failure", async () => {
    stubFetch(async () => new Response("boom", { status: 500, statusText: "Internal Server Error" }));

    await expect(createClient().send("Hi")).rejects.toMatchObject({ reason: "http", status: 500 });
  });

  it("wraps network errors", async () => {
    stubFetch(async () => {
      throw new TypeError("fetch failed");
    });

    const error = await createClient().send("Hi").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RemoteCallError);
    expect(error).toMatchObject({ reason: "network", message: "API Error: fetch failed" });
  });

  it("reports a timeout", async () => {
    stubFetch(async () => {
      throw Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
    });

    await expect(createClient().send("Hi")).rejects.toMatchObject({
      reason: "timeout",
      message: "API Error: request timed out after 1000ms",
    });
  });

  it("rejects a body that is not JSON", async () => {
    stubFetch(async () => new Response("<html>", { status: 200 }));

    await expect(createClient().send("Hi")).rejects.toMatchObject({ reason: "invalid-response" });
  });
});

describe("extractResponseText", () => {
  it("returns the response string", () => {
    expect(extractResponseText({ response: "text" })).toBe("text");
  });

  it("ignores non-string responses", () => {
    expect(extractResponseText({ response: 42 })).toBe(NO_RESPONSE);
    expect(extractResponseText(null)).toBe(NO_RESPONSE);
    expect(extractResponseText("text")).toBe(NO_RESPONSE);
  });
});
