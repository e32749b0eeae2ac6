/**
 * Generator adapter tests against an in-process HTTP server.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createServer, type IncomingHttpHeaders, type Server } from "node:http";
import { createGenerator, OllamaAdapter, OpenAICompatAdapter, RetryingGenerator, Backoff } from "../adapters/index.js";
import { calculateTimeout, estimateTokens } from "../adapters/base.js";
import { ConfigSchema } from "../config.js";
import {
  GenerationConnectionError,
  GenerationTimeoutError,
  MalformedResponseError,
} from "../errors.js";
import { ScriptedGenerator } from "./helpers.js";

interface Recorded {
  method: string;
  url: string;
  headers: IncomingHttpHeaders;
  body: unknown;
}

interface Reply {
  status: number;
  body: string;
  /** Leave the request hanging */
  hang?: boolean;
}

let server: Server;
let baseUrl: string;
let requests: Recorded[];
let reply: (url: string) => Reply;

beforeEach(async () => {
  requests = [];
  reply = () => ({ status: 200, body: "{}" });
  server = createServer((req, res) => {
    let data = "";
    req.setEncoding("utf-8");
    req.on("data", (chunk: string) => (data += chunk));
    req.on("end", () => {
      const body: unknown = data ? JSON.parse(data) : undefined;
      requests.push({ method: req.method ?? "", url: req.url ?? "", headers: req.headers, body });
      const r = reply(req.url ?? "");
      if (r.hang) return;
      res.writeHead(r.status, { "Content-Type": "application/json" });
      res.end(r.body);
    });
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server has no port");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

const opts = { maxOutputTokens: 64, temperature: 0.5 };

describe("OllamaAdapter", () => {
  function ollama(model = "llama3") {
    return new OllamaAdapter({ model, endpoint: baseUrl + "/", timeoutMs: 0 });
  }

  it("posts to /api/generate and reads token counts", async () => {
    reply = () => ({ status: 200, body: JSON.stringify({ response: "  Hello there. ", prompt_eval_count: 12, eval_count: 5 }) });
    const result = await ollama().generate("Hi", opts);

    expect(result.text).toBe("Hello there.");
    expect(result.usage).toEqual({ inputTokens: 12, outputTokens: 5 });
    expect(requests[0].method).toBe("POST");
    expect(requests[0].url).toBe("/api/generate");
    expect(requests[0].body).toEqual({
      model: "llama3",
      prompt: "Hi",
      stream: false,
      options: { temperature: 0.5, num_predict: 64 },
    });
  });

  it("forwards the system prompt and stop sequences", async () => {
    reply = () => ({ status: 200, body: JSON.stringify({ response: "ok" }) });
    const result = await ollama().generate("Hi", { ...opts, systemPrompt: "Be brief.", stop: ["\n\n"] });

    expect(result.usage).toBeUndefined();
    expect(requests[0].body).toMatchObject({ system: "Be brief.", options: { stop: ["\n\n"] } });
  });

  it("raises a retryable connection error on 5xx", async () => {
    reply = () => ({ status: 500, body: '{"error":"boom"}' });
    const err = await ollama().generate("Hi", opts).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(GenerationConnectionError);
    expect(err).toHaveProperty("message", 'ollama:llama3 API error 500: {"error":"boom"}');
    expect(err).toHaveProperty("status", 500);
    expect(err).toHaveProperty("retryable", true);
  });

  it("raises MalformedResponseError on a bad body", async () => {
    reply = () => ({ status: 200, body: "not json" });
    await expect(ollama().generate("Hi", opts)).rejects.toBeInstanceOf(MalformedResponseError);

    reply = () => ({ status: 200, body: JSON.stringify({ text: "wrong field" }) });
    await expect(ollama().generate("Hi", opts)).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it("times out", async () => {
    reply = () => ({ status: 200, body: "", hang: true });
    await expect(ollama().generate("Hi", { ...opts, timeoutMs: 50 })).rejects.toBeInstanceOf(GenerationTimeoutError);
  });

  it("checks the model list for availability", async () => {
    reply = () => ({ status: 200, body: JSON.stringify({ models: [{ name: "llama3:latest" }] }) });
    expect(await ollama().isAvailable()).toBe(true);
    expect(await ollama("mistral").isAvailable()).toBe(false);
    expect(requests[0].url).toBe("/api/tags");

    reply = () => ({ status: 500, body: "" });
    expect(await ollama().isAvailable()).toBe(false);
  });
});

describe("OpenAICompatAdapter", () => {
  function openai(apiKey?: string) {
    return new OpenAICompatAdapter({ model: "gpt-test", endpoint: baseUrl, apiKey, timeoutMs: 0 });
  }

  it("posts chat messages with a bearer token", async () => {
    reply = () => ({
      status: 200,
      body: JSON.stringify({
        choices: [{ message: { role: "assistant", content: " Sure. " } }],
        usage: { prompt_tokens: 7, completion_tokens: 3 },
      }),
    });
    const result = await openai("test-secret").generate("Hi", { ...opts, systemPrompt: "Be brief." });

    expect(result.text).toBe("Sure.");
    expect(result.usage).toEqual({ inputTokens: 7, outputTokens: 3 });
    expect(requests[0].url).toBe("/v1/chat/completions");
    expect(requests[0].headers.authorization).toBe("Bearer test-secret");
    expect(requests[0].body).toEqual({
      model: "gpt-test",
      messages: [
        { role: "system", content: "Be brief." },
        { role: "user", content: "Hi" },
      ],
      max_tokens: 64,
      temperature: 0.5,
      stream: false,
    });
  });

  it("returns empty text for a null message", async () => {
    reply = () => ({ status: 200, body: JSON.stringify({ choices: [{ message: { content: null } }] }) });
    const result = await openai().generate("Hi", opts);
    expect(result.text).toBe("");
    expect(requests[0].headers.authorization).toBeUndefined();
  });

  it("rejects a reply without choices", async () => {
    reply = () => ({ status: 200, body: JSON.stringify({ choices: [] }) });
    await expect(openai().generate("Hi", opts)).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it("does not mark client errors retryable", async () => {
    reply = () => ({ status: 401, body: "unauthorized" });
    const err = await openai().generate("Hi", opts).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(GenerationConnectionError);
    expect(err).toHaveProperty("retryable", false);
  });

  it("assumes availability when the model list is missing", async () => {
    reply = () => ({ status: 200, body: JSON.stringify({ data: [{ id: "other" }] }) });
    expect(await openai().isAvailable()).toBe(false);
    reply = () => ({ status: 200, body: "{}" });
    expect(await openai().isAvailable()).toBe(true);
  });
});

describe("Backoff", () => {
  afterEach(() => vi.restoreAllMocks());

  it("doubles up to the cap and resets on success", async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const backoff = new Backoff({ baseMs: 1000, maxMs: 3000, jitter: 0, sleep });

    await backoff.wait();
    await backoff.wait();
    await backoff.wait();
    expect(sleep.mock.calls.map((c) => c[0])).toEqual([1000, 2000, 3000]);
    expect(backoff.consecutiveFailures).toBe(3);

    backoff.succeed();
    expect(backoff.delay()).toBe(1000);
  });

  it("applies jitter in both directions", () => {
    const backoff = new Backoff({ baseMs: 1000, jitter: 0.25 });
    vi.spyOn(Math, "random").mockReturnValue(1);
    expect(backoff.delay()).toBe(1250);
    vi.spyOn(Math, "random").mockReturnValue(0);
    expect(backoff.delay()).toBe(750);
  });
});

describe("RetryingGenerator", () => {
  const noSleep = async () => undefined;

  it("retries retryable failures", async () => {
    const inner = new ScriptedGenerator([new GenerationConnectionError("down"), "ok"]);
    const result = await new RetryingGenerator(inner, { maxRetries: 3, sleep: noSleep }).generate("Hi", opts);
    expect(result.text).toBe("ok");
    expect(inner.calls).toBe(2);
  });

  it("does not retry malformed replies", async () => {
    const inner = new ScriptedGenerator([new MalformedResponseError("garbage"), "ok"]);
    const retrying = new RetryingGenerator(inner, { maxRetries: 3, sleep: noSleep });
    await expect(retrying.generate("Hi", opts)).rejects.toThrow("garbage");
    expect(inner.calls).toBe(1);
  });

  it("gives up after maxRetries", async () => {
    const down = () => new GenerationConnectionError("down", 503);
    const inner = new ScriptedGenerator([down(), down(), down(), "too late"]);
    const retrying = new RetryingGenerator(inner, { maxRetries: 2, sleep: noSleep });
    await expect(retrying.generate("Hi", opts)).rejects.toBeInstanceOf(GenerationConnectionError);
    expect(inner.calls).toBe(3);
  });
});

describe("createGenerator", () => {
  it("wraps the adapter with retries by default", () => {
    const gen = createGenerator(ConfigSchema.parse({}).generator);
    expect(gen).toBeInstanceOf(RetryingGenerator);
    expect(gen.name).toBe("ollama:llama3");
  });

  it("returns the bare adapter when retries are off", () => {
    const config = ConfigSchema.parse({ generator: { type: "openai-compat", model: "gpt-test", maxRetries: 0 } });
    const gen = createGenerator(config.generator);
    expect(gen).toBeInstanceOf(OpenAICompatAdapter);
    expect(gen.name).toBe("openai-compat:gpt-test");
  });
});

describe("token helpers", () => {
  it("derives the timeout from prompt size", () => {
    expect(calculateTimeout(400, 100)).toBe(15_000 + 200 * 15);
    expect(calculateTimeout(10_000_000)).toBe(600_000);
  });

  it("estimates four characters per token", () => {
    expect(estimateTokens("abcdefghi")).toBe(3);
  });
});
