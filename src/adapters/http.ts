import http from "node:http";
import type { z } from "zod";
import https from "node:https";
import { GenerationConnectionError, GenerationTimeoutError, MalformedResponseError } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("http");

export interface JsonRequest {
  method: "GET" | "POST";
  url: string;
  body?: object;
  headers?: Record<string, string>;
  timeoutMs: number;
  /** Name used in error messages */
  source: string;
}

/**
 * Minimal JSON-over-HTTP request on node:http/https.
 * Resolves with the raw response body; network failures, timeouts and
 * HTTP status >= 400 reject with typed generation errors.
 */
export function requestText(req: JsonRequest): Promise<string> {
  return new Promise((resolve, reject) => {
    const parsed = new URL(req.url);
    const isHttps = parsed.protocol === "https:";
    const transport = isHttps ? https : http;

    const headers: Record<string, string> = {
      "Accept": "application/json",
      ...req.headers,
    };

    const payload = req.body ? JSON.stringify(req.body) : undefined;
    if (payload) {
      headers["Content-Type"] = "application/json";
      headers["Content-Length"] = String(Buffer.byteLength(payload));
    }

    const request = transport.request(
      {
        hostname: parsed.hostname,
        port: parsed.port || (isHttps ? 443 : 80),
        path: parsed.pathname + parsed.search,
        method: req.method,
        headers,
        timeout: req.timeoutMs,
      },
      (res) => {
        let data = "";
        res.setEncoding("utf-8");
        res.on("data", (chunk: string) => (data += chunk));
        res.on("end", () => {
          const status = res.statusCode ?? 0;
          if (status >= 400) {
            const err = new GenerationConnectionError(`${req.source} API error ${status}: ${data}`, status);
            log.error(err.message);
            reject(err);
          } else {
            resolve(data);
          }
        });
        res.on("error", (err) => reject(new GenerationConnectionError(`${req.source}: ${err.message}`)));
      }
    );

    request.on("error", (err) => {
      if (err instanceof GenerationTimeoutError) {
        reject(err);
        return;
      }
      log.error(req.source, `HTTP ${req.method} error:`, err.message);
      reject(new GenerationConnectionError(`${req.source}: ${err.message}`));
    });

    request.on("timeout", () => {
      const err = new GenerationTimeoutError(req.source, req.timeoutMs);
      log.error(err.message);
      request.destroy(err);
    });

    if (payload) {
      request.write(payload);
    }
    request.end();
  });
}

/** Parse a JSON body against a schema, raising MalformedResponseError on mismatch. */
export function parseBody<T>(source: string, raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new MalformedResponseError(`${source}: response is not JSON (${raw.slice(0, 120)})`);
  }
  const result = schema.safeParse(json);
  if (!result.success) {
    throw new MalformedResponseError(`${source}: unexpected response shape: ${result.error.issues[0]?.message ?? "invalid"}`);
  }
  return result.data;
}
