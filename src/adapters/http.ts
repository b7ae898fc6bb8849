/**
 * Shared HTTP transport for the provider adapters.
 *
 * Uses node:http / node:https directly (no fetch) so the socket timeout and
 * error paths are explicit. Status >= 400 becomes a ProviderError carrying the
 * status, which withRetry uses to tell 5xx (retry) from 4xx (give up).
 * An aborted `signal` destroys the socket.
 */

import http from "node:http";
import https from "node:https";
import type { IncomingMessage } from "node:http";
import { ProviderError } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("http");

export interface HttpRequestOptions {
  method: "GET" | "POST";
  url: string;
  body?: object;
  timeoutMs: number;
  apiKey?: string;
  /** Name used in error messages (adapter name). */
  label: string;
  signal?: AbortSignal;
}

function open(options: HttpRequestOptions): Promise<IncomingMessage> {
  const { method, url, body, timeoutMs, apiKey, label, signal } = options;

  return new Promise((resolve, reject) => {
    const parsed = new URL(url);
    const isHttps = parsed.protocol === "https:";
    const transport = isHttps ? https : http;

    const headers: Record<string, string> = { Accept: "application/json" };
    const payload = body ? JSON.stringify(body) : undefined;
    if (payload) {
      headers["Content-Type"] = "application/json";
      headers["Content-Length"] = String(Buffer.byteLength(payload));
    }
    if (apiKey) {
      headers["Authorization"] = `Bearer ${apiKey}`;
    }

    const req = transport.request(
      {
        hostname: parsed.hostname,
        port: parsed.port || (isHttps ? 443 : 80),
        path: parsed.pathname + parsed.search,
        method,
        headers,
        timeout: timeoutMs,
        signal,
      },
      (res) => {
        const status = res.statusCode ?? 0;
        if (status < 400) {
          resolve(res);
          return;
        }
        let data = "";
        res.setEncoding("utf-8");
        res.on("data", (chunk: string) => (data += chunk));
        res.on("end", () => {
          const err = new ProviderError(`${label} API error ${status}: ${data.slice(0, 500)}`, status);
          log.error(err.message);
          reject(err);
        });
      }
    );

    req.on("error", (err) => {
      if (signal?.aborted) {
        log.debug(label, `HTTP ${method} ${parsed.pathname} aborted`);
        reject(err);
        return;
      }
      log.error(label, `HTTP ${method} error:`, err.message);
      reject(new ProviderError(`${label} HTTP ${method} ${parsed.pathname} failed: ${err.message}`));
    });

    req.on("timeout", () => {
      req.destroy(new Error(`request timeout after ${timeoutMs}ms`));
    });

    if (payload) {
      req.write(payload);
    }
    req.end();
  });
}

/** Perform a request and return the full response body. */
export async function httpRequest(options: HttpRequestOptions): Promise<string> {
  const res = await open(options);
  res.setEncoding("utf-8");
  let data = "";
  for await (const chunk of res) {
    data += String(chunk);
  }
  return data;
}

/**
 * Perform a request and yield the response body line by line as it arrives.
 * Empty lines are skipped. Used for SSE and NDJSON token streams.
 */
export async function* httpStreamLines(options: HttpRequestOptions): AsyncGenerator<string> {
  const res = await open(options);
  res.setEncoding("utf-8");
  let buffer = "";
  for await (const chunk of res) {
    buffer += String(chunk);
    let newline = buffer.indexOf("\n");
    while (newline >= 0) {
      const line = buffer.slice(0, newline).trim();
      buffer = buffer.slice(newline + 1);
      if (line) yield line;
      newline = buffer.indexOf("\n");
    }
  }
  const rest = buffer.trim();
  if (rest) yield rest;
}

/** Parse a JSON body, naming the adapter in the error when the body is not JSON. */
export function parseJson(raw: string, label: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new ProviderError(`${label}: response is not valid JSON: ${raw.slice(0, 200)}`);
  }
}
