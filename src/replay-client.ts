/**
 * Replay Client: Re-issue captured requests.
 *
 * Requests go to the captured origin, or to `baseUrl` when one is given
 * (path and query preserved). Captured headers are replayed except those the
 * HTTP stack owns (host, content-length, connection) and HTTP/2
 * pseudo-headers.
 */

import { ReplayError } from "./errors.js";
import { log } from "./logger.js";
import type { AnalyzedEndpoint, JsonValue, TrafficEntry } from "./types.js";

export interface ReplayClientOptions {
  /** Replaces the captured scheme + host (may carry a path prefix) */
  baseUrl?: string;
  /** Added to every request, overriding captured headers of the same name */
  headers?: Record<string, string>;
  fetch?: typeof fetch;
  /** Default 30s */
  timeoutMs?: number;
}

export interface ReplayRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface ReplayResponse {
  status: number;
  ok: boolean;
  contentType: string;
  text: string;
  /** Parsed body when it was JSON */
  json?: JsonValue;
  latencyMs: number;
}

const SKIPPED_HEADERS = new Set(["host", "content-length", "connection"]);

const DEFAULT_TIMEOUT_MS = 30_000;

function tryParseJson(text: string): JsonValue | undefined {
  if (!text.trim()) return undefined;
  try {
    const value: JsonValue = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}

export class ReplayClient {
  private readonly baseUrl?: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(opts: ReplayClientOptions = {}) {
    this.baseUrl = opts.baseUrl?.replace(/\/+$/, "");
    this.headers = opts.headers ?? {};
    this.fetchImpl = opts.fetch ?? fetch;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /** The request that replay() would send for `entry`. */
  buildRequest(entry: TrafficEntry): ReplayRequest {
    const origin = this.baseUrl ?? `${entry.url.scheme}://${entry.url.host}`;
    const search = new URLSearchParams(entry.url.query.map((q): [string, string] => [q.name, q.value])).toString();
    const url = `${origin}${entry.url.pathname}${search ? `?${search}` : ""}`;

    const headers: Record<string, string> = {};
    for (const h of entry.requestHeaders) {
      const lower = h.name.toLowerCase();
      if (SKIPPED_HEADERS.has(lower) || lower.startsWith(":")) continue;
      headers[lower] = h.value;
    }
    for (const [name, value] of Object.entries(this.headers)) {
      headers[name.toLowerCase()] = value;
    }

    const request: ReplayRequest = { method: entry.method, url, headers };
    if (entry.requestBody && entry.method !== "GET" && entry.method !== "HEAD") {
      request.body = entry.requestBody.text;
      if (entry.requestBody.contentType && !headers["content-type"]) {
        headers["content-type"] = entry.requestBody.contentType;
      }
    }
    return request;
  }

  async replay(entry: TrafficEntry): Promise<ReplayResponse> {
    const req = this.buildRequest(entry);
    const start = Date.now();

    let resp: Response;
    let text: string;
    try {
      resp = await this.fetchImpl(req.url, {
        method: req.method,
        headers: req.headers,
        body: req.body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      // The timeout signal also covers the body read.
      text = await resp.text();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      log("replay", `${req.method} ${req.url} failed: ${reason}`);
      throw new ReplayError(`Request failed: ${reason}`, req.method, req.url, { cause: err });
    }

    const latencyMs = Date.now() - start;
    log("replay", `${req.method} ${req.url} → ${resp.status} (${latencyMs}ms)`);

    return {
      status: resp.status,
      ok: resp.ok,
      contentType: resp.headers.get("content-type") ?? "",
      text,
      json: tryParseJson(text),
      latencyMs,
    };
  }

  /** Replay one of the endpoint's captured examples. */
  async replayEndpoint(endpoint: AnalyzedEndpoint, exampleIndex = 0): Promise<ReplayResponse> {
    const entry = endpoint.examples[exampleIndex];
    if (!entry) {
      throw new RangeError(
        `${endpoint.key} has ${endpoint.examples.length} examples, no example #${exampleIndex}`,
      );
    }
    return this.replay(entry);
  }
}
