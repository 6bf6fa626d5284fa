/**
 * HAR Parser: Read a HAR capture into traffic entries.
 *
 * The document is validated as it is walked: a missing log, a non-array
 * entries list or an entry without method/url/status is a HarFormatError.
 * Entries whose URL cannot be parsed are skipped with a log line. Bodies
 * declared base64 are decoded to UTF-8 text.
 */

import { readFile } from "node:fs/promises";
import { HarFormatError } from "./errors.js";
import { log } from "./logger.js";
import type { NameValue, TrafficBody, TrafficEntry, TrafficUrl } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function readHeaders(value: unknown): NameValue[] {
  if (!Array.isArray(value)) return [];
  const headers: NameValue[] = [];
  for (const h of value) {
    if (isRecord(h) && typeof h.name === "string" && typeof h.value === "string") {
      headers.push({ name: h.name, value: h.value });
    }
  }
  return headers;
}

function headerValue(headers: NameValue[], name: string): string | undefined {
  const lower = name.toLowerCase();
  return headers.find((h) => h.name.toLowerCase() === lower)?.value;
}

function decodeText(text: string, encoding: string | undefined): string {
  return encoding === "base64" ? Buffer.from(text, "base64").toString("utf8") : text;
}

function readRequestBody(postData: unknown, headers: NameValue[]): TrafficBody | undefined {
  if (!isRecord(postData)) return undefined;
  const text = optionalString(postData.text);
  if (text === undefined) return undefined;
  return {
    text: decodeText(text, optionalString(postData.encoding)),
    contentType: optionalString(postData.mimeType) || headerValue(headers, "content-type"),
  };
}

function readResponseBody(content: unknown, headers: NameValue[]): TrafficBody | undefined {
  if (!isRecord(content)) return undefined;
  const text = optionalString(content.text);
  if (text === undefined) return undefined;
  return {
    text: decodeText(text, optionalString(content.encoding)),
    contentType: optionalString(content.mimeType) || headerValue(headers, "content-type"),
  };
}

/** Split an absolute URL into the parts the analyzer works with. Null if unparseable. */
export function parseTrafficUrl(raw: string): TrafficUrl | null {
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    return null;
  }
  return {
    scheme: parsed.protocol.replace(/:$/, ""),
    host: parsed.host,
    pathname: parsed.pathname,
    pathSegments: parsed.pathname.split("/").filter(Boolean),
    query: Array.from(parsed.searchParams, ([name, value]) => ({ name, value })),
  };
}

/**
 * Parse a HAR document (already JSON-decoded) into traffic entries, in
 * capture order. `index` is the entry's position in `log.entries`.
 */
export function parseHar(har: unknown): TrafficEntry[] {
  if (!isRecord(har) || !isRecord(har.log)) {
    throw new HarFormatError("HAR document has no log object", "log");
  }
  const rawEntries = har.log.entries;
  if (!Array.isArray(rawEntries)) {
    throw new HarFormatError("HAR log has no entries array", "log.entries");
  }

  const entries: TrafficEntry[] = [];
  rawEntries.forEach((raw: unknown, index) => {
    const at = `log.entries[${index}]`;
    if (!isRecord(raw)) throw new HarFormatError("Entry is not an object", at);

    const { request, response } = raw;
    if (!isRecord(request)) throw new HarFormatError("Entry has no request", `${at}.request`);
    if (!isRecord(response)) throw new HarFormatError("Entry has no response", `${at}.response`);
    if (typeof request.method !== "string" || request.method === "") {
      throw new HarFormatError("Request method missing", `${at}.request.method`);
    }
    if (typeof request.url !== "string") {
      throw new HarFormatError("Request url missing", `${at}.request.url`);
    }
    if (typeof response.status !== "number" || !Number.isInteger(response.status)) {
      throw new HarFormatError("Response status missing", `${at}.response.status`);
    }

    const url = parseTrafficUrl(request.url);
    if (!url) {
      log("har-parser", `Skipping entry #${index}: unparseable URL ${request.url}`);
      return;
    }

    const requestHeaders = readHeaders(request.headers);
    const responseHeaders = readHeaders(response.headers);

    entries.push({
      index,
      method: request.method.toUpperCase(),
      url,
      requestHeaders,
      requestBody: readRequestBody(request.postData, requestHeaders),
      status: response.status,
      responseBody: readResponseBody(response.content, responseHeaders),
    });
  });

  log("har-parser", `Read ${entries.length} of ${rawEntries.length} entries`);
  return entries;
}

/** Read and parse a HAR file from disk. */
export async function readHarFile(filePath: string): Promise<TrafficEntry[]> {
  const text = await readFile(filePath, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new HarFormatError(`File is not valid JSON: ${reason}`, filePath);
  }
  return parseHar(json);
}

// ── Filtering ─────────────────────────────────────────────────────────────

export interface EntryFilter {
  /** Keep only these methods (case-insensitive) */
  methods?: string[];
  /** Keep only these exact statuses */
  statuses?: number[];
  /** Keep only these status classes, e.g. ["2xx"] */
  statusClasses?: string[];
}

/**
 * Narrow a capture before analysis. Criteria combine with AND; an empty or
 * missing criterion keeps everything.
 */
export function filterEntries(entries: readonly TrafficEntry[], filter: EntryFilter = {}): TrafficEntry[] {
  const methods = filter.methods?.length ? new Set(filter.methods.map((m) => m.toUpperCase())) : null;
  const statuses = filter.statuses?.length ? new Set(filter.statuses) : null;
  const classes = filter.statusClasses?.length
    ? new Set(filter.statusClasses.map((c) => c.toLowerCase()))
    : null;

  return entries.filter((entry) => {
    if (methods && !methods.has(entry.method)) return false;
    if (statuses && !statuses.has(entry.status)) return false;
    if (classes && !classes.has(`${Math.floor(entry.status / 100)}xx`)) return false;
    return true;
  });
}
