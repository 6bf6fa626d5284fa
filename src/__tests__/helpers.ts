/**
 * Test helpers: Utilities for loading HAR fixtures and building test data.
 */

import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parseTrafficUrl } from "../har-parser.js";
import type { JsonValue, NameValue, TrafficEntry, TypeTree } from "../types.js";

// ── Fixture loading ────────────────────────────────────────────────────────

const __dirname = dirname(fileURLToPath(import.meta.url));
const FIXTURES_DIR = resolve(__dirname, "fixtures");

/** Available fixture names (without .har.json extension). */
export type FixtureName = "shop-api";

export function fixturePath(name: FixtureName): string {
  return resolve(FIXTURES_DIR, `${name}.har.json`);
}

/** Load a HAR fixture file by name, JSON-decoded. */
export function loadFixture(name: FixtureName): unknown {
  return JSON.parse(readFileSync(fixturePath(name), "utf-8"));
}

// ── TrafficEntry builder ───────────────────────────────────────────────────

export interface EntryOptions {
  index?: number;
  method?: string;
  url?: string;
  status?: number;
  requestHeaders?: NameValue[];
  /** Strings are used as-is, anything else is JSON-encoded */
  requestBody?: unknown;
  requestContentType?: string;
  responseBody?: unknown;
  responseContentType?: string;
}

function bodyText(body: unknown): string {
  return typeof body === "string" ? body : JSON.stringify(body);
}

/**
 * Build a TrafficEntry for unit tests.
 * Defaults to GET https://api.example.com/test → 200 with no bodies.
 */
export function makeEntry(opts: EntryOptions = {}): TrafficEntry {
  const rawUrl = opts.url ?? "https://api.example.com/test";
  const url = parseTrafficUrl(rawUrl.startsWith("/") ? `https://api.example.com${rawUrl}` : rawUrl);
  if (!url) throw new Error(`Bad test URL: ${rawUrl}`);

  return {
    index: opts.index ?? 0,
    method: (opts.method ?? "GET").toUpperCase(),
    url,
    requestHeaders: opts.requestHeaders ?? [],
    requestBody: opts.requestBody === undefined
      ? undefined
      : { text: bodyText(opts.requestBody), contentType: opts.requestContentType ?? "application/json" },
    status: opts.status ?? 200,
    responseBody: opts.responseBody === undefined
      ? undefined
      : { text: bodyText(opts.responseBody), contentType: opts.responseContentType ?? "application/json" },
  };
}

/** Build a capture: each entry's index is its position in the list. */
export function makeEntries(list: EntryOptions[]): TrafficEntry[] {
  return list.map((opts, index) => makeEntry({ ...opts, index }));
}

// ── HAR entry builder ──────────────────────────────────────────────────────

interface HarEntryOptions {
  method?: string;
  url?: string;
  status?: number;
  requestHeaders?: NameValue[];
  responseHeaders?: NameValue[];
  postData?: { mimeType?: string; text?: string; encoding?: string };
  responseBody?: unknown;
  responseMimeType?: string;
  responseEncoding?: string;
}

/**
 * Build a minimal HAR entry object for parser tests.
 * Defaults to a GET 200 JSON request with no body.
 */
export function makeHarEntry(opts: HarEntryOptions = {}): Record<string, unknown> {
  const content: Record<string, unknown> = { mimeType: opts.responseMimeType ?? "application/json" };
  if (opts.responseBody !== undefined) {
    const text = bodyText(opts.responseBody);
    content.text = text;
    content.size = text.length;
  }
  if (opts.responseEncoding) content.encoding = opts.responseEncoding;

  return {
    request: {
      method: opts.method ?? "GET",
      url: opts.url ?? "https://api.example.com/test",
      headers: opts.requestHeaders ?? [],
      queryString: [],
      ...(opts.postData ? { postData: opts.postData } : {}),
    },
    response: {
      status: opts.status ?? 200,
      headers: opts.responseHeaders ?? [],
      content,
    },
    time: 100,
  };
}

export function makeHar(entries: Record<string, unknown>[]): { log: { entries: Record<string, unknown>[] } } {
  return { log: { entries } };
}

// ── Acceptance ─────────────────────────────────────────────────────────────

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** True when `value` is an instance of the inferred shape. */
export function accepts(tree: TypeTree, value: JsonValue): boolean {
  switch (tree.kind) {
    case "unknown":
      return false;
    case "mixed":
      return true;
    case "scalar":
      if (tree.scalar === "null") return value === null;
      if (tree.scalar === "bool") return typeof value === "boolean";
      if (tree.scalar === "string") return typeof value === "string";
      if (typeof value !== "number") return false;
      return tree.scalar === "float" || Number.isInteger(value);
    case "array": {
      const element = tree.element;
      return Array.isArray(value) && value.every((item) => accepts(element, item));
    }
    case "union":
      return tree.alternatives.some((alt) => accepts(alt, value));
    case "object": {
      if (!isJsonObject(value)) return false;
      const obj = value;
      const fields = tree.fields;
      if (Object.keys(obj).some((key) => !Object.hasOwn(fields, key))) return false;
      return Object.entries(fields).every(([key, field]) => {
        if (!Object.hasOwn(obj, key)) return field.optional;
        const v = obj[key];
        if (v === null) return field.nullable || accepts(field.type, null);
        return accepts(field.type, v);
      });
    }
  }
}
