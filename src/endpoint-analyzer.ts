/**
 * Endpoint Analyzer: Consolidate raw traffic entries into endpoints.
 *
 * Entries are grouped by method + path template, query parameters are
 * merged across the group, and request/response bodies are fed to the
 * schema inferrer. Responses are partitioned by status (class by default)
 * before inference so a 200 body and a 404 body never share a shape.
 *
 * Each endpoint also gets an operation name, a description and a category
 * for the emitters.
 */

import { DEFAULT_ANALYSIS_OPTIONS } from "./config.js";
import { MalformedSampleError } from "./errors.js";
import { log } from "./logger.js";
import { humanize, singularize, toCamelCase, withNumericSuffix } from "./naming.js";
import { buildPathTemplates, renderPathTemplate } from "./path-normalizer.js";
import { describeType, inferSchema, isJsonContentType, safeParseJson } from "./schema-inferrer.js";
import type {
  AnalysisOptions,
  BodyShape,
  Endpoint,
  EndpointCategory,
  JsonValue,
  MalformedSampleRecord,
  QueryParam,
  ResponseShape,
  TemplateSegment,
  TrafficEntry,
  TypeTree,
} from "./types.js";

// ── Categorization ──────────────────────────────────────────────────────

function categorize(method: string): EndpointCategory {
  const m = method.toUpperCase();
  if (m === "GET" || m === "HEAD" || m === "OPTIONS") return "read";
  if (m === "DELETE") return "delete";
  if (m === "POST" || m === "PUT" || m === "PATCH") return "write";
  return "other";
}

// ── Naming & description ────────────────────────────────────────────────

/** Path segments that carry no meaning for names: "api", version prefixes. */
function meaningfulSegments(segments: TemplateSegment[]): TemplateSegment[] {
  return segments.filter((s) => s.kind === "param" || !/^(api|v\d+)$/i.test(s.value));
}

function lastLiteralIndex(segments: TemplateSegment[]): number {
  for (let i = segments.length - 1; i >= 0; i--) {
    if (segments[i].kind === "literal") return i;
  }
  return -1;
}

function literalWord(segment: TemplateSegment): string {
  // Strip file extensions (.json, .php, …) before naming
  return segment.kind === "literal" ? segment.value.replace(/\.\w+$/, "") : "";
}

/**
 * Generate a method name from HTTP method + template.
 *
 *   GET /v1/projects                → listProjects
 *   GET /v1/projects/{id}           → getProject
 *   GET /v1/projects/{id}/members   → listProjectMembers
 *   POST /v1/projects               → createProject
 *   PUT /v1/projects/{id}           → updateProject
 *   DELETE /v1/projects/{id}        → deleteProject
 */
export function generateOperationName(method: string, segments: TemplateSegment[]): string {
  const m = method.toUpperCase();
  const meaningful = meaningfulSegments(segments);
  const lastIdx = lastLiteralIndex(meaningful);
  if (lastIdx === -1) return toCamelCase(m.toLowerCase());

  const last = literalWord(meaningful[lastIdx]);
  const endsWithParam = meaningful[meaningful.length - 1].kind === "param";
  if (!toCamelCase(last)) return toCamelCase(m.toLowerCase());

  switch (m) {
    case "GET": {
      if (endsWithParam) return toCamelCase(`get ${singularize(last)}`);
      if (last === "me" || last === "self" || last === "profile") return toCamelCase(`get ${last}`);
      const parentIdx = lastLiteralIndex(meaningful.slice(0, lastIdx));
      if (parentIdx !== -1) {
        return toCamelCase(`list ${singularize(literalWord(meaningful[parentIdx]))} ${last}`);
      }
      return toCamelCase(`list ${last}`);
    }
    case "POST":
      return toCamelCase(`create ${singularize(last)}`);
    case "PUT":
    case "PATCH":
      return toCamelCase(`update ${singularize(last)}`);
    case "DELETE":
      return toCamelCase(`delete ${singularize(last)}`);
    default:
      return toCamelCase(`${m.toLowerCase()} ${last}`);
  }
}

/**
 * Generate a concise description of an endpoint.
 *
 *   GET  /users                → "List users"
 *   GET  /users/{id}           → "Get a user by ID"
 *   POST /users/{id}/orders    → "Create an order for a user"
 */
export function generateDescription(method: string, segments: TemplateSegment[]): string {
  const m = method.toUpperCase();
  const meaningful = meaningfulSegments(segments);
  if (meaningful.length === 0) return `${m} root`;

  const resourceIndex = lastLiteralIndex(meaningful);
  if (resourceIndex === -1) return `${m} endpoint`;

  const resource = humanize(literalWord(meaningful[resourceIndex]));
  const endsWithParam = meaningful[meaningful.length - 1].kind === "param";

  // "for a <parent>" when a literal is followed by a param before the resource
  let parentPhrase = "";
  for (let i = resourceIndex - 1; i >= 0; i--) {
    if (meaningful[i].kind === "param") continue;
    if (meaningful[i + 1]?.kind === "param") {
      parentPhrase = ` for a ${singularize(humanize(literalWord(meaningful[i])))}`;
      break;
    }
  }

  const singular = singularize(resource);
  const article = /^[aeiou]/.test(singular) ? "an" : "a";

  if (endsWithParam) {
    switch (m) {
      case "GET":
        return `Get ${article} ${singular} by ID${parentPhrase}`;
      case "PUT":
        return `Update ${article} ${singular}${parentPhrase}`;
      case "PATCH":
        return `Partially update ${article} ${singular}${parentPhrase}`;
      case "DELETE":
        return `Delete ${article} ${singular}${parentPhrase}`;
      default:
        return `${m} ${article} ${singular}${parentPhrase}`;
    }
  }

  switch (m) {
    case "GET":
      return `List ${resource}${parentPhrase}`;
    case "POST":
      return `Create ${article} ${singular}${parentPhrase}`;
    case "PUT":
      return `Replace ${resource}${parentPhrase}`;
    case "PATCH":
      return `Update ${resource}${parentPhrase}`;
    case "DELETE":
      return `Delete ${resource}${parentPhrase}`;
    default:
      return `${m} ${resource}${parentPhrase}`;
  }
}

// ── Parameters ──────────────────────────────────────────────────────────

/** Union of query keys, first-seen order. Keys missing from any entry are optional. */
function collectQueryParams(entries: TrafficEntry[]): QueryParam[] {
  const seen = new Map<string, { count: number; example: string }>();
  for (const entry of entries) {
    const inEntry = new Set<string>();
    for (const q of entry.url.query) {
      if (inEntry.has(q.name)) continue;
      inEntry.add(q.name);
      const existing = seen.get(q.name);
      if (existing) existing.count++;
      else seen.set(q.name, { count: 1, example: q.value });
    }
  }
  return Array.from(seen.entries()).map(([name, info]) => ({
    name,
    required: info.count === entries.length,
    example: info.example,
  }));
}

// ── Bodies ──────────────────────────────────────────────────────────────

interface SampleCollection {
  samples: JsonValue[];
  present: number;
  skipped: number;
}

function collectSamples(
  entries: TrafficEntry[],
  side: "request" | "response",
  malformed: MalformedSampleRecord[],
): SampleCollection {
  const result: SampleCollection = { samples: [], present: 0, skipped: 0 };

  for (const entry of entries) {
    const body = side === "request" ? entry.requestBody : entry.responseBody;
    if (!body || body.text.trim() === "") continue;
    result.present++;

    if (!isJsonContentType(body.contentType)) {
      result.skipped++;
      continue;
    }

    const parsed = safeParseJson(body.text);
    if (!parsed.ok) {
      const err = new MalformedSampleError(parsed.error.message, entry.index, side);
      malformed.push({ entryIndex: entry.index, side, message: err.message });
      log("endpoint-analyzer", `Skipping malformed ${side} body of entry #${entry.index}: ${err.message}`);
      result.skipped++;
      continue;
    }
    result.samples.push(parsed.value);
  }

  return result;
}

function toBodyShape(collection: SampleCollection, options: AnalysisOptions): BodyShape<TypeTree> {
  return {
    type: inferSchema(collection.samples, options),
    sampleCount: collection.samples.length,
    skippedCount: collection.skipped,
  };
}

function statusKeyOf(status: number, partition: AnalysisOptions["statusPartition"]): string {
  return partition === "code" ? String(status) : `${Math.floor(status / 100)}xx`;
}

function inferResponses(
  entries: TrafficEntry[],
  options: AnalysisOptions,
  malformed: MalformedSampleRecord[],
): ResponseShape<TypeTree>[] {
  const partitions = new Map<string, TrafficEntry[]>();
  for (const entry of entries) {
    const key = statusKeyOf(entry.status, options.statusPartition);
    const bucket = partitions.get(key);
    if (bucket) bucket.push(entry);
    else partitions.set(key, [entry]);
  }

  return Array.from(partitions.entries()).map(([statusKey, bucket]) => {
    const statuses: number[] = [];
    for (const entry of bucket) {
      if (!statuses.includes(entry.status)) statuses.push(entry.status);
    }
    return {
      statusKey,
      statuses,
      ...toBodyShape(collectSamples(bucket, "response", malformed), options),
    };
  });
}

// ── Main export ─────────────────────────────────────────────────────────

export interface ConsolidationResult {
  endpoints: Endpoint<TypeTree>[];
  malformedSamples: MalformedSampleRecord[];
}

/**
 * Consolidate traffic entries into endpoints.
 *
 * @returns Endpoints in order of their first entry in `entries`, plus the
 *          bodies that failed to parse along the way
 */
export function consolidateEndpoints(
  entries: readonly TrafficEntry[],
  options: AnalysisOptions = DEFAULT_ANALYSIS_OPTIONS,
): ConsolidationResult {
  const malformedSamples: MalformedSampleRecord[] = [];

  // ── 1. Partition by METHOD + segment count ────────────────────────────
  const partitions = new Map<string, TrafficEntry[]>();
  for (const entry of entries) {
    const key = `${entry.method.toUpperCase()} ${entry.url.pathSegments.length}`;
    const bucket = partitions.get(key);
    if (bucket) bucket.push(entry);
    else partitions.set(key, [entry]);
  }

  // ── 2. Template paths and build one endpoint per group ────────────────
  const endpoints: Endpoint<TypeTree>[] = [];
  for (const bucket of partitions.values()) {
    const method = bucket[0].method.toUpperCase();

    for (const group of buildPathTemplates(bucket, options)) {
      const pathTemplate = renderPathTemplate(group.segments);
      const requests = collectSamples(group.entries, "request", malformedSamples);

      endpoints.push({
        key: `${method} ${pathTemplate}`,
        method,
        pathTemplate,
        segments: group.segments,
        pathParams: group.pathParams,
        queryParams: collectQueryParams(group.entries),
        requestBody: requests.present > 0 ? toBodyShape(requests, options) : undefined,
        responses: inferResponses(group.entries, options, malformedSamples),
        examples: group.entries,
        operationName: generateOperationName(method, group.segments),
        description: generateDescription(method, group.segments),
        category: categorize(method),
      });
    }
  }

  // ── 3. First-occurrence order, unique operation names ─────────────────
  const position = new Map(entries.map((entry, i) => [entry, i]));
  const firstSeen = (ep: Endpoint<TypeTree>) => position.get(ep.examples[0]) ?? 0;
  endpoints.sort((a, b) => firstSeen(a) - firstSeen(b));

  const usedNames = new Set<string>();
  for (const ep of endpoints) {
    ep.operationName = withNumericSuffix(ep.operationName, (n) => usedNames.has(n));
    usedNames.add(ep.operationName);
  }

  for (const ep of endpoints) {
    const shapes = ep.responses.map((r) => `${r.statusKey}:${describeType(r.type)}`).join(" ");
    log("endpoint-analyzer", `${ep.key} ← ${ep.examples.length} entr${ep.examples.length === 1 ? "y" : "ies"} ${shapes}`);
  }

  return { endpoints, malformedSamples };
}
