/**
 * Analysis pipeline - traffic entries in, endpoints and named models out.
 *
 * Consolidates entries into endpoints, then registers every request and
 * response shape in endpoint order so model names are deterministic for a
 * given capture.
 */

import { loadConfig } from "./config.js";
import { consolidateEndpoints } from "./endpoint-analyzer.js";
import { log } from "./logger.js";
import { ModelRegistry } from "./model-namer.js";
import { singularize, toPascalCase } from "./naming.js";
import type {
  AnalysisOptions,
  AnalysisResult,
  AnalyzedEndpoint,
  Endpoint,
  TemplateSegment,
  TrafficEntry,
  TypeTree,
} from "./types.js";

/** Entity name for an endpoint: the last meaningful literal, singular. */
export function resourceName(segments: TemplateSegment[]): string {
  for (let i = segments.length - 1; i >= 0; i--) {
    const seg = segments[i];
    if (seg.kind !== "literal" || /^(api|v\d+)$/i.test(seg.value)) continue;
    const name = toPascalCase(singularize(seg.value.replace(/\.\w+$/, "")));
    if (name) return name;
  }
  return "Root";
}

const REQUEST_VERBS: Record<string, string> = {
  POST: "Create",
  PUT: "Update",
  PATCH: "Update",
  DELETE: "Delete",
};

/** POST /users → CreateUserRequest */
export function requestContext(method: string, resource: string): string {
  const verb = REQUEST_VERBS[method] ?? toPascalCase(method.toLowerCase());
  return `${verb}${resource}Request`;
}

/** 2xx → User, 4xx/5xx → UserError, anything else → User + status key */
export function responseContext(statusKey: string, resource: string): string {
  if (statusKey.startsWith("2")) return resource;
  if (statusKey.startsWith("4") || statusKey.startsWith("5")) return `${resource}Error`;
  return `${resource}${statusKey}`;
}

function resolveEndpoint(endpoint: Endpoint<TypeTree>, registry: ModelRegistry): AnalyzedEndpoint {
  const resource = resourceName(endpoint.segments);
  const requestBody = endpoint.requestBody
    ? {
        ...endpoint.requestBody,
        type: registry.register(requestContext(endpoint.method, resource), endpoint.requestBody.type),
      }
    : undefined;

  const responses = endpoint.responses.map((response) => ({
    ...response,
    type: registry.register(responseContext(response.statusKey, resource), response.type),
  }));

  return { ...endpoint, requestBody, responses };
}

/** An endpoint as it is written out as JSON: raw examples reduced to their capture indices. */
export type SerializedEndpoint = Omit<AnalyzedEndpoint, "examples"> & { exampleIndices: number[] };

export function serializeEndpoint(endpoint: AnalyzedEndpoint): SerializedEndpoint {
  const { examples, ...rest } = endpoint;
  return { ...rest, exampleIndices: examples.map((e) => e.index) };
}

/**
 * Run the full pipeline over a capture.
 *
 * Options given here take precedence over the HAR_TYPEGEN_* environment.
 */
export function analyzeTraffic(
  entries: readonly TrafficEntry[],
  options: Partial<AnalysisOptions> = {},
): AnalysisResult {
  const resolved: AnalysisOptions = { ...loadConfig().analysis, ...options };
  const { endpoints, malformedSamples } = consolidateEndpoints(entries, resolved);

  const registry = new ModelRegistry();
  const analyzed = endpoints.map((ep) => resolveEndpoint(ep, registry));

  log(
    "analyze",
    `${entries.length} entries → ${analyzed.length} endpoints, ${registry.size} models` +
      (malformedSamples.length > 0 ? `, ${malformedSamples.length} malformed bodies` : ""),
  );

  return {
    endpoints: analyzed,
    models: registry.models,
    diagnostics: { entryCount: entries.length, malformedSamples },
  };
}
