/**
 * har-typegen - infer typed models and a client from recorded HTTP traffic.
 *
 *   const entries = await readHarFile("capture.har");
 *   const result = analyzeTraffic(entries);
 *   const source = generateClientSource(result, { className: "ShopClient" });
 */

export { analyzeTraffic, serializeEndpoint, type SerializedEndpoint } from "./analyze.js";
export { generateClientSource, type ClientOptions } from "./client-generator.js";
export { DEFAULT_ANALYSIS_OPTIONS, loadConfig, type AppConfig } from "./config.js";
export { generateDeclarations, renderType, type DeclarationOptions } from "./declaration-generator.js";
export { consolidateEndpoints, type ConsolidationResult } from "./endpoint-analyzer.js";
export { HarFormatError, MalformedSampleError, ReplayError } from "./errors.js";
export { filterEntries, parseHar, readHarFile, type EntryFilter } from "./har-parser.js";
export { ModelRegistry } from "./model-namer.js";
export { buildPathTemplates, detectParamType, renderPathTemplate } from "./path-normalizer.js";
export {
  ReplayClient,
  type ReplayClientOptions,
  type ReplayRequest,
  type ReplayResponse,
} from "./replay-client.js";
export {
  canonicalKey,
  describeType,
  inferSchema,
  mergeTypes,
  safeParseJson,
  typeOf,
  typeTreeEquals,
} from "./schema-inferrer.js";
export { buildServer, startServer } from "./server.js";
export type * from "./types.js";
