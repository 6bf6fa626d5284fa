// ── Traffic ───────────────────────────────────────────────────────────────

export interface NameValue {
  name: string;
  value: string;
}

/** A request or response payload as captured (already decoded to text). */
export interface TrafficBody {
  text: string;
  contentType?: string;
}

export interface TrafficUrl {
  scheme: string;
  host: string;
  /** Raw pathname as captured, trailing and repeated slashes kept */
  pathname: string;
  /** Path split on "/", empty segments dropped: /api/users/ → ["api", "users"] */
  pathSegments: string[];
  /** Query pairs in the order they appeared in the URL */
  query: NameValue[];
}

/** One recorded request/response pair. Never mutated once read. */
export interface TrafficEntry {
  /** Position in the capture */
  readonly index: number;
  /** Uppercase HTTP method */
  readonly method: string;
  readonly url: TrafficUrl;
  /** Only consulted when replaying */
  readonly requestHeaders: readonly NameValue[];
  readonly requestBody?: TrafficBody;
  readonly status: number;
  readonly responseBody?: TrafficBody;
}

// ── JSON ──────────────────────────────────────────────────────────────────

export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

// ── Type trees ────────────────────────────────────────────────────────────

export type ScalarKind = "null" | "bool" | "int" | "float" | "string";

export interface ScalarNode {
  kind: "scalar";
  scalar: ScalarKind;
}

export interface UnknownNode {
  kind: "unknown";
}

/** Produced when a union grows past the configured cap. Absorbs everything. */
export interface MixedNode {
  kind: "mixed";
}

export interface FieldSpec<T> {
  type: T;
  optional: boolean;
  nullable: boolean;
}

/** Inferred shape of a JSON position. */
export type TypeTree =
  | ScalarNode
  | UnknownNode
  | MixedNode
  | { kind: "array"; element: TypeTree }
  | { kind: "object"; fields: Record<string, FieldSpec<TypeTree>> }
  | { kind: "union"; alternatives: TypeTree[] };

export type ObjectNode = Extract<TypeTree, { kind: "object" }>;

/**
 * A type tree after model registration: every object is replaced by a
 * reference to a named model.
 */
export type ResolvedType =
  | ScalarNode
  | UnknownNode
  | MixedNode
  | { kind: "ref"; model: string }
  | { kind: "array"; element: ResolvedType }
  | { kind: "union"; alternatives: ResolvedType[] };

export interface NamedModel {
  name: string;
  fields: Record<string, FieldSpec<ResolvedType>>;
  /** Context names under which this shape was discovered, first-seen order */
  sources: string[];
}

// ── Endpoints ─────────────────────────────────────────────────────────────

export type PathParamType =
  | "numeric" | "uuid" | "hex" | "base64" | "date" | "slug" | "email" | "unknown" | "string";

export type TemplateSegment =
  | { kind: "literal"; value: string }
  | { kind: "param"; name: string };

export interface PathParam {
  name: string;
  /** Index into the path segments */
  position: number;
  type: PathParamType;
  /** Distinct observed values, first-seen order */
  examples: string[];
}

export interface QueryParam {
  name: string;
  required: boolean;
  example: string;
}

export interface BodyShape<T> {
  type: T;
  /** Bodies that parsed and contributed to the shape */
  sampleCount: number;
  /** Bodies that were present but were not JSON or failed to parse */
  skippedCount: number;
}

export interface ResponseShape<T> extends BodyShape<T> {
  /** "2xx", "4xx", … or the exact status when partitioning by code */
  statusKey: string;
  /** Distinct statuses observed in this partition, first-seen order */
  statuses: number[];
}

export type EndpointCategory = "read" | "write" | "delete" | "other";

/** A consolidated endpoint. T is TypeTree before model registration, ResolvedType after. */
export interface Endpoint<T = TypeTree> {
  /** "GET /users/{id}" */
  key: string;
  method: string;
  pathTemplate: string;
  segments: TemplateSegment[];
  pathParams: PathParam[];
  queryParams: QueryParam[];
  requestBody?: BodyShape<T>;
  responses: ResponseShape<T>[];
  /** Raw entries of the group, capture order */
  examples: TrafficEntry[];
  operationName: string;
  description: string;
  category: EndpointCategory;
}

export type AnalyzedEndpoint = Endpoint<ResolvedType>;

// ── Options & results ─────────────────────────────────────────────────────

export interface InferenceOptions {
  /** Unions with more alternatives than this collapse to "mixed" */
  maxUnionAlternatives: number;
}

export type ParamNaming = "generic" | "resource";

export interface TemplateOptions {
  /** Dynamic-segment detectors to apply; others are ignored */
  detectors: readonly PathParamType[];
  /** Distinct plain-word values at one position needed to template it; 0 disables */
  minDistinctValues: number;
  paramNaming: ParamNaming;
}

export interface AnalysisOptions extends InferenceOptions, TemplateOptions {
  statusPartition: "class" | "code";
}

export interface MalformedSampleRecord {
  entryIndex: number;
  side: "request" | "response";
  message: string;
}

export interface AnalysisDiagnostics {
  entryCount: number;
  malformedSamples: MalformedSampleRecord[];
}

export interface AnalysisResult {
  endpoints: AnalyzedEndpoint[];
  models: NamedModel[];
  diagnostics: AnalysisDiagnostics;
}
