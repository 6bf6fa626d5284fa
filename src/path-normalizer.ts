/**
 * Path Normalizer: Turn concrete request paths into path templates.
 *
 * Entries that share a method and a segment count are laid out as a trie of
 * path segments. At every trie node, segment values that look like
 * identifiers (IDs, UUIDs, tokens, dates) collapse into one placeholder
 * branch; plain words stay as separate literal branches so /users and
 * /orders never merge. When a position under a literal parent carries many
 * distinct plain words (slugs, usernames), variability alone turns it into
 * a placeholder.
 *
 * e.g. /users/123, /users/456 → /users/{id}
 */

import { ALL_DETECTORS } from "./config.js";
import { withNumericSuffix } from "./naming.js";
import type { PathParam, PathParamType, TemplateOptions, TemplateSegment, TrafficEntry } from "./types.js";

// ── Detection patterns (ordered by specificity) ───────────────────────────

const PATTERNS = {
  uuid: /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i,
  numeric: /^\d+$/,
  hex: /^[0-9a-f]{8,}$/i,
  base64: /^[A-Za-z0-9+/]{8,}={0,2}$/,
  date: /^\d{4}-\d{2}-\d{2}$/,
  email: /^[^@]+@[^@]+\.[^@]+$/,
  /** Slugs only if they look like generated IDs (mix of letters/digits with dashes) */
  slug: /^[a-z0-9]+-[a-z0-9]+-[a-z0-9]+(?:-[a-z0-9]+)*$/i,
} as const;

// ── Resource name → parameter name mapping ────────────────────────────────

const RESOURCE_NAMES: Record<string, string[]> = {
  user: ["user", "users", "customer", "customers", "member", "members", "account", "accounts", "profile", "profiles", "people"],
  product: ["product", "products", "item", "items", "sku", "skus", "listing", "listings"],
  order: ["order", "orders", "transaction", "transactions", "purchase", "purchases"],
  post: ["post", "posts", "article", "articles", "entry", "entries", "story", "stories"],
  comment: ["comment", "comments", "reply", "replies", "review", "reviews"],
  message: ["message", "messages", "notification", "notifications", "conversation", "conversations"],
  file: ["file", "files", "document", "documents", "attachment", "attachments", "upload", "uploads"],
  project: ["project", "projects", "workspace", "workspaces", "repo", "repos"],
  team: ["team", "teams", "group", "groups", "org", "orgs", "organization", "organizations"],
};

/** Static path segments that are never dynamic (API conventions). */
const STATIC_SEGMENTS = new Set([
  "api", "v1", "v2", "v3", "v4", "graphql", "rest", "rpc",
  "auth", "login", "logout", "signup", "register", "token", "refresh", "verify",
  "search", "filter", "sort", "export", "import", "bulk", "batch",
  "health", "status", "info", "version", "config", "settings", "preferences",
  "me", "self", "current", "public", "private", "internal", "admin",
  "list", "create", "update", "delete", "get", "set",
  "new", "edit", "view", "detail", "details", "summary",
  "count", "stats", "analytics", "metrics", "reports",
  "upload", "download",
]);

const VERSION_PATTERN = /^v\d+(\.\d+)*$/;

// ── Segment classification ────────────────────────────────────────────────

/**
 * Detect the type of a dynamic path segment.
 * Returns null for static-looking segments and for types not in `detectors`.
 */
export function detectParamType(
  segment: string,
  detectors: readonly PathParamType[] = ALL_DETECTORS,
): PathParamType | null {
  if (VERSION_PATTERN.test(segment)) return null;
  if (STATIC_SEGMENTS.has(segment.toLowerCase())) return null;

  const enabled = (type: PathParamType) => detectors.includes(type);

  if (enabled("uuid") && PATTERNS.uuid.test(segment)) return "uuid";
  if (enabled("email") && PATTERNS.email.test(segment)) return "email";
  if (enabled("date") && PATTERNS.date.test(segment)) return "date";
  if (enabled("numeric") && PATTERNS.numeric.test(segment)) return "numeric";
  if (enabled("hex") && PATTERNS.hex.test(segment)) return "hex";
  if (enabled("slug") && PATTERNS.slug.test(segment) && segment.length >= 8) return "slug";
  // base64 tokens tend to be long and used as session/auth tokens in URLs
  if (enabled("base64") && PATTERNS.base64.test(segment) && segment.length >= 16) return "base64";

  // Short alphanumeric strings that look like short IDs (e.g., "abc123").
  // Only if they contain both letters and digits; pure words are resource names
  if (enabled("unknown") && /^[a-z0-9]{4,}$/i.test(segment) && /[a-z]/i.test(segment) && /\d/.test(segment)) {
    return "unknown";
  }

  return null;
}

/**
 * Derive a parameter name from the preceding literal segment.
 *
 * /users/123 → "userId", /unknown/xyz → "unknownId", /{x} → "id"
 */
export function deriveParamName(prevSegment: string | undefined, paramType: PathParamType): string {
  if (paramType === "email") return "email";
  if (paramType === "date") return "date";
  if (!prevSegment) return "id";

  const prev = prevSegment.toLowerCase();
  for (const [resourceType, names] of Object.entries(RESOURCE_NAMES)) {
    if (names.includes(prev)) return `${resourceType}Id`;
  }

  let singular = prev.replace(/[^a-z0-9]+(.)/g, (_, c: string) => c.toUpperCase());
  if (singular.endsWith("ies")) {
    singular = singular.slice(0, -3) + "y";
  } else if (singular.endsWith("ses") || singular.endsWith("xes") || singular.endsWith("zes")) {
    singular = singular.slice(0, -2);
  } else if (singular.endsWith("s") && !singular.endsWith("ss")) {
    singular = singular.slice(0, -1);
  }
  return `${singular}Id`;
}

// ── Templating ────────────────────────────────────────────────────────────

type Slot =
  | { kind: "literal"; value: string }
  | { kind: "param"; type: PathParamType };

export interface TemplatedGroup {
  segments: TemplateSegment[];
  pathParams: PathParam[];
  /** Input order */
  entries: TrafficEntry[];
}

/** Position of each entry in the caller's input; `index` is not trusted for ordering. */
type InputOrder = ReadonlyMap<TrafficEntry, number>;

function byInputOrder(order: InputOrder): (a: TrafficEntry, b: TrafficEntry) => number {
  return (a, b) => (order.get(a) ?? 0) - (order.get(b) ?? 0);
}

function combineTypes(types: Set<PathParamType>): PathParamType {
  if (types.size === 1) {
    const [only] = types;
    return only;
  }
  return "string";
}

function splitAt(
  entries: TrafficEntry[],
  position: number,
  prefix: Slot[],
  options: TemplateOptions,
  order: InputOrder,
  out: { slots: Slot[]; entries: TrafficEntry[] }[],
): void {
  const depth = entries[0]?.url.pathSegments.length ?? 0;
  if (position >= depth) {
    out.push({ slots: prefix, entries });
    return;
  }

  const byValue = new Map<string, TrafficEntry[]>();
  for (const entry of entries) {
    const value = entry.url.pathSegments[position];
    const bucket = byValue.get(value);
    if (bucket) bucket.push(entry);
    else byValue.set(value, [entry]);
  }

  const dynamic: TrafficEntry[] = [];
  const dynamicTypes = new Set<PathParamType>();
  let literals: [string, TrafficEntry[]][] = [];

  for (const [value, bucket] of byValue) {
    const type = detectParamType(value, options.detectors);
    if (type) {
      dynamic.push(...bucket);
      dynamicTypes.add(type);
    } else {
      literals.push([value, bucket]);
    }
  }

  const parent = prefix[position - 1];
  if (
    options.minDistinctValues > 0 &&
    literals.length >= options.minDistinctValues &&
    parent?.kind === "literal"
  ) {
    for (const [, bucket] of literals) dynamic.push(...bucket);
    dynamicTypes.add("string");
    literals = [];
  }

  if (dynamic.length > 0) {
    const slot: Slot = { kind: "param", type: combineTypes(dynamicTypes) };
    splitAt(dynamic.sort(byInputOrder(order)), position + 1, [...prefix, slot], options, order, out);
  }
  for (const [value, bucket] of literals) {
    splitAt(bucket, position + 1, [...prefix, { kind: "literal", value }], options, order, out);
  }
}

function nameParams(
  slots: Slot[],
  entries: TrafficEntry[],
  options: TemplateOptions,
): { segments: TemplateSegment[]; pathParams: PathParam[] } {
  const used = new Set<string>();
  const segments: TemplateSegment[] = [];
  const pathParams: PathParam[] = [];

  slots.forEach((slot, position) => {
    if (slot.kind === "literal") {
      segments.push({ kind: "literal", value: slot.value });
      return;
    }

    const prev = slots[position - 1];
    const base = options.paramNaming === "resource"
      ? deriveParamName(prev?.kind === "literal" ? prev.value : undefined, slot.type)
      : "id";
    const name = withNumericSuffix(base, (n) => used.has(n));
    used.add(name);

    const examples: string[] = [];
    for (const entry of entries) {
      const value = entry.url.pathSegments[position];
      if (!examples.includes(value)) examples.push(value);
    }

    segments.push({ kind: "param", name });
    pathParams.push({ name, position, type: slot.type, examples });
  });

  return { segments, pathParams };
}

/**
 * Group entries into path templates. Callers pass entries that already share
 * a method and a segment count; groups and their entries keep input order.
 */
export function buildPathTemplates(entries: TrafficEntry[], options: TemplateOptions): TemplatedGroup[] {
  if (entries.length === 0) return [];

  const order: InputOrder = new Map(entries.map((entry, i) => [entry, i]));
  const compare = byInputOrder(order);
  const leaves: { slots: Slot[]; entries: TrafficEntry[] }[] = [];
  splitAt(entries, 0, [], options, order, leaves);

  return leaves
    .map((leaf) => ({ ...nameParams(leaf.slots, leaf.entries, options), entries: leaf.entries }))
    .sort((a, b) => compare(a.entries[0], b.entries[0]));
}

/** "/users/{id}/orders". The root path renders as "/". */
export function renderPathTemplate(segments: TemplateSegment[]): string {
  return "/" + segments.map((s) => (s.kind === "literal" ? s.value : `{${s.name}}`)).join("/");
}
