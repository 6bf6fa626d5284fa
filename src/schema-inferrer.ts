/**
 * Schema Inferrer: Join JSON samples into a single type tree.
 *
 * Every sample is turned into its own shape with typeOf(), then shapes are
 * folded with mergeTypes(), the least upper bound on type trees. The join is
 * commutative and associative, so the order in which bodies were captured
 * never changes the inferred shape (field display order aside).
 *
 * Unions are kept canonical: at most one alternative per class (null, bool,
 * number, string, array, object), same-class members joined, alternatives
 * ordered by class. That is what makes the join associative.
 */

import { DEFAULT_ANALYSIS_OPTIONS } from "./config.js";
import { MalformedSampleError } from "./errors.js";
import type {
  FieldSpec,
  InferenceOptions,
  JsonValue,
  ObjectNode,
  ResolvedType,
  ScalarKind,
  TypeTree,
} from "./types.js";

// ── Constants ─────────────────────────────────────────────────────────────

const DEFAULT_OPTIONS: InferenceOptions = {
  maxUnionAlternatives: DEFAULT_ANALYSIS_OPTIONS.maxUnionAlternatives,
};

const MAX_SUMMARY_KEYS = 6;

export const UNKNOWN: TypeTree = { kind: "unknown" };
export const MIXED: TypeTree = { kind: "mixed" };

type UnionClass = "null" | "bool" | "number" | "string" | "array" | "object";

const CLASS_ORDER: UnionClass[] = ["null", "bool", "number", "string", "array", "object"];

type Member = Extract<TypeTree, { kind: "scalar" | "array" | "object" }>;

function scalar(kind: ScalarKind): TypeTree {
  return { kind: "scalar", scalar: kind };
}

function classOf(t: Member): UnionClass {
  if (t.kind === "array" || t.kind === "object") return t.kind;
  if (t.scalar === "int" || t.scalar === "float") return "number";
  return t.scalar;
}

// ── Fields ────────────────────────────────────────────────────────────────

/**
 * Build a field spec, moving any null out of the type and into the nullable
 * flag. A field seen only as null ends up as unknown + nullable.
 */
export function toField(type: TypeTree, optional: boolean, nullable: boolean): FieldSpec<TypeTree> {
  if (type.kind === "scalar" && type.scalar === "null") {
    return { type: UNKNOWN, optional, nullable: true };
  }
  if (type.kind === "union") {
    const rest = type.alternatives.filter((alt) => !(alt.kind === "scalar" && alt.scalar === "null"));
    if (rest.length !== type.alternatives.length) {
      const stripped: TypeTree = rest.length === 1 ? rest[0] : { kind: "union", alternatives: rest };
      return { type: stripped, optional, nullable: true };
    }
  }
  return { type, optional, nullable };
}

function ownField<T>(fields: Record<string, FieldSpec<T>>, key: string): FieldSpec<T> | undefined {
  return Object.hasOwn(fields, key) ? fields[key] : undefined;
}

// ── Sample shapes ─────────────────────────────────────────────────────────

/** Shape of a single JSON sample. Every object field is required. */
export function typeOf(value: JsonValue, options: InferenceOptions = DEFAULT_OPTIONS): TypeTree {
  if (value === null) return scalar("null");
  if (typeof value === "boolean") return scalar("bool");
  if (typeof value === "number") return scalar(Number.isInteger(value) ? "int" : "float");
  if (typeof value === "string") return scalar("string");

  if (Array.isArray(value)) {
    // An empty array keeps the unknown element, which any later element replaces
    let element = UNKNOWN;
    for (const item of value) {
      element = mergeTypes(element, typeOf(item, options), options);
    }
    return { kind: "array", element };
  }

  // fromEntries keeps keys like "__proto__" as plain own properties
  const fields = Object.fromEntries(
    Object.entries(value).map(([key, v]): [string, FieldSpec<TypeTree>] => [
      key,
      toField(typeOf(v, options), false, false),
    ]),
  );
  return { kind: "object", fields };
}

// ── Join ──────────────────────────────────────────────────────────────────

function membersOf(t: TypeTree): Member[] {
  switch (t.kind) {
    case "union":
      return t.alternatives.flatMap(membersOf);
    case "unknown":
    case "mixed":
      return [];
    default:
      return [t];
  }
}

function mergeObjects(a: ObjectNode, b: ObjectNode, options: InferenceOptions): ObjectNode {
  const keys = [
    ...Object.keys(a.fields),
    ...Object.keys(b.fields).filter((k) => !Object.hasOwn(a.fields, k)),
  ];

  const fields = Object.fromEntries(keys.map((key): [string, FieldSpec<TypeTree>] => {
    const fa = ownField(a.fields, key);
    const fb = ownField(b.fields, key);
    if (fa && fb) {
      return [key, toField(
        mergeTypes(fa.type, fb.type, options),
        fa.optional || fb.optional,
        fa.nullable || fb.nullable,
      )];
    }
    // Seen on one side only: some sample lacked it
    const only = fa ?? fb;
    return [key, only ? { ...only, optional: true } : { type: UNKNOWN, optional: true, nullable: false }];
  }));

  return { kind: "object", fields };
}

function joinSameClass(a: Member, b: Member, options: InferenceOptions): Member {
  if (a.kind === "array" && b.kind === "array") {
    return { kind: "array", element: mergeTypes(a.element, b.element, options) };
  }
  if (a.kind === "object" && b.kind === "object") {
    return mergeObjects(a, b, options);
  }
  if (a.kind === "scalar" && b.kind === "scalar") {
    // Only int/float can differ within a class
    return a.scalar === b.scalar ? a : { kind: "scalar", scalar: "float" };
  }
  return a;
}

/**
 * Least upper bound of two type trees.
 *
 * unknown is the identity, mixed absorbs everything, int ⊔ float = float,
 * same-shaped containers merge recursively, anything else becomes a union
 * (collapsing to mixed past `maxUnionAlternatives`).
 */
export function mergeTypes(a: TypeTree, b: TypeTree, options: InferenceOptions = DEFAULT_OPTIONS): TypeTree {
  if (a.kind === "unknown") return b;
  if (b.kind === "unknown") return a;
  if (a.kind === "mixed" || b.kind === "mixed") return MIXED;

  const byClass = new Map<UnionClass, Member>();
  for (const member of [...membersOf(a), ...membersOf(b)]) {
    const cls = classOf(member);
    const existing = byClass.get(cls);
    byClass.set(cls, existing ? joinSameClass(existing, member, options) : member);
  }

  const alternatives: Member[] = [];
  for (const cls of CLASS_ORDER) {
    const member = byClass.get(cls);
    if (member) alternatives.push(member);
  }

  if (alternatives.length === 1) return alternatives[0];
  if (alternatives.length > options.maxUnionAlternatives) return MIXED;
  return { kind: "union", alternatives };
}

/**
 * Infer one type tree for a sequence of samples taken from the same logical
 * position. No samples → unknown.
 */
export function inferSchema(samples: Iterable<JsonValue>, options: InferenceOptions = DEFAULT_OPTIONS): TypeTree {
  let result = UNKNOWN;
  for (const sample of samples) {
    result = mergeTypes(result, typeOf(sample, options), options);
  }
  return result;
}

// ── Parsing ───────────────────────────────────────────────────────────────

export type ParseResult =
  | { ok: true; value: JsonValue }
  | { ok: false; error: MalformedSampleError };

export function safeParseJson(text: string): ParseResult {
  try {
    const value: JsonValue = JSON.parse(text);
    return { ok: true, value };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: new MalformedSampleError(message) };
  }
}

/** Content types worth parsing. A missing content type is given the benefit of the doubt. */
export function isJsonContentType(contentType: string | undefined): boolean {
  if (!contentType) return true;
  const ct = contentType.toLowerCase();
  return ct.includes("/json") || ct.includes("+json") || ct.includes("text/json");
}

// ── Comparison & display ──────────────────────────────────────────────────

/**
 * Order-insensitive structural key. Two trees are equal iff their keys are.
 * Works on resolved trees too (refs compare by model name).
 */
export function canonicalKey(t: TypeTree | ResolvedType): string {
  switch (t.kind) {
    case "scalar":
      return t.scalar;
    case "unknown":
      return "?";
    case "mixed":
      return "*";
    case "ref":
      return `@${t.model}`;
    case "array":
      return `[${canonicalKey(t.element)}]`;
    case "union": {
      const alternatives: (TypeTree | ResolvedType)[] = t.alternatives;
      return `(${alternatives.map(canonicalKey).join("|")})`;
    }
    case "object":
      return canonicalFieldsKey(t.fields);
  }
}

export function canonicalFieldsKey(fields: Record<string, FieldSpec<TypeTree | ResolvedType>>): string {
  const parts = Object.keys(fields).sort().map((key) => {
    const f = fields[key];
    return `${JSON.stringify(key)}${f.optional ? "?" : ""}${f.nullable ? "~" : ""}:${canonicalKey(f.type)}`;
  });
  return `{${parts.join(",")}}`;
}

export function typeTreeEquals(a: TypeTree | ResolvedType, b: TypeTree | ResolvedType): boolean {
  return canonicalKey(a) === canonicalKey(b);
}

/** Compact shape summary, e.g. "object{id,name,email}" or "array<object{id,title}>". */
export function describeType(t: TypeTree | ResolvedType): string {
  switch (t.kind) {
    case "scalar":
      return t.scalar;
    case "unknown":
    case "mixed":
      return t.kind;
    case "ref":
      return t.model;
    case "array":
      return `array<${describeType(t.element)}>`;
    case "union": {
      const alternatives: (TypeTree | ResolvedType)[] = t.alternatives;
      return alternatives.map(describeType).join("|");
    }
    case "object": {
      const keys = Object.keys(t.fields);
      const shown = keys.slice(0, MAX_SUMMARY_KEYS);
      const suffix = keys.length > MAX_SUMMARY_KEYS ? `,+${keys.length - MAX_SUMMARY_KEYS}` : "";
      return `object{${shown.join(",")}${suffix}}`;
    }
  }
}
