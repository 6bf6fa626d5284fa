/**
 * Unit tests for schema-inferrer.ts
 *
 * Tests typeOf(), mergeTypes() and inferSchema(): scalar widening, null
 * handling, optional field discovery, union canonicalization and the cap,
 * plus the lattice laws (commutativity, associativity, soundness) over a
 * small pool of heterogeneous samples.
 */

import { describe, it, expect } from "vitest";
import {
  MIXED,
  UNKNOWN,
  canonicalKey,
  describeType,
  inferSchema,
  isJsonContentType,
  mergeTypes,
  safeParseJson,
  toField,
  typeOf,
  typeTreeEquals,
} from "../../schema-inferrer.js";
import { MalformedSampleError } from "../../errors.js";
import type { JsonValue, TypeTree } from "../../types.js";
import { accepts } from "../helpers.js";

const INT: TypeTree = { kind: "scalar", scalar: "int" };
const FLOAT: TypeTree = { kind: "scalar", scalar: "float" };
const STRING: TypeTree = { kind: "scalar", scalar: "string" };
const BOOL: TypeTree = { kind: "scalar", scalar: "bool" };
const NULL: TypeTree = { kind: "scalar", scalar: "null" };

const POOL: JsonValue[] = [
  1,
  2.5,
  "text",
  null,
  true,
  [],
  [1, 2],
  ["a", null],
  { id: 1, name: "Ann" },
  { id: 2, email: null },
  { id: 3.5, name: "Bob", tags: ["x"] },
  { nested: { deep: [{ a: 1 }] } },
  { nested: { deep: [{ a: "b", c: false }] } },
];

// ── typeOf ─────────────────────────────────────────────────────────────────

describe("typeOf", () => {
  it("classifies scalars", () => {
    expect(typeOf(1)).toEqual(INT);
    expect(typeOf(-7)).toEqual(INT);
    expect(typeOf(1.5)).toEqual(FLOAT);
    expect(typeOf("x")).toEqual(STRING);
    expect(typeOf(false)).toEqual(BOOL);
    expect(typeOf(null)).toEqual(NULL);
  });

  it("treats 1.0 as an integer", () => {
    expect(typeOf(JSON.parse("1.0"))).toEqual(INT);
  });

  it("gives an empty array an unknown element", () => {
    expect(typeOf([])).toEqual({ kind: "array", element: UNKNOWN });
  });

  it("joins array elements", () => {
    expect(typeOf([1, 2.5])).toEqual({ kind: "array", element: FLOAT });
    expect(typeOf([1, null])).toEqual({ kind: "array", element: { kind: "union", alternatives: [NULL, INT] } });
  });

  it("marks every field of a single object required", () => {
    expect(typeOf({ id: 1, name: "Ann" })).toEqual({
      kind: "object",
      fields: {
        id: { type: INT, optional: false, nullable: false },
        name: { type: STRING, optional: false, nullable: false },
      },
    });
  });

  it("turns a null field into unknown + nullable", () => {
    expect(typeOf({ deletedAt: null })).toEqual({
      kind: "object",
      fields: { deletedAt: { type: UNKNOWN, optional: false, nullable: true } },
    });
  });

  it("keeps __proto__ as an ordinary field", () => {
    const t = typeOf(JSON.parse('{"__proto__": 1}'));
    expect(t.kind).toBe("object");
    if (t.kind === "object") {
      expect(Object.keys(t.fields)).toEqual(["__proto__"]);
    }
  });
});

// ── mergeTypes ─────────────────────────────────────────────────────────────

describe("mergeTypes", () => {
  it("uses unknown as the identity", () => {
    expect(mergeTypes(UNKNOWN, STRING)).toEqual(STRING);
    expect(mergeTypes(STRING, UNKNOWN)).toEqual(STRING);
  });

  it("lets mixed absorb everything", () => {
    expect(mergeTypes(MIXED, INT)).toEqual(MIXED);
    expect(mergeTypes(typeOf({ a: 1 }), MIXED)).toEqual(MIXED);
  });

  it("widens int and float to float", () => {
    expect(mergeTypes(INT, FLOAT)).toEqual(FLOAT);
    expect(mergeTypes(FLOAT, INT)).toEqual(FLOAT);
    expect(mergeTypes(INT, INT)).toEqual(INT);
  });

  it("unions a tree-level null with the other shape", () => {
    expect(mergeTypes(STRING, NULL)).toEqual({ kind: "union", alternatives: [NULL, STRING] });
  });

  it("joins same-class members inside a union", () => {
    const intOrString = mergeTypes(INT, STRING);
    expect(mergeTypes(intOrString, FLOAT)).toEqual({ kind: "union", alternatives: [FLOAT, STRING] });
  });

  it("orders union alternatives by class", () => {
    const t = mergeTypes(mergeTypes(STRING, BOOL), typeOf([1]));
    expect(t).toEqual({ kind: "union", alternatives: [BOOL, STRING, { kind: "array", element: INT }] });
  });

  it("collapses unions past the cap to mixed", () => {
    expect(inferSchema([1, "a"], { maxUnionAlternatives: 2 })).toEqual({
      kind: "union",
      alternatives: [INT, STRING],
    });
    expect(inferSchema([1, "a", true], { maxUnionAlternatives: 2 })).toEqual(MIXED);
  });
});

// ── inferSchema ────────────────────────────────────────────────────────────

describe("inferSchema", () => {
  it("returns unknown for no samples", () => {
    expect(inferSchema([])).toEqual(UNKNOWN);
  });

  it("marks a field missing from some samples optional", () => {
    const t = inferSchema([{ id: 1, email: "a@example.com" }, { id: 2 }]);
    expect(t).toEqual({
      kind: "object",
      fields: {
        id: { type: INT, optional: false, nullable: false },
        email: { type: STRING, optional: true, nullable: false },
      },
    });
  });

  it("moves nulls into the nullable flag instead of a union", () => {
    const t = inferSchema([{ name: "Ann" }, { name: null }]);
    expect(t).toEqual({
      kind: "object",
      fields: { name: { type: STRING, optional: false, nullable: true } },
    });
  });

  it("keeps nullability next to a field union", () => {
    const t = inferSchema([{ v: 1 }, { v: "a" }, { v: null }]);
    expect(t).toEqual({
      kind: "object",
      fields: { v: { type: { kind: "union", alternatives: [INT, STRING] }, optional: false, nullable: true } },
    });
  });

  it("widens numeric fields across samples", () => {
    const t = inferSchema([{ price: 10 }, { price: 10.5 }]);
    expect(t).toEqual({
      kind: "object",
      fields: { price: { type: FLOAT, optional: false, nullable: false } },
    });
  });

  it("merges objects nested in arrays", () => {
    const t = inferSchema([{ items: [{ a: 1 }] }, { items: [{ a: 2, b: "x" }] }]);
    expect(t).toEqual({
      kind: "object",
      fields: {
        items: {
          type: {
            kind: "array",
            element: {
              kind: "object",
              fields: {
                a: { type: INT, optional: false, nullable: false },
                b: { type: STRING, optional: true, nullable: false },
              },
            },
          },
          optional: false,
          nullable: false,
        },
      },
    });
  });

  it("does not depend on sample order", () => {
    const forward = inferSchema(POOL);
    const backward = inferSchema([...POOL].reverse());
    expect(canonicalKey(forward)).toBe(canonicalKey(backward));
  });

  it("accepts every sample it was built from", () => {
    const objects = POOL.filter((v) => typeof v === "object" && v !== null && !Array.isArray(v));
    const t = inferSchema(objects);
    for (const sample of objects) {
      expect(accepts(t, sample)).toBe(true);
    }
  });
});

// ── Lattice laws ───────────────────────────────────────────────────────────

describe("join laws", () => {
  const shapes = POOL.map((v) => typeOf(v));

  it("is commutative", () => {
    for (const a of shapes) {
      for (const b of shapes) {
        expect(canonicalKey(mergeTypes(a, b))).toBe(canonicalKey(mergeTypes(b, a)));
      }
    }
  });

  it("is associative", () => {
    for (const a of shapes) {
      for (const b of shapes) {
        for (const c of shapes) {
          const left = mergeTypes(mergeTypes(a, b), c);
          const right = mergeTypes(a, mergeTypes(b, c));
          expect(canonicalKey(left)).toBe(canonicalKey(right));
        }
      }
    }
  });

  it("produces a shape that accepts both inputs", () => {
    for (let i = 0; i < POOL.length; i++) {
      for (let j = 0; j < POOL.length; j++) {
        const joined = mergeTypes(shapes[i], shapes[j]);
        expect(accepts(joined, POOL[i])).toBe(true);
        expect(accepts(joined, POOL[j])).toBe(true);
      }
    }
  });
});

// ── Helpers ────────────────────────────────────────────────────────────────

describe("toField", () => {
  it("strips null out of a union", () => {
    expect(toField({ kind: "union", alternatives: [NULL, STRING] }, false, false)).toEqual({
      type: STRING,
      optional: false,
      nullable: true,
    });
  });
});

describe("canonicalKey / typeTreeEquals", () => {
  it("ignores field order", () => {
    expect(typeTreeEquals(typeOf({ a: 1, b: "x" }), typeOf({ b: "y", a: 2 }))).toBe(true);
  });

  it("distinguishes optional and nullable fields", () => {
    expect(canonicalKey(inferSchema([{ a: 1 }, {}]))).toBe('{"a"?:int}');
    expect(canonicalKey(inferSchema([{ a: 1 }, { a: null }]))).toBe('{"a"~:int}');
  });
});

describe("describeType", () => {
  it("summarizes objects and arrays", () => {
    expect(describeType(typeOf({ id: 1, name: "x" }))).toBe("object{id,name}");
    expect(describeType(typeOf([1]))).toBe("array<int>");
    expect(describeType(mergeTypes(INT, STRING))).toBe("int|string");
  });

  it("truncates long key lists", () => {
    const t = typeOf({ a: 1, b: 1, c: 1, d: 1, e: 1, f: 1, g: 1, h: 1 });
    expect(describeType(t)).toBe("object{a,b,c,d,e,f,+2}");
  });
});

describe("safeParseJson", () => {
  it("parses valid JSON", () => {
    expect(safeParseJson('{"a":1}')).toEqual({ ok: true, value: { a: 1 } });
  });

  it("returns a MalformedSampleError for invalid JSON", () => {
    const result = safeParseJson("{not json");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(MalformedSampleError);
  });
});

describe("isJsonContentType", () => {
  it("recognizes JSON media types", () => {
    expect(isJsonContentType("application/json; charset=utf-8")).toBe(true);
    expect(isJsonContentType("application/vnd.api+json")).toBe(true);
    expect(isJsonContentType(undefined)).toBe(true);
  });

  it("rejects other media types", () => {
    expect(isJsonContentType("text/html")).toBe(false);
    expect(isJsonContentType("application/x-www-form-urlencoded")).toBe(false);
  });
});
