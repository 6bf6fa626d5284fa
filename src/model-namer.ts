/**
 * Model Namer: Give every inferred object shape a stable name.
 *
 * register() walks a type tree bottom-up. Each object is turned into a named
 * model and replaced by a reference, so children are always registered
 * before their parents and structurally equal children already share a
 * reference by the time the parent's key is computed.
 *
 * One registry per analysis run; nothing is shared between runs.
 */

import { canonicalFieldsKey } from "./schema-inferrer.js";
import { singularize, toPascalCase, toTypeName, withNumericSuffix } from "./naming.js";
import type { AnalysisResult, FieldSpec, NamedModel, ResolvedType, TypeTree } from "./types.js";

function holdsArray(t: TypeTree): boolean {
  if (t.kind === "array") return true;
  if (t.kind === "union") return t.alternatives.some(holdsArray);
  return false;
}

/** Context of a nested field: User + address → UserAddress, User + items[] → UserItem */
function fieldContext(parent: string, key: string, type: TypeTree): string {
  const word = holdsArray(type) ? singularize(key) : key;
  return `${parent}${toPascalCase(word)}`;
}

export class ModelRegistry {
  private readonly ordered: NamedModel[] = [];
  private readonly byName = new Map<string, NamedModel>();
  /** canonical fields key → model name */
  private readonly byShape = new Map<string, string>();

  /**
   * Register every object inside `tree` under `contextName` and return the
   * tree with objects replaced by model references.
   */
  register(contextName: string, tree: TypeTree): ResolvedType {
    return this.resolve(toTypeName(contextName), tree);
  }

  /** Models in registration order. */
  get models(): NamedModel[] {
    return [...this.ordered];
  }

  get size(): number {
    return this.ordered.length;
  }

  get(name: string): NamedModel | undefined {
    return this.byName.get(name);
  }

  private resolve(context: string, tree: TypeTree): ResolvedType {
    switch (tree.kind) {
      case "scalar":
      case "unknown":
      case "mixed":
        return tree;
      case "array":
        return { kind: "array", element: this.resolve(context, tree.element) };
      case "union":
        return { kind: "union", alternatives: tree.alternatives.map((alt) => this.resolve(context, alt)) };
      case "object": {
        const fields = Object.fromEntries(
          Object.entries(tree.fields).map(([key, field]): [string, FieldSpec<ResolvedType>] => [
            key,
            {
              type: this.resolve(toTypeName(fieldContext(context, key, field.type)), field.type),
              optional: field.optional,
              nullable: field.nullable,
            },
          ]),
        );
        return { kind: "ref", model: this.intern(context, fields) };
      }
    }
  }

  private intern(context: string, fields: Record<string, FieldSpec<ResolvedType>>): string {
    const shape = canonicalFieldsKey(fields);
    const existing = this.byShape.get(shape);
    if (existing !== undefined) {
      const model = this.byName.get(existing);
      if (model && !model.sources.includes(context)) model.sources.push(context);
      return existing;
    }

    const name = withNumericSuffix(context, (n) => this.byName.has(n));
    const model: NamedModel = { name, fields, sources: [context] };
    this.ordered.push(model);
    this.byName.set(name, model);
    this.byShape.set(shape, name);
    return name;
  }
}

// ── Renaming ──────────────────────────────────────────────────────────────

function mapRefs(t: ResolvedType, rename: (name: string) => string): ResolvedType {
  switch (t.kind) {
    case "ref":
      return { kind: "ref", model: rename(t.model) };
    case "array":
      return { kind: "array", element: mapRefs(t.element, rename) };
    case "union":
      return { kind: "union", alternatives: t.alternatives.map((alt) => mapRefs(alt, rename)) };
    default:
      return t;
  }
}

/**
 * Move models off names the caller needs for its own declarations
 * (ApiClient → ApiClient2), rewriting every reference to them.
 */
export function renameModels(result: AnalysisResult, reserved: ReadonlySet<string>): AnalysisResult {
  const taken = new Set([...reserved, ...result.models.map((m) => m.name)]);
  const renames = new Map<string, string>();
  for (const model of result.models) {
    if (!reserved.has(model.name)) continue;
    const name = withNumericSuffix(model.name, (n) => taken.has(n));
    taken.add(name);
    renames.set(model.name, name);
  }
  if (renames.size === 0) return result;

  const rename = (name: string) => renames.get(name) ?? name;
  return {
    ...result,
    models: result.models.map((model) => ({
      ...model,
      name: rename(model.name),
      fields: Object.fromEntries(
        Object.entries(model.fields).map(([key, field]): [string, FieldSpec<ResolvedType>] => [
          key,
          { ...field, type: mapRefs(field.type, rename) },
        ]),
      ),
    })),
    endpoints: result.endpoints.map((endpoint) => ({
      ...endpoint,
      requestBody: endpoint.requestBody && {
        ...endpoint.requestBody,
        type: mapRefs(endpoint.requestBody.type, rename),
      },
      responses: endpoint.responses.map((response) => ({ ...response, type: mapRefs(response.type, rename) })),
    })),
  };
}
