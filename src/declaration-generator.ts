/**
 * Declaration Generator: Render named models and endpoint shapes as
 * TypeScript declarations.
 *
 * Every model becomes an interface. Endpoint request/response shapes that
 * are not a bare model reference (lists, unions, scalars) get a type alias
 * named after the endpoint's operation.
 */

import { propertyKey, toPascalCase } from "./naming.js";
import type { AnalysisResult, AnalyzedEndpoint, NamedModel, ResolvedType, ResponseShape } from "./types.js";

export interface DeclarationOptions {
  /** First line of the header comment */
  title?: string;
}

const SCALAR_TS = {
  null: "null",
  bool: "boolean",
  int: "number",
  float: "number",
  string: "string",
} as const;

/** TypeScript type expression for a resolved type. */
export function renderType(t: ResolvedType): string {
  switch (t.kind) {
    case "scalar":
      return SCALAR_TS[t.scalar];
    case "unknown":
    case "mixed":
      return "unknown";
    case "ref":
      return t.model;
    case "array": {
      const element = renderType(t.element);
      return t.element.kind === "union" ? `(${element})[]` : `${element}[]`;
    }
    case "union":
      return t.alternatives.map(renderType).join(" | ");
  }
}

export function renderModel(model: NamedModel): string {
  const lines: string[] = [];
  if (model.sources.length > 1 || model.sources[0] !== model.name) {
    lines.push(`/** Seen as: ${model.sources.join(", ")} */`);
  }
  lines.push(`export interface ${model.name} {`);
  for (const [key, field] of Object.entries(model.fields)) {
    const type = renderType(field.type);
    const nullable = field.nullable && type !== "unknown" ? " | null" : "";
    lines.push(`  ${propertyKey(key)}${field.optional ? "?" : ""}: ${type}${nullable};`);
  }
  lines.push("}");
  return lines.join("\n");
}

// ── Endpoint aliases ──────────────────────────────────────────────────────

export function requestAliasName(endpoint: AnalyzedEndpoint): string {
  return `${toPascalCase(endpoint.operationName)}Body`;
}

/**
 * GetUser + first success partition → GetUserResponse; every other partition
 * carries its status key (GetUserResponse4xx, GetUserResponse201).
 */
export function responseAliasName(endpoint: AnalyzedEndpoint, response: ResponseShape<ResolvedType>): string {
  const base = `${toPascalCase(endpoint.operationName)}Response`;
  const primary = endpoint.responses.find((r) => r.statusKey.startsWith("2"));
  return response.statusKey === primary?.statusKey ? base : `${base}${response.statusKey}`;
}

/**
 * Type name a caller should use for an endpoint shape: the model itself for a
 * bare reference, the generated alias otherwise.
 */
export function shapeTypeName(type: ResolvedType, aliasName: string): string {
  return type.kind === "ref" ? type.model : aliasName;
}

function renderEndpointAliases(endpoint: AnalyzedEndpoint): string[] {
  const lines: string[] = [];
  const body = endpoint.requestBody;
  if (body && body.type.kind !== "ref") {
    lines.push(`/** ${endpoint.key} request body */`);
    lines.push(`export type ${requestAliasName(endpoint)} = ${renderType(body.type)};`);
  }
  for (const response of endpoint.responses) {
    if (response.type.kind === "ref") continue;
    lines.push(`/** ${endpoint.key} → ${response.statuses.join(", ")} */`);
    lines.push(`export type ${responseAliasName(endpoint, response)} = ${renderType(response.type)};`);
  }
  return lines;
}

/** Model interfaces and endpoint aliases, without a header. */
export function renderDeclarationBody(result: AnalysisResult): string {
  const sections: string[] = result.models.map(renderModel);

  const aliases = result.endpoints.flatMap(renderEndpointAliases);
  if (aliases.length > 0) {
    sections.push(["// ── Endpoint shapes ──", "", ...aliases].join("\n"));
  }
  return sections.join("\n\n");
}

export function generateDeclarations(result: AnalysisResult, options: DeclarationOptions = {}): string {
  const title = options.title ?? "API models";
  const header = [
    "/**",
    ` * ${title}`,
    ` * Inferred from ${result.diagnostics.entryCount} captured entries.`,
    " */",
  ].join("\n");

  const body = renderDeclarationBody(result);
  return body ? `${header}\n\n${body}\n` : `${header}\n`;
}
