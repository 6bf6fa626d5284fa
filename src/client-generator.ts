/**
 * Client Generator: Emit a self-contained TypeScript client for the
 * analyzed endpoints.
 *
 * The output carries the model declarations followed by one class with an
 * async method per endpoint. Path parameters are positional, the request
 * body (when the endpoint took one) follows, and query parameters come last
 * as an object.
 */

import {
  renderDeclarationBody,
  requestAliasName,
  responseAliasName,
  shapeTypeName,
} from "./declaration-generator.js";
import { renameModels } from "./model-namer.js";
import { propertyKey, toPascalCase } from "./naming.js";
import type { AnalysisResult, AnalyzedEndpoint } from "./types.js";

export interface ClientOptions {
  /** Generated class name, default "ApiClient" */
  className?: string;
  /** Default base URL baked into the client; the captured origin otherwise */
  baseUrl?: string;
}

const FALLBACK_BASE_URL = "http://localhost";

function capturedBaseUrl(result: AnalysisResult): string {
  const first = result.endpoints[0]?.examples[0];
  return first ? `${first.url.scheme}://${first.url.host}` : FALLBACK_BASE_URL;
}

function successType(endpoint: AnalyzedEndpoint): string {
  const ok = endpoint.responses.find((r) => r.statusKey.startsWith("2"));
  return ok ? shapeTypeName(ok.type, responseAliasName(endpoint, ok)) : "unknown";
}

function queryType(endpoint: AnalyzedEndpoint): string {
  const members = endpoint.queryParams.map(
    (q) => `${propertyKey(q.name)}${q.required ? "" : "?"}: QueryValue`,
  );
  return `{ ${members.join("; ")} }`;
}

/** `/users/${encodeURIComponent(String(id))}` */
function pathExpression(endpoint: AnalyzedEndpoint): string {
  if (endpoint.pathParams.length === 0) return JSON.stringify(endpoint.pathTemplate);
  const parts = endpoint.segments.map((s) =>
    s.kind === "literal" ? s.value.replace(/[`$\\]/g, "\\$&") : `\${encodeURIComponent(String(${s.name}))}`,
  );
  return `\`/${parts.join("/")}\``;
}

function renderMethod(endpoint: AnalyzedEndpoint): string[] {
  const params = endpoint.pathParams.map((p) => `${p.name}: string | number`);

  const body = endpoint.requestBody;
  if (body) params.push(`body: ${shapeTypeName(body.type, requestAliasName(endpoint))}`);

  const hasQuery = endpoint.queryParams.length > 0;
  if (hasQuery) {
    const required = endpoint.queryParams.some((q) => q.required);
    params.push(`query${required ? "" : "?"}: ${queryType(endpoint)}`);
  }

  const args = [JSON.stringify(endpoint.method), pathExpression(endpoint), hasQuery ? "query" : "undefined"];
  if (body) args.push("body");

  return [
    `  /** ${endpoint.description} (${endpoint.key}) */`,
    `  async ${endpoint.operationName}(${params.join(", ")}): Promise<${successType(endpoint)}> {`,
    `    return this.request(${args.join(", ")});`,
    "  }",
  ];
}

export function generateClientSource(analysis: AnalysisResult, options: ClientOptions = {}): string {
  const className = toPascalCase(options.className ?? "") || "ApiClient";
  const result = renameModels(analysis, new Set([className, `${className}Options`, "QueryValue"]));
  const baseUrl = options.baseUrl ?? capturedBaseUrl(result);
  const models = renderDeclarationBody(result);
  const methods = result.endpoints.flatMap((ep) => ["", ...renderMethod(ep)]);

  return `/**
 * ${className}
 * Generated from ${result.diagnostics.entryCount} captured entries.
 */

${models ? `${models}\n\n` : ""}export type QueryValue = string | number | boolean;

export interface ${className}Options {
  baseUrl?: string;
  headers?: Record<string, string>;
  fetch?: typeof fetch;
}

export class ${className} {
  readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: ${className}Options = {}) {
    this.baseUrl = (opts.baseUrl ?? ${JSON.stringify(baseUrl)}).replace(/\\/+$/, "");
    this.headers = opts.headers ?? {};
    this.fetchImpl = opts.fetch ?? fetch;
  }

  private async request<T>(
    method: string,
    path: string,
    query?: Record<string, QueryValue | undefined>,
    body?: unknown,
  ): Promise<T> {
    const url = new URL(this.baseUrl + path);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    const headers: Record<string, string> = { Accept: "application/json", ...this.headers };
    if (body !== undefined) headers["Content-Type"] = "application/json";

    const resp = await this.fetchImpl(url, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const text = await resp.text();
    if (!resp.ok) {
      throw new Error(\`\${method} \${path} failed: \${resp.status} \${text.slice(0, 200)}\`);
    }
    return (text ? JSON.parse(text) : undefined) as T;
  }
${methods.join("\n")}
}
`;
}
