/**
 * Unit tests for client-generator.ts
 */

import { describe, it, expect } from "vitest";
import { analyzeTraffic } from "../../analyze.js";
import { generateClientSource } from "../../client-generator.js";
import { makeEntries } from "../helpers.js";

const result = analyzeTraffic(makeEntries([
  { url: "https://api.example.com/users/1", responseBody: { id: 1, name: "Ann" } },
  {
    method: "POST",
    url: "https://api.example.com/users",
    requestBody: { name: "Ann" },
    status: 201,
    responseBody: { id: 1, name: "Ann" },
  },
  { url: "https://api.example.com/users?page=1", responseBody: [{ id: 1, name: "Ann" }] },
  { url: "https://api.example.com/users/1/orders?status=open" },
  { url: "https://api.example.com/users/2/orders" },
]));

describe("generateClientSource", () => {
  const source = generateClientSource(result, { className: "shop client" });

  it("names the class and defaults to the captured origin", () => {
    expect(source).toContain("export class ShopClient {");
    expect(source).toContain("export interface ShopClientOptions {");
    expect(source).toContain('this.baseUrl = (opts.baseUrl ?? "https://api.example.com").replace(/\\/+$/, "");');
  });

  it("includes the model declarations", () => {
    expect(source).toContain("export interface User {\n  id: number;\n  name: string;\n}");
    expect(source).toContain("export interface CreateUserRequest {\n  name: string;\n}");
    expect(source).toContain("export type ListUsersResponse = User[];");
    expect(source).toContain("export type ListUserOrdersResponse = unknown;");
  });

  it("takes path params positionally", () => {
    expect(source).toContain([
      "  /** Get a user by ID (GET /users/{id}) */",
      "  async getUser(id: string | number): Promise<User> {",
      '    return this.request("GET", `/users/${encodeURIComponent(String(id))}`, undefined);',
      "  }",
    ].join("\n"));
  });

  it("passes the request body", () => {
    expect(source).toContain([
      "  async createUser(body: CreateUserRequest): Promise<User> {",
      '    return this.request("POST", "/users", undefined, body);',
    ].join("\n"));
  });

  it("types query parameters as required or optional", () => {
    expect(source).toContain("  async listUsers(query: { page: QueryValue }): Promise<ListUsersResponse> {");
    expect(source).toContain(
      "  async listUserOrders(id: string | number, query?: { status?: QueryValue }): Promise<ListUserOrdersResponse> {",
    );
  });

  it("uses the default class name and an explicit base URL", () => {
    const other = generateClientSource(result, { baseUrl: "https://staging.example.com" });
    expect(other).toContain("export class ApiClient {");
    expect(other).toContain('(opts.baseUrl ?? "https://staging.example.com")');
  });

  it("moves models off the names the client declares", () => {
    const clash = generateClientSource(analyzeTraffic(makeEntries([
      { url: "https://api.example.com/api-clients", responseBody: [{ id: 1 }] },
    ])));

    expect(clash).toContain("export interface ApiClient2 {\n  id: number;\n}");
    expect(clash).toContain("export type ListApiClientsResponse = ApiClient2[];");
    expect(clash).toContain("export class ApiClient {");
    expect(clash.split("\n").filter((line) => line.startsWith("export interface ApiClient "))).toEqual([]);
  });

  it("still renders a class for an empty result", () => {
    const empty = generateClientSource(analyzeTraffic([]));
    expect(empty).toContain("export class ApiClient {");
    expect(empty).toContain('(opts.baseUrl ?? "http://localhost")');
  });
});
