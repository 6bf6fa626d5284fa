/**
 * CLI commands. Each command takes parsed arguments and returns the text to
 * print; src/cli.ts owns process I/O and exit codes.
 */

import { analyzeTraffic, serializeEndpoint } from "./analyze.js";
import { generateClientSource } from "./client-generator.js";
import { loadConfig } from "./config.js";
import { generateDeclarations } from "./declaration-generator.js";
import { ReplayError, UsageError } from "./errors.js";
import { filterEntries, readHarFile, type EntryFilter } from "./har-parser.js";
import { ReplayClient } from "./replay-client.js";
import { startServer } from "./server.js";
import type { AnalysisResult } from "./types.js";

export type Flags = Record<string, string | boolean>;

export interface ParsedArgs {
  command: string;
  args: string[];
  flags: Flags;
}

// ---------------------------------------------------------------------------
// Arg parser
// ---------------------------------------------------------------------------

export function parseArgs(argv: string[]): ParsedArgs {
  const raw = argv.slice(2); // skip runtime + script
  const command = raw[0] && !raw[0].startsWith("--") ? raw[0] : "help";
  const rest = command === "help" ? raw : raw.slice(1);
  const positional: string[] = [];
  const flags: Flags = {};
  for (let i = 0; i < rest.length; i++) {
    const a = rest[i];
    if (a.startsWith("--")) {
      const key = a.slice(2);
      const next = rest[i + 1];
      if (!next || next.startsWith("--")) {
        flags[key] = true;
      } else {
        flags[key] = next;
        i++;
      }
    } else {
      positional.push(a);
    }
  }
  return { command, args: positional, flags };
}

function stringFlag(flags: Flags, name: string): string | undefined {
  const value = flags[name];
  if (value === undefined) return undefined;
  if (typeof value !== "string") throw new UsageError(`--${name} needs a value`);
  return value;
}

function listFlag(flags: Flags, name: string): string[] {
  const value = stringFlag(flags, name);
  return value ? value.split(",").map((v) => v.trim()).filter(Boolean) : [];
}

/**
 * --method GET,POST --status 200,4xx → entry filter. Status items are exact
 * codes or Nxx classes.
 */
export function entryFilterFromFlags(flags: Flags): EntryFilter {
  const statuses: number[] = [];
  const statusClasses: string[] = [];
  for (const item of listFlag(flags, "status")) {
    if (/^[1-5]xx$/i.test(item)) statusClasses.push(item.toLowerCase());
    else if (/^\d{3}$/.test(item)) statuses.push(Number(item));
    else throw new UsageError(`Invalid --status value: ${item}`);
  }
  return { methods: listFlag(flags, "method"), statuses, statusClasses };
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

function json(data: unknown, pretty: boolean): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

async function analyzeFile(parsed: ParsedArgs): Promise<AnalysisResult> {
  const file = parsed.args[0];
  if (!file) throw new UsageError(`${parsed.command} needs a HAR file`);
  const entries = filterEntries(await readHarFile(file), entryFilterFromFlags(parsed.flags));
  return analyzeTraffic(entries);
}

async function cmdEndpoints(parsed: ParsedArgs): Promise<string> {
  const result = await analyzeFile(parsed);
  return json(
    { endpoints: result.endpoints.map(serializeEndpoint), diagnostics: result.diagnostics },
    !!parsed.flags.pretty,
  );
}

async function cmdModels(parsed: ParsedArgs): Promise<string> {
  return generateDeclarations(await analyzeFile(parsed));
}

async function cmdClient(parsed: ParsedArgs): Promise<string> {
  const result = await analyzeFile(parsed);
  return generateClientSource(result, {
    className: stringFlag(parsed.flags, "class-name"),
    baseUrl: stringFlag(parsed.flags, "base-url"),
  });
}

/** Replay the first captured example of every endpoint, one at a time. */
async function cmdReplay(parsed: ParsedArgs): Promise<string> {
  const result = await analyzeFile(parsed);
  const client = new ReplayClient({ baseUrl: stringFlag(parsed.flags, "base-url") });

  const outcomes: Record<string, unknown>[] = [];
  for (const endpoint of result.endpoints) {
    try {
      const resp = await client.replayEndpoint(endpoint);
      outcomes.push({ endpoint: endpoint.key, status: resp.status, ok: resp.ok, latencyMs: resp.latencyMs });
    } catch (err) {
      if (!(err instanceof ReplayError)) throw err;
      outcomes.push({ endpoint: endpoint.key, error: err.message, url: err.url });
    }
  }
  return json(outcomes, !!parsed.flags.pretty);
}

async function cmdServe(parsed: ParsedArgs): Promise<null> {
  const config = loadConfig();
  const port = stringFlag(parsed.flags, "port");
  if (port !== undefined && !/^\d+$/.test(port)) throw new UsageError(`Invalid --port value: ${port}`);
  await startServer({
    port: port === undefined ? config.port : Number(port),
    host: stringFlag(parsed.flags, "host") ?? config.host,
  });
  return null;
}

export const HELP = `har-typegen - infer TypeScript models and clients from HAR captures

Usage: har-typegen <command> <file.har> [flags]

Commands:
  endpoints <file.har>    Consolidated endpoints as JSON
  models    <file.har>    TypeScript declarations for the inferred models
  client    <file.har>    TypeScript client class (models included)
  replay    <file.har>    Re-issue one captured request per endpoint
  serve                   Start the HTTP service
  help                    Show this help

Flags:
  --method GET,POST       Only entries with these methods
  --status 200,4xx        Only entries with these statuses / status classes
  --base-url URL          Override the captured origin (client, replay)
  --class-name NAME       Generated client class name (client)
  --out FILE              Write output to FILE instead of stdout
  --pretty                Indented JSON output
  --port N / --host H     Listen address (serve)
`;

/** Run a command. Returns the text to print, or null when there is nothing to print. */
export async function runCommand(parsed: ParsedArgs): Promise<string | null> {
  switch (parsed.command) {
    case "help": return HELP;
    case "endpoints": return cmdEndpoints(parsed);
    case "models": return cmdModels(parsed);
    case "client": return cmdClient(parsed);
    case "replay": return cmdReplay(parsed);
    case "serve": return cmdServe(parsed);
    default: throw new UsageError(`Unknown command: ${parsed.command}`);
  }
}
