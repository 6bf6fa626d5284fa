#!/usr/bin/env node
/**
 * har-typegen CLI - turn a HAR capture into endpoints, models and a client.
 *
 * Usage: har-typegen <command> <file.har> [flags]
 */

import "dotenv/config";
import { writeFile } from "node:fs/promises";
import { HELP, parseArgs, runCommand } from "./commands.js";

function output(text: string): void {
  process.stdout.write(text.endsWith("\n") ? text : text + "\n");
}

function die(msg: string): never {
  output(JSON.stringify({ error: msg }));
  process.exit(1);
}

function info(msg: string): void {
  process.stderr.write(`[har-typegen] ${msg}\n`);
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv);

  if (parsed.flags.help) {
    process.stderr.write(HELP);
    process.exit(0);
  }

  const text = await runCommand(parsed);
  if (text === null) return;

  const out = parsed.flags.out;
  if (typeof out === "string") {
    await writeFile(out, text.endsWith("\n") ? text : text + "\n", "utf-8");
    info(`Wrote ${out}`);
  } else {
    output(text);
  }
}

main().catch((err: unknown) => {
  die(err instanceof Error ? err.message : String(err));
});
