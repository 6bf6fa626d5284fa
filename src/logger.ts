import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "./config.js";

function getLogFile(dir: string): string {
  const date = new Date().toISOString().slice(0, 10); // YYYY-MM-DD
  return path.join(dir, `har-typegen-${date}.log`);
}

/**
 * Log a message to stderr and <logDir>/har-typegen-YYYY-MM-DD.log.
 * Format: [HH:MM:SS] [module] message
 *
 * stderr rather than stdout: the CLI writes generated source to stdout.
 */
export function log(module: string, message: string): void {
  const config = loadConfig();
  if (!config.logEnabled) return;

  const ts = new Date().toTimeString().slice(0, 8); // HH:MM:SS
  const line = `[${ts}] [${module}] ${message}`;
  console.error(line);
  try {
    fs.mkdirSync(config.logDir, { recursive: true });
    fs.appendFileSync(getLogFile(config.logDir), line + "\n");
  } catch {
    // Never crash the main process if logging fails
  }
}
