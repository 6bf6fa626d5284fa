/**
 * Runtime configuration read from the environment.
 *
 * Entry points load `.env` via dotenv before calling loadConfig(); library
 * callers can pass their own env object or override analysis options directly.
 */

import os from "node:os";
import path from "node:path";
import type { AnalysisOptions, ParamNaming, PathParamType } from "./types.js";

export const ALL_DETECTORS: readonly PathParamType[] = [
  "uuid", "email", "date", "numeric", "hex", "slug", "base64", "unknown",
];

export const DEFAULT_ANALYSIS_OPTIONS: AnalysisOptions = {
  maxUnionAlternatives: 4,
  detectors: ALL_DETECTORS,
  minDistinctValues: 5,
  paramNaming: "generic",
  statusPartition: "class",
};

export interface AppConfig {
  logEnabled: boolean;
  logDir: string;
  analysis: AnalysisOptions;
  port: number;
  host: string;
}

type Env = Record<string, string | undefined>;

function intFrom(raw: string | undefined, fallback: number, min: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n >= min ? n : fallback;
}

function paramNamingFrom(raw: string | undefined): ParamNaming {
  return raw === "resource" ? "resource" : DEFAULT_ANALYSIS_OPTIONS.paramNaming;
}

function statusPartitionFrom(raw: string | undefined): AnalysisOptions["statusPartition"] {
  return raw === "code" ? "code" : DEFAULT_ANALYSIS_OPTIONS.statusPartition;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    logEnabled: (env.HAR_TYPEGEN_LOG ?? "on").toLowerCase() !== "off",
    logDir: env.HAR_TYPEGEN_LOG_DIR || path.join(os.homedir(), ".har-typegen", "logs"),
    analysis: {
      ...DEFAULT_ANALYSIS_OPTIONS,
      maxUnionAlternatives: intFrom(env.HAR_TYPEGEN_MAX_UNION, DEFAULT_ANALYSIS_OPTIONS.maxUnionAlternatives, 1),
      minDistinctValues: intFrom(env.HAR_TYPEGEN_MIN_DISTINCT, DEFAULT_ANALYSIS_OPTIONS.minDistinctValues, 0),
      paramNaming: paramNamingFrom(env.HAR_TYPEGEN_PARAM_NAMING),
      statusPartition: statusPartitionFrom(env.HAR_TYPEGEN_STATUS_PARTITION),
    },
    port: intFrom(env.PORT, 6970, 0),
    host: env.HOST ?? "127.0.0.1",
  };
}
