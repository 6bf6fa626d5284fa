import type { FastifyInstance, FastifyReply } from "fastify";
import { nanoid } from "nanoid";
import { analyzeTraffic, serializeEndpoint } from "../analyze.js";
import { generateClientSource } from "../client-generator.js";
import { generateDeclarations } from "../declaration-generator.js";
import { HarFormatError } from "../errors.js";
import { filterEntries, parseHar, type EntryFilter } from "../har-parser.js";
import { log } from "../logger.js";
import { routeRateLimit } from "../ratelimit/index.js";
import type { AnalysisResult } from "../types.js";

interface AnalyzeBody {
  har: unknown;
  filter?: EntryFilter;
}

interface GenerateBody extends AnalyzeBody {
  className?: string;
  baseUrl?: string;
  title?: string;
}

const filterSchema = {
  type: "object",
  properties: {
    methods: { type: "array", items: { type: "string" } },
    statuses: { type: "array", items: { type: "integer" } },
    statusClasses: { type: "array", items: { type: "string", pattern: "^[1-5]xx$" } },
  },
} as const;

const analyzeBodySchema = {
  type: "object",
  required: ["har"],
  properties: {
    har: { type: "object" },
    filter: filterSchema,
  },
} as const;

const generateBodySchema = {
  type: "object",
  required: ["har"],
  properties: {
    ...analyzeBodySchema.properties,
    className: { type: "string" },
    baseUrl: { type: "string" },
    title: { type: "string" },
  },
} as const;

/** Parse + analyze, answering 400 for a malformed HAR. Null when the reply was sent. */
function runAnalysis(body: AnalyzeBody, reply: FastifyReply): AnalysisResult | null {
  try {
    const entries = filterEntries(parseHar(body.har), body.filter);
    return analyzeTraffic(entries);
  } catch (err) {
    if (err instanceof HarFormatError) {
      log("api", `Rejected HAR: ${err.message}`);
      void reply.code(400).send({ error: err.message, location: err.location });
      return null;
    }
    throw err;
  }
}

export async function registerRoutes(app: FastifyInstance) {
  app.get("/health", async (_req, reply) => reply.send({ status: "ok" }));

  // POST /v1/analyze
  app.post<{ Body: AnalyzeBody }>(
    "/v1/analyze",
    { ...routeRateLimit("/v1/analyze"), schema: { body: analyzeBodySchema } },
    async (req, reply) => {
      const result = runAnalysis(req.body, reply);
      if (!result) return reply;
      return reply.send({
        analysisId: nanoid(),
        endpoints: result.endpoints.map(serializeEndpoint),
        models: result.models,
        diagnostics: result.diagnostics,
      });
    },
  );

  // POST /v1/generate
  app.post<{ Body: GenerateBody }>(
    "/v1/generate",
    { ...routeRateLimit("/v1/generate"), schema: { body: generateBodySchema } },
    async (req, reply) => {
      const result = runAnalysis(req.body, reply);
      if (!result) return reply;
      const { className, baseUrl, title } = req.body;
      return reply.send({
        declarations: generateDeclarations(result, { title }),
        client: generateClientSource(result, { className, baseUrl }),
      });
    },
  );
}
