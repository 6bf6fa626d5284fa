import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { registerRoutes } from "./api/routes.js";
import type { AppConfig } from "./config.js";
import { registerRateLimiter } from "./ratelimit/index.js";

/** Captures can be large; the default 1 MiB body limit is too small. */
const BODY_LIMIT = 50 * 1024 * 1024;

export async function buildServer(opts: { logger?: boolean } = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: opts.logger ?? true, bodyLimit: BODY_LIMIT });

  await app.register(cors, { origin: true });
  await registerRateLimiter(app);
  await registerRoutes(app);

  return app;
}

/** Start listening and close cleanly on SIGTERM / SIGINT. */
export async function startServer(config: Pick<AppConfig, "port" | "host">): Promise<FastifyInstance> {
  const app = await buildServer();

  async function shutdown(signal: string): Promise<void> {
    app.log.info(`[shutdown] ${signal}, closing server`);
    await app.close();
    process.exit(0);
  }

  process.on("SIGTERM", () => { shutdown("SIGTERM").catch(() => process.exit(1)); });
  process.on("SIGINT",  () => { shutdown("SIGINT").catch(() => process.exit(1)); });

  await app.listen({ port: config.port, host: config.host });
  app.log.info(`har-typegen running on http://${config.host}:${config.port}`);
  return app;
}
