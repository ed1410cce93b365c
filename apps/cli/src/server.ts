// apps/cli/src/server.ts
import fastify, { type FastifyInstance } from "fastify";

import { registerDexRoutes } from "./routes/dex";
import { registerHealthRoutes } from "./routes/health";
import type { DexService } from "./modules/dex/dex.service";
import { DEFAULT_LOG_LEVEL } from "./shared/logger";

export type ServerOptions = {
  dex: DexService;
  logLevel?: string;
};

export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const app = fastify({
    logger: { level: options.logLevel || DEFAULT_LOG_LEVEL }
  });

  registerHealthRoutes(app);
  registerDexRoutes(app, { dex: options.dex });

  await app.ready();
  return app;
}
