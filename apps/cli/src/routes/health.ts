// apps/cli/src/routes/health.ts
import type { FastifyInstance } from "fastify";
import { APP_VERSION } from "../shared/config";

export function registerHealthRoutes(app: FastifyInstance) {
  app.get("/health", async (_request, reply) => {
    reply.send({
      ok: true,
      status: "healthy",
      version: APP_VERSION,
      now: new Date().toISOString(),
      uptimeSeconds: Math.floor(process.uptime())
    });
  });
}
