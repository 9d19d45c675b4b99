import Fastify, { type FastifyInstance } from "fastify";

import { registerStatusRoutes, type StatusSource } from "./routes/status.js";

export interface StatusServerContext {
  source: StatusSource;
}

/**
 * Read-only status surface. Unauthenticated; it exposes file names only.
 */
export async function buildStatusServer(ctx: StatusServerContext): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });
  await registerStatusRoutes(app, ctx.source);
  return app;
}
