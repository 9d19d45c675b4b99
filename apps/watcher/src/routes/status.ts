import type { FastifyInstance } from "fastify";

import type { HealthResponseV1, StatusSnapshotV1 } from "@dropcourier/shared";

export type StatusSource = {
  snapshot(): StatusSnapshotV1;
  size(): number;
};

export async function registerStatusRoutes(app: FastifyInstance, source: StatusSource): Promise<void> {
  app.get("/", async (): Promise<StatusSnapshotV1> => source.snapshot());

  app.get("/health", async (): Promise<HealthResponseV1> => ({ ok: true, working: source.size() }));
}
