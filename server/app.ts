import cors from "@fastify/cors";
import Fastify, { type FastifyBaseLogger } from "fastify";

import { createAuthGuard } from "./middleware/auth";
import translationProjectRoutes from "./routes/translationProjects";
import type { TranslationPipelineOrchestrator } from "./services/pipeline/orchestrator";

export interface BuildAppOptions {
  orchestrator: TranslationPipelineOrchestrator;
  logger: FastifyBaseLogger;
  jwtSecret: string;
  corsOrigin: string;
}

export async function buildApp({
  orchestrator,
  logger,
  jwtSecret,
  corsOrigin,
}: BuildAppOptions) {
  const app = Fastify({ logger });

  app.decorateRequest("userId", null);
  await app.register(cors, {
    origin: corsOrigin === "*" ? true : corsOrigin.split(","),
    credentials: true,
  });

  app.get("/health", async () => ({ ok: true }));

  await app.register(translationProjectRoutes, {
    prefix: "/api",
    orchestrator,
    requireAuth: createAuthGuard(jwtSecret),
  });

  return app;
}
