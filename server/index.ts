import mongoose from "mongoose";

import { buildApp } from "./app";
import { env } from "./config/env";
import { getPipelineConfiguration } from "./config/pipelineConfiguration";
import { closePool, getPool } from "./db";
import { logger } from "./logger";
import { OpenAiCapabilityService } from "./services/pipeline/aiCapabilityService";
import { MongoContentStore } from "./services/pipeline/contentStore";
import { TranslationPipelineOrchestrator } from "./services/pipeline/orchestrator";
import { PgPipelineStore } from "./services/pipeline/pgPipelineStore";
import type { PipelineEventSink } from "./services/pipeline/pipelineEvents";
import { RedisStreamEventSink } from "./services/pipeline/redisEventSink";
import { MemoryPipelineStore } from "./services/pipeline/taskStore";
import { closeSharedRedisClient, getSharedRedisClient } from "./services/redis";

async function bootstrap() {
  const configuration = getPipelineConfiguration();
  logger.info(
    {
      providers: configuration.providers.map((provider) => provider.id),
      workerPoolSize: configuration.workerPoolSize,
    },
    "[STARTUP] Pipeline configuration loaded",
  );

  logger.info("[STARTUP] Connecting to MongoDB...");
  await mongoose.connect(env.MONGO_URI);
  logger.info("[STARTUP] MongoDB connected");

  const store = env.DATABASE_URL
    ? new PgPipelineStore(getPool())
    : new MemoryPipelineStore();
  if (!env.DATABASE_URL) {
    logger.warn("[STARTUP] DATABASE_URL not set; pipeline state is kept in memory");
  }

  const sinks: PipelineEventSink[] = [];
  const redis = getSharedRedisClient();
  if (redis) {
    sinks.push(
      new RedisStreamEventSink(redis, {
        stream: env.PIPELINE_EVENT_STREAM,
        maxLength: env.PIPELINE_EVENT_STREAM_MAXLEN,
      }),
    );
  }

  const orchestrator = new TranslationPipelineOrchestrator({
    store,
    content: new MongoContentStore(),
    ai: new OpenAiCapabilityService(configuration.providers, logger),
    configuration,
    logger,
    sinks,
  });

  const app = await buildApp({
    orchestrator,
    logger,
    jwtSecret: env.JWT_SECRET,
    corsOrigin: env.CORS_ORIGIN,
  });

  await orchestrator.start();
  await app.listen({ port: env.PORT, host: env.HOST });
  logger.info(`[STARTUP] Server started on port ${env.PORT}`);

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "[SHUTDOWN] Stopping pipeline");
    try {
      await app.close();
      await orchestrator.stop();
      await Promise.all([closePool(), closeSharedRedisClient(), mongoose.disconnect()]);
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "[SHUTDOWN] Failed to stop cleanly");
      process.exit(1);
    }
  };
  process.once("SIGINT", (signal) => void shutdown(signal));
  process.once("SIGTERM", (signal) => void shutdown(signal));
}

bootstrap().catch((err) => {
  logger.error({ err }, "[FATAL] Failed to start server");
  process.exit(1);
});
