// server/config/env.ts
import 'dotenv/config';
import { z } from 'zod';

const schema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(8080),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  JWT_SECRET: z.string().min(1).default('dev_secret'),
  CORS_ORIGIN: z.string().default('*'),
  // Without DATABASE_URL the pipeline keeps its state in memory.
  DATABASE_URL: z.string().url().optional(),
  MONGO_URI: z.string().default('mongodb://localhost:27017/novel'),
  REDIS_URL: z.string().url().optional(),
  PIPELINE_EVENT_STREAM: z.string().default('pipeline:events'),
  PIPELINE_EVENT_STREAM_MAXLEN: z.coerce.number().int().positive().default(10000),
});

export type Env = z.infer<typeof schema>;

export const parseEnv = (source: NodeJS.ProcessEnv): Env => schema.parse(source);

export const env = parseEnv(process.env);
