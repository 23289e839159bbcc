import pg from "pg";
import type { PoolClient, QueryResultRow } from "pg";

import { env } from "./config/env";

const { Pool } = pg;

export type DbPool = InstanceType<typeof Pool>;

let sharedPool: DbPool | null = null;

export function getPool(): DbPool {
  if (!env.DATABASE_URL) {
    throw new Error("DATABASE_URL is not configured");
  }
  sharedPool ??= new Pool({ connectionString: env.DATABASE_URL });
  return sharedPool;
}

export async function query<R extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
) {
  return getPool().query<R>(text, params);
}

/** Runs `work` inside BEGIN/COMMIT on one client; rolls back when it throws. */
export async function withTransaction<T>(
  pool: DbPool,
  work: (client: PoolClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await work(client);
    await client.query("COMMIT");
    return result;
  } catch (err) {
    await client.query("ROLLBACK");
    throw err;
  } finally {
    client.release();
  }
}

export async function closePool() {
  if (sharedPool) {
    await sharedPool.end();
    sharedPool = null;
  }
}
