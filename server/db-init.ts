import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { closePool, query } from "./db";
import { logger } from "./logger";

async function initDb() {
  const sqlPath = path.resolve(
    path.dirname(fileURLToPath(import.meta.url)),
    "db-schema.sql",
  );
  const sql = readFileSync(sqlPath, "utf8");
  await query(sql);
  logger.info("PostgreSQL pipeline tables initialized.");
  await closePool();
}

initDb().catch((err: unknown) => {
  logger.error({ err }, "[DB] Schema initialization failed");
  process.exit(1);
});
