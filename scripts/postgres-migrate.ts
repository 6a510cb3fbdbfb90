import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Pool } from "pg";
import { createLogger } from "../src/infra/logger.js";

async function main(): Promise<void> {
  const logger = createLogger({ level: "info", environment: process.env.PAYHOOK_ENVIRONMENT ?? "development" });
  const connectionString = process.env.PAYHOOK_POSTGRES_URL?.trim();
  if (!connectionString) {
    throw new Error("PAYHOOK_POSTGRES_URL is required.");
  }

  const migrationPath = resolve(process.cwd(), "sql", "001_webhook_events.sql");
  const sql = await readFile(migrationPath, "utf8");
  const pool = new Pool({ connectionString });

  try {
    await pool.query(sql);
    logger.info({ migrationPath }, "db:migrate OK");
  } finally {
    await pool.end();
  }
}

await main();
