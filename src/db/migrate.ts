import "dotenv/config";
import path from "path";
import { fileURLToPath } from "url";
import { sql } from "drizzle-orm";
import { loadConfig } from "../shared/config.js";
import { createLogger } from "../shared/logger.js";
import { connect } from "./connection.js";
import type { Database } from "./connection.js";

export async function migrate(db: Database): Promise<void> {
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS templates (
      id VARCHAR(128) PRIMARY KEY,
      name TEXT NOT NULL,
      source TEXT NOT NULL,
      schema JSONB NOT NULL,
      description TEXT,
      version INTEGER NOT NULL DEFAULT 1,
      created_at TIMESTAMPTZ NOT NULL,
      updated_at TIMESTAMPTZ NOT NULL
    )
  `);

  await db.execute(sql`
    ALTER TABLE templates ADD COLUMN IF NOT EXISTS version INTEGER NOT NULL DEFAULT 1
  `);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS template_versions (
      template_id VARCHAR(128) NOT NULL REFERENCES templates(id) ON DELETE CASCADE,
      version INTEGER NOT NULL,
      name TEXT NOT NULL,
      source TEXT NOT NULL,
      schema JSONB NOT NULL,
      description TEXT,
      created_at TIMESTAMPTZ NOT NULL,
      updated_at TIMESTAMPTZ NOT NULL,
      PRIMARY KEY (template_id, version)
    )
  `);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS template_files (
      template_id VARCHAR(128) NOT NULL REFERENCES templates(id) ON DELETE CASCADE,
      path TEXT NOT NULL,
      content BYTEA NOT NULL,
      PRIMARY KEY (template_id, path)
    )
  `);
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.log.level, prettyPrint: config.log.pretty });
  if (!config.storage.databaseUrl) {
    throw new Error("DATABASE_URL is not set");
  }
  const { pool, db } = connect(config.storage.databaseUrl);
  logger.info("Running migrations...");
  try {
    await migrate(db);
    logger.info("Migrations complete.");
  } finally {
    await pool.end();
  }
}

if (
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))
) {
  main().catch((err) => {
    console.error("Migration failed:", err);
    process.exit(1);
  });
}
