// ──────────────────────────────────────────────
// Strand - Database Migration Runner
// ──────────────────────────────────────────────

import { createLogger } from "@strand/utils";
import { ensureVectorPointsTable } from "./bootstrap.js";
import { getDatabase, closeConnection } from "./connection.js";

const logger = createLogger("migrate");

async function runMigrations() {
  const databaseUrl = process.env["DATABASE_URL"];
  if (!databaseUrl) {
    throw new Error("DATABASE_URL is required for migrations");
  }

  logger.info("Running migrations...");
  const db = getDatabase(databaseUrl);
  await ensureVectorPointsTable(db);
  logger.info("Migrations completed successfully");
  await closeConnection();
  process.exit(0);
}

runMigrations().catch((err: unknown) => {
  logger.error({ error: err }, "Migration failed");
  process.exit(1);
});
