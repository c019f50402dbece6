// ──────────────────────────────────────────────
// Strand - Database Connection
// One pooled postgres.js client per process
// ──────────────────────────────────────────────

import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema/index.js";

export interface ConnectionOptions {
  maxConnections?: number;
  idleTimeoutSeconds?: number;
  connectTimeoutSeconds?: number;
}

let connectionInstance: ReturnType<typeof postgres> | null = null;
let dbInstance: ReturnType<typeof drizzle<typeof schema>> | null = null;

export function createConnection(databaseUrl: string, options: ConnectionOptions = {}) {
  if (connectionInstance) return connectionInstance;
  connectionInstance = postgres(databaseUrl, {
    max: options.maxConnections ?? 10,
    idle_timeout: options.idleTimeoutSeconds ?? 20,
    connect_timeout: options.connectTimeoutSeconds ?? 10,
  });
  return connectionInstance;
}

export function getDatabase(databaseUrl: string, options?: ConnectionOptions) {
  if (dbInstance) return dbInstance;
  dbInstance = drizzle(createConnection(databaseUrl, options), { schema });
  return dbInstance;
}

export type Database = ReturnType<typeof getDatabase>;

export async function closeConnection(): Promise<void> {
  if (!connectionInstance) return;
  const connection = connectionInstance;
  connectionInstance = null;
  dbInstance = null;
  await connection.end({ timeout: 5 });
}
