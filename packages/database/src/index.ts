// ──────────────────────────────────────────────
// Strand - Database Package
// ──────────────────────────────────────────────

export * from "./schema/index.js";
export { getDatabase, createConnection, closeConnection } from "./connection.js";
export type { Database, ConnectionOptions } from "./connection.js";
export { ensureVectorPointsTable } from "./bootstrap.js";
