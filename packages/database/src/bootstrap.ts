// ──────────────────────────────────────────────
// Strand - Schema Bootstrap
// ──────────────────────────────────────────────

import { sql } from "drizzle-orm";
import type { Database } from "./connection.js";

export async function ensureVectorPointsTable(db: Database): Promise<void> {
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS vector_points (
      collection varchar(255) NOT NULL,
      id varchar(255) NOT NULL,
      text text NOT NULL,
      embedding jsonb NOT NULL DEFAULT '[]'::jsonb,
      embedding_model varchar(100) NOT NULL DEFAULT 'strand-hash-v1',
      metadata jsonb NOT NULL DEFAULT '{}'::jsonb,
      created_at timestamptz NOT NULL DEFAULT now(),
      updated_at timestamptz NOT NULL DEFAULT now(),
      PRIMARY KEY (collection, id)
    )
  `);
  await db.execute(sql`
    CREATE INDEX IF NOT EXISTS vector_points_collection_idx ON vector_points (collection)
  `);
}
