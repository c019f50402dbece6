// ──────────────────────────────────────────────
// Strand - Vector Points Table Schema
// ──────────────────────────────────────────────

import { pgTable, varchar, text, jsonb, timestamp, primaryKey, index } from "drizzle-orm/pg-core";

export const vectorPoints = pgTable(
  "vector_points",
  {
    collection: varchar("collection", { length: 255 }).notNull(),
    id: varchar("id", { length: 255 }).notNull(),
    text: text("text").notNull(),
    embedding: jsonb("embedding").$type<number[]>().default([]).notNull(),
    embeddingModel: varchar("embedding_model", { length: 100 }).default("strand-hash-v1").notNull(),
    metadata: jsonb("metadata").$type<Record<string, unknown>>().default({}).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.collection, table.id] }),
    collectionIdx: index("vector_points_collection_idx").on(table.collection),
  })
);
