// ──────────────────────────────────────────────
// Strand - Document & Vector Types
// ──────────────────────────────────────────────

export interface ChunkMetadata extends Record<string, unknown> {
  original_doc_id: string;
  chunk_index: number;
  total_chunks: number;
}

export interface ChunkRecord {
  id: string;
  text: string;
  metadata: ChunkMetadata;
}

export interface VectorPoint {
  id: string;
  text: string;
  vector: number[];
  metadata: Record<string, unknown>;
}

export interface VectorMatch {
  id: string;
  text: string;
  score: number;
}

export interface VectorStore {
  upsert(collection: string, points: VectorPoint[]): Promise<void>;
  search(collection: string, vector: number[], topK: number): Promise<VectorMatch[]>;
  ping(): Promise<boolean>;
}

export interface IndexingResult {
  status: "success";
  indexed_count: number;
  collection_name: string;
  embedding_model: string;
  elapsed_ms: number;
}

export interface SearchResult {
  status: "success";
  query: string;
  retrieved_documents: VectorMatch[];
  total_results: number;
  collection_name: string;
  elapsed_ms: number;
}
