export { createInMemoryVectorStore } from "./memory.js";
export { createPostgresVectorStore } from "./postgres.js";
export type { PostgresVectorStoreOptions } from "./postgres.js";
