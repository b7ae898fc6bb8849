export type { IVectorStore } from "./interfaces.js";
export { requireEmbedding } from "./interfaces.js";
export { InMemoryVectorStore } from "./memory.js";
export { SqliteVectorStore } from "./sqlite.js";
