/**
 * RAG (Retrieval-Augmented Generation) Module
 *
 * Answers questions over uploaded documents:
 * - Fixed-window chunking with overlap
 * - Vector similarity search with per-collection persistence
 * - Bounded context assembly and grounded answer generation
 */

// Types
export type {
  DocumentChunk,
  ChunkOptions,
  SearchHit,
  StoreStats,
  SerializedStore,
  RAGConfig,
  RAGConfigInput,
  CitedChunk,
  QueryAnswer,
  IngestResult,
  PipelineStats,
} from "./types.js";
export {
  DocumentChunkSchema,
  ChunkOptionsSchema,
  SerializedStoreSchema,
  RAGConfigSchema,
} from "./types.js";

// Chunker
export { chunkDocument, reconstructText, documentIdFor } from "./chunker.js";
export type { ChunkDocumentOptions } from "./chunker.js";

// Store
export { DocumentVectorStore, DEFAULT_COLLECTION } from "./store.js";
export type { VectorStoreOptions } from "./store.js";

// Pipeline
export {
  RAGPipeline,
  NO_CONTEXT_ANSWER,
  RETRIEVAL_UNAVAILABLE_ANSWER,
  GENERATION_UNAVAILABLE_ANSWER,
  GROUNDING_SYSTEM_PROMPT,
} from "./pipeline.js";
export type { RAGPipelineOptions } from "./pipeline.js";

// Cache
export { EmbeddingCache } from "./embedding-cache.js";
export type { EmbeddingCacheStats } from "./embedding-cache.js";
