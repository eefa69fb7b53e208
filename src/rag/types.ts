import { z } from "zod";

// ============================================================================
// Chunks
// ============================================================================

/** Fixed-size span of an ingested document */
export const DocumentChunkSchema = z.object({
  /** "<documentId>:<start>" */
  id: z.string().min(1),
  documentId: z.string().min(1),
  /** Name the document was uploaded under */
  source: z.string().min(1),
  text: z.string(),
  /** Offset of the first character in the document */
  start: z.number().int().nonnegative(),
  /** Offset one past the last character */
  end: z.number().int().nonnegative(),
  /** Position in the document's chunk sequence */
  index: z.number().int().nonnegative(),
});
export type DocumentChunk = z.infer<typeof DocumentChunkSchema>;

export const ChunkOptionsSchema = z
  .object({
    /** Window size in characters */
    chunkSize: z.number().int().positive().default(500),
    /** Characters shared by consecutive chunks */
    chunkOverlap: z.number().int().nonnegative().default(50),
  })
  .refine((data) => data.chunkOverlap < data.chunkSize, {
    message: "chunkOverlap must be less than chunkSize",
    path: ["chunkOverlap"],
  });
export type ChunkOptions = z.input<typeof ChunkOptionsSchema>;

// ============================================================================
// Store
// ============================================================================

export interface SearchHit {
  readonly chunk: DocumentChunk;
  /** Cosine similarity in [-1, 1] */
  readonly score: number;
}

export interface StoreStats {
  readonly count: number;
  /** null until the first upsert unless pinned by configuration */
  readonly dimension: number | null;
  readonly collection: string;
}

/** On-disk format of one collection */
export const SerializedStoreSchema = z.object({
  version: z.literal(1),
  collection: z.string().min(1),
  dimension: z.number().int().positive().nullable(),
  entries: z.array(
    z.object({
      chunk: DocumentChunkSchema,
      embedding: z.array(z.number().finite()),
    })
  ),
});
export type SerializedStore = z.infer<typeof SerializedStoreSchema>;

// ============================================================================
// Pipeline
// ============================================================================

/**
 * RAG configuration schema with validation constraints
 *
 * Constraints:
 * - chunkOverlap must be less than chunkSize
 */
export const RAGConfigSchema = z
  .object({
    chunkSize: z.number().int().positive().default(500),
    chunkOverlap: z.number().int().nonnegative().default(50),
    /** Chunks retrieved per question */
    topK: z.number().int().positive().default(3),
    /** Character budget for retrieved text in the prompt */
    maxContextChars: z.number().int().positive().default(4000),
    /** Texts per embedding request during ingestion */
    embeddingBatchSize: z.number().int().positive().default(32),
    temperature: z.number().min(0).max(2).default(0.3),
    maxTokens: z.number().int().positive().default(1024),
  })
  .refine((data) => data.chunkOverlap < data.chunkSize, {
    message: "chunkOverlap must be less than chunkSize",
  });
export type RAGConfig = z.infer<typeof RAGConfigSchema>;
export type RAGConfigInput = z.input<typeof RAGConfigSchema>;

/** Retrieved chunk that made it into the prompt */
export interface CitedChunk {
  readonly chunkId: string;
  readonly documentId: string;
  readonly source: string;
  readonly text: string;
  readonly score: number;
}

export interface QueryAnswer {
  readonly answer: string;
  /** Most similar first */
  readonly sources: readonly CitedChunk[];
  /** False when nothing was retrieved */
  readonly hasContext: boolean;
  /** True when retrieval or generation was unavailable */
  readonly degraded: boolean;
}

export interface IngestResult {
  readonly documentId: string;
  readonly chunksAdded: number;
}

export interface PipelineStats extends StoreStats {
  readonly cachedQueries: number;
}
