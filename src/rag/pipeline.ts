import { isRecoverableInferenceError, toError } from "../errors/index.js";
import type { EmbeddingClient, GenerationClient } from "../llm/types.js";
import { logRecord, logger, roundTo, type RecordSink } from "../utils.js";
import { chunkDocument, documentIdFor } from "./chunker.js";
import { EmbeddingCache } from "./embedding-cache.js";
import type { DocumentVectorStore } from "./store.js";
import {
  RAGConfigSchema,
  type CitedChunk,
  type DocumentChunk,
  type IngestResult,
  type PipelineStats,
  type QueryAnswer,
  type RAGConfig,
  type RAGConfigInput,
  type SearchHit,
} from "./types.js";

/** Answer when the knowledge base holds no documents */
export const NO_CONTEXT_ANSWER =
  "The knowledge base has no relevant documents yet. Upload documents first, then ask again.";

/** Answer when the question could not be embedded */
export const RETRIEVAL_UNAVAILABLE_ANSWER =
  "Retrieval is unavailable right now because the embedding service could not be reached. Please try again later.";

/** Answer when retrieval worked but generation did not */
export const GENERATION_UNAVAILABLE_ANSWER =
  "Answer generation is unavailable right now. The most relevant passages from the knowledge base are listed as sources.";

export const GROUNDING_SYSTEM_PROMPT = `You are a knowledge-base question answering assistant. Answer strictly from the reference passages provided.
If the passages do not contain enough information, say so plainly instead of guessing.
Keep the answer concise, accurate and well organised, and cite passages by their number, e.g. [1].`;

export interface RAGPipelineOptions {
  readonly store: DocumentVectorStore;
  readonly embedder: EmbeddingClient;
  readonly generator: GenerationClient;
  readonly config?: RAGConfigInput;
  readonly cache?: EmbeddingCache;
  readonly recordSink?: RecordSink;
  /** Clock in epoch milliseconds (default: Date.now) */
  readonly now?: () => number;
}

interface AssembledContext {
  readonly prompt: string;
  readonly cited: readonly CitedChunk[];
  readonly contextChars: number;
}

/**
 * RAG pipeline over uploaded documents
 *
 * 1. Ingestion: Chunk -> Embed (batched) -> Upsert
 * 2. Questions: Embed (cached) -> Top-k search -> Bounded context -> Grounded generation
 *
 * @remarks ask() degrades instead of rejecting when the model endpoints fail;
 * only an embedding dimension mismatch propagates
 */
export class RAGPipeline {
  private readonly config: RAGConfig;
  private readonly store: DocumentVectorStore;
  private readonly embedder: EmbeddingClient;
  private readonly generator: GenerationClient;
  private readonly cache: EmbeddingCache;
  private readonly recordSink: RecordSink;
  private readonly now: () => number;

  constructor(options: RAGPipelineOptions) {
    this.config = RAGConfigSchema.parse(options.config ?? {});
    this.store = options.store;
    this.embedder = options.embedder;
    this.generator = options.generator;
    this.cache = options.cache ?? new EmbeddingCache();
    this.recordSink = options.recordSink ?? logRecord;
    this.now = options.now ?? Date.now;
  }

  /**
   * Chunk, embed and store one document
   * @param text - Document text; surrounding whitespace is dropped
   * @param sourceName - Name the chunks are cited under
   * @throws RemoteUnavailableError or MalformedResponseError if embedding fails
   * @throws EmbeddingDimensionMismatchError if the vectors do not fit the store
   */
  async ingest(text: string, sourceName: string): Promise<IngestResult> {
    const body = text.trim();
    const documentId = documentIdFor(sourceName, body);

    if (body.length === 0) {
      logger.warn(`[RAG] Skipping empty document "${sourceName}"`);
      return { documentId, chunksAdded: 0 };
    }

    const chunks: DocumentChunk[] = [
      ...chunkDocument(body, {
        documentId,
        source: sourceName,
        chunkSize: this.config.chunkSize,
        chunkOverlap: this.config.chunkOverlap,
      }),
    ];

    const embeddings: (readonly number[])[] = [];
    const batchSize = this.config.embeddingBatchSize;
    const totalBatches = Math.ceil(chunks.length / batchSize);

    for (let i = 0; i < chunks.length; i += batchSize) {
      const batch = chunks.slice(i, i + batchSize);
      logger.debug(
        `[RAG] Embedding batch ${Math.floor(i / batchSize) + 1}/${totalBatches}`
      );
      const results = await this.embedder.embedBatch(batch.map((c) => c.text));
      embeddings.push(...results.map((r) => r.values));
    }

    const chunksAdded = await this.store.upsert(chunks, embeddings);
    logger.info(
      `[RAG] Ingested "${sourceName}" as ${documentId}: ${chunksAdded} chunks`
    );

    return { documentId, chunksAdded };
  }

  /**
   * Answer a question from the stored documents
   * @param query - Question text
   * @param k - Chunks to retrieve (default: configured topK)
   * @throws EmbeddingDimensionMismatchError if the query vector does not fit the store
   */
  async ask(query: string, k: number = this.config.topK): Promise<QueryAnswer> {
    const startedAt = this.now();

    if (this.store.isEmpty()) {
      return this.finish(query, startedAt, [], 0, {
        answer: NO_CONTEXT_ANSWER,
        sources: [],
        hasContext: false,
        degraded: false,
      });
    }

    let queryEmbedding: readonly number[];
    try {
      queryEmbedding = await this.cache.getOrEmbed(query, this.embedder);
    } catch (error) {
      this.logInferenceFailure("embedding", error);
      return this.finish(query, startedAt, [], 0, {
        answer: RETRIEVAL_UNAVAILABLE_ANSWER,
        sources: [],
        hasContext: false,
        degraded: true,
      });
    }

    const hits = this.store.search(queryEmbedding, k);
    if (hits.length === 0) {
      return this.finish(query, startedAt, hits, 0, {
        answer: NO_CONTEXT_ANSWER,
        sources: [],
        hasContext: false,
        degraded: false,
      });
    }

    const { prompt, cited, contextChars } = this.assembleContext(query, hits);

    try {
      const completion = await this.generator.generate(prompt, {
        systemPrompt: GROUNDING_SYSTEM_PROMPT,
        temperature: this.config.temperature,
        maxTokens: this.config.maxTokens,
      });

      const answer = completion.text.trim();
      if (answer.length === 0) {
        logger.warn(`[RAG] generation returned no text (${completion.finishReason}), answering degraded`);
        return this.finish(query, startedAt, hits, contextChars, {
          answer: GENERATION_UNAVAILABLE_ANSWER,
          sources: cited,
          hasContext: true,
          degraded: true,
        });
      }

      return this.finish(query, startedAt, hits, contextChars, {
        answer,
        sources: cited,
        hasContext: true,
        degraded: false,
      });
    } catch (error) {
      this.logInferenceFailure("generation", error);
      return this.finish(query, startedAt, hits, contextChars, {
        answer: GENERATION_UNAVAILABLE_ANSWER,
        sources: cited,
        hasContext: true,
        degraded: true,
      });
    }
  }

  /**
   * Remove all documents and forget cached query vectors
   * @returns Number of chunks removed
   */
  async clear(): Promise<number> {
    const removed = await this.store.clear();
    this.cache.clear();
    return removed;
  }

  stats(): PipelineStats {
    return { ...this.store.stats(), cachedQueries: this.cache.size };
  }

  /**
   * Concatenate hits in similarity order until the character budget runs out
   * @remarks The lowest-ranked chunks are cut or dropped first; only chunks that made it in are cited
   */
  private assembleContext(query: string, hits: readonly SearchHit[]): AssembledContext {
    let remaining = this.config.maxContextChars;
    const parts: string[] = [];
    const cited: CitedChunk[] = [];

    for (const hit of hits) {
      if (remaining <= 0) break;
      const text = hit.chunk.text.slice(0, remaining);
      remaining -= text.length;

      parts.push(`[${cited.length + 1}] (source: ${hit.chunk.source})\n${text}`);
      cited.push({
        chunkId: hit.chunk.id,
        documentId: hit.chunk.documentId,
        source: hit.chunk.source,
        text: hit.chunk.text,
        score: hit.score,
      });
    }

    const prompt = `Reference passages:
${parts.join("\n\n")}

Question: ${query}

Answer the question using only the reference passages above.`;

    return {
      prompt,
      cited,
      contextChars: this.config.maxContextChars - remaining,
    };
  }

  private logInferenceFailure(stage: "embedding" | "generation", error: unknown): void {
    const err = toError(error);
    if (isRecoverableInferenceError(error)) {
      logger.warn(`[RAG] ${stage} unavailable, answering degraded: ${err.message}`);
    } else {
      logger.error(`[RAG] unexpected ${stage} failure, answering degraded`, err);
    }
  }

  private finish(
    query: string,
    startedAt: number,
    hits: readonly SearchHit[],
    contextChars: number,
    answer: QueryAnswer
  ): QueryAnswer {
    this.recordSink("query_answer", {
      query_preview: query.slice(0, 100),
      has_context: answer.hasContext,
      degraded: answer.degraded,
      retrieved: hits.length,
      cited: answer.sources.length,
      scores: answer.sources.map((s) => roundTo(s.score, 4)),
      context_chars: contextChars,
      total_ms: this.now() - startedAt,
    });
    return Object.freeze(answer);
  }
}
