import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import { dirname, join } from "path";
import {
  EmbeddingDimensionMismatchError,
  FileOperation,
  FileSystemError,
  ValidationError,
  toError,
} from "../errors/index.js";
import { logger } from "../utils.js";
import {
  SerializedStoreSchema,
  type DocumentChunk,
  type SearchHit,
  type SerializedStore,
  type StoreStats,
} from "./types.js";

/** Threshold for detecting zero/near-zero vectors during normalization */
const ZERO_VECTOR_THRESHOLD = 1e-10;

/** Default collection name */
export const DEFAULT_COLLECTION = "rag_documents";

/** Stored chunk with its unit-length embedding */
interface StoredEntry {
  readonly chunk: DocumentChunk;
  readonly embedding: readonly number[];
}

export interface VectorStoreOptions {
  readonly collection?: string;
  /** Directory for <collection>.json; in-memory only when omitted */
  readonly directory?: string;
  /** Fixes the dimension up front instead of learning it from the first upsert */
  readonly embeddingDimension?: number;
}

/**
 * In-memory vector store for document chunks, optionally persisted per collection
 * Uses brute-force cosine similarity over unit-normalized vectors
 *
 * @remarks
 * upsert/clear/load run one at a time through a promise queue and publish a new
 * frozen entry list only after persistence succeeded. search reads whichever list
 * is current, so it never sees a half-applied write.
 */
export class DocumentVectorStore {
  readonly collection: string;
  private readonly filePath: string | null;
  private readonly pinnedDimension: number | null;

  private entries: readonly StoredEntry[] = Object.freeze([]);
  private dimension: number | null;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: VectorStoreOptions = {}) {
    this.collection = options.collection ?? DEFAULT_COLLECTION;
    this.filePath =
      options.directory !== undefined
        ? join(options.directory, `${this.collection}.json`)
        : null;
    this.pinnedDimension = options.embeddingDimension ?? null;
    this.dimension = this.pinnedDimension;
  }

  /**
   * Insert chunks with their embeddings; an existing id is overwritten in place
   * @param chunks - Chunks to store
   * @param embeddings - Corresponding embeddings (same order)
   * @returns Number of entries written
   * @throws ValidationError if the arrays differ in length or a vector is empty or non-finite
   * @throws EmbeddingDimensionMismatchError if a vector's length differs from the store's
   * @throws FileSystemError if the collection file cannot be written
   */
  upsert(
    chunks: readonly DocumentChunk[],
    embeddings: readonly (readonly number[])[]
  ): Promise<number> {
    return this.enqueue(async () => {
      if (chunks.length !== embeddings.length) {
        throw new ValidationError(
          `Chunks and embeddings arrays must have same length: ${chunks.length} vs ${embeddings.length}`,
          "embeddings",
          "❌ Internal indexing error."
        );
      }
      if (chunks.length === 0) return 0;

      // Validate every vector before touching state
      const dimension = this.dimension ?? embeddings[0]?.length ?? 0;
      const normalized = embeddings.map((embedding, i) => {
        if (embedding.length === 0 || embedding.some((v) => !Number.isFinite(v))) {
          throw new ValidationError(
            `Embedding at index ${i} is empty or contains non-finite values`,
            "embeddings",
            "❌ Internal indexing error."
          );
        }
        if (embedding.length !== dimension) {
          throw new EmbeddingDimensionMismatchError(
            dimension,
            embedding.length,
            this.collection,
            { index: i }
          );
        }
        return normalizeVector(embedding);
      });

      const next = [...this.entries];
      const positions = new Map(next.map((entry, i) => [entry.chunk.id, i]));

      chunks.forEach((chunk, i) => {
        const embedding = normalized[i];
        if (embedding === undefined) return;
        const entry: StoredEntry = { chunk, embedding };
        const existing = positions.get(chunk.id);
        if (existing !== undefined) {
          next[existing] = entry;
        } else {
          positions.set(chunk.id, next.length);
          next.push(entry);
        }
      });

      await this.persist(next, dimension);
      this.entries = Object.freeze(next);
      this.dimension = dimension;
      return chunks.length;
    });
  }

  /**
   * Find the k most similar chunks
   * @param queryEmbedding - Query vector
   * @param k - Maximum number of results
   * @returns Hits sorted by similarity (highest first); ties keep insertion order
   * @throws EmbeddingDimensionMismatchError if the query length differs from the store's
   */
  search(queryEmbedding: readonly number[], k: number): readonly SearchHit[] {
    const entries = this.entries;
    if (entries.length === 0 || k <= 0) {
      return [];
    }

    if (this.dimension !== null && queryEmbedding.length !== this.dimension) {
      throw new EmbeddingDimensionMismatchError(
        this.dimension,
        queryEmbedding.length,
        this.collection,
        { operation: "search" }
      );
    }

    const query = normalizeVector(queryEmbedding);

    // Array.prototype.sort is stable, so equal scores stay in insertion order
    return entries
      .map((entry) => ({ chunk: entry.chunk, score: dotProduct(query, entry.embedding) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k);
  }

  /**
   * Remove every entry
   * @returns Number of entries removed
   */
  clear(): Promise<number> {
    return this.enqueue(async () => {
      const removed = this.entries.length;
      await this.persist([], this.pinnedDimension);
      this.entries = Object.freeze([]);
      this.dimension = this.pinnedDimension;
      logger.info(`[VectorStore] Cleared ${removed} chunks from "${this.collection}"`);
      return removed;
    });
  }

  /**
   * Replace the in-memory state with the collection file, if there is one
   * @returns Number of entries loaded (0 when no file exists)
   * @throws FileSystemError if the file is unreadable or malformed
   * @throws EmbeddingDimensionMismatchError if the file disagrees with the pinned dimension
   */
  load(): Promise<number> {
    return this.enqueue(async () => {
      const filePath = this.filePath;
      if (filePath === null) return this.entries.length;

      let content: string;
      try {
        content = await readFile(filePath, "utf-8");
      } catch (error) {
        if (isNotFound(error)) {
          logger.info(`[VectorStore] No saved collection at ${filePath}`);
          return 0;
        }
        throw new FileSystemError(
          `Cannot read vector store: ${toError(error).message}`,
          FileOperation.READ,
          filePath,
          undefined,
          toError(error)
        );
      }

      const stored = parseSerializedStore(content, filePath);

      if (
        this.pinnedDimension !== null &&
        stored.dimension !== null &&
        stored.dimension !== this.pinnedDimension
      ) {
        throw new EmbeddingDimensionMismatchError(
          this.pinnedDimension,
          stored.dimension,
          this.collection,
          { operation: "load" }
        );
      }

      for (const [i, entry] of stored.entries.entries()) {
        if (entry.embedding.length !== stored.dimension) {
          throw new FileSystemError(
            `Entry ${i} in ${filePath} has ${entry.embedding.length} dimensions, expected ${stored.dimension}`,
            FileOperation.READ,
            filePath
          );
        }
      }

      this.entries = Object.freeze(
        stored.entries.map((entry) => ({ chunk: entry.chunk, embedding: entry.embedding }))
      );
      this.dimension = stored.dimension ?? this.pinnedDimension;

      logger.info(
        `[VectorStore] Loaded ${this.entries.length} chunks into "${this.collection}"`
      );
      return this.entries.length;
    });
  }

  stats(): StoreStats {
    return {
      count: this.entries.length,
      dimension: this.dimension,
      collection: this.collection,
    };
  }

  size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  /** Resolves once every queued write has settled */
  async flush(): Promise<void> {
    await this.queue;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Write the collection file through a temp file and rename
   */
  private async persist(
    entries: readonly StoredEntry[],
    dimension: number | null
  ): Promise<void> {
    const filePath = this.filePath;
    if (filePath === null) return;

    const serialized: SerializedStore = {
      version: 1,
      collection: this.collection,
      dimension: entries.length > 0 ? dimension : this.pinnedDimension,
      entries: entries.map((entry) => ({
        chunk: entry.chunk,
        embedding: [...entry.embedding],
      })),
    };
    const tempPath = `${filePath}.${process.pid}.tmp`;

    try {
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(serialized), "utf-8");
      await rename(tempPath, filePath);
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        logger.warn(
          `[VectorStore] Could not remove temp file ${tempPath}: ${toError(cleanupError).message}`
        );
      });
      throw new FileSystemError(
        `Cannot write vector store: ${toError(error).message}`,
        FileOperation.WRITE,
        filePath,
        undefined,
        toError(error)
      );
    }
  }
}

function parseSerializedStore(content: string, filePath: string): SerializedStore {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new FileSystemError(
      `Vector store file is not valid JSON: ${filePath}`,
      FileOperation.READ,
      filePath,
      undefined,
      toError(error)
    );
  }

  const parsed = SerializedStoreSchema.safeParse(json);
  if (!parsed.success) {
    throw new FileSystemError(
      `Invalid vector store format in ${filePath}: ${parsed.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ")}`,
      FileOperation.READ,
      filePath
    );
  }
  return parsed.data;
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

/**
 * Normalize vector to unit length for cosine similarity
 * @returns Unit vector, or a zero vector if the input is zero/near-zero
 */
function normalizeVector(vec: readonly number[]): readonly number[] {
  let sumSquares = 0;
  for (const val of vec) {
    sumSquares += val * val;
  }

  const magnitude = Math.sqrt(sumSquares);

  // Zero vectors score 0 against everything
  if (magnitude < ZERO_VECTOR_THRESHOLD) {
    logger.warn("[VectorStore] Attempted to normalize zero/near-zero vector");
    return vec.map(() => 0);
  }

  return vec.map((val) => val / magnitude);
}

function dotProduct(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}
