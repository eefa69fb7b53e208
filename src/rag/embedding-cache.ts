/**
 * LRU cache for query embeddings
 *
 * The inference client itself never caches; the pipeline keeps this cache on its
 * side so repeated questions skip the embedding call. Keys are SHA256 hashes of
 * the whitespace-normalized text; concurrent misses for one key share a request.
 */
import { createHash } from "crypto";
import type { EmbeddingClient } from "../llm/types.js";

export interface EmbeddingCacheStats {
  readonly size: number;
  readonly hits: number;
  readonly misses: number;
  readonly hitRate: number;
}

export class EmbeddingCache {
  private readonly entries = new Map<string, readonly number[]>();
  /** In-flight requests, keyed like entries */
  private readonly pending = new Map<string, Promise<readonly number[]>>();
  private readonly maxSize: number;
  private hits = 0;
  private misses = 0;

  constructor(maxSize = 256) {
    this.maxSize = Math.max(1, maxSize);
  }

  private key(text: string): string {
    return createHash("sha256")
      .update(text.trim().replace(/\s+/g, " "))
      .digest("hex");
  }

  /**
   * Return the cached vector for text, embedding it on a miss
   * @param text - Text to embed
   * @param client - Client used on a miss
   * @throws Whatever the client throws; failures are not cached
   */
  async getOrEmbed(text: string, client: EmbeddingClient): Promise<readonly number[]> {
    const key = this.key(text);

    const cached = this.entries.get(key);
    if (cached) {
      // LRU: move to end
      this.entries.delete(key);
      this.entries.set(key, cached);
      this.hits++;
      return cached;
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      this.hits++;
      return inFlight;
    }

    this.misses++;
    const request = client.embed(text).then((result) => result.values);
    this.pending.set(key, request);

    try {
      const values = await request;
      if (this.entries.size >= this.maxSize) {
        const oldest = this.entries.keys().next();
        if (!oldest.done) this.entries.delete(oldest.value);
      }
      this.entries.set(key, values);
      return values;
    } finally {
      this.pending.delete(key);
    }
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  getStats(): EmbeddingCacheStats {
    const total = this.hits + this.misses;
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }

  get size(): number {
    return this.entries.size;
  }
}
