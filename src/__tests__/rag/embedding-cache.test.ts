import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import { EmbeddingCache } from "../../rag/embedding-cache.js";
import type { EmbeddingClient } from "../../llm/types.js";

describe("EmbeddingCache", () => {
  let embed: Mock<EmbeddingClient["embed"]>;
  let client: EmbeddingClient;

  beforeEach(() => {
    embed = vi.fn<EmbeddingClient["embed"]>(async (text) => ({
      values: [text.length, 1],
      tokenCount: 1,
      model: "test-embedding",
    }));
    client = { embed, embedBatch: vi.fn<EmbeddingClient["embedBatch"]>() };
  });

  it("should embed on a miss and serve the cached vector afterwards", async () => {
    const cache = new EmbeddingCache();

    const first = await cache.getOrEmbed("what is tls?", client);
    const second = await cache.getOrEmbed("what is tls?", client);

    expect(first).toEqual([12, 1]);
    expect(second).toBe(first);
    expect(embed).toHaveBeenCalledTimes(1);
    expect(cache.getStats()).toEqual({ size: 1, hits: 1, misses: 1, hitRate: 0.5 });
  });

  it("should treat whitespace variants as the same text", async () => {
    const cache = new EmbeddingCache();

    await cache.getOrEmbed("rotate   the\nkeys", client);
    await cache.getOrEmbed("  rotate the keys ", client);

    expect(embed).toHaveBeenCalledTimes(1);
  });

  it("should share one request between concurrent misses", async () => {
    const cache = new EmbeddingCache();

    const [a, b] = await Promise.all([
      cache.getOrEmbed("same question", client),
      cache.getOrEmbed("same question", client),
    ]);

    expect(a).toBe(b);
    expect(embed).toHaveBeenCalledTimes(1);
  });

  it("should not cache failures", async () => {
    embed.mockRejectedValueOnce(new Error("embeddings returned 503"));
    const cache = new EmbeddingCache();

    await expect(cache.getOrEmbed("retry me", client)).rejects.toThrow(
      "embeddings returned 503"
    );
    expect(cache.size).toBe(0);

    await expect(cache.getOrEmbed("retry me", client)).resolves.toEqual([8, 1]);
    expect(embed).toHaveBeenCalledTimes(2);
  });

  it("should evict the least recently used entry", async () => {
    const cache = new EmbeddingCache(2);

    await cache.getOrEmbed("a", client);
    await cache.getOrEmbed("b", client);
    await cache.getOrEmbed("a", client); // a is now the most recent
    await cache.getOrEmbed("c", client); // evicts b
    expect(embed).toHaveBeenCalledTimes(3);

    await cache.getOrEmbed("a", client);
    expect(embed).toHaveBeenCalledTimes(3);

    await cache.getOrEmbed("b", client);
    expect(embed).toHaveBeenCalledTimes(4);
    expect(cache.size).toBe(2);
  });

  it("should reset entries and counters on clear", async () => {
    const cache = new EmbeddingCache();
    await cache.getOrEmbed("a", client);
    await cache.getOrEmbed("a", client);

    cache.clear();

    expect(cache.getStats()).toEqual({ size: 0, hits: 0, misses: 0, hitRate: 0 });
  });
});
