import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import { OpenAICompatibleClient } from "../../llm/openai.js";
import { createInferenceClient } from "../../llm/index.js";
import {
  MalformedResponseError,
  RemoteFailureSubType,
  RemoteUnavailableError,
} from "../../errors/index.js";

// =============================================================================
// Mock Types (avoiding 'any')
// =============================================================================

interface MockFetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text: () => Promise<string>;
}

type MockFetch = Mock<(url: string, init: RequestInit) => Promise<MockFetchResponse>>;

// =============================================================================
// Mock Helpers
// =============================================================================

function createMockResponse(
  body: unknown,
  options: { ok?: boolean; status?: number; statusText?: string } = {}
): MockFetchResponse {
  const { ok = true, status = 200, statusText = "OK" } = options;
  return {
    ok,
    status,
    statusText,
    text: () => Promise.resolve(typeof body === "string" ? body : JSON.stringify(body)),
  };
}

function createChatResponse(content: string | null, finishReason: string | null = "stop") {
  return {
    choices: [{ message: { content }, finish_reason: finishReason }],
    usage: { total_tokens: 42 },
    model: "served-chat-model",
  };
}

function createEmbeddingResponse(embeddings: number[][]) {
  return {
    data: embeddings.map((embedding, index) => ({ embedding, index })),
    usage: { total_tokens: embeddings.length * 10 },
    model: "served-embedding-model",
  };
}

function requestBody(mockFetch: MockFetch, call = 0): unknown {
  const init = mockFetch.mock.calls[call]?.[1];
  return typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
}

function createClient(): OpenAICompatibleClient {
  return new OpenAICompatibleClient({
    chat: { apiKey: "test-secret", baseUrl: "https://llm.test/v1/", timeout: 1000 },
    embedding: { apiKey: "embed-secret", baseUrl: "https://embed.test/v1" },
    chatModel: "chat-model",
    embeddingModel: "embedding-model",
    retryDelayMs: 0,
  });
}

// =============================================================================
// Tests
// =============================================================================

describe("OpenAICompatibleClient", () => {
  let mockFetch: MockFetch;
  let client: OpenAICompatibleClient;

  beforeEach(() => {
    mockFetch = vi.fn<(url: string, init: RequestInit) => Promise<MockFetchResponse>>();
    vi.stubGlobal("fetch", mockFetch);
    client = createClient();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.useRealTimers();
  });

  // ---------------------------------------------------------------------------
  // generate
  // ---------------------------------------------------------------------------

  describe("generate", () => {
    it("should post a chat completion and map the response", async () => {
      mockFetch.mockResolvedValue(createMockResponse(createChatResponse("Analysis text")));

      const result = await client.generate("Analyze this", {
        systemPrompt: "You are an analyst.",
        responseFormat: "json",
        temperature: 0.3,
        maxTokens: 512,
      });

      expect(result).toEqual({
        text: "Analysis text",
        tokenCount: 42,
        model: "served-chat-model",
        finishReason: "stop",
      });
      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(mockFetch.mock.calls[0]?.[0]).toBe("https://llm.test/v1/chat/completions");
      expect(mockFetch.mock.calls[0]?.[1]).toMatchObject({
        method: "POST",
        headers: {
          Authorization: "Bearer test-secret",
          "Content-Type": "application/json",
        },
      });
      expect(requestBody(mockFetch)).toEqual({
        model: "chat-model",
        messages: [
          { role: "system", content: "You are an analyst." },
          { role: "user", content: "Analyze this" },
        ],
        temperature: 0.3,
        max_tokens: 512,
        response_format: { type: "json_object" },
      });
    });

    it("should use default sampling and plain text without a system prompt", async () => {
      mockFetch.mockResolvedValue(createMockResponse(createChatResponse("Hi")));

      await client.generate("Hello");

      expect(requestBody(mockFetch)).toEqual({
        model: "chat-model",
        messages: [{ role: "user", content: "Hello" }],
        temperature: 0.7,
        max_tokens: 1024,
      });
    });

    it("should tolerate missing usage, model and content", async () => {
      mockFetch.mockResolvedValue(
        createMockResponse({ choices: [{ message: { content: null }, finish_reason: "length" }] })
      );

      const result = await client.generate("Hello");

      expect(result).toEqual({
        text: "",
        tokenCount: 0,
        model: "chat-model",
        finishReason: "length",
      });
    });

    it.each([
      ["tool_calls", "tool_use"],
      ["content_filter", "content_filter"],
      [null, "unknown"],
      ["something_new", "unknown"],
    ])("should map finish_reason %s to %s", async (reason, expected) => {
      mockFetch.mockResolvedValue(createMockResponse(createChatResponse("x", reason)));

      const result = await client.generate("Hello");

      expect(result.finishReason).toBe(expected);
    });

    it("should raise a retryable RemoteUnavailableError on 5xx without retrying", async () => {
      mockFetch.mockResolvedValue(
        createMockResponse(
          { error: { message: "upstream overloaded", type: "server_error" } },
          { ok: false, status: 500, statusText: "Internal Server Error" }
        )
      );

      const error = await client.generate("Hello").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RemoteUnavailableError);
      expect(error).toMatchObject({
        message:
          "chat/completions returned 500 Internal Server Error: upstream overloaded (server_error)",
        subType: RemoteFailureSubType.HTTP_STATUS,
        endpoint: "chat/completions",
        status: 500,
        retryable: true,
      });
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it("should mark 4xx errors as not retryable", async () => {
      mockFetch.mockResolvedValue(
        createMockResponse({ error: "invalid api key" }, {
          ok: false,
          status: 401,
          statusText: "Unauthorized",
        })
      );

      await expect(client.generate("Hello")).rejects.toMatchObject({
        message: "chat/completions returned 401 Unauthorized: invalid api key",
        retryable: false,
      });
    });

    it("should raise a NETWORK error when fetch fails", async () => {
      mockFetch.mockRejectedValue(new TypeError("fetch failed"));

      await expect(client.generate("Hello")).rejects.toMatchObject({
        message: "chat/completions request failed: fetch failed",
        subType: RemoteFailureSubType.NETWORK,
      });
    });

    it("should raise a TIMEOUT error when the request takes too long", async () => {
      vi.useFakeTimers();
      mockFetch.mockImplementation(
        (_url, init) =>
          new Promise((_resolve, reject) => {
            init.signal?.addEventListener("abort", () => {
              reject(Object.assign(new Error("This operation was aborted"), { name: "AbortError" }));
            });
          })
      );

      const assertion = expect(client.generate("Hello")).rejects.toMatchObject({
        message: "chat/completions timed out after 1000ms",
        subType: RemoteFailureSubType.TIMEOUT,
      });
      await vi.advanceTimersByTimeAsync(1000);
      await assertion;
    });

    it("should raise MalformedResponseError for non-JSON bodies", async () => {
      mockFetch.mockResolvedValue(createMockResponse("<html>Bad Gateway</html>"));

      await expect(client.generate("Hello")).rejects.toThrow(MalformedResponseError);
    });

    it("should raise MalformedResponseError for empty choices", async () => {
      mockFetch.mockResolvedValue(createMockResponse({ choices: [] }));

      await expect(client.generate("Hello")).rejects.toThrow(
        "chat/completions: empty choices array"
      );
    });
  });

  // ---------------------------------------------------------------------------
  // embed / embedBatch
  // ---------------------------------------------------------------------------

  describe("embedBatch", () => {
    it("should return nothing for no input without a request", async () => {
      await expect(client.embedBatch([])).resolves.toEqual([]);
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it("should post to the embedding endpoint and keep input order", async () => {
      mockFetch.mockResolvedValue(
        createMockResponse({
          data: [
            { embedding: [0, 1], index: 1 },
            { embedding: [1, 0], index: 0 },
          ],
          usage: { total_tokens: 9 },
        })
      );

      const results = await client.embedBatch(["first", "second"]);

      expect(results).toEqual([
        { values: [1, 0], tokenCount: 5, model: "embedding-model" },
        { values: [0, 1], tokenCount: 5, model: "embedding-model" },
      ]);
      expect(mockFetch.mock.calls[0]?.[0]).toBe("https://embed.test/v1/embeddings");
      expect(mockFetch.mock.calls[0]?.[1]).toMatchObject({
        headers: { Authorization: "Bearer embed-secret" },
      });
      expect(requestBody(mockFetch)).toEqual({
        model: "embedding-model",
        input: ["first", "second"],
      });
    });

    it("should reject a vector count that differs from the input count", async () => {
      mockFetch.mockResolvedValue(createMockResponse(createEmbeddingResponse([[1, 0]])));

      await expect(client.embedBatch(["a", "b"])).rejects.toThrow(
        "embeddings: expected 2 vectors, got 1"
      );
    });

    it("should retry a transient failure once", async () => {
      mockFetch
        .mockResolvedValueOnce(
          createMockResponse({}, { ok: false, status: 503, statusText: "Service Unavailable" })
        )
        .mockResolvedValueOnce(createMockResponse(createEmbeddingResponse([[0.5, 0.5]])));

      const result = await client.embed("query");

      expect(result.values).toEqual([0.5, 0.5]);
      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(console.warn).toHaveBeenCalled();
    });

    it("should give up after the retry", async () => {
      mockFetch.mockResolvedValue(
        createMockResponse({}, { ok: false, status: 503, statusText: "Service Unavailable" })
      );

      await expect(client.embed("query")).rejects.toMatchObject({
        status: 503,
        endpoint: "embeddings",
      });
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it("should not retry permanent failures", async () => {
      mockFetch.mockResolvedValue(
        createMockResponse({}, { ok: false, status: 400, statusText: "Bad Request" })
      );

      await expect(client.embed("query")).rejects.toThrow(RemoteUnavailableError);
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });
  });

  // ---------------------------------------------------------------------------
  // Health
  // ---------------------------------------------------------------------------

  describe("health", () => {
    it("should start with unknown reachability", () => {
      expect(client.getHealth()).toEqual({ reachable: null, lastCheckedAt: null });
    });

    it("should report an available endpoint", async () => {
      mockFetch.mockResolvedValue(createMockResponse({ data: [{ id: "chat-model" }] }));

      await expect(client.checkAvailability()).resolves.toEqual({ available: true });
      expect(mockFetch.mock.calls[0]?.[0]).toBe("https://llm.test/v1/models");
      expect(mockFetch.mock.calls[0]?.[1]).toMatchObject({ method: "GET" });
      expect(client.getHealth().reachable).toBe(true);
    });

    it("should report an unavailable endpoint without throwing", async () => {
      mockFetch.mockRejectedValue(new TypeError("fetch failed"));

      await expect(client.checkAvailability()).resolves.toEqual({
        available: false,
        error: "models request failed: fetch failed",
      });
      expect(client.getHealth()).toMatchObject({
        reachable: false,
        lastError: "models request failed: fetch failed",
      });
    });

    it("should track reachability from ordinary calls", async () => {
      mockFetch
        .mockRejectedValueOnce(new TypeError("fetch failed"))
        .mockResolvedValueOnce(createMockResponse(createChatResponse("ok")));

      await client.generate("Hello").catch(() => undefined);
      expect(client.getHealth().reachable).toBe(false);

      await client.generate("Hello");
      expect(client.getHealth().reachable).toBe(true);
      expect(client.getHealth().lastError).toBeUndefined();
    });
  });
});

describe("createInferenceClient", () => {
  it("should build an OpenAI-compatible client from configuration", () => {
    const client = createInferenceClient({
      apiKey: "test-secret",
      baseUrl: "https://llm.test/v1",
      chatModel: "chat-model",
      embeddingApiKey: "test-secret",
      embeddingBaseUrl: "https://llm.test/v1",
      embeddingModel: "embedding-model",
      generationTimeoutMs: 60000,
      embeddingTimeoutMs: 30000,
    });

    expect(client).toBeInstanceOf(OpenAICompatibleClient);
    expect(client.getHealth().reachable).toBeNull();
  });
});
