import { z } from "zod";
import { MalformedResponseError } from "../errors/index.js";
import { logger } from "../utils.js";
import {
  BaseInferenceClient,
  EndpointConfigSchema,
  parseJsonBody,
  type EndpointConfig,
  type EndpointConfigInput,
} from "./base.js";
import { retryWithBackoff } from "./retry.js";
import {
  GenerateOptionsSchema,
  type CompletionResult,
  type EmbeddingResult,
  type FinishReason,
  type GenerateOptions,
  type InferenceClient,
} from "./types.js";

// =============================================================================
// OpenAI-compatible Response Schemas (Zod validation)
// =============================================================================

/** /embeddings response schema */
const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number(),
    })
  ),
  usage: z
    .object({
      total_tokens: z.number(),
    })
    .optional(),
  model: z.string().optional(),
});

/** /chat/completions response schema */
const ChatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable(),
      }),
      finish_reason: z.string().nullable(),
    })
  ),
  usage: z
    .object({
      total_tokens: z.number(),
    })
    .optional(),
  model: z.string().optional(),
});

// =============================================================================
// Client Implementation
// =============================================================================

export interface OpenAICompatibleClientOptions {
  /** Chat completion endpoint */
  readonly chat: EndpointConfigInput;
  /** Embedding endpoint (may share URL and key with chat) */
  readonly embedding: EndpointConfigInput;
  readonly chatModel: string;
  readonly embeddingModel: string;
  /** Retries for embedding calls on transient failures (default: 1) */
  readonly embeddingRetries?: number;
  /** Delay before the embedding retry (default: 500) */
  readonly retryDelayMs?: number;
}

/**
 * Client for OpenAI-compatible chat and embedding endpoints
 * @remarks Works with any service exposing /chat/completions, /embeddings and /models
 */
export class OpenAICompatibleClient
  extends BaseInferenceClient
  implements InferenceClient
{
  private readonly chat: EndpointConfig;
  private readonly embedding: EndpointConfig;
  private readonly chatModel: string;
  private readonly embeddingModel: string;
  private readonly embeddingRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: OpenAICompatibleClientOptions) {
    super();
    this.chat = EndpointConfigSchema.parse(options.chat);
    this.embedding = EndpointConfigSchema.parse(options.embedding);
    this.chatModel = options.chatModel;
    this.embeddingModel = options.embeddingModel;
    this.embeddingRetries = options.embeddingRetries ?? 1;
    this.retryDelayMs = options.retryDelayMs ?? 500;
  }

  /**
   * Generate chat completion
   * @param prompt - User message
   * @param options - Response format, system prompt and sampling overrides
   * @throws RemoteUnavailableError on transport failure
   * @throws MalformedResponseError if the body does not match the expected shape
   */
  async generate(
    prompt: string,
    options: GenerateOptions = {}
  ): Promise<CompletionResult> {
    const { responseFormat, systemPrompt, temperature, maxTokens } =
      GenerateOptionsSchema.parse(options);

    const messages = [
      ...(systemPrompt !== undefined
        ? [{ role: "system", content: systemPrompt }]
        : []),
      { role: "user", content: prompt },
    ];

    const body = await this.request("chat/completions", this.chat, "/chat/completions", {
      method: "POST",
      body: JSON.stringify({
        model: this.chatModel,
        messages,
        temperature,
        max_tokens: maxTokens,
        ...(responseFormat === "json"
          ? { response_format: { type: "json_object" } }
          : {}),
      }),
    });

    const data = parseJsonBody(body, ChatResponseSchema, "chat/completions");
    const choice = data.choices[0];

    if (!choice) {
      throw new MalformedResponseError(
        "chat/completions: empty choices array",
        body.slice(0, 200)
      );
    }

    return {
      text: choice.message.content ?? "",
      tokenCount: data.usage?.total_tokens ?? 0,
      model: data.model ?? this.chatModel,
      finishReason: mapFinishReason(choice.finish_reason),
    };
  }

  /**
   * Generate embedding for a single text
   * @throws RemoteUnavailableError after the retry budget is spent
   */
  async embed(text: string): Promise<EmbeddingResult> {
    const results = await this.embedBatch([text]);
    const result = results[0];

    if (!result) {
      throw new MalformedResponseError(
        "embeddings: empty result for single input",
        ""
      );
    }

    return result;
  }

  /**
   * Generate embeddings for multiple texts in a single API call
   * @returns One result per input, in input order
   */
  async embedBatch(
    texts: readonly string[]
  ): Promise<readonly EmbeddingResult[]> {
    if (texts.length === 0) {
      return [];
    }

    const body = await retryWithBackoff(
      () =>
        this.request("embeddings", this.embedding, "/embeddings", {
          method: "POST",
          body: JSON.stringify({
            model: this.embeddingModel,
            input: texts,
          }),
        }),
      {
        maxRetries: this.embeddingRetries,
        baseDelayMs: this.retryDelayMs,
        onRetry: (attempt, error, delayMs) => {
          logger.warn(
            `Embedding request failed (attempt ${attempt}), retrying in ${delayMs}ms: ${error.message}`
          );
        },
      }
    );

    const data = parseJsonBody(body, EmbeddingResponseSchema, "embeddings");

    if (data.data.length !== texts.length) {
      throw new MalformedResponseError(
        `embeddings: expected ${texts.length} vectors, got ${data.data.length}`,
        body.slice(0, 200)
      );
    }

    const sortedData = [...data.data].sort((a, b) => a.index - b.index);
    const tokensPerEmbedding = Math.ceil(
      (data.usage?.total_tokens ?? 0) / texts.length
    );

    return sortedData.map((item) => ({
      values: item.embedding,
      tokenCount: tokensPerEmbedding,
      model: data.model ?? this.embeddingModel,
    }));
  }

  /**
   * Check if the chat endpoint answers
   * @returns Availability status with optional error message
   */
  async checkAvailability(): Promise<{ available: boolean; error?: string }> {
    try {
      await this.request("models", this.chat, "/models", { method: "GET" });
      return { available: true };
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      this.markUnreachable(message);
      return { available: false, error: message };
    }
  }
}

/**
 * Map finish_reason to our FinishReason type
 */
function mapFinishReason(reason: string | null): FinishReason {
  switch (reason) {
    case "stop":
      return "stop";
    case "length":
      return "length";
    case "content_filter":
      return "content_filter";
    case "tool_calls":
    case "function_call":
      return "tool_use";
    default:
      return "unknown";
  }
}
