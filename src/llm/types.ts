import { z } from "zod";

// =============================================================================
// Request Options
// =============================================================================

/** Shape the model is asked to answer in */
export const ResponseFormatSchema = z.enum(["text", "json"]);
export type ResponseFormat = z.infer<typeof ResponseFormatSchema>;

export const GenerateOptionsSchema = z.object({
  responseFormat: ResponseFormatSchema.default("text"),
  systemPrompt: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().int().positive().default(1024),
});
export type GenerateOptions = z.input<typeof GenerateOptionsSchema>;

// =============================================================================
// Result Types
// =============================================================================

/** One embedding vector as returned by the endpoint */
export interface EmbeddingResult {
  readonly values: readonly number[];
  readonly tokenCount: number;
  readonly model: string;
}

/** Normalized finish_reason; anything unrecognised maps to "unknown" */
export const FinishReasonSchema = z.enum([
  "stop",
  "length",
  "content_filter",
  "tool_use",
  "error",
  "unknown",
]);
export type FinishReason = z.infer<typeof FinishReasonSchema>;

/** One chat completion */
export interface CompletionResult {
  readonly text: string;
  readonly tokenCount: number;
  readonly model: string;
  readonly finishReason: FinishReason;
}

/** Reachability as last observed by the client */
export interface InferenceHealth {
  /** null until the first call or availability check completes */
  readonly reachable: boolean | null;
  readonly lastCheckedAt: number | null;
  readonly lastError?: string;
}

// =============================================================================
// Client Interfaces (Separated for flexibility)
// =============================================================================

/**
 * Chat-completion capability
 * @remarks Implementations fail only with RemoteUnavailableError or MalformedResponseError
 */
export interface GenerationClient {
  /**
   * Generate a completion for the prompt
   * @param prompt - User prompt
   * @param options - Response format and sampling overrides
   */
  generate(prompt: string, options?: GenerateOptions): Promise<CompletionResult>;
}

/** Embedding capability used by ingestion and question answering */
export interface EmbeddingClient {
  embed(text: string): Promise<EmbeddingResult>;

  /** One request for all texts; results keep the input order */
  embedBatch(texts: readonly string[]): Promise<readonly EmbeddingResult[]>;
}

/** Full client with generation, embeddings and a health probe */
export interface InferenceClient extends GenerationClient, EmbeddingClient {
  /** Probe the endpoint and update the reachability flag */
  checkAvailability(): Promise<{ available: boolean; error?: string }>;

  /** Last observed reachability, without a network call */
  getHealth(): InferenceHealth;
}
