/**
 * Inference client factory
 * @module src/llm/index
 */

// =============================================================================
// Re-exports
// =============================================================================

export * from "./types.js";
export {
  BaseInferenceClient,
  EndpointConfigSchema,
  parseJsonBody,
  describeErrorBody,
} from "./base.js";
export type { EndpointConfig, EndpointConfigInput } from "./base.js";
export { OpenAICompatibleClient } from "./openai.js";
export type { OpenAICompatibleClientOptions } from "./openai.js";
export { retryWithBackoff, isRetryableError } from "./retry.js";
export type { RetryOptions, RetryCallback } from "./retry.js";

import type { InferenceConfig } from "../types.js";
import type { InferenceClient } from "./types.js";
import { OpenAICompatibleClient } from "./openai.js";

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create the inference client from configuration
 * @param config - Endpoint URLs, keys, models and timeouts
 * @returns A new client; callers own and inject it
 *
 * @example
 * ```typescript
 * const client = createInferenceClient(loadConfig().inference);
 * const { text } = await client.generate("ping");
 * ```
 */
export function createInferenceClient(config: InferenceConfig): InferenceClient {
  return new OpenAICompatibleClient({
    chat: {
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      timeout: config.generationTimeoutMs,
    },
    embedding: {
      apiKey: config.embeddingApiKey,
      baseUrl: config.embeddingBaseUrl,
      timeout: config.embeddingTimeoutMs,
    },
    chatModel: config.chatModel,
    embeddingModel: config.embeddingModel,
  });
}
