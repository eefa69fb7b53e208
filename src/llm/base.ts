import { z } from "zod";
import {
  MalformedResponseError,
  RemoteUnavailableError,
  RemoteFailureSubType,
  isRemoteUnavailableError,
  toError,
} from "../errors/index.js";
import type { InferenceHealth } from "./types.js";

// =============================================================================
// JSON Parsing Utilities
// =============================================================================

/**
 * Parse a JSON body and validate it against a schema
 * @param text - Raw response body
 * @param schema - Expected shape
 * @param what - Label used in the error message
 * @throws MalformedResponseError if the body is not JSON or does not match
 */
export function parseJsonBody<T>(
  text: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  what: string
): T {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new MalformedResponseError(
      `${what}: response is not valid JSON`,
      text.slice(0, 200),
      undefined,
      toError(error)
    );
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    throw new MalformedResponseError(
      `${what}: unexpected response shape (${result.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ")})`,
      text.slice(0, 200)
    );
  }

  return result.data;
}

/** OpenAI-compatible error body */
const ApiErrorResponseSchema = z.object({
  error: z.union([
    z.object({
      message: z.string(),
      type: z.string().optional(),
    }),
    z.string(),
  ]),
});

/**
 * Extract a readable error message from a non-2xx body
 */
export function describeErrorBody(text: string): string | undefined {
  try {
    const parsed = ApiErrorResponseSchema.safeParse(JSON.parse(text));
    if (!parsed.success) return undefined;
    const { error } = parsed.data;
    if (typeof error === "string") return error;
    return error.type ? `${error.message} (${error.type})` : error.message;
  } catch {
    return undefined;
  }
}

// =============================================================================
// Base Client Configuration
// =============================================================================

/**
 * Schema for base endpoint configuration
 * @remarks Validates API key format and timeout constraints
 */
export const EndpointConfigSchema = z.object({
  /** API key for authentication */
  apiKey: z.string().min(1),
  /** Base URL for API requests */
  baseUrl: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, "")),
  /** Request timeout in milliseconds (1s - 5min) */
  timeout: z.number().min(1000).max(300000).default(30000),
});
export type EndpointConfig = z.infer<typeof EndpointConfigSchema>;
export type EndpointConfigInput = z.input<typeof EndpointConfigSchema>;

// =============================================================================
// Abstract Base Client
// =============================================================================

/**
 * Shared HTTP plumbing for OpenAI-compatible inference endpoints
 * @remarks Converts every transport failure into RemoteUnavailableError and tracks reachability
 */
export abstract class BaseInferenceClient {
  private health: InferenceHealth = { reachable: null, lastCheckedAt: null };

  /**
   * POST/GET with timeout, returning the body text of a 2xx response
   * @param endpoint - Endpoint label for errors, e.g. "chat/completions"
   * @param config - Endpoint the request goes to
   * @param path - Path below the base URL
   * @param init - Fetch options (signal is supplied here)
   * @throws RemoteUnavailableError on timeout, network failure or non-2xx status
   */
  protected async request(
    endpoint: string,
    config: EndpointConfig,
    path: string,
    init: RequestInit
  ): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), config.timeout);

    try {
      let response: Response;
      let body: string;
      try {
        response = await fetch(`${config.baseUrl}${path}`, {
          ...init,
          headers: this.buildAuthHeaders(config.apiKey),
          signal: controller.signal,
        });
        body = await response.text();
      } catch (error) {
        const err = toError(error);
        if (controller.signal.aborted || err.name === "AbortError") {
          throw new RemoteUnavailableError(
            `${endpoint} timed out after ${config.timeout}ms`,
            RemoteFailureSubType.TIMEOUT,
            endpoint,
            undefined,
            { timeoutMs: config.timeout },
            err
          );
        }
        throw new RemoteUnavailableError(
          `${endpoint} request failed: ${err.message}`,
          RemoteFailureSubType.NETWORK,
          endpoint,
          undefined,
          undefined,
          err
        );
      }

      if (!response.ok) {
        const detail = describeErrorBody(body);
        throw new RemoteUnavailableError(
          `${endpoint} returned ${response.status} ${response.statusText}${
            detail ? `: ${detail}` : ""
          }`,
          RemoteFailureSubType.HTTP_STATUS,
          endpoint,
          response.status
        );
      }

      this.markReachable();
      return body;
    } catch (error) {
      if (isRemoteUnavailableError(error)) {
        this.markUnreachable(error.message);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Build authorization headers for API requests
   */
  protected buildAuthHeaders(apiKey: string): Record<string, string> {
    return {
      Authorization: `Bearer ${apiKey}`,
      "Content-Type": "application/json",
    };
  }

  getHealth(): InferenceHealth {
    return this.health;
  }

  protected markReachable(): void {
    this.health = { reachable: true, lastCheckedAt: Date.now() };
  }

  protected markUnreachable(reason: string): void {
    this.health = {
      reachable: false,
      lastCheckedAt: Date.now(),
      lastError: reason,
    };
  }
}
