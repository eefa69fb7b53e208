/**
 * Utility functions for the alert triage assistant
 */
import { z } from "zod";
import { SystemError, SystemErrorSubType } from "./errors/index.js";
import type { Config } from "./types.js";

const DEFAULTS = {
  MODEL_URL: "https://api.siliconflow.cn/v1",
  MODEL_NAME: "Qwen/Qwen3-30B-A3B-Instruct-2507",
  EMBEDDING_MODEL: "Qwen/Qwen3-Embedding-8B",
  GENERATION_TIMEOUT_MS: 60_000,
  EMBEDDING_TIMEOUT_MS: 30_000,
  MAX_SUMMARY_LENGTH: 300,
} as const;

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LOG_LEVEL = (() => {
  const level = process.env.LOG_LEVEL?.toUpperCase() || "INFO";
  const isProduction = process.env.NODE_ENV === "production";

  if (isProduction && level === "DEBUG") {
    return LogLevel.INFO;
  }

  switch (level) {
    case "DEBUG":
      return LogLevel.DEBUG;
    case "INFO":
      return LogLevel.INFO;
    case "WARN":
      return LogLevel.WARN;
    case "ERROR":
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
})();

export const logger = {
  debug: (message: string, ...args: unknown[]) => {
    if (LOG_LEVEL <= LogLevel.DEBUG) {
      console.log(`🔍 ${message}`, ...args);
    }
  },

  info: (message: string, ...args: unknown[]) => {
    if (LOG_LEVEL <= LogLevel.INFO) {
      console.log(`ℹ️ ${message}`, ...args);
    }
  },

  warn: (message: string, ...args: unknown[]) => {
    if (LOG_LEVEL <= LogLevel.WARN) {
      console.warn(`⚠️ ${message}`, ...args);
    }
  },

  error: (message: string, ...args: unknown[]) => {
    if (LOG_LEVEL <= LogLevel.ERROR) {
      console.error(`❌ ${message}`, ...args);
    }
  },
};

// =============================================================================
// Structured records
// =============================================================================

/** Receives one structured record per completed analysis or answer */
export type RecordSink = (event: string, fields: Record<string, unknown>) => void;

/**
 * Emit a single-line JSON record through the logger
 * @param event - Record name, e.g. "analysis_result"
 * @param fields - Flat record payload
 */
export const logRecord: RecordSink = (event, fields) => {
  logger.info(
    `[record] ${JSON.stringify({ event, at: new Date().toISOString(), ...fields })}`
  );
};

/**
 * Round a number to a fixed count of decimals for log output
 */
export function roundTo(value: number, decimals: number = 3): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Creates brief summary from content
 */
export function createSummary(
  content: string,
  maxLength: number = DEFAULTS.MAX_SUMMARY_LENGTH
): string {
  if (content.length <= maxLength) {
    return content;
  }

  const truncated = content.substring(0, maxLength);
  const lastSpaceIndex = truncated.lastIndexOf(" ");

  if (lastSpaceIndex === -1) {
    return truncated + "...";
  }

  return truncated.substring(0, lastSpaceIndex) + "...";
}

/**
 * Formats duration in milliseconds to readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.max(0, Math.round(ms))}ms`;
  }

  const seconds = Math.floor(ms / 1000);

  if (seconds < 60) {
    return `${seconds}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  return remainingSeconds > 0
    ? `${minutes}m ${remainingSeconds}s`
    : `${minutes}m`;
}

// =============================================================================
// Configuration
// =============================================================================

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === "" ? undefined : value))
  .optional();

/** Blank values count as unset before the inner schema validates them */
const blankAsUnset = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    schema.optional()
  );

const numberWithDefault = (fallback: number) =>
  z.coerce.number().finite().default(fallback);

/** Environment variables accepted by loadConfig */
export const EnvSchema = z
  .object({
    TELEGRAM_BOT_TOKEN: optionalString,
    LLM_API_KEY: z.string().trim().min(1, "LLM_API_KEY is required"),
    MODEL_URL: z.string().url().default(DEFAULTS.MODEL_URL),
    MODEL_NAME: z.string().min(1).default(DEFAULTS.MODEL_NAME),
    EMBEDDING_API_KEY: optionalString,
    EMBEDDING_URL: blankAsUnset(z.string().url()),
    EMBEDDING_MODEL: z.string().min(1).default(DEFAULTS.EMBEDDING_MODEL),
    GENERATION_TIMEOUT_MS: numberWithDefault(DEFAULTS.GENERATION_TIMEOUT_MS).pipe(
      z.number().int().min(1000).max(300_000)
    ),
    EMBEDDING_TIMEOUT_MS: numberWithDefault(DEFAULTS.EMBEDDING_TIMEOUT_MS).pipe(
      z.number().int().min(1000).max(300_000)
    ),
    RAG_CHUNK_SIZE: numberWithDefault(500).pipe(z.number().int().positive()),
    RAG_CHUNK_OVERLAP: numberWithDefault(50).pipe(z.number().int().nonnegative()),
    RAG_TOP_K: numberWithDefault(3).pipe(z.number().int().min(1).max(20)),
    RAG_MAX_CONTEXT_CHARS: numberWithDefault(4000).pipe(z.number().int().positive()),
    RAG_EMBEDDING_BATCH_SIZE: numberWithDefault(32).pipe(
      z.number().int().min(1).max(256)
    ),
    RAG_STORE_DIR: z.string().min(1).default("./data"),
    RAG_COLLECTION: z
      .string()
      .regex(/^[A-Za-z0-9_-]+$/, "RAG_COLLECTION may only contain letters, digits, _ and -")
      .default("rag_documents"),
    EMBEDDING_DIMENSION: blankAsUnset(z.coerce.number().int().positive()),
    ROUTER_KEYWORD_WEIGHT: numberWithDefault(0.6).pipe(z.number().min(0).max(1)),
    ROUTER_PATTERN_WEIGHT: numberWithDefault(0.4).pipe(z.number().min(0).max(1)),
    ROUTER_HINT_BONUS: numberWithDefault(0.2).pipe(z.number().min(0).max(1)),
    ROUTER_MIN_CONFIDENCE: numberWithDefault(0.3).pipe(z.number().min(0).max(1)),
    THREAT_HIGH_MIN: numberWithDefault(8).pipe(z.number().int().min(1).max(10)),
    THREAT_MEDIUM_MIN: numberWithDefault(4).pipe(z.number().int().min(1).max(10)),
    HISTORY_MAX_SIZE: numberWithDefault(100).pipe(z.number().int().positive()),
  })
  .refine((env) => env.RAG_CHUNK_OVERLAP < env.RAG_CHUNK_SIZE, {
    message: "RAG_CHUNK_OVERLAP must be less than RAG_CHUNK_SIZE",
    path: ["RAG_CHUNK_OVERLAP"],
  })
  .refine((env) => env.THREAT_MEDIUM_MIN < env.THREAT_HIGH_MIN, {
    message: "THREAT_MEDIUM_MIN must be less than THREAT_HIGH_MIN",
    path: ["THREAT_MEDIUM_MIN"],
  })
  .refine(
    (env) =>
      Math.abs(env.ROUTER_KEYWORD_WEIGHT + env.ROUTER_PATTERN_WEIGHT - 1) < 0.001,
    {
      message: "ROUTER_KEYWORD_WEIGHT + ROUTER_PATTERN_WEIGHT must equal 1.0",
      path: ["ROUTER_PATTERN_WEIGHT"],
    }
  );

/**
 * Loads configuration from environment variables
 * @param env - Variables to read (defaults to process.env)
 * @throws SystemError with CONFIG subtype listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Config {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "env"}: ${issue.message}`
    );
    throw new SystemError(
      `Invalid configuration: ${problems.join("; ")}`,
      SystemErrorSubType.CONFIG,
      { problems }
    );
  }

  const e = parsed.data;

  return {
    ...(e.TELEGRAM_BOT_TOKEN !== undefined
      ? { telegramToken: e.TELEGRAM_BOT_TOKEN }
      : {}),
    inference: {
      apiKey: e.LLM_API_KEY,
      baseUrl: e.MODEL_URL,
      chatModel: e.MODEL_NAME,
      embeddingApiKey: e.EMBEDDING_API_KEY ?? e.LLM_API_KEY,
      embeddingBaseUrl: e.EMBEDDING_URL ?? e.MODEL_URL,
      embeddingModel: e.EMBEDDING_MODEL,
      generationTimeoutMs: e.GENERATION_TIMEOUT_MS,
      embeddingTimeoutMs: e.EMBEDDING_TIMEOUT_MS,
    },
    router: {
      keywordWeight: e.ROUTER_KEYWORD_WEIGHT,
      patternWeight: e.ROUTER_PATTERN_WEIGHT,
      hintBonus: e.ROUTER_HINT_BONUS,
      minConfidence: e.ROUTER_MIN_CONFIDENCE,
    },
    threatBreakpoints: {
      high: e.THREAT_HIGH_MIN,
      medium: e.THREAT_MEDIUM_MIN,
    },
    rag: {
      chunkSize: e.RAG_CHUNK_SIZE,
      chunkOverlap: e.RAG_CHUNK_OVERLAP,
      topK: e.RAG_TOP_K,
      maxContextChars: e.RAG_MAX_CONTEXT_CHARS,
      embeddingBatchSize: e.RAG_EMBEDDING_BATCH_SIZE,
      storeDir: e.RAG_STORE_DIR,
      collection: e.RAG_COLLECTION,
      ...(e.EMBEDDING_DIMENSION !== undefined
        ? { embeddingDimension: e.EMBEDDING_DIMENSION }
        : {}),
    },
    historyMaxSize: e.HISTORY_MAX_SIZE,
  };
}
