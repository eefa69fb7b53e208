export interface InferenceConfig {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly chatModel: string;
  readonly embeddingApiKey: string;
  readonly embeddingBaseUrl: string;
  readonly embeddingModel: string;
  readonly generationTimeoutMs: number;
  readonly embeddingTimeoutMs: number;
}

export interface RouterConfig {
  readonly keywordWeight: number;
  readonly patternWeight: number;
  readonly hintBonus: number;
  readonly minConfidence: number;
}

/** Minimum risk score (inclusive) for each threat level above "low" */
export interface ThreatBreakpoints {
  readonly high: number;
  readonly medium: number;
}

export interface RagSettings {
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  readonly topK: number;
  readonly maxContextChars: number;
  readonly embeddingBatchSize: number;
  readonly storeDir: string;
  readonly collection: string;
  readonly embeddingDimension?: number;
}

export interface Config {
  readonly telegramToken?: string;
  readonly inference: InferenceConfig;
  readonly router: RouterConfig;
  readonly threatBreakpoints: ThreatBreakpoints;
  readonly rag: RagSettings;
  readonly historyMaxSize: number;
}

export interface HealthStatus {
  readonly status: "healthy" | "degraded" | "unknown";
  readonly timestamp: number;
  readonly inference: {
    readonly reachable: boolean | null;
    readonly lastCheckedAt: number | null;
    readonly lastError?: string;
  };
  readonly knowledgeBase: {
    readonly chunks: number;
  };
  readonly uptimeMs: number;
}

export type Milliseconds = number;
export type UnixTimestamp = number;
