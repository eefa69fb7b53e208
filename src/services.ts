/**
 * Composition root: builds every component from configuration
 */

import { AlertCoordinator } from "./agents/coordinator.js";
import { createExperts, loadFallbackRules } from "./experts/index.js";
import type { RuleTables } from "./experts/types.js";
import { MemoryHistoryStore } from "./history/memory-store.js";
import { createInferenceClient } from "./llm/index.js";
import type { InferenceClient } from "./llm/types.js";
import { DocumentVectorStore, RAGPipeline } from "./rag/index.js";
import { LexicalClassifier } from "./router/index.js";
import type { Config } from "./types.js";
import type { RecordSink } from "./utils.js";

export interface AppServices {
  readonly config: Config;
  readonly inference: InferenceClient;
  readonly classifier: LexicalClassifier;
  readonly coordinator: AlertCoordinator;
  readonly store: DocumentVectorStore;
  readonly pipeline: RAGPipeline;
  readonly history: MemoryHistoryStore;
  /** Epoch milliseconds at composition time */
  readonly startedAt: number;
  readonly now: () => number;
}

/** Replaceable parts, mainly for tests */
export interface ServiceOverrides {
  readonly inference?: InferenceClient;
  readonly rules?: RuleTables;
  readonly recordSink?: RecordSink;
  readonly now?: () => number;
}

/**
 * Wire the inference client, classifier, experts, coordinator, store, pipeline and history
 * @remarks Nothing here touches the network or the disk except reading the rule tables
 */
export function createServices(
  config: Config,
  overrides: ServiceOverrides = {}
): AppServices {
  const now = overrides.now ?? Date.now;
  const recordSinkOption =
    overrides.recordSink !== undefined ? { recordSink: overrides.recordSink } : {};

  const inference = overrides.inference ?? createInferenceClient(config.inference);
  const rules = overrides.rules ?? loadFallbackRules();

  const classifier = new LexicalClassifier({
    keywordWeight: config.router.keywordWeight,
    patternWeight: config.router.patternWeight,
    hintBonus: config.router.hintBonus,
    minConfidence: config.router.minConfidence,
  });

  const coordinator = new AlertCoordinator({
    classifier,
    experts: createExperts(inference, rules, config.threatBreakpoints),
    now,
    ...recordSinkOption,
  });

  const store = new DocumentVectorStore({
    collection: config.rag.collection,
    directory: config.rag.storeDir,
    ...(config.rag.embeddingDimension !== undefined
      ? { embeddingDimension: config.rag.embeddingDimension }
      : {}),
  });

  const pipeline = new RAGPipeline({
    store,
    embedder: inference,
    generator: inference,
    config: {
      chunkSize: config.rag.chunkSize,
      chunkOverlap: config.rag.chunkOverlap,
      topK: config.rag.topK,
      maxContextChars: config.rag.maxContextChars,
      embeddingBatchSize: config.rag.embeddingBatchSize,
    },
    now,
    ...recordSinkOption,
  });

  return {
    config,
    inference,
    classifier,
    coordinator,
    store,
    pipeline,
    history: new MemoryHistoryStore(config.historyMaxSize),
    startedAt: now(),
    now,
  };
}
