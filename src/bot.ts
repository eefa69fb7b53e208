/**
 * Telegram bot for alert triage and knowledge-base questions
 */

import { Bot } from "grammy";
import type { AnalysisResult } from "./agents/coordinator.js";
import { createDefaultErrorHandler } from "./errors/index.js";
import type { QueryAnswer } from "./rag/index.js";
import type { AppServices } from "./services.js";
import type { HealthStatus } from "./types.js";
import { createSummary, formatDuration, logger } from "./utils.js";
import {
  parseAnalyzeCommand,
  parseUploadCommand,
  sanitizeMessage,
  validateQuestion,
} from "./validation.js";

const DEFAULT_HISTORY_ITEMS = 5;
const MAX_HISTORY_ITEMS = 20;
const SOURCE_PREVIEW_LENGTH = 160;

/** The part of a grammy command context the handlers use */
export interface CommandContext {
  readonly match: string;
  reply(text: string): Promise<unknown>;
}

export type CommandHandler = (
  services: AppServices,
  ctx: CommandContext
) => Promise<void>;

const THREAT_BADGES = { high: "🔴 HIGH", medium: "🟠 MEDIUM", low: "🟢 LOW" } as const;

// =============================================================================
// Formatting
// =============================================================================

export function formatAnalysis(result: AnalysisResult): string {
  const lines = [
    `🛡️ Alert analysis${result.degraded ? " (rule-based fallback)" : ""}`,
    "",
    `Category: ${result.category} (confidence ${result.routing.confidence.toFixed(2)})`,
    `Technique: ${result.technique}`,
    `Risk score: ${result.riskScore}/10 ${THREAT_BADGES[result.threatLevel]}`,
  ];

  if (result.analysis) {
    lines.push("", createSummary(result.analysis));
  }

  if (result.advice.length > 0) {
    lines.push("", "Recommendations:");
    result.advice.forEach((item, i) => lines.push(`${i + 1}. ${item}`));
  }

  lines.push(
    "",
    `⏱️ ${formatDuration(result.latencies.totalMs)} (routing ${formatDuration(
      result.latencies.classificationMs
    )}, analysis ${formatDuration(result.latencies.analysisMs)})`,
    `🆔 ${result.taskId}`
  );

  return lines.join("\n");
}

export function formatAnswer(answer: QueryAnswer): string {
  const lines = [answer.degraded ? `⚠️ ${answer.answer}` : answer.answer];

  if (answer.sources.length > 0) {
    lines.push("", "📚 Sources:");
    answer.sources.forEach((source, i) => {
      lines.push(
        `[${i + 1}] ${source.source} (score ${source.score.toFixed(3)}): ${createSummary(
          sanitizeMessage(source.text),
          SOURCE_PREVIEW_LENGTH
        )}`
      );
    });
  }

  return lines.join("\n");
}

export function buildHealthStatus(services: AppServices): HealthStatus {
  const health = services.inference.getHealth();
  const now = services.now();

  return {
    status:
      health.reachable === true
        ? "healthy"
        : health.reachable === false
          ? "degraded"
          : "unknown",
    timestamp: now,
    inference: {
      reachable: health.reachable,
      lastCheckedAt: health.lastCheckedAt,
      ...(health.lastError !== undefined ? { lastError: health.lastError } : {}),
    },
    knowledgeBase: { chunks: services.store.size() },
    uptimeMs: now - services.startedAt,
  };
}

// =============================================================================
// Command handlers
// =============================================================================

export const handleStart: CommandHandler = async (_services, ctx) => {
  await ctx.reply(
    "👋 Hello!\n\n" +
      "🛡️ I triage security alerts and answer questions about uploaded documents.\n\n" +
      "Send /help to see the commands."
  );
};

export const handleHelp: CommandHandler = async (_services, ctx) => {
  await ctx.reply(
    [
      "📖 Commands",
      "",
      "/analyze [ip=<addr>] [target=<addr>] [type=<hint>] [proto=<name>] <payload> - analyze an alert",
      "/ask <question> - answer from the knowledge base",
      "/upload [source=<name>] <text> - add a document to the knowledge base",
      "/history [n] - last analyses",
      "/stats - analysis statistics",
      "/kb - knowledge base status",
      "/clear - empty the knowledge base",
      "/health - model endpoint status",
      "",
      "Example: /analyze ip=10.0.0.5 ' OR '1'='1",
    ].join("\n")
  );
};

export const handleAnalyze: CommandHandler = async (services, ctx) => {
  const parsed = parseAnalyzeCommand(ctx.match);
  if (!parsed.success || parsed.data === undefined) {
    await ctx.reply(`❌ ${parsed.error ?? "Invalid alert"}\n\nUsage: /analyze [ip=<addr>] <payload>`);
    return;
  }

  const result = await services.coordinator.analyzeAlert(parsed.data);
  services.history.save(result);
  await ctx.reply(formatAnalysis(result));
};

export const handleAsk: CommandHandler = async (services, ctx) => {
  const question = validateQuestion(ctx.match);
  if (!question.success || question.data === undefined) {
    await ctx.reply(`❌ ${question.error ?? "Invalid question"}\n\nUsage: /ask <question>`);
    return;
  }

  const answer = await services.pipeline.ask(question.data);
  await ctx.reply(formatAnswer(answer));
};

export const handleUpload: CommandHandler = async (services, ctx) => {
  const parsed = parseUploadCommand(ctx.match);
  if (!parsed.success || parsed.data === undefined) {
    await ctx.reply(
      `❌ ${parsed.error ?? "Invalid upload"}\n\nUsage: /upload [source=<name>] <text>`
    );
    return;
  }

  const { documentId, chunksAdded } = await services.pipeline.ingest(
    parsed.data.text,
    parsed.data.sourceName
  );
  await ctx.reply(
    `✅ Stored "${parsed.data.sourceName}" as ${documentId} (${chunksAdded} chunks).`
  );
};

export const handleHistory: CommandHandler = async (services, ctx) => {
  const requested = Number.parseInt(ctx.match.trim(), 10);
  const limit = Number.isNaN(requested)
    ? DEFAULT_HISTORY_ITEMS
    : Math.min(MAX_HISTORY_ITEMS, Math.max(1, requested));

  const records = services.history.list({ limit });
  if (records.length === 0) {
    await ctx.reply("📭 No analyses yet.");
    return;
  }

  const lines = records.map(
    (record) =>
      `${new Date(record.timestamp).toISOString()} ${record.category} ${record.riskScore}/10 ${
        THREAT_BADGES[record.threatLevel]
      }${record.degraded ? " (fallback)" : ""} - ${record.technique}`
  );
  await ctx.reply([`🗂️ Last ${records.length} analyses`, "", ...lines].join("\n"));
};

export const handleStats: CommandHandler = async (services, ctx) => {
  const stats = services.history.getStats();
  await ctx.reply(
    [
      "📊 Analysis statistics",
      "",
      `Total: ${stats.totalAnalyses} (fallback: ${stats.degradedCount})`,
      `Average risk: ${stats.averageRiskScore}`,
      `Threat levels: high ${stats.byThreatLevel.high}, medium ${stats.byThreatLevel.medium}, low ${stats.byThreatLevel.low}`,
      `Categories: web_attack ${stats.byCategory.web_attack}, vulnerability_attack ${stats.byCategory.vulnerability_attack}, illegal_connection ${stats.byCategory.illegal_connection}`,
    ].join("\n")
  );
};

export const handleKnowledgeBase: CommandHandler = async (services, ctx) => {
  const stats = services.pipeline.stats();
  await ctx.reply(
    [
      "📚 Knowledge base",
      "",
      `Collection: ${stats.collection}`,
      `Chunks: ${stats.count}`,
      `Embedding dimension: ${stats.dimension ?? "not set"}`,
      `Cached questions: ${stats.cachedQueries}`,
    ].join("\n")
  );
};

export const handleClear: CommandHandler = async (services, ctx) => {
  const removed = await services.pipeline.clear();
  await ctx.reply(`🧹 Knowledge base cleared (${removed} chunks removed).`);
};

export const handleHealth: CommandHandler = async (services, ctx) => {
  const health = buildHealthStatus(services);
  const reachability =
    health.inference.reachable === null
      ? "not checked yet"
      : health.inference.reachable
        ? "reachable"
        : `unreachable (${health.inference.lastError ?? "unknown error"})`;

  await ctx.reply(
    [
      `🩺 Status: ${health.status}`,
      `Model endpoint: ${reachability}`,
      `Knowledge base chunks: ${health.knowledgeBase.chunks}`,
      `Uptime: ${formatDuration(health.uptimeMs)}`,
    ].join("\n")
  );
};

export const COMMANDS: Readonly<Record<string, CommandHandler>> = {
  start: handleStart,
  help: handleHelp,
  analyze: handleAnalyze,
  ask: handleAsk,
  upload: handleUpload,
  history: handleHistory,
  stats: handleStats,
  kb: handleKnowledgeBase,
  clear: handleClear,
  health: handleHealth,
};

// =============================================================================
// Bot
// =============================================================================

export function createBot(token: string, services: AppServices): Bot {
  const bot = new Bot(token);
  const errorHandler = createDefaultErrorHandler();

  bot.catch(async (err) => {
    logger.error("Bot error:", err.error);
    const { userMessage } = errorHandler.handle(err.error);
    try {
      await err.ctx.reply(userMessage);
    } catch (replyError) {
      logger.warn("Could not send error reply:", replyError);
    }
  });

  for (const [name, handler] of Object.entries(COMMANDS)) {
    bot.command(name, async (ctx) => {
      logger.info(`/${name} from ${ctx.from?.id ?? "unknown"}`);
      await handler(services, ctx);
    });
  }

  bot.on("message", async (ctx) => {
    await ctx.reply("❓ Unknown input. Send /help to see the commands.");
  });

  logger.debug("Bot created");
  return bot;
}
