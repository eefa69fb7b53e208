import { isRecoverableInferenceError, toError } from "../errors/index.js";
import type { GenerationClient } from "../llm/types.js";
import type { Category } from "../router/types.js";
import type { ThreatBreakpoints } from "../types.js";
import { logger } from "../utils.js";
import type { Alert } from "../validation.js";
import { DEFAULT_THREAT_BREAKPOINTS, buildExpertFinding } from "./finding.js";
import { parseExpertResponse } from "./parser.js";
import { EXPERT_SYSTEM_PROMPT, buildExpertPrompt } from "./prompts.js";
import { matchRule } from "./rules.js";
import type { ExpertFinding, ExpertOutcome, RuleTable } from "./types.js";

export interface ExpertAnalyzerOptions {
  readonly category: Category;
  readonly client: GenerationClient;
  readonly rules: RuleTable;
  readonly breakpoints?: ThreatBreakpoints;
  /** Sampling temperature for the analysis call (default: 0.3) */
  readonly temperature?: number;
  readonly maxTokens?: number;
}

/**
 * Category-specific analyzer: asks the model first, falls back to its rule table
 * @remarks analyze() never rejects
 */
export class ExpertAnalyzer {
  readonly category: Category;
  private readonly client: GenerationClient;
  private readonly rules: RuleTable;
  private readonly breakpoints: ThreatBreakpoints;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(options: ExpertAnalyzerOptions) {
    this.category = options.category;
    this.client = options.client;
    this.rules = options.rules;
    this.breakpoints = options.breakpoints ?? DEFAULT_THREAT_BREAKPOINTS;
    this.temperature = options.temperature ?? 0.3;
    this.maxTokens = options.maxTokens ?? 512;
  }

  async analyze(alert: Alert): Promise<ExpertOutcome> {
    const prompt = buildExpertPrompt(this.category, alert);

    try {
      const completion = await this.client.generate(prompt, {
        responseFormat: "json",
        systemPrompt: EXPERT_SYSTEM_PROMPT,
        temperature: this.temperature,
        maxTokens: this.maxTokens,
      });

      const finding = buildExpertFinding(
        parseExpertResponse(completion.text),
        this.breakpoints
      );

      logger.debug(
        `[${this.category}] model analysis: ${finding.technique} (risk ${finding.riskScore})`
      );

      return { finding, degraded: false };
    } catch (error) {
      const err = toError(error);
      if (isRecoverableInferenceError(error)) {
        logger.warn(`[${this.category}] falling back to rules: ${err.message}`);
      } else {
        logger.error(`[${this.category}] unexpected analysis failure, falling back to rules`, err);
      }

      return {
        finding: this.fallback(alert),
        degraded: true,
        failureReason: err.message,
      };
    }
  }

  /**
   * Rule-based analysis over this category's table
   */
  fallback(alert: Alert): ExpertFinding {
    const { rule, indicator } = matchRule(this.rules, alert.payload);

    const analysis =
      indicator !== undefined
        ? `Rule-based analysis: payload matched indicator "${indicator}", classified as ${rule.technique} with risk score ${rule.riskScore}.`
        : `Rule-based analysis: no specific indicator matched, classified as ${rule.technique} with risk score ${rule.riskScore}.`;

    return buildExpertFinding(
      {
        technique: rule.technique,
        riskScore: rule.riskScore,
        advice: rule.advice,
        analysis,
      },
      this.breakpoints
    );
  }
}
