/**
 * Expert analyzers
 * @module src/experts
 */

export * from "./types.js";
export {
  DEFAULT_THREAT_BREAKPOINTS,
  buildExpertFinding,
  clampRiskScore,
  threatLevelFor,
} from "./finding.js";
export { parseExpertResponse, ExpertResponseSchema } from "./parser.js";
export {
  buildExpertPrompt,
  EXPERT_SYSTEM_PROMPT,
  MAX_PROMPT_PAYLOAD_LENGTH,
} from "./prompts.js";
export { loadFallbackRules, matchRule, DEFAULT_RULES_PATH } from "./rules.js";
export type { RuleMatch } from "./rules.js";
export { ExpertAnalyzer } from "./expert.js";
export type { ExpertAnalyzerOptions } from "./expert.js";

import type { GenerationClient } from "../llm/types.js";
import type { Category } from "../router/types.js";
import type { ThreatBreakpoints } from "../types.js";
import { ExpertAnalyzer } from "./expert.js";
import type { RuleTables } from "./types.js";

/**
 * Build one analyzer per category sharing a client
 */
export function createExperts(
  client: GenerationClient,
  rules: RuleTables,
  breakpoints?: ThreatBreakpoints
): Readonly<Record<Category, ExpertAnalyzer>> {
  const make = (category: Category): ExpertAnalyzer =>
    new ExpertAnalyzer({
      category,
      client,
      rules: rules[category],
      ...(breakpoints !== undefined ? { breakpoints } : {}),
    });

  return {
    web_attack: make("web_attack"),
    vulnerability_attack: make("vulnerability_attack"),
    illegal_connection: make("illegal_connection"),
  };
}
