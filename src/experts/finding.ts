import type { ThreatBreakpoints } from "../types.js";
import type { ExpertFinding, FindingInput, ThreatLevel } from "./types.js";

export const DEFAULT_THREAT_BREAKPOINTS: ThreatBreakpoints = {
  high: 8,
  medium: 4,
};

/**
 * Round and clamp a risk score into the integer range [1, 10]
 */
export function clampRiskScore(score: number): number {
  return Math.min(10, Math.max(1, Math.round(score)));
}

/**
 * Map a risk score to a threat level
 * @example threatLevelFor(8, { high: 8, medium: 4 }) // "high"
 */
export function threatLevelFor(
  riskScore: number,
  breakpoints: ThreatBreakpoints = DEFAULT_THREAT_BREAKPOINTS
): ThreatLevel {
  if (riskScore >= breakpoints.high) return "high";
  if (riskScore >= breakpoints.medium) return "medium";
  return "low";
}

/**
 * The one constructor for findings; both the model path and the rule path use it
 * @returns A frozen finding with a clamped score and its threat level
 */
export function buildExpertFinding(
  input: FindingInput,
  breakpoints: ThreatBreakpoints = DEFAULT_THREAT_BREAKPOINTS
): ExpertFinding {
  const riskScore = clampRiskScore(input.riskScore);
  return Object.freeze({
    technique: input.technique.trim() || "unknown",
    riskScore,
    threatLevel: threatLevelFor(riskScore, breakpoints),
    advice: Object.freeze(
      input.advice.map((item) => item.trim()).filter((item) => item.length > 0)
    ),
    analysis: input.analysis.trim(),
  });
}
