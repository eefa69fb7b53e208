import { z } from "zod";

export const ThreatLevelSchema = z.enum(["high", "medium", "low"]);
export type ThreatLevel = z.infer<typeof ThreatLevelSchema>;

/** Result of one expert analysis, produced by the model or by the rule table */
export interface ExpertFinding {
  readonly technique: string;
  /** Integer in [1, 10] */
  readonly riskScore: number;
  readonly threatLevel: ThreatLevel;
  readonly advice: readonly string[];
  readonly analysis: string;
}

/** Fields a finding is built from before clamping and classification */
export interface FindingInput {
  readonly technique: string;
  readonly riskScore: number;
  readonly advice: readonly string[];
  readonly analysis: string;
}

export interface ExpertOutcome {
  readonly finding: ExpertFinding;
  /** True when the rule table produced the finding */
  readonly degraded: boolean;
  /** Why the model path was abandoned */
  readonly failureReason?: string;
}

export const FallbackRuleSchema = z.object({
  technique: z.string().min(1),
  riskScore: z.number().int().min(1).max(10),
  /** Lower-case substrings searched for in the payload */
  indicators: z.array(z.string().min(1)).min(1),
  advice: z.array(z.string().min(1)),
});
export type FallbackRule = z.infer<typeof FallbackRuleSchema>;

export const RuleTableSchema = z.object({
  /** Checked in order; the first rule with a matching indicator wins */
  rules: z.array(FallbackRuleSchema),
  fallback: FallbackRuleSchema.omit({ indicators: true }),
});
export type RuleTable = z.infer<typeof RuleTableSchema>;

export const RuleTablesSchema = z.object({
  web_attack: RuleTableSchema,
  vulnerability_attack: RuleTableSchema,
  illegal_connection: RuleTableSchema,
});
export type RuleTables = z.infer<typeof RuleTablesSchema>;
