import { z } from "zod";
import { MalformedResponseError } from "../errors/index.js";
import { parseJsonBody } from "../llm/base.js";
import type { FindingInput } from "./types.js";

const NumericString = z
  .string()
  .trim()
  .regex(/^-?\d+(\.\d+)?$/, "risk_score is not numeric")
  .transform(Number);

export const ExpertResponseSchema = z.object({
  attack_technique: z.string().trim().min(1),
  risk_score: z
    .union([z.number(), NumericString])
    .pipe(z.number().finite().min(0).max(10)),
  recommendations: z.array(z.string()).default([]),
  analysis: z.string().default(""),
});

/**
 * Parse model output into finding fields
 * @remarks Reads the span from the first "{" to the last "}" so prose around the JSON is ignored
 * @throws MalformedResponseError if there is no JSON object or it does not match the schema
 */
export function parseExpertResponse(text: string): FindingInput {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");

  if (start === -1 || end <= start) {
    throw new MalformedResponseError(
      "Expert response contains no JSON object",
      text.slice(0, 200)
    );
  }

  const data = parseJsonBody(
    text.slice(start, end + 1),
    ExpertResponseSchema,
    "expert response"
  );

  return {
    technique: data.attack_technique,
    riskScore: data.risk_score,
    advice: data.recommendations,
    analysis: data.analysis,
  };
}
