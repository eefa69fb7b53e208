import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import {
  FileOperation,
  FileSystemError,
  SystemError,
  SystemErrorSubType,
  toError,
} from "../errors/index.js";
import {
  RuleTablesSchema,
  type FallbackRule,
  type RuleTable,
  type RuleTables,
} from "./types.js";

/** Location of the bundled rule tables, resolved from both src/ and dist/ */
export const DEFAULT_RULES_PATH = fileURLToPath(
  new URL("../../config/fallback-rules.json", import.meta.url)
);

/**
 * Read and validate the fallback rule tables
 * @param path - JSON file with one rule table per category
 * @throws FileSystemError if the file cannot be read
 * @throws SystemError (CONFIG) if the content is not valid rule tables
 */
export function loadFallbackRules(path: string = DEFAULT_RULES_PATH): RuleTables {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (error) {
    throw new FileSystemError(
      `Cannot read fallback rules: ${toError(error).message}`,
      FileOperation.READ,
      path,
      undefined,
      toError(error)
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new SystemError(
      `Fallback rules at ${path} are not valid JSON`,
      SystemErrorSubType.CONFIG,
      { path },
      toError(error)
    );
  }

  const parsed = RuleTablesSchema.safeParse(json);
  if (!parsed.success) {
    throw new SystemError(
      `Invalid fallback rules: ${parsed.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ")}`,
      SystemErrorSubType.CONFIG,
      { path }
    );
  }

  return parsed.data;
}

export interface RuleMatch {
  readonly rule: Omit<FallbackRule, "indicators">;
  /** Indicator that fired, absent for the table's default */
  readonly indicator?: string;
}

/**
 * Pick the first rule whose indicator occurs in the payload
 */
export function matchRule(table: RuleTable, payload: string): RuleMatch {
  const haystack = payload.toLowerCase();

  for (const rule of table.rules) {
    const indicator = rule.indicators.find((candidate) =>
      haystack.includes(candidate.toLowerCase())
    );
    if (indicator !== undefined) {
      return { rule, indicator };
    }
  }

  return { rule: table.fallback };
}
