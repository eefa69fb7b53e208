import { logger, roundTo } from "../utils.js";
import {
  CATEGORY_PRIORITY,
  CategorySchema,
  type Category,
  type CategoryRules,
  type ClassifierOptions,
  type RoutingDecision,
  type RoutingRules,
} from "./types.js";

/** Default keyword and pattern tables */
export const DEFAULT_ROUTING_RULES: RoutingRules = {
  web_attack: {
    keywords: [
      "sql",
      "xss",
      "script",
      "inject",
      "union",
      "select",
      "webshell",
      "upload",
      "traversal",
    ],
    patterns: [
      /union\s+select|select\s+.+\s+from/i,
      /<script|javascript:|on\w+\s*=/i,
      /\.\.\/|\.\.\\|%2e%2e/i,
      /'\s*or\s*'?\w+'?\s*=\s*'?\w+/i,
    ],
  },
  vulnerability_attack: {
    keywords: [
      "cve",
      "exploit",
      "vulnerability",
      "payload",
      "shellcode",
      "overflow",
      "0day",
    ],
    patterns: [/cve-\d{4}-\d+/i, /exploit|vulnerability/i, /shellcode|payload/i],
  },
  illegal_connection: {
    keywords: [
      "c2",
      "command and control",
      "tor",
      "proxy",
      "tunnel",
      "botnet",
      "ddos",
    ],
    patterns: [/c2\s+communication/i, /botnet|zombie/i, /ddos|dos\s+attack/i],
  },
};

/**
 * Normalize a free-form attack-type hint to a category
 * @example normalizeCategoryHint("Web Attack") // "web_attack"
 * @returns The category, or null when the hint names none
 */
export function normalizeCategoryHint(hint: string | undefined): Category | null {
  if (hint === undefined) return null;
  const key = hint.trim().toLowerCase().replace(/[\s-]+/g, "_");
  const parsed = CategorySchema.safeParse(key);
  return parsed.success ? parsed.data : null;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

interface CompiledRules {
  readonly keywords: readonly RegExp[];
  readonly patterns: readonly RegExp[];
}

function compileRules(rules: CategoryRules): CompiledRules {
  return {
    keywords: rules.keywords.map(
      (keyword) => new RegExp(`\\b${escapeRegExp(keyword.toLowerCase())}`, "i")
    ),
    // Strip the global flag so test() stays stateless
    patterns: rules.patterns.map(
      (pattern) => new RegExp(pattern.source, pattern.flags.replace("g", ""))
    ),
  };
}

function fraction(matchers: readonly RegExp[], text: string): number {
  if (matchers.length === 0) return 0;
  const matched = matchers.filter((matcher) => matcher.test(text)).length;
  return matched / matchers.length;
}

/**
 * Keyword/pattern classifier that routes alert text to a category
 * @remarks Pure and deterministic for fixed tables and weights
 */
export class LexicalClassifier {
  private readonly compiled: Readonly<Record<Category, CompiledRules>>;
  private readonly keywordWeight: number;
  private readonly patternWeight: number;
  private readonly hintBonus: number;
  private readonly minConfidence: number;

  constructor(options: ClassifierOptions = {}) {
    const rules = options.rules ?? DEFAULT_ROUTING_RULES;
    this.compiled = {
      web_attack: compileRules(rules.web_attack),
      vulnerability_attack: compileRules(rules.vulnerability_attack),
      illegal_connection: compileRules(rules.illegal_connection),
    };
    this.keywordWeight = options.keywordWeight ?? 0.6;
    this.patternWeight = options.patternWeight ?? 0.4;
    this.hintBonus = options.hintBonus ?? 0.2;
    this.minConfidence = options.minConfidence ?? 0.3;
  }

  /**
   * Score text against every category and pick the best one
   * @param text - Alert text (payload)
   * @param hint - Declared attack type; adds a bonus when it names a category
   */
  classify(text: string, hint?: string): RoutingDecision {
    const hinted = normalizeCategoryHint(hint);

    const score = (category: Category): number => {
      const rules = this.compiled[category];
      const combined =
        this.keywordWeight * fraction(rules.keywords, text) +
        this.patternWeight * fraction(rules.patterns, text) +
        (hinted === category ? this.hintBonus : 0);
      return Math.min(1, Math.max(0, combined));
    };

    const scores: Record<Category, number> = {
      web_attack: score("web_attack"),
      vulnerability_attack: score("vulnerability_attack"),
      illegal_connection: score("illegal_connection"),
    };

    // Stable sort keeps priority order among equal scores
    const ranked = [...CATEGORY_PRIORITY].sort((a, b) => scores[b] - scores[a]);
    const category = ranked[0] ?? "web_attack";
    const best = scores[category];
    const second = ranked[1] !== undefined ? scores[ranked[1]] : 0;

    const decision: RoutingDecision = {
      category,
      confidence: this.confidenceFor(best, second),
      scores,
    };

    logger.debug(
      `Routing decision: ${category} (confidence ${roundTo(decision.confidence)})`,
      {
        web_attack: roundTo(scores.web_attack, 2),
        vulnerability_attack: roundTo(scores.vulnerability_attack, 2),
        illegal_connection: roundTo(scores.illegal_connection, 2),
      }
    );

    return decision;
  }

  private confidenceFor(best: number, second: number): number {
    if (best === 0) return 0;
    let confidence = 0.5 * best + 0.5 * (best - second);
    if (best < this.minConfidence) {
      confidence *= best / this.minConfidence;
    }
    return Math.min(1, Math.max(0, confidence));
  }
}
