import { z } from "zod";

/** Alert categories, in tie-break priority order */
export const CategorySchema = z.enum([
  "web_attack",
  "vulnerability_attack",
  "illegal_connection",
]);
export type Category = z.infer<typeof CategorySchema>;

/** Tie-break order: earlier wins */
export const CATEGORY_PRIORITY: readonly Category[] = CategorySchema.options;

/** Keyword and pattern tables for one category */
export interface CategoryRules {
  /** Matched case-insensitively when the term starts at a word boundary */
  readonly keywords: readonly string[];
  readonly patterns: readonly RegExp[];
}

export type RoutingRules = Readonly<Record<Category, CategoryRules>>;

/** Output of the lexical classifier */
export interface RoutingDecision {
  readonly category: Category;
  /** In [0, 1] */
  readonly confidence: number;
  /** Combined score per category, each in [0, 1] */
  readonly scores: Readonly<Record<Category, number>>;
}

export interface ClassifierOptions {
  readonly rules?: RoutingRules;
  readonly keywordWeight?: number;
  readonly patternWeight?: number;
  readonly hintBonus?: number;
  readonly minConfidence?: number;
}
