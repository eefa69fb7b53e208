/**
 * Alert routing
 * @module src/router
 */

export {
  CategorySchema,
  CATEGORY_PRIORITY,
} from "./types.js";
export type {
  Category,
  CategoryRules,
  RoutingRules,
  RoutingDecision,
  ClassifierOptions,
} from "./types.js";
export {
  LexicalClassifier,
  DEFAULT_ROUTING_RULES,
  normalizeCategoryHint,
} from "./classifier.js";
