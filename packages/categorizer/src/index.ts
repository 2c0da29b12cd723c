export {
  CATEGORY_RULES,
  CATEGORY_RULES_PATH,
  DEFAULT_CATEGORY,
  loadCategoryRules,
  type CategoryRule,
  type RuleCategory,
} from './categories.js';
export {
  categorize,
  matchCategory,
  createKeywordCategorizer,
  getCategoryKeywords,
  categoryLabel,
  type Categorizer,
} from './categorizer.js';
