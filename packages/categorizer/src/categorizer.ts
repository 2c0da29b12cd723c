import type { Category } from '@ledgerlock/types';
import { CATEGORY_RULES, DEFAULT_CATEGORY, type CategoryRule } from './categories.js';

export interface Categorizer {
  categorize(details: string): Category;
}

/**
 * Walk `rules` in order and return the category of the first rule that has
 * a keyword contained in the lowercased description.
 */
export function matchCategory(details: string, rules: readonly CategoryRule[]): Category {
  const normalized = details.toLowerCase();

  for (const rule of rules) {
    if (rule.keywords.some((keyword) => normalized.includes(keyword))) {
      return rule.category;
    }
  }

  return DEFAULT_CATEGORY;
}

export function categorize(details: string): Category {
  return matchCategory(details, CATEGORY_RULES);
}

export function createKeywordCategorizer(rules: readonly CategoryRule[] = CATEGORY_RULES): Categorizer {
  return {
    categorize: (details) => matchCategory(details, rules),
  };
}

export function getCategoryKeywords(category: Category): readonly string[] {
  return CATEGORY_RULES.find((rule) => rule.category === category)?.keywords ?? [];
}

export function categoryLabel(category: Category): string {
  return category.charAt(0).toUpperCase() + category.slice(1);
}
