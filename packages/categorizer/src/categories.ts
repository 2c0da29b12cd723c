import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { CategorySchema, type Category } from '@ledgerlock/types';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export type RuleCategory = Exclude<Category, 'other'>;

export interface CategoryRule {
  category: RuleCategory;
  /** Lowercase substrings; any one of them selects the category. */
  keywords: readonly string[];
}

const CategoryRuleSchema = z.object({
  category: CategorySchema.exclude(['other']),
  keywords: z
    .array(
      z
        .string()
        .min(1)
        .refine((keyword) => keyword === keyword.toLowerCase(), 'Keywords must be lowercase')
    )
    .min(1),
});

const CategoryRulesSchema = z
  .array(CategoryRuleSchema)
  .refine(
    (rules) => new Set(rules.map((rule) => rule.category)).size === rules.length,
    'Each category may appear only once'
  );

export const CATEGORY_RULES_PATH = resolve(__dirname, '../data/category-keywords.json');

/**
 * Load an ordered rule table from a JSON file. Array order is match
 * priority: the first rule with a matching keyword wins.
 */
export function loadCategoryRules(filePath: string = CATEGORY_RULES_PATH): readonly CategoryRule[] {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
  return CategoryRulesSchema.parse(raw);
}

/**
 * Swiss German, German and English keywords. Priority order: groceries,
 * transport, rent, utilities, healthcare, dining, shopping, insurance,
 * salary, entertainment, education, savings.
 */
export const CATEGORY_RULES: readonly CategoryRule[] = loadCategoryRules();

export const DEFAULT_CATEGORY: Category = 'other';
