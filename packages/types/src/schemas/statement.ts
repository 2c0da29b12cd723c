import { z } from 'zod';
import {
  ALLOWED_EXTENSIONS,
  MAX_CONTENT_CHARS,
  MAX_FILE_SIZE_BYTES,
  MAX_PAGE_COUNT,
  SECURE_OVERWRITE_BYTES,
} from '../utils/constants.js';
import { isValidISODate } from '../utils/date.js';

export const TransactionDirectionSchema = z.enum(['debit', 'credit']);
export type TransactionDirection = z.infer<typeof TransactionDirectionSchema>;

/** Ordered by categorization priority; `other` is the catch-all. */
export const CategorySchema = z.enum([
  'groceries',
  'transport',
  'rent',
  'utilities',
  'healthcare',
  'dining',
  'shopping',
  'insurance',
  'salary',
  'entertainment',
  'education',
  'savings',
  'other',
]);
export type Category = z.infer<typeof CategorySchema>;

export const CATEGORIES: readonly Category[] = CategorySchema.options;

export const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format')
  .refine(isValidISODate, 'Date must be a real calendar date');

export const DecimalAmountSchema = z
  .string()
  .regex(/^\d+\.\d{2}$/, 'Amount must be a non-negative decimal with two fraction digits');

export const TransactionSchema = z.object({
  date: IsoDateSchema,
  details: z.string().min(1),
  amount: DecimalAmountSchema,
  direction: TransactionDirectionSchema,
  category: CategorySchema,
});
export type Transaction = z.infer<typeof TransactionSchema>;

export const ParseResultSchema = z.object({
  transactions: z.array(TransactionSchema),
  rawLines: z.array(z.string()),
  parseErrors: z.array(z.string()),
  sourceName: z.string(),
});

/**
 * Outcome of one parse invocation. Frozen on construction; the transaction
 * objects inside stay writable so a host can recategorize them.
 */
export interface ParseResult {
  readonly transactions: readonly Transaction[];
  readonly rawLines: readonly string[];
  readonly parseErrors: readonly string[];
  readonly sourceName: string;
}

export const ImportLimitsSchema = z.object({
  maxFileSizeBytes: z.number().int().positive().default(MAX_FILE_SIZE_BYTES),
  maxPageCount: z.number().int().positive().default(MAX_PAGE_COUNT),
  maxContentChars: z.number().int().positive().default(MAX_CONTENT_CHARS),
  allowedExtensions: z
    .array(z.string().regex(/^\.[a-z0-9]+$/, 'Extension must be lowercase and start with a dot'))
    .min(1)
    .default([...ALLOWED_EXTENSIONS]),
  overwriteBytes: z.number().int().nonnegative().default(SECURE_OVERWRITE_BYTES),
});
export type ImportLimits = z.infer<typeof ImportLimitsSchema>;
export type ImportLimitsInput = z.input<typeof ImportLimitsSchema>;

export function resolveImportLimits(input: ImportLimitsInput = {}): ImportLimits {
  return ImportLimitsSchema.parse(input);
}
