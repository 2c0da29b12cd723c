import { describe, it, expect } from 'vitest';
import {
  CATEGORIES,
  TransactionSchema,
  ParseResultSchema,
  resolveImportLimits,
  MAX_FILE_SIZE_BYTES,
} from '@ledgerlock/types';

const validTransaction = {
  date: '2026-01-15',
  details: 'COOP Zürich',
  amount: '45.80',
  direction: 'credit',
  category: 'groceries',
};

describe('statement schemas', () => {
  describe('TransactionSchema', () => {
    it('should accept a well-formed transaction', () => {
      expect(TransactionSchema.safeParse(validTransaction).success).toBe(true);
    });

    it('should reject signed or unpadded amounts', () => {
      expect(TransactionSchema.safeParse({ ...validTransaction, amount: '-45.80' }).success).toBe(false);
      expect(TransactionSchema.safeParse({ ...validTransaction, amount: '45.8' }).success).toBe(false);
    });

    it('should reject dates that are not on the calendar', () => {
      expect(TransactionSchema.safeParse({ ...validTransaction, date: '2026-02-30' }).success).toBe(false);
      expect(TransactionSchema.safeParse({ ...validTransaction, date: '2026-1-15' }).success).toBe(false);
      expect(TransactionSchema.safeParse({ ...validTransaction, date: '2024-02-29' }).success).toBe(true);
    });

    it('should reject empty details and unknown categories', () => {
      expect(TransactionSchema.safeParse({ ...validTransaction, details: '' }).success).toBe(false);
      expect(TransactionSchema.safeParse({ ...validTransaction, category: 'travel' }).success).toBe(false);
    });
  });

  describe('ParseResultSchema', () => {
    it('should accept an empty result', () => {
      const result = ParseResultSchema.safeParse({
        transactions: [],
        rawLines: [],
        parseErrors: ['File not found'],
        sourceName: 'statement.pdf',
      });
      expect(result.success).toBe(true);
    });
  });

  describe('CATEGORIES', () => {
    it('should end with the catch-all category', () => {
      expect(CATEGORIES).toHaveLength(13);
      expect(CATEGORIES[0]).toBe('groceries');
      expect(CATEGORIES[12]).toBe('other');
    });
  });

  describe('resolveImportLimits', () => {
    it('should fill in defaults', () => {
      expect(resolveImportLimits()).toEqual({
        maxFileSizeBytes: MAX_FILE_SIZE_BYTES,
        maxPageCount: 100,
        maxContentChars: 1_000_000,
        allowedExtensions: ['.pdf'],
        overwriteBytes: 1024,
      });
    });

    it('should keep overrides', () => {
      const limits = resolveImportLimits({ maxPageCount: 5 });
      expect(limits.maxPageCount).toBe(5);
      expect(limits.maxFileSizeBytes).toBe(10 * 1024 * 1024);
    });

    it('should reject invalid limits', () => {
      expect(() => resolveImportLimits({ maxPageCount: 0 })).toThrow();
      expect(() => resolveImportLimits({ allowedExtensions: ['pdf'] })).toThrow();
    });
  });
});
