import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { CATEGORIES } from '@ledgerlock/types';
import {
  CATEGORY_RULES,
  categorize,
  categoryLabel,
  createKeywordCategorizer,
  getCategoryKeywords,
  loadCategoryRules,
  matchCategory,
} from '@ledgerlock/categorizer';

describe('categorize', () => {
  it('should categorize streaming subscriptions as entertainment', () => {
    expect(categorize('Netflix Monatsabo')).toBe('entertainment');
  });

  it('should fall back to other', () => {
    expect(categorize('random text no keyword')).toBe('other');
  });

  it('should match case-insensitively', () => {
    expect(categorize('COOP Zürich, Kaufvertrag')).toBe('groceries');
    expect(categorize('SBB Mobile Ticket')).toBe('transport');
  });

  it('should match keywords with non-ASCII letters', () => {
    expect(categorize('EWZ Elektrizität Q1')).toBe('utilities');
  });

  it('should let the earlier category win when several match', () => {
    // groceries is checked before dining
    expect(categorize('Migros Restaurant')).toBe('groceries');
    // insurance is checked before salary
    expect(categorize('Helvetia Versicherung Lohn')).toBe('insurance');
  });

  it('should recognise salary payments', () => {
    expect(categorize('Lohnzahlung Januar 2026')).toBe('salary');
  });
});

describe('category rules', () => {
  it('should cover every category except other, in priority order', () => {
    expect(CATEGORY_RULES.map((rule) => rule.category)).toEqual(CATEGORIES.slice(0, 12));
  });

  it('should expose keywords per category', () => {
    expect(getCategoryKeywords('groceries')[0]).toBe('coop');
    expect(getCategoryKeywords('other')).toEqual([]);
  });

  it('should capitalise labels', () => {
    expect(categoryLabel('groceries')).toBe('Groceries');
  });
});

describe('createKeywordCategorizer', () => {
  it('should use the supplied rule table', () => {
    const categorizer = createKeywordCategorizer([{ category: 'savings', keywords: ['coop'] }]);
    expect(categorizer.categorize('COOP Basel')).toBe('savings');
    expect(categorizer.categorize('Netflix')).toBe('other');
  });

  it('should return other for an empty table', () => {
    expect(matchCategory('Migros', [])).toBe('other');
  });
});

describe('loadCategoryRules', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `ledgerlock-rules-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should load a custom table', async () => {
    const filePath = join(testDir, 'rules.json');
    await writeFile(filePath, JSON.stringify([{ category: 'dining', keywords: ['mensa'] }]));

    const rules = loadCategoryRules(filePath);
    expect(matchCategory('Mensa ETH', rules)).toBe('dining');
  });

  it('should reject uppercase keywords', async () => {
    const filePath = join(testDir, 'rules.json');
    await writeFile(filePath, JSON.stringify([{ category: 'dining', keywords: ['Mensa'] }]));

    expect(() => loadCategoryRules(filePath)).toThrow('Keywords must be lowercase');
  });

  it('should reject duplicate categories', async () => {
    const filePath = join(testDir, 'rules.json');
    await writeFile(
      filePath,
      JSON.stringify([
        { category: 'dining', keywords: ['mensa'] },
        { category: 'dining', keywords: ['kantine'] },
      ])
    );

    expect(() => loadCategoryRules(filePath)).toThrow('Each category may appear only once');
  });

  it('should reject the catch-all category in the table', async () => {
    const filePath = join(testDir, 'rules.json');
    await writeFile(filePath, JSON.stringify([{ category: 'other', keywords: ['misc'] }]));

    expect(() => loadCategoryRules(filePath)).toThrow();
  });
});
