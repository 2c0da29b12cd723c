import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, readdir, rm, utimes } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import type { LoadedDocument, TextExtractor } from '@ledgerlock/types';
import { localDocumentHandle, noStorageProtection } from '../../src/gateway/index.js';
import { StatementImporter, createStatementImporter } from '../../src/importer/index.js';
import { FakeExtractor } from '../helpers/fake-extractor.js';

const STATEMENT_PAGE = [
  'Zürcher Kantonalbank',
  'Kontoauszug Januar 2026',
  '15.01.2026 COOP Zürich, Kaufvertrag CHF 45.80',
  '16.01.2026 Netflix Monatsabo -15.90',
  'Saldo per 31.01.2026 CHF 1000.00',
].join('\n');

describe('StatementImporter', () => {
  let testDir: string;
  let stagingDir: string;
  let original: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `ledgerlock-importer-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    stagingDir = join(testDir, 'staging');
    await mkdir(testDir, { recursive: true });
    original = join(testDir, 'januar.pdf');
    await writeFile(original, '%PDF-1.4 test statement');
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  function importer(extractor: TextExtractor, extra: { extraNoisePatterns?: RegExp[] } = {}): StatementImporter {
    return createStatementImporter({
      extractor,
      stagingDir,
      protection: noStorageProtection,
      purgeGraceMs: 0,
      ...extra,
    });
  }

  describe('parseSecurely', () => {
    it('should parse a staged copy and label it with the original name', async () => {
      const extractor = new FakeExtractor([STATEMENT_PAGE]);

      const result = await importer(extractor).parseSecurely(localDocumentHandle(original));

      expect(result.sourceName).toBe('januar.pdf');
      expect(result.transactions).toEqual([
        {
          date: '2026-01-15',
          details: 'COOP Zürich, Kaufvertrag',
          amount: '45.80',
          direction: 'credit',
          category: 'groceries',
        },
        {
          date: '2026-01-16',
          details: 'Netflix Monatsabo',
          amount: '15.90',
          direction: 'debit',
          category: 'entertainment',
        },
      ]);
      expect(result.parseErrors).toEqual([]);
    });

    it('should load the staged copy, never the original, and destroy it', async () => {
      const extractor = new FakeExtractor([STATEMENT_PAGE]);

      await importer(extractor).parseSecurely(localDocumentHandle(original));

      const loaded = extractor.loadedPaths[0] ?? '';
      expect(loaded.startsWith(stagingDir)).toBe(true);
      expect(existsSync(loaded)).toBe(false);
      expect(await readdir(stagingDir)).toEqual([]);
      expect(existsSync(original)).toBe(true);
    });

    it('should reject gateway failures', async () => {
      const missing = localDocumentHandle(join(testDir, 'missing.pdf'));
      await expect(importer(new FakeExtractor([])).parseSecurely(missing)).rejects.toMatchObject({
        kind: 'FileNotFound',
      });
    });

    it('should return document failures inside the result', async () => {
      const result = await importer(new FakeExtractor(new Error('corrupt'))).parseSecurely(
        localDocumentHandle(original)
      );
      expect(result.parseErrors).toEqual(['Failed to load PDF document']);
      expect(result.sourceName).toBe('januar.pdf');
    });

    it('should pass extra noise patterns to the classifier', async () => {
      const extractor = new FakeExtractor([STATEMENT_PAGE]);
      const result = await importer(extractor, { extraNoisePatterns: [/Netflix/] }).parseSecurely(
        localDocumentHandle(original)
      );
      expect(result.transactions).toHaveLength(1);
    });
  });

  describe('validateSecurely', () => {
    it('should validate the staged copy', async () => {
      const result = await importer(new FakeExtractor([STATEMENT_PAGE])).validateSecurely(localDocumentHandle(original));
      expect(result).toEqual({ valid: true, reason: 'Valid statement' });
    });

    it('should turn gateway failures into reasons', async () => {
      const notes = join(testDir, 'notes.txt');
      await writeFile(notes, 'hello');

      const result = await importer(new FakeExtractor([STATEMENT_PAGE])).validateSecurely(localDocumentHandle(notes));
      expect(result).toEqual({ valid: false, reason: 'Invalid file type: txt. Only PDF files are allowed' });
    });

    it('should turn unexpected errors into reasons', async () => {
      const brokenDocument: LoadedDocument = {
        get pageCount(): number {
          throw new Error('page tree damaged');
        },
        pageText: () => Promise.resolve(null),
        close: () => Promise.resolve(),
      };
      const extractor: TextExtractor = { load: () => Promise.resolve(brokenDocument) };

      const result = await importer(extractor).validateSecurely(localDocumentHandle(original));
      expect(result).toEqual({ valid: false, reason: 'Validation error: page tree damaged' });
      expect(await readdir(stagingDir)).toEqual([]);
    });
  });

  describe('purgeStagingArea', () => {
    it('should remove leftovers from earlier runs', async () => {
      await mkdir(stagingDir, { recursive: true });
      await writeFile(join(stagingDir, 'leftover.pdf'), 'stale');
      const anHourAgo = new Date(Date.now() - 3_600_000);
      await utimes(join(stagingDir, 'leftover.pdf'), anHourAgo, anHourAgo);

      expect(await importer(new FakeExtractor([])).purgeStagingArea()).toBe(1);
      expect(await readdir(stagingDir)).toEqual([]);
    });
  });
});
