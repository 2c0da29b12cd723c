import { describe, it, expect } from 'vitest';
import { StatementValidator } from '../../src/validation/index.js';
import { FakeExtractor } from '../helpers/fake-extractor.js';

const STAGED = '/staging/0000.pdf';

async function validate(extractor: FakeExtractor, limits?: { maxContentChars?: number }) {
  return new StatementValidator({ extractor, limits }).validate(STAGED);
}

describe('StatementValidator', () => {
  it('should accept a statement with a bank marker on page one', async () => {
    const extractor = new FakeExtractor(['ZÜRCHER KANTONALBANK\nKontoauszug', 'Seite 2']);

    expect(await validate(extractor)).toEqual({ valid: true, reason: 'Valid statement' });
    expect(extractor.lastDocument?.requestedPages).toEqual([0]);
    expect(extractor.lastDocument?.closed).toBe(true);
  });

  it('should reject files that do not load', async () => {
    expect(await validate(new FakeExtractor(new Error('not a pdf')))).toEqual({
      valid: false,
      reason: 'Invalid PDF file',
    });
  });

  it('should reject documents without pages', async () => {
    expect((await validate(new FakeExtractor([]))).reason).toBe('PDF has no pages');
  });

  it('should reject documents over the page limit', async () => {
    expect((await validate(new FakeExtractor(['zkb'], 101))).reason).toBe(
      'PDF has too many pages (101). Maximum: 100'
    );
    expect((await validate(new FakeExtractor(['zkb'], 100))).valid).toBe(true);
  });

  it('should reject an unreadable first page', async () => {
    expect((await validate(new FakeExtractor([null, 'zkb']))).reason).toBe('Cannot read PDF content');
    expect((await validate(new FakeExtractor([new Error('bad page')]))).reason).toBe('Cannot read PDF content');
  });

  it('should reject an oversized first page', async () => {
    const result = await validate(new FakeExtractor(['zkb 456789']), { maxContentChars: 10 });
    expect(result).toEqual({ valid: false, reason: 'PDF content too large' });
  });

  it('should reject documents from other banks', async () => {
    expect((await validate(new FakeExtractor(['Some Other Bank\nMonthly statement']))).reason).toBe(
      'PDF does not appear to be a supported bank statement'
    );
  });

  it('should accept custom markers', async () => {
    const validator = new StatementValidator({
      extractor: new FakeExtractor(['Example Savings Bank']),
      markers: ['EXAMPLE SAVINGS'],
    });
    expect((await validator.validate(STAGED)).valid).toBe(true);
  });

  it('should return the same result when run twice', async () => {
    const validator = new StatementValidator({ extractor: new FakeExtractor(['Kontoauszug']) });
    const first = await validator.validate(STAGED);
    const second = await validator.validate(STAGED);
    expect(second).toEqual(first);
  });
});
