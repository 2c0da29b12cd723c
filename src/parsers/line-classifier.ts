/**
 * Layout lines that never carry a transaction: page and section markers,
 * balance/IBAN/bank-name headers, separator runs, blank lines. Matched
 * against the trimmed line, case-sensitively.
 */
export const NOISE_PATTERNS: readonly RegExp[] = [
  /^Page\s+\d+/,
  /^Seite\s+\d+/,
  /^IBAN/,
  /^Saldo/,
  /^Balance/,
  /^Kontostand/,
  /^Zürcher\s+Kantonalbank/,
  /^ZKB/,
  /^Kontoauszug/,
  /^Account\s+Statement/,
  /^\s*$/,
  /^-{3,}/,
  /^={3,}/,
];

export interface LineClassifierOptions {
  /** Appended to the default patterns */
  extraPatterns?: readonly RegExp[];
}

export class LineClassifier {
  private readonly patterns: readonly RegExp[];

  constructor(options: LineClassifierOptions = {}) {
    this.patterns = [...NOISE_PATTERNS, ...(options.extraPatterns ?? [])];
  }

  isNoise(line: string): boolean {
    const trimmed = line.trim();
    return this.patterns.some((pattern) => pattern.test(trimmed));
  }
}
