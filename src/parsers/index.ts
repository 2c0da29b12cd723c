export { LineClassifier, NOISE_PATTERNS, type LineClassifierOptions } from './line-classifier.js';
export { TransactionLineParser, type TransactionLineParserOptions } from './transaction-line-parser.js';
export { StatementParser, type StatementParserOptions } from './statement-parser.js';
export { createParseResult, createFailedParseResult, type ParseResultFields } from './parse-result.js';
