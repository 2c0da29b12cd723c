export {
  TransactionDirectionSchema,
  CategorySchema,
  CATEGORIES,
  IsoDateSchema,
  DecimalAmountSchema,
  TransactionSchema,
  ParseResultSchema,
  ImportLimitsSchema,
  resolveImportLimits,
} from './statement.js';

export type {
  TransactionDirection,
  Category,
  Transaction,
  ParseResult,
  ImportLimits,
  ImportLimitsInput,
} from './statement.js';
