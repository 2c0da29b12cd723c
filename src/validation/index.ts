export {
  StatementValidator,
  type StatementValidatorOptions,
  type ValidationResult,
} from './statement-validator.js';
