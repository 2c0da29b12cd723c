export {
  StatementImporter,
  createStatementImporter,
  type StatementImporterOptions,
} from './statement-importer.js';
