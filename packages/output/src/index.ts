export { exportCsv, type CsvExportOptions } from './csv-exporter.js';
export {
  summarizeTransactions,
  type CategoryTotal,
  type StatementSummary,
  type SummaryOptions,
} from './summary.js';
