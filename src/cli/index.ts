#!/usr/bin/env node

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { writeFile } from 'fs/promises';
import { resolve } from 'path';
import { exportCsv } from '@ledgerlock/output';
import { PARSER_VERSION, createConsoleLogger, isStatementError, type Logger } from '@ledgerlock/types';
import { localDocumentHandle } from '../gateway/index.js';
import { StatementImporter } from '../importer/index.js';
import { OUTPUT_FORMATS, isOutputFormat, renderTable } from './format.js';

const program = new Command();

// Helper to parse boolean env vars
const envBool = (key: string, defaultVal: boolean): boolean => {
  const val = process.env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

interface GlobalOptions {
  stagingDir?: string;
  verbose: boolean;
}

interface ParseOptions {
  format: string;
  out?: string;
}

function createImporter(options: GlobalOptions): { importer: StatementImporter; logger: Logger } {
  const logger = createConsoleLogger({ verbose: options.verbose });
  const importer = new StatementImporter({
    stagingDir: options.stagingDir !== undefined ? resolve(options.stagingDir) : undefined,
    logger,
  });
  return { importer, logger };
}

function fail(error: unknown, verbose: boolean): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[ERROR] ${message}`);
  if (verbose && !isStatementError(error) && error instanceof Error && error.stack !== undefined) {
    console.error(error.stack);
  }
  process.exit(1);
}

program
  .name('ledgerlock')
  .description('Parse bank statement PDFs into reviewable transactions, with secure staging')
  .version(PARSER_VERSION)
  .option('--staging-dir <directory>', 'Staging directory for working copies', process.env['LEDGERLOCK_STAGING_DIR'])
  .option('-v, --verbose', 'Enable verbose output', envBool('LEDGERLOCK_VERBOSE', false));

program
  .command('parse')
  .description('Dry-run parse of a statement PDF')
  .argument('<file>', 'Path to the statement PDF')
  .option('-f, --format <format>', `Output format (${OUTPUT_FORMATS.join(', ')})`, 'table')
  .option('-o, --out <file>', 'Output file path (default: stdout)')
  .action(async (file: string, options: ParseOptions) => {
    const globals = program.opts<GlobalOptions>();
    try {
      const format = options.format.toLowerCase();
      if (!isOutputFormat(format)) {
        throw new Error(`Unknown format: ${options.format}. Use one of: ${OUTPUT_FORMATS.join(', ')}`);
      }

      const { importer, logger } = createImporter(globals);
      logger.info('Parsing statement', { file: resolve(file) });

      const result = await importer.parseSecurely(localDocumentHandle(file));
      logger.info('Parse finished', {
        transactions: result.transactions.length,
        lines: result.rawLines.length,
        errors: result.parseErrors.length,
      });

      const output =
        format === 'json'
          ? JSON.stringify(result, null, 2)
          : format === 'csv'
            ? exportCsv(result)
            : renderTable(result);

      if (options.out !== undefined) {
        const outPath = resolve(options.out);
        await writeFile(outPath, output + '\n', 'utf-8');
        logger.info('Output written', { path: outPath });
      } else {
        // eslint-disable-next-line no-console
        console.log(output);
      }

      if (result.transactions.length === 0) {
        process.exitCode = 2;
      }
    } catch (error) {
      fail(error, globals.verbose);
    }
  });

program
  .command('validate')
  .description('Check that a PDF looks like a supported statement')
  .argument('<file>', 'Path to the statement PDF')
  .action(async (file: string) => {
    const globals = program.opts<GlobalOptions>();
    try {
      const { importer } = createImporter(globals);
      const validation = await importer.validateSecurely(localDocumentHandle(file));
      // eslint-disable-next-line no-console
      console.log(`${validation.valid ? 'valid' : 'invalid'}: ${validation.reason}`);
      if (!validation.valid) {
        process.exitCode = 1;
      }
    } catch (error) {
      fail(error, globals.verbose);
    }
  });

program
  .command('purge')
  .description('Securely delete leftover staged files')
  .action(async () => {
    const globals = program.opts<GlobalOptions>();
    try {
      const { importer, logger } = createImporter(globals);
      const removed = await importer.purgeStagingArea();
      logger.info('Staging area purged', { stagingDir: importer.gateway.stagingDir, removed });
      // eslint-disable-next-line no-console
      console.log(`Removed ${removed} staged file(s)`);
    } catch (error) {
      fail(error, globals.verbose);
    }
  });

await program.parseAsync();
