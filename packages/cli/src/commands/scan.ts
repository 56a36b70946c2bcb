/**
 * Scan Command - tabletrace scan
 *
 * Scan a local checkout for code that depends on a table and write the
 * ranked evidence as CSV or JSON.
 */

import { Command, Option } from 'commander';
import * as fs from 'node:fs/promises';
import chalk from 'chalk';
import {
  Errors,
  createConsoleLogger,
  isConfidence,
  isScanError,
  type ScanRequest,
} from 'tabletrace-core';
import { formatCsv } from '../output/csv-writer.js';
import { formatJson } from '../output/json-writer.js';
import { createScanRunner } from '../services/scan-runner.js';

export interface ScanCommandOptions {
  /** Table under investigation */
  table: string;
  /** Foreign key column override */
  fkColumn?: string;
  /** Primary key name of the table */
  pkColumn?: string;
  /** HIGH, MEDIUM or LOW */
  minConfidence?: string;
  /** Drop evidence whose column is missing from the schema */
  strict?: boolean;
  /** Extra directory names to skip */
  ignore?: string[];
  format?: string;
  /** Write results here instead of stdout */
  output?: string;
  verbose?: boolean;
}

export type OutputFormat = 'csv' | 'json';

function toScanRequest(rootDir: string, options: ScanCommandOptions): ScanRequest {
  const minConfidence = (options.minConfidence ?? 'LOW').toUpperCase();
  if (!isConfidence(minConfidence)) {
    throw Errors.invalidArgument('minConfidence', `unknown level ${minConfidence}`, 'Use one of: HIGH, MEDIUM, LOW');
  }

  return {
    rootDir,
    tableName: options.table,
    ...(options.fkColumn !== undefined ? { foreignKey: options.fkColumn } : {}),
    ...(options.pkColumn !== undefined ? { primaryKey: options.pkColumn } : {}),
    minConfidence,
    strict: options.strict ?? false,
    ignoreDirectories: options.ignore ?? [],
  };
}

/**
 * Run a scan and write its results. Returns the process exit code.
 */
export async function scanAction(rootDir: string, options: ScanCommandOptions): Promise<number> {
  const logger = createConsoleLogger({ verbose: options.verbose ?? false });
  const runner = createScanRunner({ logger });
  const format: OutputFormat = options.format === 'json' ? 'json' : 'csv';

  let interrupted = false;
  const onInterrupt = () => {
    interrupted = true;
  };
  process.once('SIGINT', onInterrupt);

  try {
    const request = toScanRequest(rootDir, options);
    console.error(chalk.bold(`🔍 Scanning ${rootDir} for '${options.table}' references...`));

    const outcome = await runner.run(request, {
      onProgress: (phase, detail) => logger.debug(chalk.gray(`${phase}: ${detail}`)),
      isCancelled: () => interrupted,
    });

    if (outcome.status === 'cancelled') {
      console.error(chalk.yellow('\nInterrupted.'));
      return 1;
    }

    const { evidence, stats } = outcome;
    console.error(`Found ${chalk.cyan(stats.filesScanned)} scannable files.`);
    for (const [scanner, count] of Object.entries(stats.scannerHits)) {
      console.error(chalk.gray(`  ${scanner}: ${count} hits`));
    }
    console.error(`\n${chalk.bold(stats.afterFilter)} results (min confidence: ${request.minConfidence ?? 'LOW'}).`);

    const content = format === 'json' ? formatJson(evidence, stats) : formatCsv(evidence);
    if (options.output) {
      await fs.writeFile(options.output, content, 'utf-8');
      console.error(chalk.green(`Results written to ${options.output}`));
    } else {
      process.stdout.write(content);
    }
    return 0;
  } catch (error) {
    if (isScanError(error)) {
      console.error(chalk.red(`Error: ${error.message}`));
      if (error.recovery) {
        console.error(chalk.gray(`  ${error.recovery.suggestion}`));
      }
      return 1;
    }
    throw error;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

export const scanCommand = new Command('scan')
  .description('Find code that depends on a database table')
  .argument('<path>', 'Local checkout to scan')
  .requiredOption('-t, --table <name>', 'Table to trace')
  .option('--fk-column <column>', 'Foreign key column (default: {singular}_id)')
  .option('--pk-column <column>', 'Primary key name; the foreign key becomes {singular}_{pk}')
  .addOption(
    new Option('-m, --min-confidence <level>', 'Minimum confidence to report')
      .choices(['HIGH', 'MEDIUM', 'LOW', 'high', 'medium', 'low'])
      .default('LOW')
  )
  .option('--strict', 'Drop evidence whose column is missing from schema.rb')
  .option('-i, --ignore <dirs...>', 'Extra directory names to skip')
  .addOption(new Option('-f, --format <format>', 'Output format').choices(['csv', 'json']).default('csv'))
  .option('-o, --output <file>', 'Write results to a file instead of stdout')
  .option('--verbose', 'Enable verbose output')
  .action(async (rootDir: string, options: ScanCommandOptions) => {
    process.exitCode = await scanAction(rootDir, options);
  });
