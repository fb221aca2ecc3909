#!/usr/bin/env node

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { resolveConfig, type AppConfig } from './config.js';
import { createConsoleLogger, type CliLogger } from './logger.js';
import {
  runCommit,
  runImport,
  runOutstanding,
  runSummary,
  runValidate,
  type CommandOutput,
} from './commands.js';

const VERSION = '0.1.0';

interface GlobalOptions {
  ledger?: string;
  mappings?: string;
  delimiter?: string;
  verbose?: boolean;
}

const program = new Command();

program
  .name('dues-ledger')
  .description('Reconcile bank statement credits against the membership contribution ledger')
  .version(VERSION)
  .option('--ledger <file>', 'Ledger JSON file (env: DUES_LEDGER_PATH)')
  .option('--mappings <file>', 'Member mapping JSON file (env: DUES_MAPPINGS_PATH)')
  .option('--delimiter <char>', 'Statement field delimiter (env: DUES_STATEMENT_DELIMITER)')
  .option('-v, --verbose', 'Enable verbose output (env: DUES_VERBOSE)');

/**
 * Resolve configuration, run a command, print its output and set the exit code.
 */
async function execute(command: (config: AppConfig, logger: CliLogger) => Promise<CommandOutput>): Promise<void> {
  const globals = program.opts<GlobalOptions>();
  let verbose = globals.verbose === true;
  try {
    const config = resolveConfig(globals);
    verbose = config.verbose;
    const output = await command(config, createConsoleLogger(verbose));
    if (output.stdout !== '') {
      process.stdout.write(output.stdout);
    }
    process.exitCode = output.exitCode;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[ERROR] ${message}`);
    if (verbose && error instanceof Error && error.stack !== undefined) {
      console.error(error.stack);
    }
    process.exitCode = 1;
  }
}

program
  .command('import')
  .description('Parse a statement export and write a batch file for review')
  .argument('<statement>', 'Statement CSV export')
  .option('-o, --out <file>', 'Batch output file (default: stdout)')
  .action(async (statement: string, options: { out?: string }) => {
    await execute((config, logger) => runImport(statement, config, logger, { out: options.out }));
  });

program
  .command('summary')
  .description('Summarize a batch file by member, month and purpose')
  .argument('<batch>', 'Batch JSON file')
  .action(async (batch: string) => {
    await execute(() => runSummary(batch));
  });

program
  .command('validate')
  .description('Check a reviewed batch against itself and the ledger')
  .argument('<batch>', 'Batch JSON file')
  .action(async (batch: string) => {
    await execute((config, logger) => runValidate(batch, config, logger));
  });

program
  .command('commit')
  .description('Validate a reviewed batch and merge it into the ledger')
  .argument('<batch>', 'Batch JSON file')
  .action(async (batch: string) => {
    await execute((config, logger) => runCommit(batch, config, logger));
  });

program
  .command('outstanding')
  .description('List unpaid months and amounts owed per active and passive member')
  .option('--as-of <month>', 'Reference month as YYYY-MM (default: current month)')
  .option('--json', 'Print the summary as JSON')
  .action(async (options: { asOf?: string; json?: boolean }) => {
    await execute((config, logger) =>
      runOutstanding(config, logger, { asOf: options.asOf, json: options.json === true })
    );
  });

await program.parseAsync(process.argv);
