/**
 * CLI command implementations. Each command returns what it prints to stdout
 * and its exit code; diagnostics go through the logger.
 */

import { readFile, writeFile, mkdir } from 'fs/promises';
import { basename, dirname, resolve } from 'path';
import {
  CandidateBatchSchema,
  StatementParseError,
  formatZodError,
  type CandidateBatch,
} from '@duesledger/types';
import {
  Ledger,
  MappingStore,
  createLedgerFileStore,
  createMappingFileStore,
} from '@duesledger/store';
import { parseStatement, type ParsedStatementBatch } from '@duesledger/statement-parser';
import {
  assignDefaults,
  formatBatchSummary,
  formatCommitReport,
  formatOutstandingReport,
  formatValidationFailure,
  reconcileBatch,
  summarizeBatch,
  summarizeOutstanding,
  validateBatch,
  type CommitContext,
} from '@duesledger/reconciler';
import type { AppConfig } from './config.js';
import type { CliLogger } from './logger.js';

export interface CommandOutput {
  stdout: string;
  exitCode: number;
}

export interface ImportOptions {
  out?: string | undefined;
  now?: Date;
}

export interface CommitOptions {
  now?: () => Date;
}

export interface OutstandingOptions {
  asOf?: string | undefined;
  json?: boolean;
  now?: Date;
}

async function writeOutput(filePath: string, content: string): Promise<void> {
  const target = resolve(filePath);
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, content, 'utf-8');
}

export async function readBatch(batchPath: string): Promise<CandidateBatch> {
  const raw = await readFile(resolve(batchPath), 'utf-8');
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Batch file ${batchPath} is not valid JSON: ${reason}`);
  }
  const parsed = CandidateBatchSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Batch file ${batchPath} is invalid:\n${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Load both stores. Refuses to go on when either exists but cannot be read,
 * so a damaged store is never overwritten.
 */
export async function openStores(config: AppConfig, logger: CliLogger): Promise<CommitContext> {
  const ledgerStore = createLedgerFileStore(config.ledgerPath);
  const mappingStore = createMappingFileStore(config.mappingsPath);

  const ledgerResult = await ledgerStore.load();
  if (!ledgerResult.ok) throw ledgerResult.error;
  const mappingResult = await mappingStore.load();
  if (!mappingResult.ok) throw mappingResult.error;

  if (ledgerResult.created) logger.info(`No ledger at ${ledgerStore.location}, starting empty`);
  if (mappingResult.created) logger.info(`No mappings at ${mappingStore.location}, starting empty`);

  const ledger = Ledger.fromDocument(ledgerResult.value);
  const mappings = MappingStore.fromDocument(mappingResult.value);
  logger.info(`Loaded ${ledger.size} members and ${mappings.size} mappings`);

  return { ledger, mappings, ledgerStore, mappingStore };
}

export async function runImport(
  statementPath: string,
  config: AppConfig,
  logger: CliLogger,
  options: ImportOptions = {}
): Promise<CommandOutput> {
  const text = await readFile(resolve(statementPath), 'utf-8');

  let parsed: ParsedStatementBatch;
  try {
    parsed = parseStatement(text, { delimiter: config.delimiter });
  } catch (err) {
    if (err instanceof StatementParseError) {
      logger.error(err.message);
      if (err.code === 'MalformedRows') {
        for (const detail of err.details) {
          logger.error(detail);
        }
      }
      return { stdout: '', exitCode: 1 };
    }
    throw err;
  }
  for (const warning of parsed.warnings) {
    logger.warn(warning);
  }
  logger.info(
    `Parsed ${parsed.stats.totalRows} rows: ${parsed.stats.creditRows} credits, ${parsed.stats.retained} retained`
  );

  // A damaged mapping file only disables member suggestions.
  const mappingResult = await createMappingFileStore(config.mappingsPath).load();
  if (!mappingResult.ok) {
    logger.warn(`${mappingResult.error.message}; continuing without member suggestions`);
  }
  const mappings = MappingStore.fromDocument(mappingResult.value);

  const batch: CandidateBatch = {
    source: basename(statementPath),
    createdAt: (options.now ?? new Date()).toISOString(),
    transactions: assignDefaults(parsed.transactions, mappings),
  };
  const assigned = batch.transactions.filter((tx) => tx.member !== null).length;
  logger.info(`Suggested members for ${assigned} of ${batch.transactions.length} transactions`);

  const json = `${JSON.stringify(batch, null, 2)}\n`;
  if (options.out !== undefined) {
    await writeOutput(options.out, json);
    logger.info(`Batch written to ${options.out}`);
    return { stdout: '', exitCode: 0 };
  }
  return { stdout: json, exitCode: 0 };
}

export async function runSummary(batchPath: string): Promise<CommandOutput> {
  const batch = await readBatch(batchPath);
  return { stdout: `${formatBatchSummary(summarizeBatch(batch.transactions))}\n`, exitCode: 0 };
}

export async function runValidate(batchPath: string, config: AppConfig, logger: CliLogger): Promise<CommandOutput> {
  const batch = await readBatch(batchPath);
  const { ledger } = await openStores(config, logger);

  const result = validateBatch(batch.transactions, ledger);
  if (!result.passed) {
    return { stdout: `${formatValidationFailure(result.failure)}\n`, exitCode: 1 };
  }
  return { stdout: 'Validation passed\n', exitCode: 0 };
}

export async function runCommit(
  batchPath: string,
  config: AppConfig,
  logger: CliLogger,
  options: CommitOptions = {}
): Promise<CommandOutput> {
  const batch = await readBatch(batchPath);
  const context = await openStores(config, logger);

  const outcome = await reconcileBatch(batch.transactions, context, {
    ...(options.now !== undefined ? { now: options.now } : {}),
    onWarning: (warning) => logger.warn(warning.message),
  });

  if (outcome.status === 'rejected') {
    return { stdout: `${formatValidationFailure(outcome.failure)}\n`, exitCode: 1 };
  }

  const { result } = outcome;
  for (const error of result.persistErrors) {
    logger.error(error.message);
  }
  return {
    stdout: `${formatCommitReport(result)}\n`,
    exitCode: result.persistErrors.length > 0 ? 1 : 0,
  };
}

/**
 * Parse a YYYY-MM reference month into a date inside that month.
 */
export function parseAsOf(value: string): Date {
  const match = value.trim().match(/^(\d{4})-(\d{2})$/);
  const year = match?.[1];
  const month = match?.[2];
  if (year === undefined || month === undefined) {
    throw new Error(`Invalid --as-of value "${value}", expected YYYY-MM`);
  }
  const monthNum = parseInt(month, 10);
  if (monthNum < 1 || monthNum > 12) {
    throw new Error(`Invalid --as-of value "${value}", month must be 01..12`);
  }
  return new Date(parseInt(year, 10), monthNum - 1, 1);
}

export async function runOutstanding(
  config: AppConfig,
  logger: CliLogger,
  options: OutstandingOptions = {}
): Promise<CommandOutput> {
  const asOf = options.asOf !== undefined ? parseAsOf(options.asOf) : (options.now ?? new Date());
  const { ledger } = await openStores(config, logger);

  const summary = summarizeOutstanding(ledger, asOf);
  const stdout = options.json === true
    ? `${JSON.stringify(summary, null, 2)}\n`
    : `${formatOutstandingReport(summary)}\n`;
  return { stdout, exitCode: 0 };
}
