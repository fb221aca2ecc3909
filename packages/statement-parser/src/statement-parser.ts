/**
 * Bank statement parser.
 *
 * Turns a delimited statement export into candidate transactions for
 * membership reconciliation. Only credits are kept; debits and fees carry no
 * value in the credit column and are dropped without a warning.
 */

import Papa, { type ParseError as CsvParseError } from 'papaparse';
import {
  DEFAULT_PURPOSE,
  StatementParseError,
  parseDecimalAmount,
  parseDottedDate,
  type CandidateTransaction,
} from '@duesledger/types';

/**
 * Column names of the statement export. The schema is fixed per deployment;
 * there is no detection of other bank formats.
 */
export interface StatementLayout {
  date: string;
  details: string;
  credit: string;
  purpose: string;
  reference: string;
}

export const DEFAULT_STATEMENT_LAYOUT: Readonly<StatementLayout> = {
  date: 'Datum',
  details: 'Details',
  credit: 'Gutschrift CHF',
  purpose: 'Zahlungszweck',
  reference: 'ZKB-Referenz',
};

export const DEFAULT_DELIMITER = ';';

export interface StatementParserOptions {
  /** Field delimiter (default: ';') */
  delimiter?: string;
  /** Column name overrides */
  layout?: Partial<StatementLayout>;
}

export interface ParsedStatementBatch {
  transactions: CandidateTransaction[];
  stats: {
    /** Data rows in the file (header excluded, blank lines skipped) */
    totalRows: number;
    /** Rows with a value in the credit column */
    creditRows: number;
    /** Transactions returned */
    retained: number;
  };
  /** One entry per credit row that was dropped */
  warnings: string[];
}

type StatementRow = Record<string, string | undefined>;

/** papaparse error types that mean a row's fields cannot be trusted */
const MALFORMED_ROW_ERRORS: ReadonlySet<string> = new Set(['Quotes', 'FieldMismatch']);

/**
 * Strip whitespace, a leading byte-order mark and stray quoting from a header cell.
 */
export function normalizeHeader(header: string): string {
  return header.replace(/^\uFEFF/, '').trim().replace(/"/g, '').trim();
}

/**
 * One line per offending data row (1-based), joining all parser messages for it.
 */
function describeMalformedRows(errors: readonly CsvParseError[]): string[] {
  const byRow = new Map<number | undefined, string[]>();
  for (const error of errors) {
    if (!MALFORMED_ROW_ERRORS.has(error.type)) continue;
    const row = error.row === undefined ? undefined : error.row + 1;
    const messages = byRow.get(row);
    if (messages === undefined) {
      byRow.set(row, [error.message]);
    } else {
      messages.push(error.message);
    }
  }
  return Array.from(byRow, ([row, messages]) => `Row ${row ?? '?'}: ${messages.join('; ')}`);
}

function cell(row: StatementRow, column: string): string {
  return (row[column] ?? '').trim();
}

/**
 * Parse a statement export into candidate transactions, in file order.
 *
 * @throws StatementParseError when the input is empty, lacks a required
 *   column, has rows with broken quoting or the wrong number of fields, or
 *   contains no credit rows at all
 */
export function parseStatement(text: string, options: StatementParserOptions = {}): ParsedStatementBatch {
  const layout: StatementLayout = { ...DEFAULT_STATEMENT_LAYOUT, ...options.layout };
  const delimiter = options.delimiter ?? DEFAULT_DELIMITER;

  if (text.trim() === '') {
    throw new StatementParseError('EmptyInput', 'Statement file is empty');
  }

  const parsed = Papa.parse<StatementRow>(text, {
    delimiter,
    header: true,
    skipEmptyLines: 'greedy',
    transformHeader: normalizeHeader,
  });

  const fields = parsed.meta.fields ?? [];
  const required = [layout.date, layout.details, layout.credit, layout.purpose, layout.reference];
  const missing = required.filter((column) => !fields.includes(column));
  if (missing.length > 0) {
    throw new StatementParseError(
      'MissingColumns',
      `Statement is missing required columns: ${missing.join(', ')}`,
      missing
    );
  }

  const malformed = describeMalformedRows(parsed.errors);
  if (malformed.length > 0) {
    throw new StatementParseError(
      'MalformedRows',
      `Statement has ${malformed.length} malformed row(s)`,
      malformed
    );
  }

  const rows = parsed.data;
  const transactions: CandidateTransaction[] = [];
  const warnings: string[] = [];
  let creditRows = 0;

  rows.forEach((row, index) => {
    const rowNumber = index + 1;
    const creditText = cell(row, layout.credit);
    if (creditText === '') {
      return;
    }
    creditRows++;

    const amount = parseDecimalAmount(creditText);
    if (amount === null || amount <= 0) {
      warnings.push(`Row ${rowNumber}: dropped, credit amount "${creditText}" is not a positive decimal`);
      return;
    }

    const dateText = cell(row, layout.date);
    const date = parseDottedDate(dateText);
    if (date === null) {
      warnings.push(`Row ${rowNumber}: dropped, date "${dateText}" is not in DD.MM.YYYY format`);
      return;
    }

    const transaction: CandidateTransaction = {
      date,
      details: cell(row, layout.details),
      amount,
      // bank purpose text is carried as a remark only
      purpose: DEFAULT_PURPOSE,
      member: null,
      month: null,
    };
    const remarks = cell(row, layout.purpose);
    if (remarks !== '') {
      transaction.remarks = remarks;
    }
    const reference = cell(row, layout.reference);
    if (reference !== '') {
      transaction.bankReference = reference;
    }
    transactions.push(transaction);
  });

  if (creditRows === 0) {
    throw new StatementParseError('NoCreditTransactions', 'No credit transactions found in statement');
  }

  return {
    transactions,
    stats: {
      totalRows: rows.length,
      creditRows,
      retained: transactions.length,
    },
    warnings,
  };
}
