export type StatementParseErrorCode = 'EmptyInput' | 'MissingColumns' | 'MalformedRows' | 'NoCreditTransactions';

/**
 * The statement file cannot be used as-is; the operator has to fix or
 * replace it. Never fatal to the process.
 */
export class StatementParseError extends Error {
  readonly code: StatementParseErrorCode;
  readonly details: string[];

  constructor(code: StatementParseErrorCode, message: string, details: string[] = []) {
    super(message);
    this.name = 'StatementParseError';
    this.code = code;
    this.details = details;
  }
}

export type PersistOperation = 'load' | 'save';

export class PersistError extends Error {
  readonly operation: PersistOperation;
  readonly location: string;

  constructor(operation: PersistOperation, location: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} ${location}: ${reason}`, { cause });
    this.name = 'PersistError';
    this.operation = operation;
    this.location = location;
  }
}
