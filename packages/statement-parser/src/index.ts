export {
  parseStatement,
  normalizeHeader,
  DEFAULT_STATEMENT_LAYOUT,
  DEFAULT_DELIMITER,
  type StatementLayout,
  type StatementParserOptions,
  type ParsedStatementBatch,
} from './statement-parser.js';
