/**
 * Error types raised by the conversion pipeline.
 *
 * Fatal conditions are thrown; recoverable ones are reported as
 * {@link ConversionWarning} records through a warning callback.
 */

export type StatementKind = 'createTable' | 'createIndex' | 'alterTable' | 'insert' | 'session' | 'other';

export type WarningCode =
  | 'unknown-type'
  | 'unclassified-clause'
  | 'unsupported-attribute'
  | 'oversized-statement'
  | 'duplicate-table'
  | 'duplicate-column'
  | 'dangling-reference'
  | 'skipped-statement';

export interface ConversionWarning {
  readonly code: WarningCode;
  readonly message: string;
  readonly table?: string;
  readonly column?: string;
  /** Source-order index of the statement the warning refers to */
  readonly index?: number;
}

export type WarningHandler = (warning: ConversionWarning) => void;

/**
 * A statement could not be delimited: a quoted literal, comment or
 * parenthesis was still open at end of input.
 */
export class StatementSyntaxError extends Error {
  constructor(
    readonly index: number,
    readonly line: number,
    readonly kind: StatementKind,
    readonly reason: string,
    /** Table or index the statement names, when known */
    readonly subject?: string
  ) {
    super(`Statement #${index} (${kind}${subject !== undefined ? ` ${subject}` : ''}, line ${line}): ${reason}`);
    this.name = 'StatementSyntaxError';
  }
}

export class DdlParseError extends Error {
  constructor(
    readonly table: string | undefined,
    readonly line: number,
    reason: string
  ) {
    super(table !== undefined ? `Table ${table} (line ${line}): ${reason}` : `DDL statement at line ${line}: ${reason}`);
    this.name = 'DdlParseError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
