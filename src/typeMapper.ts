import type { ColumnDefault } from './model';
import type { WarningCode } from './errors';
import { renderToken } from './literalRewriter';
import { escapeIdentifier, escapeLiteral, isCharsetIntroducer, isPunct, keyword, type Token } from './sqlLexer';

export interface TypeMappingInput {
  /** MySQL type name, any case */
  readonly type: string;
  /** Length/precision arguments as written, e.g. ['10', '2'] */
  readonly args?: readonly string[];
  /** Values of an enum or set declaration */
  readonly enumValues?: readonly string[];
  /** Tokens of the DEFAULT clause, without the DEFAULT keyword */
  readonly default?: readonly Token[];
  /** Column the CHECK constraint of an enum refers to */
  readonly column?: string;
}

export interface TypeMappingWarning {
  readonly code: Extract<WarningCode, 'unknown-type' | 'unsupported-attribute'>;
  readonly message: string;
}

export interface TypeMapping {
  readonly type: string;
  /** Column constraint text, e.g. an enum's CHECK */
  readonly check?: string;
  readonly default: ColumnDefault;
  readonly warnings: readonly TypeMappingWarning[];
}

// Types whose arguments are display widths or otherwise irrelevant to PostgreSQL
const FIXED_TYPES: Record<string, string> = {
  tinyint: 'smallint',
  smallint: 'smallint',
  mediumint: 'integer',
  int: 'integer',
  integer: 'integer',
  bigint: 'bigint',
  float: 'real',
  double: 'double precision',
  'double precision': 'double precision',
  real: 'real',
  // MySQL stores BOOL as tinyint(1); data arrives as 0/1
  bool: 'smallint',
  boolean: 'smallint',
  date: 'date',
  year: 'smallint',
  json: 'jsonb',
  tinytext: 'text',
  text: 'text',
  mediumtext: 'text',
  longtext: 'text',
  tinyblob: 'bytea',
  blob: 'bytea',
  mediumblob: 'bytea',
  longblob: 'bytea',
  binary: 'bytea',
  varbinary: 'bytea',
  set: 'text',
};

// Types that keep their arguments verbatim
const PARAMETERIZED_TYPES: Record<string, string> = {
  decimal: 'numeric',
  numeric: 'numeric',
  varchar: 'varchar',
  char: 'char',
  datetime: 'timestamp',
  timestamp: 'timestamp',
  time: 'time',
};

const TIMESTAMP_FUNCTIONS = new Set(['CURRENT_TIMESTAMP', 'NOW', 'LOCALTIMESTAMP', 'LOCALTIME']);

function withArgs(type: string, args: readonly string[]): string {
  return args.length > 0 ? `${type}(${args.join(',')})` : type;
}

function mapTypeName(
  name: string,
  args: readonly string[],
  enumValues: readonly string[],
  column: string | undefined
): { type: string; check?: string; known: boolean } {
  if (name === 'enum') {
    const target = column !== undefined ? escapeIdentifier(column) : 'VALUE';
    const values = enumValues.map(escapeLiteral).join(', ');
    return { type: 'varchar(255)', check: `CHECK (${target} IN (${values}))`, known: true };
  }
  if (name === 'bit') {
    return args.length === 0 || args[0] === '1'
      ? { type: 'boolean', known: true }
      : { type: `bit(${args[0]})`, known: true };
  }
  const fixed = FIXED_TYPES[name];
  if (fixed !== undefined) {
    return { type: fixed, known: true };
  }
  const parameterized = PARAMETERIZED_TYPES[name];
  if (parameterized !== undefined) {
    return { type: withArgs(parameterized, args), known: true };
  }
  return { type: withArgs(name, args), known: false };
}

function mapDefault(tokens: readonly Token[] | undefined): { value: ColumnDefault; warning?: string } {
  if (tokens === undefined || tokens.length === 0) {
    return { value: { kind: 'none' } };
  }
  if (tokens.length === 2 && isCharsetIntroducer(tokens, 0)) {
    return mapDefault(tokens.slice(1));
  }

  const [first, second] = tokens;
  const word = keyword(first);

  if (tokens.length === 1) {
    if (word === 'NULL') {
      return { value: { kind: 'null' } };
    }
    if (word === 'TRUE' || word === 'FALSE') {
      return { value: { kind: 'expression', sql: word } };
    }
    if (word === 'CURRENT_DATE') {
      return { value: { kind: 'expression', sql: 'CURRENT_DATE' } };
    }
    if (word !== undefined && TIMESTAMP_FUNCTIONS.has(word)) {
      return { value: { kind: 'expression', sql: 'CURRENT_TIMESTAMP' } };
    }
    if (first.kind === 'string' || first.kind === 'bitString' || first.kind === 'hexString' || first.kind === 'number') {
      return { value: { kind: 'expression', sql: renderToken(first) } };
    }
  }

  // CURRENT_TIMESTAMP(3), NOW()
  if (word !== undefined && TIMESTAMP_FUNCTIONS.has(word) && isPunct(second, '(') && isPunct(tokens[tokens.length - 1], ')')) {
    return { value: { kind: 'expression', sql: 'CURRENT_TIMESTAMP' } };
  }

  // -1, +2.5
  if (tokens.length === 2 && (isPunct(first, '-') || isPunct(first, '+')) && second.kind === 'number') {
    return { value: { kind: 'expression', sql: `${first.raw}${second.raw}` } };
  }

  const raw = tokens.map(t => t.raw).join(' ');
  return { value: { kind: 'none' }, warning: `Default expression ${raw} is not supported and was dropped` };
}

/**
 * Map a MySQL column type and default to their PostgreSQL equivalents.
 * Pure: the same input always gives the same output.
 */
export function mapColumnType(input: TypeMappingInput): TypeMapping {
  const name = input.type.toLowerCase().replace(/\s+/g, ' ');
  const { type, check, known } = mapTypeName(name, input.args ?? [], input.enumValues ?? [], input.column);
  const { value, warning } = mapDefault(input.default);

  const warnings: TypeMappingWarning[] = [];
  if (!known) {
    warnings.push({ code: 'unknown-type', message: `Unknown type '${input.type}' passed through unchanged` });
  }
  if (warning !== undefined) {
    warnings.push({ code: 'unsupported-attribute', message: warning });
  }

  return { type, check, default: value, warnings };
}
