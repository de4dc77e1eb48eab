import type {
  Column,
  CommentEntry,
  ForeignKey,
  Index,
  ReferentialAction,
  SchemaModel,
  Sequence,
  Table,
} from './model';
import { sequenceName } from './model';
import {
  DdlParseError,
  StatementSyntaxError,
  type ConversionWarning,
  type WarningCode,
  type WarningHandler,
} from './errors';
import {
  bareIdentifier,
  escapeLiteral,
  findClosingParen,
  identifierName,
  isPunct,
  keyword,
  significantTokens,
  splitTopLevel,
  type Token,
} from './sqlLexer';
import { readStatements, type RawStatement, type SqlSource } from './statementScanner';
import { mapColumnType } from './typeMapper';

interface TableDraft {
  name: string;
  columns: Column[];
  primaryKey: string[];
  indexes: Index[];
  comment?: string;
}

interface ClauseContext {
  readonly table: TableDraft;
  readonly statement: RawStatement;
}

const CONSTRAINT_KEYWORDS = new Set(['PRIMARY', 'UNIQUE', 'KEY', 'INDEX', 'FULLTEXT', 'SPATIAL', 'CONSTRAINT', 'FOREIGN', 'CHECK']);

// ALTER TABLE specifications that only tune the MySQL storage engine
const ENGINE_ALTER_KEYWORDS = new Set([
  'DISABLE', 'ENABLE', 'ENGINE', 'AUTO_INCREMENT', 'ROW_FORMAT', 'CHARSET', 'CHARACTER', 'COLLATE', 'DEFAULT', 'LOCK', 'ALGORITHM',
]);

const REFERENTIAL_ACTIONS: Record<string, ReferentialAction> = {
  CASCADE: 'CASCADE',
  RESTRICT: 'RESTRICT',
  'SET NULL': 'SET NULL',
  'SET DEFAULT': 'SET DEFAULT',
  'NO ACTION': 'NO ACTION',
};

/**
 * Read a possibly schema-qualified name starting at `at`; `db`.`t` yields `t`.
 */
function readName(tokens: readonly Token[], at: number): { name: string | undefined; next: number } {
  let name = identifierName(tokens[at]);
  let next = at + 1;
  while (name !== undefined && isPunct(tokens[next], '.')) {
    name = identifierName(tokens[next + 1]);
    next += 2;
  }
  return { name, next };
}

/**
 * Read `(a, b(10) DESC, ...)` starting at the opening parenthesis.
 * Prefix lengths and sort order are dropped.
 */
function readColumnList(tokens: readonly Token[], at: number): { columns: string[]; next: number } | undefined {
  if (!isPunct(tokens[at], '(')) return undefined;
  const close = findClosingParen(tokens, at);
  if (close === -1) return undefined;
  const columns: string[] = [];
  for (const part of splitTopLevel(tokens.slice(at + 1, close))) {
    const name = identifierName(part[0]);
    if (name === undefined) return undefined;
    columns.push(name);
  }
  return { columns, next: close + 1 };
}

function tokensText(tokens: readonly Token[]): string {
  return tokens.map(t => t.raw).join(' ');
}

/**
 * Incremental MySQL DDL parser. Statements are consumed one at a time in
 * source order; {@link finish} validates references and returns the model.
 */
export class DdlParser {
  private readonly _tables = new Map<string, TableDraft>();
  private readonly _sequences = new Map<string, Sequence>();
  private _foreignKeys: ForeignKey[] = [];
  private _comments: CommentEntry[] = [];

  constructor(private readonly _onWarning: WarningHandler = () => { }) { }

  private _warn(code: WarningCode, message: string, details: Omit<ConversionWarning, 'code' | 'message'> = {}): void {
    this._onWarning({ code, message, ...details });
  }

  consume(statement: RawStatement): void {
    switch (statement.kind) {
      case 'createTable':
        this._createTable(statement);
        break;
      case 'createIndex':
        this._createIndex(statement);
        break;
      case 'alterTable':
        this._alterTable(statement);
        break;
      case 'other':
        this._warn('skipped-statement', `Statement #${statement.index} (line ${statement.line}) is not supported and was skipped`, {
          index: statement.index,
        });
        break;
      case 'insert':
      case 'session':
        break;
    }
  }

  finish(): SchemaModel {
    const foreignKeys = this._foreignKeys.filter(fk => {
      const referenced = this._tables.get(fk.referencedTable);
      if (referenced === undefined) {
        this._warn('dangling-reference', `Foreign key ${fk.name} on ${fk.table} references unknown table ${fk.referencedTable} and was dropped`, {
          table: fk.table,
        });
        return false;
      }
      const owner = this._tables.get(fk.table);
      const missing = [
        ...fk.columns.filter(c => !owner?.columns.some(col => col.name === c)),
        ...fk.referencedColumns.filter(c => !referenced.columns.some(col => col.name === c)),
      ];
      if (missing.length > 0) {
        this._warn('dangling-reference', `Foreign key ${fk.name} on ${fk.table} names unknown column(s) ${missing.join(', ')} and was dropped`, {
          table: fk.table,
        });
        return false;
      }
      return true;
    });

    // PostgreSQL index names share one namespace with tables and sequences
    const usedNames = new Set<string>([...this._tables.keys(), ...this._sequences.keys()]);
    const tables: Table[] = [];
    for (const draft of this._tables.values()) {
      const indexes = draft.indexes.map(index => {
        let name = usedNames.has(index.name) ? `${draft.name}_${index.name}` : index.name;
        for (let n = 2; usedNames.has(name); n++) {
          name = `${draft.name}_${index.name}_${n}`;
        }
        usedNames.add(name);
        return name === index.name ? index : { ...index, name };
      });
      tables.push({
        name: draft.name,
        columns: draft.columns,
        primaryKey: draft.primaryKey,
        indexes,
        comment: draft.comment,
      });
    }

    return {
      tables: new Map(tables.map(t => [t.name, t])),
      sequences: new Map(this._sequences),
      foreignKeys,
      comments: [...this._comments],
    };
  }

  // === CREATE TABLE ===

  private _createTable(statement: RawStatement): void {
    const tokens = significantTokens(statement.text, statement.line);
    let p = 1;
    if (keyword(tokens[p]) === 'TEMPORARY') p++;
    p++; // TABLE
    if (keyword(tokens[p]) === 'IF' && keyword(tokens[p + 1]) === 'NOT' && keyword(tokens[p + 2]) === 'EXISTS') p += 3;

    const { name, next } = readName(tokens, p);
    if (name === undefined) {
      throw new DdlParseError(undefined, statement.line, 'missing table name');
    }
    if (!isPunct(tokens[next], '(')) {
      this._warn('unclassified-clause', `CREATE TABLE ${name} without a column list (LIKE / AS SELECT) is not supported`, {
        table: name,
        index: statement.index,
      });
      return;
    }
    const close = findClosingParen(tokens, next);
    if (close === -1) {
      throw new DdlParseError(name, statement.line, 'column list is never closed');
    }

    this._dropTable(name, statement);
    const table: TableDraft = { name, columns: [], primaryKey: [], indexes: [] };
    this._tables.set(name, table);

    const context: ClauseContext = { table, statement };
    for (const clause of splitTopLevel(tokens.slice(next + 1, close))) {
      if (clause.length > 0) this._applyClause(context, clause);
    }
    this._applyTableOptions(context, tokens.slice(close + 1));
    this._checkPrimaryKey(context);
  }

  private _dropTable(name: string, statement: RawStatement): void {
    if (!this._tables.has(name)) return;
    this._warn('duplicate-table', `Table ${name} is defined more than once; the last definition wins`, {
      table: name,
      index: statement.index,
    });
    this._tables.delete(name);
    for (const [key, sequence] of this._sequences) {
      if (sequence.table === name) this._sequences.delete(key);
    }
    this._foreignKeys = this._foreignKeys.filter(fk => fk.table !== name);
    this._comments = this._comments.filter(c => c.table !== name);
  }

  /**
   * One comma-separated item of a table body or an ALTER TABLE ADD.
   */
  private _applyClause(context: ClauseContext, clause: readonly Token[]): void {
    const first = keyword(clause[0]);
    if (first !== undefined && CONSTRAINT_KEYWORDS.has(first)) {
      this._applyConstraint(context, clause);
    } else {
      this._applyColumn(context, clause);
    }
  }

  private _applyConstraint(context: ClauseContext, clause: readonly Token[]): void {
    const { table } = context;
    let p = 0;
    let constraintName: string | undefined;

    if (keyword(clause[p]) === 'CONSTRAINT') {
      p++;
      const word = keyword(clause[p]);
      if (word === undefined || !CONSTRAINT_KEYWORDS.has(word) || clause[p].kind === 'identifier') {
        constraintName = identifierName(clause[p]);
        p++;
      }
    }

    const kind = keyword(clause[p]);
    switch (kind) {
      case 'PRIMARY': {
        const list = readColumnList(clause, p + 2);
        if (keyword(clause[p + 1]) !== 'KEY' || list === undefined) break;
        table.primaryKey = list.columns;
        return;
      }
      case 'UNIQUE':
      case 'KEY':
      case 'INDEX': {
        const isUnique = kind === 'UNIQUE';
        p++;
        if (isUnique && (keyword(clause[p]) === 'KEY' || keyword(clause[p]) === 'INDEX')) p++;
        let indexName = constraintName;
        if (!isPunct(clause[p], '(')) {
          indexName = identifierName(clause[p]) ?? indexName;
          p++;
        }
        const list = readColumnList(clause, p);
        if (list === undefined) break;
        this._addIndex(context, {
          name: indexName ?? `${table.name}_${list.columns.join('_')}_${isUnique ? 'key' : 'idx'}`,
          table: table.name,
          columns: list.columns,
          isUnique,
        });
        return;
      }
      case 'FOREIGN': {
        const fk = this._readForeignKey(table.name, clause, p + 2, constraintName);
        if (keyword(clause[p + 1]) !== 'KEY' || fk === undefined) break;
        this._foreignKeys.push(fk);
        return;
      }
      case 'FULLTEXT':
      case 'SPATIAL':
      case 'CHECK':
        this._warn('unclassified-clause', `${kind} clause on ${table.name} has no PostgreSQL counterpart and was skipped: ${tokensText(clause)}`, {
          table: table.name,
          index: context.statement.index,
        });
        return;
    }

    this._warn('unclassified-clause', `Could not parse clause on ${table.name}: ${tokensText(clause)}`, {
      table: table.name,
      index: context.statement.index,
    });
  }

  private _readForeignKey(
    tableName: string,
    clause: readonly Token[],
    at: number,
    constraintName: string | undefined
  ): ForeignKey | undefined {
    let p = at;
    // FOREIGN KEY index_name (cols) is legal MySQL
    if (!isPunct(clause[p], '(')) p++;
    const local = readColumnList(clause, p);
    if (local === undefined || keyword(clause[local.next]) !== 'REFERENCES') return undefined;
    const { name: referencedTable, next } = readName(clause, local.next + 1);
    const referenced = readColumnList(clause, next);
    if (referencedTable === undefined || referenced === undefined) return undefined;

    let onDelete: ReferentialAction | undefined;
    let onUpdate: ReferentialAction | undefined;
    p = referenced.next;
    while (p < clause.length) {
      if (keyword(clause[p]) === 'ON') {
        const event = keyword(clause[p + 1]);
        const first = keyword(clause[p + 2]) ?? '';
        const twoWords = `${first} ${keyword(clause[p + 3]) ?? ''}`;
        const action = REFERENTIAL_ACTIONS[twoWords] ?? REFERENTIAL_ACTIONS[first];
        if (action === undefined) return undefined;
        if (event === 'DELETE') onDelete = action;
        else if (event === 'UPDATE') onUpdate = action;
        else return undefined;
        p += action.includes(' ') ? 4 : 3;
      } else if (keyword(clause[p]) === 'MATCH') {
        p += 2;
      } else {
        return undefined;
      }
    }

    return {
      name: constraintName ?? `${tableName}_${local.columns.join('_')}_fkey`,
      table: tableName,
      columns: local.columns,
      referencedTable,
      referencedColumns: referenced.columns,
      onDelete,
      onUpdate,
    };
  }

  private _addIndex(context: ClauseContext, index: Index): void {
    const { table } = context;
    const missing = index.columns.filter(c => !table.columns.some(col => col.name === c));
    if (missing.length > 0) {
      this._warn('dangling-reference', `Index ${index.name} on ${table.name} names unknown column(s) ${missing.join(', ')} and was dropped`, {
        table: table.name,
        index: context.statement.index,
      });
      return;
    }
    if (table.indexes.some(i => i.name === index.name)) {
      this._warn('unclassified-clause', `Index ${index.name} is declared twice on ${table.name}; the second declaration was skipped`, {
        table: table.name,
        index: context.statement.index,
      });
      return;
    }
    table.indexes.push(index);
  }

  // === Columns ===

  private _applyColumn(context: ClauseContext, clause: readonly Token[]): void {
    const { table, statement } = context;
    const name = identifierName(clause[0]);
    let p = 1;
    let typeName = keyword(clause[p])?.toLowerCase();
    if (name === undefined || typeName === undefined) {
      this._warn('unclassified-clause', `Could not parse clause on ${table.name}: ${tokensText(clause)}`, {
        table: table.name,
        index: statement.index,
      });
      return;
    }
    if (table.columns.some(c => c.name === name)) {
      this._warn('duplicate-column', `Column ${name} is declared twice on ${table.name}; the second declaration was skipped`, {
        table: table.name,
        column: name,
        index: statement.index,
      });
      return;
    }
    p++;
    if (typeName === 'double' && keyword(clause[p]) === 'PRECISION') {
      typeName = 'double precision';
      p++;
    }

    const args: string[] = [];
    const enumValues: string[] = [];
    if (isPunct(clause[p], '(')) {
      const close = findClosingParen(clause, p);
      for (const part of splitTopLevel(clause.slice(p + 1, close))) {
        if (part.length === 1 && part[0].kind === 'string') enumValues.push(part[0].value);
        else args.push(part.map(t => t.raw).join(''));
      }
      p = close + 1;
    }

    let isNullable = true;
    let isAutoIncrement = false;
    let defaultTokens: Token[] | undefined;
    let comment: string | undefined;
    let inlinePrimaryKey = false;
    let inlineUnique = false;

    const unsupported = (what: string) =>
      this._warn('unsupported-attribute', `${what} on ${table.name}.${name} is not supported and was dropped`, {
        table: table.name,
        column: name,
        index: statement.index,
      });

    while (p < clause.length) {
      const word = keyword(clause[p]);
      switch (word) {
        case 'UNSIGNED':
        case 'SIGNED':
        case 'ZEROFILL':
        case 'VIRTUAL':
        case 'STORED':
        case 'VISIBLE':
        case 'INVISIBLE':
          p++;
          break;
        case 'CHARACTER':
          p += 3; // CHARACTER SET name
          break;
        case 'CHARSET':
        case 'COLLATE':
        case 'COLUMN_FORMAT':
        case 'STORAGE':
        case 'SRID':
          p += 2;
          break;
        case 'NOT':
          if (keyword(clause[p + 1]) === 'NULL') isNullable = false;
          p += 2;
          break;
        case 'NULL':
          isNullable = true;
          p++;
          break;
        case 'DEFAULT': {
          const end = this._defaultEnd(clause, p + 1);
          defaultTokens = clause.slice(p + 1, end);
          p = end;
          break;
        }
        case 'AUTO_INCREMENT':
          isAutoIncrement = true;
          p++;
          break;
        case 'COMMENT':
          if (clause[p + 1]?.kind === 'string') comment = clause[p + 1].value;
          p += 2;
          break;
        case 'PRIMARY':
          inlinePrimaryKey = true;
          p += keyword(clause[p + 1]) === 'KEY' ? 2 : 1;
          break;
        case 'KEY':
          inlinePrimaryKey = true;
          p++;
          break;
        case 'UNIQUE':
          inlineUnique = true;
          p += keyword(clause[p + 1]) === 'KEY' ? 2 : 1;
          break;
        case 'ON': {
          // ON UPDATE CURRENT_TIMESTAMP[(n)]
          unsupported('ON UPDATE');
          p += 3;
          if (isPunct(clause[p], '(')) p = findClosingParen(clause, p) + 1;
          break;
        }
        case 'GENERATED':
        case 'AS': {
          unsupported('Generated column expression');
          const open = clause.findIndex((t, i) => i > p && isPunct(t, '('));
          p = open === -1 ? clause.length : findClosingParen(clause, open) + 1;
          break;
        }
        case 'CHECK':
          unsupported('CHECK constraint');
          p = findClosingParen(clause, p + 1) + 1;
          break;
        case 'REFERENCES':
          unsupported('Inline REFERENCES');
          p = clause.length;
          break;
        default:
          unsupported(`Attribute ${clause[p].raw}`);
          p++;
      }
      if (p <= 0) p = clause.length;
    }

    const mapping = mapColumnType({ type: typeName, args, enumValues, default: defaultTokens, column: name });
    for (const warning of mapping.warnings) {
      this._warn(warning.code, `${table.name}.${name}: ${warning.message}`, {
        table: table.name,
        column: name,
        index: statement.index,
      });
    }

    let columnDefault = mapping.default;
    if (isAutoIncrement) {
      const sequence = sequenceName(table.name, name);
      this._sequences.set(sequence, { name: sequence, table: table.name, column: name });
      columnDefault = { kind: 'expression', sql: `nextval(${escapeLiteral(bareIdentifier(sequence))})` };
      isNullable = false;
    }
    if (columnDefault.kind === 'null' && (!isNullable || inlinePrimaryKey)) {
      columnDefault = { kind: 'none' };
    }

    table.columns.push({
      name,
      sourceType: typeName,
      sourceArgs: args.length > 0 ? args : enumValues,
      type: mapping.type,
      isNullable: isNullable && !inlinePrimaryKey,
      rawDefault: defaultTokens !== undefined ? defaultTokens.map(t => t.raw).join('') : undefined,
      default: columnDefault,
      isAutoIncrement,
      check: mapping.check,
      comment,
    });

    if (comment !== undefined) {
      this._comments.push({ target: 'column', table: table.name, column: name, text: comment });
    }
    if (inlinePrimaryKey) {
      table.primaryKey = [name];
    }
    if (inlineUnique) {
      this._addIndex(context, { name: `${table.name}_${name}_key`, table: table.name, columns: [name], isUnique: true });
    }
  }

  /** End (exclusive) of a DEFAULT value starting at `at`. */
  private _defaultEnd(clause: readonly Token[], at: number): number {
    let p = at;
    if (isPunct(clause[p], '-') || isPunct(clause[p], '+')) p++;
    if (isPunct(clause[p], '(')) {
      return findClosingParen(clause, p) + 1 || clause.length;
    }
    p++;
    if (isPunct(clause[p], '(')) {
      return findClosingParen(clause, p) + 1 || clause.length;
    }
    return Math.min(p, clause.length);
  }

  private _applyTableOptions(context: ClauseContext, options: readonly Token[]): void {
    for (let p = 0; p < options.length; p++) {
      if (keyword(options[p]) !== 'COMMENT') continue;
      const value = isPunct(options[p + 1], '=') ? options[p + 2] : options[p + 1];
      if (value?.kind === 'string') {
        this._setTableComment(context.table, value.value);
      }
    }
  }

  private _setTableComment(table: TableDraft, text: string): void {
    table.comment = text;
    this._comments = this._comments.filter(c => !(c.target === 'table' && c.table === table.name));
    this._comments.push({ target: 'table', table: table.name, text });
  }

  private _checkPrimaryKey(context: ClauseContext): void {
    const { table } = context;
    const missing = table.primaryKey.filter(c => !table.columns.some(col => col.name === c));
    if (missing.length > 0) {
      this._warn('dangling-reference', `Primary key of ${table.name} names unknown column(s) ${missing.join(', ')}`, {
        table: table.name,
        index: context.statement.index,
      });
      table.primaryKey = table.primaryKey.filter(c => !missing.includes(c));
    }
    // Primary key columns are implicitly NOT NULL
    table.columns = table.columns.map(column =>
      table.primaryKey.includes(column.name) && column.isNullable
        ? { ...column, isNullable: false, default: column.default.kind === 'null' ? { kind: 'none' } : column.default }
        : column
    );
  }

  // === CREATE INDEX / ALTER TABLE ===

  private _createIndex(statement: RawStatement): void {
    const tokens = significantTokens(statement.text, statement.line);
    let p = 1;
    const modifier = keyword(tokens[p]);
    if (modifier === 'FULLTEXT' || modifier === 'SPATIAL') {
      this._warn('unclassified-clause', `${modifier} index ${statement.subject ?? ''} has no PostgreSQL counterpart and was skipped`, {
        index: statement.index,
      });
      return;
    }
    const isUnique = modifier === 'UNIQUE';
    if (isUnique) p++;
    p++; // INDEX
    const indexName = identifierName(tokens[p]);
    p++;
    if (keyword(tokens[p]) === 'USING') p += 2;
    const { name: tableName, next } = keyword(tokens[p]) === 'ON' ? readName(tokens, p + 1) : { name: undefined, next: p };
    const list = readColumnList(tokens, next);
    const table = tableName !== undefined ? this._tables.get(tableName) : undefined;

    if (indexName === undefined || list === undefined) {
      this._warn('unclassified-clause', `Could not parse CREATE INDEX at line ${statement.line}`, { index: statement.index });
      return;
    }
    if (table === undefined) {
      this._warn('dangling-reference', `Index ${indexName} targets unknown table ${tableName ?? '?'} and was dropped`, {
        table: tableName,
        index: statement.index,
      });
      return;
    }
    this._addIndex({ table, statement }, { name: indexName, table: table.name, columns: list.columns, isUnique });
  }

  private _alterTable(statement: RawStatement): void {
    const tokens = significantTokens(statement.text, statement.line);
    const { name, next } = readName(tokens, 2);
    const table = name !== undefined ? this._tables.get(name) : undefined;
    if (table === undefined) {
      this._warn('dangling-reference', `ALTER TABLE targets unknown table ${name ?? '?'} and was skipped`, {
        table: name,
        index: statement.index,
      });
      return;
    }

    const context: ClauseContext = { table, statement };
    const body = tokens.slice(next).filter(t => !isPunct(t, ';'));
    for (const spec of splitTopLevel(body)) {
      const action = keyword(spec[0]);
      if (action === 'ADD') {
        const rest = keyword(spec[1]) === 'COLUMN' ? spec.slice(2) : spec.slice(1);
        this._applyClause(context, rest);
      } else if (action === 'COMMENT') {
        const value = isPunct(spec[1], '=') ? spec[2] : spec[1];
        if (value?.kind === 'string') this._setTableComment(table, value.value);
      } else if (action !== undefined && ENGINE_ALTER_KEYWORDS.has(action)) {
        continue;
      } else if (spec.length > 0) {
        this._warn('unclassified-clause', `Could not apply ALTER TABLE ${table.name} ${tokensText(spec)}`, {
          table: table.name,
          index: statement.index,
        });
      }
    }
    this._checkPrimaryKey(context);
  }
}

export interface ParseDdlOptions {
  readonly onWarning?: WarningHandler;
}

// Unterminated statements of these kinds belong to the DDL pass
const DDL_KINDS = new Set(['createTable', 'createIndex', 'alterTable']);

/**
 * Parse every DDL statement of a dump into a schema model. INSERT
 * statements are skipped without being rewritten.
 */
export async function parseDdlStream(source: SqlSource, options: ParseDdlOptions = {}): Promise<SchemaModel> {
  const onWarning = options.onWarning ?? (() => { });
  const parser = new DdlParser(onWarning);
  try {
    for await (const statement of readStatements(source)) {
      parser.consume(statement);
    }
  } catch (error) {
    if (!(error instanceof StatementSyntaxError)) throw error;
    if (DDL_KINDS.has(error.kind)) {
      throw new DdlParseError(error.kind === 'createIndex' ? undefined : error.subject, error.line, error.reason);
    }
    // Unterminated data is reported by the data pass
    onWarning({
      code: 'skipped-statement',
      message: `${error.message}; left to the data pass`,
      index: error.index,
    });
  }
  return parser.finish();
}

export function parseDdl(sql: string, options: ParseDdlOptions = {}): Promise<SchemaModel> {
  return parseDdlStream([sql], options);
}
