import { StringDecoder } from 'string_decoder';
import { StatementSyntaxError, type StatementKind } from './errors';
import { identifierName, isPunct, isSignificant, keyword, scanTokens, type Token } from './sqlLexer';

/**
 * Anything the scanner can pull text from: a file read stream, an async
 * generator, or a plain array of strings.
 */
export type SqlSource = AsyncIterable<string | Buffer> | Iterable<string>;

export interface ScannedStatement {
  readonly text: string;
  /** Line of the first character that is not whitespace or a comment */
  readonly line: number;
}

export type ScanEnd =
  | { readonly kind: 'clean' }
  | { readonly kind: 'statement'; readonly statement: ScannedStatement }
  | { readonly kind: 'unterminated'; readonly statement: ScannedStatement; readonly reason: string };

export interface RawStatement {
  /** Source-order index, counting every statement in the input */
  readonly index: number;
  readonly line: number;
  readonly kind: StatementKind;
  /** Table (or index) the statement targets, when it names one */
  readonly subject?: string;
  readonly text: string;
}

type ScanState = 'normal' | 'single' | 'double' | 'backtick' | 'lineComment' | 'blockComment';

// Longest look-ahead the state machine needs past the current character.
const LOOKAHEAD = 2;

function isSpace(ch: string): boolean {
  return ch === ' ' || ch === '\n' || ch === '\r' || ch === '\t' || ch === '\f' || ch === '\v';
}

/**
 * Incremental statement splitter. Text is pushed in arbitrary pieces; a
 * statement is complete at a `;` outside quotes and comments with every
 * parenthesis closed. Only the statement in progress is buffered.
 */
export class StatementScanner {
  private _buffer = '';
  private _pos = 0;
  private _start = 0;
  private _state: ScanState = 'normal';
  private _depth = 0;
  private _hasContent = false;
  private _line = 1;
  private _startLine = 1;

  push(chunk: string): ScannedStatement[] {
    this._buffer += chunk;
    return this._scan(false);
  }

  /**
   * Signal end of input. Returns the statements completed by the last few
   * buffered characters, and what is left over after them.
   */
  end(): { statements: ScannedStatement[]; tail: ScanEnd } {
    const statements = this._scan(true);
    const text = this._buffer.slice(this._start).trim();
    const statement = { text, line: this._startLine };

    let reason: string | undefined;
    if (this._state === 'single' || this._state === 'double') {
      reason = 'unterminated string literal at end of input';
    } else if (this._state === 'backtick') {
      reason = 'unterminated quoted identifier at end of input';
    } else if (this._state === 'blockComment') {
      reason = 'unterminated comment at end of input';
    } else if (this._depth !== 0) {
      reason = 'unbalanced parentheses at end of input';
    }

    if (reason !== undefined) {
      return { statements, tail: { kind: 'unterminated', statement, reason } };
    }
    if (this._hasContent) {
      return { statements, tail: { kind: 'statement', statement } };
    }
    return { statements, tail: { kind: 'clean' } };
  }

  private _markContent(): void {
    if (!this._hasContent) {
      this._hasContent = true;
      this._startLine = this._line;
    }
  }

  private _advance(count: number): void {
    const end = Math.min(this._pos + count, this._buffer.length);
    for (let i = this._pos; i < end; i++) {
      if (this._buffer[i] === '\n') this._line++;
    }
    this._pos = end;
  }

  private _scan(final: boolean): ScannedStatement[] {
    const statements: ScannedStatement[] = [];
    const buf = this._buffer;

    while (this._pos < buf.length) {
      if (!final && this._pos + LOOKAHEAD >= buf.length) break;

      const ch = buf[this._pos];
      const next = buf[this._pos + 1];

      switch (this._state) {
        case 'normal':
          if (ch === "'" || ch === '"' || ch === '`') {
            this._markContent();
            this._state = ch === "'" ? 'single' : ch === '"' ? 'double' : 'backtick';
            this._advance(1);
          } else if (ch === '#' || (ch === '-' && next === '-' && isSpace(buf[this._pos + 2] ?? ' '))) {
            this._state = 'lineComment';
            this._advance(1);
          } else if (ch === '/' && next === '*') {
            this._state = 'blockComment';
            this._advance(2);
          } else if (ch === ';' && this._depth === 0) {
            if (this._hasContent) {
              statements.push({ text: buf.slice(this._start, this._pos + 1).trim(), line: this._startLine });
            }
            this._advance(1);
            this._start = this._pos;
            this._hasContent = false;
          } else {
            if (ch === '(') this._depth++;
            else if (ch === ')') this._depth--;
            if (!isSpace(ch)) this._markContent();
            this._advance(1);
          }
          break;

        case 'single':
        case 'double': {
          const quote = this._state === 'single' ? "'" : '"';
          if (ch === '\\') {
            this._advance(2);
          } else if (ch === quote && next === quote) {
            this._advance(2);
          } else {
            if (ch === quote) this._state = 'normal';
            this._advance(1);
          }
          break;
        }

        case 'backtick':
          if (ch === '`' && next === '`') {
            this._advance(2);
          } else {
            if (ch === '`') this._state = 'normal';
            this._advance(1);
          }
          break;

        case 'lineComment':
          if (ch === '\n') this._state = 'normal';
          this._advance(1);
          break;

        case 'blockComment':
          if (ch === '*' && next === '/') {
            this._state = 'normal';
            this._advance(2);
          } else {
            this._advance(1);
          }
          break;
      }
    }

    if (this._start > 0) {
      this._buffer = this._buffer.slice(this._start);
      this._pos -= this._start;
      this._start = 0;
    }
    return statements;
  }
}

const SESSION_KEYWORDS = new Set([
  'SET', 'LOCK', 'UNLOCK', 'USE', 'DROP', 'START', 'BEGIN', 'COMMIT', 'ROLLBACK', 'DELIMITER',
]);

/**
 * Classify a statement by its leading keywords without tokenizing the
 * whole text.
 */
export function describeStatement(text: string): { kind: StatementKind; subject?: string } {
  const head: Token[] = [];
  for (const token of scanTokens(text)) {
    if (isSignificant(token)) head.push(token);
    if (head.length >= 9) break;
  }

  const words = head.map(keyword);
  let i = 0;
  const nameAfter = (at: number): string | undefined => {
    // db.table resolves to table
    if (isPunct(head[at + 1], '.')) return identifierName(head[at + 2]);
    return identifierName(head[at]);
  };

  const first = words[0];
  switch (first) {
    case 'INSERT': {
      i = 1;
      while (words[i] === 'IGNORE' || words[i] === 'LOW_PRIORITY' || words[i] === 'DELAYED' || words[i] === 'HIGH_PRIORITY') i++;
      if (words[i] === 'INTO') i++;
      return { kind: 'insert', subject: nameAfter(i) };
    }
    case 'CREATE': {
      i = 1;
      if (words[i] === 'TEMPORARY') i++;
      if (words[i] === 'TABLE') {
        i++;
        if (words[i] === 'IF' && words[i + 1] === 'NOT' && words[i + 2] === 'EXISTS') i += 3;
        return { kind: 'createTable', subject: nameAfter(i) };
      }
      if (words[i] === 'UNIQUE' || words[i] === 'FULLTEXT' || words[i] === 'SPATIAL') i++;
      if (words[i] === 'INDEX') return { kind: 'createIndex', subject: identifierName(head[i + 1]) };
      if (words[i] === 'DATABASE' || words[i] === 'SCHEMA') return { kind: 'session' };
      return { kind: 'other' };
    }
    case 'ALTER':
      if (words[1] === 'TABLE') return { kind: 'alterTable', subject: nameAfter(2) };
      return { kind: 'other' };
    case undefined:
      return { kind: 'other' };
    default:
      return SESSION_KEYWORDS.has(first) ? { kind: 'session' } : { kind: 'other' };
  }
}

function toRawStatement(statement: ScannedStatement, index: number): RawStatement {
  const { kind, subject } = describeStatement(statement.text);
  return { index, line: statement.line, kind, subject, text: statement.text };
}

/**
 * Pull complete statements out of a SQL source, one at a time, in source
 * order. Throws {@link StatementSyntaxError} when input ends inside a
 * statement.
 */
export async function* readStatements(source: SqlSource): AsyncGenerator<RawStatement> {
  const scanner = new StatementScanner();
  const decoder = new StringDecoder('utf8');
  let index = 0;

  for await (const chunk of source) {
    const text = typeof chunk === 'string' ? chunk : decoder.write(chunk);
    for (const statement of scanner.push(text)) {
      yield toRawStatement(statement, index++);
    }
  }

  for (const statement of scanner.push(decoder.end())) {
    yield toRawStatement(statement, index++);
  }

  const { statements, tail } = scanner.end();
  for (const statement of statements) {
    yield toRawStatement(statement, index++);
  }

  if (tail.kind === 'statement') {
    yield toRawStatement(tail.statement, index);
  } else if (tail.kind === 'unterminated') {
    const { kind, subject } = describeStatement(tail.statement.text);
    throw new StatementSyntaxError(index, tail.statement.line, kind, tail.reason, subject);
  }
}
