/**
 * Token-level grammar shared by the DDL parser, the type mapper and the
 * INSERT rewriter. Quoting and escaping follow MySQL's default SQL mode:
 * `'...'` and `"..."` are strings, backticks quote identifiers and a
 * backslash escapes the next character inside strings.
 */

export type TokenKind =
  | 'whitespace'
  | 'word'
  | 'number'
  | 'identifier'
  | 'string'
  | 'bitString'
  | 'hexString'
  | 'nullMarker'
  | 'comment'
  | 'conditionalComment'
  | 'punct';

export interface Token {
  readonly kind: TokenKind;
  /** Exact source text of the token */
  readonly raw: string;
  /**
   * Decoded value: unescaped name for identifiers, decoded text for
   * strings, digits for bit and hex strings, otherwise the raw text.
   */
  readonly value: string;
  readonly line: number;
}

const WHITESPACE = /[ \t\r\n\f\v]+/y;
const WORD = /[\p{L}\p{N}_$]+/uy;
const NUMBER = /(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/y;
const BIT_STRING = /[bB]'([01]*)'/y;
const HEX_STRING = /[xX]'([0-9a-fA-F]*)'/y;
const HEX_NUMBER = /0[xX]([0-9a-fA-F]+)/y;
const WORD_CHAR = /[\p{L}\p{N}_$]/u;

function matchAt(pattern: RegExp, text: string, at: number): RegExpExecArray | null {
  pattern.lastIndex = at;
  return pattern.exec(text);
}

function countNewlines(text: string): number {
  let count = 0;
  for (let i = text.indexOf('\n'); i !== -1; i = text.indexOf('\n', i + 1)) {
    count++;
  }
  return count;
}

/**
 * Find the end (exclusive) of a quoted run starting at `start`.
 * Returns the text length when the quote is never closed.
 */
function findQuoteEnd(text: string, start: number, allowBackslash: boolean): number {
  const quote = text[start];
  let i = start + 1;
  while (i < text.length) {
    const ch = text[i];
    if (allowBackslash && ch === '\\') {
      i += 2;
    } else if (ch === quote) {
      if (text[i + 1] === quote) {
        i += 2;
      } else {
        return i + 1;
      }
    } else {
      i++;
    }
  }
  return text.length;
}

const MYSQL_ESCAPES: Record<string, string> = {
  '0': '',
  "'": "'",
  '"': '"',
  b: '\b',
  n: '\n',
  r: '\r',
  t: '\t',
  Z: '\x1a',
  '\\': '\\',
  // LIKE wildcards keep their backslash
  '%': '\\%',
  _: '\\_',
};

/**
 * Decode the body of a MySQL string literal (without the surrounding quotes).
 * NUL bytes are dropped since PostgreSQL text cannot hold them.
 */
export function decodeMySqlString(body: string, quote: string): string {
  let result = '';
  let i = 0;
  while (i < body.length) {
    const ch = body[i];
    if (ch === '\\' && i + 1 < body.length) {
      const next = body[i + 1];
      result += MYSQL_ESCAPES[next] ?? next;
      i += 2;
    } else if (ch === quote && body[i + 1] === quote) {
      result += quote;
      i += 2;
    } else {
      result += ch;
      i++;
    }
  }
  return result;
}

/**
 * Lazily split SQL text into tokens. Unterminated quotes and comments run to
 * the end of the text; statement boundaries are validated by the scanner
 * before text gets here.
 */
export function* scanTokens(text: string, startLine = 1): Generator<Token> {
  let i = 0;
  let line = startLine;

  function take(kind: TokenKind, end: number, value?: string): Token {
    const raw = text.slice(i, end);
    const token: Token = { kind, raw, value: value ?? raw, line };
    line += countNewlines(raw);
    i = end;
    return token;
  }

  while (i < text.length) {
    const ch = text[i];
    const next = text[i + 1];

    const ws = matchAt(WHITESPACE, text, i);
    if (ws) {
      yield take('whitespace', i + ws[0].length);
      continue;
    }

    if (ch === "'" || ch === '"') {
      const end = findQuoteEnd(text, i, true);
      const closed = end - i >= 2 && text[end - 1] === ch;
      yield take('string', end, decodeMySqlString(text.slice(i + 1, closed ? end - 1 : end), ch));
      continue;
    }

    if (ch === '`') {
      const end = findQuoteEnd(text, i, false);
      const closed = end - i >= 2 && text[end - 1] === '`';
      yield take('identifier', end, text.slice(i + 1, closed ? end - 1 : end).replace(/``/g, '`'));
      continue;
    }

    if (next === "'") {
      const bits = matchAt(BIT_STRING, text, i);
      if (bits) {
        yield take('bitString', i + bits[0].length, bits[1]);
        continue;
      }
      const hex = matchAt(HEX_STRING, text, i);
      if (hex) {
        yield take('hexString', i + hex[0].length, hex[1]);
        continue;
      }
    }

    if (ch === '\\' && next === 'N') {
      yield take('nullMarker', i + 2);
      continue;
    }

    if ((ch === '-' && next === '-' && (i + 2 >= text.length || /\s/.test(text[i + 2]))) || ch === '#') {
      const newline = text.indexOf('\n', i);
      yield take('comment', newline === -1 ? text.length : newline);
      continue;
    }

    if (ch === '/' && next === '*') {
      const close = text.indexOf('*/', i + 2);
      yield take(text[i + 2] === '!' ? 'conditionalComment' : 'comment', close === -1 ? text.length : close + 2);
      continue;
    }

    if (ch === '0' && (next === 'x' || next === 'X')) {
      const hex = matchAt(HEX_NUMBER, text, i);
      if (hex && !WORD_CHAR.test(text[i + hex[0].length] ?? '')) {
        yield take('hexString', i + hex[0].length, hex[1]);
        continue;
      }
    }

    const num = matchAt(NUMBER, text, i);
    if (num) {
      const end = i + num[0].length;
      const rest = matchAt(WORD, text, end);
      if (rest) {
        // 1abc is an identifier, not a number
        yield take('word', end + rest[0].length);
      } else {
        yield take('number', end);
      }
      continue;
    }

    const word = matchAt(WORD, text, i);
    if (word) {
      yield take('word', i + word[0].length);
      continue;
    }

    yield take('punct', i + 1);
  }
}

export function tokenize(text: string, startLine = 1): Token[] {
  return [...scanTokens(text, startLine)];
}

export function isSignificant(token: Token): boolean {
  return token.kind !== 'whitespace' && token.kind !== 'comment' && token.kind !== 'conditionalComment';
}

export function significantTokens(text: string, startLine = 1): Token[] {
  return tokenize(text, startLine).filter(isSignificant);
}

export function isPunct(token: Token | undefined, char: string): boolean {
  return token !== undefined && token.kind === 'punct' && token.raw === char;
}

/**
 * Whether the token at `at` is a character set introducer such as `_binary`
 * or `_utf8mb4`, i.e. a `_` word directly followed by a string literal.
 */
export function isCharsetIntroducer(tokens: readonly Token[], at: number): boolean {
  const token = tokens[at];
  if (token === undefined || token.kind !== 'word' || !/^_[A-Za-z0-9]+$/.test(token.raw)) return false;
  let next = at + 1;
  while (tokens[next]?.kind === 'whitespace') next++;
  const literal = tokens[next];
  return literal !== undefined && (literal.kind === 'string' || literal.kind === 'hexString' || literal.kind === 'bitString');
}

/** Upper-cased keyword for word tokens, undefined for anything else. */
export function keyword(token: Token | undefined): string | undefined {
  return token !== undefined && token.kind === 'word' ? token.raw.toUpperCase() : undefined;
}

/** Name carried by an identifier or bare word token. */
export function identifierName(token: Token | undefined): string | undefined {
  if (token === undefined) return undefined;
  if (token.kind === 'identifier') return token.value;
  if (token.kind === 'word') return token.raw;
  return undefined;
}

/**
 * Index of the `)` matching the `(` at `open`, or -1 when unbalanced.
 */
export function findClosingParen(tokens: readonly Token[], open: number): number {
  let depth = 0;
  for (let i = open; i < tokens.length; i++) {
    if (isPunct(tokens[i], '(')) depth++;
    else if (isPunct(tokens[i], ')')) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Split tokens at `separator` punctuation that is not nested in parentheses.
 */
export function splitTopLevel(tokens: readonly Token[], separator = ','): Token[][] {
  const parts: Token[][] = [];
  let current: Token[] = [];
  let depth = 0;
  for (const token of tokens) {
    if (isPunct(token, '(')) depth++;
    if (isPunct(token, ')')) depth--;
    if (depth === 0 && isPunct(token, separator)) {
      parts.push(current);
      current = [];
    } else {
      current.push(token);
    }
  }
  if (current.length > 0) parts.push(current);
  return parts;
}

/**
 * Escape a PostgreSQL identifier (table or column name).
 * Doubles any embedded double-quotes.
 */
export function escapeIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Identifier that PostgreSQL reads back unchanged, quoted only when needed.
 */
export function bareIdentifier(name: string): string {
  return /^[a-z_][a-z0-9_$]*$/.test(name) ? name : escapeIdentifier(name);
}

/** Standard-conforming PostgreSQL string literal. */
export function escapeLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}
