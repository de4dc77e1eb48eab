import { escapeIdentifier, escapeLiteral, isCharsetIntroducer, isSignificant, keyword, tokenize, type Token } from './sqlLexer';

/**
 * Render a single MySQL token as PostgreSQL text.
 */
export function renderToken(token: Token): string {
  switch (token.kind) {
    case 'identifier':
      return escapeIdentifier(token.value);
    case 'string':
      return escapeLiteral(token.value);
    case 'bitString':
      return token.value.length === 1 ? `'${token.value}'` : `B'${token.value}'`;
    case 'hexString':
      return `'\\x${token.value}'`;
    case 'nullMarker':
      return 'NULL';
    case 'comment':
    case 'conditionalComment':
      return '';
    case 'whitespace':
      return token.raw.replace(/\r\n?/g, '\n');
    default:
      return token.raw;
  }
}

/**
 * Rewrite one MySQL INSERT statement for PostgreSQL.
 *
 * Backtick identifiers become double-quoted, strings are re-encoded with
 * `''` escaping, `\N` becomes NULL and bit literals become quoted digits.
 * Charset introducers (`_binary 'x'`) are dropped.
 * `INSERT IGNORE` turns into `ON CONFLICT DO NOTHING`.
 */
export function rewriteInsert(text: string): string {
  const tokens = tokenize(text);

  let ignoreAt = -1;
  const firstWord = tokens.findIndex(isSignificant);
  if (keyword(tokens[firstWord]) === 'INSERT') {
    const second = tokens.findIndex((t, i) => i > firstWord && isSignificant(t));
    if (keyword(tokens[second]) === 'IGNORE') ignoreAt = second;
  }

  let out = '';
  for (let i = 0; i < tokens.length; i++) {
    if (i === ignoreAt) {
      // drop the keyword together with the whitespace after it
      if (tokens[i + 1]?.kind === 'whitespace') i++;
      continue;
    }
    if (isCharsetIntroducer(tokens, i)) {
      // _binary 'x' becomes 'x'
      while (tokens[i + 1]?.kind === 'whitespace') i++;
      continue;
    }
    out += renderToken(tokens[i]);
  }

  out = out.trim();
  if (out.endsWith(';')) out = out.slice(0, -1).trimEnd();
  if (ignoreAt !== -1) out += ' ON CONFLICT DO NOTHING';
  return `${out};`;
}
