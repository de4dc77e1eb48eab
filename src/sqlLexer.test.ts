import { describe, test, expect } from 'vitest';
import {
  bareIdentifier,
  decodeMySqlString,
  escapeIdentifier,
  escapeLiteral,
  findClosingParen,
  identifierName,
  isSignificant,
  keyword,
  significantTokens,
  splitTopLevel,
  tokenize,
} from './sqlLexer';

describe('tokenize', () => {
  test('recognizes MySQL literal forms', () => {
    const tokens = significantTokens("INSERT INTO `t` VALUES ('a\\'b', \\N, b'1', 0x0aFF);");

    expect(tokens.map(t => [t.kind, t.value])).toEqual([
      ['word', 'INSERT'],
      ['word', 'INTO'],
      ['identifier', 't'],
      ['word', 'VALUES'],
      ['punct', '('],
      ['string', "a'b"],
      ['punct', ','],
      ['nullMarker', '\\N'],
      ['punct', ','],
      ['bitString', '1'],
      ['punct', ','],
      ['hexString', '0aFF'],
      ['punct', ')'],
      ['punct', ';'],
    ]);
  });

  test('separates comments from code', () => {
    const tokens = tokenize('a -- note\nb #x\n/*!40101 c */ d').filter(t => t.kind !== 'whitespace');

    expect(tokens.map(t => t.kind)).toEqual(['word', 'comment', 'word', 'comment', 'conditionalComment', 'word']);
    expect(tokens.filter(isSignificant).map(t => t.raw)).toEqual(['a', 'b', 'd']);
  });

  test('double dash without whitespace is not a comment', () => {
    expect(tokenize('1--2').map(t => t.kind)).toEqual(['number', 'punct', 'punct', 'number']);
  });

  test('a number followed by letters is a word', () => {
    expect(tokenize('1abc').map(t => t.kind)).toEqual(['word']);
  });

  test('tracks line numbers across multi-line tokens', () => {
    const tokens = significantTokens("a\n'x\ny'\nb", 5);

    expect(tokens.map(t => t.line)).toEqual([5, 6, 8]);
  });

  test('unescapes doubled backticks in identifiers', () => {
    const [token] = tokenize('`a``b`');

    expect(token.kind).toBe('identifier');
    expect(identifierName(token)).toBe('a`b');
  });

  test('keyword upper-cases words only', () => {
    const [word, , ident] = tokenize('select `from`');

    expect(keyword(word)).toBe('SELECT');
    expect(keyword(ident)).toBeUndefined();
    expect(identifierName(ident)).toBe('from');
  });
});

describe('decodeMySqlString', () => {
  test('decodes backslash escapes', () => {
    expect(decodeMySqlString('a\\nb\\0c\\\\d\\%', "'")).toBe('a\nbc\\d\\%');
  });

  test('collapses doubled quotes', () => {
    expect(decodeMySqlString("it''s", "'")).toBe("it's");
  });

  test('unknown escapes keep the escaped character', () => {
    expect(decodeMySqlString('\\q', "'")).toBe('q');
  });
});

describe('token helpers', () => {
  test('findClosingParen and splitTopLevel respect nesting', () => {
    const tokens = significantTokens('(a, f(b, c), d)');

    expect(findClosingParen(tokens, 0)).toBe(11);
    expect(splitTopLevel(tokens.slice(1, 11)).map(part => part.map(t => t.raw).join(''))).toEqual(['a', 'f(b,c)', 'd']);
  });

  test('findClosingParen returns -1 when unbalanced', () => {
    expect(findClosingParen(significantTokens('(a, (b)'), 0)).toBe(-1);
  });
});

describe('escaping', () => {
  test('escapeIdentifier doubles double quotes', () => {
    expect(escapeIdentifier('a"b')).toBe('"a""b"');
  });

  test('bareIdentifier quotes only when needed', () => {
    expect(bareIdentifier('t_id_seq')).toBe('t_id_seq');
    expect(bareIdentifier('User_id_seq')).toBe('"User_id_seq"');
  });

  test('escapeLiteral doubles single quotes', () => {
    expect(escapeLiteral("it's")).toBe("'it''s'");
  });
});
