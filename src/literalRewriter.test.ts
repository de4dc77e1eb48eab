import { describe, test, expect } from 'vitest';
import { renderToken, rewriteInsert } from './literalRewriter';
import { tokenize } from './sqlLexer';

describe('rewriteInsert', () => {
  test('rewrites identifiers, escaped quotes, NULL markers and bit literals', () => {
    const sql = "INSERT INTO `t` (`a`,`b`) VALUES ('it\\'s',\\N),(b'1',b'0');";

    expect(rewriteInsert(sql)).toBe(`INSERT INTO "t" ("a","b") VALUES ('it''s',NULL),('1','0');`);
  });

  test('turns INSERT IGNORE into ON CONFLICT DO NOTHING', () => {
    expect(rewriteInsert('INSERT IGNORE INTO t VALUES (1);')).toBe('INSERT INTO t VALUES (1) ON CONFLICT DO NOTHING;');
  });

  test('converts hex and multi-digit bit literals, drops comments and CRLF', () => {
    const sql = "INSERT INTO t VALUES (0xCAFE, X'00ff', b'101') /* c */;\r\n";

    expect(rewriteInsert(sql)).toBe("INSERT INTO t VALUES ('\\xCAFE', '\\x00ff', B'101');");
  });

  test('drops character set introducers before literals', () => {
    const sql = "INSERT INTO t VALUES (_binary 'x',_utf8mb4'caf\\'e',_binary 0x41,_x);";

    expect(rewriteInsert(sql)).toBe(`INSERT INTO t VALUES ('x','caf''e','\\x41',_x);`);
  });

  test('re-quotes double-quoted strings', () => {
    expect(rewriteInsert('INSERT INTO t VALUES ("say \\"hi\\"");')).toBe(`INSERT INTO t VALUES ('say "hi"');`);
  });

  test('decodes escaped control characters', () => {
    expect(rewriteInsert("INSERT INTO t VALUES ('a\\nb','c\\0d');")).toBe("INSERT INTO t VALUES ('a\nb','cd');");
  });

  test('keeps line breaks between rows', () => {
    expect(rewriteInsert('INSERT INTO t VALUES\r\n(1),\r\n(2);')).toBe('INSERT INTO t VALUES\n(1),\n(2);');
  });

  test('adds a missing terminator', () => {
    expect(rewriteInsert('INSERT INTO t VALUES (1)')).toBe('INSERT INTO t VALUES (1);');
  });
});

describe('renderToken', () => {
  test('renders single-digit bit strings as quoted digits', () => {
    const [token] = tokenize("b'1'");

    expect(renderToken(token)).toBe("'1'");
  });

  test('renders the MySQL NULL marker as NULL', () => {
    const [token] = tokenize('\\N');

    expect(renderToken(token)).toBe('NULL');
  });
});
