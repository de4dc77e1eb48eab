import { describe, test, expect } from 'vitest';
import { mapColumnType } from './typeMapper';
import { significantTokens } from './sqlLexer';

function mapDefault(sql: string) {
  return mapColumnType({ type: 'varchar', args: ['10'], default: significantTokens(sql) });
}

describe('mapColumnType', () => {
  test('maps the fixed type table', () => {
    const cases: [string, string[], string][] = [
      ['tinyint', ['4'], 'smallint'],
      ['int', ['11'], 'integer'],
      ['INTEGER', [], 'integer'],
      ['mediumint', ['9'], 'integer'],
      ['bigint', ['20'], 'bigint'],
      ['float', [], 'real'],
      ['double', ['10', '2'], 'double precision'],
      ['decimal', ['10', '2'], 'numeric(10,2)'],
      ['numeric', ['5'], 'numeric(5)'],
      ['varchar', ['255'], 'varchar(255)'],
      ['char', ['2'], 'char(2)'],
      ['text', [], 'text'],
      ['longtext', [], 'text'],
      ['mediumtext', [], 'text'],
      ['blob', [], 'bytea'],
      ['longblob', [], 'bytea'],
      ['varbinary', ['16'], 'bytea'],
      ['datetime', [], 'timestamp'],
      ['datetime', ['6'], 'timestamp(6)'],
      ['timestamp', [], 'timestamp'],
      ['date', [], 'date'],
      ['time', [], 'time'],
      ['year', ['4'], 'smallint'],
      ['json', [], 'jsonb'],
      ['bit', ['1'], 'boolean'],
      ['bit', [], 'boolean'],
      ['bit', ['8'], 'bit(8)'],
      ['boolean', [], 'smallint'],
    ];

    const mapped = cases.map(([type, args]) => mapColumnType({ type, args }).type);

    expect(mapped).toEqual(cases.map(([, , expected]) => expected));
  });

  test('maps enum to varchar with a CHECK over its values', () => {
    expect(mapColumnType({ type: 'enum', enumValues: ['a', "b'c"], column: 'status' })).toEqual({
      type: 'varchar(255)',
      check: `CHECK ("status" IN ('a', 'b''c'))`,
      default: { kind: 'none' },
      warnings: [],
    });
  });

  test('passes unknown types through with a warning', () => {
    expect(mapColumnType({ type: 'POINTX', args: ['3'] })).toEqual({
      type: 'pointx(3)',
      default: { kind: 'none' },
      warnings: [{ code: 'unknown-type', message: "Unknown type 'POINTX' passed through unchanged" }],
    });
  });

  test('rewrites bit defaults to quoted digits', () => {
    expect(mapDefault("b'1'").default).toEqual({ kind: 'expression', sql: "'1'" });
    expect(mapDefault("b'0'").default).toEqual({ kind: 'expression', sql: "'0'" });
  });

  test('keeps CURRENT_TIMESTAMP in any spelling', () => {
    expect(mapDefault('CURRENT_TIMESTAMP').default).toEqual({ kind: 'expression', sql: 'CURRENT_TIMESTAMP' });
    expect(mapDefault('CURRENT_TIMESTAMP(3)').default).toEqual({ kind: 'expression', sql: 'CURRENT_TIMESTAMP' });
    expect(mapDefault('now()').default).toEqual({ kind: 'expression', sql: 'CURRENT_TIMESTAMP' });
  });

  test('drops a character set introducer from a string default', () => {
    expect(mapDefault("_utf8mb4'new'").default).toEqual({ kind: 'expression', sql: "'new'" });
  });

  test('marks an explicit NULL default', () => {
    expect(mapDefault('NULL').default).toEqual({ kind: 'null' });
  });

  test('re-quotes string defaults', () => {
    expect(mapDefault("'it\\'s'").default).toEqual({ kind: 'expression', sql: "'it''s'" });
    expect(mapDefault('"x"').default).toEqual({ kind: 'expression', sql: "'x'" });
  });

  test('keeps signed numbers and hex defaults', () => {
    expect(mapDefault('-1').default).toEqual({ kind: 'expression', sql: '-1' });
    expect(mapDefault('0x1F').default).toEqual({ kind: 'expression', sql: "'\\x1F'" });
  });

  test('drops unsupported default expressions with a warning', () => {
    expect(mapDefault('(rand())')).toEqual({
      type: 'varchar(10)',
      default: { kind: 'none' },
      warnings: [{ code: 'unsupported-attribute', message: 'Default expression ( rand ( ) ) is not supported and was dropped' }],
    });
  });

  test('is a pure function of its input', () => {
    const input = { type: 'enum', enumValues: ['x'], column: 'c', default: significantTokens("'x'") };

    expect(mapColumnType(input)).toEqual(mapColumnType(input));
  });
});
