import type { Column, CommentEntry, ForeignKey, Index, SchemaModel, Sequence, Table } from './model';
import { bareIdentifier, escapeIdentifier, escapeLiteral } from './sqlLexer';

export type DdlPhase = 'SEQUENCES' | 'TABLES' | 'INDEXES' | 'FOREIGN KEYS' | 'COMMENTS';

/** Emission order. Foreign keys come after every table exists. */
export const DDL_PHASES: readonly DdlPhase[] = ['SEQUENCES', 'TABLES', 'INDEXES', 'FOREIGN KEYS', 'COMMENTS'];

export interface DdlSection {
  readonly phase: DdlPhase;
  readonly statements: readonly string[];
}

export function sectionMarker(phase: DdlPhase): string {
  return `-- ===== ${phase} =====`;
}

function columnList(columns: readonly string[]): string {
  return columns.map(c => escapeIdentifier(c)).join(', ');
}

function generateCreateSequence(sequence: Sequence): string {
  return `CREATE SEQUENCE ${bareIdentifier(sequence.name)};`;
}

function generateColumn(column: Column): string {
  const parts = [escapeIdentifier(column.name), column.type];
  if (column.default.kind === 'null') {
    parts.push('DEFAULT NULL');
  } else if (column.default.kind === 'expression') {
    parts.push(`DEFAULT ${column.default.sql}`);
  }
  if (!column.isNullable) {
    parts.push('NOT NULL');
  }
  if (column.check !== undefined) {
    parts.push(column.check);
  }
  return parts.join(' ');
}

function generateCreateTable(table: Table): string {
  const elements = table.columns.map(generateColumn);
  if (table.primaryKey.length > 0) {
    elements.push(`PRIMARY KEY (${columnList(table.primaryKey)})`);
  }
  return `CREATE TABLE ${escapeIdentifier(table.name)} (${elements.join(', ')});`;
}

function generateCreateIndex(index: Index): string {
  const unique = index.isUnique ? 'UNIQUE ' : '';
  return `CREATE ${unique}INDEX ${escapeIdentifier(index.name)} ON ${escapeIdentifier(index.table)} (${columnList(index.columns)});`;
}

function generateAddForeignKey(fk: ForeignKey): string {
  let sql = `ALTER TABLE ${escapeIdentifier(fk.table)} ADD CONSTRAINT ${escapeIdentifier(fk.name)}`
    + ` FOREIGN KEY (${columnList(fk.columns)})`
    + ` REFERENCES ${escapeIdentifier(fk.referencedTable)} (${columnList(fk.referencedColumns)})`;
  if (fk.onDelete !== undefined) sql += ` ON DELETE ${fk.onDelete}`;
  if (fk.onUpdate !== undefined) sql += ` ON UPDATE ${fk.onUpdate}`;
  return `${sql};`;
}

function generateComment(entry: CommentEntry): string {
  const target = entry.target === 'table'
    ? `TABLE ${escapeIdentifier(entry.table)}`
    : `COLUMN ${escapeIdentifier(entry.table)}.${escapeIdentifier(entry.column)}`;
  return `COMMENT ON ${target} IS ${escapeLiteral(entry.text)};`;
}

/**
 * Build the DDL statements of each phase, in emission order.
 */
export function buildDdlSections(model: SchemaModel): DdlSection[] {
  const tables = [...model.tables.values()];
  const statements: Record<DdlPhase, string[]> = {
    SEQUENCES: [...model.sequences.values()].map(generateCreateSequence),
    TABLES: tables.map(generateCreateTable),
    INDEXES: tables.flatMap(t => t.indexes.map(generateCreateIndex)),
    'FOREIGN KEYS': model.foreignKeys.map(generateAddForeignKey),
    COMMENTS: model.comments.map(generateComment),
  };
  return DDL_PHASES.map(phase => ({ phase, statements: statements[phase] }));
}

/**
 * Render a schema model as PostgreSQL DDL. Each phase is preceded by its
 * section marker, even when empty, so downstream tooling can find it.
 */
export function emitDdl(model: SchemaModel): string {
  const sections = buildDdlSections(model).map(section =>
    [sectionMarker(section.phase), ...section.statements].join('\n')
  );
  return `${sections.join('\n\n')}\n`;
}

/**
 * Statements to run after the data is loaded: tie each sequence to its
 * column and move it past the highest loaded value.
 */
export function emitPostLoad(model: SchemaModel): string {
  const lines = ['-- ===== SEQUENCE VALUES ====='];
  for (const sequence of model.sequences.values()) {
    const name = bareIdentifier(sequence.name);
    const table = escapeIdentifier(sequence.table);
    const column = escapeIdentifier(sequence.column);
    lines.push(`ALTER SEQUENCE ${name} OWNED BY ${table}.${column};`);
    lines.push(`SELECT setval(${escapeLiteral(name)}, COALESCE((SELECT MAX(${column}) FROM ${table}), 0) + 1, false);`);
  }
  return `${lines.join('\n')}\n`;
}
