/**
 * Schema model for a converted dump.
 *
 * Design principle: Immutable, readonly types. The DDL parser builds drafts
 * internally and hands out a finished {@link SchemaModel}.
 */

// === Schema Types ===

export interface SchemaModel {
  readonly tables: ReadonlyMap<string, Table>;
  readonly sequences: ReadonlyMap<string, Sequence>;
  /** Deferred constraints, applied only after every table exists */
  readonly foreignKeys: readonly ForeignKey[];
  readonly comments: readonly CommentEntry[];
}

export interface Table {
  readonly name: string;
  readonly columns: readonly Column[];
  readonly primaryKey: readonly string[];
  readonly indexes: readonly Index[];
  readonly comment?: string;
}

export type ColumnDefault =
  | { readonly kind: 'none' }
  | { readonly kind: 'null' }
  | { readonly kind: 'expression'; readonly sql: string };

export interface Column {
  readonly name: string;
  /** Declared MySQL type name, lower-cased */
  readonly sourceType: string;
  readonly sourceArgs: readonly string[];
  /** Mapped PostgreSQL type */
  readonly type: string;
  readonly isNullable: boolean;
  /** DEFAULT clause as written in the dump */
  readonly rawDefault?: string;
  readonly default: ColumnDefault;
  readonly isAutoIncrement: boolean;
  /** Column CHECK constraint, e.g. for enums */
  readonly check?: string;
  readonly comment?: string;
}

export interface Index {
  readonly name: string;
  readonly table: string;
  readonly columns: readonly string[];
  readonly isUnique: boolean;
}

export type ReferentialAction = 'CASCADE' | 'SET NULL' | 'SET DEFAULT' | 'RESTRICT' | 'NO ACTION';

export interface ForeignKey {
  readonly name: string;
  readonly table: string;
  readonly columns: readonly string[];
  readonly referencedTable: string;
  readonly referencedColumns: readonly string[];
  readonly onDelete?: ReferentialAction;
  readonly onUpdate?: ReferentialAction;
}

export interface Sequence {
  readonly name: string;
  readonly table: string;
  readonly column: string;
}

export type CommentEntry =
  | { readonly target: 'table'; readonly table: string; readonly text: string }
  | { readonly target: 'column'; readonly table: string; readonly column: string; readonly text: string };

// === Helpers ===

export function createSchemaModel(
  tables: Table[],
  options: { sequences?: Sequence[]; foreignKeys?: ForeignKey[]; comments?: CommentEntry[] } = {}
): SchemaModel {
  return {
    tables: new Map(tables.map(t => [t.name, t])),
    sequences: new Map((options.sequences ?? []).map(s => [s.name, s])),
    foreignKeys: options.foreignKeys ?? [],
    comments: options.comments ?? [],
  };
}

export function sequenceName(table: string, column: string): string {
  return `${table}_${column}_seq`;
}
