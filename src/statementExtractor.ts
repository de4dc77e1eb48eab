import { StatementSyntaxError, type WarningHandler } from './errors';
import { rewriteInsert } from './literalRewriter';
import { readStatements, type SqlSource } from './statementScanner';

export interface InsertStatement {
  /** Source-order index among all statements of the dump */
  readonly index: number;
  readonly line: number;
  readonly table?: string;
  /** PostgreSQL text, terminated by `;` */
  readonly text: string;
}

export interface ExtractOptions {
  readonly onWarning?: WarningHandler;
}

/**
 * Lazily pull the INSERT statements out of a dump and rewrite them for
 * PostgreSQL. Every other statement belongs to the DDL pass and is passed
 * over. Stopping the iteration early stops reading the source.
 *
 * Throws {@link StatementSyntaxError} when the input ends inside an INSERT.
 */
export async function* extractInserts(source: SqlSource, options: ExtractOptions = {}): AsyncGenerator<InsertStatement> {
  try {
    for await (const statement of readStatements(source)) {
      if (statement.kind !== 'insert') continue;
      yield {
        index: statement.index,
        line: statement.line,
        table: statement.subject,
        text: rewriteInsert(statement.text),
      };
    }
  } catch (error) {
    if (!(error instanceof StatementSyntaxError) || error.kind === 'insert') throw error;
    // A broken DDL tail is the DDL pass's failure; the data read so far stands
    options.onWarning?.({
      code: 'skipped-statement',
      message: `${error.message}; left to the DDL pass`,
      index: error.index,
    });
  }
}
