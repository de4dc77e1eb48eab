import * as fs from 'fs';
import * as path from 'path';
import { once } from 'events';
import { finished } from 'stream/promises';
import { ConfigError, type WarningHandler } from './errors';
import type { InsertStatement } from './statementExtractor';

export const MEGABYTE = 1024 * 1024;

/** An open output unit. Closing it makes the unit immutable. */
export interface ChunkWriter {
  readonly location: string;
  write(text: string): Promise<void>;
  close(): Promise<void>;
}

export interface ChunkSink {
  open(sequence: number): Promise<ChunkWriter>;
}

export interface ChunkFile {
  /** 1-based, increasing in source order */
  readonly sequence: number;
  readonly location: string;
  readonly statementCount: number;
  /** Bytes of statement text, excluding any header or footer the sink adds */
  readonly bytes: number;
  readonly firstIndex: number;
  readonly lastIndex: number;
}

export interface SplitOptions {
  readonly budgetBytes: number;
  readonly sink: ChunkSink;
  readonly onWarning?: WarningHandler;
  /** Called as each unit is closed */
  readonly onChunk?: (chunk: ChunkFile) => void;
}

interface OpenChunk {
  readonly sequence: number;
  readonly writer: ChunkWriter;
  statementCount: number;
  bytes: number;
  firstIndex: number;
  lastIndex: number;
}

/**
 * Write rewritten statements into size-bounded units. A statement is never
 * split: a unit is closed once it reaches the budget, and a statement larger
 * than the budget forms a unit of its own.
 */
export async function splitIntoChunks(
  statements: AsyncIterable<InsertStatement> | Iterable<InsertStatement>,
  options: SplitOptions
): Promise<ChunkFile[]> {
  const { budgetBytes, sink, onWarning, onChunk } = options;
  if (!Number.isFinite(budgetBytes) || budgetBytes <= 0) {
    throw new ConfigError(`Chunk budget must be a positive number of bytes, got ${budgetBytes}`);
  }

  const chunks: ChunkFile[] = [];
  let current: OpenChunk | undefined;

  const closeCurrent = async () => {
    if (current === undefined) return;
    const { writer, ...stats } = current;
    current = undefined;
    await writer.close();
    const chunk: ChunkFile = { ...stats, location: writer.location };
    chunks.push(chunk);
    onChunk?.(chunk);
  };

  try {
    for await (const statement of statements) {
      const line = `${statement.text}\n`;
      const size = Buffer.byteLength(line, 'utf8');

      if (size > budgetBytes) {
        onWarning?.({
          code: 'oversized-statement',
          message: `Statement #${statement.index} is ${size} bytes, over the ${budgetBytes} byte budget; it is written to a unit of its own`,
          table: statement.table,
          index: statement.index,
        });
        await closeCurrent();
      }

      if (current === undefined) {
        const sequence = chunks.length + 1;
        current = {
          sequence,
          writer: await sink.open(sequence),
          statementCount: 0,
          bytes: 0,
          firstIndex: statement.index,
          lastIndex: statement.index,
        };
      }

      await current.writer.write(line);
      current.statementCount++;
      current.bytes += size;
      current.lastIndex = statement.index;

      if (current.bytes >= budgetBytes) {
        await closeCurrent();
      }
    }
    await closeCurrent();
  } catch (error) {
    // Leave what was written so far on disk, but not an open handle
    if (current !== undefined) {
      await current.writer.close();
    }
    throw error;
  }

  return chunks;
}

export function chunkFileName(prefix: string, sequence: number): string {
  return `${prefix}_part_${String(sequence).padStart(3, '0')}.sql`;
}

export interface FileChunkSinkOptions {
  readonly directory: string;
  readonly prefix: string;
  /** Wrap each unit in `session_replication_role` settings */
  readonly sessionSettings: boolean;
  readonly now?: () => Date;
}

/**
 * Set `session_replication_role`, which only superusers may change. Other
 * roles keep the current value and still load the chunk.
 */
function replicationRole(value: 'replica' | 'origin'): string {
  return `DO $$ BEGIN SET session_replication_role = '${value}'; EXCEPTION WHEN insufficient_privilege THEN NULL; END $$;`;
}

export function chunkHeader(sequence: number, options: Pick<FileChunkSinkOptions, 'sessionSettings'> & { readonly createdAt: Date }): string {
  const lines = [
    `-- PostgreSQL INSERT statements, part ${sequence}`,
    `-- Converted from a MySQL dump at ${options.createdAt.toISOString()}`,
    '-- Create the schema before loading this file.',
    '',
  ];
  if (options.sessionSettings) {
    // Skips triggers and foreign key checks while loading
    lines.push(replicationRole('replica'), 'SET synchronous_commit = OFF;', '');
  }
  return `${lines.join('\n')}\n`;
}

export function chunkFooter(options: Pick<FileChunkSinkOptions, 'sessionSettings'>): string {
  return options.sessionSettings ? `\n${replicationRole('origin')}\n` : '';
}

/**
 * A sink writing `<prefix>_part_NNN.sql` files into a directory.
 */
export function createFileChunkSink(options: FileChunkSinkOptions): ChunkSink {
  const now = options.now ?? (() => new Date());
  fs.mkdirSync(options.directory, { recursive: true });

  return {
    async open(sequence) {
      const location = path.join(options.directory, chunkFileName(options.prefix, sequence));
      const stream = fs.createWriteStream(location, { encoding: 'utf8' });
      let closed = false;

      const write = async (text: string) => {
        if (!stream.write(text)) {
          await once(stream, 'drain');
        }
      };

      await write(chunkHeader(sequence, { sessionSettings: options.sessionSettings, createdAt: now() }));

      return {
        location,
        write,
        async close() {
          if (closed) return;
          closed = true;
          stream.end(chunkFooter(options));
          await finished(stream);
        },
      };
    },
  };
}
