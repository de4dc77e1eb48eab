// Schema model
export type {
  SchemaModel,
  Table,
  Column,
  ColumnDefault,
  Index,
  ForeignKey,
  ReferentialAction,
  Sequence,
  CommentEntry,
} from './model';

export { createSchemaModel, sequenceName } from './model';

// Errors and warnings
export type { StatementKind, WarningCode, ConversionWarning, WarningHandler } from './errors';
export { StatementSyntaxError, DdlParseError, ConfigError } from './errors';

// Lexer primitives
export type { Token, TokenKind } from './sqlLexer';
export { tokenize, escapeIdentifier, escapeLiteral, bareIdentifier, decodeMySqlString } from './sqlLexer';

// Statement stream
export type { SqlSource, RawStatement, ScannedStatement } from './statementScanner';
export { StatementScanner, readStatements, describeStatement } from './statementScanner';

// Type mapping
export type { TypeMappingInput, TypeMapping, TypeMappingWarning } from './typeMapper';
export { mapColumnType } from './typeMapper';

// DDL
export type { ParseDdlOptions } from './ddlParser';
export { DdlParser, parseDdl, parseDdlStream } from './ddlParser';
export type { DdlPhase, DdlSection } from './ddlEmitter';
export { DDL_PHASES, buildDdlSections, emitDdl, emitPostLoad, sectionMarker } from './ddlEmitter';

// Data
export { renderToken, rewriteInsert } from './literalRewriter';
export type { InsertStatement, ExtractOptions } from './statementExtractor';
export { extractInserts } from './statementExtractor';
export type { ChunkFile, ChunkSink, ChunkWriter, SplitOptions, FileChunkSinkOptions } from './chunkSplitter';
export { splitIntoChunks, createFileChunkSink, chunkFileName } from './chunkSplitter';
export type { ChunkManifest, ManifestChunk } from './manifest';
export { createManifest, parseManifest, serializeManifest, readManifest, writeManifest, manifestFileName } from './manifest';

// Loading
export type { LoadOutcome, LoadExecutor, LoadResult, LoadEvent, LoadOptions, LoadSummary } from './loadOrchestrator';
export { runParallelLoad } from './loadOrchestrator';
export type { LoadTarget } from './loadExecutors';
export { connectLoadTarget, fromPGlite } from './loadExecutors';

// Configuration and coordination
export type { DumpConfig, ConfigFile } from './config';
export { DEFAULT_CONFIG, CONFIG_FILE_NAME, loadConfig, parseConfig, resolveConfig } from './config';
export type { SchemaResult, SplitResult, ConvertResult, StageResult, LoadDirectoryOptions } from './converter';
export { DumpConverter } from './converter';
export type { ProgramIO } from './program';
export { createProgram } from './program';
