import * as fs from "fs";
import * as path from "path";
import type { SchemaModel } from "./model";
import type { WarningHandler } from "./errors";
import { DEFAULT_CONFIG, type DumpConfig } from "./config";
import { parseDdlStream } from "./ddlParser";
import { emitDdl, emitPostLoad } from "./ddlEmitter";
import { extractInserts } from "./statementExtractor";
import { MEGABYTE, createFileChunkSink, splitIntoChunks, type ChunkFile } from "./chunkSplitter";
import { createManifest, readManifest, writeManifest } from "./manifest";
import { runParallelLoad, type LoadEvent, type LoadSummary } from "./loadOrchestrator";
import { connectLoadTarget, type LoadTarget } from "./loadExecutors";

export const SCHEMA_FILE_NAME = "schema.sql";
export const POST_LOAD_FILE_NAME = "post-load.sql";

export interface SchemaResult {
	model: SchemaModel;
	ddl: string;
	postLoad: string;
}

export interface SplitResult {
	chunks: ChunkFile[];
	manifestPath: string;
}

/** Outcome of one pipeline of {@link DumpConverter.convert} */
export type StageResult<T> =
	| { ok: true; value: T }
	| { ok: false; error: Error };

export interface ConvertResult {
	schema: StageResult<SchemaResult & { schemaPath: string; postLoadPath: string }>;
	data: StageResult<SplitResult>;
	ok: boolean;
}

export interface LoadDirectoryOptions {
	/** Schema script applied before any chunk */
	ddl?: string;
	/** Script applied after every chunk loaded */
	postLoad?: string;
	onEvent?: (event: LoadEvent) => void;
}

export interface ConverterOptions {
	onWarning?: WarningHandler;
	now?: () => Date;
}

function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}

/**
 * High-level conversion operations.
 * Coordinates the DDL pass, the data pass, chunk files and parallel loading.
 */
export class DumpConverter {
	constructor(
		private readonly _config: DumpConfig = DEFAULT_CONFIG,
		private readonly _options: ConverterOptions = {}
	) { }

	get config(): DumpConfig {
		return this._config;
	}

	private get _onWarning(): WarningHandler {
		return this._options.onWarning ?? (() => { });
	}

	/**
	 * Parse the DDL of a dump and render the schema and post-load scripts.
	 */
	async convertSchema(dumpPath: string): Promise<SchemaResult> {
		const model = await parseDdlStream(fs.createReadStream(dumpPath), { onWarning: this._onWarning });
		return { model, ddl: emitDdl(model), postLoad: emitPostLoad(model) };
	}

	async writeSchema(dumpPath: string, output: string, postLoadOutput?: string): Promise<SchemaResult> {
		const result = await this.convertSchema(dumpPath);
		fs.mkdirSync(path.dirname(path.resolve(output)), { recursive: true });
		fs.writeFileSync(output, result.ddl);
		if (postLoadOutput !== undefined) {
			fs.writeFileSync(postLoadOutput, result.postLoad);
		}
		return result;
	}

	/**
	 * Rewrite the INSERT statements of a dump into chunk files plus a manifest.
	 */
	async split(dumpPath: string, outputDir: string, onChunk?: (chunk: ChunkFile) => void): Promise<SplitResult> {
		const { prefix, sessionSettings } = this._config;
		const budgetBytes = Math.max(1, Math.round(this._config.chunkSizeMb * MEGABYTE));
		const now = this._options.now ?? (() => new Date());
		const createdAt = now();

		const chunks = await splitIntoChunks(
			extractInserts(fs.createReadStream(dumpPath), { onWarning: this._onWarning }),
			{
				budgetBytes,
				sink: createFileChunkSink({ directory: outputDir, prefix, sessionSettings, now: () => createdAt }),
				onWarning: this._onWarning,
				onChunk,
			}
		);
		const manifest = createManifest(chunks, { prefix, budgetBytes, sessionSettings, createdAt });
		return { chunks, manifestPath: writeManifest(outputDir, manifest) };
	}

	/**
	 * Run the schema and data pipelines independently. A fatal error in one
	 * is reported in its stage result without stopping the other.
	 */
	async convert(dumpPath: string, outputDir: string, onChunk?: (chunk: ChunkFile) => void): Promise<ConvertResult> {
		fs.mkdirSync(outputDir, { recursive: true });
		const schemaPath = path.join(outputDir, SCHEMA_FILE_NAME);
		const postLoadPath = path.join(outputDir, POST_LOAD_FILE_NAME);

		let schema: ConvertResult["schema"];
		try {
			const result = await this.writeSchema(dumpPath, schemaPath, postLoadPath);
			schema = { ok: true, value: { ...result, schemaPath, postLoadPath } };
		} catch (error) {
			schema = { ok: false, error: toError(error) };
		}

		let data: ConvertResult["data"];
		try {
			data = { ok: true, value: await this.split(dumpPath, outputDir, onChunk) };
		} catch (error) {
			data = { ok: false, error: toError(error) };
		}

		return { schema, data, ok: schema.ok && data.ok };
	}

	/**
	 * Load the chunks listed in a directory's manifest, in parallel.
	 */
	async load(directory: string, target: LoadTarget, options: LoadDirectoryOptions = {}): Promise<LoadSummary> {
		const { files } = readManifest(directory, this._config.prefix);
		if (options.ddl !== undefined) {
			await target.runScript(fs.readFileSync(options.ddl, "utf-8"));
		}
		const summary = await runParallelLoad(files, target.execute, {
			workers: this._config.workers,
			maxAttempts: this._config.maxAttempts,
			onEvent: options.onEvent,
		});
		if (summary.ok && options.postLoad !== undefined) {
			await target.runScript(fs.readFileSync(options.postLoad, "utf-8"));
		}
		return summary;
	}

	/**
	 * Connect to `connectionString`, load a directory and disconnect.
	 */
	async loadInto(directory: string, connectionString: string, options: LoadDirectoryOptions = {}): Promise<LoadSummary> {
		const target = await connectLoadTarget(connectionString);
		try {
			return await this.load(directory, target, options);
		} finally {
			await target.close();
		}
	}
}
