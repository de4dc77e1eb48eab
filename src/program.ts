import { Command, InvalidArgumentError } from "commander";
import type { ConversionWarning } from "./errors";
import { loadConfig, resolveConfig, type ConfigFile } from "./config";
import { DumpConverter } from "./converter";
import type { ChunkFile } from "./chunkSplitter";
import type { LoadEvent, LoadSummary } from "./loadOrchestrator";

/**
 * Where the program prints and reports its exit code.
 */
export interface ProgramIO {
	log(line: string): void;
	error(line: string): void;
	setExitCode(code: number): void;
	readonly cwd: string;
}

const consoleIO: ProgramIO = {
	log: (line) => console.log(line),
	error: (line) => console.error(line),
	setExitCode: (code) => {
		process.exitCode = code;
	},
	get cwd() {
		return process.cwd();
	},
};

function parsePositiveInt(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed < 1) {
		throw new InvalidArgumentError("Not a positive integer.");
	}
	return parsed;
}

function parsePositiveNumber(value: string): number {
	const parsed = Number(value);
	if (!Number.isFinite(parsed) || parsed <= 0) {
		throw new InvalidArgumentError("Not a positive number.");
	}
	return parsed;
}

function formatMb(bytes: number): string {
	return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

interface SplitFlags {
	config?: string;
	size?: number;
	prefix?: string;
	sessionSettings: boolean;
}

export function createProgram(io: ProgramIO = consoleIO): Command {
	const program: Command = new Command();

	const printWarning = (warning: ConversionWarning) => {
		io.error(`warning [${warning.code}]: ${warning.message}`);
	};

	const createConverter = (configPath: string | undefined, overrides: ConfigFile) => {
		const config = resolveConfig(loadConfig(configPath, io.cwd), overrides);
		return new DumpConverter(config, { onWarning: printWarning });
	};

	const splitOverrides = (flags: SplitFlags, command: Command): ConfigFile => ({
		chunkSizeMb: flags.size,
		prefix: flags.prefix,
		// Only an explicit --no-session-settings overrides the config file
		sessionSettings: command.getOptionValueSource("sessionSettings") === "cli" ? flags.sessionSettings : undefined,
	});

	const printChunk = (chunk: ChunkFile) => {
		io.log(`Wrote ${chunk.location} (${chunk.statementCount} statement(s), ${formatMb(chunk.bytes)})`);
	};

	const printLoadEvent = (event: LoadEvent) => {
		if (event.type === "retry") {
			io.error(`Retrying ${event.file} after attempt ${event.attempt}: ${event.error}`);
		} else if (event.type === "done") {
			const { result } = event;
			io.log(result.ok
				? `Loaded ${result.file} (attempt ${result.attempts})`
				: `Failed ${result.file} after ${result.attempts} attempt(s): ${result.lastError ?? "unknown error"}`);
		}
	};

	const printSummary = (summary: LoadSummary) => {
		io.log(`Succeeded: ${summary.succeeded}, failed: ${summary.failed}`);
		for (const failure of summary.failures) {
			io.error(`  ${failure.file}: ${failure.lastError ?? "unknown error"}`);
		}
		if (!summary.ok) io.setExitCode(1);
	};

	program
		.name("dump2pg")
		.description("Convert MySQL dumps into PostgreSQL schema and chunked data files")
		.version("1.0.0")
		// Parse errors and --help throw a CommanderError instead of exiting
		.exitOverride()
		.configureOutput({
			writeOut: (str) => io.log(str.trimEnd()),
			writeErr: (str) => io.error(str.trimEnd()),
		});

	program
		.command("schema")
		.description("Convert the DDL of a dump into a PostgreSQL schema script")
		.argument("<dump>", "MySQL dump file")
		.requiredOption("-o, --output <file>", "Output schema file")
		.option("--post-load <file>", "Also write the sequence script to run after loading data")
		.option("--config <file>", "Config file")
		.action(async (dump: string, options: { output: string; postLoad?: string; config?: string }) => {
			const converter = createConverter(options.config, {});
			const result = await converter.writeSchema(dump, options.output, options.postLoad);
			io.log(`Wrote ${result.model.tables.size} table(s) to ${options.output}`);
			if (options.postLoad !== undefined) {
				io.log(`Wrote ${result.model.sequences.size} sequence(s) to ${options.postLoad}`);
			}
		});

	program
		.command("split")
		.description("Rewrite the INSERT statements of a dump into size-bounded chunk files")
		.argument("<dump>", "MySQL dump file")
		.requiredOption("-o, --output <dir>", "Output directory")
		.option("-s, --size <mb>", "Chunk size in megabytes", parsePositiveNumber)
		.option("-p, --prefix <prefix>", "Chunk file name prefix")
		.option("--no-session-settings", "Do not wrap chunks in session_replication_role settings")
		.option("--config <file>", "Config file")
		.action(async (dump: string, options: SplitFlags & { output: string }, command: Command) => {
			const converter = createConverter(options.config, splitOverrides(options, command));
			const result = await converter.split(dump, options.output, printChunk);
			io.log(`Wrote ${result.chunks.length} chunk(s) and ${result.manifestPath}`);
		});

	program
		.command("convert")
		.description("Write the schema, post-load script, chunk files and manifest of a dump")
		.argument("<dump>", "MySQL dump file")
		.requiredOption("-o, --output <dir>", "Output directory")
		.option("-s, --size <mb>", "Chunk size in megabytes", parsePositiveNumber)
		.option("-p, --prefix <prefix>", "Chunk file name prefix")
		.option("--no-session-settings", "Do not wrap chunks in session_replication_role settings")
		.option("--config <file>", "Config file")
		.action(async (dump: string, options: SplitFlags & { output: string }, command: Command) => {
			const converter = createConverter(options.config, splitOverrides(options, command));
			const result = await converter.convert(dump, options.output, printChunk);

			if (result.schema.ok) {
				io.log(`Wrote ${result.schema.value.model.tables.size} table(s) to ${result.schema.value.schemaPath}`);
			} else {
				io.error(`Schema conversion failed: ${result.schema.error.message}`);
			}
			if (result.data.ok) {
				io.log(`Wrote ${result.data.value.chunks.length} chunk(s) and ${result.data.value.manifestPath}`);
			} else {
				io.error(`Data conversion failed: ${result.data.error.message}`);
			}
			if (!result.ok) io.setExitCode(1);
		});

	program
		.command("load")
		.description("Load the chunk files of a directory in parallel")
		.argument("<dir>", "Directory holding the manifest and chunk files")
		.option("-c, --connection <string>", "PostgreSQL connection string, or pglite:<dir>")
		.option("-w, --workers <n>", "Parallel workers", parsePositiveInt)
		.option("-r, --retries <n>", "Attempts per chunk", parsePositiveInt)
		.option("-p, --prefix <prefix>", "Chunk file name prefix")
		.option("--ddl <file>", "Schema script to apply before loading")
		.option("--post-load <file>", "Script to apply after every chunk loaded")
		.option("--config <file>", "Config file")
		.action(async (dir: string, options: {
			connection?: string;
			workers?: number;
			retries?: number;
			prefix?: string;
			ddl?: string;
			postLoad?: string;
			config?: string;
		}) => {
			const converter = createConverter(options.config, {
				connection: options.connection,
				workers: options.workers,
				maxAttempts: options.retries,
				prefix: options.prefix,
			});
			const connection = converter.config.connection;
			if (connection === undefined) {
				program.error("error: a connection string is required (--connection or the config file)");
			}
			const summary = await converter.loadInto(dir, connection, {
				ddl: options.ddl,
				postLoad: options.postLoad,
				onEvent: printLoadEvent,
			});
			printSummary(summary);
		});

	return program;
}
