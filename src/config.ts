import * as fs from "fs";
import * as path from "path";
import type { JSONSchemaType } from "ajv";
import { ConfigError } from "./errors";
import { createValidator, parseJson } from "./jsonValidation";

export const CONFIG_FILE_NAME = "dump2pg.config.json";

export interface DumpConfig {
	/** Statement bytes per chunk file, in megabytes */
	readonly chunkSizeMb: number;
	readonly prefix: string;
	/** Wrap chunk files in replication-role session settings */
	readonly sessionSettings: boolean;
	readonly workers: number;
	readonly maxAttempts: number;
	readonly connection?: string;
}

export type ConfigFile = Partial<DumpConfig>;

export const DEFAULT_CONFIG: DumpConfig = {
	chunkSizeMb: 200,
	prefix: "pg_inserts",
	sessionSettings: true,
	workers: 4,
	maxAttempts: 3,
};

const configSchema: JSONSchemaType<ConfigFile> = {
	type: "object",
	properties: {
		chunkSizeMb: { type: "number", exclusiveMinimum: 0, nullable: true },
		prefix: { type: "string", pattern: "^[A-Za-z0-9_.-]+$", nullable: true },
		sessionSettings: { type: "boolean", nullable: true },
		workers: { type: "integer", minimum: 1, nullable: true },
		maxAttempts: { type: "integer", minimum: 1, nullable: true },
		connection: { type: "string", minLength: 1, nullable: true },
	},
	additionalProperties: false,
};

const validateConfig = createValidator(configSchema, "config");

export function parseConfig(json: string): ConfigFile {
	return validateConfig(parseJson(json, "config"));
}

/**
 * Read the config file. An explicit path must exist; without one,
 * `dump2pg.config.json` in `cwd` is used when present.
 */
export function loadConfig(explicitPath?: string, cwd = process.cwd()): ConfigFile {
	if (explicitPath !== undefined) {
		const file = path.resolve(cwd, explicitPath);
		if (!fs.existsSync(file)) {
			throw new ConfigError(`Config file ${file} does not exist`);
		}
		return parseConfig(fs.readFileSync(file, "utf-8"));
	}
	const file = path.join(cwd, CONFIG_FILE_NAME);
	return fs.existsSync(file) ? parseConfig(fs.readFileSync(file, "utf-8")) : {};
}

function withoutUnset(config: ConfigFile): ConfigFile {
	// JSON null counts as unset
	const entries = Object.entries(config).filter(([, value]) => value !== undefined && value !== null);
	return validateConfig(Object.fromEntries(entries));
}

/**
 * Merge defaults, the config file and command-line overrides, in
 * increasing precedence.
 */
export function resolveConfig(file: ConfigFile, overrides: ConfigFile = {}): DumpConfig {
	return { ...DEFAULT_CONFIG, ...withoutUnset(file), ...withoutUnset(overrides) };
}
