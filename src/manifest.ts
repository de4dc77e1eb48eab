import * as fs from "fs";
import * as path from "path";
import type { JSONSchemaType } from "ajv";
import type { ChunkFile } from "./chunkSplitter";
import { ConfigError } from "./errors";
import { createValidator, parseJson } from "./jsonValidation";

export const MANIFEST_VERSION = 1;

export interface ManifestChunk {
	readonly sequence: number;
	/** File name relative to the manifest's directory */
	readonly file: string;
	readonly statements: number;
	readonly bytes: number;
}

/**
 * Index of the chunk files one `split` run produced, in load order.
 */
export interface ChunkManifest {
	readonly version: number;
	readonly prefix: string;
	readonly budgetBytes: number;
	readonly sessionSettings: boolean;
	readonly createdAt: string;
	readonly chunks: readonly ManifestChunk[];
}

const chunkSchema: JSONSchemaType<ManifestChunk> = {
	type: "object",
	properties: {
		sequence: { type: "integer", minimum: 1 },
		file: { type: "string", minLength: 1 },
		statements: { type: "integer", minimum: 1 },
		bytes: { type: "integer", minimum: 0 },
	},
	required: ["sequence", "file", "statements", "bytes"],
	additionalProperties: false,
};

const manifestSchema: JSONSchemaType<ChunkManifest> = {
	type: "object",
	properties: {
		version: { type: "integer", const: MANIFEST_VERSION },
		prefix: { type: "string", minLength: 1 },
		budgetBytes: { type: "integer", minimum: 1 },
		sessionSettings: { type: "boolean" },
		createdAt: { type: "string", format: "date-time" },
		chunks: { type: "array", items: chunkSchema },
	},
	required: ["version", "prefix", "budgetBytes", "sessionSettings", "createdAt", "chunks"],
	additionalProperties: false,
};

const validateManifest = createValidator(manifestSchema, "manifest");

export function manifestFileName(prefix: string): string {
	return `${prefix}_manifest.json`;
}

export function createManifest(
	chunks: readonly ChunkFile[],
	options: { prefix: string; budgetBytes: number; sessionSettings: boolean; createdAt: Date }
): ChunkManifest {
	return {
		version: MANIFEST_VERSION,
		prefix: options.prefix,
		budgetBytes: options.budgetBytes,
		sessionSettings: options.sessionSettings,
		createdAt: options.createdAt.toISOString(),
		chunks: chunks.map(chunk => ({
			sequence: chunk.sequence,
			file: path.basename(chunk.location),
			statements: chunk.statementCount,
			bytes: chunk.bytes,
		})),
	};
}

export function serializeManifest(manifest: ChunkManifest): string {
	return JSON.stringify(manifest, null, 2) + "\n";
}

/**
 * Parse and validate manifest JSON. Chunks must be numbered 1..n in order.
 */
export function parseManifest(json: string): ChunkManifest {
	const manifest = validateManifest(parseJson(json, "manifest"));
	manifest.chunks.forEach((chunk, i) => {
		if (chunk.sequence !== i + 1) {
			throw new ConfigError(`Invalid manifest: chunk ${chunk.file} has sequence ${chunk.sequence}, expected ${i + 1}`);
		}
	});
	return manifest;
}

export function writeManifest(directory: string, manifest: ChunkManifest): string {
	const file = path.join(directory, manifestFileName(manifest.prefix));
	fs.writeFileSync(file, serializeManifest(manifest));
	return file;
}

/**
 * Read the manifest for `prefix` from a directory. Returns the manifest and
 * the absolute chunk paths in load order.
 */
export function readManifest(directory: string, prefix: string): { manifest: ChunkManifest; files: string[] } {
	const file = path.join(directory, manifestFileName(prefix));
	if (!fs.existsSync(file)) {
		throw new ConfigError(`No manifest ${manifestFileName(prefix)} in ${directory}`);
	}
	const manifest = parseManifest(fs.readFileSync(file, "utf-8"));
	const files = manifest.chunks.map(chunk => path.resolve(directory, chunk.file));
	for (const chunkFile of files) {
		if (!fs.existsSync(chunkFile)) {
			throw new ConfigError(`Manifest ${file} lists missing chunk ${chunkFile}`);
		}
	}
	return { manifest, files };
}
