import { describe, test, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import {
	createManifest,
	manifestFileName,
	parseManifest,
	readManifest,
	serializeManifest,
	writeManifest,
	type ChunkManifest,
} from "./manifest";
import { ConfigError } from "./errors";

const MANIFEST: ChunkManifest = {
	version: 1,
	prefix: "pg_inserts",
	budgetBytes: 1024,
	sessionSettings: true,
	createdAt: "2024-01-02T03:04:05.000Z",
	chunks: [
		{ sequence: 1, file: "pg_inserts_part_001.sql", statements: 3, bytes: 900 },
		{ sequence: 2, file: "pg_inserts_part_002.sql", statements: 1, bytes: 40 },
	],
};

describe("manifest", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "manifest-test-"));
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	test("createManifest records chunk files by name", () => {
		const manifest = createManifest(
			[{ sequence: 1, location: path.join(tempDir, "x_part_001.sql"), statementCount: 2, bytes: 52, firstIndex: 4, lastIndex: 5 }],
			{ prefix: "x", budgetBytes: 100, sessionSettings: false, createdAt: new Date("2024-01-02T03:04:05.000Z") }
		);

		expect(manifest).toEqual({
			version: 1,
			prefix: "x",
			budgetBytes: 100,
			sessionSettings: false,
			createdAt: "2024-01-02T03:04:05.000Z",
			chunks: [{ sequence: 1, file: "x_part_001.sql", statements: 2, bytes: 52 }],
		});
	});

	test("parseManifest accepts serialized output", () => {
		expect(parseManifest(serializeManifest(MANIFEST))).toEqual(MANIFEST);
	});

	test("parseManifest rejects missing properties", () => {
		expect(() => parseManifest('{"version": 1}')).toThrow(ConfigError);
		expect(() => parseManifest('{"version": 1}')).toThrow("manifest must have required property 'prefix'");
	});

	test("parseManifest rejects a malformed timestamp", () => {
		const json = JSON.stringify({ ...MANIFEST, createdAt: "yesterday" });

		expect(() => parseManifest(json)).toThrow('Invalid manifest: manifest/createdAt must match format "date-time"');
	});

	test("parseManifest rejects chunks out of order", () => {
		const json = JSON.stringify({ ...MANIFEST, chunks: [...MANIFEST.chunks].reverse() });

		expect(() => parseManifest(json)).toThrow(
			"Invalid manifest: chunk pg_inserts_part_002.sql has sequence 2, expected 1"
		);
	});

	test("parseManifest rejects invalid JSON", () => {
		expect(() => parseManifest("{")).toThrow(/^Invalid manifest: /);
	});

	test("readManifest resolves chunk paths in order", () => {
		writeManifest(tempDir, MANIFEST);
		for (const chunk of MANIFEST.chunks) {
			fs.writeFileSync(path.join(tempDir, chunk.file), "");
		}

		const { manifest, files } = readManifest(tempDir, "pg_inserts");

		expect(manifest).toEqual(MANIFEST);
		expect(files).toEqual([
			path.join(tempDir, "pg_inserts_part_001.sql"),
			path.join(tempDir, "pg_inserts_part_002.sql"),
		]);
	});

	test("readManifest fails when a chunk file is missing", () => {
		writeManifest(tempDir, MANIFEST);
		fs.writeFileSync(path.join(tempDir, MANIFEST.chunks[0].file), "");

		expect(() => readManifest(tempDir, "pg_inserts")).toThrow(
			`Manifest ${path.join(tempDir, "pg_inserts_manifest.json")} lists missing chunk ${path.join(tempDir, "pg_inserts_part_002.sql")}`
		);
	});

	test("readManifest fails without a manifest", () => {
		expect(() => readManifest(tempDir, "other")).toThrow(`No manifest ${manifestFileName("other")} in ${tempDir}`);
	});
});
