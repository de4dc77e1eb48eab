import { Client } from "pg";
import { PGlite } from "@electric-sql/pglite";
import * as fs from "fs";
import type { LoadExecutor } from "./loadOrchestrator";

/**
 * A database that chunk files and schema scripts can be run against.
 */
export interface LoadTarget {
	readonly execute: LoadExecutor;
	/** Run a SQL script, throwing on the first error */
	runScript(sql: string): Promise<void>;
	close(): Promise<void>;
}

function errorText(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Connect to the load target.
 *
 * Connection string formats:
 * - `pglite:` - In-memory PGLite database
 * - `pglite:/path/to/dir` - PGLite database persisted to filesystem
 * - `postgresql://...` or other - PostgreSQL connection string; every
 *   execution opens its own connection
 *
 * A script is sent as one simple-protocol query, which PostgreSQL runs as a
 * single transaction: a failed chunk leaves nothing behind.
 */
export async function connectLoadTarget(connectionString: string): Promise<LoadTarget> {
	if (connectionString.startsWith("pglite:")) {
		const pglitePath = connectionString.slice("pglite:".length);
		return fromPGlite(new PGlite(pglitePath || undefined), true);
	}
	return fromConnectionString(connectionString);
}

/**
 * Wrap an existing PGLite instance (useful for testing). The instance is
 * closed with the target only when `owned` is set.
 */
export async function fromPGlite(db: PGlite, owned = false): Promise<LoadTarget> {
	await db.waitReady;
	const runScript = async (sql: string) => {
		await db.exec(sql);
	};
	return {
		execute: async (file) => {
			try {
				await runScript(await fs.promises.readFile(file, "utf-8"));
				return { ok: true };
			} catch (error) {
				return { ok: false, error: errorText(error) };
			}
		},
		runScript,
		async close() {
			if (owned) await db.close();
		},
	};
}

function fromConnectionString(connectionString: string): LoadTarget {
	const runScript = async (sql: string) => {
		const client = new Client({ connectionString });
		await client.connect();
		try {
			await client.query(sql);
		} finally {
			await client.end();
		}
	};
	return {
		execute: async (file) => {
			try {
				await runScript(await fs.promises.readFile(file, "utf-8"));
				return { ok: true };
			} catch (error) {
				return { ok: false, error: errorText(error) };
			}
		},
		runScript,
		async close() { },
	};
}
