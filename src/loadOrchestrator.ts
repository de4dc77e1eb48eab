/**
 * Parallel load of chunk files.
 *
 * A fixed number of workers pull tasks from one shared queue. Each worker
 * runs one task to completion, retrying it immediately on failure, before it
 * takes the next. JavaScript runs the queue operations on a single thread,
 * so a task is never taken twice.
 */

export type LoadOutcome =
	| { readonly ok: true }
	| { readonly ok: false; readonly error: string };

/** Runs one chunk file against the target database. */
export type LoadExecutor = (file: string) => Promise<LoadOutcome>;

export interface LoadResult {
	readonly file: string;
	readonly ok: boolean;
	readonly attempts: number;
	/** Error text of the last failed attempt */
	readonly lastError?: string;
}

export type LoadEvent =
	| { readonly type: "start"; readonly file: string; readonly attempt: number; readonly worker: number }
	| { readonly type: "retry"; readonly file: string; readonly attempt: number; readonly error: string }
	| { readonly type: "done"; readonly result: LoadResult };

export interface LoadOptions {
	readonly workers: number;
	/** Attempts per file, including the first */
	readonly maxAttempts: number;
	readonly onEvent?: (event: LoadEvent) => void;
}

export interface LoadSummary {
	readonly succeeded: number;
	readonly failed: number;
	/** One result per file, in input order */
	readonly results: readonly LoadResult[];
	readonly failures: readonly LoadResult[];
	readonly ok: boolean;
}

function errorText(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

async function runTask(file: string, worker: number, execute: LoadExecutor, options: LoadOptions): Promise<LoadResult> {
	let lastError: string | undefined;
	for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
		options.onEvent?.({ type: "start", file, attempt, worker });
		let outcome: LoadOutcome;
		try {
			outcome = await execute(file);
		} catch (error) {
			// A throwing executor counts as a failed attempt
			outcome = { ok: false, error: errorText(error) };
		}
		if (outcome.ok) {
			return { file, ok: true, attempts: attempt };
		}
		lastError = outcome.error;
		if (attempt < options.maxAttempts) {
			options.onEvent?.({ type: "retry", file, attempt, error: outcome.error });
		}
	}
	return { file, ok: false, attempts: options.maxAttempts, lastError };
}

/**
 * Load every file, `workers` at a time. Failed files do not stop the others;
 * the summary's `ok` is false if any file failed on every attempt.
 */
export async function runParallelLoad(files: readonly string[], execute: LoadExecutor, options: LoadOptions): Promise<LoadSummary> {
	if (!Number.isInteger(options.workers) || options.workers < 1) {
		throw new RangeError(`workers must be a positive integer, got ${options.workers}`);
	}
	if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
		throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
	}

	const queue = files.map((file, position) => ({ file, position }));
	const results = new Array<LoadResult | undefined>(files.length).fill(undefined);

	const worker = async (id: number) => {
		for (let task = queue.shift(); task !== undefined; task = queue.shift()) {
			const result = await runTask(task.file, id, execute, options);
			results[task.position] = result;
			options.onEvent?.({ type: "done", result });
		}
	};

	const poolSize = Math.min(options.workers, files.length);
	await Promise.all(Array.from({ length: poolSize }, (_, i) => worker(i + 1)));

	const ordered = results.filter((r): r is LoadResult => r !== undefined);
	const failures = ordered.filter(r => !r.ok);
	return {
		succeeded: ordered.length - failures.length,
		failed: failures.length,
		results: ordered,
		failures,
		ok: failures.length === 0,
	};
}
