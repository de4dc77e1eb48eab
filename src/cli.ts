#!/usr/bin/env node
import { CommanderError } from "commander";
import { createProgram } from "./program";

createProgram()
	.parseAsync(process.argv)
	.catch((error: unknown) => {
		if (error instanceof CommanderError) {
			// Commander has already printed the message
			process.exitCode = error.exitCode;
			return;
		}
		console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
		process.exitCode = 1;
	});
