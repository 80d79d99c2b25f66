#!/usr/bin/env node
import { parseArgs, runCli } from "./host/cli.js";

try {
	await runCli(parseArgs(process.argv.slice(2)));
} catch (err) {
	console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
	process.exitCode = 1;
}
