#!/usr/bin/env node
import "dotenv/config";
import { dirname } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import pc from "picocolors";
import { runCli } from "./run.js";
import type { CliFlags } from "./utils/get-config.js";
import { readPackageVersion } from "./utils/version.js";

function readVersion(): string {
	try {
		return readPackageVersion(dirname(fileURLToPath(import.meta.url)));
	} catch (error) {
		process.stderr.write(`teller: could not read package version: ${String(error)}\n`);
		return "0.0.0";
	}
}

const cliVersion = readVersion();

const program = new Command()
	.name("teller")
	.description("Command-line ATM over a flat-file account ledger")
	.version(cliVersion, "-v, --version")
	.option("--cwd <dir>", "Working directory", process.cwd())
	.option("-c, --config <path>", "Path to teller config file")
	.option("-d, --data <path>", "Account snapshot file (default: accounts.json)")
	.option("--currency <code>", "ISO 4217 currency code (default: INR)")
	.option("--log-level <level>", "debug | info | warn | error (default: warn)")
	.option("--json-logs", "Write logs as JSON lines to stderr")
	.option("--no-demo", "Do not create demo accounts on an empty store")
	.action(async () => {
		const flags = program.opts<CliFlags>();
		await runCli({ ...flags, version: cliVersion, sleep: (ms) => sleep(ms) });
	});

program.exitOverride();

try {
	await program.parseAsync();
} catch (error) {
	if (error instanceof Error && "code" in error) {
		if (error.code === "commander.helpDisplayed" || error.code === "commander.version") {
			process.exit(0);
		}
	}
	const message = error instanceof Error ? error.message : String(error);
	console.error(pc.red(message));
	process.exit(1);
}
