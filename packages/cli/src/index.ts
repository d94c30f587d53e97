#!/usr/bin/env node
import "dotenv/config";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import pc from "picocolors";
import { callCommand } from "./commands/call.js";
import { migrateCommand } from "./commands/migrate.js";
import { readCommand } from "./commands/read.js";
import { toolsCommand } from "./commands/tools.js";
import { sanitizeErrorMessage } from "./utils/runtime.js";

// Graceful shutdown
process.on("SIGINT", () => process.exit(0));
process.on("SIGTERM", () => process.exit(0));

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(fallback: string): string {
	try {
		const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, "../package.json"), "utf-8"));
		const version: unknown = typeof pkg === "object" && pkg !== null ? Reflect.get(pkg, "version") : undefined;
		return typeof version === "string" ? version : fallback;
	} catch {
		return fallback;
	}
}

const cliVersion = readVersion("0.1.0");

const BANNER = `
  ${pc.bold(pc.cyan("payrail"))} ${pc.dim(`v${cliVersion}`)}
  ${pc.dim("Open-banking payments over a relational ledger store")}
`;

const program = new Command()
	.name("payrail")
	.description("CLI for payrail: schema migration, tools and resources")
	.version(cliVersion, "-v, --version")
	.action(() => {
		console.log(BANNER);
		program.help();
	});

program.addCommand(migrateCommand);
program.addCommand(toolsCommand);
program.addCommand(callCommand);
program.addCommand(readCommand);

program.exitOverride();

try {
	await program.parseAsync();
} catch (error) {
	if (error instanceof Error && "code" in error && error.code === "commander.helpDisplayed") {
		process.exit(0);
	}
	if (error instanceof Error && "code" in error && error.code === "commander.version") {
		process.exit(0);
	}
	const message = error instanceof Error ? error.message : String(error);
	console.error(pc.red(sanitizeErrorMessage(message)));
	process.exit(1);
}
