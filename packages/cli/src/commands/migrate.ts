import * as p from "@clack/prompts";
import { createPooledAdapter } from "@payrail/drizzle-adapter";
import { Command } from "commander";
import { generateSchemaSql, loadEnvConfig } from "payrail";
import pc from "picocolors";
import { resolveDatabaseUrl } from "../utils/runtime.js";

const SCHEMA_NAME = /^[A-Za-z0-9_]+$/;

/** Split generated DDL into single statements, each ending in `;`. */
export function splitStatements(sql: string): string[] {
	return sql
		.split(";\n")
		.map((stmt) => stmt.trim())
		.filter((stmt) => stmt.length > 0)
		.map((stmt) => (stmt.endsWith(";") ? stmt : `${stmt};`));
}

export const migrateCommand = new Command("migrate")
	.description("Create the payrail tables and indexes")
	.option("--sql", "Print the DDL instead of applying it")
	.option("--schema <name>", "PostgreSQL schema (or set PAYRAIL_SCHEMA)")
	.option("--url <url>", "PostgreSQL connection URL (or set DATABASE_URL)")
	.option("-y, --yes", "Skip confirmation prompt")
	.action(async (options: { sql?: boolean; schema?: string; url?: string; yes?: boolean }) => {
		const config = loadEnvConfig();
		const schema = options.schema ?? config.schema ?? "public";
		if (!SCHEMA_NAME.test(schema)) {
			throw new Error(
				`--schema must contain only alphanumeric characters and underscores, got "${schema}"`,
			);
		}

		const ddl = generateSchemaSql(schema);
		if (options.sql) {
			process.stdout.write(ddl);
			return;
		}

		p.intro(pc.bgCyan(pc.black(" payrail migrate ")));

		const statements = splitStatements(ddl);
		p.log.step(pc.bold("Migration Plan"));
		p.log.info(
			`  ${pc.green("APPLY")}  ${pc.cyan(String(statements.length))} statement(s) to schema ${pc.cyan(schema)}`,
		);

		if (!options.yes) {
			const confirmed = await p.confirm({
				message: "Apply these changes to the database?",
				initialValue: false,
			});

			if (p.isCancel(confirmed) || !confirmed) {
				p.cancel("Migration cancelled.");
				return;
			}
		}

		const { adapter, close } = createPooledAdapter({
			connectionString: resolveDatabaseUrl(config, options.url),
		});
		const s = p.spinner();
		s.start("Applying schema...");

		try {
			// PostgreSQL DDL is transactional; a failing statement leaves nothing behind.
			await adapter.transaction(async (tx) => {
				for (const stmt of statements) {
					await tx.raw(stmt, []);
				}
			});
			s.stop(`Applied ${pc.cyan(String(statements.length))} statement(s)`);
			p.outro(pc.green("Migration completed successfully!"));
		} catch (error) {
			s.stop(pc.red("Migration failed"));
			throw error;
		} finally {
			await close();
		}
	});
