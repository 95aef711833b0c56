import * as p from "@clack/prompts";
import { createTableResolver } from "@instalo/core/db";
import { Command } from "commander";
import pc from "picocolors";
import { buildMigrationStatements, hashStatements, MIGRATIONS_TABLE } from "../sql/ddl.js";
import { errorMessage, resolveConnection, resolveSchema, withClient } from "../utils/connection.js";

interface MigrateOptions {
	url?: string;
	schema?: string;
	dryRun?: boolean;
}

export const migrateCommand = new Command("migrate")
	.description("Create or update the Instalo tables")
	.option("--url <url>", "PostgreSQL connection URL (or set DATABASE_URL)")
	.option("--schema <name>", "PostgreSQL schema (default: instalo)")
	.option("--dry-run", "Print the SQL without executing it")
	.action(async (options: MigrateOptions) => {
		p.intro(pc.bgCyan(pc.black(" instalo migrate ")));

		if (options.dryRun) {
			const schema = resolveSchema(options);
			if (schema === null) return;
			const statements = buildMigrationStatements(schema);
			console.log(`${statements.join(";\n\n")};`);
			p.outro(pc.dim(`${statements.length} statement(s), hash ${hashStatements(statements)}`));
			return;
		}

		const conn = resolveConnection(options);
		if (!conn) return;

		const statements = buildMigrationStatements(conn.schema);
		const hash = hashStatements(statements);
		const migrations = createTableResolver(conn.schema)(MIGRATIONS_TABLE);

		try {
			await withClient(conn.dbUrl, async (client) => {
				const s = p.spinner();
				s.start(`Applying ${statements.length} statement(s) to schema "${conn.schema}"...`);

				// PostgreSQL DDL is transactional; a failure leaves nothing half-applied
				await client.query("BEGIN");
				try {
					for (const sql of statements) {
						await client.query(sql);
					}
					const inserted = await client.query(
						`INSERT INTO ${migrations} (hash) VALUES ($1) ON CONFLICT (hash) DO NOTHING`,
						[hash],
					);
					await client.query("COMMIT");
					s.stop(
						inserted.rowCount === 0
							? `Schema already at ${pc.cyan(hash)}`
							: `Applied schema ${pc.cyan(hash)}`,
					);
				} catch (error) {
					await client.query("ROLLBACK");
					throw error;
				}
			});
			p.outro(pc.green("Migration completed"));
		} catch (error) {
			p.log.error(`${pc.red("Migration failed:")} ${pc.dim(errorMessage(error))}`);
			process.exitCode = 1;
		}
	});
