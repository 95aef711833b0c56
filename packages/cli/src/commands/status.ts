import * as p from "@clack/prompts";
import { minorToDecimal } from "@instalo/core/utils";
import { Command } from "commander";
import pc from "picocolors";
import { MIGRATIONS_TABLE } from "../sql/ddl.js";
import { lastMigrationSQL, MIGRATIONS_TABLE_EXISTS_SQL, STATUS_METRICS } from "../sql/status.js";
import { errorMessage, resolveConnection, withClient } from "../utils/connection.js";

export const statusCommand = new Command("status")
	.description("Show schema state and ledger totals")
	.option("--url <url>", "PostgreSQL connection URL (or set DATABASE_URL)")
	.option("--schema <name>", "PostgreSQL schema (default: instalo)")
	.option("--currency <code>", "Currency used to format amounts", "SAR")
	.action(async (options: { url?: string; schema?: string; currency: string }) => {
		p.intro(pc.bgCyan(pc.black(" instalo status ")));

		const conn = resolveConnection(options);
		if (!conn) return;

		try {
			await withClient(conn.dbUrl, async (client) => {
				p.log.step(pc.bold("Database"));
				p.log.success(`  Connection:    ${pc.green("connected")}`);
				p.log.info(`  Schema:        ${pc.cyan(conn.schema)}`);

				const migrated = await client.query(MIGRATIONS_TABLE_EXISTS_SQL, [
					conn.schema,
					MIGRATIONS_TABLE,
				]);
				if (migrated.rows.length === 0) {
					p.log.warning(
						`  Migrations:    ${pc.yellow("none")} ${pc.dim("run instalo migrate first")}`,
					);
					return;
				}

				const last = await client.query<{ hash: string; applied_at: Date }>(
					lastMigrationSQL(conn.schema),
				);
				const latest = last.rows[0];
				if (latest) {
					p.log.info(
						`  Migrations:    ${pc.cyan(latest.hash)} ${pc.dim(latest.applied_at.toISOString())}`,
					);
				}

				p.log.step(pc.bold("Ledger"));
				for (const metric of STATUS_METRICS) {
					const result = await client.query<{ value: string }>(metric.sql(conn.schema));
					// COUNT and SUM come back from pg as strings
					const value = Number(result.rows[0]?.value ?? 0);
					const shown = metric.money ? minorToDecimal(value, options.currency) : String(value);
					p.log.info(`  ${`${metric.label}:`.padEnd(24)} ${pc.cyan(shown)}`);
				}
			});
		} catch (error) {
			p.log.error(`${pc.red("Status failed:")} ${pc.dim(errorMessage(error))}`);
			process.exitCode = 1;
		}

		p.outro(pc.dim("instalo status complete"));
	});
