import * as p from "@clack/prompts";
import { Command } from "commander";
import pc from "picocolors";
import { formatCheckRow, INVARIANT_CHECKS } from "../sql/checks.js";
import { errorMessage, resolveConnection, withClient } from "../utils/connection.js";

export const verifyCommand = new Command("verify")
	.description("Check ledger invariants against the database")
	.option("--url <url>", "PostgreSQL connection URL (or set DATABASE_URL)")
	.option("--schema <name>", "PostgreSQL schema (default: instalo)")
	.action(async (options: { url?: string; schema?: string }) => {
		p.intro(pc.bgCyan(pc.black(" instalo verify ")));

		const conn = resolveConnection(options);
		if (!conn) return;

		let failed = 0;

		try {
			await withClient(conn.dbUrl, async (client) => {
				for (const check of INVARIANT_CHECKS) {
					const s = p.spinner();
					s.start(`${check.title}...`);
					const result = await client.query<Record<string, unknown>>(check.sql(conn.schema));

					if (result.rows.length === 0) {
						s.stop(`${pc.green("PASS")} ${check.passMessage}`);
						continue;
					}

					failed++;
					s.stop(`${pc.red("FAIL")} ${check.title}: ${result.rows.length} offending row(s)`);
					for (const row of result.rows) {
						p.log.error(`  ${formatCheckRow(row)}`);
					}
				}
			});
		} catch (error) {
			p.log.error(`${pc.red("Verification aborted:")} ${pc.dim(errorMessage(error))}`);
			process.exitCode = 1;
			return;
		}

		const passed = INVARIANT_CHECKS.length - failed;
		if (failed > 0) {
			process.exitCode = 1;
			p.outro(pc.red(`${failed} check(s) failed, ${passed} passed`));
		} else {
			p.outro(pc.green(`All ${passed} checks passed`));
		}
	});
