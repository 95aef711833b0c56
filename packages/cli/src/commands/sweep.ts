import * as p from "@clack/prompts";
import { createConsoleLogger } from "@instalo/core/logger";
import { createPooledDrizzleAdapter } from "@instalo/drizzle-adapter";
import { createInstalo } from "@instalo/engine";
import { Command } from "commander";
import pc from "picocolors";
import { errorMessage, resolveConnection } from "../utils/connection.js";

export const sweepCommand = new Command("sweep")
	.description("Expire stale purchase requests and mark overdue installments")
	.option("--url <url>", "PostgreSQL connection URL (or set DATABASE_URL)")
	.option("--schema <name>", "PostgreSQL schema (default: instalo)")
	.option("--verbose", "Log engine activity at debug level")
	.action(async (options: { url?: string; schema?: string; verbose?: boolean }) => {
		p.intro(pc.bgCyan(pc.black(" instalo sweep ")));

		const conn = resolveConnection(options);
		if (!conn) return;

		const { adapter, close } = createPooledDrizzleAdapter({
			connectionString: conn.dbUrl,
			schema: conn.schema,
			pool: { max: 2 },
		});

		try {
			const instalo = createInstalo({
				database: adapter,
				schema: conn.schema,
				logger: createConsoleLogger({ level: options.verbose ? "debug" : "warn" }),
			});

			const s = p.spinner();
			s.start("Sweeping...");
			const result = await instalo.sweep.run();
			s.stop("Sweep finished");

			p.log.info(`  Requests expired:      ${pc.cyan(String(result.expiredRequests))}`);
			p.log.info(`  Installments overdue:  ${pc.cyan(String(result.overdueInstallments))}`);
			p.log.info(`  Transactions overdue:  ${pc.cyan(String(result.overdueTransactions))}`);
			p.outro(pc.green("Done"));
		} catch (error) {
			p.log.error(`${pc.red("Sweep failed:")} ${pc.dim(errorMessage(error))}`);
			process.exitCode = 1;
		} finally {
			await close();
		}
	});
