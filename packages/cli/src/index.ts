#!/usr/bin/env node
import "dotenv/config";
import { readFileSync } from "node:fs";
import { Command } from "commander";
import pc from "picocolors";
import { migrateCommand } from "./commands/migrate.js";
import { statusCommand } from "./commands/status.js";
import { sweepCommand } from "./commands/sweep.js";
import { verifyCommand } from "./commands/verify.js";
import { errorMessage } from "./utils/connection.js";

process.on("SIGINT", () => process.exit(0));
process.on("SIGTERM", () => process.exit(0));

const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
const cliVersion =
	typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
		? pkg.version
		: "0.0.0";

const BANNER = `
  ${pc.bold(pc.cyan("instalo"))} ${pc.dim(`v${cliVersion}`)}
  ${pc.dim("Installment credit ledger")}
`;

const program = new Command()
	.name("instalo")
	.description("Operate an Instalo ledger database")
	.version(cliVersion, "-v, --version")
	.action(() => {
		console.log(BANNER);
		program.help();
	});

program.addCommand(migrateCommand);
program.addCommand(verifyCommand);
program.addCommand(sweepCommand);
program.addCommand(statusCommand);

program.exitOverride();

try {
	await program.parseAsync();
} catch (error) {
	if (
		error instanceof Error &&
		"code" in error &&
		(error.code === "commander.helpDisplayed" || error.code === "commander.version")
	) {
		process.exit(0);
	}
	console.error(pc.red(errorMessage(error)));
	process.exit(1);
}
