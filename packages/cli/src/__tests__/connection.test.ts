import { afterEach, describe, expect, it, vi } from "vitest";
import { resolveConnection, resolveSchema, sanitizeErrorMessage } from "../utils/connection.js";

vi.mock("@clack/prompts", () => ({ log: { error: vi.fn() } }));

describe("resolveConnection", () => {
	const initialExitCode = process.exitCode;

	afterEach(() => {
		process.exitCode = initialExitCode;
	});

	it("prefers flags over the environment", () => {
		const env = { DATABASE_URL: "postgres://env/db", INSTALO_SCHEMA: "from_env" };
		expect(resolveConnection({ url: "postgres://flag/db", schema: "from_flag" }, env)).toEqual({
			dbUrl: "postgres://flag/db",
			schema: "from_flag",
		});
		expect(resolveConnection({}, env)).toEqual({ dbUrl: "postgres://env/db", schema: "from_env" });
	});

	it("defaults the schema", () => {
		expect(resolveConnection({}, { DATABASE_URL: "postgres://env/db" })).toEqual({
			dbUrl: "postgres://env/db",
			schema: "instalo",
		});
	});

	it("fails without a database URL", () => {
		expect(resolveConnection({}, {})).toBeNull();
		expect(process.exitCode).toBe(1);
	});

	it("rejects schema names that cannot be used as identifiers", () => {
		expect(resolveSchema({ schema: 'ledger"; DROP' }, {})).toBeNull();
		expect(resolveSchema({ schema: "1ledger" }, {})).toBeNull();
		expect(resolveSchema({ schema: "ledger_2" }, {})).toBe("ledger_2");
	});
});

describe("sanitizeErrorMessage", () => {
	it("masks connection strings and secrets", () => {
		expect(sanitizeErrorMessage("connect failed for postgres://app:test-secret@db/ledger")).toBe(
			"connect failed for postgres://***",
		);
		expect(sanitizeErrorMessage("auth error password=test-secret")).toBe("auth error password=***");
	});
});
