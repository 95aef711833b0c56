// =============================================================================
// DDL GENERATION
// =============================================================================
// Renders the core table definitions into PostgreSQL statements. Every
// statement is idempotent so `instalo migrate` can be re-run safely.

import { createHash } from "node:crypto";
import {
	type ColumnDefinition,
	createTableResolver,
	INSTALO_TABLES,
	type TableDefinition,
} from "@instalo/core/db";

export const MIGRATIONS_TABLE = "_instalo_migrations";

export function pgType(col: ColumnDefinition): string {
	switch (col.type) {
		case "uuid":
			return "UUID";
		case "text":
			return "TEXT";
		case "bigint":
			return "BIGINT";
		case "integer":
			return "INTEGER";
		case "timestamp":
			return "TIMESTAMPTZ";
	}
}

export function columnSQL(
	name: string,
	col: ColumnDefinition,
	table: (name: string) => string,
): string {
	const parts = [name, pgType(col)];
	if (col.primaryKey) parts.push("PRIMARY KEY");
	if (col.notNull && !col.primaryKey) parts.push("NOT NULL");
	if (col.default !== undefined) parts.push(`DEFAULT ${col.default}`);
	if (col.references) {
		parts.push(`REFERENCES ${table(col.references.table)}(${col.references.column})`);
	}
	return parts.join(" ");
}

/** CREATE TABLE plus one CREATE INDEX per declared index. */
export function createTableStatements(
	tableName: string,
	def: TableDefinition,
	schema: string,
): string[] {
	const table = createTableResolver(schema);
	const columns = Object.entries(def.columns).map(
		([name, col]) => `  ${columnSQL(name, col, table)}`,
	);
	const statements = [`CREATE TABLE IF NOT EXISTS ${table(tableName)} (\n${columns.join(",\n")}\n)`];

	for (const idx of def.indexes ?? []) {
		const kind = idx.unique ? "UNIQUE INDEX" : "INDEX";
		statements.push(
			`CREATE ${kind} IF NOT EXISTS ${idx.name} ON ${table(tableName)} (${idx.columns.join(", ")})`,
		);
	}

	return statements;
}

export function migrationsTableStatement(schema: string): string {
	const table = createTableResolver(schema);
	return `CREATE TABLE IF NOT EXISTS ${table(MIGRATIONS_TABLE)} (
  id SERIAL PRIMARY KEY,
  hash TEXT NOT NULL UNIQUE,
  applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
)`;
}

/**
 * Full ordered statement list for a schema. Tables are emitted in
 * declaration order, which already places referenced tables first.
 */
export function buildMigrationStatements(
	schema: string,
	tables: Record<string, TableDefinition> = INSTALO_TABLES,
): string[] {
	const statements: string[] = [];
	if (schema !== "public") {
		statements.push(`CREATE SCHEMA IF NOT EXISTS "${schema}"`);
	}
	for (const [name, def] of Object.entries(tables)) {
		statements.push(...createTableStatements(name, def, schema));
	}
	statements.push(migrationsTableStatement(schema));
	return statements;
}

/** Short content hash recorded in the migrations table. */
export function hashStatements(statements: string[]): string {
	return createHash("sha256").update(statements.join(";\n")).digest("hex").slice(0, 16);
}
