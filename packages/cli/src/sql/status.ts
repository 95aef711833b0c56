import { createTableResolver } from "@instalo/core/db";
import { MIGRATIONS_TABLE } from "./ddl.js";

export interface StatusMetric {
	label: string;
	/** Selects a single row with one `value` column */
	sql: (schema: string) => string;
	/** Amounts are shown in major units */
	money?: boolean;
}

export const STATUS_METRICS: StatusMetric[] = [
	{
		label: "Customers",
		sql: (s) => `SELECT COUNT(*)::bigint AS value FROM ${createTableResolver(s)("customer")}`,
	},
	{
		label: "Merchants",
		sql: (s) => `SELECT COUNT(*)::bigint AS value FROM ${createTableResolver(s)("merchant")}`,
	},
	{
		label: "Pending requests",
		sql: (s) =>
			`SELECT COUNT(*)::bigint AS value FROM ${createTableResolver(s)("purchase_request")} WHERE status = 'pending'`,
	},
	{
		label: "Open transactions",
		sql: (s) =>
			`SELECT COUNT(*)::bigint AS value FROM ${createTableResolver(s)("credit_transaction")} WHERE status IN ('active', 'overdue')`,
	},
	{
		label: "Overdue installments",
		sql: (s) =>
			`SELECT COUNT(*)::bigint AS value FROM ${createTableResolver(s)("repayment_schedule")} WHERE status = 'overdue'`,
	},
	{
		label: "Credit outstanding",
		money: true,
		sql: (s) =>
			`SELECT COALESCE(SUM(outstanding_balance), 0)::bigint AS value FROM ${createTableResolver(s)("customer")}`,
	},
	{
		label: "Merchant balances",
		money: true,
		sql: (s) =>
			`SELECT COALESCE(SUM(balance), 0)::bigint AS value FROM ${createTableResolver(s)("merchant")}`,
	},
	{
		label: "Pending withdrawals",
		sql: (s) =>
			`SELECT COUNT(*)::bigint AS value FROM ${createTableResolver(s)("settlement")} WHERE settlement_type = 'withdrawal' AND status IN ('pending', 'processing')`,
	},
	{
		label: "Pending limit requests",
		sql: (s) =>
			`SELECT COUNT(*)::bigint AS value FROM ${createTableResolver(s)("customer_limit_history")} WHERE status = 'pending'`,
	},
];

/** Latest applied migration, or no rows when the schema was never migrated. */
export function lastMigrationSQL(schema: string): string {
	return `SELECT hash, applied_at FROM ${createTableResolver(schema)(MIGRATIONS_TABLE)} ORDER BY id DESC LIMIT 1`;
}

export const MIGRATIONS_TABLE_EXISTS_SQL =
	"SELECT 1 FROM information_schema.tables WHERE table_schema = $1 AND table_name = $2";
