// =============================================================================
// INVARIANT CHECKS
// =============================================================================
// Each check selects up to CHECK_ROW_LIMIT offending rows. An empty result
// means the invariant holds across the whole schema.

import { createTableResolver } from "@instalo/core/db";

export const CHECK_ROW_LIMIT = 10;

export interface InvariantCheck {
	id: string;
	title: string;
	/** Shown when no rows come back */
	passMessage: string;
	sql: (schema: string) => string;
}

export const INVARIANT_CHECKS: InvariantCheck[] = [
	{
		id: "credit-conservation",
		title: "Customer credit conservation",
		passMessage: "available + outstanding = limit for every customer",
		sql: (schema) => {
			const t = createTableResolver(schema);
			return `SELECT id, credit_limit, available_balance, outstanding_balance
FROM ${t("customer")}
WHERE available_balance + outstanding_balance <> credit_limit
   OR available_balance < 0
   OR outstanding_balance < 0
LIMIT ${CHECK_ROW_LIMIT}`;
		},
	},
	{
		id: "outstanding-matches-transactions",
		title: "Outstanding balance vs open transactions",
		passMessage: "outstanding balances match open transaction remainders",
		sql: (schema) => {
			const t = createTableResolver(schema);
			return `SELECT c.id, c.outstanding_balance, COALESCE(SUM(ct.remaining_balance), 0)::bigint AS open_remaining
FROM ${t("customer")} c
LEFT JOIN ${t("credit_transaction")} ct
  ON ct.customer_id = c.id AND ct.status NOT IN ('completed', 'cancelled')
GROUP BY c.id, c.outstanding_balance
HAVING c.outstanding_balance <> COALESCE(SUM(ct.remaining_balance), 0)
LIMIT ${CHECK_ROW_LIMIT}`;
		},
	},
	{
		id: "schedule-sums",
		title: "Installment schedule sums",
		passMessage: "every plan's installments sum to its total",
		sql: (schema) => {
			const t = createTableResolver(schema);
			return `SELECT p.id, p.total_amount, COALESCE(SUM(s.amount), 0)::bigint AS scheduled
FROM ${t("repayment_plan")} p
LEFT JOIN ${t("repayment_schedule")} s ON s.plan_id = p.id
GROUP BY p.id, p.total_amount
HAVING p.total_amount <> COALESCE(SUM(s.amount), 0)
LIMIT ${CHECK_ROW_LIMIT}`;
		},
	},
	{
		id: "commission-sums",
		title: "Commission split",
		passMessage: "commission + net = total for every transaction",
		sql: (schema) => {
			const t = createTableResolver(schema);
			return `SELECT id, total_amount, commission_amount, net_amount
FROM ${t("credit_transaction")}
WHERE commission_amount + net_amount <> total_amount
   OR commission_amount < 0
LIMIT ${CHECK_ROW_LIMIT}`;
		},
	},
	{
		id: "paid-within-total",
		title: "Paid amounts within totals",
		passMessage: "paid + remaining = total and no installment is overpaid",
		sql: (schema) => {
			const t = createTableResolver(schema);
			return `SELECT id, total_amount, paid_amount, remaining_balance
FROM ${t("credit_transaction")}
WHERE paid_amount + remaining_balance <> total_amount
   OR paid_amount > total_amount
UNION ALL
SELECT id, amount, paid_amount, amount - paid_amount
FROM ${t("repayment_schedule")}
WHERE paid_amount > amount OR paid_amount < 0
LIMIT ${CHECK_ROW_LIMIT}`;
		},
	},
	{
		id: "merchant-balance",
		title: "Merchant balances",
		passMessage: "no merchant balance is negative",
		sql: (schema) => {
			const t = createTableResolver(schema);
			return `SELECT id, balance
FROM ${t("merchant")}
WHERE balance < 0
LIMIT ${CHECK_ROW_LIMIT}`;
		},
	},
];

/** Compact "key=value" rendering of an offending row. */
export function formatCheckRow(row: Record<string, unknown>): string {
	return Object.entries(row)
		.map(([key, value]) => {
			const text = String(value);
			return key === "id" ? `${key}=${text.slice(0, 8)}...` : `${key}=${text}`;
		})
		.join(" ");
}
