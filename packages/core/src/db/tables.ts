// =============================================================================
// TABLE DEFINITIONS
// =============================================================================
// Logical schema of the ledger. Model names double as table names; the CLI
// renders these definitions into PostgreSQL DDL.

export interface ColumnDefinition {
	type: "text" | "integer" | "bigint" | "timestamp" | "uuid";
	primaryKey?: boolean;
	notNull?: boolean;
	default?: string;
	references?: { table: string; column: string };
}

export interface TableDefinition {
	columns: Record<string, ColumnDefinition>;
	indexes?: Array<{ name: string; columns: string[]; unique?: boolean }>;
}

export const MODELS = {
	customer: "customer",
	merchant: "merchant",
	purchaseRequest: "purchase_request",
	transaction: "credit_transaction",
	plan: "repayment_plan",
	schedule: "repayment_schedule",
	payment: "payment",
	paymentAllocation: "payment_allocation",
	settlement: "settlement",
	limitHistory: "customer_limit_history",
} as const;

export type ModelName = (typeof MODELS)[keyof typeof MODELS];

const id: ColumnDefinition = { type: "uuid", primaryKey: true, notNull: true };
const money: ColumnDefinition = { type: "bigint", notNull: true, default: "0" };
const version: ColumnDefinition = { type: "integer", notNull: true, default: "1" };
const createdAt: ColumnDefinition = { type: "timestamp", notNull: true, default: "NOW()" };
const updatedAt: ColumnDefinition = { type: "timestamp", notNull: true, default: "NOW()" };

function ref(table: ModelName): ColumnDefinition {
	return { type: "uuid", notNull: true, references: { table, column: "id" } };
}

export const INSTALO_TABLES: Record<ModelName, TableDefinition> = {
	customer: {
		columns: {
			id,
			user_id: { type: "text" },
			customer_code: { type: "text", notNull: true },
			credit_limit: money,
			available_balance: money,
			outstanding_balance: money,
			status: { type: "text", notNull: true, default: "'active'" },
			version,
			created_at: createdAt,
			updated_at: updatedAt,
		},
		indexes: [
			{ name: "uq_customer_code", columns: ["customer_code"], unique: true },
			{ name: "idx_customer_user", columns: ["user_id"] },
		],
	},
	merchant: {
		columns: {
			id,
			user_id: { type: "text" },
			shop_name: { type: "text", notNull: true },
			status: { type: "text", notNull: true, default: "'active'" },
			balance: money,
			total_transactions: { type: "integer", notNull: true, default: "0" },
			total_volume: money,
			total_commission_paid: money,
			bank_name: { type: "text" },
			bank_account_number: { type: "text" },
			iban: { type: "text" },
			version,
			created_at: createdAt,
			updated_at: updatedAt,
		},
		indexes: [{ name: "idx_merchant_user", columns: ["user_id"] }],
	},
	purchase_request: {
		columns: {
			id,
			reference_number: { type: "text", notNull: true },
			merchant_id: ref("merchant"),
			customer_id: ref("customer"),
			product_name: { type: "text", notNull: true },
			description: { type: "text" },
			quantity: { type: "integer", notNull: true },
			unit_price: money,
			total_amount: money,
			currency: { type: "text", notNull: true },
			status: { type: "text", notNull: true, default: "'pending'" },
			expires_at: { type: "timestamp", notNull: true },
			rejection_reason: { type: "text" },
			responded_at: { type: "timestamp" },
			transaction_id: { type: "uuid" },
			version,
			created_at: createdAt,
			updated_at: updatedAt,
		},
		indexes: [
			{ name: "uq_purchase_request_reference", columns: ["reference_number"], unique: true },
			{ name: "idx_purchase_request_customer", columns: ["customer_id", "status"] },
			{ name: "idx_purchase_request_merchant", columns: ["merchant_id", "status"] },
		],
	},
	credit_transaction: {
		columns: {
			id,
			reference_number: { type: "text", notNull: true },
			purchase_request_id: ref("purchase_request"),
			customer_id: ref("customer"),
			merchant_id: ref("merchant"),
			product_name: { type: "text", notNull: true },
			currency: { type: "text", notNull: true },
			total_amount: money,
			commission_rate_ppm: { type: "integer", notNull: true },
			commission_amount: money,
			net_amount: money,
			paid_amount: money,
			remaining_balance: money,
			status: { type: "text", notNull: true, default: "'active'" },
			due_date: { type: "timestamp", notNull: true },
			completed_at: { type: "timestamp" },
			version,
			created_at: createdAt,
			updated_at: updatedAt,
		},
		indexes: [
			{ name: "uq_credit_transaction_reference", columns: ["reference_number"], unique: true },
			{ name: "uq_credit_transaction_request", columns: ["purchase_request_id"], unique: true },
			{ name: "idx_credit_transaction_customer", columns: ["customer_id", "status"] },
			{ name: "idx_credit_transaction_merchant", columns: ["merchant_id"] },
		],
	},
	repayment_plan: {
		columns: {
			id,
			reference_number: { type: "text", notNull: true },
			transaction_id: ref("credit_transaction"),
			plan_type: { type: "integer", notNull: true },
			total_amount: money,
			installment_amount: money,
			number_of_installments: { type: "integer", notNull: true },
			installments_paid: { type: "integer", notNull: true, default: "0" },
			amount_paid: money,
			remaining_amount: money,
			first_due_date: { type: "timestamp", notNull: true },
			last_due_date: { type: "timestamp", notNull: true },
			status: { type: "text", notNull: true, default: "'active'" },
			version,
			created_at: createdAt,
			updated_at: updatedAt,
		},
		indexes: [{ name: "uq_repayment_plan_transaction", columns: ["transaction_id"], unique: true }],
	},
	repayment_schedule: {
		columns: {
			id,
			plan_id: ref("repayment_plan"),
			transaction_id: ref("credit_transaction"),
			installment_number: { type: "integer", notNull: true },
			amount: money,
			due_date: { type: "timestamp", notNull: true },
			status: { type: "text", notNull: true, default: "'pending'" },
			paid_amount: money,
			paid_at: { type: "timestamp" },
			version,
			created_at: createdAt,
			updated_at: updatedAt,
		},
		indexes: [
			{
				name: "uq_repayment_schedule_installment",
				columns: ["plan_id", "installment_number"],
				unique: true,
			},
			{ name: "idx_repayment_schedule_due", columns: ["status", "due_date"] },
		],
	},
	payment: {
		columns: {
			id,
			reference_number: { type: "text", notNull: true },
			transaction_id: ref("credit_transaction"),
			customer_id: ref("customer"),
			amount: money,
			currency: { type: "text", notNull: true },
			payment_method: { type: "text", notNull: true },
			status: { type: "text", notNull: true },
			created_at: createdAt,
		},
		indexes: [
			{ name: "uq_payment_reference", columns: ["reference_number"], unique: true },
			{ name: "idx_payment_transaction", columns: ["transaction_id"] },
			{ name: "idx_payment_customer", columns: ["customer_id"] },
		],
	},
	payment_allocation: {
		columns: {
			id,
			payment_id: ref("payment"),
			schedule_id: ref("repayment_schedule"),
			installment_number: { type: "integer", notNull: true },
			amount: money,
			created_at: createdAt,
		},
		indexes: [{ name: "idx_payment_allocation_payment", columns: ["payment_id"] }],
	},
	settlement: {
		columns: {
			id,
			reference_number: { type: "text", notNull: true },
			merchant_id: ref("merchant"),
			transaction_id: { type: "uuid", references: { table: "credit_transaction", column: "id" } },
			settlement_type: { type: "text", notNull: true },
			gross_amount: money,
			commission_amount: money,
			net_amount: money,
			currency: { type: "text", notNull: true },
			status: { type: "text", notNull: true },
			bank_name: { type: "text" },
			bank_account_number: { type: "text" },
			iban: { type: "text" },
			bank_reference: { type: "text" },
			failure_reason: { type: "text" },
			processed_at: { type: "timestamp" },
			completed_at: { type: "timestamp" },
			version,
			created_at: createdAt,
			updated_at: updatedAt,
		},
		indexes: [
			{ name: "uq_settlement_reference", columns: ["reference_number"], unique: true },
			{ name: "idx_settlement_merchant", columns: ["merchant_id", "settlement_type", "status"] },
		],
	},
	customer_limit_history: {
		columns: {
			id,
			customer_id: ref("customer"),
			previous_limit: money,
			requested_limit: money,
			reason: { type: "text" },
			status: { type: "text", notNull: true },
			decided_by: { type: "text" },
			decision_reason: { type: "text" },
			decided_at: { type: "timestamp" },
			version,
			created_at: createdAt,
		},
		indexes: [{ name: "idx_limit_history_customer", columns: ["customer_id", "status"] }],
	},
};
