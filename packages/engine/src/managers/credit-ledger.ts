// =============================================================================
// CREDIT LEDGER -- Reservation model over a customer's credit line
// =============================================================================
// available + outstanding == limit after every operation. Accepting a purchase
// moves money from available to outstanding; each payment moves it back.

import type { Customer } from "@instalo/core";
import { InstaloError } from "@instalo/core";
import { type InstaloTransactionAdapter, MODELS } from "@instalo/core/db";
import { toCustomer } from "./rows.js";
import { lockRow, updateVersioned } from "./versioned.js";

export interface CreditBalances {
	creditLimit: number;
	availableBalance: number;
	outstandingBalance: number;
}

// =============================================================================
// PURE OPERATIONS
// =============================================================================

function assertPositive(amount: number): void {
	if (!Number.isSafeInteger(amount) || amount <= 0) {
		throw InstaloError.invalidAmount("Amount must be a positive integer", { amount });
	}
}

export function assertLedgerBalanced(balances: CreditBalances): void {
	const { creditLimit, availableBalance, outstandingBalance } = balances;
	if (
		availableBalance < 0 ||
		outstandingBalance < 0 ||
		availableBalance > creditLimit ||
		availableBalance + outstandingBalance !== creditLimit
	) {
		throw InstaloError.invariantViolation("Credit ledger out of balance", {
			creditLimit,
			availableBalance,
			outstandingBalance,
		});
	}
}

export function reserveCredit(balances: CreditBalances, amount: number): CreditBalances {
	assertPositive(amount);
	if (amount > balances.availableBalance) {
		throw InstaloError.insufficientCredit("Insufficient available credit", {
			requested: amount,
			available: balances.availableBalance,
		});
	}
	return {
		creditLimit: balances.creditLimit,
		availableBalance: balances.availableBalance - amount,
		outstandingBalance: balances.outstandingBalance + amount,
	};
}

export function releaseCredit(balances: CreditBalances, amount: number): CreditBalances {
	assertPositive(amount);
	if (amount > balances.outstandingBalance) {
		throw InstaloError.invariantViolation("Release exceeds outstanding balance", {
			amount,
			outstanding: balances.outstandingBalance,
		});
	}
	return {
		creditLimit: balances.creditLimit,
		availableBalance: balances.availableBalance + amount,
		outstandingBalance: balances.outstandingBalance - amount,
	};
}

/** Raises the limit; the whole delta becomes available. */
export function raiseLimit(
	balances: CreditBalances,
	newLimit: number,
	maxCreditLimit: number,
): CreditBalances {
	if (newLimit > maxCreditLimit) {
		throw InstaloError.limitExceedsMax(undefined, { newLimit, maxCreditLimit });
	}
	if (!Number.isSafeInteger(newLimit) || newLimit <= balances.creditLimit) {
		throw InstaloError.validation("New limit must be greater than the current limit", {
			newLimit,
			currentLimit: balances.creditLimit,
		});
	}
	return {
		creditLimit: newLimit,
		availableBalance: balances.availableBalance + (newLimit - balances.creditLimit),
		outstandingBalance: balances.outstandingBalance,
	};
}

// =============================================================================
// PERSISTENCE
// =============================================================================

export function lockCustomer(tx: InstaloTransactionAdapter, customerId: string): Promise<Customer> {
	return lockRow(tx, MODELS.customer, customerId, toCustomer, "Customer");
}

export async function saveCreditBalances(
	tx: InstaloTransactionAdapter,
	customer: Customer,
	next: CreditBalances,
	now: Date,
): Promise<Customer> {
	assertLedgerBalanced(next);
	return updateVersioned(tx, {
		model: MODELS.customer,
		current: customer,
		changes: {
			creditLimit: next.creditLimit,
			availableBalance: next.availableBalance,
			outstandingBalance: next.outstandingBalance,
		},
		map: toCustomer,
		now,
	});
}
