import type { Instalo } from "@instalo/engine";

/**
 * Assert that a customer's credit ledger is conserved:
 * available + outstanding == limit, and outstanding equals the sum of the
 * remaining balances of their open transactions.
 */
export async function assertCreditConserved(instalo: Instalo, customerId: string): Promise<void> {
	const customer = await instalo.customers.get(customerId);
	const { creditLimit, availableBalance, outstandingBalance } = customer;

	if (availableBalance + outstandingBalance !== creditLimit) {
		throw new Error(
			`Customer ${customerId}: available(${availableBalance}) + outstanding(${outstandingBalance}) != limit(${creditLimit})`,
		);
	}

	let open = 0;
	let page = 1;
	for (;;) {
		const result = await instalo.transactions.list({ customerId, page, perPage: 100 });
		for (const transaction of result.data) {
			if (transaction.status !== "completed" && transaction.status !== "cancelled") {
				open += transaction.remainingBalance;
			}
		}
		if (!result.hasMore) break;
		page++;
	}
	if (open !== outstandingBalance) {
		throw new Error(
			`Customer ${customerId}: outstanding(${outstandingBalance}) != open transaction balances(${open})`,
		);
	}
}

/** Assert that a transaction's schedule sums to its total and its paid amounts agree. */
export async function assertScheduleConsistent(
	instalo: Instalo,
	transactionId: string,
): Promise<void> {
	const { transaction, plan, schedule } = await instalo.transactions.schedule(transactionId);

	const scheduled = schedule.reduce((acc, row) => acc + row.amount, 0);
	if (scheduled !== transaction.totalAmount) {
		throw new Error(
			`Transaction ${transactionId}: schedule sums to ${scheduled}, expected ${transaction.totalAmount}`,
		);
	}
	const paid = schedule.reduce((acc, row) => acc + row.paidAmount, 0);
	if (paid !== transaction.paidAmount || paid !== plan.amountPaid) {
		throw new Error(
			`Transaction ${transactionId}: rows paid ${paid}, transaction ${transaction.paidAmount}, plan ${plan.amountPaid}`,
		);
	}
	if (transaction.paidAmount + transaction.remainingBalance !== transaction.totalAmount) {
		throw new Error(`Transaction ${transactionId}: paid + remaining != total`);
	}
}

/** Assert a merchant's withdrawable balance. */
export async function assertMerchantBalance(
	instalo: Instalo,
	merchantId: string,
	expectedBalance: number,
): Promise<void> {
	const merchant = await instalo.merchants.get(merchantId);
	if (merchant.balance !== expectedBalance) {
		throw new Error(
			`Merchant ${merchantId}: expected balance ${expectedBalance}, got ${merchant.balance}`,
		);
	}
}
