import type { BankDetails, Customer, Merchant } from "@instalo/core";
import { assertMerchantBalance, getTestInstance, type TestInstance } from "@instalo/test-utils";
import { beforeEach, describe, expect, it } from "vitest";

const bankDetails: BankDetails = {
	bankName: "Test Bank",
	bankAccountNumber: "000123456789",
	iban: "SA0000000000000000000000",
};

describe("Settlements", () => {
	let t: TestInstance;
	let customer: Customer;
	let merchant: Merchant;

	async function purchase(totalAmount: number) {
		const request = await t.instalo.purchaseRequests.send({
			merchantId: merchant.id,
			customerId: customer.id,
			productName: "Desk",
			quantity: 1,
			unitPrice: totalAmount,
		});
		return t.instalo.purchaseRequests.accept({ requestId: request.id, planType: 3 });
	}

	describe("with the default commission", () => {
		beforeEach(async () => {
			t = getTestInstance();
			customer = await t.instalo.customers.create({ creditLimit: 1_000_000 });
			merchant = await t.instalo.merchants.create({ shopName: "Oak & Iron" });
			await purchase(399900);
		});

		it("debits the balance when a withdrawal is requested", async () => {
			const withdrawal = await t.instalo.settlements.requestWithdrawal({
				merchantId: merchant.id,
				amount: 100000,
				bankDetails,
			});

			expect(withdrawal).toMatchObject({
				settlementType: "withdrawal",
				status: "pending",
				grossAmount: 100000,
				netAmount: 100000,
				commissionAmount: 0,
				transactionId: null,
				bankName: "Test Bank",
			});
			const updated = await t.instalo.merchants.get(merchant.id);
			expect(updated.balance).toBe(297900);
			expect(updated.bankAccountNumber).toBe("000123456789");
		});

		it("walks a withdrawal through processing to completion", async () => {
			const withdrawal = await t.instalo.settlements.requestWithdrawal({
				merchantId: merchant.id,
				amount: 100000,
				bankDetails,
			});

			t.clock.advance({ hours: 2 });
			const processing = await t.instalo.settlements.process(withdrawal.id);
			expect(processing).toMatchObject({
				status: "processing",
				processedAt: new Date("2025-01-15T12:00:00.000Z"),
			});

			t.clock.advance({ days: 1 });
			const completed = await t.instalo.settlements.complete({
				settlementId: withdrawal.id,
				bankReference: "BANK-REF-1",
			});
			expect(completed).toMatchObject({
				status: "completed",
				bankReference: "BANK-REF-1",
				completedAt: new Date("2025-01-16T12:00:00.000Z"),
				version: 3,
			});
			await assertMerchantBalance(t.instalo, merchant.id, 297900);
		});

		it("re-credits the balance when a withdrawal fails", async () => {
			const withdrawal = await t.instalo.settlements.requestWithdrawal({
				merchantId: merchant.id,
				amount: 100000,
				bankDetails,
			});
			await t.instalo.settlements.process(withdrawal.id);

			const failed = await t.instalo.settlements.fail({
				settlementId: withdrawal.id,
				reason: "Account closed",
			});

			expect(failed).toMatchObject({ status: "failed", failureReason: "Account closed" });
			await assertMerchantBalance(t.instalo, merchant.id, 397900);
		});

		it("enforces the settlement lifecycle", async () => {
			const withdrawal = await t.instalo.settlements.requestWithdrawal({
				merchantId: merchant.id,
				amount: 1000,
				bankDetails,
			});

			await expect(
				t.instalo.settlements.complete({ settlementId: withdrawal.id }),
			).rejects.toMatchObject({ code: "INVALID_STATE" });

			await t.instalo.settlements.fail({ settlementId: withdrawal.id, reason: "Rejected by bank" });
			await expect(
				t.instalo.settlements.fail({ settlementId: withdrawal.id, reason: "Again" }),
			).rejects.toMatchObject({ code: "INVALID_STATE" });
			await assertMerchantBalance(t.instalo, merchant.id, 397900);
		});

		it("refuses withdrawals for a suspended merchant", async () => {
			await t.instalo.merchants.setStatus({ merchantId: merchant.id, status: "suspended" });

			await expect(
				t.instalo.settlements.requestWithdrawal({
					merchantId: merchant.id,
					amount: 1000,
					bankDetails,
				}),
			).rejects.toMatchObject({ code: "ACCOUNT_INACTIVE" });
		});

		it("requires bank details", async () => {
			await expect(
				t.instalo.settlements.requestWithdrawal({
					merchantId: merchant.id,
					amount: 1000,
					bankDetails: { bankName: "", bankAccountNumber: "1" },
				}),
			).rejects.toMatchObject({ code: "VALIDATION_ERROR", message: "bankName is required" });
		});

		it("reports platform revenue over completed income", async () => {
			t.clock.advance({ days: 1 });
			await purchase(100000);

			expect(await t.instalo.settlements.platformRevenue()).toEqual({
				transactionCount: 2,
				grossVolume: 499900,
				commission: 2500,
				netToMerchants: 497400,
			});
			expect(
				await t.instalo.settlements.platformRevenue({
					from: new Date("2025-01-15T11:00:00.000Z"),
				}),
			).toEqual({
				transactionCount: 1,
				grossVolume: 100000,
				commission: 500,
				netToMerchants: 99500,
			});
		});

		it("excludes withdrawals from revenue", async () => {
			await t.instalo.settlements.requestWithdrawal({
				merchantId: merchant.id,
				amount: 1000,
				bankDetails,
			});

			expect((await t.instalo.settlements.platformRevenue()).transactionCount).toBe(1);
		});

		it("summarizes merchant activity", async () => {
			await t.instalo.purchaseRequests.send({
				merchantId: merchant.id,
				customerId: customer.id,
				productName: "Chair",
				quantity: 2,
				unitPrice: 15000,
			});
			await t.instalo.settlements.requestWithdrawal({
				merchantId: merchant.id,
				amount: 5000,
				bankDetails,
			});

			expect(await t.instalo.merchants.stats(merchant.id)).toEqual({
				merchantId: merchant.id,
				balance: 392900,
				totalTransactions: 1,
				totalVolume: 399900,
				totalCommissionPaid: 2000,
				requests: { pending: 1, accepted: 1, rejected: 0, expired: 0, cancelled: 0 },
				pendingWithdrawals: 1,
				pendingWithdrawalAmount: 5000,
			});
		});
	});

	describe("with commission waived", () => {
		beforeEach(async () => {
			t = getTestInstance({ commissionRate: 0 });
			customer = await t.instalo.customers.create();
			merchant = await t.instalo.merchants.create({ shopName: "Oak & Iron" });
			await purchase(50000);
		});

		it("rejects a withdrawal above the balance and leaves it unchanged", async () => {
			await assertMerchantBalance(t.instalo, merchant.id, 50000);

			await expect(
				t.instalo.settlements.requestWithdrawal({
					merchantId: merchant.id,
					amount: 60000,
					bankDetails,
				}),
			).rejects.toMatchObject({ code: "INSUFFICIENT_BALANCE" });

			await assertMerchantBalance(t.instalo, merchant.id, 50000);
			const withdrawals = await t.instalo.settlements.list({ type: "withdrawal" });
			expect(withdrawals.total).toBe(0);
		});

		it("never overdraws under concurrent withdrawals", async () => {
			const results = await Promise.allSettled(
				Array.from({ length: 3 }, () =>
					t.instalo.settlements.requestWithdrawal({
						merchantId: merchant.id,
						amount: 20000,
						bankDetails,
					}),
				),
			);

			expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(2);
			await assertMerchantBalance(t.instalo, merchant.id, 10000);
		});
	});
});
