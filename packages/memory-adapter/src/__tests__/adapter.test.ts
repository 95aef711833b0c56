import type { Row } from "@instalo/core/db";
import { describe, expect, it } from "vitest";
import { memoryAdapter } from "../adapter.js";

// =============================================================================
// MEMORY ADAPTER TESTS
// =============================================================================

const byId = (id: string) => [{ field: "id", operator: "eq" as const, value: id }];

function deferred() {
	let resolve: () => void = () => {};
	const promise = new Promise<void>((r) => {
		resolve = r;
	});
	return { promise, resolve };
}

describe("memoryAdapter", () => {
	it("identifies itself", () => {
		const adapter = memoryAdapter();
		expect(adapter.id).toBe("memory");
		expect(adapter.options).toEqual({
			supportsAdvisoryLocks: true,
			supportsForUpdate: true,
			dialectName: "memory",
		});
	});

	describe("CRUD", () => {
		it("creates with a generated id and reads back a copy", async () => {
			const adapter = memoryAdapter();
			const created = await adapter.create<Row>({ model: "customer", data: { creditLimit: 200000 } });
			expect(typeof created.id).toBe("string");

			const found = await adapter.findOne<Row>({ model: "customer", where: byId(String(created.id)) });
			expect(found).toEqual({ id: created.id, creditLimit: 200000 });

			if (found) found.creditLimit = 1;
			const again = await adapter.findOne<Row>({ model: "customer", where: byId(String(created.id)) });
			expect(again?.creditLimit).toBe(200000);
		});

		it("rejects duplicate ids", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "customer", data: { id: "c-1" } });
			await expect(adapter.create({ model: "customer", data: { id: "c-1" } })).rejects.toThrow(
				"Duplicate key: customer c-1 already exists",
			);
		});

		it("updates a single matching row and returns it", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "customer", data: { id: "c-1", version: 1, balance: 10 } });

			const stale = await adapter.update({
				model: "customer",
				where: [...byId("c-1"), { field: "version", operator: "eq", value: 2 }],
				update: { balance: 0 },
			});
			expect(stale).toBeNull();

			const updated = await adapter.update<Row>({
				model: "customer",
				where: [...byId("c-1"), { field: "version", operator: "eq", value: 1 }],
				update: { balance: 5, version: 2 },
			});
			expect(updated).toEqual({ id: "c-1", version: 2, balance: 5 });
		});

		it("filters, sorts and paginates", async () => {
			const adapter = memoryAdapter();
			const rows = [
				{ id: "r-1", dueDate: new Date("2024-03-01T00:00:00Z"), status: "pending", amount: 300 },
				{ id: "r-2", dueDate: new Date("2024-01-01T00:00:00Z"), status: "paid", amount: 100 },
				{ id: "r-3", dueDate: new Date("2024-02-01T00:00:00Z"), status: "overdue", amount: 200 },
			];
			for (const data of rows) await adapter.create({ model: "repayment_schedule", data });

			const open = await adapter.findMany<Row>({
				model: "repayment_schedule",
				where: [{ field: "status", operator: "in", value: ["pending", "overdue"] }],
				sortBy: { field: "dueDate", direction: "asc" },
			});
			expect(open.map((r) => r.id)).toEqual(["r-3", "r-1"]);

			const beforeMarch = await adapter.findMany<Row>({
				model: "repayment_schedule",
				where: [{ field: "dueDate", operator: "lt", value: new Date("2024-03-01T00:00:00Z") }],
				sortBy: { field: "amount", direction: "desc" },
				limit: 1,
				offset: 1,
			});
			expect(beforeMarch.map((r) => r.id)).toEqual(["r-2"]);

			const sameInstant = await adapter.findOne<Row>({
				model: "repayment_schedule",
				where: [{ field: "dueDate", operator: "eq", value: new Date("2024-02-01T00:00:00Z") }],
			});
			expect(sameInstant?.id).toBe("r-3");
		});

		it("counts, sums and deletes", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "payment", data: { id: "p-1", txId: "t-1", amount: 500 } });
			await adapter.create({ model: "payment", data: { id: "p-2", txId: "t-1", amount: 250 } });
			await adapter.create({ model: "payment", data: { id: "p-3", txId: "t-2", amount: 50 } });

			const forT1 = [{ field: "txId", operator: "eq" as const, value: "t-1" }];
			expect(await adapter.count({ model: "payment", where: forT1 })).toBe(2);
			expect(await adapter.sum({ model: "payment", field: "amount", where: forT1 })).toBe(750);
			expect(await adapter.sum({ model: "settlement", field: "amount" })).toBe(0);

			await adapter.delete({ model: "payment", where: forT1 });
			expect(await adapter.count({ model: "payment" })).toBe(1);
		});

		it("matches null checks", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "settlement", data: { id: "s-1", completedAt: null } });
			await adapter.create({ model: "settlement", data: { id: "s-2", completedAt: new Date() } });

			const open = await adapter.findMany<Row>({
				model: "settlement",
				where: [{ field: "completedAt", operator: "is_null", value: null }],
			});
			expect(open.map((r) => r.id)).toEqual(["s-1"]);
		});

		it("does not run raw SQL", async () => {
			const adapter = memoryAdapter();
			await expect(adapter.raw("SELECT 1", [])).rejects.toThrow(
				"raw() is not supported by the memory adapter",
			);
			await expect(adapter.rawMutate("DELETE FROM x", [])).rejects.toThrow(
				"rawMutate() is not supported by the memory adapter",
			);
		});

		it("resets", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "customer", data: { id: "c-1" } });
			adapter.reset();
			expect(await adapter.count({ model: "customer" })).toBe(0);
		});
	});

	describe("transactions", () => {
		it("commits writes", async () => {
			const adapter = memoryAdapter();
			const result = await adapter.transaction(async (tx) => {
				await tx.create({ model: "customer", data: { id: "c-1", balance: 1 } });
				return "done";
			});
			expect(result).toBe("done");
			expect(await adapter.count({ model: "customer" })).toBe(1);
		});

		it("keeps uncommitted writes out of reads made outside the transaction", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "customer", data: { id: "c-1", balance: 100 } });
			const written = deferred();
			const finish = deferred();

			const pending = adapter.transaction(async (tx) => {
				await tx.update({ model: "customer", where: byId("c-1"), update: { balance: 40 } });
				await tx.create({ model: "customer", data: { id: "c-2", balance: 60 } });
				const inside = await tx.findOne<Row>({ model: "customer", where: byId("c-1") });
				expect(inside?.balance).toBe(40);
				expect(await tx.sum({ model: "customer", field: "balance" })).toBe(100);
				written.resolve();
				await finish.promise;
			});
			await written.promise;

			const outside = await adapter.findOne<Row>({ model: "customer", where: byId("c-1") });
			expect(outside?.balance).toBe(100);
			expect(await adapter.count({ model: "customer" })).toBe(1);
			expect(await adapter.sum({ model: "customer", field: "balance" })).toBe(100);

			finish.resolve();
			await pending;

			const committed = await adapter.findOne<Row>({ model: "customer", where: byId("c-1") });
			expect(committed?.balance).toBe(40);
			expect(await adapter.count({ model: "customer" })).toBe(2);
		});

		it("hides rows deleted inside the transaction from its own reads", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "customer", data: { id: "c-1", balance: 100 } });

			await adapter.transaction(async (tx) => {
				await tx.delete({ model: "customer", where: byId("c-1") });
				expect(await tx.findOne({ model: "customer", where: byId("c-1") })).toBeNull();
				expect(await adapter.count({ model: "customer" })).toBe(1);
			});

			expect(await adapter.count({ model: "customer" })).toBe(0);
		});

		it("rolls back creates, updates and deletes on error", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "customer", data: { id: "c-1", balance: 100 } });
			await adapter.create({ model: "customer", data: { id: "c-2", balance: 50 } });

			await expect(
				adapter.transaction(async (tx) => {
					await tx.update({ model: "customer", where: byId("c-1"), update: { balance: 0 } });
					await tx.update({ model: "customer", where: byId("c-1"), update: { balance: -5 } });
					await tx.delete({ model: "customer", where: byId("c-2") });
					await tx.create({ model: "customer", data: { id: "c-3", balance: 7 } });
					throw new Error("boom");
				}),
			).rejects.toThrow("boom");

			const rows = await adapter.findMany<Row>({
				model: "customer",
				sortBy: { field: "id", direction: "asc" },
			});
			expect(rows).toEqual([
				{ id: "c-1", balance: 100 },
				{ id: "c-2", balance: 50 },
			]);
		});

		it("serializes read-modify-write through row locks", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "counter", data: { id: "k", value: 0 } });

			const increment = () =>
				adapter.transaction(async (tx) => {
					const row = await tx.findOne<Row>({ model: "counter", where: byId("k"), forUpdate: true });
					const value = Number(row?.value);
					await new Promise((resolve) => setTimeout(resolve, 5));
					await tx.update({ model: "counter", where: byId("k"), update: { value: value + 1 } });
				});

			await Promise.all([increment(), increment(), increment()]);

			const row = await adapter.findOne<Row>({ model: "counter", where: byId("k") });
			expect(row?.value).toBe(3);
		});

		it("re-checks the filter after waiting for a lock", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "request", data: { id: "r-1", status: "pending" } });
			const locked = deferred();
			const unblock = deferred();

			const first = adapter.transaction(async (tx) => {
				await tx.findOne({ model: "request", where: byId("r-1"), forUpdate: true });
				locked.resolve();
				await unblock.promise;
				await tx.update({ model: "request", where: byId("r-1"), update: { status: "accepted" } });
			});
			await locked.promise;

			const second = adapter.transaction((tx) =>
				tx.findOne<Row>({
					model: "request",
					where: [...byId("r-1"), { field: "status", operator: "eq", value: "pending" }],
					forUpdate: true,
				}),
			);
			unblock.resolve();

			await first;
			expect(await second).toBeNull();
		});

		it("fails with BUSY when a lock wait times out", async () => {
			const adapter = memoryAdapter({ lockTimeoutMs: 20 });
			await adapter.create({ model: "customer", data: { id: "c-1" } });
			const locked = deferred();
			const unblock = deferred();

			const holder = adapter.transaction(async (tx) => {
				await tx.findOne({ model: "customer", where: byId("c-1"), forUpdate: true });
				locked.resolve();
				await unblock.promise;
			});
			await locked.promise;

			await expect(
				adapter.transaction((tx) =>
					tx.findOne({ model: "customer", where: byId("c-1"), forUpdate: true }),
				),
			).rejects.toMatchObject({ code: "BUSY" });

			unblock.resolve();
			await holder;

			const row = await adapter.transaction((tx) =>
				tx.findOne<Row>({ model: "customer", where: byId("c-1"), forUpdate: true }),
			);
			expect(row?.id).toBe("c-1");
		});

		it("serializes advisory locks with the same key", async () => {
			const adapter = memoryAdapter();
			const order: string[] = [];

			const job = (name: string) =>
				adapter.transaction(async (tx) => {
					await tx.advisoryLock(7);
					order.push(`${name}:start`);
					await new Promise((resolve) => setTimeout(resolve, 5));
					order.push(`${name}:end`);
				});

			await Promise.all([job("a"), job("b")]);
			expect(order).toEqual(["a:start", "a:end", "b:start", "b:end"]);
		});
	});
});
