import { describe, expect, it, vi } from "vitest";
import { queueAfterCommit, runWithTransactionContext } from "../db/transaction-context.js";

describe("runWithTransactionContext", () => {
	it("runs queued callbacks after the work resolves, in order", async () => {
		const order: string[] = [];

		const result = await runWithTransactionContext(async () => {
			queueAfterCommit(() => {
				order.push("first");
			});
			queueAfterCommit(async () => {
				order.push("second");
			});
			order.push("work");
			return 42;
		});

		expect(result).toBe(42);
		expect(order).toEqual(["work", "first", "second"]);
	});

	it("drops callbacks when the work throws", async () => {
		const callback = vi.fn();

		await expect(
			runWithTransactionContext(async () => {
				queueAfterCommit(callback);
				throw new Error("rolled back");
			}),
		).rejects.toThrow("rolled back");

		expect(callback).not.toHaveBeenCalled();
	});

	it("reports callback failures without failing the committed work", async () => {
		const onError = vi.fn();

		const result = await runWithTransactionContext(async () => {
			queueAfterCommit(() => {
				throw new Error("notify failed");
			});
			return "committed";
		}, onError);

		expect(result).toBe("committed");
		expect(onError).toHaveBeenCalledWith(expect.any(Error), 0);
	});
});
