// =============================================================================
// TRANSACTION CONTEXT — after-commit callback queue
// =============================================================================
// Code running inside a payrail transaction can defer side effects (log
// lines, notifications) until the transaction has committed. Callbacks
// queued by a transaction that rolls back are dropped.

import { AsyncLocalStorage } from "node:async_hooks";

type AfterCommitCallback = () => void | Promise<void>;

interface TransactionStore {
	callbacks: AfterCommitCallback[];
}

const storage = new AsyncLocalStorage<TransactionStore>();

/**
 * Queue a callback to run once the enclosing transaction commits.
 * Outside a transaction context the callback runs immediately.
 *
 * @example
 * ```ts
 * queueAfterCommit(() => ctx.logger.info("Payment completed", { paymentId }));
 * ```
 */
export function queueAfterCommit(cb: AfterCommitCallback): void {
	const store = storage.getStore();
	if (store) {
		store.callbacks.push(cb);
		return;
	}
	void Promise.resolve()
		.then(cb)
		.catch((error: unknown) => {
			console.error("[payrail] after-commit callback failed", error);
		});
}

/**
 * Run `fn` inside a transaction context and drain the queued callbacks once it
 * resolves. If `fn` throws, the callbacks are discarded.
 *
 * @param onCallbackError - Receives callback failures with the callback's index.
 *   Without it, failures go to stderr.
 */
export async function runWithTransactionContext<T>(
	fn: () => Promise<T>,
	onCallbackError?: (error: unknown, index: number) => void,
): Promise<T> {
	const store: TransactionStore = { callbacks: [] };

	const result = await storage.run(store, fn);

	for (const [index, cb] of store.callbacks.entries()) {
		try {
			await cb();
		} catch (error) {
			if (onCallbackError) {
				onCallbackError(error, index);
			} else {
				console.error("[payrail] after-commit callback failed", error);
			}
		}
	}

	return result;
}
