// =============================================================================
// TRANSACTION BOUNDARY
// =============================================================================
// Every multi-write operation runs through withTransaction. On PostgreSQL the
// isolation level and both timeouts are set for this transaction only, so a
// timed-out statement aborts and rolls back everything before it.
// Nothing here retries: a failed commit is reported, never re-applied.

import type { PayrailContext } from "@payrail/core";
import {
	classifyStoreError,
	type PayrailTransactionAdapter,
	runWithTransactionContext,
} from "@payrail/core/db";

export async function withTransaction<T>(
	ctx: PayrailContext,
	operation: (tx: PayrailTransactionAdapter) => Promise<T>,
): Promise<T> {
	const { isolationLevel, transactionTimeoutMs, lockTimeoutMs } = ctx.options.advanced;

	try {
		return await runWithTransactionContext(
			() =>
				ctx.adapter.transaction(async (tx) => {
					if (tx.options.dialectName === "postgres") {
						await tx.raw(`SET TRANSACTION ISOLATION LEVEL ${isolationLevel.toUpperCase()}`, []);
						await tx.raw(`SET LOCAL statement_timeout = ${Math.trunc(transactionTimeoutMs)}`, []);
						await tx.raw(`SET LOCAL lock_timeout = ${Math.trunc(lockTimeoutMs)}`, []);
					}
					return operation(tx);
				}),
			(error, index) => {
				ctx.logger.error("After-commit callback failed", {
					callbackIndex: index,
					error: error instanceof Error ? error.message : String(error),
				});
			},
		);
	} catch (error) {
		throw classifyStoreError(error);
	}
}
