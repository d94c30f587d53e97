// =============================================================================
// PAYMENT MANAGER -- payment initiation, scheduling and cancellation
// =============================================================================
// The only component that writes more than one row per operation. Every
// money-moving path runs inside withTransaction: verify the beneficiary,
// verify the source account and its funds, debit, record. Any throw rolls
// back the debit and the insert together.
//
// The debit is always conditional (`balance >= amount`) and must affect
// exactly one row. In pessimistic mode, on a store that supports it, the
// source account is also locked with SELECT ... FOR UPDATE before the funds
// check.

import {
	type Account,
	generateId,
	type ImmediatePaymentType,
	isPayrailError,
	type Payment,
	type PayrailContext,
	type PayrailErrorCode,
	PayrailError,
} from "@payrail/core";
import { queueAfterCommit } from "@payrail/core/db";
import { createRepository, type Repository } from "../db/repository.js";
import { withTransaction } from "../infrastructure/transaction.js";
import { validatePaymentRequest } from "./validation.js";

export interface InitiatePaymentParams {
	/** Minor units */
	amount: number;
	currency: string;
	beneficiaryId: string;
	sourceAccountId: string;
	/** Default: "IMMEDIATE" */
	paymentType?: ImmediatePaymentType;
}

export interface SchedulePaymentParams {
	/** Minor units */
	amount: number;
	currency: string;
	beneficiaryId: string;
	sourceAccountId: string;
	scheduledDate: Date;
}

export interface DuePaymentsResult {
	completed: string[];
	failed: Array<{ paymentId: string; code: PayrailErrorCode }>;
}

// =============================================================================
// AUTHORIZE & DEBIT
// =============================================================================

/** Row locks are taken in pessimistic mode on stores that support them. */
function lockRows(ctx: PayrailContext): boolean {
	return ctx.options.advanced.lockMode === "pessimistic" && ctx.adapter.options.supportsForUpdate;
}

interface DebitRequest {
	amount: number;
	currency: string;
	beneficiaryId: string;
	sourceAccountId: string;
}

async function authorizeAndDebit(
	ctx: PayrailContext,
	repo: Repository,
	req: DebitRequest,
): Promise<Account> {
	const beneficiary = await repo.getBeneficiary(req.beneficiaryId);
	if (!beneficiary) {
		throw PayrailError.beneficiaryNotFound(req.beneficiaryId);
	}

	const account = await repo.getAccount(req.sourceAccountId, {
		forUpdate: lockRows(ctx),
	});
	if (!account) {
		throw PayrailError.accountNotFound(req.sourceAccountId);
	}

	assertSameCurrency(account, req.currency);

	if (account.balance < req.amount) {
		throw PayrailError.insufficientFunds({
			accountId: account.accountId,
			balance: account.balance,
			required: req.amount,
			currency: account.currency,
		});
	}

	const debited = await repo.debitAccount(account.accountId, req.amount);
	if (debited !== 1) {
		// Lost a race with a concurrent debit, or the row is gone
		const fresh = await repo.getAccount(account.accountId);
		if (!fresh) {
			throw PayrailError.transactionIntegrity(
				`Source account ${account.accountId} disappeared during payment`,
				{ accountId: account.accountId },
			);
		}
		throw PayrailError.insufficientFunds({
			accountId: fresh.accountId,
			balance: fresh.balance,
			required: req.amount,
			currency: fresh.currency,
		});
	}

	return { ...account, balance: account.balance - req.amount };
}

function assertSameCurrency(account: Account, currency: string): void {
	if (account.currency !== currency) {
		throw PayrailError.invalidArgument(
			`Payment currency ${currency} does not match account currency ${account.currency}`,
			{ accountId: account.accountId, accountCurrency: account.currency, currency },
		);
	}
}

async function recordPayment(repo: Repository, payment: Payment): Promise<void> {
	let inserted: number;
	try {
		inserted = await repo.insertPayment(payment);
	} catch (error) {
		if (isPayrailError(error, "CONSTRAINT_VIOLATION")) {
			throw PayrailError.transactionIntegrity(
				"Payment record could not be written",
				{ paymentId: payment.paymentId },
				error,
			);
		}
		throw error;
	}
	if (inserted !== 1) {
		throw PayrailError.transactionIntegrity("Payment record could not be written", {
			paymentId: payment.paymentId,
		});
	}
}

function logRejection(
	ctx: PayrailContext,
	error: unknown,
	data: Record<string, unknown>,
): void {
	if (isPayrailError(error, "INSUFFICIENT_FUNDS")) {
		ctx.logger.warn("Payment rejected: insufficient funds", { ...data, ...error.details });
	} else if (isPayrailError(error, "TRANSACTION_INTEGRITY")) {
		ctx.logger.error("Payment rolled back: integrity violation", {
			...data,
			error: error.message,
		});
	}
}

// =============================================================================
// INITIATE
// =============================================================================

export async function initiatePayment(
	ctx: PayrailContext,
	params: InitiatePaymentParams,
): Promise<Payment> {
	const { amount, currency, beneficiaryId, sourceAccountId, paymentType = "IMMEDIATE" } = params;

	validatePaymentRequest(ctx, params);

	try {
		return await withTransaction(ctx, async (tx) => {
			const repo = createRepository(tx);
			await authorizeAndDebit(ctx, repo, params);

			const now = new Date();
			const payment: Payment = {
				paymentId: generateId(),
				amount,
				currency,
				beneficiaryId,
				sourceAccountId,
				status: "COMPLETED",
				type: paymentType,
				scheduledDate: null,
				createdAt: now,
				completedAt: now,
			};
			await recordPayment(repo, payment);

			queueAfterCommit(() => {
				ctx.logger.info("Payment completed", {
					paymentId: payment.paymentId,
					amount,
					currency,
					sourceAccountId,
				});
			});
			return payment;
		});
	} catch (error) {
		logRejection(ctx, error, { amount, currency, sourceAccountId });
		throw error;
	}
}

// =============================================================================
// SCHEDULE & CANCEL
// =============================================================================

export async function schedulePayment(
	ctx: PayrailContext,
	params: SchedulePaymentParams,
): Promise<Payment> {
	const { amount, currency, beneficiaryId, sourceAccountId, scheduledDate } = params;

	validatePaymentRequest(ctx, params);

	const now = new Date();
	if (Number.isNaN(scheduledDate.getTime()) || scheduledDate.getTime() <= now.getTime()) {
		throw PayrailError.invalidArgument("scheduledDate must be in the future", {
			scheduledDate: Number.isNaN(scheduledDate.getTime()) ? null : scheduledDate.toISOString(),
		});
	}

	return withTransaction(ctx, async (tx) => {
		const repo = createRepository(tx);

		if (!(await repo.getBeneficiary(beneficiaryId))) {
			throw PayrailError.beneficiaryNotFound(beneficiaryId);
		}
		const account = await repo.getAccount(sourceAccountId);
		if (!account) {
			throw PayrailError.accountNotFound(sourceAccountId);
		}
		assertSameCurrency(account, currency);

		const payment: Payment = {
			paymentId: generateId(),
			amount,
			currency,
			beneficiaryId,
			sourceAccountId,
			status: "SCHEDULED",
			type: "SCHEDULED",
			scheduledDate,
			createdAt: now,
			completedAt: null,
		};
		await recordPayment(repo, payment);

		queueAfterCommit(() => {
			ctx.logger.info("Payment scheduled", {
				paymentId: payment.paymentId,
				scheduledDate: scheduledDate.toISOString(),
			});
		});
		return payment;
	});
}

/**
 * Move a SCHEDULED payment to CANCELLED. Balances are never touched because
 * scheduled payments are not debited until they execute.
 */
export async function cancelPayment(ctx: PayrailContext, paymentId: string): Promise<Payment> {
	return withTransaction<Payment>(ctx, async (tx) => {
		const repo = createRepository(tx);
		const payment = await repo.getPayment(paymentId, {
			forUpdate: lockRows(ctx),
		});
		if (!payment) {
			throw PayrailError.paymentNotFound(paymentId);
		}
		if (payment.status !== "SCHEDULED") {
			throw PayrailError.invalidStateTransition(paymentId, payment.status, "CANCELLED");
		}

		const updated = await repo.updatePaymentStatus(paymentId, "SCHEDULED", {
			status: "CANCELLED",
		});
		if (updated !== 1) {
			const fresh = await repo.getPayment(paymentId);
			throw PayrailError.invalidStateTransition(
				paymentId,
				fresh?.status ?? payment.status,
				"CANCELLED",
			);
		}

		queueAfterCommit(() => {
			ctx.logger.info("Payment cancelled", { paymentId });
		});
		return { ...payment, status: "CANCELLED" };
	});
}

// =============================================================================
// EXECUTE SCHEDULED
// =============================================================================

interface ExecutionOutcome {
	payment: Payment;
	failure?: PayrailErrorCode;
}

async function failScheduledPayment(
	ctx: PayrailContext,
	repo: Repository,
	payment: Payment,
	reason: PayrailErrorCode,
): Promise<ExecutionOutcome> {
	const completedAt = new Date();
	const updated = await repo.updatePaymentStatus(payment.paymentId, "SCHEDULED", {
		status: "FAILED",
		completedAt,
	});
	if (updated !== 1) {
		throw PayrailError.transactionIntegrity("Scheduled payment changed during execution", {
			paymentId: payment.paymentId,
		});
	}

	queueAfterCommit(() => {
		ctx.logger.warn("Scheduled payment failed", { paymentId: payment.paymentId, reason });
	});
	return { payment: { ...payment, status: "FAILED", completedAt }, failure: reason };
}

async function runScheduledPayment(
	ctx: PayrailContext,
	paymentId: string,
): Promise<ExecutionOutcome> {
	return withTransaction<ExecutionOutcome>(ctx, async (tx) => {
		const repo = createRepository(tx);
		const payment = await repo.getPayment(paymentId, {
			forUpdate: lockRows(ctx),
		});
		if (!payment) {
			throw PayrailError.paymentNotFound(paymentId);
		}
		if (payment.status !== "SCHEDULED") {
			throw PayrailError.invalidStateTransition(paymentId, payment.status, "COMPLETED");
		}

		// Policy may have changed since the payment was scheduled
		if (ctx.options.blockedCurrencies.has(payment.currency)) {
			return failScheduledPayment(ctx, repo, payment, "PAYMENT_BLOCKED");
		}

		try {
			await authorizeAndDebit(ctx, repo, payment);
		} catch (error) {
			if (isPayrailError(error, "INSUFFICIENT_FUNDS")) {
				return failScheduledPayment(ctx, repo, payment, "INSUFFICIENT_FUNDS");
			}
			throw error;
		}

		const completedAt = new Date();
		const updated = await repo.updatePaymentStatus(paymentId, "SCHEDULED", {
			status: "COMPLETED",
			completedAt,
		});
		if (updated !== 1) {
			throw PayrailError.transactionIntegrity("Scheduled payment changed during execution", {
				paymentId,
			});
		}

		queueAfterCommit(() => {
			ctx.logger.info("Scheduled payment completed", {
				paymentId,
				amount: payment.amount,
				currency: payment.currency,
			});
		});
		return { payment: { ...payment, status: "COMPLETED", completedAt } };
	});
}

/**
 * Execute one SCHEDULED payment now. Insufficient funds or a blocked currency
 * mark it FAILED (committed) and return it; other errors roll back and throw.
 */
export async function executeScheduledPayment(
	ctx: PayrailContext,
	paymentId: string,
): Promise<Payment> {
	const outcome = await runScheduledPayment(ctx, paymentId);
	return outcome.payment;
}

/**
 * Execute every SCHEDULED payment due at `asOf`, oldest first, one
 * transaction each. A failing payment is logged and recorded; the batch continues.
 */
export async function executeDuePayments(
	ctx: PayrailContext,
	asOf: Date = new Date(),
): Promise<DuePaymentsResult> {
	const due = await createRepository(ctx.adapter).listPayments(
		{ status: "SCHEDULED", scheduledUntil: asOf },
		{ field: "scheduledDate", direction: "asc" },
	);

	const result: DuePaymentsResult = { completed: [], failed: [] };
	for (const { paymentId } of due) {
		try {
			const outcome = await runScheduledPayment(ctx, paymentId);
			if (outcome.failure) {
				result.failed.push({ paymentId, code: outcome.failure });
			} else {
				result.completed.push(paymentId);
			}
		} catch (error) {
			const code = isPayrailError(error) ? error.code : "INTERNAL";
			ctx.logger.error("Scheduled payment execution failed", {
				paymentId,
				code,
				error: error instanceof Error ? error.message : String(error),
			});
			result.failed.push({ paymentId, code });
		}
	}
	return result;
}

// =============================================================================
// READ
// =============================================================================

export async function getPayment(ctx: PayrailContext, paymentId: string): Promise<Payment> {
	const payment = await createRepository(ctx.adapter).getPayment(paymentId);
	if (!payment) {
		throw PayrailError.paymentNotFound(paymentId);
	}
	return payment;
}
