// =============================================================================
// QUERY MANAGER -- payment history and statistics
// =============================================================================

import type { PayrailContext, Payment, PaymentStatistics } from "@payrail/core";
import { PAYMENT_STATUSES, PAYMENT_TYPES, PayrailError } from "@payrail/core";
import { createRepository, type PaymentFilter, type PaymentSort } from "../db/repository.js";
import { assertCurrency } from "./validation.js";

export type PaymentHistoryFilter = Omit<PaymentFilter, "scheduledUntil">;

export interface PaymentHistoryOptions {
	/** Default: "createdAt" */
	sortBy?: PaymentSort["field"];
	/** Default: "desc" */
	sortOrder?: PaymentSort["direction"];
	limit?: number;
}

function assertPeriod(start: Date | undefined, end: Date | undefined): void {
	for (const [field, value] of [
		["startDate", start],
		["endDate", end],
	] as const) {
		if (value !== undefined && Number.isNaN(value.getTime())) {
			throw PayrailError.invalidArgument(`${field} must be a valid date`, { field });
		}
	}
	if (start && end && start.getTime() > end.getTime()) {
		throw PayrailError.invalidArgument("startDate must not be after endDate", {
			startDate: start.toISOString(),
			endDate: end.toISOString(),
		});
	}
}

/**
 * Filter payments. All filters combine with AND; date bounds are inclusive
 * and apply to `createdAt`.
 *
 * @example
 * ```ts
 * const recent = await searchPaymentHistory(ctx, { status: "COMPLETED" }, { limit: 10 });
 * ```
 */
export async function searchPaymentHistory(
	ctx: PayrailContext,
	filter: PaymentHistoryFilter = {},
	options: PaymentHistoryOptions = {},
): Promise<Payment[]> {
	const { sortBy = "createdAt", sortOrder = "desc", limit } = options;

	assertPeriod(filter.startDate, filter.endDate);
	if (filter.currency !== undefined) assertCurrency(filter.currency);
	if (filter.status !== undefined && !PAYMENT_STATUSES.includes(filter.status)) {
		throw PayrailError.invalidArgument(`Unknown payment status "${filter.status}"`);
	}
	if (filter.paymentType !== undefined && !PAYMENT_TYPES.includes(filter.paymentType)) {
		throw PayrailError.invalidArgument(`Unknown payment type "${filter.paymentType}"`);
	}
	if (limit !== undefined && (!Number.isSafeInteger(limit) || limit <= 0)) {
		throw PayrailError.invalidArgument(`limit must be a positive integer, got ${limit}`, {
			limit,
		});
	}

	return createRepository(ctx.adapter).listPayments(
		filter,
		{ field: sortBy, direction: sortOrder },
		limit,
	);
}

export async function getPaymentStatistics(
	ctx: PayrailContext,
	period: { startDate?: Date; endDate?: Date } = {},
): Promise<PaymentStatistics> {
	assertPeriod(period.startDate, period.endDate);

	const payments = await createRepository(ctx.adapter).listPayments({
		startDate: period.startDate,
		endDate: period.endDate,
	});

	const stats: PaymentStatistics = {
		totalPayments: payments.length,
		totalAmount: 0,
		statusBreakdown: {},
		currencyBreakdown: {},
		typeBreakdown: {},
		period: { start: period.startDate ?? null, end: period.endDate ?? null },
		lastUpdated: new Date(),
	};

	for (const payment of payments) {
		stats.totalAmount += payment.amount;
		stats.statusBreakdown[payment.status] = (stats.statusBreakdown[payment.status] ?? 0) + 1;
		stats.typeBreakdown[payment.type] = (stats.typeBreakdown[payment.type] ?? 0) + 1;
		stats.currencyBreakdown[payment.currency] =
			(stats.currencyBreakdown[payment.currency] ?? 0) + payment.amount;
	}

	return stats;
}
