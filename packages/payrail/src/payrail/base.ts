// =============================================================================
// PAYRAIL -- Main entry point
// =============================================================================
// Creates the Payrail instance that provides the payment service API.

import type {
	Account,
	AccountBalance,
	AccountSummary,
	Beneficiary,
	PayrailContext,
	PayrailOptions,
	Payment,
	PaymentStatistics,
} from "@payrail/core";
import { buildContext } from "../context/context.js";
import type { BeneficiaryFilter } from "../db/repository.js";
import * as accounts from "../managers/account-manager.js";
import * as beneficiaries from "../managers/beneficiary-manager.js";
import * as payments from "../managers/payment-manager.js";
import * as queries from "../managers/query-manager.js";

// =============================================================================
// PAYRAIL INTERFACE
// =============================================================================

export interface Payrail {
	accounts: {
		add: (params: accounts.AddAccountParams) => Promise<Account>;
		addMany: (list: accounts.AddAccountParams[]) => Promise<Account[]>;
		get: (accountId: string) => Promise<Account>;
		getBalance: (accountId: string) => Promise<AccountBalance>;
		list: (params?: accounts.ListAccountsParams) => Promise<Account[]>;
		summary: () => Promise<AccountSummary>;
	};
	beneficiaries: {
		add: (params: beneficiaries.AddBeneficiaryParams) => Promise<Beneficiary>;
		get: (beneficiaryId: string) => Promise<Beneficiary>;
		delete: (beneficiaryId: string) => Promise<void>;
		search: (filter?: BeneficiaryFilter) => Promise<Beneficiary[]>;
	};
	payments: {
		initiate: (params: payments.InitiatePaymentParams) => Promise<Payment>;
		schedule: (params: payments.SchedulePaymentParams) => Promise<Payment>;
		cancel: (paymentId: string) => Promise<Payment>;
		get: (paymentId: string) => Promise<Payment>;
		executeScheduled: (paymentId: string) => Promise<Payment>;
		/** Run every SCHEDULED payment due at or before `asOf` (default: now). */
		executeDue: (asOf?: Date) => Promise<payments.DuePaymentsResult>;
		search: (
			filter?: queries.PaymentHistoryFilter,
			options?: queries.PaymentHistoryOptions,
		) => Promise<Payment[]>;
		statistics: (period?: { startDate?: Date; endDate?: Date }) => Promise<PaymentStatistics>;
	};
	/** Resolved context, for tools, resources and tests. */
	$context: PayrailContext;
	$options: PayrailOptions;
}

// =============================================================================
// CREATE PAYRAIL
// =============================================================================

/**
 * Create a payrail instance over a ledger store adapter.
 *
 * @example
 * ```ts
 * import { createPayrail } from "payrail";
 * import { drizzleAdapter } from "@payrail/drizzle-adapter";
 *
 * const payrail = createPayrail({ database: drizzleAdapter(db), currency: "USD" });
 * const payment = await payrail.payments.initiate({
 *   amount: 6000,
 *   currency: "USD",
 *   beneficiaryId,
 *   sourceAccountId,
 * });
 * ```
 */
export function createPayrail(options: PayrailOptions): Payrail {
	const ctx = buildContext(options);

	return {
		accounts: {
			add: (params) => accounts.addAccount(ctx, params),
			addMany: (list) => accounts.addMultipleAccounts(ctx, list),
			get: (accountId) => accounts.getAccount(ctx, accountId),
			getBalance: (accountId) => accounts.getAccountBalance(ctx, accountId),
			list: (params) => accounts.listAccounts(ctx, params),
			summary: () => accounts.getAccountSummary(ctx),
		},
		beneficiaries: {
			add: (params) => beneficiaries.addBeneficiary(ctx, params),
			get: (beneficiaryId) => beneficiaries.getBeneficiary(ctx, beneficiaryId),
			delete: (beneficiaryId) => beneficiaries.deleteBeneficiary(ctx, beneficiaryId),
			search: (filter) => beneficiaries.searchBeneficiaries(ctx, filter),
		},
		payments: {
			initiate: (params) => payments.initiatePayment(ctx, params),
			schedule: (params) => payments.schedulePayment(ctx, params),
			cancel: (paymentId) => payments.cancelPayment(ctx, paymentId),
			get: (paymentId) => payments.getPayment(ctx, paymentId),
			executeScheduled: (paymentId) => payments.executeScheduledPayment(ctx, paymentId),
			executeDue: (asOf) => payments.executeDuePayments(ctx, asOf),
			search: (filter, queryOptions) => queries.searchPaymentHistory(ctx, filter, queryOptions),
			statistics: (period) => queries.getPaymentStatistics(ctx, period),
		},
		$context: ctx,
		$options: options,
	};
}
