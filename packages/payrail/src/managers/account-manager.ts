// =============================================================================
// ACCOUNT MANAGER -- account creation, lookup, listing and summaries
// =============================================================================
// Balances are written here only on creation; afterwards the payment manager
// is the only writer.

import type {
	Account,
	AccountBalance,
	AccountSummary,
	AccountType,
	PayrailContext,
} from "@payrail/core";
import { generateId, PayrailError } from "@payrail/core";
import { queueAfterCommit } from "@payrail/core/db";
import { type AccountFilter, type AccountSort, createRepository } from "../db/repository.js";
import { withTransaction } from "../infrastructure/transaction.js";
import { assertAccountType, assertBalance, assertCurrency } from "./validation.js";

export interface AddAccountParams {
	accountType: AccountType;
	/** Opening balance in minor units */
	balance: number;
	/** Default: the configured currency */
	currency?: string;
}

export interface ListAccountsParams extends AccountFilter {
	/** Default: "balance" */
	sortBy?: AccountSort["field"];
	/** Default: "desc" */
	sortOrder?: AccountSort["direction"];
}

function buildAccount(ctx: PayrailContext, params: AddAccountParams): Account {
	const currency = params.currency ?? ctx.options.currency;
	assertAccountType(params.accountType);
	assertBalance(params.balance);
	assertCurrency(currency);

	return {
		accountId: generateId(),
		accountType: params.accountType,
		balance: params.balance,
		currency,
		createdAt: new Date(),
	};
}

// =============================================================================
// CREATE
// =============================================================================

export async function addAccount(ctx: PayrailContext, params: AddAccountParams): Promise<Account> {
	const account = buildAccount(ctx, params);

	const inserted = await createRepository(ctx.adapter).insertAccount(account);
	if (inserted !== 1) {
		throw PayrailError.internal(`Account ${account.accountId} was not stored`);
	}

	ctx.logger.info("Account added", {
		accountId: account.accountId,
		accountType: account.accountType,
		currency: account.currency,
	});
	return account;
}

/** Add several accounts in one transaction. Either all are stored or none. */
export async function addMultipleAccounts(
	ctx: PayrailContext,
	list: AddAccountParams[],
): Promise<Account[]> {
	if (list.length === 0) {
		throw PayrailError.invalidArgument("accounts must not be empty");
	}

	const accounts = list.map((params, index) => {
		try {
			return buildAccount(ctx, params);
		} catch (error) {
			if (error instanceof PayrailError) {
				throw PayrailError.invalidArgument(`accounts[${index}]: ${error.message}`, {
					...error.details,
					index,
				});
			}
			throw error;
		}
	});

	return withTransaction(ctx, async (tx) => {
		const repo = createRepository(tx);
		for (const account of accounts) {
			if ((await repo.insertAccount(account)) !== 1) {
				throw PayrailError.internal(`Account ${account.accountId} was not stored`);
			}
		}
		queueAfterCommit(() => {
			ctx.logger.info("Accounts added", { count: accounts.length });
		});
		return accounts;
	});
}

// =============================================================================
// READ
// =============================================================================

export async function getAccount(ctx: PayrailContext, accountId: string): Promise<Account> {
	const account = await createRepository(ctx.adapter).getAccount(accountId);
	if (!account) {
		throw PayrailError.accountNotFound(accountId);
	}
	return account;
}

export async function getAccountBalance(
	ctx: PayrailContext,
	accountId: string,
): Promise<AccountBalance> {
	const { balance, currency } = await getAccount(ctx, accountId);
	return { accountId, balance, currency };
}

export async function listAccounts(
	ctx: PayrailContext,
	params: ListAccountsParams = {},
): Promise<Account[]> {
	const { sortBy = "balance", sortOrder = "desc", ...filter } = params;
	if (filter.accountType !== undefined) assertAccountType(filter.accountType);
	if (filter.currency !== undefined) assertCurrency(filter.currency);

	return createRepository(ctx.adapter).listAccounts(filter, {
		field: sortBy,
		direction: sortOrder,
	});
}

export async function getAccountSummary(ctx: PayrailContext): Promise<AccountSummary> {
	const accounts = await createRepository(ctx.adapter).listAccounts();

	const balanceByCurrency: Record<string, number> = {};
	const accountsByType: Partial<Record<AccountType, number>> = {};
	for (const account of accounts) {
		balanceByCurrency[account.currency] = (balanceByCurrency[account.currency] ?? 0) + account.balance;
		accountsByType[account.accountType] = (accountsByType[account.accountType] ?? 0) + 1;
	}

	return {
		totalAccounts: accounts.length,
		balanceByCurrency,
		accountsByType,
		lastUpdated: new Date(),
	};
}
