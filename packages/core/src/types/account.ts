export const ACCOUNT_TYPES = [
	"CHECKING",
	"SAVINGS",
	"CREDIT",
	"INVESTMENT",
	"FIXED_DEPOSIT",
	"LOAN",
] as const;

export type AccountType = (typeof ACCOUNT_TYPES)[number];

export interface Account {
	accountId: string;
	accountType: AccountType;
	/** Balance in smallest currency units (cents) */
	balance: number;
	currency: string;
	createdAt: Date;
}

export interface AccountBalance {
	accountId: string;
	/** Balance in smallest currency units (cents) */
	balance: number;
	currency: string;
}

export interface AccountSummary {
	totalAccounts: number;
	/** Summed balances keyed by currency code, in smallest units */
	balanceByCurrency: Record<string, number>;
	accountsByType: Partial<Record<AccountType, number>>;
	lastUpdated: Date;
}
