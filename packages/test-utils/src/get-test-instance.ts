import type {
	Account,
	Beneficiary,
	PayrailAdapter,
	PayrailLogger,
	PayrailOptions,
} from "@payrail/core";
import { memoryAdapter } from "@payrail/memory-adapter";
import { createPayrail, getPayrailTables, type Payrail } from "payrail";

export const silentLogger: PayrailLogger = {
	info: () => {},
	warn: () => {},
	error: () => {},
	debug: () => {},
};

export interface TestInstanceOptions {
	/** Store adapter. Default: a fresh memory adapter with the payrail tables */
	adapter?: PayrailAdapter;
	/** Currency. Default: "USD" */
	currency?: string;
	blockedCurrencies?: string[];
	advanced?: PayrailOptions["advanced"];
	/** Default: a logger that discards everything */
	logger?: PayrailLogger;
}

export interface TestInstance {
	/** The payrail instance */
	payrail: Payrail;
	/** The store behind it, for row-level checks */
	adapter: PayrailAdapter;
}

export function getTestInstance(options: TestInstanceOptions = {}): TestInstance {
	const adapter = options.adapter ?? memoryAdapter({ tables: getPayrailTables() });
	const payrail = createPayrail({
		database: adapter,
		currency: options.currency ?? "USD",
		blockedCurrencies: options.blockedCurrencies,
		advanced: options.advanced,
		logger: options.logger ?? silentLogger,
	});

	return { payrail, adapter };
}

/** Add a CHECKING account holding `balance` minor units. */
export function seedAccount(
	payrail: Payrail,
	balance: number,
	currency = payrail.$context.options.currency,
): Promise<Account> {
	return payrail.accounts.add({ accountType: "CHECKING", balance, currency });
}

export function seedBeneficiary(payrail: Payrail, name = "Test Payee"): Promise<Beneficiary> {
	return payrail.beneficiaries.add({ name, accountNumber: "000123456789", bankCode: "TESTBANK" });
}
