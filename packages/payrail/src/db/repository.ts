// =============================================================================
// REPOSITORY — typed access to the payrail tables
// =============================================================================
// Maps adapter rows onto domain records. Every write returns the number of
// rows it affected; callers treat 0 as a failed write. An id that is not a
// UUID matches no row and never reaches the store.

import {
	ACCOUNT_TYPES,
	type Account,
	type AccountType,
	type Beneficiary,
	isRecordId,
	PAYMENT_STATUSES,
	PAYMENT_TYPES,
	type Payment,
	type PaymentStatus,
	type PaymentType,
	PayrailError,
} from "@payrail/core";
import {
	escapeLike,
	type PayrailTransactionAdapter,
	type Row,
	type SortBy,
	type Where,
} from "@payrail/core/db";

// =============================================================================
// ROW READERS
// =============================================================================

function malformed(field: string, value: unknown): PayrailError {
	return PayrailError.internal(`Malformed ${field} in store row: ${String(value)}`);
}

function readString(row: Row, field: string): string {
	const value = row[field];
	if (typeof value !== "string") throw malformed(field, value);
	return value;
}

/** BIGINT columns come back from pg as strings. */
function readInteger(row: Row, field: string): number {
	const value = row[field];
	const parsed =
		typeof value === "number"
			? value
			: typeof value === "bigint" || (typeof value === "string" && /^-?\d+$/.test(value))
				? Number(value)
				: Number.NaN;
	if (!Number.isSafeInteger(parsed)) throw malformed(field, value);
	return parsed;
}

function readDate(row: Row, field: string): Date {
	const value = row[field];
	const date =
		value instanceof Date
			? value
			: typeof value === "string" || typeof value === "number"
				? new Date(value)
				: null;
	if (date === null || Number.isNaN(date.getTime())) throw malformed(field, value);
	return date;
}

function readNullableDate(row: Row, field: string): Date | null {
	const value = row[field];
	return value === null || value === undefined ? null : readDate(row, field);
}

function readEnum<T extends string>(row: Row, field: string, values: readonly T[]): T {
	const value = readString(row, field);
	const match = values.find((v) => v === value);
	if (match === undefined) throw malformed(field, value);
	return match;
}

export function toAccount(row: Row): Account {
	return {
		accountId: readString(row, "accountId"),
		accountType: readEnum(row, "accountType", ACCOUNT_TYPES),
		balance: readInteger(row, "balance"),
		currency: readString(row, "currency"),
		createdAt: readDate(row, "createdAt"),
	};
}

export function toBeneficiary(row: Row): Beneficiary {
	return {
		beneficiaryId: readString(row, "beneficiaryId"),
		name: readString(row, "name"),
		accountNumber: readString(row, "accountNumber"),
		bankCode: readString(row, "bankCode"),
		createdAt: readDate(row, "createdAt"),
	};
}

export function toPayment(row: Row): Payment {
	return {
		paymentId: readString(row, "paymentId"),
		amount: readInteger(row, "amount"),
		currency: readString(row, "currency"),
		beneficiaryId: readString(row, "beneficiaryId"),
		sourceAccountId: readString(row, "sourceAccountId"),
		status: readEnum(row, "status", PAYMENT_STATUSES),
		type: readEnum(row, "type", PAYMENT_TYPES),
		scheduledDate: readNullableDate(row, "scheduledDate"),
		createdAt: readDate(row, "createdAt"),
		completedAt: readNullableDate(row, "completedAt"),
	};
}

// =============================================================================
// FILTERS & SORTING
// =============================================================================

export type SortDirection = "asc" | "desc";

export interface AccountFilter {
	accountType?: AccountType;
	currency?: string;
	minBalance?: number;
	maxBalance?: number;
}

export interface AccountSort {
	field: "balance" | "createdAt" | "accountType";
	direction: SortDirection;
}

export interface BeneficiaryFilter {
	/** Case-insensitive substring of the name */
	name?: string;
	bankCode?: string;
}

export interface PaymentFilter {
	/** Inclusive lower bound on createdAt */
	startDate?: Date;
	/** Inclusive upper bound on createdAt */
	endDate?: Date;
	minAmount?: number;
	maxAmount?: number;
	currency?: string;
	status?: PaymentStatus;
	paymentType?: PaymentType;
	beneficiaryId?: string;
	sourceAccountId?: string;
	/** Inclusive upper bound on scheduledDate */
	scheduledUntil?: Date;
}

export interface PaymentSort {
	field: "createdAt" | "amount" | "scheduledDate";
	direction: SortDirection;
}

/** Collects conditions for the filters that are set; absent filters match all rows. */
function conditions(): {
	add: (field: string, operator: Where["operator"], value: unknown) => void;
	where: Where[];
} {
	const where: Where[] = [];
	return {
		add: (field, operator, value) => {
			if (value !== undefined) where.push({ field, operator, value });
		},
		where,
	};
}

/** Requested key first, then createdAt ascending, then the primary key. */
function stableSort(primaryKey: string, sort?: SortBy): SortBy[] {
	const keys: SortBy[] = sort ? [sort] : [];
	if (sort?.field !== "createdAt") keys.push({ field: "createdAt", direction: "asc" });
	keys.push({ field: primaryKey, direction: "asc" });
	return keys;
}

// =============================================================================
// REPOSITORY
// =============================================================================

export interface Repository {
	getAccount(accountId: string, options?: { forUpdate?: boolean }): Promise<Account | null>;
	getBeneficiary(beneficiaryId: string): Promise<Beneficiary | null>;
	getPayment(paymentId: string, options?: { forUpdate?: boolean }): Promise<Payment | null>;
	/** Conditional debit: only applies while the balance covers `amount`. */
	debitAccount(accountId: string, amount: number): Promise<number>;
	insertAccount(account: Account): Promise<number>;
	insertBeneficiary(beneficiary: Beneficiary): Promise<number>;
	insertPayment(payment: Payment): Promise<number>;
	/** Compare-and-set on the current status. */
	updatePaymentStatus(
		paymentId: string,
		fromStatus: PaymentStatus,
		patch: { status: PaymentStatus; completedAt?: Date },
	): Promise<number>;
	deleteBeneficiary(beneficiaryId: string): Promise<number>;
	countPaymentsForBeneficiary(beneficiaryId: string): Promise<number>;
	listAccounts(filter?: AccountFilter, sort?: AccountSort): Promise<Account[]>;
	listBeneficiaries(filter?: BeneficiaryFilter): Promise<Beneficiary[]>;
	listPayments(filter?: PaymentFilter, sort?: PaymentSort, limit?: number): Promise<Payment[]>;
}

/**
 * Create a repository over an adapter or a transaction handle.
 *
 * @example
 * ```ts
 * await ctx.adapter.transaction(async (tx) => {
 *   const repo = createRepository(tx);
 *   const affected = await repo.debitAccount(accountId, 4000);
 * });
 * ```
 */
export function createRepository(adapter: PayrailTransactionAdapter): Repository {
	return {
		async getAccount(accountId, options) {
			if (!isRecordId(accountId)) return null;
			const row = await adapter.findOne({
				model: "accounts",
				where: [{ field: "accountId", operator: "eq", value: accountId }],
				forUpdate: options?.forUpdate,
			});
			return row ? toAccount(row) : null;
		},

		async getBeneficiary(beneficiaryId) {
			if (!isRecordId(beneficiaryId)) return null;
			const row = await adapter.findOne({
				model: "beneficiaries",
				where: [{ field: "beneficiaryId", operator: "eq", value: beneficiaryId }],
			});
			return row ? toBeneficiary(row) : null;
		},

		async getPayment(paymentId, options) {
			if (!isRecordId(paymentId)) return null;
			const row = await adapter.findOne({
				model: "payments",
				where: [{ field: "paymentId", operator: "eq", value: paymentId }],
				forUpdate: options?.forUpdate,
			});
			return row ? toPayment(row) : null;
		},

		debitAccount(accountId, amount) {
			return adapter.update({
				model: "accounts",
				where: [
					{ field: "accountId", operator: "eq", value: accountId },
					{ field: "balance", operator: "gte", value: amount },
				],
				increment: { balance: -amount },
			});
		},

		insertAccount(account) {
			return adapter.create({ model: "accounts", data: { ...account } });
		},

		insertBeneficiary(beneficiary) {
			return adapter.create({ model: "beneficiaries", data: { ...beneficiary } });
		},

		insertPayment(payment) {
			return adapter.create({ model: "payments", data: { ...payment } });
		},

		updatePaymentStatus(paymentId, fromStatus, patch) {
			return adapter.update({
				model: "payments",
				where: [
					{ field: "paymentId", operator: "eq", value: paymentId },
					{ field: "status", operator: "eq", value: fromStatus },
				],
				update: { ...patch },
			});
		},

		async deleteBeneficiary(beneficiaryId) {
			if (!isRecordId(beneficiaryId)) return 0;
			return adapter.delete({
				model: "beneficiaries",
				where: [{ field: "beneficiaryId", operator: "eq", value: beneficiaryId }],
			});
		},

		async countPaymentsForBeneficiary(beneficiaryId) {
			if (!isRecordId(beneficiaryId)) return 0;
			return adapter.count({
				model: "payments",
				where: [{ field: "beneficiaryId", operator: "eq", value: beneficiaryId }],
			});
		},

		async listAccounts(filter = {}, sort) {
			const c = conditions();
			c.add("accountType", "eq", filter.accountType);
			c.add("currency", "eq", filter.currency);
			c.add("balance", "gte", filter.minBalance);
			c.add("balance", "lte", filter.maxBalance);

			const rows = await adapter.findMany({
				model: "accounts",
				where: c.where,
				sortBy: stableSort("accountId", sort),
			});
			return rows.map(toAccount);
		},

		async listBeneficiaries(filter = {}) {
			const c = conditions();
			c.add("name", "ilike", filter.name === undefined ? undefined : `%${escapeLike(filter.name)}%`);
			c.add("bankCode", "eq", filter.bankCode);

			const rows = await adapter.findMany({
				model: "beneficiaries",
				where: c.where,
				sortBy: stableSort("beneficiaryId"),
			});
			return rows.map(toBeneficiary);
		},

		async listPayments(filter = {}, sort, limit) {
			const ids = [filter.beneficiaryId, filter.sourceAccountId];
			if (ids.some((id) => id !== undefined && !isRecordId(id))) return [];

			const c = conditions();
			c.add("createdAt", "gte", filter.startDate);
			c.add("createdAt", "lte", filter.endDate);
			c.add("amount", "gte", filter.minAmount);
			c.add("amount", "lte", filter.maxAmount);
			c.add("currency", "eq", filter.currency);
			c.add("status", "eq", filter.status);
			c.add("type", "eq", filter.paymentType);
			c.add("beneficiaryId", "eq", filter.beneficiaryId);
			c.add("sourceAccountId", "eq", filter.sourceAccountId);
			c.add("scheduledDate", "lte", filter.scheduledUntil);

			const rows = await adapter.findMany({
				model: "payments",
				where: c.where,
				sortBy: stableSort("paymentId", sort),
				limit,
			});
			return rows.map(toPayment);
		},
	};
}
