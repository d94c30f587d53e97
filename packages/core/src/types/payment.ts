export const PAYMENT_STATUSES = [
	"PENDING",
	"COMPLETED",
	"FAILED",
	"CANCELLED",
	"SCHEDULED",
] as const;

export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export const PAYMENT_TYPES = [
	"TRANSFER",
	"BILL_PAYMENT",
	"WIRE_TRANSFER",
	"ACH",
	"CARD_PAYMENT",
	"IMMEDIATE",
	"SCHEDULED",
] as const;

export type PaymentType = (typeof PAYMENT_TYPES)[number];

/** Types accepted for an immediate payment. SCHEDULED is reserved for future-dated ones. */
export type ImmediatePaymentType = Exclude<PaymentType, "SCHEDULED">;

export interface Payment {
	paymentId: string;
	/** Amount in smallest currency units (cents) */
	amount: number;
	currency: string;
	beneficiaryId: string;
	sourceAccountId: string;
	status: PaymentStatus;
	type: PaymentType;
	/** Set only for SCHEDULED payments */
	scheduledDate: Date | null;
	createdAt: Date;
	/** Set exactly once, when the payment reaches COMPLETED or FAILED */
	completedAt: Date | null;
}

export interface PaymentStatistics {
	totalPayments: number;
	/** Sum of amounts in smallest units across all currencies in the period */
	totalAmount: number;
	statusBreakdown: Partial<Record<PaymentStatus, number>>;
	/** Summed amounts keyed by currency code */
	currencyBreakdown: Record<string, number>;
	typeBreakdown: Partial<Record<PaymentType, number>>;
	period: { start: Date | null; end: Date | null };
	lastUpdated: Date;
}
