import { randomUUID } from "node:crypto";

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Generate a UUID v4 for accounts, beneficiaries and payments. */
export function generateId(): string {
	return randomUUID();
}

/**
 * Whether `value` has the shape of a record id. Ids are UUID columns, so
 * anything else can never match a stored row.
 */
export function isRecordId(value: string): boolean {
	return UUID.test(value);
}
