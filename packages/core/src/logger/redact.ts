// =============================================================================
// PII REDACTION — shared by the console and JSON loggers
// =============================================================================

export const DEFAULT_REDACT_KEYS: readonly string[] = [
	"accountNumber",
	"account_number",
	"password",
	"token",
	"secret",
];

const MAX_DEPTH = 4;

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return (
		typeof value === "object" &&
		value !== null &&
		!Array.isArray(value) &&
		!(value instanceof Date)
	);
}

/**
 * Replace values under redacted keys with "[REDACTED]", descending into
 * nested plain objects. The input is never mutated.
 */
export function redactData(
	data: Record<string, unknown> | undefined,
	keys: ReadonlySet<string>,
	depth = 0,
): Record<string, unknown> | undefined {
	if (!data || keys.size === 0) return data;

	let redacted: Record<string, unknown> | undefined;
	for (const [key, value] of Object.entries(data)) {
		let next = value;
		if (keys.has(key)) {
			next = "[REDACTED]";
		} else if (depth < MAX_DEPTH && isPlainObject(value)) {
			next = redactData(value, keys, depth + 1);
		}
		if (next !== value) {
			redacted ??= { ...data };
			redacted[key] = next;
		}
	}
	return redacted ?? data;
}

/** Build the redaction key set from user-provided keys, or the defaults. */
export function buildRedactKeys(userKeys?: string[]): Set<string> {
	return new Set(userKeys ?? DEFAULT_REDACT_KEYS);
}
