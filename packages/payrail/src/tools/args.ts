// =============================================================================
// TOOL ARGUMENTS — typed readers over untrusted JSON input
// =============================================================================
// Every reader throws INVALID_ARGUMENT naming the offending key. A null value
// counts as absent.

import { PayrailError } from "@payrail/core";

export type ToolArgs = Readonly<Record<string, unknown>>;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Accepts a JSON object; an absent body reads as no arguments. */
export function toToolArgs(input: unknown): ToolArgs {
	if (input === undefined || input === null) return {};
	if (!isRecord(input)) {
		throw PayrailError.invalidArgument("Tool arguments must be a JSON object");
	}
	return input;
}

function present(args: ToolArgs, key: string): unknown {
	const value = args[key];
	return value === null ? undefined : value;
}

function missing(key: string): PayrailError {
	return PayrailError.invalidArgument(`'${key}' is required`, { field: key });
}

// =============================================================================
// STRINGS
// =============================================================================

export function optionalString(args: ToolArgs, key: string): string | undefined {
	const value = present(args, key);
	if (value === undefined) return undefined;
	if (typeof value !== "string") {
		throw PayrailError.invalidArgument(`'${key}' must be a string`, { field: key });
	}
	return value;
}

export function requireString(args: ToolArgs, key: string): string {
	const value = optionalString(args, key);
	if (value === undefined) throw missing(key);
	return value;
}

// =============================================================================
// NUMBERS
// =============================================================================

export function optionalNumber(args: ToolArgs, key: string): number | undefined {
	const value = present(args, key);
	if (value === undefined) return undefined;
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw PayrailError.invalidArgument(`'${key}' must be a number`, { field: key });
	}
	return value;
}

export function requireNumber(args: ToolArgs, key: string): number {
	const value = optionalNumber(args, key);
	if (value === undefined) throw missing(key);
	return value;
}

export function optionalInteger(args: ToolArgs, key: string): number | undefined {
	const value = optionalNumber(args, key);
	if (value !== undefined && !Number.isSafeInteger(value)) {
		throw PayrailError.invalidArgument(`'${key}' must be an integer`, { field: key });
	}
	return value;
}

// =============================================================================
// ENUMS
// =============================================================================

export function optionalEnum<const T extends string>(
	args: ToolArgs,
	key: string,
	values: readonly T[],
): T | undefined {
	const value = optionalString(args, key);
	if (value === undefined) return undefined;
	const match = values.find((candidate) => candidate === value);
	if (match === undefined) {
		throw PayrailError.invalidArgument(`'${key}' must be one of: ${values.join(", ")}`, {
			field: key,
			value,
		});
	}
	return match;
}

export function requireEnum<const T extends string>(
	args: ToolArgs,
	key: string,
	values: readonly T[],
): T {
	const value = optionalEnum(args, key, values);
	if (value === undefined) throw missing(key);
	return value;
}

// =============================================================================
// DATES & LISTS
// =============================================================================

export function optionalDate(args: ToolArgs, key: string): Date | undefined {
	const value = optionalString(args, key);
	if (value === undefined) return undefined;
	const parsed = new Date(value);
	if (!ISO_DATE.test(value) || Number.isNaN(parsed.getTime())) {
		throw PayrailError.invalidArgument(`'${key}' must be an ISO 8601 date`, {
			field: key,
			value,
		});
	}
	return parsed;
}

export function requireDate(args: ToolArgs, key: string): Date {
	const value = optionalDate(args, key);
	if (value === undefined) throw missing(key);
	return value;
}

/** A required, non-empty array of argument objects. */
export function requireObjectList(args: ToolArgs, key: string): ToolArgs[] {
	const value = present(args, key);
	if (value === undefined) throw missing(key);
	if (!Array.isArray(value) || value.length === 0) {
		throw PayrailError.invalidArgument(`'${key}' must be a non-empty array`, { field: key });
	}
	return value.map((item, index) => {
		if (!isRecord(item)) {
			throw PayrailError.invalidArgument(`'${key}[${index}]' must be an object`, {
				field: key,
				index,
			});
		}
		return item;
	});
}
