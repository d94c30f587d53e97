// =============================================================================
// RESOURCES — read-only lookups addressed by URI
// =============================================================================

import { PayrailError } from "@payrail/core";
import type { Payrail } from "../payrail/base.js";
import { presentAccount, presentBalance, presentBeneficiary, presentPayment } from "./present.js";

export interface ResourceDefinition {
	/** URI template, e.g. `account://{account_id}` */
	uriTemplate: string;
	description: string;
}

export interface ResourceContents {
	uri: string;
	mimeType: "application/json";
	text: string;
}

interface ResourceRoute {
	pattern: RegExp;
	read: (payrail: Payrail, id: string) => Promise<unknown>;
}

export const RESOURCES: readonly ResourceDefinition[] = [
	{ uriTemplate: "account://{account_id}", description: "A single account" },
	{ uriTemplate: "balance://{account_id}", description: "Current balance of an account" },
	{ uriTemplate: "accounts://all", description: "Every account, highest balance first" },
	{ uriTemplate: "beneficiaries://all", description: "Every beneficiary, oldest first" },
	{ uriTemplate: "payment://{payment_id}", description: "A single payment" },
	{ uriTemplate: "payments://all", description: "Every payment, newest first" },
];

const ROUTES: readonly ResourceRoute[] = [
	{
		pattern: /^accounts:\/\/all$/,
		read: async (payrail) => (await payrail.accounts.list()).map(presentAccount),
	},
	{
		pattern: /^beneficiaries:\/\/all$/,
		read: async (payrail) => (await payrail.beneficiaries.search()).map(presentBeneficiary),
	},
	{
		pattern: /^payments:\/\/all$/,
		read: async (payrail) => (await payrail.payments.search()).map(presentPayment),
	},
	{
		pattern: /^account:\/\/([^/]+)$/,
		read: async (payrail, id) => presentAccount(await payrail.accounts.get(id)),
	},
	{
		pattern: /^balance:\/\/([^/]+)$/,
		read: async (payrail, id) => presentBalance(await payrail.accounts.getBalance(id)),
	},
	{
		pattern: /^payment:\/\/([^/]+)$/,
		read: async (payrail, id) => presentPayment(await payrail.payments.get(id)),
	},
];

function decodeSegment(segment: string, uri: string): string {
	try {
		return decodeURIComponent(segment);
	} catch {
		throw PayrailError.notFound(`Unknown resource: ${uri}`, { uri });
	}
}

/**
 * Read a resource by URI. Unknown URIs raise NOT_FOUND; a missing record
 * raises the not-found code of its kind.
 *
 * @example
 * ```ts
 * const { text } = await readResource(payrail, `balance://${accountId}`);
 * ```
 */
export async function readResource(payrail: Payrail, uri: string): Promise<ResourceContents> {
	for (const route of ROUTES) {
		const match = route.pattern.exec(uri);
		if (!match) continue;
		const body = await route.read(payrail, decodeSegment(match[1] ?? "", uri));
		return { uri, mimeType: "application/json", text: JSON.stringify(body, null, 2) };
	}
	throw PayrailError.notFound(`Unknown resource: ${uri}`, { uri });
}
