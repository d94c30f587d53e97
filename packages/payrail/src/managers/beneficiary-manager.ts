// =============================================================================
// BENEFICIARY MANAGER
// =============================================================================
// Beneficiaries are immutable once added. Deletion is refused while any
// payment references the beneficiary.

import type { Beneficiary, PayrailContext } from "@payrail/core";
import { generateId, isPayrailError, PayrailError } from "@payrail/core";
import { queueAfterCommit } from "@payrail/core/db";
import { type BeneficiaryFilter, createRepository } from "../db/repository.js";
import { withTransaction } from "../infrastructure/transaction.js";
import { requireText } from "./validation.js";

export interface AddBeneficiaryParams {
	name: string;
	accountNumber: string;
	bankCode: string;
}

export async function addBeneficiary(
	ctx: PayrailContext,
	params: AddBeneficiaryParams,
): Promise<Beneficiary> {
	const beneficiary: Beneficiary = {
		beneficiaryId: generateId(),
		name: requireText(params.name, "name"),
		accountNumber: requireText(params.accountNumber, "accountNumber"),
		bankCode: requireText(params.bankCode, "bankCode"),
		createdAt: new Date(),
	};

	const inserted = await createRepository(ctx.adapter).insertBeneficiary(beneficiary);
	if (inserted !== 1) {
		throw PayrailError.internal(`Beneficiary ${beneficiary.beneficiaryId} was not stored`);
	}

	ctx.logger.info("Beneficiary added", {
		beneficiaryId: beneficiary.beneficiaryId,
		bankCode: beneficiary.bankCode,
		accountNumber: beneficiary.accountNumber,
	});
	return beneficiary;
}

export async function getBeneficiary(
	ctx: PayrailContext,
	beneficiaryId: string,
): Promise<Beneficiary> {
	const beneficiary = await createRepository(ctx.adapter).getBeneficiary(beneficiaryId);
	if (!beneficiary) {
		throw PayrailError.beneficiaryNotFound(beneficiaryId);
	}
	return beneficiary;
}

export async function deleteBeneficiary(ctx: PayrailContext, beneficiaryId: string): Promise<void> {
	try {
		await withTransaction(ctx, async (tx) => {
			const repo = createRepository(tx);
			if (!(await repo.getBeneficiary(beneficiaryId))) {
				throw PayrailError.beneficiaryNotFound(beneficiaryId);
			}

			const references = await repo.countPaymentsForBeneficiary(beneficiaryId);
			if (references > 0) {
				throw PayrailError.conflict(
					`Beneficiary ${beneficiaryId} is referenced by ${references} payment(s)`,
					{ details: { beneficiaryId, payments: references } },
				);
			}

			if ((await repo.deleteBeneficiary(beneficiaryId)) !== 1) {
				throw PayrailError.beneficiaryNotFound(beneficiaryId);
			}
			queueAfterCommit(() => {
				ctx.logger.info("Beneficiary deleted", { beneficiaryId });
			});
		});
	} catch (error) {
		// A payment inserted after the count still trips the foreign key
		if (isPayrailError(error, "CONSTRAINT_VIOLATION")) {
			throw PayrailError.conflict(`Beneficiary ${beneficiaryId} is referenced by payments`, {
				cause: error,
				details: { beneficiaryId },
			});
		}
		throw error;
	}
}

/**
 * Name matches case-insensitively anywhere in the beneficiary name; bankCode
 * matches exactly. Results are ordered by creation time.
 */
export async function searchBeneficiaries(
	ctx: PayrailContext,
	filter: BeneficiaryFilter = {},
): Promise<Beneficiary[]> {
	return createRepository(ctx.adapter).listBeneficiaries(filter);
}
