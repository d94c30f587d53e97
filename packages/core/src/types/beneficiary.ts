export interface Beneficiary {
	beneficiaryId: string;
	name: string;
	accountNumber: string;
	bankCode: string;
	createdAt: Date;
}
