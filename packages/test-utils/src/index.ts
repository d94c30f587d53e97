export {
	assertAccountBalance,
	assertBalanceConserved,
	assertPaymentCount,
} from "./assertions.js";
export {
	getTestInstance,
	seedAccount,
	seedBeneficiary,
	silentLogger,
	type TestInstance,
	type TestInstanceOptions,
} from "./get-test-instance.js";
