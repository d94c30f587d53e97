export { generateId, isRecordId } from "./id.js";
export {
	decimalToMinor,
	getCurrencyPrecision,
	getDecimalPlaces,
	isCurrencyCode,
	minorToDecimal,
} from "./money.js";
