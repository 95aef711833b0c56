export { CURRENCY_DECIMALS } from "./currencies.js";
export { addCalendarDays, addCalendarMonths, addHoursTo, compactTimestamp } from "./dates.js";
export { hashLockKey } from "./lock.js";
export {
	applyRate,
	assertMinorUnits,
	getCurrencyPrecision,
	getDecimalPlaces,
	isMinorUnits,
	isSupportedCurrency,
	minorToDecimal,
	PPM,
	parseAmount,
	rateToPpm,
} from "./money.js";
export {
	generateCustomerCode,
	generateId,
	generateReference,
	type ReferencePrefix,
} from "./reference.js";
export { optionalString, requireOneOf, requirePositiveInteger, requireString } from "./validate.js";
