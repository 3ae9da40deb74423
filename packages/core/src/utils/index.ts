export {
	formatMoney,
	getCurrencyPrecision,
	getCurrencySymbol,
	getDecimalPlaces,
	minorToDecimal,
	parseAmount,
	parseMinorUnits,
} from "./money.js";
export { isStrongPin, pinsMatch } from "./pin.js";
