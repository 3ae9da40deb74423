import { TellerError } from "../error/index.js";

const AMOUNT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const CURRENCY_SYMBOLS: Record<string, string> = {
	INR: "₹",
	USD: "$",
	EUR: "€",
	GBP: "£",
	JPY: "¥",
};

/**
 * Convert smallest units (paise/cents) to decimal string.
 * 25490 → "254.90"
 */
export function minorToDecimal(amount: number, currency = "INR"): string {
	const precision = getCurrencyPrecision(currency);
	const major = amount / precision;
	const decimals = getDecimalPlaces(currency);
	return major.toFixed(decimals);
}

/**
 * Render an amount with its currency glyph.
 * 520000 INR → "₹5200.00"
 */
export function formatMoney(amount: number, currency = "INR"): string {
	return `${getCurrencySymbol(currency)}${minorToDecimal(amount, currency)}`;
}

/** Glyph shown before amounts. Unknown codes fall back to "<CODE> ". */
export function getCurrencySymbol(currency: string): string {
	return CURRENCY_SYMBOLS[currency] ?? `${currency} `;
}

/**
 * Get precision (subunit count) for a currency.
 * INR → 100 (100 paise = 1 rupee)
 * USD → 100 (100 cents = 1 dollar)
 */
export function getCurrencyPrecision(currency: string): number {
	switch (currency) {
		case "JPY":
		case "KRW":
			return 1;
		case "BHD":
		case "KWD":
			return 1000;
		default:
			return 100;
	}
}

/**
 * Get decimal places for display.
 */
export function getDecimalPlaces(currency: string): number {
	switch (currency) {
		case "JPY":
		case "KRW":
			return 0;
		case "BHD":
		case "KWD":
			return 3;
		default:
			return 2;
	}
}

/**
 * Parse user input in major units into smallest units, rounding to the
 * currency's precision. Returns null when the text is not a finite number.
 *
 * "200" → 20000, "0.29" → 29, "abc" → null
 */
export function parseMinorUnits(input: string | number, currency = "INR"): number | null {
	let major: number;
	if (typeof input === "number") {
		major = input;
	} else {
		const trimmed = input.trim();
		if (!AMOUNT_PATTERN.test(trimmed)) return null;
		major = Number(trimmed);
	}
	if (!Number.isFinite(major)) return null;

	const minor = Math.round(major * getCurrencyPrecision(currency));
	if (!Number.isSafeInteger(minor)) return null;
	// Math.round(-0.001) is -0
	return minor === 0 ? 0 : minor;
}

/**
 * Parse a transaction amount. Throws INVALID_AMOUNT when the input is not a
 * number or is not strictly positive once rounded to smallest units.
 */
export function parseAmount(input: string | number, currency = "INR"): number {
	const minor = parseMinorUnits(input, currency);
	if (minor === null) {
		throw TellerError.invalidAmount("Invalid amount.");
	}
	if (minor <= 0) {
		throw TellerError.invalidAmount("Amount must be positive.");
	}
	return minor;
}
