import type { TellerOptions } from "@atm-teller/core";
import { TellerError } from "@atm-teller/core";

const VALID_CURRENCIES = new Set(Intl.supportedValuesOf("currency"));

/**
 * Validate Teller configuration options at runtime.
 * Throws TellerError with INVALID_ARGUMENT on invalid configuration.
 */
export function validateConfig(options: TellerOptions): void {
	if (!options.store) {
		throw TellerError.invalidArgument("Teller config: 'store' is required");
	}

	if (options.currency !== undefined && !VALID_CURRENCIES.has(options.currency)) {
		throw TellerError.invalidArgument(
			`Teller config: unknown currency "${options.currency}". Use a valid ISO 4217 code.`,
		);
	}

	if (
		options.statementLimit !== undefined &&
		(!Number.isInteger(options.statementLimit) || options.statementLimit < 1)
	) {
		throw TellerError.invalidArgument(
			"Teller config: 'statementLimit' must be a positive integer",
		);
	}
}
