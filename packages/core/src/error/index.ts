import { BASE_ERROR_CODES, type BaseErrorCode } from "./codes.js";

export { BASE_ERROR_CODES, type BaseErrorCode, type RawErrorCode } from "./codes.js";

export type TellerErrorCode = BaseErrorCode;

export class TellerError extends Error {
	readonly code: TellerErrorCode;
	readonly details?: Record<string, unknown>;
	/**
	 * Whether the error should end the program instead of returning to the menu.
	 *
	 * - `true`: corrupt snapshot or internal failure.
	 * - `false`: a rejected operation; state is unchanged.
	 */
	readonly fatal: boolean;

	constructor(
		code: TellerErrorCode,
		message: string,
		options?: {
			cause?: unknown;
			fatal?: boolean;
			details?: Record<string, unknown>;
		},
	) {
		super(message, { cause: options?.cause });
		this.code = code;
		this.fatal = options?.fatal ?? false;
		this.details = options?.details;
		this.name = "TellerError";
	}

	/**
	 * Create a TellerError from a typed error code.
	 * Uses the default message and fatality from BASE_ERROR_CODES.
	 */
	static fromCode(
		code: TellerErrorCode,
		options?: { message?: string; cause?: unknown; details?: Record<string, unknown> },
	): TellerError {
		const raw = BASE_ERROR_CODES[code];
		return new TellerError(code, options?.message ?? raw.message, {
			cause: options?.cause,
			fatal: raw.fatal,
			details: options?.details,
		});
	}

	// --- Validation errors (state unchanged) ---

	static alreadyExists(message: string = BASE_ERROR_CODES.ALREADY_EXISTS.message) {
		return new TellerError("ALREADY_EXISTS", message);
	}

	static notFound(message: string = BASE_ERROR_CODES.NOT_FOUND.message) {
		return new TellerError("NOT_FOUND", message);
	}

	static invalidAmount(message: string = BASE_ERROR_CODES.INVALID_AMOUNT.message, cause?: unknown) {
		return new TellerError("INVALID_AMOUNT", message, { cause });
	}

	static insufficientFunds(message: string = BASE_ERROR_CODES.INSUFFICIENT_FUNDS.message) {
		return new TellerError("INSUFFICIENT_FUNDS", message);
	}

	static wrongPin(message: string = BASE_ERROR_CODES.WRONG_PIN.message) {
		return new TellerError("WRONG_PIN", message);
	}

	static pinMismatch(message: string = BASE_ERROR_CODES.PIN_MISMATCH.message) {
		return new TellerError("PIN_MISMATCH", message);
	}

	static weakPin(message: string = BASE_ERROR_CODES.WEAK_PIN.message) {
		return new TellerError("WEAK_PIN", message);
	}

	static invalidArgument(message: string = BASE_ERROR_CODES.INVALID_ARGUMENT.message) {
		return new TellerError("INVALID_ARGUMENT", message);
	}

	// --- Fatal errors ---

	static parseError(message: string = BASE_ERROR_CODES.PARSE_ERROR.message, cause?: unknown) {
		return new TellerError("PARSE_ERROR", message, { cause, fatal: true });
	}

	static internal(message: string = BASE_ERROR_CODES.INTERNAL.message, cause?: unknown) {
		return new TellerError("INTERNAL", message, { cause, fatal: true });
	}
}

/** Narrow an unknown thrown value to a recoverable TellerError. */
export function isRecoverableError(error: unknown): error is TellerError {
	return error instanceof TellerError && !error.fatal;
}
