// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Registry of every error code an operation can raise, with its default
// message. Validation failures are recoverable: the shell prints the message
// and returns to the menu. Fatal codes end the program.

export type RawErrorCode = {
	message: string;
	/**
	 * Whether the condition leaves the process in a state it cannot continue from.
	 *
	 * - `true`: the persisted snapshot could not be read, or an invariant broke.
	 * - `false` (default): the operation was rejected and nothing was mutated.
	 */
	fatal?: boolean;
};

export const BASE_ERROR_CODES = {
	// Validation errors: nothing is mutated or persisted.
	ALREADY_EXISTS: { message: "Account already exists.", fatal: false },
	NOT_FOUND: { message: "Account not found.", fatal: false },
	INVALID_AMOUNT: { message: "Invalid amount.", fatal: false },
	INSUFFICIENT_FUNDS: { message: "Insufficient funds.", fatal: false },
	WRONG_PIN: { message: "Invalid PIN.", fatal: false },
	PIN_MISMATCH: { message: "PIN mismatch.", fatal: false },
	WEAK_PIN: { message: "PIN must be numeric and at least 4 digits.", fatal: false },
	INVALID_ARGUMENT: { message: "Invalid argument", fatal: false },

	// Fatal errors: propagate to the caller.
	PARSE_ERROR: { message: "Account snapshot is corrupt", fatal: true },
	INTERNAL: { message: "Internal error", fatal: true },
} as const satisfies Record<string, RawErrorCode>;

export type BaseErrorCode = keyof typeof BASE_ERROR_CODES;
