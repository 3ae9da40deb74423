// Errors
export type { BaseErrorCode, RawErrorCode, TellerErrorCode } from "./error/index.js";
export { BASE_ERROR_CODES, isRecoverableError, TellerError } from "./error/index.js";

// Type definitions
export * from "./types/index.js";

// Utilities
export * from "./utils/index.js";
