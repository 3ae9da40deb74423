export { type ConsoleLoggerOptions, createConsoleLogger, formatFields } from "./console-logger.js";
export { createJsonLogger, type JsonLoggerOptions } from "./json-logger.js";
export { isLogLevel } from "./levels.js";
export { maskPins } from "./redact.js";
