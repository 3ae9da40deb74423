export { assertAccountBalance, assertLedgerConsistent } from "./assertions.js";
export {
	createTestClock,
	getTestInstance,
	silentLogger,
	type TestInstance,
	type TestInstanceOptions,
} from "./get-test-instance.js";
