export {
	assertCreditConserved,
	assertMerchantBalance,
	assertScheduleConsistent,
} from "./assertions.js";
export {
	createTestClock,
	getTestInstance,
	type TestClock,
	type TestInstance,
	type TestInstanceOptions,
} from "./get-test-instance.js";
