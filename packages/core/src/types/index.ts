export * from "./account.js";
export * from "./config.js";
export * from "./context.js";
export * from "./credit-transaction.js";
export * from "./limit.js";
export * from "./pagination.js";
export * from "./payment.js";
export * from "./purchase-request.js";
export * from "./repayment.js";
export * from "./settlement.js";
