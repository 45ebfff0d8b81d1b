/**
 * Risk module: the sticky circuit breaker that gates every trade attempt.
 *
 * @module
 */
export type { GuardVerdict, RiskLimits, RiskState } from "./types.js";
export { allow, blockFatal, blockFatalWithValues, isAllowed, isBlocked } from "./types.js";
export { RiskController } from "./risk-controller.js";
