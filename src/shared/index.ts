export { type Result, type Ok, type Err, ok, err, isOk, isErr } from "./result.js";

export {
	ErrorCategory,
	TradingError,
	NetworkError,
	TimeoutError,
	RateLimitError,
	AuthError,
	OrderRejectedError,
	ConfigError,
	SystemError,
	classifyError,
	errorFromStatus,
	isNetworkError,
} from "./errors.js";

export { Decimal } from "./decimal.js";
export { OrderSide, oppositeSide } from "./side.js";
export {
	type Clock,
	SystemClock,
	FakeClock,
	Duration,
	sleep,
	startOfLocalDay,
} from "./time.js";
