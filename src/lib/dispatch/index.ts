export { type ArchiveSnapshot, ResponseArchive } from './archive.js';
export {
	BLOCKED_RESPONSE_TEXT,
	type DispatchOptions,
	type DispatchTarget,
	EMPTY_RESPONSE_TEXT,
	type ProviderSummary,
	dispatchAll,
	dispatchProvider,
	toResponseRecord,
} from './dispatcher.js';
export {
	type RetryOptions,
	type RetryResult,
	type SleepFn,
	backoffDelay,
	isRetryable,
	sleep,
	withRetry,
} from './retry.js';
