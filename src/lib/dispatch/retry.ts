import { isLLMError } from '../errors.js';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
	maxAttempts: number;
	baseDelayMs?: number;
	maxDelayMs?: number;
	random?: () => number;
	sleep?: SleepFn;
	signal?: AbortSignal;
	onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export type RetryResult<T> =
	| { ok: true; value: T; attempts: number }
	| { ok: false; error: unknown; attempts: number };

const DEFAULT_BASE_DELAY_MS = 1000;
const DEFAULT_MAX_DELAY_MS = 30000;

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(signal.reason);
			return;
		}
		const timer = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort);
			resolve();
		}, ms);
		const onAbort = () => {
			clearTimeout(timer);
			reject(signal?.reason);
		};
		signal?.addEventListener('abort', onAbort, { once: true });
	});
}

/**
 * Rate limits (429), server errors (5xx) and network failures are retried;
 * everything else fails on the first attempt.
 */
export function isRetryable(error: unknown): boolean {
	if (!isLLMError(error)) {
		return false;
	}
	if (error.transient) {
		return true;
	}
	if (error.status === undefined) {
		return false;
	}
	return error.status === 429 || (error.status >= 500 && error.status < 600);
}

/**
 * Delay before attempt `attempt + 1` (attempt is 1-based).
 * Retry-After wins when present; otherwise exponential backoff with up to
 * one second of jitter. Both are capped at maxDelayMs.
 */
export function backoffDelay(
	attempt: number,
	error: unknown,
	options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'random'> = {},
): number {
	const base = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
	const max = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
	const random = options.random ?? Math.random;

	if (isLLMError(error) && error.retryAfter !== undefined) {
		return Math.min(error.retryAfter * 1000, max);
	}

	const exponential = 2 ** (attempt - 1) * base;
	return Math.min(exponential + random() * 1000, max);
}

export async function withRetry<T>(
	fn: (attempt: number) => Promise<T>,
	options: RetryOptions,
): Promise<RetryResult<T>> {
	const wait = options.sleep ?? sleep;

	for (let attempt = 1; ; attempt++) {
		try {
			const value = await fn(attempt);
			return { ok: true, value, attempts: attempt };
		} catch (error) {
			if (options.signal?.aborted) {
				throw error;
			}
			if (attempt >= options.maxAttempts || !isRetryable(error)) {
				return { ok: false, error, attempts: attempt };
			}
			const delayMs = backoffDelay(attempt, error, options);
			options.onRetry?.({ attempt, delayMs, error });
			await wait(delayMs, options.signal);
		}
	}
}
