import { describe, expect, test } from 'vitest';
import { createLLMError } from '../lib/errors.js';
import { backoffDelay, isRetryable, sleep, withRetry } from '../lib/dispatch/retry.js';

function recordingSleep() {
	const delays: number[] = [];
	const fn = async (ms: number) => {
		delays.push(ms);
	};
	return { fn, delays };
}

describe('isRetryable', () => {
	test('retries rate limits, server errors and transient failures', () => {
		expect(isRetryable(createLLMError('slow down', { status: 429 }))).toBe(true);
		expect(isRetryable(createLLMError('bad gateway', { status: 502 }))).toBe(true);
		expect(isRetryable(createLLMError('timeout', { transient: true }))).toBe(true);
	});

	test('does not retry client errors or foreign errors', () => {
		expect(isRetryable(createLLMError('unauthorized', { status: 401 }))).toBe(false);
		expect(isRetryable(createLLMError('no status'))).toBe(false);
		expect(isRetryable(new Error('boom'))).toBe(false);
	});
});

describe('backoffDelay', () => {
	const noJitter = { random: () => 0 };

	test('doubles from the base delay', () => {
		expect([1, 2, 3, 4].map((attempt) => backoffDelay(attempt, undefined, noJitter))).toEqual([
			1000, 2000, 4000, 8000,
		]);
	});

	test('adds up to one second of jitter', () => {
		expect(backoffDelay(1, undefined, { random: () => 0.5 })).toBe(1500);
	});

	test('caps the delay', () => {
		expect(backoffDelay(10, undefined, noJitter)).toBe(30000);
		expect(backoffDelay(3, undefined, { ...noJitter, maxDelayMs: 2500 })).toBe(2500);
	});

	test('honours Retry-After', () => {
		const error = createLLMError('slow down', { status: 429, retryAfter: 7 });
		expect(backoffDelay(1, error, noJitter)).toBe(7000);
		expect(backoffDelay(1, createLLMError('x', { retryAfter: 120 }), noJitter)).toBe(30000);
	});
});

describe('withRetry', () => {
	test('returns the first success with its attempt count', async () => {
		const wait = recordingSleep();
		let calls = 0;
		const result = await withRetry(
			async () => {
				calls++;
				if (calls < 3) throw createLLMError('busy', { status: 503 });
				return 'done';
			},
			{ maxAttempts: 5, sleep: wait.fn, random: () => 0 },
		);
		expect(result).toEqual({ ok: true, value: 'done', attempts: 3 });
		expect(wait.delays).toEqual([1000, 2000]);
	});

	test('gives up after maxAttempts', async () => {
		const wait = recordingSleep();
		const error = createLLMError('busy', { status: 503 });
		const result = await withRetry(
			async () => {
				throw error;
			},
			{ maxAttempts: 3, sleep: wait.fn, random: () => 0 },
		);
		expect(result).toEqual({ ok: false, error, attempts: 3 });
		expect(wait.delays).toHaveLength(2);
	});

	test('fails immediately on a permanent error', async () => {
		const wait = recordingSleep();
		const result = await withRetry(
			async () => {
				throw createLLMError('bad request', { status: 400 });
			},
			{ maxAttempts: 5, sleep: wait.fn },
		);
		expect(result).toMatchObject({ ok: false, attempts: 1 });
		expect(wait.delays).toEqual([]);
	});

	test('reports each retry', async () => {
		const retries: Array<{ attempt: number; delayMs: number }> = [];
		await withRetry(
			async (attempt) => {
				if (attempt === 1) throw createLLMError('slow', { status: 429, retryAfter: 2 });
				return attempt;
			},
			{
				maxAttempts: 2,
				sleep: recordingSleep().fn,
				onRetry: ({ attempt, delayMs }) => retries.push({ attempt, delayMs }),
			},
		);
		expect(retries).toEqual([{ attempt: 1, delayMs: 2000 }]);
	});

	test('rethrows once the signal is aborted', async () => {
		const controller = new AbortController();
		const error = createLLMError('busy', { status: 503 });
		await expect(
			withRetry(
				async () => {
					controller.abort();
					throw error;
				},
				{ maxAttempts: 5, signal: controller.signal, sleep: recordingSleep().fn },
			),
		).rejects.toBe(error);
	});
});

describe('sleep', () => {
	test('rejects when the signal is already aborted', async () => {
		const controller = new AbortController();
		controller.abort(new Error('stop'));
		await expect(sleep(1000, controller.signal)).rejects.toThrow('stop');
	});

	test('rejects when aborted while waiting', async () => {
		const controller = new AbortController();
		const pending = sleep(60000, controller.signal);
		controller.abort(new Error('interrupted'));
		await expect(pending).rejects.toThrow('interrupted');
	});
});
