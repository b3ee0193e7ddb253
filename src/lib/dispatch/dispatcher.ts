import type { PromptRecord, ResponseRecord } from '../bbq/types.js';
import type { DispatchSettings } from '../config/workspace.js';
import { formatError } from '../errors.js';
import type { Completion, CompletionClient } from '../llm/client.js';
import type { Logger } from '../logger.js';
import type { ResponseArchive } from './archive.js';
import { type SleepFn, sleep as defaultSleep, withRetry } from './retry.js';

export const EMPTY_RESPONSE_TEXT = '(empty response)';
export const BLOCKED_RESPONSE_TEXT = '(blocked)';

export interface DispatchTarget {
	provider: string;
	client: CompletionClient;
}

export interface DispatchOptions {
	archive: ResponseArchive;
	settings: DispatchSettings;
	temperature?: number;
	maxTokens?: number;
	seed?: number;
	signal?: AbortSignal;
	logger?: Logger;
	sleep?: SleepFn;
	random?: () => number;
	now?: () => number;
}

export interface ProviderSummary {
	provider: string;
	model: string;
	total: number;
	skipped: number;
	ok: number;
	empty: number;
	blocked: number;
	error: number;
	interrupted: boolean;
}

export function toResponseRecord(
	prompt: PromptRecord,
	target: { provider: string; model: string },
	outcome: { completion: Completion } | { error: unknown },
	meta: { attempts: number; durationMs: number; createdAt: string },
): ResponseRecord {
	const base = {
		promptId: prompt.id,
		provider: target.provider,
		model: target.model,
		category: prompt.category,
		...meta,
	};

	if ('error' in outcome) {
		return { ...base, status: 'error', text: '', error: formatError(outcome.error) };
	}
	if (outcome.completion.blocked) {
		return { ...base, status: 'blocked', text: BLOCKED_RESPONSE_TEXT };
	}
	if (outcome.completion.text.trim() === '') {
		return { ...base, status: 'empty', text: EMPTY_RESPONSE_TEXT };
	}
	return { ...base, status: 'ok', text: outcome.completion.text };
}

function pendingPrompts(
	archive: ResponseArchive,
	provider: string,
	prompts: readonly PromptRecord[],
): PromptRecord[] {
	const completed = new Map<string, Set<string>>();
	return prompts.filter((prompt) => {
		let done = completed.get(prompt.category);
		if (!done) {
			done = archive.completedPromptIds(provider, prompt.category);
			completed.set(prompt.category, done);
		}
		return !done.has(prompt.id);
	});
}

/**
 * Send every pending prompt to one provider, one call at a time,
 * archiving each response as soon as it arrives.
 */
export async function dispatchProvider(
	target: DispatchTarget,
	prompts: readonly PromptRecord[],
	options: DispatchOptions,
): Promise<ProviderSummary> {
	const { archive, settings, signal, logger } = options;
	const wait = options.sleep ?? defaultSleep;
	const now = options.now ?? Date.now;
	const model = target.client.getConfig().model;

	const pending = pendingPrompts(archive, target.provider, prompts);
	const summary: ProviderSummary = {
		provider: target.provider,
		model,
		total: prompts.length,
		skipped: prompts.length - pending.length,
		ok: 0,
		empty: 0,
		blocked: 0,
		error: 0,
		interrupted: false,
	};

	if (summary.skipped > 0) {
		logger?.info(`${target.provider}: ${summary.skipped} prompt(s) already answered, skipping`);
	}

	try {
		for (let i = 0; i < pending.length; i++) {
			const prompt = pending[i];
			if (!prompt) continue;
			if (signal?.aborted) {
				summary.interrupted = true;
				break;
			}

			const started = now();
			const result = await withRetry(
				() =>
					target.client.complete(prompt.system, prompt.text, {
						temperature: options.temperature,
						maxTokens: options.maxTokens,
						seed: options.seed,
						timeoutMs: settings.timeoutMs,
						signal,
					}),
				{
					maxAttempts: settings.maxAttempts,
					random: options.random,
					sleep: wait,
					signal,
					onRetry: ({ attempt, delayMs, error }) => {
						logger?.warning(
							`${target.provider} ${prompt.id}: attempt ${attempt} failed (${formatError(error)}), retrying in ${Math.round(delayMs)}ms`,
						);
					},
				},
			);

			const record = toResponseRecord(
				prompt,
				{ provider: target.provider, model },
				result.ok ? { completion: result.value } : { error: result.error },
				{
					attempts: result.attempts,
					durationMs: Math.max(0, now() - started),
					createdAt: new Date(now()).toISOString(),
				},
			);
			archive.append(record);
			summary[record.status]++;

			logger?.promptProgress(
				i + 1,
				pending.length,
				target.provider,
				record.status === 'error' ? `error: ${record.error ?? ''}` : `${record.status} ${prompt.id}`,
			);

			const isLast = i === pending.length - 1;
			if (!isLast) {
				if (settings.sleepEachMs > 0) {
					await wait(settings.sleepEachMs, signal);
				}
				if (settings.pauseEvery > 0 && (i + 1) % settings.pauseEvery === 0) {
					logger?.info(`${target.provider}: pausing ${settings.pauseSeconds}s`);
					await wait(settings.pauseSeconds * 1000, signal);
				}
			}
		}
	} catch (error) {
		if (!signal?.aborted) {
			throw error;
		}
		summary.interrupted = true;
	}

	return summary;
}

/**
 * Fan prompts out to every provider concurrently.
 * Calls for a single provider stay sequential. A provider that throws does
 * not cut the others short: its error is raised once all of them are done.
 */
export async function dispatchAll(
	targets: readonly DispatchTarget[],
	prompts: readonly PromptRecord[],
	options: DispatchOptions,
): Promise<ProviderSummary[]> {
	const settled = await Promise.allSettled(
		targets.map((target) => dispatchProvider(target, prompts, options)),
	);

	const summaries: ProviderSummary[] = [];
	const failures: unknown[] = [];
	for (const [i, result] of settled.entries()) {
		if (result.status === 'fulfilled') {
			summaries.push(result.value);
		} else {
			options.logger?.error(`${targets[i]?.provider ?? 'provider'}: ${formatError(result.reason)}`);
			failures.push(result.reason);
		}
	}

	if (failures.length > 0) {
		throw failures[0];
	}
	return summaries;
}
