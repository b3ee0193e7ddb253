import type { ReviewItem } from '../bbq/types.js';
import { type RetryResult, type SleepFn, withRetry } from '../dispatch/retry.js';
import { formatError } from '../errors.js';
import type { CompletionClient } from '../llm/client.js';
import { buildTranslationPrompt, parseTranslationResponse } from '../llm/prompts.js';
import type { Logger } from '../logger.js';
import { withDraftTranslation } from './index.js';

export interface TranslateOptions {
	language: string;
	maxAttempts?: number;
	logger?: Logger;
	signal?: AbortSignal;
	sleep?: SleepFn;
	/** Receives the full item list after every new draft */
	onProgress?: (items: readonly ReviewItem[]) => void;
}

export interface TranslateSummary {
	translated: number;
	failed: number;
	skipped: number;
	interrupted: boolean;
}

/**
 * Request machine draft translations for items that have none.
 * Items that already carry a translation are left alone; failures
 * leave the item untranslated for the next run.
 */
export async function translateReviewItems(
	items: readonly ReviewItem[],
	client: CompletionClient,
	options: TranslateOptions,
): Promise<{ items: ReviewItem[]; summary: TranslateSummary }> {
	const result = [...items];
	const summary: TranslateSummary = { translated: 0, failed: 0, skipped: 0, interrupted: false };
	const todo = result.filter((item) => item.translation === null).length;
	summary.skipped = result.length - todo;

	let done = 0;
	for (let i = 0; i < result.length; i++) {
		const item = result[i];
		if (!item || item.translation !== null) continue;
		if (options.signal?.aborted) {
			summary.interrupted = true;
			break;
		}

		done++;
		const prompt = buildTranslationPrompt(
			{ context: item.context, question: item.question, answers: item.answers },
			options.language,
		);

		let outcome: RetryResult<string>;
		try {
			outcome = await withRetry(
				async () => {
					const completion = await client.complete(prompt.system, prompt.user, {
						temperature: 0,
						signal: options.signal,
					});
					return completion.text;
				},
				{ maxAttempts: options.maxAttempts ?? 3, sleep: options.sleep, signal: options.signal },
			);
		} catch (error) {
			if (options.signal?.aborted) {
				summary.interrupted = true;
				break;
			}
			throw error;
		}

		if (!outcome.ok) {
			summary.failed++;
			options.logger?.warning(`${item.id}: translation failed: ${formatError(outcome.error)}`);
			continue;
		}

		const draft = parseTranslationResponse(outcome.value);
		if (!draft) {
			summary.failed++;
			options.logger?.warning(`${item.id}: response did not contain a translated object`);
			continue;
		}

		result[i] = withDraftTranslation(item, draft);
		summary.translated++;
		options.logger?.progress(done, todo, `${item.id} translated`);
		options.onProgress?.(result);
	}

	return { items: result, summary };
}
