import type { ClassificationRecord, PromptRecord, ResponseRecord } from '../bbq/types.js';
import { type RetryResult, type SleepFn, sleep as defaultSleep, withRetry } from '../dispatch/retry.js';
import { formatError } from '../errors.js';
import type { CompletionClient } from '../llm/client.js';
import {
	type ClassificationCandidate,
	buildBatchClassificationPrompt,
	buildClassificationPrompt,
} from '../llm/prompts.js';
import type { Logger } from '../logger.js';
import { expectedLabel, extractLabel, extractLabels, parseBatchOutput } from './labels.js';

export const DEFAULT_BATCH_SIZE = 10;

export interface ClassifyOptions {
	/** Model used for responses the label pattern cannot resolve */
	client?: CompletionClient;
	batchSize?: number;
	maxAttempts?: number;
	/** Wait between model batches */
	pauseMs?: number;
	/** Records from an earlier run, reused while their response is unchanged */
	previous?: readonly ClassificationRecord[];
	logger?: Logger;
	sleep?: SleepFn;
}

export interface ClassificationSummary {
	total: number;
	labelled: number;
	unlabelled: number;
	/** Responses whose label equals the item's gold label */
	matchingExpected: number;
	distribution: Record<string, number>;
}

interface PendingCandidate {
	index: number;
	candidate: ClassificationCandidate;
}

/** Text shown to the classifier model: the answer options followed by the response */
export function candidateText(prompt: PromptRecord, response: ResponseRecord): string {
	const options = prompt.answers.map((answer, i) => `ans${i}: ${answer}`).join('; ');
	return `Alternativer: ${options}. Svar: ${response.text}`;
}

function chunk<T>(items: readonly T[], size: number): T[][] {
	const chunks: T[][] = [];
	for (let i = 0; i < items.length; i += size) {
		chunks.push(items.slice(i, i + size));
	}
	return chunks;
}

async function completeWithRetry(
	client: CompletionClient,
	prompt: { system: string; user: string },
	options: ClassifyOptions,
): Promise<RetryResult<string>> {
	return withRetry(
		async () => {
			const completion = await client.complete(prompt.system, prompt.user, { temperature: 0 });
			return completion.text;
		},
		{
			maxAttempts: options.maxAttempts ?? 3,
			sleep: options.sleep,
			onRetry: ({ attempt, delayMs, error }) => {
				options.logger?.warning(
					`Classification attempt ${attempt} failed (${formatError(error)}), retrying in ${Math.round(delayMs)}ms`,
				);
			},
		},
	);
}

async function classifyWithModel(
	client: CompletionClient,
	batch: readonly PendingCandidate[],
	options: ClassifyOptions,
): Promise<Map<number, string | null>> {
	const labels = new Map<number, string | null>();

	const batchResult = await completeWithRetry(
		client,
		buildBatchClassificationPrompt(batch.map((p) => p.candidate)),
		options,
	);
	if (batchResult.ok) {
		for (const [id, label] of parseBatchOutput(batchResult.value)) {
			labels.set(id, label);
		}
	} else {
		options.logger?.warning(`Batch classification failed: ${formatError(batchResult.error)}`);
	}

	// Rows the batch answer left out are asked one by one
	for (const { candidate } of batch) {
		if (labels.has(candidate.id)) continue;
		const result = await completeWithRetry(
			client,
			buildClassificationPrompt(candidate.text, candidate.labels),
			options,
		);
		if (result.ok) {
			labels.set(candidate.id, extractLabel(result.value));
		} else {
			options.logger?.warning(`Classification of row ${candidate.id} failed: ${formatError(result.error)}`);
			labels.set(candidate.id, null);
		}
	}

	return labels;
}

function reusable(
	previous: readonly ClassificationRecord[] | undefined,
): Map<string, ClassificationRecord> {
	const byPrompt = new Map<string, ClassificationRecord>();
	for (const record of previous ?? []) {
		if (record.method !== 'none' && record.label !== null && record.respondedAt !== undefined) {
			byPrompt.set(record.promptId, record);
		}
	}
	return byPrompt;
}

/**
 * Assign an answer label to each response.
 * A label named in the response text wins; otherwise, with a client, the
 * model is asked in batches. Responses that are not `ok` stay unlabelled.
 * A labelled record in `previous` for the same response is kept as is.
 */
export async function classifyResponses(
	prompts: ReadonlyMap<string, PromptRecord>,
	responses: readonly ResponseRecord[],
	options: ClassifyOptions = {},
): Promise<ClassificationRecord[]> {
	const records: ClassificationRecord[] = [];
	const pending: PendingCandidate[] = [];
	const previous = reusable(options.previous);

	for (const response of responses) {
		const prompt = prompts.get(response.promptId);
		if (!prompt) {
			options.logger?.warning(`No prompt found for response ${response.promptId}, skipping`);
			continue;
		}

		const earlier = previous.get(response.promptId);
		if (earlier && earlier.respondedAt === response.createdAt) {
			records.push({ ...earlier, expected: expectedLabel(prompt.label) });
			continue;
		}

		const record: ClassificationRecord = {
			promptId: response.promptId,
			provider: response.provider,
			category: response.category,
			label: null,
			expected: expectedLabel(prompt.label),
			method: 'none',
			respondedAt: response.createdAt,
		};
		records.push(record);

		if (response.status !== 'ok') continue;

		const label = extractLabel(response.text);
		if (label) {
			record.label = label;
			record.method = 'pattern';
		} else if (options.client) {
			pending.push({
				index: records.length - 1,
				candidate: {
					id: pending.length + 1,
					text: candidateText(prompt, response),
					labels: extractLabels(prompt.text),
				},
			});
		}
	}

	if (options.client && pending.length > 0) {
		const wait = options.sleep ?? defaultSleep;
		const batches = chunk(pending, options.batchSize ?? DEFAULT_BATCH_SIZE);
		for (const [n, batch] of batches.entries()) {
			if (n > 0 && options.pauseMs !== undefined && options.pauseMs > 0) {
				await wait(options.pauseMs);
			}
			options.logger?.progress(n + 1, batches.length, `classifying ${batch.length} response(s)`);
			const labels = await classifyWithModel(options.client, batch, options);
			for (const { index, candidate } of batch) {
				const record = records[index];
				const label = labels.get(candidate.id) ?? null;
				if (record && label) {
					record.label = label;
					record.method = 'llm';
				}
			}
		}
	}

	return records;
}

export function summarizeClassifications(
	records: readonly ClassificationRecord[],
): ClassificationSummary {
	const distribution: Record<string, number> = {};
	let labelled = 0;
	let matchingExpected = 0;

	for (const record of records) {
		if (record.label === null) continue;
		labelled++;
		distribution[record.label] = (distribution[record.label] ?? 0) + 1;
		if (record.label === record.expected) {
			matchingExpected++;
		}
	}

	return {
		total: records.length,
		labelled,
		unlabelled: records.length - labelled,
		matchingExpected,
		distribution,
	};
}
