import fs from 'node:fs';
import { ReviewItemSchema } from '../../lib/bbq/index.js';
import { type ProviderName, stagePath } from '../../lib/config/workspace.js';
import { readJsonl, writeJsonl } from '../../lib/jsonl.js';
import {
	type CompletionClient,
	type LLMConfig,
	createLLMClient,
	loadLLMConfig,
} from '../../lib/llm/index.js';
import { type TranslateSummary, translateReviewItems } from '../../lib/review/translate.js';
import type { CommandContext } from '../context.js';

export interface TranslateCommandOptions {
	provider: ProviderName;
	model?: string;
	language: string;
	signal?: AbortSignal;
	createClient?: (config: LLMConfig) => CompletionClient;
}

export type TranslateCommandResult = { category: string; provider: string } & TranslateSummary;

export async function runTranslateCommand(
	ctx: CommandContext,
	options: TranslateCommandOptions,
): Promise<TranslateCommandResult[]> {
	const config = loadLLMConfig(options.provider, { model: options.model });
	const client = (options.createClient ?? createLLMClient)(config);

	ctx.logger.config('Translator', `${config.provider} (${config.model})`);
	ctx.logger.config('Target language', options.language);

	const results: TranslateCommandResult[] = [];
	for (const category of ctx.categories) {
		const target = stagePath(ctx.workspace, 'review', category);
		if (!fs.existsSync(target)) {
			continue;
		}

		ctx.logger.categoryHeader(category, 'translating');
		const { summary } = await translateReviewItems(readJsonl(target, ReviewItemSchema), client, {
			language: options.language,
			maxAttempts: ctx.config.dispatch.maxAttempts,
			logger: ctx.logger,
			signal: options.signal,
			// Rewritten after every draft
			onProgress: (items) => writeJsonl(target, items),
		});

		results.push({ category, provider: config.provider, ...summary });
		if (summary.interrupted) {
			break;
		}
	}

	if (results.length === 0) {
		ctx.logger.warning('No review files found, run "nbbq review export" first');
	}

	return results;
}
