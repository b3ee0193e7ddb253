import fs from 'node:fs';
import { ClassificationRecordSchema, PromptRecordSchema } from '../../lib/bbq/index.js';
import { type ProviderName, stagePath } from '../../lib/config/workspace.js';
import { ResponseArchive, type SleepFn } from '../../lib/dispatch/index.js';
import { readJsonl, readJsonlLenient, writeJsonl } from '../../lib/jsonl.js';
import {
	type CompletionClient,
	type LLMConfig,
	createLLMClient,
	loadLLMConfig,
} from '../../lib/llm/index.js';
import {
	type ClassificationSummary,
	classifyResponses,
	summarizeClassifications,
} from '../../lib/scoring/index.js';
import type { CommandContext } from '../context.js';

export interface ClassifyCommandOptions {
	/** Provider asked to label responses the pattern cannot resolve */
	llm?: ProviderName;
	model?: string;
	createClient?: (config: LLMConfig) => CompletionClient;
	sleep?: SleepFn;
}

export type ClassifyCommandResult = { category: string; provider: string } & ClassificationSummary;

export async function runClassifyCommand(
	ctx: CommandContext,
	options: ClassifyCommandOptions,
): Promise<ClassifyCommandResult[]> {
	let client: CompletionClient | undefined;
	if (options.llm) {
		const config = loadLLMConfig(options.llm, { model: options.model });
		ctx.logger.config('Classifier', `${config.provider} (${config.model})`);
		client = (options.createClient ?? createLLMClient)(config);
	}

	const archive = new ResponseArchive(ctx.workspace);
	const results: ClassifyCommandResult[] = [];

	for (const category of ctx.categories) {
		const promptPath = stagePath(ctx.workspace, 'prompts', category);
		if (!fs.existsSync(promptPath)) {
			continue;
		}
		const prompts = new Map(
			readJsonl(promptPath, PromptRecordSchema).map((prompt) => [prompt.id, prompt]),
		);

		for (const provider of ctx.providers) {
			const responses = archive.latest(provider, category);
			if (responses.length === 0) {
				continue;
			}

			const target = stagePath(ctx.workspace, 'classified', category, provider);
			const previous = readJsonlLenient(target, ClassificationRecordSchema);
			for (const warning of previous.warnings) {
				ctx.logger.warning(`${warning.path}:${warning.line}: ${warning.message}`);
			}

			const records = await classifyResponses(prompts, responses, {
				client,
				previous: previous.records,
				maxAttempts: ctx.config.dispatch.maxAttempts,
				pauseMs: ctx.config.dispatch.sleepEachMs,
				logger: ctx.logger,
				sleep: options.sleep,
			});
			writeJsonl(target, records);
			results.push({ category, provider, ...summarizeClassifications(records) });
		}
	}

	if (results.length === 0) {
		ctx.logger.warning('No responses found, run "nbbq dispatch" first');
	}

	return results;
}
