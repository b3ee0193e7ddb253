import fs from 'node:fs';
import { type PromptRecord, PromptRecordSchema } from '../../lib/bbq/index.js';
import { stagePath } from '../../lib/config/workspace.js';
import { type ProviderSummary, ResponseArchive, dispatchAll } from '../../lib/dispatch/index.js';
import { createInvalidArgsError } from '../../lib/errors.js';
import { readJsonl } from '../../lib/jsonl.js';
import {
	type CompletionClient,
	type LLMConfig,
	createLLMClient,
	loadLLMConfig,
} from '../../lib/llm/index.js';
import type { CommandContext } from '../context.js';

export interface DispatchCommandOptions {
	model?: string;
	temperature?: number;
	signal?: AbortSignal;
	createClient?: (config: LLMConfig) => CompletionClient;
}

export function loadPrompts(ctx: CommandContext): PromptRecord[] {
	const prompts: PromptRecord[] = [];
	for (const category of ctx.categories) {
		const promptPath = stagePath(ctx.workspace, 'prompts', category);
		if (fs.existsSync(promptPath)) {
			prompts.push(...readJsonl(promptPath, PromptRecordSchema));
		}
	}
	return prompts;
}

/**
 * Send every assembled prompt to each selected provider and archive the answers.
 */
export async function runDispatchCommand(
	ctx: CommandContext,
	options: DispatchCommandOptions,
): Promise<ProviderSummary[]> {
	if (options.model && ctx.providers.length > 1) {
		throw createInvalidArgsError('--model can only be used with a single provider', '--model');
	}

	const prompts = loadPrompts(ctx);
	if (prompts.length === 0) {
		ctx.logger.warning('No prompts found, run "nbbq prompts" first');
		return [];
	}

	const targets = ctx.providers.map((provider) => {
		const config = loadLLMConfig(provider, { model: options.model });
		ctx.logger.config(provider, `${config.model} at ${config.endpoint}`);
		return { provider, client: (options.createClient ?? createLLMClient)(config) };
	});

	const { dispatch } = ctx.config;
	ctx.logger.config('Prompts', String(prompts.length));
	ctx.logger.config(
		'Pacing',
		`${dispatch.sleepEachMs}ms per call${dispatch.pauseEvery > 0 ? `, ${dispatch.pauseSeconds}s pause every ${dispatch.pauseEvery} calls` : ''}`,
	);
	ctx.logger.separator();

	return dispatchAll(targets, prompts, {
		archive: new ResponseArchive(ctx.workspace),
		settings: dispatch,
		temperature: options.temperature,
		seed: ctx.config.seed,
		signal: options.signal,
		logger: ctx.logger,
	});
}
