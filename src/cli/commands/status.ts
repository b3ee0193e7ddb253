import fs from 'node:fs';
import { PROVIDER_NAMES, type Stage, stagePath } from '../../lib/config/workspace.js';
import { ResponseArchive } from '../../lib/dispatch/index.js';
import { createLLMClient, loadLLMConfig } from '../../lib/llm/index.js';
import type { CommandContext } from '../context.js';

export interface ProviderStatus {
	provider: string;
	model: string;
	endpoint: string;
	healthy: boolean;
	message: string;
}

export interface CategoryStatus {
	category: string;
	raw: number;
	sampled: number;
	review: number;
	prompts: number;
	responses: Record<string, number>;
}

export interface StatusResult {
	workspace: string;
	providers: ProviderStatus[];
	categories: CategoryStatus[];
}

function countLines(filePath: string): number {
	if (!fs.existsSync(filePath)) {
		return 0;
	}
	return fs
		.readFileSync(filePath, 'utf-8')
		.split('\n')
		.filter((line) => line.trim() !== '').length;
}

/**
 * Provider configuration and reachability plus per-category artefact counts.
 * With `all`, every known provider is probed, not only the selected ones.
 */
export async function runStatusCommand(
	ctx: CommandContext,
	options: { all: boolean; fetchFn?: typeof fetch },
): Promise<StatusResult> {
	const names = options.all ? [...PROVIDER_NAMES] : ctx.providers;

	const providers = await Promise.all(
		names.map(async (provider): Promise<ProviderStatus> => {
			const config = loadLLMConfig(provider);
			const health = await createLLMClient(config, options.fetchFn).checkHealth();
			return {
				provider,
				model: config.model,
				endpoint: config.endpoint,
				healthy: health.healthy,
				message: health.message,
			};
		}),
	);

	const archive = new ResponseArchive(ctx.workspace);
	const count = (stage: Stage, category: string) =>
		countLines(stagePath(ctx.workspace, stage, category));

	const categories = ctx.categories.map((category): CategoryStatus => {
		const responses: Record<string, number> = {};
		for (const provider of ctx.providers) {
			const answered = archive.completedPromptIds(provider, category).size;
			if (answered > 0) {
				responses[provider] = answered;
			}
		}
		return {
			category,
			raw: count('raw', category),
			sampled: count('sampled', category),
			review: count('review', category),
			prompts: count('prompts', category),
			responses,
		};
	});

	return { workspace: ctx.workspace, providers, categories };
}
