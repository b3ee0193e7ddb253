import fs from 'node:fs';
import { ReviewItemSchema } from '../../lib/bbq/index.js';
import { stagePath } from '../../lib/config/workspace.js';
import { readJsonl, writeJsonl } from '../../lib/jsonl.js';
import { displayPath } from '../../lib/path-utils.js';
import { buildPrompts, loadTemplate } from '../../lib/prompts/index.js';
import { approvedItems } from '../../lib/review/index.js';
import type { CommandContext } from '../context.js';

export interface PromptsCommandResult {
	category: string;
	template: string;
	reviewed: number;
	approved: number;
	prompts: number;
	path?: string;
}

/**
 * Assemble prompts/<Category>.jsonl from approved review items.
 */
export function runPromptsCommand(
	ctx: CommandContext,
	options: { template: string },
): PromptsCommandResult[] {
	const template = loadTemplate(options.template, ctx.workspace);
	ctx.logger.config('Template', `${template.id} (${template.language})`);

	const results: PromptsCommandResult[] = [];
	for (const category of ctx.categories) {
		const reviewPath = stagePath(ctx.workspace, 'review', category);
		if (!fs.existsSync(reviewPath)) {
			continue;
		}

		const items = readJsonl(reviewPath, ReviewItemSchema);
		const approved = approvedItems(items);
		const prompts = buildPrompts(approved, template);

		const target = stagePath(ctx.workspace, 'prompts', category);
		writeJsonl(target, prompts);

		if (approved.length === 0) {
			ctx.logger.warning(`${category}: no approved items yet`);
		} else {
			ctx.logger.success(`${category}: ${prompts.length} prompts`);
		}

		results.push({
			category,
			template: template.id,
			reviewed: items.length,
			approved: approved.length,
			prompts: prompts.length,
			path: displayPath(target, ctx.workspace),
		});
	}

	if (results.length === 0) {
		ctx.logger.warning('No review files found, run "nbbq review export" first');
	}

	return results;
}
