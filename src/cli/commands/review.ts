import fs from 'node:fs';
import { ReviewItemSchema, SampledItemSchema } from '../../lib/bbq/index.js';
import { stagePath } from '../../lib/config/workspace.js';
import { readJsonl, readJsonlLenient, writeJsonl } from '../../lib/jsonl.js';
import { displayPath } from '../../lib/path-utils.js';
import { type ReviewSummary, mergeReviewItems, summarizeReview } from '../../lib/review/index.js';
import type { CommandContext } from '../context.js';

export interface ReviewExportResult {
	category: string;
	status: 'exported' | 'missing';
	items: number;
	kept: number;
	added: number;
	dropped: number;
	path?: string;
}

/**
 * Write review/<Category>.jsonl from the sampled set, keeping reviewers' work
 * on items that are still sampled.
 */
export function runReviewExportCommand(ctx: CommandContext): ReviewExportResult[] {
	const results: ReviewExportResult[] = [];

	for (const category of ctx.categories) {
		const sampledPath = stagePath(ctx.workspace, 'sampled', category);
		if (!fs.existsSync(sampledPath)) {
			ctx.logger.warning(`${category}: nothing sampled, run "nbbq sample" first`);
			results.push({ category, status: 'missing', items: 0, kept: 0, added: 0, dropped: 0 });
			continue;
		}

		const sampled = readJsonl(sampledPath, SampledItemSchema);
		const target = stagePath(ctx.workspace, 'review', category);
		const existing = fs.existsSync(target) ? readJsonl(target, ReviewItemSchema) : [];

		const merged = mergeReviewItems(sampled, existing);
		const existingIds = new Set(existing.map((item) => item.id));
		const kept = merged.filter((item) => existingIds.has(item.id)).length;

		writeJsonl(target, merged);
		ctx.logger.success(`${category}: ${merged.length} items ready for review`);

		results.push({
			category,
			status: 'exported',
			items: merged.length,
			kept,
			added: merged.length - kept,
			dropped: existing.length - kept,
			path: displayPath(target, ctx.workspace),
		});
	}

	return results;
}

/**
 * Validate review files and count items per status.
 * Unparseable lines are reported as errors instead of aborting the check.
 */
export function runReviewCheckCommand(ctx: CommandContext): ReviewSummary[] {
	const summaries: ReviewSummary[] = [];

	for (const category of ctx.categories) {
		const target = stagePath(ctx.workspace, 'review', category);
		if (!fs.existsSync(target)) {
			continue;
		}

		const { records, warnings } = readJsonlLenient(target, ReviewItemSchema);
		const summary = summarizeReview(category, records);
		summary.errors.unshift(...warnings.map((w) => `line ${w.line}: ${w.message}`));
		summaries.push(summary);
	}

	if (summaries.length === 0) {
		ctx.logger.warning('No review files found, run "nbbq review export" first');
	}

	return summaries;
}
