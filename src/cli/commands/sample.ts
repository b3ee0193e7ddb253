import fs from 'node:fs';
import { BbqRecordSchema, dedupeItems, sampleItems, toSampledItem } from '../../lib/bbq/index.js';
import { stagePath } from '../../lib/config/workspace.js';
import { readJsonl, writeJsonl } from '../../lib/jsonl.js';
import { displayPath } from '../../lib/path-utils.js';
import type { CommandContext } from '../context.js';

export interface SampleCommandResult {
	category: string;
	status: 'sampled' | 'missing';
	raw: number;
	unique: number;
	sampled: number;
	path?: string;
}

export function runSampleCommand(
	ctx: CommandContext,
	options: { limit: number; seed: number },
): SampleCommandResult[] {
	ctx.logger.config('Sample size', String(options.limit));
	ctx.logger.config('Seed', String(options.seed));

	const results: SampleCommandResult[] = [];
	for (const category of ctx.categories) {
		const rawPath = stagePath(ctx.workspace, 'raw', category);
		if (!fs.existsSync(rawPath)) {
			ctx.logger.warning(`${category}: no raw data, run "nbbq fetch" first`);
			results.push({ category, status: 'missing', raw: 0, unique: 0, sampled: 0 });
			continue;
		}

		const items = readJsonl(rawPath, BbqRecordSchema).map((record) =>
			toSampledItem(record, category),
		);
		const sampled = sampleItems(items, { limit: options.limit, seed: options.seed });
		const target = stagePath(ctx.workspace, 'sampled', category);
		writeJsonl(target, sampled);
		ctx.logger.success(`${category}: ${sampled.length} of ${items.length} items`);

		results.push({
			category,
			status: 'sampled',
			raw: items.length,
			unique: dedupeItems(items).length,
			sampled: sampled.length,
			path: displayPath(target, ctx.workspace),
		});
	}
	return results;
}
