import { type FetchFn, fetchCategories } from '../../lib/bbq/index.js';
import { displayPath } from '../../lib/path-utils.js';
import type { CommandContext } from '../context.js';

export interface FetchCommandOptions {
	force: boolean;
	fetchFn?: FetchFn;
}

export async function runFetchCommand(
	ctx: CommandContext,
	options: FetchCommandOptions,
): Promise<Array<{ category: string; status: string; records: number; path: string }>> {
	ctx.logger.config('Source', ctx.config.sourceUrl);
	ctx.logger.config('Workspace', ctx.workspace);

	const results = await fetchCategories(ctx.categories, {
		workspace: ctx.workspace,
		sourceUrl: ctx.config.sourceUrl,
		force: options.force,
		fetchFn: options.fetchFn,
		logger: ctx.logger,
	});

	return results.map((result) => ({
		category: result.category,
		status: result.status,
		records: result.records,
		path: displayPath(result.path, ctx.workspace),
	}));
}
