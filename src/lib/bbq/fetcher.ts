import fs from 'node:fs';
import { DEFAULT_SOURCE_URL, stagePath } from '../config/workspace.js';
import { createConnectionError, formatError } from '../errors.js';
import { parseJsonl, writeJsonl } from '../jsonl.js';
import { type Logger, createLogger } from '../logger.js';
import type { BbqCategory } from './categories.js';
import { BbqRecordSchema } from './types.js';

export type FetchFn = typeof fetch;

export interface FetchCategoryOptions {
	workspace: string;
	sourceUrl?: string;
	force?: boolean;
	fetchFn?: FetchFn;
	logger?: Logger;
}

export interface FetchCategoryResult {
	category: BbqCategory;
	status: 'downloaded' | 'skipped';
	records: number;
	path: string;
}

export function categoryUrl(sourceUrl: string, category: string): string {
	return `${sourceUrl.replace(/\/+$/, '')}/${category}.jsonl`;
}

/**
 * Download one category's JSONL file from the upstream repository.
 * Every line is validated before anything is written.
 */
export async function fetchCategory(
	category: BbqCategory,
	options: FetchCategoryOptions,
): Promise<FetchCategoryResult> {
	const logger = options.logger ?? createLogger(false);
	const fetchFn = options.fetchFn ?? fetch;
	const target = stagePath(options.workspace, 'raw', category);

	if (!options.force && fs.existsSync(target)) {
		const existing = parseJsonl(fs.readFileSync(target, 'utf-8'), BbqRecordSchema, target);
		logger.info(`${category}: already downloaded (${existing.length} records)`);
		return { category, status: 'skipped', records: existing.length, path: target };
	}

	const url = categoryUrl(options.sourceUrl ?? DEFAULT_SOURCE_URL, category);
	logger.info(`${category}: downloading ${url}`);

	let response: Response;
	try {
		response = await fetchFn(url);
	} catch (error) {
		throw createConnectionError(`Failed to download ${url}: ${formatError(error)}`, url);
	}

	if (!response.ok) {
		throw createConnectionError(
			`Failed to download ${url}: HTTP ${response.status} ${response.statusText}`,
			url,
			response.status,
		);
	}

	const body = await response.text();
	const records = parseJsonl(body, BbqRecordSchema, url);

	writeJsonl(target, records);
	logger.success(`${category}: ${records.length} records`);

	return { category, status: 'downloaded', records: records.length, path: target };
}

export async function fetchCategories(
	categories: readonly BbqCategory[],
	options: FetchCategoryOptions,
): Promise<FetchCategoryResult[]> {
	const results: FetchCategoryResult[] = [];
	for (const category of categories) {
		results.push(await fetchCategory(category, options));
	}
	return results;
}
