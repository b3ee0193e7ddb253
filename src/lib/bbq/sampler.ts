import { MAX_SAMPLE_SIZE } from '../config/workspace.js';
import { createInvalidArgsError } from '../errors.js';
import type { SampledItem } from './types.js';

export interface SampleOptions {
	limit?: number;
	seed?: number;
}

/** mulberry32: small deterministic PRNG returning floats in [0, 1) */
export function createRandom(seed: number): () => number {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

export function shuffle<T>(items: readonly T[], random: () => number): T[] {
	const result = [...items];
	for (let i = result.length - 1; i > 0; i--) {
		const j = Math.floor(random() * (i + 1));
		const a = result[i];
		const b = result[j];
		if (a === undefined || b === undefined) continue;
		result[i] = b;
		result[j] = a;
	}
	return result;
}

function normalizeText(text: string): string {
	return text.replace(/\s+/g, ' ').trim().toLowerCase();
}

export function pairKey(item: Pick<SampledItem, 'context' | 'question'>): string {
	return `${normalizeText(item.context)}\u0000${normalizeText(item.question)}`;
}

/**
 * Drop items whose context/question pair repeats an earlier one.
 * Comparison ignores case and whitespace runs; first occurrence wins.
 */
export function dedupeItems<T extends Pick<SampledItem, 'context' | 'question'>>(
	items: readonly T[],
): T[] {
	const seen = new Set<string>();
	const unique: T[] = [];
	for (const item of items) {
		const key = pairKey(item);
		if (seen.has(key)) continue;
		seen.add(key);
		unique.push(item);
	}
	return unique;
}

export function validateSampleLimit(limit: number): number {
	if (!Number.isInteger(limit) || limit < 1 || limit > MAX_SAMPLE_SIZE) {
		throw createInvalidArgsError(
			`Sample size must be an integer between 1 and ${MAX_SAMPLE_SIZE}`,
			'--limit',
		);
	}
	return limit;
}

/**
 * Reduce a category to at most `limit` unique context/question pairs.
 *
 * Items are grouped by context condition and polarity, each group is shuffled
 * with the seeded PRNG, and groups are drawn round-robin so the subset stays
 * balanced across ambiguous/disambiguated and negative/non-negative questions.
 */
export function sampleItems(items: readonly SampledItem[], options: SampleOptions = {}): SampledItem[] {
	const limit = validateSampleLimit(options.limit ?? MAX_SAMPLE_SIZE);
	const random = createRandom(options.seed ?? 42);
	const unique = dedupeItems(items);

	const strata = new Map<string, SampledItem[]>();
	for (const item of unique) {
		const key = `${item.contextCondition}/${item.polarity}`;
		const bucket = strata.get(key) ?? [];
		bucket.push(item);
		strata.set(key, bucket);
	}

	const queues = [...strata.keys()]
		.sort()
		.map((key) => shuffle(strata.get(key) ?? [], random));

	const selected: SampledItem[] = [];
	let round = 0;
	while (selected.length < limit) {
		let took = false;
		for (const queue of queues) {
			const next = queue[round];
			if (next === undefined) continue;
			selected.push(next);
			took = true;
			if (selected.length === limit) break;
		}
		if (!took) break;
		round++;
	}

	return selected;
}
