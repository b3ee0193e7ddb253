import { Minimatch } from 'minimatch';
import { createInvalidArgsError } from '../errors.js';

export const BBQ_CATEGORIES = [
	'Age',
	'Disability_status',
	'Gender_identity',
	'Nationality',
	'Physical_appearance',
	'Race_ethnicity',
	'Race_x_SES',
	'Race_x_gender',
	'Religion',
	'SES',
	'Sexual_orientation',
] as const;

export type BbqCategory = (typeof BBQ_CATEGORIES)[number];

export function isBbqCategory(value: string): value is BbqCategory {
	return BBQ_CATEGORIES.some((known) => known === value);
}

/**
 * Resolve category arguments to upstream category names.
 * Accepts exact names or glob patterns (e.g. "Race*"), case-insensitive.
 * An empty selection means every category. Order follows BBQ_CATEGORIES.
 */
export function selectCategories(patterns: readonly string[] | undefined): BbqCategory[] {
	const cleaned = (patterns ?? []).map((p) => p.trim()).filter((p) => p.length > 0);
	if (cleaned.length === 0) {
		return [...BBQ_CATEGORIES];
	}

	const selected = new Set<BbqCategory>();
	for (const pattern of cleaned) {
		const matcher = new Minimatch(pattern, { nocase: true });
		const matches = BBQ_CATEGORIES.filter((category) => matcher.match(category));
		if (matches.length === 0) {
			throw createInvalidArgsError(
				`Unknown category "${pattern}". Valid categories: ${BBQ_CATEGORIES.join(', ')}`,
				'--categories',
			);
		}
		for (const match of matches) {
			selected.add(match);
		}
	}

	return BBQ_CATEGORIES.filter((category) => selected.has(category));
}
