import { type ReviewError, createReviewError } from '../errors.js';
import type { ReviewItem, ReviewStatus, SampledItem, Translation } from '../bbq/types.js';

export type ApprovedItem = ReviewItem & { translation: Translation };

export interface ReviewSummary {
	category: string;
	total: number;
	pending: number;
	approved: number;
	rejected: number;
	untranslated: number;
	errors: string[];
}

export function newReviewItem(item: SampledItem): ReviewItem {
	return { ...item, translation: null, review: { status: 'pending' } };
}

/**
 * Build the review set for a category from its sampled items.
 * Items already under review keep their translation and review state;
 * items that are no longer sampled are dropped. Order follows `sampled`.
 */
export function mergeReviewItems(
	sampled: readonly SampledItem[],
	existing: readonly ReviewItem[],
): ReviewItem[] {
	const byId = new Map(existing.map((item) => [item.id, item]));
	return sampled.map((item) => {
		const previous = byId.get(item.id);
		if (!previous) {
			return newReviewItem(item);
		}
		return { ...item, translation: previous.translation, review: previous.review };
	});
}

export function isApproved(item: ReviewItem): item is ApprovedItem {
	return item.review.status === 'approved' && item.translation !== null;
}

export function approvedItems(items: readonly ReviewItem[]): ApprovedItem[] {
	return items.filter(isApproved);
}

export function validateReviewItems(category: string, items: readonly ReviewItem[]): ReviewError[] {
	const errors: ReviewError[] = [];
	const seen = new Set<string>();

	for (const item of items) {
		if (seen.has(item.id)) {
			errors.push(createReviewError(`Duplicate item id "${item.id}"`, category, item.id));
		}
		seen.add(item.id);

		if (item.category !== category) {
			errors.push(
				createReviewError(
					`Item "${item.id}" belongs to category "${item.category}"`,
					category,
					item.id,
				),
			);
		}

		if (item.review.status === 'approved' && item.translation === null) {
			errors.push(
				createReviewError(`Item "${item.id}" is approved but has no translation`, category, item.id),
			);
		}
	}

	return errors;
}

export function summarizeReview(category: string, items: readonly ReviewItem[]): ReviewSummary {
	const counts: Record<ReviewStatus, number> = { pending: 0, approved: 0, rejected: 0 };
	let untranslated = 0;

	for (const item of items) {
		counts[item.review.status]++;
		if (item.translation === null) {
			untranslated++;
		}
	}

	return {
		category,
		total: items.length,
		...counts,
		untranslated,
		errors: validateReviewItems(category, items).map((e) => e.message),
	};
}

/**
 * Attach a machine draft translation. Review state is left untouched:
 * only a reviewer moves an item out of `pending`.
 */
export function withDraftTranslation(
	item: ReviewItem,
	draft: Omit<Translation, 'origin'>,
): ReviewItem {
	return { ...item, translation: { ...draft, origin: 'machine' } };
}
