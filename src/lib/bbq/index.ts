export {
	BBQ_CATEGORIES,
	type BbqCategory,
	isBbqCategory,
	selectCategories,
} from './categories.js';
export {
	type FetchCategoryOptions,
	type FetchCategoryResult,
	type FetchFn,
	categoryUrl,
	fetchCategories,
	fetchCategory,
} from './fetcher.js';
export {
	type SampleOptions,
	createRandom,
	dedupeItems,
	pairKey,
	sampleItems,
	shuffle,
	validateSampleLimit,
} from './sampler.js';
export * from './types.js';
