export {
	type ClassificationSummary,
	type ClassifyOptions,
	DEFAULT_BATCH_SIZE,
	candidateText,
	classifyResponses,
	summarizeClassifications,
} from './classifier.js';
export {
	DEFAULT_LABELS,
	expectedLabel,
	extractLabel,
	extractLabels,
	parseBatchOutput,
} from './labels.js';
