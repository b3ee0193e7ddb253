export {
	type LLMConfig,
	apiKeyVariables,
	isOllamaEndpoint,
	loadLLMConfig,
	requiresApiKey,
} from './config.js';
export {
	type Completion,
	type CompletionClient,
	LLMClient,
	type LLMCompletionOptions,
	createLLMClient,
	parseRetryAfter,
} from './client.js';
export {
	type ClassificationCandidate,
	type PromptPair,
	type TranslationDraft,
	buildBatchClassificationPrompt,
	buildClassificationPrompt,
	buildTranslationPrompt,
	findBalancedJsonObject,
	parseTranslationResponse,
} from './prompts.js';
