import type { ProviderName } from '../config/workspace.js';

export interface LLMConfig {
	provider: ProviderName;
	endpoint: string;
	model: string;
	apiKey?: string;
}

interface ProviderDefaults {
	endpoint: string;
	model: string;
	/** Environment variables checked in order for the API key */
	keyVars: string[];
}

const PROVIDER_DEFAULTS: Record<ProviderName, ProviderDefaults> = {
	openai: {
		endpoint: 'https://api.openai.com/v1',
		model: 'gpt-4o',
		keyVars: ['OPENAI_API_KEY'],
	},
	gemini: {
		endpoint: 'https://generativelanguage.googleapis.com/v1beta',
		model: 'gemini-2.5-flash',
		keyVars: ['GOOGLE_API_KEY', 'GEMINI_API_KEY'],
	},
	perplexity: {
		endpoint: 'https://api.perplexity.ai',
		model: 'sonar',
		keyVars: ['PERPLEXITY_API_KEY'],
	},
	anthropic: {
		endpoint: 'https://api.anthropic.com/v1',
		model: 'claude-3-5-sonnet-latest',
		keyVars: ['ANTHROPIC_API_KEY'],
	},
	ollama: {
		endpoint: 'http://localhost:11434',
		model: 'llama3',
		keyVars: [],
	},
};

type Env = Record<string, string | undefined>;

function envName(provider: ProviderName, suffix: 'MODEL' | 'ENDPOINT'): string {
	return `NBBQ_${provider.toUpperCase()}_${suffix}`;
}

/**
 * Resolve a provider's endpoint, model and key.
 * Explicit overrides win over NBBQ_<PROVIDER>_* variables, which win over defaults.
 */
export function loadLLMConfig(
	provider: ProviderName,
	overrides: { model?: string; endpoint?: string } = {},
	env: Env = process.env,
): LLMConfig {
	const defaults = PROVIDER_DEFAULTS[provider];

	let endpoint = overrides.endpoint ?? env[envName(provider, 'ENDPOINT')];
	if (!endpoint && provider === 'ollama') {
		endpoint = env.OLLAMA_BASE_URL;
	}

	const apiKey = defaults.keyVars.map((name) => env[name]).find((value) => value && value.trim());

	return {
		provider,
		endpoint: (endpoint ?? defaults.endpoint).replace(/\/+$/, ''),
		model: overrides.model ?? env[envName(provider, 'MODEL')] ?? defaults.model,
		apiKey,
	};
}

export function requiresApiKey(provider: ProviderName): boolean {
	return PROVIDER_DEFAULTS[provider].keyVars.length > 0;
}

export function apiKeyVariables(provider: ProviderName): string[] {
	return [...PROVIDER_DEFAULTS[provider].keyVars];
}

export function isOllamaEndpoint(endpoint: string): boolean {
	return endpoint.includes('localhost:11434') || endpoint.includes('127.0.0.1:11434');
}
