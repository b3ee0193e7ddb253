import { z } from 'zod';
import { type LLMError, createLLMError, formatError, isLLMError } from '../errors.js';
import { type LLMConfig, apiKeyVariables, isOllamaEndpoint, requiresApiKey } from './config.js';

interface ChatMessage {
	role: 'system' | 'user' | 'assistant';
	content: string;
}

const ChatCompletionSchema = z.object({
	choices: z.array(
		z.object({
			message: z.object({ content: z.string().nullable().optional() }),
			finish_reason: z.string().nullable().optional(),
		}),
	),
});

const AnthropicMessageSchema = z.object({
	content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
	stop_reason: z.string().nullable().optional(),
});

const GeminiResponseSchema = z.object({
	candidates: z
		.array(
			z.object({
				content: z
					.object({ parts: z.array(z.object({ text: z.string().optional() })).optional() })
					.optional(),
				finishReason: z.string().optional(),
			}),
		)
		.optional(),
	promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
});

const OllamaChatSchema = z.object({
	message: z.object({ content: z.string().optional() }).optional(),
});

const GEMINI_BLOCK_REASONS = new Set(['SAFETY', 'BLOCKLIST', 'PROHIBITED_CONTENT', 'SPII']);

export interface LLMCompletionOptions {
	maxTokens?: number;
	temperature?: number;
	/** Sampling seed, honoured by providers that accept one */
	seed?: number;
	/** Ollama context window */
	numCtx?: number;
	timeoutMs?: number;
	signal?: AbortSignal;
}

export interface Completion {
	text: string;
	/** The provider refused or filtered the prompt */
	blocked: boolean;
	finishReason?: string;
}

type FetchFn = typeof fetch;

/** The completion surface shared by the dispatcher, translator and classifier */
export interface CompletionClient {
	complete(
		systemPrompt: string | undefined,
		userPrompt: string,
		options?: LLMCompletionOptions,
	): Promise<Completion>;
	getConfig(): LLMConfig;
}

interface ResolvedOptions {
	maxTokens: number;
	temperature: number;
	seed?: number;
	numCtx: number;
	signal?: AbortSignal;
}

export class LLMClient implements CompletionClient {
	private config: LLMConfig;
	private fetchFn: FetchFn;

	constructor(config: LLMConfig, fetchFn: FetchFn = fetch) {
		this.config = config;
		this.fetchFn = fetchFn;
	}

	async complete(
		systemPrompt: string | undefined,
		userPrompt: string,
		options: LLMCompletionOptions = {},
	): Promise<Completion> {
		if (requiresApiKey(this.config.provider) && !this.config.apiKey) {
			throw this.error(
				`API key required for ${this.config.provider}: set ${apiKeyVariables(this.config.provider).join(' or ')}`,
			);
		}

		const resolved: ResolvedOptions = {
			maxTokens: options.maxTokens ?? 1024,
			temperature: options.temperature ?? 0.3,
			seed: options.seed,
			numCtx: options.numCtx ?? 8192,
			signal: combineSignals(options.signal, options.timeoutMs),
		};

		try {
			switch (this.config.provider) {
				case 'anthropic':
					return await this.completeClaude(systemPrompt, userPrompt, resolved);
				case 'gemini':
					return await this.completeGemini(systemPrompt, userPrompt, resolved);
				case 'ollama':
					return await this.completeOllama(systemPrompt, userPrompt, resolved);
				default:
					return await this.completeOpenAI(systemPrompt, userPrompt, resolved);
			}
		} catch (error) {
			if (isLLMError(error)) {
				throw this.withModelHelp(error);
			}
			// Caller cancellation propagates untouched
			if (options.signal?.aborted) {
				throw error;
			}
			if (error instanceof Error && error.name === 'TimeoutError') {
				throw this.transientError(`${this.config.provider} request timed out`);
			}
			throw this.transientError(`Cannot reach ${this.config.provider}: ${formatError(error)}`);
		}
	}

	private error(message: string, status?: number, retryAfter?: number): LLMError {
		return createLLMError(message, {
			provider: this.config.provider,
			model: this.config.model,
			status,
			retryAfter,
		});
	}

	private transientError(message: string): LLMError {
		return createLLMError(message, {
			provider: this.config.provider,
			model: this.config.model,
			transient: true,
		});
	}

	private withModelHelp(error: LLMError): LLMError {
		const message = error.message.toLowerCase();
		if (
			!message.includes('model') ||
			!(message.includes('not found') || message.includes('does not exist'))
		) {
			return error;
		}

		const envVar = `NBBQ_${this.config.provider.toUpperCase()}_MODEL`;
		const helpText = isOllamaEndpoint(this.config.endpoint)
			? `\n\nTo fix this:\n  1. List available models: ollama list\n  2. Pull the model: ollama pull ${this.config.model}\n  3. Or use a different model: export ${envVar}="llama3"`
			: `\n\nSpecify a valid model using: export ${envVar}="your-model-name"`;

		return { ...error, message: error.message + helpText };
	}

	private async post(
		url: string,
		headers: Record<string, string>,
		body: unknown,
		signal?: AbortSignal,
	): Promise<unknown> {
		const response = await this.fetchFn(url, {
			method: 'POST',
			headers: { 'Content-Type': 'application/json', ...headers },
			body: JSON.stringify(body),
			signal,
		});

		if (!response.ok) {
			const errorText = await response.text().catch(() => '');
			throw this.error(
				`${this.config.provider} API error (${response.status}): ${errorText}`,
				response.status,
				parseRetryAfter(response.headers.get('retry-after')),
			);
		}

		return response.json();
	}

	private parse<S extends z.ZodTypeAny>(schema: S, data: unknown): z.infer<S> {
		const result = schema.safeParse(data);
		if (!result.success) {
			throw this.error(`${this.config.provider} returned an unexpected response shape`);
		}
		return result.data;
	}

	private async completeOpenAI(
		systemPrompt: string | undefined,
		userPrompt: string,
		options: ResolvedOptions,
	): Promise<Completion> {
		const messages: ChatMessage[] = [];
		if (systemPrompt) {
			messages.push({ role: 'system', content: systemPrompt });
		}
		messages.push({ role: 'user', content: userPrompt });

		const headers: Record<string, string> = {};
		if (this.config.apiKey) {
			headers.Authorization = `Bearer ${this.config.apiKey}`;
		}

		const body: Record<string, unknown> = {
			model: this.config.model,
			messages,
			max_tokens: options.maxTokens,
			temperature: options.temperature,
		};
		if (options.seed !== undefined && this.config.provider === 'openai') {
			body.seed = options.seed;
		}

		const data = this.parse(
			ChatCompletionSchema,
			await this.post(`${this.config.endpoint}/chat/completions`, headers, body, options.signal),
		);

		const choice = data.choices[0];
		if (!choice) {
			throw this.error('LLM returned no choices');
		}

		const finishReason = choice.finish_reason ?? undefined;
		return {
			text: (choice.message.content ?? '').trim(),
			blocked: finishReason === 'content_filter',
			finishReason,
		};
	}

	private async completeClaude(
		systemPrompt: string | undefined,
		userPrompt: string,
		options: ResolvedOptions,
	): Promise<Completion> {
		const body: Record<string, unknown> = {
			model: this.config.model,
			max_tokens: options.maxTokens,
			temperature: options.temperature,
			messages: [{ role: 'user', content: userPrompt }],
		};
		if (systemPrompt) {
			body.system = systemPrompt;
		}

		const data = this.parse(
			AnthropicMessageSchema,
			await this.post(
				`${this.config.endpoint}/messages`,
				{
					'x-api-key': this.config.apiKey ?? '',
					'anthropic-version': '2023-06-01',
				},
				body,
				options.signal,
			),
		);

		const text = data.content
			.filter((c) => c.type === 'text')
			.map((c) => c.text ?? '')
			.join('')
			.trim();
		const finishReason = data.stop_reason ?? undefined;

		return { text, blocked: finishReason === 'refusal', finishReason };
	}

	private async completeGemini(
		systemPrompt: string | undefined,
		userPrompt: string,
		options: ResolvedOptions,
	): Promise<Completion> {
		const body: Record<string, unknown> = {
			contents: [{ role: 'user', parts: [{ text: userPrompt }] }],
			generationConfig: {
				temperature: options.temperature,
				maxOutputTokens: options.maxTokens,
				...(options.seed !== undefined && { seed: options.seed }),
			},
		};
		if (systemPrompt) {
			body.systemInstruction = { parts: [{ text: systemPrompt }] };
		}

		const url = `${this.config.endpoint}/models/${encodeURIComponent(this.config.model)}:generateContent`;
		const data = this.parse(
			GeminiResponseSchema,
			await this.post(url, { 'x-goog-api-key': this.config.apiKey ?? '' }, body, options.signal),
		);

		const blockReason = data.promptFeedback?.blockReason;
		if (blockReason) {
			return { text: '', blocked: true, finishReason: blockReason };
		}

		const candidate = data.candidates?.[0];
		const text = (candidate?.content?.parts ?? [])
			.map((part) => part.text ?? '')
			.join('')
			.trim();
		const finishReason = candidate?.finishReason;

		return {
			text,
			blocked: finishReason !== undefined && GEMINI_BLOCK_REASONS.has(finishReason) && !text,
			finishReason,
		};
	}

	private async completeOllama(
		systemPrompt: string | undefined,
		userPrompt: string,
		options: ResolvedOptions,
	): Promise<Completion> {
		const messages: ChatMessage[] = [];
		if (systemPrompt) {
			messages.push({ role: 'system', content: systemPrompt });
		}
		messages.push({ role: 'user', content: userPrompt });

		const data = this.parse(
			OllamaChatSchema,
			await this.post(
				`${this.config.endpoint}/api/chat`,
				{},
				{
					model: this.config.model,
					messages,
					stream: false,
					options: {
						temperature: options.temperature,
						seed: options.seed ?? 42,
						num_ctx: options.numCtx,
					},
				},
				options.signal,
			),
		);

		return { text: (data.message?.content ?? '').trim(), blocked: false };
	}

	async checkHealth(): Promise<{ healthy: boolean; message: string }> {
		if (requiresApiKey(this.config.provider) && !this.config.apiKey) {
			return {
				healthy: false,
				message: `No API key (set ${apiKeyVariables(this.config.provider).join(' or ')})`,
			};
		}

		const probe = this.healthProbe();
		if (!probe) {
			return { healthy: true, message: 'API key configured (no health endpoint)' };
		}

		try {
			const response = await this.fetchFn(probe.url, {
				headers: probe.headers,
				signal: AbortSignal.timeout(10000),
			});
			if (response.ok) {
				return { healthy: true, message: `${this.config.provider} is reachable` };
			}
			return {
				healthy: false,
				message: `${this.config.provider} returned ${response.status}`,
			};
		} catch (error) {
			return {
				healthy: false,
				message: `Cannot connect to ${this.config.provider}: ${formatError(error)}`,
			};
		}
	}

	private healthProbe(): { url: string; headers: Record<string, string> } | null {
		const { endpoint, apiKey = '' } = this.config;
		switch (this.config.provider) {
			case 'ollama':
				return { url: `${endpoint}/api/tags`, headers: {} };
			case 'openai':
				return { url: `${endpoint}/models`, headers: { Authorization: `Bearer ${apiKey}` } };
			case 'anthropic':
				return {
					url: `${endpoint}/models`,
					headers: { 'x-api-key': apiKey, 'anthropic-version': '2023-06-01' },
				};
			case 'gemini':
				return { url: `${endpoint}/models`, headers: { 'x-goog-api-key': apiKey } };
			case 'perplexity':
				return null;
		}
	}

	getConfig(): LLMConfig {
		return { ...this.config };
	}
}

export function parseRetryAfter(value: string | null): number | undefined {
	if (!value) return undefined;
	const seconds = Number.parseFloat(value);
	if (!Number.isNaN(seconds) && seconds >= 0) {
		return seconds;
	}
	const date = Date.parse(value);
	if (!Number.isNaN(date)) {
		return Math.max(0, (date - Date.now()) / 1000);
	}
	return undefined;
}

function combineSignals(signal?: AbortSignal, timeoutMs?: number): AbortSignal | undefined {
	if (timeoutMs === undefined) {
		return signal;
	}
	const timeout = AbortSignal.timeout(timeoutMs);
	return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

export function createLLMClient(config: LLMConfig, fetchFn?: FetchFn): LLMClient {
	return new LLMClient(config, fetchFn);
}
