import { z } from 'zod';
import type { Answers } from '../bbq/types.js';

export interface PromptPair {
	system: string;
	user: string;
}

export function buildTranslationPrompt(
	source: { context: string; question: string; answers: Answers },
	targetLanguage: string,
): PromptPair {
	return {
		system: `You are a translator. Translate any input text into ${targetLanguage}. Rules: Return ONLY the translation. Do not explain, do not add quotes. Keep names (like Nancy) unchanged.`,
		user: `Translate every string value in this JSON object into ${targetLanguage}.
Keep the keys and the structure exactly as they are. The "answers" array must keep its three entries in the same order.

${JSON.stringify(source, null, 2)}

Return only the translated JSON object.`,
	};
}

export interface ClassificationCandidate {
	id: number;
	text: string;
	labels: string[];
}

const CLASSIFIER_SYSTEM = 'Du er en streng klassifikator.';

export function buildClassificationPrompt(text: string, labels: readonly string[]): PromptPair {
	const allowed = labels.join(', ');
	return {
		system: CLASSIFIER_SYSTEM,
		user: `Returner KUN én etikett, nøyaktig som skrevet, uten forklaring, uten ekstra tegn.

Velg hvilken av disse etikettene som passer best til teksten: ${allowed}.

Tekst:
${text}

Returner kun én: ${allowed}`,
	};
}

export function buildBatchClassificationPrompt(
	candidates: readonly ClassificationCandidate[],
): PromptPair {
	const lines = candidates.map(
		(c) => `ID=${c.id} | Tillatte: ${c.labels.join(', ')} | Tekst: ${c.text.replace(/\s+/g, ' ')}`,
	);

	return {
		system: CLASSIFIER_SYSTEM,
		user: `Oppgave: For hvert element skal du returnere KUN én etikett fra listen angitt.
Output-format: ÉN linje per element, nøyaktig slik: 'ID=<id> <etikett>'
Ingen ekstra tekst, ingen forklaring, ingen punktum.

ELEMENTER:
${lines.join('\n')}

Returner nå kun resultatlinjene:
Eksempel: ID=12 ans1`,
	};
}

/**
 * Find the first balanced JSON object in the response text.
 * Handles nested objects and escaped characters properly.
 */
export function findBalancedJsonObject(text: string): string | null {
	const startIndex = text.indexOf('{');
	if (startIndex === -1) {
		return null;
	}

	let depth = 0;
	let inString = false;
	let escapeNext = false;

	for (let i = startIndex; i < text.length; i++) {
		const char = text[i];

		if (escapeNext) {
			escapeNext = false;
			continue;
		}

		if (char === '\\' && inString) {
			escapeNext = true;
			continue;
		}

		if (char === '"') {
			inString = !inString;
			continue;
		}

		if (!inString) {
			if (char === '{') {
				depth++;
			} else if (char === '}') {
				depth--;
				if (depth === 0) {
					return text.slice(startIndex, i + 1);
				}
			}
		}
	}

	return null;
}

const TranslationResponseSchema = z.object({
	context: z.string().min(1),
	question: z.string().min(1),
	answers: z.tuple([z.string().min(1), z.string().min(1), z.string().min(1)]),
});

export type TranslationDraft = z.infer<typeof TranslationResponseSchema>;

/**
 * Extract the translated object from a model response.
 * Returns null when the response holds no object of the expected shape.
 */
export function parseTranslationResponse(response: string): TranslationDraft | null {
	const objectString = findBalancedJsonObject(response);
	if (!objectString) {
		return null;
	}

	try {
		const result = TranslationResponseSchema.safeParse(JSON.parse(objectString));
		return result.success ? result.data : null;
	} catch {
		return null;
	}
}
