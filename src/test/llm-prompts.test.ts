import { describe, expect, test } from 'vitest';
import type { Answers } from '../lib/bbq/types.js';
import {
	buildBatchClassificationPrompt,
	buildClassificationPrompt,
	buildTranslationPrompt,
	findBalancedJsonObject,
	parseTranslationResponse,
} from '../lib/llm/prompts.js';

describe('buildTranslationPrompt', () => {
	test('names the target language and embeds the source object', () => {
		const answers: Answers = ['Nancy', 'The doctor', 'Unknown'];
		const source = { context: 'Nancy met a doctor.', question: 'Who was rude?', answers };
		const prompt = buildTranslationPrompt(source, 'Norwegian');
		expect(prompt.system).toContain('Translate any input text into Norwegian.');
		expect(prompt.user).toContain(JSON.stringify(source, null, 2));
		expect(prompt.user.endsWith('Return only the translated JSON object.')).toBe(true);
	});
});

describe('buildClassificationPrompt', () => {
	test('lists the allowed labels', () => {
		const prompt = buildClassificationPrompt('Svaret er bestefaren', ['ans0', 'ans1', 'ans2']);
		expect(prompt.system).toBe('Du er en streng klassifikator.');
		expect(prompt.user).toContain('Tekst:\nSvaret er bestefaren');
		expect(prompt.user.endsWith('Returner kun én: ans0, ans1, ans2')).toBe(true);
	});
});

describe('buildBatchClassificationPrompt', () => {
	test('writes one line per candidate with whitespace collapsed', () => {
		const prompt = buildBatchClassificationPrompt([
			{ id: 1, text: 'Første\n  svar', labels: ['ans0', 'ans1'] },
			{ id: 2, text: 'Andre svar', labels: ['ans2'] },
		]);
		expect(prompt.user).toContain(
			'ELEMENTER:\nID=1 | Tillatte: ans0, ans1 | Tekst: Første svar\nID=2 | Tillatte: ans2 | Tekst: Andre svar\n',
		);
	});
});

describe('findBalancedJsonObject', () => {
	test('finds the first object among surrounding prose', () => {
		expect(findBalancedJsonObject('Here: {"a":{"b":1}} and {"c":2}')).toBe('{"a":{"b":1}}');
	});

	test('ignores braces inside strings', () => {
		expect(findBalancedJsonObject('{"text":"a } b \\" {"}')).toBe('{"text":"a } b \\" {"}');
	});

	test('returns null without a complete object', () => {
		expect(findBalancedJsonObject('no json')).toBeNull();
		expect(findBalancedJsonObject('{"open": 1')).toBeNull();
	});
});

describe('parseTranslationResponse', () => {
	const draft = { context: 'Kontekst', question: 'Spørsmål?', answers: ['A', 'B', 'C'] };

	test('extracts a draft wrapped in prose', () => {
		expect(parseTranslationResponse(`Oversettelse:\n${JSON.stringify(draft)}\nFerdig.`)).toEqual(draft);
	});

	test('rejects objects of the wrong shape', () => {
		expect(parseTranslationResponse(JSON.stringify({ ...draft, answers: ['A', 'B'] }))).toBeNull();
		expect(parseTranslationResponse(JSON.stringify({ ...draft, context: '' }))).toBeNull();
	});

	test('rejects malformed JSON', () => {
		expect(parseTranslationResponse("{context: 'x'}")).toBeNull();
	});
});
