import chalk from 'chalk';
import { beforeAll, describe, expect, test } from 'vitest';
import {
	CsvFormatter,
	HumanFormatter,
	JsonFormatter,
	XmlFormatter,
	flattenRecord,
	getFormatter,
} from '../lib/formatters.js';

beforeAll(() => {
	chalk.level = 0;
});

describe('JsonFormatter', () => {
	const formatter = new JsonFormatter();

	test('formats object as pretty JSON', () => {
		expect(formatter.format({ key: 'value' })).toBe('{\n  "key": "value"\n}');
	});

	test('formats array as pretty JSON', () => {
		expect(formatter.format([1, 2, 3])).toBe('[\n  1,\n  2,\n  3\n]');
	});

	test('formats error as JSON object', () => {
		expect(formatter.formatError({ message: 'Something went wrong' })).toBe(
			'{\n  "error": "Something went wrong"\n}',
		);
	});
});

describe('XmlFormatter', () => {
	const formatter = new XmlFormatter();

	test('formats nested records with item elements', () => {
		expect(formatter.format([{ id: 'Age-0', answers: ['A', 'B'] }])).toBe(
			[
				'<result>',
				'  <item>',
				'    <id>Age-0</id>',
				'    <answers>',
				'      <item>A</item>',
				'      <item>B</item>',
				'    </answers>',
				'  </item>',
				'</result>',
			].join('\n'),
		);
	});

	test('writes an empty array as an empty element', () => {
		expect(formatter.format([])).toBe('<result/>');
	});

	test('escapes special XML characters', () => {
		const result = formatter.format({ text: '<script>alert("xss")</script>' });
		expect(result).toContain('<text>&lt;script&gt;alert(&quot;xss&quot;)&lt;/script&gt;</text>');
	});

	test('formats error as XML', () => {
		expect(formatter.formatError({ message: 'a < b' })).toBe('<error>a &lt; b</error>');
	});
});

describe('flattenRecord', () => {
	test('uses dotted keys for nested values', () => {
		expect(
			flattenRecord({
				id: 'Age-0',
				answers: ['A', 'B'],
				translation: { context: 'K', origin: 'human' },
				review: {},
				error: null,
			}),
		).toEqual({
			id: 'Age-0',
			'answers.0': 'A',
			'answers.1': 'B',
			'translation.context': 'K',
			'translation.origin': 'human',
			review: '',
			error: '',
		});
	});
});

describe('CsvFormatter', () => {
	const formatter = new CsvFormatter();

	test('writes a header from the union of keys', () => {
		expect(formatter.format([{ id: 'a', label: 'ans0' }, { id: 'b', method: 'llm' }])).toBe(
			'id,label,method\na,ans0,\nb,,llm',
		);
	});

	test('quotes fields with commas, quotes and newlines', () => {
		expect(formatter.format([{ text: 'Hei, "du"\nder' }])).toBe('text\n"Hei, ""du""\nder"');
	});

	test('formats a single object as one row', () => {
		expect(formatter.format({ total: 3, labelled: 2 })).toBe('total,labelled\n3,2');
	});

	test('formats error as a one-column table', () => {
		expect(formatter.formatError({ message: 'bad, input' })).toBe('error\n"bad, input"');
	});
});

describe('HumanFormatter', () => {
	const formatter = new HumanFormatter();

	test('formats a category summary as a titled section', () => {
		expect(
			formatter.format({
				category: 'Age',
				provider: 'openai',
				total: 3,
				distribution: { ans0: 2, ans2: 1 },
				errors: [],
			}),
		).toBe('Age (openai)\n  total: 3\n  distribution: ans0=2, ans2=1');
	});

	test('lists review problems', () => {
		expect(formatter.format({ category: 'SES', total: 1, errors: ['Duplicate item id "SES-1"'] })).toBe(
			'SES\n  total: 1\n\n1 problem(s):\n  Duplicate item id "SES-1"',
		);
	});

	test('marks an empty nested record', () => {
		expect(formatter.format({ provider: 'gemini', distribution: {} })).toBe(
			'gemini\n  distribution: none',
		);
	});

	test('formats provider health', () => {
		expect(
			formatter.format({
				provider: 'ollama',
				healthy: false,
				message: 'ollama returned 500',
				model: 'llama3',
				endpoint: 'http://localhost:11434',
			}),
		).toBe('✗ ollama ollama returned 500\n  Model: llama3\n  Endpoint: http://localhost:11434');
	});

	test('separates array items with a blank line', () => {
		expect(formatter.format([{ provider: 'a', ok: 1 }, { provider: 'b', ok: 2 }])).toBe(
			'a\n  ok: 1\n\nb\n  ok: 2',
		);
	});

	test('formats nested record lists under their key', () => {
		expect(formatter.format({ workspace: '/ws', providers: [{ provider: 'openai', ok: 1 }] })).toBe(
			'workspace: /ws\nproviders:\nopenai\n  ok: 1',
		);
	});

	test('formats error with prefix', () => {
		expect(formatter.formatError({ message: 'Test error' })).toBe('Error: Test error');
	});
});

describe('getFormatter', () => {
	test('returns the formatter for each format', () => {
		expect(getFormatter('json')).toBeInstanceOf(JsonFormatter);
		expect(getFormatter('xml')).toBeInstanceOf(XmlFormatter);
		expect(getFormatter('csv')).toBeInstanceOf(CsvFormatter);
		expect(getFormatter('human')).toBeInstanceOf(HumanFormatter);
	});
});
