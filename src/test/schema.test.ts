import { describe, expect, test } from 'vitest';
import { SCHEMA_NAMES, recordJsonSchema } from '../lib/schema.js';
import { thrownBy } from './fixtures.js';

describe('recordJsonSchema', () => {
	test('covers every record type', () => {
		expect(SCHEMA_NAMES).toEqual(['review', 'prompt', 'response', 'classification']);
	});

	test('describes the response record', () => {
		expect(recordJsonSchema('response')).toMatchObject({
			$ref: '#/definitions/response',
			definitions: {
				response: {
					type: 'object',
					properties: {
						status: { type: 'string', enum: ['ok', 'empty', 'blocked', 'error'] },
					},
					required: expect.arrayContaining(['promptId', 'status', 'text']),
				},
			},
		});
	});

	test('allows a null translation in review records', () => {
		expect(recordJsonSchema('review')).toMatchObject({
			definitions: { review: { properties: { translation: { anyOf: expect.any(Array) } } } },
		});
	});

	test('rejects an unknown record type', () => {
		expect(thrownBy(() => recordJsonSchema('toString'))).toMatchObject({
			_tag: 'InvalidArgsError',
			arg: 'record',
			message: 'Unknown record type "toString". Expected one of: review, prompt, response, classification',
		});
	});
});
