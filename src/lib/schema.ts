import { zodToJsonSchema } from 'zod-to-json-schema';
import {
	ClassificationRecordSchema,
	PromptRecordSchema,
	ResponseRecordSchema,
	ReviewItemSchema,
} from './bbq/types.js';
import { createInvalidArgsError } from './errors.js';

const RECORD_SCHEMAS = {
	review: ReviewItemSchema,
	prompt: PromptRecordSchema,
	response: ResponseRecordSchema,
	classification: ClassificationRecordSchema,
} as const;

export type SchemaName = keyof typeof RECORD_SCHEMAS;

export const SCHEMA_NAMES = Object.keys(RECORD_SCHEMAS);

function isSchemaName(value: string): value is SchemaName {
	return Object.hasOwn(RECORD_SCHEMAS, value);
}

/**
 * JSON Schema for one JSONL record type, for editors validating hand-edited files.
 */
export function recordJsonSchema(name: string): object {
	if (!isSchemaName(name)) {
		throw createInvalidArgsError(
			`Unknown record type "${name}". Expected one of: ${SCHEMA_NAMES.join(', ')}`,
			'record',
		);
	}
	return zodToJsonSchema(RECORD_SCHEMAS[name], { name, $refStrategy: 'none' });
}
