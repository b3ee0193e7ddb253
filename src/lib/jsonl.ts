import fs from 'node:fs';
import path from 'node:path';
import type { z } from 'zod';
import { createFileSystemError, createParseError } from './errors.js';

export interface JsonlWarning {
	path: string;
	line: number;
	message: string;
}

export interface LenientReadResult<T> {
	records: T[];
	warnings: JsonlWarning[];
}

function describeIssue(error: unknown): string {
	if (error && typeof error === 'object' && 'issues' in error && Array.isArray(error.issues)) {
		return error.issues
			.map((issue: { path?: Array<string | number>; message?: string }) => {
				const where = issue.path && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
				return `${where}${issue.message ?? 'invalid value'}`;
			})
			.join('; ');
	}
	return error instanceof Error ? error.message : String(error);
}

/**
 * Parse JSONL text, validating each non-blank line.
 * Throws a ParseError naming the first bad line.
 */
export function parseJsonl<S extends z.ZodTypeAny>(
	content: string,
	schema: S,
	source = '<input>',
): z.infer<S>[] {
	const records: z.infer<S>[] = [];
	const lines = content.split('\n');

	for (let i = 0; i < lines.length; i++) {
		const line = lines[i]?.trim() ?? '';
		if (line === '') {
			continue;
		}

		let value: unknown;
		try {
			value = JSON.parse(line);
		} catch (error) {
			throw createParseError(
				`Invalid JSON in ${source} at line ${i + 1}: ${describeIssue(error)}`,
				source,
				i + 1,
			);
		}

		const result = schema.safeParse(value);
		if (!result.success) {
			throw createParseError(
				`Invalid record in ${source} at line ${i + 1}: ${describeIssue(result.error)}`,
				source,
				i + 1,
			);
		}
		records.push(result.data);
	}

	return records;
}

export function readJsonl<S extends z.ZodTypeAny>(filePath: string, schema: S): z.infer<S>[] {
	let content: string;
	try {
		content = fs.readFileSync(filePath, 'utf-8');
	} catch (error) {
		throw createFileSystemError(`Cannot read ${filePath}: ${describeIssue(error)}`, filePath);
	}
	return parseJsonl(content, schema, filePath);
}

/**
 * Read a JSONL file, skipping lines that fail to parse or validate.
 * A missing file reads as empty.
 */
export function readJsonlLenient<S extends z.ZodTypeAny>(
	filePath: string,
	schema: S,
): LenientReadResult<z.infer<S>> {
	if (!fs.existsSync(filePath)) {
		return { records: [], warnings: [] };
	}

	const records: z.infer<S>[] = [];
	const warnings: JsonlWarning[] = [];
	const lines = fs.readFileSync(filePath, 'utf-8').split('\n');

	for (let i = 0; i < lines.length; i++) {
		const line = lines[i]?.trim() ?? '';
		if (line === '') {
			continue;
		}
		try {
			const result = schema.safeParse(JSON.parse(line));
			if (result.success) {
				records.push(result.data);
			} else {
				warnings.push({ path: filePath, line: i + 1, message: describeIssue(result.error) });
			}
		} catch (error) {
			warnings.push({ path: filePath, line: i + 1, message: describeIssue(error) });
		}
	}

	return { records, warnings };
}

export function serializeJsonl(records: readonly unknown[]): string {
	return records.map((record) => `${JSON.stringify(record)}\n`).join('');
}

/**
 * Replace a JSONL file via a sibling temp file and rename.
 */
export function writeJsonl(filePath: string, records: readonly unknown[]): void {
	fs.mkdirSync(path.dirname(filePath), { recursive: true });
	const tmpPath = `${filePath}.tmp`;
	fs.writeFileSync(tmpPath, serializeJsonl(records), 'utf-8');
	fs.renameSync(tmpPath, filePath);
}

export function appendJsonl(filePath: string, record: unknown): void {
	fs.mkdirSync(path.dirname(filePath), { recursive: true });
	fs.appendFileSync(filePath, `${JSON.stringify(record)}\n`, 'utf-8');
}
