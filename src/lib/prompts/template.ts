import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import matter from 'gray-matter';
import { z } from 'zod';
import { createNotFoundError, createParseError } from '../errors.js';
import { expandTilde } from '../path-utils.js';

export const PLACEHOLDERS = ['context', 'question', 'ans0', 'ans1', 'ans2'] as const;
export type Placeholder = (typeof PLACEHOLDERS)[number];

/** Placeholders that must appear exactly once: one context, one question */
const SINGLETON_PLACEHOLDERS: readonly Placeholder[] = ['context', 'question'];

const PLACEHOLDER_PATTERN = /\{\{\s*([A-Za-z0-9_]+)\s*\}\}/g;

export interface TemplateFrontmatter {
	id: string;
	language: string;
	system?: string;
	description?: string;
}

const TemplateFrontmatterSchema = z.object({
	id: z
		.string()
		.min(1)
		.regex(/^[a-z0-9][a-z0-9-]*$/, 'id must be lowercase letters, digits and dashes'),
	language: z.string().min(1),
	system: z.string().optional(),
	description: z.string().optional(),
});

export interface PromptTemplate extends TemplateFrontmatter {
	body: string;
	placeholders: Placeholder[];
	path?: string;
}

const BUILTIN_DIR = fileURLToPath(new URL('../../../templates/', import.meta.url));

export const BUILTIN_TEMPLATES = ['multiple-choice', 'open-ended'] as const;

function isPlaceholder(name: string): name is Placeholder {
	return PLACEHOLDERS.some((known) => known === name);
}

export function findPlaceholders(body: string): string[] {
	return [...body.matchAll(PLACEHOLDER_PATTERN)].map((match) => match[1] ?? '');
}

/**
 * Parse a template file: YAML front matter plus a body with {{placeholders}}.
 */
export function parseTemplate(content: string, source = '<template>'): PromptTemplate {
	const { data, content: rawBody } = matter(content);

	const frontmatter = TemplateFrontmatterSchema.safeParse(data);
	if (!frontmatter.success) {
		const detail = frontmatter.error.issues
			.map((issue) => `${issue.path.join('.') || 'front matter'}: ${issue.message}`)
			.join('; ');
		throw createParseError(`Invalid template front matter in ${source}: ${detail}`, source);
	}

	const body = rawBody.trim();
	const found = findPlaceholders(body);

	const unknown = found.filter((name) => !isPlaceholder(name));
	if (unknown.length > 0) {
		throw createParseError(
			`Unknown placeholder(s) in ${source}: ${[...new Set(unknown)].map((n) => `{{${n}}}`).join(', ')}`,
			source,
		);
	}

	for (const required of SINGLETON_PLACEHOLDERS) {
		const count = found.filter((name) => name === required).length;
		if (count !== 1) {
			throw createParseError(
				`Template ${source} must contain {{${required}}} exactly once (found ${count})`,
				source,
			);
		}
	}

	return {
		...frontmatter.data,
		body,
		placeholders: [...new Set(found.filter(isPlaceholder))],
	};
}

export function loadTemplateFile(filePath: string): PromptTemplate {
	if (!fs.existsSync(filePath)) {
		throw createNotFoundError(`Template not found: ${filePath}`, filePath);
	}
	const template = parseTemplate(fs.readFileSync(filePath, 'utf-8'), filePath);
	return { ...template, path: filePath };
}

/**
 * Load a template by built-in name or file path.
 * Relative paths are resolved against `baseDir`.
 */
export function loadTemplate(nameOrPath: string, baseDir = process.cwd()): PromptTemplate {
	if (BUILTIN_TEMPLATES.some((name) => name === nameOrPath)) {
		return loadTemplateFile(path.join(BUILTIN_DIR, `${nameOrPath}.md`));
	}
	return loadTemplateFile(path.resolve(baseDir, expandTilde(nameOrPath)));
}

export function renderTemplate(
	template: PromptTemplate,
	values: Record<Placeholder, string>,
): string {
	return template.body.replace(PLACEHOLDER_PATTERN, (_match, name: string) =>
		isPlaceholder(name) ? values[name].trim() : '',
	);
}
