import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { expandTilde } from '../path-utils.js';

export const CONFIG_FILENAME = 'nbbq.json';

export const DEFAULT_SOURCE_URL = 'https://raw.githubusercontent.com/nyu-mll/BBQ/main/data';

/** Hard ceiling on the per-category subset size */
export const MAX_SAMPLE_SIZE = 50;

export const PROVIDER_NAMES = ['openai', 'gemini', 'perplexity', 'anthropic', 'ollama'] as const;
export type ProviderName = (typeof PROVIDER_NAMES)[number];

export type Stage = 'raw' | 'sampled' | 'review' | 'prompts' | 'responses' | 'classified';
export const STAGES: readonly Stage[] = [
	'raw',
	'sampled',
	'review',
	'prompts',
	'responses',
	'classified',
];

export interface DispatchSettings {
	sleepEachMs: number;
	pauseEvery: number;
	pauseSeconds: number;
	maxAttempts: number;
	timeoutMs: number;
}

export interface WorkspaceConfig {
	sourceUrl: string;
	sampleSize: number;
	seed: number;
	language: string;
	template: string;
	providers: ProviderName[];
	dispatch: DispatchSettings;
}

const DispatchSettingsSchema = z.object({
	sleepEachMs: z.number().int().nonnegative().default(300),
	pauseEvery: z.number().int().nonnegative().default(0),
	pauseSeconds: z.number().nonnegative().default(30),
	maxAttempts: z.number().int().min(1).max(20).default(6),
	timeoutMs: z.number().int().positive().default(180000),
});

export const WorkspaceConfigSchema = z.object({
	sourceUrl: z.string().url().default(DEFAULT_SOURCE_URL),
	sampleSize: z.number().int().min(1).max(MAX_SAMPLE_SIZE).default(MAX_SAMPLE_SIZE),
	seed: z.number().int().default(42),
	language: z.string().min(1).default('Norwegian'),
	template: z.string().min(1).default('multiple-choice'),
	providers: z.array(z.enum(PROVIDER_NAMES)).min(1).default(['openai', 'gemini', 'perplexity']),
	dispatch: DispatchSettingsSchema.default({}),
});

export function defaultWorkspaceConfig(): WorkspaceConfig {
	return WorkspaceConfigSchema.parse({});
}

/**
 * Resolve the workspace directory.
 * Precedence: explicit --dir, NBBQ_WORKSPACE, current directory.
 */
export function resolveWorkspace(dir?: string): string {
	const base = dir ?? process.env.NBBQ_WORKSPACE ?? process.cwd();
	return path.resolve(expandTilde(base));
}

export function getConfigPath(workspace: string): string {
	return path.join(workspace, CONFIG_FILENAME);
}

/**
 * Load nbbq.json from the workspace, returning defaults if it doesn't exist.
 * Warns to stderr if the file exists but is corrupt.
 */
export function loadWorkspaceConfig(workspace: string): WorkspaceConfig {
	const configPath = getConfigPath(workspace);

	if (!fs.existsSync(configPath)) {
		return defaultWorkspaceConfig();
	}

	try {
		const content = fs.readFileSync(configPath, 'utf-8');
		return WorkspaceConfigSchema.parse(JSON.parse(content));
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		console.error(`Warning: Failed to parse workspace config: ${configPath}`);
		console.error(`  ${message}`);
		console.error('Using default settings.');
		return defaultWorkspaceConfig();
	}
}

export function saveWorkspaceConfig(workspace: string, config: WorkspaceConfig): void {
	fs.mkdirSync(workspace, { recursive: true });
	fs.writeFileSync(getConfigPath(workspace), `${JSON.stringify(config, null, 2)}\n`, 'utf-8');
}

/**
 * Path of a stage file. Provider-scoped stages (responses, classified)
 * nest one directory per provider.
 */
export function stagePath(
	workspace: string,
	stage: Stage,
	category: string,
	provider?: string,
): string {
	if (stage === 'responses' || stage === 'classified') {
		if (!provider) {
			throw new Error(`Stage "${stage}" requires a provider`);
		}
		return path.join(workspace, stage, provider, `${category}.jsonl`);
	}
	return path.join(workspace, stage, `${category}.jsonl`);
}

export function isProviderName(value: string): value is ProviderName {
	return PROVIDER_NAMES.some((known) => known === value);
}
