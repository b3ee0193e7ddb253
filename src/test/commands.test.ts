import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { runClassifyCommand } from '../cli/commands/classify.js';
import { runDispatchCommand } from '../cli/commands/dispatch.js';
import { parseStage, runExportCommand } from '../cli/commands/export.js';
import { runFetchCommand } from '../cli/commands/fetch.js';
import { runPromptsCommand } from '../cli/commands/prompts.js';
import { runReviewCheckCommand, runReviewExportCommand } from '../cli/commands/review.js';
import { runSampleCommand } from '../cli/commands/sample.js';
import { runStatusCommand } from '../cli/commands/status.js';
import { runTranslateCommand } from '../cli/commands/translate.js';
import type { CommandContext } from '../cli/context.js';
import { ReviewItemSchema } from '../lib/bbq/types.js';
import { defaultWorkspaceConfig, stagePath } from '../lib/config/workspace.js';
import { ResponseArchive } from '../lib/dispatch/archive.js';
import { readJsonl, writeJsonl } from '../lib/jsonl.js';
import type { LLMConfig } from '../lib/llm/config.js';
import { createLogger } from '../lib/logger.js';
import {
	NORWEGIAN_TRANSLATION,
	ScriptedClient,
	completion,
	createFakeFetch,
	jsonResponse,
	makeBbqRecord,
	makePrompt,
	makeReviewItem,
	makeTempDir,
	removeDir,
	thrownBy,
} from './fixtures.js';

const DRAFT = JSON.stringify({
	context: NORWEGIAN_TRANSLATION.context,
	question: NORWEGIAN_TRANSLATION.question,
	answers: NORWEGIAN_TRANSLATION.answers,
});

function rawBody(): string {
	return [0, 1, 2]
		.map((i) => JSON.stringify(makeBbqRecord({ example_id: i, context: `Context number ${i}.` })))
		.join('\n');
}

describe('workspace commands', () => {
	let workspace: string;
	let ctx: CommandContext;

	beforeEach(() => {
		workspace = makeTempDir();
		const config = defaultWorkspaceConfig();
		ctx = {
			workspace,
			config: {
				...config,
				sourceUrl: 'https://example.test/data',
				dispatch: { ...config.dispatch, sleepEachMs: 0 },
			},
			categories: ['Age'],
			providers: ['openai'],
			logger: createLogger(false),
		};
	});

	afterEach(() => {
		removeDir(workspace);
		vi.unstubAllEnvs();
	});

	test('commands warn and skip when earlier stages are missing', async () => {
		expect(runSampleCommand(ctx, { limit: 50, seed: 1 })).toEqual([
			{ category: 'Age', status: 'missing', raw: 0, unique: 0, sampled: 0 },
		]);
		expect(runReviewExportCommand(ctx)[0]?.status).toBe('missing');
		expect(runReviewCheckCommand(ctx)).toEqual([]);
		expect(await runDispatchCommand(ctx, {})).toEqual([]);
		expect(await runClassifyCommand(ctx, {})).toEqual([]);
		expect(runExportCommand(ctx, 'responses')).toEqual([]);
	});

	test('runs the pipeline from download to classification', async () => {
		const fake = createFakeFetch([new Response(rawBody())]);
		expect(await runFetchCommand(ctx, { force: false, fetchFn: fake.fetch })).toEqual([
			{ category: 'Age', status: 'downloaded', records: 3, path: path.join('raw', 'Age.jsonl') },
		]);

		expect(runSampleCommand(ctx, { limit: 50, seed: 1 })).toEqual([
			{
				category: 'Age',
				status: 'sampled',
				raw: 3,
				unique: 3,
				sampled: 3,
				path: path.join('sampled', 'Age.jsonl'),
			},
		]);

		expect(runReviewExportCommand(ctx)).toEqual([
			{
				category: 'Age',
				status: 'exported',
				items: 3,
				kept: 0,
				added: 3,
				dropped: 0,
				path: path.join('review', 'Age.jsonl'),
			},
		]);

		const translator = new ScriptedClient([completion(DRAFT), completion(DRAFT), completion(DRAFT)]);
		const translated = await runTranslateCommand(ctx, {
			provider: 'openai',
			language: 'Norwegian',
			createClient: () => translator,
		});
		expect(translated).toEqual([
			{ category: 'Age', provider: 'openai', translated: 3, failed: 0, skipped: 0, interrupted: false },
		]);

		// A reviewer approves two drafts and rejects one
		const reviewPath = stagePath(workspace, 'review', 'Age');
		const drafts = readJsonl(reviewPath, ReviewItemSchema);
		writeJsonl(
			reviewPath,
			drafts.map((item, i) => ({ ...item, review: { status: i < 2 ? 'approved' : 'rejected' } })),
		);
		expect(runReviewCheckCommand(ctx)).toEqual([
			{ category: 'Age', total: 3, pending: 0, approved: 2, rejected: 1, untranslated: 0, errors: [] },
		]);

		expect(runPromptsCommand(ctx, { template: 'multiple-choice' })).toEqual([
			{
				category: 'Age',
				template: 'multiple-choice',
				reviewed: 3,
				approved: 2,
				prompts: 2,
				path: path.join('prompts', 'Age.jsonl'),
			},
		]);

		const configs: LLMConfig[] = [];
		const responder = new ScriptedClient([completion('ans2'), completion('Bestefaren, tror jeg')]);
		const summaries = await runDispatchCommand(ctx, {
			createClient: (config) => {
				configs.push(config);
				return responder;
			},
		});
		expect(configs.map((c) => c.provider)).toEqual(['openai']);
		expect(summaries).toEqual([
			{
				provider: 'openai',
				model: 'test-model',
				total: 2,
				skipped: 0,
				ok: 2,
				empty: 0,
				blocked: 0,
				error: 0,
				interrupted: false,
			},
		]);
		expect(responder.calls[0]?.system).toBe('Du er en hjelpsom assistent. Les teksten og svar på spørsmålet.');

		expect(await runClassifyCommand(ctx, {})).toEqual([
			{
				category: 'Age',
				provider: 'openai',
				total: 2,
				labelled: 1,
				unlabelled: 1,
				matchingExpected: 1,
				distribution: { ans2: 1 },
			},
		]);
		expect(fs.existsSync(stagePath(workspace, 'classified', 'Age', 'openai'))).toBe(true);

		expect(runExportCommand(ctx, 'responses')).toEqual([
			expect.objectContaining({ status: 'ok', text: 'ans2' }),
			expect.objectContaining({ status: 'ok', text: 'Bestefaren, tror jeg' }),
		]);
		expect(runExportCommand(ctx, 'classified')).toHaveLength(2);
		expect(runExportCommand(ctx, 'raw')).toHaveLength(3);

		vi.stubEnv('OPENAI_API_KEY', 'test-secret');
		const health = createFakeFetch([jsonResponse({ data: [] })]);
		const status = await runStatusCommand(ctx, { all: false, fetchFn: health.fetch });
		expect(status.providers).toEqual([
			{
				provider: 'openai',
				model: 'gpt-4o',
				endpoint: 'https://api.openai.com/v1',
				healthy: true,
				message: 'openai is reachable',
			},
		]);
		expect(status.categories).toEqual([
			{ category: 'Age', raw: 3, sampled: 3, review: 3, prompts: 2, responses: { openai: 2 } },
		]);
	});

	test('review export keeps reviewers work when sampling again', () => {
		writeJsonl(
			stagePath(workspace, 'raw', 'Age'),
			[0, 1].map((i) => makeBbqRecord({ example_id: i, context: `C${i}` })),
		);
		runSampleCommand(ctx, { limit: 50, seed: 1 });
		runReviewExportCommand(ctx);

		const reviewPath = stagePath(workspace, 'review', 'Age');
		const items = readJsonl(reviewPath, ReviewItemSchema).map((item) => ({
			...item,
			translation: NORWEGIAN_TRANSLATION,
			review: { status: 'approved' as const, reviewer: 'test' },
		}));
		writeJsonl(reviewPath, items);

		expect(runReviewExportCommand(ctx)[0]).toMatchObject({ items: 2, kept: 2, added: 0, dropped: 0 });
		expect(readJsonl(reviewPath, ReviewItemSchema).every((item) => item.review.reviewer === 'test')).toBe(true);
	});

	test('review check reports unreadable lines', () => {
		fs.mkdirSync(path.dirname(stagePath(workspace, 'review', 'Age')), { recursive: true });
		fs.writeFileSync(stagePath(workspace, 'review', 'Age'), 'not json\n');
		const [summary] = runReviewCheckCommand(ctx);
		expect(summary?.total).toBe(0);
		expect(summary?.errors).toHaveLength(1);
		expect(summary?.errors[0]?.startsWith('line 1: ')).toBe(true);
	});

	test('prompts finds a configured template inside the workspace', () => {
		fs.mkdirSync(path.join(workspace, 'templates'));
		fs.writeFileSync(
			path.join(workspace, 'templates', 'short.md'),
			'---\nid: short\nlanguage: nb\n---\n{{context}} {{question}}\n',
		);
		writeJsonl(stagePath(workspace, 'review', 'Age'), [
			makeReviewItem({ translation: NORWEGIAN_TRANSLATION, review: { status: 'approved' } }),
		]);

		expect(runPromptsCommand(ctx, { template: path.join('templates', 'short.md') })).toEqual([
			{
				category: 'Age',
				template: 'short',
				reviewed: 1,
				approved: 1,
				prompts: 1,
				path: path.join('prompts', 'Age.jsonl'),
			},
		]);
	});

	test('classify with a model reuses the labels of an earlier run', async () => {
		const prompts = ['Age-0', 'Age-1'].map((itemId) =>
			makePrompt({ id: `${itemId}:multiple-choice`, itemId }),
		);
		writeJsonl(stagePath(workspace, 'prompts', 'Age'), prompts);
		const archive = new ResponseArchive(workspace);
		for (const prompt of prompts) {
			archive.append({
				promptId: prompt.id,
				provider: 'openai',
				model: 'test-model',
				category: 'Age',
				status: 'ok',
				text: 'Bestefaren',
				attempts: 1,
				durationMs: 5,
				createdAt: '2026-01-01T00:00:00.000Z',
			});
		}

		const expected = [
			{
				category: 'Age',
				provider: 'openai',
				total: 2,
				labelled: 2,
				unlabelled: 0,
				matchingExpected: 0,
				distribution: { ans0: 1, ans1: 1 },
			},
		];

		const first = new ScriptedClient([completion('ID=1 ans0\nID=2 ans1')]);
		expect(await runClassifyCommand(ctx, { llm: 'openai', createClient: () => first })).toEqual(expected);
		expect(first.calls).toHaveLength(1);

		const second = new ScriptedClient([]);
		expect(await runClassifyCommand(ctx, { llm: 'openai', createClient: () => second })).toEqual(expected);
		expect(second.calls).toHaveLength(0);
	});

	test('dispatch refuses a model override for several providers', async () => {
		await expect(
			runDispatchCommand({ ...ctx, providers: ['openai', 'gemini'] }, { model: 'x' }),
		).rejects.toMatchObject({ _tag: 'InvalidArgsError', arg: '--model' });
	});
});

describe('parseStage', () => {
	test('accepts known stages only', () => {
		expect(parseStage('prompts')).toBe('prompts');
		expect(thrownBy(() => parseStage('scores'))).toMatchObject({
			_tag: 'InvalidArgsError',
			arg: 'stage',
		});
	});
});
