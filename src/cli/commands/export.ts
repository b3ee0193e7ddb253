import fs from 'node:fs';
import type { z } from 'zod';
import {
	BbqRecordSchema,
	ClassificationRecordSchema,
	PromptRecordSchema,
	ReviewItemSchema,
	SampledItemSchema,
} from '../../lib/bbq/index.js';
import { STAGES, type Stage, stagePath } from '../../lib/config/workspace.js';
import { ResponseArchive } from '../../lib/dispatch/index.js';
import { createInvalidArgsError } from '../../lib/errors.js';
import { readJsonl } from '../../lib/jsonl.js';
import type { CommandContext } from '../context.js';

const STAGE_SCHEMAS: Record<Exclude<Stage, 'responses'>, z.ZodTypeAny> = {
	raw: BbqRecordSchema,
	sampled: SampledItemSchema,
	review: ReviewItemSchema,
	prompts: PromptRecordSchema,
	classified: ClassificationRecordSchema,
};

export function parseStage(value: string | undefined): Stage {
	const stage = STAGES.find((s) => s === value);
	if (!stage) {
		throw createInvalidArgsError(
			`Expected a stage: ${STAGES.join(', ')}${value ? ` (got "${value}")` : ''}`,
			'stage',
		);
	}
	return stage;
}

/**
 * Collect a stage's records across the selected categories (and providers,
 * for provider-scoped stages). Responses are the latest record per prompt.
 */
export function runExportCommand(ctx: CommandContext, stage: Stage): unknown[] {
	const records: unknown[] = [];

	if (stage === 'responses') {
		const archive = new ResponseArchive(ctx.workspace);
		for (const category of ctx.categories) {
			for (const provider of ctx.providers) {
				records.push(...archive.latest(provider, category));
			}
		}
		return records;
	}

	const schema = STAGE_SCHEMAS[stage];
	for (const category of ctx.categories) {
		const providers = stage === 'classified' ? ctx.providers : [undefined];
		for (const provider of providers) {
			const filePath = stagePath(ctx.workspace, stage, category, provider);
			if (fs.existsSync(filePath)) {
				records.push(...readJsonl(filePath, schema));
			}
		}
	}

	return records;
}
