import { z } from 'zod';

export type Polarity = 'neg' | 'nonneg';
export type ContextCondition = 'ambig' | 'disambig';
export type AnswerLabel = 0 | 1 | 2;

// Upstream record, one per line of <Category>.jsonl
export interface BbqRecord {
	example_id: number;
	question_index: string;
	question_polarity: Polarity;
	context_condition: ContextCondition;
	category: string;
	answer_info: Record<string, string[]>;
	additional_metadata: Record<string, unknown>;
	context: string;
	question: string;
	ans0: string;
	ans1: string;
	ans2: string;
	label: AnswerLabel;
	[key: string]: unknown;
}

const AnswerLabelSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);

export const BbqRecordSchema = z
	.object({
		example_id: z.number().int().nonnegative(),
		question_index: z.coerce.string(),
		question_polarity: z.enum(['neg', 'nonneg']),
		context_condition: z.enum(['ambig', 'disambig']),
		category: z.string().min(1),
		answer_info: z.record(z.array(z.string())),
		additional_metadata: z.record(z.unknown()).default({}),
		context: z.string().min(1),
		question: z.string().min(1),
		ans0: z.string(),
		ans1: z.string(),
		ans2: z.string(),
		label: AnswerLabelSchema,
	})
	.passthrough();

export type Answers = [string, string, string];

const AnswersSchema = z.tuple([z.string(), z.string(), z.string()]);

export interface SampledItem {
	id: string;
	category: string;
	exampleId: number;
	questionIndex: string;
	polarity: Polarity;
	contextCondition: ContextCondition;
	context: string;
	question: string;
	answers: Answers;
	label: AnswerLabel;
}

export const SampledItemSchema = z.object({
	id: z.string().min(1),
	category: z.string().min(1),
	exampleId: z.number().int().nonnegative(),
	questionIndex: z.string(),
	polarity: z.enum(['neg', 'nonneg']),
	contextCondition: z.enum(['ambig', 'disambig']),
	context: z.string().min(1),
	question: z.string().min(1),
	answers: AnswersSchema,
	label: AnswerLabelSchema,
});

export type TranslationOrigin = 'machine' | 'human';

export interface Translation {
	context: string;
	question: string;
	answers: Answers;
	origin: TranslationOrigin;
}

export const TranslationSchema = z.object({
	context: z.string().min(1),
	question: z.string().min(1),
	answers: AnswersSchema,
	origin: z.enum(['machine', 'human']),
});

export type ReviewStatus = 'pending' | 'approved' | 'rejected';

export interface ReviewState {
	status: ReviewStatus;
	reviewer?: string;
	notes?: string;
}

export interface ReviewItem extends SampledItem {
	translation: Translation | null;
	review: ReviewState;
}

export const ReviewItemSchema = SampledItemSchema.extend({
	translation: TranslationSchema.nullable(),
	review: z.object({
		status: z.enum(['pending', 'approved', 'rejected']),
		reviewer: z.string().optional(),
		notes: z.string().optional(),
	}),
});

export interface PromptRecord {
	id: string;
	itemId: string;
	category: string;
	templateId: string;
	language: string;
	system?: string;
	text: string;
	answers: Answers;
	label: AnswerLabel;
	contextCondition: ContextCondition;
	polarity: Polarity;
}

export const PromptRecordSchema = z.object({
	id: z.string().min(1),
	itemId: z.string().min(1),
	category: z.string().min(1),
	templateId: z.string().min(1),
	language: z.string().min(1),
	system: z.string().optional(),
	text: z.string().min(1),
	answers: AnswersSchema,
	label: AnswerLabelSchema,
	contextCondition: z.enum(['ambig', 'disambig']),
	polarity: z.enum(['neg', 'nonneg']),
});

export type ResponseStatus = 'ok' | 'empty' | 'blocked' | 'error';

export interface ResponseRecord {
	promptId: string;
	provider: string;
	model: string;
	category: string;
	status: ResponseStatus;
	text: string;
	error?: string;
	attempts: number;
	durationMs: number;
	createdAt: string;
}

export const ResponseRecordSchema = z.object({
	promptId: z.string().min(1),
	provider: z.string().min(1),
	model: z.string(),
	category: z.string().min(1),
	status: z.enum(['ok', 'empty', 'blocked', 'error']),
	text: z.string(),
	error: z.string().optional(),
	attempts: z.number().int().nonnegative(),
	durationMs: z.number().nonnegative(),
	createdAt: z.string(),
});

export type ClassificationMethod = 'pattern' | 'llm' | 'none';

export interface ClassificationRecord {
	promptId: string;
	provider: string;
	category: string;
	label: string | null;
	expected: string;
	method: ClassificationMethod;
	/** createdAt of the response the label was read from */
	respondedAt?: string;
}

export const ClassificationRecordSchema = z.object({
	promptId: z.string().min(1),
	provider: z.string().min(1),
	category: z.string().min(1),
	label: z.string().nullable(),
	expected: z.string(),
	method: z.enum(['pattern', 'llm', 'none']),
	respondedAt: z.string().optional(),
});

export function toSampledItem(record: BbqRecord, category: string): SampledItem {
	return {
		id: `${category}-${record.example_id}`,
		category,
		exampleId: record.example_id,
		questionIndex: record.question_index,
		polarity: record.question_polarity,
		contextCondition: record.context_condition,
		context: record.context,
		question: record.question,
		answers: [record.ans0, record.ans1, record.ans2],
		label: record.label,
	};
}
