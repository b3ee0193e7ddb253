import type { PromptRecord } from '../bbq/types.js';
import type { ApprovedItem } from '../review/index.js';
import { type PromptTemplate, renderTemplate } from './template.js';

export function promptId(itemId: string, templateId: string): string {
	return `${itemId}:${templateId}`;
}

/**
 * Pair one reviewed context with its question under a template.
 * Uses the reviewed translation, never the upstream English text.
 */
export function buildPrompt(item: ApprovedItem, template: PromptTemplate): PromptRecord {
	const { translation } = item;
	const text = renderTemplate(template, {
		context: translation.context,
		question: translation.question,
		ans0: translation.answers[0],
		ans1: translation.answers[1],
		ans2: translation.answers[2],
	});

	const record: PromptRecord = {
		id: promptId(item.id, template.id),
		itemId: item.id,
		category: item.category,
		templateId: template.id,
		language: template.language,
		text,
		answers: translation.answers,
		label: item.label,
		contextCondition: item.contextCondition,
		polarity: item.polarity,
	};

	if (template.system) {
		record.system = template.system;
	}

	return record;
}

export function buildPrompts(
	items: readonly ApprovedItem[],
	template: PromptTemplate,
): PromptRecord[] {
	return items.map((item) => buildPrompt(item, template));
}
