export const DEFAULT_LABELS: readonly string[] = ['ans0', 'ans1', 'ans2'];

const LABEL_PATTERN = /\bans\d+\b/gi;
const BATCH_LINE_PATTERN = /^\s*ID=(\d+)\s+(ans\d+)\s*$/i;

/**
 * Distinct answer labels mentioned in a text, in order of appearance.
 * Falls back to ans0..ans2 when none are mentioned.
 */
export function extractLabels(text: string): string[] {
	const ordered: string[] = [];
	for (const match of text.matchAll(LABEL_PATTERN)) {
		const label = match[0].toLowerCase();
		if (!ordered.includes(label)) {
			ordered.push(label);
		}
	}
	return ordered.length > 0 ? ordered : [...DEFAULT_LABELS];
}

/** First answer label in a model response, lower-cased */
export function extractLabel(response: string): string | null {
	const match = response.match(/\bans\d+\b/i);
	return match ? match[0].toLowerCase() : null;
}

/** Parse `ID=<n> ans<k>` result lines; other lines are ignored */
export function parseBatchOutput(text: string): Map<number, string> {
	const results = new Map<number, string>();
	for (const line of text.split(/\r?\n/)) {
		const match = BATCH_LINE_PATTERN.exec(line);
		const id = match?.[1];
		const label = match?.[2];
		if (id !== undefined && label !== undefined) {
			results.set(Number.parseInt(id, 10), label.toLowerCase());
		}
	}
	return results;
}

export function expectedLabel(label: number): string {
	return `ans${label}`;
}
