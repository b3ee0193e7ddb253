import { type ResponseRecord, ResponseRecordSchema } from '../bbq/types.js';
import { stagePath } from '../config/workspace.js';
import { type JsonlWarning, appendJsonl, readJsonlLenient } from '../jsonl.js';

export interface ArchiveSnapshot {
	/** Latest record per prompt id */
	byPrompt: Map<string, ResponseRecord>;
	warnings: JsonlWarning[];
}

/**
 * Append-only store of provider responses under responses/<provider>/<Category>.jsonl.
 * Every record is written as soon as it is produced; on load the last
 * record for a prompt wins.
 */
export class ResponseArchive {
	private workspace: string;
	private onWarning: (warning: JsonlWarning) => void;

	constructor(workspace: string, onWarning?: (warning: JsonlWarning) => void) {
		this.workspace = workspace;
		this.onWarning =
			onWarning ??
			((warning) => {
				console.error(
					`Warning: skipping corrupt line ${warning.line} in ${warning.path}: ${warning.message}`,
				);
			});
	}

	path(provider: string, category: string): string {
		return stagePath(this.workspace, 'responses', category, provider);
	}

	load(provider: string, category: string): ArchiveSnapshot {
		const { records, warnings } = readJsonlLenient(
			this.path(provider, category),
			ResponseRecordSchema,
		);
		for (const warning of warnings) {
			this.onWarning(warning);
		}

		const byPrompt = new Map<string, ResponseRecord>();
		for (const record of records) {
			byPrompt.set(record.promptId, record);
		}
		return { byPrompt, warnings };
	}

	/** Latest records in first-seen prompt order */
	latest(provider: string, category: string): ResponseRecord[] {
		return [...this.load(provider, category).byPrompt.values()];
	}

	append(record: ResponseRecord): void {
		appendJsonl(this.path(record.provider, record.category), record);
	}

	/** Prompt ids that already hold a usable answer and are skipped on resume */
	completedPromptIds(provider: string, category: string): Set<string> {
		const done = new Set<string>();
		for (const [id, record] of this.load(provider, category).byPrompt) {
			if (record.status !== 'error') {
				done.add(id);
			}
		}
		return done;
	}
}
