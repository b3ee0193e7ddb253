import type { BbqCategory } from '../lib/bbq/index.js';
import type { ProviderName, WorkspaceConfig } from '../lib/config/workspace.js';
import type { Logger } from '../lib/logger.js';

/** Resolved state every workspace command runs against */
export interface CommandContext {
	workspace: string;
	config: WorkspaceConfig;
	categories: BbqCategory[];
	providers: ProviderName[];
	logger: Logger;
}
