import fs from 'node:fs';
import { z } from 'zod';
import { selectCategories, validateSampleLimit } from '../lib/bbq/index.js';
import {
	MAX_SAMPLE_SIZE,
	PROVIDER_NAMES,
	type ProviderName,
	type WorkspaceConfig,
	isProviderName,
	loadWorkspaceConfig,
	resolveWorkspace,
} from '../lib/config/workspace.js';
import {
	EXIT_CODES,
	type ExitCode,
	createInvalidArgsError,
	formatError,
	getExitCode,
	isNbbqError,
} from '../lib/errors.js';
import { type Formatter, type OutputFormat, getFormatter } from '../lib/formatters.js';
import { createLogger } from '../lib/logger.js';
import { SCHEMA_NAMES, recordJsonSchema } from '../lib/schema.js';
import { runClassifyCommand } from './commands/classify.js';
import { runDispatchCommand } from './commands/dispatch.js';
import { parseStage, runExportCommand } from './commands/export.js';
import { runFetchCommand } from './commands/fetch.js';
import { runPromptsCommand } from './commands/prompts.js';
import { runReviewCheckCommand, runReviewExportCommand } from './commands/review.js';
import { runSampleCommand } from './commands/sample.js';
import { runStatusCommand } from './commands/status.js';
import { runTranslateCommand } from './commands/translate.js';
import type { CommandContext } from './context.js';

const PackageJsonSchema = z.object({ version: z.string() });
const VERSION = PackageJsonSchema.parse(
	JSON.parse(fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')),
).version;

export interface ParsedArgs {
	command: string;
	subcommand?: string;
	positional: string[];
	options: {
		help: boolean;
		version: boolean;
		verbose: boolean;
		json: boolean;
		xml: boolean;
		csv: boolean;
		force: boolean;
		all: boolean;
		dir?: string;
		categories?: string[];
		providers?: ProviderName[];
		provider?: ProviderName;
		llm?: ProviderName;
		model?: string;
		template?: string;
		language?: string;
		sourceUrl?: string;
		limit?: number;
		seed?: number;
		temperature?: number;
		sleepEach?: number;
		pauseEvery?: number;
		pauseSeconds?: number;
		maxAttempts?: number;
	};
}

type BooleanFlag = 'help' | 'version' | 'verbose' | 'json' | 'xml' | 'csv' | 'force' | 'all';
type StringFlag = 'dir' | 'model' | 'template' | 'language' | 'sourceUrl';
type NumberFlag =
	| 'limit'
	| 'seed'
	| 'temperature'
	| 'sleepEach'
	| 'pauseEvery'
	| 'pauseSeconds'
	| 'maxAttempts';

const BOOLEAN_FLAGS: Record<string, BooleanFlag> = {
	'--help': 'help',
	'-h': 'help',
	'--version': 'version',
	'-v': 'version',
	'--verbose': 'verbose',
	'--json': 'json',
	'--xml': 'xml',
	'--csv': 'csv',
	'--force': 'force',
	'--all': 'all',
};

const STRING_FLAGS: Record<string, StringFlag> = {
	'--dir': 'dir',
	'-d': 'dir',
	'--model': 'model',
	'--template': 'template',
	'--language': 'language',
	'--source-url': 'sourceUrl',
};

interface NumberSpec {
	key: NumberFlag;
	min: number;
	max: number;
	integer: boolean;
}

const NUMBER_FLAGS: Record<string, NumberSpec> = {
	'--limit': { key: 'limit', min: 1, max: MAX_SAMPLE_SIZE, integer: true },
	'--seed': { key: 'seed', min: 0, max: 2 ** 32 - 1, integer: true },
	'--temperature': { key: 'temperature', min: 0, max: 2, integer: false },
	'--sleep-each': { key: 'sleepEach', min: 0, max: 600000, integer: true },
	'--pause-every': { key: 'pauseEvery', min: 0, max: 100000, integer: true },
	'--pause-seconds': { key: 'pauseSeconds', min: 0, max: 3600, integer: false },
	'--max-attempts': { key: 'maxAttempts', min: 1, max: 20, integer: true },
};

const SUBCOMMANDS: Record<string, readonly string[]> = {
	review: ['export', 'check'],
};

function parseProvider(value: string, flag: string): ProviderName {
	const name = value.trim().toLowerCase();
	if (!isProviderName(name)) {
		throw createInvalidArgsError(
			`${flag} must be one of: ${PROVIDER_NAMES.join(', ')} (got "${value}")`,
			flag,
		);
	}
	return name;
}

function splitList(value: string): string[] {
	return value
		.split(',')
		.map((item) => item.trim())
		.filter((item) => item.length > 0);
}

function parseNumber(flag: string, spec: NumberSpec, value: string): number {
	const parsed = Number(value);
	if (
		value.trim() === '' ||
		Number.isNaN(parsed) ||
		(spec.integer && !Number.isInteger(parsed)) ||
		parsed < spec.min ||
		parsed > spec.max
	) {
		throw createInvalidArgsError(
			`${flag} must be ${spec.integer ? 'an integer' : 'a number'} between ${spec.min} and ${spec.max}`,
			flag,
		);
	}
	return parsed;
}

function tryParseFlag(
	arg: string,
	nextArg: string | undefined,
	options: ParsedArgs['options'],
): number {
	const boolFlag = BOOLEAN_FLAGS[arg];
	if (boolFlag) {
		options[boolFlag] = true;
		return 1;
	}

	if (nextArg === undefined) {
		return 0;
	}

	const strFlag = STRING_FLAGS[arg];
	if (strFlag) {
		options[strFlag] = nextArg;
		return 2;
	}

	const numberSpec = NUMBER_FLAGS[arg];
	if (numberSpec) {
		options[numberSpec.key] = parseNumber(arg, numberSpec, nextArg);
		return 2;
	}

	switch (arg) {
		case '--categories':
		case '-c':
			options.categories = [...(options.categories ?? []), ...splitList(nextArg)];
			return 2;
		case '--providers':
		case '-p':
			options.providers = [
				...(options.providers ?? []),
				...splitList(nextArg).map((name) => parseProvider(name, '--providers')),
			];
			return 2;
		case '--provider':
			options.provider = parseProvider(nextArg, '--provider');
			return 2;
		case '--llm':
			options.llm = parseProvider(nextArg, '--llm');
			return 2;
		default:
			return 0;
	}
}

function handlePositionalArg(result: ParsedArgs, arg: string): void {
	if (!result.command) {
		result.command = arg;
	} else if (!result.subcommand && SUBCOMMANDS[result.command]?.includes(arg)) {
		result.subcommand = arg;
	} else {
		result.positional.push(arg);
	}
}

export interface ParseResult {
	parsed: ParsedArgs;
	unknownFlags: string[];
}

export function parseArgs(args: readonly string[]): ParseResult {
	const result: ParsedArgs = {
		command: '',
		positional: [],
		options: {
			help: false,
			version: false,
			verbose: false,
			json: false,
			xml: false,
			csv: false,
			force: false,
			all: false,
		},
	};
	const unknownFlags: string[] = [];

	let i = 0;
	while (i < args.length) {
		const arg = args[i];
		if (arg === undefined) break;

		const consumed = tryParseFlag(arg, args[i + 1], result.options);
		if (consumed > 0) {
			i += consumed;
			continue;
		}

		if (arg.startsWith('-')) {
			unknownFlags.push(arg);
		} else {
			handlePositionalArg(result, arg);
		}
		i++;
	}

	return { parsed: result, unknownFlags };
}

/**
 * Merge command-line flags over the workspace file.
 */
export function applyOverrides(
	config: WorkspaceConfig,
	options: ParsedArgs['options'],
): WorkspaceConfig {
	return {
		...config,
		sourceUrl: options.sourceUrl ?? config.sourceUrl,
		sampleSize: options.limit !== undefined ? validateSampleLimit(options.limit) : config.sampleSize,
		seed: options.seed ?? config.seed,
		language: options.language ?? config.language,
		template: options.template ?? config.template,
		providers: options.providers && options.providers.length > 0 ? options.providers : config.providers,
		dispatch: {
			...config.dispatch,
			sleepEachMs: options.sleepEach ?? config.dispatch.sleepEachMs,
			pauseEvery: options.pauseEvery ?? config.dispatch.pauseEvery,
			pauseSeconds: options.pauseSeconds ?? config.dispatch.pauseSeconds,
			maxAttempts: options.maxAttempts ?? config.dispatch.maxAttempts,
		},
	};
}

export function getOutputFormat(options: ParsedArgs['options']): OutputFormat {
	if (options.json) return 'json';
	if (options.xml) return 'xml';
	if (options.csv) return 'csv';
	return 'human';
}

const WORKSPACE_OPTIONS = `  -d, --dir <path>          Workspace directory (default: $NBBQ_WORKSPACE or current directory)
  -c, --categories <list>   Categories or glob patterns, comma-separated (default: all)
  --verbose                 Show progress
  --json | --xml | --csv    Output format`;

function printHelp(command?: string): void {
	switch (command) {
		case 'fetch':
			console.log(`nbbq fetch - Download BBQ category files into raw/

USAGE:
  nbbq fetch [options]

OPTIONS:
${WORKSPACE_OPTIONS}
  --source-url <url>        Base URL of the category files
  --force                   Download again even if raw/<Category>.jsonl exists

EXAMPLES:
  nbbq fetch
  nbbq fetch --categories "Race*,Age" --verbose
`);
			break;

		case 'sample':
			console.log(`nbbq sample - Pick a stratified subset of unique items per category

USAGE:
  nbbq sample [options]

OPTIONS:
${WORKSPACE_OPTIONS}
  --limit <n>               Items per category, 1-50 (default: 50)
  --seed <n>                Sampling seed (default: 42)

EXAMPLES:
  nbbq sample
  nbbq sample --categories Age --limit 20 --seed 7
`);
			break;

		case 'translate':
			console.log(`nbbq translate - Request machine draft translations for review

USAGE:
  nbbq translate [options]

OPTIONS:
${WORKSPACE_OPTIONS}
  --provider <name>         Translating provider (default: openai)
  --model <name>            Model override
  --language <name>         Target language (default: Norwegian)

NOTES:
  Only items without a translation are sent. Drafts stay "pending" until a
  reviewer approves them in review/<Category>.jsonl.
`);
			break;

		case 'review':
			console.log(`nbbq review - Prepare and validate human review files

USAGE:
  nbbq review export        Create or refresh review/<Category>.jsonl from sampled/
  nbbq review check         Validate review files and count items per status

OPTIONS:
${WORKSPACE_OPTIONS}

NOTES:
  Reviewers edit "translation" and set "review.status" to "approved" or
  "rejected". Export keeps existing translations and decisions.
  Run "nbbq schema review" for a JSON Schema of the record format.
`);
			break;

		case 'prompts':
			console.log(`nbbq prompts - Assemble prompts from approved review items

USAGE:
  nbbq prompts [options]

OPTIONS:
${WORKSPACE_OPTIONS}
  --template <name|path>    multiple-choice, open-ended or a template file (default: multiple-choice)
                            relative paths are resolved against the workspace
`);
			break;

		case 'dispatch':
			console.log(`nbbq dispatch - Send prompts to LLM providers and archive the responses

USAGE:
  nbbq dispatch [options]

OPTIONS:
${WORKSPACE_OPTIONS}
  -p, --providers <list>    openai, gemini, perplexity, anthropic, ollama (default: openai,gemini,perplexity)
  --model <name>            Model override (single provider only)
  --temperature <t>         Sampling temperature, 0-2
  --sleep-each <ms>         Delay after every call (default: 300)
  --pause-every <n>         Extra pause after every n calls (default: off)
  --pause-seconds <s>       Length of the extra pause (default: 30)
  --max-attempts <n>        Attempts per prompt for rate limits and server errors (default: 6)

NOTES:
  Prompts already answered are skipped, so an interrupted run can be resumed.
  API keys: OPENAI_API_KEY, GOOGLE_API_KEY, PERPLEXITY_API_KEY, ANTHROPIC_API_KEY.

EXAMPLES:
  nbbq dispatch --providers openai,gemini --verbose
  nbbq dispatch --providers ollama --model llama3 --pause-every 50
`);
			break;

		case 'classify':
			console.log(`nbbq classify - Label responses with the answer they chose

USAGE:
  nbbq classify [options]

OPTIONS:
${WORKSPACE_OPTIONS}
  -p, --providers <list>    Providers whose responses are classified
  --llm <provider>          Ask this provider when no ans0/ans1/ans2 label is found
  --model <name>            Model for --llm
`);
			break;

		case 'export':
			console.log(`nbbq export - Print a stage's records

USAGE:
  nbbq export <raw|sampled|review|prompts|responses|classified> [options]

OPTIONS:
${WORKSPACE_OPTIONS}
  -p, --providers <list>    Providers for responses and classified

EXAMPLES:
  nbbq export review --categories Age --csv > age-review.csv
`);
			break;

		case 'status':
			console.log(`nbbq status - Show provider configuration and workspace progress

USAGE:
  nbbq status [options]

OPTIONS:
${WORKSPACE_OPTIONS}
  -p, --providers <list>    Providers to check
  --all                     Check every known provider
`);
			break;

		case 'schema':
			console.log(`nbbq schema - Print the JSON Schema of a record type

USAGE:
  nbbq schema <${SCHEMA_NAMES.join('|')}>
`);
			break;

		default:
			console.log(`nbbq - Norwegian BBQ bias benchmark pipeline

USAGE:
  nbbq <command> [options]

COMMANDS:
  fetch              Download BBQ category files
  sample             Pick up to 50 unique items per category
  review export      Create review files from the sampled items
  translate          Request machine draft translations
  review check       Validate review files
  prompts            Assemble prompts from approved items
  dispatch           Send prompts to LLM providers
  classify           Label responses with the chosen answer
  export <stage>     Print a stage's records (CSV, JSON, XML)
  status             Provider and workspace status
  schema <record>    Print a record's JSON Schema

GLOBAL OPTIONS:
  -h, --help         Show this help message
  -v, --version      Show version number

Run "nbbq <command> --help" for command-specific help.
`);
	}
}

function printVersion(): void {
	console.log(`nbbq version ${VERSION}`);
}

function handleError(error: unknown, formatter: Formatter): never {
	if (isNbbqError(error)) {
		console.error(formatter.formatError({ message: error.message }));
		process.exit(getExitCode(error));
	}

	console.error(formatter.formatError({ message: formatError(error) }));
	process.exit(EXIT_CODES.GENERAL_ERROR);
}

/**
 * Abort the signal on the first Ctrl-C; a second one exits immediately.
 */
/** Ctrl-C during translate or dispatch still writes results but fails the run */
export function interruptedExitCode(results: ReadonlyArray<{ interrupted: boolean }>): ExitCode {
	return results.some((result) => result.interrupted) ? EXIT_CODES.GENERAL_ERROR : EXIT_CODES.SUCCESS;
}

function interruptSignal(onInterrupt: () => void): { signal: AbortSignal; dispose: () => void } {
	const controller = new AbortController();
	const handler = () => {
		if (controller.signal.aborted) {
			process.exit(EXIT_CODES.GENERAL_ERROR);
		}
		onInterrupt();
		controller.abort();
	};
	process.on('SIGINT', handler);
	return { signal: controller.signal, dispose: () => process.off('SIGINT', handler) };
}

function buildContext(parsed: ParsedArgs): CommandContext {
	const workspace = resolveWorkspace(parsed.options.dir);
	const config = applyOverrides(loadWorkspaceConfig(workspace), parsed.options);
	return {
		workspace,
		config,
		categories: selectCategories(parsed.options.categories),
		providers: config.providers,
		logger: createLogger(parsed.options.verbose),
	};
}

export async function run(args: string[]): Promise<void> {
	let formatter = getFormatter('human');

	try {
		const { parsed, unknownFlags } = parseArgs(args);
		formatter = getFormatter(getOutputFormat(parsed.options));

		if (parsed.options.version) {
			printVersion();
			process.exit(EXIT_CODES.SUCCESS);
		}

		if (parsed.options.help) {
			printHelp(parsed.command || undefined);
			process.exit(EXIT_CODES.SUCCESS);
		}

		if (!parsed.command) {
			printHelp();
			process.exit(EXIT_CODES.INVALID_ARGS);
		}

		if (unknownFlags.length > 0) {
			console.error(`Warning: Unknown flag(s): ${unknownFlags.join(', ')}`);
		}

		switch (parsed.command) {
			case 'fetch': {
				const ctx = buildContext(parsed);
				console.log(formatter.format(await runFetchCommand(ctx, { force: parsed.options.force })));
				break;
			}

			case 'sample': {
				const ctx = buildContext(parsed);
				const result = runSampleCommand(ctx, {
					limit: ctx.config.sampleSize,
					seed: ctx.config.seed,
				});
				console.log(formatter.format(result));
				break;
			}

			case 'review': {
				const ctx = buildContext(parsed);
				if (parsed.subcommand === 'export') {
					console.log(formatter.format(runReviewExportCommand(ctx)));
					break;
				}
				if (parsed.subcommand === 'check') {
					const summaries = runReviewCheckCommand(ctx);
					console.log(formatter.format(summaries));
					if (summaries.some((summary) => summary.errors.length > 0)) {
						process.exit(EXIT_CODES.PARSE_ERROR);
					}
					break;
				}
				throw createInvalidArgsError('Usage: nbbq review <export|check>', 'subcommand');
			}

			case 'translate': {
				const ctx = buildContext(parsed);
				const interrupt = interruptSignal(() =>
					ctx.logger.error('Interrupted, saving drafts translated so far'),
				);
				try {
					const result = await runTranslateCommand(ctx, {
						provider: parsed.options.provider ?? 'openai',
						model: parsed.options.model,
						language: ctx.config.language,
						signal: interrupt.signal,
					});
					console.log(formatter.format(result));
					const code = interruptedExitCode(result);
					if (code !== EXIT_CODES.SUCCESS) {
						process.exit(code);
					}
				} finally {
					interrupt.dispose();
				}
				break;
			}

			case 'prompts': {
				const ctx = buildContext(parsed);
				console.log(formatter.format(runPromptsCommand(ctx, { template: ctx.config.template })));
				break;
			}

			case 'dispatch': {
				const ctx = buildContext(parsed);
				const interrupt = interruptSignal(() =>
					ctx.logger.error('Interrupted, finishing with the responses archived so far'),
				);
				try {
					const summaries = await runDispatchCommand(ctx, {
						model: parsed.options.model,
						temperature: parsed.options.temperature,
						signal: interrupt.signal,
					});
					console.log(formatter.format(summaries));
					const code = interruptedExitCode(summaries);
					if (code !== EXIT_CODES.SUCCESS) {
						process.exit(code);
					}
				} finally {
					interrupt.dispose();
				}
				break;
			}

			case 'classify': {
				const ctx = buildContext(parsed);
				const result = await runClassifyCommand(ctx, {
					llm: parsed.options.llm,
					model: parsed.options.model,
				});
				console.log(formatter.format(result));
				break;
			}

			case 'export': {
				const stage = parseStage(parsed.positional[0]);
				const ctx = buildContext(parsed);
				console.log(formatter.format(runExportCommand(ctx, stage)));
				break;
			}

			case 'status': {
				const ctx = buildContext(parsed);
				const result = await runStatusCommand(ctx, { all: parsed.options.all });
				console.log(formatter.format(result));
				if (result.providers.some((provider) => !provider.healthy)) {
					process.exit(EXIT_CODES.CONNECTION_ERROR);
				}
				break;
			}

			case 'schema': {
				const name = parsed.positional[0];
				if (!name) {
					throw createInvalidArgsError(`Usage: nbbq schema <${SCHEMA_NAMES.join('|')}>`, 'record');
				}
				console.log(JSON.stringify(recordJsonSchema(name), null, 2));
				break;
			}

			default:
				console.error(formatter.formatError({ message: `Unknown command: ${parsed.command}` }));
				printHelp();
				process.exit(EXIT_CODES.INVALID_ARGS);
		}
	} catch (error) {
		handleError(error, formatter);
	}
}
