export const EXIT_CODES = {
	SUCCESS: 0,
	GENERAL_ERROR: 1,
	INVALID_ARGS: 2,
	NOT_FOUND: 3,
	CONNECTION_ERROR: 4,
	PARSE_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface BaseError {
	readonly _tag: string;
	readonly message: string;
}

export interface ConnectionError extends BaseError {
	readonly _tag: 'ConnectionError';
	readonly url?: string;
	readonly status?: number;
}

export interface NotFoundError extends BaseError {
	readonly _tag: 'NotFoundError';
	readonly resource: string;
}

export interface ParseError extends BaseError {
	readonly _tag: 'ParseError';
	readonly path?: string;
	readonly line?: number;
}

export interface InvalidArgsError extends BaseError {
	readonly _tag: 'InvalidArgsError';
	readonly arg?: string;
}

export interface FileSystemError extends BaseError {
	readonly _tag: 'FileSystemError';
	readonly path?: string;
}

export interface LLMError extends BaseError {
	readonly _tag: 'LLMError';
	readonly provider?: string;
	readonly model?: string;
	/** HTTP status of the failed call, absent for network failures */
	readonly status?: number;
	/** Seconds the provider asked us to wait (Retry-After) */
	readonly retryAfter?: number;
	/** Network failure or timeout, worth another attempt */
	readonly transient?: boolean;
}

export interface ReviewError extends BaseError {
	readonly _tag: 'ReviewError';
	readonly category: string;
	readonly itemId?: string;
}

export type NbbqError =
	| ConnectionError
	| NotFoundError
	| ParseError
	| InvalidArgsError
	| FileSystemError
	| LLMError
	| ReviewError;

export function createConnectionError(
	message: string,
	url?: string,
	status?: number,
): ConnectionError {
	return { _tag: 'ConnectionError', message, url, status };
}

export function createNotFoundError(message: string, resource: string): NotFoundError {
	return { _tag: 'NotFoundError', message, resource };
}

export function createParseError(message: string, path?: string, line?: number): ParseError {
	return { _tag: 'ParseError', message, path, line };
}

export function createInvalidArgsError(message: string, arg?: string): InvalidArgsError {
	return { _tag: 'InvalidArgsError', message, arg };
}

export function createFileSystemError(message: string, path?: string): FileSystemError {
	return { _tag: 'FileSystemError', message, path };
}

export function createLLMError(
	message: string,
	details: {
		provider?: string;
		model?: string;
		status?: number;
		retryAfter?: number;
		transient?: boolean;
	} = {},
): LLMError {
	return { _tag: 'LLMError', message, ...details };
}

export function createReviewError(message: string, category: string, itemId?: string): ReviewError {
	return { _tag: 'ReviewError', message, category, itemId };
}

const ERROR_TAGS = new Set<string>([
	'ConnectionError',
	'NotFoundError',
	'ParseError',
	'InvalidArgsError',
	'FileSystemError',
	'LLMError',
	'ReviewError',
]);

export function isNbbqError(error: unknown): error is NbbqError {
	return (
		typeof error === 'object' &&
		error !== null &&
		'_tag' in error &&
		typeof error._tag === 'string' &&
		ERROR_TAGS.has(error._tag)
	);
}

export function isLLMError(error: unknown): error is LLMError {
	return isNbbqError(error) && error._tag === 'LLMError';
}

export function getExitCode(error: NbbqError): ExitCode {
	switch (error._tag) {
		case 'ConnectionError':
			return EXIT_CODES.CONNECTION_ERROR;
		case 'NotFoundError':
			return EXIT_CODES.NOT_FOUND;
		case 'ParseError':
			return EXIT_CODES.PARSE_ERROR;
		case 'InvalidArgsError':
			return EXIT_CODES.INVALID_ARGS;
		case 'FileSystemError':
			return EXIT_CODES.GENERAL_ERROR;
		case 'LLMError':
			return EXIT_CODES.CONNECTION_ERROR;
		case 'ReviewError':
			return EXIT_CODES.PARSE_ERROR;
	}
}

/**
 * Format any error into a readable string message
 */
export function formatError(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}

	if (isNbbqError(error)) {
		return error.message;
	}

	if (error && typeof error === 'object') {
		if ('message' in error && typeof error.message === 'string') {
			return error.message;
		}
		try {
			return JSON.stringify(error);
		} catch {
			return String(error);
		}
	}

	return String(error);
}
