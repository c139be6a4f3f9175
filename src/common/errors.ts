import { StatusCode } from './types.js';

/**
 * Base class for matcache specific errors
 * Provides status code and cause support
 */
export class MatcacheError extends Error {
	public code: number;
	public cause?: Error;

	constructor(message: string, code: number = StatusCode.ERROR, cause?: Error) {
		super(message);
		this.code = code;
		this.name = 'MatcacheError';
		this.cause = cause;

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, MatcacheError);
		}
	}
}

/**
 * Raised when a matrix cannot be inverted: it is empty, ragged, holds
 * non-finite entries, is not square, or is singular.
 */
export class InvalidMatrixError extends MatcacheError {
	public rows?: number;
	public columns?: number;

	constructor(message: string, rows?: number, columns?: number, cause?: Error) {
		super(message, StatusCode.MISMATCH, cause);
		this.name = 'InvalidMatrixError';
		this.rows = rows;
		this.columns = columns;
		Object.setPrototypeOf(this, InvalidMatrixError.prototype);
	}
}

/**
 * Raised when inversion options are malformed
 */
export class InvalidOptionsError extends MatcacheError {
	constructor(message: string = 'Invalid inversion options') {
		super(message, StatusCode.MISUSE);
		this.name = 'InvalidOptionsError';
		Object.setPrototypeOf(this, InvalidOptionsError.prototype);
	}
}

export interface ErrorInfo {
	message: string;
	name: string;
	code?: number;
}

/**
 * Walks the `cause` chain of an error, outermost first.
 */
export function unwrapError(error: unknown): ErrorInfo[] {
	const chain: ErrorInfo[] = [];
	const seen = new Set<unknown>();
	let current: unknown = error;

	while (current !== undefined && current !== null && !seen.has(current)) {
		seen.add(current);
		if (current instanceof Error) {
			chain.push({
				message: current.message,
				name: current.name,
				code: current instanceof MatcacheError ? current.code : undefined,
			});
			current = current.cause;
		} else {
			chain.push({ message: String(current), name: 'Unknown' });
			break;
		}
	}

	return chain;
}

/**
 * Formats an error and its causes as one line per error, causes indented.
 */
export function formatErrorChain(error: unknown): string {
	return unwrapError(error)
		.map((info, depth) => `${'  '.repeat(depth)}${depth > 0 ? 'Caused by: ' : ''}${info.name}: ${info.message}`)
		.join('\n');
}
