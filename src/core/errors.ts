/**
 * Centralized error handling
 */

import { types } from 'util';

/** Error codes for standardized error handling */
export enum ErrorCode {
	// File & Resource Errors
	NOT_FOUND = 'NOT_FOUND',
	PERMISSION_DENIED = 'PERMISSION_DENIED',
	IO_ERROR = 'IO_ERROR',

	// Validation & Input Errors
	INVALID_INPUT = 'INVALID_INPUT',
	VALIDATION_ERROR = 'VALIDATION_ERROR',

	// Persisted state
	CORRUPT_STATE = 'CORRUPT_STATE',

	// System & Runtime Errors
	CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
	RUNTIME_ERROR = 'RUNTIME_ERROR',

	// External services
	GENERATION_ERROR = 'GENERATION_ERROR',
	EMBEDDING_ERROR = 'EMBEDDING_ERROR',
	INDEX_ERROR = 'INDEX_ERROR',
	TIMEOUT_ERROR = 'TIMEOUT_ERROR',
}

export const ErrorMessages: Record<ErrorCode, string> = {
	[ErrorCode.NOT_FOUND]: 'Resource not found',
	[ErrorCode.PERMISSION_DENIED]: 'Permission denied',
	[ErrorCode.IO_ERROR]: 'File system operation failed',
	[ErrorCode.INVALID_INPUT]: 'Invalid input',
	[ErrorCode.VALIDATION_ERROR]: 'Validation failed',
	[ErrorCode.CORRUPT_STATE]: 'Persisted story state is corrupt',
	[ErrorCode.CONFIGURATION_ERROR]: 'Invalid configuration',
	[ErrorCode.RUNTIME_ERROR]: 'Runtime error',
	[ErrorCode.GENERATION_ERROR]: 'Text generation failed',
	[ErrorCode.EMBEDDING_ERROR]: 'Embedding request failed',
	[ErrorCode.INDEX_ERROR]: 'Semantic index operation failed',
	[ErrorCode.TIMEOUT_ERROR]: 'Operation timed out',
};

/** Standard application error */
export class AppError extends Error {
	constructor(
		message: string,
		public readonly code: ErrorCode,
		public readonly details?: unknown
	) {
		super(message);
		this.name = 'AppError';
		Error.captureStackTrace?.(this, this.constructor);
	}

	toJSON(): { name: string; message: string; code: ErrorCode; details?: unknown } {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			details: this.details,
		};
	}
}

/**
 * The persisted aggregate (or a backup of it) could not be turned back into a
 * StoryMemory. Fatal for the load; the caller falls back to a backup or stops.
 */
export class CorruptStateError extends AppError {
	constructor(message: string, details?: unknown) {
		super(message, ErrorCode.CORRUPT_STATE, details);
		this.name = 'CorruptStateError';
	}
}

/** Raised once the generation service has exhausted its retry budget. */
export class GenerationError extends AppError {
	constructor(
		message: string,
		public readonly attempts: number,
		details?: unknown
	) {
		super(message, ErrorCode.GENERATION_ERROR, details);
		this.name = 'GenerationError';
	}
}

export function createError(code: ErrorCode, details?: unknown, message?: string): AppError {
	return new AppError(message ?? ErrorMessages[code], code, details);
}

/** Error check that also holds for errors from another realm (fs errors under Jest) */
function isError(value: unknown): value is Error {
	return value instanceof Error || types.isNativeError(value);
}

/** Wrap unknown errors into AppError */
export function handleError(error: unknown, context?: string): AppError {
	if (error instanceof AppError) return error;

	if (isError(error)) {
		const { message, stack } = error;
		const code = 'code' in error ? error.code : undefined;
		switch (code) {
			case 'ENOENT':
				return new AppError(
					`Not found${context ? ` in ${context}` : ''}`,
					ErrorCode.NOT_FOUND,
					{ originalError: message }
				);
			case 'EACCES':
			case 'EPERM':
				return new AppError(
					`Permission denied${context ? ` for ${context}` : ''}`,
					ErrorCode.PERMISSION_DENIED,
					{ originalError: message }
				);
			default:
				return new AppError(message || 'Unknown error', ErrorCode.RUNTIME_ERROR, {
					context,
					stack,
				});
		}
	}

	return new AppError('Unexpected error', ErrorCode.RUNTIME_ERROR, {
		error: String(error),
		context,
	});
}

/** Message of any thrown value, for log lines and reports */
export function errorMessage(error: unknown): string {
	return isError(error) ? error.message : String(error);
}
