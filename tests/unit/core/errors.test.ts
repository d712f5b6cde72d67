/**
 * Error handling tests
 */

import {
	AppError,
	CorruptStateError,
	ErrorCode,
	ErrorMessages,
	GenerationError,
	createError,
	errorMessage,
	handleError,
} from '../../../src/core/errors';
import { runInNewContext } from 'vm';

describe('Error Handling', () => {
	describe('AppError', () => {
		it('should create error with all properties', () => {
			const error = new AppError('Test error', ErrorCode.VALIDATION_ERROR, { field: 'test' });

			expect(error.message).toBe('Test error');
			expect(error.code).toBe(ErrorCode.VALIDATION_ERROR);
			expect(error.details).toEqual({ field: 'test' });
			expect(error.name).toBe('AppError');
			expect(error).toBeInstanceOf(Error);
		});

		it('should serialize to JSON', () => {
			const json = new AppError('Test', ErrorCode.RUNTIME_ERROR, { a: 1 }).toJSON();

			expect(json).toEqual({
				name: 'AppError',
				message: 'Test',
				code: ErrorCode.RUNTIME_ERROR,
				details: { a: 1 },
			});
		});
	});

	describe('subclasses', () => {
		it('should tag corrupt state', () => {
			const error = new CorruptStateError('bad file', { path: '/x' });

			expect(error).toBeInstanceOf(AppError);
			expect(error.code).toBe(ErrorCode.CORRUPT_STATE);
			expect(error.name).toBe('CorruptStateError');
		});

		it('should record generation attempts', () => {
			const error = new GenerationError('gave up', 3);

			expect(error.code).toBe(ErrorCode.GENERATION_ERROR);
			expect(error.attempts).toBe(3);
		});
	});

	describe('createError', () => {
		it('should use standard message', () => {
			const error = createError(ErrorCode.TIMEOUT_ERROR);
			expect(error.message).toBe(ErrorMessages[ErrorCode.TIMEOUT_ERROR]);
		});

		it('should use custom message', () => {
			const error = createError(ErrorCode.RUNTIME_ERROR, null, 'Custom');
			expect(error.message).toBe('Custom');
		});
	});

	describe('handleError', () => {
		it('should return AppError unchanged', () => {
			const appError = createError(ErrorCode.INDEX_ERROR);
			expect(handleError(appError)).toBe(appError);
		});

		it('should map errors from another realm by code', () => {
			const foreign: unknown = runInNewContext('Object.assign(new Error("gone"), { code: "ENOENT" })');
			const wrapped = handleError(foreign, 'readFile /tmp/x');

			expect(foreign instanceof Error).toBe(false);
			expect(wrapped.code).toBe(ErrorCode.NOT_FOUND);
			expect(wrapped.details).toEqual({ originalError: 'gone' });
			expect(errorMessage(foreign)).toBe('gone');
		});

		it('should map ENOENT to NOT_FOUND', () => {
			const fsError = Object.assign(new Error('no such file'), { code: 'ENOENT' });
			const wrapped = handleError(fsError, 'readFile /tmp/x');

			expect(wrapped.code).toBe(ErrorCode.NOT_FOUND);
			expect(wrapped.message).toBe('Not found in readFile /tmp/x');
		});

		it('should map EACCES and EPERM to PERMISSION_DENIED', () => {
			for (const code of ['EACCES', 'EPERM']) {
				const wrapped = handleError(Object.assign(new Error('denied'), { code }));
				expect(wrapped.code).toBe(ErrorCode.PERMISSION_DENIED);
			}
		});

		it('should keep the message of other errors', () => {
			const wrapped = handleError(new Error('boom'));

			expect(wrapped.code).toBe(ErrorCode.RUNTIME_ERROR);
			expect(wrapped.message).toBe('boom');
		});

		it('should wrap non-Error values', () => {
			const wrapped = handleError('String error', 'ctx');

			expect(wrapped.message).toBe('Unexpected error');
			expect(wrapped.details).toEqual({ error: 'String error', context: 'ctx' });
		});
	});

	describe('errorMessage', () => {
		it('should read messages from anything thrown', () => {
			expect(errorMessage(new Error('a'))).toBe('a');
			expect(errorMessage(42)).toBe('42');
		});
	});
});
