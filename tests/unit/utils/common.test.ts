import * as fs from 'fs/promises';
import * as path from 'path';
import { AppError, ErrorCode } from '../../../src/core/errors';
import {
	atomicWriteFile,
	pathExists,
	retry,
	safeReadFile,
	safeWriteFile,
	tryParseJson,
	withTimeout,
} from '../../../src/utils/common';
import { cleanupTemp, createTempDir } from '../../helpers';

describe('common utilities', () => {
	let dir: string;

	beforeEach(async () => {
		dir = await createTempDir();
	});

	afterEach(async () => {
		await cleanupTemp(dir);
	});

	describe('file helpers', () => {
		it('should create parent directories on write', async () => {
			const file = path.join(dir, 'a', 'b', 'c.txt');
			await safeWriteFile(file, 'hello');

			expect(await safeReadFile(file)).toBe('hello');
		});

		it('should report missing files as NOT_FOUND', async () => {
			await expect(safeReadFile(path.join(dir, 'missing.txt'))).rejects.toMatchObject({
				code: ErrorCode.NOT_FOUND,
			});
			expect(await pathExists(path.join(dir, 'missing.txt'))).toBe(false);
		});

		it('should replace a file atomically and leave no temp files', async () => {
			const file = path.join(dir, 'state.json');
			await atomicWriteFile(file, '{"v":1}');
			await atomicWriteFile(file, '{"v":2}');

			expect(await safeReadFile(file)).toBe('{"v":2}');
			expect(await fs.readdir(dir)).toEqual(['state.json']);
		});
	});

	describe('retry', () => {
		it('should return the first success', async () => {
			const fn = jest
				.fn<Promise<string>, []>()
				.mockRejectedValueOnce(new Error('transient'))
				.mockResolvedValueOnce('ok');
			const onRetry = jest.fn();

			await expect(retry(fn, { maxAttempts: 3, initialDelay: 1, onRetry })).resolves.toBe('ok');
			expect(fn).toHaveBeenCalledTimes(2);
			expect(onRetry).toHaveBeenCalledTimes(1);
			expect(onRetry).toHaveBeenCalledWith(1, expect.any(Error));
		});

		it('should throw the last error once attempts run out', async () => {
			let n = 0;
			const fn = jest.fn(async () => {
				n += 1;
				throw new Error(`failure ${n}`);
			});

			await expect(retry(fn, { maxAttempts: 3, initialDelay: 1 })).rejects.toThrow('failure 3');
			expect(fn).toHaveBeenCalledTimes(3);
		});
	});

	describe('withTimeout', () => {
		it('should resolve when the promise settles in time', async () => {
			await expect(withTimeout(Promise.resolve(5), 1000)).resolves.toBe(5);
		});

		it('should reject with TIMEOUT_ERROR otherwise', async () => {
			const never = new Promise<number>(() => undefined);
			const result = withTimeout(never, 10, 'too slow');

			await expect(result).rejects.toBeInstanceOf(AppError);
			await expect(result).rejects.toMatchObject({
				code: ErrorCode.TIMEOUT_ERROR,
				message: 'too slow',
			});
		});
	});

	describe('tryParseJson', () => {
		it('should parse valid JSON', () => {
			expect(tryParseJson('{"a":1}')).toEqual({ ok: true, value: { a: 1 } });
		});

		it('should report invalid JSON without throwing', () => {
			const result = tryParseJson('{not json');
			expect(result.ok).toBe(false);
		});
	});
});
