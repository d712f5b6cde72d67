import * as fs from 'fs';
import * as path from 'path';
import { AppError, ErrorCode, handleError } from '../core/errors.js';

// ============================================================================
// File System Utilities
// ============================================================================

export async function ensureDir(dirPath: string): Promise<void> {
	try {
		await fs.promises.mkdir(dirPath, { recursive: true });
	} catch (e) {
		throw handleError(e, `ensureDir ${dirPath}`);
	}
}

export async function safeReadFile(
	filePath: string,
	encoding: BufferEncoding = 'utf-8'
): Promise<string> {
	try {
		return await fs.promises.readFile(filePath, encoding);
	} catch (e) {
		throw handleError(e, `readFile ${filePath}`);
	}
}

export async function safeWriteFile(filePath: string, data: string): Promise<void> {
	try {
		await ensureDir(path.dirname(filePath));
		await fs.promises.writeFile(filePath, data, 'utf-8');
	} catch (e) {
		throw handleError(e, `writeFile ${filePath}`);
	}
}

export async function pathExists(filePath: string): Promise<boolean> {
	try {
		await fs.promises.access(filePath);
		return true;
	} catch {
		return false;
	}
}

/**
 * Write through a temp file and rename over the target. A crash mid-write
 * leaves the previous file in place.
 */
export async function atomicWriteFile(filePath: string, content: string): Promise<void> {
	const tempPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;
	try {
		await safeWriteFile(tempPath, content);
		await fs.promises.rename(tempPath, filePath);
	} catch (error) {
		await fs.promises.rm(tempPath, { force: true });
		throw handleError(error, `atomicWrite ${filePath}`);
	}
}

// ============================================================================
// Async Utilities
// ============================================================================

export const sleep = (ms: number): Promise<void> => new Promise((res) => setTimeout(res, ms));

export async function retry<T>(
	fn: () => Promise<T>,
	{
		maxAttempts = 3,
		initialDelay = 1000,
		maxDelay = 10000,
		factor = 2,
		onRetry,
	}: {
		maxAttempts?: number;
		initialDelay?: number;
		maxDelay?: number;
		factor?: number;
		onRetry?: (attempt: number, e: unknown) => void;
	} = {}
): Promise<T> {
	let delay = initialDelay;
	for (let attempt = 1; ; attempt++) {
		try {
			return await fn();
		} catch (e) {
			if (attempt >= maxAttempts) throw e;
			onRetry?.(attempt, e);
			await sleep(delay);
			delay = Math.min(delay * factor, maxDelay);
		}
	}
}

/** Reject with TIMEOUT_ERROR when `promise` has not settled within `timeoutMs`. */
export async function withTimeout<T>(
	promise: Promise<T>,
	timeoutMs: number,
	errorMessage?: string
): Promise<T> {
	let timer: NodeJS.Timeout | undefined;
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(
			() =>
				reject(
					new AppError(
						errorMessage || `Operation timed out after ${timeoutMs}ms`,
						ErrorCode.TIMEOUT_ERROR,
						{ timeoutMs }
					)
				),
			timeoutMs
		);
	});
	try {
		return await Promise.race([promise, timeout]);
	} finally {
		clearTimeout(timer);
	}
}

// ============================================================================
// JSON Utilities
// ============================================================================

export type JsonParseResult = { ok: true; value: unknown } | { ok: false; error: string };

/** JSON.parse without throwing */
export function tryParseJson(s: string): JsonParseResult {
	try {
		return { ok: true, value: JSON.parse(s) as unknown };
	} catch (e) {
		return { ok: false, error: e instanceof Error ? e.message : String(e) };
	}
}
