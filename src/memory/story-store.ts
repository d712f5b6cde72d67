/**
 * JSON file store for the StoryMemory aggregate.
 *
 * Layout under the memory directory:
 *   story_memory.json          current document
 *   backups/story_memory_*.json  timestamped copies, one per backed-up save
 * Chapter bodies live beside it as `<chapterId>.md` in the chapters directory.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { AppError, CorruptStateError, ErrorCode } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { StoryMemory } from '../types/index.js';
import {
	atomicWriteFile,
	ensureDir,
	pathExists,
	safeReadFile,
	safeWriteFile,
	tryParseJson,
} from '../utils/common.js';
import { createStoryMemory, type NewStoryOptions } from './story-memory.js';
import { parseStoryMemory } from './story-schema.js';

const logger = getLogger('story-store');

export const MEMORY_FILE_NAME = 'story_memory.json';
const BACKUP_PREFIX = 'story_memory_';
// Same-second backups carry a numeric suffix: story_memory_<stamp>_<n>.json
const BACKUP_PATTERN = /^story_memory_(.+?)(?:_(\d+))?\.json$/;
const BACKUP_DIR_NAME = 'backups';

export interface StoryStoreOptions {
	memoryDir: string;
	chaptersDir: string;
	/** Clock for lastUpdated and backup names */
	now?: () => Date;
}

function isPlainFileName(name: string): boolean {
	return name.length > 0 && name !== '.' && name !== '..' && path.basename(name) === name;
}

export class StoryStore {
	readonly memoryFile: string;
	readonly backupDir: string;
	private readonly chaptersDir: string;
	private readonly now: () => Date;

	constructor({ memoryDir, chaptersDir, now = () => new Date() }: StoryStoreOptions) {
		this.memoryFile = path.join(memoryDir, MEMORY_FILE_NAME);
		this.backupDir = path.join(memoryDir, BACKUP_DIR_NAME);
		this.chaptersDir = chaptersDir;
		this.now = now;
	}

	async exists(): Promise<boolean> {
		return pathExists(this.memoryFile);
	}

	/** Fresh aggregate; nothing is written until the first save. */
	initializeNewStory(options: NewStoryOptions): StoryMemory {
		const memory = createStoryMemory(options, this.now());
		logger.info('Initialized new story', {
			storyTitle: memory.storyTitle,
			worldName: memory.worldName,
		});
		return memory;
	}

	/**
	 * Current aggregate, or null on first run.
	 * @throws CorruptStateError when the file is not a valid StoryMemory document
	 */
	async load(): Promise<StoryMemory | null> {
		if (!(await this.exists())) {
			logger.info('No existing memory file', { path: this.memoryFile });
			return null;
		}

		const memory = await this.readDocument(this.memoryFile);
		logger.info('Loaded story memory', {
			storyTitle: memory.storyTitle,
			chapters: Object.keys(memory.chapters).length,
			characters: Object.keys(memory.characters).length,
			currentChapter: memory.currentChapterNumber,
		});
		return memory;
	}

	async save(memory: StoryMemory, makeBackup = true): Promise<void> {
		memory.lastUpdated = this.now().toISOString();

		if (makeBackup) {
			await this.createBackup();
		}

		await ensureDir(path.dirname(this.memoryFile));
		await atomicWriteFile(this.memoryFile, JSON.stringify(memory, null, 2));
		logger.debug('Saved story memory', { path: this.memoryFile });
	}

	/**
	 * Copy the current document into the backup directory.
	 * @returns the backup file name, or null when there is no current document
	 */
	async createBackup(): Promise<string | null> {
		if (!(await this.exists())) return null;

		await ensureDir(this.backupDir);
		const stamp = this.now().toISOString().replace(/[:.]/g, '-');
		let name = `${BACKUP_PREFIX}${stamp}.json`;
		for (let n = 1; await pathExists(path.join(this.backupDir, name)); n++) {
			name = `${BACKUP_PREFIX}${stamp}_${n}.json`;
		}

		await fs.copyFile(this.memoryFile, path.join(this.backupDir, name));
		logger.debug('Created backup', { name });
		return name;
	}

	/** Backup file names, newest first */
	async listBackups(): Promise<string[]> {
		if (!(await pathExists(this.backupDir))) return [];

		const files = await fs.readdir(this.backupDir);
		return files
			.map((name) => ({ name, match: BACKUP_PATTERN.exec(name) }))
			.flatMap(({ name, match }) => (match ? [{ name, stamp: match[1], n: Number(match[2] ?? 0) }] : []))
			.sort((a, b) => (a.stamp === b.stamp ? b.n - a.n : a.stamp < b.stamp ? 1 : -1))
			.map(({ name }) => name);
	}

	/**
	 * Parse a backup into a new aggregate. The caller decides whether it
	 * replaces the in-memory state; the current file is left untouched.
	 */
	async restoreBackup(name: string): Promise<StoryMemory | null> {
		if (!isPlainFileName(name)) {
			logger.warn('Rejected backup name', { name });
			return null;
		}

		const backupFile = path.join(this.backupDir, name);
		if (!(await pathExists(backupFile))) {
			logger.warn('Backup not found', { name });
			return null;
		}

		const memory = await this.readDocument(backupFile);
		logger.info('Restored from backup', { name });
		return memory;
	}

	async saveChapterText(chapterId: string, content: string): Promise<void> {
		if (!isPlainFileName(chapterId)) {
			throw new AppError(`Invalid chapter id: ${chapterId}`, ErrorCode.INVALID_INPUT, {
				chapterId,
			});
		}
		await safeWriteFile(this.chapterFile(chapterId), content);
	}

	async loadChapterText(chapterId: string): Promise<string | null> {
		if (!isPlainFileName(chapterId)) return null;

		const file = this.chapterFile(chapterId);
		if (!(await pathExists(file))) return null;
		return safeReadFile(file);
	}

	private chapterFile(chapterId: string): string {
		return path.join(this.chaptersDir, `${chapterId}.md`);
	}

	private async readDocument(file: string): Promise<StoryMemory> {
		const parsed = tryParseJson(await safeReadFile(file));
		if (!parsed.ok) {
			throw new CorruptStateError(`Memory file is not valid JSON: ${path.basename(file)}`, {
				path: file,
				error: parsed.error,
			});
		}

		const result = parseStoryMemory(parsed.value);
		if (!result.success) {
			throw new CorruptStateError(`Memory file failed validation: ${path.basename(file)}`, {
				path: file,
				issues: result.issues,
			});
		}
		return result.memory;
	}
}
