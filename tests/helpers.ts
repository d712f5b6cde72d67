/**
 * Shared test utilities
 */

import { Embeddings } from '@langchain/core/embeddings';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { chapterIdFor, createChapter, createStoryMemory } from '../src/memory/story-memory';
import type { QueryResult, SemanticSearch } from '../src/services/ai/vector-store';
import type { Chapter, StoryMemory } from '../src/types';

export async function createTempDir(): Promise<string> {
	return fs.mkdtemp(path.join(os.tmpdir(), 'saga-memory-test-'));
}

export async function cleanupTemp(dir: string): Promise<void> {
	await fs.rm(dir, { recursive: true, force: true });
}

/**
 * One dimension per keyword, counting occurrences. Similarities are easy to
 * work out by hand. Text without a keyword embeds to a zero vector.
 */
export const KEYWORDS = [
	'dragon',
	'storm',
	'sword',
	'ship',
	'forest',
	'crown',
	'river',
	'tower',
	'map',
	'prophecy',
	'betrayal',
	'festival',
] as const;

export class KeywordEmbeddings extends Embeddings {
	calls = 0;

	constructor() {
		super({});
	}

	async embedDocuments(documents: string[]): Promise<number[][]> {
		this.calls += documents.length;
		return documents.map((doc) => this.embed(doc));
	}

	async embedQuery(document: string): Promise<number[]> {
		this.calls += 1;
		return this.embed(document);
	}

	private embed(text: string): number[] {
		const tokens = text.toLowerCase().match(/[a-z]+/g) ?? [];
		return KEYWORDS.map((keyword) => tokens.filter((token) => token === keyword).length);
	}
}

/** Index stand-in whose queries always reject */
export class FailingSearch implements SemanticSearch {
	calls = 0;

	async query(): Promise<QueryResult[]> {
		this.calls += 1;
		throw new Error('index unavailable');
	}
}

/** Index stand-in whose queries never settle */
export class HangingSearch implements SemanticSearch {
	query(): Promise<QueryResult[]> {
		return new Promise<QueryResult[]>(() => undefined);
	}
}

export function makeChapter(chapterNumber: number, overrides: Partial<Chapter> = {}): Chapter {
	return createChapter({
		chapterId: chapterIdFor(chapterNumber),
		chapterNumber,
		arcId: 'arc_001',
		title: `Chapter ${chapterNumber}`,
		summary: `Summary of chapter ${chapterNumber}`,
		createdAt: '2026-01-01T00:00:00.000Z',
		...overrides,
	});
}

export function makeMemory(): StoryMemory {
	return createStoryMemory(
		{ storyTitle: 'Chronicles of Test', worldName: 'Testhold', sagaGoal: 'Find the sky crown' },
		new Date('2026-01-01T00:00:00.000Z')
	);
}
