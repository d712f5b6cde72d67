/**
 * Context retrieval for planning the next chapter.
 *
 * Blends four strategies: the most recent chapters, chapters and events that
 * are semantically close to where the story is now, a few random old chapters
 * as callback opportunities, and the open plot threads by importance.
 */

import { errorMessage } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { getOpenThreads, getRecentChapters, importanceRank } from '../memory/story-memory.js';
import {
	toRelevance,
	type FragmentMetadata,
	type QueryResult,
	type SemanticSearch,
} from '../services/ai/vector-store.js';
import type {
	Chapter,
	DeepReadonly,
	StoryMemoryView,
	ThreadImportance,
	ThreadStatus,
} from '../types/index.js';
import { withTimeout } from '../utils/common.js';
import { defaultRandom, pickOne, sampleWithoutReplacement, type RandomSource } from '../utils/random.js';

const logger = getLogger('smart-retriever');

export const SURPRISE_NOTE = 'Consider subtle callback';
/** Chapters this much older than the recent window qualify as callbacks */
export const SURPRISE_GAP = 5;
const MAX_ACTIVE_THREADS = 5;

export interface RecentChapterContext {
	chapterId: string;
	chapterNumber: number;
	title: string;
	summary: string;
	cliffhanger: string;
}

export interface RelevantChapterContext {
	chapterId: string;
	chapterNumber: number;
	title: string;
	/** Indexed chapter text */
	summary: string;
	relevance: number;
}

export interface RelevantEventContext {
	event: string;
	chapterId: string;
	chapterNumber: number;
	relevance: number;
}

export interface SurpriseCallback {
	chapterId: string;
	chapterNumber: number;
	title: string;
	/** One key event of the chapter, or '' when it has none */
	keyEvent: string;
	note: string;
}

export interface ActiveThreadContext {
	threadId: string;
	name: string;
	threadType: string;
	importance: ThreadImportance;
	status: ThreadStatus;
}

export interface ContextBundle {
	recentChapters: RecentChapterContext[];
	relevantChapters: RelevantChapterContext[];
	relevantEvents: RelevantEventContext[];
	surpriseCallbacks: SurpriseCallback[];
	activeThreads: ActiveThreadContext[];
}

export interface RetrievalOptions {
	currentArcId?: string;
	nRecent?: number;
	nRelevant?: number;
	nSurprise?: number;
}

export interface ThreadHistoryEntry {
	chapterId: string;
	description: string;
	chapter?: DeepReadonly<Chapter>;
}

export interface SmartRetrieverOptions {
	index: SemanticSearch;
	random?: RandomSource;
	/** Bound on each index-backed strategy */
	timeoutMs?: number;
	defaults?: Omit<RetrievalOptions, 'currentArcId'>;
}

function stringField(metadata: FragmentMetadata, key: string): string | undefined {
	const value = metadata[key];
	return typeof value === 'string' ? value : undefined;
}

function numberField(metadata: FragmentMetadata, key: string): number | undefined {
	const value = metadata[key];
	return typeof value === 'number' ? value : undefined;
}

function toEventContext(result: QueryResult): RelevantEventContext {
	return {
		event: result.text,
		chapterId: stringField(result.metadata, 'chapterId') ?? '',
		chapterNumber: numberField(result.metadata, 'chapterNumber') ?? 0,
		relevance: toRelevance(result.distance),
	};
}

export class SmartRetriever {
	private readonly index: SemanticSearch;
	private readonly random: RandomSource;
	private readonly timeoutMs: number;
	private readonly defaults: Required<Omit<RetrievalOptions, 'currentArcId'>>;

	constructor({ index, random = defaultRandom, timeoutMs = 10000, defaults = {} }: SmartRetrieverOptions) {
		this.index = index;
		this.random = random;
		this.timeoutMs = timeoutMs;
		this.defaults = {
			nRecent: defaults.nRecent ?? 3,
			nRelevant: defaults.nRelevant ?? 5,
			nSurprise: defaults.nSurprise ?? 2,
		};
	}

	/**
	 * Assemble planning context. Index-backed strategies run concurrently and
	 * each falls back to an empty list on failure or timeout, so the bundle
	 * always carries at least the recent chapters and active threads.
	 */
	async retrieveForPlanning(
		memory: StoryMemoryView,
		options: RetrievalOptions = {}
	): Promise<ContextBundle> {
		const {
			currentArcId,
			nRecent = this.defaults.nRecent,
			nRelevant = this.defaults.nRelevant,
			nSurprise = this.defaults.nSurprise,
		} = options;

		const recent = getRecentChapters(memory, nRecent);
		const recentChapters = recent.map((ch) => ({
			chapterId: ch.chapterId,
			chapterNumber: ch.chapterNumber,
			title: ch.title,
			summary: ch.summary,
			cliffhanger: ch.cliffhanger,
		}));

		const useRelevance = Object.keys(memory.chapters).length > nRecent;
		const query = this.buildQuery(memory, recent);
		const recentIds = new Set(recent.map((ch) => ch.chapterId));

		const [relevantChapters, relevantEvents, surpriseCallbacks] = await Promise.all([
			useRelevance
				? this.guarded('relevant chapters', () =>
						this.relevantChapters(query, nRelevant, recentIds, currentArcId)
					)
				: Promise.resolve([]),
			useRelevance
				? this.guarded('relevant events', () => this.relevantEvents(query, nRelevant))
				: Promise.resolve([]),
			this.guarded('surprise callbacks', async () =>
				this.surpriseCallbacks(memory, nRecent, nSurprise)
			),
		]);

		const bundle: ContextBundle = {
			recentChapters,
			relevantChapters,
			relevantEvents,
			surpriseCallbacks,
			activeThreads: this.activeThreads(memory),
		};
		logger.debug('Retrieved planning context', {
			recent: bundle.recentChapters.length,
			relevantChapters: bundle.relevantChapters.length,
			relevantEvents: bundle.relevantEvents.length,
			surprises: bundle.surpriseCallbacks.length,
			threads: bundle.activeThreads.length,
		});
		return bundle;
	}

	/** Past events that mention the character */
	async searchCharacterHistory(characterName: string, n = 5): Promise<RelevantEventContext[]> {
		const results = await this.index.query(
			'events',
			`${characterName} character development moment action`,
			n
		);
		return results.map(toEventContext);
	}

	async findSimilarSituations(description: string, n = 3): Promise<RelevantEventContext[]> {
		const results = await this.index.query('events', description, n);
		return results.map(toEventContext);
	}

	/** Developments of the thread with that exact name, oldest first; [] if unknown */
	getThreadHistory(threadName: string, memory: StoryMemoryView): ThreadHistoryEntry[] {
		const thread = Object.values(memory.plotThreads).find((t) => t.name === threadName);
		if (!thread) return [];

		return thread.developments.map((development) => ({
			chapterId: development.chapterId,
			description: development.description,
			chapter: memory.chapters[development.chapterId],
		}));
	}

	private buildQuery(memory: StoryMemoryView, recent: DeepReadonly<Chapter>[]): string {
		const latest = recent[0];
		if (!latest) return `${memory.sagaGoal} ${memory.worldName}`;
		return `${latest.summary} ${latest.keyEvents.slice(0, 3).join(' ')}`;
	}

	private async relevantChapters(
		query: string,
		n: number,
		excludeIds: ReadonlySet<string>,
		arcId?: string
	): Promise<RelevantChapterContext[]> {
		const results = await this.index.query('chapters', query, n, arcId ? { arcId } : undefined);
		return results
			.filter((result) => !excludeIds.has(result.id))
			.map((result) => ({
				chapterId: result.id,
				chapterNumber: numberField(result.metadata, 'chapterNumber') ?? 0,
				title: stringField(result.metadata, 'title') ?? '',
				summary: result.text,
				relevance: toRelevance(result.distance),
			}));
	}

	private async relevantEvents(query: string, n: number): Promise<RelevantEventContext[]> {
		const results = await this.index.query('events', query, n * 2);
		return results.slice(0, n).map(toEventContext);
	}

	private surpriseCallbacks(
		memory: StoryMemoryView,
		nRecent: number,
		nSurprise: number
	): SurpriseCallback[] {
		if (nSurprise <= 0) return [];

		const cutoff = memory.currentChapterNumber - nRecent - SURPRISE_GAP;
		const eligible = Object.values(memory.chapters).filter((ch) => ch.chapterNumber < cutoff);

		return sampleWithoutReplacement(eligible, nSurprise, this.random).map((ch) => ({
			chapterId: ch.chapterId,
			chapterNumber: ch.chapterNumber,
			title: ch.title,
			keyEvent: pickOne(ch.keyEvents, this.random) ?? '',
			note: SURPRISE_NOTE,
		}));
	}

	private activeThreads(memory: StoryMemoryView): ActiveThreadContext[] {
		return getOpenThreads(memory)
			.sort((a, b) => importanceRank(b.importance) - importanceRank(a.importance))
			.slice(0, MAX_ACTIVE_THREADS)
			.map((t) => ({
				threadId: t.threadId,
				name: t.name,
				threadType: t.threadType,
				importance: t.importance,
				status: t.status,
			}));
	}

	private async guarded<T>(strategy: string, run: () => Promise<T[]>): Promise<T[]> {
		try {
			return await withTimeout(
				run(),
				this.timeoutMs,
				`Retrieval strategy "${strategy}" timed out after ${this.timeoutMs}ms`
			);
		} catch (error) {
			logger.warn('Retrieval strategy failed, continuing without it', {
				strategy,
				error: errorMessage(error),
			});
			return [];
		}
	}
}
