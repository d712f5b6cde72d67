/**
 * Semantic index over story fragments: chapters, their key events and plot
 * threads, one in-memory LangChain vector store per collection.
 */

import { Document } from '@langchain/core/documents';
import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import * as fs from 'fs/promises';
import { MemoryVectorStore } from 'langchain/vectorstores/memory';
import { z } from 'zod';
import { AppError, CorruptStateError, ErrorCode, errorMessage } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';
import type { Chapter, DeepReadonly, PlotThread, StoryMemoryView } from '../../types/index.js';
import { atomicWriteFile, pathExists, tryParseJson, withTimeout } from '../../utils/common.js';

const logger = getLogger('semantic-index');

export const INDEX_COLLECTIONS = ['chapters', 'events', 'threads'] as const;
export type IndexCollection = (typeof INDEX_COLLECTIONS)[number];

export type MetadataValue = string | number | boolean;
export type FragmentMetadata = Record<string, MetadataValue>;

export interface QueryResult {
	id: string;
	text: string;
	metadata: FragmentMetadata;
	/** 1 - cosine similarity, in [0, 2]; lower is closer */
	distance: number;
}

export interface IndexStats {
	chapters: number;
	events: number;
	threads: number;
}

/** Read side of the index, as the retriever sees it */
export interface SemanticSearch {
	query(
		collection: IndexCollection,
		text: string,
		k: number,
		metadataFilter?: FragmentMetadata
	): Promise<QueryResult[]>;
}

export interface SemanticIndexOptions {
	/** Bound on each embedding call and similarity search */
	timeoutMs?: number;
	/** vectors.json location for persist/restore */
	persistPath?: string;
}

/** Metadata key holding the caller's fragment id */
const FRAGMENT_ID_KEY = 'fragmentId';

const PersistedFragmentSchema = z.object({
	id: z.string(),
	text: z.string(),
	metadata: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])),
	embedding: z.array(z.number()),
});

const PersistedIndexSchema = z.object({
	version: z.literal(1),
	collections: z.object({
		chapters: z.array(PersistedFragmentSchema).default([]),
		events: z.array(PersistedFragmentSchema).default([]),
		threads: z.array(PersistedFragmentSchema).default([]),
	}),
});

type PersistedFragment = z.infer<typeof PersistedFragmentSchema>;

/**
 * Relevance score for display and ranking: 1 - distance, floored at 0.
 * Results without a distance count as fully relevant.
 */
export function toRelevance(distance: number | undefined): number {
	if (distance === undefined) return 1.0;
	return distance <= 1 ? 1 - distance : 0;
}

/** Event fragment id for the key event at `index` (zero-based) */
export function eventFragmentId(chapterId: string, index: number): string {
	return `${chapterId}_event_${index}`;
}

/** Cosine similarity; a zero vector (text without tokens) scores 0 */
export function cosineSimilarity(a: number[], b: number[]): number {
	let dot = 0;
	let normA = 0;
	let normB = 0;
	for (let i = 0; i < Math.max(a.length, b.length); i++) {
		const x = a[i] ?? 0;
		const y = b[i] ?? 0;
		dot += x * y;
		normA += x * x;
		normB += y * y;
	}
	if (normA === 0 || normB === 0) return 0;
	return dot / Math.sqrt(normA * normB);
}

function toDistance(similarity: number): number {
	if (!Number.isFinite(similarity)) return 1;
	return Math.min(2, Math.max(0, 1 - similarity));
}

function toFragmentMetadata(raw: Record<string, unknown>): FragmentMetadata {
	const metadata: FragmentMetadata = {};
	for (const [key, value] of Object.entries(raw)) {
		if (key === FRAGMENT_ID_KEY) continue;
		if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
			metadata[key] = value;
		}
	}
	return metadata;
}

function matchesFilter(metadata: Record<string, unknown>, filter: FragmentMetadata): boolean {
	return Object.entries(filter).every(([key, value]) => metadata[key] === value);
}

function fragmentIdOf(metadata: Record<string, unknown>): string {
	const id = metadata[FRAGMENT_ID_KEY];
	return typeof id === 'string' ? id : '';
}

export class SemanticIndex implements SemanticSearch {
	private stores: Record<IndexCollection, MemoryVectorStore>;
	private ids: Record<IndexCollection, Set<string>>;
	private readonly timeoutMs: number;
	private readonly persistPath?: string;

	constructor(
		private readonly embeddings: EmbeddingsInterface,
		{ timeoutMs = 10000, persistPath }: SemanticIndexOptions = {}
	) {
		this.timeoutMs = timeoutMs;
		this.persistPath = persistPath;
		this.stores = this.createStores();
		this.ids = { chapters: new Set(), events: new Set(), threads: new Set() };
	}

	private createStores(): Record<IndexCollection, MemoryVectorStore> {
		return {
			chapters: new MemoryVectorStore(this.embeddings, { similarity: cosineSimilarity }),
			events: new MemoryVectorStore(this.embeddings, { similarity: cosineSimilarity }),
			threads: new MemoryVectorStore(this.embeddings, { similarity: cosineSimilarity }),
		};
	}

	has(collection: IndexCollection, id: string): boolean {
		return this.ids[collection].has(id);
	}

	/**
	 * Embed and add one fragment. Fragments are append-only: an id already in
	 * the collection is left as it is and false is returned.
	 */
	async indexFragment(
		collection: IndexCollection,
		id: string,
		text: string,
		metadata: FragmentMetadata = {}
	): Promise<boolean> {
		const ids = this.ids[collection];
		if (ids.has(id)) {
			logger.debug('Fragment already indexed', { collection, id });
			return false;
		}

		// Reserved before the await so a concurrent call with the same id skips
		ids.add(id);
		try {
			const [vector] = await withTimeout(
				this.embeddings.embedDocuments([text]),
				this.timeoutMs,
				`Embedding ${collection}/${id} timed out after ${this.timeoutMs}ms`
			);
			if (!vector) {
				throw new AppError('Embedding provider returned no vector', ErrorCode.EMBEDDING_ERROR);
			}
			await this.stores[collection].addVectors(
				[vector],
				[new Document({ pageContent: text, metadata: { ...metadata, [FRAGMENT_ID_KEY]: id } })]
			);
			return true;
		} catch (error) {
			ids.delete(id);
			if (error instanceof AppError) throw error;
			throw new AppError(`Failed to index ${collection}/${id}`, ErrorCode.INDEX_ERROR, {
				error: errorMessage(error),
			});
		}
	}

	/**
	 * Nearest fragments to `text`, closest first. An empty collection answers
	 * without touching the embedding provider.
	 */
	async query(
		collection: IndexCollection,
		text: string,
		k: number,
		metadataFilter?: FragmentMetadata
	): Promise<QueryResult[]> {
		if (k <= 0 || this.ids[collection].size === 0) return [];

		const vector = await withTimeout(
			this.embeddings.embedQuery(text),
			this.timeoutMs,
			`Query embedding timed out after ${this.timeoutMs}ms`
		);
		const filter = metadataFilter
			? (doc: Document) => matchesFilter(doc.metadata, metadataFilter)
			: undefined;
		const matches = await withTimeout(
			this.stores[collection].similaritySearchVectorWithScore(vector, k, filter),
			this.timeoutMs,
			`Query on ${collection} timed out after ${this.timeoutMs}ms`
		);

		return matches.map(([doc, similarity]) => ({
			id: fragmentIdOf(doc.metadata),
			text: doc.pageContent,
			metadata: toFragmentMetadata(doc.metadata),
			distance: toDistance(similarity),
		}));
	}

	/**
	 * Index a chapter and each of its key events. Resolves once every fragment
	 * is in place.
	 * @returns whether the chapter fragment itself was new
	 */
	async indexChapter(chapter: DeepReadonly<Chapter>): Promise<boolean> {
		const text = `${chapter.title}\n${chapter.summary}\n${chapter.keyEvents.join('\n')}`;
		const added = await this.indexFragment('chapters', chapter.chapterId, text, {
			chapterId: chapter.chapterId,
			chapterNumber: chapter.chapterNumber,
			arcId: chapter.arcId,
			title: chapter.title,
			cliffhangerType: chapter.cliffhangerType,
		});

		for (const [index, event] of chapter.keyEvents.entries()) {
			await this.indexFragment('events', eventFragmentId(chapter.chapterId, index), event, {
				chapterId: chapter.chapterId,
				chapterNumber: chapter.chapterNumber,
				eventIndex: index,
			});
		}

		logger.debug('Indexed chapter', {
			chapterId: chapter.chapterId,
			events: chapter.keyEvents.length,
		});
		return added;
	}

	/** Status in the metadata is the one at index time. */
	async indexThread(thread: DeepReadonly<PlotThread>): Promise<boolean> {
		return this.indexFragment('threads', thread.threadId, `${thread.name}\n${thread.setupDescription}`, {
			name: thread.name,
			threadType: thread.threadType,
			status: thread.status,
			importance: thread.importance,
		});
	}

	async searchChapters(query: string, n = 5, arcId?: string): Promise<QueryResult[]> {
		return this.query('chapters', query, n, arcId ? { arcId } : undefined);
	}

	async searchEvents(query: string, n = 10): Promise<QueryResult[]> {
		return this.query('events', query, n);
	}

	async searchThreads(query: string, n = 5, status?: string): Promise<QueryResult[]> {
		return this.query('threads', query, n, status ? { status } : undefined);
	}

	getStats(): IndexStats {
		return {
			chapters: this.ids.chapters.size,
			events: this.ids.events.size,
			threads: this.ids.threads.size,
		};
	}

	reset(): void {
		this.stores = this.createStores();
		this.ids = { chapters: new Set(), events: new Set(), threads: new Set() };
		logger.info('Semantic index reset');
	}

	/** Drop everything and re-index every chapter (in order) and thread. */
	async rebuildFromMemory(memory: StoryMemoryView): Promise<IndexStats> {
		this.reset();
		const chapters = Object.values(memory.chapters).sort(
			(a, b) => a.chapterNumber - b.chapterNumber
		);
		for (const chapter of chapters) {
			await this.indexChapter(chapter);
		}
		for (const thread of Object.values(memory.plotThreads)) {
			await this.indexThread(thread);
		}

		const stats = this.getStats();
		logger.info('Rebuilt semantic index', { ...stats });
		return stats;
	}

	/** Write all vectors to the persist path. */
	async persist(): Promise<void> {
		const file = this.requirePersistPath();
		const collections: Record<IndexCollection, PersistedFragment[]> = {
			chapters: [],
			events: [],
			threads: [],
		};
		for (const collection of INDEX_COLLECTIONS) {
			collections[collection] = this.stores[collection].memoryVectors.map((vector) => ({
				id: fragmentIdOf(vector.metadata),
				text: vector.content,
				metadata: toFragmentMetadata(vector.metadata),
				embedding: vector.embedding,
			}));
		}

		await atomicWriteFile(file, JSON.stringify({ version: 1, collections }));
		logger.debug('Persisted semantic index', { path: file, ...this.getStats() });
	}

	/**
	 * Replace the index contents with the persisted vectors, without
	 * re-embedding.
	 * @returns false when nothing has been persisted yet
	 */
	async restore(): Promise<boolean> {
		const file = this.requirePersistPath();
		if (!(await pathExists(file))) return false;

		const parsed = tryParseJson(await fs.readFile(file, 'utf-8'));
		const result = parsed.ok ? PersistedIndexSchema.safeParse(parsed.value) : undefined;
		if (!result?.success) {
			throw new CorruptStateError('Vector file is malformed', { path: file });
		}

		this.reset();
		for (const collection of INDEX_COLLECTIONS) {
			const fragments = result.data.collections[collection];
			if (fragments.length === 0) continue;

			await this.stores[collection].addVectors(
				fragments.map((fragment) => fragment.embedding),
				fragments.map(
					(fragment) =>
						new Document({
							pageContent: fragment.text,
							metadata: { ...fragment.metadata, [FRAGMENT_ID_KEY]: fragment.id },
						})
				)
			);
			for (const fragment of fragments) {
				this.ids[collection].add(fragment.id);
			}
		}

		logger.info('Restored semantic index', { path: file, ...this.getStats() });
		return true;
	}

	private requirePersistPath(): string {
		if (!this.persistPath) {
			throw new AppError('No persist path configured', ErrorCode.CONFIGURATION_ERROR);
		}
		return this.persistPath;
	}
}
