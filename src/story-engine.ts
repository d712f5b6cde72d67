/**
 * Wires store, semantic index, merge pipeline and retriever from configuration
 * and holds the one in-memory aggregate they share.
 */

import * as path from 'path';
import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import { AppError, CorruptStateError, ErrorCode } from './core/errors.js';
import { getLogger, setGlobalLogLevel } from './core/logger.js';
import { parseWorldSeed, seedStory, storyOptionsFromSeed } from './memory/bootstrap.js';
import { StoryStore } from './memory/story-store.js';
import {
	SmartRetriever,
	type ContextBundle,
	type RetrievalOptions,
} from './retrieval/smart-retriever.js';
import { createEmbeddings } from './services/ai/embeddings.js';
import {
	OpenAIGenerationService,
	type GenerationService,
} from './services/ai/generation-service.js';
import { SemanticIndex } from './services/ai/vector-store.js';
import type { Chapter, StoryMemory, StoryMemoryView } from './types/index.js';
import { FactExtractor } from './updater/fact-extractor.js';
import type { Fact } from './updater/fact-schema.js';
import { StateMergePipeline, type MergeReport } from './updater/state-merge.js';
import { getEnvConfig, type EnvConfig } from './utils/env-config.js';
import type { RandomSource } from './utils/random.js';

const logger = getLogger('story-engine');

export const VECTORS_FILE_NAME = 'vectors.json';

export interface StoryEngineOverrides {
	embeddings?: EmbeddingsInterface;
	/** Enables fact extraction when no facts are passed to mergeChapter */
	generator?: GenerationService;
	random?: RandomSource;
}

export class StoryEngine {
	readonly store: StoryStore;
	readonly index: SemanticIndex;
	readonly pipeline: StateMergePipeline;
	readonly retriever: SmartRetriever;
	private memory: StoryMemory | null = null;

	constructor(config: EnvConfig, overrides: StoryEngineOverrides = {}) {
		setGlobalLogLevel(config.logLevel);
		this.store = new StoryStore({ memoryDir: config.memoryDir, chaptersDir: config.chaptersDir });
		this.index = new SemanticIndex(overrides.embeddings ?? createEmbeddings(config), {
			timeoutMs: config.queryTimeoutMs,
			persistPath: path.join(config.memoryDir, VECTORS_FILE_NAME),
		});

		const generator =
			overrides.generator ??
			(config.openaiApiKey
				? new OpenAIGenerationService({
						apiKey: config.openaiApiKey,
						model: config.generationModel,
						maxRetries: config.maxRetries,
						retryInitialDelayMs: config.retryInitialDelayMs,
						requestTimeoutMs: config.requestTimeoutMs,
					})
				: undefined);

		this.pipeline = new StateMergePipeline({
			index: this.index,
			store: this.store,
			extractor: generator ? new FactExtractor(generator) : undefined,
		});
		this.retriever = new SmartRetriever({
			index: this.index,
			random: overrides.random,
			timeoutMs: config.queryTimeoutMs,
			defaults: config.retrieval,
		});
	}

	static fromEnv(overrides: StoryEngineOverrides = {}): StoryEngine {
		return new StoryEngine(getEnvConfig(), overrides);
	}

	/**
	 * Load the persisted story, if any, and bring the index in line with it.
	 * @throws CorruptStateError when the memory file is unreadable
	 */
	async open(): Promise<StoryMemoryView | null> {
		this.memory = await this.store.load();
		if (!this.memory) return null;

		let restored = false;
		try {
			restored = await this.index.restore();
		} catch (error) {
			if (!(error instanceof CorruptStateError)) throw error;
			logger.warn('Vector file unreadable, rebuilding index', { error: error.message });
		}
		if (!restored) {
			await this.index.rebuildFromMemory(this.memory);
			await this.index.persist();
		}
		return this.memory;
	}

	/** Start a new story from a world seed and save it (no backup). */
	async initializeFromSeed(rawSeed: unknown): Promise<StoryMemoryView> {
		const seed = parseWorldSeed(rawSeed);
		const memory = seedStory(this.store.initializeNewStory(storyOptionsFromSeed(seed)), seed);
		await this.store.save(memory, false);

		this.index.reset();
		for (const thread of Object.values(memory.plotThreads)) {
			await this.index.indexThread(thread);
		}
		await this.index.persist();

		this.memory = memory;
		return memory;
	}

	async mergeChapter(chapter: Chapter, facts?: Fact[]): Promise<MergeReport> {
		const memory = this.requireMemory();
		const report = await this.pipeline.mergeChapter(memory, chapter, facts);
		if (report.indexed) {
			await this.index.persist();
		}
		return report;
	}

	async retrieveForPlanning(options: RetrievalOptions = {}): Promise<ContextBundle> {
		const memory = this.requireMemory();
		return this.retriever.retrieveForPlanning(memory, {
			currentArcId: memory.currentArcId ?? undefined,
			...options,
		});
	}

	getMemory(): StoryMemoryView | null {
		return this.memory;
	}

	private requireMemory(): StoryMemory {
		if (!this.memory) {
			throw new AppError(
				'No story loaded; call open() or initializeFromSeed() first',
				ErrorCode.INVALID_INPUT
			);
		}
		return this.memory;
	}
}
