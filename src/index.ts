/**
 * saga-memory: narrative state store and retrieval engine
 */

export * from './types/index.js';
export * from './core/errors.js';
export { getLogger, setGlobalLogLevel, LogLevel, Logger, type LogContext } from './core/logger.js';
export { getEnvConfig, type EnvConfig, type EmbeddingProviderName } from './utils/env-config.js';
export { createSeededRandom, type RandomSource } from './utils/random.js';

export * from './memory/story-memory.js';
export { parseStoryMemory, StoryMemorySchema } from './memory/story-schema.js';
export { StoryStore, type StoryStoreOptions } from './memory/story-store.js';
export { normalizeName, findMatch, type NameCandidate } from './memory/name-resolver.js';
export {
	parseWorldSeed,
	seedStory,
	storyOptionsFromSeed,
	WorldSeedSchema,
	type WorldSeed,
	type WorldSeedInput,
} from './memory/bootstrap.js';

export { HashingEmbeddings, createEmbeddings } from './services/ai/embeddings.js';
export {
	SemanticIndex,
	toRelevance,
	INDEX_COLLECTIONS,
	type IndexCollection,
	type IndexStats,
	type QueryResult,
	type SemanticSearch,
	type FragmentMetadata,
} from './services/ai/vector-store.js';
export {
	OpenAIGenerationService,
	type GenerationRequest,
	type GenerationService,
} from './services/ai/generation-service.js';

export * from './updater/fact-schema.js';
export { FactExtractor, type FactSource } from './updater/fact-extractor.js';
export { StateMergePipeline, type MergeReport } from './updater/state-merge.js';

export * from './retrieval/smart-retriever.js';
export { StoryEngine, type StoryEngineOverrides } from './story-engine.js';
