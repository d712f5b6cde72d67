import * as path from 'path';
import { LogLevel } from '../../../src/core/logger';
import { getEnvConfig, parseEnvInt } from '../../../src/utils/env-config';

describe('env-config', () => {
	describe('parseEnvInt', () => {
		it('should fall back to the default for missing, invalid or out-of-range values', () => {
			expect(parseEnvInt(undefined, 3, 'X')).toBe(3);
			expect(parseEnvInt('abc', 3, 'X')).toBe(3);
			expect(parseEnvInt('-1', 3, 'X')).toBe(3);
			expect(parseEnvInt('11', 3, 'X', { max: 10 })).toBe(3);
		});

		it('should parse valid integers', () => {
			expect(parseEnvInt('7', 3, 'X')).toBe(7);
		});
	});

	describe('getEnvConfig', () => {
		it('should apply defaults', () => {
			const config = getEnvConfig({});

			expect(config.dataDir).toBe(path.resolve('data'));
			expect(config.memoryDir).toBe(path.join(path.resolve('data'), 'memory'));
			expect(config.chaptersDir).toBe(path.join(path.resolve('data'), 'chapters'));
			expect(config.logLevel).toBe(LogLevel.INFO);
			expect(config.openaiApiKey).toBeUndefined();
			expect(config.generationModel).toBe('gpt-4o-mini');
			expect(config.embeddingProvider).toBe('hashing');
			expect(config.embeddingModel).toBe('text-embedding-3-small');
			expect(config.maxRetries).toBe(3);
			expect(config.retryInitialDelayMs).toBe(1000);
			expect(config.requestTimeoutMs).toBe(60000);
			expect(config.queryTimeoutMs).toBe(10000);
			expect(config.retrieval).toEqual({ nRecent: 3, nRelevant: 5, nSurprise: 2 });
		});

		it('should default to OpenAI embeddings when a key is present', () => {
			const config = getEnvConfig({ OPENAI_API_KEY: 'test-key' });

			expect(config.openaiApiKey).toBe('test-key');
			expect(config.embeddingProvider).toBe('openai');
		});

		it('should read overrides', () => {
			const config = getEnvConfig({
				STORY_DATA_DIR: '/tmp/saga',
				LOG_LEVEL: 'debug',
				OPENAI_API_KEY: 'test-key',
				STORY_EMBEDDING_PROVIDER: 'hashing',
				STORY_MAX_RETRIES: '5',
				STORY_RECENT_CHAPTERS: '4',
				STORY_RELEVANT_ITEMS: '6',
				STORY_SURPRISE_CALLBACKS: '0',
			});

			expect(config.dataDir).toBe(path.resolve('/tmp/saga'));
			expect(config.logLevel).toBe(LogLevel.DEBUG);
			expect(config.embeddingProvider).toBe('hashing');
			expect(config.maxRetries).toBe(5);
			expect(config.retrieval).toEqual({ nRecent: 4, nRelevant: 6, nSurprise: 0 });
		});

		it('should ignore an unknown embedding provider', () => {
			expect(getEnvConfig({ STORY_EMBEDDING_PROVIDER: 'cohere' }).embeddingProvider).toBe('hashing');
		});
	});
});
