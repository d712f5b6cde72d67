import { OpenAIEmbeddings } from '@langchain/openai';
import { ErrorCode } from '../../../src/core/errors';
import {
	HASHING_DIMENSIONS,
	HashingEmbeddings,
	createEmbeddings,
} from '../../../src/services/ai/embeddings';

const baseConfig = {
	embeddingModel: 'text-embedding-3-small',
	maxRetries: 3,
	requestTimeoutMs: 1000,
};

describe('embeddings', () => {
	describe('HashingEmbeddings', () => {
		const embeddings = new HashingEmbeddings();

		it('should produce unit vectors of the configured size', async () => {
			const vector = await embeddings.embedQuery('The dragon guards the tower');
			const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));

			expect(vector).toHaveLength(HASHING_DIMENSIONS);
			expect(norm).toBeCloseTo(1, 10);
		});

		it('should be deterministic and case-insensitive', async () => {
			const [a, b] = await embeddings.embedDocuments(['Storm over the river', 'storm OVER the River']);
			expect(a).toEqual(b);
		});

		it('should return a zero vector for text without tokens', async () => {
			const vector = await embeddings.embedQuery('  ...  ');
			expect(vector.every((v) => v === 0)).toBe(true);
		});

		it('should honor a custom dimension count', async () => {
			expect(await new HashingEmbeddings(16).embedQuery('map')).toHaveLength(16);
		});
	});

	describe('createEmbeddings', () => {
		it('should build hashing embeddings', () => {
			const embeddings = createEmbeddings({ ...baseConfig, embeddingProvider: 'hashing' });
			expect(embeddings).toBeInstanceOf(HashingEmbeddings);
		});

		it('should build OpenAI embeddings with a key', () => {
			const embeddings = createEmbeddings({
				...baseConfig,
				embeddingProvider: 'openai',
				openaiApiKey: 'test-key',
			});
			expect(embeddings).toBeInstanceOf(OpenAIEmbeddings);
		});

		it('should require a key for OpenAI embeddings', () => {
			expect(() => createEmbeddings({ ...baseConfig, embeddingProvider: 'openai' })).toThrow(
				expect.objectContaining({ code: ErrorCode.CONFIGURATION_ERROR })
			);
		});
	});
});
