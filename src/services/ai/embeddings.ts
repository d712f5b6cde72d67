/**
 * Embedding providers for the semantic index
 */

import { Embeddings, type EmbeddingsParams } from '@langchain/core/embeddings';
import { OpenAIEmbeddings } from '@langchain/openai';
import { createError, ErrorCode } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';
import type { EnvConfig } from '../../utils/env-config.js';

const logger = getLogger('embeddings');

export const HASHING_DIMENSIONS = 384;

function hashToken(token: string): number {
	let hash = 0;
	for (let i = 0; i < token.length; i++) {
		hash = (hash << 5) - hash + token.charCodeAt(i);
		hash |= 0;
	}
	return hash;
}

/**
 * Offline bag-of-words embeddings: each token bumps one hashed dimension and the
 * vector is L2-normalized. Deterministic, no network, no model download.
 */
export class HashingEmbeddings extends Embeddings {
	constructor(
		private readonly dimensions: number = HASHING_DIMENSIONS,
		params: EmbeddingsParams = {}
	) {
		super(params);
	}

	async embedDocuments(documents: string[]): Promise<number[][]> {
		return documents.map((doc) => this.embed(doc));
	}

	async embedQuery(document: string): Promise<number[]> {
		return this.embed(document);
	}

	private embed(text: string): number[] {
		const vector = new Array<number>(this.dimensions).fill(0);
		const tokens = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
		for (const token of tokens) {
			vector[Math.abs(hashToken(token)) % this.dimensions] += 1;
		}

		const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
		return norm > 0 ? vector.map((v) => v / norm) : vector;
	}
}

export function createEmbeddings(
	config: Pick<
		EnvConfig,
		'embeddingProvider' | 'embeddingModel' | 'openaiApiKey' | 'maxRetries' | 'requestTimeoutMs'
	>
): Embeddings {
	if (config.embeddingProvider === 'hashing') {
		logger.info('Using hashing embeddings');
		return new HashingEmbeddings();
	}

	if (!config.openaiApiKey) {
		throw createError(
			ErrorCode.CONFIGURATION_ERROR,
			{ embeddingProvider: config.embeddingProvider },
			'OPENAI_API_KEY is required for openai embeddings'
		);
	}

	logger.info('Using OpenAI embeddings', { model: config.embeddingModel });
	return new OpenAIEmbeddings({
		openAIApiKey: config.openaiApiKey,
		model: config.embeddingModel,
		maxRetries: config.maxRetries,
		timeout: config.requestTimeoutMs,
	});
}
