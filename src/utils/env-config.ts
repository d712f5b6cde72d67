/**
 * Environment Configuration Utilities
 * Parsing and validation of environment variables
 */

import * as path from 'path';
import { getLogger, LogLevel, parseLogLevel } from '../core/logger.js';

const logger = getLogger('env-config');

export type EmbeddingProviderName = 'openai' | 'hashing';

export interface RetrievalDefaults {
	nRecent: number;
	nRelevant: number;
	nSurprise: number;
}

export interface EnvConfig {
	dataDir: string;
	memoryDir: string;
	chaptersDir: string;
	logLevel: LogLevel;
	openaiApiKey?: string;
	generationModel: string;
	embeddingProvider: EmbeddingProviderName;
	embeddingModel: string;
	maxRetries: number;
	retryInitialDelayMs: number;
	requestTimeoutMs: number;
	queryTimeoutMs: number;
	retrieval: RetrievalDefaults;
}

/**
 * Safely parse integer environment variable
 */
export function parseEnvInt(
	value: string | undefined,
	defaultValue: number,
	name: string,
	{ min = 0, max = Number.MAX_SAFE_INTEGER }: { min?: number; max?: number } = {}
): number {
	if (!value) return defaultValue;

	const parsed = parseInt(value, 10);
	if (isNaN(parsed)) {
		logger.warn(`Invalid integer for ${name}: "${value}", using default ${defaultValue}`);
		return defaultValue;
	}

	if (parsed < min || parsed > max) {
		logger.warn(`${name} out of range: ${parsed}, using default ${defaultValue}`);
		return defaultValue;
	}

	return parsed;
}

function parseEmbeddingProvider(
	value: string | undefined,
	hasApiKey: boolean
): EmbeddingProviderName {
	const fallback: EmbeddingProviderName = hasApiKey ? 'openai' : 'hashing';
	if (!value) return fallback;

	const lower = value.toLowerCase().trim();
	if (lower === 'openai' || lower === 'hashing') return lower;

	logger.warn(`Unknown embedding provider "${value}", using ${fallback}`);
	return fallback;
}

/**
 * Get validated environment configuration
 */
export function getEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
	const dataDir = path.resolve(env.STORY_DATA_DIR?.trim() || 'data');
	const openaiApiKey = env.OPENAI_API_KEY?.trim() || undefined;

	const config: EnvConfig = {
		dataDir,
		memoryDir: path.join(dataDir, 'memory'),
		chaptersDir: path.join(dataDir, 'chapters'),
		logLevel: parseLogLevel(env.LOG_LEVEL) ?? LogLevel.INFO,
		openaiApiKey,
		generationModel: env.STORY_GENERATION_MODEL?.trim() || 'gpt-4o-mini',
		embeddingProvider: parseEmbeddingProvider(env.STORY_EMBEDDING_PROVIDER, !!openaiApiKey),
		embeddingModel: env.STORY_EMBEDDING_MODEL?.trim() || 'text-embedding-3-small',
		maxRetries: parseEnvInt(env.STORY_MAX_RETRIES, 3, 'STORY_MAX_RETRIES', { min: 1, max: 10 }),
		retryInitialDelayMs: parseEnvInt(env.STORY_RETRY_DELAY_MS, 1000, 'STORY_RETRY_DELAY_MS'),
		requestTimeoutMs: parseEnvInt(env.STORY_REQUEST_TIMEOUT_MS, 60000, 'STORY_REQUEST_TIMEOUT_MS', {
			min: 1,
		}),
		queryTimeoutMs: parseEnvInt(env.STORY_QUERY_TIMEOUT_MS, 10000, 'STORY_QUERY_TIMEOUT_MS', {
			min: 1,
		}),
		retrieval: {
			nRecent: parseEnvInt(env.STORY_RECENT_CHAPTERS, 3, 'STORY_RECENT_CHAPTERS'),
			nRelevant: parseEnvInt(env.STORY_RELEVANT_ITEMS, 5, 'STORY_RELEVANT_ITEMS'),
			nSurprise: parseEnvInt(env.STORY_SURPRISE_CALLBACKS, 2, 'STORY_SURPRISE_CALLBACKS'),
		},
	};

	// Log configuration (without sensitive data)
	logger.debug('Environment configuration loaded', {
		dataDir: config.dataDir,
		hasOpenaiKey: !!config.openaiApiKey,
		generationModel: config.generationModel,
		embeddingProvider: config.embeddingProvider,
		maxRetries: config.maxRetries,
	});

	return config;
}
