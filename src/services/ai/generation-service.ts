/**
 * Text generation over the OpenAI chat completions API
 */

import OpenAI from 'openai';
import { AppError, ErrorCode, GenerationError, errorMessage } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';
import { retry } from '../../utils/common.js';

const logger = getLogger('generation-service');

export interface GenerationRequest {
	prompt: string;
	systemPrompt?: string;
	temperature?: number;
	maxTokens?: number;
}

export interface GenerationService {
	generate(request: GenerationRequest): Promise<string>;
}

export interface OpenAIGenerationConfig {
	apiKey?: string;
	model?: string;
	temperature?: number;
	maxTokens?: number;
	/** Total attempts per request, first one included */
	maxRetries?: number;
	retryInitialDelayMs?: number;
	retryMaxDelayMs?: number;
	requestTimeoutMs?: number;
}

export class OpenAIGenerationService implements GenerationService {
	private readonly client: OpenAI;
	private readonly model: string;
	private readonly temperature: number;
	private readonly maxTokens: number;
	private readonly maxRetries: number;
	private readonly retryInitialDelayMs: number;
	private readonly retryMaxDelayMs: number;

	constructor(config: OpenAIGenerationConfig = {}) {
		if (!config.apiKey) {
			throw new AppError(
				'OpenAI service not configured. Please provide an API key.',
				ErrorCode.CONFIGURATION_ERROR
			);
		}

		this.model = config.model ?? 'gpt-4o-mini';
		this.temperature = config.temperature ?? 0.7;
		this.maxTokens = config.maxTokens ?? 2000;
		this.maxRetries = Math.max(1, config.maxRetries ?? 3);
		this.retryInitialDelayMs = config.retryInitialDelayMs ?? 1000;
		this.retryMaxDelayMs = config.retryMaxDelayMs ?? 30000;
		this.client = new OpenAI({
			apiKey: config.apiKey,
			timeout: config.requestTimeoutMs ?? 60000,
			// retries are ours, with logging
			maxRetries: 0,
		});
	}

	/**
	 * Completion text for the prompt. Transient failures and empty completions
	 * are retried with exponential backoff.
	 * @throws GenerationError once every attempt has failed
	 */
	async generate({
		prompt,
		systemPrompt,
		temperature = this.temperature,
		maxTokens = this.maxTokens,
	}: GenerationRequest): Promise<string> {
		try {
			return await retry(
				async () => {
					const response = await this.client.chat.completions.create({
						model: this.model,
						messages: [
							...(systemPrompt ? [{ role: 'system' as const, content: systemPrompt }] : []),
							{ role: 'user' as const, content: prompt },
						],
						temperature,
						max_tokens: maxTokens,
					});

					const content = response.choices[0]?.message?.content?.trim();
					if (!content) {
						throw new AppError('Empty completion', ErrorCode.GENERATION_ERROR);
					}
					return content;
				},
				{
					maxAttempts: this.maxRetries,
					initialDelay: this.retryInitialDelayMs,
					maxDelay: this.retryMaxDelayMs,
					onRetry: (attempt, error) =>
						logger.warn('Generation attempt failed, retrying', {
							attempt,
							maxAttempts: this.maxRetries,
							error: errorMessage(error),
						}),
				}
			);
		} catch (error) {
			logger.error('Generation failed', { attempts: this.maxRetries, error: errorMessage(error) });
			throw new GenerationError(
				`Generation failed after ${this.maxRetries} attempts: ${errorMessage(error)}`,
				this.maxRetries,
				{ model: this.model }
			);
		}
	}
}
