import { ErrorCode, GenerationError } from '../../../src/core/errors';
import { OpenAIGenerationService } from '../../../src/services/ai/generation-service';

const mockCreate = jest.fn();

jest.mock('openai', () => ({
	__esModule: true,
	default: jest.fn().mockImplementation(() => ({
		chat: { completions: { create: mockCreate } },
	})),
}));

function completion(content: string | null) {
	return { choices: [{ message: { content } }] };
}

describe('OpenAIGenerationService', () => {
	const config = { apiKey: 'test-key', maxRetries: 3, retryInitialDelayMs: 1, retryMaxDelayMs: 2 };

	beforeEach(() => {
		mockCreate.mockReset();
	});

	it('should require an API key', () => {
		expect(() => new OpenAIGenerationService({})).toThrow(
			expect.objectContaining({ code: ErrorCode.CONFIGURATION_ERROR })
		);
	});

	it('should return the trimmed completion', async () => {
		mockCreate.mockResolvedValueOnce(completion('  Once upon a tide.  \n'));
		const service = new OpenAIGenerationService(config);

		await expect(service.generate({ prompt: 'Write' })).resolves.toBe('Once upon a tide.');
		expect(mockCreate).toHaveBeenCalledWith({
			model: 'gpt-4o-mini',
			messages: [{ role: 'user', content: 'Write' }],
			temperature: 0.7,
			max_tokens: 2000,
		});
	});

	it('should send the system prompt and request overrides', async () => {
		mockCreate.mockResolvedValueOnce(completion('{}'));
		const service = new OpenAIGenerationService({ ...config, model: 'test-model' });

		await service.generate({ prompt: 'Extract', systemPrompt: 'You extract facts', temperature: 0.3, maxTokens: 500 });

		expect(mockCreate).toHaveBeenCalledWith({
			model: 'test-model',
			messages: [
				{ role: 'system', content: 'You extract facts' },
				{ role: 'user', content: 'Extract' },
			],
			temperature: 0.3,
			max_tokens: 500,
		});
	});

	it('should retry transient failures', async () => {
		mockCreate
			.mockRejectedValueOnce(new Error('rate limited'))
			.mockResolvedValueOnce(completion('   '))
			.mockResolvedValueOnce(completion('Third time lucky'));
		const service = new OpenAIGenerationService(config);

		await expect(service.generate({ prompt: 'Write' })).resolves.toBe('Third time lucky');
		expect(mockCreate).toHaveBeenCalledTimes(3);
	});

	it('should give up after the configured attempts', async () => {
		mockCreate.mockRejectedValue(new Error('service unavailable'));
		const service = new OpenAIGenerationService({ ...config, maxRetries: 2 });

		const error = await service.generate({ prompt: 'Write' }).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(GenerationError);
		expect(error).toMatchObject({
			attempts: 2,
			code: ErrorCode.GENERATION_ERROR,
			message: 'Generation failed after 2 attempts: service unavailable',
		});
		expect(mockCreate).toHaveBeenCalledTimes(2);
	});
});
