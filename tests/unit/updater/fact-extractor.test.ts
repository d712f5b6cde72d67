import { GenerationError } from '../../../src/core/errors';
import type { GenerationRequest, GenerationService } from '../../../src/services/ai/generation-service';
import {
	EXTRACTION_SYSTEM_PROMPT,
	FactExtractor,
	buildExtractionPrompt,
} from '../../../src/updater/fact-extractor';
import { makeChapter } from '../../helpers';

class ScriptedGenerator implements GenerationService {
	requests: GenerationRequest[] = [];

	constructor(private readonly reply: () => Promise<string>) {}

	async generate(request: GenerationRequest): Promise<string> {
		this.requests.push(request);
		return this.reply();
	}
}

describe('FactExtractor', () => {
	const chapter = makeChapter(4, { title: 'The Drowned Bell', content: 'Kai rang the bell.' });

	it('should include the chapter in the prompt', () => {
		const prompt = buildExtractionPrompt(chapter);

		expect(prompt).toContain('CHAPTER: The Drowned Bell\nCONTENT:\nKai rang the bell.\n');
		expect(prompt).toContain('"new_characters"');
	});

	it('should request a low-temperature extraction', async () => {
		const generator = new ScriptedGenerator(async () => '{}');

		await new FactExtractor(generator).extract(chapter);

		expect(generator.requests).toEqual([
			{
				prompt: buildExtractionPrompt(chapter),
				systemPrompt: EXTRACTION_SYSTEM_PROMPT,
				temperature: 0.3,
				maxTokens: 2000,
			},
		]);
	});

	it('should return parsed facts', async () => {
		const generator = new ScriptedGenerator(async () =>
			JSON.stringify({ thread_updates: [{ action: 'introduce', thread_name: 'The Bell', description: 'it rang alone' }] })
		);

		await expect(new FactExtractor(generator, { temperature: 0.1 }).extract(chapter)).resolves.toEqual([
			{ kind: 'thread_action', action: 'introduce', threadName: 'The Bell', description: 'it rang alone' },
		]);
		expect(generator.requests[0].temperature).toBe(0.1);
	});

	it('should yield no facts for malformed output', async () => {
		const generator = new ScriptedGenerator(async () => 'Here are the facts: none.');

		await expect(new FactExtractor(generator).extract(chapter)).resolves.toEqual([]);
	});

	it('should propagate generation failures', async () => {
		const generator = new ScriptedGenerator(async () => {
			throw new GenerationError('Generation failed after 3 attempts: down', 3);
		});

		await expect(new FactExtractor(generator).extract(chapter)).rejects.toBeInstanceOf(GenerationError);
	});
});
