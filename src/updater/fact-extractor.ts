/**
 * Asks the generation service for the state changes a chapter implies.
 */

import { getLogger } from '../core/logger.js';
import type { GenerationService } from '../services/ai/generation-service.js';
import type { Chapter, DeepReadonly } from '../types/index.js';
import { parseFactBatch, type Fact } from './fact-schema.js';

const logger = getLogger('fact-extractor');

export const EXTRACTION_SYSTEM_PROMPT = `You read fiction and report concrete state changes as JSON.
Report only what the text states or clearly implies:
- named characters who appear, speak, or act for the first time
- injuries, captures, deaths, moves, and items gained or lost
- places found, changed, or destroyed
- plot threads opened, advanced, or settled
Leave out unnamed background figures such as townspeople or guards.`;

export function buildExtractionPrompt(chapter: DeepReadonly<Chapter>): string {
	return `Extract the state changes in this chapter.

CHAPTER: ${chapter.title}
CONTENT:
${chapter.content}

Respond with a single JSON object and nothing else:
{
  "new_characters": [{"name": "", "role": "protagonist|antagonist|ally|mentor|supporting|neutral", "personality": "", "first_description": ""}],
  "character_updates": [{"character_name": "", "updates": {"status": "", "location": "", "items_gained": [], "items_lost": []}}],
  "location_updates": [{"location_name": "", "change": "", "status": "active|destroyed"}],
  "thread_updates": [{"action": "introduce|progress|resolve", "thread_name": "", "description": ""}],
  "relationships": [{"character_a": "", "character_b": "", "type": "ally|friend|rival|enemy|mentor|family", "description": ""}],
  "major_events": [{"description": "", "type": "battle|discovery|death|alliance|betrayal|revelation", "impact": "minor|moderate|major|critical"}]
}

Use the exact names already used in the story for existing characters and threads.
Use [] for any category without changes.`;
}

export interface FactSource {
	extract(chapter: DeepReadonly<Chapter>): Promise<Fact[]>;
}

export class FactExtractor implements FactSource {
	constructor(
		private readonly generator: GenerationService,
		private readonly options: { temperature?: number; maxTokens?: number } = {}
	) {}

	/**
	 * Facts for the chapter. Malformed model output yields no facts; a failed
	 * generation call propagates.
	 */
	async extract(chapter: DeepReadonly<Chapter>): Promise<Fact[]> {
		const response = await this.generator.generate({
			prompt: buildExtractionPrompt(chapter),
			systemPrompt: EXTRACTION_SYSTEM_PROMPT,
			temperature: this.options.temperature ?? 0.3,
			maxTokens: this.options.maxTokens ?? 2000,
		});

		const { facts, warnings } = parseFactBatch(response);
		if (warnings.length > 0) {
			logger.warn('Extraction produced invalid items', {
				chapterId: chapter.chapterId,
				dropped: warnings.length,
			});
		}
		logger.debug('Extracted facts', { chapterId: chapter.chapterId, count: facts.length });
		return facts;
	}
}

