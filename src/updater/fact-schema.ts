/**
 * Facts extracted from a chapter, and validation of the raw extraction JSON.
 *
 * The extractor returns one object with an array per category (snake_case, as
 * the prompt asks for). Each item is validated on its own and converted to a
 * tagged Fact; a bad item is dropped without losing the rest of the batch.
 */

import { z } from 'zod';
import { getLogger } from '../core/logger.js';
import { CHARACTER_ROLES, EVENT_IMPACTS } from '../types/index.js';
import { tryParseJson } from '../utils/common.js';

const logger = getLogger('fact-schema');

const name = z.string().trim().min(1);
const optionalText = z
	.string()
	.nullish()
	.transform((value) => value ?? '');
const optionalField = z
	.string()
	.nullish()
	.transform((value) => value?.trim() || undefined);
const stringList = z
	.array(z.string())
	.nullish()
	.transform((value) => value ?? []);

export const NewCharacterFactSchema = z.object({
	kind: z.literal('new_character'),
	name,
	role: z.enum(CHARACTER_ROLES).optional().catch(undefined),
	personality: optionalText,
	description: optionalText,
});

export const CharacterUpdateFactSchema = z.object({
	kind: z.literal('character_update'),
	characterName: name,
	status: optionalField,
	location: optionalField,
	itemsGained: stringList,
	itemsLost: stringList,
});

export const LocationUpdateFactSchema = z.object({
	kind: z.literal('location_update'),
	locationName: name,
	change: optionalText,
	status: optionalField,
});

export const THREAD_ACTIONS = ['introduce', 'progress', 'resolve'] as const;
export type ThreadAction = (typeof THREAD_ACTIONS)[number];

export const ThreadActionFactSchema = z.object({
	kind: z.literal('thread_action'),
	action: z.enum(THREAD_ACTIONS),
	threadName: name,
	description: optionalText,
});

export const RelationshipFactSchema = z.object({
	kind: z.literal('relationship'),
	characterA: name,
	characterB: name,
	relationshipType: z.string().trim().min(1).catch('neutral').default('neutral'),
	description: optionalText,
});

export const TimelineEventFactSchema = z.object({
	kind: z.literal('timeline_event'),
	description: name,
	eventType: z.string().trim().min(1).catch('event').default('event'),
	impact: z.enum(EVENT_IMPACTS).catch('moderate').default('moderate'),
	charactersInvolved: stringList,
	locationsInvolved: stringList,
});

export const FactSchema = z.discriminatedUnion('kind', [
	NewCharacterFactSchema,
	CharacterUpdateFactSchema,
	LocationUpdateFactSchema,
	ThreadActionFactSchema,
	RelationshipFactSchema,
	TimelineEventFactSchema,
]);

export type Fact = z.infer<typeof FactSchema>;
export type FactInput = z.input<typeof FactSchema>;
export type FactKind = Fact['kind'];
export type NewCharacterFact = z.infer<typeof NewCharacterFactSchema>;
export type CharacterUpdateFact = z.infer<typeof CharacterUpdateFactSchema>;
export type LocationUpdateFact = z.infer<typeof LocationUpdateFactSchema>;
export type ThreadActionFact = z.infer<typeof ThreadActionFactSchema>;
export type RelationshipFact = z.infer<typeof RelationshipFactSchema>;
export type TimelineEventFact = z.infer<typeof TimelineEventFactSchema>;

/** Order in which a batch is applied */
export const FACT_KIND_ORDER: readonly FactKind[] = [
	'new_character',
	'character_update',
	'location_update',
	'thread_action',
	'relationship',
	'timeline_event',
];

/** Build a fact from camelCase input, filling defaults */
export function fact(input: FactInput): Fact {
	return FactSchema.parse(input);
}

// ============================================================================
// Raw extraction output
// ============================================================================

const RawCharacterUpdate = z
	.object({
		character_name: z.string(),
		updates: z
			.object({
				status: z.string().nullish(),
				location: z.string().nullish(),
				items_gained: z.array(z.string()).nullish(),
				items_lost: z.array(z.string()).nullish(),
			})
			.default({}),
	})
	.transform(({ character_name, updates }) => ({
		kind: 'character_update' as const,
		characterName: character_name,
		status: updates.status,
		location: updates.location,
		itemsGained: updates.items_gained,
		itemsLost: updates.items_lost,
	}))
	.pipe(CharacterUpdateFactSchema);

const CATEGORY_NAMES = [
	'new_characters',
	'character_updates',
	'location_updates',
	'thread_updates',
	'relationships',
	'major_events',
] as const;
type ExtractionCategory = (typeof CATEGORY_NAMES)[number];

const EXTRACTION_CATEGORIES: Record<ExtractionCategory, z.ZodType<Fact, z.ZodTypeDef, unknown>> = {
	new_characters: z
		.object({
			name: z.string(),
			role: z.string().nullish(),
			personality: z.string().nullish(),
			first_description: z.string().nullish(),
		})
		.transform((raw) => ({
			kind: 'new_character' as const,
			name: raw.name,
			role: raw.role,
			personality: raw.personality,
			description: raw.first_description,
		}))
		.pipe(NewCharacterFactSchema),
	character_updates: RawCharacterUpdate,
	location_updates: z
		.object({
			location_name: z.string(),
			change: z.string().nullish(),
			status: z.string().nullish(),
		})
		.transform((raw) => ({
			kind: 'location_update' as const,
			locationName: raw.location_name,
			change: raw.change,
			status: raw.status,
		}))
		.pipe(LocationUpdateFactSchema),
	thread_updates: z
		.object({
			action: z.string(),
			thread_name: z.string(),
			description: z.string().nullish(),
		})
		.transform((raw) => ({
			kind: 'thread_action' as const,
			action: raw.action.trim().toLowerCase(),
			threadName: raw.thread_name,
			description: raw.description,
		}))
		.pipe(ThreadActionFactSchema),
	relationships: z
		.object({
			character_a: z.string(),
			character_b: z.string(),
			type: z.string().nullish(),
			description: z.string().nullish(),
		})
		.transform((raw) => ({
			kind: 'relationship' as const,
			characterA: raw.character_a,
			characterB: raw.character_b,
			relationshipType: raw.type ?? undefined,
			description: raw.description,
		}))
		.pipe(RelationshipFactSchema),
	major_events: z
		.object({
			description: z.string(),
			type: z.string().nullish(),
			impact: z.string().nullish(),
			characters_involved: z.array(z.string()).nullish(),
			locations_involved: z.array(z.string()).nullish(),
		})
		.transform((raw) => ({
			kind: 'timeline_event' as const,
			description: raw.description,
			eventType: raw.type ?? undefined,
			impact: raw.impact?.trim().toLowerCase(),
			charactersInvolved: raw.characters_involved,
			locationsInvolved: raw.locations_involved,
		}))
		.pipe(TimelineEventFactSchema),
};

export interface FactBatch {
	facts: Fact[];
	/** One line per dropped item or unreadable payload */
	warnings: string[];
}

/**
 * Remove a surrounding Markdown code fence (```json ... ```), if any.
 */
export function stripCodeFences(text: string): string {
	const trimmed = text.trim();
	if (!trimmed.startsWith('```')) return trimmed;

	const lines = trimmed.split('\n');
	const close = lines.findIndex((line, i) => i > 0 && line.trim().startsWith('```'));
	return lines
		.slice(1, close === -1 ? undefined : close)
		.join('\n')
		.trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate raw extraction output (text or already-parsed JSON) into facts.
 * Non-JSON and non-object payloads give an empty batch.
 */
export function parseFactBatch(raw: unknown): FactBatch {
	let payload = raw;
	if (typeof raw === 'string') {
		const parsed = tryParseJson(stripCodeFences(raw));
		if (!parsed.ok) {
			logger.warn('Extraction output is not JSON, using no facts', { error: parsed.error });
			return { facts: [], warnings: [`Unparseable extraction output: ${parsed.error}`] };
		}
		payload = parsed.value;
	}

	if (!isRecord(payload)) {
		logger.warn('Extraction output is not an object, using no facts');
		return { facts: [], warnings: ['Extraction output is not an object'] };
	}

	const facts: Fact[] = [];
	const warnings: string[] = [];
	for (const category of CATEGORY_NAMES) {
		const items = payload[category];
		if (items === undefined || items === null) continue;
		if (!Array.isArray(items)) {
			warnings.push(`${category}: expected an array`);
			continue;
		}

		items.forEach((item: unknown, index) => {
			const result = EXTRACTION_CATEGORIES[category].safeParse(item);
			if (result.success) {
				facts.push(result.data);
			} else {
				const issue = result.error.issues[0];
				warnings.push(
					`${category}[${index}] dropped: ${issue ? `${issue.path.join('.') || '<item>'} ${issue.message}` : 'invalid'}`
				);
			}
		});
	}

	for (const warning of warnings) {
		logger.warn('Invalid extraction item', { warning });
	}
	return { facts, warnings };
}
