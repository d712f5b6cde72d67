/**
 * First-run setup: turns a world seed into the opening StoryMemory state
 * (protagonist, crew, starting location, initial threads, first arc).
 */

import { z } from 'zod';
import { AppError, ErrorCode } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { CHARACTER_ROLES, type StoryMemory } from '../types/index.js';
import { findMatch } from './name-resolver.js';
import {
	createArc,
	createCharacter,
	createLocation,
	createPlotThread,
	nextSequentialId,
} from './story-memory.js';

const logger = getLogger('bootstrap');

/** Seeds arrive hand-written, so list fields also accept "a, b, c" */
const commaList = z
	.union([z.string(), z.array(z.string())])
	.default([])
	.transform((value) =>
		(typeof value === 'string' ? value.split(',') : value)
			.map((item) => item.trim())
			.filter(Boolean)
	);

export const WorldSeedSchema = z.object({
	worldName: z.string().min(1),
	storyTitle: z.string().min(1).optional(),
	centralConflict: z.string().default(''),
	protagonist: z.object({
		name: z.string().min(1),
		age: z.number().int().nonnegative().optional(),
		personality: z.string().default(''),
		dream: z.string().optional(),
		quirks: commaList,
		abilities: commaList,
		background: z.string().default(''),
	}),
	initialCrew: z
		.array(
			z.object({
				name: z.string().min(1),
				personality: z.string().default(''),
				role: z.enum(CHARACTER_ROLES).default('ally'),
				background: z.string().default(''),
			})
		)
		.default([]),
	startingLocation: z.object({
		name: z.string().min(1),
		description: z.string().default(''),
	}),
	initialThreads: z
		.array(
			z.object({
				thread: z.string().min(1),
				type: z.string().default('mystery'),
			})
		)
		.default([]),
	themes: z.array(z.string()).default(['adventure', 'friendship']),
});

export type WorldSeed = z.infer<typeof WorldSeedSchema>;
export type WorldSeedInput = z.input<typeof WorldSeedSchema>;

/** Setup chapter recorded on threads that exist before chapter one */
export const PROLOGUE_CHAPTER_ID = 'ch_000';

export function parseWorldSeed(raw: unknown): WorldSeed {
	const result = WorldSeedSchema.safeParse(raw);
	if (!result.success) {
		throw new AppError('Invalid world seed', ErrorCode.VALIDATION_ERROR, {
			issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
		});
	}
	return result.data;
}

export function storyOptionsFromSeed(seed: WorldSeed): {
	storyTitle: string;
	worldName: string;
	sagaGoal: string;
} {
	return {
		storyTitle: seed.storyTitle ?? `Chronicles of ${seed.worldName}`,
		worldName: seed.worldName,
		sagaGoal: seed.centralConflict,
	};
}

/** Populate a freshly initialized aggregate from the seed, in place. */
export function seedStory(memory: StoryMemory, seed: WorldSeed): StoryMemory {
	const startingLocation = seed.startingLocation.name;
	const { protagonist } = seed;

	const hero = createCharacter({
		characterId: nextSequentialId('char', Object.keys(memory.characters)),
		name: protagonist.name,
		age: protagonist.age,
		personality: protagonist.personality,
		dream: protagonist.dream,
		quirks: protagonist.quirks,
		abilities: protagonist.abilities,
		background: protagonist.background,
		role: 'protagonist',
		currentLocation: startingLocation,
	});
	memory.characters[hero.characterId] = hero;

	for (const member of seed.initialCrew) {
		const candidates = Object.values(memory.characters).map((c) => ({ id: c.characterId, name: c.name }));
		const existingId = findMatch(member.name, candidates);
		if (existingId) {
			logger.warn('Skipped duplicate crew member', { name: member.name, existingId });
			continue;
		}
		const crew = createCharacter({
			characterId: nextSequentialId('char', Object.keys(memory.characters)),
			name: member.name,
			personality: member.personality,
			role: member.role,
			background: member.background,
			currentLocation: startingLocation,
		});
		memory.characters[crew.characterId] = crew;
	}

	const location = createLocation({
		locationId: nextSequentialId('loc', Object.keys(memory.locations)),
		name: startingLocation,
		description: seed.startingLocation.description,
		importance: 'major',
	});
	memory.locations[location.locationId] = location;

	for (const entry of seed.initialThreads) {
		const thread = createPlotThread({
			threadId: nextSequentialId('thread', Object.keys(memory.plotThreads)),
			name: entry.thread,
			threadType: entry.type,
			setupChapter: PROLOGUE_CHAPTER_ID,
			setupDescription: entry.thread,
			importance: 'major',
		});
		memory.plotThreads[thread.threadId] = thread;
	}

	const arc = createArc({
		arcId: nextSequentialId('arc', Object.keys(memory.arcs)),
		arcNumber: Object.keys(memory.arcs).length + 1,
		name: 'Arrival',
		arcType: 'exploration',
		status: 'active',
		summary: `The adventure begins at ${startingLocation}`,
		primaryLocation: startingLocation,
		centralConflict: seed.centralConflict,
		themes: [...seed.themes],
		expectedChapters: 5,
	});
	memory.arcs[arc.arcId] = arc;
	memory.currentArcId = arc.arcId;
	memory.arcTypeHistory.push(arc.arcType);

	logger.info('Seeded story', {
		characters: Object.keys(memory.characters).length,
		threads: Object.keys(memory.plotThreads).length,
		arcId: arc.arcId,
	});
	return memory;
}
