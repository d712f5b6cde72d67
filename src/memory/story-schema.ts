/**
 * zod schema for the persisted StoryMemory document.
 *
 * Every field an older document might lack carries a default, so loading stays
 * backward compatible without a migration step.
 */

import { z } from 'zod';
import {
	ARC_PHASES,
	CHARACTER_ROLES,
	EVENT_IMPACTS,
	THREAD_IMPORTANCE,
	THREAD_STATUSES,
	type StoryMemory,
} from '../types/index.js';
import { STORY_MEMORY_VERSION } from './story-memory.js';

const text = z.string().default('');
const list = z.array(z.string()).default([]);

export const CharacterSchema = z.object({
	characterId: z.string(),
	name: z.string(),
	age: z.number().int().nonnegative().optional(),
	appearance: text,
	personality: text,
	quirks: list,
	dream: z.string().optional(),
	background: text,
	abilities: list,
	role: z.enum(CHARACTER_ROLES).default('neutral'),
	status: z.string().default('active'),
	currentLocation: text,
	items: list,
	relationships: z.record(z.string(), z.string()).default({}),
	faction: z.string().optional(),
	firstAppearance: z.string().optional(),
	lastAppearance: z.string().optional(),
	notes: text,
});

export const LocationSchema = z.object({
	locationId: z.string(),
	name: z.string(),
	description: text,
	status: z.string().default('active'),
	importance: z.string().default('minor'),
	factions: list,
	connectedTo: list,
	firstAppearance: z.string().optional(),
	notes: text,
});

export const FactionSchema = z.object({
	factionId: z.string(),
	name: z.string(),
	description: text,
	alignment: z.string().default('neutral'),
	leader: z.string().optional(),
	members: list,
	goals: list,
	status: z.string().default('active'),
	firstAppearance: z.string().optional(),
	notes: text,
});

export const ArtifactSchema = z.object({
	artifactId: z.string(),
	name: z.string(),
	description: text,
	powers: list,
	currentOwner: z.string().optional(),
	location: z.string().optional(),
	status: z.string().default('intact'),
	firstMentioned: z.string().optional(),
	notes: text,
});

export const ArcSchema = z.object({
	arcId: z.string(),
	arcNumber: z.number().int().positive(),
	name: z.string(),
	arcType: z.string().default('exploration'),
	status: z.enum(['planned', 'active', 'completed']).default('planned'),
	primaryLocation: text,
	summary: text,
	centralConflict: text,
	themes: list,
	expectedChapters: z.number().int().positive().default(10),
	currentChapter: z.number().int().nonnegative().default(0),
	currentPhase: z.enum(ARC_PHASES).default('arrival'),
	threadsIntroduced: list,
	threadsAdvanced: list,
	threadsResolved: list,
	notes: text,
});

export const ChapterSchema = z.object({
	chapterId: z.string(),
	chapterNumber: z.number().int().positive(),
	arcId: z.string(),
	title: z.string(),
	content: text,
	wordCount: z.number().int().nonnegative().default(0),
	summary: text,
	keyEvents: list,
	charactersPresent: list,
	locations: list,
	cliffhanger: text,
	cliffhangerType: text,
	themes: list,
	tone: z.string().default('balanced'),
	createdAt: z.string().default(() => new Date().toISOString()),
});

export const PlotThreadSchema = z.object({
	threadId: z.string(),
	name: z.string(),
	threadType: z.string().default('mystery'),
	setupChapter: z.string(),
	setupDescription: text,
	status: z.enum(THREAD_STATUSES).default('open'),
	importance: z.enum(THREAD_IMPORTANCE).default('medium'),
	expectedResolution: z.string().default('medium_term'),
	developments: z
		.array(z.object({ chapterId: z.string(), description: z.string() }))
		.default([]),
	resolutionChapter: z.string().optional(),
	resolutionDescription: z.string().optional(),
	charactersInvolved: list,
	notes: text,
});

export const RelationshipSchema = z.object({
	characterA: z.string(),
	characterB: z.string(),
	relationshipType: z.string(),
	strength: z.number().min(0).max(100).default(50),
	establishedChapter: z.string(),
	lastUpdated: z.string(),
	notes: text,
});

export const WorldEventSchema = z.object({
	eventId: z.string(),
	chapterId: z.string(),
	chapterNumber: z.number().int().nonnegative(),
	description: z.string(),
	eventType: z.string().default('event'),
	impact: z.enum(EVENT_IMPACTS).default('moderate'),
	charactersInvolved: list,
	locationsInvolved: list,
	timestamp: z.string().default(() => new Date().toISOString()),
});

export const StoryMemorySchema = z.object({
	version: z.string().default(STORY_MEMORY_VERSION),
	storyTitle: z.string(),
	worldName: z.string(),
	sagaGoal: text,
	sagaMilestones: list,
	createdAt: z.string().default(() => new Date().toISOString()),
	lastUpdated: z.string().default(() => new Date().toISOString()),
	currentChapterNumber: z.number().int().nonnegative().default(0),
	currentArcId: z.string().nullable().default(null),
	characters: z.record(z.string(), CharacterSchema).default({}),
	locations: z.record(z.string(), LocationSchema).default({}),
	factions: z.record(z.string(), FactionSchema).default({}),
	artifacts: z.record(z.string(), ArtifactSchema).default({}),
	arcs: z.record(z.string(), ArcSchema).default({}),
	chapters: z.record(z.string(), ChapterSchema).default({}),
	plotThreads: z.record(z.string(), PlotThreadSchema).default({}),
	relationships: z.record(z.string(), RelationshipSchema).default({}),
	worldTimeline: z.array(WorldEventSchema).default([]),
	themeCounts: z.record(z.string(), z.number().int().nonnegative()).default({}),
	arcTypeHistory: list,
});

export type StoryMemoryParseResult =
	| { success: true; memory: StoryMemory }
	| { success: false; issues: string[] };

/** Validate an already-parsed JSON value as a StoryMemory document. */
export function parseStoryMemory(raw: unknown): StoryMemoryParseResult {
	const result = StoryMemorySchema.safeParse(raw);
	if (!result.success) {
		return {
			success: false,
			issues: result.error.issues.map(
				(issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`
			),
		};
	}
	return { success: true, memory: result.data };
}
