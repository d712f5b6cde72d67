/**
 * Story world model
 *
 * The aggregate root `StoryMemory` owns every collection by value, keyed by
 * stable per-collection IDs. Chapters and world events are immutable once
 * merged; everything else changes only through the merge pipeline.
 */

export type DeepReadonly<T> = T extends (infer U)[]
	? ReadonlyArray<DeepReadonly<U>>
	: T extends ReadonlyArray<infer V>
		? ReadonlyArray<DeepReadonly<V>>
		: T extends object
			? { readonly [K in keyof T]: DeepReadonly<T[K]> }
			: T;

// ============================================================================
// Characters & world
// ============================================================================

export const CHARACTER_ROLES = [
	'protagonist',
	'antagonist',
	'ally',
	'mentor',
	'supporting',
	'neutral',
] as const;
export type CharacterRole = (typeof CHARACTER_ROLES)[number];

export interface Character {
	characterId: string;
	name: string;
	age?: number;
	appearance: string;
	/** Core personality traits, free text */
	personality: string;
	quirks: string[];
	dream?: string;
	background: string;
	abilities: string[];
	role: CharacterRole;
	/** active, injured, captured, dead, ... */
	status: string;
	currentLocation: string;
	/** Held items; kept free of duplicates */
	items: string[];
	/** Character ID -> relationship description */
	relationships: Record<string, string>;
	faction?: string;
	firstAppearance?: string;
	lastAppearance?: string;
	notes: string;
}

export interface WorldLocation {
	locationId: string;
	name: string;
	description: string;
	/** active, destroyed, inaccessible, ... */
	status: string;
	importance: string;
	factions: string[];
	connectedTo: string[];
	firstAppearance?: string;
	notes: string;
}

export interface Faction {
	factionId: string;
	name: string;
	description: string;
	alignment: string;
	/** Character ID */
	leader?: string;
	members: string[];
	goals: string[];
	status: string;
	firstAppearance?: string;
	notes: string;
}

export interface Artifact {
	artifactId: string;
	name: string;
	description: string;
	powers: string[];
	/** Character ID */
	currentOwner?: string;
	location?: string;
	status: string;
	firstMentioned?: string;
	notes: string;
}

// ============================================================================
// Story structure
// ============================================================================

export const ARC_PHASES = [
	'arrival',
	'discovery',
	'escalation',
	'climax',
	'resolution',
	'departure',
] as const;
export type ArcPhase = (typeof ARC_PHASES)[number];

export type ArcStatus = 'planned' | 'active' | 'completed';

export interface Arc {
	arcId: string;
	arcNumber: number;
	name: string;
	arcType: string;
	status: ArcStatus;
	primaryLocation: string;
	summary: string;
	centralConflict: string;
	themes: string[];
	expectedChapters: number;
	currentChapter: number;
	currentPhase: ArcPhase;
	threadsIntroduced: string[];
	threadsAdvanced: string[];
	threadsResolved: string[];
	notes: string;
}

export interface Chapter {
	readonly chapterId: string;
	readonly chapterNumber: number;
	readonly arcId: string;
	readonly title: string;
	readonly content: string;
	readonly wordCount: number;
	readonly summary: string;
	readonly keyEvents: readonly string[];
	readonly charactersPresent: readonly string[];
	readonly locations: readonly string[];
	readonly cliffhanger: string;
	readonly cliffhangerType: string;
	readonly themes: readonly string[];
	readonly tone: string;
	readonly createdAt: string;
}

export const THREAD_STATUSES = ['open', 'progressing', 'resolved', 'abandoned'] as const;
export type ThreadStatus = (typeof THREAD_STATUSES)[number];

export const THREAD_IMPORTANCE = ['major', 'medium', 'minor'] as const;
export type ThreadImportance = (typeof THREAD_IMPORTANCE)[number];

export interface ThreadDevelopment {
	chapterId: string;
	description: string;
}

export interface PlotThread {
	threadId: string;
	name: string;
	/** mystery, prophecy, promise, quest, danger, rivalry, romance, ... */
	threadType: string;
	setupChapter: string;
	setupDescription: string;
	status: ThreadStatus;
	importance: ThreadImportance;
	expectedResolution: string;
	developments: ThreadDevelopment[];
	resolutionChapter?: string;
	resolutionDescription?: string;
	charactersInvolved: string[];
	notes: string;
}

// ============================================================================
// Tracking
// ============================================================================

export interface Relationship {
	/** Lower of the two character IDs */
	characterA: string;
	/** Higher of the two character IDs */
	characterB: string;
	relationshipType: string;
	/** 0-100 */
	strength: number;
	establishedChapter: string;
	lastUpdated: string;
	notes: string;
}

export const EVENT_IMPACTS = ['minor', 'moderate', 'major', 'critical'] as const;
export type EventImpact = (typeof EVENT_IMPACTS)[number];

export interface WorldEvent {
	readonly eventId: string;
	readonly chapterId: string;
	readonly chapterNumber: number;
	readonly description: string;
	/** battle, discovery, death, alliance, betrayal, revelation, ... */
	readonly eventType: string;
	readonly impact: EventImpact;
	readonly charactersInvolved: readonly string[];
	readonly locationsInvolved: readonly string[];
	readonly timestamp: string;
}

// ============================================================================
// Aggregate
// ============================================================================

export interface StoryMemory {
	version: string;
	storyTitle: string;
	worldName: string;
	sagaGoal: string;
	sagaMilestones: string[];
	createdAt: string;
	lastUpdated: string;

	currentChapterNumber: number;
	currentArcId: string | null;

	characters: Record<string, Character>;
	locations: Record<string, WorldLocation>;
	factions: Record<string, Faction>;
	artifacts: Record<string, Artifact>;
	arcs: Record<string, Arc>;
	chapters: Record<string, Chapter>;
	plotThreads: Record<string, PlotThread>;
	relationships: Record<string, Relationship>;
	worldTimeline: WorldEvent[];

	themeCounts: Record<string, number>;
	arcTypeHistory: string[];
}

/** What readers (retriever, planners) get: no writes compile against it */
export type StoryMemoryView = DeepReadonly<StoryMemory>;
