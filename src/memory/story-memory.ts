/**
 * Construction helpers and derived views over the StoryMemory aggregate.
 *
 * Views are recomputed on every call; nothing here caches.
 */

import type {
	Arc,
	Chapter,
	Character,
	DeepReadonly,
	PlotThread,
	StoryMemory,
	StoryMemoryView,
	ThreadImportance,
	WorldLocation,
} from '../types/index.js';

export const STORY_MEMORY_VERSION = '1.0.0';

export interface NewStoryOptions {
	storyTitle: string;
	worldName: string;
	sagaGoal?: string;
}

export function createStoryMemory(
	{ storyTitle, worldName, sagaGoal = '' }: NewStoryOptions,
	now: Date = new Date()
): StoryMemory {
	const timestamp = now.toISOString();
	return {
		version: STORY_MEMORY_VERSION,
		storyTitle,
		worldName,
		sagaGoal,
		sagaMilestones: [],
		createdAt: timestamp,
		lastUpdated: timestamp,
		currentChapterNumber: 0,
		currentArcId: null,
		characters: {},
		locations: {},
		factions: {},
		artifacts: {},
		arcs: {},
		chapters: {},
		plotThreads: {},
		relationships: {},
		worldTimeline: [],
		themeCounts: {},
		arcTypeHistory: [],
	};
}

export function createCharacter(
	fields: Pick<Character, 'characterId' | 'name'> & Partial<Character>
): Character {
	return {
		appearance: '',
		personality: '',
		quirks: [],
		background: '',
		abilities: [],
		role: 'neutral',
		status: 'active',
		currentLocation: '',
		items: [],
		relationships: {},
		notes: '',
		...fields,
	};
}

export function createPlotThread(
	fields: Pick<PlotThread, 'threadId' | 'name' | 'setupChapter'> & Partial<PlotThread>
): PlotThread {
	return {
		threadType: 'mystery',
		setupDescription: '',
		status: 'open',
		importance: 'medium',
		expectedResolution: 'medium_term',
		developments: [],
		charactersInvolved: [],
		notes: '',
		...fields,
	};
}

export function createLocation(
	fields: Pick<WorldLocation, 'locationId' | 'name'> & Partial<WorldLocation>
): WorldLocation {
	return {
		description: '',
		status: 'active',
		importance: 'minor',
		factions: [],
		connectedTo: [],
		notes: '',
		...fields,
	};
}

export function createArc(
	fields: Pick<Arc, 'arcId' | 'arcNumber' | 'name'> & Partial<Arc>
): Arc {
	return {
		arcType: 'exploration',
		status: 'planned',
		primaryLocation: '',
		summary: '',
		centralConflict: '',
		themes: [],
		expectedChapters: 10,
		currentChapter: 0,
		currentPhase: 'arrival',
		threadsIntroduced: [],
		threadsAdvanced: [],
		threadsResolved: [],
		notes: '',
		...fields,
	};
}

export function createChapter(
	fields: Pick<Chapter, 'chapterId' | 'chapterNumber' | 'arcId' | 'title'> & Partial<Chapter>
): Chapter {
	const content = fields.content ?? '';
	return {
		content,
		wordCount: content.split(/\s+/).filter(Boolean).length,
		summary: '',
		keyEvents: [],
		charactersPresent: [],
		locations: [],
		cliffhanger: '',
		cliffhangerType: '',
		themes: [],
		tone: 'balanced',
		createdAt: new Date().toISOString(),
		...fields,
	};
}

// ============================================================================
// IDs
// ============================================================================

/** `ch_007` for chapter 7 */
export function chapterIdFor(chapterNumber: number): string {
	return `ch_${String(chapterNumber).padStart(3, '0')}`;
}

/**
 * Next `prefix_NNN` ID for a collection: one past the highest numeric suffix in
 * use, skipping anything already taken.
 */
export function nextSequentialId(prefix: string, existingIds: Iterable<string>): string {
	const taken = new Set(existingIds);
	const pattern = new RegExp(`^${prefix}_(\\d+)$`);
	let highest = 0;
	for (const id of taken) {
		const match = pattern.exec(id);
		if (match) highest = Math.max(highest, Number(match[1]));
	}
	let next = highest + 1;
	while (taken.has(`${prefix}_${String(next).padStart(3, '0')}`)) next++;
	return `${prefix}_${String(next).padStart(3, '0')}`;
}

/** Storage key for the unordered character pair */
export function relationshipKey(idA: string, idB: string): { key: string; pair: [string, string] } {
	const pair: [string, string] = idA <= idB ? [idA, idB] : [idB, idA];
	return { key: `rel_${pair[0]}_${pair[1]}`, pair };
}

// ============================================================================
// Derived views
// ============================================================================

const IMPORTANCE_RANK: Record<ThreadImportance, number> = {
	major: 3,
	medium: 2,
	minor: 1,
};

export function importanceRank(importance: ThreadImportance): number {
	return IMPORTANCE_RANK[importance];
}

export function getOpenThreads(memory: StoryMemoryView): DeepReadonly<PlotThread>[] {
	return Object.values(memory.plotThreads).filter(
		(thread) => thread.status === 'open' || thread.status === 'progressing'
	);
}

export function getMajorOpenThreads(memory: StoryMemoryView): DeepReadonly<PlotThread>[] {
	return getOpenThreads(memory).filter((thread) => thread.importance === 'major');
}

export function getCurrentArc(memory: StoryMemoryView): DeepReadonly<Arc> | undefined {
	return memory.currentArcId ? memory.arcs[memory.currentArcId] : undefined;
}

/** The `n` chapters with the highest chapter number, newest first */
export function getRecentChapters(memory: StoryMemoryView, n = 3): DeepReadonly<Chapter>[] {
	if (n <= 0) return [];
	return Object.values(memory.chapters)
		.sort((a, b) => b.chapterNumber - a.chapterNumber)
		.slice(0, n);
}

export function findCharacterByName(memory: StoryMemory, name: string): Character | undefined;
export function findCharacterByName(
	memory: StoryMemoryView,
	name: string
): DeepReadonly<Character> | undefined;
export function findCharacterByName(
	memory: StoryMemoryView,
	name: string
): DeepReadonly<Character> | undefined {
	return Object.values(memory.characters).find((character) => character.name === name);
}

export function findThreadByName(memory: StoryMemory, name: string): PlotThread | undefined;
export function findThreadByName(
	memory: StoryMemoryView,
	name: string
): DeepReadonly<PlotThread> | undefined;
export function findThreadByName(
	memory: StoryMemoryView,
	name: string
): DeepReadonly<PlotThread> | undefined {
	return Object.values(memory.plotThreads).find((thread) => thread.name === name);
}

export function findLocationByName(memory: StoryMemory, name: string): WorldLocation | undefined;
export function findLocationByName(
	memory: StoryMemoryView,
	name: string
): DeepReadonly<WorldLocation> | undefined;
export function findLocationByName(
	memory: StoryMemoryView,
	name: string
): DeepReadonly<WorldLocation> | undefined {
	return Object.values(memory.locations).find((location) => location.name === name);
}
