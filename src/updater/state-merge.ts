/**
 * Reconciles extracted facts against the StoryMemory aggregate.
 *
 * Facts that introduce entities go through the name resolver so that
 * "The Wind Walker prophecy" and "Wind Walker Prophecy" land on one thread;
 * facts that update entities require the exact current name. Anything that
 * cannot be resolved becomes a warning on the report, never an exception.
 */

import { errorMessage } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { findMatch, type NameCandidate } from '../memory/name-resolver.js';
import {
	createCharacter,
	createPlotThread,
	findCharacterByName,
	findLocationByName,
	findThreadByName,
	nextSequentialId,
	relationshipKey,
} from '../memory/story-memory.js';
import type { Arc, Chapter, DeepReadonly, PlotThread, StoryMemory } from '../types/index.js';
import type { FactSource } from './fact-extractor.js';
import {
	FACT_KIND_ORDER,
	type CharacterUpdateFact,
	type Fact,
	type LocationUpdateFact,
	type NewCharacterFact,
	type RelationshipFact,
	type ThreadActionFact,
	type TimelineEventFact,
} from './fact-schema.js';

const logger = getLogger('state-merge');

export interface MergeReport {
	chapterId: string;
	/** The chapter was already merged; nothing changed */
	skipped: boolean;
	createdCharacters: string[];
	createdThreads: string[];
	createdRelationships: string[];
	appendedEvents: string[];
	warnings: string[];
	indexed: boolean;
	indexingError?: string;
}

export interface ChapterIndexer {
	indexChapter(chapter: DeepReadonly<Chapter>): Promise<boolean>;
	indexThread(thread: DeepReadonly<PlotThread>): Promise<boolean>;
}

export interface MemoryWriter {
	save(memory: StoryMemory, makeBackup?: boolean): Promise<void>;
	saveChapterText(chapterId: string, content: string): Promise<void>;
}

export interface StateMergeOptions {
	index?: ChapterIndexer;
	store?: MemoryWriter;
	extractor?: FactSource;
	now?: () => Date;
}

function emptyReport(chapterId: string): MergeReport {
	return {
		chapterId,
		skipped: false,
		createdCharacters: [],
		createdThreads: [],
		createdRelationships: [],
		appendedEvents: [],
		warnings: [],
		indexed: false,
	};
}

function addOnce(list: string[], value: string): void {
	if (!list.includes(value)) list.push(value);
}

export class StateMergePipeline {
	private readonly index?: ChapterIndexer;
	private readonly store?: MemoryWriter;
	private readonly extractor?: FactSource;
	private readonly now: () => Date;

	constructor({ index, store, extractor, now = () => new Date() }: StateMergeOptions = {}) {
		this.index = index;
		this.store = store;
		this.extractor = extractor;
		this.now = now;
	}

	/**
	 * Merge a finished chapter: record it, apply its facts, persist, then index.
	 *
	 * Facts come from the argument, else from the configured extractor, else
	 * there are none. They are obtained before anything is modified, so a failed
	 * extraction leaves the aggregate untouched. A chapter already present is
	 * skipped. Callers must not run two merges on the same aggregate at once.
	 */
	async mergeChapter(memory: StoryMemory, chapter: Chapter, facts?: Fact[]): Promise<MergeReport> {
		if (memory.chapters[chapter.chapterId]) {
			logger.info('Chapter already merged, skipping', { chapterId: chapter.chapterId });
			return { ...emptyReport(chapter.chapterId), skipped: true };
		}

		const batch = facts ?? (this.extractor ? await this.extractor.extract(chapter) : []);

		memory.chapters[chapter.chapterId] = chapter;
		memory.currentChapterNumber = chapter.chapterNumber;

		const report = this.applyFacts(memory, chapter, batch);

		const arc = this.currentArc(memory);
		if (arc) arc.currentChapter += 1;

		for (const theme of chapter.themes) {
			memory.themeCounts[theme] = (memory.themeCounts[theme] ?? 0) + 1;
		}

		if (this.store) {
			await this.store.saveChapterText(chapter.chapterId, chapter.content);
			await this.store.save(memory, true);
		}

		if (this.index) {
			try {
				await this.index.indexChapter(chapter);
				for (const thread of Object.values(memory.plotThreads)) {
					if (thread.setupChapter === chapter.chapterId) {
						await this.index.indexThread(thread);
					}
				}
				report.indexed = true;
			} catch (error) {
				report.indexingError = errorMessage(error);
				logger.error('Indexing failed; merge is persisted', {
					chapterId: chapter.chapterId,
					error: report.indexingError,
				});
			}
		}

		logger.info('Merged chapter', {
			chapterId: chapter.chapterId,
			characters: report.createdCharacters.length,
			threads: report.createdThreads.length,
			events: report.appendedEvents.length,
			warnings: report.warnings.length,
		});
		return report;
	}

	/**
	 * Apply facts to the aggregate in kind order (new characters, character
	 * updates, locations, threads, relationships, timeline), keeping input order
	 * within a kind. Re-applying the same facts creates nothing new.
	 */
	applyFacts(memory: StoryMemory, chapter: DeepReadonly<Chapter>, facts: readonly Fact[]): MergeReport {
		const report = emptyReport(chapter.chapterId);
		const ordered = [...facts].sort(
			(a, b) => FACT_KIND_ORDER.indexOf(a.kind) - FACT_KIND_ORDER.indexOf(b.kind)
		);

		for (const fact of ordered) {
			switch (fact.kind) {
				case 'new_character':
					this.applyNewCharacter(memory, chapter, fact, report);
					break;
				case 'character_update':
					this.applyCharacterUpdate(memory, chapter, fact, report);
					break;
				case 'location_update':
					this.applyLocationUpdate(memory, fact);
					break;
				case 'thread_action':
					this.applyThreadAction(memory, chapter, fact, report);
					break;
				case 'relationship':
					this.applyRelationship(memory, chapter, fact, report);
					break;
				case 'timeline_event':
					this.applyTimelineEvent(memory, chapter, fact, report);
					break;
			}
		}

		for (const warning of report.warnings) {
			logger.warn(warning, { chapterId: chapter.chapterId });
		}
		return report;
	}

	private currentArc(memory: StoryMemory): Arc | undefined {
		return memory.currentArcId ? memory.arcs[memory.currentArcId] : undefined;
	}

	private applyNewCharacter(
		memory: StoryMemory,
		chapter: DeepReadonly<Chapter>,
		fact: NewCharacterFact,
		report: MergeReport
	): void {
		const candidates: NameCandidate[] = Object.values(memory.characters).map((c) => ({
			id: c.characterId,
			name: c.name,
		}));
		const matchId = findMatch(fact.name, candidates);

		if (matchId) {
			const existing = memory.characters[matchId];
			logger.debug('Character already known', { name: fact.name, existing: existing.name });
			if (fact.personality && !existing.personality) existing.personality = fact.personality;
			if (fact.description && !existing.background) existing.background = fact.description;
			if (fact.role && existing.role === 'neutral') existing.role = fact.role;
			return;
		}

		const character = createCharacter({
			characterId: nextSequentialId('char', Object.keys(memory.characters)),
			name: fact.name,
			role: fact.role ?? 'neutral',
			personality: fact.personality,
			background: fact.description,
			status: 'active',
			firstAppearance: chapter.chapterId,
			lastAppearance: chapter.chapterId,
		});
		memory.characters[character.characterId] = character;
		report.createdCharacters.push(character.characterId);
	}

	private applyCharacterUpdate(
		memory: StoryMemory,
		chapter: DeepReadonly<Chapter>,
		fact: CharacterUpdateFact,
		report: MergeReport
	): void {
		const character = findCharacterByName(memory, fact.characterName);
		if (!character) {
			report.warnings.push(`Character not found: ${fact.characterName}`);
			return;
		}

		if (fact.status) character.status = fact.status;
		if (fact.location) character.currentLocation = fact.location;
		for (const item of fact.itemsGained) addOnce(character.items, item);
		character.items = character.items.filter((item) => !fact.itemsLost.includes(item));
		character.lastAppearance = chapter.chapterId;
	}

	private applyLocationUpdate(memory: StoryMemory, fact: LocationUpdateFact): void {
		const location = findLocationByName(memory, fact.locationName);
		if (!location) {
			logger.info('Unknown location mentioned', { name: fact.locationName, change: fact.change });
			return;
		}
		if (fact.status) location.status = fact.status;
	}

	private applyThreadAction(
		memory: StoryMemory,
		chapter: DeepReadonly<Chapter>,
		fact: ThreadActionFact,
		report: MergeReport
	): void {
		const arc = this.currentArc(memory);

		if (fact.action === 'introduce') {
			const candidates: NameCandidate[] = Object.values(memory.plotThreads).map((t) => ({
				id: t.threadId,
				name: t.name,
			}));
			const matchId = findMatch(fact.threadName, candidates);
			if (matchId) {
				const existing = memory.plotThreads[matchId];
				if (fact.description && !existing.setupDescription) {
					existing.setupDescription = fact.description;
				}
				return;
			}

			const thread = createPlotThread({
				threadId: nextSequentialId('thread', Object.keys(memory.plotThreads)),
				name: fact.threadName,
				setupChapter: chapter.chapterId,
				setupDescription: fact.description,
			});
			memory.plotThreads[thread.threadId] = thread;
			report.createdThreads.push(thread.threadId);
			if (arc) addOnce(arc.threadsIntroduced, thread.threadId);
			return;
		}

		const thread = findThreadByName(memory, fact.threadName);
		if (!thread) {
			report.warnings.push(`Thread not found: ${fact.threadName}`);
			return;
		}

		if (fact.action === 'progress') {
			const duplicate = thread.developments.some(
				(d) => d.chapterId === chapter.chapterId && d.description === fact.description
			);
			if (!duplicate) {
				thread.developments.push({ chapterId: chapter.chapterId, description: fact.description });
			}
			if (thread.status === 'open' || thread.status === 'progressing') {
				thread.status = 'progressing';
			} else {
				report.warnings.push(`Progress on ${thread.status} thread kept its status: ${thread.name}`);
			}
			if (arc) addOnce(arc.threadsAdvanced, thread.threadId);
			return;
		}

		if (thread.resolutionChapter !== undefined) {
			if (thread.resolutionChapter !== chapter.chapterId) {
				report.warnings.push(
					`Thread already resolved in ${thread.resolutionChapter}, keeping first resolution: ${thread.name}`
				);
			}
			return;
		}
		thread.status = 'resolved';
		thread.resolutionChapter = chapter.chapterId;
		thread.resolutionDescription = fact.description;
		if (arc) addOnce(arc.threadsResolved, thread.threadId);
	}

	private applyRelationship(
		memory: StoryMemory,
		chapter: DeepReadonly<Chapter>,
		fact: RelationshipFact,
		report: MergeReport
	): void {
		const a = findCharacterByName(memory, fact.characterA);
		const b = findCharacterByName(memory, fact.characterB);
		if (!a || !b) {
			report.warnings.push(
				`Relationship skipped, character not found: ${!a ? fact.characterA : fact.characterB}`
			);
			return;
		}
		if (a.characterId === b.characterId) {
			report.warnings.push(`Relationship skipped, same character on both sides: ${a.name}`);
			return;
		}

		const { key, pair } = relationshipKey(a.characterId, b.characterId);
		const existing = memory.relationships[key];
		if (existing) {
			existing.lastUpdated = chapter.chapterId;
			return;
		}

		memory.relationships[key] = {
			characterA: pair[0],
			characterB: pair[1],
			relationshipType: fact.relationshipType,
			strength: 50,
			establishedChapter: chapter.chapterId,
			lastUpdated: chapter.chapterId,
			notes: fact.description,
		};
		const label = fact.description || fact.relationshipType;
		a.relationships[b.characterId] ??= label;
		b.relationships[a.characterId] ??= label;
		report.createdRelationships.push(key);
	}

	private applyTimelineEvent(
		memory: StoryMemory,
		chapter: DeepReadonly<Chapter>,
		fact: TimelineEventFact,
		report: MergeReport
	): void {
		const duplicate = memory.worldTimeline.some(
			(event) => event.chapterId === chapter.chapterId && event.description === fact.description
		);
		if (duplicate) return;

		const eventId = `event_${chapter.chapterId}_${memory.worldTimeline.length + 1}`;
		memory.worldTimeline.push({
			eventId,
			chapterId: chapter.chapterId,
			chapterNumber: chapter.chapterNumber,
			description: fact.description,
			eventType: fact.eventType,
			impact: fact.impact,
			charactersInvolved: fact.charactersInvolved,
			locationsInvolved: fact.locationsInvolved,
			timestamp: this.now().toISOString(),
		});
		report.appendedEvents.push(eventId);
	}
}
