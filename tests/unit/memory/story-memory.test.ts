import {
	chapterIdFor,
	createArc,
	createChapter,
	createPlotThread,
	findCharacterByName,
	findLocationByName,
	findThreadByName,
	createLocation,
	getCurrentArc,
	getMajorOpenThreads,
	getOpenThreads,
	getRecentChapters,
	nextSequentialId,
	relationshipKey,
	createCharacter,
} from '../../../src/memory/story-memory';
import { makeChapter, makeMemory } from '../../helpers';

describe('story memory', () => {
	describe('ids', () => {
		it('should pad chapter ids', () => {
			expect(chapterIdFor(7)).toBe('ch_007');
			expect(chapterIdFor(123)).toBe('ch_123');
		});

		it('should continue after the highest numeric suffix', () => {
			expect(nextSequentialId('char', [])).toBe('char_001');
			expect(nextSequentialId('char', ['char_001', 'char_003'])).toBe('char_004');
			expect(nextSequentialId('thread', ['thread_002', 'custom'])).toBe('thread_003');
			expect(nextSequentialId('char', ['char_999'])).toBe('char_1000');
		});

		it('should key relationships by the sorted pair', () => {
			expect(relationshipKey('char_002', 'char_001')).toEqual({
				key: 'rel_char_001_char_002',
				pair: ['char_001', 'char_002'],
			});
			expect(relationshipKey('char_001', 'char_002').key).toBe('rel_char_001_char_002');
		});
	});

	describe('factories', () => {
		it('should count words of the chapter content', () => {
			const chapter = createChapter({
				chapterId: 'ch_001',
				chapterNumber: 1,
				arcId: 'arc_001',
				title: 'One',
				content: '  The storm  broke\nat dawn. ',
			});

			expect(chapter.wordCount).toBe(5);
			expect(chapter.keyEvents).toEqual([]);
		});

		it('should default characters to neutral and active', () => {
			const character = createCharacter({ characterId: 'char_001', name: 'Kai' });

			expect(character.role).toBe('neutral');
			expect(character.status).toBe('active');
			expect(character.items).toEqual([]);
			expect(character.relationships).toEqual({});
		});
	});

	describe('derived views', () => {
		it('should list the most recent chapters by number, newest first', () => {
			const memory = makeMemory();
			for (const n of [2, 5, 1, 4, 3]) {
				const chapter = makeChapter(n);
				memory.chapters[chapter.chapterId] = chapter;
			}

			expect(getRecentChapters(memory, 3).map((ch) => ch.chapterNumber)).toEqual([5, 4, 3]);
			expect(getRecentChapters(memory, 0)).toEqual([]);
			expect(getRecentChapters(memory, 10)).toHaveLength(5);
		});

		it('should filter open and major open threads', () => {
			const memory = makeMemory();
			const threads = [
				createPlotThread({ threadId: 'thread_001', name: 'A', setupChapter: 'ch_000', importance: 'major' }),
				createPlotThread({
					threadId: 'thread_002',
					name: 'B',
					setupChapter: 'ch_000',
					status: 'progressing',
				}),
				createPlotThread({
					threadId: 'thread_003',
					name: 'C',
					setupChapter: 'ch_000',
					status: 'resolved',
					importance: 'major',
				}),
				createPlotThread({
					threadId: 'thread_004',
					name: 'D',
					setupChapter: 'ch_000',
					status: 'abandoned',
				}),
			];
			for (const thread of threads) memory.plotThreads[thread.threadId] = thread;

			expect(getOpenThreads(memory).map((t) => t.threadId)).toEqual(['thread_001', 'thread_002']);
			expect(getMajorOpenThreads(memory).map((t) => t.threadId)).toEqual(['thread_001']);
		});

		it('should resolve the current arc', () => {
			const memory = makeMemory();
			expect(getCurrentArc(memory)).toBeUndefined();

			memory.arcs.arc_001 = createArc({ arcId: 'arc_001', arcNumber: 1, name: 'Arrival' });
			memory.currentArcId = 'arc_001';
			expect(getCurrentArc(memory)?.name).toBe('Arrival');
		});

		it('should look characters up by exact name', () => {
			const memory = makeMemory();
			memory.characters.char_001 = createCharacter({ characterId: 'char_001', name: 'Kai' });

			expect(findCharacterByName(memory, 'Kai')?.characterId).toBe('char_001');
			expect(findCharacterByName(memory, 'kai')).toBeUndefined();
		});

		it('should return mutable records from a mutable aggregate', () => {
			const memory = makeMemory();
			memory.characters.char_001 = createCharacter({ characterId: 'char_001', name: 'Kai' });
			memory.plotThreads.thread_001 = createPlotThread({
				threadId: 'thread_001',
				name: 'The Lost Map',
				setupChapter: 'ch_001',
			});
			memory.locations.loc_001 = createLocation({ locationId: 'loc_001', name: 'Port Gale' });

			const kai = findCharacterByName(memory, 'Kai');
			kai?.items.push('rope');
			const thread = findThreadByName(memory, 'The Lost Map');
			if (thread) thread.status = 'resolved';
			const port = findLocationByName(memory, 'Port Gale');
			port?.factions.push('Harbor Guild');

			expect(memory.characters.char_001.items).toEqual(['rope']);
			expect(memory.plotThreads.thread_001.status).toBe('resolved');
			expect(memory.locations.loc_001.factions).toEqual(['Harbor Guild']);
		});
	});
});
