import { createSeededRandom, pickOne, sampleWithoutReplacement } from '../../../src/utils/random';

describe('random helpers', () => {
	it('should repeat a sequence for the same seed', () => {
		const a = createSeededRandom(42);
		const b = createSeededRandom(42);
		const seqA = [a(), a(), a()];

		expect([b(), b(), b()]).toEqual(seqA);
		for (const value of seqA) {
			expect(value).toBeGreaterThanOrEqual(0);
			expect(value).toBeLessThan(1);
		}
	});

	it('should sample distinct items', () => {
		const random = createSeededRandom(7);
		const sample = sampleWithoutReplacement([1, 2, 3, 4, 5], 3, random);

		expect(sample).toHaveLength(3);
		expect(new Set(sample).size).toBe(3);
		for (const item of sample) expect([1, 2, 3, 4, 5]).toContain(item);
	});

	it('should cap the sample at the population size', () => {
		expect(sampleWithoutReplacement(['a', 'b'], 5, () => 0)).toEqual(['a', 'b']);
		expect(sampleWithoutReplacement([], 2, () => 0)).toEqual([]);
	});

	it('should keep insertion order when the source always returns 0', () => {
		expect(sampleWithoutReplacement([1, 2, 3, 4], 2, () => 0)).toEqual([1, 2]);
	});

	it('should pick from the end when the source is near 1', () => {
		expect(pickOne(['x', 'y', 'z'], () => 0.999)).toBe('z');
		expect(pickOne([], () => 0.5)).toBeUndefined();
	});

	it('should not mutate the input', () => {
		const items = [1, 2, 3];
		sampleWithoutReplacement(items, 3, () => 0.99);
		expect(items).toEqual([1, 2, 3]);
	});
});
