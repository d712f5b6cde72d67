/**
 * Injectable randomness for the retriever's callback sampling.
 */

/** Returns a float in [0, 1) */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/** Seeded mulberry32 generator; the same seed yields the same sequence. */
export function createSeededRandom(seed: number): RandomSource {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

function randomIndex(random: RandomSource, length: number): number {
	return Math.min(length - 1, Math.floor(random() * length));
}

/**
 * Up to `count` distinct items, via a partial Fisher-Yates shuffle over a copy.
 */
export function sampleWithoutReplacement<T>(
	items: readonly T[],
	count: number,
	random: RandomSource = defaultRandom
): T[] {
	const pool = [...items];
	const take = Math.max(0, Math.min(count, pool.length));
	for (let i = 0; i < take; i++) {
		const j = i + randomIndex(random, pool.length - i);
		[pool[i], pool[j]] = [pool[j], pool[i]];
	}
	return pool.slice(0, take);
}

export function pickOne<T>(items: readonly T[], random: RandomSource = defaultRandom): T | undefined {
	if (items.length === 0) return undefined;
	return items[randomIndex(random, items.length)];
}
