/**
 * Canonical name keys for deduplicating extracted characters and threads.
 *
 * The extractor rarely names the same entity the same way twice
 * ("The Wind Walker prophecy" vs "Wind Walker Prophecy"), so matching happens
 * on a normalized key rather than the raw string.
 */

const LEADING_ARTICLE = /^(?:the|a|an)\s+/;
const LEADING_UNNAMED = /^unnamed\s+/;

export function normalizeName(name: string): string {
	return name
		.toLowerCase()
		.replace(/\s+/g, ' ')
		.trim()
		.replace(LEADING_ARTICLE, '')
		.replace(LEADING_UNNAMED, '')
		.trim();
}

export interface NameCandidate {
	id: string;
	name: string;
}

/**
 * ID of the first candidate whose canonical key equals that of `name`, or null.
 * A name that normalizes to nothing never matches.
 */
export function findMatch(name: string, candidates: Iterable<NameCandidate>): string | null {
	const key = normalizeName(name);
	if (!key) return null;

	for (const candidate of candidates) {
		if (normalizeName(candidate.name) === key) return candidate.id;
	}
	return null;
}
