import { stripAccents } from '../utils/text.js';

const MIN_PARTIAL_WORD_LENGTH = 3;

function normalizeName(name: string): string {
    return stripAccents(name.toLowerCase()).replace(/\s+/g, ' ').trim();
}

function words(name: string): Set<string> {
    return new Set(name.split(' ').filter(word => word.length > 0));
}

/**
 * Heuristic [0, 1] score of how likely `storedName` refers to the person named
 * in `queryName`.
 *
 * Scoring is not symmetric: coverage is measured against the query's words, and
 * the partial branch counts query words that contain (or are contained in) a
 * stored word, so `nameSimilarity('Ana Maria', 'Mariana')` is 0.6 while
 * `nameSimilarity('Mariana', 'Ana Maria')` is 0.5.
 */
export function nameSimilarity(queryName: string, storedName: string): number {
    const query = normalizeName(queryName);
    const stored = normalizeName(storedName);

    if (query.length === 0 || stored.length === 0) return 0;
    if (query === stored) return 1;

    const queryWords = words(query);
    const storedWords = words(stored);
    const common = [...queryWords].filter(word => storedWords.has(word));

    if (common.length === 0) {
        const matches = countPartialMatches(queryWords, storedWords);
        return matches > 0 ? Math.min(0.4 + 0.1 * matches, 0.7) : 0;
    }

    let score = common.length / queryWords.size;

    if (common.length === queryWords.size) {
        score += 0.4;
    }

    score += 0.1 * common.length;

    const [firstQueryWord] = queryWords;
    if (firstQueryWord !== undefined && storedWords.has(firstQueryWord)) {
        score += 0.1;
    }

    const extraStoredWords = storedWords.size - common.length;
    if (extraStoredWords > 1) {
        score -= 0.05 * (extraStoredWords - 1);
    }

    return Math.max(0, Math.min(score, 1));
}

function countPartialMatches(queryWords: Set<string>, storedWords: Set<string>): number {
    let matches = 0;
    for (const queryWord of queryWords) {
        if (queryWord.length < MIN_PARTIAL_WORD_LENGTH) continue;
        for (const storedWord of storedWords) {
            if (storedWord.length < MIN_PARTIAL_WORD_LENGTH) continue;
            if (queryWord.includes(storedWord) || storedWord.includes(queryWord)) {
                matches++;
                break;
            }
        }
    }
    return matches;
}
