const WINDOW_STEP = 10;
const MIN_TAIL = 50;
const ELLIPSIS = '...';

/**
 * Picks the window of `text` that contains the most query words (longer than two
 * characters), widened back to a word boundary. `...` marks a cut on either side;
 * the result, markers included, never exceeds `maxLength`.
 */
export function createExcerpt(text: string, query: string, maxLength = 200): string {
    if (text.length <= maxLength) {
        return text;
    }

    const windowLength = maxLength - 2 * ELLIPSIS.length;

    const queryWords = query
        .toLowerCase()
        .split(/\s+/)
        .filter(word => word.length > 2);

    if (queryWords.length === 0) {
        return text.substring(0, maxLength - ELLIPSIS.length) + ELLIPSIS;
    }

    const lowerText = text.toLowerCase();
    let bestStart = 0;
    let bestScore = 0;

    for (let i = 0; i < lowerText.length - MIN_TAIL; i += WINDOW_STEP) {
        const span = lowerText.substring(i, i + windowLength);
        const score = queryWords.filter(word => span.includes(word)).length;
        if (score > bestScore) {
            bestScore = score;
            bestStart = i;
        }
    }

    while (bestStart > 0 && ![' ', '.', '\n'].includes(text[bestStart])) {
        bestStart--;
    }

    let excerpt = text.substring(bestStart, bestStart + windowLength).trim();

    if (bestStart > 0) {
        excerpt = ELLIPSIS + excerpt;
    }
    if (text.length > bestStart + windowLength) {
        excerpt = excerpt + ELLIPSIS;
    }

    return excerpt;
}
