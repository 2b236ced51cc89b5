const COMBINING_MARKS = /\p{M}/gu;
const QUESTION_PUNCTUATION = /[¿¡?!]/g;

export function stripAccents(text: string): string {
    return text.normalize('NFD').replace(COMBINING_MARKS, '');
}

/** Lowercase, accent-free, without `¿¡?!`, single-spaced. */
export function normalizeText(text: string): string {
    return stripAccents(text.toLowerCase())
        .replace(QUESTION_PUNCTUATION, '')
        .replace(/\s+/g, ' ')
        .trim();
}

export function truncate(text: string, maxLength: number, suffix = '...'): string {
    if (text.length <= maxLength) return text;
    return text.substring(0, maxLength) + suffix;
}

export function dedupe(values: Iterable<string>): string[] {
    return [...new Set(values)];
}
