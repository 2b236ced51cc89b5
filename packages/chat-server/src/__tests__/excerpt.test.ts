import { describe, it, expect } from 'vitest';
import { createExcerpt } from '../utils/excerpt.js';

describe('createExcerpt', () => {
    it('returns short text unchanged', () => {
        expect(createExcerpt('Paciente estable.', 'paciente')).toBe('Paciente estable.');
    });

    it('centres the excerpt on the query words', () => {
        const text = 'a '.repeat(150) + 'diabetes confirmada en control' + ' b'.repeat(100);

        const excerpt = createExcerpt(text, 'diabetes');

        expect(excerpt.startsWith('...')).toBe(true);
        expect(excerpt.endsWith('...')).toBe(true);
        expect(excerpt).toContain(' a diabetes conf');
        expect(excerpt).toHaveLength(199);
    });

    it('cuts from the start when the query has no usable words', () => {
        const text = 'x'.repeat(300);

        expect(createExcerpt(text, 'de la')).toBe('x'.repeat(197) + '...');
    });
});
