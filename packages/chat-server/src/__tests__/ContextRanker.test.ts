import { describe, it, expect } from 'vitest';
import { ContextRanker, RANKING_WEIGHTS } from '../services/ContextRanker.js';
import type { ContextItem } from '../types/ChatTypes.js';
import { makeAnalysis } from './fakes.js';

const ranker = new ContextRanker();

function item(overrides: Partial<ContextItem>): ContextItem {
    return {
        conversationId: 'conv',
        content: '',
        baseSimilarity: 0.5,
        excerpt: '',
        retrievalRank: 1,
        ...overrides
    };
}

const analysis = makeAnalysis({
    intent: 'patient_info',
    entities: {
        patients: ['Pepito Gómez'],
        conditions: ['diabetes'],
        symptoms: ['fiebre'],
        medications: [],
        dates: []
    }
});

describe('ContextRanker', () => {
    it('adds a bonus for every entity mentioned in the content and for a date', () => {
        const score = ranker.score(
            item({ content: 'Pepito Gómez tiene DIABETES', baseSimilarity: 0.6, date: '2024-01-10' }),
            analysis
        );

        expect(score).toBeCloseTo(0.6 + RANKING_WEIGHTS.patient + RANKING_WEIGHTS.condition + RANKING_WEIGHTS.dated, 10);
    });

    it('keeps scores within [0, 1]', () => {
        const ranked = ranker.rank([
            item({ content: 'Pepito Gómez con diabetes y fiebre', baseSimilarity: 0.95, date: '2024-01-10' }),
            item({ content: 'sin coincidencias', baseSimilarity: -0.2 })
        ], analysis);

        expect(ranked.map(context => context.finalScore)).toEqual([1, 0]);
    });

    it('sorts by final score and keeps every item', () => {
        const items = [
            item({ conversationId: 'a', content: 'control general', baseSimilarity: 0.7 }),
            item({ conversationId: 'b', content: 'fiebre alta', baseSimilarity: 0.68 }),
            item({ conversationId: 'c', content: 'diabetes', baseSimilarity: 0.6 })
        ];

        const ranked = ranker.rank(items, analysis);

        expect(ranked).toHaveLength(items.length);
        expect(ranked.map(context => context.conversationId)).toEqual(['c', 'b', 'a']);
    });

    it('keeps retrieval order between equal scores', () => {
        const ranked = ranker.rank([
            item({ conversationId: 'a', content: 'control general' }),
            item({ conversationId: 'b', content: 'control general', baseSimilarity: 0.7 }),
            item({ conversationId: 'c', content: 'control general' }),
            item({ conversationId: 'd', content: 'control general' })
        ], analysis);

        expect(ranked.map(context => context.conversationId)).toEqual(['b', 'a', 'c', 'd']);
        expect(ranked.map(context => context.finalScore)).toEqual([0.7, 0.5, 0.5, 0.5]);
    });

    it('does not modify the input items', () => {
        const original = item({ content: 'fiebre', baseSimilarity: 0.6 });

        ranker.rank([original], analysis);

        expect(original).not.toHaveProperty('finalScore');
    });
});
