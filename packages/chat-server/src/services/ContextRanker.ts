import type { ContextItem, QueryAnalysis, RankedContext } from '../types/ChatTypes.js';

export const RANKING_WEIGHTS = Object.freeze({
    patient: 0.10,
    condition: 0.15,
    symptom: 0.05,
    // Flat bonus for dated items; no recency decay is applied.
    dated: 0.02
});

export class ContextRanker {
    rank(items: readonly ContextItem[], analysis: QueryAnalysis): RankedContext[] {
        const ranked = items
            .map(item => ({ ...item, finalScore: this.score(item, analysis) }))
            .sort((a, b) => b.finalScore - a.finalScore);

        console.log('[ContextRanker] Contexts ranked:', {
            count: ranked.length,
            topScore: ranked[0]?.finalScore ?? 0
        });

        return ranked;
    }

    score(item: ContextItem, analysis: QueryAnalysis): number {
        const content = item.content.toLowerCase();
        const { patients, conditions, symptoms } = analysis.entities;

        const entityBonus =
            countMentions(patients, content) * RANKING_WEIGHTS.patient +
            countMentions(conditions, content) * RANKING_WEIGHTS.condition +
            countMentions(symptoms, content) * RANKING_WEIGHTS.symptom;

        const dateBonus = item.date ? RANKING_WEIGHTS.dated : 0;

        return Math.max(0, Math.min(item.baseSimilarity + entityBonus + dateBonus, 1));
    }
}

function countMentions(entities: readonly string[], content: string): number {
    return entities.filter(entity => content.includes(entity.toLowerCase())).length;
}
