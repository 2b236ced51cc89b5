import type { MetadataFilters } from '@medrecall/shared';

export const INTENTS = [
    'patient_info',
    'condition_list',
    'symptom_search',
    'medication_info',
    'temporal_query',
    'general_query'
] as const;

export type Intent = typeof INTENTS[number];

export const ENTITY_CATEGORIES = ['patients', 'conditions', 'symptoms', 'medications', 'dates'] as const;

export interface EntitySet {
    readonly patients: readonly string[];
    readonly conditions: readonly string[];
    readonly symptoms: readonly string[];
    readonly medications: readonly string[];
    readonly dates: readonly string[];
}

export interface QueryAnalysis {
    readonly originalQuery: string;
    readonly normalizedQuery: string;
    readonly intent: Intent;
    readonly entities: EntitySet;
    readonly searchTerms: readonly string[];
    readonly autoFilters: Readonly<MetadataFilters>;
}

export interface ContextItem {
    readonly conversationId: string;
    readonly patientName?: string;
    readonly diagnosis?: string;
    readonly symptoms?: string;
    readonly date?: string;
    readonly content: string;
    readonly baseSimilarity: number;
    readonly excerpt: string;
    /** 1-based position in the retrieval result. */
    readonly retrievalRank: number;
}

export interface RankedContext extends ContextItem {
    readonly finalScore: number;
}

export interface ChatSource {
    readonly conversationId: string;
    readonly patientName?: string;
    readonly relevanceScore: number;
    readonly excerpt: string;
    readonly date?: string;
    readonly metadata: {
        readonly diagnosis?: string;
        readonly symptoms?: string;
        readonly rank: number;
    };
}

export interface QueryClassification {
    readonly entities: EntitySet;
    readonly searchTerms: readonly string[];
    readonly normalizedQuery: string;
    readonly autoFilters: Readonly<MetadataFilters>;
}

export interface ChatResponse {
    readonly answer: string;
    readonly sources: readonly ChatSource[];
    readonly confidence: number;
    readonly intent: Intent;
    readonly followUpSuggestions: readonly string[];
    readonly queryClassification: QueryClassification;
    readonly processingTimeMs: number;
}

export interface QueryValidation {
    valid: boolean;
    reason?: string;
    suggestions: string[];
    estimatedIntent?: Intent;
}

/** Outcome of a stage that falls back instead of failing. */
export type Degradable<T> =
    | { ok: true; value: T }
    | { ok: false; value: T; error: unknown };

export function countEntities(entities: EntitySet): number {
    return ENTITY_CATEGORIES.reduce((total, category) => total + entities[category].length, 0);
}

export function emptyEntities(): EntitySet {
    return { patients: [], conditions: [], symptoms: [], medications: [], dates: [] };
}
