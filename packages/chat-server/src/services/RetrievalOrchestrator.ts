import type {
    EmbeddingProvider,
    MetadataFilters,
    SemanticStore,
    StoredMetadata
} from '@medrecall/shared';
import type { ContextItem, Degradable, QueryAnalysis } from '../types/ChatTypes.js';
import { nameSimilarity } from './NameMatcher.js';
import { createExcerpt } from '../utils/excerpt.js';
import { stripAccents } from '../utils/text.js';

export type RetrievalStrategy = 'patient_lookup' | 'condition_lookup' | 'semantic_search';

export interface RetrievalConfig {
    /** Minimum `1 - distance` kept from a semantic query. */
    similarityThreshold: number;
    /** Stored names must score strictly above this to count as the queried patient. */
    patientMatchThreshold: number;
}

const DEFAULT_CONFIG: RetrievalConfig = {
    similarityThreshold: 0.6,
    patientMatchThreshold: 0.3
};

const SEMANTIC_TERM_COUNT = 3;
const CONDITION_CANDIDATE_FACTOR = 2;

interface ScoredMatch {
    content: string;
    metadata: StoredMetadata;
    similarity: number;
}

export class RetrievalOrchestrator {
    private store: SemanticStore;
    private embedder: EmbeddingProvider;
    private config: RetrievalConfig;

    constructor(store: SemanticStore, embedder: EmbeddingProvider, config?: Partial<RetrievalConfig>) {
        this.store = store;
        this.embedder = embedder;
        this.config = { ...DEFAULT_CONFIG, ...config };
    }

    selectStrategy(analysis: QueryAnalysis): RetrievalStrategy {
        if (analysis.intent === 'patient_info' && analysis.entities.patients.length > 0) {
            return 'patient_lookup';
        }
        if (analysis.intent === 'condition_list' && analysis.entities.conditions.length > 0) {
            return 'condition_lookup';
        }
        return 'semantic_search';
    }

    async retrieve(analysis: QueryAnalysis, maxResults: number, userFilters?: MetadataFilters): Promise<ContextItem[]> {
        const result = await this.tryRetrieve(analysis, maxResults, userFilters);
        if (!result.ok) {
            console.error('[RetrievalOrchestrator] Context retrieval failed, continuing without context:', result.error);
        }
        return result.value;
    }

    async tryRetrieve(analysis: QueryAnalysis, maxResults: number, userFilters?: MetadataFilters): Promise<Degradable<ContextItem[]>> {
        const filters: MetadataFilters = { ...analysis.autoFilters, ...userFilters };
        const strategy = this.selectStrategy(analysis);

        try {
            const items = await this.runStrategy(strategy, analysis, maxResults, filters);

            console.log('[RetrievalOrchestrator] Context retrieval completed:', {
                intent: analysis.intent,
                strategy,
                resultsCount: items.length
            });

            return { ok: true, value: items };
        } catch (error) {
            return { ok: false, value: [], error };
        }
    }

    private async runStrategy(
        strategy: RetrievalStrategy,
        analysis: QueryAnalysis,
        maxResults: number,
        filters: MetadataFilters
    ): Promise<ContextItem[]> {
        switch (strategy) {
            case 'patient_lookup':
                return this.patientLookup(analysis.entities.patients[0]);
            case 'condition_lookup':
                return this.conditionLookup(analysis.entities.conditions[0], maxResults);
            case 'semantic_search':
                return this.semanticSearch(
                    analysis.searchTerms.slice(0, SEMANTIC_TERM_COUNT).join(' '),
                    maxResults,
                    Object.keys(filters).length > 0 ? filters : undefined
                );
        }
    }

    private async patientLookup(patientName: string): Promise<ContextItem[]> {
        const records = await this.store.get();

        const scored = records
            .map(record => ({
                record,
                similarity: nameSimilarity(patientName, stringField(record.metadata, 'patient_name') ?? '')
            }))
            .filter(candidate => candidate.similarity > this.config.patientMatchThreshold)
            .sort((a, b) => b.similarity - a.similarity);

        console.log('[RetrievalOrchestrator] Patient lookup:', {
            patientName,
            scanned: records.length,
            matched: scored.length
        });

        return scored.map((candidate, index) => toContextItem(
            {
                content: candidate.record.content,
                metadata: candidate.record.metadata,
                similarity: candidate.similarity
            },
            index + 1,
            patientName
        ));
    }

    private async conditionLookup(condition: string, maxResults: number): Promise<ContextItem[]> {
        const searchQuery = `diagnóstico ${condition} enfermedad`;
        const candidates = await this.semanticSearch(searchQuery, maxResults * CONDITION_CANDIDATE_FACTOR);
        const needle = foldCase(condition);

        const byPatient = new Map<string, ContextItem>();
        for (const item of candidates) {
            if (!item.patientName || byPatient.has(item.patientName)) continue;

            const mentionsCondition = [item.diagnosis, item.symptoms, item.content]
                .some(field => field !== undefined && foldCase(field).includes(needle));

            if (mentionsCondition) {
                byPatient.set(item.patientName, item);
            }
        }

        const results = [...byPatient.values()].slice(0, maxResults);

        console.log('[RetrievalOrchestrator] Condition lookup:', {
            condition,
            candidates: candidates.length,
            uniquePatients: results.length
        });

        return results;
    }

    private async semanticSearch(searchQuery: string, k: number, filters?: MetadataFilters): Promise<ContextItem[]> {
        const embedding = await this.embedder.embed(searchQuery);
        const matches = await this.store.query(embedding, k, filters);

        const items: ContextItem[] = [];
        matches.forEach((match, index) => {
            const similarity = clamp(1 - match.distance);
            if (similarity >= this.config.similarityThreshold) {
                items.push(toContextItem({ content: match.content, metadata: match.metadata, similarity }, index + 1, searchQuery));
            }
        });

        return items;
    }
}

function toContextItem(match: ScoredMatch, retrievalRank: number, excerptQuery: string): ContextItem {
    return {
        conversationId: stringField(match.metadata, 'conversation_id') ?? 'unknown',
        patientName: stringField(match.metadata, 'patient_name'),
        diagnosis: stringField(match.metadata, 'diagnosis'),
        symptoms: stringField(match.metadata, 'symptoms'),
        date: stringField(match.metadata, 'conversation_date'),
        content: match.content,
        baseSimilarity: match.similarity,
        excerpt: createExcerpt(match.content, excerptQuery),
        retrievalRank
    };
}

function stringField(metadata: StoredMetadata, key: string): string | undefined {
    const value = metadata[key];
    if (value === null || value === undefined || value === '') return undefined;
    return String(value);
}

function foldCase(text: string): string {
    return stripAccents(text.toLowerCase());
}

function clamp(value: number): number {
    return Math.max(0, Math.min(value, 1));
}
