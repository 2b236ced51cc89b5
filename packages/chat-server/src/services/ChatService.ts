import type { MetadataFilters } from '@medrecall/shared';
import type { ChatResponse, QueryValidation } from '../types/ChatTypes.js';
import type { QueryAnalyzer } from './QueryAnalyzer.js';
import type { CompiledChatPipeline } from '../graphs/ChatPipelineGraph.js';
import { ChatPipelineError } from '../errors/ChatPipelineError.js';

export const MIN_QUERY_LENGTH = 3;
export const MAX_QUERY_LENGTH = 1000;
export const MIN_RESULTS = 1;
export const MAX_RESULTS = 20;
export const DEFAULT_MAX_RESULTS = 5;


/**
 * Entry point for callers of the retrieval pipeline. Wraps the compiled
 * graph and exposes query validation.
 */
export class ChatService {
    private pipeline: CompiledChatPipeline;
    private analyzer: QueryAnalyzer;

    constructor(pipeline: CompiledChatPipeline, analyzer: QueryAnalyzer) {
        this.pipeline = pipeline;
        this.analyzer = analyzer;
    }

    async processQuery(
        queryText: string,
        maxResults: number = DEFAULT_MAX_RESULTS,
        userFilters?: MetadataFilters
    ): Promise<ChatResponse> {
        const startedAt = Date.now();

        if (!Number.isInteger(maxResults) || maxResults < MIN_RESULTS || maxResults > MAX_RESULTS) {
            throw new ChatPipelineError(
                'validation',
                `maxResults debe ser un entero entre ${MIN_RESULTS} y ${MAX_RESULTS}`
            );
        }

        console.log('[ChatService] Processing query:', {
            query: queryText.substring(0, 100),
            maxResults,
            hasUserFilters: userFilters !== undefined
        });

        try {
            const finalState = await this.pipeline.invoke({
                query: queryText,
                maxResults,
                userFilters,
                startedAt
            });

            if (!finalState.response) {
                throw new ChatPipelineError('pipeline', 'Pipeline finished without a response');
            }

            console.log('[ChatService] Query processed:', {
                intent: finalState.response.intent,
                sourcesCount: finalState.response.sources.length,
                confidence: finalState.response.confidence,
                processingTimeMs: finalState.response.processingTimeMs
            });

            return finalState.response;
        } catch (error) {
            console.error('[ChatService] Error processing query:', error);
            throw ChatPipelineError.wrap('pipeline', error);
        }
    }

    validateQuery(queryText: string): QueryValidation {
        const trimmed = queryText.trim();

        if (trimmed.length < MIN_QUERY_LENGTH) {
            return {
                valid: false,
                reason: `Consulta demasiado corta (mínimo ${MIN_QUERY_LENGTH} caracteres)`,
                suggestions: ['Intenta ser más específico en tu consulta']
            };
        }

        if (trimmed.length > MAX_QUERY_LENGTH) {
            return {
                valid: false,
                reason: `Consulta demasiado larga (máximo ${MAX_QUERY_LENGTH} caracteres)`,
                suggestions: ['Intenta ser más conciso en tu consulta']
            };
        }

        return {
            valid: true,
            suggestions: ['Tu consulta parece válida', 'Puedes proceder con la consulta completa'],
            estimatedIntent: this.analyzer.analyze(trimmed).intent
        };
    }
}
