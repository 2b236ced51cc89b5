import { Router, Request, Response } from 'express';
import { readFileSync } from 'fs';
import { z } from 'zod';
import type { MetadataFilters } from '@medrecall/shared';
import type { ChatService } from '../services/ChatService.js';
import type { ChatResponse, ChatSource, QueryValidation } from '../types/ChatTypes.js';
import { INTENTS } from '../types/ChatTypes.js';
import { ChatPipelineError } from '../errors/ChatPipelineError.js';

const filterLiteral = z.union([z.string(), z.number(), z.boolean()]);

const filtersSchema: z.ZodType<MetadataFilters> = z.record(z.union([
    filterLiteral,
    z.object({ $eq: filterLiteral }),
    z.object({ $contains: z.string() })
]));

const chatRequestSchema = z.object({
    query: z.string().min(1).max(1000),
    max_results: z.number().int().min(1).max(20).default(5),
    filters: filtersSchema.optional()
});

const quickChatRequestSchema = z.object({
    query: z.string().min(3).max(500),
    max_results: z.number().int().min(1).max(10).default(3)
});

const validateRequestSchema = z.object({
    query: z.string()
});

const examplesSchema = z.object({
    examples: z.record(z.object({
        description: z.string(),
        examples: z.array(z.string())
    })),
    tips: z.array(z.string())
});

export type ChatExamples = z.infer<typeof examplesSchema>;

const EXAMPLES_URL = new URL('../data/chat-examples.json', import.meta.url);

export function loadChatExamples(location: URL = EXAMPLES_URL): ChatExamples {
    return examplesSchema.parse(JSON.parse(readFileSync(location, 'utf-8')));
}

export function ChatRouter(chatService: ChatService): Router {
    const router = Router();
    const examples = loadChatExamples();

    const answer = async (res: Response, query: string, maxResults: number, filters?: MetadataFilters) => {
        try {
            const response = await chatService.processQuery(query, maxResults, filters);
            res.status(200).json(toWireResponse(response));
        } catch (error) {
            sendPipelineError(res, error);
        }
    };

    router.post('/api/v1/chat', async (req: Request, res: Response) => {
        const parsed = chatRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            sendInvalidRequest(res, parsed.error);
            return;
        }

        const { query, max_results, filters } = parsed.data;

        if (query.trim().length < 3) {
            res.status(400).json({
                error: {
                    message: 'La consulta debe tener al menos 3 caracteres',
                    type: 'invalid_request_error'
                }
            });
            return;
        }

        console.log('[Chat Route] Chat query received:', {
            query: query.substring(0, 100),
            maxResults: max_results,
            hasFilters: filters !== undefined
        });

        await answer(res, query, max_results, filters);
    });

    router.post('/api/v1/chat/quick', async (req: Request, res: Response) => {
        const parsed = quickChatRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            sendInvalidRequest(res, parsed.error);
            return;
        }

        console.log('[Chat Route] Quick chat query received:', { query: parsed.data.query.substring(0, 100) });

        await answer(res, parsed.data.query, parsed.data.max_results);
    });

    router.get('/api/v1/chat/examples', (req: Request, res: Response) => {
        res.status(200).json({
            ...examples,
            supported_intents: INTENTS
        });
    });

    router.post('/api/v1/chat/validate', (req: Request, res: Response) => {
        const parsed = validateRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            sendInvalidRequest(res, parsed.error);
            return;
        }

        res.status(200).json(toWireValidation(chatService.validateQuery(parsed.data.query)));
    });

    return router;
}

function sendInvalidRequest(res: Response, error: z.ZodError): void {
    res.status(400).json({
        error: {
            message: error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '),
            type: 'invalid_request_error'
        }
    });
}

function sendPipelineError(res: Response, error: unknown): void {
    if (error instanceof ChatPipelineError) {
        console.error('[Chat Route] Pipeline error:', { stage: error.stage, message: error.message });
        res.status(error.isClientError ? 400 : 500).json({
            error: {
                message: error.isClientError
                    ? `Parámetros de consulta inválidos: ${error.message}`
                    : `Error procesando consulta médica: ${error.message}`,
                type: error.isClientError ? 'invalid_request_error' : 'pipeline_error',
                stage: error.stage
            }
        });
        return;
    }

    console.error('[Chat Route] Unexpected error:', error);
    res.status(500).json({
        error: {
            message: 'Error interno del servidor. Por favor intenta de nuevo.',
            type: 'internal_error'
        }
    });
}

function toWireSource(source: ChatSource) {
    return {
        conversation_id: source.conversationId,
        patient_name: source.patientName ?? null,
        relevance_score: source.relevanceScore,
        excerpt: source.excerpt,
        date: source.date ?? null,
        metadata: {
            diagnosis: source.metadata.diagnosis ?? null,
            symptoms: source.metadata.symptoms ?? null,
            rank: source.metadata.rank
        }
    };
}

export function toWireResponse(response: ChatResponse) {
    const { queryClassification } = response;

    return {
        answer: response.answer,
        sources: response.sources.map(toWireSource),
        confidence: response.confidence,
        intent: response.intent,
        follow_up_suggestions: response.followUpSuggestions,
        query_classification: {
            entities: queryClassification.entities,
            search_terms: queryClassification.searchTerms,
            normalized_query: queryClassification.normalizedQuery,
            auto_filters: queryClassification.autoFilters
        },
        processing_time_ms: response.processingTimeMs
    };
}

function toWireValidation(validation: QueryValidation) {
    return {
        valid: validation.valid,
        ...(validation.reason !== undefined && { reason: validation.reason }),
        ...(validation.estimatedIntent !== undefined && { estimated_intent: validation.estimatedIntent }),
        suggestions: validation.suggestions
    };
}
