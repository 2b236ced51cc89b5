import type { TextGenerator } from '@medrecall/shared';
import type {
    ChatResponse,
    ChatSource,
    Degradable,
    Intent,
    QueryAnalysis,
    RankedContext
} from '../types/ChatTypes.js';
import type { AnswerPrompt } from '../prompts/AnswerPrompt.js';
import { PatientInfoPrompt } from '../prompts/PatientInfoPrompt.js';
import { ConditionListPrompt } from '../prompts/ConditionListPrompt.js';
import { GeneralAnswerPrompt } from '../prompts/GeneralAnswerPrompt.js';
import { stripAccents, truncate } from '../utils/text.js';

export const NO_CONTEXT_MESSAGE = 'No se encontró información relevante en las conversaciones médicas.';
export const TRUNCATION_MARKER = '\n\n[Contexto truncado...]';
export const FALLBACK_ANSWER = 'Lo siento, no pude procesar tu consulta en este momento. Por favor, intenta reformular tu pregunta o consulta directamente con el personal médico.';
export const MEDICAL_DISCLAIMER = '\n\n⚠️ Esta información proviene de conversaciones registradas. Para decisiones médicas, consulte siempre con un profesional de la salud.';

const MEDICAL_KEYWORDS = ['diagnóstico', 'medicamento', 'tratamiento', 'enfermedad'].map(stripAccents);

const MAX_CONTEXT_ITEMS = 5;
const MAX_CONTENT_PER_ITEM = 500;
const MAX_CONTEXT_LENGTH = 4000;
const MAX_ANSWER_LENGTH = 2000;
const MAX_SOURCES = 5;
const MAX_EXCERPT_LENGTH = 200;
const MAX_FOLLOW_UPS = 3;

const EMPTY_CONFIDENCE = 0.1;
const MAX_CONFIDENCE = 0.95;
const ENTITY_CONFIDENCE_BONUS = 0.1;
const CONFIDENCE_PER_SOURCE = 0.05;
const MAX_SOURCE_CONFIDENCE_BONUS = 0.2;

export interface AnswerPrompts {
    patientInfo: AnswerPrompt;
    conditionList: AnswerPrompt;
    general: AnswerPrompt;
}

export class AnswerAssembler {
    private generator: TextGenerator;
    private prompts: AnswerPrompts;

    constructor(generator: TextGenerator, prompts?: Partial<AnswerPrompts>) {
        this.generator = generator;
        this.prompts = {
            patientInfo: prompts?.patientInfo ?? new PatientInfoPrompt(),
            conditionList: prompts?.conditionList ?? new ConditionListPrompt(),
            general: prompts?.general ?? new GeneralAnswerPrompt()
        };
    }

    async assemble(ranked: readonly RankedContext[], analysis: QueryAnalysis, startedAt: number = Date.now()): Promise<ChatResponse> {
        const context = this.buildContext(ranked);
        const generation = await this.generateAnswer(analysis, context);

        if (!generation.ok) {
            console.error('[AnswerAssembler] Answer generation failed, using fallback answer:', generation.error);
        }

        const response: ChatResponse = {
            answer: generation.value,
            sources: this.prepareSources(ranked),
            confidence: generation.ok ? this.calculateConfidence(ranked, analysis) : EMPTY_CONFIDENCE,
            intent: analysis.intent,
            followUpSuggestions: this.suggestFollowUps(analysis),
            queryClassification: {
                entities: analysis.entities,
                searchTerms: analysis.searchTerms,
                normalizedQuery: analysis.normalizedQuery,
                autoFilters: analysis.autoFilters
            },
            processingTimeMs: Date.now() - startedAt
        };

        console.log('[AnswerAssembler] Response assembled:', {
            intent: response.intent,
            sourcesCount: response.sources.length,
            confidence: response.confidence,
            contextLength: context.length
        });

        return Object.freeze(response);
    }

    buildContext(ranked: readonly RankedContext[]): string {
        if (ranked.length === 0) {
            return NO_CONTEXT_MESSAGE;
        }

        const blocks = ranked.slice(0, MAX_CONTEXT_ITEMS).map((item, index) => [
            `CONVERSACIÓN ${index + 1}:`,
            `Paciente: ${item.patientName ?? 'Paciente no identificado'}`,
            `Fecha: ${item.date ?? 'Fecha no disponible'}`,
            `Relevancia: ${item.finalScore.toFixed(2)}`,
            `Contenido: ${truncate(item.content, MAX_CONTENT_PER_ITEM)}`
        ].join('\n'));

        const context = blocks.join('\n\n');

        return context.length > MAX_CONTEXT_LENGTH
            ? context.substring(0, MAX_CONTEXT_LENGTH) + TRUNCATION_MARKER
            : context;
    }

    selectPrompt(intent: Intent): AnswerPrompt {
        switch (intent) {
            case 'patient_info':
                return this.prompts.patientInfo;
            case 'condition_list':
                return this.prompts.conditionList;
            default:
                return this.prompts.general;
        }
    }

    async generateAnswer(analysis: QueryAnalysis, context: string): Promise<Degradable<string>> {
        const prompt = this.selectPrompt(analysis.intent);

        try {
            const raw = await this.generator.generate([
                { role: 'system', content: prompt.systemInstruction },
                {
                    role: 'user',
                    content: prompt.build({
                        query: analysis.originalQuery,
                        context,
                        entities: analysis.entities
                    })
                }
            ]);

            return { ok: true, value: this.validateAnswer(raw) };
        } catch (error) {
            return { ok: false, value: FALLBACK_ANSWER, error };
        }
    }

    validateAnswer(answer: string): string {
        let cleaned = answer.trim();

        const folded = stripAccents(cleaned.toLowerCase());
        if (MEDICAL_KEYWORDS.some(keyword => folded.includes(keyword))) {
            cleaned += MEDICAL_DISCLAIMER;
        }

        if (cleaned.length > MAX_ANSWER_LENGTH) {
            cleaned = cleaned.substring(0, MAX_ANSWER_LENGTH - 3) + '...';
        }

        return cleaned;
    }

    calculateConfidence(ranked: readonly RankedContext[], analysis: QueryAnalysis): number {
        if (ranked.length === 0) {
            return EMPTY_CONFIDENCE;
        }

        const top = ranked.slice(0, 3);
        const averageScore = top.reduce((total, item) => total + item.finalScore, 0) / top.length;

        const { patients, conditions } = analysis.entities;
        const entityBonus = patients.length > 0 || conditions.length > 0 ? ENTITY_CONFIDENCE_BONUS : 0;
        const sourceBonus = Math.min(ranked.length * CONFIDENCE_PER_SOURCE, MAX_SOURCE_CONFIDENCE_BONUS);

        const confidence = Math.min(averageScore + entityBonus + sourceBonus, MAX_CONFIDENCE);

        return Math.round(confidence * 100) / 100;
    }

    prepareSources(ranked: readonly RankedContext[]): ChatSource[] {
        return ranked.slice(0, MAX_SOURCES).map(item => ({
            conversationId: item.conversationId,
            patientName: item.patientName,
            relevanceScore: item.finalScore,
            excerpt: (item.excerpt || item.content).substring(0, MAX_EXCERPT_LENGTH),
            date: item.date,
            metadata: {
                diagnosis: item.diagnosis,
                symptoms: item.symptoms,
                rank: item.retrievalRank
            }
        }));
    }

    suggestFollowUps(analysis: QueryAnalysis): string[] {
        const [patient] = analysis.entities.patients;
        const [condition] = analysis.entities.conditions;

        let suggestions: string[];

        if (analysis.intent === 'patient_info' && patient) {
            suggestions = [
                `¿Qué tratamiento se recomendó para ${patient}?`,
                `¿Cuándo fue la última consulta de ${patient}?`,
                `¿Qué síntomas reportó ${patient}?`
            ];
        } else if (analysis.intent === 'condition_list' && condition) {
            suggestions = [
                `¿Qué tratamientos hay para ${condition}?`,
                `¿Cuántos pacientes nuevos con ${condition} hay este mes?`,
                `¿Qué síntomas son más comunes en ${condition}?`
            ];
        } else {
            suggestions = [
                '¿Puedes mostrarme información de un paciente específico?',
                '¿Qué pacientes tienen una condición particular?',
                '¿Cuáles son los síntomas más reportados?'
            ];
        }

        return suggestions.slice(0, MAX_FOLLOW_UPS);
    }
}
