import { ENTITY_CATEGORIES, type EntitySet } from '../types/ChatTypes.js';

export interface AnswerPromptInput {
    query: string;
    context: string;
    entities: EntitySet;
}

export abstract class AnswerPrompt {
    readonly systemInstruction = 'Eres un asistente médico especializado en consultar información de expedientes médicos.';

    protected readonly groundingRules = `
        - Responde basándote ÚNICAMENTE en la información proporcionada
        - NUNCA inventes información médica
        - Si la información es insuficiente, indícalo claramente
        - Sugiere consultar al médico para decisiones críticas
    `.trim();

    protected buildContextSection(context: string): string {
        return `INFORMACIÓN MÉDICA DISPONIBLE:\n${context}`;
    }

    protected describeEntities(entities: EntitySet): string {
        const parts = ENTITY_CATEGORIES
            .filter(category => entities[category].length > 0)
            .map(category => `${category}: ${entities[category].join(', ')}`);
        return parts.length > 0 ? parts.join(', ') : 'ninguna';
    }

    abstract build(input: AnswerPromptInput): string;
}
