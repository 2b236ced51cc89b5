import { AnswerPrompt, type AnswerPromptInput } from './AnswerPrompt.js';

export class PatientInfoPrompt extends AnswerPrompt {
    protected readonly instructions = `
        INSTRUCCIONES CRÍTICAS:
        - Responde SOLO con información que esté explícitamente en el contexto
        - Usa terminología médica apropiada pero accesible
        - Incluye fechas y detalles relevantes cuando estén disponibles
        ${this.groundingRules}
    `.trim();

    build(input: AnswerPromptInput): string {
        return [
            'Basándote ÚNICAMENTE en la información médica proporcionada, responde la siguiente consulta sobre un paciente específico.',
            this.buildContextSection(input.context),
            `CONSULTA: ${input.query}`,
            this.instructions,
            'RESPUESTA:'
        ].join('\n\n');
    }
}
