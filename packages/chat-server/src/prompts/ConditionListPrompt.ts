import { AnswerPrompt, type AnswerPromptInput } from './AnswerPrompt.js';

export class ConditionListPrompt extends AnswerPrompt {
    protected readonly instructions = `
        INSTRUCCIONES:
        - Lista SOLO pacientes que aparezcan en la información proporcionada
        - Incluye información relevante de cada paciente (diagnóstico, fecha, síntomas)
        - Organiza la lista de manera clara y estructurada
        - Indica el número total de pacientes encontrados
        - Si no hay pacientes que cumplan el criterio, indícalo claramente
        ${this.groundingRules}
    `.trim();

    build(input: AnswerPromptInput): string {
        return [
            'Basándote en la información médica proporcionada, genera una lista de pacientes que cumplen con el criterio solicitado.',
            this.buildContextSection(input.context),
            `CONSULTA: ${input.query}`,
            this.instructions,
            'RESPUESTA:'
        ].join('\n\n');
    }
}
