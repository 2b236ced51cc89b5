import { AnswerPrompt, type AnswerPromptInput } from './AnswerPrompt.js';

export class GeneralAnswerPrompt extends AnswerPrompt {
    protected readonly instructions = `
        INSTRUCCIONES:
        - Mantén un enfoque médico profesional pero accesible
        - Proporciona respuestas estructuradas y claras
        ${this.groundingRules}
    `.trim();

    build(input: AnswerPromptInput): string {
        return [
            'Basándote en la información médica proporcionada, responde la consulta médica de manera precisa y responsable.',
            this.buildContextSection(input.context),
            `CONSULTA: ${input.query}\nENTIDADES DETECTADAS: ${this.describeEntities(input.entities)}`,
            this.instructions,
            'RESPUESTA:'
        ].join('\n\n');
    }
}
