import { describe, it, expect } from 'vitest';
import { ChatPipelineError } from '../errors/ChatPipelineError.js';
import { FALLBACK_ANSWER, NO_CONTEXT_MESSAGE } from '../services/AnswerAssembler.js';
import {
    InMemoryStore,
    MARIA_RECORD,
    PEPITO_RECORD,
    buildChatService,
    createGenerator,
    type FakeRecord
} from './fakes.js';

function diabetic(id: string, patient: string, distance: number): FakeRecord {
    return {
        id,
        content: `${patient} refiere poliuria. Se confirma diabetes.`,
        metadata: { conversation_id: `conv-${id}`, patient_name: patient, diagnosis: 'diabetes mellitus' },
        distance
    };
}

describe('ChatService', () => {
    describe('processQuery', () => {
        it('answers a question about a named patient from that patient\'s conversations', async () => {
            const store = new InMemoryStore([MARIA_RECORD, PEPITO_RECORD]);
            const { generator } = createGenerator('Pepito Gómez tiene diabetes tipo 2.');
            const service = buildChatService(store, generator);

            const response = await service.processQuery('¿Qué enfermedad tiene Pepito Gómez?');

            expect(response.intent).toBe('patient_info');
            expect(response.answer).toBe('Pepito Gómez tiene diabetes tipo 2.');
            expect(response.sources).toHaveLength(1);
            expect(response.sources[0].patientName).toBe('Pepito Gómez');
            expect(response.sources[0].conversationId).toBe('conv-pepito');
            expect(response.confidence).toBeGreaterThanOrEqual(0.8);
            expect(response.confidence).toBe(0.95);
            expect(response.followUpSuggestions[0]).toBe('¿Qué tratamiento se recomendó para Pepito Gómez?');
            expect(response.queryClassification.autoFilters).toEqual({ patient_name: { $eq: 'Pepito Gómez' } });
            expect(response.processingTimeMs).toBeGreaterThanOrEqual(0);
        });

        it('lists each diabetic patient once', async () => {
            const store = new InMemoryStore([
                diabetic('1', 'Ana Ruiz', 0.1),
                diabetic('2', 'Ana Ruiz', 0.11),
                diabetic('3', 'Luis Mora', 0.12),
                diabetic('4', 'Carmen Vega', 0.14),
                { ...MARIA_RECORD, distance: 0.13 }
            ]);
            const service = buildChatService(store, createGenerator('Hay tres pacientes.').generator);

            const response = await service.processQuery('Listame los pacientes con diabetes');

            expect(response.intent).toBe('condition_list');
            expect(response.sources.map(source => source.patientName).sort()).toEqual(['Ana Ruiz', 'Carmen Vega', 'Luis Mora']);
            for (const source of response.sources) {
                expect(source.metadata.diagnosis).toContain('diabetes');
            }
        });

        it('reports minimum confidence and no sources when nothing matches', async () => {
            const { generator, generate } = createGenerator('No hay información.');
            const service = buildChatService(new InMemoryStore([]), generator);

            const response = await service.processQuery('El clima está bueno');

            expect(response.intent).toBe('general_query');
            expect(response.sources).toEqual([]);
            expect(response.confidence).toBe(0.1);
            expect(response.queryClassification.searchTerms).toEqual(['El clima está bueno']);
            expect(generate.mock.calls[0][0][1].content).toContain(NO_CONTEXT_MESSAGE);
        });

        it('keeps answering when the store is unreachable', async () => {
            const store = new InMemoryStore([PEPITO_RECORD]);
            store.failure = new Error('connection refused');
            const service = buildChatService(store, createGenerator('Sin datos.').generator);

            const response = await service.processQuery('¿Qué enfermedad tiene Pepito Gómez?');

            expect(response.sources).toEqual([]);
            expect(response.confidence).toBe(0.1);
            expect(response.answer).toBe('Sin datos.');
        });

        it('uses the fallback answer when the language model fails', async () => {
            const service = buildChatService(new InMemoryStore([PEPITO_RECORD]), createGenerator(new Error('timeout')).generator);

            const response = await service.processQuery('¿Qué enfermedad tiene Pepito Gómez?');

            expect(response.answer).toBe(FALLBACK_ANSWER);
            expect(response.confidence).toBe(0.1);
            expect(response.sources).toHaveLength(1);
        });

        it.each([0, 21, 2.5])('rejects maxResults=%s as a validation error', async maxResults => {
            const service = buildChatService(new InMemoryStore([]), createGenerator().generator);

            const failure = await service.processQuery('Listame los pacientes con asma', maxResults).catch((error: unknown) => error);

            expect(failure).toBeInstanceOf(ChatPipelineError);
            expect(failure).toMatchObject({ stage: 'validation' });
        });
    });

    describe('validateQuery', () => {
        const service = buildChatService(new InMemoryStore([]), createGenerator().generator);

        it.each(['', 'ab', '  a  '])('rejects the short query "%s"', query => {
            expect(service.validateQuery(query)).toEqual({
                valid: false,
                reason: 'Consulta demasiado corta (mínimo 3 caracteres)',
                suggestions: ['Intenta ser más específico en tu consulta']
            });
        });

        it('rejects queries over 1000 characters', () => {
            const result = service.validateQuery('a'.repeat(1001));

            expect(result.valid).toBe(false);
            expect(result.reason).toBe('Consulta demasiado larga (máximo 1000 caracteres)');
        });

        it('estimates the intent of a valid query', () => {
            expect(service.validateQuery('Listame los pacientes con diabetes')).toEqual({
                valid: true,
                suggestions: ['Tu consulta parece válida', 'Puedes proceder con la consulta completa'],
                estimatedIntent: 'condition_list'
            });
        });
    });
});
