import type { Server } from 'http';
import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { createApp } from '../app.js';
import { ChatPipelineError } from '../errors/ChatPipelineError.js';
import { InMemoryStore, MARIA_RECORD, PEPITO_RECORD, buildChatService, createGenerator } from './fakes.js';

const chatService = buildChatService(
    new InMemoryStore([MARIA_RECORD, PEPITO_RECORD]),
    createGenerator('Pepito Gómez tiene diabetes tipo 2.').generator
);

let server: Server;
let baseUrl: string;

beforeAll(async () => {
    server = createApp(chatService).listen(0, '127.0.0.1');
    await new Promise<void>(resolve => server.once('listening', () => resolve()));

    const address = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error('Test server has no TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
});

async function request(path: string, payload?: unknown) {
    const res = await fetch(`${baseUrl}${path}`, payload === undefined ? undefined : {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload)
    });
    return { status: res.status, body: JSON.parse(await res.text()) };
}

describe('chat routes', () => {
    it('reports health', async () => {
        const { status, body } = await request('/health');

        expect(status).toBe(200);
        expect(body).toMatchObject({ status: 'healthy', service: 'medrecall-chat-server' });
    });

    it('answers a chat query with snake_case fields', async () => {
        const { status, body } = await request('/api/v1/chat', { query: '¿Qué enfermedad tiene Pepito Gómez?' });

        expect(status).toBe(200);
        expect(body.intent).toBe('patient_info');
        expect(body.sources[0]).toMatchObject({
            conversation_id: 'conv-pepito',
            patient_name: 'Pepito Gómez',
            relevance_score: 1,
            date: '2024-03-12',
            metadata: { diagnosis: 'diabetes tipo 2', symptoms: null, rank: 1 }
        });
        expect(body.follow_up_suggestions).toHaveLength(3);
        expect(body.query_classification.auto_filters).toEqual({ patient_name: { $eq: 'Pepito Gómez' } });
        expect(body.confidence).toBe(0.95);
        expect(typeof body.processing_time_ms).toBe('number');
    });

    it('rejects queries that are blank after trimming', async () => {
        const { status, body } = await request('/api/v1/chat', { query: '  a  ' });

        expect(status).toBe(400);
        expect(body.error.message).toBe('La consulta debe tener al menos 3 caracteres');
    });

    it('rejects out-of-range max_results', async () => {
        const { status } = await request('/api/v1/chat', { query: 'Listame los pacientes con asma', max_results: 50 });

        expect(status).toBe(400);
    });

    it('enforces the quick endpoint limits', async () => {
        const { status } = await request('/api/v1/chat/quick', { query: 'ab' });

        expect(status).toBe(400);
    });

    it('maps pipeline failures to 500 with the failing stage', async () => {
        vi.spyOn(chatService, 'processQuery').mockRejectedValueOnce(new ChatPipelineError('assembly', 'boom'));

        const { status, body } = await request('/api/v1/chat/quick', { query: 'Pacientes con asma' });

        expect(status).toBe(500);
        expect(body.error).toEqual({
            message: 'Error procesando consulta médica: boom',
            type: 'pipeline_error',
            stage: 'assembly'
        });
    });

    it('lists example queries and supported intents', async () => {
        const { body } = await request('/api/v1/chat/examples');

        expect(body.examples.patient_info.examples[0]).toBe('¿Qué enfermedad tiene Pepito Gómez?');
        expect(body.supported_intents).toEqual([
            'patient_info',
            'condition_list',
            'symptom_search',
            'medication_info',
            'temporal_query',
            'general_query'
        ]);
        expect(body.tips).toHaveLength(4);
    });

    it('validates queries without running the pipeline', async () => {
        const { body: short } = await request('/api/v1/chat/validate', { query: 'hi' });
        const { body: valid } = await request('/api/v1/chat/validate', { query: 'Listame los pacientes con diabetes' });

        expect(short).toEqual({
            valid: false,
            reason: 'Consulta demasiado corta (mínimo 3 caracteres)',
            suggestions: ['Intenta ser más específico en tu consulta']
        });
        expect(valid).toMatchObject({ valid: true, estimated_intent: 'condition_list' });
    });
});
