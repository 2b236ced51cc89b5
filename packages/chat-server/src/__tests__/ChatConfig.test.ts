import { describe, it, expect } from 'vitest';
import { loadChatConfig } from '../config/ChatConfig.js';

const required = {
    OPENAI_API_KEY: 'test-openai-key',
    QDRANT_URL: 'http://localhost:6333'
};

describe('loadChatConfig', () => {
    it('fills defaults around the required variables', () => {
        expect(loadChatConfig(required)).toEqual({
            port: 3001,
            openai: {
                apiKey: 'test-openai-key',
                baseUrl: undefined,
                chatModel: 'gpt-4o',
                embeddingModel: 'text-embedding-3-small',
                temperature: 0.3
            },
            qdrant: {
                baseUrl: 'http://localhost:6333',
                apiKey: undefined,
                collectionName: 'medical_conversations'
            },
            retrieval: {
                similarityThreshold: 0.6,
                patientMatchThreshold: 0.3
            }
        });
    });

    it('parses numeric overrides and treats blank values as unset', () => {
        const config = loadChatConfig({
            ...required,
            CHAT_PORT: '4000',
            RAG_SIMILARITY_THRESHOLD: '0.75',
            QDRANT_API_KEY: 'test-secret',
            OPENAI_BASE_URL: '  '
        });

        expect(config.port).toBe(4000);
        expect(config.retrieval.similarityThreshold).toBe(0.75);
        expect(config.qdrant.apiKey).toBe('test-secret');
        expect(config.openai.baseUrl).toBeUndefined();
    });

    it('names the missing variables', () => {
        expect(() => loadChatConfig({})).toThrow(/OPENAI_API_KEY.*QDRANT_URL/);
    });

    it('rejects thresholds outside [0, 1]', () => {
        expect(() => loadChatConfig({ ...required, RAG_PATIENT_MATCH_THRESHOLD: '1.5' }))
            .toThrow(/RAG_PATIENT_MATCH_THRESHOLD/);
    });
});
