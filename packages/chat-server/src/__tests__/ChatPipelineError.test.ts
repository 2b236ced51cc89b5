import { describe, it, expect } from 'vitest';
import { ChatPipelineError } from '../errors/ChatPipelineError.js';

describe('ChatPipelineError', () => {
    it('wraps unknown failures with the stage and cause', () => {
        const cause = new Error('socket hang up');

        const error = ChatPipelineError.wrap('retrieval', cause);

        expect(error.stage).toBe('retrieval');
        expect(error.message).toBe('Error procesando consulta: socket hang up');
        expect(error.cause).toBe(cause);
        expect(error.isClientError).toBe(false);
    });

    it('passes existing pipeline errors through unchanged', () => {
        const original = new ChatPipelineError('validation', 'maxResults fuera de rango');

        expect(ChatPipelineError.wrap('pipeline', original)).toBe(original);
        expect(original.isClientError).toBe(true);
    });
});
