export type PipelineStage =
    | 'validation'
    | 'analysis'
    | 'retrieval'
    | 'ranking'
    | 'assembly'
    | 'pipeline';

/**
 * Raised when a query cannot be answered at all. Stages that degrade
 * (analysis, retrieval, generation) normally recover on their own, so this
 * only surfaces for invalid input or unexpected failures.
 */
export class ChatPipelineError extends Error {
    readonly stage: PipelineStage;

    constructor(stage: PipelineStage, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ChatPipelineError';
        this.stage = stage;
    }

    get isClientError(): boolean {
        return this.stage === 'validation';
    }

    static wrap(stage: PipelineStage, error: unknown): ChatPipelineError {
        if (error instanceof ChatPipelineError) {
            return error;
        }
        const detail = error instanceof Error ? error.message : String(error);
        return new ChatPipelineError(stage, `Error procesando consulta: ${detail}`, { cause: error });
    }
}
