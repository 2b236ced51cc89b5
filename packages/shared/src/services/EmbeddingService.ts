import type { OpenAIClient } from '../clients/OpenAIClient.js';
import type { EmbeddingProvider } from '../types/capabilities.js';

export type EmbeddingBackend = Pick<OpenAIClient, 'generateEmbeddings'>;

export interface EmbeddingOptions {
    maxInputLength?: number;  // default: 8000
}

export interface EmbeddingResult {
    embedding: number[];
    preparedText: string;
}

export class EmbeddingService implements EmbeddingProvider {
    private openAIClient: EmbeddingBackend;
    private maxInputLength: number;

    constructor(openAIClient: EmbeddingBackend, options?: EmbeddingOptions) {
        this.openAIClient = openAIClient;
        this.maxInputLength = options?.maxInputLength ?? 8000;
    }

    async embed(text: string): Promise<number[]> {
        const result = await this.generateEmbedding(text);
        return result.embedding;
    }

    async generateEmbedding(text: string): Promise<EmbeddingResult> {
        const preparedText = this.prepareText(text);

        if (preparedText.length === 0) {
            throw new Error('[EmbeddingService] Cannot embed empty text');
        }

        console.log('[EmbeddingService] Generating embedding:', preparedText.substring(0, 50));

        const embedding = await this.openAIClient.generateEmbeddings(preparedText);

        return { embedding, preparedText };
    }

    private prepareText(text: string): string {
        const collapsed = text.replace(/\s+/g, ' ').trim();
        return collapsed.length > this.maxInputLength
            ? collapsed.substring(0, this.maxInputLength)
            : collapsed;
    }
}
