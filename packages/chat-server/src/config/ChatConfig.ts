import { z } from 'zod';

const numberWithDefault = (fallback: number) => z.coerce.number().default(fallback);

const ChatEnvSchema = z.object({
    OPENAI_API_KEY: z.string().min(1),
    OPENAI_BASE_URL: z.string().url().optional(),
    OPENAI_CHAT_MODEL: z.string().min(1).default('gpt-4o'),
    OPENAI_EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
    OPENAI_TEMPERATURE: numberWithDefault(0.3).pipe(z.number().min(0).max(2)),
    QDRANT_URL: z.string().url(),
    QDRANT_API_KEY: z.string().min(1).optional(),
    QDRANT_COLLECTION: z.string().min(1).default('medical_conversations'),
    CHAT_PORT: numberWithDefault(3001).pipe(z.number().int().min(0).max(65535)),
    RAG_SIMILARITY_THRESHOLD: numberWithDefault(0.6).pipe(z.number().min(0).max(1)),
    RAG_PATIENT_MATCH_THRESHOLD: numberWithDefault(0.3).pipe(z.number().min(0).max(1))
});

export interface ChatConfig {
    port: number;
    openai: {
        apiKey: string;
        baseUrl?: string;
        chatModel: string;
        embeddingModel: string;
        temperature: number;
    };
    qdrant: {
        baseUrl: string;
        apiKey?: string;
        collectionName: string;
    };
    retrieval: {
        similarityThreshold: number;
        patientMatchThreshold: number;
    };
}

// Blank values in a .env file count as unset.
function dropBlank(env: NodeJS.ProcessEnv): Record<string, string> {
    const cleaned: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') {
            cleaned[key] = value.trim();
        }
    }
    return cleaned;
}

export function loadChatConfig(env: NodeJS.ProcessEnv = process.env): ChatConfig {
    const parsed = ChatEnvSchema.safeParse(dropBlank(env));

    if (!parsed.success) {
        const problems = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`[ChatConfig] Invalid environment: ${problems}`);
    }

    const vars = parsed.data;

    return {
        port: vars.CHAT_PORT,
        openai: {
            apiKey: vars.OPENAI_API_KEY,
            baseUrl: vars.OPENAI_BASE_URL,
            chatModel: vars.OPENAI_CHAT_MODEL,
            embeddingModel: vars.OPENAI_EMBEDDING_MODEL,
            temperature: vars.OPENAI_TEMPERATURE
        },
        qdrant: {
            baseUrl: vars.QDRANT_URL,
            apiKey: vars.QDRANT_API_KEY,
            collectionName: vars.QDRANT_COLLECTION
        },
        retrieval: {
            similarityThreshold: vars.RAG_SIMILARITY_THRESHOLD,
            patientMatchThreshold: vars.RAG_PATIENT_MATCH_THRESHOLD
        }
    };
}
