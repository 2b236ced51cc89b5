import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import type {
    MetadataFilters,
    SemanticStore,
    StoreMatch,
    StoredMetadata,
    StoredMetadataValue,
    StoredRecord
} from '../types/capabilities.js';

export interface QdrantConfig {
    baseUrl: string;
    apiKey?: string;
    collectionName: string;
    /** Payload field that holds the stored conversation text. */
    contentField?: string;
}

interface QdrantCondition {
    key: string;
    match: { value: string | number | boolean } | { text: string };
}

export interface QdrantFilter {
    must: QdrantCondition[];
}

const pointIdSchema = z.union([z.string(), z.number()]);
const payloadSchema = z.record(z.unknown()).nullish();

const searchResponseSchema = z.object({
    result: z.array(z.object({
        id: pointIdSchema,
        score: z.number(),
        payload: payloadSchema
    }))
});

const scrollResponseSchema = z.object({
    result: z.object({
        points: z.array(z.object({
            id: pointIdSchema,
            payload: payloadSchema
        })),
        next_page_offset: pointIdSchema.nullish()
    })
});

const SCROLL_PAGE_SIZE = 256;

export class QdrantClient implements SemanticStore {
    private client: AxiosInstance;
    private config: QdrantConfig;
    private contentField: string;

    constructor(config: QdrantConfig, client?: AxiosInstance) {
        this.config = config;
        this.contentField = config.contentField ?? 'content';
        this.client = client ?? axios.create({
            baseURL: config.baseUrl,
            headers: this.getQdrantHeaders()
        });
    }

    private getQdrantHeaders(): Record<string, string> {
        const headers: Record<string, string> = { 'Content-Type': 'application/json' };
        if (this.config.apiKey) {
            headers['api-key'] = this.config.apiKey;
        }
        return headers;
    }

    async query(embedding: number[], k: number, filters?: MetadataFilters): Promise<StoreMatch[]> {
        if (embedding.length === 0) {
            throw new Error('[QdrantClient] query embedding must not be empty');
        }

        try {
            const response = await this.client.post(`/collections/${this.config.collectionName}/points/search`, {
                vector: embedding,
                limit: k,
                with_payload: true,
                ...(filters && { filter: toQdrantFilter(filters) })
            });

            const parsed = searchResponseSchema.parse(response.data);

            return parsed.result.map(point => {
                const { content, metadata } = this.splitPayload(point.payload);
                return { content, metadata, distance: 1 - point.score };
            });
        } catch (error) {
            console.error('[QdrantClient] Error searching collection:', error);
            throw new Error('[QdrantClient] Search request failed', { cause: error });
        }
    }

    async get(filters?: MetadataFilters, limit?: number): Promise<StoredRecord[]> {
        const records: StoredRecord[] = [];
        let offset: string | number | null | undefined = undefined;

        try {
            do {
                const pageSize = limit === undefined
                    ? SCROLL_PAGE_SIZE
                    : Math.min(SCROLL_PAGE_SIZE, limit - records.length);

                const response = await this.client.post(`/collections/${this.config.collectionName}/points/scroll`, {
                    limit: pageSize,
                    with_payload: true,
                    with_vector: false,
                    ...(filters && { filter: toQdrantFilter(filters) }),
                    ...(offset !== undefined && offset !== null && { offset })
                });

                const parsed = scrollResponseSchema.parse(response.data);

                for (const point of parsed.result.points) {
                    const { content, metadata } = this.splitPayload(point.payload);
                    records.push({ id: String(point.id), metadata, content });
                }

                offset = parsed.result.next_page_offset;
            } while (offset !== undefined && offset !== null && (limit === undefined || records.length < limit));

            console.log('[QdrantClient] Scrolled', records.length, 'records');
            return records;
        } catch (error) {
            console.error('[QdrantClient] Error scrolling collection:', error);
            throw new Error('[QdrantClient] Scroll request failed', { cause: error });
        }
    }

    private splitPayload(payload: Record<string, unknown> | null | undefined): { content: string; metadata: StoredMetadata } {
        const metadata: StoredMetadata = {};
        let content = '';

        for (const [key, value] of Object.entries(payload ?? {})) {
            if (key === this.contentField) {
                content = typeof value === 'string' ? value : '';
                continue;
            }
            metadata[key] = toMetadataValue(value);
        }

        return { content, metadata };
    }
}

export function toQdrantFilter(filters: MetadataFilters): QdrantFilter {
    const must = Object.entries(filters).map(([key, condition]): QdrantCondition => {
        if (typeof condition === 'object') {
            if ('$contains' in condition) {
                return { key, match: { text: condition.$contains } };
            }
            return { key, match: { value: condition.$eq } };
        }
        return { key, match: { value: condition } };
    });

    return { must };
}

function toMetadataValue(value: unknown): StoredMetadataValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }
    if (Array.isArray(value)) {
        return value.map(item => String(item)).join(', ');
    }
    return JSON.stringify(value);
}
