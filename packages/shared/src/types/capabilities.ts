export type MessageRole = 'system' | 'user' | 'assistant';

export interface Message {
    role: MessageRole;
    content: string;
}

export type FilterLiteral = string | number | boolean;

export type FilterCondition =
    | FilterLiteral
    | { $eq: FilterLiteral }
    | { $contains: string };

/** Keyed by stored metadata field, e.g. `patient_name` or `diagnosis`. */
export type MetadataFilters = Record<string, FilterCondition>;

export type StoredMetadataValue = string | number | boolean | null;

export type StoredMetadata = Record<string, StoredMetadataValue>;

export interface StoreMatch {
    content: string;
    metadata: StoredMetadata;
    /** Cosine distance; `1 - distance` is the similarity. */
    distance: number;
}

export interface StoredRecord {
    id: string;
    metadata: StoredMetadata;
    content: string;
}

export interface SemanticStore {
    query(embedding: number[], k: number, filters?: MetadataFilters): Promise<StoreMatch[]>;
    get(filters?: MetadataFilters, limit?: number): Promise<StoredRecord[]>;
}

export interface EmbeddingProvider {
    embed(text: string): Promise<number[]>;
}

export interface TextGenerator {
    generate(messages: Message[]): Promise<string>;
}
