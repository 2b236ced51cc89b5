export * from './types/capabilities.js';
export * from './clients/OpenAIClient.js';
export * from './clients/QdrantClient.js';
export * from './services/EmbeddingService.js';
