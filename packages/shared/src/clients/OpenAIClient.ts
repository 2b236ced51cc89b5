import OpenAI from 'openai';
import type { Message, TextGenerator } from '../types/capabilities.js';

export interface OpenAIConfigs {
    apiKey: string;
    baseUrl?: string;
    chatModel?: string;
    embeddingModel?: string;
    temperature?: number;
}

export interface ChatCompletionRequest {
    messages: Message[];
    max_tokens?: number;
}

export class OpenAIClient implements TextGenerator {
    private openai: OpenAI;
    private chatModel: string;
    private embeddingModel: string;
    private temperature: number;

    constructor(configs: OpenAIConfigs, openai?: OpenAI) {
        this.openai = openai ?? new OpenAI({
            apiKey: configs.apiKey,
            baseURL: configs.baseUrl
        });
        this.chatModel = configs.chatModel ?? 'gpt-4o';
        this.embeddingModel = configs.embeddingModel ?? 'text-embedding-3-small';
        this.temperature = configs.temperature ?? 0.3;
    }

    async generalGPTCall(request: ChatCompletionRequest): Promise<OpenAI.Chat.Completions.ChatCompletion> {
        try {
            const oaiRequest: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
                messages: request.messages.map(message => this.toCompletionMessage(message)),
                model: this.chatModel,
                temperature: this.temperature,
                stream: false,
                ...(request.max_tokens !== undefined ? { max_tokens: request.max_tokens } : {})
            };

            return await this.openai.chat.completions.create(oaiRequest);
        } catch (error) {
            console.error('[OpenAI] Failed general task:', error);
            throw new Error('[OpenAI] Call to api with general prompt failed', { cause: error });
        }
    }

    async generate(messages: Message[]): Promise<string> {
        const completion = await this.generalGPTCall({ messages, max_tokens: 1000 });
        const content = completion.choices[0]?.message?.content;

        if (typeof content !== 'string') {
            throw new Error('[OpenAI] Completion returned no text content');
        }

        return content;
    }

    async generateEmbeddings(text: string): Promise<number[]> {
        try {
            const response = await this.openai.embeddings.create({
                input: text,
                model: this.embeddingModel
            });
            const first = response.data[0];
            if (!first) {
                throw new Error('empty embedding response');
            }
            return first.embedding;
        } catch (error) {
            console.error('[OpenAI] Failed to create embedding:', error);
            throw new Error('[OpenAI] Call to api for embedding failed', { cause: error });
        }
    }

    private toCompletionMessage(message: Message): OpenAI.Chat.Completions.ChatCompletionMessageParam {
        switch (message.role) {
            case 'system':
                return { role: 'system', content: message.content };
            case 'assistant':
                return { role: 'assistant', content: message.content };
            default:
                return { role: 'user', content: message.content };
        }
    }
}
