import { Annotation } from "@langchain/langgraph";
import type { MetadataFilters } from "@medrecall/shared";
import type { ChatResponse, ContextItem, QueryAnalysis, RankedContext } from "../types/ChatTypes.js";

export const ChatPipelineState = Annotation.Root({
    query: Annotation<string>(),
    maxResults: Annotation<number>({
        reducer: (x, y) => y ?? x ?? 5,
        default: () => 5
    }),
    userFilters: Annotation<MetadataFilters | undefined>({
        reducer: (x, y) => y ?? x,
        default: () => undefined
    }),
    startedAt: Annotation<number>({
        reducer: (x, y) => y ?? x ?? Date.now(),
        default: () => Date.now()
    }),

    analysis: Annotation<QueryAnalysis | null>({
        reducer: (x, y) => y ?? x ?? null,
        default: () => null
    }),
    retrieved: Annotation<ContextItem[]>({
        reducer: (x, y) => y ?? x ?? [],
        default: () => []
    }),
    ranked: Annotation<RankedContext[]>({
        reducer: (x, y) => y ?? x ?? [],
        default: () => []
    }),

    response: Annotation<ChatResponse | null>({
        reducer: (x, y) => y ?? x ?? null,
        default: () => null
    })
});

export type ChatPipelineStateType = typeof ChatPipelineState.State;
export type ChatPipelineUpdate = typeof ChatPipelineState.Update;
