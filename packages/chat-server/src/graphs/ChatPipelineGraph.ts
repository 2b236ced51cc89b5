import { StateGraph, START, END } from "@langchain/langgraph";
import { ChatPipelineState, type ChatPipelineStateType, type ChatPipelineUpdate } from "../states/ChatPipelineState.js";
import { ChatPipelineError, type PipelineStage } from "../errors/ChatPipelineError.js";
import type { QueryAnalysis } from "../types/ChatTypes.js";
import type { QueryAnalyzer } from "../services/QueryAnalyzer.js";
import type { RetrievalOrchestrator } from "../services/RetrievalOrchestrator.js";
import type { ContextRanker } from "../services/ContextRanker.js";
import type { AnswerAssembler } from "../services/AnswerAssembler.js";

export interface ChatPipelineDeps {
    analyzer: QueryAnalyzer;
    orchestrator: RetrievalOrchestrator;
    ranker: ContextRanker;
    assembler: AnswerAssembler;
}

type PipelineNode = (state: ChatPipelineStateType) => Promise<ChatPipelineUpdate>;

export class ChatPipelineGraph {
    private analyzer: QueryAnalyzer;
    private orchestrator: RetrievalOrchestrator;
    private ranker: ContextRanker;
    private assembler: AnswerAssembler;

    constructor(deps: ChatPipelineDeps) {
        this.analyzer = deps.analyzer;
        this.orchestrator = deps.orchestrator;
        this.ranker = deps.ranker;
        this.assembler = deps.assembler;
    }

    private async analyzeQuery(state: ChatPipelineStateType): Promise<ChatPipelineUpdate> {
        return { analysis: this.analyzer.analyze(state.query) };
    }

    private async retrieveContext(state: ChatPipelineStateType): Promise<ChatPipelineUpdate> {
        const analysis = requireAnalysis(state);
        const retrieved = await this.orchestrator.retrieve(analysis, state.maxResults, state.userFilters);
        return { retrieved };
    }

    private async rankContext(state: ChatPipelineStateType): Promise<ChatPipelineUpdate> {
        const analysis = requireAnalysis(state);
        return { ranked: this.ranker.rank(state.retrieved, analysis) };
    }

    private async assembleResponse(state: ChatPipelineStateType): Promise<ChatPipelineUpdate> {
        const analysis = requireAnalysis(state);
        const response = await this.assembler.assemble(state.ranked, analysis, state.startedAt);
        return { response };
    }

    public compile() {
        return new StateGraph(ChatPipelineState)
            .addNode("analyze_query", staged('analysis', this.analyzeQuery.bind(this)))
            .addNode("retrieve_context", staged('retrieval', this.retrieveContext.bind(this)))
            .addNode("rank_context", staged('ranking', this.rankContext.bind(this)))
            .addNode("assemble_response", staged('assembly', this.assembleResponse.bind(this)))
            .addEdge(START, "analyze_query")
            .addEdge("analyze_query", "retrieve_context")
            .addEdge("retrieve_context", "rank_context")
            .addEdge("rank_context", "assemble_response")
            .addEdge("assemble_response", END)
            .compile();
    }
}

export type CompiledChatPipeline = ReturnType<ChatPipelineGraph['compile']>;

function staged(stage: PipelineStage, node: PipelineNode): PipelineNode {
    return async (state) => {
        try {
            return await node(state);
        } catch (error) {
            console.error(`[ChatPipelineGraph] Stage "${stage}" failed:`, error);
            throw ChatPipelineError.wrap(stage, error);
        }
    };
}

function requireAnalysis(state: ChatPipelineStateType): QueryAnalysis {
    if (!state.analysis) {
        throw new ChatPipelineError('pipeline', 'Query analysis missing from pipeline state');
    }
    return state.analysis;
}
