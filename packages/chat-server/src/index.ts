import 'dotenv/config';
import http from 'http';
import { OpenAIClient, QdrantClient, EmbeddingService } from '@medrecall/shared';
import { loadChatConfig } from './config/ChatConfig.js';
import { MedicalLexicon } from './services/MedicalLexicon.js';
import { QueryAnalyzer } from './services/QueryAnalyzer.js';
import { RetrievalOrchestrator } from './services/RetrievalOrchestrator.js';
import { ContextRanker } from './services/ContextRanker.js';
import { AnswerAssembler } from './services/AnswerAssembler.js';
import { ChatService } from './services/ChatService.js';
import { ChatPipelineGraph } from './graphs/ChatPipelineGraph.js';
import { createApp } from './app.js';

const config = loadChatConfig();

const openAIClient = new OpenAIClient(config.openai);
const vectorStore = new QdrantClient(config.qdrant);
const embeddingService = new EmbeddingService(openAIClient);

const analyzer = new QueryAnalyzer(MedicalLexicon.load());
const pipeline = new ChatPipelineGraph({
    analyzer,
    orchestrator: new RetrievalOrchestrator(vectorStore, embeddingService, config.retrieval),
    ranker: new ContextRanker(),
    assembler: new AnswerAssembler(openAIClient)
}).compile();

const chatService = new ChatService(pipeline, analyzer);
const server = http.createServer(createApp(chatService));

server.listen(config.port, () => {
  console.log(`Chat Server running on port ${config.port}`);
  console.log(`Chat endpoint: http://localhost:${config.port}/api/v1/chat`);
  console.log(`Qdrant collection: ${config.qdrant.collectionName}`);
});

let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    console.log(`Shutdown already in progress, ignoring ${signal}`);
    return;
  }

  isShuttingDown = true;
  console.log(`\n${signal} received - Shutting down gracefully...`);

  let exitCode = 0;

  try {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) {
          console.error('Error closing HTTP server:', err);
          reject(err);
        } else {
          console.log('HTTP server closed');
          resolve();
        }
      });
    });

    console.log('Graceful shutdown complete');
  } catch (error) {
    console.error('Error during shutdown:', error);
    exitCode = 1;
  } finally {
    process.exit(exitCode);
  }
}

process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));

process.on('uncaughtException', async (error) => {
  console.error('Uncaught Exception:', error);
  await gracefulShutdown('UNCAUGHT_EXCEPTION');
});

process.on('unhandledRejection', async (reason, promise) => {
  console.error('Unhandled Rejection at:', promise, 'reason:', reason);
  await gracefulShutdown('UNHANDLED_REJECTION');
});
