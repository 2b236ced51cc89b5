import express, { Express } from 'express';
import { ChatRouter } from './routes/ChatRoute.js';
import { StatusRouter } from './routes/StatusRoute.js';
import type { ChatService } from './services/ChatService.js';

export function createApp(chatService: ChatService): Express {
    const app = express();

    app.use(express.urlencoded({ extended: false }));
    app.use(express.json());
    app.use(ChatRouter(chatService));
    app.use(StatusRouter());

    return app;
}
