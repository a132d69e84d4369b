import express, { type Express } from 'express';
import type { ConversationController } from './controllers/ConversationController.js';
import { createWhatsAppRouter, type SignatureValidator } from './routes/WhatsAppRoute.js';
import { StatusRouter } from './routes/StatusRoute.js';

export interface AppDeps {
    conversationController: ConversationController;
    signatureValidator?: SignatureValidator | null;
}

export function createApp(deps: AppDeps): Express {
    const app = express();

    app.use(express.urlencoded({ extended: false }));
    app.use(express.json());
    app.use(createWhatsAppRouter(deps.conversationController, deps.signatureValidator ?? null));
    app.use(StatusRouter());

    return app;
}
