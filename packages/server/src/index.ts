import dotenv from 'dotenv';
import http from 'http';
import {
    DeliverySheetClient,
    InMemoryPendingTranscriptStore,
    RedisClient,
    RedisPendingTranscriptStore,
    SpeechToTextClient,
    TwilioClient,
    type PendingTranscriptStore
} from '@feedline/shared';
import { createApp } from './app.js';
import { loadConfig, describeMissingSettings, ConfigurationError, type AppConfig } from './config/AppConfig.js';
import { ConversationController } from './controllers/ConversationController.js';
import { FieldExtractor } from './services/FieldExtractor.js';

dotenv.config();

function readConfig(): AppConfig {
    try {
        return loadConfig(process.env);
    } catch (error) {
        if (error instanceof ConfigurationError) {
            console.error('[Server]', error.message);
            process.exit(1);
        }
        throw error;
    }
}

const config = readConfig();

for (const missing of describeMissingSettings(config)) {
    console.warn('[Server] Not configured:', missing);
}

let redisClient: RedisClient | null = null;
let store: PendingTranscriptStore;
if (config.pendingStore.kind === 'redis') {
    redisClient = new RedisClient(config.pendingStore.url);
    await redisClient.connect();
    store = new RedisPendingTranscriptStore(redisClient);
} else {
    store = new InMemoryPendingTranscriptStore();
}

const twilioClient = new TwilioClient({
    accountSid: config.twilio.accountSid,
    authToken: config.twilio.authToken,
    mediaFetchTimeoutMs: config.twilio.mediaFetchTimeoutMs
});
const speechClient = config.speech ? new SpeechToTextClient(config.speech) : null;
const sheetClient = config.sheet ? new DeliverySheetClient(config.sheet) : null;

const conversationController = new ConversationController({
    store,
    parser: new FieldExtractor(),
    mediaFetcher: twilioClient,
    transcriber: speechClient,
    recorder: sheetClient
});

const publicBaseUrl = config.twilio.publicBaseUrl;
const app = createApp({
    conversationController,
    signatureValidator: config.twilio.validateSignature && publicBaseUrl
        ? {
            publicBaseUrl,
            validateSignature: (signature, url, params) => twilioClient.validateSignature(signature, url, params)
        }
        : null
});
const server = http.createServer(app);

server.listen(config.port, () => {
    console.log(`[Server] Running on port ${config.port}`);
    console.log(`[Server] Pending transcripts kept in ${config.pendingStore.kind}`);
    console.log('[Server] WhatsApp webhook available at: /whatsapp');
});

let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
    if (isShuttingDown) {
        console.log(`[Server] Shutdown already in progress, ignoring ${signal}`);
        return;
    }

    isShuttingDown = true;
    console.log(`\n[Server] ${signal} received - Shutting down gracefully...`);

    let exitCode = 0;

    try {
        await new Promise<void>((resolve, reject) => {
            server.close((err) => {
                if (err && !('code' in err && err.code === 'ERR_SERVER_NOT_RUNNING')) {
                    console.error('[Server] Error closing HTTP server:', err);
                    reject(err);
                } else {
                    console.log('[Server] HTTP server closed');
                    resolve();
                }
            });
        });

        if (speechClient) {
            await speechClient.close();
        }

        if (redisClient) {
            console.log('[Server] Disconnecting from Redis...');
            await redisClient.disconnect();
        }

        console.log('[Server] Graceful shutdown complete');
    } catch (error) {
        console.error('[Server] Error during shutdown:', error);
        exitCode = 1;
    } finally {
        process.exit(exitCode);
    }
}

process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));

process.on('uncaughtException', (error) => {
    console.error('[Server] Uncaught Exception:', error);
    void gracefulShutdown('UNCAUGHT_EXCEPTION');
});

process.on('unhandledRejection', (reason) => {
    console.error('[Server] Unhandled Rejection:', reason);
    void gracefulShutdown('UNHANDLED_REJECTION');
});
