import { createClient } from 'redis';
import type { PendingSlotBackend } from '../stores/RedisPendingTranscriptStore.js';

export class RedisClient implements PendingSlotBackend {
    private client: ReturnType<typeof createClient>;
    private isConnected = false;

    constructor(url: string) {
        this.client = createClient({
            url
        });
        this.setupEventHandlers();
    }

    private setupEventHandlers(): void {
        this.client.on('error', (err) => {
            console.error('[RedisClient] Client error:', err);
            this.isConnected = false;
        });

        this.client.on('connect', () => {
            console.log('[RedisClient] Connected');
            this.isConnected = true;
        });

        this.client.on('reconnecting', () => {
            console.log('[RedisClient] Reconnecting...');
        });

        this.client.on('ready', () => {
            console.log('[RedisClient] Ready');
            this.isConnected = true;
        });
    }

    async connect(): Promise<void> {
        if (!this.isConnected) {
            await this.client.connect();
        }
    }

    async disconnect(): Promise<void> {
        await this.client.quit();
        this.isConnected = false;
    }

    async set(key: string, value: string): Promise<void> {
        await this.client.set(key, value);
    }

    async getDel(key: string): Promise<string | null> {
        return await this.client.getDel(key);
    }

    async exists(key: string): Promise<boolean> {
        return (await this.client.exists(key)) > 0;
    }
}
