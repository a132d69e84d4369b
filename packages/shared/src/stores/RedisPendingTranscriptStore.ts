import type { PendingTranscriptStore } from './PendingTranscriptStore.js';

/** The subset of Redis the store needs; `RedisClient` provides it. */
export interface PendingSlotBackend {
    set(key: string, value: string): Promise<void>;
    getDel(key: string): Promise<string | null>;
    exists(key: string): Promise<boolean>;
}

/**
 * Keeps the slots in Redis so several server processes share them. Entries
 * carry no TTL and no persistence guarantee beyond what the Redis server has.
 */
export class RedisPendingTranscriptStore implements PendingTranscriptStore {
    constructor(
        private backend: PendingSlotBackend,
        private keyPrefix: string = 'pending:'
    ) {}

    private key(senderId: string): string {
        return `${this.keyPrefix}${senderId}`;
    }

    async put(senderId: string, text: string): Promise<void> {
        await this.backend.set(this.key(senderId), text);
        console.log('[RedisPendingTranscriptStore] Stored pending transcript for:', senderId);
    }

    async takeIfPresent(senderId: string): Promise<string | null> {
        return await this.backend.getDel(this.key(senderId));
    }

    async has(senderId: string): Promise<boolean> {
        return await this.backend.exists(this.key(senderId));
    }
}
