/**
 * One unconfirmed transcript per sender. A sender with a slot is awaiting
 * confirmation; a sender without one is idle.
 *
 * `put` overwrites unconditionally. `takeIfPresent` reads and removes in a
 * single step, so two concurrent confirmations can never both receive the
 * same transcript.
 */
export interface PendingTranscriptStore {
    put(senderId: string, text: string): Promise<void>;
    takeIfPresent(senderId: string): Promise<string | null>;
    has(senderId: string): Promise<boolean>;
}

export class InMemoryPendingTranscriptStore implements PendingTranscriptStore {
    private slots = new Map<string, string>();

    async put(senderId: string, text: string): Promise<void> {
        this.slots.set(senderId, text);
    }

    async takeIfPresent(senderId: string): Promise<string | null> {
        // get and delete run in the same tick; nothing can interleave between them
        const text = this.slots.get(senderId);
        if (text === undefined) {
            return null;
        }
        this.slots.delete(senderId);
        return text;
    }

    async has(senderId: string): Promise<boolean> {
        return this.slots.has(senderId);
    }

    get size(): number {
        return this.slots.size;
    }
}
