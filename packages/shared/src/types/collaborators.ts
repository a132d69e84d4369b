import type { DeliveryRecord } from './delivery.js';

export type MediaFetchResult =
    | { success: true; data: Buffer }
    | { success: false; error: string };

export type TranscriptionResult =
    | { success: true; transcript: string }
    | { success: false; error: string };

export interface PersistenceResult {
    success: boolean;
    error?: string;
}

export interface MediaFetcher {
    fetchMedia(url: string): Promise<MediaFetchResult>;
}

export interface Transcriber {
    transcribe(audio: Buffer): Promise<TranscriptionResult>;
}

export interface DeliveryRecorder {
    appendDelivery(record: DeliveryRecord): Promise<PersistenceResult>;
}
