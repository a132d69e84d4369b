import type {
    DeliveryRecord,
    DeliveryRecorder,
    MediaFetcher,
    PendingTranscriptStore,
    Transcriber
} from '@feedline/shared';
import type { DeliveryParser } from '../services/FieldExtractor.js';
import { calculateReminders, formatDate, formatReminders } from '../services/ReminderCalculator.js';
import type { InboundMessage } from '../types/InboundMessage.js';
import { CONFIRMATION_TOKEN, ConversationReplies } from './ConversationReplies.js';

/** Derived from the store on demand; never stored itself. */
export type ConversationState = 'Idle' | 'AwaitingConfirmation';

export type MessageKind = 'confirmation' | 'audio' | 'other';

export interface ConversationReply {
    status: 200 | 500;
    message: string;
}

export interface ConversationControllerDeps {
    store: PendingTranscriptStore;
    parser: DeliveryParser;
    mediaFetcher: MediaFetcher;
    /** null when speech credentials are not configured */
    transcriber: Transcriber | null;
    /** null when the sheet is not configured */
    recorder: DeliveryRecorder | null;
    clock?: () => Date;
}

export function classifyMessage(message: InboundMessage): MessageKind {
    if (message.bodyText.trim() === CONFIRMATION_TOKEN) {
        return 'confirmation';
    }
    if (message.mediaCount > 0 && message.mediaContentType?.toLowerCase().startsWith('audio')) {
        return 'audio';
    }
    return 'other';
}

function reply(message: string): ConversationReply {
    return { status: 200, message };
}

/**
 * Two-phase exchange per sender: a voice note is transcribed and held, then a
 * reply of "1" turns the held transcript into a sheet row. The only state is
 * the pending slot in the store; collaborators are called outside it.
 */
export class ConversationController {
    private store: PendingTranscriptStore;
    private parser: DeliveryParser;
    private mediaFetcher: MediaFetcher;
    private transcriber: Transcriber | null;
    private recorder: DeliveryRecorder | null;
    private clock: () => Date;

    constructor(deps: ConversationControllerDeps) {
        this.store = deps.store;
        this.parser = deps.parser;
        this.mediaFetcher = deps.mediaFetcher;
        this.transcriber = deps.transcriber;
        this.recorder = deps.recorder;
        this.clock = deps.clock ?? (() => new Date());
    }

    async getState(senderId: string): Promise<ConversationState> {
        return (await this.store.has(senderId)) ? 'AwaitingConfirmation' : 'Idle';
    }

    async handleMessage(message: InboundMessage): Promise<ConversationReply> {
        try {
            switch (classifyMessage(message)) {
                case 'confirmation':
                    return await this.confirmPending(message.senderId);
                case 'audio':
                    return await this.holdTranscript(message);
                default:
                    return reply(ConversationReplies.help);
            }
        } catch (error) {
            console.error('[ConversationController] Unhandled error for sender:', message.senderId, error);
            return { status: 500, message: ConversationReplies.unexpectedFault };
        }
    }

    private async holdTranscript(message: InboundMessage): Promise<ConversationReply> {
        const { senderId, mediaUrl } = message;

        if (!this.transcriber) {
            console.warn('[ConversationController] Voice note received but transcription is not configured');
            return reply(ConversationReplies.serviceUnavailable);
        }

        if (!mediaUrl) {
            console.error('[ConversationController] Audio message without a media URL from:', senderId);
            return reply(ConversationReplies.downloadFailed);
        }

        const media = await this.mediaFetcher.fetchMedia(mediaUrl);
        if (!media.success) {
            return reply(ConversationReplies.downloadFailed);
        }

        const result = await this.transcriber.transcribe(media.data);
        if (!result.success || result.transcript.trim() === '') {
            console.warn('[ConversationController] No transcript for sender:', senderId, result.success ? '(empty)' : result.error);
            return reply(ConversationReplies.transcriptionFailed);
        }

        await this.store.put(senderId, result.transcript);
        console.log('[ConversationController] Holding transcript for confirmation:', senderId);

        return reply(ConversationReplies.confirmPrompt(result.transcript));
    }

    private async confirmPending(senderId: string): Promise<ConversationReply> {
        // checked before taking so an unconfigured sheet leaves the slot intact
        if (!this.recorder) {
            if (!(await this.store.has(senderId))) {
                return reply(ConversationReplies.nothingPending);
            }
            console.warn('[ConversationController] Confirmation received but the sheet is not configured');
            return reply(ConversationReplies.serviceUnavailable);
        }

        const transcript = await this.store.takeIfPresent(senderId);
        if (transcript === null) {
            return reply(ConversationReplies.nothingPending);
        }

        const extraction = this.parser.extract(transcript);
        if (!extraction.success) {
            console.warn('[ConversationController] Could not parse transcript (%s) for sender:', extraction.reason, senderId);
            return reply(ConversationReplies.parseFailed(transcript));
        }

        const confirmedAt = this.clock();
        const record: Readonly<DeliveryRecord> = Object.freeze({
            ...extraction.delivery,
            date: formatDate(confirmedAt),
            senderId,
            reminders: formatReminders(calculateReminders(confirmedAt))
        });

        const persisted = await this.recorder.appendDelivery(record);
        if (!persisted.success) {
            // the slot is already consumed; the transcript only survives in this log line
            console.error('[ConversationController] Delivery not logged, transcript discarded:', {
                senderId,
                transcript,
                error: persisted.error
            });
            return reply(ConversationReplies.logFailed);
        }

        console.log('[ConversationController] Delivery logged for sender:', senderId);
        return reply(ConversationReplies.logged);
    }
}
