import { z } from 'zod';

export interface InboundMessage {
    senderId: string;
    bodyText: string;
    mediaCount: number;
    mediaContentType?: string;
    mediaUrl?: string;
}

const WHATSAPP_PREFIX = 'whatsapp:';

/** Twilio's messaging webhook fields, as posted (form) or queried (GET). */
export const TwilioWebhookSchema = z.object({
    From: z.string().default(''),
    Body: z.string().default(''),
    NumMedia: z.preprocess(
        (value) => (value === '' ? undefined : value),
        z.coerce.number().int().min(0).default(0)
    ),
    MediaContentType0: z.string().optional(),
    MediaUrl0: z.string().optional()
}).passthrough();

export type TwilioWebhookPayload = z.infer<typeof TwilioWebhookSchema>;

export function toInboundMessage(payload: TwilioWebhookPayload): InboundMessage {
    const from = payload.From.trim();
    return {
        senderId: from.toLowerCase().startsWith(WHATSAPP_PREFIX) ? from.slice(WHATSAPP_PREFIX.length) : from,
        bodyText: payload.Body.trim(),
        mediaCount: payload.NumMedia,
        mediaContentType: payload.MediaContentType0 || undefined,
        mediaUrl: payload.MediaUrl0 || undefined
    };
}
