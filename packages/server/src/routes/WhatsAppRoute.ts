import { Router, type Request, type Response } from 'express';
import { generateMessageTwiml, type WebhookParams } from '@feedline/shared';
import type { ConversationController } from '../controllers/ConversationController.js';
import { TwilioWebhookSchema, toInboundMessage } from '../types/InboundMessage.js';

export interface SignatureValidator {
    publicBaseUrl: string;
    validateSignature(signature: string, url: string, params: WebhookParams): boolean;
}

function collectParams(source: unknown): WebhookParams {
    const params: WebhookParams = {};
    if (source && typeof source === 'object') {
        for (const [key, value] of Object.entries(source)) {
            if (typeof value === 'string') {
                params[key] = value;
            }
        }
    }
    return params;
}

function sendTwiml(res: Response, status: number, message: string): void {
    res.status(status).type('text/xml').send(generateMessageTwiml(message));
}

export function createWhatsAppRouter(
    conversationController: ConversationController,
    signatureValidator: SignatureValidator | null = null
): Router {
    const router = Router();

    const handleWebhook = async (req: Request, res: Response): Promise<void> => {
        const params = collectParams(req.method === 'GET' ? req.query : req.body);

        if (signatureValidator) {
            const signature = req.header('X-Twilio-Signature');
            const url = `${signatureValidator.publicBaseUrl}${req.originalUrl}`;
            // GET webhooks carry their params in the signed URL itself
            const signedParams = req.method === 'GET' ? {} : params;

            if (!signature || !signatureValidator.validateSignature(signature, url, signedParams)) {
                console.error('[WhatsAppRoute] Rejected webhook with invalid signature');
                res.status(403).send('Invalid signature');
                return;
            }
        }

        const parsed = TwilioWebhookSchema.safeParse(params);
        if (!parsed.success) {
            console.error('[WhatsAppRoute] Invalid webhook payload:', parsed.error.issues);
            res.status(400).send('Invalid webhook payload');
            return;
        }

        try {
            const message = toInboundMessage(parsed.data);
            const result = await conversationController.handleMessage(message);
            sendTwiml(res, result.status, result.message);
        } catch (error) {
            console.error('[WhatsAppRoute] Error handling message:', error);
            sendTwiml(res, 500, 'Service temporarily unavailable');
        }
    };

    router.post('/whatsapp', handleWebhook);
    router.get('/whatsapp', handleWebhook);

    return router;
}
