import axios, { type AxiosInstance } from 'axios';
import Twilio from 'twilio';
import type { MediaFetcher, MediaFetchResult } from '../types/collaborators.js';

export interface TwilioConfigs {
    accountSid?: string;
    authToken?: string;
    mediaFetchTimeoutMs?: number;
    httpClient?: AxiosInstance;
}

export type WebhookParams = Record<string, string>;

/**
 * Twilio-side plumbing for the WhatsApp channel: downloading inbound media
 * and checking webhook signatures. Media URLs are fetched with basic auth
 * when credentials are configured, anonymously otherwise.
 */
export class TwilioClient implements MediaFetcher {
    private http: AxiosInstance;
    private configs: TwilioConfigs;

    constructor(configs: TwilioConfigs = {}) {
        this.configs = configs;
        this.http = configs.httpClient ?? axios.create({
            timeout: configs.mediaFetchTimeoutMs ?? 15000
        });
    }

    async fetchMedia(url: string): Promise<MediaFetchResult> {
        try {
            const response = await this.http.get<ArrayBuffer>(url, {
                responseType: 'arraybuffer',
                auth: this.configs.accountSid && this.configs.authToken
                    ? { username: this.configs.accountSid, password: this.configs.authToken }
                    : undefined
            });

            return {
                success: true,
                data: Buffer.from(response.data)
            };
        } catch (error) {
            console.error('[TwilioClient] Error downloading media:', url, error instanceof Error ? error.message : error);
            return {
                success: false,
                error: error instanceof Error ? error.message : 'Unknown error'
            };
        }
    }

    validateSignature(signature: string, url: string, params: WebhookParams): boolean {
        if (!this.configs.authToken) {
            return false;
        }
        return Twilio.validateRequest(this.configs.authToken, signature, url, params);
    }
}

export function generateMessageTwiml(message: string): string {
    const response = new Twilio.twiml.MessagingResponse();
    response.message(message);
    return response.toString();
}
