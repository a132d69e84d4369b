import speech from '@google-cloud/speech';
import { PHRASE_HINTS } from '../constants/vocabulary.js';
import type { Transcriber, TranscriptionResult } from '../types/collaborators.js';

export interface SpeechToTextConfigs {
    credentialsPath: string;
    languageCode?: string;
    sampleRateHertz?: number;
    phraseHints?: readonly string[];
}

/**
 * Google Cloud Speech-to-Text for WhatsApp voice notes (OGG/Opus). Returns
 * the top alternative of the first result, or an empty transcript when the
 * provider heard nothing.
 */
export class SpeechToTextClient implements Transcriber {
    private client: InstanceType<typeof speech.SpeechClient>;
    private configs: Required<SpeechToTextConfigs>;

    constructor(configs: SpeechToTextConfigs) {
        if (!configs.credentialsPath) {
            throw new Error('Speech-to-Text configuration error: credentialsPath is required');
        }

        this.configs = {
            languageCode: 'en-US',
            sampleRateHertz: 16000,
            phraseHints: PHRASE_HINTS,
            ...configs
        };
        this.client = new speech.SpeechClient({ keyFilename: configs.credentialsPath });
    }

    async transcribe(audio: Buffer): Promise<TranscriptionResult> {
        try {
            const [response] = await this.client.recognize({
                config: {
                    encoding: 'OGG_OPUS',
                    sampleRateHertz: this.configs.sampleRateHertz,
                    languageCode: this.configs.languageCode,
                    speechContexts: [{ phrases: [...this.configs.phraseHints] }]
                },
                audio: {
                    content: audio.toString('base64')
                }
            });

            const transcript = response.results?.[0]?.alternatives?.[0]?.transcript ?? '';
            console.log('[SpeechToTextClient] Transcribed', audio.length, 'bytes into', transcript.length, 'characters');

            return { success: true, transcript };
        } catch (error) {
            console.error('[SpeechToTextClient] Error transcribing audio:', error);
            return {
                success: false,
                error: error instanceof Error ? error.message : 'Unknown error'
            };
        }
    }

    async close(): Promise<void> {
        await this.client.close();
    }
}
