import { describe, it, expect } from 'vitest';
import { ConfigurationError, describeMissingSettings, loadConfig } from './AppConfig.js';

describe('loadConfig', () => {
    it('falls back to defaults for an empty environment', () => {
        const config = loadConfig({});

        expect(config).toEqual({
            port: 3000,
            twilio: {
                accountSid: undefined,
                authToken: undefined,
                validateSignature: false,
                publicBaseUrl: undefined,
                mediaFetchTimeoutMs: 15000
            },
            speech: null,
            sheet: null,
            pendingStore: { kind: 'memory' }
        });
    });

    it('treats blank values as unset', () => {
        const config = loadConfig({ PORT: '', GOOGLE_CREDENTIALS_PATH: '  ', PENDING_STORE: '', TWILIO_VALIDATE_SIGNATURE: '' });

        expect(config.port).toBe(3000);
        expect(config.speech).toBeNull();
        expect(config.pendingStore).toEqual({ kind: 'memory' });
        expect(config.twilio.validateSignature).toBe(false);
    });

    it('reads a complete environment', () => {
        const config = loadConfig({
            PORT: '8080',
            TWILIO_ACCOUNT_SID: 'ACtest',
            TWILIO_AUTH_TOKEN: 'test-secret',
            TWILIO_VALIDATE_SIGNATURE: 'true',
            PUBLIC_BASE_URL: 'https://bot.example.test/',
            GOOGLE_CREDENTIALS_PATH: '/etc/feedline/service-account.json',
            GOOGLE_SHEET_ID: 'sheet-test-id',
            WORKSHEET_NAME: 'Deliveries',
            PENDING_STORE: 'redis',
            REDIS_URL: 'redis://cache.internal:6380',
            MEDIA_FETCH_TIMEOUT_MS: '5000'
        });

        expect(config.port).toBe(8080);
        expect(config.twilio).toEqual({
            accountSid: 'ACtest',
            authToken: 'test-secret',
            validateSignature: true,
            publicBaseUrl: 'https://bot.example.test',
            mediaFetchTimeoutMs: 5000
        });
        expect(config.speech).toEqual({ credentialsPath: '/etc/feedline/service-account.json' });
        expect(config.sheet).toEqual({
            credentialsPath: '/etc/feedline/service-account.json',
            sheetId: 'sheet-test-id',
            worksheetName: 'Deliveries'
        });
        expect(config.pendingStore).toEqual({ kind: 'redis', url: 'redis://cache.internal:6380' });
    });

    it('uses Sheet1 when only the sheet id is given', () => {
        const config = loadConfig({ GOOGLE_CREDENTIALS_PATH: '/tmp/key.json', GOOGLE_SHEET_ID: 'sheet-test-id' });

        expect(config.sheet?.worksheetName).toBe('Sheet1');
    });

    it('leaves the sheet unconfigured without credentials', () => {
        expect(loadConfig({ GOOGLE_SHEET_ID: 'sheet-test-id' }).sheet).toBeNull();
    });

    it.each([
        ['a non-numeric port', { PORT: 'abc' }],
        ['an unknown store', { PENDING_STORE: 'disk' }],
        ['a malformed base URL', { PUBLIC_BASE_URL: 'not a url' }],
        ['a malformed flag', { TWILIO_VALIDATE_SIGNATURE: 'sometimes' }]
    ])('rejects %s', (_label, env) => {
        expect(() => loadConfig(env)).toThrow(ConfigurationError);
    });

    it('requires a token and base URL for signature checks', () => {
        expect(() => loadConfig({ TWILIO_VALIDATE_SIGNATURE: 'true', TWILIO_AUTH_TOKEN: 'test-secret' }))
            .toThrow('TWILIO_VALIDATE_SIGNATURE requires TWILIO_AUTH_TOKEN and PUBLIC_BASE_URL');
    });

    it('lists the issues on the error', () => {
        try {
            loadConfig({ PORT: '70000' });
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ConfigurationError);
            expect(error instanceof ConfigurationError && error.issues).toHaveLength(1);
        }
    });
});

describe('describeMissingSettings', () => {
    it('names each collaborator that will be unavailable', () => {
        expect(describeMissingSettings(loadConfig({}))).toHaveLength(3);
    });

    it('is empty for a complete environment', () => {
        const config = loadConfig({
            TWILIO_ACCOUNT_SID: 'ACtest',
            TWILIO_AUTH_TOKEN: 'test-secret',
            GOOGLE_CREDENTIALS_PATH: '/tmp/key.json',
            GOOGLE_SHEET_ID: 'sheet-test-id'
        });

        expect(describeMissingSettings(config)).toEqual([]);
    });
});
