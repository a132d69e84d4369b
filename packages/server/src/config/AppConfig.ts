import { z } from 'zod';

export class ConfigurationError extends Error {
    constructor(message: string, public readonly issues: string[] = []) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

// dotenv turns `KEY=` into an empty string; treat that as unset
const blankToUndefined = (value: unknown): unknown =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().optional());

const booleanFlag = z.preprocess(
    (value) => (typeof value === 'string' && value.trim() !== '' ? value.trim().toLowerCase() : undefined),
    z.enum(['true', 'false', '1', '0']).default('false').transform((value) => value === 'true' || value === '1')
);

const EnvSchema = z.object({
    PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(65535).default(3000)),
    TWILIO_ACCOUNT_SID: optionalString,
    TWILIO_AUTH_TOKEN: optionalString,
    TWILIO_VALIDATE_SIGNATURE: booleanFlag,
    PUBLIC_BASE_URL: optionalString.pipe(z.string().url().optional()),
    GOOGLE_CREDENTIALS_PATH: optionalString,
    GOOGLE_SHEET_ID: optionalString,
    WORKSHEET_NAME: optionalString.transform((value) => value ?? 'Sheet1'),
    PENDING_STORE: z.preprocess(blankToUndefined, z.enum(['memory', 'redis']).default('memory')),
    REDIS_URL: optionalString.transform((value) => value ?? 'redis://localhost:6379'),
    MEDIA_FETCH_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(15000))
});

export type PendingStoreConfig =
    | { kind: 'memory' }
    | { kind: 'redis'; url: string };

export interface AppConfig {
    port: number;
    twilio: {
        accountSid?: string;
        authToken?: string;
        validateSignature: boolean;
        publicBaseUrl?: string;
        mediaFetchTimeoutMs: number;
    };
    /** null when no service-account key is configured. */
    speech: { credentialsPath: string } | null;
    /** null unless both the key and the sheet id are configured. */
    sheet: { credentialsPath: string; sheetId: string; worksheetName: string } | null;
    pendingStore: PendingStoreConfig;
}

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid environment configuration: ${issues.join('; ')}`, issues);
    }

    const vars = parsed.data;

    if (vars.TWILIO_VALIDATE_SIGNATURE && (!vars.TWILIO_AUTH_TOKEN || !vars.PUBLIC_BASE_URL)) {
        throw new ConfigurationError('TWILIO_VALIDATE_SIGNATURE requires TWILIO_AUTH_TOKEN and PUBLIC_BASE_URL');
    }

    const credentialsPath = vars.GOOGLE_CREDENTIALS_PATH;

    return {
        port: vars.PORT,
        twilio: {
            accountSid: vars.TWILIO_ACCOUNT_SID,
            authToken: vars.TWILIO_AUTH_TOKEN,
            validateSignature: vars.TWILIO_VALIDATE_SIGNATURE,
            publicBaseUrl: vars.PUBLIC_BASE_URL?.replace(/\/+$/, ''),
            mediaFetchTimeoutMs: vars.MEDIA_FETCH_TIMEOUT_MS
        },
        speech: credentialsPath ? { credentialsPath } : null,
        sheet: credentialsPath && vars.GOOGLE_SHEET_ID
            ? { credentialsPath, sheetId: vars.GOOGLE_SHEET_ID, worksheetName: vars.WORKSHEET_NAME }
            : null,
        pendingStore: vars.PENDING_STORE === 'redis'
            ? { kind: 'redis', url: vars.REDIS_URL }
            : { kind: 'memory' }
    };
}

/** Settings the process can run without, reported once at startup. */
export function describeMissingSettings(config: AppConfig): string[] {
    const missing: string[] = [];
    if (!config.twilio.accountSid || !config.twilio.authToken) {
        missing.push('TWILIO_ACCOUNT_SID/TWILIO_AUTH_TOKEN (media is fetched without credentials)');
    }
    if (!config.speech) {
        missing.push('GOOGLE_CREDENTIALS_PATH (voice notes cannot be transcribed)');
    }
    if (!config.sheet) {
        missing.push('GOOGLE_CREDENTIALS_PATH/GOOGLE_SHEET_ID (deliveries cannot be logged)');
    }
    return missing;
}
