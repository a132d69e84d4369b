import {
    CLIENT_INDICES,
    FEED_TYPES,
    LOCATIONS,
    NOT_AVAILABLE,
    type ExtractedDelivery
} from '@feedline/shared';

export type ExtractionFailureReason = 'no-match' | 'invalid-number';

export type ExtractionResult =
    | { success: true; delivery: Readonly<ExtractedDelivery> }
    | { success: false; reason: ExtractionFailureReason };

/** Turns a transcript into delivery fields. Swappable behind the controller. */
export interface DeliveryParser {
    extract(transcript: string): ExtractionResult;
}

function escapeForPattern(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function alternation(values: readonly string[]): string {
    return values.map(escapeForPattern).join('|');
}

/**
 * Clauses in the order they must be spoken. The filler before each keyword is
 * lazy, so the first occurrence of a keyword that still lets the rest match
 * is the one used. `s` lets filler run across line breaks. The `^` keeps
 * the engine from retrying at every offset of a transcript that nearly matches.
 */
export function buildDeliveryPattern(): RegExp {
    const clientIndex = `[${CLIENT_INDICES.join('')}]`;

    return new RegExp(
        `^.*?client\\s+(?<clientIndex>${clientIndex})` +
        `.*?delivered\\s+(?<quantity>\\d+)\\s+(?<feedType>${alternation(FEED_TYPES)})(?:\\s+at)?` +
        `.*?price\\s+(?<price>\\d+)` +
        `(?:.*?location\\s+(?<location>${alternation(LOCATIONS)})\\s*)` +
        `(?:.*?notes\\s+(?<notes>.*))?`,
        'is'
    );
}

function textField(value: string | undefined): string {
    const trimmed = value?.trim() ?? '';
    return trimmed === '' ? NOT_AVAILABLE : trimmed;
}

function integerField(value: string | undefined): number | null {
    if (value === undefined || !/^\d+$/.test(value.trim())) {
        return null;
    }
    const parsed = Number.parseInt(value.trim(), 10);
    return Number.isSafeInteger(parsed) ? parsed : null;
}

export class FieldExtractor implements DeliveryParser {
    private readonly pattern: RegExp;

    constructor(pattern: RegExp = buildDeliveryPattern()) {
        this.pattern = pattern;
    }

    extract(transcript: string): ExtractionResult {
        const groups = this.pattern.exec(transcript)?.groups;
        if (!groups) {
            return { success: false, reason: 'no-match' };
        }

        const quantity = integerField(groups.quantity);
        const price = integerField(groups.price);
        if (quantity === null || price === null) {
            return { success: false, reason: 'invalid-number' };
        }

        return {
            success: true,
            delivery: Object.freeze({
                clientIndex: textField(groups.clientIndex),
                quantity,
                feedType: textField(groups.feedType),
                price,
                location: textField(groups.location),
                notes: textField(groups.notes),
                debt: 0,
                overpaid: 0
            })
        };
    }
}
