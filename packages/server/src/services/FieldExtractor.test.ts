import { describe, it, expect } from 'vitest';
import { FieldExtractor } from './FieldExtractor.js';

const extractor = new FieldExtractor();

describe('FieldExtractor', () => {
    it('extracts every clause of a well-formed transcript', () => {
        const result = extractor.extract('client 3 delivered 50 pellets at price 2000 location matangi notes none');

        expect(result).toEqual({
            success: true,
            delivery: {
                clientIndex: '3',
                quantity: 50,
                feedType: 'pellets',
                price: 2000,
                location: 'matangi',
                notes: 'none',
                debt: 0,
                overpaid: 0
            }
        });
    });

    it('defaults notes when the clause is absent', () => {
        const result = extractor.extract('client 1 delivered 10 crumbs price 500 location kitengela');

        expect(result.success && result.delivery.notes).toBe('N/A');
    });

    it('defaults notes when the keyword has nothing after it', () => {
        const result = extractor.extract('client 1 delivered 10 crumbs price 500 location kitengela notes');

        expect(result.success && result.delivery.notes).toBe('N/A');
    });

    it('ignores case, filler and line breaks between clauses', () => {
        const transcript = 'Hello, this is CLIENT 5 speaking.\nWe Delivered 20 Layer Mash at\nthe agreed Price 1200 to Location Kitengela.\nNotes paid half  ';

        expect(extractor.extract(transcript)).toEqual({
            success: true,
            delivery: {
                clientIndex: '5',
                quantity: 20,
                feedType: 'Layer Mash',
                price: 1200,
                location: 'Kitengela',
                notes: 'paid half',
                debt: 0,
                overpaid: 0
            }
        });
    });

    it("matches the apostrophe in mihang'o literally", () => {
        const withApostrophe = extractor.extract("client 7 delivered 100 day old chicks price 500 location mihang'o");
        const without = extractor.extract('client 7 delivered 100 day old chicks price 500 location mihango');

        expect(withApostrophe.success && withApostrophe.delivery.location).toBe("mihang'o");
        expect(withApostrophe.success && withApostrophe.delivery.feedType).toBe('day old chicks');
        expect(without).toEqual({ success: false, reason: 'no-match' });
    });

    it.each([
        ['client', 'delivered 50 pellets price 2000 location matangi'],
        ['delivered', 'client 3 price 2000 location matangi'],
        ['feed type', 'client 3 delivered 50 bags price 2000 location matangi'],
        ['price', 'client 3 delivered 50 pellets location matangi'],
        ['location', 'client 3 delivered 50 pellets at price 2000 notes none']
    ])('fails without the %s clause', (_clause, transcript) => {
        expect(extractor.extract(transcript)).toEqual({ success: false, reason: 'no-match' });
    });

    it('fails for a client index outside 1 to 7', () => {
        expect(extractor.extract('client 8 delivered 50 pellets price 2000 location matangi'))
            .toEqual({ success: false, reason: 'no-match' });
    });

    it('fails for a location outside the known sites', () => {
        expect(extractor.extract('client 2 delivered 50 pellets price 2000 location nairobi'))
            .toEqual({ success: false, reason: 'no-match' });
    });

    it('fails when clauses come out of order', () => {
        expect(extractor.extract('price 2000 client 3 delivered 50 pellets location matangi'))
            .toEqual({ success: false, reason: 'no-match' });
    });

    it('uses the first occurrence of a keyword that lets the rest match', () => {
        const result = extractor.extract('client 2 says client 4 delivered 30 crumbs price 900 location matangi');

        expect(result.success && result.delivery.clientIndex).toBe('2');
    });

    it('keeps everything after the first notes keyword', () => {
        const result = extractor.extract('client 2 delivered 30 crumbs price 900 location matangi notes first notes second\n');

        expect(result.success && result.delivery.notes).toBe('first notes second');
    });

    it('rejects a quantity too large to hold as an integer', () => {
        expect(extractor.extract('client 1 delivered 99999999999999999999 crumbs price 10 location matangi'))
            .toEqual({ success: false, reason: 'invalid-number' });
    });

    it('gives up quickly on a long transcript that never completes the pattern', () => {
        const transcript = 'client 1 delivered 5 crumbs price 10 '.repeat(60) + 'location nairobi';

        const started = performance.now();
        const result = extractor.extract(transcript);
        const elapsed = performance.now() - started;

        expect(result).toEqual({ success: false, reason: 'no-match' });
        expect(elapsed).toBeLessThan(1000);
    });

    it('returns a frozen delivery', () => {
        const result = extractor.extract('client 3 delivered 50 pellets price 2000 location matangi');

        expect(result.success).toBe(true);
        if (result.success) {
            expect(Object.isFrozen(result.delivery)).toBe(true);
        }
    });
});
