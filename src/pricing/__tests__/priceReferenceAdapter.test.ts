/**
 * Price Reference Adapter Tests
 */

import { normalizeReferencePrice, readReferencePrice } from '../priceReferenceAdapter';
import { derivePoolPrices } from '../poolPriceDeriver';
import { StaticOracle } from '../../adapters/staticOracle';
import { HOOK_CONSTANTS } from '../../config/constants';
import { isHookError } from '../../errors';

const SOURCE = '0x00000000000000000000000000000000000000c3';

describe('Price Reference Adapter', () => {
    describe('normalizeReferencePrice', () => {
        it('scales an 8-decimal quote up to 18 decimals', () => {
            expect(normalizeReferencePrice(3900n * 10n ** 8n, 8, 18)).toBe(3900n * 10n ** 18n);
        });

        it('scales an 8-decimal quote down to 6 decimals', () => {
            expect(normalizeReferencePrice(390000000000n, 8, 6)).toBe(3900000000n);
        });

        it('passes equal precisions through unchanged', () => {
            expect(normalizeReferencePrice(123456789n, 8, 8)).toBe(123456789n);
        });

        it('truncates dropped digits instead of rounding', () => {
            expect(normalizeReferencePrice(123456789n, 8, 6)).toBe(1234567n);
        });

        it('truncates negative answers toward zero', () => {
            expect(normalizeReferencePrice(-123456789n, 8, 6)).toBe(-1234567n);
        });

        it('passes zero and negative answers through without validation', () => {
            expect(normalizeReferencePrice(0n, 8, 18)).toBe(0n);
            expect(normalizeReferencePrice(-5n, 8, 10)).toBe(-500n);
        });

        it.each([
            ['fractional native decimals', 1.5, 18],
            ['negative target decimals', 8, -1],
            ['target decimals above 255', 8, 256],
        ])('rejects %s with InvalidArgument', (_label, nativeDecimals, targetDecimals) => {
            let caught: unknown;
            try {
                normalizeReferencePrice(1n, nativeDecimals, targetDecimals);
            } catch (err) {
                caught = err;
            }
            expect(isHookError(caught, 'INVALID_ARGUMENT')).toBe(true);
        });
    });

    describe('rounding asymmetry with the pool price deriver', () => {
        it('rounds 4/9 up for pool prices but truncates it for reference prices', () => {
            // Pool at sqrt price 1.5: price1 = 4/9 in 18 decimals, rounded up
            const { price1 } = derivePoolPrices(3n * 2n ** 95n);

            // The same 4/9 quoted with 19 decimals, normalized to 18, is truncated
            const reference = normalizeReferencePrice(4444444444444444444n, 19, 18);

            expect(price1).toBe(444444444444444445n);
            expect(reference).toBe(444444444444444444n);
            expect(price1 - reference).toBe(1n);
        });
    });

    describe('readReferencePrice', () => {
        it('reads the bound source and rescales to the comparison asset decimals', () => {
            const oracle = new StaticOracle();
            oracle.publish(SOURCE, { answer: 3900n * 10n ** 8n, decimals: 8, updatedAt: 1_700_000_000 });

            const result = readReferencePrice(
                oracle,
                { referenceSource: SOURCE, compareAgainstAsset0: true },
                HOOK_CONSTANTS.PRICE_DECIMALS
            );

            expect(result.value).toBe(3900n * 10n ** 18n);
            expect(result.decimals).toBe(18);
            expect(result.quote.updatedAt).toBe(1_700_000_000);
            expect(oracle.readCount).toBe(1);
        });

        it('uses a stale quote unchanged (no freshness check)', () => {
            const oracle = new StaticOracle();
            oracle.publish(SOURCE, { answer: 250n, decimals: 2, updatedAt: 0 });

            const result = readReferencePrice(
                oracle,
                { referenceSource: SOURCE, compareAgainstAsset0: false },
                6
            );

            expect(result.value).toBe(2500000n);
        });
    });
});
