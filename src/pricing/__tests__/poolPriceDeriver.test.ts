/**
 * Pool Price Deriver Tests
 *
 * Covers the fixed-point conversion from sqrtPriceX96 to price0/price1,
 * its round-up bias, the engine bounds and the degenerate zero price.
 */

import { derivePoolPrices, isValidSqrtPrice } from '../poolPriceDeriver';
import { HOOK_CONSTANTS } from '../../config/constants';
import { isHookError } from '../../errors';

const { Q96, WAD, MIN_SQRT_PRICE, MAX_SQRT_PRICE } = HOOK_CONSTANTS;
const WAD_SQUARED = WAD * WAD;

function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (err) {
        return err;
    }
    throw new Error('expected function to throw');
}

describe('Pool Price Deriver', () => {
    describe('derivePoolPrices', () => {
        it('returns 1.0 for both assets at parity', () => {
            expect(derivePoolPrices(Q96)).toEqual({ price0: WAD, price1: WAD });
        });

        it('derives price0 = 3600 and its reciprocal for sqrt price 60', () => {
            const { price0, price1 } = derivePoolPrices(60n * Q96);
            expect(price0).toBe(3600n * WAD);
            expect(price1).toBe(277777777777778n);
        });

        it('derives 0.25 / 4 when asset0 is the cheaper asset', () => {
            const { price0, price1 } = derivePoolPrices(Q96 / 2n);
            expect(price0).toBe(250000000000000000n);
            expect(price1).toBe(4n * WAD);
        });

        it('rounds a non-terminating reciprocal up, never down', () => {
            // price0 = 2.25 exactly, price1 = 4/9 = 0.444...
            const { price0, price1 } = derivePoolPrices(3n * 2n ** 95n);
            expect(price0).toBe(2250000000000000000n);
            expect(price1).toBe(444444444444444445n);
        });

        it('reports the smallest non-zero price1 just below the upper bound', () => {
            const { price1 } = derivePoolPrices(MAX_SQRT_PRICE - 1n);
            expect(price1).toBe(1n);
        });
    });

    describe('reciprocal consistency', () => {
        const samples = [
            Q96,
            60n * Q96,
            3n * 2n ** 95n,
            1000n * Q96,
            Q96 / 1000n,
            (123456789n * Q96) / 1000n,
            2n ** 80n,
            2n ** 120n,
            987654321987654321987654321n,
        ];

        it.each(samples)(
            'price0 * price1 stays within rounding of 1e36 for sqrt price %s',
            (sqrtPrice) => {
                const { price0, price1 } = derivePoolPrices(sqrtPrice);
                const excess = price0 * price1 - WAD_SQUARED;

                // Both prices round up, so the product never falls below 1e36 and
                // exceeds it by at most one unit of each price.
                expect(excess >= 0n).toBe(true);
                expect(excess <= price0 + price1).toBe(true);
            }
        );
    });

    describe('bounds', () => {
        it('accepts the minimum and rejects the maximum sqrt price', () => {
            expect(isValidSqrtPrice(MIN_SQRT_PRICE)).toBe(true);
            expect(isValidSqrtPrice(MIN_SQRT_PRICE - 1n)).toBe(false);
            expect(isValidSqrtPrice(MAX_SQRT_PRICE - 1n)).toBe(true);
            expect(isValidSqrtPrice(MAX_SQRT_PRICE)).toBe(false);
        });

        it.each([
            ['zero', 0n],
            ['below minimum', MIN_SQRT_PRICE - 1n],
            ['at maximum', MAX_SQRT_PRICE],
        ])('fails with OutOfRange for a sqrt price %s', (_label, sqrtPrice) => {
            const err = captureError(() => derivePoolPrices(sqrtPrice));
            expect(isHookError(err, 'OUT_OF_RANGE')).toBe(true);
        });

        it('fails with ArithmeticError when the squared price rounds to zero', () => {
            // MIN_SQRT_PRICE^2 / 2^96 < 1
            const err = captureError(() => derivePoolPrices(MIN_SQRT_PRICE));
            expect(isHookError(err, 'ARITHMETIC')).toBe(true);
        });
    });
});
