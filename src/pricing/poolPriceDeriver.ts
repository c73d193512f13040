/**
 * Pool Price Deriver
 *
 * Converts the pool's square-root price (sqrt(asset1/asset0) scaled by 2^96)
 * into per-asset spot prices in 18-decimal fixed point.
 *
 *   priceX96 = floor(sqrtPriceX96^2 / 2^96)
 *   price0   = ceil(priceX96 * 1e18 / 2^96)      asset1 per asset0
 *   price1   = ceil(2^96 * 1e18 / priceX96)      asset0 per asset1
 *
 * Both prices round up so the fee engine never sees an under-reported price.
 */

import { PoolPrices } from '../types';
import { ArithmeticError, OutOfRange } from '../errors';
import { HOOK_CONSTANTS } from '../config/constants';
import { mulDiv, mulDivRoundingUp } from '../utils/math';

const { Q96, WAD, MIN_SQRT_PRICE, MAX_SQRT_PRICE } = HOOK_CONSTANTS;

export function isValidSqrtPrice(sqrtPriceX96: bigint): boolean {
    return sqrtPriceX96 >= MIN_SQRT_PRICE && sqrtPriceX96 < MAX_SQRT_PRICE;
}

export function derivePoolPrices(sqrtPriceX96: bigint): PoolPrices {
    if (!isValidSqrtPrice(sqrtPriceX96)) {
        throw new OutOfRange('sqrt price outside engine bounds', {
            sqrtPriceX96: sqrtPriceX96.toString(),
        });
    }

    const priceX96 = mulDiv(sqrtPriceX96, sqrtPriceX96, Q96);
    if (priceX96 === 0n) {
        throw new ArithmeticError('squared price rounds to zero', {
            sqrtPriceX96: sqrtPriceX96.toString(),
        });
    }

    const price0 = mulDivRoundingUp(priceX96, WAD, Q96);
    const price1 = mulDivRoundingUp(Q96, WAD, priceX96);

    if (price0 === 0n || price1 === 0n) {
        throw new ArithmeticError('derived pool price is zero', {
            sqrtPriceX96: sqrtPriceX96.toString(),
        });
    }

    return { price0, price1 };
}
