/**
 * Fee Engine
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * PURPOSE: Charge more for trades that push the pool price further away from
 * the market reference, and never penalize trades that move it back.
 *
 * STEPS:
 * 1. Base selection:  fee = overrideFee if non-zero, else baseFee
 * 2. Adjustment (only with a positive reference price M):
 *      P = price0 when comparing against asset0, else price1
 *      adverse when
 *        asset0: (P > M and asset0→asset1) or (P < M and asset1→asset0)
 *        asset1: (P < M and asset0→asset1) or (P > M and asset1→asset0)
 *      fee += |P - M| * sensitivityMultiplier / M   (truncating)
 * 3. The result may not exceed MAX_LP_FEE (100%); otherwise ArithmeticError
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { TradeDirection } from '../types';
import { ArithmeticError } from '../errors';
import { HOOK_CONSTANTS } from '../config/constants';
import { absDiff, formatFixedPoint } from '../utils/math';
import logger from '../utils/logger';
import { FeeComputation, FeeInput } from './types';

export function selectStaticFee(baseFee: number, overrideFee: number): number {
    return overrideFee !== 0 ? overrideFee : baseFee;
}

export function isAdverseTrade(
    poolPrice: bigint,
    referencePrice: bigint,
    compareAgainstAsset0: boolean,
    direction: TradeDirection
): boolean {
    const sellsAsset0 = direction === 'asset0ToAsset1';

    if (compareAgainstAsset0) {
        return (poolPrice > referencePrice && sellsAsset0) ||
            (poolPrice < referencePrice && !sellsAsset0);
    }
    return (poolPrice < referencePrice && sellsAsset0) ||
        (poolPrice > referencePrice && !sellsAsset0);
}

export function computeFee(input: FeeInput): FeeComputation {
    const staticFee = selectStaticFee(input.baseFee, input.overrideFee);
    const comparedPrice = input.compareAgainstAsset0 ? input.price0 : input.price1;
    const referencePrice = input.referencePrice;

    const unadjusted = (skipReason: FeeComputation['skipReason']): FeeComputation => ({
        fee: staticFee,
        staticFee,
        adjustment: 0,
        adjusted: false,
        skipReason,
        comparedPrice,
        referencePrice,
    });

    if (referencePrice === null) {
        return unadjusted('NO_REFERENCE');
    }

    if (referencePrice <= 0n) {
        logger.warn(`[FEE] Non-positive reference price ${referencePrice}, using static fee ${staticFee}`);
        return unadjusted('NON_POSITIVE_REFERENCE');
    }

    if (!isAdverseTrade(comparedPrice, referencePrice, input.compareAgainstAsset0, input.direction)) {
        return unadjusted('NOT_ADVERSE');
    }

    const delta = absDiff(comparedPrice, referencePrice);
    const adjustment = (delta * BigInt(input.sensitivityMultiplier)) / referencePrice;
    const fee = BigInt(staticFee) + adjustment;

    if (fee > BigInt(HOOK_CONSTANTS.MAX_LP_FEE)) {
        throw new ArithmeticError('fee exceeds 100%', {
            staticFee,
            adjustment: adjustment.toString(),
        });
    }

    logger.debug(
        `[FEE] adverse ${input.direction} P=${formatFixedPoint(comparedPrice, HOOK_CONSTANTS.PRICE_DECIMALS)} ` +
        `M=${referencePrice} fee ${staticFee} -> ${fee}`
    );

    return {
        fee: Number(fee),
        staticFee,
        adjustment: Number(adjustment),
        adjusted: true,
        comparedPrice,
        referencePrice,
    };
}
