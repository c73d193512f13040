/**
 * Fee Engine - Type Definitions
 */

import { TradeDirection } from '../types';

export interface FeeInput {
    /** Global default fee */
    baseFee: number;

    /** Per-pool override; 0 means none */
    overrideFee: number;

    /** asset1 per asset0, 18-decimal fixed point */
    price0: bigint;

    /** asset0 per asset1, 18-decimal fixed point */
    price1: bigint;

    /** Normalized market reference, or null when the pool has no oracle binding */
    referencePrice: bigint | null;

    compareAgainstAsset0: boolean;

    direction: TradeDirection;

    /** Scales the proportional adjustment; 1_000_000 = 100% */
    sensitivityMultiplier: number;
}

/**
 * Why the directional adjustment did not fire.
 */
export type SkipReason =
    | 'NO_REFERENCE'            // pool has no oracle binding
    | 'NON_POSITIVE_REFERENCE'  // reference price <= 0
    | 'NOT_ADVERSE';            // trade moves the pool price toward the reference

export interface FeeComputation {
    /** Fee to apply to the in-flight trade */
    fee: number;

    /** Override if set, else base fee */
    staticFee: number;

    /** fee - staticFee */
    adjustment: number;

    adjusted: boolean;

    skipReason?: SkipReason;

    /** Pool price compared against the reference (price0 or price1) */
    comparedPrice: bigint;

    referencePrice: bigint | null;
}
