// Type Definitions for the Dynamic Fee Hook

// ═══════════════════════════════════════════════════════════════════════════════
// IDENTITIES & POOLS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Participant, asset or oracle address: `0x` followed by 40 hex digits.
 * Stored lower-cased.
 */
export type Identity = string;

/**
 * Opaque pool identifier derived from the pool key.
 */
export type PoolId = string;

export interface Currency {
    address: Identity;
    decimals: number;
}

/**
 * Constituents of a pool. currency0 always sorts below currency1.
 */
export interface PoolKey {
    currency0: Currency;
    currency1: Currency;
    /** Fee tier tag; DYNAMIC_FEE_FLAG for pools whose fee the hook sets */
    fee: number;
    tickSpacing: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// TRADING & LIQUIDITY
// ═══════════════════════════════════════════════════════════════════════════════

export type TradeDirection = 'asset0ToAsset1' | 'asset1ToAsset0';

export interface TradeParams {
    /** true when asset0 is sold for asset1 */
    zeroForOne: boolean;
    /** Negative for exact input, positive for exact output */
    amountSpecified: bigint;
    sqrtPriceLimitX96?: bigint;
}

export interface LiquidityChangeParams {
    tickLower: number;
    tickUpper: number;
    /** Positive adds liquidity, negative removes it */
    liquidityDelta: bigint;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PRICES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Spot prices of a pool in 18-decimal fixed point.
 * price0 = units of asset1 per asset0, price1 = units of asset0 per asset1.
 */
export interface PoolPrices {
    price0: bigint;
    price1: bigint;
}

/**
 * Latest answer reported by a market reference source.
 */
export interface OracleQuote {
    answer: bigint;
    decimals: number;
    /** Unix seconds of the last update; carried through, never checked */
    updatedAt: number;
    roundId?: bigint;
}

export interface OracleBinding {
    referenceSource: Identity;
    compareAgainstAsset0: boolean;
}
