import BigNumber from 'bignumber.js';

export const toBigNumber = (value: string | number | bigint): BigNumber => {
    return new BigNumber(typeof value === 'bigint' ? value.toString() : value);
};

/**
 * floor(a * b / denominator) for non-negative operands.
 */
export const mulDiv = (a: bigint, b: bigint, denominator: bigint): bigint => {
    return (a * b) / denominator;
};

/**
 * ceil(a * b / denominator) for non-negative operands.
 */
export const mulDivRoundingUp = (a: bigint, b: bigint, denominator: bigint): bigint => {
    const product = a * b;
    const quotient = product / denominator;
    return product % denominator === 0n ? quotient : quotient + 1n;
};

export const absDiff = (a: bigint, b: bigint): bigint => {
    return a > b ? a - b : b - a;
};

export const pow10 = (exponent: number): bigint => {
    return 10n ** BigInt(exponent);
};

/**
 * Render a fixed-point integer as a decimal string, e.g. (3900n * 10n ** 18n, 18) -> "3900".
 */
export const formatFixedPoint = (value: bigint, decimals: number, displayDecimals: number = 6): string => {
    return toBigNumber(value)
        .shiftedBy(-decimals)
        .decimalPlaces(displayDecimals, BigNumber.ROUND_DOWN)
        .toFixed();
};

/**
 * Render a fee in hundredths of a basis point as a percentage, e.g. 3000 -> "0.3%".
 */
export const formatFeePct = (fee: number): string => {
    return `${toBigNumber(fee).shiftedBy(-4).toFixed()}%`;
};
