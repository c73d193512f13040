/**
 * Price Reference Adapter
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Rescales an oracle answer from its native decimals to the decimals of the
 * pool asset it is compared against.
 *
 * NOTES:
 * - Division truncates toward zero (no round-up, unlike the pool price deriver)
 * - Non-positive answers and stale quotes pass through unchanged; the fee
 *   engine decides what to do with a non-positive reference
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { OracleBinding, OracleQuote } from '../types';
import { InvalidArgument } from '../errors';
import { HOOK_CONSTANTS } from '../config/constants';
import { pow10 } from '../utils/math';
import logger from '../utils/logger';

/**
 * Market reference collaborator. Reads are synchronous and already resolved.
 */
export interface OracleCollaborator {
    readLatestQuote(referenceSource: string): OracleQuote;
}

export interface ReferencePrice {
    /** Answer rescaled to the comparison asset's decimals */
    value: bigint;
    decimals: number;
    quote: OracleQuote;
}

function assertDecimals(field: string, decimals: number): void {
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > HOOK_CONSTANTS.MAX_DECIMALS) {
        throw new InvalidArgument(`${field} out of range`, { field, decimals });
    }
}

export function normalizeReferencePrice(
    answer: bigint,
    nativeDecimals: number,
    targetDecimals: number
): bigint {
    assertDecimals('nativeDecimals', nativeDecimals);
    assertDecimals('targetDecimals', targetDecimals);

    if (nativeDecimals > targetDecimals) {
        return answer / pow10(nativeDecimals - targetDecimals);
    }
    if (nativeDecimals < targetDecimals) {
        return answer * pow10(targetDecimals - nativeDecimals);
    }
    return answer;
}

/**
 * Read the bound source's latest quote and rescale it to targetDecimals.
 */
export function readReferencePrice(
    oracle: OracleCollaborator,
    binding: OracleBinding,
    targetDecimals: number
): ReferencePrice {
    const quote = oracle.readLatestQuote(binding.referenceSource);
    const value = normalizeReferencePrice(quote.answer, quote.decimals, targetDecimals);

    logger.debug(
        `[ORACLE] source=${binding.referenceSource} answer=${quote.answer} ` +
        `decimals=${quote.decimals}->${targetDecimals} updatedAt=${quote.updatedAt}`
    );

    return { value, decimals: targetDecimals, quote };
}
