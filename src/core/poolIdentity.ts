/**
 * Pool Identity
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * A pool is identified by its asset pair, fee tier tag and tick spacing.
 * The pair is order-stable: currency0 is always the lower address, so the
 * same constituents always resolve to the same PoolId.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { createHash } from 'crypto';
import { Currency, PoolId, PoolKey } from '../types';
import { InvalidArgument } from '../errors';
import { HOOK_CONSTANTS } from '../config/constants';
import { normalizeIdentity } from './identity';

function normalizeCurrency(currency: Currency, field: string): Currency {
    const { decimals } = currency;
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > HOOK_CONSTANTS.MAX_DECIMALS) {
        throw new InvalidArgument(`${field} decimals out of range`, { field, decimals });
    }
    return { address: normalizeIdentity(currency.address, field), decimals };
}

/**
 * Build a pool key from two currencies in any order.
 */
export function createPoolKey(
    currencyA: Currency,
    currencyB: Currency,
    fee: number,
    tickSpacing: number
): PoolKey {
    const a = normalizeCurrency(currencyA, 'currencyA');
    const b = normalizeCurrency(currencyB, 'currencyB');

    if (a.address === b.address) {
        throw new InvalidArgument('pool currencies must differ', { currency: a.address });
    }
    if (!Number.isInteger(fee) || fee < 0 || fee > HOOK_CONSTANTS.MAX_UINT24) {
        throw new InvalidArgument('fee tier out of range', { fee });
    }
    if (!Number.isInteger(tickSpacing) || tickSpacing < 1 || tickSpacing > HOOK_CONSTANTS.MAX_TICK_SPACING) {
        throw new InvalidArgument('tick spacing out of range', { tickSpacing });
    }

    const [currency0, currency1] = a.address < b.address ? [a, b] : [b, a];
    return { currency0, currency1, fee, tickSpacing };
}

/**
 * Derive the PoolId of a key: 0x-prefixed SHA-256 of its canonical encoding.
 * Currency decimals do not take part in the id.
 */
export function toPoolId(key: PoolKey): PoolId {
    const canonical = [
        key.currency0.address.toLowerCase(),
        key.currency1.address.toLowerCase(),
        key.fee,
        key.tickSpacing,
    ].join('|');

    return `0x${createHash('sha256').update(canonical).digest('hex')}`;
}

export function isDynamicFeePool(key: PoolKey): boolean {
    return key.fee === HOOK_CONSTANTS.DYNAMIC_FEE_FLAG;
}
