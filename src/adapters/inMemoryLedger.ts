/**
 * In-memory liquidity engine stand-in.
 *
 * Holds a square-root price per pool and records the fees the hook pushes.
 * Backs the simulation script and the test suite; it does not move prices
 * on trades.
 */

import { PoolId } from '../types';
import { InvalidArgument, OutOfRange } from '../errors';
import { HOOK_CONSTANTS } from '../config/constants';
import { LedgerCollaborator } from '../hook/collaborators';

export interface FeeUpdate {
    poolId: PoolId;
    fee: number;
}

export class InMemoryLedger implements LedgerCollaborator {
    private readonly sqrtPrices = new Map<PoolId, bigint>();
    private readonly fees = new Map<PoolId, number>();
    readonly feeUpdates: FeeUpdate[] = [];

    setSqrtPrice(poolId: PoolId, sqrtPriceX96: bigint): void {
        this.sqrtPrices.set(poolId, sqrtPriceX96);
    }

    readPriceSnapshot(poolId: PoolId): bigint {
        const sqrtPrice = this.sqrtPrices.get(poolId);
        if (sqrtPrice === undefined) {
            throw new OutOfRange('pool not initialized', { poolId });
        }
        return sqrtPrice;
    }

    setDynamicFee(poolId: PoolId, fee: number): void {
        if (!Number.isInteger(fee) || fee < 0 || fee > HOOK_CONSTANTS.MAX_LP_FEE) {
            throw new InvalidArgument('fee rejected by ledger', { poolId, fee });
        }
        this.fees.set(poolId, fee);
        this.feeUpdates.push({ poolId, fee });
    }

    getCurrentFee(poolId: PoolId): number | undefined {
        return this.fees.get(poolId);
    }
}
