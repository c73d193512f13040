/**
 * Collaborator interfaces the hook depends on.
 *
 * The liquidity engine and the market reference are outside the hook. Both are
 * reached through synchronous calls whose state is resolved before an event
 * is evaluated, so one event never observes another's partial effects.
 */

import { PoolId } from '../types';

export type { OracleCollaborator } from '../pricing';

export interface LedgerCollaborator {
    /** Current square-root price of the pool, scaled by 2^96 */
    readPriceSnapshot(poolId: PoolId): bigint;

    /** Fee to apply to the pool's in-flight trade */
    setDynamicFee(poolId: PoolId, fee: number): void;
}
