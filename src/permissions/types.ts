/**
 * Permission Gate - Type Definitions
 */

import { Identity } from '../types';

/**
 * Gated actions. Each capability has its own independent allow-list.
 */
export type Capability = 'trade' | 'manageLiquidity';

/**
 * Read-only view of the gate's state, for diagnostics.
 */
export interface PermissionSnapshot {
    admin: Identity | null;
    trade: Identity[];
    manageLiquidity: Identity[];
}
