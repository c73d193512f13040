/**
 * Permission Gate Module
 *
 * Admin-controlled allow-lists for trading and liquidity management.
 */

export type { Capability, PermissionSnapshot } from './types';
export { PermissionGate } from './permissionGate';
