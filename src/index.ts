// Oracle-adjusted dynamic fee hook - public API

export * from './types';
export * from './errors';
export { HOOK_CONSTANTS } from './config/constants';
export { DEFAULT_CONFIG, loadHookConfig } from './config/default';
export type { DefaultConfig, HookConfig, LogLevel } from './config/default';
export { createPoolKey, toPoolId, isDynamicFeePool } from './core/poolIdentity';
export { isIdentity, isZeroIdentity, normalizeIdentity } from './core/identity';
export * from './permissions';
export * from './pricing';
export * from './fees';
export * from './hook';
export * from './adapters';
export { formatFixedPoint, formatFeePct } from './utils/math';
