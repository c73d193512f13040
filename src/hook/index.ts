export { DynamicFeeHook, toTradeDirection } from './dynamicFeeHook';
export type { DynamicFeeHookOptions, PoolRef, TradeEvaluation } from './dynamicFeeHook';
export type { LedgerCollaborator } from './collaborators';
