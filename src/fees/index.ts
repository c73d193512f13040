/**
 * Fee Module
 *
 * Static fee selection, oracle-driven directional adjustment and the
 * configuration records behind them.
 */

export type { FeeInput, FeeComputation, SkipReason } from './types';
export { computeFee, isAdverseTrade, selectStaticFee } from './feeEngine';
export { FeeSettings } from './feeSettings';
export type { FeeSettingsInit } from './feeSettings';
