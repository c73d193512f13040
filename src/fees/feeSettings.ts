/**
 * Fee Settings
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Configuration records read by the fee engine:
 *   - baseFee                   global default fee
 *   - feeSensitivityMultiplier  adjustment scale, <= 1_000_000 (100%)
 *   - per-pool fee overrides    0 / miss = no override
 *   - per-pool oracle bindings  miss = no dynamic adjustment
 *
 * Setters validate first and write last. Admin checks belong to the caller.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { Identity, OracleBinding, PoolId } from '../types';
import { InvalidArgument } from '../errors';
import { HOOK_CONSTANTS } from '../config/constants';
import { isZeroIdentity, normalizeIdentity } from '../core/identity';

export interface FeeSettingsInit {
    baseFee?: number;
    feeSensitivityMultiplier?: number;
}

function assertBoundedInt(field: string, value: number, max: number): void {
    if (!Number.isInteger(value) || value < 0 || value > max) {
        throw new InvalidArgument(`${field} must be an integer in [0, ${max}]`, { field, value });
    }
}

export class FeeSettings {
    private baseFee: number = HOOK_CONSTANTS.DEFAULT_BASE_FEE;
    private feeSensitivityMultiplier: number = 0;
    private readonly feeOverrides = new Map<PoolId, number>();
    private readonly oracleBindings = new Map<PoolId, OracleBinding>();

    constructor(init: FeeSettingsInit = {}) {
        if (init.baseFee !== undefined) this.setBaseFee(init.baseFee);
        if (init.feeSensitivityMultiplier !== undefined) {
            this.setFeeSensitivityMultiplier(init.feeSensitivityMultiplier);
        }
    }

    getBaseFee(): number {
        return this.baseFee;
    }

    setBaseFee(fee: number): void {
        assertBoundedInt('baseFee', fee, HOOK_CONSTANTS.MAX_LP_FEE);
        this.baseFee = fee;
    }

    getFeeSensitivityMultiplier(): number {
        return this.feeSensitivityMultiplier;
    }

    setFeeSensitivityMultiplier(multiplier: number): void {
        assertBoundedInt('feeSensitivityMultiplier', multiplier, HOOK_CONSTANTS.MAX_SENSITIVITY_MULTIPLIER);
        this.feeSensitivityMultiplier = multiplier;
    }

    getPoolFeeOverride(poolId: PoolId): number {
        return this.feeOverrides.get(poolId) ?? 0;
    }

    /**
     * Setting 0 removes the override.
     */
    setPoolFeeOverride(poolId: PoolId, fee: number): void {
        assertBoundedInt('overrideFee', fee, HOOK_CONSTANTS.MAX_LP_FEE);
        if (fee === 0) {
            this.feeOverrides.delete(poolId);
        } else {
            this.feeOverrides.set(poolId, fee);
        }
    }

    getPoolOracleBinding(poolId: PoolId): OracleBinding | null {
        return this.oracleBindings.get(poolId) ?? null;
    }

    /**
     * Binding the null identity clears the pool's binding.
     */
    setPoolOracleBinding(poolId: PoolId, referenceSource: Identity, compareAgainstAsset0: boolean): void {
        const source = normalizeIdentity(referenceSource, 'referenceSource');
        if (isZeroIdentity(source)) {
            this.oracleBindings.delete(poolId);
            return;
        }
        this.oracleBindings.set(poolId, { referenceSource: source, compareAgainstAsset0 });
    }
}
