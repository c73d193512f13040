/**
 * Dynamic Fee Hook
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Boundary adapter invoked by the liquidity engine before pool events.
 *
 *   onBeforeInitialize       pool must be declared with the dynamic-fee flag
 *   onBeforeLiquidityChange  actor needs the manageLiquidity capability
 *   onBeforeTrade            actor needs the trade capability and the pool the
 *                            dynamic-fee flag; the fee for the trade is
 *                            computed and pushed to the engine
 *
 * Trade flow:
 *   readPriceSnapshot → derivePoolPrices → (bound) readReferencePrice
 *   → computeFee → setDynamicFee
 *
 * Any failure happens before setDynamicFee, so a failed event leaves no trace.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import {
    Identity,
    LiquidityChangeParams,
    OracleBinding,
    PoolId,
    PoolKey,
    TradeDirection,
    TradeParams,
} from '../types';
import { Forbidden, InvalidArgument } from '../errors';
import { HookConfig } from '../config/default';
import { isDynamicFeePool, toPoolId } from '../core/poolIdentity';
import { shortId } from '../core/identity';
import { PermissionGate } from '../permissions';
import { derivePoolPrices, readReferencePrice } from '../pricing';
import { computeFee, FeeComputation, FeeSettings } from '../fees';
import { formatFeePct } from '../utils/math';
import logger from '../utils/logger';
import { LedgerCollaborator, OracleCollaborator } from './collaborators';

export interface DynamicFeeHookOptions {
    ledger: LedgerCollaborator;
    oracle: OracleCollaborator;
    /** Leave unset to require a one-time setAdmin */
    admin?: Identity;
    baseFee?: number;
    feeSensitivityMultiplier?: number;
}

/**
 * A pool addressed by key or by its derived id.
 */
export type PoolRef = PoolKey | PoolId;

export interface TradeEvaluation extends FeeComputation {
    poolId: PoolId;
    direction: TradeDirection;
}

function resolvePoolId(pool: PoolRef): PoolId {
    return typeof pool === 'string' ? pool : toPoolId(pool);
}

export function toTradeDirection(zeroForOne: boolean): TradeDirection {
    return zeroForOne ? 'asset0ToAsset1' : 'asset1ToAsset0';
}

export class DynamicFeeHook {
    private readonly ledger: LedgerCollaborator;
    private readonly oracle: OracleCollaborator;
    private readonly permissions: PermissionGate;
    private readonly settings: FeeSettings;

    constructor(options: DynamicFeeHookOptions) {
        this.ledger = options.ledger;
        this.oracle = options.oracle;
        this.permissions = new PermissionGate(options.admin);
        this.settings = new FeeSettings({
            baseFee: options.baseFee,
            feeSensitivityMultiplier: options.feeSensitivityMultiplier,
        });
    }

    static fromConfig(
        config: HookConfig,
        ledger: LedgerCollaborator,
        oracle: OracleCollaborator
    ): DynamicFeeHook {
        return new DynamicFeeHook({
            ledger,
            oracle,
            admin: config.admin ?? undefined,
            baseFee: config.baseFee,
            feeSensitivityMultiplier: config.feeSensitivityMultiplier,
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // INBOUND EVENTS
    // ═══════════════════════════════════════════════════════════════════════════

    onBeforeInitialize(poolKey: PoolKey): void {
        if (!isDynamicFeePool(poolKey)) {
            throw new InvalidArgument('pool must use the dynamic fee flag', { fee: poolKey.fee });
        }
        logger.info(`[HOOK] Pool ${shortId(toPoolId(poolKey))} initialized with dynamic fee`);
    }

    onBeforeLiquidityChange(actor: Identity, poolKey: PoolKey, params: LiquidityChangeParams): void {
        if (!this.permissions.check('manageLiquidity', actor)) {
            const action = params.liquidityDelta < 0n ? 'remove' : 'add';
            logger.warn(`[HOOK] Liquidity ${action} blocked for ${shortId(actor)}`);
            throw new Forbidden('actor may not manage liquidity', {
                actor,
                poolId: toPoolId(poolKey),
            });
        }
    }

    onBeforeTrade(actor: Identity, poolKey: PoolKey, params: TradeParams): TradeEvaluation {
        if (!this.permissions.check('trade', actor)) {
            logger.warn(`[HOOK] Trade blocked for ${shortId(actor)}`);
            throw new Forbidden('actor may not trade', { actor, poolId: toPoolId(poolKey) });
        }

        if (!isDynamicFeePool(poolKey)) {
            throw new InvalidArgument('pool does not use the dynamic fee flag', {
                poolId: toPoolId(poolKey),
                fee: poolKey.fee,
            });
        }

        const evaluation = this.evaluate(poolKey, toTradeDirection(params.zeroForOne));
        this.ledger.setDynamicFee(evaluation.poolId, evaluation.fee);

        logger.info(
            `[HOOK] Trade ${evaluation.direction} pool=${shortId(evaluation.poolId)} ` +
            `fee=${formatFeePct(evaluation.fee)}${evaluation.adjusted ? ` (+${evaluation.adjustment})` : ''}`
        );
        return evaluation;
    }

    /**
     * Fee a trade in the given direction would pay right now. No permission
     * check and no write to the engine.
     */
    quoteFee(poolKey: PoolKey, zeroForOne: boolean): TradeEvaluation {
        return this.evaluate(poolKey, toTradeDirection(zeroForOne));
    }

    private evaluate(poolKey: PoolKey, direction: TradeDirection): TradeEvaluation {
        const poolId = toPoolId(poolKey);
        const { price0, price1 } = derivePoolPrices(this.ledger.readPriceSnapshot(poolId));
        const binding = this.settings.getPoolOracleBinding(poolId);

        let referencePrice: bigint | null = null;
        if (binding) {
            const target = binding.compareAgainstAsset0 ? poolKey.currency0 : poolKey.currency1;
            referencePrice = readReferencePrice(this.oracle, binding, target.decimals).value;
        }

        const computation = computeFee({
            baseFee: this.settings.getBaseFee(),
            overrideFee: this.settings.getPoolFeeOverride(poolId),
            price0,
            price1,
            referencePrice,
            compareAgainstAsset0: binding?.compareAgainstAsset0 ?? false,
            direction,
            sensitivityMultiplier: this.settings.getFeeSensitivityMultiplier(),
        });

        return { ...computation, poolId, direction };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // ADMINISTRATIVE SURFACE
    // ═══════════════════════════════════════════════════════════════════════════

    setAdmin(caller: Identity, admin: Identity): void {
        this.permissions.setAdmin(caller, admin);
    }

    updateAdmin(caller: Identity, admin: Identity): void {
        this.permissions.transferAdmin(caller, admin);
    }

    setBaseFee(caller: Identity, fee: number): void {
        this.permissions.requireAdmin(caller);
        this.settings.setBaseFee(fee);
        logger.info(`[CONFIG] Base fee set to ${formatFeePct(fee)}`);
    }

    setFeeSensitivityMultiplier(caller: Identity, multiplier: number): void {
        this.permissions.requireAdmin(caller);
        this.settings.setFeeSensitivityMultiplier(multiplier);
        logger.info(`[CONFIG] Fee sensitivity multiplier set to ${multiplier}`);
    }

    setPoolFeeOverride(caller: Identity, pool: PoolRef, fee: number): void {
        this.permissions.requireAdmin(caller);
        const poolId = resolvePoolId(pool);
        this.settings.setPoolFeeOverride(poolId, fee);
        logger.info(`[CONFIG] Pool ${shortId(poolId)} fee override ${fee === 0 ? 'cleared' : formatFeePct(fee)}`);
    }

    setPoolOracleBinding(
        caller: Identity,
        pool: PoolRef,
        referenceSource: Identity,
        compareAgainstAsset0: boolean
    ): void {
        this.permissions.requireAdmin(caller);
        const poolId = resolvePoolId(pool);
        this.settings.setPoolOracleBinding(poolId, referenceSource, compareAgainstAsset0);
        logger.info(
            `[CONFIG] Pool ${shortId(poolId)} oracle binding -> ${shortId(referenceSource)} ` +
            `(compare asset${compareAgainstAsset0 ? '0' : '1'})`
        );
    }

    grantTradePermission(caller: Identity, identity: Identity, allowed: boolean): void {
        this.permissions.grant(caller, 'trade', identity, allowed);
    }

    grantLiquidityPermission(caller: Identity, identity: Identity, allowed: boolean): void {
        this.permissions.grant(caller, 'manageLiquidity', identity, allowed);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // READS
    // ═══════════════════════════════════════════════════════════════════════════

    getAdmin(): Identity | null {
        return this.permissions.getAdmin();
    }

    getBaseFee(): number {
        return this.settings.getBaseFee();
    }

    getFeeSensitivityMultiplier(): number {
        return this.settings.getFeeSensitivityMultiplier();
    }

    getPoolFeeOverride(pool: PoolRef): number {
        return this.settings.getPoolFeeOverride(resolvePoolId(pool));
    }

    getPoolOracleBinding(pool: PoolRef): OracleBinding | null {
        return this.settings.getPoolOracleBinding(resolvePoolId(pool));
    }

    hasTradePermission(identity: Identity): boolean {
        return this.permissions.check('trade', identity);
    }

    hasLiquidityPermission(identity: Identity): boolean {
        return this.permissions.check('manageLiquidity', identity);
    }
}
