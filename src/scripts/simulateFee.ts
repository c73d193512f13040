/**
 * Simulate the dynamic fee against an in-memory pool and a static oracle.
 *
 * Run with: npx ts-node src/scripts/simulateFee.ts
 *
 * Reads BASE_FEE, FEE_SENSITIVITY_MULTIPLIER and HOOK_ADMIN from the
 * environment (.env supported).
 */

import { DEFAULT_CONFIG, loadHookConfig } from '../config/default';
import { HOOK_CONSTANTS } from '../config/constants';
import { createPoolKey, toPoolId } from '../core/poolIdentity';
import { DynamicFeeHook } from '../hook';
import { InMemoryLedger, StaticOracle } from '../adapters';
import { formatFeePct, formatFixedPoint } from '../utils/math';
import logger from '../utils/logger';

const FALLBACK_ADMIN = '0x00000000000000000000000000000000000000a1';
const TRADER = '0x00000000000000000000000000000000000000b2';
const REFERENCE_SOURCE = '0x00000000000000000000000000000000000000c3';
const DEMO_MULTIPLIER = 500_000;

// Pool quoted as asset1 per asset0; asset0 plays the volatile leg
const ASSET0 = { address: '0x1000000000000000000000000000000000000001', decimals: 18 };
const ASSET1 = { address: '0x2000000000000000000000000000000000000002', decimals: 18 };

// sqrt(price) * 2^96 for integer square roots
const SQRT_PRICES: Record<string, bigint> = {
    '3600': 60n * HOOK_CONSTANTS.Q96,
    '3969': 63n * HOOK_CONSTANTS.Q96,
};

function main(): void {
    const config = loadHookConfig({
        ...DEFAULT_CONFIG,
        HOOK_ADMIN: DEFAULT_CONFIG.HOOK_ADMIN || FALLBACK_ADMIN,
    });
    const admin = config.admin ?? FALLBACK_ADMIN;

    const ledger = new InMemoryLedger();
    const oracle = new StaticOracle();
    const hook = DynamicFeeHook.fromConfig(config, ledger, oracle);

    const poolKey = createPoolKey(ASSET0, ASSET1, HOOK_CONSTANTS.DYNAMIC_FEE_FLAG, 60);
    const poolId = toPoolId(poolKey);
    hook.onBeforeInitialize(poolKey);

    if (config.feeSensitivityMultiplier === 0) {
        hook.setFeeSensitivityMultiplier(admin, DEMO_MULTIPLIER);
    }
    hook.grantTradePermission(admin, TRADER, true);
    hook.setPoolOracleBinding(admin, poolKey, REFERENCE_SOURCE, true);
    oracle.publish(REFERENCE_SOURCE, {
        answer: 3900n * 10n ** 8n,
        decimals: 8,
        updatedAt: Math.floor(Date.now() / 1000),
    });

    for (const [label, sqrtPrice] of Object.entries(SQRT_PRICES)) {
        ledger.setSqrtPrice(poolId, sqrtPrice);

        for (const zeroForOne of [true, false]) {
            const result = hook.onBeforeTrade(TRADER, poolKey, { zeroForOne, amountSpecified: -(10n ** 18n) });
            logger.info(
                `[SIMULATE] pool=${label} ref=3900 ${result.direction} ` +
                `price0=${formatFixedPoint(result.comparedPrice, HOOK_CONSTANTS.PRICE_DECIMALS, 2)} ` +
                `fee=${formatFeePct(result.fee)} ${result.adjusted ? 'ADJUSTED' : (result.skipReason ?? '')}`
            );
        }
    }

    logger.info(`[SIMULATE] ${ledger.feeUpdates.length} fee updates pushed to the ledger`);
}

main();
