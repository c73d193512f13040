// Protocol constants for the dynamic fee hook

export const HOOK_CONSTANTS = {
    // Fixed-point radix of the pool's square-root price (2^96)
    Q96: 2n ** 96n,

    // 18-decimal fixed point used for derived pool prices
    WAD: 10n ** 18n,
    PRICE_DECIMALS: 18,

    // Square-root price bounds reported by the liquidity engine (min inclusive, max exclusive)
    MIN_SQRT_PRICE: 4295128739n,
    MAX_SQRT_PRICE: 1461446703485210103287273052203988822378723970342n,

    // ═══════════════════════════════════════════════════════════════════════════
    // FEES (hundredths of a basis point: 1_000_000 = 100%)
    // ═══════════════════════════════════════════════════════════════════════════
    MAX_LP_FEE: 1_000_000,
    MAX_UINT24: 16_777_215,
    DYNAMIC_FEE_FLAG: 0x800000,
    DEFAULT_BASE_FEE: 3000,       // 0.30%

    // Sensitivity multiplier ceiling (1_000_000 = 100%)
    MAX_SENSITIVITY_MULTIPLIER: 1_000_000,

    // Pool key bounds
    MAX_TICK_SPACING: 32767,
    MAX_DECIMALS: 255,

    ZERO_IDENTITY: '0x0000000000000000000000000000000000000000',
} as const;
