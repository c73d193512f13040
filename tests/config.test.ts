/**
 * Hook Config Tests
 */

import { DEFAULT_CONFIG, DefaultConfig, loadHookConfig } from '../src/config/default';
import { isHookError } from '../src/errors';

function createEnv(partial: Partial<DefaultConfig> = {}): DefaultConfig {
    return {
        ...DEFAULT_CONFIG,
        HOOK_ADMIN: '0x00000000000000000000000000000000000000A1',
        BASE_FEE: '3000',
        FEE_SENSITIVITY_MULTIPLIER: '500000',
        ...partial,
    };
}

describe('loadHookConfig', () => {
    it('parses admin, base fee and multiplier', () => {
        expect(loadHookConfig(createEnv())).toEqual({
            admin: '0x00000000000000000000000000000000000000a1',
            baseFee: 3000,
            feeSensitivityMultiplier: 500000,
        });
    });

    it('leaves the admin unset when HOOK_ADMIN is empty', () => {
        expect(loadHookConfig(createEnv({ HOOK_ADMIN: '' })).admin).toBeNull();
    });

    it('accepts the 100% multiplier ceiling', () => {
        expect(loadHookConfig(createEnv({ FEE_SENSITIVITY_MULTIPLIER: '1000000' })).feeSensitivityMultiplier)
            .toBe(1_000_000);
    });

    it.each([
        ['multiplier above 100%', { FEE_SENSITIVITY_MULTIPLIER: '1000001' }],
        ['non-numeric base fee', { BASE_FEE: 'abc' }],
        ['negative base fee', { BASE_FEE: '-1' }],
        ['base fee above 100%', { BASE_FEE: '1000001' }],
        ['null admin', { HOOK_ADMIN: '0x0000000000000000000000000000000000000000' }],
    ])('rejects a %s', (_label, overrides: Partial<DefaultConfig>) => {
        let caught: unknown;
        try {
            loadHookConfig(createEnv(overrides));
        } catch (err) {
            caught = err;
        }
        expect(isHookError(caught, 'INVALID_ARGUMENT')).toBe(true);
    });
});
