// Configuration Constants for the strategy pool

import { ValidationError } from '../core/errors';

export interface PoolConfig {
    /** Denominator for every basis-point value */
    bpsDenominator: number;
    /** Largest target allocation a single strategy may hold */
    maxAllocationBpsPerStrategy: number;
    /** Decimals of the underlying asset (shares use the same) */
    assetDecimals: number;
}

export const POOL_CONFIG: Readonly<PoolConfig> = {
    bpsDenominator: 10_000,
    maxAllocationBpsPerStrategy: 6_000, // 60%
    assetDecimals: 6,
};

export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000';

// ═══════════════════════════════════════════════════════════════════════════════
// ENV OVERRIDES
// ═══════════════════════════════════════════════════════════════════════════════

function parseIntegerSetting(name: string, raw: string, min: number, max: number): number {
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new ValidationError('INVALID_CONFIG', `${name} must be an integer in [${min}, ${max}]`, {
            name,
            raw,
        });
    }
    return value;
}

/**
 * Read pool settings from the environment, falling back to POOL_CONFIG.
 */
export function loadPoolConfig(env: NodeJS.ProcessEnv = process.env): PoolConfig {
    const config: PoolConfig = { ...POOL_CONFIG };

    const cap = env.POOL_MAX_STRATEGY_BPS?.trim();
    if (cap) {
        config.maxAllocationBpsPerStrategy = parseIntegerSetting(
            'POOL_MAX_STRATEGY_BPS',
            cap,
            0,
            config.bpsDenominator,
        );
    }

    const decimals = env.POOL_ASSET_DECIMALS?.trim();
    if (decimals) {
        config.assetDecimals = parseIntegerSetting('POOL_ASSET_DECIMALS', decimals, 0, 36);
    }

    return config;
}
