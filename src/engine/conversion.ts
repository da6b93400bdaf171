/**
 * Share <-> asset conversion law.
 *
 *   shares = assets * totalSupply / totalAssets     (1:1 while no shares exist)
 *   assets = shares * totalAssets / totalSupply     (error while no shares exist)
 *
 * Rounding always favours the pool: anything the pool hands out (shares on
 * deposit, assets on redeem) rounds down, anything it takes in (assets on
 * mint, shares burned on withdraw) rounds up.
 */

import { InsufficientState } from '../core/errors';
import { mulDivDown, mulDivUp } from '../utils/math';

export type Rounding = 'down' | 'up';

/** One valuation snapshot; every conversion inside an operation uses the same basis */
export interface ConversionBasis {
    totalAssets: bigint;
    totalSupply: bigint;
}

export function sharesForAssets(basis: ConversionBasis, assets: bigint, rounding: Rounding): bigint {
    if (basis.totalSupply === 0n) return assets;
    if (basis.totalAssets === 0n) {
        throw new InsufficientState('POOL_VALUE_DEPLETED', 'shares exist but the pool holds no value', {
            totalSupply: basis.totalSupply.toString(),
        });
    }
    return rounding === 'down'
        ? mulDivDown(assets, basis.totalSupply, basis.totalAssets)
        : mulDivUp(assets, basis.totalSupply, basis.totalAssets);
}

export function assetsForShares(basis: ConversionBasis, shares: bigint, rounding: Rounding): bigint {
    if (basis.totalSupply === 0n) {
        throw new InsufficientState('NO_SHARES', 'no shares exist to convert', {
            shares: shares.toString(),
        });
    }
    return rounding === 'down'
        ? mulDivDown(shares, basis.totalAssets, basis.totalSupply)
        : mulDivUp(shares, basis.totalAssets, basis.totalSupply);
}

// Vault-standard previews
export const previewDeposit = (basis: ConversionBasis, assets: bigint): bigint =>
    sharesForAssets(basis, assets, 'down');

export const previewMint = (basis: ConversionBasis, shares: bigint): bigint =>
    basis.totalSupply === 0n ? shares : assetsForShares(basis, shares, 'up');

export const previewWithdraw = (basis: ConversionBasis, assets: bigint): bigint =>
    sharesForAssets(basis, assets, 'up');

export const previewRedeem = (basis: ConversionBasis, shares: bigint): bigint =>
    assetsForShares(basis, shares, 'down');
