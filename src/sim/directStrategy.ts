/**
 * Plain sub-account: holds assets for a single owner, reports them 1:1.
 * The pool can fund it but has no way to pull funds back.
 */

import type { Address, DirectStrategy } from '../types';
import type { SimulatedToken } from './token';

export class SimulatedDirectStrategy implements DirectStrategy {
    constructor(
        readonly address: Address,
        private readonly asset: SimulatedToken,
        private readonly owner: Address,
    ) {}

    balanceOf(account: Address): bigint {
        return account === this.owner ? this.asset.balanceOf(this.address) : 0n;
    }
}
