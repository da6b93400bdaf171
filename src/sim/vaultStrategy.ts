/**
 * Share-based strategy over a SimulatedToken.
 *
 * Issues units against the assets it holds; yield and loss change the assets
 * it holds, and so the exchange rate. Supports a redemption lock, a deposit
 * cap, an injected failure, and a hook that runs in the middle of a deposit
 * or redeem (used to call back into the pool).
 */

import type { Address, ConvertibleStrategy } from '../types';
import { mulDivDown } from '../utils/math';
import type { ChainParticipant } from './chain';
import type { SimulatedToken } from './token';

export type VaultAction = 'deposit' | 'redeem';

export interface SimulatedVaultOptions {
    /** Maximum assets the strategy accepts in total */
    depositCap?: bigint;
    clock?: () => number;
}

export class SimulatedVaultStrategy implements ChainParticipant {
    private units = new Map<Address, bigint>();
    private totalUnits = 0n;
    private lockedUntil = 0;
    private failure: string | null = null;
    private hook: ((action: VaultAction) => void) | null = null;
    private readonly depositCap: bigint | null;
    private readonly clock: () => number;

    constructor(
        readonly address: Address,
        private readonly asset: SimulatedToken,
        options: SimulatedVaultOptions = {},
    ) {
        this.depositCap = options.depositCap ?? null;
        this.clock = options.clock ?? Date.now;
    }

    totalAssets(): bigint {
        return this.asset.balanceOf(this.address);
    }

    totalSupply(): bigint {
        return this.totalUnits;
    }

    balanceOf(account: Address): bigint {
        this.checkFailure();
        return this.units.get(account) ?? 0n;
    }

    convertToShares(assets: bigint): bigint {
        this.checkFailure();
        if (this.totalUnits === 0n) return assets;
        const held = this.totalAssets();
        return held === 0n ? 0n : mulDivDown(assets, this.totalUnits, held);
    }

    convertToAssets(units: bigint): bigint {
        this.checkFailure();
        if (this.totalUnits === 0n) return units;
        return mulDivDown(units, this.totalAssets(), this.totalUnits);
    }

    depositAs(sender: Address, assets: bigint, receiver: Address): bigint {
        this.checkFailure();
        if (this.depositCap !== null && this.totalAssets() + assets > this.depositCap) {
            throw new Error(`deposit cap ${this.depositCap} exceeded`);
        }
        const minted = this.convertToShares(assets);
        if (!this.asset.transferFromAs(this.address, sender, this.address, assets)) {
            throw new Error('asset transfer into strategy failed');
        }
        this.units.set(receiver, this.balanceOf(receiver) + minted);
        this.totalUnits += minted;
        this.hook?.('deposit');
        return minted;
    }

    redeemAs(sender: Address, units: bigint, receiver: Address, owner: Address): bigint {
        this.checkFailure();
        if (this.clock() < this.lockedUntil) {
            throw new Error(`redemptions locked until ${new Date(this.lockedUntil).toISOString()}`);
        }
        if (sender !== owner) {
            throw new Error('only the owner may redeem');
        }
        const held = this.balanceOf(owner);
        if (held < units) {
            throw new Error(`redeem of ${units} exceeds held ${held}`);
        }
        const assets = this.convertToAssets(units);
        this.units.set(owner, held - units);
        this.totalUnits -= units;
        if (!this.asset.transferAs(this.address, receiver, assets)) {
            throw new Error('asset transfer out of strategy failed');
        }
        this.hook?.('redeem');
        return assets;
    }

    /** Grow held assets by `bps` of their current value */
    simulateYield(bps: number): bigint {
        const gain = mulDivDown(this.totalAssets(), BigInt(bps), 10_000n);
        this.asset.mint(this.address, gain);
        return gain;
    }

    /** Shrink held assets by `bps` of their current value */
    simulateLoss(bps: number): bigint {
        const loss = mulDivDown(this.totalAssets(), BigInt(bps), 10_000n);
        this.asset.burn(this.address, loss);
        return loss;
    }

    lockUntil(timestamp: number): void {
        this.lockedUntil = timestamp;
    }

    /** Every call throws `message` until cleared with null */
    setFailure(message: string | null): void {
        this.failure = message;
    }

    setHook(hook: ((action: VaultAction) => void) | null): void {
        this.hook = hook;
    }

    connect(sender: Address): ConvertibleStrategy {
        return {
            address: this.address,
            asset: () => {
                this.checkFailure();
                return this.asset.address;
            },
            deposit: (assets, receiver) => this.depositAs(sender, assets, receiver),
            redeem: (units, receiver, owner) => this.redeemAs(sender, units, receiver, owner),
            convertToAssets: units => this.convertToAssets(units),
            convertToShares: assets => this.convertToShares(assets),
            balanceOf: account => this.balanceOf(account),
        };
    }

    capture(): () => void {
        const units = new Map(this.units);
        const totalUnits = this.totalUnits;
        return () => {
            this.units = new Map(units);
            this.totalUnits = totalUnits;
        };
    }

    private checkFailure(): void {
        if (this.failure !== null) throw new Error(this.failure);
    }
}
