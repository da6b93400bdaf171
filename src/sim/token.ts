/**
 * Fungible asset with balances and allowances, in base units.
 *
 * Calls are made on behalf of a sender: `connect(sender)` returns the
 * AssetToken view the pool (or a user) works with.
 */

import type { Address, AssetToken } from '../types';
import type { ChainParticipant } from './chain';

export class SimulatedToken implements ChainParticipant {
    private balances = new Map<Address, bigint>();
    private allowances = new Map<string, bigint>();
    private frozen = new Set<Address>();
    private supply = 0n;

    constructor(
        readonly address: Address,
        readonly symbol: string,
        readonly decimals: number,
    ) {}

    totalSupply(): bigint {
        return this.supply;
    }

    balanceOf(account: Address): bigint {
        return this.balances.get(account) ?? 0n;
    }

    allowance(owner: Address, spender: Address): bigint {
        return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
    }

    mint(to: Address, amount: bigint): void {
        requireNonNegative(amount);
        this.balances.set(to, this.balanceOf(to) + amount);
        this.supply += amount;
    }

    burn(from: Address, amount: bigint): void {
        requireNonNegative(amount);
        const balance = this.balanceOf(from);
        if (balance < amount) {
            throw new Error(`${this.symbol}: burn of ${amount} exceeds balance ${balance}`);
        }
        this.balances.set(from, balance - amount);
        this.supply -= amount;
    }

    /** Transfers out of a frozen account answer `false` */
    freeze(account: Address): void {
        this.frozen.add(account);
    }

    unfreeze(account: Address): void {
        this.frozen.delete(account);
    }

    transferAs(sender: Address, to: Address, amount: bigint): boolean {
        if (this.frozen.has(sender)) return false;
        this.move(sender, to, amount);
        return true;
    }

    transferFromAs(spender: Address, from: Address, to: Address, amount: bigint): boolean {
        if (this.frozen.has(from)) return false;
        const allowed = this.allowance(from, spender);
        if (allowed < amount) {
            throw new Error(`${this.symbol}: allowance ${allowed} below ${amount}`);
        }
        this.move(from, to, amount);
        this.allowances.set(allowanceKey(from, spender), allowed - amount);
        return true;
    }

    approveAs(owner: Address, spender: Address, amount: bigint): boolean {
        requireNonNegative(amount);
        this.allowances.set(allowanceKey(owner, spender), amount);
        return true;
    }

    connect(sender: Address): AssetToken {
        return {
            address: this.address,
            decimals: this.decimals,
            balanceOf: account => this.balanceOf(account),
            allowance: (owner, spender) => this.allowance(owner, spender),
            transfer: (to, amount) => this.transferAs(sender, to, amount),
            transferFrom: (from, to, amount) => this.transferFromAs(sender, from, to, amount),
            approve: (spender, amount) => this.approveAs(sender, spender, amount),
        };
    }

    capture(): () => void {
        const balances = new Map(this.balances);
        const allowances = new Map(this.allowances);
        const frozen = new Set(this.frozen);
        const supply = this.supply;
        return () => {
            this.balances = new Map(balances);
            this.allowances = new Map(allowances);
            this.frozen = new Set(frozen);
            this.supply = supply;
        };
    }

    private move(from: Address, to: Address, amount: bigint): void {
        requireNonNegative(amount);
        const balance = this.balanceOf(from);
        if (balance < amount) {
            throw new Error(`${this.symbol}: transfer of ${amount} exceeds balance ${balance}`);
        }
        this.balances.set(from, balance - amount);
        this.balances.set(to, this.balanceOf(to) + amount);
    }
}

function allowanceKey(owner: Address, spender: Address): string {
    return `${owner}->${spender}`;
}

function requireNonNegative(amount: bigint): void {
    if (amount < 0n) throw new RangeError(`negative amount ${amount}`);
}
