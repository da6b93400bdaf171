/**
 * Share Ledger: ownership units of the pool
 *
 * INVARIANTS:
 *   1. totalSupply === sum(balances)
 *   2. no balance or allowance is ever negative
 *
 * Zero balances are dropped so holder iteration stays proportional to
 * live holders.
 */

import { InsufficientState, ValidationError } from '../core/errors';
import type { Address } from '../types';
import { sumBigInt } from '../utils/math';
import logger from '../utils/logger';

export interface ShareLedgerState {
    totalSupply: bigint;
    balances: Array<[Address, bigint]>;
    allowances: Array<[Address, Address, bigint]>;
}

export class ShareLedger {
    private supply = 0n;
    private balances = new Map<Address, bigint>();
    private allowances = new Map<Address, Map<Address, bigint>>();

    totalSupply(): bigint {
        return this.supply;
    }

    balanceOf(holder: Address): bigint {
        return this.balances.get(holder) ?? 0n;
    }

    allowance(owner: Address, spender: Address): bigint {
        return this.allowances.get(owner)?.get(spender) ?? 0n;
    }

    holders(): Address[] {
        return [...this.balances.keys()];
    }

    sumOfBalances(): bigint {
        return sumBigInt(this.balances.values());
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // MUTATIONS
    // ═══════════════════════════════════════════════════════════════════════════

    mint(to: Address, shares: bigint): void {
        assertPositive(shares, 'mint');
        this.setBalance(to, this.balanceOf(to) + shares);
        this.supply += shares;
        logger.debug(`[LEDGER] mint to=${to} shares=${shares} supply=${this.supply}`);
    }

    burn(from: Address, shares: bigint): void {
        assertPositive(shares, 'burn');
        const balance = this.balanceOf(from);
        if (balance < shares) {
            throw new InsufficientState('INSUFFICIENT_SHARES', `${from} holds fewer shares than requested`, {
                holder: from,
                balance: balance.toString(),
                requested: shares.toString(),
            });
        }
        this.setBalance(from, balance - shares);
        this.supply -= shares;
        logger.debug(`[LEDGER] burn from=${from} shares=${shares} supply=${this.supply}`);
    }

    transfer(from: Address, to: Address, shares: bigint): void {
        assertPositive(shares, 'transfer');
        const balance = this.balanceOf(from);
        if (balance < shares) {
            throw new InsufficientState('INSUFFICIENT_SHARES', `${from} holds fewer shares than requested`, {
                holder: from,
                balance: balance.toString(),
                requested: shares.toString(),
            });
        }
        this.setBalance(from, balance - shares);
        this.setBalance(to, this.balanceOf(to) + shares);
    }

    approve(owner: Address, spender: Address, shares: bigint): void {
        if (shares < 0n) {
            throw new ValidationError('NEGATIVE_AMOUNT', 'allowance cannot be negative', { shares: shares.toString() });
        }
        let granted = this.allowances.get(owner);
        if (!granted) {
            granted = new Map();
            this.allowances.set(owner, granted);
        }
        if (shares === 0n) {
            granted.delete(spender);
            if (granted.size === 0) this.allowances.delete(owner);
        } else {
            granted.set(spender, shares);
        }
    }

    spendAllowance(owner: Address, spender: Address, shares: bigint): void {
        if (owner === spender) return;
        const current = this.allowance(owner, spender);
        if (current < shares) {
            throw new InsufficientState('INSUFFICIENT_ALLOWANCE', `${spender} may not move ${shares} shares of ${owner}`, {
                owner,
                spender,
                allowance: current.toString(),
                requested: shares.toString(),
            });
        }
        this.approve(owner, spender, current - shares);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // CHECKPOINTS
    // ═══════════════════════════════════════════════════════════════════════════

    snapshot(): ShareLedgerState {
        const allowances: Array<[Address, Address, bigint]> = [];
        for (const [owner, granted] of this.allowances) {
            for (const [spender, amount] of granted) allowances.push([owner, spender, amount]);
        }
        return {
            totalSupply: this.supply,
            balances: [...this.balances.entries()],
            allowances,
        };
    }

    restore(state: ShareLedgerState): void {
        this.supply = state.totalSupply;
        this.balances = new Map(state.balances);
        this.allowances = new Map();
        for (const [owner, spender, amount] of state.allowances) {
            this.approve(owner, spender, amount);
        }
    }

    private setBalance(holder: Address, amount: bigint): void {
        if (amount === 0n) {
            this.balances.delete(holder);
        } else {
            this.balances.set(holder, amount);
        }
    }
}

function assertPositive(shares: bigint, action: string): void {
    if (shares <= 0n) {
        throw new ValidationError('ZERO_AMOUNT', `cannot ${action} ${shares} shares`, { shares: shares.toString() });
    }
}
