/**
 * Valuation Oracle: live value of everything the pool manages
 *
 *   totalValue = idle + Σ active strategies' convertible balance
 *
 * Read-only: never mutates pool state. A strategy that fails or answers with
 * something that is not a non-negative amount makes the whole valuation
 * unavailable (ExternalFailure); there is no fallback to a stale value.
 */

import { callExternal, expectAmount } from '../core/external';
import type { Address, AssetToken, StrategyRecord } from '../types';
import type { StrategyRegistry } from './strategyRegistry';

export interface ValuationSnapshot {
    idle: bigint;
    /** index -> convertible balance, active strategies only */
    strategies: Map<number, bigint>;
    total: bigint;
}

export class ValuationOracle {
    constructor(
        private readonly poolAddress: Address,
        private readonly asset: AssetToken,
        private readonly registry: StrategyRegistry,
    ) {}

    idleBalance(): bigint {
        const context = { account: this.poolAddress };
        return expectAmount(
            'asset.balanceOf',
            context,
            callExternal('asset.balanceOf', context, () => this.asset.balanceOf(this.poolAddress)),
        );
    }

    /** Units the pool holds in a convertible strategy, asset units for a direct one */
    heldUnits(record: StrategyRecord): bigint {
        const handle = record.handle;
        const context = { index: record.index, strategy: handle.address };
        const units = handle.kind === 'convertible'
            ? callExternal('strategy.balanceOf', context, () => handle.vault.balanceOf(this.poolAddress))
            : callExternal('strategy.balanceOf', context, () => handle.account.balanceOf(this.poolAddress));
        return expectAmount('strategy.balanceOf', context, units);
    }

    strategyValue(record: StrategyRecord): bigint {
        const handle = record.handle;
        const held = this.heldUnits(record);
        if (handle.kind === 'direct' || held === 0n) return held;

        const context = { index: record.index, strategy: handle.address, units: held.toString() };
        return expectAmount(
            'strategy.convertToAssets',
            context,
            callExternal('strategy.convertToAssets', context, () => handle.vault.convertToAssets(held)),
        );
    }

    snapshot(): ValuationSnapshot {
        const idle = this.idleBalance();
        const strategies = new Map<number, bigint>();
        let total = idle;
        for (const record of this.registry.active()) {
            const value = this.strategyValue(record);
            strategies.set(record.index, value);
            total += value;
        }
        return { idle, strategies, total };
    }

    totalValue(): bigint {
        return this.snapshot().total;
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// VALUATION TRACKING (yield / loss reporting)
// ═══════════════════════════════════════════════════════════════════════════════

export interface ValuationChange {
    previousTotal: bigint;
    newTotal: bigint;
    delta: bigint;
    at: number;
}

export interface ValuationCacheState {
    value: bigint | null;
    at: number | null;
}

/**
 * Last recorded valuation. Only used to detect and report deltas; conversions
 * never read it.
 */
export class ValuationTracker {
    private value: bigint | null = null;
    private at: number | null = null;

    /**
     * Record a new total. Returns the change when a previous snapshot existed
     * and the value moved.
     */
    observe(total: bigint, now: number): ValuationChange | null {
        const previous = this.value;
        this.value = total;
        this.at = now;
        if (previous === null || previous === total) return null;
        return { previousTotal: previous, newTotal: total, delta: total - previous, at: now };
    }

    /**
     * Move the recorded value by a known flow (a queued payout) so it is not
     * reported as yield or loss later. No-op before the first observation.
     */
    shift(delta: bigint): void {
        if (this.value === null) return;
        const next = this.value + delta;
        this.value = next < 0n ? 0n : next;
    }

    last(): ValuationCacheState {
        return { value: this.value, at: this.at };
    }

    restore(state: ValuationCacheState): void {
        this.value = state.value;
        this.at = state.at;
    }
}
