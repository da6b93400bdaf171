/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * STRATEGY REGISTRY: APPEND-ONLY, SOFT DELETE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Indices are stable handles: strategies are appended and never removed,
 * removal only clears `active`.
 *
 * INVARIANTS (checked before every mutation, registry untouched on failure):
 *   1. allocationBps <= maxAllocationBpsPerStrategy for every entry
 *   2. sum(allocationBps of active entries) <= bpsDenominator
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { InvariantViolation, ValidationError } from '../core/errors';
import { ZERO_ADDRESS, type PoolConfig } from '../config/constants';
import type { StrategyHandle, StrategyInfo, StrategyRecord } from '../types';
import logger from '../utils/logger';

export interface AddStrategyInput {
    handle: StrategyHandle;
    allocationBps: number;
    hasLockup: boolean;
}

export class StrategyRegistry {
    private records: StrategyRecord[] = [];

    constructor(
        private readonly config: Pick<PoolConfig, 'bpsDenominator' | 'maxAllocationBpsPerStrategy'>,
    ) {}

    // ═══════════════════════════════════════════════════════════════════════════
    // MUTATIONS
    // ═══════════════════════════════════════════════════════════════════════════

    add(input: AddStrategyInput, now: number): StrategyRecord {
        const { handle, allocationBps } = input;

        if (!handle.address || handle.address === ZERO_ADDRESS) {
            throw new ValidationError('NULL_ADDRESS', 'strategy address is empty');
        }
        if (this.records.some(r => r.active && r.handle.address === handle.address)) {
            throw new ValidationError('STRATEGY_ALREADY_ACTIVE', `${handle.address} is already an active strategy`, {
                address: handle.address,
            });
        }
        this.assertAllocation(allocationBps, this.activeAllocationBps());

        const record: StrategyRecord = {
            index: this.records.length,
            handle,
            allocationBps,
            hasLockup: input.hasLockup,
            active: true,
            addedAt: now,
        };
        this.records.push(record);

        logger.info(
            `[REGISTRY] added #${record.index} ${handle.kind} ${handle.address} ` +
            `allocation=${allocationBps}bps lockup=${record.hasLockup} total=${this.activeAllocationBps()}bps`
        );
        return record;
    }

    /** @returns the previous allocation */
    updateAllocation(index: number, allocationBps: number): number {
        const record = this.get(index);
        if (!record.active) {
            throw new ValidationError('STRATEGY_INACTIVE', `strategy #${index} has been removed`, { index });
        }
        this.assertAllocation(allocationBps, this.activeAllocationBps() - record.allocationBps);

        const previous = record.allocationBps;
        record.allocationBps = allocationBps;
        logger.info(`[REGISTRY] #${index} allocation ${previous}bps -> ${allocationBps}bps total=${this.activeAllocationBps()}bps`);
        return previous;
    }

    /** @returns false when the strategy was already inactive */
    remove(index: number): boolean {
        const record = this.get(index);
        if (!record.active) {
            logger.debug(`[REGISTRY] #${index} already inactive`);
            return false;
        }
        record.active = false;
        logger.info(`[REGISTRY] removed #${index} ${record.handle.address} total=${this.activeAllocationBps()}bps`);
        return true;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // QUERIES
    // ═══════════════════════════════════════════════════════════════════════════

    get(index: number): StrategyRecord {
        if (!Number.isInteger(index) || index < 0 || index >= this.records.length) {
            throw new ValidationError('INDEX_OUT_OF_RANGE', `no strategy at index ${index}`, {
                index,
                count: this.records.length,
            });
        }
        return this.records[index];
    }

    all(): readonly StrategyRecord[] {
        return this.records;
    }

    active(): StrategyRecord[] {
        return this.records.filter(r => r.active);
    }

    count(): number {
        return this.records.length;
    }

    activeAllocationBps(): number {
        return this.records.reduce((sum, r) => (r.active ? sum + r.allocationBps : sum), 0);
    }

    list(): StrategyInfo[] {
        return this.records.map(toStrategyInfo);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // CHECKPOINTS
    // ═══════════════════════════════════════════════════════════════════════════

    snapshot(): StrategyRecord[] {
        return this.records.map(r => ({ ...r }));
    }

    restore(records: StrategyRecord[]): void {
        this.records = records.map(r => ({ ...r }));
    }

    private assertAllocation(allocationBps: number, otherActiveBps: number): void {
        const { bpsDenominator, maxAllocationBpsPerStrategy } = this.config;

        if (!Number.isInteger(allocationBps) || allocationBps < 0) {
            throw new ValidationError('INVALID_ALLOCATION', `allocation must be a non-negative integer, got ${allocationBps}`, {
                allocationBps,
            });
        }
        if (allocationBps > maxAllocationBpsPerStrategy) {
            throw new InvariantViolation(
                'ALLOCATION_EXCEEDS_MAX',
                `allocation ${allocationBps}bps exceeds per-strategy cap ${maxAllocationBpsPerStrategy}bps`,
                { allocationBps, maxAllocationBpsPerStrategy },
            );
        }
        if (otherActiveBps + allocationBps > bpsDenominator) {
            throw new InvariantViolation(
                'TOTAL_ALLOCATION_INVALID',
                `aggregate allocation ${otherActiveBps + allocationBps}bps exceeds ${bpsDenominator}bps`,
                { allocationBps, otherActiveBps, bpsDenominator },
            );
        }
    }
}

export function toStrategyInfo(record: StrategyRecord): StrategyInfo {
    return {
        index: record.index,
        address: record.handle.address,
        kind: record.handle.kind,
        allocationBps: record.allocationBps,
        hasLockup: record.hasLockup,
        active: record.active,
        addedAt: record.addedAt,
    };
}
