/**
 * Pool State Persister: write-behind of committed pool state
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * RULES:
 * 1. The snapshot is taken synchronously on `committed`, so each save holds
 *    exactly the state that operation produced.
 * 2. Saves run one at a time, in commit order.
 * 3. A failed save is logged and counted; the pool keeps running. The next
 *    commit writes the full state again.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { describeError } from '../core/errors';
import {
    MultiStrategyPool,
    type PoolDependencies,
    type StrategyResolver,
} from '../engine/MultiStrategyPool';
import type { PoolStateRepository } from '../storage/poolStateRepository';
import logger from '../utils/logger';

export interface PersisterStats {
    saved: number;
    failed: number;
    lastOperationId: string | null;
    lastError: string | null;
}

export class PoolStatePersister {
    private queue: Promise<void> = Promise.resolve();
    private unsubscribe: (() => void) | null = null;
    private stats: PersisterStats = { saved: 0, failed: 0, lastOperationId: null, lastError: null };

    constructor(
        private readonly pool: MultiStrategyPool,
        private readonly repository: PoolStateRepository,
        private readonly poolId: string,
    ) {}

    start(): void {
        if (this.unsubscribe) return;
        this.unsubscribe = this.pool.on('committed', ({ operation, operationId }) => {
            this.schedule(operation, operationId);
        });
        logger.info(`[PERSIST] tracking pool ${this.poolId}`);
    }

    stop(): void {
        this.unsubscribe?.();
        this.unsubscribe = null;
    }

    /** Save the current state outside of any operation */
    persistNow(): Promise<void> {
        return this.schedule('manual', null);
    }

    /** Resolves once every scheduled save has settled */
    flush(): Promise<void> {
        return this.queue;
    }

    getStats(): PersisterStats {
        return { ...this.stats };
    }

    private schedule(operation: string, operationId: string | null): Promise<void> {
        const snapshot = this.pool.snapshot();
        this.queue = this.queue
            .then(() => this.repository.save(this.poolId, snapshot))
            .then(
                () => {
                    this.stats.saved++;
                    this.stats.lastOperationId = operationId;
                    logger.debug(`[PERSIST] saved after ${operation} op=${operationId ?? '-'}`);
                },
                (err: unknown) => {
                    this.stats.failed++;
                    this.stats.lastError = describeError(err);
                    logger.error(`[PERSIST] save after ${operation} failed: ${describeError(err)}`);
                },
            );
        return this.queue;
    }
}

/**
 * Load the stored snapshot for `poolId` and rebuild the pool from it.
 * Returns null when nothing has been stored yet.
 */
export async function loadPool(
    repository: PoolStateRepository,
    poolId: string,
    deps: PoolDependencies,
    resolve: StrategyResolver,
): Promise<MultiStrategyPool | null> {
    const snapshot = await repository.load(poolId);
    if (!snapshot) {
        logger.info(`[PERSIST] no stored state for ${poolId}`);
        return null;
    }
    return MultiStrategyPool.restore(snapshot, deps, resolve);
}
