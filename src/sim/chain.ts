/**
 * In-process ledger host for the demo and the tests.
 *
 * Holds the clock and every participant that keeps balances (token,
 * strategies). As a TransactionBoundary it captures all participants when a
 * pool operation begins and restores them if the operation rolls back.
 */

import type { TransactionBoundary } from '../core/transactions';
import logger from '../utils/logger';

export interface ChainParticipant {
    /** Capture current state; calling the returned function puts it back */
    capture(): () => void;
}

export interface ChainCheckpoint {
    id: number;
    restorers: Array<() => void>;
}

export const SIM_EPOCH = Date.UTC(2024, 0, 1);

export class SimulatedChain implements TransactionBoundary<ChainCheckpoint> {
    private participants: ChainParticipant[] = [];
    private now: number;
    private nextCheckpoint = 1;

    constructor(startTime: number = SIM_EPOCH) {
        this.now = startTime;
    }

    readonly clock = (): number => this.now;

    advance(ms: number): number {
        if (!Number.isFinite(ms) || ms < 0) {
            throw new RangeError(`cannot advance the clock by ${ms}`);
        }
        this.now += ms;
        return this.now;
    }

    register<P extends ChainParticipant>(participant: P): P {
        this.participants.push(participant);
        return participant;
    }

    begin(): ChainCheckpoint {
        return this.snapshot();
    }

    commit(checkpoint: ChainCheckpoint): void {
        logger.debug(`[CHAIN] commit #${checkpoint.id}`);
    }

    rollback(checkpoint: ChainCheckpoint): void {
        this.revert(checkpoint);
        logger.debug(`[CHAIN] rollback #${checkpoint.id}`);
    }

    snapshot(): ChainCheckpoint {
        return {
            id: this.nextCheckpoint++,
            restorers: this.participants.map(p => p.capture()),
        };
    }

    /** Time is not rewound */
    revert(checkpoint: ChainCheckpoint): void {
        for (let i = checkpoint.restorers.length - 1; i >= 0; i--) {
            checkpoint.restorers[i]();
        }
    }
}
