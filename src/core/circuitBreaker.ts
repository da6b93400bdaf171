/**
 * Circuit breaker: a single pause flag flipped by an admin.
 *
 * While paused, every flow into or out of the pool stops; only the emergency
 * unwind (which requires the pause) can run.
 */

import type { AccessPolicy } from './access';
import type { Address } from '../types';
import logger from '../utils/logger';

export interface PauseGate {
    isPaused(): boolean;
}

export interface CircuitState {
    paused: boolean;
    changedAt: number | null;
    changedBy: Address | null;
}

export class CircuitBreaker implements PauseGate {
    private state: CircuitState = { paused: false, changedAt: null, changedBy: null };

    constructor(
        private readonly access: AccessPolicy,
        private readonly clock: () => number = Date.now,
    ) {}

    isPaused(): boolean {
        return this.state.paused;
    }

    status(): CircuitState {
        return { ...this.state };
    }

    pause(caller: Address): void {
        this.set(caller, true);
    }

    unpause(caller: Address): void {
        this.set(caller, false);
    }

    private set(caller: Address, paused: boolean): void {
        this.access.requireRole('ADMIN', caller);
        if (this.state.paused === paused) return;
        this.state = { paused, changedAt: this.clock(), changedBy: caller };
        logger.warn(`[CIRCUIT] ${paused ? 'PAUSED' : 'RESUMED'} by=${caller}`);
    }
}
