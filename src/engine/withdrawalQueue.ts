/**
 * Withdrawal Queue: deferred settlement when idle liquidity is short
 *
 * Per request: Pending -> Completed (terminal). Requests are never deleted;
 * ids are per-holder positions in that holder's list.
 *
 * The claim is fixed in asset units when the request is queued: later yield
 * or loss in the pool does not change `assetsOwed`.
 *
 * INVARIANT: totalQueuedAssets === Σ assetsOwed over pending requests
 */

import { InsufficientState, ValidationError } from '../core/errors';
import type { Address, WithdrawalRequest } from '../types';
import logger from '../utils/logger';

export interface EnqueueInput {
    holder: Address;
    receiver: Address;
    sharesBurned: bigint;
    assetsOwed: bigint;
}

export interface WithdrawalQueueState {
    requests: Array<[Address, WithdrawalRequest[]]>;
    totalQueuedAssets: bigint;
}

export class WithdrawalQueue {
    private requests = new Map<Address, WithdrawalRequest[]>();
    private queued = 0n;

    totalQueuedAssets(): bigint {
        return this.queued;
    }

    /**
     * Append a pending request. The caller has already burned the shares.
     */
    enqueue(input: EnqueueInput, now: number): WithdrawalRequest {
        if (input.assetsOwed <= 0n) {
            throw new ValidationError('ZERO_AMOUNT', 'cannot queue a withdrawal of zero assets', {
                holder: input.holder,
            });
        }

        let list = this.requests.get(input.holder);
        if (!list) {
            list = [];
            this.requests.set(input.holder, list);
        }

        const request: WithdrawalRequest = {
            requestId: list.length,
            holder: input.holder,
            receiver: input.receiver,
            sharesBurned: input.sharesBurned,
            assetsOwed: input.assetsOwed,
            createdAt: now,
            completed: false,
            completedAt: null,
        };
        list.push(request);
        this.queued += input.assetsOwed;

        logger.info(
            `[QUEUE] queued holder=${input.holder} id=${request.requestId} ` +
            `assets=${input.assetsOwed} shares=${input.sharesBurned} totalQueued=${this.queued}`
        );
        return request;
    }

    /**
     * Validate that a request can settle against `idle` and return it.
     * Does not mutate; pair with markCompleted once the payout succeeded.
     */
    requireSettleable(holder: Address, requestId: number, idle: bigint): WithdrawalRequest {
        const list = this.requests.get(holder) ?? [];
        if (!Number.isInteger(requestId) || requestId < 0 || requestId >= list.length) {
            throw new InsufficientState('REQUEST_NOT_FOUND', `${holder} has no request ${requestId}`, {
                holder,
                requestId,
                count: list.length,
            });
        }
        const request = list[requestId];
        if (request.completed) {
            throw new InsufficientState('REQUEST_ALREADY_COMPLETED', `request ${requestId} of ${holder} is already settled`, {
                holder,
                requestId,
            });
        }
        if (idle < request.assetsOwed) {
            throw new InsufficientState('INSUFFICIENT_LIQUIDITY', `idle ${idle} cannot cover ${request.assetsOwed}`, {
                holder,
                requestId,
                idle: idle.toString(),
                assetsOwed: request.assetsOwed.toString(),
            });
        }
        return request;
    }

    markCompleted(request: WithdrawalRequest, now: number): void {
        request.completed = true;
        request.completedAt = now;
        this.queued -= request.assetsOwed;
        logger.info(
            `[QUEUE] completed holder=${request.holder} id=${request.requestId} ` +
            `assets=${request.assetsOwed} totalQueued=${this.queued}`
        );
    }

    pending(holder: Address): WithdrawalRequest[] {
        return (this.requests.get(holder) ?? []).filter(r => !r.completed).map(r => ({ ...r }));
    }

    /** Every request of a holder, settled ones included */
    history(holder: Address): WithdrawalRequest[] {
        return (this.requests.get(holder) ?? []).map(r => ({ ...r }));
    }

    sumPendingAssets(): bigint {
        let total = 0n;
        for (const list of this.requests.values()) {
            for (const request of list) {
                if (!request.completed) total += request.assetsOwed;
            }
        }
        return total;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // CHECKPOINTS
    // ═══════════════════════════════════════════════════════════════════════════

    snapshot(): WithdrawalQueueState {
        return {
            requests: [...this.requests.entries()].map(([holder, list]) => [holder, list.map(r => ({ ...r }))]),
            totalQueuedAssets: this.queued,
        };
    }

    restore(state: WithdrawalQueueState): void {
        this.requests = new Map(state.requests.map(([holder, list]) => [holder, list.map(r => ({ ...r }))]));
        this.queued = state.totalQueuedAssets;
    }
}
