/**
 * Pool signals.
 *
 * Events raised inside a guarded operation are buffered and published only
 * after the operation commits; a rolled-back call emits nothing.
 */

import { EventEmitter } from 'events';
import type { Address, RebalanceReport, StrategyKind } from '../types';
import { describeError } from '../core/errors';
import logger from '../utils/logger';

export interface PoolEventMap {
    deposit: { caller: Address; receiver: Address; assets: bigint; shares: bigint };
    withdraw: { caller: Address; receiver: Address; owner: Address; assets: bigint; shares: bigint };
    strategyAdded: { index: number; address: Address; kind: StrategyKind; allocationBps: number; hasLockup: boolean };
    strategyUpdated: { index: number; previousBps: number; allocationBps: number };
    strategyRemoved: { index: number; address: Address };
    strategyUnwound: { index: number; address: Address; assets: bigint };
    rebalanceCompleted: RebalanceReport;
    withdrawalQueued: { holder: Address; requestId: number; shares: bigint; assets: bigint };
    withdrawalCompleted: { holder: Address; requestId: number; receiver: Address; assets: bigint };
    valuationChanged: { previousTotal: bigint; newTotal: bigint; delta: bigint; at: number };
    emergencyWithdrawal: { recovered: bigint; timestamp: number };
    committed: { operation: string; operationId: string };
}

export type PoolEventName = keyof PoolEventMap;

export type PoolEvent = {
    [K in PoolEventName]: { name: K; payload: PoolEventMap[K] };
}[PoolEventName];

export class PoolEventBus {
    private emitter = new EventEmitter();

    on<K extends PoolEventName>(name: K, listener: (payload: PoolEventMap[K]) => void): () => void {
        const wrapped = (payload: PoolEventMap[K]) => {
            try {
                listener(payload);
            } catch (err) {
                logger.error(`[POOL] listener for ${name} threw: ${describeError(err)}`);
            }
        };
        this.emitter.on(name, wrapped);
        return () => {
            this.emitter.off(name, wrapped);
        };
    }

    publish(event: PoolEvent): void {
        this.emitter.emit(event.name, event.payload);
    }
}
