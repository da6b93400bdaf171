/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * STRATEGY POOL ENGINE: PUBLIC SURFACE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * No side effects at import time beyond logger and config setup.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export {
    MultiStrategyPool,
    type AddStrategyParams,
    type PoolDependencies,
    type PoolSnapshot,
    type StrategyResolver,
    type WithdrawalOutcome,
} from './engine/MultiStrategyPool';
export type { PoolEvent, PoolEventMap, PoolEventName } from './engine/events';
export type { ValuationChange } from './engine/valuationOracle';
export * from './engine/conversion';

export * from './core/errors';
export { RoleRegistry, type AccessPolicy } from './core/access';
export { CircuitBreaker, type CircuitState, type PauseGate } from './core/circuitBreaker';
export { PASS_THROUGH_BOUNDARY, type TransactionBoundary } from './core/transactions';

export { POOL_CONFIG, ZERO_ADDRESS, loadPoolConfig, type PoolConfig } from './config/constants';
export * from './types';
export { formatUnits, parseUnits } from './utils/math';

export {
    InMemoryPoolStateRepository,
    SupabasePoolStateRepository,
    type PoolStateRepository,
} from './storage/poolStateRepository';
export { parseSnapshot, serializeSnapshot, type SerializedPoolSnapshot } from './storage/snapshotCodec';
export { PoolStatePersister, loadPool, type PersisterStats } from './services/poolStatePersister';

export { createDashboardApp, startDashboard } from './dashboard/server';
export * from './sim';
