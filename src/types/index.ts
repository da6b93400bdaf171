// ═══════════════════════════════════════════════════════════════════════════════
// SHARED POOL TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Opaque account handle on the asset ledger */
export type Address = string;

export type Role = 'ADMIN' | 'MANAGER';

// ═══════════════════════════════════════════════════════════════════════════════
// COLLABORATORS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * The underlying asset, as seen by one sender (the pool).
 * A `false` return means the transfer did not happen.
 */
export interface AssetToken {
    readonly address: Address;
    readonly decimals: number;
    balanceOf(account: Address): bigint;
    allowance(owner: Address, spender: Address): bigint;
    transfer(to: Address, amount: bigint): boolean;
    transferFrom(from: Address, to: Address, amount: bigint): boolean;
    approve(spender: Address, amount: bigint): boolean;
}

/** Share-based sub-account that publishes its own exchange rate */
export interface ConvertibleStrategy {
    readonly address: Address;
    asset(): Address;
    deposit(assets: bigint, receiver: Address): bigint;
    redeem(units: bigint, receiver: Address, owner: Address): bigint;
    convertToAssets(units: bigint): bigint;
    convertToShares(assets: bigint): bigint;
    balanceOf(account: Address): bigint;
}

/** Plain sub-account; its balance is already in asset units */
export interface DirectStrategy {
    readonly address: Address;
    balanceOf(account: Address): bigint;
}

export type StrategyKind = 'convertible' | 'direct';

export type StrategyHandle =
    | { kind: 'convertible'; address: Address; vault: ConvertibleStrategy }
    | { kind: 'direct'; address: Address; account: DirectStrategy };

// ═══════════════════════════════════════════════════════════════════════════════
// REGISTRY & QUEUE RECORDS
// ═══════════════════════════════════════════════════════════════════════════════

export interface StrategyRecord {
    /** Stable handle, never reused */
    index: number;
    handle: StrategyHandle;
    allocationBps: number;
    hasLockup: boolean;
    active: boolean;
    addedAt: number;
}

export interface StrategyInfo {
    index: number;
    address: Address;
    kind: StrategyKind;
    allocationBps: number;
    hasLockup: boolean;
    active: boolean;
    addedAt: number;
}

export interface WithdrawalRequest {
    requestId: number;
    holder: Address;
    receiver: Address;
    sharesBurned: bigint;
    assetsOwed: bigint;
    createdAt: number;
    completed: boolean;
    completedAt: number | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// REPORTING
// ═══════════════════════════════════════════════════════════════════════════════

export interface PoolMetrics {
    /** idle + convertible balance of every active strategy */
    totalValue: bigint;
    /** totalValue minus outstanding queued claims */
    totalAssets: bigint;
    idleBalance: bigint;
    totalShares: bigint;
    /** Asset units owed for one whole share */
    pricePerShare: bigint;
    totalQueued: bigint;
    strategyCount: number;
    activeStrategyCount: number;
    lastValuation: bigint | null;
    lastValuationAt: number | null;
}

export interface StrategyMovement {
    index: number;
    address: Address;
    assets: bigint;
}

export interface RebalanceReport {
    timestamp: number;
    totalValue: bigint;
    deployableValue: bigint;
    divested: StrategyMovement[];
    invested: StrategyMovement[];
    idleAfter: bigint;
}

export interface InvariantCheckResult {
    valid: boolean;
    errors: string[];
    computed: {
        sumBalances: bigint;
        totalSupply: bigint;
        activeAllocationBps: number;
        sumPendingAssets: bigint;
        totalQueuedAssets: bigint;
    };
}
