/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * MULTI-STRATEGY POOL: SINGLE CONTEXT FOR ALL POOL STATE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Owns the share ledger, strategy registry, withdrawal queue and valuation
 * cache, and exposes every operation of the pool.
 *
 * EXECUTION RULES:
 * 1. One guarded operation at a time. A call that arrives while another is
 *    in flight (a strategy calling back in) is rejected.
 * 2. All-or-nothing. Internal state is checkpointed and the transaction
 *    boundary opened before the body runs; any failure restores both.
 * 3. Pool invariants are asserted before commit.
 * 4. Events are buffered and published after commit.
 *
 * VALUATION:
 *   totalValue  = idle + Σ active strategies
 *   totalAssets = totalValue - queued claims (what shareholders own)
 * Every conversion uses totalAssets from one snapshot per operation.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { v4 as uuidv4 } from 'uuid';
import { POOL_CONFIG, ZERO_ADDRESS, type PoolConfig } from '../config/constants';
import type { AccessPolicy } from '../core/access';
import type { PauseGate } from '../core/circuitBreaker';
import {
    describeError,
    ExternalFailure,
    InvariantViolation,
    PausedError,
    ReentrancyError,
    ValidationError,
} from '../core/errors';
import { callExternal, expectAmount, expectSuccess } from '../core/external';
import { PASS_THROUGH_BOUNDARY, type TransactionBoundary } from '../core/transactions';
import type {
    Address,
    AssetToken,
    InvariantCheckResult,
    PoolMetrics,
    RebalanceReport,
    StrategyHandle,
    StrategyInfo,
    StrategyRecord,
    WithdrawalRequest,
} from '../types';
import { mulDivDown, subFloor, unitScale } from '../utils/math';
import logger from '../utils/logger';
import {
    assetsForShares,
    previewDeposit,
    previewMint,
    previewRedeem,
    previewWithdraw,
    sharesForAssets,
    type ConversionBasis,
} from './conversion';
import { PoolEventBus, type PoolEvent, type PoolEventMap, type PoolEventName } from './events';
import { Rebalancer } from './rebalancer';
import { ShareLedger, type ShareLedgerState } from './shareLedger';
import { StrategyRegistry, toStrategyInfo } from './strategyRegistry';
import {
    ValuationOracle,
    ValuationTracker,
    type ValuationCacheState,
    type ValuationChange,
} from './valuationOracle';
import { WithdrawalQueue, type WithdrawalQueueState } from './withdrawalQueue';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface PoolDependencies {
    /** The pool's own account on the asset ledger */
    address: Address;
    asset: AssetToken;
    access: AccessPolicy;
    pauseGate: PauseGate;
    transactions?: TransactionBoundary<unknown>;
    clock?: () => number;
    config?: Partial<PoolConfig>;
}

export interface AddStrategyParams {
    strategy: StrategyHandle;
    allocationBps: number;
    hasLockup?: boolean;
}

export type WithdrawalOutcome =
    | { status: 'settled'; assets: bigint; shares: bigint }
    | { status: 'queued'; assets: bigint; shares: bigint; requestId: number };

export interface PoolSnapshot {
    version: 1;
    poolAddress: Address;
    assetAddress: Address;
    strategies: StrategyInfo[];
    shares: ShareLedgerState;
    queue: WithdrawalQueueState;
    valuation: ValuationCacheState;
}

export type StrategyResolver = (info: StrategyInfo) => StrategyHandle;

type ValuationMode = 'sync' | 'skip';

interface PoolCheckpoint {
    shares: ShareLedgerState;
    strategies: StrategyRecord[];
    queue: WithdrawalQueueState;
    valuation: ValuationCacheState;
}

// ═══════════════════════════════════════════════════════════════════════════════
// POOL
// ═══════════════════════════════════════════════════════════════════════════════

export class MultiStrategyPool {
    readonly address: Address;
    readonly asset: AssetToken;
    readonly config: Readonly<PoolConfig>;

    private readonly access: AccessPolicy;
    private readonly pauseGate: PauseGate;
    private readonly transactions: TransactionBoundary<unknown>;
    private readonly clock: () => number;

    private readonly ledger = new ShareLedger();
    private readonly registry: StrategyRegistry;
    private readonly oracle: ValuationOracle;
    private readonly queue = new WithdrawalQueue();
    private readonly tracker = new ValuationTracker();
    private readonly rebalancer: Rebalancer;
    private readonly events = new PoolEventBus();

    private inFlight: string | null = null;
    private buffered: PoolEvent[] = [];

    constructor(deps: PoolDependencies) {
        if (!deps.address || deps.address === ZERO_ADDRESS) {
            throw new ValidationError('NULL_ADDRESS', 'pool address is empty');
        }
        this.address = deps.address;
        this.asset = deps.asset;
        this.access = deps.access;
        this.pauseGate = deps.pauseGate;
        this.transactions = deps.transactions ?? PASS_THROUGH_BOUNDARY;
        this.clock = deps.clock ?? Date.now;
        this.config = { ...POOL_CONFIG, ...deps.config };

        this.registry = new StrategyRegistry(this.config);
        this.oracle = new ValuationOracle(this.address, this.asset, this.registry);
        this.rebalancer = new Rebalancer({
            poolAddress: this.address,
            asset: this.asset,
            registry: this.registry,
            oracle: this.oracle,
            config: this.config,
        });

        logger.info(
            `[POOL] initialized address=${this.address} asset=${this.asset.address} ` +
            `cap=${this.config.maxAllocationBpsPerStrategy}bps`
        );
    }

    /**
     * Rebuild a pool from a persisted snapshot. Strategy handles are resolved
     * by the caller from the stored address and kind.
     */
    static restore(snapshot: PoolSnapshot, deps: PoolDependencies, resolve: StrategyResolver): MultiStrategyPool {
        if (snapshot.poolAddress !== deps.address || snapshot.assetAddress !== deps.asset.address) {
            throw new ValidationError('SNAPSHOT_MISMATCH', 'snapshot belongs to a different pool or asset', {
                snapshotPool: snapshot.poolAddress,
                snapshotAsset: snapshot.assetAddress,
                pool: deps.address,
                asset: deps.asset.address,
            });
        }

        const pool = new MultiStrategyPool(deps);
        const records: StrategyRecord[] = snapshot.strategies.map((info, position) => {
            if (info.index !== position) {
                throw new ValidationError('SNAPSHOT_INDEX_GAP', `strategy at position ${position} has index ${info.index}`);
            }
            const handle = resolve(info);
            if (handle.kind !== info.kind || handle.address !== info.address) {
                throw new ValidationError('SNAPSHOT_HANDLE_MISMATCH', `resolved handle for #${info.index} does not match`, {
                    index: info.index,
                    expected: `${info.kind}:${info.address}`,
                    resolved: `${handle.kind}:${handle.address}`,
                });
            }
            return {
                index: info.index,
                handle,
                allocationBps: info.allocationBps,
                hasLockup: info.hasLockup,
                active: info.active,
                addedAt: info.addedAt,
            };
        });

        pool.restoreCheckpoint({
            shares: snapshot.shares,
            strategies: records,
            queue: snapshot.queue,
            valuation: snapshot.valuation,
        });

        const check = pool.checkInvariants();
        if (!check.valid) {
            throw new InvariantViolation('SNAPSHOT_INVALID', 'restored state violates pool invariants', {
                errors: check.errors,
            });
        }
        logger.info(`[POOL] restored strategies=${records.length} supply=${pool.totalSupply()} queued=${pool.totalQueuedAssets()}`);
        return pool;
    }

    on<K extends PoolEventName>(name: K, listener: (payload: PoolEventMap[K]) => void): () => void {
        return this.events.on(name, listener);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // SHARE LEDGER OPERATIONS
    // ═══════════════════════════════════════════════════════════════════════════

    /** @returns shares minted to `receiver` */
    deposit(caller: Address, assets: bigint, receiver: Address): bigint {
        return this.execute('deposit', 'sync', () => {
            this.requireNotPaused('deposit');
            requirePositive(assets, 'assets');
            requireAddress(receiver, 'receiver');

            const shares = previewDeposit(this.conversionBasis(), assets);
            if (shares === 0n) {
                throw new ValidationError('ZERO_SHARES', `${assets} assets would mint no shares`, { assets: assets.toString() });
            }

            this.pullAssets(caller, assets);
            this.ledger.mint(receiver, shares);
            this.emit({ name: 'deposit', payload: { caller, receiver, assets, shares } });
            logger.info(`[POOL] deposit caller=${caller} receiver=${receiver} assets=${assets} shares=${shares}`);
            return shares;
        });
    }

    /** @returns assets pulled from `caller` */
    mint(caller: Address, shares: bigint, receiver: Address): bigint {
        return this.execute('mint', 'sync', () => {
            this.requireNotPaused('mint');
            requirePositive(shares, 'shares');
            requireAddress(receiver, 'receiver');

            const assets = previewMint(this.conversionBasis(), shares);
            if (assets === 0n) {
                throw new ValidationError('ZERO_ASSETS', `${shares} shares would cost nothing`, { shares: shares.toString() });
            }

            this.pullAssets(caller, assets);
            this.ledger.mint(receiver, shares);
            this.emit({ name: 'deposit', payload: { caller, receiver, assets, shares } });
            logger.info(`[POOL] mint caller=${caller} receiver=${receiver} assets=${assets} shares=${shares}`);
            return assets;
        });
    }

    withdraw(caller: Address, assets: bigint, receiver: Address, owner: Address): WithdrawalOutcome {
        return this.execute('withdraw', 'sync', () => {
            this.requireNotPaused('withdraw');
            requirePositive(assets, 'assets');
            requireAddress(receiver, 'receiver');
            requireAddress(owner, 'owner');

            const shares = previewWithdraw(this.conversionBasis(), assets);
            return this.settleOrQueue(caller, receiver, owner, assets, shares);
        });
    }

    redeem(caller: Address, shares: bigint, receiver: Address, owner: Address): WithdrawalOutcome {
        return this.execute('redeem', 'sync', () => {
            this.requireNotPaused('redeem');
            requirePositive(shares, 'shares');
            requireAddress(receiver, 'receiver');
            requireAddress(owner, 'owner');

            const assets = previewRedeem(this.conversionBasis(), shares);
            if (assets === 0n) {
                throw new ValidationError('ZERO_ASSETS', `${shares} shares redeem for nothing`, { shares: shares.toString() });
            }
            return this.settleOrQueue(caller, receiver, owner, assets, shares);
        });
    }

    approveShares(caller: Address, spender: Address, shares: bigint): void {
        requireAddress(spender, 'spender');
        this.ledger.approve(caller, spender, shares);
    }

    transferShares(caller: Address, to: Address, shares: bigint): void {
        requireAddress(to, 'to');
        this.ledger.transfer(caller, to, shares);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // STRATEGY REGISTRY OPERATIONS
    // ═══════════════════════════════════════════════════════════════════════════

    /** @returns the new strategy's index */
    addStrategy(caller: Address, params: AddStrategyParams): number {
        return this.execute('addStrategy', 'skip', () => {
            this.access.requireRole('MANAGER', caller);
            const handle = params.strategy;

            if (handle.kind === 'convertible' && handle.address && handle.address !== ZERO_ADDRESS) {
                const context = { strategy: handle.address };
                const strategyAsset = callExternal('strategy.asset', context, () => handle.vault.asset());
                if (strategyAsset !== this.asset.address) {
                    throw new ValidationError('ASSET_MISMATCH', `${handle.address} does not hold the pool asset`, {
                        strategy: handle.address,
                        strategyAsset: String(strategyAsset),
                        poolAsset: this.asset.address,
                    });
                }
            }

            const record = this.registry.add(
                { handle, allocationBps: params.allocationBps, hasLockup: params.hasLockup ?? false },
                this.clock(),
            );
            // units the pool already holds there re-enter totalValue as a transfer, not yield
            this.tracker.shift(this.oracle.strategyValue(record));
            this.emit({
                name: 'strategyAdded',
                payload: {
                    index: record.index,
                    address: handle.address,
                    kind: handle.kind,
                    allocationBps: record.allocationBps,
                    hasLockup: record.hasLockup,
                },
            });
            return record.index;
        });
    }

    updateAllocation(caller: Address, index: number, allocationBps: number): void {
        this.execute('updateAllocation', 'skip', () => {
            this.access.requireRole('MANAGER', caller);
            const previousBps = this.registry.updateAllocation(index, allocationBps);
            this.emit({ name: 'strategyUpdated', payload: { index, previousBps, allocationBps } });
        });
    }

    removeStrategy(caller: Address, index: number): void {
        this.execute('removeStrategy', 'skip', () => {
            this.access.requireRole('MANAGER', caller);
            const record = this.registry.get(index);
            const departing = record.active ? this.readDepartingValue(record) : 0n;
            if (this.registry.remove(index)) {
                if (departing === null) {
                    this.tracker.restore({ value: null, at: null });
                } else {
                    this.tracker.shift(-departing);
                }
                this.emit({ name: 'strategyRemoved', payload: { index, address: this.registry.get(index).handle.address } });
            }
        });
    }

    /**
     * Bring the balance of a removed convertible strategy back to idle.
     * @returns assets recovered
     */
    unwindStrategy(caller: Address, index: number): bigint {
        return this.execute('unwindStrategy', 'sync', () => {
            this.access.requireRole('MANAGER', caller);
            const record = this.registry.get(index);
            if (record.active) {
                throw new InvariantViolation('STRATEGY_STILL_ACTIVE', `strategy #${index} must be removed before unwinding`, { index });
            }
            const handle = record.handle;
            if (handle.kind !== 'convertible') {
                throw new InvariantViolation(
                    'DIRECT_STRATEGY_DIVEST_UNSUPPORTED',
                    `direct strategy #${index} has no unwind path`,
                    { index },
                );
            }
            // the pool's units are per address, so a re-added entry owns them now
            const live = this.registry.active().find(r => r.handle.address === handle.address);
            if (live) {
                throw new InvariantViolation(
                    'STRATEGY_ADDRESS_ACTIVE',
                    `${handle.address} is active again as #${live.index}; unwinding #${index} would drain it`,
                    { index, activeIndex: live.index },
                );
            }

            const units = this.oracle.heldUnits(record);
            if (units === 0n) return 0n;

            const assets = this.rebalancer.redeemUnits(record, handle.vault, units);
            this.emit({ name: 'strategyUnwound', payload: { index, address: handle.address, assets } });
            logger.info(`[POOL] unwound #${index} units=${units} assets=${assets}`);
            return assets;
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // REBALANCE & QUEUE SETTLEMENT
    // ═══════════════════════════════════════════════════════════════════════════

    rebalance(caller: Address): RebalanceReport {
        return this.execute('rebalance', 'sync', () => {
            this.access.requireRole('MANAGER', caller);
            this.requireNotPaused('rebalance');

            const plan = this.rebalancer.plan(this.queue.totalQueuedAssets());
            const report = this.rebalancer.execute(plan, this.clock());

            this.emit({ name: 'rebalanceCompleted', payload: report });
            logger.info(
                `[REBALANCE] completed total=${report.totalValue} deployable=${report.deployableValue} ` +
                `divested=${report.divested.length} invested=${report.invested.length} idle=${report.idleAfter}`
            );
            return report;
        });
    }

    /**
     * Settle a queued request. Anyone may call on a holder's behalf; the
     * assets go to the receiver recorded when the request was queued.
     * @returns assets paid
     */
    completeWithdrawal(caller: Address, requestId: number, holder: Address = caller): bigint {
        return this.execute('completeWithdrawal', 'skip', () => {
            this.requireNotPaused('completeWithdrawal');

            const request = this.queue.requireSettleable(holder, requestId, this.oracle.idleBalance());
            this.queue.markCompleted(request, this.clock());
            this.pushAssets(request.receiver, request.assetsOwed);
            this.tracker.shift(-request.assetsOwed);

            this.emit({
                name: 'withdrawalCompleted',
                payload: { holder, requestId, receiver: request.receiver, assets: request.assetsOwed },
            });
            logger.info(`[WITHDRAWAL] completed holder=${holder} id=${requestId} assets=${request.assetsOwed} by=${caller}`);
            return request.assetsOwed;
        });
    }

    /**
     * Pull everything the pool holds in convertible strategies back to idle.
     * Only while paused. Registry entries are left as they are.
     * @returns assets recovered
     */
    emergencyWithdrawAll(caller: Address): bigint {
        return this.execute('emergencyWithdrawAll', 'skip', () => {
            this.access.requireRole('ADMIN', caller);
            if (!this.pauseGate.isPaused()) {
                throw new PausedError('emergencyWithdrawAll', true);
            }

            let recovered = 0n;
            let recoveredFromInactive = 0n;
            const visited = new Set<Address>();
            for (const record of this.registry.all()) {
                const handle = record.handle;
                if (handle.kind !== 'convertible') {
                    logger.warn(`[EMERGENCY] skipping direct strategy #${record.index} ${handle.address}`);
                    continue;
                }
                if (visited.has(handle.address)) continue;
                visited.add(handle.address);

                const units = this.oracle.heldUnits(record);
                if (units === 0n) continue;
                const assets = this.rebalancer.redeemUnits(record, handle.vault, units);
                recovered += assets;
                if (!this.registry.active().some(r => r.handle.address === handle.address)) {
                    recoveredFromInactive += assets;
                }
                logger.warn(`[EMERGENCY] recovered #${record.index} units=${units} assets=${assets}`);
            }
            // removed strategies were outside totalValue; their return is not yield
            this.tracker.shift(recoveredFromInactive);

            const timestamp = this.clock();
            this.emit({ name: 'emergencyWithdrawal', payload: { recovered, timestamp } });
            logger.warn(`[EMERGENCY] withdraw-all by=${caller} recovered=${recovered}`);
            return recovered;
        });
    }

    /** Record the current valuation, reporting yield or loss since the last one */
    syncValuation(caller: Address): ValuationChange | null {
        let change: ValuationChange | null = null;
        const unsubscribe = this.events.on('valuationChanged', payload => {
            change = payload;
        });
        try {
            this.execute('syncValuation', 'sync', () => {
                logger.debug(`[VALUATION] sync requested by=${caller}`);
            });
        } finally {
            unsubscribe();
        }
        return change;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // VIEWS
    // ═══════════════════════════════════════════════════════════════════════════

    totalValue(): bigint {
        return this.oracle.totalValue();
    }

    totalAssets(): bigint {
        return this.conversionBasis().totalAssets;
    }

    idleBalance(): bigint {
        return this.oracle.idleBalance();
    }

    strategyValue(index: number): bigint {
        return this.oracle.strategyValue(this.registry.get(index));
    }

    totalSupply(): bigint {
        return this.ledger.totalSupply();
    }

    balanceOf(holder: Address): bigint {
        return this.ledger.balanceOf(holder);
    }

    allowance(owner: Address, spender: Address): bigint {
        return this.ledger.allowance(owner, spender);
    }

    convertToShares(assets: bigint): bigint {
        return sharesForAssets(this.conversionBasis(), assets, 'down');
    }

    convertToAssets(shares: bigint): bigint {
        return assetsForShares(this.conversionBasis(), shares, 'down');
    }

    previewDeposit(assets: bigint): bigint {
        return previewDeposit(this.conversionBasis(), assets);
    }

    previewMint(shares: bigint): bigint {
        return previewMint(this.conversionBasis(), shares);
    }

    previewWithdraw(assets: bigint): bigint {
        return previewWithdraw(this.conversionBasis(), assets);
    }

    previewRedeem(shares: bigint): bigint {
        return previewRedeem(this.conversionBasis(), shares);
    }

    maxRedeem(owner: Address): bigint {
        return this.ledger.balanceOf(owner);
    }

    maxWithdraw(owner: Address): bigint {
        const shares = this.ledger.balanceOf(owner);
        return shares === 0n ? 0n : previewRedeem(this.conversionBasis(), shares);
    }

    listStrategies(): StrategyInfo[] {
        return this.registry.list();
    }

    getStrategy(index: number): StrategyInfo {
        return toStrategyInfo(this.registry.get(index));
    }

    /** Every request of the holder, in id order; settled ones carry `completed` */
    pendingWithdrawals(holder: Address): WithdrawalRequest[] {
        return this.queue.history(holder);
    }

    /** Only the requests still waiting for liquidity */
    openWithdrawals(holder: Address): WithdrawalRequest[] {
        return this.queue.pending(holder);
    }

    totalQueuedAssets(): bigint {
        return this.queue.totalQueuedAssets();
    }

    paused(): boolean {
        return this.pauseGate.isPaused();
    }

    decimals(): number {
        return this.asset.decimals;
    }

    metrics(): PoolMetrics {
        const valuation = this.oracle.snapshot();
        const totalQueued = this.queue.totalQueuedAssets();
        const totalAssets = subFloor(valuation.total, totalQueued);
        const totalShares = this.ledger.totalSupply();
        const scale = unitScale(this.asset.decimals);
        const last = this.tracker.last();

        return {
            totalValue: valuation.total,
            totalAssets,
            idleBalance: valuation.idle,
            totalShares,
            pricePerShare: totalShares === 0n ? scale : mulDivDown(scale, totalAssets, totalShares),
            totalQueued,
            strategyCount: this.registry.count(),
            activeStrategyCount: this.registry.active().length,
            lastValuation: last.value,
            lastValuationAt: last.at,
        };
    }

    checkInvariants(): InvariantCheckResult {
        const errors: string[] = [];
        const sumBalances = this.ledger.sumOfBalances();
        const totalSupply = this.ledger.totalSupply();
        const activeAllocationBps = this.registry.activeAllocationBps();
        const sumPendingAssets = this.queue.sumPendingAssets();
        const totalQueuedAssets = this.queue.totalQueuedAssets();
        const { bpsDenominator, maxAllocationBpsPerStrategy } = this.config;

        if (sumBalances !== totalSupply) {
            errors.push(`sum(balances) ${sumBalances} !== totalSupply ${totalSupply}`);
        }
        if (totalSupply < 0n) {
            errors.push(`totalSupply is negative: ${totalSupply}`);
        }
        if (activeAllocationBps > bpsDenominator) {
            errors.push(`active allocation ${activeAllocationBps}bps exceeds ${bpsDenominator}bps`);
        }
        for (const record of this.registry.all()) {
            if (record.allocationBps > maxAllocationBpsPerStrategy) {
                errors.push(`strategy #${record.index} allocation ${record.allocationBps}bps exceeds cap ${maxAllocationBpsPerStrategy}bps`);
            }
        }
        if (sumPendingAssets !== totalQueuedAssets) {
            errors.push(`sum(pending) ${sumPendingAssets} !== totalQueuedAssets ${totalQueuedAssets}`);
        }
        if (totalQueuedAssets < 0n) {
            errors.push(`totalQueuedAssets is negative: ${totalQueuedAssets}`);
        }

        return {
            valid: errors.length === 0,
            errors,
            computed: { sumBalances, totalSupply, activeAllocationBps, sumPendingAssets, totalQueuedAssets },
        };
    }

    snapshot(): PoolSnapshot {
        const checkpoint = this.captureCheckpoint();
        return {
            version: 1,
            poolAddress: this.address,
            assetAddress: this.asset.address,
            strategies: checkpoint.strategies.map(toStrategyInfo),
            shares: checkpoint.shares,
            queue: checkpoint.queue,
            valuation: checkpoint.valuation,
        };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // EXECUTION CORE
    // ═══════════════════════════════════════════════════════════════════════════

    private execute<T>(operation: string, valuation: ValuationMode, body: () => T): T {
        if (this.inFlight !== null) {
            throw new ReentrancyError(operation, this.inFlight);
        }
        this.inFlight = operation;
        this.buffered = [];

        const operationId = uuidv4();
        const checkpoint = this.captureCheckpoint();
        const external = this.transactions.begin();
        let result: T;
        let events: PoolEvent[];

        try {
            if (valuation === 'sync') this.accrueValuation();
            result = body();
            if (valuation === 'sync') this.tracker.observe(this.oracle.totalValue(), this.clock());
            this.assertInvariants(operation);
            this.transactions.commit(external);
            events = this.buffered;
        } catch (err) {
            this.restoreCheckpoint(checkpoint);
            this.transactions.rollback(external);
            logger.warn(`[POOL] ${operation} reverted op=${operationId}: ${describeError(err)}`);
            throw err;
        } finally {
            this.buffered = [];
            this.inFlight = null;
        }

        logger.debug(`[POOL] ${operation} committed op=${operationId}`);
        for (const event of events) this.events.publish(event);
        this.events.publish({ name: 'committed', payload: { operation, operationId } });
        return result;
    }

    /** Report yield or loss accrued since the last recorded valuation */
    private accrueValuation(): void {
        const change = this.tracker.observe(this.oracle.totalValue(), this.clock());
        if (!change) return;

        logger.info(
            `[VALUATION] ${change.delta > 0n ? 'yield' : 'loss'} previous=${change.previousTotal} ` +
            `new=${change.newTotal} delta=${change.delta}`
        );
        this.emit({ name: 'valuationChanged', payload: change });
    }

    private conversionBasis(): ConversionBasis {
        return {
            totalAssets: subFloor(this.oracle.totalValue(), this.queue.totalQueuedAssets()),
            totalSupply: this.ledger.totalSupply(),
        };
    }

    private settleOrQueue(
        caller: Address,
        receiver: Address,
        owner: Address,
        assets: bigint,
        shares: bigint,
    ): WithdrawalOutcome {
        if (caller !== owner) {
            this.ledger.spendAllowance(owner, caller, shares);
        }
        this.ledger.burn(owner, shares);

        const free = subFloor(this.oracle.idleBalance(), this.queue.totalQueuedAssets());
        if (free >= assets) {
            this.pushAssets(receiver, assets);
            this.emit({ name: 'withdraw', payload: { caller, receiver, owner, assets, shares } });
            logger.info(`[WITHDRAWAL] settled owner=${owner} receiver=${receiver} assets=${assets} shares=${shares}`);
            return { status: 'settled', assets, shares };
        }

        const request = this.queue.enqueue(
            { holder: owner, receiver, sharesBurned: shares, assetsOwed: assets },
            this.clock(),
        );
        this.emit({
            name: 'withdrawalQueued',
            payload: { holder: owner, requestId: request.requestId, shares, assets },
        });
        logger.info(`[WITHDRAWAL] queued owner=${owner} id=${request.requestId} assets=${assets} free=${free}`);
        return { status: 'queued', assets, shares, requestId: request.requestId };
    }

    /** Funds arrive before any accounting is created for them */
    private pullAssets(from: Address, amount: bigint): void {
        const context = { from, amount: amount.toString() };
        const before = this.oracle.idleBalance();
        expectSuccess(
            'asset.transferFrom',
            context,
            callExternal('asset.transferFrom', context, () => this.asset.transferFrom(from, this.address, amount)),
        );
        const received = this.oracle.idleBalance() - before;
        if (received !== amount) {
            throw new ExternalFailure('CUSTODY_MISMATCH', `expected ${amount} but received ${received}`, {
                ...context,
                received: received.toString(),
            });
        }
    }

    private pushAssets(to: Address, amount: bigint): void {
        const context = { to, amount: amount.toString() };
        const before = this.oracle.idleBalance();
        expectSuccess('asset.transfer', context, callExternal('asset.transfer', context, () => this.asset.transfer(to, amount)));
        const sent = expectAmount('asset.balanceOf', context, before - this.oracle.idleBalance());
        if (sent !== amount) {
            throw new ExternalFailure('CUSTODY_MISMATCH', `expected to send ${amount} but idle moved ${sent}`, {
                ...context,
                sent: sent.toString(),
            });
        }
    }

    /**
     * Value that leaves totalValue with a removed strategy. An unreachable
     * strategy yields null and the valuation baseline starts over.
     */
    private readDepartingValue(record: StrategyRecord): bigint | null {
        try {
            return this.oracle.strategyValue(record);
        } catch (err) {
            if (!(err instanceof ExternalFailure)) throw err;
            logger.warn(`[VALUATION] #${record.index} unreadable on removal, baseline reset: ${describeError(err)}`);
            return null;
        }
    }

    private requireNotPaused(operation: string): void {
        if (this.pauseGate.isPaused()) {
            throw new PausedError(operation, false);
        }
    }

    private emit(event: PoolEvent): void {
        this.buffered.push(event);
    }

    private assertInvariants(operation: string): void {
        const check = this.checkInvariants();
        if (!check.valid) {
            logger.error(`[POOL] invariant violation after ${operation}:\n${check.errors.map(e => `  - ${e}`).join('\n')}`);
            throw new InvariantViolation('POOL_INVARIANT_BROKEN', `${operation} would break pool invariants`, {
                operation,
                errors: check.errors,
            });
        }
    }

    private captureCheckpoint(): PoolCheckpoint {
        return {
            shares: this.ledger.snapshot(),
            strategies: this.registry.snapshot(),
            queue: this.queue.snapshot(),
            valuation: this.tracker.last(),
        };
    }

    private restoreCheckpoint(checkpoint: PoolCheckpoint): void {
        this.ledger.restore(checkpoint.shares);
        this.registry.restore(checkpoint.strategies);
        this.queue.restore(checkpoint.queue);
        this.tracker.restore(checkpoint.valuation);
    }
}

function requirePositive(amount: bigint, name: string): void {
    if (amount <= 0n) {
        throw new ValidationError('ZERO_AMOUNT', `${name} must be positive, got ${amount}`, { [name]: amount.toString() });
    }
}

function requireAddress(address: Address, name: string): void {
    if (!address || address === ZERO_ADDRESS) {
        throw new ValidationError('NULL_ADDRESS', `${name} address is empty`, { [name]: address });
    }
}
