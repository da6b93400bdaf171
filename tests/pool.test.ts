/**
 * Multi-Strategy Pool Scenario Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * End-to-end flows on the simulated chain: deposit, 60/40 rebalance, yield,
 * queued withdrawal settled after a rebalance, allocation caps, share token
 * operations, previews and metrics.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { InsufficientState } from '../src/core/errors';
import type { PoolEventName } from '../src/engine/events';
import type { MultiStrategyPool } from '../src/engine/MultiStrategyPool';
import {
    createSimulatedPool,
    createVault,
    directHandle,
    fundAccount,
    SimulatedToken,
    SimulatedVaultStrategy,
    vaultHandle,
    type SimulatedPool,
} from '../src/sim';

const ALICE = 'alice';
const BOB = 'bob';

const ALL_EVENTS: PoolEventName[] = [
    'deposit',
    'withdraw',
    'strategyAdded',
    'strategyUpdated',
    'strategyRemoved',
    'strategyUnwound',
    'rebalanceCompleted',
    'withdrawalQueued',
    'withdrawalCompleted',
    'valuationChanged',
    'emergencyWithdrawal',
    'committed',
];

function recordEvents(pool: MultiStrategyPool): string[] {
    const seen: string[] = [];
    for (const name of ALL_EVENTS) pool.on(name, () => seen.push(name));
    return seen;
}

/** 1000 deposited by alice, strategies A/B at 60/40, rebalanced */
function createInvestedPool(): SimulatedPool & { a: SimulatedVaultStrategy; b: SimulatedVaultStrategy } {
    const setup = createSimulatedPool();
    const { pool, admin } = setup;
    fundAccount(setup, ALICE, 1_000n);
    pool.deposit(ALICE, 1_000n, ALICE);

    const a = createVault(setup, 'strategy-a');
    const b = createVault(setup, 'strategy-b');
    pool.addStrategy(admin, { strategy: vaultHandle(a, pool.address), allocationBps: 6000 });
    pool.addStrategy(admin, { strategy: vaultHandle(b, pool.address), allocationBps: 4000 });
    pool.rebalance(admin);
    return { ...setup, a, b };
}

describe('MultiStrategyPool', () => {
    describe('deposit', () => {
        test('first deposit into an empty pool mints 1:1', () => {
            const setup = createSimulatedPool();
            const { pool, token } = setup;
            const events = recordEvents(pool);
            fundAccount(setup, ALICE, 1_000n);

            expect(pool.deposit(ALICE, 1_000n, ALICE)).toBe(1_000n);
            expect(pool.balanceOf(ALICE)).toBe(1_000n);
            expect(pool.totalSupply()).toBe(1_000n);
            expect(pool.totalValue()).toBe(1_000n);
            expect(token.balanceOf(ALICE)).toBe(0n);
            expect(events).toEqual(['deposit', 'committed']);
        });

        test('shares can be minted to another receiver', () => {
            const setup = createSimulatedPool();
            fundAccount(setup, ALICE, 50n);

            setup.pool.deposit(ALICE, 50n, BOB);

            expect(setup.pool.balanceOf(BOB)).toBe(50n);
            expect(setup.pool.balanceOf(ALICE)).toBe(0n);
        });

        test('rejects zero amounts and empty receivers before any transfer', () => {
            const setup = createSimulatedPool();
            fundAccount(setup, ALICE, 10n);

            expect(() => setup.pool.deposit(ALICE, 0n, ALICE)).toThrow('[ZERO_AMOUNT]');
            expect(() => setup.pool.deposit(ALICE, 10n, '')).toThrow('[NULL_ADDRESS]');
            expect(setup.token.balanceOf(ALICE)).toBe(10n);
        });

        test('a deposit too small to mint a share is rejected', () => {
            const setup = createSimulatedPool();
            fundAccount(setup, ALICE, 1_000n);
            setup.pool.deposit(ALICE, 1_000n, ALICE);
            setup.token.mint(setup.pool.address, 60n);

            fundAccount(setup, BOB, 1n);
            // 1 * 1000 / 1060 = 0
            expect(() => setup.pool.deposit(BOB, 1n, BOB)).toThrow('[ZERO_SHARES]');
            expect(setup.token.balanceOf(BOB)).toBe(1n);
        });

        test('later deposits are priced against current value', () => {
            const setup = createSimulatedPool();
            fundAccount(setup, ALICE, 1_000n);
            setup.pool.deposit(ALICE, 1_000n, ALICE);
            setup.token.mint(setup.pool.address, 60n);

            fundAccount(setup, BOB, 530n);
            // 530 * 1000 / 1060 = 500
            expect(setup.pool.deposit(BOB, 530n, BOB)).toBe(500n);
        });
    });

    describe('mint', () => {
        test('pulls the rounded-up asset cost', () => {
            const setup = createSimulatedPool();
            fundAccount(setup, ALICE, 1_000n);
            setup.pool.deposit(ALICE, 1_000n, ALICE);
            setup.token.mint(setup.pool.address, 60n);

            fundAccount(setup, BOB, 100n);
            // 7 * 1060 / 1000 = 7.42 -> 8
            expect(setup.pool.mint(BOB, 7n, BOB)).toBe(8n);
            expect(setup.pool.balanceOf(BOB)).toBe(7n);
            expect(setup.token.balanceOf(BOB)).toBe(92n);
        });
    });

    describe('rebalance', () => {
        test('60/40 split of a 1000-unit pool', () => {
            const { pool } = createInvestedPool();

            expect(pool.idleBalance()).toBe(0n);
            expect(pool.strategyValue(0)).toBe(600n);
            expect(pool.strategyValue(1)).toBe(400n);
            expect(pool.totalValue()).toBe(1_000n);
        });

        test('requires the manager role', () => {
            const { pool } = createInvestedPool();
            expect(() => pool.rebalance(ALICE)).toThrow('[MISSING_ROLE]');
        });

        test('emits a report with the timestamp', () => {
            const setup = createSimulatedPool();
            const { pool, admin, chain } = setup;
            fundAccount(setup, ALICE, 100n);
            pool.deposit(ALICE, 100n, ALICE);
            pool.addStrategy(admin, { strategy: vaultHandle(createVault(setup, 'strategy-a'), pool.address), allocationBps: 5000 });

            const reports: number[] = [];
            pool.on('rebalanceCompleted', report => reports.push(report.timestamp));
            const report = pool.rebalance(admin);

            expect(reports).toEqual([chain.clock()]);
            expect(report.invested).toEqual([{ index: 0, address: 'strategy-a', assets: 50n }]);
            expect(report.idleAfter).toBe(50n);
        });
    });

    describe('yield', () => {
        test('10% on strategy A lifts value to 1060, all of it redeemable', () => {
            const { pool, a, admin, token } = createInvestedPool();
            const changes: bigint[] = [];
            pool.on('valuationChanged', change => changes.push(change.delta));

            a.simulateYield(1_000);

            expect(pool.strategyValue(0)).toBe(660n);
            expect(pool.totalValue()).toBe(1_060n);
            expect(pool.previewRedeem(1_000n)).toBe(1_060n);
            expect(pool.maxWithdraw(ALICE)).toBe(1_060n);

            const outcome = pool.redeem(ALICE, 1_000n, ALICE, ALICE);
            expect(outcome).toEqual({ status: 'queued', assets: 1_060n, shares: 1_000n, requestId: 0 });
            expect(changes).toEqual([60n]);

            pool.rebalance(admin);
            expect(pool.completeWithdrawal(ALICE, 0)).toBe(1_060n);
            expect(token.balanceOf(ALICE)).toBe(1_060n);
            expect(pool.totalSupply()).toBe(0n);
        });

        test('syncValuation reports the delta once', () => {
            const { pool, a, admin } = createInvestedPool();
            a.simulateYield(1_000);

            expect(pool.syncValuation(admin)).toMatchObject({ previousTotal: 1_000n, newTotal: 1_060n, delta: 60n });
            expect(pool.syncValuation(admin)).toBeNull();
        });

        test('a loss is reported with a negative delta', () => {
            const { pool, b, admin } = createInvestedPool();
            b.simulateLoss(2_500);

            expect(pool.syncValuation(admin)).toMatchObject({ previousTotal: 1_000n, newTotal: 900n, delta: -100n });
            expect(pool.convertToAssets(1_000n)).toBe(900n);
        });
    });

    describe('withdrawal queue', () => {
        test('queues when idle is short, settles after a rebalance, then refuses a second settlement', () => {
            const { pool, admin, token } = createInvestedPool();
            const events = recordEvents(pool);

            const outcome = pool.withdraw(ALICE, 500n, ALICE, ALICE);

            expect(outcome).toEqual({ status: 'queued', assets: 500n, shares: 500n, requestId: 0 });
            expect(pool.balanceOf(ALICE)).toBe(500n);
            expect(pool.totalQueuedAssets()).toBe(500n);
            expect(pool.pendingWithdrawals(ALICE)).toMatchObject([{ requestId: 0, assetsOwed: 500n, sharesBurned: 500n, completed: false }]);
            // queued claim is a liability: remaining shares keep their price
            expect(pool.totalAssets()).toBe(500n);
            expect(pool.convertToAssets(500n)).toBe(500n);

            expect(() => pool.completeWithdrawal(ALICE, 0)).toThrow('[INSUFFICIENT_LIQUIDITY]');

            pool.rebalance(admin);
            expect(pool.idleBalance()).toBe(500n);

            expect(pool.completeWithdrawal(ALICE, 0)).toBe(500n);
            expect(token.balanceOf(ALICE)).toBe(500n);
            expect(pool.totalQueuedAssets()).toBe(0n);
            expect(pool.pendingWithdrawals(ALICE)[0].completed).toBe(true);
            expect(pool.openWithdrawals(ALICE)).toEqual([]);

            expect(() => pool.completeWithdrawal(ALICE, 0)).toThrow(InsufficientState);
            expect(() => pool.completeWithdrawal(ALICE, 0)).toThrow('[REQUEST_ALREADY_COMPLETED]');
            expect(events).toEqual([
                'withdrawalQueued', 'committed',
                'rebalanceCompleted', 'committed',
                'withdrawalCompleted', 'committed',
            ]);
        });

        test('settles immediately when free idle covers the request', () => {
            const setup = createSimulatedPool();
            const { pool, token } = setup;
            fundAccount(setup, ALICE, 1_000n);
            pool.deposit(ALICE, 1_000n, ALICE);

            const outcome = pool.withdraw(ALICE, 400n, BOB, ALICE);

            expect(outcome).toEqual({ status: 'settled', assets: 400n, shares: 400n });
            expect(token.balanceOf(BOB)).toBe(400n);
            expect(pool.balanceOf(ALICE)).toBe(600n);
            expect(pool.totalQueuedAssets()).toBe(0n);
        });

        test('idle reserved for pending claims is not handed to new withdrawals', () => {
            const setup = createInvestedPool();
            const { pool } = setup;
            pool.withdraw(ALICE, 500n, ALICE, ALICE);
            fundAccount(setup, BOB, 200n);
            pool.deposit(BOB, 200n, BOB);

            const outcome = pool.withdraw(BOB, 100n, BOB, BOB);

            expect(outcome).toMatchObject({ status: 'queued', requestId: 0 });
            expect(pool.totalQueuedAssets()).toBe(600n);
        });

        test('a queued request pays the receiver chosen at request time', () => {
            const { pool, admin, token } = createInvestedPool();
            pool.withdraw(ALICE, 300n, 'cold-wallet', ALICE);
            pool.rebalance(admin);

            pool.completeWithdrawal('keeper', 0, ALICE);

            expect(token.balanceOf('cold-wallet')).toBe(300n);
            expect(token.balanceOf('keeper')).toBe(0n);
        });

        test('unknown requests are rejected', () => {
            const { pool } = createInvestedPool();
            expect(() => pool.completeWithdrawal(ALICE, 3)).toThrow('[REQUEST_NOT_FOUND]');
        });
    });

    describe('strategy registry', () => {
        test('a third strategy above 10000 bps fails and leaves two entries', () => {
            const setup = createInvestedPool();
            const { pool, admin } = setup;
            const c = createVault(setup, 'strategy-c');

            expect(() => pool.addStrategy(admin, { strategy: vaultHandle(c, pool.address), allocationBps: 100 }))
                .toThrow('[TOTAL_ALLOCATION_INVALID]');
            expect(pool.listStrategies()).toHaveLength(2);
        });

        test('rejects a strategy over a different asset', () => {
            const setup = createSimulatedPool();
            const other = new SimulatedToken('other-asset', 'DAI', 18);
            const vault = new SimulatedVaultStrategy('foreign', other);

            expect(() => setup.pool.addStrategy(setup.admin, { strategy: vaultHandle(vault, setup.pool.address), allocationBps: 100 }))
                .toThrow('[ASSET_MISMATCH]');
            expect(setup.pool.listStrategies()).toEqual([]);
        });

        test('add, update and remove emit events and keep indices', () => {
            const setup = createSimulatedPool();
            const { pool, admin } = setup;
            const events = recordEvents(pool);

            pool.addStrategy(admin, { strategy: vaultHandle(createVault(setup, 'strategy-a'), pool.address), allocationBps: 3000, hasLockup: true });
            pool.addStrategy(admin, { strategy: directHandle(setup, 'desk-1'), allocationBps: 1000 });
            pool.updateAllocation(admin, 0, 5000);
            pool.removeStrategy(admin, 0);
            pool.removeStrategy(admin, 0);

            expect(pool.listStrategies().map(s => [s.index, s.kind, s.allocationBps, s.active, s.hasLockup])).toEqual([
                [0, 'convertible', 5000, false, true],
                [1, 'direct', 1000, true, false],
            ]);
            expect(events.filter(e => e !== 'committed')).toEqual([
                'strategyAdded', 'strategyAdded', 'strategyUpdated', 'strategyRemoved',
            ]);
        });

        test('unwinding brings a removed strategy back to idle', () => {
            const { pool, admin } = createInvestedPool();
            pool.removeStrategy(admin, 0);
            expect(pool.totalValue()).toBe(400n);

            expect(() => pool.unwindStrategy(admin, 1)).toThrow('[STRATEGY_STILL_ACTIVE]');
            expect(pool.unwindStrategy(admin, 0)).toBe(600n);
            expect(pool.idleBalance()).toBe(600n);
            expect(pool.totalValue()).toBe(1_000n);
            expect(pool.unwindStrategy(admin, 0)).toBe(0n);
        });

        test('a removed address added back keeps its units with the live entry', () => {
            const { pool, admin, a } = createInvestedPool();
            pool.removeStrategy(admin, 0);
            expect(pool.addStrategy(admin, { strategy: vaultHandle(a, pool.address), allocationBps: 6000 })).toBe(2);

            expect(() => pool.unwindStrategy(admin, 0)).toThrow('[STRATEGY_ADDRESS_ACTIVE]');
            expect(pool.strategyValue(2)).toBe(600n);
            expect(pool.idleBalance()).toBe(0n);
            expect(pool.metrics().lastValuation).toBe(1_000n);

            pool.removeStrategy(admin, 2);
            expect(pool.unwindStrategy(admin, 0)).toBe(600n);
            expect(pool.idleBalance()).toBe(600n);
        });

        test('moving a strategy out of and back into the registry is not yield', () => {
            const { pool, admin, a } = createInvestedPool();
            const changes: bigint[] = [];
            pool.on('valuationChanged', change => changes.push(change.delta));

            pool.removeStrategy(admin, 0);
            expect(pool.metrics().lastValuation).toBe(400n);
            pool.unwindStrategy(admin, 0);
            pool.addStrategy(admin, { strategy: vaultHandle(a, pool.address), allocationBps: 6000 });
            pool.rebalance(admin);
            expect(changes).toEqual([]);

            a.simulateYield(1_000);
            pool.syncValuation(admin);
            expect(changes).toEqual([60n]);
        });

        test('direct strategies cannot be unwound', () => {
            const setup = createSimulatedPool();
            setup.pool.addStrategy(setup.admin, { strategy: directHandle(setup, 'desk-1'), allocationBps: 1000 });
            setup.pool.removeStrategy(setup.admin, 0);

            expect(() => setup.pool.unwindStrategy(setup.admin, 0)).toThrow('[DIRECT_STRATEGY_DIVEST_UNSUPPORTED]');
        });
    });

    describe('share token', () => {
        test('redeem on behalf of an owner consumes allowance', () => {
            const setup = createSimulatedPool();
            const { pool, token } = setup;
            fundAccount(setup, ALICE, 100n);
            pool.deposit(ALICE, 100n, ALICE);

            expect(() => pool.redeem(BOB, 10n, BOB, ALICE)).toThrow('[INSUFFICIENT_ALLOWANCE]');

            pool.approveShares(ALICE, BOB, 30n);
            pool.redeem(BOB, 10n, BOB, ALICE);

            expect(pool.allowance(ALICE, BOB)).toBe(20n);
            expect(pool.balanceOf(ALICE)).toBe(90n);
            expect(token.balanceOf(BOB)).toBe(10n);
        });

        test('transfers move shares between holders', () => {
            const setup = createSimulatedPool();
            fundAccount(setup, ALICE, 100n);
            setup.pool.deposit(ALICE, 100n, ALICE);

            setup.pool.transferShares(ALICE, BOB, 40n);

            expect(setup.pool.balanceOf(BOB)).toBe(40n);
            expect(setup.pool.maxRedeem(ALICE)).toBe(60n);
            expect(() => setup.pool.transferShares(ALICE, BOB, 61n)).toThrow('[INSUFFICIENT_SHARES]');
        });

        test('redeeming more than held is rejected', () => {
            const setup = createSimulatedPool();
            fundAccount(setup, ALICE, 100n);
            setup.pool.deposit(ALICE, 100n, ALICE);

            expect(() => setup.pool.redeem(ALICE, 101n, ALICE, ALICE)).toThrow('[INSUFFICIENT_SHARES]');
            expect(setup.pool.balanceOf(ALICE)).toBe(100n);
        });
    });

    describe('metrics', () => {
        test('empty pool prices one share at one asset unit', () => {
            const { pool } = createSimulatedPool();
            expect(pool.metrics()).toMatchObject({
                totalValue: 0n,
                totalShares: 0n,
                pricePerShare: 1_000_000n,
                totalQueued: 0n,
                strategyCount: 0,
            });
            expect(pool.maxWithdraw(ALICE)).toBe(0n);
        });

        test('reflects yield, queue and strategy counts', () => {
            const { pool, a } = createInvestedPool();
            a.simulateYield(1_000);
            pool.withdraw(ALICE, 106n, ALICE, ALICE);

            // 106 * 1000 / 1060 = 100 shares burned; 954 assets over 900 shares
            expect(pool.metrics()).toMatchObject({
                totalValue: 1_060n,
                totalAssets: 954n,
                idleBalance: 0n,
                totalShares: 900n,
                pricePerShare: 1_060_000n,
                totalQueued: 106n,
                strategyCount: 2,
                activeStrategyCount: 2,
                lastValuation: 1_060n,
            });
        });
    });

    describe('accounting properties', () => {
        test('holders redeem no more than the pool holds across deposits and withdrawals', () => {
            const setup = createSimulatedPool();
            const { pool, token } = setup;
            const holders = ['h1', 'h2', 'h3'];
            const amounts = [333n, 1_001n, 77n];

            holders.forEach((holder, i) => {
                fundAccount(setup, holder, amounts[i]);
                pool.deposit(holder, amounts[i], holder);
            });
            token.mint(pool.address, 19n);
            pool.withdraw('h2', 250n, 'h2', 'h2');
            fundAccount(setup, 'h4', 500n);
            pool.deposit('h4', 500n, 'h4');

            const claims = [...holders, 'h4'].map(h => pool.maxWithdraw(h));
            const total = claims.reduce((sum, c) => sum + c, 0n);

            expect(total).toBeLessThanOrEqual(pool.totalAssets());
            expect(pool.totalAssets() - total).toBeLessThanOrEqual(4n);
            expect(pool.checkInvariants().valid).toBe(true);
        });

        test('deposit then full redeem never returns more than deposited', () => {
            const setup = createSimulatedPool();
            const { pool, token } = setup;
            fundAccount(setup, ALICE, 1_000n);
            pool.deposit(ALICE, 1_000n, ALICE);
            token.mint(pool.address, 37n);

            for (const amount of [3n, 50n, 999n]) {
                fundAccount(setup, BOB, amount);
                const shares = pool.deposit(BOB, amount, BOB);
                const before = token.balanceOf(BOB);
                pool.redeem(BOB, shares, BOB, BOB);
                expect(token.balanceOf(BOB) - before).toBeLessThanOrEqual(amount);
            }
        });
    });
});
