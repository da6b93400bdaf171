/**
 * End-to-end run of a pool on the simulated chain:
 * deposit, two strategies at 60/40, rebalance, yield, a queued withdrawal
 * settled after a second rebalance.
 *
 * Run with: npm run build && npm run simulate [-- --serve]
 */

import { loadPoolConfig } from '../config/constants';
import { DEFAULT_CONFIG } from '../config/default';
import { describeError } from '../core/errors';
import { buildMetricsView, buildStrategyViews } from '../dashboard/views';
import { startDashboard } from '../dashboard/server';
import { getSupabaseClient } from '../db/supabase';
import { PoolStatePersister } from '../services/poolStatePersister';
import { createSimulatedPool, createVault, fundAccount, vaultHandle } from '../sim';
import {
    InMemoryPoolStateRepository,
    SupabasePoolStateRepository,
    type PoolStateRepository,
} from '../storage/poolStateRepository';
import { formatUnits, unitScale } from '../utils/math';
import logger from '../utils/logger';

const ONE_DAY_MS = 24 * 60 * 60 * 1000;

async function run(): Promise<void> {
    const config = loadPoolConfig();
    const setup = createSimulatedPool({ config });
    const { pool, chain, admin } = setup;
    const unit = unitScale(config.assetDecimals);
    const fmt = (amount: bigint) => formatUnits(amount, config.assetDecimals);

    const client = getSupabaseClient();
    const repository: PoolStateRepository = client
        ? new SupabasePoolStateRepository(client)
        : new InMemoryPoolStateRepository();
    const persister = new PoolStatePersister(pool, repository, DEFAULT_CONFIG.POOL_ID);
    persister.start();

    logger.info('═══════════════════════════════════════════════════════════════════');
    logger.info('STRATEGY POOL SIMULATION');
    logger.info('═══════════════════════════════════════════════════════════════════');

    const holder = 'holder-1';
    fundAccount(setup, holder, 1_000n * unit);
    const shares = pool.deposit(holder, 1_000n * unit, holder);
    logger.info(`[SIM] deposit 1000 -> ${fmt(shares)} shares, totalValue=${fmt(pool.totalValue())}`);

    const strategyA = createVault(setup, 'strategy-a');
    const strategyB = createVault(setup, 'strategy-b');
    pool.addStrategy(admin, { strategy: vaultHandle(strategyA, pool.address), allocationBps: 6_000 });
    pool.addStrategy(admin, { strategy: vaultHandle(strategyB, pool.address), allocationBps: 4_000 });

    pool.rebalance(admin);
    logger.info(
        `[SIM] after rebalance idle=${fmt(pool.idleBalance())} ` +
        `A=${fmt(pool.strategyValue(0))} B=${fmt(pool.strategyValue(1))}`
    );

    chain.advance(ONE_DAY_MS);
    strategyA.simulateYield(1_000);
    const change = pool.syncValuation(admin);
    logger.info(`[SIM] strategy A +10%: delta=${change ? fmt(change.delta) : '0'} totalValue=${fmt(pool.totalValue())}`);

    const outcome = pool.withdraw(holder, 500n * unit, holder, holder);
    logger.info(`[SIM] withdraw 500 -> ${outcome.status} (burned ${fmt(outcome.shares)} shares)`);

    if (outcome.status === 'queued') {
        pool.rebalance(admin);
        const paid = pool.completeWithdrawal(holder, outcome.requestId);
        logger.info(`[SIM] request #${outcome.requestId} completed, paid ${fmt(paid)}`);
    }

    const metrics = buildMetricsView(pool);
    logger.info(
        `[SIM] totalValue=${metrics.totalValue} shares=${metrics.totalShares} ` +
        `pricePerShare=${metrics.pricePerShare} queued=${metrics.totalQueued}`
    );
    for (const s of buildStrategyViews(pool)) {
        logger.info(`[SIM]   #${s.index} ${s.address} ${s.allocationPct}% value=${s.value}`);
    }

    const check = pool.checkInvariants();
    logger.info(`[SIM] invariants ${check.valid ? 'OK' : `BROKEN: ${check.errors.join('; ')}`}`);

    await persister.flush();
    const stats = persister.getStats();
    logger.info(`[SIM] persisted ${stats.saved} snapshots (${stats.failed} failed)`);

    if (process.argv.includes('--serve')) {
        startDashboard(pool);
    } else {
        persister.stop();
    }
}

run().catch((err: unknown) => {
    logger.error(`[SIM] failed: ${describeError(err)}`);
    process.exitCode = 1;
});
