/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * REBALANCER: TWO-PASS CAPITAL MOVEMENT
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * PLAN (no external writes):
 *   - one valuation snapshot for the whole call
 *   - deployable = totalValue - reserved (queued claims stay idle)
 *   - target(i)  = deployable * allocationBps(i) / 10000
 *   - a direct strategy above target cannot be unwound -> reject here
 *
 * EXECUTE:
 *   1. DIVEST: every active strategy above target returns its excess to idle
 *   2. INVEST: every active strategy below target receives its shortfall,
 *      capped by free idle (idle - reserved), in registry order
 *
 * Each movement is verified against the pool's own asset balance. Any
 * failure propagates; the caller rolls the whole operation back.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { InvariantViolation, ExternalFailure } from '../core/errors';
import { callExternal, expectAmount, expectSuccess } from '../core/external';
import type { PoolConfig } from '../config/constants';
import type {
    Address,
    AssetToken,
    ConvertibleStrategy,
    RebalanceReport,
    StrategyMovement,
    StrategyRecord,
} from '../types';
import { applyBps, minBigInt, subFloor } from '../utils/math';
import logger from '../utils/logger';
import type { StrategyRegistry } from './strategyRegistry';
import type { ValuationOracle, ValuationSnapshot } from './valuationOracle';

export interface RebalancePlan {
    snapshot: ValuationSnapshot;
    reserved: bigint;
    deployable: bigint;
    targets: Map<number, bigint>;
}

export interface RebalancerDeps {
    poolAddress: Address;
    asset: AssetToken;
    registry: StrategyRegistry;
    oracle: ValuationOracle;
    config: Pick<PoolConfig, 'bpsDenominator'>;
}

export class Rebalancer {
    constructor(private readonly deps: RebalancerDeps) {}

    plan(reserved: bigint): RebalancePlan {
        const { registry, oracle, config } = this.deps;
        const snapshot = oracle.snapshot();
        const deployable = subFloor(snapshot.total, reserved);
        const targets = new Map<number, bigint>();

        for (const record of registry.active()) {
            const target = applyBps(deployable, record.allocationBps, config.bpsDenominator);
            targets.set(record.index, target);

            const current = snapshot.strategies.get(record.index) ?? 0n;
            if (record.handle.kind === 'direct' && current > target) {
                throw new InvariantViolation(
                    'DIRECT_STRATEGY_DIVEST_UNSUPPORTED',
                    `direct strategy #${record.index} holds ${current} above target ${target} and cannot be unwound`,
                    { index: record.index, current: current.toString(), target: target.toString() },
                );
            }
        }

        return { snapshot, reserved, deployable, targets };
    }

    execute(plan: RebalancePlan, now: number): RebalanceReport {
        const { registry } = this.deps;
        const active = registry.active();

        // ═══════════════════════════════════════════════════════════════════════
        // PASS 1: DIVEST
        // ═══════════════════════════════════════════════════════════════════════
        const divested: StrategyMovement[] = [];
        for (const record of active) {
            const current = plan.snapshot.strategies.get(record.index) ?? 0n;
            const target = plan.targets.get(record.index) ?? 0n;
            if (current <= target || record.handle.kind !== 'convertible') continue;

            const excess = current - target;
            const vault = record.handle.vault;
            const context = { index: record.index, strategy: record.handle.address };
            const wanted = expectAmount(
                'strategy.convertToShares',
                context,
                callExternal('strategy.convertToShares', context, () => vault.convertToShares(excess)),
            );
            const units = minBigInt(wanted, this.deps.oracle.heldUnits(record));
            if (units === 0n) continue;

            const returned = this.redeemUnits(record, vault, units);
            divested.push({ index: record.index, address: record.handle.address, assets: returned });
            logger.info(`[REBALANCE] divest #${record.index} excess=${excess} units=${units} returned=${returned}`);
        }

        // ═══════════════════════════════════════════════════════════════════════
        // PASS 2: INVEST
        // ═══════════════════════════════════════════════════════════════════════
        const invested: StrategyMovement[] = [];
        let free = subFloor(this.deps.oracle.idleBalance(), plan.reserved);
        for (const record of active) {
            if (free === 0n) break;
            const current = plan.snapshot.strategies.get(record.index) ?? 0n;
            const target = plan.targets.get(record.index) ?? 0n;
            if (current >= target) continue;

            const amount = minBigInt(target - current, free);
            const moved = this.depositAssets(record, amount);
            if (moved === 0n) continue;

            free -= moved;
            invested.push({ index: record.index, address: record.handle.address, assets: moved });
            logger.info(`[REBALANCE] invest #${record.index} shortfall=${target - current} deposited=${moved}`);
        }

        return {
            timestamp: now,
            totalValue: plan.snapshot.total,
            deployableValue: plan.deployable,
            divested,
            invested,
            idleAfter: this.deps.oracle.idleBalance(),
        };
    }

    /**
     * Redeem units from a convertible strategy into idle and verify custody.
     * @returns assets received
     */
    redeemUnits(record: StrategyRecord, vault: ConvertibleStrategy, units: bigint): bigint {
        const { poolAddress, oracle } = this.deps;
        const context = { index: record.index, strategy: record.handle.address, units: units.toString() };

        const idleBefore = oracle.idleBalance();
        const returned = expectAmount(
            'strategy.redeem',
            context,
            callExternal('strategy.redeem', context, () => vault.redeem(units, poolAddress, poolAddress)),
        );
        const idleAfter = oracle.idleBalance();

        if (idleAfter - idleBefore !== returned) {
            throw new ExternalFailure('CUSTODY_MISMATCH', `strategy #${record.index} reported ${returned} but idle moved ${idleAfter - idleBefore}`, {
                ...context,
                reported: returned.toString(),
                received: (idleAfter - idleBefore).toString(),
            });
        }
        return returned;
    }

    /**
     * Move `amount` of idle into a strategy with an exact, single-use approval.
     * @returns assets moved (0 when the strategy would mint nothing for it)
     */
    private depositAssets(record: StrategyRecord, amount: bigint): bigint {
        const { poolAddress, asset, oracle } = this.deps;
        const handle = record.handle;
        const context = { index: record.index, strategy: handle.address, amount: amount.toString() };
        const idleBefore = oracle.idleBalance();

        if (handle.kind === 'convertible') {
            const vault = handle.vault;
            const preview = expectAmount(
                'strategy.convertToShares',
                context,
                callExternal('strategy.convertToShares', context, () => vault.convertToShares(amount)),
            );
            if (preview === 0n) {
                logger.debug(`[REBALANCE] skip #${record.index}: ${amount} buys no units`);
                return 0n;
            }

            expectSuccess('asset.approve', context, callExternal('asset.approve', context, () => asset.approve(handle.address, amount)));
            const units = expectAmount(
                'strategy.deposit',
                context,
                callExternal('strategy.deposit', context, () => vault.deposit(amount, poolAddress)),
            );
            if (units === 0n) {
                throw new ExternalFailure('ZERO_UNITS_MINTED', `strategy #${record.index} minted nothing for ${amount}`, context);
            }

            const leftover = callExternal('asset.allowance', context, () => asset.allowance(poolAddress, handle.address));
            if (leftover !== 0n) {
                expectSuccess('asset.approve', context, callExternal('asset.approve', context, () => asset.approve(handle.address, 0n)));
            }
        } else {
            expectSuccess('asset.transfer', context, callExternal('asset.transfer', context, () => asset.transfer(handle.address, amount)));
        }

        const spent = idleBefore - oracle.idleBalance();
        if (spent !== amount) {
            throw new ExternalFailure('CUSTODY_MISMATCH', `strategy #${record.index} took ${spent} instead of ${amount}`, {
                ...context,
                spent: spent.toString(),
            });
        }
        return amount;
    }
}
