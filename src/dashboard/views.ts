/**
 * Read models for the dashboard. Amounts are rendered as decimal strings in
 * asset units; raw base-unit values are kept alongside where operators need
 * them exact.
 */

import type { MultiStrategyPool } from '../engine/MultiStrategyPool';
import type { Address, StrategyKind } from '../types';
import { formatUnits, percentageChange, toBigNumber } from '../utils/math';

export interface MetricsView {
    totalValue: string;
    totalAssets: string;
    idleBalance: string;
    totalShares: string;
    pricePerShare: string;
    totalQueued: string;
    /** Change of totalValue against the last recorded valuation, in percent */
    changeSinceLastValuationPct: string;
    strategyCount: number;
    activeStrategyCount: number;
    paused: boolean;
    lastValuationAt: string | null;
    raw: {
        totalValue: string;
        totalAssets: string;
        totalShares: string;
        totalQueued: string;
    };
}

export interface StrategyView {
    index: number;
    address: Address;
    kind: StrategyKind;
    allocationBps: number;
    allocationPct: string;
    hasLockup: boolean;
    active: boolean;
    value: string;
    addedAt: string;
}

export interface WithdrawalView {
    requestId: number;
    receiver: Address;
    shares: string;
    assets: string;
    status: 'pending' | 'completed';
    createdAt: string;
    completedAt: string | null;
}

export interface InvariantView {
    valid: boolean;
    errors: string[];
    computed: Record<string, string>;
}

export function buildMetricsView(pool: MultiStrategyPool): MetricsView {
    const m = pool.metrics();
    const decimals = pool.decimals();
    return {
        totalValue: formatUnits(m.totalValue, decimals),
        totalAssets: formatUnits(m.totalAssets, decimals),
        idleBalance: formatUnits(m.idleBalance, decimals),
        totalShares: formatUnits(m.totalShares, decimals),
        pricePerShare: formatUnits(m.pricePerShare, decimals),
        totalQueued: formatUnits(m.totalQueued, decimals),
        changeSinceLastValuationPct: m.lastValuation === null ? '0.00' : percentageChange(m.totalValue, m.lastValuation),
        strategyCount: m.strategyCount,
        activeStrategyCount: m.activeStrategyCount,
        paused: pool.paused(),
        lastValuationAt: m.lastValuationAt === null ? null : new Date(m.lastValuationAt).toISOString(),
        raw: {
            totalValue: m.totalValue.toString(),
            totalAssets: m.totalAssets.toString(),
            totalShares: m.totalShares.toString(),
            totalQueued: m.totalQueued.toString(),
        },
    };
}

export function buildStrategyViews(pool: MultiStrategyPool): StrategyView[] {
    const decimals = pool.decimals();
    return pool.listStrategies().map(s => ({
        index: s.index,
        address: s.address,
        kind: s.kind,
        allocationBps: s.allocationBps,
        allocationPct: toBigNumber(s.allocationBps).div(100).toFixed(2),
        hasLockup: s.hasLockup,
        active: s.active,
        value: formatUnits(pool.strategyValue(s.index), decimals),
        addedAt: new Date(s.addedAt).toISOString(),
    }));
}

export function buildWithdrawalViews(pool: MultiStrategyPool, holder: Address): WithdrawalView[] {
    const decimals = pool.decimals();
    return pool.pendingWithdrawals(holder).map(r => ({
        requestId: r.requestId,
        receiver: r.receiver,
        shares: formatUnits(r.sharesBurned, decimals),
        assets: formatUnits(r.assetsOwed, decimals),
        status: r.completed ? 'completed' : 'pending',
        createdAt: new Date(r.createdAt).toISOString(),
        completedAt: r.completedAt === null ? null : new Date(r.completedAt).toISOString(),
    }));
}

export function buildInvariantView(pool: MultiStrategyPool): InvariantView {
    const check = pool.checkInvariants();
    const computed: Record<string, string> = {};
    for (const [key, value] of Object.entries(check.computed)) {
        computed[key] = String(value);
    }
    return { valid: check.valid, errors: check.errors, computed };
}

// ═══════════════════════════════════════════════════════════════════════════════
// HTML
// ═══════════════════════════════════════════════════════════════════════════════

export function escapeHtml(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

export function renderDashboardHtml(metrics: MetricsView, strategies: StrategyView[]): string {
    const rows = strategies.length === 0
        ? '<div class="empty-state">No strategies registered</div>'
        : strategies.map(s => `
            <div class="strategy-item ${s.active ? '' : 'inactive'}">
              <div class="strategy-name">#${s.index} ${escapeHtml(s.address)}</div>
              <div class="strategy-type">${s.kind}${s.hasLockup ? ' • lockup' : ''}${s.active ? '' : ' • removed'}</div>
              <div class="strategy-stat">${s.allocationPct}%</div>
              <div class="strategy-stat">${s.value}</div>
            </div>`).join('');

    return `<!DOCTYPE html>
<html>
<head>
  <title>Strategy Pool Dashboard</title>
  <meta http-equiv="refresh" content="30">
  <style>
    * { margin: 0; padding: 0; box-sizing: border-box; }
    body { font-family: 'Segoe UI', Tahoma, Geneva, Verdana, sans-serif; background: #0a0e27; color: #e0e6ed; padding: 20px; }
    .container { max-width: 1200px; margin: 0 auto; }
    h1 { font-size: 2em; margin-bottom: 20px; text-align: center; color: #06b6d4; }
    .grid { display: grid; grid-template-columns: repeat(3, 1fr); gap: 20px; margin-bottom: 30px; }
    .card { background: #1a1f3a; border-radius: 12px; padding: 20px; }
    .card h3 { font-size: 0.85em; color: #8b95a5; text-transform: uppercase; margin-bottom: 8px; }
    .card .value { font-size: 1.6em; font-weight: 600; }
    .paused { color: #ef4444; }
    .strategy-item { display: grid; grid-template-columns: 2fr 1fr 1fr 1fr; padding: 12px; border-bottom: 1px solid #2a2f4a; }
    .strategy-item.inactive { opacity: 0.5; }
    .empty-state { text-align: center; color: #8b95a5; padding: 30px; }
    @media (max-width: 768px) { .grid { grid-template-columns: 1fr; } }
  </style>
</head>
<body>
  <div class="container">
    <h1>Strategy Pool</h1>
    <div class="grid">
      <div class="card"><h3>Total Value</h3><div class="value">${metrics.totalValue}</div></div>
      <div class="card"><h3>Shareholder Assets</h3><div class="value">${metrics.totalAssets}</div></div>
      <div class="card"><h3>Idle</h3><div class="value">${metrics.idleBalance}</div></div>
      <div class="card"><h3>Share Supply</h3><div class="value">${metrics.totalShares}</div></div>
      <div class="card"><h3>Price / Share</h3><div class="value">${metrics.pricePerShare}</div></div>
      <div class="card"><h3>Queued Claims</h3><div class="value">${metrics.totalQueued}</div></div>
    </div>
    <div class="card">
      <h3>Strategies (${metrics.activeStrategyCount} active / ${metrics.strategyCount})${metrics.paused ? ' <span class="paused">PAUSED</span>' : ''}</h3>
      ${rows}
    </div>
  </div>
</body>
</html>`;
}
