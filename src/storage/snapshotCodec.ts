/**
 * Pool snapshot <-> JSON row.
 *
 * Amounts are stored as decimal strings. Parsing validates every field; a row
 * that does not match the expected shape is rejected as a whole.
 */

import { ValidationError } from '../core/errors';
import type { PoolSnapshot } from '../engine/MultiStrategyPool';
import type { StrategyInfo, WithdrawalRequest } from '../types';

export interface SerializedWithdrawalRequest {
    requestId: number;
    holder: string;
    receiver: string;
    sharesBurned: string;
    assetsOwed: string;
    createdAt: number;
    completed: boolean;
    completedAt: number | null;
}

export interface SerializedPoolSnapshot {
    version: 1;
    poolAddress: string;
    assetAddress: string;
    strategies: StrategyInfo[];
    shares: {
        totalSupply: string;
        balances: Array<[string, string]>;
        allowances: Array<[string, string, string]>;
    };
    queue: {
        requests: Array<[string, SerializedWithdrawalRequest[]]>;
        totalQueuedAssets: string;
    };
    valuation: { value: string | null; at: number | null };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENCODE
// ═══════════════════════════════════════════════════════════════════════════════

export function serializeSnapshot(snapshot: PoolSnapshot): SerializedPoolSnapshot {
    return {
        version: snapshot.version,
        poolAddress: snapshot.poolAddress,
        assetAddress: snapshot.assetAddress,
        strategies: snapshot.strategies.map(s => ({ ...s })),
        shares: {
            totalSupply: snapshot.shares.totalSupply.toString(),
            balances: snapshot.shares.balances.map(([holder, amount]): [string, string] => [holder, amount.toString()]),
            allowances: snapshot.shares.allowances.map(
                ([owner, spender, amount]): [string, string, string] => [owner, spender, amount.toString()],
            ),
        },
        queue: {
            requests: snapshot.queue.requests.map(
                ([holder, list]): [string, SerializedWithdrawalRequest[]] => [holder, list.map(serializeRequest)],
            ),
            totalQueuedAssets: snapshot.queue.totalQueuedAssets.toString(),
        },
        valuation: {
            value: snapshot.valuation.value === null ? null : snapshot.valuation.value.toString(),
            at: snapshot.valuation.at,
        },
    };
}

function serializeRequest(request: WithdrawalRequest): SerializedWithdrawalRequest {
    return {
        ...request,
        sharesBurned: request.sharesBurned.toString(),
        assetsOwed: request.assetsOwed.toString(),
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// DECODE
// ═══════════════════════════════════════════════════════════════════════════════

export function parseSnapshot(raw: unknown): PoolSnapshot {
    const root = readRecord(raw, 'snapshot');
    if (root.version !== 1) {
        fail('snapshot.version', `unsupported version ${String(root.version)}`);
    }

    const shares = readRecord(root.shares, 'shares');
    const queue = readRecord(root.queue, 'queue');
    const valuation = readRecord(root.valuation, 'valuation');

    return {
        version: 1,
        poolAddress: readString(root.poolAddress, 'poolAddress'),
        assetAddress: readString(root.assetAddress, 'assetAddress'),
        strategies: readArray(root.strategies, 'strategies').map((s, i) => parseStrategy(s, `strategies[${i}]`)),
        shares: {
            totalSupply: readAmount(shares.totalSupply, 'shares.totalSupply'),
            balances: readArray(shares.balances, 'shares.balances').map((entry, i): [string, bigint] => {
                const path = `shares.balances[${i}]`;
                const [holder, amount] = readTuple(entry, 2, path);
                return [readString(holder, `${path}[0]`), readAmount(amount, `${path}[1]`)];
            }),
            allowances: readArray(shares.allowances, 'shares.allowances').map((entry, i): [string, string, bigint] => {
                const path = `shares.allowances[${i}]`;
                const [owner, spender, amount] = readTuple(entry, 3, path);
                return [readString(owner, `${path}[0]`), readString(spender, `${path}[1]`), readAmount(amount, `${path}[2]`)];
            }),
        },
        queue: {
            requests: readArray(queue.requests, 'queue.requests').map((entry, i): [string, WithdrawalRequest[]] => {
                const path = `queue.requests[${i}]`;
                const [holder, list] = readTuple(entry, 2, path);
                return [
                    readString(holder, `${path}[0]`),
                    readArray(list, `${path}[1]`).map((r, j) => parseRequest(r, `${path}[1][${j}]`)),
                ];
            }),
            totalQueuedAssets: readAmount(queue.totalQueuedAssets, 'queue.totalQueuedAssets'),
        },
        valuation: {
            value: valuation.value === null ? null : readAmount(valuation.value, 'valuation.value'),
            at: valuation.at === null ? null : readNumber(valuation.at, 'valuation.at'),
        },
    };
}

function parseStrategy(raw: unknown, path: string): StrategyInfo {
    const s = readRecord(raw, path);
    const kind = s.kind;
    if (kind !== 'convertible' && kind !== 'direct') {
        fail(`${path}.kind`, `unknown strategy kind ${String(kind)}`);
    }
    return {
        index: readNumber(s.index, `${path}.index`),
        address: readString(s.address, `${path}.address`),
        kind,
        allocationBps: readNumber(s.allocationBps, `${path}.allocationBps`),
        hasLockup: readBoolean(s.hasLockup, `${path}.hasLockup`),
        active: readBoolean(s.active, `${path}.active`),
        addedAt: readNumber(s.addedAt, `${path}.addedAt`),
    };
}

function parseRequest(raw: unknown, path: string): WithdrawalRequest {
    const r = readRecord(raw, path);
    return {
        requestId: readNumber(r.requestId, `${path}.requestId`),
        holder: readString(r.holder, `${path}.holder`),
        receiver: readString(r.receiver, `${path}.receiver`),
        sharesBurned: readAmount(r.sharesBurned, `${path}.sharesBurned`),
        assetsOwed: readAmount(r.assetsOwed, `${path}.assetsOwed`),
        createdAt: readNumber(r.createdAt, `${path}.createdAt`),
        completed: readBoolean(r.completed, `${path}.completed`),
        completedAt: r.completedAt === null ? null : readNumber(r.completedAt, `${path}.completedAt`),
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// FIELD READERS
// ═══════════════════════════════════════════════════════════════════════════════

function fail(path: string, reason: string): never {
    throw new ValidationError('INVALID_SNAPSHOT', `${path}: ${reason}`, { path });
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readRecord(value: unknown, path: string): Record<string, unknown> {
    if (!isRecord(value)) fail(path, 'expected an object');
    return value;
}

function readArray(value: unknown, path: string): unknown[] {
    if (!Array.isArray(value)) fail(path, 'expected an array');
    return value;
}

function readTuple(value: unknown, length: number, path: string): unknown[] {
    const items = readArray(value, path);
    if (items.length !== length) fail(path, `expected ${length} entries, got ${items.length}`);
    return items;
}

function readString(value: unknown, path: string): string {
    if (typeof value !== 'string' || value.length === 0) fail(path, 'expected a non-empty string');
    return value;
}

function readNumber(value: unknown, path: string): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) fail(path, 'expected a finite number');
    return value;
}

function readBoolean(value: unknown, path: string): boolean {
    if (typeof value !== 'boolean') fail(path, 'expected a boolean');
    return value;
}

function readAmount(value: unknown, path: string): bigint {
    if (typeof value !== 'string' || !/^\d+$/.test(value)) fail(path, 'expected a non-negative integer string');
    return BigInt(value);
}
