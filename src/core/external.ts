/**
 * Boundary for calls into collaborators the pool does not trust.
 *
 * Anything a collaborator throws becomes an ExternalFailure, and every value
 * it returns is checked for shape before the pool uses it.
 */

import { describeError, ExternalFailure, PoolError } from './errors';

export function callExternal<T>(label: string, context: Record<string, unknown>, call: () => T): T {
    try {
        return call();
    } catch (err) {
        if (err instanceof ExternalFailure) throw err;
        throw new ExternalFailure(
            'EXTERNAL_CALL_FAILED',
            `${label} failed: ${describeError(err)}`,
            { ...context, call: label, ...(err instanceof PoolError ? { innerCode: err.code } : {}) },
            err,
        );
    }
}

/** An amount reported by a collaborator: must be a non-negative bigint */
export function expectAmount(label: string, context: Record<string, unknown>, value: unknown): bigint {
    if (typeof value !== 'bigint' || value < 0n) {
        throw new ExternalFailure('INCONSISTENT_RESULT', `${label} returned ${String(value)}`, {
            ...context,
            call: label,
        });
    }
    return value;
}

/** Token calls answer with a success flag */
export function expectSuccess(label: string, context: Record<string, unknown>, ok: unknown): void {
    if (ok !== true) {
        throw new ExternalFailure('TRANSFER_REJECTED', `${label} returned ${String(ok)}`, { ...context, call: label });
    }
}
