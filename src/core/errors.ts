/**
 * Pool error taxonomy.
 *
 * Every rejection carries a stable `code` (used by tests and operators), a
 * human-readable `reason`, and the values that caused it in `context`.
 * A rejected guarded operation never leaves state behind: the pool restores
 * its checkpoint before the error reaches the caller.
 */

export type PoolErrorCategory =
    | 'VALIDATION'
    | 'INVARIANT'
    | 'INSUFFICIENT_STATE'
    | 'EXTERNAL'
    | 'REENTRANCY'
    | 'ACCESS'
    | 'PAUSED';

export class PoolError extends Error {
    constructor(
        public readonly category: PoolErrorCategory,
        public readonly code: string,
        public readonly reason: string,
        public readonly context: Record<string, unknown> = {},
        options?: { cause?: unknown },
    ) {
        super(`[${code}] ${reason}`, options);
        this.name = 'PoolError';
    }
}

/** Bad index, null address, zero amount */
export class ValidationError extends PoolError {
    constructor(code: string, reason: string, context: Record<string, unknown> = {}) {
        super('VALIDATION', code, reason, context);
        this.name = 'ValidationError';
    }
}

/** Allocation caps and the pool-wide accounting invariants */
export class InvariantViolation extends PoolError {
    constructor(code: string, reason: string, context: Record<string, unknown> = {}) {
        super('INVARIANT', code, reason, context);
        this.name = 'InvariantViolation';
    }
}

/** No shares, unknown or settled request, not enough idle liquidity */
export class InsufficientState extends PoolError {
    constructor(code: string, reason: string, context: Record<string, unknown> = {}) {
        super('INSUFFICIENT_STATE', code, reason, context);
        this.name = 'InsufficientState';
    }
}

/**
 * A collaborator (asset token or strategy) failed or answered inconsistently.
 * The collaborator's own error is kept as `cause`.
 */
export class ExternalFailure extends PoolError {
    constructor(code: string, reason: string, context: Record<string, unknown> = {}, cause?: unknown) {
        super('EXTERNAL', code, reason, context, cause === undefined ? undefined : { cause });
        this.name = 'ExternalFailure';
    }
}

export class ReentrancyError extends PoolError {
    constructor(operation: string, inFlight: string) {
        super('REENTRANCY', 'REENTRANT_CALL', `${operation} rejected while ${inFlight} is in flight`, {
            operation,
            inFlight,
        });
        this.name = 'ReentrancyError';
    }
}

export class AccessDenied extends PoolError {
    constructor(role: string, caller: string) {
        super('ACCESS', 'MISSING_ROLE', `${caller} lacks role ${role}`, { role, caller });
        this.name = 'AccessDenied';
    }
}

export class PausedError extends PoolError {
    constructor(operation: string, expectPaused: boolean) {
        super(
            'PAUSED',
            expectPaused ? 'NOT_PAUSED' : 'PAUSED',
            expectPaused ? `${operation} requires the pool to be paused` : `${operation} is unavailable while paused`,
            { operation },
        );
        this.name = 'PausedError';
    }
}

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
