/**
 * Atomicity boundary for the collaborators a pool operation touches.
 *
 * The pool restores its own state on failure; the boundary is responsible
 * for undoing what the asset token and strategies did during the same call.
 * On a host that is already transactional the pass-through is enough.
 */

export interface TransactionBoundary<C = unknown> {
    begin(): C;
    commit(checkpoint: C): void;
    rollback(checkpoint: C): void;
}

export const PASS_THROUGH_BOUNDARY: TransactionBoundary<null> = {
    begin: () => null,
    commit: () => undefined,
    rollback: () => undefined,
};
