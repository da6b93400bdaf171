/**
 * Role gate for manager and admin operations.
 *
 * The pool only consumes `AccessPolicy`; RoleRegistry is the in-process
 * implementation used by the demo and the tests.
 */

import { AccessDenied } from './errors';
import type { Address, Role } from '../types';
import logger from '../utils/logger';

export interface AccessPolicy {
    requireRole(role: Role, caller: Address): void;
}

export class RoleRegistry implements AccessPolicy {
    private members = new Map<Role, Set<Address>>();

    constructor(admin: Address) {
        this.members.set('ADMIN', new Set([admin]));
        this.members.set('MANAGER', new Set([admin]));
    }

    hasRole(role: Role, account: Address): boolean {
        return this.members.get(role)?.has(account) ?? false;
    }

    requireRole(role: Role, caller: Address): void {
        if (!this.hasRole(role, caller)) {
            logger.warn(`[ACCESS] denied role=${role} caller=${caller}`);
            throw new AccessDenied(role, caller);
        }
    }

    grantRole(caller: Address, role: Role, account: Address): void {
        this.requireRole('ADMIN', caller);
        this.membersOf(role).add(account);
        logger.info(`[ACCESS] granted role=${role} account=${account} by=${caller}`);
    }

    revokeRole(caller: Address, role: Role, account: Address): void {
        this.requireRole('ADMIN', caller);
        this.membersOf(role).delete(account);
        logger.info(`[ACCESS] revoked role=${role} account=${account} by=${caller}`);
    }

    private membersOf(role: Role): Set<Address> {
        let set = this.members.get(role);
        if (!set) {
            set = new Set();
            this.members.set(role, set);
        }
        return set;
    }
}
