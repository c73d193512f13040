/**
 * Permission Gate
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Two independent allow-lists (trade, manageLiquidity) and a single admin.
 *
 * RULES:
 * - The admin starts unset (or injected at construction), is set at most once
 *   from the unset state, and afterwards only the current admin can replace it
 * - Only the admin mutates the allow-lists
 * - check() defaults to false and never throws
 * - Every validation happens before the write; a failed call changes nothing
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { Identity } from '../types';
import { Unauthorized } from '../errors';
import { isIdentity, normalizeIdentity, requireNonZeroIdentity, shortId } from '../core/identity';
import logger from '../utils/logger';
import { Capability, PermissionSnapshot } from './types';

export class PermissionGate {
    private admin: Identity | null;
    private readonly allowLists: Record<Capability, Map<Identity, boolean>> = {
        trade: new Map(),
        manageLiquidity: new Map(),
    };

    constructor(admin?: Identity) {
        this.admin = admin === undefined ? null : requireNonZeroIdentity(admin, 'admin');
    }

    getAdmin(): Identity | null {
        return this.admin;
    }

    isAdmin(identity: Identity): boolean {
        return this.admin !== null && isIdentity(identity) && identity.toLowerCase() === this.admin;
    }

    /**
     * Throws Unauthorized unless the caller is the current admin.
     * An unset admin authorizes nobody.
     */
    requireAdmin(caller: Identity): void {
        if (!this.isAdmin(caller)) {
            throw new Unauthorized('caller is not the admin', { caller });
        }
    }

    /**
     * One-time transition from the unset state.
     */
    setAdmin(caller: Identity, identity: Identity): void {
        if (this.admin !== null) {
            throw new Unauthorized('admin already set', { caller });
        }
        this.admin = requireNonZeroIdentity(identity, 'admin');
        logger.info(`[PERMISSION] Admin set to ${shortId(this.admin)} by ${shortId(caller)}`);
    }

    transferAdmin(caller: Identity, identity: Identity): void {
        this.requireAdmin(caller);
        const next = requireNonZeroIdentity(identity, 'admin');
        logger.info(`[PERMISSION] Admin transferred ${shortId(caller)} -> ${shortId(next)}`);
        this.admin = next;
    }

    grant(caller: Identity, capability: Capability, identity: Identity, allowed: boolean): void {
        this.requireAdmin(caller);
        const target = normalizeIdentity(identity);
        this.allowLists[capability].set(target, allowed);
        logger.info(`[PERMISSION] ${capability} ${allowed ? 'granted to' : 'revoked from'} ${shortId(target)}`);
    }

    check(capability: Capability, identity: Identity): boolean {
        if (!isIdentity(identity)) return false;
        return this.allowLists[capability].get(identity.toLowerCase()) ?? false;
    }

    snapshot(): PermissionSnapshot {
        const allowed = (capability: Capability): Identity[] =>
            [...this.allowLists[capability].entries()]
                .filter(([, isAllowed]) => isAllowed)
                .map(([identity]) => identity)
                .sort();

        return {
            admin: this.admin,
            trade: allowed('trade'),
            manageLiquidity: allowed('manageLiquidity'),
        };
    }
}
