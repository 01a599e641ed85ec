/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * TIMELOCKED PARAMETERS — REQUEST / ACCEPT / REJECT
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * A parameter keyed by string (e.g. `${market}:${asset}`) holds a committed
 * value and at most one pending update. A pending update becomes acceptable
 * at `validAfter` and stops being acceptable after `validAfter + deadline`.
 *
 * RULES:
 * 1. A new request replaces any older pending request for the same key
 * 2. accept before validAfter → TimelockNotElapsed
 * 3. accept after validAfter + deadline → TimelockExpired (pending kept)
 * 4. accept/reject with nothing pending → NoPendingUpdate
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type { Clock } from './clock';
import { ProtocolError } from './errors';
import { Journal, StateMap } from './journal';

export interface PendingUpdate<V> {
    readonly value: V;
    readonly requestedAt: number;
    readonly validAfter: number;
    readonly expiresAt: number;
}

export interface TimelockWindow {
    readonly timelock: number;
    readonly deadline: number;
}

export class TimelockedParameter<V extends {} | null> {
    private readonly committed: StateMap<string, V>;
    private readonly pending: StateMap<string, PendingUpdate<V>>;

    constructor(
        journal: Journal,
        private readonly clock: Clock,
        private readonly parameter: string,
        private readonly window: TimelockWindow
    ) {
        this.committed = new StateMap(journal);
        this.pending = new StateMap(journal);
    }

    get(key: string): V | undefined {
        return this.committed.get(key);
    }

    getPending(key: string): PendingUpdate<V> | undefined {
        return this.pending.get(key);
    }

    /** Commit without delay. Used for first-time bindings and privileged setters. */
    set(key: string, value: V): void {
        this.committed.set(key, value);
    }

    request(key: string, value: V): PendingUpdate<V> {
        const now = this.clock.now();
        const update: PendingUpdate<V> = {
            value,
            requestedAt: now,
            validAfter: now + this.window.timelock,
            expiresAt: now + this.window.timelock + this.window.deadline,
        };
        this.pending.set(key, update);
        return update;
    }

    accept(key: string): V {
        const update = this.requirePending(key);
        const now = this.clock.now();
        if (now < update.validAfter) {
            throw new ProtocolError('TimelockNotElapsed', `${this.parameter} update not yet valid`, {
                key,
                now,
                validAfter: update.validAfter,
            });
        }
        if (now > update.expiresAt) {
            throw new ProtocolError('TimelockExpired', `${this.parameter} update expired`, {
                key,
                now,
                expiresAt: update.expiresAt,
            });
        }
        this.committed.set(key, update.value);
        this.pending.delete(key);
        return update.value;
    }

    reject(key: string): PendingUpdate<V> {
        const update = this.requirePending(key);
        this.pending.delete(key);
        return update;
    }

    private requirePending(key: string): PendingUpdate<V> {
        const update = this.pending.get(key);
        if (update === undefined) {
            throw new ProtocolError('NoPendingUpdate', `no pending ${this.parameter} update`, { key });
        }
        return update;
    }
}
