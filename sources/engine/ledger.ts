/**
 * Pending-update ledger
 *
 * In-memory table of optimistic mutations keyed by update ID.
 * Entries are immutable records; every transition replaces the record.
 * Terminal entries are kept for a retention window so late pushes can
 * be recognised as duplicates, then purged lazily on the next access.
 *
 * JavaScript runs completions on the same event loop as the UI path,
 * so register/resolve are the only synchronization points needed.
 */

import { DuplicateActiveMutationError } from './errors';
import { createUpdateId, fieldsOverlap } from './helpers';
import { systemClock, type Clock } from './clock';
import type {
    EntityId,
    EntityType,
    NewPendingUpdate,
    PendingUpdate,
    TerminalStatus,
    UpdateId,
} from './types';

export type LedgerConfig = {
    /**
     * How long terminal entries stay queryable, in milliseconds
     * Default: 30 seconds
     */
    retentionMs?: number;
    clock?: Clock;
};

export class PendingUpdateLedger<TValue = unknown> {
    private entries: Map<UpdateId, PendingUpdate<TValue>>;
    private readonly retentionMs: number;
    private readonly clock: Clock;

    constructor(config: LedgerConfig = {}) {
        this.entries = new Map();
        this.retentionMs = config.retentionMs ?? 30_000;
        this.clock = config.clock ?? systemClock;
    }

    /**
     * Insert a pending update and return its ID
     *
     * @throws DuplicateActiveMutationError when a pending update already
     * touches one of the same entities with an overlapping field-set
     */
    register(update: NewPendingUpdate<TValue>): UpdateId {
        this.purgeExpired();

        const relatedIds = update.relatedIds ?? [];
        const touched = [update.entityId, ...relatedIds];
        for (const existing of this.entries.values()) {
            if (
                existing.status === 'pending' &&
                existing.entityType === update.entityType &&
                touchedIds(existing).some((id) => touched.includes(id)) &&
                fieldsOverlap(existing.fields, update.fields)
            ) {
                throw new DuplicateActiveMutationError(update.entityType, update.entityId, existing.id);
            }
        }

        const now = this.clock.now();
        const id = createUpdateId();
        this.entries.set(id, {
            ...update,
            relatedIds,
            id,
            retryCount: 0,
            createdAt: now,
            lastAttemptAt: now,
            resolvedAt: null,
            status: 'pending',
        });
        return id;
    }

    /**
     * Move a pending update to a terminal status
     * Returns false when the entry is unknown or already terminal
     */
    resolve(id: UpdateId, outcome: TerminalStatus): boolean {
        this.purgeExpired();

        const entry = this.entries.get(id);
        if (!entry || entry.status !== 'pending') {
            return false;
        }

        this.entries.set(id, {
            ...entry,
            status: outcome,
            resolvedAt: this.clock.now(),
        });
        return true;
    }

    /**
     * Count one more attempt against a pending update
     */
    recordRetry(id: UpdateId): PendingUpdate<TValue> | undefined {
        const entry = this.entries.get(id);
        if (!entry || entry.status !== 'pending') {
            return entry;
        }

        const updated: PendingUpdate<TValue> = {
            ...entry,
            retryCount: entry.retryCount + 1,
            lastAttemptAt: this.clock.now(),
        };
        this.entries.set(id, updated);
        return updated;
    }

    get(id: UpdateId): PendingUpdate<TValue> | undefined {
        this.purgeExpired();
        return this.entries.get(id);
    }

    /**
     * Pending updates that touch an entity, directly or as a related entity
     */
    activeFor(entityId: EntityId): PendingUpdate<TValue>[] {
        this.purgeExpired();
        return Array.from(this.entries.values()).filter(
            (entry) => entry.status === 'pending' && touchedIds(entry).includes(entityId)
        );
    }

    /**
     * Newest update for an entity, pending or within the retention window
     * A pending update is preferred over a resolved one
     */
    latestFor(entityType: EntityType, entityId: EntityId): PendingUpdate<TValue> | undefined {
        this.purgeExpired();

        let latest: PendingUpdate<TValue> | undefined;
        for (const entry of this.entries.values()) {
            if (entry.entityType !== entityType || entry.entityId !== entityId) continue;
            if (!latest) {
                latest = entry;
                continue;
            }
            if (latest.status === 'pending' && entry.status !== 'pending') continue;
            if (
                (entry.status === 'pending' && latest.status !== 'pending') ||
                entry.createdAt >= latest.createdAt
            ) {
                latest = entry;
            }
        }
        return latest;
    }

    /**
     * Number of entries currently held, terminal ones included
     */
    get size(): number {
        this.purgeExpired();
        return this.entries.size;
    }

    /**
     * Drop terminal entries older than the retention window
     */
    private purgeExpired(): void {
        const now = this.clock.now();
        for (const [id, entry] of this.entries) {
            if (entry.resolvedAt !== null && now - entry.resolvedAt >= this.retentionMs) {
                this.entries.delete(id);
            }
        }
    }
}

function touchedIds(entry: PendingUpdate<unknown>): EntityId[] {
    return [entry.entityId, ...entry.relatedIds];
}
