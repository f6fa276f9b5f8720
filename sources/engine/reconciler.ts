/**
 * Reconciliation of server data with optimistic state
 *
 * Authoritative data always wins. The reconciler never throws:
 * disagreements are resolved in favour of the server and reported
 * through the event sink.
 */

import { deepEqual, findItem } from './helpers';
import { noopSink, type EventSink } from './events';
import { removeItem, upsertItem, type CollectionStore, type Reducer } from './store';
import type { PendingUpdateLedger } from './ledger';
import type { CollectionState, EntityUpdate, Identified, UpdateId } from './types';

/**
 * Applies a real-time event to the server base of a collection
 */
export type PushApplier<T extends Identified> = (
    state: CollectionState<T>,
    event: EntityUpdate<T>,
) => CollectionState<T>;

/**
 * Upserts replace in place or insert at the top, deletes remove
 */
export function defaultPushApplier<T extends Identified>(
    state: CollectionState<T>,
    event: EntityUpdate<T>,
): CollectionState<T> {
    return event.kind === 'upsert'
        ? upsertItem(state, event.value)
        : removeItem(state, event.entityId);
}

export type PushOutcome =
    /** Push matched a pending update and confirmed it */
    | { kind: 'confirmed'; updateId: UpdateId }
    /** Push differed from a pending update; it became the base under the update's overlay */
    | { kind: 'rebased'; updateId: UpdateId }
    /** Push repeated a recently resolved change */
    | { kind: 'suppressed'; updateId: UpdateId }
    | { kind: 'applied' };

export type ConfirmOutcome =
    | { confirmed: true; overridden: boolean }
    /** The update was already terminal, e.g. confirmed by a push */
    | { confirmed: false };

export class Reconciler<T extends Identified> {
    private readonly store: CollectionStore<T>;
    private readonly ledger: PendingUpdateLedger<T>;
    private readonly sink: EventSink;

    constructor(store: CollectionStore<T>, ledger: PendingUpdateLedger<T>, sink: EventSink = noopSink) {
        this.store = store;
        this.ledger = ledger;
        this.sink = sink;
    }

    /**
     * Fold a successful response into the server base
     *
     * @param reducer - Authoritative change built from the server's response
     */
    confirm(updateId: UpdateId, reducer: Reducer<T>): ConfirmOutcome {
        const entry = this.ledger.get(updateId);
        if (!entry || entry.status !== 'pending') {
            this.sink({ type: 'late_response_ignored', updateId });
            return { confirmed: false };
        }

        this.store.commit(updateId, reducer);
        this.ledger.resolve(updateId, 'confirmed');

        const visible = findItem(this.store.state.items, entry.entityId);
        const overridden = !deepEqual(visible, entry.optimisticValue);
        this.sink({
            type: 'mutation_confirmed',
            updateId,
            entityType: entry.entityType,
            entityId: entry.entityId,
            via: 'response',
            overridden,
        });
        return { confirmed: true, overridden };
    }

    /**
     * Drop the overlay of a pending update and mark it rolled back
     * Returns false when the update was already terminal
     */
    rollback(updateId: UpdateId): boolean {
        if (!this.ledger.resolve(updateId, 'rolled-back')) {
            return false;
        }
        this.store.discard(updateId);
        return true;
    }

    /**
     * Mark a pending update failed, leaving its overlay in place until
     * server data for the entity arrives
     */
    fail(updateId: UpdateId): boolean {
        const entry = this.ledger.get(updateId);
        if (!entry || !this.ledger.resolve(updateId, 'failed')) {
            return false;
        }
        this.store.markFailed(updateId, entry.entityId);
        return true;
    }

    /**
     * Reconcile a real-time event with the ledger and the store
     *
     * A push equal to a pending update's value confirms it. Any other push
     * for that entity becomes the server base under the still pending
     * overlay; the call's own outcome settles the update later.
     */
    receive(event: EntityUpdate<T>, applier: PushApplier<T> = defaultPushApplier): PushOutcome {
        const entry = this.ledger.latestFor(event.entityType, event.entityId);
        const pushed = event.kind === 'upsert' ? event.value : null;

        if (entry?.status === 'pending') {
            if (deepEqual(entry.optimisticValue, pushed)) {
                return this.confirmFromPush(entry.id, event, applier);
            }
            this.applyToBase(event, applier, entry.id);
            return { kind: 'rebased', updateId: entry.id };
        }

        if (entry && deepEqual(findItem(this.store.serverState.items, event.entityId), pushed)) {
            this.sink({
                type: 'duplicate_suppressed',
                updateId: entry.id,
                entityType: entry.entityType,
                entityId: entry.entityId,
            });
            return { kind: 'suppressed', updateId: entry.id };
        }

        this.applyToBase(event, applier, null);
        return { kind: 'applied' };
    }

    /**
     * Take a push as the server's copy of a pending update's change
     * The push is folded into the base and the update's overlay dropped
     */
    confirmFromPush(
        updateId: UpdateId,
        event: EntityUpdate<T>,
        applier: PushApplier<T> = defaultPushApplier,
    ): PushOutcome {
        const entry = this.ledger.get(updateId);
        if (!entry || entry.status !== 'pending') {
            return this.receive(event, applier);
        }

        this.ledger.resolve(updateId, 'confirmed');
        this.store.commit(updateId, (state) => applier(state, event));

        this.sink({
            type: 'duplicate_suppressed',
            updateId,
            entityType: entry.entityType,
            entityId: entry.entityId,
        });
        this.sink({
            type: 'mutation_confirmed',
            updateId,
            entityType: entry.entityType,
            entityId: entry.entityId,
            via: 'push',
            overridden: false,
        });
        return { kind: 'confirmed', updateId };
    }

    private applyToBase(event: EntityUpdate<T>, applier: PushApplier<T>, pendingUpdateId: UpdateId | null): void {
        const wasVisible = findItem(this.store.state.items, event.entityId) !== null;
        this.store.applyServer((state) => applier(state, event), [event.entityId]);
        this.sink({
            type: 'push_applied',
            entityType: event.entityType,
            entityId: event.entityId,
            kind: event.kind,
            pendingUpdateId,
            removed: wasVisible && findItem(this.store.state.items, event.entityId) === null,
        });
    }
}
