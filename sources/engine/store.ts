/**
 * Observable collection store
 *
 * Holds the server base of a collection and an ordered list of
 * optimistic overlays. The visible state is the base with every overlay
 * replayed on top, recomputed whenever either changes:
 *
 * 1. Server data (page loads, confirmations, pushes) changes the base
 * 2. Optimistic mutations add an overlay
 * 3. Confirmation folds the authoritative change into the base and drops the overlay
 * 4. Rollback drops the overlay; the view falls back to base + remaining overlays
 * 5. A failed overlay stays until removed, or until server data for its entity arrives
 *
 * Only the owning coordinator and page loader write to a store.
 */

import { freeze, produce, type Draft } from 'immer';
import { deepEqual } from './helpers';
import type { CollectionState, EntityId, Identified, UpdateId } from './types';

/**
 * Immer recipe over the collection state - mutate the draft directly
 */
export type Recipe<T extends Identified> = (draft: Draft<CollectionState<T>>) => void;

/**
 * Pure state transition
 */
export type Reducer<T extends Identified> = (state: CollectionState<T>) => CollectionState<T>;

/**
 * Turn an Immer recipe into a reducer
 */
export function fromRecipe<T extends Identified>(recipe: Recipe<T>): Reducer<T> {
    return (state) => produce(state, recipe);
}

/**
 * Entities covered by a server write; 'all' when it replaces the collection
 */
export type ServerScope = ReadonlyArray<EntityId> | 'all';

type Overlay<T extends Identified> = {
    readonly updateId: UpdateId;
    readonly reducer: Reducer<T>;
    /** Entity of a failed update; null while the update is live */
    readonly failedFor: EntityId | null;
};

export type StoreListener<T extends Identified> = (state: CollectionState<T>) => void;

export function emptyCollectionState<T extends Identified>(): CollectionState<T> {
    return {
        items: [],
        unreadOrPendingCount: 0,
        loadingState: { status: 'idle' },
    };
}

export class CollectionStore<T extends Identified> {
    readonly name: string;
    private base: CollectionState<T>;
    private view: CollectionState<T>;
    private overlays: Overlay<T>[];
    private listeners: Set<StoreListener<T>>;

    constructor(name: string, initial: CollectionState<T> = emptyCollectionState<T>()) {
        this.name = name;
        this.base = freeze(initial, true);
        this.view = this.base;
        this.overlays = [];
        this.listeners = new Set();
    }

    /**
     * Current visible state (server base + overlays)
     */
    get state(): CollectionState<T> {
        return this.view;
    }

    /**
     * Server base without optimistic overlays
     */
    get serverState(): CollectionState<T> {
        return this.base;
    }

    /**
     * IDs of updates whose overlays are applied, oldest first
     */
    get overlayIds(): UpdateId[] {
        return this.overlays.map((overlay) => overlay.updateId);
    }

    hasOverlay(updateId: UpdateId): boolean {
        return this.overlays.some((overlay) => overlay.updateId === updateId);
    }

    /**
     * Add an overlay on top of the current view
     */
    applyOptimistic(updateId: UpdateId, reducer: Reducer<T>): void {
        this.overlays.push({ updateId, reducer, failedFor: null });
        this.publish(reducer(this.view));
    }

    /**
     * Fold an authoritative change into the base and drop the overlay
     */
    commit(updateId: UpdateId, reducer: Reducer<T>): void {
        this.base = reducer(this.base);
        this.overlays = this.overlays.filter((overlay) => overlay.updateId !== updateId);
        this.rebase();
    }

    /**
     * Drop an overlay without touching the base
     * Returns false when no overlay was registered for the update
     */
    discard(updateId: UpdateId): boolean {
        const before = this.overlays.length;
        this.overlays = this.overlays.filter((overlay) => overlay.updateId !== updateId);
        if (this.overlays.length === before) {
            return false;
        }
        this.rebase();
        return true;
    }

    /**
     * Keep the overlay of a failed update visible until server data for
     * its entity replaces it
     */
    markFailed(updateId: UpdateId, entityId: EntityId): void {
        this.overlays = this.overlays.map((overlay) =>
            overlay.updateId === updateId ? { ...overlay, failedFor: entityId } : overlay
        );
    }

    /**
     * Apply server data to the base; overlays are replayed on top
     * Failed overlays for entities within `scope` are dropped
     */
    applyServer(reducer: Reducer<T>, scope: ServerScope = []): void {
        this.base = reducer(this.base);
        this.overlays = this.overlays.filter((overlay) =>
            overlay.failedFor === null || (scope !== 'all' && !scope.includes(overlay.failedFor))
        );
        this.rebase();
    }

    /**
     * Listen for state changes; returns an unsubscribe function
     */
    subscribe(listener: StoreListener<T>): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    private rebase(): void {
        this.publish(
            this.overlays.reduce((state, overlay) => overlay.reducer(state), this.base)
        );
    }

    /**
     * Listeners only hear about structural changes; an equal state keeps
     * the previous reference
     */
    private publish(next: CollectionState<T>): void {
        if (next === this.view || deepEqual(next, this.view)) {
            return;
        }
        this.view = next;
        for (const listener of this.listeners) {
            listener(next);
        }
    }
}

// ============================================================================
// Reducers shared by the engine
// ============================================================================

/**
 * Replace the item with the same ID in place, or insert it
 */
export function upsertItem<T extends Identified>(
    state: CollectionState<T>,
    item: T,
    position: 'start' | 'end' = 'start',
): CollectionState<T> {
    const index = state.items.findIndex((existing) => existing.id === item.id);
    if (index >= 0) {
        const items = state.items.slice();
        items[index] = item;
        return { ...state, items };
    }
    return {
        ...state,
        items: position === 'start' ? [item, ...state.items] : [...state.items, item],
    };
}

/**
 * Remove the item with the given ID
 */
export function removeItem<T extends Identified>(state: CollectionState<T>, id: string): CollectionState<T> {
    const items = state.items.filter((item) => item.id !== id);
    return items.length === state.items.length ? state : { ...state, items };
}
