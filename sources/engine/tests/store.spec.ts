/**
 * Level 3: Observable Collection Store
 * Tests for the server base, optimistic overlays and rebasing
 */

import { describe, it, expect, vi } from 'vitest';
import { CollectionStore, emptyCollectionState, fromRecipe, removeItem, upsertItem, type Reducer } from '../index';
import { item, stateOf, type Item } from './test-helpers';

const markDone = (id: string): Reducer<Item> => fromRecipe<Item>((draft) => {
    const target = draft.items.find((entry) => entry.id === id);
    if (target) {
        target.done = true;
    }
});

const increment: Reducer<Item> = fromRecipe<Item>((draft) => {
    draft.unreadOrPendingCount += 1;
});

describe('CollectionStore', () => {
    it('should start idle and empty', () => {
        const store = new CollectionStore<Item>('items');

        expect(store.state).toEqual(emptyCollectionState());
        expect(store.state.loadingState).toEqual({ status: 'idle' });
    });

    it('should show overlays on top of the server base', () => {
        const store = new CollectionStore('items', stateOf([item('a'), item('b')]));

        store.applyOptimistic('u1', markDone('a'));

        expect(store.state.items[0].done).toBe(true);
        expect(store.serverState.items[0].done).toBe(false);
        expect(store.overlayIds).toEqual(['u1']);
        expect(store.hasOverlay('u1')).toBe(true);
    });

    it('should restore the exact base when the only overlay is discarded', () => {
        const initial = stateOf([item('a')], 1);
        const store = new CollectionStore('items', initial);

        store.applyOptimistic('u1', markDone('a'));
        expect(store.discard('u1')).toBe(true);

        expect(store.state).toBe(store.serverState);
        expect(store.state).toEqual(initial);
    });

    it('should replay the remaining overlays after a discard', () => {
        const store = new CollectionStore('items', stateOf([item('a'), item('b')]));

        store.applyOptimistic('u1', markDone('a'));
        store.applyOptimistic('u2', markDone('b'));
        store.discard('u1');

        expect(store.state.items.map((entry) => entry.done)).toEqual([false, true]);
        expect(store.overlayIds).toEqual(['u2']);
    });

    it('should report discarding an unknown overlay', () => {
        const store = new CollectionStore<Item>('items');
        expect(store.discard('missing')).toBe(false);
    });

    it('should fold a committed change into the base', () => {
        const store = new CollectionStore('items', stateOf([item('a')]));

        store.applyOptimistic('u1', markDone('a'));
        store.commit('u1', (state) => upsertItem(state, item('a', { done: true, title: 'Server title' })));

        expect(store.overlayIds).toEqual([]);
        expect(store.serverState.items[0]).toEqual(item('a', { done: true, title: 'Server title' }));
        expect(store.state).toBe(store.serverState);
    });

    it('should keep overlays across server updates', () => {
        const store = new CollectionStore('items', stateOf([item('a')]));

        store.applyOptimistic('u1', increment);
        store.applyServer((state) => ({ ...state, items: [item('a'), item('c')], unreadOrPendingCount: 5 }));

        expect(store.state.items).toHaveLength(2);
        expect(store.state.unreadOrPendingCount).toBe(6);
        expect(store.serverState.unreadOrPendingCount).toBe(5);
    });

    it('should notify listeners only on structural changes', () => {
        const store = new CollectionStore('items', stateOf([item('a')]));
        const listener = vi.fn();
        const unsubscribe = store.subscribe(listener);

        store.applyOptimistic('u1', markDone('a'));
        expect(listener).toHaveBeenCalledTimes(1);

        // Confirming with the value already shown changes nothing visible
        store.commit('u1', markDone('a'));
        expect(listener).toHaveBeenCalledTimes(1);

        unsubscribe();
        store.applyServer((state) => removeItem(state, 'a'));
        expect(listener).toHaveBeenCalledTimes(1);
        expect(store.state.items).toEqual([]);
    });

    it('should drop a failed overlay only when server data reaches its entity', () => {
        const store = new CollectionStore('items', stateOf([item('a'), item('b')]));
        store.applyOptimistic('u1', markDone('a'));
        store.markFailed('u1', 'a');

        store.applyServer((state) => ({ ...state, unreadOrPendingCount: 1 }));
        store.applyServer((state) => upsertItem(state, item('b', { title: 'Renamed' })), ['b']);
        expect(store.overlayIds).toEqual(['u1']);
        expect(store.state.items[0].done).toBe(true);

        store.applyServer((state) => upsertItem(state, item('a', { title: 'Renamed' })), ['a']);
        expect(store.overlayIds).toEqual([]);
        expect(store.state.items[0]).toEqual(item('a', { title: 'Renamed' }));
    });

    it('should drop every failed overlay on a full reload and keep pending ones', () => {
        const store = new CollectionStore('items', stateOf([item('a'), item('b')]));
        store.applyOptimistic('u1', markDone('a'));
        store.markFailed('u1', 'a');
        store.applyOptimistic('u2', markDone('b'));

        store.applyServer((state) => ({ ...state, items: [item('a'), item('b')] }), 'all');

        expect(store.overlayIds).toEqual(['u2']);
        expect(store.state.items.map((entry) => entry.done)).toEqual([false, true]);
    });

    it('should freeze the server base', () => {
        const store = new CollectionStore('items', stateOf([item('a')]));
        expect(Object.isFrozen(store.serverState.items)).toBe(true);
    });

    describe('Reducers', () => {
        it('should upsert in place or at either end', () => {
            const state = stateOf([item('a'), item('b')]);

            expect(upsertItem(state, item('b', { done: true })).items).toEqual([item('a'), item('b', { done: true })]);
            expect(upsertItem(state, item('c')).items.map((entry) => entry.id)).toEqual(['c', 'a', 'b']);
            expect(upsertItem(state, item('c'), 'end').items.map((entry) => entry.id)).toEqual(['a', 'b', 'c']);
        });

        it('should return the same state when removing a missing item', () => {
            const state = stateOf([item('a')]);
            expect(removeItem(state, 'z')).toBe(state);
        });
    });
});
