/**
 * Shared test utilities
 */

import { vi } from 'vitest';
import { DomainError } from '../errors';
import { noop, proceed, type MutationDefinition } from '../coordinator';
import { findItem } from '../helpers';
import type { Clock } from '../clock';
import type { CoordinatorEvent, CoordinatorEventType, EventSink } from '../events';
import type { CollectionState, EntityUpdate, RealtimeSource } from '../types';

export interface Item {
    readonly id: string;
    readonly title: string;
    readonly done: boolean;
    readonly count: number;
}

export function item(id: string, overrides: Partial<Omit<Item, 'id'>> = {}): Item {
    return { id, title: `Item ${id}`, done: false, count: 0, ...overrides };
}

export function stateOf(items: Item[], count = 0): CollectionState<Item> {
    return { items, unreadOrPendingCount: count, loadingState: { status: 'loaded' } };
}

/**
 * Event sink that records everything it receives
 */
export function captureEvents() {
    const events: CoordinatorEvent[] = [];
    const sink: EventSink = (event) => {
        events.push(event);
    };
    return {
        sink,
        events,
        types(): CoordinatorEventType[] {
            return events.map((event) => event.type);
        },
        ofType<K extends CoordinatorEventType>(type: K): Extract<CoordinatorEvent, { type: K }>[] {
            return events.filter((event): event is Extract<CoordinatorEvent, { type: K }> => event.type === type);
        },
    };
}

/**
 * Promise with its resolve/reject handles exposed
 */
export function deferred<T>() {
    let resolve: (value: T) => void = () => {};
    let reject: (error: unknown) => void = () => {};
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

/**
 * In-process real-time channel
 */
export function fakeRealtime<T extends { readonly id: string }>() {
    const listeners = new Set<(event: EntityUpdate<T>) => void>();
    const source: RealtimeSource<T> = {
        subscribe(onEvent) {
            listeners.add(onEvent);
            return () => {
                listeners.delete(onEvent);
            };
        },
    };
    return {
        source,
        emit(event: EntityUpdate<T>): void {
            for (const listener of listeners) {
                listener(event);
            }
        },
        get listenerCount(): number {
            return listeners.size;
        },
    };
}

/**
 * Clock whose time only moves when told to
 */
export function manualClock(start = 1_000) {
    let now = start;
    const clock: Clock = {
        now: () => now,
        sleep: () => Promise.resolve(),
    };
    return {
        clock,
        advance(ms: number): void {
            now += ms;
        },
    };
}

export function networkError(): Error {
    return Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
}

export function httpError(status: number, message = `Request failed with status ${status}`): DomainError {
    return new DomainError('http_error', message, status);
}

export type SetDone = { id: string; done: boolean };

/**
 * Toggle of the `done` flag; the server's item is authoritative
 */
export function setDoneMutation(
    execute: (input: SetDone, signal: AbortSignal) => Promise<Item>,
): MutationDefinition<Item, SetDone, Item> {
    return {
        entityType: 'listing',
        operation: 'toggle',
        entityId: (input) => input.id,
        fields: () => ['done'],
        precondition: (state, input) => {
            const existing = findItem(state.items, input.id);
            return !existing || existing.done === input.done ? noop : proceed;
        },
        apply: (draft, input) => {
            const target = draft.items.find((entry) => entry.id === input.id);
            if (target) {
                target.done = input.done;
            }
        },
        confirm: (draft, input, result) => {
            const index = draft.items.findIndex((entry) => entry.id === input.id);
            if (index >= 0) {
                draft.items[index] = result;
            }
        },
        execute,
    };
}

export type Rename = { id: string; title: string };

export function renameMutation(
    execute: (input: Rename, signal: AbortSignal) => Promise<void>,
): MutationDefinition<Item, Rename, void> {
    return {
        entityType: 'listing',
        operation: 'update',
        entityId: (input) => input.id,
        fields: () => ['title'],
        apply: (draft, input) => {
            const target = draft.items.find((entry) => entry.id === input.id);
            if (target) {
                target.title = input.title;
            }
        },
        execute,
    };
}

/**
 * Repository call that never settles on its own and rejects when aborted
 */
export function hangingCall<T>() {
    return vi.fn((_input: unknown, signal: AbortSignal) =>
        new Promise<T>((_resolve, reject) => {
            signal.addEventListener('abort', () => reject(signal.reason), { once: true });
        })
    );
}
