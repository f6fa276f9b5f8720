/**
 * Helper functions for the mutation coordinator
 */

import { createId } from '@paralleldrive/cuid2';
import type { EntityId, Identified, UpdateId } from './types';

/**
 * Create a new pending update ID
 */
export function createUpdateId(): UpdateId {
    return createId();
}

/**
 * Create an ID for an entity that only exists locally until the server confirms it
 */
export function createPlaceholderId(): EntityId {
    return `local_${createId()}`;
}

/**
 * Whether two field-sets touch a common field
 * An empty set stands for the whole entity and overlaps everything
 */
export function fieldsOverlap(a: ReadonlyArray<string>, b: ReadonlyArray<string>): boolean {
    if (a.length === 0 || b.length === 0) {
        return true;
    }
    return a.some((field) => b.includes(field));
}

/**
 * Find an item by ID, null when absent
 */
export function findItem<T extends Identified>(items: ReadonlyArray<T>, id: EntityId): T | null {
    return items.find((item) => item.id === id) ?? null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/**
 * Structural equality for plain data (objects, arrays, primitives)
 */
export function deepEqual(a: unknown, b: unknown): boolean {
    if (a === b) return true;
    if (!isRecord(a) || !isRecord(b)) return false;
    if (Array.isArray(a) !== Array.isArray(b)) return false;

    const keysA = Object.keys(a);
    const keysB = Object.keys(b);

    if (keysA.length !== keysB.length) return false;

    for (const key of keysA) {
        if (!keysB.includes(key)) return false;
        if (!deepEqual(a[key], b[key])) {
            return false;
        }
    }

    return true;
}

/**
 * Settle with the promise, or reject with the signal's reason as soon as it aborts
 * Used for repository calls that may not honour their signal
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(signal.reason);
        promise.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            },
        );
        if (signal.aborted) {
            onAbort();
            return;
        }
        signal.addEventListener('abort', onAbort, { once: true });
    });
}
