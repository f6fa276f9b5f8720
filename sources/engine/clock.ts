/**
 * Injectable time source and delay primitive
 */

import { MutationCancelledError } from './errors';
import type { Timestamp } from './types';

export interface Clock {
    now(): Timestamp;
    /**
     * Resolve after `ms` milliseconds
     * Rejects with the signal's reason (or MutationCancelledError) when aborted
     */
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

function abortReason(signal: AbortSignal): unknown {
    return signal.reason ?? new MutationCancelledError();
}

/**
 * Clock backed by Date.now and setTimeout
 * Vitest fake timers drive it in tests
 */
export const systemClock: Clock = {
    now() {
        return Date.now();
    },

    sleep(ms, signal) {
        return new Promise<void>((resolve, reject) => {
            if (signal?.aborted) {
                reject(abortReason(signal));
                return;
            }

            const onAbort = () => {
                clearTimeout(timer);
                if (signal) {
                    reject(abortReason(signal));
                }
            };

            const timer = setTimeout(() => {
                signal?.removeEventListener('abort', onAbort);
                resolve();
            }, ms);

            signal?.addEventListener('abort', onAbort, { once: true });
        });
    },
};
