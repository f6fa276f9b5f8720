/**
 * Rate/debounce gate
 *
 * Keeps a feature from issuing the same remote call again while one is
 * in flight, or again within a cooldown after one succeeded.
 */

import { systemClock, type Clock } from './clock';
import type { Timestamp } from './types';

export type RateGateConfig = {
    /**
     * Cooldown used when a call site passes none
     * Default: 3 seconds
     */
    defaultCooldownMs?: number;
    clock?: Clock;
};

export class RateGate {
    private readonly completedAt: Map<string, Timestamp>;
    private readonly inFlight: Set<string>;
    private readonly defaultCooldownMs: number;
    private readonly clock: Clock;

    constructor(config: RateGateConfig = {}) {
        this.completedAt = new Map();
        this.inFlight = new Set();
        this.defaultCooldownMs = config.defaultCooldownMs ?? 3_000;
        this.clock = config.clock ?? systemClock;
    }

    /**
     * Whether a call for `key` may be issued now
     * A true answer marks the key in flight until settle() is called
     */
    shouldProceed(key: string, cooldownMs: number = this.defaultCooldownMs): boolean {
        if (this.inFlight.has(key)) {
            return false;
        }

        const last = this.completedAt.get(key);
        if (last !== undefined && this.clock.now() - last < cooldownMs) {
            return false;
        }

        this.inFlight.add(key);
        return true;
    }

    /**
     * End the in-flight mark for `key`
     * Only a successful call starts the cooldown
     */
    settle(key: string, succeeded: boolean): void {
        this.inFlight.delete(key);
        if (succeeded) {
            this.completedAt.set(key, this.clock.now());
        }
    }

    /**
     * Forget everything about `key`
     */
    reset(key: string): void {
        this.inFlight.delete(key);
        this.completedAt.delete(key);
    }

    isInFlight(key: string): boolean {
        return this.inFlight.has(key);
    }
}
