/**
 * Retry/rollback policy
 *
 * The single place where retry semantics are defined. Feature code
 * never runs its own retry loop; it asks the policy what to do next.
 */

import { retryConfigSchema, type RetryConfig } from './config';
import type { ErrorCategory, PendingUpdate, RetryRecommendation } from './types';

type CategoryPolicy =
    | { kind: 'retry'; limit: (config: RetryConfig) => number }
    | { kind: 'rollback'; reason: 'server-conflict' | 'unauthorized'; hint: 'refetch' | 'reauthenticate' }
    | { kind: 'surface' };

const policyTable: Record<ErrorCategory, CategoryPolicy> = {
    'network': { kind: 'retry', limit: (config) => config.maxRetries },
    'server-error': { kind: 'retry', limit: (config) => config.maxRetries },
    'unknown': { kind: 'retry', limit: (config) => config.unknownMaxRetries },
    'conflict': { kind: 'rollback', reason: 'server-conflict', hint: 'refetch' },
    'authorization': { kind: 'rollback', reason: 'unauthorized', hint: 'reauthenticate' },
    'validation': { kind: 'surface' },
};

export class RetryPolicy {
    readonly config: RetryConfig;
    private readonly random: () => number;

    /**
     * @param random - Source of jitter in [0, 1), Math.random by default
     */
    constructor(config: Partial<RetryConfig> = {}, random: () => number = Math.random) {
        this.config = retryConfigSchema.parse(config);
        this.random = random;
    }

    /**
     * Decide what happens to a failed pending update
     */
    decide(update: Pick<PendingUpdate, 'retryCount'>, category: ErrorCategory): RetryRecommendation {
        return this.decideAttempt(update.retryCount, category);
    }

    /**
     * Decide from a bare retry count
     * Used by page loads, which have no ledger entry
     */
    decideAttempt(retryCount: number, category: ErrorCategory): RetryRecommendation {
        const policy = policyTable[category];
        switch (policy.kind) {
            case 'retry': {
                if (retryCount < policy.limit(this.config)) {
                    return {
                        shouldRetry: true,
                        shouldRollback: false,
                        delayMs: this.backoffDelay(retryCount),
                        hint: null,
                        reason: 'retryable',
                    };
                }
                return {
                    shouldRetry: false,
                    shouldRollback: true,
                    delayMs: null,
                    hint: null,
                    reason: 'retries-exhausted',
                };
            }

            case 'rollback':
                return {
                    shouldRetry: false,
                    shouldRollback: true,
                    delayMs: null,
                    hint: policy.hint,
                    reason: policy.reason,
                };

            case 'surface':
                return {
                    shouldRetry: false,
                    shouldRollback: false,
                    delayMs: null,
                    hint: null,
                    reason: 'validation-failed',
                };
        }
    }

    /**
     * Delay before retry number `retryCount + 1`
     * baseDelay * factor^retryCount, spread by jitter, capped at maxDelay
     */
    backoffDelay(retryCount: number): number {
        const { baseDelayMs, factor, maxDelayMs, jitterRatio } = this.config;
        const exponential = baseDelayMs * Math.pow(factor, retryCount);
        const spread = jitterRatio > 0 ? exponential * jitterRatio * (this.random() * 2 - 1) : 0;
        return Math.min(Math.max(0, Math.round(exponential + spread)), maxDelayMs);
    }
}
