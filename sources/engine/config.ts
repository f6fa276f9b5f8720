/**
 * Coordinator configuration
 *
 * Every constant that shapes retry, retention, gating or paging lives
 * here. Components accept a partial input and resolve it through the
 * schema, so omitted values take the defaults below.
 */

import { z } from 'zod';

export const retryConfigSchema = z.object({
    /** Retries allowed for network and server errors */
    maxRetries: z.number().int().min(0).default(3),
    /** Retries allowed for unclassified errors */
    unknownMaxRetries: z.number().int().min(0).default(1),
    baseDelayMs: z.number().min(0).default(400),
    factor: z.number().min(1).default(2),
    maxDelayMs: z.number().min(0).default(30_000),
    /** Random spread applied to each delay, 0.25 means ±25% */
    jitterRatio: z.number().min(0).max(1).default(0),
});

export const gateConfigSchema = z.object({
    defaultCooldownMs: z.number().min(0).default(3_000),
});

export const pagingConfigSchema = z.object({
    pageSize: z.number().int().positive().default(20),
    /** Fraction of the list the user must have seen before the next page is prefetched */
    prefetchThreshold: z.number().gt(0).max(1).default(0.8),
});

export const coordinatorConfigSchema = z.object({
    retry: retryConfigSchema.default({}),
    gate: gateConfigSchema.default({}),
    paging: pagingConfigSchema.default({}),
    /** How long terminal ledger entries stay queryable for late pushes */
    retentionMs: z.number().min(0).default(30_000),
});

export type RetryConfig = z.infer<typeof retryConfigSchema>;
export type GateConfig = z.infer<typeof gateConfigSchema>;
export type PagingConfig = z.infer<typeof pagingConfigSchema>;
export type CoordinatorConfig = z.infer<typeof coordinatorConfigSchema>;
export type CoordinatorConfigInput = z.input<typeof coordinatorConfigSchema>;

/**
 * Fill in defaults and validate a partial configuration
 * Throws a ZodError for out-of-range values
 */
export function resolveConfig(input: CoordinatorConfigInput = {}): CoordinatorConfig {
    return coordinatorConfigSchema.parse(input);
}
