/**
 * Error classifier
 *
 * Maps a raw failure to an ErrorCategory through an ordered rule table.
 * New backends are supported by prepending rules, not by adding string
 * checks at call sites.
 */

import { z } from 'zod';
import type { ErrorCategory } from './types';

/**
 * Fields the classifier reads from a raw error
 */
export interface ErrorFacts {
    status: number | null;
    code: string | null;
    name: string | null;
    message: string;
}

/**
 * One row of the classification table
 * A rule matches when any of its criteria matches
 */
export interface ClassificationRule {
    category: ErrorCategory;
    statuses?: ReadonlyArray<number | readonly [number, number]>;
    codes?: ReadonlyArray<string>;
    names?: ReadonlyArray<string>;
    test?: (facts: ErrorFacts) => boolean;
}

export type ErrorClassifier = (error: unknown) => ErrorCategory;

const errorShape = z.object({
    status: z.number().int().optional().catch(undefined),
    statusCode: z.number().int().optional().catch(undefined),
    code: z.union([z.string(), z.number()]).optional().catch(undefined),
    name: z.string().optional().catch(undefined),
    message: z.string().optional().catch(undefined),
    response: z.object({ status: z.number().int().optional().catch(undefined) }).optional().catch(undefined),
    cause: z.object({ code: z.string().optional().catch(undefined) }).optional().catch(undefined),
});

/**
 * Pull status, code, name and message out of whatever was thrown
 */
export function extractFacts(error: unknown): ErrorFacts {
    if (typeof error === 'string') {
        return { status: null, code: null, name: null, message: error };
    }

    const parsed = errorShape.safeParse(error);
    if (!parsed.success) {
        return { status: null, code: null, name: null, message: String(error) };
    }

    const shape = parsed.data;
    const code = shape.code ?? shape.cause?.code;
    return {
        status: shape.status ?? shape.statusCode ?? shape.response?.status ?? null,
        code: code === undefined ? null : String(code),
        name: shape.name ?? null,
        message: shape.message ?? '',
    };
}

export const defaultRules: ReadonlyArray<ClassificationRule> = [
    {
        category: 'network',
        names: ['AbortError', 'TimeoutError', 'MutationCancelledError'],
        codes: ['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN', 'ENETUNREACH', 'network_error', 'timeout', 'offline'],
        statuses: [408],
        // undici reports connectivity failures as a bare TypeError
        test: (facts) => facts.name === 'TypeError' && facts.message === 'fetch failed',
    },
    {
        category: 'authorization',
        statuses: [401, 403],
        codes: ['unauthenticated', 'unauthorized', 'forbidden', 'session_expired', 'PGRST301', '42501'],
    },
    {
        category: 'conflict',
        statuses: [409, 412],
        codes: ['already_exists', 'version_mismatch', 'conflict', '23505'],
    },
    {
        category: 'validation',
        statuses: [400, 422],
        codes: ['validation_failed', 'invalid_input', '22P02', '23514'],
    },
    {
        category: 'server-error',
        statuses: [429, [500, 599]],
    },
];

function matchesStatus(status: number | null, statuses: ClassificationRule['statuses']): boolean {
    if (status === null || !statuses) return false;
    return statuses.some((entry) =>
        typeof entry === 'number' ? entry === status : status >= entry[0] && status <= entry[1]
    );
}

function matches(rule: ClassificationRule, facts: ErrorFacts): boolean {
    if (facts.code !== null && rule.codes?.includes(facts.code)) return true;
    if (facts.name !== null && rule.names?.includes(facts.name)) return true;
    if (matchesStatus(facts.status, rule.statuses)) return true;
    return rule.test?.(facts) ?? false;
}

/**
 * Build a classifier from a rule table; the first matching rule wins
 */
export function createClassifier(rules: ReadonlyArray<ClassificationRule> = defaultRules): ErrorClassifier {
    return (error) => {
        const facts = extractFacts(error);
        for (const rule of rules) {
            if (matches(rule, facts)) {
                return rule.category;
            }
        }
        return 'unknown';
    };
}

/**
 * Default table with backend-specific rules taking precedence
 */
export function extendRules(extra: ReadonlyArray<ClassificationRule>): ReadonlyArray<ClassificationRule> {
    return [...extra, ...defaultRules];
}

export const classify: ErrorClassifier = createClassifier();

const categoryMessages: Record<ErrorCategory, string> = {
    'network': 'Unable to connect. Please check your internet connection and try again.',
    'authorization': 'Your session has expired. Please sign in again.',
    'conflict': 'This item was changed elsewhere. Refreshing with the latest version.',
    'validation': 'Some of the information provided is not valid.',
    'server-error': 'Something went wrong on our end. Please try again later.',
    'unknown': 'An unexpected error occurred. Please try again.',
};

/**
 * User-facing message for a category
 */
export function describeCategory(category: ErrorCategory): string {
    return categoryMessages[category];
}
