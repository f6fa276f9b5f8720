/**
 * Error classes raised by the coordinator and by repositories
 */

import type { EntityId, EntityType, UpdateId } from './types';

/**
 * Thrown by the ledger when a pending update already targets the same
 * entity with an overlapping field-set
 */
export class DuplicateActiveMutationError extends Error {
    readonly name = 'DuplicateActiveMutationError';

    constructor(
        readonly entityType: EntityType,
        readonly entityId: EntityId,
        readonly activeUpdateId: UpdateId,
    ) {
        super(`A pending ${entityType} mutation (${activeUpdateId}) already targets ${entityId}`);
    }
}

/**
 * Reason passed to an AbortController when the coordinator cancels work
 * Classified as a network failure
 */
export class MutationCancelledError extends Error {
    readonly name = 'MutationCancelledError';

    constructor(message = 'Mutation cancelled') {
        super(message);
    }
}

/**
 * Failure reported by a repository
 *
 * `code` is the backend's error code (Postgres SQLSTATE, PostgREST code,
 * or an application code such as "version_mismatch"), `status` the HTTP
 * status when the failure came from an HTTP response.
 */
export class DomainError extends Error {
    readonly name = 'DomainError';

    constructor(
        readonly code: string,
        message: string,
        readonly status?: number,
    ) {
        super(message);
    }
}
