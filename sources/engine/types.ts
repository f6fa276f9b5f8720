/**
 * Core types for the mutation coordinator
 */

// ============================================================================
// Identity and Time
// ============================================================================

/**
 * Identifier of an entity inside an observable collection
 */
export type EntityId = string;

/**
 * Unique identifier of a pending update (CUID2 format)
 */
export type UpdateId = string;

/**
 * Timestamp in milliseconds since epoch
 */
export type Timestamp = number;

/**
 * Every item held by a collection store must carry a string id
 */
export interface Identified {
    readonly id: EntityId;
}

// ============================================================================
// Pending Updates
// ============================================================================

/**
 * Kind of entity a mutation targets
 */
export type EntityType =
    | 'notification'
    | 'review'
    | 'listing'
    | 'saved-item'
    | 'profile-field';

/**
 * Kind of change a mutation performs
 */
export type UpdateOperation = 'create' | 'update' | 'delete' | 'toggle';

/**
 * Lifecycle of a pending update
 * `pending` moves to exactly one of the terminal statuses
 */
export type UpdateStatus = 'pending' | 'confirmed' | 'rolled-back' | 'failed';

/**
 * Terminal statuses accepted by the ledger's resolve()
 */
export type TerminalStatus = Exclude<UpdateStatus, 'pending'>;

/**
 * One in-flight optimistic mutation
 *
 * Snapshots are typed with the collection's item type so that
 * rollback and push comparisons are exact.
 *
 * @typeParam TValue - Item type of the collection the entity lives in
 */
export interface PendingUpdate<TValue = unknown> {
    readonly id: UpdateId;
    readonly entityType: EntityType;
    readonly entityId: EntityId;
    /** Further entities the update changes, e.g. every item a bulk update marks */
    readonly relatedIds: ReadonlyArray<EntityId>;
    /** Fields the mutation touches; empty means the whole entity */
    readonly fields: ReadonlyArray<string>;
    readonly operation: UpdateOperation;
    /** Entity before the change, null for creates */
    readonly originalValue: TValue | null;
    /** Entity as applied locally, null for deletes */
    readonly optimisticValue: TValue | null;
    readonly retryCount: number;
    readonly createdAt: Timestamp;
    readonly lastAttemptAt: Timestamp;
    readonly resolvedAt: Timestamp | null;
    readonly status: UpdateStatus;
}

/**
 * Input accepted by the ledger when registering a new update
 */
export type NewPendingUpdate<TValue = unknown> = Pick<
    PendingUpdate<TValue>,
    'entityType' | 'entityId' | 'fields' | 'operation' | 'originalValue' | 'optimisticValue'
> & {
    relatedIds?: ReadonlyArray<EntityId>;
};

// ============================================================================
// Errors and Policy
// ============================================================================

/**
 * Complete classification of failures surfaced by the coordinator
 */
export type ErrorCategory =
    | 'network'
    | 'authorization'
    | 'conflict'
    | 'validation'
    | 'server-error'
    | 'unknown';

/**
 * Corrective action the feature layer should take after a rollback
 */
export type RecoveryHint = 'refetch' | 'reauthenticate';

/**
 * Decision taken by the policy engine for a failed attempt
 *
 * At most one of shouldRetry/shouldRollback is true. Both false means
 * "surface the error, keep the optimistic state".
 */
export interface RetryRecommendation {
    readonly shouldRetry: boolean;
    readonly shouldRollback: boolean;
    /** Backoff before the next attempt, null unless shouldRetry */
    readonly delayMs: number | null;
    readonly hint: RecoveryHint | null;
    readonly reason: RecommendationReason;
}

export type RecommendationReason =
    | 'retryable'
    | 'retries-exhausted'
    | 'server-conflict'
    | 'unauthorized'
    | 'validation-failed'
    | 'cancelled';

// ============================================================================
// Observable State
// ============================================================================

/**
 * Loading state of a collection
 */
export type LoadingState =
    | { readonly status: 'idle' }
    | { readonly status: 'loading' }
    | { readonly status: 'loaded' }
    | { readonly status: 'failed'; readonly reason: string };

/**
 * State exposed to the UI for one feature
 * Items are kept in display order
 */
export interface CollectionState<T extends Identified> {
    readonly items: ReadonlyArray<T>;
    readonly unreadOrPendingCount: number;
    readonly loadingState: LoadingState;
}

// ============================================================================
// External Data
// ============================================================================

/**
 * Out-of-band entity change delivered by a real-time channel
 */
export type EntityUpdate<T extends Identified> =
    | {
        readonly kind: 'upsert';
        readonly entityType: EntityType;
        readonly entityId: EntityId;
        readonly value: T;
    }
    | {
        readonly kind: 'delete';
        readonly entityType: EntityType;
        readonly entityId: EntityId;
    };

/**
 * Registration surface of a real-time channel
 * Returns a function that ends the subscription
 */
export interface RealtimeSource<T extends Identified> {
    subscribe(onEvent: (event: EntityUpdate<T>) => void): () => void;
}

/**
 * One page returned by a repository
 * `offset` echoes the requested cursor, `nextOffset` is null at the end
 */
export interface Page<T> {
    readonly items: ReadonlyArray<T>;
    readonly offset: number;
    readonly nextOffset: number | null;
    /** Server-side count for the collection badge, when the backend reports one */
    readonly unreadOrPendingCount?: number;
}
