/**
 * Mutation coordinator - Export all public APIs
 */

// Types
export type {
    EntityId,
    UpdateId,
    Timestamp,
    Identified,
    EntityType,
    UpdateOperation,
    UpdateStatus,
    TerminalStatus,
    PendingUpdate,
    NewPendingUpdate,
    ErrorCategory,
    RecoveryHint,
    RetryRecommendation,
    RecommendationReason,
    LoadingState,
    CollectionState,
    EntityUpdate,
    RealtimeSource,
    Page,
} from './types';

// Helpers
export { abortable, createUpdateId, createPlaceholderId, deepEqual, fieldsOverlap, findItem } from './helpers';

// Errors
export { DuplicateActiveMutationError, MutationCancelledError, DomainError } from './errors';

// Configuration
export { resolveConfig, coordinatorConfigSchema } from './config';
export type { CoordinatorConfig, CoordinatorConfigInput, RetryConfig, GateConfig, PagingConfig } from './config';

// Time
export { systemClock } from './clock';
export type { Clock } from './clock';

// Events and logging
export { createLogSink, fanOut, noopSink } from './events';
export type { CoordinatorEvent, CoordinatorEventType, EventSink, SkipReason } from './events';
export { createLogger, createRootLogger } from './logger';
export type { RootLoggerOptions } from './logger';

// Components
export { PendingUpdateLedger } from './ledger';
export type { LedgerConfig } from './ledger';
export { classify, createClassifier, defaultRules, describeCategory, extendRules, extractFacts } from './classifier';
export type { ClassificationRule, ErrorClassifier, ErrorFacts } from './classifier';
export { RetryPolicy } from './policy';
export { RateGate } from './gate';
export type { RateGateConfig } from './gate';
export { CollectionStore, emptyCollectionState, fromRecipe, removeItem, upsertItem } from './store';
export type { Recipe, Reducer, ServerScope, StoreListener } from './store';
export { Reconciler, defaultPushApplier } from './reconciler';
export type { ConfirmOutcome, PushApplier, PushOutcome } from './reconciler';
export { PageLoader } from './pagination';
export type { LoadResult, PageFetcher, PageLoaderOptions, PageRequest } from './pagination';
export { MutationCoordinator, invalid, noop, proceed } from './coordinator';
export type {
    MutationCoordinatorOptions,
    MutationDefinition,
    MutationFailure,
    MutationOutcome,
    Precondition,
} from './coordinator';
