/**
 * Mutation coordinator
 *
 * Entry point for optimistic mutations on one collection. Each call to
 * mutate() runs this state machine:
 *
 * 1. Precondition - a no-op or invalid input returns before anything changes
 * 2. Gate - a rate-limited call returns before anything changes
 * 3. Optimistic apply - ledger entry registered, overlay pushed to the store
 * 4. In flight - the repository operation runs
 * 5. Success - the reconciler folds the authoritative result into the store
 * 6. Failure - the error is classified and the policy decides:
 *    retry after a backoff, roll back, or fail and keep the overlay
 *
 * All mutations of one store go through one coordinator.
 */

import type { Draft } from 'immer';
import { classify, describeCategory, extractFacts, type ErrorClassifier } from './classifier';
import { systemClock, type Clock } from './clock';
import { resolveConfig, type CoordinatorConfig, type CoordinatorConfigInput } from './config';
import { DuplicateActiveMutationError, MutationCancelledError } from './errors';
import { noopSink, type EventSink } from './events';
import { RateGate } from './gate';
import { abortable, findItem } from './helpers';
import { PendingUpdateLedger } from './ledger';
import { RetryPolicy } from './policy';
import { Reconciler, defaultPushApplier, type PushApplier, type PushOutcome } from './reconciler';
import { CollectionStore, fromRecipe } from './store';
import type {
    CollectionState,
    EntityId,
    EntityType,
    EntityUpdate,
    ErrorCategory,
    Identified,
    RealtimeSource,
    RecommendationReason,
    RecoveryHint,
    UpdateId,
    UpdateOperation,
} from './types';

// ============================================================================
// Mutation Definitions
// ============================================================================

/**
 * Result of a local precondition check
 */
export type Precondition =
    | { kind: 'proceed' }
    | { kind: 'noop' }
    | { kind: 'invalid'; message: string };

export const proceed: Precondition = { kind: 'proceed' };
export const noop: Precondition = { kind: 'noop' };
export function invalid(message: string): Precondition {
    return { kind: 'invalid', message };
}

/**
 * Describes one kind of mutation for a collection of T
 *
 * @typeParam T - Item type of the collection
 * @typeParam TInput - Input passed to mutate()
 * @typeParam TResult - Value returned by the repository on success
 */
export interface MutationDefinition<T extends Identified, TInput, TResult> {
    entityType: EntityType;
    operation: UpdateOperation;
    entityId(input: TInput): EntityId;
    /** Further entities the mutation changes, checked against other pending updates */
    relatedIds?(input: TInput): ReadonlyArray<EntityId>;
    /** Fields touched by the mutation; omitted means the whole entity */
    fields?(input: TInput): ReadonlyArray<string>;
    /** Checked against the visible state before anything changes */
    precondition?(state: CollectionState<T>, input: TInput): Precondition;
    /** Rate-gate key and cooldown; omitted means ungated */
    rateLimit?(input: TInput): { key: string; cooldownMs?: number };
    /** Optimistic change */
    apply(draft: Draft<CollectionState<T>>, input: TInput): void;
    /**
     * Authoritative change, applied to the server base on success
     * Defaults to apply()
     */
    confirm?(draft: Draft<CollectionState<T>>, input: TInput, result: TResult): void;
    /** Remote operation; rejects on failure */
    execute(input: TInput, signal: AbortSignal): Promise<TResult>;
    /**
     * Recognise a pushed entity as the server's copy of what this mutation
     * creates, when the push carries a real id instead of the placeholder
     */
    matchesPush?(input: TInput, value: T): boolean;
}

// ============================================================================
// Outcomes
// ============================================================================

/**
 * User-visible error signal, emitted once per failed ledger entry
 */
export interface MutationFailure {
    updateId: UpdateId;
    entityType: EntityType;
    entityId: EntityId;
    status: 'rolled-back' | 'failed';
    category: ErrorCategory;
    reason: RecommendationReason;
    hint: RecoveryHint | null;
    message: string;
}

export type MutationOutcome<TResult> =
    | { status: 'skipped'; reason: 'noop' | 'rate-limited' }
    | { status: 'invalid'; message: string }
    | { status: 'rejected'; error: DuplicateActiveMutationError }
    | { status: 'confirmed'; updateId: UpdateId; via: 'response'; result: TResult; overridden: boolean }
    | { status: 'confirmed'; updateId: UpdateId; via: 'push' }
    | { status: 'rolled-back'; updateId: UpdateId; failure: MutationFailure }
    | { status: 'failed'; updateId: UpdateId; failure: MutationFailure };

// ============================================================================
// Coordinator
// ============================================================================

export type MutationCoordinatorOptions<T extends Identified> = {
    /** Collection name, used for the store and in events */
    collection: string;
    initialState?: CollectionState<T>;
    store?: CollectionStore<T>;
    config?: CoordinatorConfigInput;
    clock?: Clock;
    classifier?: ErrorClassifier;
    policy?: RetryPolicy;
    gate?: RateGate;
    sink?: EventSink;
    /** How real-time events change the server base */
    applyPush?: PushApplier<T>;
};

type Target = {
    readonly updateId: UpdateId;
    readonly entityType: EntityType;
    readonly entityId: EntityId;
};

type Run<T> = {
    readonly target: Target;
    readonly matchesPush: ((value: T) => boolean) | null;
    /** Aborts the whole mutation: repository call and backoff */
    readonly controller: AbortController;
    /** Aborts only the current backoff delay */
    backoff: AbortController | null;
};

export class MutationCoordinator<T extends Identified> {
    readonly store: CollectionStore<T>;
    readonly ledger: PendingUpdateLedger<T>;
    readonly gate: RateGate;
    readonly policy: RetryPolicy;
    readonly config: CoordinatorConfig;
    private readonly reconciler: Reconciler<T>;
    private readonly classifier: ErrorClassifier;
    private readonly clock: Clock;
    private readonly sink: EventSink;
    private readonly applyPush: PushApplier<T>;
    private readonly runs: Map<UpdateId, Run<T>>;
    private readonly failureListeners: Set<(failure: MutationFailure) => void>;
    private readonly subscriptions: Array<() => void>;

    constructor(options: MutationCoordinatorOptions<T>) {
        this.config = resolveConfig(options.config);
        this.clock = options.clock ?? systemClock;
        this.sink = options.sink ?? noopSink;
        this.classifier = options.classifier ?? classify;
        this.policy = options.policy ?? new RetryPolicy(this.config.retry);
        this.gate = options.gate ?? new RateGate({
            defaultCooldownMs: this.config.gate.defaultCooldownMs,
            clock: this.clock,
        });
        this.store = options.store ?? new CollectionStore<T>(options.collection, options.initialState);
        this.ledger = new PendingUpdateLedger<T>({ retentionMs: this.config.retentionMs, clock: this.clock });
        this.reconciler = new Reconciler(this.store, this.ledger, this.sink);
        this.applyPush = options.applyPush ?? defaultPushApplier;
        this.runs = new Map();
        this.failureListeners = new Set();
        this.subscriptions = [];
    }

    get state(): CollectionState<T> {
        return this.store.state;
    }

    /**
     * Listen for terminal failures; returns an unsubscribe function
     */
    onFailure(listener: (failure: MutationFailure) => void): () => void {
        this.failureListeners.add(listener);
        return () => {
            this.failureListeners.delete(listener);
        };
    }

    /**
     * Apply a mutation optimistically and drive it to a terminal state
     */
    async mutate<TInput, TResult>(
        definition: MutationDefinition<T, TInput, TResult>,
        input: TInput,
    ): Promise<MutationOutcome<TResult>> {
        const entityId = definition.entityId(input);

        // Step 1: Local precondition
        const precondition = definition.precondition?.(this.store.state, input) ?? proceed;
        if (precondition.kind !== 'proceed') {
            this.sink({
                type: 'mutation_skipped',
                entityType: definition.entityType,
                entityId,
                reason: precondition.kind,
            });
            return precondition.kind === 'noop'
                ? { status: 'skipped', reason: 'noop' }
                : { status: 'invalid', message: precondition.message };
        }

        // Step 2: Rate gate
        const rateLimit = definition.rateLimit?.(input);
        if (rateLimit && !this.gate.shouldProceed(rateLimit.key, rateLimit.cooldownMs)) {
            this.sink({
                type: 'mutation_skipped',
                entityType: definition.entityType,
                entityId,
                reason: 'rate-limited',
            });
            return { status: 'skipped', reason: 'rate-limited' };
        }

        // Step 3: Optimistic apply
        const optimistic = fromRecipe<T>((draft) => definition.apply(draft, input));
        let updateId: UpdateId;
        try {
            updateId = this.ledger.register({
                entityType: definition.entityType,
                entityId,
                relatedIds: definition.relatedIds?.(input),
                fields: definition.fields?.(input) ?? [],
                operation: definition.operation,
                originalValue: findItem(this.store.state.items, entityId),
                optimisticValue: findItem(optimistic(this.store.state).items, entityId),
            });
        } catch (error) {
            if (rateLimit) {
                this.gate.settle(rateLimit.key, false);
            }
            if (error instanceof DuplicateActiveMutationError) {
                this.sink({
                    type: 'mutation_skipped',
                    entityType: definition.entityType,
                    entityId,
                    reason: 'duplicate',
                });
                return { status: 'rejected', error };
            }
            throw error;
        }

        this.store.applyOptimistic(updateId, optimistic);
        this.sink({
            type: 'mutation_applied',
            updateId,
            entityType: definition.entityType,
            entityId,
            operation: definition.operation,
        });

        // Steps 4-6
        const target: Target = { updateId, entityType: definition.entityType, entityId };
        const run: Run<T> = {
            target,
            matchesPush: definition.matchesPush
                ? (value: T) => definition.matchesPush?.(input, value) ?? false
                : null,
            controller: new AbortController(),
            backoff: null,
        };
        this.runs.set(updateId, run);
        let confirmed = false;
        try {
            const outcome = await this.drive(definition, input, target, run);
            confirmed = outcome.status === 'confirmed';
            return outcome;
        } finally {
            this.runs.delete(updateId);
            if (rateLimit) {
                this.gate.settle(rateLimit.key, confirmed);
            }
        }
    }

    /**
     * Drop the overlay a failed mutation left in place
     */
    revert(updateId: UpdateId): boolean {
        const entry = this.ledger.get(updateId);
        if (entry?.status === 'pending') {
            return false;
        }
        return this.store.discard(updateId);
    }

    /**
     * Cancel a mutation in flight or waiting for a retry
     * It is rolled back as a network failure
     */
    cancel(updateId: UpdateId): boolean {
        const run = this.runs.get(updateId);
        if (!run) {
            return false;
        }
        run.controller.abort(new MutationCancelledError());
        return true;
    }

    /**
     * Feed a real-time event to the reconciler
     */
    receive(event: EntityUpdate<T>): PushOutcome {
        const claimant = this.claimantOf(event);
        const outcome = claimant
            ? this.reconciler.confirmFromPush(claimant, event, this.applyPush)
            : this.reconciler.receive(event, this.applyPush);
        if (outcome.kind === 'confirmed') {
            // Stop waiting for a retry the push made unnecessary
            this.runs.get(outcome.updateId)?.backoff?.abort(new MutationCancelledError('Confirmed by push'));
        }
        return outcome;
    }

    /**
     * Subscribe to a real-time channel until dispose()
     */
    connect(source: RealtimeSource<T>): () => void {
        const unsubscribe = source.subscribe((event) => {
            this.receive(event);
        });
        this.subscriptions.push(unsubscribe);
        return unsubscribe;
    }

    /**
     * Tear down: cancel every mutation and end real-time subscriptions
     */
    dispose(): void {
        for (const run of this.runs.values()) {
            run.controller.abort(new MutationCancelledError('Coordinator disposed'));
        }
        for (const unsubscribe of this.subscriptions.splice(0)) {
            unsubscribe();
        }
        this.failureListeners.clear();
    }

    /**
     * Pending create that recognises a pushed entity as its own
     */
    private claimantOf(event: EntityUpdate<T>): UpdateId | null {
        if (event.kind !== 'upsert') {
            return null;
        }
        for (const [updateId, run] of this.runs) {
            if (
                run.target.entityType === event.entityType &&
                this.ledger.get(updateId)?.status === 'pending' &&
                run.matchesPush?.(event.value)
            ) {
                return updateId;
            }
        }
        return null;
    }

    private async drive<TInput, TResult>(
        definition: MutationDefinition<T, TInput, TResult>,
        input: TInput,
        target: Target,
        run: Run<T>,
    ): Promise<MutationOutcome<TResult>> {
        const { updateId } = target;
        const { signal } = run.controller;

        for (;;) {
            let failure: unknown;
            try {
                // Cancellation settles the call even when the repository ignores the signal
                const result = await abortable(definition.execute(input, signal), signal);
                if (signal.aborted) {
                    failure = signal.reason;
                } else {
                    const confirm = definition.confirm;
                    const outcome = this.reconciler.confirm(
                        updateId,
                        fromRecipe<T>((draft) =>
                            confirm ? confirm(draft, input, result) : definition.apply(draft, input)
                        ),
                    );
                    return outcome.confirmed
                        ? { status: 'confirmed', updateId, via: 'response', result, overridden: outcome.overridden }
                        : this.settledElsewhere(updateId);
                }
            } catch (error) {
                failure = error;
            }

            const entry = this.ledger.get(updateId);
            if (entry?.status !== 'pending') {
                return this.settledElsewhere(updateId);
            }

            if (signal.aborted) {
                return this.rollback(target, 'network', 'cancelled', null);
            }

            const category = this.classifier(failure);
            const decision = this.policy.decide(entry, category);

            if (decision.shouldRetry) {
                const attempt = entry.retryCount + 1;
                const delayMs = decision.delayMs ?? 0;
                this.sink({ type: 'mutation_retry_scheduled', updateId, category, attempt, delayMs });

                const backoff = new AbortController();
                const onCancel = () => backoff.abort(signal.reason);
                signal.addEventListener('abort', onCancel, { once: true });
                run.backoff = backoff;
                try {
                    await this.clock.sleep(delayMs, backoff.signal);
                } catch {
                    if (this.ledger.get(updateId)?.status !== 'pending') {
                        return this.settledElsewhere(updateId);
                    }
                    return this.rollback(target, 'network', 'cancelled', null);
                } finally {
                    signal.removeEventListener('abort', onCancel);
                    run.backoff = null;
                }

                if (this.ledger.get(updateId)?.status !== 'pending') {
                    return this.settledElsewhere(updateId);
                }
                this.ledger.recordRetry(updateId);
                continue;
            }

            if (decision.shouldRollback) {
                return this.rollback(target, category, decision.reason, decision.hint);
            }

            return this.fail(target, category, failure);
        }
    }

    /**
     * Outcome for an update a push resolved while the call was running
     */
    private settledElsewhere(updateId: UpdateId): MutationOutcome<never> {
        return { status: 'confirmed', updateId, via: 'push' };
    }

    private rollback(
        target: Target,
        category: ErrorCategory,
        reason: RecommendationReason,
        hint: RecoveryHint | null,
    ): MutationOutcome<never> {
        const { updateId } = target;
        this.reconciler.rollback(updateId);

        const failure: MutationFailure = {
            ...target,
            status: 'rolled-back',
            category,
            reason,
            hint,
            message: describeCategory(category),
        };
        this.sink({
            type: 'mutation_rolled_back',
            updateId,
            entityType: failure.entityType,
            entityId: failure.entityId,
            category,
            reason,
        });
        this.signal(failure);
        return { status: 'rolled-back', updateId, failure };
    }

    private fail(target: Target, category: ErrorCategory, error: unknown): MutationOutcome<never> {
        const { updateId } = target;
        this.reconciler.fail(updateId);

        // Validation messages reach the user as the server wrote them
        const raw = extractFacts(error).message;
        const failure: MutationFailure = {
            ...target,
            status: 'failed',
            category,
            reason: 'validation-failed',
            hint: null,
            message: raw || describeCategory(category),
        };
        this.sink({
            type: 'mutation_failed',
            updateId,
            entityType: failure.entityType,
            entityId: failure.entityId,
            category,
        });
        this.signal(failure);
        return { status: 'failed', updateId, failure };
    }

    private signal(failure: MutationFailure): void {
        for (const listener of this.failureListeners) {
            listener(failure);
        }
    }
}
