/**
 * Notification center
 *
 * Recent notifications for the dropdown, with optimistic mark-as-read,
 * mark-all-as-read and delete, a rate-limited refresh, and real-time
 * inserts from the notification channel.
 *
 * Actions rolled back because the connection was lost are queued and
 * replayed by processPendingActions() once it is back.
 */

import { produce } from 'immer';
import type { Logger } from 'pino';
import {
    MutationCancelledError,
    MutationCoordinator,
    PageLoader,
    classify,
    createLogSink,
    createLogger,
    describeCategory,
    findItem,
    noop,
    proceed,
    type Clock,
    type CollectionState,
    type CoordinatorConfigInput,
    type EntityUpdate,
    type EventSink,
    type LoadResult,
    type MutationDefinition,
    type MutationFailure,
    type MutationOutcome,
    type Page,
    type PageRequest,
    type RealtimeSource,
    type StoreListener,
} from '../engine';

export type NotificationType = 'message' | 'listing' | 'review' | 'challenge' | 'system';

export interface UserNotification {
    readonly id: string;
    readonly type: NotificationType;
    readonly title: string;
    readonly body: string;
    readonly isRead: boolean;
    readonly createdAt: string;
}

export interface NotificationRepository {
    /** Newest first; `unreadOrPendingCount` carries the user's total unread count */
    fetchNotifications(request: PageRequest): Promise<Page<UserNotification>>;
    markAsRead(notificationId: string, signal: AbortSignal): Promise<void>;
    markAllAsRead(signal: AbortSignal): Promise<void>;
    deleteNotification(notificationId: string, signal: AbortSignal): Promise<void>;
    fetchUnreadCount(signal: AbortSignal): Promise<number>;
}

export type NotificationCenterOptions = {
    userId: string;
    repository: NotificationRepository;
    realtime?: RealtimeSource<UserNotification>;
    /** Notifications kept in the dropdown. Default: 10 */
    dropdownLimit?: number;
    /** Minimum time between two successful refreshes. Default: 5 seconds */
    refreshCooldownMs?: number;
    config?: CoordinatorConfigInput;
    clock?: Clock;
    sink?: EventSink;
    /** Parent of the feature's logger when no sink is given */
    logger?: Logger;
};

type NotificationState = CollectionState<UserNotification>;

export type MarkAllInput = {
    /** Notifications shown as unread when the action started */
    ids: ReadonlyArray<string>;
    /** Unread count shown when the action started */
    unreadCount: number;
};

/**
 * Action waiting for the connection to come back
 */
export type PendingAction =
    | { kind: 'mark-read'; notificationId: string }
    | { kind: 'mark-all-read' }
    | { kind: 'delete'; notificationId: string };

// ============================================================================
// Mutations
// ============================================================================

export function markAsReadMutation(
    repository: NotificationRepository,
): MutationDefinition<UserNotification, string, void> {
    return {
        entityType: 'notification',
        operation: 'update',
        entityId: (id) => id,
        fields: () => ['isRead'],
        precondition: (state, id) => {
            const notification = findItem(state.items, id);
            return !notification || notification.isRead ? noop : proceed;
        },
        apply: (draft, id) => {
            const notification = draft.items.find((item) => item.id === id);
            if (notification && !notification.isRead) {
                notification.isRead = true;
                draft.unreadOrPendingCount = Math.max(0, draft.unreadOrPendingCount - 1);
            }
        },
        execute: (id, signal) => repository.markAsRead(id, signal),
    };
}

/**
 * Marks read only what was unread when the user asked; notifications
 * arriving while the call is in flight keep their own state
 */
export function markAllAsReadMutation(
    repository: NotificationRepository,
    userId: string,
): MutationDefinition<UserNotification, MarkAllInput, void> {
    return {
        entityType: 'notification',
        operation: 'update',
        entityId: () => `all:${userId}`,
        relatedIds: (input) => input.ids,
        fields: () => ['isRead'],
        precondition: (_state, input) => (input.unreadCount > 0 ? proceed : noop),
        apply: (draft, input) => {
            for (const notification of draft.items) {
                if (input.ids.includes(notification.id)) {
                    notification.isRead = true;
                }
            }
            draft.unreadOrPendingCount = Math.max(0, draft.unreadOrPendingCount - input.unreadCount);
        },
        execute: (_input, signal) => repository.markAllAsRead(signal),
    };
}

export function deleteNotificationMutation(
    repository: NotificationRepository,
): MutationDefinition<UserNotification, string, void> {
    return {
        entityType: 'notification',
        operation: 'delete',
        entityId: (id) => id,
        precondition: (state, id) => (findItem(state.items, id) ? proceed : noop),
        apply: (draft, id) => {
            const index = draft.items.findIndex((item) => item.id === id);
            if (index < 0) return;
            const [removed] = draft.items.splice(index, 1);
            if (!removed.isRead) {
                draft.unreadOrPendingCount = Math.max(0, draft.unreadOrPendingCount - 1);
            }
        },
        execute: (id, signal) => repository.deleteNotification(id, signal),
    };
}

/**
 * Real-time events: new notifications go on top and bump the unread
 * count, read-state changes adjust it, the dropdown stays within its limit
 */
export function notificationPushApplier(dropdownLimit: number) {
    return (state: NotificationState, event: EntityUpdate<UserNotification>): NotificationState =>
        produce(state, (draft) => {
            const index = draft.items.findIndex((item) => item.id === event.entityId);
            const existing = index >= 0 ? draft.items[index] : undefined;

            if (event.kind === 'delete') {
                if (!existing) return;
                draft.items.splice(index, 1);
                if (!existing.isRead) {
                    draft.unreadOrPendingCount = Math.max(0, draft.unreadOrPendingCount - 1);
                }
                return;
            }

            const incoming = event.value;
            if (existing) {
                if (existing.isRead !== incoming.isRead) {
                    draft.unreadOrPendingCount = Math.max(
                        0,
                        draft.unreadOrPendingCount + (incoming.isRead ? -1 : 1),
                    );
                }
                draft.items[index] = incoming;
                return;
            }

            draft.items.unshift(incoming);
            if (draft.items.length > dropdownLimit) {
                draft.items.splice(dropdownLimit);
            }
            if (!incoming.isRead) {
                draft.unreadOrPendingCount += 1;
            }
        });
}

// ============================================================================
// Notification Center
// ============================================================================

export class NotificationCenter {
    readonly userId: string;
    private readonly repository: NotificationRepository;
    private readonly sink: EventSink;
    private readonly coordinator: MutationCoordinator<UserNotification>;
    private readonly pages: PageLoader<UserNotification>;
    private readonly realtime: RealtimeSource<UserNotification> | undefined;
    private readonly refreshCooldownMs: number;
    private readonly markAsReadDefinition: MutationDefinition<UserNotification, string, void>;
    private readonly markAllAsReadDefinition: MutationDefinition<UserNotification, MarkAllInput, void>;
    private readonly deleteDefinition: MutationDefinition<UserNotification, string, void>;
    private pendingActions: PendingAction[];
    private countController: AbortController | null;

    constructor(options: NotificationCenterOptions) {
        const dropdownLimit = options.dropdownLimit ?? 10;
        const sink = options.sink ?? createLogSink(createLogger('notifications', options.logger));

        this.userId = options.userId;
        this.repository = options.repository;
        this.sink = sink;
        this.pendingActions = [];
        this.countController = null;
        this.realtime = options.realtime;
        this.refreshCooldownMs = options.refreshCooldownMs ?? 5_000;
        this.coordinator = new MutationCoordinator<UserNotification>({
            collection: 'notifications',
            config: options.config,
            clock: options.clock,
            sink,
            applyPush: notificationPushApplier(dropdownLimit),
        });
        this.pages = new PageLoader<UserNotification>({
            store: this.coordinator.store,
            fetchPage: (request) => options.repository.fetchNotifications(request),
            paging: { ...this.coordinator.config.paging, pageSize: dropdownLimit },
            policy: this.coordinator.policy,
            clock: options.clock,
            sink,
        });
        this.markAsReadDefinition = markAsReadMutation(options.repository);
        this.markAllAsReadDefinition = markAllAsReadMutation(options.repository, options.userId);
        this.deleteDefinition = deleteNotificationMutation(options.repository);
    }

    get state(): NotificationState {
        return this.coordinator.state;
    }

    get unreadCount(): number {
        return this.coordinator.state.unreadOrPendingCount;
    }

    get hasMore(): boolean {
        return this.pages.hasMore;
    }

    /**
     * Whether actions are waiting for the connection to come back
     */
    get isOffline(): boolean {
        return this.pendingActions.length > 0;
    }

    get queuedActions(): ReadonlyArray<PendingAction> {
        return this.pendingActions;
    }

    subscribe(listener: StoreListener<UserNotification>): () => void {
        return this.coordinator.store.subscribe(listener);
    }

    onFailure(listener: (failure: MutationFailure) => void): () => void {
        return this.coordinator.onFailure(listener);
    }

    /**
     * Reload the dropdown from the top
     * Skipped while a refresh is running or within the cooldown of the last one
     */
    async loadRecent(): Promise<LoadResult> {
        const key = `loadRecent:${this.userId}`;
        if (!this.coordinator.gate.shouldProceed(key, this.refreshCooldownMs)) {
            return { status: 'skipped' };
        }

        let loaded = false;
        try {
            const result = await this.pages.refresh();
            loaded = result.status === 'loaded';
            return result;
        } finally {
            this.coordinator.gate.settle(key, loaded);
        }
    }

    loadMore(): Promise<LoadResult> {
        return this.pages.loadNext();
    }

    prefetch(visibleIndex: number): Promise<LoadResult> {
        return this.pages.prefetch(visibleIndex);
    }

    /**
     * Fetch the unread count alone
     * A newer call discards the result of an older one
     */
    async refreshUnreadCount(): Promise<LoadResult> {
        this.countController?.abort(new MutationCancelledError('Superseded by a newer count request'));
        const controller = new AbortController();
        this.countController = controller;

        try {
            const count = await this.repository.fetchUnreadCount(controller.signal);
            if (controller.signal.aborted) {
                return { status: 'discarded' };
            }
            this.coordinator.store.applyServer((state) => ({ ...state, unreadOrPendingCount: count }));
            return { status: 'loaded', count };
        } catch (error) {
            if (controller.signal.aborted) {
                return { status: 'discarded' };
            }
            const category = classify(error);
            this.sink({ type: 'count_failed', collection: 'notifications', category });
            return { status: 'failed', category, message: describeCategory(category) };
        } finally {
            if (this.countController === controller) {
                this.countController = null;
            }
        }
    }

    markAsRead(notificationId: string): Promise<MutationOutcome<void>> {
        return this.queueWhenOffline(
            { kind: 'mark-read', notificationId },
            this.coordinator.mutate(this.markAsReadDefinition, notificationId),
        );
    }

    markAllAsRead(): Promise<MutationOutcome<void>> {
        const { items, unreadOrPendingCount } = this.coordinator.state;
        return this.queueWhenOffline(
            { kind: 'mark-all-read' },
            this.coordinator.mutate(this.markAllAsReadDefinition, {
                ids: items.filter((item) => !item.isRead).map((item) => item.id),
                unreadCount: unreadOrPendingCount,
            }),
        );
    }

    deleteNotification(notificationId: string): Promise<MutationOutcome<void>> {
        return this.queueWhenOffline(
            { kind: 'delete', notificationId },
            this.coordinator.mutate(this.deleteDefinition, notificationId),
        );
    }

    /**
     * Replay queued actions, oldest first
     * Actions whose notification is gone or already in the target state are skipped
     */
    async processPendingActions(): Promise<MutationOutcome<void>[]> {
        const actions = this.pendingActions.splice(0);
        const outcomes: MutationOutcome<void>[] = [];
        for (const action of actions) {
            outcomes.push(await this.replay(action));
        }
        return outcomes;
    }

    /**
     * Start receiving real-time notifications
     * Returns a function that ends the subscription; a no-op without a channel
     */
    subscribeToRealtime(): () => void {
        if (!this.realtime) {
            return () => {};
        }
        return this.coordinator.connect(this.realtime);
    }

    dispose(): void {
        this.pages.cancel();
        this.countController?.abort(new MutationCancelledError('Notification center disposed'));
        this.coordinator.dispose();
    }

    private replay(action: PendingAction): Promise<MutationOutcome<void>> {
        switch (action.kind) {
            case 'mark-read':
                return this.markAsRead(action.notificationId);
            case 'mark-all-read':
                return this.markAllAsRead();
            case 'delete':
                return this.deleteNotification(action.notificationId);
        }
    }

    /**
     * Queue an action that was rolled back after its network retries ran out
     */
    private async queueWhenOffline(
        action: PendingAction,
        pending: Promise<MutationOutcome<void>>,
    ): Promise<MutationOutcome<void>> {
        const outcome = await pending;
        if (
            outcome.status === 'rolled-back' &&
            outcome.failure.category === 'network' &&
            outcome.failure.reason === 'retries-exhausted'
        ) {
            this.pendingActions.push(action);
            this.sink({
                type: 'action_queued',
                entityType: 'notification',
                entityId: outcome.failure.entityId,
                queued: this.pendingActions.length,
            });
        }
        return outcome;
    }
}
