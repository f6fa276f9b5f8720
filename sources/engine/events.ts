/**
 * Structured events emitted by the coordinator
 */

import type { Logger } from 'pino';
import type {
    EntityId,
    EntityType,
    ErrorCategory,
    RecommendationReason,
    UpdateId,
    UpdateOperation,
} from './types';

export type SkipReason = 'noop' | 'rate-limited' | 'invalid' | 'duplicate';

export type CoordinatorEvent =
    | {
        type: 'mutation_applied';
        updateId: UpdateId;
        entityType: EntityType;
        entityId: EntityId;
        operation: UpdateOperation;
    }
    | {
        type: 'mutation_confirmed';
        updateId: UpdateId;
        entityType: EntityType;
        entityId: EntityId;
        via: 'response' | 'push';
        /** The server value differed from the optimistic one */
        overridden: boolean;
    }
    | {
        type: 'mutation_retry_scheduled';
        updateId: UpdateId;
        category: ErrorCategory;
        attempt: number;
        delayMs: number;
    }
    | {
        type: 'mutation_rolled_back';
        updateId: UpdateId;
        entityType: EntityType;
        entityId: EntityId;
        category: ErrorCategory;
        reason: RecommendationReason;
    }
    | {
        type: 'mutation_failed';
        updateId: UpdateId;
        entityType: EntityType;
        entityId: EntityId;
        category: ErrorCategory;
    }
    | {
        type: 'mutation_skipped';
        entityType: EntityType;
        entityId: EntityId;
        reason: SkipReason;
    }
    | {
        type: 'duplicate_suppressed';
        updateId: UpdateId;
        entityType: EntityType;
        entityId: EntityId;
    }
    | {
        type: 'push_applied';
        entityType: EntityType;
        entityId: EntityId;
        kind: 'upsert' | 'delete';
        /** Pending update whose overlay now sits on the pushed value */
        pendingUpdateId: UpdateId | null;
        /** A visible item disappeared */
        removed: boolean;
    }
    | {
        type: 'late_response_ignored';
        updateId: UpdateId;
    }
    | {
        /** A rolled-back action waits for the connection to come back */
        type: 'action_queued';
        entityType: EntityType;
        entityId: EntityId;
        queued: number;
    }
    | {
        type: 'page_loaded';
        collection: string;
        offset: number;
        count: number;
    }
    | {
        type: 'page_discarded';
        collection: string;
        offset: number;
        reason: 'stale-generation' | 'cursor-mismatch';
    }
    | {
        type: 'page_failed';
        collection: string;
        offset: number;
        category: ErrorCategory;
    }
    | {
        type: 'count_failed';
        collection: string;
        category: ErrorCategory;
    };

export type CoordinatorEventType = CoordinatorEvent['type'];

/**
 * Destination of coordinator events
 */
export type EventSink = (event: CoordinatorEvent) => void;

export const noopSink: EventSink = () => {};

/**
 * Route events to a pino logger
 * Routine bookkeeping goes to debug, confirmations to info,
 * anything the user will notice to warn
 */
export function createLogSink(logger: Logger): EventSink {
    return (event) => {
        const { type, ...fields } = event;
        switch (event.type) {
            case 'mutation_confirmed':
            case 'page_loaded':
            case 'action_queued':
                logger.info(fields, type);
                return;
            case 'mutation_rolled_back':
            case 'mutation_failed':
            case 'page_failed':
            case 'count_failed':
                logger.warn(fields, type);
                return;
            case 'push_applied':
                if (event.removed || event.pendingUpdateId !== null) {
                    logger.warn(fields, type);
                } else {
                    logger.debug(fields, type);
                }
                return;
            default:
                logger.debug(fields, type);
        }
    };
}

/**
 * Combine several sinks into one
 */
export function fanOut(...sinks: EventSink[]): EventSink {
    return (event) => {
        for (const sink of sinks) {
            sink(event);
        }
    };
}
