/**
 * Reviews of a user
 *
 * Submitting a review shows it at once under a placeholder id; the review
 * returned by the server replaces the placeholder when the call succeeds.
 */

import { produce } from 'immer';
import { z } from 'zod';
import type { Logger } from 'pino';
import {
    MutationCoordinator,
    PageLoader,
    createLogSink,
    createLogger,
    createPlaceholderId,
    invalid,
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
    type UpdateId,
} from '../engine';

export interface Review {
    readonly id: string;
    readonly reviewerId: string;
    readonly revieweeId: string;
    readonly rating: number;
    readonly comment: string;
    readonly createdAt: string;
    /** True while the review only exists locally */
    readonly isPlaceholder: boolean;
}

export const reviewDraftSchema = z
    .object({
        reviewerId: z.string().min(1),
        revieweeId: z.string().min(1),
        rating: z.number().int('Rating must be a whole number').min(1, 'Rating must be between 1 and 5').max(5, 'Rating must be between 1 and 5'),
        comment: z.string().max(500, 'Comment must be at most 500 characters'),
    })
    .refine((draft) => draft.reviewerId !== draft.revieweeId, {
        message: 'You cannot review yourself',
        path: ['revieweeId'],
    });

export type ReviewDraft = z.infer<typeof reviewDraftSchema>;

export interface ReviewRepository {
    /** Newest first; `unreadOrPendingCount` carries the total number of reviews */
    fetchReviews(revieweeId: string, request: PageRequest): Promise<Page<Review>>;
    submitReview(draft: ReviewDraft, signal: AbortSignal): Promise<Review>;
}

export type ReviewsOptions = {
    revieweeId: string;
    repository: ReviewRepository;
    realtime?: RealtimeSource<Review>;
    config?: CoordinatorConfigInput;
    clock?: Clock;
    sink?: EventSink;
    /** Parent of the feature's logger when no sink is given */
    logger?: Logger;
    /** Timestamp source for placeholder reviews */
    now?: () => Date;
};

type ReviewState = CollectionState<Review>;

export type SubmitReviewInput = {
    placeholderId: string;
    draft: ReviewDraft;
    createdAt: string;
};

// ============================================================================
// Mutations
// ============================================================================

export function submitReviewMutation(
    repository: ReviewRepository,
): MutationDefinition<Review, SubmitReviewInput, Review> {
    return {
        entityType: 'review',
        operation: 'create',
        entityId: (input) => input.placeholderId,
        precondition: (state, input) => {
            const parsed = reviewDraftSchema.safeParse(input.draft);
            if (!parsed.success) {
                return invalid(parsed.error.issues[0]?.message ?? 'Invalid review');
            }
            const duplicate = state.items.some((review) =>
                review.reviewerId === input.draft.reviewerId && review.revieweeId === input.draft.revieweeId
            );
            return duplicate ? invalid('You have already reviewed this user') : proceed;
        },
        apply: (draft, input) => {
            draft.items.unshift({
                id: input.placeholderId,
                ...input.draft,
                createdAt: input.createdAt,
                isPlaceholder: true,
            });
            draft.unreadOrPendingCount += 1;
        },
        confirm: (draft, input, result) => {
            const index = draft.items.findIndex((review) => review.id === input.placeholderId);
            if (index >= 0) {
                draft.items.splice(index, 1);
            }
            if (!draft.items.some((review) => review.id === result.id)) {
                draft.items.unshift(result);
                draft.unreadOrPendingCount += 1;
            }
        },
        execute: (input, signal) => repository.submitReview(input.draft, signal),
        // The channel delivers the saved review under its server id
        matchesPush: (input, review) =>
            !review.isPlaceholder &&
            review.reviewerId === input.draft.reviewerId &&
            review.revieweeId === input.draft.revieweeId,
    };
}

/**
 * Real-time events keep the review count in step with inserts and deletes
 */
export function reviewPushApplier(state: ReviewState, event: EntityUpdate<Review>): ReviewState {
    return produce(state, (draft) => {
        const index = draft.items.findIndex((review) => review.id === event.entityId);
        if (event.kind === 'delete') {
            if (index >= 0) {
                draft.items.splice(index, 1);
                draft.unreadOrPendingCount = Math.max(0, draft.unreadOrPendingCount - 1);
            }
            return;
        }
        if (index >= 0) {
            draft.items[index] = event.value;
        } else {
            draft.items.unshift(event.value);
            draft.unreadOrPendingCount += 1;
        }
    });
}

// ============================================================================
// Reviews
// ============================================================================

export class ReviewsController {
    readonly revieweeId: string;
    private readonly coordinator: MutationCoordinator<Review>;
    private readonly pages: PageLoader<Review>;
    private readonly realtime: RealtimeSource<Review> | undefined;
    private readonly submitDefinition: MutationDefinition<Review, SubmitReviewInput, Review>;
    private readonly now: () => Date;

    constructor(options: ReviewsOptions) {
        const sink = options.sink ?? createLogSink(createLogger('reviews', options.logger));

        this.revieweeId = options.revieweeId;
        this.realtime = options.realtime;
        this.now = options.now ?? (() => new Date());
        this.coordinator = new MutationCoordinator<Review>({
            collection: 'reviews',
            config: options.config,
            clock: options.clock,
            sink,
            applyPush: reviewPushApplier,
        });
        this.pages = new PageLoader<Review>({
            store: this.coordinator.store,
            fetchPage: (request) => options.repository.fetchReviews(options.revieweeId, request),
            paging: this.coordinator.config.paging,
            policy: this.coordinator.policy,
            clock: options.clock,
            sink,
        });
        this.submitDefinition = submitReviewMutation(options.repository);
    }

    get state(): CollectionState<Review> {
        return this.coordinator.state;
    }

    get reviewCount(): number {
        return this.coordinator.state.unreadOrPendingCount;
    }

    /**
     * Mean rating of the loaded reviews, null without any
     */
    get averageRating(): number | null {
        const { items } = this.coordinator.state;
        if (items.length === 0) {
            return null;
        }
        return items.reduce((sum, review) => sum + review.rating, 0) / items.length;
    }

    subscribe(listener: StoreListener<Review>): () => void {
        return this.coordinator.store.subscribe(listener);
    }

    onFailure(listener: (failure: MutationFailure) => void): () => void {
        return this.coordinator.onFailure(listener);
    }

    loadReviews(): Promise<LoadResult> {
        return this.pages.refresh();
    }

    loadMore(): Promise<LoadResult> {
        return this.pages.loadNext();
    }

    submitReview(draft: ReviewDraft): Promise<MutationOutcome<Review>> {
        return this.coordinator.mutate(this.submitDefinition, {
            placeholderId: createPlaceholderId(),
            draft,
            createdAt: this.now().toISOString(),
        });
    }

    /**
     * Remove a placeholder the server refused
     */
    discardFailed(updateId: UpdateId): boolean {
        return this.coordinator.revert(updateId);
    }

    subscribeToRealtime(): () => void {
        if (!this.realtime) {
            return () => {};
        }
        return this.coordinator.connect(this.realtime);
    }

    dispose(): void {
        this.pages.cancel();
        this.coordinator.dispose();
    }
}
