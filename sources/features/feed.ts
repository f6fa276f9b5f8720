/**
 * Nearby listings feed
 *
 * Paginated listings around the user with progressive radius widening
 * when nothing is found nearby, and optimistic saved-item toggles.
 */

import type { Logger } from 'pino';
import {
    MutationCoordinator,
    PageLoader,
    createLogSink,
    createLogger,
    findItem,
    noop,
    proceed,
    type Clock,
    type CollectionState,
    type CoordinatorConfigInput,
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

export interface FoodListing {
    readonly id: string;
    readonly title: string;
    readonly postType: 'food' | 'fridge' | 'foodbank';
    readonly distanceKm: number;
    readonly isSaved: boolean;
    /** Recomputed by the server on every save/unsave */
    readonly saveCount: number;
}

export interface SavedState {
    readonly isSaved: boolean;
    readonly saveCount: number;
}

export type ListingQuery = PageRequest & {
    radiusKm: number;
};

export interface FeedRepository {
    fetchListings(query: ListingQuery): Promise<Page<FoodListing>>;
    setSaved(listingId: string, saved: boolean, signal: AbortSignal): Promise<SavedState>;
}

export type FeedOptions = {
    repository: FeedRepository;
    realtime?: RealtimeSource<FoodListing>;
    /** Search radius chosen by the user. Default: 25 km */
    radiusKm?: number;
    /** Radii tried in order when nothing is found. Default: 50, 200, 800 km */
    expansionRadiiKm?: ReadonlyArray<number>;
    config?: CoordinatorConfigInput;
    clock?: Clock;
    sink?: EventSink;
    /** Parent of the feature's logger when no sink is given */
    logger?: Logger;
};

export type SavedToggle = {
    listingId: string;
    saved: boolean;
};

export const MIN_RADIUS_KM = 1;
export const MAX_RADIUS_KM = 800;

// ============================================================================
// Mutations
// ============================================================================

export function setSavedMutation(
    repository: FeedRepository,
): MutationDefinition<FoodListing, SavedToggle, SavedState> {
    return {
        entityType: 'saved-item',
        operation: 'toggle',
        entityId: (input) => input.listingId,
        fields: () => ['isSaved', 'saveCount'],
        precondition: (state, input) => {
            const listing = findItem(state.items, input.listingId);
            return !listing || listing.isSaved === input.saved ? noop : proceed;
        },
        apply: (draft, input) => {
            const listing = draft.items.find((item) => item.id === input.listingId);
            if (!listing || listing.isSaved === input.saved) return;
            listing.isSaved = input.saved;
            listing.saveCount = Math.max(0, listing.saveCount + (input.saved ? 1 : -1));
        },
        confirm: (draft, input, result) => {
            const listing = draft.items.find((item) => item.id === input.listingId);
            if (!listing) return;
            listing.isSaved = result.isSaved;
            listing.saveCount = result.saveCount;
        },
        execute: (input, signal) => repository.setSaved(input.listingId, input.saved, signal),
    };
}

// ============================================================================
// Feed
// ============================================================================

export class FeedController {
    private readonly coordinator: MutationCoordinator<FoodListing>;
    private readonly pages: PageLoader<FoodListing>;
    private readonly repository: FeedRepository;
    private readonly realtime: RealtimeSource<FoodListing> | undefined;
    private readonly expansionRadiiKm: ReadonlyArray<number>;
    private readonly setSavedDefinition: MutationDefinition<FoodListing, SavedToggle, SavedState>;
    private radius: number;
    private effectiveRadius: number;

    constructor(options: FeedOptions) {
        const sink = options.sink ?? createLogSink(createLogger('feed', options.logger));

        this.repository = options.repository;
        this.realtime = options.realtime;
        this.expansionRadiiKm = options.expansionRadiiKm ?? [50, 200, 800];
        this.radius = clampRadius(options.radiusKm ?? 25);
        this.effectiveRadius = this.radius;
        this.coordinator = new MutationCoordinator<FoodListing>({
            collection: 'feed',
            config: options.config,
            clock: options.clock,
            sink,
        });
        this.pages = new PageLoader<FoodListing>({
            store: this.coordinator.store,
            fetchPage: (request) => this.fetchPage(request),
            paging: this.coordinator.config.paging,
            policy: this.coordinator.policy,
            clock: options.clock,
            sink,
        });
        this.setSavedDefinition = setSavedMutation(options.repository);
    }

    get state(): CollectionState<FoodListing> {
        return this.coordinator.state;
    }

    /**
     * Radius chosen by the user
     */
    get radiusKm(): number {
        return this.radius;
    }

    /**
     * Radius the listings were actually found at
     */
    get effectiveRadiusKm(): number {
        return this.effectiveRadius;
    }

    get hasMore(): boolean {
        return this.pages.hasMore;
    }

    subscribe(listener: StoreListener<FoodListing>): () => void {
        return this.coordinator.store.subscribe(listener);
    }

    onFailure(listener: (failure: MutationFailure) => void): () => void {
        return this.coordinator.onFailure(listener);
    }

    loadFeed(): Promise<LoadResult> {
        return this.pages.refresh();
    }

    refresh(): Promise<LoadResult> {
        return this.pages.refresh();
    }

    loadMore(): Promise<LoadResult> {
        return this.pages.loadNext();
    }

    prefetch(visibleIndex: number): Promise<LoadResult> {
        return this.pages.prefetch(visibleIndex);
    }

    /**
     * Change the search radius and reload
     */
    setRadius(radiusKm: number): Promise<LoadResult> {
        this.radius = clampRadius(radiusKm);
        return this.pages.refresh();
    }

    setSaved(listingId: string, saved: boolean): Promise<MutationOutcome<SavedState>> {
        return this.coordinator.mutate(this.setSavedDefinition, { listingId, saved });
    }

    /**
     * Flip the saved flag of a listing
     * A no-op for listings not in the feed
     */
    toggleSaved(listingId: string): Promise<MutationOutcome<SavedState>> {
        const listing = findItem(this.coordinator.state.items, listingId);
        return this.setSaved(listingId, !(listing?.isSaved ?? true));
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

    /**
     * First pages widen the radius step by step until something is found;
     * later pages stay at the radius the first page was found at
     */
    private async fetchPage(request: PageRequest): Promise<Page<FoodListing>> {
        if (request.offset > 0) {
            return this.repository.fetchListings({ ...request, radiusKm: this.effectiveRadius });
        }

        const radii = [this.radius, ...this.expansionRadiiKm.filter((radius) => radius > this.radius)];
        let page: Page<FoodListing> = { items: [], offset: 0, nextOffset: null };
        for (const radiusKm of radii) {
            page = await this.repository.fetchListings({ ...request, radiusKm });
            this.effectiveRadius = radiusKm;
            if (page.items.length > 0) {
                break;
            }
        }
        return page;
    }
}

function clampRadius(radiusKm: number): number {
    return Math.min(Math.max(radiusKm, MIN_RADIUS_KM), MAX_RADIUS_KM);
}
