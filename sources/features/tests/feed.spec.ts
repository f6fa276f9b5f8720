/**
 * Nearby feed
 * Tests for radius widening, paging and optimistic saved-item toggles
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Page } from '../../engine';
import { FeedController, type FeedRepository, type FoodListing, type ListingQuery, type SavedState } from '../feed';
import { captureEvents, deferred, fakeRealtime, httpError } from '../../engine/tests/test-helpers';

function listing(id: string, overrides: Partial<Omit<FoodListing, 'id'>> = {}): FoodListing {
    return {
        id,
        title: `Listing ${id}`,
        postType: 'food',
        distanceKm: 2,
        isSaved: false,
        saveCount: 3,
        ...overrides,
    };
}

/**
 * Listings keyed by the smallest radius at which they become visible
 */
class FakeFeedRepository implements FeedRepository {
    listings: Array<{ radiusKm: number; listing: FoodListing }> = [];

    fetchListings = vi.fn(async (query: ListingQuery): Promise<Page<FoodListing>> => {
        const visible = this.listings
            .filter((entry) => entry.radiusKm <= query.radiusKm)
            .map((entry) => entry.listing);
        const end = query.offset + query.limit;
        return {
            items: visible.slice(query.offset, end),
            offset: query.offset,
            nextOffset: end < visible.length ? end : null,
        };
    });

    setSaved = vi.fn(async (_listingId: string, saved: boolean, _signal: AbortSignal): Promise<SavedState> => ({
        isSaved: saved,
        saveCount: saved ? 4 : 3,
    }));
}

describe('FeedController', () => {
    let repository: FakeFeedRepository;
    let capture: ReturnType<typeof captureEvents>;
    let feed: FeedController;

    beforeEach(() => {
        repository = new FakeFeedRepository();
        capture = captureEvents();
        feed = new FeedController({ repository, sink: capture.sink });
    });

    afterEach(() => {
        feed.dispose();
    });

    describe('Radius widening', () => {
        it('should load at the chosen radius when something is nearby', async () => {
            repository.listings = [{ radiusKm: 10, listing: listing('1') }];

            expect(await feed.loadFeed()).toEqual({ status: 'loaded', count: 1 });
            expect(feed.effectiveRadiusKm).toBe(25);
            expect(repository.fetchListings).toHaveBeenCalledTimes(1);
        });

        it('should widen through larger radii until listings are found', async () => {
            repository.listings = [{ radiusKm: 150, listing: listing('far') }];

            expect(await feed.loadFeed()).toEqual({ status: 'loaded', count: 1 });
            expect(repository.fetchListings.mock.calls.map(([query]) => query.radiusKm)).toEqual([25, 50, 200]);
            expect(feed.effectiveRadiusKm).toBe(200);
            expect(feed.radiusKm).toBe(25);
        });

        it('should only try radii larger than the chosen one', async () => {
            feed = new FeedController({ repository, radiusKm: 300, sink: capture.sink });

            expect(await feed.loadFeed()).toEqual({ status: 'loaded', count: 0 });
            expect(repository.fetchListings.mock.calls.map(([query]) => query.radiusKm)).toEqual([300, 800]);
            expect(feed.effectiveRadiusKm).toBe(800);
        });

        it('should page at the radius the first page was found at', async () => {
            repository.listings = Array.from({ length: 25 }, (_, index) => ({ radiusKm: 100, listing: listing(`l${index}`) }));

            await feed.loadFeed();
            expect(await feed.loadMore()).toEqual({ status: 'loaded', count: 5 });

            expect(repository.fetchListings).toHaveBeenLastCalledWith(
                expect.objectContaining({ offset: 20, radiusKm: 200 }),
            );
            expect(feed.state.items).toHaveLength(25);
            expect(feed.hasMore).toBe(false);
        });

        it('should clamp the radius and reload', async () => {
            await feed.setRadius(5_000);
            expect(feed.radiusKm).toBe(800);

            await feed.setRadius(0);
            expect(feed.radiusKm).toBe(1);
            expect(repository.fetchListings).toHaveBeenLastCalledWith(expect.objectContaining({ radiusKm: 800 }));
        });
    });

    describe('Saved items', () => {
        beforeEach(async () => {
            repository.listings = [{ radiusKm: 5, listing: listing('42') }, { radiusKm: 5, listing: listing('43') }];
            await feed.loadFeed();
        });

        it('should roll back a conflicting save and ask for a refetch', async () => {
            repository.setSaved.mockRejectedValueOnce(httpError(409));
            const failures = vi.fn();
            feed.onFailure(failures);

            const pending = feed.toggleSaved('42');
            expect(feed.state.items[0]).toMatchObject({ isSaved: true, saveCount: 4 });

            const outcome = await pending;

            expect(outcome).toMatchObject({ status: 'rolled-back', failure: { category: 'conflict', hint: 'refetch' } });
            expect(feed.state.items[0]).toEqual(listing('42'));
            expect(failures).toHaveBeenCalledTimes(1);
            expect(failures.mock.calls[0][0]).toMatchObject({ entityType: 'saved-item', entityId: '42', hint: 'refetch' });
        });

        it('should take the save count from the server', async () => {
            repository.setSaved.mockResolvedValueOnce({ isSaved: true, saveCount: 10 });

            const outcome = await feed.toggleSaved('42');

            expect(outcome).toMatchObject({ status: 'confirmed', via: 'response', overridden: true });
            expect(feed.state.items[0]).toMatchObject({ isSaved: true, saveCount: 10 });
        });

        it('should not call the server for a listing already in the target state', async () => {
            expect(await feed.setSaved('42', false)).toEqual({ status: 'skipped', reason: 'noop' });
            expect(await feed.toggleSaved('unknown')).toEqual({ status: 'skipped', reason: 'noop' });
            expect(repository.setSaved).not.toHaveBeenCalled();
        });

        it('should reject a second toggle while the first is in flight', async () => {
            const response = deferred<SavedState>();
            repository.setSaved.mockReturnValueOnce(response.promise);

            const first = feed.toggleSaved('42');
            const second = await feed.toggleSaved('42');

            expect(second.status).toBe('rejected');
            expect(repository.setSaved).toHaveBeenCalledTimes(1);
            expect(feed.state.items[0].isSaved).toBe(true);

            response.resolve({ isSaved: true, saveCount: 4 });
            expect((await first).status).toBe('confirmed');
        });

        it('should let different listings be saved concurrently', async () => {
            const outcomes = await Promise.all([feed.toggleSaved('42'), feed.toggleSaved('43')]);

            expect(outcomes.map((outcome) => outcome.status)).toEqual(['confirmed', 'confirmed']);
            expect(feed.state.items.map((entry) => entry.isSaved)).toEqual([true, true]);
        });

        it('should apply saves made on another device', () => {
            const realtime = fakeRealtime<FoodListing>();
            const synced = new FeedController({ repository, realtime: realtime.source, sink: capture.sink });
            synced.subscribeToRealtime();

            realtime.emit({
                kind: 'upsert',
                entityType: 'saved-item',
                entityId: '7',
                value: listing('7', { isSaved: true }),
            });

            expect(synced.state.items).toEqual([listing('7', { isSaved: true })]);
            synced.dispose();
        });
    });
});
