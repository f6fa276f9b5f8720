/**
 * Page loading for a collection store
 *
 * Refreshes and page appends are serialized per collection:
 * - refresh() starts a new generation and aborts whatever request is in flight
 * - loadNext() does nothing while a refresh or another append is running
 * - results from an older generation, or for a cursor that is no longer
 *   the current one, are discarded
 *
 * Order is defined by the server cursor, never by the order in which
 * responses arrive.
 */

import { classify, describeCategory, type ErrorClassifier } from './classifier';
import { systemClock, type Clock } from './clock';
import { pagingConfigSchema, type PagingConfig } from './config';
import { MutationCancelledError } from './errors';
import { noopSink, type EventSink } from './events';
import { RetryPolicy } from './policy';
import type { CollectionStore } from './store';
import type { CollectionState, ErrorCategory, Identified, Page } from './types';

export type PageRequest = {
    offset: number;
    limit: number;
    signal: AbortSignal;
};

export type PageFetcher<T> = (request: PageRequest) => Promise<Page<T>>;

export type PageLoaderOptions<T extends Identified> = {
    store: CollectionStore<T>;
    fetchPage: PageFetcher<T>;
    paging?: Partial<PagingConfig>;
    policy?: RetryPolicy;
    classifier?: ErrorClassifier;
    clock?: Clock;
    sink?: EventSink;
};

export type LoadResult =
    | { status: 'loaded'; count: number }
    | { status: 'skipped' }
    | { status: 'discarded' }
    | { status: 'failed'; category: ErrorCategory; message: string };

type FetchResult<T> =
    | { ok: true; page: Page<T> }
    | { ok: false; aborted: true }
    | { ok: false; aborted: false; category: ErrorCategory };

export class PageLoader<T extends Identified> {
    readonly config: PagingConfig;
    private readonly store: CollectionStore<T>;
    private readonly fetchPage: PageFetcher<T>;
    private readonly policy: RetryPolicy;
    private readonly classifier: ErrorClassifier;
    private readonly clock: Clock;
    private readonly sink: EventSink;

    private generation: number;
    private controller: AbortController | null;
    private refreshing: boolean;
    private appending: boolean;
    private cursor: number | null;

    constructor(options: PageLoaderOptions<T>) {
        this.config = pagingConfigSchema.parse(options.paging ?? {});
        this.store = options.store;
        this.fetchPage = options.fetchPage;
        this.policy = options.policy ?? new RetryPolicy();
        this.classifier = options.classifier ?? classify;
        this.clock = options.clock ?? systemClock;
        this.sink = options.sink ?? noopSink;

        this.generation = 0;
        this.controller = null;
        this.refreshing = false;
        this.appending = false;
        this.cursor = 0;
    }

    get isRefreshing(): boolean {
        return this.refreshing;
    }

    get isLoadingMore(): boolean {
        return this.appending;
    }

    /**
     * Whether the server reported another page
     */
    get hasMore(): boolean {
        return this.cursor !== null;
    }

    /**
     * Reload the collection from the top, replacing the server base
     * Any request in flight is aborted and its result discarded; overlays
     * of failed mutations give way to the fresh data
     */
    async refresh(): Promise<LoadResult> {
        this.generation += 1;
        const generation = this.generation;
        const controller = this.restartController();

        this.refreshing = true;
        this.store.applyServer((state) => ({ ...state, loadingState: { status: 'loading' } }));

        try {
            const result = await this.fetchWithPolicy(0, controller.signal);
            if (generation !== this.generation) {
                this.sink({ type: 'page_discarded', collection: this.store.name, offset: 0, reason: 'stale-generation' });
                return { status: 'discarded' };
            }

            if (!result.ok) {
                return this.markFailed(result.aborted ? 'network' : result.category);
            }

            const { page } = result;
            this.cursor = page.nextOffset;
            this.store.applyServer((state) => ({
                ...state,
                items: page.items,
                unreadOrPendingCount: page.unreadOrPendingCount ?? state.unreadOrPendingCount,
                loadingState: { status: 'loaded' },
            }), 'all');
            this.sink({ type: 'page_loaded', collection: this.store.name, offset: 0, count: page.items.length });
            return { status: 'loaded', count: page.items.length };
        } finally {
            if (generation === this.generation) {
                this.refreshing = false;
                this.releaseController(controller);
            }
        }
    }

    /**
     * Append the page at the current cursor
     * Skipped while a refresh or another append is in flight, or at the end
     */
    async loadNext(): Promise<LoadResult> {
        if (this.refreshing || this.appending || this.cursor === null) {
            return { status: 'skipped' };
        }

        const generation = this.generation;
        const offset = this.cursor;
        const controller = this.restartController();
        this.appending = true;

        try {
            const result = await this.fetchWithPolicy(offset, controller.signal);
            if (generation !== this.generation) {
                this.sink({ type: 'page_discarded', collection: this.store.name, offset, reason: 'stale-generation' });
                return { status: 'discarded' };
            }

            if (!result.ok) {
                return this.markFailed(result.aborted ? 'network' : result.category);
            }

            const { page } = result;
            if (page.offset !== this.cursor) {
                this.sink({ type: 'page_discarded', collection: this.store.name, offset: page.offset, reason: 'cursor-mismatch' });
                return { status: 'discarded' };
            }

            this.cursor = page.nextOffset;
            this.store.applyServer(
                (state) => appendPage(state, page),
                page.items.map((item) => item.id),
            );
            this.sink({ type: 'page_loaded', collection: this.store.name, offset, count: page.items.length });
            return { status: 'loaded', count: page.items.length };
        } finally {
            this.appending = false;
            this.releaseController(controller);
        }
    }

    /**
     * Load the next page once the user has seen enough of the list
     */
    prefetch(visibleIndex: number): Promise<LoadResult> {
        const threshold = Math.floor(this.store.state.items.length * this.config.prefetchThreshold);
        if (visibleIndex < threshold) {
            return Promise.resolve({ status: 'skipped' });
        }
        return this.loadNext();
    }

    /**
     * Abort the request in flight; its result will be discarded
     */
    cancel(): void {
        this.generation += 1;
        this.refreshing = false;
        this.controller?.abort(new MutationCancelledError('Page load cancelled'));
        this.controller = null;
    }

    private async fetchWithPolicy(offset: number, signal: AbortSignal): Promise<FetchResult<T>> {
        let retryCount = 0;
        for (;;) {
            try {
                const page = await this.fetchPage({ offset, limit: this.config.pageSize, signal });
                return { ok: true, page };
            } catch (error) {
                if (signal.aborted) {
                    return { ok: false, aborted: true };
                }

                const category = this.classifier(error);
                const decision = this.policy.decideAttempt(retryCount, category);
                if (!decision.shouldRetry) {
                    this.sink({ type: 'page_failed', collection: this.store.name, offset, category });
                    return { ok: false, aborted: false, category };
                }

                try {
                    await this.clock.sleep(decision.delayMs ?? 0, signal);
                } catch {
                    return { ok: false, aborted: true };
                }
                retryCount += 1;
            }
        }
    }

    private markFailed(category: ErrorCategory): LoadResult {
        const message = describeCategory(category);
        this.store.applyServer((state) => ({ ...state, loadingState: { status: 'failed', reason: message } }));
        return { status: 'failed', category, message };
    }

    private restartController(): AbortController {
        this.controller?.abort(new MutationCancelledError('Superseded by a newer page request'));
        const controller = new AbortController();
        this.controller = controller;
        return controller;
    }

    private releaseController(controller: AbortController): void {
        if (this.controller === controller) {
            this.controller = null;
        }
    }
}

/**
 * Append a page, replacing items already present instead of duplicating them
 */
function appendPage<T extends Identified>(state: CollectionState<T>, page: Page<T>): CollectionState<T> {
    const items = state.items.slice();
    for (const incoming of page.items) {
        const index = items.findIndex((item) => item.id === incoming.id);
        if (index >= 0) {
            items[index] = incoming;
        } else {
            items.push(incoming);
        }
    }
    return {
        ...state,
        items,
        unreadOrPendingCount: page.unreadOrPendingCount ?? state.unreadOrPendingCount,
        loadingState: { status: 'loaded' },
    };
}
