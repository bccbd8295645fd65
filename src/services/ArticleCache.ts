import { ArticleTable, CacheResult, Clock, RemoteRecord, RemoteTableClient } from '../types';
import { ConnectivityError, DashboardError, TimeoutError } from '../errors';
import { toArticleTable } from './articleRecords';

export interface ArticleCacheOptions {
    client: RemoteTableClient;
    table?: string;
    ttlMs?: number;
    fetchTimeoutMs?: number;
    clock?: Clock;
}

interface CacheEntry {
    table: ArticleTable;
    capturedAt: number;
    // Invalidation count when the refresh that produced this entry began.
    generation: number;
}

interface Flight {
    promise: Promise<CacheResult>;
    generation: number;
}

export const DEFAULT_TTL_MS = 300 * 1000;
export const DEFAULT_FETCH_TIMEOUT_MS = 10 * 1000;

function toDashboardError(error: unknown): DashboardError {
    if (error instanceof DashboardError) {
        return error;
    }
    const message = error instanceof Error ? error.message : 'Unknown error';
    return new ConnectivityError(message, { cause: error });
}

/**
 * Holds the most recent successful fetch of the article table.
 *
 * An entry is served while it is younger than the TTL and no invalidation
 * happened after its refresh began. Concurrent readers share one refresh;
 * a refresh requested after an invalidation that landed mid-flight is
 * queued behind the running one, so at most one fetch is outstanding.
 * A failed refresh never throws: the previous entry is served as `stale`,
 * or an empty `unavailable` result when there is none.
 */
export class ArticleCache {
    private readonly client: RemoteTableClient;
    private readonly table: string;
    private readonly ttlMs: number;
    private readonly fetchTimeoutMs: number;
    private readonly clock: Clock;

    private entry: CacheEntry | null = null;
    private generation = 0;
    private flight: Flight | null = null;

    constructor(options: ArticleCacheOptions) {
        this.client = options.client;
        this.table = options.table ?? 'articles';
        this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
        this.fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
        this.clock = options.clock ?? Date.now;
    }

    get(now: number = this.clock()): Promise<CacheResult> {
        const entry = this.entry;
        if (entry && this.isCurrent(entry, now)) {
            const hit: CacheResult = {
                status: 'fresh',
                table: entry.table,
                capturedAt: entry.capturedAt,
                error: null,
            };
            return Promise.resolve(hit);
        }

        if (this.flight) {
            if (this.flight.generation === this.generation) {
                return this.flight.promise;
            }
            return this.startFlight(now, this.flight.promise);
        }
        return this.startFlight(now);
    }

    invalidate(): void {
        this.generation++;
        console.log('[CACHE] Invalidated');
    }

    peek(): { capturedAt: number; rows: number } | null {
        return this.entry ? { capturedAt: this.entry.capturedAt, rows: this.entry.table.length } : null;
    }

    private isCurrent(entry: CacheEntry, now: number): boolean {
        return entry.generation === this.generation && now - entry.capturedAt < this.ttlMs;
    }

    private startFlight(now: number, after?: Promise<CacheResult>): Promise<CacheResult> {
        const generation = this.generation;
        const run = () => this.refresh(now, generation);
        const promise: Promise<CacheResult> = (after ? after.then(run) : run()).finally(() => {
            if (this.flight?.promise === promise) {
                this.flight = null;
            }
        });
        this.flight = { promise, generation };
        return promise;
    }

    private async refresh(now: number, generation: number): Promise<CacheResult> {
        try {
            const records = await this.fetchWithTimeout();
            const table = toArticleTable(records);
            this.entry = { table, capturedAt: now, generation };
            console.log(`[CACHE] Refreshed "${this.table}": ${table.length} articles`);
            return { status: 'refreshed', table, capturedAt: now, error: null };
        } catch (caught) {
            const error = toDashboardError(caught);
            const previous = this.entry;
            if (previous) {
                console.error(`[CACHE] Refresh failed, serving stale data: ${error.message}`);
                return { status: 'stale', table: previous.table, capturedAt: previous.capturedAt, error };
            }
            console.error(`[CACHE] Refresh failed, no data available: ${error.message}`);
            return { status: 'unavailable', table: Object.freeze([]), capturedAt: null, error };
        }
    }

    private fetchWithTimeout(): Promise<RemoteRecord[]> {
        let pending: Promise<RemoteRecord[]>;
        try {
            pending = this.client.selectAll(this.table);
        } catch (error) {
            return Promise.reject(error);
        }

        return new Promise<RemoteRecord[]>((resolve, reject) => {
            const timer = setTimeout(() => {
                reject(new TimeoutError(this.fetchTimeoutMs));
            }, this.fetchTimeoutMs);
            timer.unref();

            pending.then(
                (rows) => {
                    clearTimeout(timer);
                    resolve(rows);
                },
                (error: unknown) => {
                    clearTimeout(timer);
                    reject(error);
                }
            );
        });
    }
}
