import type { DashboardError } from './errors';

export interface Article {
    id: string;
    title: string;
    description?: string;
    url?: string;
    source: string;
    topic: string;
    // Kept exactly as the store emits it, no re-casing.
    sentiment: string;
    sentimentScore?: number;
    publishedDate?: Date;
}

export type ArticleTable = ReadonlyArray<Article>;

/** A row as the remote store returns it, before normalization. */
export type RemoteRecord = Record<string, unknown>;

export interface RemoteTableClient {
    selectAll(table: string): Promise<RemoteRecord[]>;
}

export interface Criteria {
    searchText?: string;
    sentiments: ReadonlySet<string>;
    sources: ReadonlySet<string>;
    topics: ReadonlySet<string>;
}

export interface FilterPipeline {
    apply(table: ArticleTable, criteria: Criteria): ArticleTable;
}

export type CacheStatus = 'fresh' | 'refreshed' | 'stale' | 'unavailable';

export interface CacheResult {
    status: CacheStatus;
    table: ArticleTable;
    capturedAt: number | null;
    error: DashboardError | null;
}

export interface Clock {
    (): number;
}
