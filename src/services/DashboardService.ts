import moment from 'moment';
import { ArticleTable, CacheStatus, Criteria, FilterPipeline } from '../types';
import { ArticleCache } from './ArticleCache';
import { LocalOverrideLoader } from './LocalOverrideLoader';
import {
    ArticleView,
    DashboardSummary,
    FilterOptions,
    filterOptions,
    summarize,
    toArticleView,
} from './DashboardSummary';

export type DataSourceKind = 'remote' | 'upload' | 'none';

export interface DashboardPayload {
    status: CacheStatus;
    dataSource: DataSourceKind;
    diagnostic: string | null;
    uploadIgnored: boolean;
    lastUpdated: string | null;
    summary: DashboardSummary;
    filterOptions: FilterOptions;
    showing: number;
    total: number;
    articles: ArticleView[];
}

export const ARTICLE_LIMIT = 50;

function formatTimestamp(epochMs: number): string {
    return moment.utc(epochMs).format('YYYY-MM-DD HH:mm:ss');
}

/**
 * One read-filter-summarize cycle per dashboard interaction. An uploaded
 * CSV is only consulted when the cache has no rows, and is never merged
 * with remote data.
 */
export class DashboardService {
    constructor(
        private readonly cache: ArticleCache,
        private readonly pipeline: FilterPipeline,
        private readonly loader: LocalOverrideLoader,
        private readonly clock: () => number = Date.now
    ) {}

    async getDashboard(criteria: Criteria, upload?: string | Buffer): Promise<DashboardPayload> {
        const result = await this.cache.get();

        let table: ArticleTable = result.table;
        let dataSource: DataSourceKind = table.length > 0 ? 'remote' : 'none';
        let lastUpdated = result.capturedAt === null ? null : formatTimestamp(result.capturedAt);
        let uploadIgnored = false;

        if (upload !== undefined) {
            if (table.length === 0) {
                // ParseError propagates: a malformed upload must reach the user.
                table = this.loader.load(upload);
                dataSource = 'upload';
                lastUpdated = formatTimestamp(this.clock());
            } else {
                uploadIgnored = true;
            }
        }

        const filtered = this.pipeline.apply(table, criteria);

        return {
            status: result.status,
            dataSource,
            diagnostic: result.error ? result.error.message : null,
            uploadIgnored,
            lastUpdated,
            summary: summarize(table),
            filterOptions: filterOptions(table),
            showing: filtered.length,
            total: table.length,
            articles: filtered.slice(0, ARTICLE_LIMIT).map(toArticleView),
        };
    }

    refresh(): void {
        this.cache.invalidate();
    }

    health(): { ok: boolean; cache: { capturedAt: string; rows: number } | null } {
        const entry = this.cache.peek();
        return {
            ok: true,
            cache: entry ? { capturedAt: formatTimestamp(entry.capturedAt), rows: entry.rows } : null,
        };
    }
}
