import { Article, ArticleTable, Criteria, FilterPipeline } from '../types';

type Predicate = (article: Article) => boolean;

function membership(values: ReadonlySet<string>, pick: (article: Article) => string): Predicate | null {
    return values.size === 0 ? null : (article) => values.has(pick(article));
}

function textMatch(searchText: string | undefined): Predicate | null {
    if (!searchText) {
        return null;
    }
    const needle = searchText.toLowerCase();
    return (article) =>
        article.title.toLowerCase().includes(needle) ||
        (article.description !== undefined && article.description.toLowerCase().includes(needle));
}

/**
 * Scans the whole table once per call. Predicates are AND-ed; an empty set
 * or empty search text disables its axis. Input order is kept.
 */
export class LinearFilterPipeline implements FilterPipeline {
    apply(table: ArticleTable, criteria: Criteria): ArticleTable {
        const predicates = [
            textMatch(criteria.searchText),
            membership(criteria.sentiments, (a) => a.sentiment),
            membership(criteria.sources, (a) => a.source),
            membership(criteria.topics, (a) => a.topic),
        ].filter((p): p is Predicate => p !== null);

        if (predicates.length === 0) {
            return table;
        }
        return Object.freeze(table.filter((article) => predicates.every((matches) => matches(article))));
    }
}

export function emptyCriteria(): Criteria {
    return { sentiments: new Set(), sources: new Set(), topics: new Set() };
}

function strings(value: unknown): string[] {
    const raw: unknown[] = Array.isArray(value) ? value : [value];
    return raw.filter((item): item is string => typeof item === 'string');
}

function toSet(value: unknown): Set<string> {
    return new Set(
        strings(value)
            .map((item) => item.trim())
            .filter((item) => item !== '')
    );
}

/**
 * Builds criteria from HTTP query parameters; `sentiment`, `source` and
 * `topic` repeat once per selected value.
 */
export function criteriaFromQuery(query: Record<string, unknown>): Criteria {
    const searchText = strings(query.q).join(' ').trim();
    return {
        searchText: searchText === '' ? undefined : searchText,
        sentiments: toSet(query.sentiment),
        sources: toSet(query.source),
        topics: toSet(query.topic),
    };
}
