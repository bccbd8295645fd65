import moment from 'moment';
import { Article, ArticleTable, RemoteRecord } from '../types';

function text(value: unknown): string | undefined {
    if (typeof value === 'string') {
        return value;
    }
    if (typeof value === 'number' || typeof value === 'bigint') {
        return String(value);
    }
    return undefined;
}

// Accepted date shapes; values without an offset are read as UTC.
const DATE_FORMATS = [moment.ISO_8601, moment.RFC_2822];

function optionalText(value: unknown): string | undefined {
    const result = text(value);
    return result === undefined || result.trim() === '' ? undefined : result;
}

export function parseSentimentScore(value: unknown): number | undefined {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : undefined;
    }
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value.trim());
        return Number.isFinite(parsed) ? parsed : undefined;
    }
    return undefined;
}

export function parsePublishedDate(value: unknown): Date | undefined {
    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? undefined : value;
    }
    if (typeof value === 'number') {
        const m = moment.utc(value);
        return m.isValid() ? m.toDate() : undefined;
    }
    if (typeof value === 'string' && value.trim() !== '') {
        const m = moment.utc(value.trim(), DATE_FORMATS, true);
        return m.isValid() ? m.toDate() : undefined;
    }
    return undefined;
}

/**
 * Maps one loosely typed row from the store onto an Article. The store is
 * the source of truth for the schema, so missing text becomes an empty
 * string instead of failing the whole fetch.
 */
export function toArticle(record: RemoteRecord, index: number): Article {
    const article: Article = {
        id: text(record.id) ?? `row-${index + 1}`,
        title: text(record.title) ?? '',
        source: text(record.source) ?? '',
        topic: text(record.topic) ?? '',
        sentiment: text(record.sentiment) ?? '',
    };

    const description = optionalText(record.description);
    if (description !== undefined) article.description = description;

    const url = optionalText(record.url);
    if (url !== undefined) article.url = url;

    const score = parseSentimentScore(record.sentiment_score);
    if (score !== undefined) article.sentimentScore = score;

    const publishedDate = parsePublishedDate(record.published_date);
    if (publishedDate !== undefined) article.publishedDate = publishedDate;

    return article;
}

export function toArticleTable(records: RemoteRecord[]): ArticleTable {
    return Object.freeze(records.map((record, index) => toArticle(record, index)));
}
