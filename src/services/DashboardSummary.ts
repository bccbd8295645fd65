import moment from 'moment';
import { Article, ArticleTable } from '../types';
import stopwordList from '../data/stopwords.json';

export interface CountEntry {
    label: string;
    count: number;
}

export interface SentimentKeywords {
    sentiment: string;
    keywords: CountEntry[];
}

export interface DashboardSummary {
    totalArticles: number;
    positiveCount: number;
    positivePercent: number;
    sourceCount: number;
    topicCount: number;
    sentimentDistribution: CountEntry[];
    topSources: CountEntry[];
    topTopics: CountEntry[];
    timeline: CountEntry[];
    keywords: SentimentKeywords[];
}

export interface FilterOptions {
    sentiments: string[];
    sources: string[];
    topics: string[];
}

export interface ArticleView {
    id: string;
    title: string;
    source: string;
    topic: string;
    sentiment: string;
    sentimentScore: number;
    publishedDate: string;
    summary: string;
    url: string | null;
}

export const TOP_LIMIT = 10;
export const KEYWORD_LIMIT = 20;
export const SUMMARY_LENGTH = 500;
export const UNDATED = 'N/A';

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

// Descending by count; Array.prototype.sort is stable, so ties keep first-appearance order.
function countBy(table: ArticleTable, pick: (article: Article) => string): CountEntry[] {
    const counts = new Map<string, number>();
    for (const article of table) {
        const key = pick(article);
        counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    return Array.from(counts, ([label, count]) => ({ label, count })).sort((a, b) => b.count - a.count);
}

function distinct(values: string[]): string[] {
    return Array.from(new Set(values));
}

function isPositive(sentiment: string): boolean {
    return sentiment.toLowerCase() === 'positive';
}

export function dayOf(date: Date | undefined): string {
    return date ? moment.utc(date).format('YYYY-MM-DD') : UNDATED;
}

function buildTimeline(table: ArticleTable): CountEntry[] {
    const counts = new Map<string, number>();
    for (const article of table) {
        const day = dayOf(article.publishedDate);
        counts.set(day, (counts.get(day) ?? 0) + 1);
    }
    const undated = counts.get(UNDATED);
    counts.delete(UNDATED);
    const days = Array.from(counts, ([label, count]) => ({ label, count })).sort((a, b) =>
        a.label < b.label ? -1 : a.label > b.label ? 1 : 0
    );
    return undated === undefined ? days : [...days, { label: UNDATED, count: undated }];
}

export function titleWords(title: string): string[] {
    return title
        .toLowerCase()
        .split(/[^\p{L}\p{N}]+/u)
        .filter((word) => word.length >= 3 && !/^\p{N}+$/u.test(word) && !STOPWORDS.has(word));
}

function buildKeywords(table: ArticleTable, sentiments: string[]): SentimentKeywords[] {
    return sentiments.map((sentiment) => {
        const counts = new Map<string, number>();
        for (const article of table) {
            if (article.sentiment !== sentiment) continue;
            for (const word of titleWords(article.title)) {
                counts.set(word, (counts.get(word) ?? 0) + 1);
            }
        }
        const keywords = Array.from(counts, ([label, count]) => ({ label, count }))
            .sort((a, b) => b.count - a.count || (a.label < b.label ? -1 : a.label > b.label ? 1 : 0))
            .slice(0, KEYWORD_LIMIT);
        return { sentiment, keywords };
    });
}

export function summarize(table: ArticleTable): DashboardSummary {
    const total = table.length;
    const positiveCount = table.filter((article) => isPositive(article.sentiment)).length;
    const sentiments = distinct(table.map((article) => article.sentiment));

    return {
        totalArticles: total,
        positiveCount,
        positivePercent: total === 0 ? 0 : Math.round((positiveCount / total) * 1000) / 10,
        sourceCount: new Set(table.map((article) => article.source)).size,
        topicCount: new Set(table.map((article) => article.topic)).size,
        sentimentDistribution: countBy(table, (article) => article.sentiment),
        topSources: countBy(table, (article) => article.source).slice(0, TOP_LIMIT),
        topTopics: countBy(table, (article) => article.topic).slice(0, TOP_LIMIT),
        timeline: buildTimeline(table),
        keywords: buildKeywords(table, sentiments),
    };
}

export function filterOptions(table: ArticleTable): FilterOptions {
    return {
        sentiments: distinct(table.map((article) => article.sentiment)),
        sources: distinct(table.map((article) => article.source)).sort((a, b) => a.localeCompare(b)),
        topics: distinct(table.map((article) => article.topic)),
    };
}

const LINK_PROTOCOLS = new Set(['http:', 'https:']);

// Only web links reach the page; anything else renders as plain text.
function linkUrl(url: string | undefined): string | null {
    const candidate = url?.trim();
    if (candidate === undefined || !URL.canParse(candidate)) {
        return null;
    }
    return LINK_PROTOCOLS.has(new URL(candidate).protocol) ? candidate : null;
}

export function toArticleView(article: Article): ArticleView {
    const description = article.description;
    let summary = 'No description available.';
    if (description !== undefined) {
        summary = description.length > SUMMARY_LENGTH ? `${description.slice(0, SUMMARY_LENGTH)}...` : description;
    }

    return {
        id: article.id,
        title: article.title,
        source: article.source,
        topic: article.topic,
        sentiment: article.sentiment,
        sentimentScore: article.sentimentScore ?? 0,
        publishedDate: article.publishedDate
            ? moment.utc(article.publishedDate).format('YYYY-MM-DD HH:mm')
            : UNDATED,
        summary,
        url: linkUrl(article.url),
    };
}
