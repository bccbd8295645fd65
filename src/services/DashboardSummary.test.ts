import { filterOptions, summarize, titleWords, toArticleView } from './DashboardSummary';
import { Article } from '../types';

const articles: Article[] = [
    {
        id: '1',
        title: 'Storm hits coast towns',
        source: 'BBC',
        topic: 'Weather',
        sentiment: 'Negative',
        publishedDate: new Date('2024-05-02T08:00:00Z'),
    },
    {
        id: '2',
        title: 'Markets rally as storm fades',
        source: 'CNN',
        topic: 'Finance',
        sentiment: 'Positive',
        publishedDate: new Date('2024-05-01T23:30:00Z'),
    },
    {
        id: '3',
        title: 'Tech markets rally again',
        source: 'BBC',
        topic: 'Tech',
        sentiment: 'Positive',
    },
    {
        id: '4',
        title: 'Quiet day',
        source: 'AP',
        topic: 'General',
        sentiment: 'Neutral',
        publishedDate: new Date('2024-05-01T01:00:00Z'),
    },
];

describe('summarize', () => {
    it('should compute the headline metrics', () => {
        const summary = summarize(articles);

        expect(summary.totalArticles).toBe(4);
        expect(summary.positiveCount).toBe(2);
        expect(summary.positivePercent).toBe(50);
        expect(summary.sourceCount).toBe(3);
        expect(summary.topicCount).toBe(4);
    });

    it('should count labels by frequency, ties in first-seen order', () => {
        const summary = summarize(articles);

        expect(summary.sentimentDistribution).toEqual([
            { label: 'Positive', count: 2 },
            { label: 'Negative', count: 1 },
            { label: 'Neutral', count: 1 },
        ]);
        expect(summary.topSources).toEqual([
            { label: 'BBC', count: 2 },
            { label: 'CNN', count: 1 },
            { label: 'AP', count: 1 },
        ]);
        expect(summary.topTopics.map((entry) => entry.label)).toEqual(['Weather', 'Finance', 'Tech', 'General']);
    });

    it('should group the timeline by UTC day with undated articles last', () => {
        expect(summarize(articles).timeline).toEqual([
            { label: '2024-05-01', count: 2 },
            { label: '2024-05-02', count: 1 },
            { label: 'N/A', count: 1 },
        ]);
    });

    it('should rank title keywords per sentiment', () => {
        expect(summarize(articles).keywords).toEqual([
            {
                sentiment: 'Negative',
                keywords: [
                    { label: 'coast', count: 1 },
                    { label: 'hits', count: 1 },
                    { label: 'storm', count: 1 },
                    { label: 'towns', count: 1 },
                ],
            },
            {
                sentiment: 'Positive',
                keywords: [
                    { label: 'markets', count: 2 },
                    { label: 'rally', count: 2 },
                    { label: 'fades', count: 1 },
                    { label: 'storm', count: 1 },
                    { label: 'tech', count: 1 },
                ],
            },
            {
                sentiment: 'Neutral',
                keywords: [
                    { label: 'day', count: 1 },
                    { label: 'quiet', count: 1 },
                ],
            },
        ]);
    });

    it('should match the positive label in any casing for the headline share', () => {
        const summary = summarize([
            { ...articles[0], sentiment: 'positive' },
            { ...articles[1], sentiment: 'POSITIVE' },
            { ...articles[2], sentiment: 'Negative' },
        ]);

        expect(summary.positiveCount).toBe(2);
        expect(summary.positivePercent).toBe(66.7);
        expect(summary.sentimentDistribution.map((entry) => entry.label)).toEqual(['positive', 'POSITIVE', 'Negative']);
    });

    it('should keep only the ten largest sources', () => {
        const many = Array.from({ length: 12 }, (_, i) => ({ ...articles[0], id: String(i), source: `Source ${i}` }));

        const summary = summarize(many);

        expect(summary.topSources).toHaveLength(10);
        expect(summary.topSources[9]).toEqual({ label: 'Source 9', count: 1 });
        expect(summary.sourceCount).toBe(12);
    });

    it('should return zeros for an empty table', () => {
        expect(summarize([])).toEqual({
            totalArticles: 0,
            positiveCount: 0,
            positivePercent: 0,
            sourceCount: 0,
            topicCount: 0,
            sentimentDistribution: [],
            topSources: [],
            topTopics: [],
            timeline: [],
            keywords: [],
        });
    });
});

describe('titleWords', () => {
    it('should drop short words, numbers and stop words', () => {
        expect(titleWords("Apple's 2024 results beat forecasts, says the CEO")).toEqual([
            'apple',
            'results',
            'beat',
            'forecasts',
            'ceo',
        ]);
    });
});

describe('filterOptions', () => {
    it('should list distinct values with sources sorted', () => {
        expect(filterOptions(articles)).toEqual({
            sentiments: ['Negative', 'Positive', 'Neutral'],
            sources: ['AP', 'BBC', 'CNN'],
            topics: ['Weather', 'Finance', 'Tech', 'General'],
        });
    });
});

describe('toArticleView', () => {
    it('should format a complete article for display', () => {
        const view = toArticleView({
            ...articles[0],
            description: 'x'.repeat(600),
            url: 'https://example.com/storm',
            sentimentScore: -0.42,
            publishedDate: new Date('2024-05-02T08:05:00Z'),
        });

        expect(view).toEqual({
            id: '1',
            title: 'Storm hits coast towns',
            source: 'BBC',
            topic: 'Weather',
            sentiment: 'Negative',
            sentimentScore: -0.42,
            publishedDate: '2024-05-02 08:05',
            summary: `${'x'.repeat(500)}...`,
            url: 'https://example.com/storm',
        });
    });

    it('should fill in placeholders for missing fields', () => {
        const view = toArticleView(articles[2]);

        expect(view.summary).toBe('No description available.');
        expect(view.publishedDate).toBe('N/A');
        expect(view.sentimentScore).toBe(0);
        expect(view.url).toBeNull();
    });

    it('should only link web addresses', () => {
        expect(toArticleView({ ...articles[0], url: 'javascript:alert(1)' }).url).toBeNull();
        expect(toArticleView({ ...articles[0], url: 'not a url' }).url).toBeNull();
        expect(toArticleView({ ...articles[0], url: ' http://example.com/a ' }).url).toBe('http://example.com/a');
    });
});
