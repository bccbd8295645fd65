import { DataSource, ObjectLiteral, Repository } from "typeorm";
import { PostgresTableClient } from "./PostgresTableClient";
import { createDataSource } from "../config/database";
import { ArticleRecord } from "../entities/ArticleRecord";
import { ConnectivityError } from "../errors";

describe('PostgresTableClient', () => {
    let dataSource: DataSource;
    let mockArticleRepo: { metadata: { tableName: string }; find: jest.Mock };
    let client: PostgresTableClient;

    beforeEach(() => {
        dataSource = createDataSource({
            host: 'localhost',
            port: 5432,
            username: 'postgres',
            password: 'test-password',
            database: 'news_pulse_test',
        });

        mockArticleRepo = {
            metadata: { tableName: 'articles' },
            find: jest.fn(),
        };

        jest.spyOn(dataSource, 'initialize').mockResolvedValue(dataSource);
        jest.spyOn(dataSource, 'getRepository').mockReturnValue(
            mockArticleRepo as unknown as Repository<ObjectLiteral>
        );

        client = new PostgresTableClient(dataSource);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should read every row and expose the store column names', async () => {
        const published = new Date('2024-05-01T10:30:00Z');
        mockArticleRepo.find.mockResolvedValue([
            {
                id: 7,
                title: 'Storm hits coast',
                description: null,
                url: 'https://example.com/storm',
                source: 'BBC',
                topic: 'Weather',
                sentiment: 'Negative',
                sentimentScore: -0.8,
                publishedDate: published,
            },
        ]);

        const rows = await client.selectAll('articles');

        expect(dataSource.initialize).toHaveBeenCalledTimes(1);
        expect(dataSource.getRepository).toHaveBeenCalledWith(ArticleRecord);
        expect(rows).toEqual([
            {
                id: 7,
                title: 'Storm hits coast',
                description: null,
                url: 'https://example.com/storm',
                source: 'BBC',
                topic: 'Weather',
                sentiment: 'Negative',
                sentiment_score: -0.8,
                published_date: published,
            },
        ]);
    });

    it('should wrap query failures as connectivity errors', async () => {
        mockArticleRepo.find.mockRejectedValue(new Error('relation "articles" does not exist'));

        const error = await client.selectAll('articles').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ConnectivityError);
        expect(error).toMatchObject({
            message: 'Postgres query failed: relation "articles" does not exist',
        });
    });

    it('should refuse a table the entity does not map', async () => {
        await expect(client.selectAll('headlines')).rejects.toThrow(
            'Postgres query failed: table "headlines" is not mapped'
        );
        expect(mockArticleRepo.find).not.toHaveBeenCalled();
    });

    it('should wrap connection failures as connectivity errors', async () => {
        jest.spyOn(dataSource, 'initialize').mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:5432'));

        await expect(client.selectAll('articles')).rejects.toBeInstanceOf(ConnectivityError);
    });
});
