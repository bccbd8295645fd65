import { DataSource } from "typeorm";
import { RemoteRecord, RemoteTableClient } from "../types";
import { ArticleRecord } from "../entities/ArticleRecord";
import { ConnectivityError } from "../errors";

export class PostgresTableClient implements RemoteTableClient {
    constructor(private readonly dataSource: DataSource) {}

    async selectAll(table: string): Promise<RemoteRecord[]> {
        try {
            if (!this.dataSource.isInitialized) {
                await this.dataSource.initialize();
            }
            const articleRepo = this.dataSource.getRepository(ArticleRecord);
            if (articleRepo.metadata.tableName !== table) {
                throw new Error(`table "${table}" is not mapped`);
            }
            const rows = await articleRepo.find();
            return rows.map((row) => this.toRecord(row));
        } catch (error) {
            const message = error instanceof Error ? error.message : "Unknown error";
            throw new ConnectivityError(`Postgres query failed: ${message}`, { cause: error });
        }
    }

    private toRecord(row: ArticleRecord): RemoteRecord {
        return {
            id: row.id,
            title: row.title,
            description: row.description,
            url: row.url,
            source: row.source,
            topic: row.topic,
            sentiment: row.sentiment,
            sentiment_score: row.sentimentScore,
            published_date: row.publishedDate,
        };
    }
}
