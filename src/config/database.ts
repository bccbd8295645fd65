import { DataSource } from "typeorm";
import { ArticleRecord } from "../entities/ArticleRecord";
import { PostgresConfig } from "./env";

export function createDataSource(config: PostgresConfig): DataSource {
    return new DataSource({
        type: "postgres",
        host: config.host,
        port: config.port,
        username: config.username,
        password: config.password,
        database: config.database,
        synchronize: false, // the articles table belongs to the ingestion job
        logging: false,
        entities: [ArticleRecord],
        subscribers: [],
        migrations: [],
    });
}
