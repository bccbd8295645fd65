import { Entity, PrimaryGeneratedColumn, Column } from "typeorm";
import { ARTICLES_TABLE } from "../config/env";

// Mirrors the table the ingestion job writes; this service only reads it.
@Entity({ name: ARTICLES_TABLE, synchronize: false })
export class ArticleRecord {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ type: "text", nullable: true })
    title!: string | null;

    @Column({ type: "text", nullable: true })
    description!: string | null;

    @Column({ type: "text", nullable: true })
    url!: string | null;

    @Column({ type: "text", nullable: true })
    source!: string | null;

    @Column({ type: "text", nullable: true })
    topic!: string | null;

    @Column({ type: "text", nullable: true })
    sentiment!: string | null;

    @Column({ name: "sentiment_score", type: "double precision", nullable: true })
    sentimentScore!: number | null;

    @Column({ name: "published_date", type: "timestamptz", nullable: true })
    publishedDate!: Date | null;
}
