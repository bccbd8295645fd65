import { Article, ArticleTable } from '../types';
import { ParseError, RowError } from '../errors';
import { parsePublishedDate, parseSentimentScore } from './articleRecords';

export const REQUIRED_COLUMNS = ['title', 'source', 'topic', 'sentiment'] as const;
export const OPTIONAL_COLUMNS = ['id', 'description', 'url', 'sentiment_score', 'published_date'] as const;

type Column = (typeof REQUIRED_COLUMNS)[number] | (typeof OPTIONAL_COLUMNS)[number];

interface CsvRow {
    line: number;
    fields: string[];
}

interface TokenizeResult {
    rows: CsvRow[];
    error?: RowError;
}

/**
 * Splits delimited text into rows. Handles quoted fields with doubled
 * quotes and embedded delimiters or line breaks; CRLF, LF and CR all end
 * a row. Blank lines are dropped.
 */
export function tokenize(text: string, delimiter = ','): TokenizeResult {
    const rows: CsvRow[] = [];
    let fields: string[] = [];
    let field = '';
    let inQuotes = false;
    let sawQuote = false;
    let line = 1;
    let rowLine = 1;

    const endRow = () => {
        fields.push(field);
        const blank = fields.length === 1 && fields[0] === '' && !sawQuote;
        if (!blank) {
            rows.push({ line: rowLine, fields });
        }
        fields = [];
        field = '';
        sawQuote = false;
    };

    for (let i = 0; i < text.length; i++) {
        const ch = text[i];

        if (inQuotes) {
            if (ch === '"') {
                if (text[i + 1] === '"') {
                    field += '"';
                    i++;
                } else {
                    inQuotes = false;
                }
            } else {
                if (ch === '\n' || (ch === '\r' && text[i + 1] !== '\n')) line++;
                field += ch;
            }
            continue;
        }

        if (ch === '"' && field === '') {
            inQuotes = true;
            sawQuote = true;
        } else if (ch === delimiter) {
            fields.push(field);
            field = '';
        } else if (ch === '\r' || ch === '\n') {
            if (ch === '\r' && text[i + 1] === '\n') i++;
            endRow();
            line++;
            rowLine = line;
        } else {
            field += ch;
        }
    }

    if (inQuotes) {
        return { rows, error: { line: rowLine, message: 'Unterminated quoted field' } };
    }
    if (field !== '' || fields.length > 0 || sawQuote) {
        endRow();
    }
    return { rows };
}

/**
 * Turns a user-supplied CSV file into an article table. Rows are never
 * dropped silently: every malformed row is collected and the whole upload
 * is rejected with one ParseError listing them.
 */
export class LocalOverrideLoader {
    constructor(private readonly delimiter = ',') {}

    load(content: string | Buffer): ArticleTable {
        const raw = Buffer.isBuffer(content) ? content.toString('utf8') : content;
        const text = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;

        const { rows, error } = tokenize(text, this.delimiter);
        if (rows.length === 0) {
            throw new ParseError('Upload is empty: expected a header row', error ? [error] : []);
        }

        const [header, ...dataRows] = rows;
        const totalRows = dataRows.length + (error ? 1 : 0);
        const columns = header.fields.map((name) => name.trim().toLowerCase());
        const index = new Map<string, number>();
        columns.forEach((name, position) => {
            if (!index.has(name)) index.set(name, position);
        });

        const missing = REQUIRED_COLUMNS.filter((name) => !index.has(name));
        if (missing.length > 0) {
            throw new ParseError(
                `Missing required columns: ${missing.join(', ')}`,
                [{ line: header.line, message: `Header lacks ${missing.join(', ')}` }],
                0,
                totalRows
            );
        }

        const articles: Article[] = [];
        const rowErrors: RowError[] = [];

        dataRows.forEach((row, position) => {
            const problems = this.validate(row, columns.length, index);
            if (problems.length > 0) {
                rowErrors.push(...problems.map((message) => ({ line: row.line, message })));
                return;
            }
            articles.push(this.toArticle(row, index, position));
        });

        if (error) {
            rowErrors.push(error);
        }

        if (rowErrors.length > 0) {
            const badRows = new Set(rowErrors.map((e) => e.line)).size;
            throw new ParseError(
                `Upload rejected: ${badRows} of ${totalRows} rows are malformed`,
                rowErrors,
                articles.length,
                totalRows
            );
        }

        return Object.freeze(articles);
    }

    private validate(row: CsvRow, width: number, index: Map<string, number>): string[] {
        if (row.fields.length !== width) {
            return [`Expected ${width} fields, found ${row.fields.length}`];
        }

        const problems: string[] = [];
        for (const name of REQUIRED_COLUMNS) {
            if (this.cell(row, index, name).trim() === '') {
                problems.push(`Missing value for "${name}"`);
            }
        }

        const score = this.cell(row, index, 'sentiment_score');
        if (score.trim() !== '' && parseSentimentScore(score) === undefined) {
            problems.push(`Invalid sentiment_score "${score}"`);
        }

        const published = this.cell(row, index, 'published_date');
        if (published.trim() !== '' && parsePublishedDate(published) === undefined) {
            problems.push(`Invalid published_date "${published}"`);
        }
        return problems;
    }

    private toArticle(row: CsvRow, index: Map<string, number>, position: number): Article {
        const id = this.cell(row, index, 'id').trim();
        const article: Article = {
            id: id !== '' ? id : `local-${position + 1}`,
            title: this.cell(row, index, 'title'),
            source: this.cell(row, index, 'source'),
            topic: this.cell(row, index, 'topic'),
            sentiment: this.cell(row, index, 'sentiment'),
        };

        const description = this.cell(row, index, 'description');
        if (description.trim() !== '') article.description = description;

        const url = this.cell(row, index, 'url').trim();
        if (url !== '') article.url = url;

        const score = parseSentimentScore(this.cell(row, index, 'sentiment_score'));
        if (score !== undefined) article.sentimentScore = score;

        const publishedDate = parsePublishedDate(this.cell(row, index, 'published_date'));
        if (publishedDate !== undefined) article.publishedDate = publishedDate;

        return article;
    }

    private cell(row: CsvRow, index: Map<string, number>, name: Column): string {
        const position = index.get(name);
        return position === undefined ? '' : row.fields[position] ?? '';
    }
}
