import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import type { Article, ArticleSource, DiscoveredArticle, ExtractionResult, FailureKind, Section } from './types.js';

// ── Row types ──────────────────────────────────────────────────────────────────

interface ArticleUrlRow {
    url: string;
    title: string;
    source: ArticleSource | null;
    position: number;
}

interface ExtractionRow {
    url: string;
    success: number;
    title: string | null;
    has_body: number | null;
    word_count: number | null;
    last_modified: string | null;
    breadcrumbs: string | null;  // JSON array
    sections: string | null;     // JSON array of Section
    error_kind: FailureKind | null;
    error_message: string | null;
    extracted_at: string;
}

export interface ListOptions {
    sources?: readonly ArticleSource[];
    /** 0 or undefined = no limit. */
    limit?: number;
}

/**
 * SQLite store for one scraper installation: the discovered URL list (in
 * discovery order) and the latest extraction result per URL.
 *
 * Pass ':memory:' for a throwaway database.
 */
export class ArticleStore {
    readonly db: Database.Database;

    constructor(dbPath: string) {
        if (dbPath !== ':memory:') {
            fs.mkdirSync(path.dirname(dbPath), { recursive: true });
        }
        this.db = new Database(dbPath);
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS article_urls (
                url           TEXT PRIMARY KEY,
                title         TEXT NOT NULL DEFAULT '',
                source        TEXT,
                position      INTEGER NOT NULL,
                discovered_at DATETIME DEFAULT CURRENT_TIMESTAMP
            );

            CREATE TABLE IF NOT EXISTS extractions (
                url           TEXT PRIMARY KEY,
                success       INTEGER NOT NULL,
                title         TEXT,
                has_body      INTEGER,
                word_count    INTEGER,
                last_modified TEXT,
                breadcrumbs   TEXT,
                sections      TEXT,
                error_kind    TEXT,
                error_message TEXT,
                extracted_at  TEXT NOT NULL
            );
        `);

        // Stores created before anchor labels were kept lack the title column.
        const urlColumns = (this.db.prepare(
            `PRAGMA table_info(article_urls)`
        ).all() as Array<{ name: string }>).map(c => c.name);
        if (!urlColumns.includes('title')) {
            this.db.exec(`ALTER TABLE article_urls ADD COLUMN title TEXT NOT NULL DEFAULT '';`);
        }
    }

    // ── Discovered URLs ────────────────────────────────────────────────────────

    /** Replaces the URL list with a fresh discovery, keeping its order. */
    saveDiscovered(articles: readonly DiscoveredArticle[]): void {
        const insert = this.db.prepare(
            `INSERT INTO article_urls (url, title, source, position) VALUES (?, ?, ?, ?)`
        );
        const replaceAll = this.db.transaction((rows: readonly DiscoveredArticle[]) => {
            this.db.prepare(`DELETE FROM article_urls`).run();
            rows.forEach((row, i) => insert.run(row.url, row.title, row.source, i));
        });
        replaceAll(articles);
        process.stderr.write(`[store] Saved ${articles.length} discovered URLs\n`);
    }

    listDiscovered(options: ListOptions = {}): DiscoveredArticle[] {
        const rows = this.db.prepare(
            `SELECT url, title, source, position FROM article_urls ORDER BY position`
        ).all() as ArticleUrlRow[];

        const sources = options.sources;
        const filtered = sources && sources.length > 0
            ? rows.filter(r => r.source !== null && sources.includes(r.source))
            : rows;
        const limited = options.limit ? filtered.slice(0, options.limit) : filtered;
        return limited.map(r => ({ url: r.url, title: r.title, source: r.source }));
    }

    // ── Extraction results ─────────────────────────────────────────────────────

    saveResults(results: readonly ExtractionResult[]): void {
        const upsert = this.db.prepare(`
            INSERT INTO extractions (url, success, title, has_body, word_count, last_modified,
                                     breadcrumbs, sections, error_kind, error_message, extracted_at)
            VALUES (@url, @success, @title, @has_body, @word_count, @last_modified,
                    @breadcrumbs, @sections, @error_kind, @error_message, @extracted_at)
            ON CONFLICT(url) DO UPDATE SET
                success       = excluded.success,
                title         = excluded.title,
                has_body      = excluded.has_body,
                word_count    = excluded.word_count,
                last_modified = excluded.last_modified,
                breadcrumbs   = excluded.breadcrumbs,
                sections      = excluded.sections,
                error_kind    = excluded.error_kind,
                error_message = excluded.error_message,
                extracted_at  = excluded.extracted_at
        `);
        const upsertMany = this.db.transaction((rows: readonly ExtractionResult[]) => {
            for (const row of rows) upsert.run(toRow(row));
        });
        upsertMany(results);
    }

    getResult(url: string): ExtractionResult | null {
        const row = this.db.prepare(
            `SELECT * FROM extractions WHERE url = ?`
        ).get(url) as ExtractionRow | undefined;
        return row ? fromRow(row) : null;
    }

    getArticle(url: string): Article | null {
        const result = this.getResult(url);
        return result?.success ? result.article : null;
    }

    /**
     * All stored results, discovered URLs first in discovery order, then
     * URLs extracted directly.
     */
    listResults(): ExtractionResult[] {
        const rows = this.db.prepare(`
            SELECT e.* FROM extractions e
            LEFT JOIN article_urls u ON u.url = e.url
            ORDER BY u.position IS NULL, u.position, e.extracted_at, e.url
        `).all() as ExtractionRow[];
        return rows.map(fromRow);
    }

    listFailedUrls(): string[] {
        return this.listResults().filter(r => !r.success).map(r => r.url);
    }

    getCounts(): { discovered: number; extracted: number; failed: number } {
        const discovered = this.db.prepare(`SELECT COUNT(*) AS count FROM article_urls`).get() as { count: number };
        const extracted = this.db.prepare(`SELECT COUNT(*) AS count FROM extractions WHERE success = 1`).get() as { count: number };
        const failed = this.db.prepare(`SELECT COUNT(*) AS count FROM extractions WHERE success = 0`).get() as { count: number };
        return { discovered: discovered.count, extracted: extracted.count, failed: failed.count };
    }

    close(): void {
        this.db.close();
    }
}

// ── Row mapping ────────────────────────────────────────────────────────────────

function toRow(result: ExtractionResult): ExtractionRow {
    if (result.success) {
        const a = result.article;
        return {
            url: result.url,
            success: 1,
            title: a.title,
            has_body: a.hasBody ? 1 : 0,
            word_count: a.wordCount,
            last_modified: a.lastModified,
            breadcrumbs: JSON.stringify(a.breadcrumbs),
            sections: JSON.stringify(a.sections),
            error_kind: null,
            error_message: null,
            extracted_at: result.extractedAt,
        };
    }
    return {
        url: result.url,
        success: 0,
        title: null,
        has_body: null,
        word_count: null,
        last_modified: null,
        breadcrumbs: null,
        sections: null,
        error_kind: result.error.kind,
        error_message: result.error.message,
        extracted_at: result.extractedAt,
    };
}

function fromRow(row: ExtractionRow): ExtractionResult {
    if (row.success !== 1) {
        return {
            url: row.url,
            success: false,
            error: { kind: row.error_kind ?? 'navigation', message: row.error_message ?? '' },
            extractedAt: row.extracted_at,
        };
    }
    const sections: Section[] = JSON.parse(row.sections ?? '[]');
    const breadcrumbs: string[] = JSON.parse(row.breadcrumbs ?? '[]');
    return {
        url: row.url,
        success: true,
        article: {
            url: row.url,
            title: row.title ?? '',
            hasBody: row.has_body === 1,
            sections,
            wordCount: row.word_count ?? 0,
            lastModified: row.last_modified ?? '',
            breadcrumbs,
        },
        extractedAt: row.extracted_at,
    };
}
