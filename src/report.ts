import fs from 'fs';
import type { Article, ExtractionResult } from './types.js';

export interface ExtractionStatistics {
    totalArticles: number;
    successfulExtractions: number;
    failedExtractions: number;
    /** Percentage, 0–100. */
    successRate: number;
    averageWordCount: number;
    averageSections: number;
    articlesWithImages: number;
}

function successfulArticles(results: readonly ExtractionResult[]): Article[] {
    return results.flatMap(r => (r.success ? [r.article] : []));
}

function hasImages(article: Article): boolean {
    return article.sections.some(s => s.blocks.some(b => b.kind === 'image'));
}

export function computeStatistics(results: readonly ExtractionResult[]): ExtractionStatistics {
    const articles = successfulArticles(results);
    const total = results.length;
    const ok = articles.length;
    const average = (values: number[]) => (values.length ? values.reduce((a, b) => a + b, 0) / values.length : 0);

    return {
        totalArticles: total,
        successfulExtractions: ok,
        failedExtractions: total - ok,
        successRate: total ? (ok / total) * 100 : 0,
        averageWordCount: average(articles.map(a => a.wordCount)),
        averageSections: average(articles.map(a => a.sections.length)),
        articlesWithImages: articles.filter(hasImages).length,
    };
}

// ── CSV ────────────────────────────────────────────────────────────────────────

function csvField(value: string | number): string {
    const text = String(value);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function csvLine(fields: ReadonlyArray<string | number>): string {
    return fields.map(csvField).join(',');
}

/** The discovered URL list as a one-column CSV table headed `URL`. */
export function toUrlTable(urls: readonly string[]): string {
    return [csvLine(['URL']), ...urls.map(u => csvLine([u]))].join('\n') + '\n';
}

const SUMMARY_COLUMNS = ['URL', 'Title', 'Word Count', 'Last Modified', 'Extracted At', 'Breadcrumbs', 'Section Count'];

/** One row per successful extraction. */
export function toSummaryCsv(results: readonly ExtractionResult[]): string {
    const rows = results.flatMap(r => (r.success
        ? [csvLine([
            r.url,
            r.article.title,
            r.article.wordCount,
            r.article.lastModified,
            r.extractedAt,
            r.article.breadcrumbs.join(' > '),
            r.article.sections.length,
        ])]
        : []));
    return [csvLine(SUMMARY_COLUMNS), ...rows].join('\n') + '\n';
}

// ── JSON ───────────────────────────────────────────────────────────────────────

export function buildExtractionReport(results: readonly ExtractionResult[], generatedAt: Date = new Date()) {
    const stats = computeStatistics(results);
    return {
        extraction_summary: {
            total_articles: stats.totalArticles,
            successful_extractions: stats.successfulExtractions,
            failed_extractions: stats.failedExtractions,
            average_word_count: stats.averageWordCount,
            extraction_timestamp: generatedAt.toISOString(),
        },
        articles: results,
    };
}

/**
 * Writes `<prefix>_complete.json` and `<prefix>_summary.csv`.
 * Returns the two file paths.
 */
export function writeExtractionReport(
    results: readonly ExtractionResult[],
    outputPrefix: string,
): { jsonFile: string; csvFile: string } {
    const jsonFile = `${outputPrefix}_complete.json`;
    const csvFile = `${outputPrefix}_summary.csv`;
    fs.writeFileSync(jsonFile, JSON.stringify(buildExtractionReport(results), null, 2), 'utf-8');
    fs.writeFileSync(csvFile, toSummaryCsv(results), 'utf-8');
    process.stderr.write(`[report] Saved ${jsonFile} and ${csvFile}\n`);
    return { jsonFile, csvFile };
}
