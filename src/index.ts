#!/usr/bin/env node

import "./setup.js";

// CRITICAL: MCP over stdio requires stdout to be strictly JSON-RPC messages.
// Redirect all console.log output to stderr to prevent protocol corruption.
console.log = (...args: unknown[]) => console.error(...args);

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { withBrowserSession } from "./browser.js";
import { loadConfig } from "./config.js";
import { discoverArticleUrls, extractArticles, type ExtractionOptions } from "./crawler.js";
import { ArticleStore } from "./db.js";
import { HELP_CENTER_SELECTORS } from "./extract.js";
import { RobotsGate } from "./politeness.js";
import { computeStatistics, toUrlTable, writeExtractionReport } from "./report.js";
import type { ArticleSource, ExtractionResult } from "./types.js";

const config = loadConfig();
const store = new ArticleStore(config.dbPath);

const server = new Server(
    { name: "help-center-scraper", version: "1.0.0" },
    { capabilities: { tools: {} } }
);

// ── Pipeline wiring ────────────────────────────────────────────────────────────

const browserOptions = { headless: config.headless, userAgent: config.userAgent };

function extractionOptions(concurrency: number = config.concurrency): ExtractionOptions {
    return {
        navigationTimeoutMs: config.navigationTimeoutMs,
        idleTimeoutMs: config.idleTimeoutMs,
        selectors: { ...HELP_CENTER_SELECTORS, headingTags: config.headingTags },
        delayMs: config.delayMs,
        maxRetries: config.maxRetries,
        retryBackoffMs: config.retryBackoffMs,
        concurrency,
        robots: config.respectRobots ? new RobotsGate() : undefined,
    };
}

async function runDiscovery(entryUrl: string) {
    const articles = await withBrowserSession(browserOptions, session =>
        discoverArticleUrls(session, entryUrl, {
            navigationTimeoutMs: config.navigationTimeoutMs,
            idleTimeoutMs: config.idleTimeoutMs,
        })
    );
    store.saveDiscovered(articles);
    return articles;
}

async function runExtraction(urls: string[], concurrency?: number): Promise<ExtractionResult[]> {
    const results = await withBrowserSession(browserOptions, session =>
        extractArticles(session, urls, extractionOptions(concurrency))
    );
    store.saveResults(results);
    return results;
}

function failuresOf(results: ExtractionResult[]) {
    return results.flatMap(r => (r.success ? [] : [{ url: r.url, ...r.error }]));
}

// ── Argument parsing ───────────────────────────────────────────────────────────

type ToolArgs = Record<string, unknown>;

const SOURCES: readonly ArticleSource[] = ["help", "developers", "partners"];

function isArticleSource(value: unknown): value is ArticleSource {
    return SOURCES.some(s => s === value);
}

function optionalString(args: ToolArgs, key: string): string | undefined {
    const value = args[key];
    if (value === undefined || value === null || value === "") return undefined;
    if (typeof value !== "string") throw new Error(`${key} must be a string`);
    return value;
}

function requireString(args: ToolArgs, key: string): string {
    const value = optionalString(args, key);
    if (!value) throw new Error(`${key} is required`);
    return value;
}

function optionalInt(args: ToolArgs, key: string, min: number): number | undefined {
    const value = args[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
        throw new Error(`${key} must be an integer >= ${min}`);
    }
    return value;
}

function optionalSources(args: ToolArgs, key: string): ArticleSource[] | undefined {
    const value = args[key];
    if (value === undefined || value === null) return undefined;
    if (!Array.isArray(value) || !value.every(isArticleSource)) {
        throw new Error(`${key} must be an array of: ${SOURCES.join(", ")}`);
    }
    return value;
}

function json(payload: unknown, isError = false) {
    return {
        content: [{ type: "text" as const, text: JSON.stringify(payload, null, 2) }],
        ...(isError ? { isError: true } : {}),
    };
}

// ── Tool definitions ───────────────────────────────────────────────────────────

server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
        tools: [
            {
                name: "discover_article_urls",
                description: [
                    "Loads the help-center home page in a headless browser, collects every anchor href,",
                    "and keeps the links that start with one of the known article-path prefixes",
                    "(help, developers and partners subdomains). The deduplicated list, with each link's",
                    "anchor text as its title, replaces the stored one.",
                ].join(" "),
                inputSchema: {
                    type: "object",
                    properties: {
                        entry_url: {
                            type: "string",
                            description: `Page to collect links from. Defaults to ${config.entryUrl}.`,
                        },
                    },
                },
            },
            {
                name: "extract_article",
                description: [
                    "Fetches one article and returns its title and sections. Each section has a heading",
                    "and ordered blocks: {kind: 'text', value} or {kind: 'image', src}.",
                    "A page without the article body returns hasBody: false and no sections.",
                ].join(" "),
                inputSchema: {
                    type: "object",
                    properties: { url: { type: "string" } },
                    required: ["url"],
                },
            },
            {
                name: "extract_articles",
                description: [
                    "Extracts the stored article URLs in discovery order (discovering them first if none are stored)",
                    "and saves one result per URL. Failures are reported per URL and do not stop the batch.",
                ].join(" "),
                inputSchema: {
                    type: "object",
                    properties: {
                        limit: { type: "number", description: "Only the first N URLs (0 = all)." },
                        sources: {
                            type: "array",
                            items: { type: "string", enum: [...SOURCES] },
                            description: "Only URLs from these sources.",
                        },
                        concurrency: {
                            type: "number",
                            description: `Parallel browser contexts. Defaults to ${config.concurrency}.`,
                        },
                    },
                },
            },
            {
                name: "retry_failed",
                description: "Re-extracts every URL whose last extraction failed and reports how many now succeed.",
                inputSchema: { type: "object", properties: {} },
            },
            {
                name: "get_article",
                description: "Returns the stored extraction result for a URL.",
                inputSchema: {
                    type: "object",
                    properties: { url: { type: "string" } },
                    required: ["url"],
                },
            },
            {
                name: "get_url_table",
                description: "Returns the stored article URLs as a CSV table with a single URL column.",
                inputSchema: { type: "object", properties: {} },
            },
            {
                name: "export_results",
                description: "Writes <output_prefix>_complete.json and <output_prefix>_summary.csv from the stored results.",
                inputSchema: {
                    type: "object",
                    properties: {
                        output_prefix: { type: "string", description: "Defaults to 'documentation'." },
                    },
                },
            },
            {
                name: "get_extraction_stats",
                description: "Returns success rate, average word count, average sections and image counts over the stored results.",
                inputSchema: { type: "object", properties: {} },
            },
        ],
    };
});

// ── Tool execution ─────────────────────────────────────────────────────────────

server.setRequestHandler(CallToolRequestSchema, async (request) => {
    try {
        const args: ToolArgs = request.params.arguments ?? {};

        switch (request.params.name) {
            case "discover_article_urls": {
                const entryUrl = optionalString(args, "entry_url") ?? config.entryUrl;
                const articles = await runDiscovery(entryUrl);
                const bySource: Record<string, number> = {};
                for (const a of articles) {
                    const key = a.source ?? "other";
                    bySource[key] = (bySource[key] ?? 0) + 1;
                }
                return json({ count: articles.length, by_source: bySource, articles });
            }

            case "extract_article": {
                const url = requireString(args, "url");
                const [result] = await runExtraction([url], 1);
                return result.success ? json(result.article) : json(result, true);
            }

            case "extract_articles": {
                const limit = optionalInt(args, "limit", 0);
                const sources = optionalSources(args, "sources");
                const concurrency = optionalInt(args, "concurrency", 1);

                if (store.listDiscovered().length === 0) {
                    process.stderr.write("[server] No stored URLs, discovering first\n");
                    await runDiscovery(config.entryUrl);
                }
                const urls = store.listDiscovered({ sources, limit }).map(a => a.url);
                if (urls.length === 0) {
                    return json({ statistics: computeStatistics([]), failures: [] });
                }
                const results = await runExtraction(urls, concurrency);
                return json({ statistics: computeStatistics(results), failures: failuresOf(results) });
            }

            case "retry_failed": {
                const failed = store.listFailedUrls();
                if (failed.length === 0) {
                    return json({ retried: 0, recovered: 0, failures: [] });
                }
                const results = await runExtraction(failed);
                return json({
                    retried: failed.length,
                    recovered: results.filter(r => r.success).length,
                    failures: failuresOf(results),
                });
            }

            case "get_article": {
                const url = requireString(args, "url");
                const result = store.getResult(url);
                if (!result) {
                    return { content: [{ type: "text" as const, text: `No stored result for: ${url}` }] };
                }
                return json(result);
            }

            case "get_url_table": {
                const urls = store.listDiscovered().map(a => a.url);
                return { content: [{ type: "text" as const, text: toUrlTable(urls) }] };
            }

            case "export_results": {
                const prefix = optionalString(args, "output_prefix") ?? "documentation";
                return json(writeExtractionReport(store.listResults(), prefix));
            }

            case "get_extraction_stats":
                return json({ ...store.getCounts(), statistics: computeStatistics(store.listResults()) });

            default:
                throw new Error(`Tool not found: ${request.params.name}`);
        }
    } catch (err: unknown) {
        const errorMessage = err instanceof Error ? err.message : String(err);
        return {
            content: [{ type: "text" as const, text: `Error: ${errorMessage}` }],
            isError: true,
        };
    }
});

// ── Server startup ─────────────────────────────────────────────────────────────

function shutdown() {
    store.close();
    process.exit(0);
}

async function main() {
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
    const transport = new StdioServerTransport();
    await server.connect(transport);
    console.error("Help-center scraper MCP server v1.0 running on stdio");
}

main().catch((error) => {
    console.error("Server error:", error);
    store.close();
    process.exit(1);
});
