import pLimit from 'p-limit';
import { collectAnchors } from './collector.js';
import { CrawlDisallowedError, NavigationError, ScraperError } from './errors.js';
import { fetchArticle, type FetchOptions } from './fetcher.js';
import { ARTICLE_URL_PREFIXES, filterArticleUrls, labelArticleUrls, toDiscoveredArticles } from './filter.js';
import type { NavigationTimeouts, PageLease, PageProvider, RenderedPage } from './navigation.js';
import { HostThrottle, sleep, type RobotsGate } from './politeness.js';
import type { CanonicalArticleUrl, DiscoveredArticle, ExtractionResult } from './types.js';

// ── Discovery ──────────────────────────────────────────────────────────────────

export interface DiscoveryOptions extends NavigationTimeouts {
    prefixes?: readonly string[];
}

/**
 * Loads the entry page once and returns its article links, filtered against
 * the prefix allowlist, deduplicated, in document order, each labelled with
 * its anchor text.
 */
export async function discoverArticleUrls(
    provider: PageProvider,
    entryUrl: string,
    options: DiscoveryOptions,
): Promise<DiscoveredArticle[]> {
    const lease = await provider.acquire();
    try {
        const anchors = await collectAnchors(lease.page, entryUrl, options);
        const links = anchors.map(a => a.href);
        const urls = filterArticleUrls(links, options.prefixes ?? ARTICLE_URL_PREFIXES, entryUrl);
        process.stderr.write(`[discover] ${urls.length} unique article URLs out of ${links.length} links\n`);
        return toDiscoveredArticles(urls, labelArticleUrls(anchors, entryUrl));
    } finally {
        await lease.release();
    }
}

// ── Batch extraction ───────────────────────────────────────────────────────────

export interface ExtractionOptions extends FetchOptions {
    /** Minimum spacing between requests to the same host. */
    delayMs: number;
    /** Extra attempts after a NavigationError; 0 disables retrying. */
    maxRetries: number;
    /** Backoff before retry n (0-based) is `retryBackoffMs * 2^n`. */
    retryBackoffMs: number;
    /** Number of workers, each with its own browsing context. */
    concurrency: number;
    /** When set, URLs refused by robots.txt are recorded as failures and not loaded. */
    robots?: RobotsGate;
    onResult?: (result: ExtractionResult, index: number) => void;
}

/**
 * Extracts every URL and returns one result per URL, in input order.
 *
 * With `concurrency: 1` (the default configuration) a single page is reused
 * and URLs are fetched strictly one after another. Higher values lease one
 * page per worker and cap in-flight fetches with p-limit. Failures
 * attributable to one URL become failed results; the batch carries on.
 * Every leased page is released on every exit path.
 */
export async function extractArticles(
    provider: PageProvider,
    urls: readonly CanonicalArticleUrl[],
    options: ExtractionOptions,
): Promise<ExtractionResult[]> {
    if (urls.length === 0) return [];

    const workers = Math.max(1, Math.min(options.concurrency, urls.length));
    const throttle = new HostThrottle(options.delayMs);
    const leases: PageLease[] = [];

    process.stderr.write(`[crawler] Extracting ${urls.length} articles with ${workers} worker(s)\n`);

    try {
        for (let i = 0; i < workers; i++) {
            leases.push(await provider.acquire());
        }
        const idle = [...leases];
        const limit = pLimit(workers);

        const settled = await Promise.allSettled(urls.map((url, index) =>
            limit(async () => {
                // p-limit never runs more tasks than there are leases
                const lease = idle.pop();
                if (!lease) throw new Error('No idle page for worker');
                try {
                    const result = await extractOne(lease.page, url, throttle, options);
                    options.onResult?.(result, index);
                    return result;
                } finally {
                    idle.push(lease);
                }
            })
        ));

        // Pages are released only once every worker has stopped using them.
        const results: ExtractionResult[] = [];
        for (const outcome of settled) {
            if (outcome.status === 'rejected') throw outcome.reason;
            results.push(outcome.value);
        }

        const ok = results.filter(r => r.success).length;
        process.stderr.write(`[crawler] Completed: ${ok}/${urls.length} articles extracted\n`);
        return results;
    } finally {
        await Promise.all(leases.map(lease => lease.release()));
    }
}

async function extractOne(
    page: RenderedPage,
    url: CanonicalArticleUrl,
    throttle: HostThrottle,
    options: ExtractionOptions,
): Promise<ExtractionResult> {
    for (let attempt = 0; ; attempt++) {
        try {
            if (options.robots && !(await options.robots.isAllowed(url))) {
                throw new CrawlDisallowedError(url);
            }
            await throttle.wait(url, (await options.robots?.crawlDelayMs(url)) ?? 0);

            const article = await fetchArticle(page, url, options);
            process.stderr.write(
                `[crawler] ✓ ${url} (${article.hasBody ? `sections: ${article.sections.length}` : 'no body'})\n`
            );
            return { url, success: true, article, extractedAt: new Date().toISOString() };
        } catch (err) {
            if (!(err instanceof ScraperError)) throw err;

            if (err instanceof NavigationError && attempt < options.maxRetries) {
                const backoff = options.retryBackoffMs * 2 ** attempt;
                process.stderr.write(`[crawler] Retry ${attempt + 1}/${options.maxRetries} in ${backoff}ms: ${url}\n`);
                await sleep(backoff);
                continue;
            }

            process.stderr.write(`[crawler] ✗ ${url} (${err.kind}): ${err.message}\n`);
            return {
                url,
                success: false,
                error: { kind: err.kind, message: err.message },
                extractedAt: new Date().toISOString(),
            };
        }
    }
}
