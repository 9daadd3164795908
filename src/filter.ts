/**
 * Article URL allowlist.
 *
 * Matching is a literal string-prefix test. Trailing slashes, query strings,
 * fragments and http/https variants are NOT normalized, so two spellings of
 * the same article are two distinct entries unless they are byte-identical.
 */

import type { AnchorLink, ArticleSource, CanonicalArticleUrl, DiscoveredArticle, RawLink } from './types.js';

export const ARTICLE_SOURCES: ReadonlyArray<{ source: ArticleSource; prefix: string }> = [
    { source: 'help', prefix: 'https://help.moengage.com/hc/en-us/articles/' },
    { source: 'developers', prefix: 'https://developers.moengage.com/hc/en-us/articles/' },
    { source: 'partners', prefix: 'https://partners.moengage.com/hc/en-us/articles/' },
];

export const ARTICLE_URL_PREFIXES: readonly string[] = ARTICLE_SOURCES.map(s => s.prefix);

const HAS_SCHEME = /^[a-z][a-z0-9+.-]*:/i;

/**
 * Resolves a scheme-less href against the page it was found on, the way a
 * browser does for `anchor.href`. Links that already carry a scheme
 * (`https:`, `mailto:`, `javascript:` …) are returned untouched.
 */
export function resolveLink(raw: RawLink, baseUrl?: string): string {
    if (!baseUrl || HAS_SCHEME.test(raw)) return raw;
    try {
        return new URL(raw, baseUrl).href;
    } catch {
        return raw;
    }
}

/**
 * Keeps the links that start with one of `prefixes`, in first-seen order and
 * without duplicates. Pure: the same input always yields the same output.
 */
export function filterArticleUrls(
    links: readonly RawLink[],
    prefixes: readonly string[] = ARTICLE_URL_PREFIXES,
    baseUrl?: string,
): CanonicalArticleUrl[] {
    const seen = new Set<CanonicalArticleUrl>();
    for (const raw of links) {
        const url = resolveLink(raw, baseUrl);
        if (seen.has(url)) continue;
        if (prefixes.some(prefix => url.startsWith(prefix))) {
            seen.add(url);
        }
    }
    return [...seen];
}

/**
 * Returns the source whose prefix the URL starts with, or undefined for
 * URLs outside the allowlist.
 */
export function classifySource(url: string): ArticleSource | undefined {
    return ARTICLE_SOURCES.find(s => url.startsWith(s.prefix))?.source;
}

/**
 * Resolved href → text of the first anchor with a non-empty label. Duplicate
 * links such as "Campaigns (again)" never overwrite the first label.
 */
export function labelArticleUrls(anchors: readonly AnchorLink[], baseUrl?: string): Map<string, string> {
    const labels = new Map<string, string>();
    for (const { href, text } of anchors) {
        const url = resolveLink(href, baseUrl);
        if (text && !labels.get(url)) labels.set(url, text);
    }
    return labels;
}

export function toDiscoveredArticles(
    urls: readonly CanonicalArticleUrl[],
    labels: ReadonlyMap<string, string> = new Map(),
): DiscoveredArticle[] {
    return urls.map(url => ({ url, title: labels.get(url) ?? '', source: classifySource(url) ?? null }));
}
