import { extractAnchors } from './extract.js';
import { loadPage, type NavigationTimeouts, type RenderedPage } from './navigation.js';
import type { AnchorLink, RawLink } from './types.js';

/**
 * Loads the entry page and returns every anchor with an `href`, in document
 * order. One page load; a failed or timed-out load raises NavigationError.
 */
export async function collectAnchors(
    page: RenderedPage,
    entryUrl: string,
    timeouts: NavigationTimeouts,
): Promise<AnchorLink[]> {
    await loadPage(page, entryUrl, timeouts);
    const anchors = extractAnchors(await page.content());
    process.stderr.write(`[discover] Found ${anchors.length} links on ${entryUrl}\n`);
    return anchors;
}

/** The `href` of every anchor on the entry page, in document order. */
export async function collectLinks(
    page: RenderedPage,
    entryUrl: string,
    timeouts: NavigationTimeouts,
): Promise<RawLink[]> {
    return (await collectAnchors(page, entryUrl, timeouts)).map(a => a.href);
}
