import type { FailureKind } from './types.js';

/**
 * Base class for failures attributable to a single URL. Batch runs record
 * these per URL and move on; anything else propagates.
 */
export abstract class ScraperError extends Error {
    abstract readonly kind: FailureKind;

    constructor(readonly url: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** The page failed to load, or did not reach network idle within the timeout. */
export class NavigationError extends ScraperError {
    readonly kind = 'navigation' as const;

    constructor(url: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(url, `Navigation to ${url} failed: ${reason}`, { cause });
    }
}

/** A body child could not be read while segmenting an article. */
export class ExtractionError extends ScraperError {
    readonly kind = 'extraction' as const;
}

/** robots.txt refuses the URL for our user agent. */
export class CrawlDisallowedError extends ScraperError {
    readonly kind = 'disallowed' as const;

    constructor(url: string) {
        super(url, `robots.txt disallows ${url}`);
    }
}
