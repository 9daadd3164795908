import type { Page } from 'playwright';
import { NavigationError } from './errors.js';

/** The slice of a Playwright page the pipeline drives. */
export type RenderedPage = Pick<Page, 'goto' | 'waitForLoadState' | 'content'>;

/** A page on its own browsing context; `release` closes the context. */
export interface PageLease {
    page: RenderedPage;
    release(): Promise<void>;
}

export interface PageProvider {
    acquire(): Promise<PageLease>;
}

export interface NavigationTimeouts {
    navigationTimeoutMs: number;
    idleTimeoutMs: number;
}

export interface BrowserOptions {
    headless: boolean;
    userAgent: string;
}

/**
 * Navigates and waits for network idle. Either step failing or timing out
 * raises {@link NavigationError}; nothing is retried here.
 */
export async function loadPage(page: RenderedPage, url: string, timeouts: NavigationTimeouts): Promise<void> {
    try {
        await page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeouts.navigationTimeoutMs });
        await page.waitForLoadState('networkidle', { timeout: timeouts.idleTimeoutMs });
    } catch (err) {
        throw new NavigationError(url, err);
    }
}
