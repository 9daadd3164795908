import { chromium, Browser } from 'playwright';
import type { BrowserOptions, PageLease, PageProvider } from './navigation.js';

/**
 * One headless Chromium instance owned by a single run. Each lease gets an
 * isolated browsing context so concurrent workers never share a page.
 */
export class BrowserSession implements PageProvider {
    private constructor(
        private readonly browser: Browser,
        private readonly options: BrowserOptions,
    ) { }

    static async launch(options: BrowserOptions): Promise<BrowserSession> {
        const browser = await chromium.launch({
            headless: options.headless,
            args: [
                '--disable-blink-features=AutomationControlled',
                '--disable-dev-shm-usage',
                '--no-sandbox',
            ],
        });
        return new BrowserSession(browser, options);
    }

    async acquire(): Promise<PageLease> {
        const context = await this.browser.newContext({
            viewport: { width: 1920, height: 1080 },
            userAgent: this.options.userAgent,
        });
        try {
            const page = await context.newPage();
            return { page, release: () => context.close() };
        } catch (err) {
            await context.close();
            throw err;
        }
    }

    async close(): Promise<void> {
        await this.browser.close();
    }
}

/**
 * Launches a session, hands it to `fn`, and closes the browser on every exit
 * path.
 */
export async function withBrowserSession<T>(
    options: BrowserOptions,
    fn: (session: BrowserSession) => Promise<T>,
): Promise<T> {
    const session = await BrowserSession.launch(options);
    try {
        return await fn(session);
    } finally {
        await session.close();
    }
}
