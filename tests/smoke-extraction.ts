/**
 * Smoke test: single article extraction
 *
 * Manually run to verify Playwright loading + segmentation end-to-end.
 * Needs a Chromium install (npx playwright install chromium) and network.
 * Not a unit test — exits with process.exit(0) on success.
 *
 * Usage: tsx tests/smoke-extraction.ts [article-url]
 */
import { withBrowserSession } from '../src/browser.js';
import { loadConfig } from '../src/config.js';
import { extractArticles } from '../src/crawler.js';

async function test() {
    const config = loadConfig();
    const url = process.argv[2] ?? 'https://help.moengage.com/hc/en-us/articles/360001520773-What-is-an-Event-';
    console.log(`Extracting ${url}...`);
    try {
        const [result] = await withBrowserSession(
            { headless: config.headless, userAgent: config.userAgent },
            session => extractArticles(session, [url], { ...config, concurrency: 1 }),
        );
        console.log(JSON.stringify(result, null, 2));
        if (!result.success) process.exit(1);
    } catch (e) {
        console.error('Error during extraction:', e);
        process.exit(1);
    }
    process.exit(0);
}

test();
