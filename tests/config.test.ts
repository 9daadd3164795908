/**
 * Test: config.ts
 *
 * Verifies defaults and environment overrides, and that malformed values
 * are rejected instead of silently falling back.
 */

import os from 'os';
import path from 'path';
import { loadConfig } from '../src/config.js';
import assert from 'node:assert/strict';

console.log('Running config tests...\n');

// ── Test 1: Defaults ─────────────────────────────────────────────────────────
{
    const config = loadConfig({});
    assert.equal(config.entryUrl, 'https://help.moengage.com/hc/en-us');
    assert.equal(config.dbPath, path.join(os.homedir(), '.help-center-scraper', 'articles.db'));
    assert.equal(config.navigationTimeoutMs, 30_000);
    assert.equal(config.idleTimeoutMs, 20_000);
    assert.equal(config.delayMs, 1000);
    assert.equal(config.maxRetries, 0);
    assert.equal(config.concurrency, 1);
    assert.equal(config.headless, true);
    assert.equal(config.respectRobots, true);
    assert.deepEqual(config.headingTags, ['h2']);
    console.log('✓ Test 1 passed: defaults');
}

// ── Test 2: Overrides ────────────────────────────────────────────────────────
{
    const config = loadConfig({
        SCRAPER_ENTRY_URL: 'https://docs.example.com/start',
        SCRAPER_DB_PATH: '/tmp/articles.db',
        SCRAPER_DELAY_MS: '0',
        SCRAPER_MAX_RETRIES: '3',
        SCRAPER_CONCURRENCY: '4',
        SCRAPER_HEADLESS: 'false',
        SCRAPER_RESPECT_ROBOTS: 'no',
        SCRAPER_HEADING_TAGS: 'H2, h3,',
    });
    assert.equal(config.entryUrl, 'https://docs.example.com/start');
    assert.equal(config.dbPath, '/tmp/articles.db');
    assert.equal(config.delayMs, 0);
    assert.equal(config.maxRetries, 3);
    assert.equal(config.concurrency, 4);
    assert.equal(config.headless, false);
    assert.equal(config.respectRobots, false);
    assert.deepEqual(config.headingTags, ['h2', 'h3']);
    console.log('✓ Test 2 passed: environment overrides');
}

// ── Test 3: Malformed values throw ───────────────────────────────────────────
{
    assert.throws(() => loadConfig({ SCRAPER_DELAY_MS: '1.5s' }), /SCRAPER_DELAY_MS must be an integer/);
    assert.throws(() => loadConfig({ SCRAPER_CONCURRENCY: '0' }), /SCRAPER_CONCURRENCY must be >= 1/);
    assert.throws(() => loadConfig({ SCRAPER_HEADLESS: 'maybe' }), /SCRAPER_HEADLESS must be a boolean/);
    assert.throws(() => loadConfig({ SCRAPER_ENTRY_URL: 'help.moengage.com' }), /absolute URL/);
    console.log('✓ Test 3 passed: malformed values rejected');
}

console.log('\n✅ All config tests passed!');
