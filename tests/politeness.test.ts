/**
 * Test: politeness.ts
 *
 * Verifies per-host request spacing with a fake clock, and robots.txt rules
 * with injected robots.txt text (no network).
 */

import { HostThrottle, RobotsGate } from '../src/politeness.js';
import assert from 'node:assert/strict';

console.log('Running politeness tests...\n');

// ── Test 1: Same host is spaced, other hosts are not ─────────────────────────
{
    let now = 0;
    const sleeps: number[] = [];
    const throttle = new HostThrottle(1000, () => now, async (ms) => { sleeps.push(ms); });

    await throttle.wait('https://help.moengage.com/a');
    await throttle.wait('https://help.moengage.com/b');
    await throttle.wait('https://developers.moengage.com/c');
    assert.deepEqual(sleeps, [1000], 'Only the second request to the same host waits');

    now = 5000;
    await throttle.wait('https://help.moengage.com/d');
    assert.deepEqual(sleeps, [1000], 'No wait once the delay has elapsed');
    console.log('✓ Test 1 passed: per-host spacing');
}

// ── Test 2: Concurrent callers queue in slots ────────────────────────────────
{
    const sleeps: number[] = [];
    const throttle = new HostThrottle(500, () => 0, async (ms) => { sleeps.push(ms); });
    await Promise.all([1, 2, 3].map(i => throttle.wait(`https://help.moengage.com/${i}`)));
    assert.deepEqual(sleeps, [500, 1000]);
    console.log('✓ Test 2 passed: concurrent requests reserve successive slots');
}

// ── Test 3: A larger minimum delay wins ──────────────────────────────────────
{
    const sleeps: number[] = [];
    const throttle = new HostThrottle(100, () => 0, async (ms) => { sleeps.push(ms); });
    await throttle.wait('https://help.moengage.com/a', 2000);
    await throttle.wait('https://help.moengage.com/b');
    assert.deepEqual(sleeps, [2000]);
    console.log('✓ Test 3 passed: crawl-delay overrides a shorter configured delay');
}

// ── Test 4: robots.txt rules and crawl delay ─────────────────────────────────
{
    const fetched: string[] = [];
    const gate = new RobotsGate(async (robotsUrl) => {
        fetched.push(robotsUrl);
        return 'User-agent: *\nDisallow: /hc/en-us/articles/999\nCrawl-delay: 2\n';
    });

    assert.equal(await gate.isAllowed('https://help.moengage.com/hc/en-us/articles/1-Open'), true);
    assert.equal(await gate.isAllowed('https://help.moengage.com/hc/en-us/articles/999-Private'), false);
    assert.equal(await gate.crawlDelayMs('https://help.moengage.com/hc/en-us/articles/1-Open'), 2000);
    assert.deepEqual(fetched, ['https://help.moengage.com/robots.txt'], 'robots.txt fetched once per origin');
    console.log('✓ Test 4 passed: disallow rule and crawl-delay honoured, cache reused');
}

// ── Test 5: Missing robots.txt allows everything ─────────────────────────────
{
    const gate = new RobotsGate(async () => null);
    assert.equal(await gate.isAllowed('https://partners.moengage.com/hc/en-us/articles/1-A'), true);
    assert.equal(await gate.crawlDelayMs('https://partners.moengage.com/hc/en-us/articles/1-A'), undefined);
    console.log('✓ Test 5 passed: no robots.txt → allowed, no crawl delay');
}

console.log('\n✅ All politeness tests passed!');
