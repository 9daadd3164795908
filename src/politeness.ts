/**
 * Keeps the crawler from hammering a help center. {@link HostThrottle} holds
 * successive article loads on one hostname apart; {@link RobotsGate} refuses
 * URLs that the site's robots.txt disallows and reports its Crawl-delay.
 */

import { createRequire } from 'module';

/** The parts of a robots-parser result the gate reads. */
interface ParsedRobots {
    isAllowed(url: string, ua?: string): boolean | undefined;
    getCrawlDelay(ua?: string): number | undefined;
}

// robots-parser is a CommonJS module exporting a single function.
const loadCommonJs = createRequire(import.meta.url);
const parseRobots: (robotsUrl: string, body: string) => ParsedRobots = loadCommonJs('robots-parser');

export const ROBOTS_USER_AGENT = 'help-center-scraper/1.0';

/** Returns the body of a robots.txt, or null when there is none to honour. */
export type RobotsFetcher = (robotsUrl: string) => Promise<string | null>;

export const fetchRobotsText: RobotsFetcher = async (robotsUrl) => {
    try {
        const res = await fetch(robotsUrl, {
            headers: { 'User-Agent': ROBOTS_USER_AGENT },
            signal: AbortSignal.timeout(5000),
        });
        return res.ok ? await res.text() : null;
    } catch (err) {
        process.stderr.write(`[robots] ${robotsUrl} unreachable, allowing all: ${err}\n`);
        return null;
    }
};

export class RobotsGate {
    // null: the origin serves no robots.txt
    private readonly cache = new Map<string, ParsedRobots | null>();

    constructor(private readonly fetchText: RobotsFetcher = fetchRobotsText) { }

    async isAllowed(url: string): Promise<boolean> {
        const robots = await this.robotsFor(url);
        if (!robots) return true;
        return robots.isAllowed(url, ROBOTS_USER_AGENT) !== false;
    }

    /** `Crawl-delay` for our agent (or `*`) in milliseconds, if declared. */
    async crawlDelayMs(url: string): Promise<number | undefined> {
        const robots = await this.robotsFor(url);
        const seconds = robots?.getCrawlDelay(ROBOTS_USER_AGENT) ?? robots?.getCrawlDelay('*');
        return seconds === undefined ? undefined : seconds * 1000;
    }

    private async robotsFor(url: string): Promise<ParsedRobots | null> {
        const { origin } = new URL(url);
        const cached = this.cache.get(origin);
        if (cached !== undefined) return cached;

        const robotsUrl = `${origin}/robots.txt`;
        const text = await this.fetchText(robotsUrl);
        const robots = text === null ? null : parseRobots(robotsUrl, text);
        this.cache.set(origin, robots);
        return robots;
    }
}

/**
 * Spaces requests to the same hostname at least `delayMs` apart. Slots are
 * reserved before sleeping, so concurrent callers queue up instead of all
 * waking at once.
 */
export class HostThrottle {
    private readonly nextSlot = new Map<string, number>();

    constructor(
        private readonly delayMs: number,
        private readonly now: () => number = Date.now,
        private readonly sleepFn: (ms: number) => Promise<void> = sleep,
    ) { }

    async wait(url: string, minDelayMs: number = 0): Promise<void> {
        const { hostname } = new URL(url);
        const delay = Math.max(this.delayMs, minDelayMs);
        const now = this.now();
        const slot = Math.max(now, this.nextSlot.get(hostname) ?? 0);
        this.nextSlot.set(hostname, slot + delay);
        if (slot > now) {
            await this.sleepFn(slot - now);
        }
    }
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
