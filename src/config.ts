import os from 'os';
import path from 'path';

export interface ScraperConfig {
    entryUrl: string;
    dbPath: string;
    navigationTimeoutMs: number;
    idleTimeoutMs: number;
    delayMs: number;
    maxRetries: number;
    retryBackoffMs: number;
    concurrency: number;
    headless: boolean;
    userAgent: string;
    respectRobots: boolean;
    headingTags: string[];
}

const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

// Stored in the user's home directory so the URL list survives reinstalls.
const DEFAULT_DB_PATH = path.join(os.homedir(), '.help-center-scraper', 'articles.db');

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
    const raw = env[name]?.trim();
    if (!raw) return fallback;
    if (!/^-?\d+$/.test(raw)) {
        throw new Error(`${name} must be an integer, got "${raw}"`);
    }
    const value = Number(raw);
    if (value < min) {
        throw new Error(`${name} must be >= ${min}, got ${value}`);
    }
    return value;
}

function readBool(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
    const raw = env[name]?.trim().toLowerCase();
    if (!raw) return fallback;
    if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
    if (['0', 'false', 'no', 'off'].includes(raw)) return false;
    throw new Error(`${name} must be a boolean, got "${env[name]}"`);
}

function readUrl(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
    const raw = env[name]?.trim();
    if (!raw) return fallback;
    try {
        return new URL(raw).href;
    } catch {
        throw new Error(`${name} must be an absolute URL, got "${raw}"`);
    }
}

/**
 * Builds the scraper configuration from environment variables
 * (see .env.example). Malformed values throw instead of falling back.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScraperConfig {
    const headingTags = (env.SCRAPER_HEADING_TAGS ?? 'h2')
        .split(',')
        .map(t => t.trim().toLowerCase())
        .filter(Boolean);

    return {
        entryUrl: readUrl(env, 'SCRAPER_ENTRY_URL', 'https://help.moengage.com/hc/en-us'),
        dbPath: env.SCRAPER_DB_PATH?.trim() || DEFAULT_DB_PATH,
        navigationTimeoutMs: readInt(env, 'SCRAPER_NAVIGATION_TIMEOUT_MS', 30_000, 1),
        idleTimeoutMs: readInt(env, 'SCRAPER_IDLE_TIMEOUT_MS', 20_000, 1),
        delayMs: readInt(env, 'SCRAPER_DELAY_MS', 1000, 0),
        maxRetries: readInt(env, 'SCRAPER_MAX_RETRIES', 0, 0),
        retryBackoffMs: readInt(env, 'SCRAPER_RETRY_BACKOFF_MS', 2000, 0),
        concurrency: readInt(env, 'SCRAPER_CONCURRENCY', 1, 1),
        headless: readBool(env, 'SCRAPER_HEADLESS', true),
        userAgent: env.SCRAPER_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
        respectRobots: readBool(env, 'SCRAPER_RESPECT_ROBOTS', true),
        headingTags: headingTags.length > 0 ? headingTags : ['h2'],
    };
}
