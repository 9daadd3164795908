import fs from 'fs';
import assert from 'node:assert/strict';
import type { Article, ExtractionResult } from '../../src/types.js';

const FIXTURES = new URL('../fixtures/', import.meta.url);

export function fixture(name: string): string {
    return fs.readFileSync(new URL(name, FIXTURES), 'utf-8');
}

/** Wraps body markup in a help-center article page. */
export function articlePage(title: string, bodyHtml: string): string {
    return `<!doctype html><html><head><title>${title}</title></head><body>
<h1 class="article-title">${title}</h1>
<div class="article-body">${bodyHtml}</div>
</body></html>`;
}

/** Unwraps a successful result, failing the test otherwise. */
export function articleOf(result: ExtractionResult): Article {
    if (!result.success) {
        throw new assert.AssertionError({ message: `Expected ${result.url} to succeed, got ${result.error.kind}: ${result.error.message}` });
    }
    return result.article;
}
