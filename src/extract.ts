import { JSDOM } from 'jsdom';
import { ExtractionError } from './errors.js';
import { INTRO_HEADING, segmentSections } from './segmenter.js';
import type { AnchorLink, Article, BodyChild, RawLink } from './types.js';

// ── Selectors ──────────────────────────────────────────────────────────────────

export interface ArticleSelectors {
    /** Tried top-to-bottom; the first match with non-empty text wins. */
    title: string[];
    /** Tried top-to-bottom; the first match is the body container. */
    body: string[];
    breadcrumbs: string;
    /** Lower-case tag names that start a new section. */
    headingTags: string[];
}

/** Zendesk help-center article layout. */
export const HELP_CENTER_SELECTORS: ArticleSelectors = {
    title: ['h6.article-title', 'h1.article-title', '.article-title', 'h1', '.page-title'],
    body: ['div.article__body', '.article-body', '.content'],
    breadcrumbs: '.breadcrumbs a, nav a',
    headingTags: ['h2'],
};

export const NO_TITLE = '[No Title Found]';

/** Removed from the body before it is segmented. */
const NOISE_SELECTORS = ['script', 'style', 'noscript'];

// ── Links ──────────────────────────────────────────────────────────────────────

/**
 * Returns every anchor with an `href` attribute in document order: the href
 * exactly as written and the anchor's trimmed text.
 */
export function extractAnchors(html: string): AnchorLink[] {
    const dom = new JSDOM(html);
    try {
        const anchors: AnchorLink[] = [];
        dom.window.document.querySelectorAll('a').forEach(anchor => {
            const href = anchor.getAttribute('href');
            if (href !== null) anchors.push({ href, text: anchor.textContent?.trim() ?? '' });
        });
        return anchors;
    } finally {
        dom.window.close();
    }
}

/** Every anchor's `href` value in document order; anchors without one are skipped. */
export function extractRawLinks(html: string): RawLink[] {
    return extractAnchors(html).map(a => a.href);
}

// ── Body children ──────────────────────────────────────────────────────────────

export interface ChildSnapshot {
    tag: string;
    text: string;
    images: string[];
}

/** Reads the tag, text and image sources of one body child. */
export function snapshotChild(el: Element): ChildSnapshot {
    const images: Element[] = Array.from(el.querySelectorAll('img'));
    if (el.tagName.toLowerCase() === 'img') images.unshift(el);
    return {
        tag: el.tagName,
        text: el.textContent ?? '',
        images: images.map(img => img.getAttribute('src') ?? ''),
    };
}

/**
 * Classifies a snapshot as a heading break or a content block. Any tag name
 * is accepted (`o:p`, custom elements); only a snapshot without one makes the
 * whole article unextractable.
 */
export function classifyChild(
    snapshot: ChildSnapshot,
    headingTags: readonly string[],
    url: string,
): BodyChild {
    const tag = snapshot.tag.trim().toLowerCase();
    if (!tag) {
        throw new ExtractionError(url, `Unreadable tag name ${JSON.stringify(snapshot.tag)} in body of ${url}`);
    }
    if (headingTags.includes(tag)) {
        return { kind: 'heading', tag, text: snapshot.text.trim() };
    }
    return { kind: 'block', tag, text: snapshot.text, images: snapshot.images };
}

/**
 * Materializes the container's direct element children, in order, so the
 * segmenter never touches the live DOM.
 */
export function materializeChildren(
    body: Element,
    headingTags: readonly string[],
    url: string,
): BodyChild[] {
    for (const selector of NOISE_SELECTORS) {
        body.querySelectorAll(selector).forEach(el => el.remove());
    }
    return Array.from(body.children, el => classifyChild(snapshotChild(el), headingTags, url));
}

// ── Article ────────────────────────────────────────────────────────────────────

/** Turns rendered HTML into an {@link Article}. */
export type ArticleParser = (
    html: string,
    url: string,
    selectors: ArticleSelectors,
    introHeading: string,
) => Article;

/**
 * Builds an {@link Article} from rendered HTML.
 *
 * Missing elements are data, not errors: no title element gives
 * {@link NO_TITLE}, no body container gives `hasBody: false` with no sections.
 *
 * @param html The rendered page HTML (from Playwright).
 * @param url  The article URL, used as the document URL.
 */
export function parseArticleHtml(
    html: string,
    url: string,
    selectors: ArticleSelectors = HELP_CENTER_SELECTORS,
    introHeading: string = INTRO_HEADING,
): Article {
    const dom = new JSDOM(html, { url });
    try {
        const document = dom.window.document;

        let title = NO_TITLE;
        for (const selector of selectors.title) {
            const text = document.querySelector(selector)?.textContent?.trim();
            if (text) {
                title = text;
                break;
            }
        }

        const breadcrumbs = Array.from(document.querySelectorAll(selectors.breadcrumbs))
            .map(a => a.textContent?.trim() ?? '')
            .filter(Boolean);
        const lastModified = document.querySelector('time')?.getAttribute('datetime') ?? '';

        const body = findFirst(document, selectors.body);
        if (!body) {
            return { url, title, hasBody: false, sections: [], wordCount: 0, lastModified, breadcrumbs };
        }

        const children = materializeChildren(body, selectors.headingTags, url);
        const fullText = body.textContent?.trim() ?? '';
        return {
            url,
            title,
            hasBody: true,
            sections: segmentSections(children, introHeading),
            wordCount: fullText ? fullText.split(/\s+/).length : 0,
            lastModified,
            breadcrumbs,
        };
    } finally {
        dom.window.close();
    }
}

function findFirst(document: Document, selectors: readonly string[]): Element | null {
    for (const selector of selectors) {
        const el = document.querySelector(selector);
        if (el) return el;
    }
    return null;
}
