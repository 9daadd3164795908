/**
 * Shared data model for the article pipeline.
 *
 * Discovery produces canonical article URLs; extraction turns each one into
 * an {@link Article} whose sections are keyed by top-level headings.
 */

/** An href exactly as found on a page: relative, absolute or a pseudo-URL. */
export type RawLink = string;

/** An anchor on a listing page: its raw href and visible label. */
export interface AnchorLink {
    href: RawLink;
    text: string;
}

/** Absolute URL that passed the prefix allowlist. */
export type CanonicalArticleUrl = string;

export type ArticleSource = 'help' | 'developers' | 'partners';

export interface DiscoveredArticle {
    url: CanonicalArticleUrl;
    /** Text of the first non-empty anchor that linked to the URL, or ''. */
    title: string;
    /** Null when the URL matched a caller-supplied prefix outside the known sources. */
    source: ArticleSource | null;
}

export type ContentBlock =
    | { kind: 'text'; value: string }
    | { kind: 'image'; src: string };

export interface Section {
    heading: string;
    blocks: ContentBlock[];
}

/**
 * A direct child of the body container, materialized out of the DOM.
 * Heading breaks start a new section; everything else contributes blocks.
 */
export type BodyChild =
    | { kind: 'heading'; tag: string; text: string }
    | { kind: 'block'; tag: string; text: string; images: string[] };

export interface Article {
    url: string;
    /** `"[No Title Found]"` when no title element matched. */
    title: string;
    /** False when the body container was missing; `sections` is then empty. */
    hasBody: boolean;
    sections: Section[];
    wordCount: number;
    /** `datetime` of the page's first `<time>` element, or ''. */
    lastModified: string;
    breadcrumbs: string[];
}

export type FailureKind = 'navigation' | 'extraction' | 'disallowed';

export type ExtractionResult =
    | { url: string; success: true; article: Article; extractedAt: string }
    | { url: string; success: false; error: { kind: FailureKind; message: string }; extractedAt: string };
