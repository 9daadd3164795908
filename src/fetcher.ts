import { HELP_CENTER_SELECTORS, parseArticleHtml, type ArticleParser, type ArticleSelectors } from './extract.js';
import { NavigationError } from './errors.js';
import { loadPage, type NavigationTimeouts, type RenderedPage } from './navigation.js';
import { INTRO_HEADING } from './segmenter.js';
import type { Article, CanonicalArticleUrl } from './types.js';

export interface FetchOptions extends NavigationTimeouts {
    selectors?: ArticleSelectors;
    introHeading?: string;
    /** Defaults to {@link parseArticleHtml}. */
    parse?: ArticleParser;
}

/**
 * Loads one article and segments its body.
 *
 * Callers should check `article.hasBody` before treating an empty
 * `sections` list as an article without headings.
 */
export async function fetchArticle(
    page: RenderedPage,
    url: CanonicalArticleUrl,
    options: FetchOptions,
): Promise<Article> {
    await loadPage(page, url, options);

    let html: string;
    try {
        html = await page.content();
    } catch (err) {
        // The page can navigate away (client-side redirect) between idle and read.
        throw new NavigationError(url, err);
    }

    const parse = options.parse ?? parseArticleHtml;
    return parse(
        html,
        url,
        options.selectors ?? HELP_CENTER_SELECTORS,
        options.introHeading ?? INTRO_HEADING,
    );
}
