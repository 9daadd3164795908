/**
 * Heading-driven section segmenter.
 *
 * Walks the body container's direct children once, keeping a single
 * accumulator. A heading break flushes the accumulated blocks (if any) as a
 * section and renames the accumulator; every other child appends its text
 * and image blocks. Example:
 *
 *   p "Intro text" | h2 "Setup" | p "Step1" | div(img x.png) | h2 "FAQ" | p "Q1"
 *
 * produces
 *
 *   Introduction → [Text "Intro text"]
 *   Setup        → [Text "Step1", Image x.png]
 *   FAQ          → [Text "Q1"]
 *
 * A heading followed directly by another heading yields no section, and a
 * body that opens with a heading yields no intro section.
 */

import type { BodyChild, ContentBlock, Section } from './types.js';

export const INTRO_HEADING = 'Introduction';

export function segmentSections(
    children: readonly BodyChild[],
    introHeading: string = INTRO_HEADING,
): Section[] {
    const sections: Section[] = [];
    let heading = introHeading;
    let blocks: ContentBlock[] = [];

    for (const child of children) {
        switch (child.kind) {
            case 'heading':
                if (blocks.length > 0) {
                    sections.push({ heading, blocks });
                    blocks = [];
                }
                heading = child.text.trim();
                break;
            case 'block':
                blocks.push(...blocksOf(child));
                break;
        }
    }

    if (blocks.length > 0) {
        sections.push({ heading, blocks });
    }
    return sections;
}

/**
 * Text first (when non-empty), then one image block per non-empty `src`.
 * The image scan does not depend on whether the element had any text.
 */
function blocksOf(child: Extract<BodyChild, { kind: 'block' }>): ContentBlock[] {
    const blocks: ContentBlock[] = [];
    const text = child.text.trim();
    if (text) blocks.push({ kind: 'text', value: text });
    for (const src of child.images) {
        if (src.trim()) blocks.push({ kind: 'image', src });
    }
    return blocks;
}
