/**
 * Test: Section segmenter
 *
 * Verifies heading-driven segmentation over materialized body children:
 * intro handling, empty-heading suppression, block order and image blocks.
 */

import { INTRO_HEADING, segmentSections } from '../src/segmenter.js';
import type { BodyChild } from '../src/types.js';
import assert from 'node:assert/strict';

console.log('Running segmenter tests...\n');

const h2 = (text: string): BodyChild => ({ kind: 'heading', tag: 'h2', text });
const p = (text: string, images: string[] = []): BodyChild => ({ kind: 'block', tag: 'p', text, images });
const div = (images: string[], text = ''): BodyChild => ({ kind: 'block', tag: 'div', text, images });

// ── Test 1: Intro, headings and an image-only block ──────────────────────────
{
    const sections = segmentSections([
        p('Intro text'),
        h2('Setup'),
        p('Step1'),
        div(['x.png']),
        h2('FAQ'),
        p('Q1'),
    ]);
    assert.deepEqual(sections, [
        { heading: INTRO_HEADING, blocks: [{ kind: 'text', value: 'Intro text' }] },
        { heading: 'Setup', blocks: [{ kind: 'text', value: 'Step1' }, { kind: 'image', src: 'x.png' }] },
        { heading: 'FAQ', blocks: [{ kind: 'text', value: 'Q1' }] },
    ]);
    console.log('✓ Test 1 passed: intro + two headed sections, image block in order');
}

// ── Test 2: No intro section when the body opens with a heading ──────────────
{
    const sections = segmentSections([h2('Overview'), p('Body')]);
    assert.deepEqual(sections, [{ heading: 'Overview', blocks: [{ kind: 'text', value: 'Body' }] }]);
    console.log('✓ Test 2 passed: leading heading suppresses the empty intro');
}

// ── Test 3: Consecutive headings produce a section only for the last ─────────
{
    const sections = segmentSections([p('Lead'), h2('Empty'), h2('Full'), p('Content'), h2('Trailing')]);
    assert.deepEqual(sections.map(s => s.heading), [INTRO_HEADING, 'Full']);
    console.log('✓ Test 3 passed: headings without content before the next boundary are dropped');
}

// ── Test 4: Heading order mirrors document order ─────────────────────────────
{
    const names = ['Alpha', 'Bravo', 'Charlie', 'Delta', 'Echo'];
    const children = names.flatMap(n => [h2(n), p(`${n} body`)]);
    assert.deepEqual(segmentSections(children).map(s => s.heading), names);
    console.log('✓ Test 4 passed: section order matches heading order');
}

// ── Test 5: Image independence from text ────────────────────────────────────
{
    const sections = segmentSections([h2('Screens'), div(['shot.png'], '   \n  ')]);
    assert.deepEqual(sections, [{ heading: 'Screens', blocks: [{ kind: 'image', src: 'shot.png' }] }]);
    console.log('✓ Test 5 passed: whitespace-only element with an image yields one image block');
}

// ── Test 6: Text then every non-empty image, in element order ────────────────
{
    const sections = segmentSections([p('  Caption  ', ['a.png', '', '  ', 'b.png'])]);
    assert.deepEqual(sections, [{
        heading: INTRO_HEADING,
        blocks: [
            { kind: 'text', value: 'Caption' },
            { kind: 'image', src: 'a.png' },
            { kind: 'image', src: 'b.png' },
        ],
    }]);
    console.log('✓ Test 6 passed: text trimmed, empty srcs skipped');
}

// ── Test 7: Degenerate inputs ────────────────────────────────────────────────
{
    assert.deepEqual(segmentSections([]), []);
    assert.deepEqual(segmentSections([h2('Only heading')]), []);
    assert.deepEqual(segmentSections([p(''), div([])]), []);
    assert.deepEqual(
        segmentSections([p('No headings'), p('at all')], 'Intro…'),
        [{ heading: 'Intro…', blocks: [{ kind: 'text', value: 'No headings' }, { kind: 'text', value: 'at all' }] }],
    );
    assert.equal(segmentSections([h2('  Padded  '), p('x')])[0].heading, 'Padded');
    console.log('✓ Test 7 passed: empty bodies, custom intro label, trimmed headings');
}

console.log('\n✅ All segmenter tests passed!');
