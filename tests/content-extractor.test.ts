import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  type ContentExtractionEngine,
  DEFAULT_CONTENT_ROOT_OPTIONS,
  contentRootEngine,
  createContentRootEngine,
  extractMainContent,
  readabilityEngine,
} from '../src/content-extractor.js';

const SENTENCE = 'The quick brown fox jumps over the lazy dog, then rests. ';
const LONG = SENTENCE.repeat(4).trim();

function page(body: string): string {
  return `<html><head><title>t</title></head><body>${body}</body></html>`;
}

function engine(
  name: string,
  extract: (html: string) => string | null
): ContentExtractionEngine {
  return { name, extract };
}

describe('contentRootEngine', () => {
  it('returns the inner HTML of the first known content root', () => {
    const html = page(
      `<nav>Home | About</nav><article><h1>Title</h1><p>${LONG}</p></article><aside>ads</aside>`
    );
    assert.equal(
      contentRootEngine.extract(html),
      `<h1>Title</h1><p>${LONG}</p>`
    );
  });

  it('falls back to the block with the most paragraph text', () => {
    const html = page(
      `<div class="wrap"><div id="a"><p>short</p></div><div id="b"><p>${LONG}</p><p>${LONG}</p></div></div>`
    );
    assert.equal(
      contentRootEngine.extract(html),
      `<p>${LONG}</p><p>${LONG}</p>`
    );
  });

  it('drops reader comment sections', () => {
    const html = page(
      `<article><p>${LONG}</p><section id="comments"><p>first!</p></section></article>`
    );
    assert.equal(contentRootEngine.extract(html), `<p>${LONG}</p>`);
  });

  it('drops images when told to', () => {
    const noImages = createContentRootEngine({
      ...DEFAULT_CONTENT_ROOT_OPTIONS,
      includeImages: false,
    });
    const html = page(`<main><img src="a.png"><p>${LONG}</p></main>`);
    assert.equal(noImages.extract(html), `<p>${LONG}</p>`);
  });

  it('can return text instead of HTML', () => {
    const textOnly = createContentRootEngine({
      ...DEFAULT_CONTENT_ROOT_OPTIONS,
      output: 'text',
    });
    const html = page(`<article><h1>Title</h1><p>${LONG}</p></article>`);
    assert.equal(textOnly.extract(html), `Title${LONG}`);
  });

  it('returns null when no block carries enough text', () => {
    assert.equal(contentRootEngine.extract(page('<div><p>tiny</p></div>')), null);
  });
});

describe('readabilityEngine', () => {
  it('extracts the article body from a full page', () => {
    const paragraphs = Array.from(
      { length: 6 },
      (_, index) => `<p>Paragraph ${index}: ${SENTENCE.repeat(5)}</p>`
    ).join('');
    const html = page(
      `<header><a href="/">Site</a></header><div class="story">${paragraphs}</div><footer>(c) Site</footer>`
    );

    const content = readabilityEngine.extract(html);
    assert.ok(content);
    assert.ok(content.includes('Paragraph 3: The quick brown fox'));
  });
});

describe('extractMainContent', () => {
  it('returns the first non-empty engine result', () => {
    const calls: string[] = [];
    const engines = [
      engine('throws', () => {
        calls.push('throws');
        throw new Error('boom');
      }),
      engine('empty', () => {
        calls.push('empty');
        return '   ';
      }),
      engine('works', () => {
        calls.push('works');
        return '<p>ok</p>';
      }),
      engine('unused', () => {
        calls.push('unused');
        return '<p>never</p>';
      }),
    ];

    assert.equal(extractMainContent('<p>x</p>', engines), '<p>ok</p>');
    assert.deepEqual(calls, ['throws', 'empty', 'works']);
  });

  it('returns null when every engine fails', () => {
    const engines = [
      engine('none', () => null),
      engine('throws', () => {
        throw new Error('boom');
      }),
    ];
    assert.equal(extractMainContent('<p>x</p>', engines), null);
  });
});
