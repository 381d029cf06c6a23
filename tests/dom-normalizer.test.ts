import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { load } from 'cheerio';

import {
  findComments,
  hasStructuralMarker,
  normalizeDocument,
} from '../src/dom-normalizer.js';

describe('normalizeDocument', () => {
  it('keeps only comments that carry a structural marker', () => {
    const $ = load(
      '<body><!-- HEADER start --><p>Hi</p><!-- tracking pixel --><!-- main --></body>'
    );
    const report = normalizeDocument($);

    assert.equal(report.commentsRemoved, 2);
    assert.deepEqual(
      findComments($).map((comment) => comment.data),
      [' HEADER start ']
    );
  });

  it('removes empty div, span and p elements in a single pass', () => {
    const $ = load(
      '<body><div id="outer"><span>  </span></div><p></p><div><img src="a.png"></div><p>text</p></body>'
    );
    const report = normalizeDocument($);

    assert.equal(report.emptyRemoved, 2);
    assert.equal($('span').length, 0);
    // emptied by the removal of its child, but not revisited
    assert.equal($('#outer').length, 1);
    assert.equal($('img').length, 1);
    assert.equal($('p').text(), 'text');
  });

  it('removes an empty element even when it carries a style', () => {
    const $ = load('<body><p style="color:red"></p><p>kept</p></body>');
    normalizeDocument($);
    assert.equal($('[style]').length, 0);
    assert.equal($('p').length, 1);
  });

  it('removes inline scripts and keeps external ones', () => {
    const $ = load(
      '<head><script>track()</script><script src="app.js"></script></head><body><script src="">x()</script></body>'
    );
    const report = normalizeDocument($);

    assert.equal(report.scriptsRemoved, 2);
    assert.deepEqual(
      $('script')
        .toArray()
        .map((script) => script.attribs['src']),
      ['app.js']
    );
  });

  it('keeps charset, viewport, description and Open Graph meta only', () => {
    const $ = load(
      [
        '<head>',
        '<meta charset="utf-8">',
        '<meta name="viewport" content="width=device-width">',
        '<meta name="description" content="d">',
        '<meta property="og:title" content="t">',
        '<meta name="generator" content="x">',
        '<meta http-equiv="refresh" content="5">',
        '<meta name="Description" content="case differs">',
        '</head>',
      ].join('')
    );
    const report = normalizeDocument($);

    assert.equal(report.metaRemoved, 3);
    assert.equal($('meta').length, 4);
    assert.equal($('meta[property="og:title"]').length, 1);
  });

  it('renames b and i while keeping attributes and children', () => {
    const $ = load(
      '<body><p><b class="x">bold <i>both</i></b> and <i>it</i></p></body>'
    );
    const report = normalizeDocument($);

    assert.equal(report.tagsRenamed, 3);
    assert.equal(
      $('p').html(),
      '<strong class="x">bold <em>both</em></strong> and <em>it</em>'
    );
  });
});

describe('hasStructuralMarker', () => {
  it('is a case-sensitive substring test', () => {
    assert.equal(hasStructuralMarker(' SECTION: pricing '), true);
    assert.equal(hasStructuralMarker('footer'), false);
  });
});
