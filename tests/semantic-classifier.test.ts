import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { load } from 'cheerio';

import {
  SEMANTIC_RULES,
  buildSignature,
  classifyDocument,
  resolveSemanticTag,
} from '../src/semantic-classifier.js';

function bodyHtml(html: string): string {
  const $ = load(`<body>${html}</body>`);
  classifyDocument($);
  return $('body').html() ?? '';
}

describe('classifyDocument', () => {
  it('turns a header-like div into <header>', () => {
    assert.equal(
      bodyHtml('<div class="site-header"><p>Hi</p></div>'),
      '<header class="site-header"><p>Hi</p></header>'
    );
  });

  it('matches on the id as well as the classes', () => {
    assert.equal(
      bodyHtml('<div id="Footer-Links">x</div>'),
      '<footer id="Footer-Links">x</footer>'
    );
  });

  it('lets the first rule in table order win', () => {
    // "top" (header) is checked before "content" (main)
    assert.equal(
      bodyHtml('<div class="content top-bar">x</div>'),
      '<header class="content top-bar">x</header>'
    );
  });

  it('counts conversions and leaves unmatched and non-div elements alone', () => {
    const $ = load(
      '<body><div class="post-list">a</div><div class="wrapper">b</div><span class="header">c</span><div class="MENU">d</div></body>'
    );
    assert.equal(classifyDocument($), 2);
    assert.equal($('article.post-list').length, 1);
    assert.equal($('div.wrapper').length, 1);
    assert.equal($('span.header').length, 1);
    assert.equal($('nav.MENU').length, 1);
  });
});

describe('resolveSemanticTag', () => {
  it('uses substring matching on the joined class list', () => {
    const signature = buildSignature('  Blocky   Thing ', undefined);
    assert.deepEqual(signature, { classes: 'blocky thing', id: '' });
    assert.equal(resolveSemanticTag(signature), 'section');
  });

  it('returns undefined when nothing matches', () => {
    assert.equal(
      resolveSemanticTag(buildSignature('wrapper', 'page')),
      undefined
    );
  });

  it('accepts a custom rule table', () => {
    const [, footerRule] = SEMANTIC_RULES;
    assert.ok(footerRule);
    assert.equal(
      resolveSemanticTag(buildSignature('site-header bottom', ''), [
        footerRule,
      ]),
      'footer'
    );
  });
});
