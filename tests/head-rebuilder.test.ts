import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { load } from 'cheerio';

import { rebuildHead } from '../src/head-rebuilder.js';

const STYLESHEET = '<link rel="stylesheet" href="styles/styles.css">';

describe('rebuildHead', () => {
  it('keeps title, viewport and description in a fixed order', () => {
    const $ = load(
      [
        '<html><head>',
        '<meta charset="ISO-8859-1">',
        '<link rel="icon" href="favicon.ico">',
        '<meta name="description" content="About us">',
        '<title> My Page </title>',
        '<meta name="viewport" content="width=500">',
        '<meta property="og:title" content="ignored">',
        '</head><body><p>x</p></body></html>',
      ].join('')
    );
    rebuildHead($);

    assert.equal(
      $('head').html(),
      '<meta charset="utf-8"><title>My Page</title>' +
        '<meta name="viewport" content="width=500">' +
        '<meta name="description" content="About us">' +
        STYLESHEET
    );
  });

  it('fills in a default title and viewport and never invents a description', () => {
    const $ = load('<html><head></head><body></body></html>');
    rebuildHead($);

    assert.equal(
      $('head').html(),
      '<meta charset="utf-8"><title>Untitled Document</title>' +
        '<meta name="viewport" content="width=device-width, initial-scale=1.0">' +
        STYLESHEET
    );
  });

  it('treats a blank title as missing', () => {
    const $ = load('<title>   </title><p>x</p>');
    rebuildHead($);
    assert.equal($('title').text(), 'Untitled Document');
  });

  it('moves head style blocks to the start of the body', () => {
    const $ = load(
      '<html><head><style>a{color:red}</style></head><body><p>x</p></body></html>'
    );
    rebuildHead($);

    assert.equal($('head style').length, 0);
    assert.equal($('body').html(), '<style>a{color:red}</style><p>x</p>');
  });

  it('creates a head when the document has none', () => {
    const $ = load('<p>x</p>', null, false);
    rebuildHead($);

    assert.equal($('head').length, 1);
    assert.equal($('head link[rel="stylesheet"]').attr('href'), 'styles/styles.css');
    assert.equal($.root().children().first().is('head'), true);
  });
});
