import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { load } from 'cheerio';

import { minifyHtml, serializeDocument } from '../src/serializer.js';

describe('minifyHtml', () => {
  it('collapses whitespace and drops redundant type attributes', () => {
    const html = [
      '<html>',
      '  <head>',
      '    <script type="text/javascript" src="a.js"></script>',
      '    <link type="text/css" rel="stylesheet" href="s.css">',
      '  </head>',
      '  <body>',
      '    <!-- HEADER -->',
      '    <!-- remove me -->',
      '    <p>Hello    world</p>',
      '  </body>',
      '</html>',
      '',
    ].join('\n');

    assert.equal(
      minifyHtml(html),
      '<html><head><script src="a.js"></script><link rel="stylesheet" href="s.css"></head>' +
        '<body><!-- HEADER --><p>Hello world</p></body></html>'
    );
  });

  it('keeps only comments that open with a structural marker', () => {
    assert.equal(
      minifyHtml('<p>a</p><!-- the MAIN area --><!--SECTION--><!--\nmulti\nline\n-->'),
      '<p>a</p><!--SECTION-->'
    );
  });
});

describe('serializeDocument', () => {
  it('minifies the serialized tree in minified mode', async () => {
    const $ = load('<html><head></head><body>\n  <p>x</p>\n</body></html>');
    assert.equal(
      await serializeDocument($, 'minified'),
      '<html><head></head><body><p>x</p></body></html>'
    );
  });

  it('pretty-prints in readable mode', async () => {
    const $ = load(
      '<html><head><title>x</title></head><body><p>Hi</p></body></html>'
    );
    assert.equal(
      await serializeDocument($, 'readable'),
      [
        '<html>',
        '  <head>',
        '    <title>x</title>',
        '  </head>',
        '  <body>',
        '    <p>Hi</p>',
        '  </body>',
        '</html>',
        '',
      ].join('\n')
    );
  });
});
