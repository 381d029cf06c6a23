import { Readability } from '@mozilla/readability';
import { type Cheerio, type CheerioAPI, load } from 'cheerio';
import type { Element } from 'domhandler';
import { parseHTML } from 'linkedom';

import { getErrorMessage } from './errors.js';
import { logDebug, logInfo, logWarn } from './observability.js';

export interface ContentExtractionEngine {
  readonly name: string;
  /** An HTML (or text) fragment, or null when nothing usable was found. */
  extract(html: string): string | null;
}

export interface ContentRootOptions {
  readonly includeComments: boolean;
  readonly includeTables: boolean;
  readonly includeImages: boolean;
  readonly output: 'html' | 'text';
}

export const DEFAULT_CONTENT_ROOT_OPTIONS: ContentRootOptions = {
  includeComments: false,
  includeTables: true,
  includeImages: true,
  output: 'html',
};

const NON_CONTENT_SELECTOR =
  'script, style, noscript, template, iframe, nav, aside, form, button';

const READER_COMMENTS_SELECTOR = [
  '#comments',
  '.comments',
  '.comment-list',
  '.comments-area',
  '#disqus_thread',
  '[itemprop="comment"]',
].join(', ');

const CONTENT_ROOT_SELECTORS = [
  'article',
  'main',
  '[role="main"]',
  '#content',
  '#main-content',
  '.content',
  '.main-content',
  '.post-content',
  '.article-content',
  '.entry-content',
  '[itemprop="articleBody"]',
  '.post-body',
  '.article-body',
] as const;

const MIN_ROOT_HTML_LENGTH = 100;
const MIN_DENSITY_SCORE = 80;

/* -------------------------------------------------------------------------------------------------
 * Content-root engine (cheerio)
 * ------------------------------------------------------------------------------------------------- */

function stripNonContent($: CheerioAPI, options: ContentRootOptions): void {
  $(NON_CONTENT_SELECTOR).remove();
  if (!options.includeComments) $(READER_COMMENTS_SELECTOR).remove();
  if (!options.includeTables) $('table').remove();
  if (!options.includeImages) $('img, picture, figure').remove();
}

function findContentRoot($: CheerioAPI): Cheerio<Element> | undefined {
  for (const selector of CONTENT_ROOT_SELECTORS) {
    const candidate = $(selector).first();
    if (candidate.length === 0) continue;
    if ((candidate.html() ?? '').trim().length > MIN_ROOT_HTML_LENGTH) {
      return candidate;
    }
  }
  return undefined;
}

function paragraphDensity($: CheerioAPI, element: Element): number {
  let score = 0;
  $(element)
    .children('p')
    .each((_, paragraph) => {
      score += $(paragraph).text().trim().length;
    });
  return score;
}

function findDensestBlock($: CheerioAPI): Cheerio<Element> | undefined {
  let best: Element | undefined;
  let bestScore = MIN_DENSITY_SCORE - 1;

  for (const element of $('article, section, div').toArray()) {
    const score = paragraphDensity($, element);
    if (score > bestScore) {
      best = element;
      bestScore = score;
    }
  }
  return best ? $(best) : undefined;
}

function renderRoot(
  root: Cheerio<Element>,
  output: ContentRootOptions['output']
): string | null {
  const rendered =
    output === 'html' ? (root.html() ?? '').trim() : root.text().trim();
  return rendered.length > 0 ? rendered : null;
}

export function createContentRootEngine(
  options: ContentRootOptions = DEFAULT_CONTENT_ROOT_OPTIONS
): ContentExtractionEngine {
  return {
    name: 'content-root',
    extract(html) {
      const $ = load(html);
      stripNonContent($, options);
      const root = findContentRoot($) ?? findDensestBlock($);
      return root ? renderRoot(root, options.output) : null;
    },
  };
}

/* -------------------------------------------------------------------------------------------------
 * Readability engine (linkedom)
 * ------------------------------------------------------------------------------------------------- */

function isReadabilityCompatible(doc: unknown): doc is Document {
  return (
    typeof doc === 'object' &&
    doc !== null &&
    'documentElement' in doc &&
    Boolean(doc.documentElement) &&
    'querySelector' in doc &&
    typeof doc.querySelector === 'function' &&
    'querySelectorAll' in doc &&
    typeof doc.querySelectorAll === 'function'
  );
}

export const readabilityEngine: ContentExtractionEngine = {
  name: 'readability',
  extract(html) {
    const { document } = parseHTML(html);
    if (!isReadabilityCompatible(document)) {
      logDebug('Document not compatible with Readability');
      return null;
    }

    const article = new Readability(document, {
      maxElemsToParse: 20_000,
    }).parse();
    const content = article?.content;
    return typeof content === 'string' && content.trim().length > 0
      ? content
      : null;
  },
};

export const contentRootEngine = createContentRootEngine();

export const DEFAULT_ENGINES: readonly ContentExtractionEngine[] = [
  contentRootEngine,
  readabilityEngine,
];

/**
 * Tries each engine in turn; the first non-empty fragment wins. A throwing
 * or empty engine is logged and the next one is tried. Null when none
 * produced anything.
 */
export function extractMainContent(
  html: string,
  engines: readonly ContentExtractionEngine[] = DEFAULT_ENGINES
): string | null {
  for (const engine of engines) {
    try {
      const content = engine.extract(html);
      if (content !== null && content.trim().length > 0) {
        logInfo('Main content extracted', {
          engine: engine.name,
          length: content.length,
        });
        return content;
      }
      logWarn('Content extraction engine produced no output', {
        engine: engine.name,
      });
    } catch (error: unknown) {
      logWarn('Content extraction engine failed', {
        engine: engine.name,
        error: getErrorMessage(error),
      });
    }
  }
  return null;
}
