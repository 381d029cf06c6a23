import type { CheerioAPI } from 'cheerio';

import { logInfo } from './observability.js';

export type SemanticTag =
  | 'header'
  | 'footer'
  | 'main'
  | 'section'
  | 'nav'
  | 'article';

export interface ContainerSignature {
  /** Class tokens joined by single spaces, lower-cased. */
  readonly classes: string;
  readonly id: string;
}

export interface SemanticRule {
  readonly tag: SemanticTag;
  readonly keywords: readonly string[];
  matches(signature: ContainerSignature): boolean;
}

function keywordRule(
  tag: SemanticTag,
  keywords: readonly string[]
): SemanticRule {
  return {
    tag,
    keywords,
    matches: ({ classes, id }) =>
      keywords.some(
        (keyword) => classes.includes(keyword) || id.includes(keyword)
      ),
  };
}

/** Evaluated top to bottom; the first matching rule decides. */
export const SEMANTIC_RULES: readonly SemanticRule[] = [
  keywordRule('header', ['header', 'top', 'masthead']),
  keywordRule('footer', ['footer', 'bottom']),
  keywordRule('main', ['main', 'content', 'primary']),
  keywordRule('section', ['section', 'block']),
  keywordRule('nav', ['nav', 'menu', 'navigation']),
  keywordRule('article', ['article', 'post', 'entry']),
];

export function buildSignature(
  classAttr: string | undefined,
  idAttr: string | undefined
): ContainerSignature {
  const classes = (classAttr ?? '')
    .split(/\s+/)
    .filter((token) => token.length > 0)
    .join(' ')
    .toLowerCase();
  return { classes, id: (idAttr ?? '').toLowerCase() };
}

export function resolveSemanticTag(
  signature: ContainerSignature,
  rules: readonly SemanticRule[] = SEMANTIC_RULES
): SemanticTag | undefined {
  return rules.find((rule) => rule.matches(signature))?.tag;
}

/** Renames matching `div`s in place; returns how many were converted. */
export function classifyDocument(
  $: CheerioAPI,
  rules: readonly SemanticRule[] = SEMANTIC_RULES
): number {
  let conversions = 0;

  for (const div of $('div').toArray()) {
    const signature = buildSignature(div.attribs['class'], div.attribs['id']);
    const tag = resolveSemanticTag(signature, rules);
    if (!tag) continue;
    div.name = tag;
    conversions++;
  }

  logInfo('Semantic conversion finished', { conversions });
  return conversions;
}
