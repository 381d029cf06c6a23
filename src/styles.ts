import type { CheerioAPI } from 'cheerio';
import postcss, {
  type ChildNode,
  type Declaration,
  type Root,
  type Rule,
} from 'postcss';

import { parseDataImageUri, safeBase64Decode } from './codec.js';
import { shortFingerprint } from './crypto.js';
import { getErrorMessage } from './errors.js';
import {
  describeReference,
  logDebug,
  logInfo,
  logSkippedResource,
  logWarn,
} from './observability.js';
import type { ResourceStore } from './resource-store.js';

export const INLINE_CLASS_PREFIX = 'inline_';

/** Where images referenced from the stylesheet live, relative to it. */
export const CSS_IMAGE_BASE = '../images/';

// url(data:image/...;base64,...) with optional matching quotes.
const CSS_DATA_IMAGE_URL =
  /url\(\s*(['"]?)(data:image\/[^'")]*?;base64,[^'")]*)\1\s*\)/gi;

export function inlineClassName(style: string): string {
  return `${INLINE_CLASS_PREFIX}${shortFingerprint(style)}`;
}

// --- Extraction -------------------------------------------------------------

/**
 * Moves every `<style>` block and `style` attribute out of the tree. Inline
 * declarations become `.inline_<hash>` rules; elements get the class instead.
 */
export function extractStyles($: CheerioAPI): string {
  const blocks: string[] = [];
  const seenRules = new Set<string>();

  const styleElements = $('style');
  styleElements.each((_, element) => {
    const text = $(element).text();
    if (text.trim().length > 0) blocks.push(text);
  });
  const styleBlocks = styleElements.length;
  styleElements.remove();

  let inlineStyles = 0;
  $('[style]').each((_, element) => {
    const $element = $(element);
    const style = ($element.attr('style') ?? '').trim();
    $element.removeAttr('style');
    if (!style) return;

    inlineStyles++;
    const className = inlineClassName(style);
    $element.addClass(className);

    const rule = `.${className} {${style}}`;
    if (seenRules.has(rule)) return;
    seenRules.add(rule);
    blocks.push(rule);
  });

  logInfo('Styles extracted', {
    styleBlocks,
    inlineStyles,
    rules: seenRules.size,
  });
  return blocks.join('\n');
}

// --- Optimization -----------------------------------------------------------

interface MergedDeclaration {
  readonly prop: string;
  readonly value: string;
  readonly important: boolean;
}

interface MergedRule {
  readonly kind: 'rule';
  readonly selector: string;
  readonly declarations: Map<string, MergedDeclaration>;
  /** Nested rules and at-rules, kept as written, after the declarations. */
  readonly nested: string[];
}

interface VerbatimNode {
  readonly kind: 'verbatim';
  readonly text: string;
}

type SheetEntry = MergedRule | VerbatimNode;

function declarationKey(prop: string): string {
  // Custom properties are case-sensitive.
  return prop.startsWith('--') ? prop : prop.toLowerCase();
}

function isDeclaration(node: ChildNode): node is Declaration {
  return node.type === 'decl';
}

function mergeRule(target: MergedRule, rule: Rule): void {
  for (const node of rule.nodes ?? []) {
    if (node.type === 'comment') continue;
    if (!isDeclaration(node)) {
      target.nested.push(node.toString().trim());
      continue;
    }
    const prop = declarationKey(node.prop);
    target.declarations.set(prop, {
      prop,
      value: node.value,
      important: node.important,
    });
  }
}

function indent(text: string): string {
  return text
    .split('\n')
    .map((line) => `  ${line}`)
    .join('\n');
}

function renderRule({ selector, declarations, nested }: MergedRule): string {
  if (declarations.size === 0 && nested.length === 0) return `${selector} {}`;
  const lines = [...declarations.values()].map(
    ({ prop, value, important }) =>
      `  ${prop}: ${value}${important ? ' !important' : ''};`
  );
  lines.push(...nested.map(indent));
  return `${selector} {\n${lines.join('\n')}\n}`;
}

function renderEntry(entry: SheetEntry): string {
  return entry.kind === 'rule' ? renderRule(entry) : entry.text;
}

/**
 * One rule per selector: later declarations override earlier ones property by
 * property, and each selector keeps the position of its first occurrence.
 * Nested blocks follow the merged declarations. Top-level at-rules stay where
 * they are; comments are dropped. Unparseable input is
 * returned as is.
 */
export function optimizeCss(css: string): string {
  let root: Root;
  try {
    root = postcss.parse(css);
  } catch (error: unknown) {
    logWarn('CSS optimization failed, keeping original stylesheet', {
      error: getErrorMessage(error),
    });
    return css;
  }

  const entries: SheetEntry[] = [];
  const rulesBySelector = new Map<string, MergedRule>();
  let rulesIn = 0;

  for (const node of root.nodes) {
    if (node.type === 'comment') continue;
    if (node.type !== 'rule') {
      entries.push({ kind: 'verbatim', text: node.toString().trim() });
      continue;
    }

    rulesIn++;
    const selector = node.selectors.join(', ');
    let merged = rulesBySelector.get(selector);
    if (!merged) {
      merged = {
        kind: 'rule',
        selector,
        declarations: new Map(),
        nested: [],
      };
      rulesBySelector.set(selector, merged);
      entries.push(merged);
    }
    mergeRule(merged, node);
  }

  logInfo('CSS optimized', { rulesIn, rulesOut: rulesBySelector.size });
  return entries.map(renderEntry).join('\n');
}

// --- Embedded images --------------------------------------------------------

async function persistCssImage(
  uri: string,
  store: ResourceStore
): Promise<string | null> {
  const parsed = parseDataImageUri(uri);
  if (!parsed) {
    logSkippedResource('Unsupported data URI in stylesheet', 'not_base64', {
      reference: describeReference(uri),
    });
    return null;
  }

  const bytes = safeBase64Decode(parsed.payload);
  if (!bytes) {
    logSkippedResource('Undecodable image in stylesheet', 'decode_failed', {
      reference: describeReference(uri),
    });
    return null;
  }

  const stored = await store.save(bytes, parsed.extension);
  logDebug('Stylesheet image extracted', { filename: stored.filename });
  return `url("${CSS_IMAGE_BASE}${stored.filename}")`;
}

/**
 * Replaces `url(data:image/...;base64,...)` references with files in the
 * store. References that cannot be decoded are left untouched.
 */
export async function extractCssEmbeddedImages(
  css: string,
  store: ResourceStore
): Promise<string> {
  const resolved = new Map<string, string | null>();
  let output = '';
  let cursor = 0;
  let extracted = 0;

  for (const match of css.matchAll(CSS_DATA_IMAGE_URL)) {
    const [whole, , uri] = match;
    if (uri === undefined || match.index === undefined) continue;

    if (!resolved.has(uri)) {
      resolved.set(uri, await persistCssImage(uri, store));
    }
    const replacement = resolved.get(uri) ?? null;

    output += css.slice(cursor, match.index);
    output += replacement ?? whole;
    cursor = match.index + whole.length;
    if (replacement) extracted++;
  }
  output += css.slice(cursor);

  if (extracted > 0) logInfo('Stylesheet images extracted', { extracted });
  return output;
}
