import type { CheerioAPI } from 'cheerio';
import { type AnyNode, type Comment, type Element, hasChildren, isComment } from 'domhandler';

import { logInfo } from './observability.js';

// --- Constants ---

/** Comments containing one of these survive cleanup and minification. */
export const STRUCTURAL_MARKERS = [
  'HEADER',
  'MAIN',
  'FOOTER',
  'SECTION',
] as const;

const PRUNABLE_EMPTY_TAGS = 'div, span, p';
const PRESERVED_META_NAMES: ReadonlySet<string> = new Set([
  'viewport',
  'description',
]);
const OPEN_GRAPH_PREFIX = 'og:';

const TAG_ALIASES: ReadonlyMap<string, string> = new Map([
  ['b', 'strong'],
  ['i', 'em'],
]);

// --- Types ---

export interface NormalizationReport {
  readonly commentsRemoved: number;
  readonly emptyRemoved: number;
  readonly scriptsRemoved: number;
  readonly metaRemoved: number;
  readonly tagsRenamed: number;
}

// --- Helpers ---

export function hasStructuralMarker(text: string): boolean {
  return STRUCTURAL_MARKERS.some((marker) => text.includes(marker));
}

function collectComments(node: AnyNode, found: Comment[]): void {
  if (isComment(node)) {
    found.push(node);
    return;
  }
  if (!hasChildren(node)) return;
  for (const child of node.children) collectComments(child, found);
}

/** Every comment node in the document, including those outside `<html>`. */
export function findComments($: CheerioAPI): Comment[] {
  const found: Comment[] = [];
  for (const node of $.root().toArray()) collectComments(node, found);
  return found;
}

// --- Passes ---

function removeComments($: CheerioAPI): number {
  let removed = 0;
  for (const comment of findComments($)) {
    if (hasStructuralMarker(comment.data)) continue;
    $(comment).remove();
    removed++;
  }
  return removed;
}

// Single pass over a selection taken up front: a parent emptied by the
// removal of its children is not revisited.
function removeEmptyNodes($: CheerioAPI): number {
  let removed = 0;
  for (const element of $(PRUNABLE_EMPTY_TAGS).toArray()) {
    const $element = $(element);
    if ($element.text().trim().length > 0) continue;
    if ($element.children().length > 0) continue;
    $element.remove();
    removed++;
  }
  return removed;
}

function removeInlineScripts($: CheerioAPI): number {
  const inline = $('script').filter((_, el) => !$(el).attr('src'));
  const count = inline.length;
  inline.remove();
  return count;
}

function isEssentialMeta(attribs: Readonly<Record<string, string>>): boolean {
  if (attribs['charset']) return true;
  const name = attribs['name'];
  if (name !== undefined && PRESERVED_META_NAMES.has(name)) return true;
  return attribs['property']?.startsWith(OPEN_GRAPH_PREFIX) ?? false;
}

function removeNonEssentialMeta($: CheerioAPI): number {
  const disposable = $('meta').filter((_, el) => !isEssentialMeta(el.attribs));
  const count = disposable.length;
  disposable.remove();
  return count;
}

function renameAliasedTags($: CheerioAPI): number {
  let renamed = 0;
  for (const [from, to] of TAG_ALIASES) {
    for (const element of $<Element, string>(from).toArray()) {
      element.name = to;
      renamed++;
    }
  }
  return renamed;
}

/**
 * Structural cleanup. Pass order matters: comments, empty nodes, inline
 * scripts, meta filtering, then tag aliasing.
 */
export function normalizeDocument($: CheerioAPI): NormalizationReport {
  const report: NormalizationReport = {
    commentsRemoved: removeComments($),
    emptyRemoved: removeEmptyNodes($),
    scriptsRemoved: removeInlineScripts($),
    metaRemoved: removeNonEssentialMeta($),
    tagsRenamed: renameAliasedTags($),
  };
  logInfo('Document normalized', { ...report });
  return report;
}
