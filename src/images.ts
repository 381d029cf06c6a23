import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

import {
  extensionFromUrl,
  isDataImageUri,
  isRemoteUrl,
  parseDataImageUri,
  safeBase64Decode,
} from './codec.js';
import { runWithConcurrency } from './concurrency.js';
import { getErrorMessage } from './errors.js';
import type { ImageFetcher } from './fetch.js';
import {
  describeReference,
  logDebug,
  logInfo,
  logSkippedResource,
} from './observability.js';
import type { ResourceStore } from './resource-store.js';

/** Rewritten references point here, relative to the output HTML file. */
export const HTML_IMAGE_BASE = 'images/';

const IMAGE_ATTRIBUTE_TARGETS = [
  { selector: 'img[src]', attribute: 'src' },
  { selector: 'input[type="image"][src]', attribute: 'src' },
  { selector: 'video[poster]', attribute: 'poster' },
] as const;

export interface ImageExtractionDeps {
  readonly store: ResourceStore;
  readonly fetchImage: ImageFetcher;
  readonly maxImageBytes: number;
  readonly concurrency: number;
  /** Called after each distinct remote URL settles. */
  readonly onFetchProgress?: (completed: number, total: number) => void;
}

export interface ImageExtractionReport {
  /** Inline `data:` images written to the store. */
  readonly embedded: number;
  /** Remote images fetched and written to the store. */
  readonly downloaded: number;
  /** Inline or remote references left unchanged. */
  readonly skipped: number;
}

interface ImageOccurrence {
  readonly element: Element;
  readonly attribute: string;
  readonly reference: string;
}

function collectOccurrences($: CheerioAPI): ImageOccurrence[] {
  const occurrences: ImageOccurrence[] = [];
  for (const { selector, attribute } of IMAGE_ATTRIBUTE_TARGETS) {
    for (const element of $(selector).toArray()) {
      const reference = (element.attribs[attribute] ?? '').trim();
      if (reference) occurrences.push({ element, attribute, reference });
    }
  }
  return occurrences;
}

function rewrite(
  $: CheerioAPI,
  occurrence: ImageOccurrence,
  filename: string
): void {
  $(occurrence.element).attr(
    occurrence.attribute,
    `${HTML_IMAGE_BASE}${filename}`
  );
}

async function persistInlineImage(
  reference: string,
  store: ResourceStore
): Promise<string | null> {
  const parsed = parseDataImageUri(reference);
  if (!parsed) {
    logSkippedResource('Unsupported inline image', 'not_base64', {
      reference: describeReference(reference),
    });
    return null;
  }

  const bytes = safeBase64Decode(parsed.payload);
  if (!bytes) {
    logSkippedResource('Undecodable inline image', 'decode_failed', {
      reference: describeReference(reference),
    });
    return null;
  }

  return (await store.save(bytes, parsed.extension)).filename;
}

function groupByReference(
  occurrences: readonly ImageOccurrence[]
): Map<string, ImageOccurrence[]> {
  const groups = new Map<string, ImageOccurrence[]>();
  for (const occurrence of occurrences) {
    const group = groups.get(occurrence.reference);
    if (group) group.push(occurrence);
    else groups.set(occurrence.reference, [occurrence]);
  }
  return groups;
}

async function extractInlineImages(
  $: CheerioAPI,
  occurrences: readonly ImageOccurrence[],
  store: ResourceStore
): Promise<number> {
  let embedded = 0;
  for (const [reference, group] of groupByReference(occurrences)) {
    const filename = await persistInlineImage(reference, store);
    if (!filename) continue;
    for (const occurrence of group) rewrite($, occurrence, filename);
    embedded += group.length;
  }
  return embedded;
}

async function downloadRemoteImages(
  $: CheerioAPI,
  occurrences: readonly ImageOccurrence[],
  deps: ImageExtractionDeps
): Promise<number> {
  const groups = [...groupByReference(occurrences)];
  const tasks = groups.map(([url]) => async (): Promise<string | null> => {
    const bytes = await deps.fetchImage(url, deps.maxImageBytes);
    if (!bytes) return null;
    return (await deps.store.save(bytes, extensionFromUrl(url))).filename;
  });

  const results = await runWithConcurrency(deps.concurrency, tasks, {
    onProgress: (completed, total) => {
      logDebug('Image fetch progress', { completed, total });
      deps.onFetchProgress?.(completed, total);
    },
  });

  let downloaded = 0;
  results.forEach((result, index) => {
    const entry = groups[index];
    if (!entry) return;
    const [url, group] = entry;

    if (result.status === 'rejected') {
      logSkippedResource('Remote image could not be stored', 'persist_failed', {
        url: describeReference(url),
        error: getErrorMessage(result.reason),
      });
      return;
    }
    if (!result.value) return;

    for (const occurrence of group) rewrite($, occurrence, result.value);
    downloaded += group.length;
  });
  return downloaded;
}

/**
 * Externalizes inline and remote images referenced by `img[src]`,
 * `input[type=image][src]` and `video[poster]`. Anything else (relative
 * paths, protocol-relative URLs) is left alone. A reference that fails is
 * left unchanged and never affects the others.
 */
export async function extractImages(
  $: CheerioAPI,
  deps: ImageExtractionDeps
): Promise<ImageExtractionReport> {
  const occurrences = collectOccurrences($);
  const inline = occurrences.filter(({ reference }) =>
    isDataImageUri(reference)
  );
  const remote = occurrences.filter(({ reference }) => isRemoteUrl(reference));

  const ignored = occurrences.length - inline.length - remote.length;
  if (ignored > 0) logDebug('Local image references left as is', { ignored });

  const embedded = await extractInlineImages($, inline, deps.store);
  const downloaded = await downloadRemoteImages($, remote, deps);

  const report: ImageExtractionReport = {
    embedded,
    downloaded,
    skipped: inline.length + remote.length - embedded - downloaded,
  };
  logInfo('Images processed', { ...report });
  return report;
}
