import type { CheerioAPI } from 'cheerio';
import * as prettier from 'prettier';

import type { SerializationMode } from './config.js';
import { getErrorMessage } from './errors.js';
import { logInfo, logWarn } from './observability.js';

// Comments carrying a structural marker survive minification.
const DISPOSABLE_COMMENT = /<!--(?!\s*(?:HEADER|MAIN|FOOTER|SECTION)).*?-->/gs;
const INTER_TAG_WHITESPACE = />\s+</g;
const WHITESPACE_RUN = /\s{2,}/g;
const NEWLINES = /\n+/g;
const REDUNDANT_TYPE_ATTRIBUTES = [
  ' type="text/javascript"',
  ' type="text/css"',
] as const;

/**
 * Plain text pass; the order of the substitutions matters.
 * Whitespace inside `<pre>` and `<textarea>` is collapsed as well.
 */
export function minifyHtml(html: string): string {
  let output = html
    .replace(DISPOSABLE_COMMENT, '')
    .replace(INTER_TAG_WHITESPACE, '><')
    .replace(WHITESPACE_RUN, ' ')
    .replace(NEWLINES, '');
  for (const attribute of REDUNDANT_TYPE_ATTRIBUTES) {
    output = output.replaceAll(attribute, '');
  }
  return output.trim();
}

async function formatReadable(html: string): Promise<string> {
  try {
    return await prettier.format(html, { parser: 'html' });
  } catch (error: unknown) {
    logWarn('HTML formatting failed, writing unformatted output', {
      error: getErrorMessage(error),
    });
    return html;
  }
}

export async function serializeDocument(
  $: CheerioAPI,
  mode: SerializationMode
): Promise<string> {
  const html = $.html();
  const output =
    mode === 'minified' ? minifyHtml(html) : await formatReadable(html);
  logInfo('HTML serialized', { mode, length: output.length });
  return output;
}
