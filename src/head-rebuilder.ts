import type { Cheerio, CheerioAPI } from 'cheerio';
import { Element } from 'domhandler';

import { logInfo } from './observability.js';

export const DEFAULT_TITLE = 'Untitled Document';
export const STYLESHEET_HREF = 'styles/styles.css';

const CHARSET_TAG = '<meta charset="utf-8">';
const DEFAULT_VIEWPORT_TAG =
  '<meta name="viewport" content="width=device-width, initial-scale=1.0">';
const STYLESHEET_TAG = `<link rel="stylesheet" href="${STYLESHEET_HREF}">`;

function ensureHead($: CheerioAPI): Cheerio<Element> {
  const head = $('head').first();
  if (head.length > 0) return head;

  // Built as a node: fragment parsing drops a bare <head> tag.
  const created = new Element('head', {});
  const html = $('html').first();
  if (html.length > 0) {
    html.prepend(created);
  } else {
    $.root().prepend(created);
  }
  return $(created);
}

function ensureBody($: CheerioAPI): Cheerio<Element> {
  const body = $('body').first();
  if (body.length > 0) return body;

  const created = new Element('body', {});
  $('html').first().append(created);
  return $(created);
}

/**
 * Replaces the head with: charset, title, viewport, description (only if
 * one existed) and the stylesheet link, in that order. Head `<style>` blocks
 * move to the top of the body so style extraction still sees them.
 */
export function rebuildHead($: CheerioAPI): void {
  const head = ensureHead($);

  const title = head.find('title').first().text().trim() || DEFAULT_TITLE;
  const viewport = head.find('meta[name="viewport"]').first().remove();
  const description = head.find('meta[name="description"]').first().remove();
  const styles = head.find('style').remove();

  head.empty();
  head.append(CHARSET_TAG);
  head.append($('<title></title>').text(title));
  head.append(viewport.length > 0 ? viewport : DEFAULT_VIEWPORT_TAG);
  if (description.length > 0) head.append(description);
  head.append(STYLESHEET_TAG);

  if (styles.length > 0) ensureBody($).prepend(styles);

  logInfo('Head rebuilt', {
    title,
    keptViewport: viewport.length > 0,
    keptDescription: description.length > 0,
    relocatedStyles: styles.length,
  });
}
