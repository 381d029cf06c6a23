import { Buffer } from 'node:buffer';

import { sha256Hex } from './crypto.js';

export const DEFAULT_IMAGE_EXTENSION = 'png';

const MAX_URL_EXTENSION_LENGTH = 4;
const CONTENT_NAME_HASH_LENGTH = 16;

const NON_BASE64_CHARS = /[^A-Za-z0-9+/=]/g;
const PADDING_CHARS = /=+/g;

const DATA_IMAGE_PREFIX = /^data:image\//i;
const DATA_IMAGE_BASE64 = /^data:image\/([^;,]*)((?:;[^;,]*)*);base64,/i;

const EXTENSION_ALIASES: ReadonlyMap<string, string> = new Map([
  ['svg+xml', 'svg'],
  ['x-icon', 'ico'],
  ['vnd.microsoft.icon', 'ico'],
]);

export interface DataImageUri {
  readonly extension: string;
  readonly payload: string;
}

/**
 * Decodes base64 the lenient way: surrounding whitespace and any character
 * outside the standard alphabet are dropped and missing padding is restored.
 * Returns null when nothing decodable remains.
 */
export function safeBase64Decode(data: string): Buffer | null {
  const cleaned = data
    .trim()
    .replace(NON_BASE64_CHARS, '')
    .replace(PADDING_CHARS, '');

  // A single dangling sextet cannot encode a byte.
  if (cleaned.length === 0 || cleaned.length % 4 === 1) return null;

  const remainder = cleaned.length % 4;
  const padded = remainder === 0 ? cleaned : cleaned + '='.repeat(4 - remainder);
  const decoded = Buffer.from(padded, 'base64');
  return decoded.byteLength > 0 ? decoded : null;
}

export function isDataImageUri(reference: string): boolean {
  return DATA_IMAGE_PREFIX.test(reference.trim());
}

export function isRemoteUrl(reference: string): boolean {
  const lowered = reference.trim().toLowerCase();
  return lowered.startsWith('http://') || lowered.startsWith('https://');
}

export function normalizeImageExtension(raw: string | undefined): string {
  if (!raw) return DEFAULT_IMAGE_EXTENSION;
  const lowered = raw.trim().toLowerCase();
  const aliased = EXTENSION_ALIASES.get(lowered) ?? lowered;
  return /^[a-z0-9]+$/.test(aliased) ? aliased : DEFAULT_IMAGE_EXTENSION;
}

/**
 * Splits `data:image/<ext>[;params];base64,<payload>`. URIs that are not
 * base64-encoded images return null.
 */
export function parseDataImageUri(uri: string): DataImageUri | null {
  const trimmed = uri.trim();
  const match = DATA_IMAGE_BASE64.exec(trimmed);
  if (!match) return null;

  return {
    extension: normalizeImageExtension(match[1]),
    payload: trimmed.slice(match[0].length),
  };
}

export function extensionFromUrl(rawUrl: string): string {
  let pathname: string;
  try {
    ({ pathname } = new URL(rawUrl));
  } catch {
    pathname = rawUrl.split(/[?#]/, 1)[0] ?? '';
  }

  const lastSegment = pathname.split('/').pop() ?? '';
  const dot = lastSegment.lastIndexOf('.');
  if (dot === -1) return DEFAULT_IMAGE_EXTENSION;

  const extension = lastSegment
    .slice(dot + 1)
    .toLowerCase()
    .replace(/[^a-z0-9]/g, '')
    .slice(0, MAX_URL_EXTENSION_LENGTH);
  return extension || DEFAULT_IMAGE_EXTENSION;
}

/** `img_<sha256 prefix>.<ext>`: identical bytes always map to the same name. */
export function contentAddressedName(
  bytes: Uint8Array,
  extension: string
): string {
  const digest = sha256Hex(bytes).slice(0, CONTENT_NAME_HASH_LENGTH);
  return `img_${digest}.${normalizeImageExtension(extension)}`;
}
