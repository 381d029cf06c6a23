import { createHash } from 'node:crypto';

type AllowedHashAlgorithm = 'md5' | 'sha256';

const ALLOWED_HASH_ALGORITHMS: ReadonlySet<AllowedHashAlgorithm> = new Set([
  'md5',
  'sha256',
]);

const FINGERPRINT_LENGTH = 8;

function assertAllowedAlgorithm(
  algorithm: AllowedHashAlgorithm
): asserts algorithm is AllowedHashAlgorithm {
  if (!ALLOWED_HASH_ALGORITHMS.has(algorithm)) {
    throw new Error(`Hash algorithm not allowed: ${algorithm}`);
  }
}

function hashHex(
  algorithm: AllowedHashAlgorithm,
  input: string | Uint8Array
): string {
  assertAllowedAlgorithm(algorithm);
  return createHash(algorithm).update(input).digest('hex');
}

export function sha256Hex(input: string | Uint8Array): string {
  return hashHex('sha256', input);
}

export function md5Hex(input: string | Uint8Array): string {
  return hashHex('md5', input);
}

/** First eight hex characters of the MD5 digest of `text` (UTF-8). */
export function shortFingerprint(text: string): string {
  return md5Hex(text).slice(0, FINGERPRINT_LENGTH);
}
