import { randomUUID } from 'node:crypto';
import { link, mkdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { contentAddressedName } from './codec.js';
import { hasErrorCode } from './errors.js';
import { logDebug } from './observability.js';

export interface StoredResource {
  readonly filename: string;
  readonly path: string;
  /** False when a file with the same content-addressed name already existed. */
  readonly created: boolean;
}

/**
 * Content-addressed image directory. Writes go to a private temp file that
 * is then hard-linked into place, so concurrent writers of the same name
 * never observe a partial file: the first link wins, later ones get EEXIST.
 */
export class ResourceStore {
  private ready: Promise<void> | undefined;

  constructor(readonly directory: string) {}

  async save(bytes: Uint8Array, extension: string): Promise<StoredResource> {
    const filename = contentAddressedName(bytes, extension);
    const target = path.join(this.directory, filename);
    await this.ensureDirectory();

    const created = await this.createIfAbsent(target, bytes);
    logDebug(created ? 'Resource written' : 'Resource already present', {
      filename,
      bytes: bytes.byteLength,
    });
    return { filename, path: target, created };
  }

  private async ensureDirectory(): Promise<void> {
    this.ready ??= mkdir(this.directory, { recursive: true }).then(
      () => undefined
    );
    await this.ready;
  }

  private async createIfAbsent(
    target: string,
    bytes: Uint8Array
  ): Promise<boolean> {
    const temp = `${target}.${randomUUID()}.tmp`;
    try {
      await writeFile(temp, bytes, { flag: 'wx' });
      await link(temp, target);
      return true;
    } catch (error: unknown) {
      if (hasErrorCode(error, 'EEXIST')) return false;
      throw error;
    } finally {
      // force: the write may have failed before the file existed
      await rm(temp, { force: true });
    }
  }
}
