import os from 'node:os';

import type { Dispatcher } from 'undici';
import { Agent } from 'undici';

import { config } from './config.js';
import { FetchError, getErrorMessage } from './errors.js';
import { logInfo, logSkippedResource, redactUrl } from './observability.js';

export interface ImageFetchOptions {
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
}

/** Returns the image bytes, or null when the resource was rejected. */
export type ImageFetcher = (
  url: string,
  maxBytes: number,
  options?: ImageFetchOptions
) => Promise<Uint8Array | null>;

/* -------------------------------------------------------------------------------------------------
 * Dispatcher / Agent lifecycle
 * ------------------------------------------------------------------------------------------------- */

function getAgentOptions(): ConstructorParameters<typeof Agent>[0] {
  const cpuCount = os.availableParallelism();
  return {
    keepAliveTimeout: 10000,
    connections: Math.max(cpuCount, config.fetcher.concurrency),
    pipelining: 1,
    connect: { timeout: config.fetcher.timeoutMs },
  };
}

export const dispatcher: Dispatcher = new Agent(getAgentOptions());

export async function destroyAgents(): Promise<void> {
  await dispatcher.close();
}

/* -------------------------------------------------------------------------------------------------
 * Rejections
 * ------------------------------------------------------------------------------------------------- */

class FetchRejections {
  http(url: string, status: number, statusText: string): FetchError {
    return new FetchError(
      `HTTP ${status}: ${statusText}`,
      url,
      'http_status',
      { status }
    );
  }

  declaredSize(url: string, declared: number, maxBytes: number): FetchError {
    return new FetchError(
      `Declared size ${declared} exceeds limit of ${maxBytes} bytes`,
      url,
      'declared_size',
      { declared, maxBytes }
    );
  }

  contentType(url: string, contentType: string): FetchError {
    return new FetchError(
      `Not an image: ${contentType || 'no content type'}`,
      url,
      'content_type',
      { contentType }
    );
  }

  streamedSize(url: string, maxBytes: number): FetchError {
    return new FetchError(
      `Response exceeds maximum size of ${maxBytes} bytes`,
      url,
      'streamed_size',
      { maxBytes }
    );
  }

  timeout(url: string, timeoutMs: number): FetchError {
    return new FetchError(
      `Request timeout after ${timeoutMs}ms`,
      url,
      'timeout',
      { timeoutMs }
    );
  }

  network(url: string, message: string): FetchError {
    return new FetchError(
      `Network error: Could not reach ${redactUrl(url)}`,
      url,
      'network',
      { cause: message }
    );
  }
}

const rejections = new FetchRejections();

function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'AbortError' || error.name === 'TimeoutError')
  );
}

function mapFetchError(
  error: unknown,
  url: string,
  timeoutMs: number
): FetchError {
  if (error instanceof FetchError) return error;
  if (isAbortError(error)) return rejections.timeout(url, timeoutMs);
  return rejections.network(url, getErrorMessage(error));
}

function cancelResponseBody(response: Response): void {
  const cancelPromise = response.body?.cancel();
  if (cancelPromise)
    cancelPromise.catch(() => {
      /* body already errored or closed */
    });
}

/* -------------------------------------------------------------------------------------------------
 * Response validation + bounded reading
 * ------------------------------------------------------------------------------------------------- */

function parseContentLength(response: Response): number | null {
  const header = response.headers.get('content-length');
  if (!header) return null;
  const parsed = Number.parseInt(header, 10);
  return Number.isNaN(parsed) ? null : parsed;
}

function assertResponseAcceptable(
  response: Response,
  url: string,
  maxBytes: number
): void {
  if (!response.ok) {
    throw rejections.http(url, response.status, response.statusText);
  }

  const declared = parseContentLength(response);
  if (declared !== null && declared > maxBytes) {
    throw rejections.declaredSize(url, declared, maxBytes);
  }

  const contentType = response.headers.get('content-type') ?? '';
  if (!contentType.trim().toLowerCase().startsWith('image/')) {
    throw rejections.contentType(url, contentType);
  }
}

class ResponseBytesReader {
  async read(
    response: Response,
    url: string,
    maxBytes: number
  ): Promise<Uint8Array> {
    if (!response.body) {
      const buffer = new Uint8Array(await response.arrayBuffer());
      if (buffer.byteLength > maxBytes) {
        throw rejections.streamedSize(url, maxBytes);
      }
      return buffer;
    }

    return this.readStreamWithLimit(response.body, url, maxBytes);
  }

  // Content-Length may be absent or wrong, so the cap is enforced again
  // on the bytes actually received.
  private async readStreamWithLimit(
    stream: ReadableStream<Uint8Array>,
    url: string,
    maxBytes: number
  ): Promise<Uint8Array> {
    const chunks: Uint8Array[] = [];
    let total = 0;

    const reader = stream.getReader();
    try {
      let result = await reader.read();
      while (!result.done) {
        total += result.value.byteLength;
        if (total > maxBytes) throw rejections.streamedSize(url, maxBytes);
        chunks.push(result.value);
        result = await reader.read();
      }
    } catch (error: unknown) {
      await this.cancelReaderQuietly(reader);
      throw error;
    } finally {
      reader.releaseLock();
    }

    return concatChunks(chunks, total);
  }

  private async cancelReaderQuietly(
    reader: ReadableStreamDefaultReader<Uint8Array>
  ): Promise<void> {
    try {
      await reader.cancel();
    } catch {
      // the stream is being abandoned either way
    }
  }
}

function concatChunks(chunks: readonly Uint8Array[], total: number): Uint8Array {
  const output = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    output.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return output;
}

const responseReader = new ResponseBytesReader();

/* -------------------------------------------------------------------------------------------------
 * Image fetcher
 * ------------------------------------------------------------------------------------------------- */

const DEFAULT_HEADERS = {
  'User-Agent': config.fetcher.userAgent,
  Accept: 'image/avif,image/webp,image/png,image/svg+xml,image/*;q=0.8',
} as const satisfies Record<string, string>;

function buildRequestSignal(
  timeoutMs: number,
  external?: AbortSignal
): AbortSignal {
  const timeoutSignal = AbortSignal.timeout(timeoutMs);
  return external ? AbortSignal.any([external, timeoutSignal]) : timeoutSignal;
}

function buildRequestInit(
  signal: AbortSignal
): RequestInit & { dispatcher: Dispatcher } {
  return {
    method: 'GET',
    headers: { ...DEFAULT_HEADERS },
    redirect: 'follow',
    signal,
    dispatcher,
  };
}

class HttpImageFetcher {
  async fetchImage(
    url: string,
    maxBytes: number,
    options?: ImageFetchOptions
  ): Promise<Uint8Array | null> {
    const timeoutMs = options?.timeoutMs ?? config.fetcher.timeoutMs;
    const init = buildRequestInit(
      buildRequestSignal(timeoutMs, options?.signal)
    );

    try {
      const response = await fetch(url, init);
      try {
        assertResponseAcceptable(response, url, maxBytes);
      } catch (error: unknown) {
        cancelResponseBody(response);
        throw error;
      }

      const bytes = await responseReader.read(response, url, maxBytes);
      logInfo('Image downloaded', {
        url: redactUrl(url),
        kb: Number((bytes.byteLength / 1024).toFixed(2)),
      });
      return bytes;
    } catch (error: unknown) {
      const mapped = mapFetchError(error, url, timeoutMs);
      logSkippedResource('Image fetch rejected', mapped.reason, {
        ...mapped.details,
        url: redactUrl(url),
        error: mapped.message,
      });
      return null;
    }
  }
}

const httpImageFetcher = new HttpImageFetcher();

export const fetchImage: ImageFetcher = (url, maxBytes, options) =>
  httpImageFetcher.fetchImage(url, maxBytes, options);
