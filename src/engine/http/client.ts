/**
 * HTTP client for the segmented download engine.
 *
 * Probes resources (size, range support, validators, file name) and
 * opens byte-range requests. Uses the global `fetch`.
 *
 * @module engine/http/client
 */

import * as path from 'path';
import {
  DownloadError,
  HttpError,
  InterruptedError,
  NetworkError,
  type ResourceInfo,
} from '../types.js';

// =============================================================================
// Types
// =============================================================================

export interface RequestOptions {
  /** User-Agent header */
  userAgent: string;

  /** Milliseconds before the request is abandoned */
  timeoutMs: number;

  /** Aborts the request */
  signal?: AbortSignal;
}

/**
 * A byte range of the resource to fetch (both ends inclusive; end -1 means
 * "until the end").
 */
export interface RangeRequest {
  start: number;
  end: number;

  /** ETag or Last-Modified sent as If-Range */
  validator?: string;
}

/**
 * Parsed `Content-Range: bytes start-end/total` header.
 */
export interface ContentRange {
  start: number;
  end: number;
  total: number | null;
}

/**
 * An open response for a range, plus the abort handle that tears it down.
 */
export interface RangeResponse {
  response: Response;

  /** Whether the server honoured the range (206) */
  partial: boolean;

  /** Aborts this request only */
  abort: () => void;
}

// =============================================================================
// Constants
// =============================================================================

const DEFAULT_FILE_NAME = 'index.html';

// =============================================================================
// Header Parsing
// =============================================================================

/**
 * Parses a Content-Range header.
 *
 * @returns The parsed range, or null when the header is missing or malformed
 */
export function parseContentRange(header: string | null): ContentRange | null {
  if (!header) {
    return null;
  }
  const match = /^bytes\s+(\d+)-(\d+)\/(\d+|\*)$/i.exec(header.trim());
  if (!match) {
    return null;
  }
  return {
    start: Number.parseInt(match[1], 10),
    end: Number.parseInt(match[2], 10),
    total: match[3] === '*' ? null : Number.parseInt(match[3], 10),
  };
}

/**
 * Extracts a file name from a Content-Disposition header.
 *
 * Prefers the RFC 5987 `filename*` form over plain `filename`.
 */
export function parseContentDisposition(header: string | null): string | null {
  if (!header) {
    return null;
  }

  const extended = /filename\*\s*=\s*([^']*)'[^']*'([^;]+)/i.exec(header);
  if (extended) {
    try {
      return sanitizeFileName(decodeURIComponent(extended[2].trim()));
    } catch {
      // Malformed percent-encoding; fall back to the plain parameter
    }
  }

  const quoted = /filename\s*=\s*"([^"]*)"/i.exec(header);
  if (quoted) {
    return sanitizeFileName(quoted[1]);
  }

  const bare = /filename\s*=\s*([^;]+)/i.exec(header);
  if (bare) {
    return sanitizeFileName(bare[1].trim());
  }

  return null;
}

/**
 * Derives a file name from the last path segment of a URL.
 */
export function fileNameFromUrl(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return DEFAULT_FILE_NAME;
  }

  const lastSegment = pathname.split('/').filter(Boolean).pop();
  if (!lastSegment) {
    return DEFAULT_FILE_NAME;
  }

  try {
    return sanitizeFileName(decodeURIComponent(lastSegment)) ?? DEFAULT_FILE_NAME;
  } catch {
    return sanitizeFileName(lastSegment) ?? DEFAULT_FILE_NAME;
  }
}

/**
 * Reduces a server-supplied name to a bare file name.
 *
 * @returns The name, or null if nothing usable remains
 */
function sanitizeFileName(name: string): string | null {
  const base = path.basename(name.replace(/\\/g, '/'));
  const cleaned = base.replace(/[\x00-\x1f]/g, '').trim();
  if (!cleaned || cleaned === '.' || cleaned === '..') {
    return null;
  }
  return cleaned;
}

// =============================================================================
// Request Plumbing
// =============================================================================

/**
 * Creates an AbortController that also fires when `outer` aborts.
 *
 * @returns The controller and a function that detaches it from `outer`
 */
function linkedController(outer?: AbortSignal): {
  controller: AbortController;
  release: () => void;
} {
  const controller = new AbortController();
  if (!outer) {
    return { controller, release: () => undefined };
  }
  if (outer.aborted) {
    controller.abort();
    return { controller, release: () => undefined };
  }
  const onAbort = () => controller.abort();
  outer.addEventListener('abort', onAbort, { once: true });
  return {
    controller,
    release: () => outer.removeEventListener('abort', onAbort),
  };
}

/**
 * Translates a fetch failure into an engine error.
 */
function toRequestError(
  error: unknown,
  outer: AbortSignal | undefined,
  timedOut: boolean,
  timeoutMs: number
): Error {
  if (outer?.aborted) {
    return new InterruptedError();
  }
  if (timedOut) {
    return new NetworkError(`Request timed out after ${timeoutMs}ms`);
  }
  if (error instanceof DownloadError) {
    return error;
  }
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return new NetworkError(`Network error: ${error.message}${cause}`);
  }
  return new NetworkError('Unknown network error');
}

async function request(
  url: string,
  init: { method: string; headers: Record<string, string> },
  options: RequestOptions
): Promise<{ response: Response; abort: () => void }> {
  const { controller, release } = linkedController(options.signal);
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);

  try {
    const response = await fetch(url, {
      method: init.method,
      headers: { 'User-Agent': options.userAgent, ...init.headers },
      redirect: 'follow',
      signal: controller.signal,
    });
    return {
      response,
      abort: () => {
        release();
        controller.abort();
      },
    };
  } catch (error) {
    release();
    throw toRequestError(error, options.signal, timedOut, options.timeoutMs);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Discards a response body without reading it.
 */
async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    await response.body.cancel().catch(() => undefined);
  }
}

// =============================================================================
// Probe
// =============================================================================

/**
 * Asks the server about a resource before downloading it.
 *
 * Sends HEAD first. When HEAD is refused, or the answer does not say
 * whether ranges are accepted, a one-byte range GET settles it.
 *
 * @param url - Resource URL
 * @param options - Request options
 * @returns Resource information
 * @throws {HttpError} On a non-success status
 * @throws {NetworkError} On connection failure or timeout
 */
export async function probeResource(
  url: string,
  options: RequestOptions
): Promise<ResourceInfo> {
  const head = await request(url, { method: 'HEAD', headers: {} }, options);
  await discardBody(head.response);

  let info: ResourceInfo | null = null;
  if (head.response.ok) {
    info = resourceFromResponse(url, head.response);
    const acceptRanges = head.response.headers.get('accept-ranges')?.toLowerCase();
    if (acceptRanges === 'bytes' && info.totalSize !== null) {
      return { ...info, acceptRanges: true };
    }
    if (acceptRanges === 'none') {
      return { ...info, acceptRanges: false };
    }
  } else if (head.response.status !== 405 && head.response.status !== 501) {
    throw new HttpError(head.response.status, head.response.statusText, url);
  }

  const probe = await request(url, { method: 'GET', headers: { Range: 'bytes=0-0' } }, options);
  try {
    const { response } = probe;
    if (response.status === 206) {
      const range = parseContentRange(response.headers.get('content-range'));
      const base = resourceFromResponse(url, response);
      return {
        ...base,
        // HEAD may know a name the GET lacks
        fileName: info?.fileName ?? base.fileName,
        totalSize: range?.total ?? info?.totalSize ?? null,
        acceptRanges: range?.total !== null && range?.total !== undefined,
      };
    }
    if (response.ok) {
      return { ...resourceFromResponse(url, response), acceptRanges: false };
    }
    if (response.status === 416) {
      // Range not satisfiable on a zero-length resource
      return { ...resourceFromResponse(url, response), totalSize: 0, acceptRanges: false };
    }
    throw new HttpError(response.status, response.statusText, url);
  } finally {
    probe.abort();
    await discardBody(probe.response);
  }
}

function resourceFromResponse(requestUrl: string, response: Response): ResourceInfo {
  const finalUrl = response.url || requestUrl;
  const length = response.headers.get('content-length');
  const totalSize = length !== null && /^\d+$/.test(length) ? Number.parseInt(length, 10) : null;

  return {
    url: finalUrl,
    totalSize,
    acceptRanges: false,
    etag: response.headers.get('etag') ?? undefined,
    lastModified: response.headers.get('last-modified') ?? undefined,
    fileName:
      parseContentDisposition(response.headers.get('content-disposition')) ??
      fileNameFromUrl(finalUrl),
  };
}

// =============================================================================
// Range Requests
// =============================================================================

/**
 * Opens a GET request for a byte range.
 *
 * A 206 must echo the requested start offset. A 200 is accepted only
 * when the range starts at zero: the server then streams the whole
 * resource, which the caller treats as a single-connection download.
 *
 * @param url - Resource URL
 * @param range - Requested range
 * @param options - Request options; `timeoutMs` bounds the wait for headers
 * @throws {HttpError} On an unexpected status
 * @throws {DownloadError} When the server ignored a non-zero range
 */
export async function openRange(
  url: string,
  range: RangeRequest,
  options: RequestOptions
): Promise<RangeResponse> {
  const headers: Record<string, string> = {};
  const wantsRange = range.start > 0 || range.end >= 0;
  if (wantsRange) {
    headers.Range = `bytes=${range.start}-${range.end >= 0 ? range.end : ''}`;
    if (range.validator) {
      headers['If-Range'] = range.validator;
    }
  }

  const { response, abort } = await request(url, { method: 'GET', headers }, options);

  if (response.status === 206) {
    const contentRange = parseContentRange(response.headers.get('content-range'));
    if (contentRange && contentRange.start !== range.start) {
      abort();
      throw new DownloadError(
        `Server returned bytes ${contentRange.start}-${contentRange.end} for a request starting at ${range.start}`
      );
    }
    return { response, partial: true, abort };
  }

  if (response.ok) {
    if (range.start > 0) {
      abort();
      throw new DownloadError(
        'Server ignored the byte range; the resource may have changed since the download started'
      );
    }
    return { response, partial: false, abort };
  }

  abort();
  throw new HttpError(response.status, response.statusText, url);
}
