/**
 * File Downloader - fetch a URL to disk with a checksum
 *
 * Every hop, redirects included, passes the URL safety check before it is
 * requested. Bodies are capped at `maxBytes`; the file is written only once
 * the whole body has arrived.
 */

import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { NavigationError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import { assertSafeUrl, type HostLookup } from '../utils/url-safety.js';

const log = logger.create('FileDownloader');

const MAX_REDIRECTS = 5;
const DEFAULT_MAX_BYTES = 50 * 1024 * 1024;

export interface FetchedFile {
  status: number;
  contentType: string | null;
  /** Redirect target, when the response is a redirect */
  location: string | null;
  body: Uint8Array;
  /** The body was cut off at `maxBytes` */
  exceeded: boolean;
}

export type FileFetcher = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal; maxBytes: number }
) => Promise<FetchedFile>;

/**
 * Default fetcher over the global fetch. Redirects are returned, not followed.
 */
export const fetchFile: FileFetcher = async (url, init) => {
  const response = await fetch(url, { headers: init.headers, signal: init.signal, redirect: 'manual' });
  const base = {
    status: response.status,
    contentType: response.headers.get('content-type'),
    location: response.headers.get('location'),
  };

  if (!response.body) {
    return { ...base, body: new Uint8Array(0), exceeded: false };
  }

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    total += value.byteLength;
    if (total > init.maxBytes) {
      await reader.cancel();
      return { ...base, body: Buffer.concat(chunks), exceeded: true };
    }
    chunks.push(value);
  }
  return { ...base, body: Buffer.concat(chunks), exceeded: false };
};

export interface FileDownloaderOptions {
  directory: string;
  maxBytes?: number;
  timeoutMs?: number;
  allowPrivateHosts?: boolean;
  fetcher?: FileFetcher;
  lookup?: HostLookup;
}

export interface DownloadOptions {
  filename?: string;
  subdirectory?: string;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface DownloadResult {
  url: string;
  path: string;
  filename: string;
  sizeBytes: number;
  sha256: string;
  contentType: string | null;
}

/**
 * Keep letters, digits, dot, dash and underscore; no leading dots.
 */
export function sanitizeFilename(name: string, fallback = 'download.bin'): string {
  const safe = name.replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^\.+/, '');
  return safe || fallback;
}

function sha256(data: Uint8Array | string): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * File name for a download: the requested one, else the URL's last path
 * segment, else a name derived from the URL's hash.
 */
export function targetFilename(url: string, requested?: string): string {
  if (requested) return sanitizeFilename(requested);
  const segment = new URL(url).pathname.split('/').pop() ?? '';
  let basename: string;
  try {
    basename = decodeURIComponent(segment);
  } catch {
    basename = segment;
  }
  return sanitizeFilename(basename, `download-${sha256(url).slice(0, 12)}.bin`);
}

export class FileDownloader {
  private readonly directory: string;
  private readonly maxBytes: number;
  private readonly timeoutMs: number;
  private readonly allowPrivateHosts: boolean;
  private readonly fetcher: FileFetcher;
  private readonly lookup: HostLookup | undefined;

  constructor(options: FileDownloaderOptions) {
    this.directory = path.resolve(options.directory);
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
    this.timeoutMs = options.timeoutMs ?? TIMEOUTS.DOWNLOAD;
    this.allowPrivateHosts = options.allowPrivateHosts ?? false;
    this.fetcher = options.fetcher ?? fetchFile;
    this.lookup = options.lookup;
  }

  async download(url: string, options: DownloadOptions = {}): Promise<DownloadResult> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;
    const started = Date.now();

    let current = url;
    let file: FetchedFile;
    for (let hop = 0; ; hop++) {
      await assertSafeUrl(current, { allowPrivateHosts: this.allowPrivateHosts, lookup: this.lookup });
      try {
        file = await this.fetcher(current, { headers: options.headers ?? {}, signal, maxBytes: this.maxBytes });
      } catch (error) {
        throw new NavigationError(current, error instanceof Error ? error.message : String(error), null, {
          cause: error,
        });
      }

      if (file.status >= 300 && file.status < 400 && file.location) {
        if (hop >= MAX_REDIRECTS) {
          throw new NavigationError(url, `more than ${MAX_REDIRECTS} redirects`, file.status);
        }
        current = new URL(file.location, current).toString();
        continue;
      }
      break;
    }

    if (file.status >= 400) {
      throw new NavigationError(current, `HTTP ${file.status}`, file.status);
    }
    if (file.exceeded || file.body.byteLength > this.maxBytes) {
      throw new NavigationError(current, `response exceeds ${this.maxBytes} bytes`, file.status);
    }

    const directory = options.subdirectory
      ? path.join(this.directory, sanitizeFilename(options.subdirectory, 'files'))
      : this.directory;
    const filename = targetFilename(current, options.filename);
    const target = path.join(directory, filename);

    await fs.mkdir(directory, { recursive: true });
    await fs.writeFile(target, file.body);

    const result: DownloadResult = {
      url: current,
      path: target,
      filename,
      sizeBytes: file.body.byteLength,
      sha256: sha256(file.body),
      contentType: file.contentType,
    };
    log.timed('Downloaded file', started, { url: current, sizeBytes: result.sizeBytes });
    return result;
  }
}
