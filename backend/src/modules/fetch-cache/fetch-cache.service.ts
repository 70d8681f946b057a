/**
 * FETCH CACHE
 * ===========
 *
 * Process-lifetime cache of remote image payloads, used when inlining
 * images into an SVG before rasterization.
 *
 * - Keyed by SHA-512 of the URL; bytes live in a temporary directory
 * - Concurrent gets for one URL share a single download (single-flight)
 * - Every access refreshes the entry's last hit, even while in flight
 * - prune() drops entries idle for longer than the threshold (12h)
 */

import { createHash } from 'node:crypto';
import { createWriteStream } from 'node:fs';
import { mkdir, mkdtemp, readFile, rename, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Readable, Transform } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import axios, { type AxiosInstance } from 'axios';
import { v4 as uuidv4 } from 'uuid';
import { FetchError, errorMessage } from '../../common/errors.js';
import { noopLogger, systemClock, type Clock, type Logger } from '../../common/logger.js';
import { RequestCoalescer } from '../shared/runtime/request-coalescer.js';

export const DEFAULT_IDLE_MS = 12 * 60 * 60 * 1000;
export const DEFAULT_FETCH_TIMEOUT_MS = 15_000;

export interface FetchCacheOptions {
  /** Storage directory. A fresh one under the OS temp dir when omitted. */
  directory?: string;
  idleMs?: number;
  userAgent: string;
  timeoutMs?: number;
  http?: AxiosInstance;
  clock?: Clock;
  logger?: Logger;
}

export interface FetchCacheStats {
  entries: number;
  inFlight: number;
  hits: number;
  misses: number;
  downloads: number;
  failures: number;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class FetchCache {
  readonly directory: string;
  /** True when create() made the directory itself. */
  private readonly ownsDirectory: boolean;
  private readonly idleMs: number;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private lastHit = new Map<string, number>();
  private downloads = new RequestCoalescer<Buffer>();
  private closed = false;

  private hits = 0;
  private misses = 0;
  private downloaded = 0;
  private failures = 0;

  private constructor(directory: string, ownsDirectory: boolean, options: FetchCacheOptions) {
    this.directory = directory;
    this.ownsDirectory = ownsDirectory;
    this.idleMs = options.idleMs ?? DEFAULT_IDLE_MS;
    this.userAgent = options.userAgent;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.http = options.http ?? axios.create();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? noopLogger;
  }

  static async create(options: FetchCacheOptions): Promise<FetchCache> {
    if (options.directory) {
      const directory = path.resolve(options.directory);
      await mkdir(directory, { recursive: true });
      return new FetchCache(directory, false, options);
    }
    const directory = await mkdtemp(path.join(os.tmpdir(), 'badge-fetch-'));
    return new FetchCache(directory, true, options);
  }

  static digest(url: string): string {
    return createHash('sha512').update(url, 'utf8').digest('hex');
  }

  /**
   * Get the bytes behind a URL, downloading them on first use.
   * Throws FetchError on any network, status or storage failure.
   */
  async get(url: string): Promise<Buffer> {
    if (this.closed) {
      throw new FetchError(url, 'Fetch cache is closed');
    }

    const digest = FetchCache.digest(url);
    this.lastHit.set(digest, this.clock.now());

    return this.downloads.run(digest, () => this.load(url, digest));
  }

  private async load(url: string, digest: string): Promise<Buffer> {
    const file = path.join(this.directory, digest);

    try {
      const data = await readFile(file);
      this.hits++;
      return data;
    } catch (err) {
      if (!isNotFound(err)) {
        throw new FetchError(url, `Failed to read cached ${url}: ${errorMessage(err)}`, { cause: err });
      }
    }

    this.misses++;
    return this.download(url, file);
  }

  private async download(url: string, file: string): Promise<Buffer> {
    const temp = `${file}.${uuidv4()}.part`;
    const chunks: Buffer[] = [];

    const collect = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback(null, chunk);
      },
    });

    try {
      const response = await this.http.get<Readable>(url, {
        responseType: 'stream',
        timeout: this.timeoutMs,
        headers: { 'User-Agent': this.userAgent },
      });
      await pipeline(response.data, collect, createWriteStream(temp));
      await rename(temp, file);
    } catch (err) {
      this.failures++;
      if (axios.isAxiosError(err) && err.response?.data instanceof Readable) {
        err.response.data.destroy();
      }
      await rm(temp, { force: true });
      this.logger.warn({ url, err: errorMessage(err) }, '[FetchCache] Download failed');
      throw new FetchError(url, `Failed to fetch ${url}: ${errorMessage(err)}`, { cause: err });
    }

    this.downloaded++;
    const data = Buffer.concat(chunks);
    this.logger.debug?.({ url, bytes: data.length }, '[FetchCache] Downloaded');
    return data;
  }

  /**
   * Drop entries idle for longer than the threshold. Works on a snapshot
   * of the hit map, so concurrent gets are unaffected.
   */
  async prune(): Promise<number> {
    const cutoff = this.clock.now() - this.idleMs;
    let pruned = 0;

    for (const [digest, hit] of Array.from(this.lastHit.entries())) {
      if (hit >= cutoff || this.downloads.isInFlight(digest)) continue;

      // A get() may have refreshed the entry while an earlier rm was pending.
      const latest = this.lastHit.get(digest);
      if (latest === undefined || latest >= cutoff) continue;

      this.lastHit.delete(digest);
      await rm(path.join(this.directory, digest), { force: true });
      pruned++;
    }

    if (pruned > 0) {
      this.logger.info({ pruned, remaining: this.lastHit.size }, '[FetchCache] Pruned dormant images');
    }
    return pruned;
  }

  /**
   * Remove stored images: the whole directory when create() made it,
   * otherwise only the files this cache wrote. The cache is unusable afterwards.
   */
  async close(): Promise<void> {
    this.closed = true;
    const digests = Array.from(this.lastHit.keys());
    this.lastHit.clear();

    if (this.ownsDirectory) {
      await rm(this.directory, { recursive: true, force: true });
    } else {
      for (const digest of digests) {
        await rm(path.join(this.directory, digest), { force: true });
      }
    }
    this.logger.info({ directory: this.directory }, '[FetchCache] Closed');
  }

  stats(): FetchCacheStats {
    return {
      entries: this.lastHit.size,
      inFlight: this.downloads.size(),
      hits: this.hits,
      misses: this.misses,
      downloads: this.downloaded,
      failures: this.failures,
    };
  }
}
