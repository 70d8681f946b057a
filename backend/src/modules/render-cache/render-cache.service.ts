/**
 * RENDER CACHE
 * ============
 *
 * Content-addressed on-disk cache of rendered embeds.
 *
 * Filename: {subject}.{variant}.{fingerprint}.{filetype}
 * The fingerprint segment is dropped when the variant declares no options.
 *
 * Existence of the file is the only record. Writes go to a dot-prefixed
 * sibling and are renamed into place, so a reader never sees a partial
 * artifact under the final name.
 */

import { createHash } from 'node:crypto';
import { access, mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { CacheIoError, errorMessage } from '../../common/errors.js';
import { noopLogger, type Logger } from '../../common/logger.js';
import { stableStringify } from '../shared/runtime/stable-stringify.js';
import type { Configuration } from '../options/options.types.js';

export interface RenderCacheOptions {
  directory: string;
  logger?: Logger;
}

export function computeFingerprint(
  subjectId: string,
  variant: string,
  config: Configuration,
): string | null {
  if (Object.keys(config).length === 0) {
    return null;
  }
  const canonical = stableStringify({ subject: subjectId, variant, options: config });
  return createHash('sha256').update(canonical, 'utf8').digest('hex');
}

export function renderFilename(
  subjectId: string,
  variant: string,
  fingerprint: string | null,
  filetype: string,
): string {
  const parts = fingerprint
    ? [subjectId, variant, fingerprint, filetype]
    : [subjectId, variant, filetype];
  return parts.join('.');
}

export class RenderCache {
  readonly directory: string;
  private logger: Logger;

  /** subject → purge count, so renders can tell they were overtaken. */
  private generations = new Map<string, number>();

  private hits = 0;
  private misses = 0;
  private writes = 0;

  constructor(options: RenderCacheOptions) {
    this.directory = path.resolve(options.directory);
    this.logger = options.logger ?? noopLogger;
  }

  async init(): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    this.logger.info({ directory: this.directory }, '[RenderCache] Ready');
  }

  computeFingerprint(subjectId: string, variant: string, config: Configuration): string | null {
    return computeFingerprint(subjectId, variant, config);
  }

  filename(subjectId: string, variant: string, fingerprint: string | null, filetype: string): string {
    return renderFilename(subjectId, variant, fingerprint, filetype);
  }

  pathFor(filename: string): string {
    if (filename !== path.basename(filename) || filename.startsWith('.')) {
      throw new CacheIoError(`Invalid render filename: ${filename}`);
    }
    return path.join(this.directory, filename);
  }

  async exists(filename: string): Promise<boolean> {
    try {
      await access(this.pathFor(filename));
      this.hits++;
      return true;
    } catch {
      this.misses++;
      return false;
    }
  }

  async read(filename: string): Promise<Buffer> {
    try {
      return await readFile(this.pathFor(filename));
    } catch (err) {
      throw new CacheIoError(`Failed to read render ${filename}: ${errorMessage(err)}`, { cause: err });
    }
  }

  /**
   * Publish a render atomically: temp sibling, then rename.
   */
  async save(filename: string, data: Uint8Array): Promise<void> {
    const target = this.pathFor(filename);
    const temp = path.join(this.directory, `.${filename}.${uuidv4()}.tmp`);

    try {
      await writeFile(temp, data);
      await rename(temp, target);
      this.writes++;
    } catch (err) {
      await rm(temp, { force: true });
      throw new CacheIoError(`Failed to save render ${filename}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async remove(filename: string): Promise<void> {
    await rm(this.pathFor(filename), { force: true });
  }

  /**
   * Purges of a subject so far. A render that sees this change while it
   * runs was produced from superseded data.
   */
  generation(subjectId: string): number {
    return this.generations.get(subjectId) ?? 0;
  }

  /**
   * Drop every render of a subject. Called when its upstream data is
   * refreshed, since filenames do not encode the data version.
   */
  async purgeSubject(subjectId: string): Promise<number> {
    this.generations.set(subjectId, this.generation(subjectId) + 1);

    const prefix = `${subjectId}.`;
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (err) {
      throw new CacheIoError(`Failed to list renders: ${errorMessage(err)}`, { cause: err });
    }

    const doomed = names.filter((name) => name.startsWith(prefix));
    await Promise.all(doomed.map((name) => rm(path.join(this.directory, name), { force: true })));

    if (doomed.length > 0) {
      this.logger.info({ subjectId, removed: doomed.length }, '[RenderCache] Purged subject renders');
    }
    return doomed.length;
  }

  stats() {
    return {
      directory: this.directory,
      hits: this.hits,
      misses: this.misses,
      writes: this.writes,
    };
  }
}
