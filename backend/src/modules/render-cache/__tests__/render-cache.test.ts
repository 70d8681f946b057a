import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { RenderCache, computeFingerprint, renderFilename } from '../render-cache.service.js';
import { CacheIoError } from '../../../common/errors.js';

describe('computeFingerprint', () => {
  const config = { background_color: '#181b1f', border_radius: 8, show: ['status'] };

  it('is stable for identical inputs', () => {
    const a = computeFingerprint('usr_1', 'large', config);
    const b = computeFingerprint('usr_1', 'large', { ...config });
    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{64}$/);
  });

  it('ignores key order', () => {
    const reordered = { show: ['status'], border_radius: 8, background_color: '#181b1f' };
    expect(computeFingerprint('usr_1', 'large', reordered)).toBe(computeFingerprint('usr_1', 'large', config));
  });

  it('changes when any converted value changes', () => {
    const base = computeFingerprint('usr_1', 'large', config);
    expect(computeFingerprint('usr_1', 'large', { ...config, border_radius: 9 })).not.toBe(base);
    expect(computeFingerprint('usr_1', 'large', { ...config, show: ['status', 'pronouns'] })).not.toBe(base);
    expect(computeFingerprint('usr_1', 'large', { ...config, show: null })).not.toBe(base);
  });

  it('mixes in subject and variant', () => {
    const base = computeFingerprint('usr_1', 'large', config);
    expect(computeFingerprint('usr_2', 'large', config)).not.toBe(base);
    expect(computeFingerprint('usr_1', 'small', config)).not.toBe(base);
  });

  it('returns null for an empty option set', () => {
    expect(computeFingerprint('usr_1', 'tiny', {})).toBeNull();
  });
});

describe('renderFilename', () => {
  it('joins the segments with dots', () => {
    expect(renderFilename('usr_1', 'large', 'abc123', 'png')).toBe('usr_1.large.abc123.png');
  });

  it('omits the fingerprint segment when there is none', () => {
    expect(renderFilename('usr_1', 'tiny', null, 'svg')).toBe('usr_1.tiny.svg');
  });
});

describe('RenderCache', () => {
  let dir: string;
  let cache: RenderCache;
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'render-cache-test-'));
    cache = new RenderCache({ directory: path.join(dir, 'renders'), logger });
    await cache.init();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reports saved files as existing', async () => {
    expect(await cache.exists('usr_1.large.png')).toBe(false);
    await cache.save('usr_1.large.png', Buffer.from('png-bytes'));
    expect(await cache.exists('usr_1.large.png')).toBe(true);
    expect((await cache.read('usr_1.large.png')).toString()).toBe('png-bytes');
  });

  it('leaves no temporary files behind', async () => {
    await cache.save('usr_1.large.svg', Buffer.from('<svg/>'));
    expect(await readdir(cache.directory)).toEqual(['usr_1.large.svg']);
  });

  it('replaces an existing render in one step', async () => {
    await cache.save('usr_1.large.svg', Buffer.from('old'));
    await cache.save('usr_1.large.svg', Buffer.from('new'));
    expect(await readFile(path.join(cache.directory, 'usr_1.large.svg'), 'utf8')).toBe('new');
  });

  it('never exposes a partial file to concurrent readers', async () => {
    const payload = Buffer.alloc(512 * 1024, 7);
    const writes = Array.from({ length: 4 }, () => cache.save('usr_1.large.png', payload));

    const observed: number[] = [];
    for (let i = 0; i < 20; i++) {
      if (await cache.exists('usr_1.large.png')) {
        observed.push((await cache.read('usr_1.large.png')).length);
      }
      await new Promise((r) => setImmediate(r));
    }
    await Promise.all(writes);

    for (const size of observed) {
      expect(size).toBe(payload.length);
    }
    expect((await cache.read('usr_1.large.png')).length).toBe(payload.length);
  });

  it('surfaces write failures as CacheIoError without leaving a file', async () => {
    const broken = new RenderCache({ directory: path.join(dir, 'missing', 'dir') });
    await expect(broken.save('usr_1.large.png', Buffer.from('x'))).rejects.toBeInstanceOf(CacheIoError);
    expect(await broken.exists('usr_1.large.png')).toBe(false);
  });

  it('refuses filenames that escape the directory', async () => {
    await expect(cache.save('../evil.png', Buffer.from('x'))).rejects.toThrow('Invalid render filename');
    expect(await cache.exists('../evil.png')).toBe(false);
  });

  it('purges only the renders of one subject', async () => {
    await cache.save('usr_1.large.png', Buffer.from('a'));
    await cache.save('usr_1.small.abc.svg', Buffer.from('b'));
    await cache.save('usr_10.large.png', Buffer.from('c'));
    await writeFile(path.join(cache.directory, 'usr_2.tiny.svg'), 'd');

    expect(await cache.purgeSubject('usr_1')).toBe(2);
    expect((await readdir(cache.directory)).sort()).toEqual(['usr_10.large.png', 'usr_2.tiny.svg']);
  });

  it('advances a subject generation on every purge, even with nothing to remove', async () => {
    expect(cache.generation('usr_1')).toBe(0);
    await cache.purgeSubject('usr_1');
    await cache.purgeSubject('usr_1');
    expect(cache.generation('usr_1')).toBe(2);
    expect(cache.generation('usr_10')).toBe(0);
  });

  it('removes a single render', async () => {
    await cache.save('usr_1.large.png', Buffer.from('a'));
    await cache.save('usr_1.tiny.svg', Buffer.from('b'));
    await cache.remove('usr_1.large.png');
    await cache.remove('usr_1.large.png');
    expect(await readdir(cache.directory)).toEqual(['usr_1.tiny.svg']);
  });

  it('counts hits, misses and writes', async () => {
    await cache.exists('usr_1.large.png');
    await cache.save('usr_1.large.png', Buffer.from('a'));
    await cache.exists('usr_1.large.png');
    expect(cache.stats()).toMatchObject({ hits: 1, misses: 1, writes: 1 });
  });
});
