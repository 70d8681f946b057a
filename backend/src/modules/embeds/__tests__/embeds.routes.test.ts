import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { FastifyInstance } from 'fastify';
import { buildApp, registerApiRoutes } from '../../../app.js';
import { EmbedService } from '../embeds.service.js';
import { RenderCache } from '../../render-cache/render-cache.service.js';
import type { ProfileLookup } from '../../profiles/profile.types.js';
import { UpstreamError } from '../../../common/errors.js';
import { GIF, makeProfile, NOW } from './fixtures.js';

describe('embed routes', () => {
  let dir: string;
  let app: FastifyInstance;
  const getProfile = vi.fn<[string], Promise<ProfileLookup>>();

  beforeEach(async () => {
    getProfile.mockReset();
    getProfile.mockResolvedValue({ profile: makeProfile(), cached: true });

    dir = await mkdtemp(path.join(os.tmpdir(), 'badge-routes-'));
    const renders = new RenderCache({ directory: dir });
    await renders.init();

    const embeds = new EmbedService({
      profiles: { get: getProfile },
      renders,
      images: { get: async () => GIF },
      rasterizer: { toPng: async () => Buffer.from('png-bytes') },
      clock: { now: () => NOW.getTime() },
    });

    app = buildApp({ logLevel: 'silent' });
    registerApiRoutes(app, {
      embeds,
      cacheStats: () => ({ renders: renders.stats() }),
    });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
    await rm(dir, { recursive: true, force: true });
  });

  it('answers health checks', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ok: true });
  });

  it('lists the embed catalogue', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/embeds' });
    const body = res.json();

    expect(res.statusCode).toBe(200);
    expect(body.embeds.map((e: { name: string }) => e.name)).toEqual(['large', 'small', 'tiny']);
    expect(body.embeds[2]).toEqual({
      name: 'tiny',
      width: 200,
      height: 32,
      filetypes: ['svg', 'png'],
      options: [
        { name: 'background_color', type: { type: 'color' }, description: 'Card background, hex without "#"', default: '#181b1f' },
        { name: 'foreground_color', type: { type: 'color' }, description: 'Text color, hex without "#"', default: '#f8f9fa' },
        { name: 'border_radius', type: { type: 'int', min: 0, max: 64 }, description: 'Corner radius in pixels', default: 8 },
        { name: 'show_status', type: { type: 'bool' }, description: 'Show the status dot', default: true },
      ],
    });
  });

  it('returns the defaults of a variant', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/embeds/small/defaults' });
    expect(res.json()).toEqual({
      ok: true,
      variant: 'small',
      defaults: {
        background_color: '#181b1f',
        foreground_color: '#f8f9fa',
        border_radius: 8,
        show: ['status', 'last_seen'],
        avatar: 'icon',
      },
    });
  });

  it('404s on an unknown variant', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/embeds/huge/defaults' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Unknown embed variant huge' });
  });

  it('serves a badge, then the cached copy', async () => {
    const first = await app.inject({ method: 'GET', url: '/usr_a/large.svg?border_radius=12' });
    const second = await app.inject({ method: 'GET', url: '/usr_a/large.svg?border_radius=12' });

    expect(first.statusCode).toBe(200);
    expect(first.headers['content-type']).toBe('image/svg+xml');
    expect(first.headers['cache-control']).toBe('public, max-age=60');
    expect(first.headers['x-cache']).toBe('MISS');
    expect(first.body).toContain('rx="12" ry="12" fill="#181b1f"/>');

    expect(second.headers['x-cache']).toBe('HIT');
    expect(second.body).toBe(first.body);
  });

  it('serves png badges', async () => {
    const res = await app.inject({ method: 'GET', url: '/usr_a/tiny.png' });
    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('image/png');
    expect(res.rawPayload.toString()).toBe('png-bytes');
  });

  it.each([
    ['/usr_a/large.svg?border_radius=abc', 'Invalid value for border_radius: Invalid integer: abc'],
    ['/usr_a/large.svg?nope=1', 'Unknown option nope'],
    ['/usr_a/large.svg?show=status&show=pronouns', 'Option show was given more than once'],
    ['/usr_a/large.svg?avatar=banner', 'Invalid value for avatar: Invalid value banner, must be one of: profile, avatar, icon, none'],
  ])('400s on bad options: %s', async (url, message) => {
    const res = await app.inject({ method: 'GET', url });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ ok: false, error: 'INVALID_OPTION', message });
  });

  it('404s on unknown embeds and subjects', async () => {
    expect((await app.inject({ method: 'GET', url: '/usr_a/huge.svg' })).statusCode).toBe(404);

    getProfile.mockResolvedValue({ profile: null, cached: false });
    const res = await app.inject({ method: 'GET', url: '/usr_gone/large.svg' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Unknown subject usr_gone' });
  });

  it('502s when the profile api fails', async () => {
    getProfile.mockRejectedValue(new UpstreamError('Profile request failed: timeout of 10000ms exceeded'));
    const res = await app.inject({ method: 'GET', url: '/usr_a/large.svg' });
    expect(res.statusCode).toBe(502);
    expect(res.json()).toMatchObject({ ok: false, error: 'UPSTREAM_ERROR' });
  });

  it('reports cache stats', async () => {
    await app.inject({ method: 'GET', url: '/usr_a/tiny.svg' });
    const res = await app.inject({ method: 'GET', url: '/api/cache/stats' });
    expect(res.json()).toEqual({
      ok: true,
      renders: { directory: dir, hits: 0, misses: 1, writes: 1 },
    });
  });

  it('answers unknown routes with the json 404', async () => {
    const res = await app.inject({ method: 'GET', url: '/a/b/c' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Route not found' });
  });
});
