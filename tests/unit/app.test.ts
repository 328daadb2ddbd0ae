/**
 * Unit tests for app factory
 */

import { describe, expect, it } from 'vitest';

import { buildApp, createApp, toSongsConfig } from '@/app/build-app.js';

import { makeSong, makeTestConfig } from '../fixtures/builders.js';
import { makeFakeBlobStorage, makeFakeSongRepo, makeTestLogger } from '../fixtures/fakes.js';

const SLUG = 'night-drive-the-lanterns-a1b2c3';

describe('App Factory', () => {
  describe('buildApp', () => {
    it('requires the core dependencies', async () => {
      await expect(buildApp({ deps: { config: makeTestConfig() } })).rejects.toThrow(
        'Missing required dependencies: config, logger, songRepo, blobStorage'
      );
    });

    it('registers song, analytics and health routes', async () => {
      const app = await buildApp({
        fastifyOptions: { logger: false },
        deps: {
          config: makeTestConfig(),
          logger: makeTestLogger(),
          songRepo: makeFakeSongRepo(),
          blobStorage: makeFakeBlobStorage(),
        },
      });
      await app.ready();

      expect(app.hasRoute({ method: 'POST', url: '/api/songs/upload' })).toBe(true);
      expect(app.hasRoute({ method: 'GET', url: '/api/songs/:slug' })).toBe(true);
      expect(app.hasRoute({ method: 'GET', url: '/api/songs/:slug/download' })).toBe(true);
      expect(app.hasRoute({ method: 'GET', url: '/api/analytics/overview' })).toBe(true);
      expect(app.hasRoute({ method: 'GET', url: '/health/ready' })).toBe(true);

      await app.close();
    });
  });

  describe('toSongsConfig', () => {
    it('combines the songs and storage sections', () => {
      const config = makeTestConfig({
        storage: { maxUploadBytes: 2048 },
        songs: { slugStrategy: 'token', slugMaxAttempts: 3 },
      });

      expect(toSongsConfig(config)).toEqual({
        publicBaseUrl: undefined,
        slugStrategy: 'token',
        slugMaxAttempts: 3,
        maxUploadBytes: 2048,
      });
    });
  });

  describe('createApp', () => {
    it('finishes pending view recordings on close', async () => {
      const songRepo = makeFakeSongRepo({ songs: [makeSong({ slug: SLUG })] });
      const app = await createApp({
        fastifyOptions: { logger: false },
        deps: {
          config: makeTestConfig(),
          logger: makeTestLogger(),
          songRepo,
          blobStorage: makeFakeBlobStorage(),
        },
      });

      const response = await app.inject({ method: 'GET', url: `/api/songs/${SLUG}` });
      await app.close();

      expect(response.statusCode).toBe(200);
      expect(songRepo.allSongs()[0]?.viewCount).toBe(1);
      expect(songRepo.allEvents()).toHaveLength(1);
    });

    it('hides unexpected errors behind a generic 500', async () => {
      const app = await createApp({
        fastifyOptions: { logger: false },
        deps: {
          config: makeTestConfig(),
          logger: makeTestLogger(),
          songRepo: makeFakeSongRepo({ throwingOperations: ['findBySlug'] }),
          blobStorage: makeFakeBlobStorage(),
        },
      });

      const response = await app.inject({ method: 'GET', url: `/api/songs/${SLUG}` });
      await app.close();

      expect(response.statusCode).toBe(500);
      expect(response.json()).toEqual({
        ok: false,
        error: 'InternalServerError',
        message: 'An unexpected error occurred',
      });
    });

    it('names the method and URL of unknown routes', async () => {
      const app = await createApp({
        fastifyOptions: { logger: false },
        deps: {
          config: makeTestConfig(),
          logger: makeTestLogger(),
          songRepo: makeFakeSongRepo(),
          blobStorage: makeFakeBlobStorage(),
        },
      });

      const response = await app.inject({ method: 'POST', url: '/does-not-exist' });
      await app.close();

      expect(response.statusCode).toBe(404);
      expect(response.json().message).toBe('Route POST /does-not-exist not found');
    });
  });
});
