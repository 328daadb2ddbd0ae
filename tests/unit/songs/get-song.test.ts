/**
 * Unit tests for get-song and download-song use cases
 */

import { describe, expect, it } from 'vitest';

import { EMPTY_REQUEST_CONTEXT } from '@/modules/songs/core/types.js';
import { downloadSong } from '@/modules/songs/core/usecases/download-song.js';
import { getSong } from '@/modules/songs/core/usecases/get-song.js';

import { makeSong } from '../../fixtures/builders.js';
import {
  makeFakeBlobStorage,
  makeFakeSongRepo,
  makeRecordingEventRecorder,
  makeTestLogger,
} from '../../fixtures/fakes.js';

import type { Readable } from 'node:stream';

const SLUG = 'night-drive-the-lanterns-a1b2c3';

const readAll = async (stream: Readable): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString();
};

describe('getSong use case', () => {
  it('returns the public song and records a view', async () => {
    const songRepo = makeFakeSongRepo({ songs: [makeSong({ slug: SLUG, viewCount: 4 })] });
    const eventRecorder = makeRecordingEventRecorder();
    const context = { userAgent: 'test-agent/1.0', ipAddress: '198.51.100.2', referer: null };

    const result = await getSong(
      { songRepo, eventRecorder, config: { publicBaseUrl: undefined } },
      { slug: SLUG, context }
    );

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.slug).toBe(SLUG);
      expect(result.value.title).toBe('Night Drive');
      // Counters as read, before this view
      expect(result.value.viewCount).toBe(4);
      expect(result.value.metaUrl).toBe(`/api/songs/${SLUG}`);
    }
    expect(eventRecorder.recorded).toEqual([
      { slug: SLUG, eventType: 'view', songTitle: 'Night Drive', context },
    ]);
  });

  it('returns SongNotFoundError for an unknown slug', async () => {
    const eventRecorder = makeRecordingEventRecorder();

    const result = await getSong(
      { songRepo: makeFakeSongRepo(), eventRecorder, config: { publicBaseUrl: undefined } },
      { slug: 'unknown-a1b2c3', context: EMPTY_REQUEST_CONTEXT }
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({
        type: 'SongNotFoundError',
        message: 'Song not found',
        slug: 'unknown-a1b2c3',
      });
    }
    expect(eventRecorder.recorded).toHaveLength(0);
  });

  it('rejects a malformed slug without querying the store', async () => {
    const result = await getSong(
      {
        songRepo: makeFakeSongRepo({ simulateDbError: true }),
        eventRecorder: makeRecordingEventRecorder(),
        config: { publicBaseUrl: undefined },
      },
      { slug: 'not a slug!', context: EMPTY_REQUEST_CONTEXT }
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe('SongNotFoundError');
    }
  });

  it('returns store failures', async () => {
    const result = await getSong(
      {
        songRepo: makeFakeSongRepo({ simulateDbError: true }),
        eventRecorder: makeRecordingEventRecorder(),
        config: { publicBaseUrl: undefined },
      },
      { slug: SLUG, context: EMPTY_REQUEST_CONTEXT }
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe('StoreUnavailableError');
    }
  });
});

describe('downloadSong use case', () => {
  const setup = () => {
    const songRepo = makeFakeSongRepo({
      songs: [makeSong({ slug: SLUG, storedLocation: 'blob-1.mp3' })],
    });
    const blobStorage = makeFakeBlobStorage();
    blobStorage.files.set('blob-1.mp3', Buffer.from('audio-bytes'));
    const eventRecorder = makeRecordingEventRecorder();
    return {
      songRepo,
      blobStorage,
      eventRecorder,
      deps: { songRepo, blobStorage, eventRecorder, logger: makeTestLogger() },
    };
  };

  it('opens the file and records a download', async () => {
    const { deps, eventRecorder } = setup();

    const result = await downloadSong(deps, { slug: SLUG, context: EMPTY_REQUEST_CONTEXT });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.sizeBytes).toBe(11);
      expect(result.value.mimeType).toBe('audio/mpeg');
      expect(result.value.filename).toBe('night-drive.mp3');
      expect(await readAll(result.value.stream)).toBe('audio-bytes');
    }
    expect(eventRecorder.recorded).toEqual([
      { slug: SLUG, eventType: 'download', songTitle: 'Night Drive', context: EMPTY_REQUEST_CONTEXT },
    ]);
  });

  it('returns SongFileMissingError when the file is gone', async () => {
    const { deps, blobStorage, eventRecorder } = setup();
    blobStorage.files.delete('blob-1.mp3');

    const result = await downloadSong(deps, { slug: SLUG, context: EMPTY_REQUEST_CONTEXT });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe('SongFileMissingError');
    }
    expect(eventRecorder.recorded).toHaveLength(0);
  });

  it('returns SongNotFoundError for an unknown slug', async () => {
    const { deps } = setup();

    const result = await downloadSong(deps, {
      slug: 'unknown-a1b2c3',
      context: EMPTY_REQUEST_CONTEXT,
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe('SongNotFoundError');
    }
  });
});
