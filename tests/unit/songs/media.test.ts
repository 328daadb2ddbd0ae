/**
 * Unit tests for audio file checks
 */

import { describe, expect, it } from 'vitest';

import { checkAudioFile, extractExtension, toBaseFilename } from '@/modules/songs/core/media.js';

describe('toBaseFilename', () => {
  it('removes directory parts', () => {
    expect(toBaseFilename('../../etc/passwd.mp3')).toBe('passwd.mp3');
    expect(toBaseFilename('C:\\music\\track.mp3')).toBe('track.mp3');
  });

  it('trims whitespace', () => {
    expect(toBaseFilename('  track.mp3 ')).toBe('track.mp3');
  });
});

describe('extractExtension', () => {
  it('returns the lowercased last extension', () => {
    expect(extractExtension('Track.FLAC')).toBe('.flac');
    expect(extractExtension('archive.tar.gz')).toBe('.gz');
  });

  it('returns an empty string for dotfiles and names without a dot', () => {
    expect(extractExtension('.hidden')).toBe('');
    expect(extractExtension('voice')).toBe('');
  });

  it('rejects extensions with unexpected characters', () => {
    expect(extractExtension('a.m p3')).toBe('');
  });
});

describe('checkAudioFile', () => {
  it('accepts an allow-listed MIME type', () => {
    const result = checkAudioFile('audio/mpeg', 'track.mp3');

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({
        extension: '.mp3',
        mimeType: 'audio/mpeg',
        originalFilename: 'track.mp3',
      });
    }
  });

  it('accepts a generic MIME type when the extension is allow-listed', () => {
    const result = checkAudioFile('application/octet-stream', 'Track.FLAC');

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.extension).toBe('.flac');
      expect(result.value.mimeType).toBe('application/octet-stream');
    }
  });

  it('normalizes MIME parameters and case', () => {
    const result = checkAudioFile('Audio/OGG; codecs=opus', 'voice');

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.mimeType).toBe('audio/ogg');
      expect(result.value.extension).toBe('');
    }
  });

  it('uses the fallback MIME type when none was sent', () => {
    const result = checkAudioFile(undefined, 'song.wav');

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.mimeType).toBe('application/octet-stream');
    }
  });

  it('rejects files that are neither audio MIME nor audio extension', () => {
    const result = checkAudioFile('text/plain', 'notes.txt');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({
        type: 'InvalidInputError',
        message: 'Unsupported audio format',
        field: 'file',
      });
    }
  });

  it('rejects an empty file name', () => {
    const result = checkAudioFile('audio/mpeg', '   ');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('File name is required');
    }
  });

  it('keeps only the base name of a path-like file name', () => {
    const result = checkAudioFile('audio/mpeg', '../uploads/track.mp3');

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.originalFilename).toBe('track.mp3');
    }
  });
});
