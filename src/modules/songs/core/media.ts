/**
 * Songs Module - Media Checks
 *
 * Allow-listing of uploaded audio by MIME type or file extension.
 */

import { ok, err, type Result } from 'neverthrow';

import { createInvalidInputError, type InvalidInputError } from './errors.js';
import {
  ALLOWED_AUDIO_EXTENSIONS,
  ALLOWED_AUDIO_MIME_TYPES,
  FALLBACK_MIME_TYPE,
} from './types.js';

const EXTENSION_PATTERN = /^\.[a-z0-9]{1,8}$/;

export interface AcceptedAudio {
  /** Lowercased extension including the dot, or '' */
  extension: string;
  mimeType: string;
  originalFilename: string;
}

/**
 * Strips any directory part a client put in the file name.
 */
export const toBaseFilename = (filename: string): string => {
  const parts = filename.split(/[\\/]/);
  const last = parts[parts.length - 1] ?? '';
  return last.trim();
};

/**
 * Extracts a safe, lowercased extension from a file name.
 * @returns '' when there is none or it contains unexpected characters
 */
export const extractExtension = (filename: string): string => {
  const base = toBaseFilename(filename);
  const dot = base.lastIndexOf('.');
  if (dot <= 0) {
    return '';
  }
  const extension = base.slice(dot).toLowerCase();
  return EXTENSION_PATTERN.test(extension) ? extension : '';
};

/**
 * Accepts a file when either its MIME type or its extension is allow-listed.
 */
export const checkAudioFile = (
  mimeType: string | undefined,
  filename: string
): Result<AcceptedAudio, InvalidInputError> => {
  const originalFilename = toBaseFilename(filename);
  if (originalFilename === '') {
    return err(createInvalidInputError('file', 'File name is required'));
  }

  const normalizedMime = mimeType?.split(';')[0]?.trim().toLowerCase() ?? '';
  const extension = extractExtension(originalFilename);

  const mimeAllowed = ALLOWED_AUDIO_MIME_TYPES.includes(normalizedMime);
  const extensionAllowed = ALLOWED_AUDIO_EXTENSIONS.includes(extension);

  if (!mimeAllowed && !extensionAllowed) {
    return err(createInvalidInputError('file', 'Unsupported audio format'));
  }

  return ok({
    extension,
    mimeType: normalizedMime !== '' ? normalizedMime : FALLBACK_MIME_TYPE,
    originalFilename,
  });
};
