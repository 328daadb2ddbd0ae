/**
 * Songs Module - Slug Utilities
 *
 * Pure functions that turn song metadata into readable slugs.
 */

import { DEFAULT_SLUG_BASE, MAX_SLUG_BASE_LENGTH } from './types.js';

const COMBINING_MARKS = /[\u0300-\u036f]/g;
const NON_ALPHANUMERIC_RUN = /[^a-z0-9]+/g;
const EDGE_DASHES = /^-+|-+$/g;

const trimDashes = (value: string): string => value.replace(EDGE_DASHES, '');

/**
 * Builds the readable part of a slug from title and artist.
 *
 * Rules:
 * - Unicode is decomposed (NFKD) and combining marks dropped, so "Beyoncé" → "beyonce"
 * - Lowercased; every run of other characters becomes a single dash
 * - At most MAX_SLUG_BASE_LENGTH characters, never starting or ending with a dash
 * - Falls back to DEFAULT_SLUG_BASE when nothing is left
 *
 * @example
 * buildSlugBase('Hello, World!', 'The Band') // 'hello-world-the-band'
 */
export const buildSlugBase = (title: string, artist: string): string => {
  const normalized = `${title} ${artist}`
    .normalize('NFKD')
    .replace(COMBINING_MARKS, '')
    .toLowerCase()
    .replace(NON_ALPHANUMERIC_RUN, '-');

  const base = trimDashes(trimDashes(normalized).slice(0, MAX_SLUG_BASE_LENGTH));

  return base !== '' ? base : DEFAULT_SLUG_BASE;
};

export const composeSlug = (base: string, suffix: string): string => `${base}-${suffix}`;
