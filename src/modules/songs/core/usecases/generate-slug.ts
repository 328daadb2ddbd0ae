/**
 * Generate Slug Use Case
 *
 * Mints a share identifier that no existing song uses.
 */

import { ok, err, type Result } from 'neverthrow';

import { createCollisionRetryExhaustedError, type SongError } from '../errors.js';
import { buildSlugBase, composeSlug } from '../slug.js';
import { SLUG_SUFFIX_LENGTH, TOKEN_BYTES, type RandomSource, type SongsConfig } from '../types.js';

import type { SongRepository } from '../ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface GenerateSlugDeps {
  songRepo: SongRepository;
  random: RandomSource;
  config: Pick<SongsConfig, 'slugStrategy' | 'slugMaxAttempts'>;
}

export interface GenerateSlugInput {
  title: string;
  artist: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

export interface MintedSlug {
  slug: string;
  /** Candidates drawn, including the one returned */
  attempts: number;
}

/**
 * Draws candidates with the configured strategy until one is free or
 * `budget` candidates have been drawn.
 *
 * - `token`: URL-safe random token, no existence check (the unique
 *   constraint on insert is the only backstop)
 * - `readable`: `<title-artist>-<hex suffix>`, redrawing the suffix while the
 *   candidate is taken
 *
 * A record store failure during the existence check is returned as is; no
 * slug is issued without a completed check.
 */
export const mintSlug = async (
  deps: GenerateSlugDeps,
  input: GenerateSlugInput,
  budget: number
): Promise<Result<MintedSlug, SongError>> => {
  const { songRepo, random, config } = deps;
  const maxAttempts = Math.max(1, budget);

  if (config.slugStrategy === 'token') {
    return ok({ slug: random.urlSafeToken(TOKEN_BYTES), attempts: 1 });
  }

  const base = buildSlugBase(input.title, input.artist);

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const candidate = composeSlug(base, random.hex(SLUG_SUFFIX_LENGTH));

    const existsResult = await songRepo.existsBySlug(candidate);
    if (existsResult.isErr()) {
      return err(existsResult.error);
    }

    if (!existsResult.value) {
      return ok({ slug: candidate, attempts: attempt });
    }
  }

  return err(createCollisionRetryExhaustedError(maxAttempts));
};

/**
 * Generates a slug, drawing at most `slugMaxAttempts` candidates.
 */
export const generateSlug = async (
  deps: GenerateSlugDeps,
  input: GenerateSlugInput
): Promise<Result<string, SongError>> => {
  const result = await mintSlug(deps, input, deps.config.slugMaxAttempts);
  return result.map((minted) => minted.slug);
};
