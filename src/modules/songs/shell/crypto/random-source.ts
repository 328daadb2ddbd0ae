/**
 * Crypto-backed random source for slug generation.
 */

import { randomBytes } from 'node:crypto';

import type { RandomSource } from '../../core/types.js';

export const cryptoRandomSource: RandomSource = {
  hex: (length: number): string =>
    randomBytes(Math.ceil(length / 2))
      .toString('hex')
      .slice(0, length),
  urlSafeToken: (bytes: number): string => randomBytes(bytes).toString('base64url'),
};
