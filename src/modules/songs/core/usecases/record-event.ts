/**
 * Record Event Use Case
 *
 * Counts a view or download and appends it to the event log.
 * Both writes are attempted independently; failures are logged and never
 * reach the caller, so a broken event log cannot fail a lookup or download.
 */

import { counterForEvent } from '../types.js';

import type { SongError } from '../errors.js';
import type { RecordEventInput, SongRepository } from '../ports.js';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';

export interface RecordEventDeps {
  songRepo: SongRepository;
  logger: Logger;
}

const reportFailure = <T>(
  logger: Logger,
  outcome: PromiseSettledResult<Result<T, SongError>>,
  context: Record<string, unknown>,
  message: string
): void => {
  if (outcome.status === 'rejected') {
    logger.warn({ ...context, err: outcome.reason }, message);
    return;
  }
  if (outcome.value.isErr()) {
    logger.warn({ ...context, err: outcome.value.error }, message);
  }
};

export const recordEvent = async (
  deps: RecordEventDeps,
  input: RecordEventInput
): Promise<void> => {
  const { songRepo, logger } = deps;
  const { slug, eventType, songTitle, context } = input;

  const [incrementOutcome, insertOutcome] = await Promise.allSettled([
    songRepo.incrementCounter(slug, counterForEvent(eventType), 1),
    songRepo.insertEvent({
      slug,
      eventType,
      songTitle,
      userAgent: context.userAgent,
      ipAddress: context.ipAddress,
      referer: context.referer,
    }),
  ]);

  const logContext = { slug, eventType };
  reportFailure(logger, incrementOutcome, logContext, 'Failed to increment song counter');
  reportFailure(logger, insertOutcome, logContext, 'Failed to append song event');

  if (
    incrementOutcome.status === 'fulfilled' &&
    incrementOutcome.value.isOk() &&
    !incrementOutcome.value.value
  ) {
    logger.warn(logContext, 'No song matched counter increment');
  }
};
