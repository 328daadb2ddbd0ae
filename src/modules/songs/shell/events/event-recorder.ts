/**
 * Event Recorder
 *
 * Runs `recordEvent` in the background so lookups and downloads respond
 * without waiting for the counter and event log writes. Pending recordings
 * are tracked so shutdown (and tests) can wait for them.
 */

import { recordEvent } from '../../core/usecases/record-event.js';

import type { EventRecorder, RecordEventInput, SongRepository } from '../../core/ports.js';
import type { Logger } from 'pino';

export interface EventRecorderOptions {
  songRepo: SongRepository;
  logger: Logger;
}

class BackgroundEventRecorder implements EventRecorder {
  private readonly songRepo: SongRepository;
  private readonly log: Logger;
  private readonly pending = new Set<Promise<void>>();

  constructor(options: EventRecorderOptions) {
    this.songRepo = options.songRepo;
    this.log = options.logger.child({ component: 'EventRecorder' });
  }

  record(input: RecordEventInput): void {
    const task: Promise<void> = recordEvent({ songRepo: this.songRepo, logger: this.log }, input)
      .catch((error: unknown) => {
        this.log.error({ err: error, slug: input.slug }, 'Event recording failed unexpectedly');
      })
      .finally(() => {
        this.pending.delete(task);
      });

    this.pending.add(task);
  }

  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled([...this.pending]);
    }
  }
}

export const makeEventRecorder = (options: EventRecorderOptions): EventRecorder => {
  return new BackgroundEventRecorder(options);
};
