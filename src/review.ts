import type { Logger } from 'pino';

export interface ReviewOptions {
  wait: (ms: number) => Promise<void>;
  logger: Logger;
  tickMs?: number;
}

const ANNOUNCE_AT = new Set([60, 30, 10, 5, 3, 2, 1]);

/**
 * Counts down the review window before an irreversible submit. Closing the
 * browser makes `wait` reject, which is how a human aborts.
 */
export async function waitForReview(seconds: number, options: ReviewOptions): Promise<void> {
  const { wait, logger } = options;
  const tickMs = options.tickMs ?? 1000;

  if (seconds <= 0) {
    return;
  }

  logger.info({ seconds }, 'Review the form now; close the browser to cancel the booking');

  for (let remaining = seconds; remaining > 0; remaining -= 1) {
    if (ANNOUNCE_AT.has(remaining) && remaining !== seconds) {
      logger.info({ remaining }, 'Booking will be submitted soon');
    } else {
      logger.debug({ remaining }, 'Review countdown');
    }
    await wait(tickMs);
  }
}
