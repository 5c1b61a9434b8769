import { setTimeout as delay } from 'timers/promises';
import type { Logger } from 'pino';
import { findMatchingSlot, formatTimeSlot, SlotPreference } from './matcher';
import { PollResult } from './slots';
import { Slot } from './types';

export type MonitorState =
  | 'idle'
  | 'polling'
  | 'matched'
  | 'booking'
  | 'done'
  | 'stopped'
  | 'error';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface MonitorDeps<T> {
  poll: () => Promise<PollResult>;
  book: (slot: Slot) => Promise<T>;
  sleep?: Sleep;
}

export interface MonitorOptions {
  preference: SlotPreference;
  intervalMs: number;
  logger: Logger;
  signal?: AbortSignal;
  onStateChange?: (state: MonitorState, previous: MonitorState) => void;
}

export type MonitorOutcome<T> =
  | { status: 'booked'; slot: Slot; result: T; polls: number }
  | { status: 'stopped'; polls: number };

/** Resolves early, without throwing, once the signal aborts. */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      return;
    }
    throw error;
  }
}

export class SlotMonitor<T> {
  private state: MonitorState = 'idle';
  private polls = 0;
  private readonly deps: MonitorDeps<T>;
  private readonly options: MonitorOptions;

  constructor(deps: MonitorDeps<T>, options: MonitorOptions) {
    this.deps = deps;
    this.options = options;
  }

  get currentState(): MonitorState {
    return this.state;
  }

  get pollCount(): number {
    return this.polls;
  }

  async run(): Promise<MonitorOutcome<T>> {
    const { preference, intervalMs, logger, signal } = this.options;
    const wait = this.deps.sleep ?? sleep;
    const target = { day: preference.day, time: formatTimeSlot(preference.startHour) };

    logger.info({ ...target, intervalMs }, 'Watching for slot');

    while (!signal?.aborted) {
      this.transition('polling');
      this.polls += 1;
      const result = await this.deps.poll();

      if (signal?.aborted) {
        break;
      }

      const slot = findMatchingSlot(result.slots, preference);
      if (slot) {
        this.transition('matched');
        logger.info({ day: slot.day, time: slot.time, court: slot.court }, 'Matching slot found');

        this.transition('booking');
        try {
          const booked = await this.deps.book(slot);
          this.transition('done');
          return { status: 'booked', slot, result: booked, polls: this.polls };
        } catch (error) {
          this.transition('error');
          throw error;
        }
      }

      this.transition('idle');
      logger.info(
        { ...target, pollOk: result.ok, nextPollInS: Math.round(intervalMs / 1000) },
        'No matching slot; trying again later'
      );
      await wait(intervalMs, signal);
    }

    this.transition('stopped');
    logger.info({ polls: this.polls }, 'Slot watch stopped');
    return { status: 'stopped', polls: this.polls };
  }

  private transition(next: MonitorState): void {
    const previous = this.state;
    this.state = next;
    this.options.logger.debug({ from: previous, to: next }, 'Monitor state');
    this.options.onStateChange?.(next, previous);
  }
}
