import axios from 'axios';
import * as cheerio from 'cheerio';
import type { Logger } from 'pino';
import { SlotFetchError, SlotPageError } from './errors';
import { Slot } from './types';

// The first day header sits above the table body, so rows start on Monday.
const FIRST_DAY = 'Montag';
const TIME_PATTERN = /^(\d{1,2}):(\d{2})/;

export interface FetchSlotsOptions {
  timeout?: number;
}

export type FetchSlotsPage = (url: string, options: FetchSlotsOptions) => Promise<string>;

export interface PollOptions {
  logger: Logger;
  timeout?: number;
  fetchPage?: FetchSlotsPage;
}

export type PollResult =
  | { ok: true; slots: Slot[] }
  | { ok: false; slots: Slot[]; error: Error };

export async function fetchSlotsPage(url: string, options: FetchSlotsOptions = {}): Promise<string> {
  try {
    const response = await axios.get<string>(url, {
      timeout: options.timeout ?? 10000,
      responseType: 'text',
      validateStatus: () => true,
    });

    if (response.status !== 200) {
      throw new SlotFetchError(`Request failed with status code ${response.status}`, response.status);
    }

    return response.data;
  } catch (error) {
    if (error instanceof SlotFetchError) {
      throw error;
    }
    const reason = axios.isAxiosError(error) ? error.code ?? error.message : String(error);
    throw new SlotFetchError(`Could not reach ${url}: ${reason}`, undefined, { cause: error });
  }
}

export function parseStartHour(time: string): number | null {
  const match = time.match(TIME_PATTERN);
  if (!match) {
    return null;
  }
  const hour = Number(match[1]);
  return Number.isInteger(hour) ? hour : null;
}

export function parseSlots(html: string, baseUrl: string): Slot[] {
  const $ = cheerio.load(html);

  const tableBody = $('div.table-body-group').first();
  if (tableBody.length === 0) {
    throw new SlotPageError('Could not find table containing time slots.');
  }

  const slots: Slot[] = [];
  let day = FIRST_DAY;

  tableBody.find('div.table-row').each((_, row) => {
    const $row = $(row);
    const head = $row.find('div.table-head.column-1').first();
    if (head.length > 0) {
      day = head.text().trim();
      return;
    }

    $row.find('div.date').each((__, cell) => {
      const $cell = $(cell);
      const time = $cell.find('strong.time').first().text().trim();
      const startHour = parseStartHour(time);
      if (startHour === null) {
        return;
      }

      // "Feld 2" -> "2"
      const court = $cell.find('span.detail').first().text().trim().slice(-1);
      const href = $cell.find('a').first().attr('href')?.trim();
      const bookingUrl = href ? new URL(href, baseUrl).toString() : undefined;

      slots.push({
        day,
        time,
        startHour,
        court,
        open: $cell.hasClass('bookable') && bookingUrl !== undefined,
        bookingUrl,
      });
    });
  });

  return slots;
}

/** Open slots per day, one line per time with the courts that are free. */
export function summarizeSlots(slots: Slot[]): Record<string, string[]> {
  const byDay = new Map<string, Map<string, string[]>>();

  for (const slot of slots) {
    if (!slot.open) {
      continue;
    }
    const times = byDay.get(slot.day) ?? new Map<string, string[]>();
    const courts = times.get(slot.time) ?? [];
    courts.push(slot.court);
    times.set(slot.time, courts);
    byDay.set(slot.day, times);
  }

  const summary: Record<string, string[]> = {};
  for (const [day, times] of byDay) {
    summary[day] = [...times].map(([time, courts]) => `${time} (court ${courts.join(' & ')})`);
  }
  return summary;
}

export async function pollSlots(url: string, options: PollOptions): Promise<PollResult> {
  const { logger } = options;
  const fetchPage = options.fetchPage ?? fetchSlotsPage;

  try {
    const html = await fetchPage(url, { timeout: options.timeout });
    const slots = parseSlots(html, url);
    const summary = summarizeSlots(slots);

    logger.debug({ total: slots.length }, 'Slots parsed');
    for (const [day, lines] of Object.entries(summary)) {
      logger.info({ day, count: lines.length, slots: lines }, 'Available slots');
    }

    return { ok: true, slots };
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.warn({ err, url }, 'Slot poll failed; no slots this cycle');
    return { ok: false, slots: [], error: err };
  }
}
