import fs from 'fs';
import path from 'path';
import pino from 'pino';
import { loadConfig } from '../src/config';
import { parseBookingSettings } from '../src/settings';
import { AppConfig, BookingSettings } from '../src/types';

export const OVERVIEW_URL = 'https://booking.example.com/angebote/aktueller_zeitraum/_Tennis.html';

export const silentLogger = pino({ level: 'silent' });

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, 'fixtures', name), 'utf-8');
}

/** A fresh, mutable copy of the sample booking JSON. */
export function rawBooking(): Record<string, unknown> {
  const parsed: unknown = JSON.parse(readFixture('form_data.json'));
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('form_data.json fixture must be an object');
  }
  return { ...parsed };
}

export function rawPerson(raw: Record<string, unknown>, key: 'person1' | 'person2'): Record<string, unknown> {
  const person = raw[key];
  if (!person || typeof person !== 'object' || Array.isArray(person)) {
    throw new Error(`${key} fixture must be an object`);
  }
  const copy = { ...person };
  raw[key] = copy;
  return copy;
}

export function makeSettings(): BookingSettings {
  return parseBookingSettings(rawBooking());
}

export function makeConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({ env });
}
