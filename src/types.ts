import type { Logger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AppConfig {
  bookingConfigPath: string;
  headless: boolean;
  slowMo: number;
  outputDir: string;
  logLevel: LogLevel;
  globalTimeout: number;
  fetchTimeout: number;
  confirmationHoldMs: number;
}

export const WEEKDAYS = [
  'Montag',
  'Dienstag',
  'Mittwoch',
  'Donnerstag',
  'Freitag',
  'Samstag',
  'Sonntag',
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export type PersonStatus =
  | { readonly kind: 'student'; readonly studentNumber: string }
  | { readonly kind: 'alumnus' }
  | { readonly kind: 'external' };

export interface Person {
  readonly gender: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly address: string;
  readonly city: string;
  readonly postalCode: string;
  readonly status: PersonStatus;
  readonly email: string;
  readonly phone: string;
  readonly birthdate: string;
}

export interface BankAccount {
  readonly iban: string;
  readonly bic: string;
}

/** Loaded once at startup and frozen, nested records included. */
export interface BookingSettings {
  readonly person1: Person;
  readonly person2: Person;
  readonly banking: BankAccount;
  readonly slotsOverviewUrl: string;
  readonly desiredDay: Weekday;
  readonly desiredStartHour: number;
  readonly refreshIntervalS: number;
  readonly reviewTimeS: number;
  /** Accepted but not acted on. */
  readonly desiredDurationH?: number;
  /** Accepted but not acted on. */
  readonly doubleBooking?: boolean;
}

export interface Slot {
  day: string;
  /** Label as shown on the overview page, e.g. `14:00-15:00`. */
  time: string;
  startHour: number;
  court: string;
  open: boolean;
  bookingUrl?: string;
}

/** The slice of a Playwright locator the form code touches. */
export interface FormLocator {
  count(): Promise<number>;
  isVisible(): Promise<boolean>;
  check(): Promise<void>;
  fill(value: string): Promise<void>;
  selectOption(value: string): Promise<string[]>;
}

export interface FormPage {
  locator(selector: string): FormLocator;
}

export interface FlowLocator extends FormLocator {
  first(): FlowLocator;
  waitFor(options?: { state?: 'visible'; timeout?: number }): Promise<void>;
  click(): Promise<void>;
}

/** What the flows need from a page; a Playwright `Page` fits it. */
export interface FlowPage extends FormPage {
  goto(url: string, options?: { waitUntil?: 'domcontentloaded' }): Promise<unknown>;
  getByRole(role: 'radio' | 'button' | 'checkbox', options?: { name?: string }): FlowLocator;
  locator(selector: string): FlowLocator;
  waitForLoadState(state?: 'domcontentloaded'): Promise<void>;
  waitForTimeout(timeout: number): Promise<void>;
  isClosed(): boolean;
}

export interface FlowContext {
  config: AppConfig;
  settings: BookingSettings;
  logger: Logger;
  page?: FlowPage;
  slot?: Slot;
  flowData?: Record<string, unknown>;
}

export interface FlowStep {
  name: string;
  description?: string;
  action: (ctx: FlowContext) => Promise<void>;
}

export interface FlowDefinition {
  name: string;
  description: string;
  steps: FlowStep[];
}
