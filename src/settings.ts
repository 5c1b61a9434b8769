import fs from 'fs';
import { z } from 'zod';
import { ConfigError, ConfigValidationError } from './errors';
import { BookingSettings, Person, PersonStatus, WEEKDAYS } from './types';

export const OPENING_HOUR = 8;
export const CLOSING_HOUR = 22;

const NAME_PATTERN = /^\p{L}[\p{L}\s'-]*$/u;
const EMAIL_PATTERN = /^[a-zA-Z0-9_.+-]+@[a-zA-Z0-9-]+\.[a-zA-Z0-9-.]+$/;
const POSTAL_CODE_PATTERN = /^\d{5}$/;
const BIRTHDATE_PATTERN = /^\d{2}\.\d{2}\.\d{4}$/;
const IBAN_PATTERN = /^[A-Z]{2}\d{2}[A-Z0-9]{11,30}$/;
const BIC_PATTERN = /^[A-Z]{6}[A-Z0-9]{2}([A-Z0-9]{3})?$/;

const STATUS_VALUES = ['S-TU', 'TU-Alumni', 'extern'] as const;

const STATUS_DESCRIPTIONS: Record<(typeof STATUS_VALUES)[number], string> = {
  'S-TU': 'Student',
  'TU-Alumni': 'Registered Alumni',
  extern: 'External',
};

const textOrNumber = z.union([z.string(), z.number()]).transform((value) => String(value).trim());

function capitalize(value: string): string {
  const trimmed = value.trim();
  return trimmed.charAt(0).toUpperCase() + trimmed.slice(1).toLowerCase();
}

function freezePerson(person: Person): Person {
  return Object.freeze({ ...person, status: Object.freeze({ ...person.status }) });
}

function compact(value: string): string {
  return value.replace(/\s+/g, '').toUpperCase();
}

const personSchema = z
  .object({
    gender: z.string({ required_error: 'Gender is required.' }).trim(),
    first_name: z.string().trim().regex(NAME_PATTERN, 'First name should only contain letters.'),
    last_name: z.string().trim().regex(NAME_PATTERN, 'Last name should only contain letters.'),
    address: z.string().trim().min(1, 'Address is required.'),
    city: z.string().trim().min(1, 'City is required.'),
    postal_code: textOrNumber.pipe(
      z.string().regex(POSTAL_CODE_PATTERN, 'Postal code must be a 5-digit number.')
    ),
    status: z.enum(STATUS_VALUES, {
      errorMap: () => ({
        message: `Status must be one of ${STATUS_VALUES.map(
          (value) => `${value} (${STATUS_DESCRIPTIONS[value]})`
        ).join(', ')}.`,
      }),
    }),
    student_number: textOrNumber.optional(),
    email: z.string().trim().regex(EMAIL_PATTERN, 'Invalid email address.'),
    phone: textOrNumber.refine(
      (value) => /^\d+$/.test(value.replace(/[\s+]/g, '')),
      'Phone number must contain only digits.'
    ),
    birthdate: z.string().trim().regex(BIRTHDATE_PATTERN, 'Birthdate must use the format dd.mm.yyyy.'),
  })
  .transform((raw, ctx): Person => {
    let status: PersonStatus;
    if (raw.status === 'S-TU') {
      if (!raw.student_number) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['student_number'],
          message: 'Student number is required for status S-TU.',
        });
        return z.NEVER;
      }
      status = { kind: 'student', studentNumber: raw.student_number };
    } else if (raw.status === 'TU-Alumni') {
      status = { kind: 'alumnus' };
    } else {
      status = { kind: 'external' };
    }

    return {
      gender: raw.gender,
      firstName: raw.first_name,
      lastName: raw.last_name,
      address: raw.address,
      city: raw.city,
      postalCode: raw.postal_code,
      status,
      email: raw.email,
      phone: raw.phone,
      birthdate: raw.birthdate,
    };
  });

const bookingSchema = z.object({
  person1: personSchema,
  person2: personSchema,
  banking: z.object({
    iban: z.string().transform(compact).pipe(z.string().regex(IBAN_PATTERN, 'Invalid IBAN.')),
    bic: z.string().transform(compact).pipe(z.string().regex(BIC_PATTERN, 'Invalid BIC.')),
  }),
  slots_overview_url: z
    .string()
    .trim()
    .url('Slots overview URL must be a valid URL.')
    .refine((value) => /^https?:\/\//i.test(value), 'Slots overview URL must use http or https.'),
  desired_day: z
    .string()
    .transform(capitalize)
    .pipe(
      z.enum(WEEKDAYS, {
        errorMap: () => ({ message: `Day must be one of ${WEEKDAYS.join(', ')}.` }),
      })
    ),
  desired_start_time: z
    .number({ invalid_type_error: 'Start time must be a number.' })
    .int('Start time must be a whole hour.')
    .min(OPENING_HOUR, `Start time must be between ${OPENING_HOUR} and ${CLOSING_HOUR}.`)
    .max(CLOSING_HOUR, `Start time must be between ${OPENING_HOUR} and ${CLOSING_HOUR}.`),
  desired_duration_h: z.number().positive().optional(),
  double_booking: z.boolean().optional(),
  request_refresh_interval_s: z
    .number()
    .int('Refresh interval must be a whole number of seconds.')
    .positive('Refresh interval must be positive.'),
  review_time_s: z
    .number()
    .int('Review time must be a whole number of seconds.')
    .nonnegative('Review time must not be negative.'),
});

export function toValidationErrors(error: z.ZodError): ConfigValidationError[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.') || '(root)',
    message: issue.message,
  }));
}

export function parseBookingSettings(raw: unknown): BookingSettings {
  const result = bookingSchema.safeParse(raw);
  if (!result.success) {
    const issues = toValidationErrors(result.error);
    throw new ConfigError(`Booking configuration is invalid (${issues.length} issue(s)).`, issues);
  }

  const data = result.data;
  return Object.freeze({
    person1: freezePerson(data.person1),
    person2: freezePerson(data.person2),
    banking: Object.freeze({ ...data.banking }),
    slotsOverviewUrl: data.slots_overview_url,
    desiredDay: data.desired_day,
    desiredStartHour: data.desired_start_time,
    refreshIntervalS: data.request_refresh_interval_s,
    reviewTimeS: data.review_time_s,
    desiredDurationH: data.desired_duration_h,
    doubleBooking: data.double_booking,
  });
}

export function loadBookingSettings(filePath: string): BookingSettings {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Booking config not found: ${filePath}`, [
      { field: 'BOOKING_CONFIG', message: `File not found: ${filePath}` },
    ]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Booking config is not valid JSON: ${filePath}`, [
      { field: '(root)', message: reason },
    ]);
  }

  return parseBookingSettings(raw);
}

function mask(value: string, keepStart = 4, keepEnd = 2): string {
  if (value.length <= keepStart + keepEnd) {
    return '***';
  }
  return `${value.slice(0, keepStart)}${'*'.repeat(value.length - keepStart - keepEnd)}${value.slice(-keepEnd)}`;
}

function redactPerson(person: Person): Person {
  if (person.status.kind !== 'student') {
    return person;
  }
  return { ...person, status: { kind: 'student', studentNumber: '***' } };
}

export function redactSettings(settings: BookingSettings): BookingSettings {
  return {
    ...settings,
    person1: redactPerson(settings.person1),
    person2: redactPerson(settings.person2),
    banking: {
      iban: mask(settings.banking.iban),
      bic: settings.banking.bic,
    },
  };
}
