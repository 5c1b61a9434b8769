import type { Logger } from 'pino';
import { BookingLayoutError } from './errors';
import { BankAccount, BookingSettings, FormPage, Person, PersonStatus } from './types';

export const STATUS_LABELS: Record<PersonStatus['kind'], string> = {
  student: 'S-TU',
  alumnus: 'TU-Alumni',
  external: 'extern',
};

const GENDER_IDS: Record<string, string> = {
  male: 'maennlich',
  female: 'weiblich',
};

// "keine Angabe"
const UNSPECIFIED_GENDER_ID = 'ska';

export type FormAction =
  | { kind: 'check'; selector: string; optional?: boolean }
  | { kind: 'fill'; selector: string; value: string; optional?: boolean }
  | { kind: 'select'; selector: string; value: string; optional?: boolean };

export function genderId(gender: string): string {
  return GENDER_IDS[gender.trim().toLowerCase()] ?? UNSPECIFIED_GENDER_ID;
}

/**
 * Form actions for one participant. The first participant's inputs carry no
 * suffix, the second one's end in "2" (Vorname, Vorname2, ...).
 */
export function buildPersonFields(person: Person, index?: number): FormAction[] {
  const suffix = index === undefined ? '' : String(index);
  const input = (name: string): string => `input[name="${name}${suffix}"]`;

  const actions: FormAction[] = [
    { kind: 'check', selector: `input[name="Geschlecht${suffix}"][id="${genderId(person.gender)}"]` },
    { kind: 'fill', selector: input('Vorname'), value: person.firstName },
    { kind: 'fill', selector: input('Name'), value: person.lastName },
    { kind: 'fill', selector: input('Strasse'), value: person.address },
    { kind: 'fill', selector: input('Ort'), value: `${person.postalCode} ${person.city}` },
    { kind: 'select', selector: `select[name="Statusorig${suffix}"]`, value: STATUS_LABELS[person.status.kind] },
  ];

  if (person.status.kind === 'student') {
    actions.push({ kind: 'fill', selector: input('Matnr'), value: person.status.studentNumber });
  }

  actions.push(
    { kind: 'fill', selector: input('Mail'), value: person.email },
    { kind: 'fill', selector: input('Tel'), value: person.phone },
    // Only some offers ask for a birthdate.
    { kind: 'fill', selector: input('Geburtsdatum'), value: person.birthdate, optional: true }
  );

  return actions;
}

export function buildBankingFields(banking: BankAccount): FormAction[] {
  return [
    { kind: 'fill', selector: 'input[name="iban"]', value: banking.iban },
    { kind: 'fill', selector: 'input[name="bic"]', value: banking.bic },
    { kind: 'check', selector: 'input[name="BuchBed"]' },
  ];
}

export function buildBookingForm(settings: BookingSettings): FormAction[] {
  return [
    ...buildPersonFields(settings.person1),
    ...buildPersonFields(settings.person2, 2),
    ...buildBankingFields(settings.banking),
  ];
}

export async function findMissingFields(page: FormPage, actions: FormAction[]): Promise<string[]> {
  const missing: string[] = [];
  for (const action of actions) {
    if (action.optional) {
      continue;
    }
    const count = await page.locator(action.selector).count();
    if (count === 0) {
      missing.push(action.selector);
    }
  }
  return missing;
}

/**
 * Applies the actions in order. Every required element must exist before the
 * first one is touched; a partially filled form is never left behind.
 */
export async function applyFormActions(
  page: FormPage,
  actions: FormAction[],
  logger?: Logger
): Promise<number> {
  const missing = await findMissingFields(page, actions);
  if (missing.length > 0) {
    throw new BookingLayoutError(missing);
  }

  let applied = 0;
  for (const action of actions) {
    const locator = page.locator(action.selector);

    if (action.optional && !(await locator.isVisible())) {
      logger?.debug({ selector: action.selector }, 'Optional field not shown; skipping');
      continue;
    }

    switch (action.kind) {
      case 'check':
        await locator.check();
        break;
      case 'fill':
        await locator.fill(action.value);
        break;
      case 'select':
        await locator.selectOption(action.value);
        break;
    }
    applied += 1;
    logger?.debug({ selector: action.selector, kind: action.kind }, 'Form field applied');
  }

  return applied;
}
