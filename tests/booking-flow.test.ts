import { describe, it, expect } from 'vitest';
import { BookingCancelledError, BookingLayoutError, FlowStepError, rootCause } from '../src/errors';
import { runFlow } from '../src/flow-runner';
import { bookingFlow } from '../src/flows/booking.flow';
import { FlowContext, Slot } from '../src/types';
import { FakeFlowPage } from './fake-page';
import { makeConfig, makeSettings, silentLogger } from './helpers';

const REGISTER = 'button "verbindlich anmelden"';
const CONFIRM = 'button "kostenpflichtig buchen"';

const slot: Slot = {
  day: 'Mittwoch',
  time: '14:00-15:00',
  startHour: 14,
  court: '2',
  open: true,
  bookingUrl: 'https://booking.example.com/buchung.html?slot=w2',
};

function context(page: FakeFlowPage, reviewTimeS: number): FlowContext {
  return {
    config: { ...makeConfig(), confirmationHoldMs: 0 },
    settings: { ...makeSettings(), reviewTimeS },
    logger: silentLogger,
    slot,
    page,
    flowData: {},
  };
}

async function failureOf(promise: Promise<unknown>): Promise<FlowStepError> {
  const error = await promise.then(
    () => undefined,
    (err: unknown) => err
  );
  if (!(error instanceof FlowStepError)) {
    throw new Error('expected the flow to fail in a step');
  }
  return error;
}

describe('bookingFlow on a page', () => {
  it('submits right after the form when there is no review time', async () => {
    const page = new FakeFlowPage();

    const result = await runFlow(bookingFlow, context(page, 0));

    expect(result.stepsCompleted).toBe(8);
    expect(page.events.slice(0, 3)).toEqual([
      'goto https://booking.example.com/buchung.html?slot=w2',
      'check radio',
      'click button "weiter zur Buchung"',
    ]);
    expect(page.events.slice(-4)).toEqual([
      'check input[name="BuchBed"]',
      `click ${REGISTER}`,
      'check checkbox',
      `click ${CONFIRM}`,
    ]);
    expect(page.events.some((event) => event.startsWith('wait'))).toBe(false);
    expect(result.data).toMatchObject({ slot, fieldsFilled: 22 });
  });

  it('waits out the review window before confirming', async () => {
    const page = new FakeFlowPage();

    await runFlow(bookingFlow, context(page, 2));

    expect(page.events.slice(-4)).toEqual(['check checkbox', 'wait 1000', 'wait 1000', `click ${CONFIRM}`]);
  });

  it('cancels when the browser is closed during review', async () => {
    const page = new FakeFlowPage({ closeOnWait: 3 });

    const error = await failureOf(runFlow(bookingFlow, context(page, 5)));

    expect(error.step).toBe('review-pause');
    expect(rootCause(error)).toBeInstanceOf(BookingCancelledError);
    expect(page.events.slice(-3)).toEqual(['check checkbox', 'wait 1000', 'wait 1000']);
    expect(page.events).not.toContain(`click ${CONFIRM}`);
  });

  it('aborts on a missing button and never confirms', async () => {
    const page = new FakeFlowPage({ missing: [REGISTER] });

    const error = await failureOf(runFlow(bookingFlow, context(page, 0)));

    expect(error.step).toBe('submit-registration');
    const cause = rootCause(error);
    expect(cause).toBeInstanceOf(BookingLayoutError);
    expect(cause).toMatchObject({ missing: [REGISTER] });
    expect(page.events.at(-1)).toBe('check input[name="BuchBed"]');
    expect(page.events).not.toContain(`click ${CONFIRM}`);
  });

  it('leaves the form untouched when a required field is missing', async () => {
    const page = new FakeFlowPage({ missing: ['input[name="iban"]'] });

    const error = await failureOf(runFlow(bookingFlow, context(page, 0)));

    expect(error.step).toBe('fill-participants');
    expect(rootCause(error)).toMatchObject({ missing: ['input[name="iban"]'] });
    expect(page.events).toEqual([
      'goto https://booking.example.com/buchung.html?slot=w2',
      'check radio',
      'click button "weiter zur Buchung"',
    ]);
  });
});
