import { describe, it, expect, vi } from 'vitest';
import { FlowStepError, rootCause } from '../src/errors';
import { runFlow } from '../src/flow-runner';
import { bookingFlow } from '../src/flows/booking.flow';
import { getFlow } from '../src/flows';
import { FlowDefinition } from '../src/types';
import { makeConfig, makeSettings, silentLogger } from './helpers';

describe('runFlow', () => {
  it('logs the booking steps without a page on a dry run', async () => {
    const ctx = { config: makeConfig(), settings: makeSettings(), logger: silentLogger };

    const result = await runFlow(bookingFlow, ctx, { dryRun: true });

    expect(result.stepsCompleted).toBe(8);
    expect(result.data).toEqual({});
  });

  it('does not run step actions on a dry run', async () => {
    const action = vi.fn(async () => undefined);
    const flow: FlowDefinition = {
      name: 'sample',
      description: 'test flow',
      steps: [{ name: 'only', action }],
    };

    await runFlow(flow, { config: makeConfig(), settings: makeSettings(), logger: silentLogger }, { dryRun: true });

    expect(action).not.toHaveBeenCalled();
  });

  it('requires a page for a real run', async () => {
    const ctx = { config: makeConfig(), settings: makeSettings(), logger: silentLogger };

    await expect(runFlow(bookingFlow, ctx)).rejects.toThrow(
      'FlowContext.page is required for non-dry-run execution.'
    );
  });
});

describe('bookingFlow', () => {
  it('is registered', () => {
    expect(getFlow('booking')).toBe(bookingFlow);
    expect(getFlow('login')).toBeUndefined();
  });

  it('submits only after the review pause', () => {
    const names = bookingFlow.steps.map((step) => step.name);

    expect(names).toEqual([
      'open-slot',
      'select-date',
      'fill-participants',
      'submit-registration',
      'accept-confirmation',
      'review-pause',
      'confirm-booking',
      'hold-confirmation',
    ]);
  });
});

describe('rootCause', () => {
  it('unwraps step errors', () => {
    const cause = new Error('closed');
    const wrapped = new FlowStepError('booking', 'review-pause', cause);

    expect(wrapped.message).toBe('Step "review-pause" of flow "booking" failed: closed');
    expect(rootCause(wrapped)).toBe(cause);
    expect(rootCause(cause)).toBe(cause);
  });
});
