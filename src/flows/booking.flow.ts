import { BookingCancelledError, BookingLayoutError } from '../errors';
import { applyFormActions, buildBookingForm } from '../form';
import { waitForReview } from '../review';
import { FlowContext, FlowDefinition, FlowLocator, FlowPage } from '../types';

const CONTINUE_LABEL = 'weiter zur Buchung';
const REGISTER_LABEL = 'verbindlich anmelden';
const CONFIRM_LABEL = 'kostenpflichtig buchen';

function requirePage(ctx: FlowContext): FlowPage {
  if (!ctx.page) {
    throw new Error('Booking flow needs an open page.');
  }
  return ctx.page;
}

async function requireElement(ctx: FlowContext, locator: FlowLocator, label: string): Promise<FlowLocator> {
  const target = locator.first();
  try {
    await target.waitFor({ state: 'visible', timeout: ctx.config.globalTimeout });
  } catch (error) {
    throw new BookingLayoutError([label], { cause: error });
  }
  return target;
}

function recordStep(ctx: FlowContext, key: string, value: unknown): void {
  if (!ctx.flowData) {
    ctx.flowData = {};
  }
  ctx.flowData[key] = value;
}

export const bookingFlow: FlowDefinition = {
  name: 'booking',
  description: 'Fill and submit the booking form for a matched slot',
  steps: [
    {
      name: 'open-slot',
      description: 'Open the booking page of the matched slot.',
      action: async (ctx) => {
        const page = requirePage(ctx);
        const url = ctx.slot?.bookingUrl;
        if (!url) {
          throw new Error('No booking URL for the matched slot.');
        }

        ctx.logger.info({ url, day: ctx.slot?.day, time: ctx.slot?.time }, 'Opening booking page');
        await page.goto(url, { waitUntil: 'domcontentloaded' });
        recordStep(ctx, 'slot', ctx.slot);
      },
    },
    {
      name: 'select-date',
      description: 'Pick the offered date and continue to the booking form.',
      action: async (ctx) => {
        const page = requirePage(ctx);
        // New dates are released one week ahead, so there is only ever one to choose.
        const radio = await requireElement(ctx, page.getByRole('radio'), 'date radio');
        await radio.check();
        const next = await requireElement(
          ctx,
          page.getByRole('button', { name: CONTINUE_LABEL }),
          `button "${CONTINUE_LABEL}"`
        );
        await next.click();
        await page.waitForLoadState('domcontentloaded');
      },
    },
    {
      name: 'fill-participants',
      description: 'Fill both participants and the banking details.',
      action: async (ctx) => {
        const page = requirePage(ctx);
        await requireElement(ctx, page.locator('input[name="Vorname"]'), 'input[name="Vorname"]');
        const applied = await applyFormActions(page, buildBookingForm(ctx.settings), ctx.logger);
        ctx.logger.info({ fields: applied }, 'Booking form filled');
        recordStep(ctx, 'fieldsFilled', applied);
      },
    },
    {
      name: 'submit-registration',
      description: 'Send the filled form to the confirmation page.',
      action: async (ctx) => {
        const page = requirePage(ctx);
        const register = await requireElement(
          ctx,
          page.getByRole('button', { name: REGISTER_LABEL }),
          `button "${REGISTER_LABEL}"`
        );
        await register.click();
        await page.waitForLoadState('domcontentloaded');
      },
    },
    {
      name: 'accept-confirmation',
      description: 'Confirm that the data is correct and the account is covered.',
      action: async (ctx) => {
        const page = requirePage(ctx);
        const checkbox = await requireElement(ctx, page.getByRole('checkbox'), 'confirmation checkbox');
        await checkbox.check();
      },
    },
    {
      name: 'review-pause',
      description: 'Wait for the review window; closing the browser cancels.',
      action: async (ctx) => {
        const page = requirePage(ctx);
        try {
          await waitForReview(ctx.settings.reviewTimeS, {
            wait: (ms) => page.waitForTimeout(ms),
            logger: ctx.logger,
          });
        } catch (error) {
          if (page.isClosed()) {
            throw new BookingCancelledError();
          }
          throw error;
        }

        if (page.isClosed()) {
          throw new BookingCancelledError();
        }
      },
    },
    {
      name: 'confirm-booking',
      description: 'Submit the paid booking. This cannot be undone.',
      action: async (ctx) => {
        const page = requirePage(ctx);
        const confirm = await requireElement(
          ctx,
          page.getByRole('button', { name: CONFIRM_LABEL }),
          `button "${CONFIRM_LABEL}"`
        );
        await confirm.click();
        recordStep(ctx, 'submittedAt', new Date().toISOString());
        ctx.logger.info({ day: ctx.slot?.day, time: ctx.slot?.time }, 'Booking submitted');
      },
    },
    {
      name: 'hold-confirmation',
      description: 'Keep the confirmation page open for a moment.',
      action: async (ctx) => {
        const page = requirePage(ctx);
        if (ctx.config.confirmationHoldMs <= 0 || page.isClosed()) {
          return;
        }
        await page.waitForTimeout(ctx.config.confirmationHoldMs).catch((error: unknown) => {
          ctx.logger.debug({ err: error }, 'Confirmation page closed early');
        });
      },
    },
  ],
};
