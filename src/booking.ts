import type { Logger } from 'pino';
import { launchBrowser } from './browser';
import { FlowStepError, rootCause } from './errors';
import { runFlow, RunResult } from './flow-runner';
import { bookingFlow } from './flows/booking.flow';
import { OutputEnvelope, TOOL_NAME, TOOL_VERSION, writeOutput } from './output';
import { AppConfig, BookingSettings, FlowContext, FlowPage, Slot } from './types';

export interface BookingSession {
  page: FlowPage;
  close: () => Promise<void>;
}

export interface BookingAttemptOptions {
  dryRun?: boolean;
  launch?: (config: AppConfig) => Promise<BookingSession>;
}

export interface BookingReport {
  slot: Slot;
  stepsCompleted: number;
  dryRun: boolean;
  outputPath?: string;
}

/**
 * Runs the booking flow once for a matched slot. Failures are recorded and
 * rethrown; a failed attempt is never repeated here. The output file is a
 * record only: failing to write it never changes the outcome of the flow.
 */
export async function attemptBooking(
  config: AppConfig,
  settings: BookingSettings,
  logger: Logger,
  slot: Slot,
  options: BookingAttemptOptions = {}
): Promise<BookingReport> {
  if (options.dryRun) {
    const ctx: FlowContext = { config, settings, logger, slot };
    const result = await runFlow(bookingFlow, ctx, { dryRun: true });
    return { slot, stepsCompleted: result.stepsCompleted, dryRun: true };
  }

  const launch = options.launch ?? launchBrowser;
  logger.info({ flow: bookingFlow.name, headless: config.headless }, 'Launching browser');
  const session = await launch(config);
  const ctx: FlowContext = { config, settings, logger, slot, page: session.page, flowData: {} };
  const start = Date.now();
  const now = new Date();

  const record = (success: boolean, stepsCompleted: number, errors: string[]): string | undefined => {
    const envelope: OutputEnvelope = {
      meta: {
        tool: TOOL_NAME,
        version: TOOL_VERSION,
        flow: bookingFlow.name,
        overviewUrl: settings.slotsOverviewUrl,
        timestamp: now.toISOString(),
        durationMs: Date.now() - start,
        stepsCompleted,
        stepsTotal: bookingFlow.steps.length,
        success,
      },
      data: { slot, ...ctx.flowData },
      errors,
    };

    try {
      const outputPath = writeOutput(config, bookingFlow.name, envelope, now);
      logger.info({ outputPath }, success ? 'Output written' : 'Failure output written');
      return outputPath;
    } catch (error) {
      logger.error({ err: error, outputDir: config.outputDir }, 'Could not write booking output');
      return undefined;
    }
  };

  let result: RunResult;
  try {
    result = await runFlow(bookingFlow, ctx);
  } catch (error) {
    const cause = rootCause(error);
    const message = cause instanceof Error ? cause.message : String(cause);
    const failedStep = error instanceof FlowStepError ? error.step : undefined;
    const completed = bookingFlow.steps.findIndex((step) => step.name === failedStep);
    record(false, Math.max(completed, 0), [message]);
    throw error;
  } finally {
    await session.close();
    logger.info({ flow: bookingFlow.name }, 'Browser closed.');
  }

  const outputPath = record(true, result.stepsCompleted, []);
  return { slot, stepsCompleted: result.stepsCompleted, dryRun: false, outputPath };
}
