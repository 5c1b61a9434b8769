#!/usr/bin/env node
import path from 'path';
import { Command } from 'commander';
import type { Logger } from 'pino';
import { flows } from './flows';
import { loadConfig, validateConfig } from './config';
import { createLogger } from './logger';
import { isMissingBrowserError } from './browser';
import { attemptBooking } from './booking';
import { BookingCancelledError, ConfigError, ConfigValidationError, rootCause } from './errors';
import { findMatchingSlot, formatTimeSlot } from './matcher';
import { SlotMonitor } from './monitor';
import { TOOL_NAME, TOOL_VERSION } from './output';
import { loadBookingSettings, redactSettings } from './settings';
import { pollSlots, summarizeSlots } from './slots';
import { AppConfig, BookingSettings } from './types';

interface GlobalOptions {
  config: string;
  booking?: string;
  verbose?: boolean;
}

interface WatchOptions {
  headless?: boolean;
  slowMo?: string;
  timeout?: string;
  dryRun?: boolean;
}

function parseCliNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function applyRunOverrides(config: AppConfig, options: WatchOptions): AppConfig {
  const next = { ...config };

  if (options.headless !== undefined) {
    next.headless = options.headless;
  }

  if (options.slowMo !== undefined) {
    next.slowMo = parseCliNumber(options.slowMo, config.slowMo);
  }

  if (options.timeout !== undefined) {
    next.globalTimeout = parseCliNumber(options.timeout, config.globalTimeout);
  }

  return next;
}

function reportConfigErrors(errors: ConfigValidationError[]): void {
  console.error('Config errors:');
  for (const error of errors) {
    console.error(`- ${error.field}: ${error.message}`);
  }
}

const program = new Command();

function resolveConfig(): AppConfig {
  const { config: configPath, booking } = program.opts<GlobalOptions>();
  const config = loadConfig({ path: configPath });
  return booking ? { ...config, bookingConfigPath: path.resolve(booking) } : config;
}

function resolveLogger(config: AppConfig): Logger {
  const { verbose } = program.opts<GlobalOptions>();
  return createLogger(config, { level: verbose ? 'debug' : undefined });
}

/** Loads everything a command needs, or reports why it cannot and returns null. */
function loadSettingsOrReport(config: AppConfig, logger: Logger): BookingSettings | null {
  const configErrors = validateConfig(config);
  if (configErrors.length > 0) {
    reportConfigErrors(configErrors);
    process.exitCode = 1;
    return null;
  }

  try {
    return loadBookingSettings(config.bookingConfigPath);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error({ path: config.bookingConfigPath }, error.message);
      reportConfigErrors(error.issues);
    } else {
      logger.error({ err: error }, 'Could not load booking config');
    }
    process.exitCode = 1;
    return null;
  }
}

function logInertSettings(settings: BookingSettings, logger: Logger): void {
  if (settings.desiredDurationH !== undefined) {
    logger.info({ desiredDurationH: settings.desiredDurationH }, 'desired_duration_h is not supported; booking one slot');
  }
  if (settings.doubleBooking) {
    logger.info('double_booking is not supported; stopping after the first booking');
  }
}

program
  .name(TOOL_NAME)
  .description('Watch a court booking page and book the wanted slot')
  .version(TOOL_VERSION)
  .option('--config <path>', 'Path to env file', '.env')
  .option('--booking <path>', 'Path to booking JSON (overrides BOOKING_CONFIG)')
  .option('--verbose', 'Enable debug logging');

program
  .command('watch', { isDefault: true })
  .description('Poll for the configured slot and book it when it opens')
  .option('--headless', 'Run the browser headless')
  .option('--no-headless', 'Run with visible browser (default)')
  .option('--slow-mo <ms>', 'Slow down browser actions by N ms')
  .option('--timeout <ms>', 'Global browser timeout in ms')
  .option('--dry-run', 'Log the booking steps on a match instead of booking')
  .action(async (options: WatchOptions) => {
    const config = applyRunOverrides(resolveConfig(), options);
    const logger = resolveLogger(config);
    const settings = loadSettingsOrReport(config, logger);
    if (!settings) {
      return;
    }
    logInertSettings(settings, logger);

    const controller = new AbortController();
    const stop = (signal: NodeJS.Signals): void => {
      logger.info({ signal }, 'Stop requested');
      controller.abort();
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    const monitor = new SlotMonitor(
      {
        poll: () => pollSlots(settings.slotsOverviewUrl, { logger, timeout: config.fetchTimeout }),
        book: (slot) => attemptBooking(config, settings, logger, slot, { dryRun: options.dryRun }),
      },
      {
        preference: { day: settings.desiredDay, startHour: settings.desiredStartHour },
        intervalMs: settings.refreshIntervalS * 1000,
        logger,
        signal: controller.signal,
      }
    );

    try {
      const outcome = await monitor.run();
      if (outcome.status === 'booked') {
        logger.info(
          {
            day: outcome.slot.day,
            time: outcome.slot.time,
            polls: outcome.polls,
            outputPath: outcome.result.outputPath,
          },
          outcome.result.dryRun ? 'Dry run complete; nothing was booked' : 'Booking complete'
        );
      }
    } catch (error) {
      const cause = rootCause(error);
      if (cause instanceof BookingCancelledError) {
        logger.warn(cause.message);
        process.exitCode = 2;
      } else if (isMissingBrowserError(cause)) {
        logger.error('Playwright browsers are missing. Run: npx playwright install chromium');
        process.exitCode = 1;
      } else {
        logger.error({ err: error }, 'Booking failed; not retrying');
        process.exitCode = 1;
      }
    } finally {
      process.off('SIGINT', stop);
      process.off('SIGTERM', stop);
    }
  });

program
  .command('slots')
  .description('Fetch the overview once and list open slots')
  .action(async () => {
    const config = resolveConfig();
    const logger = resolveLogger(config);
    const settings = loadSettingsOrReport(config, logger);
    if (!settings) {
      return;
    }

    const result = await pollSlots(settings.slotsOverviewUrl, { logger, timeout: config.fetchTimeout });
    if (!result.ok) {
      console.error(`Poll failed: ${result.error.message}`);
      process.exitCode = 1;
      return;
    }

    const summary = summarizeSlots(result.slots);
    const days = Object.keys(summary);
    if (days.length === 0) {
      console.log('No open slots.');
    }
    for (const day of days) {
      console.log(`${day}:`);
      for (const line of summary[day]) {
        console.log(`  ${line}`);
      }
    }

    const wanted = `${settings.desiredDay} ${formatTimeSlot(settings.desiredStartHour)}`;
    const match = findMatchingSlot(result.slots, {
      day: settings.desiredDay,
      startHour: settings.desiredStartHour,
    });
    console.log(match ? `Wanted slot ${wanted} is open (court ${match.court}).` : `Wanted slot ${wanted} is not open.`);
  });

program
  .command('config')
  .description('Show resolved configuration (redacted)')
  .option('--validate', 'Exit non-zero when the configuration is invalid')
  .action((options: { validate?: boolean }) => {
    const config = resolveConfig();
    const logger = resolveLogger(config);
    const configErrors = validateConfig(config);

    logger.debug({ errorCount: configErrors.length }, 'Config validation complete');

    if (configErrors.length > 0) {
      reportConfigErrors(configErrors);
      if (options.validate) {
        process.exitCode = 1;
      }
    }

    console.log(JSON.stringify(config, null, 2));

    try {
      const settings = loadBookingSettings(config.bookingConfigPath);
      console.log(JSON.stringify(redactSettings(settings), null, 2));
      if (options.validate && configErrors.length === 0) {
        console.log('Config is valid.');
      }
    } catch (error) {
      if (!(error instanceof ConfigError)) {
        throw error;
      }
      console.error(error.message);
      reportConfigErrors(error.issues);
      if (options.validate) {
        process.exitCode = 1;
      }
    }
  });

program
  .command('list')
  .description('List available flows')
  .action(() => {
    console.log('Available flows:');
    for (const flow of flows) {
      console.log(`- ${flow.name}: ${flow.description}`);
      for (const step of flow.steps) {
        console.log(`    ${step.name}${step.description ? `: ${step.description}` : ''}`);
      }
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
