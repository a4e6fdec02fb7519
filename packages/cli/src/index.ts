#!/usr/bin/env node
import dotenv from 'dotenv';
import { RealtimeFeedClient, StaticScheduleStore } from '@transit-console/gtfs-parser';
import { loadConfig } from './config.js';
import { NominatimGeocoder } from './geocoder.js';
import { logger as fallbackLogger, loggerFor } from './logger.js';
import { runConsole } from './menus.js';
import { createConsolePrompt } from './prompt.js';

/**
 * Transit Console
 * Interactive console for one agency's GTFS and GTFS-Realtime feeds
 *
 * Lets a rider:
 * - Read service alerts for the routes they follow
 * - See where buses on those routes are right now
 * - Check predicted arrivals at a stop
 * - Look up stops by name, position or route
 */
async function main(): Promise<void> {
  dotenv.config();
  const config = loadConfig();
  const logger = loggerFor(config);
  logger.debug('Configuration loaded', config);

  // Fail now rather than at the first lookup
  logger.info(`Opening GTFS archive ${config.gtfsStaticPath}`);
  const store = await StaticScheduleStore.open(config.gtfsStaticPath);
  logger.info(`Loaded ${store.loadStops().length} stops`);

  const feeds = new RealtimeFeedClient(config.feeds, { timeoutMs: config.feedTimeoutMs, logger });
  const geocoder = config.geocoder.enabled
    ? new NominatimGeocoder({ ...config.geocoder, timeoutMs: config.feedTimeoutMs, logger })
    : null;

  const prompt = createConsolePrompt();
  try {
    await runConsole({ store, feeds, geocoder, prompt, logger });
  } finally {
    prompt.close();
  }
}

main().catch((error) => {
  fallbackLogger.error('Fatal error:', error);
  process.exit(1);
});
