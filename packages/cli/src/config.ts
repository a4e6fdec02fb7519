import { z } from 'zod';
import { TransitError } from '@transit-console/gtfs-parser';
import type { FeedUrls } from '@transit-console/gtfs-parser';

export const DEFAULT_FEED_URLS: Readonly<FeedUrls> = Object.freeze({
  alertsUrl: 'http://gtfs.halifax.ca/realtime/Alert/Alerts.pb',
  tripUpdatesUrl: 'http://gtfs.halifax.ca/realtime/TripUpdate/TripUpdates.pb',
  vehiclePositionsUrl: 'http://gtfs.halifax.ca/realtime/Vehicle/VehiclePositions.pb',
});

export interface GeocoderConfig {
  enabled: boolean;
  url: string;
  userAgent: string;
}

export interface AppConfig {
  feeds: Readonly<FeedUrls>;
  gtfsStaticPath: string;
  feedTimeoutMs: number;
  geocoder: Readonly<GeocoderConfig>;
  debug: boolean;
}

export interface ConfigProblem {
  variable: string;
  message: string;
}

/** One or more environment variables failed validation */
export class ConfigError extends TransitError {
  constructor(readonly problems: readonly ConfigProblem[]) {
    super(
      `Invalid configuration: ${problems.map((p) => `${p.variable} ${p.message}`).join('; ')}`
    );
  }
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

const httpUrl = z.string().refine(isHttpUrl, 'must be an http(s) URL');

const TRUE_WORDS = ['true', '1', 'yes', 'on'];
const FALSE_WORDS = ['false', '0', 'no', 'off'];

const flag = z
  .string()
  .toLowerCase()
  .refine((value) => TRUE_WORDS.includes(value) || FALSE_WORDS.includes(value), 'must be true or false')
  .transform((value) => TRUE_WORDS.includes(value));

const WHOLE_MS = 'must be a positive whole number of milliseconds';

const envSchema = z.object({
  ALERTS_FEED_URL: httpUrl.default(DEFAULT_FEED_URLS.alertsUrl),
  TRIP_UPDATES_FEED_URL: httpUrl.default(DEFAULT_FEED_URLS.tripUpdatesUrl),
  VEHICLE_POSITIONS_FEED_URL: httpUrl.default(DEFAULT_FEED_URLS.vehiclePositionsUrl),
  GTFS_STATIC_PATH: z.string().default('data/Static_data.zip'),
  FEED_TIMEOUT_MS: z.coerce
    .number({ invalid_type_error: WHOLE_MS })
    .int(WHOLE_MS)
    .positive(WHOLE_MS)
    .default(10_000),
  GEOCODER_URL: httpUrl.default('https://nominatim.openstreetmap.org/reverse'),
  GEOCODER_USER_AGENT: z.string().default('transit-console/0.1.0'),
  GEOCODING_ENABLED: flag.default('true'),
  DEBUG: z.string().optional(),
});

// `FOO=` in a .env file means "unset", not "empty"
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  return Object.fromEntries(
    Object.entries(env)
      .filter((entry): entry is [string, string] => entry[1] !== undefined)
      .map(([key, value]): [string, string] => [key, value.trim()])
      .filter(([, value]) => value !== '')
  );
}

/**
 * Validate the environment into a frozen configuration object.
 * Every offending variable is reported at once.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const result = envSchema.safeParse(withoutBlanks(env));

  if (!result.success) {
    const problems = new Map<string, string>();
    for (const issue of result.error.issues) {
      const variable = String(issue.path[0]);
      if (!problems.has(variable)) problems.set(variable, issue.message);
    }
    throw new ConfigError([...problems].map(([variable, message]) => ({ variable, message })));
  }

  const values = result.data;
  return Object.freeze({
    feeds: Object.freeze({
      alertsUrl: values.ALERTS_FEED_URL,
      tripUpdatesUrl: values.TRIP_UPDATES_FEED_URL,
      vehiclePositionsUrl: values.VEHICLE_POSITIONS_FEED_URL,
    }),
    gtfsStaticPath: values.GTFS_STATIC_PATH,
    feedTimeoutMs: values.FEED_TIMEOUT_MS,
    geocoder: Object.freeze({
      enabled: values.GEOCODING_ENABLED,
      url: values.GEOCODER_URL,
      userAgent: values.GEOCODER_USER_AGENT,
    }),
    debug: values.DEBUG !== undefined,
  });
}
