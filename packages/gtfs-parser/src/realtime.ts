import GtfsRealtimeBindings from 'gtfs-realtime-bindings';
import type { transit_realtime } from 'gtfs-realtime-bindings';
import { DecodeError, TransportError } from './errors.js';
import type { FeedError } from './errors.js';
import { formatTimestamp, normalizeId } from './utils.js';
import { silentLogger } from './types.js';
import type {
  ActivePeriod,
  Alert,
  FeedUrls,
  Logger,
  TripUpdateRecord,
  VehiclePosition,
} from './types.js';

/**
 * GTFS-Realtime Protocol Buffer support
 *
 * Feeds are decoded with the published gtfs-realtime.proto bindings and
 * flattened into the plain records the rest of the package works with.
 */

export type FeedMessage = transit_realtime.FeedMessage;

/** Result of one feed fetch: records, or an empty list and the reason */
export type FeedResult<T> =
  | { ok: true; records: T[] }
  | { ok: false; records: []; error: FeedError };

export interface FeedResponse {
  ok: boolean;
  status: number;
  statusText: string;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type FetchLike = (
  url: string,
  init: { signal: AbortSignal; headers: Record<string, string> }
) => Promise<FeedResponse>;

export interface RealtimeFeedClientOptions {
  fetch?: FetchLike;
  /** Per-request timeout; defaults to 10 seconds */
  timeoutMs?: number;
  logger?: Logger;
}

// uint64 fields decode to Long when long.js is present, to number otherwise
interface LongLike {
  low: number;
  high: number;
  toNumber?: () => number;
}

function toSeconds(value: number | LongLike | null | undefined): number {
  if (value === null || value === undefined) return 0;
  if (typeof value === 'number') return value;
  if (value.toNumber) return value.toNumber();
  return (value.high >>> 0) * 0x100000000 + (value.low >>> 0);
}

function joinTranslations(text: transit_realtime.ITranslatedString | null | undefined): string {
  return (text?.translation ?? []).map((t) => t.text).join('\n');
}

function formatBound(value: number | LongLike | null | undefined): string | null {
  const seconds = toSeconds(value);
  return seconds === 0 ? null : formatTimestamp(seconds);
}

function liveEntities(feed: FeedMessage): transit_realtime.IFeedEntity[] {
  return feed.entity.filter((entity) => !entity.isDeleted);
}

/**
 * Parse GTFS-Realtime Protocol Buffer data
 *
 * @param buffer - Binary Protocol Buffer data
 * @param source - URL or label used in the error message
 */
export function decodeFeed(buffer: ArrayBuffer | Uint8Array, source = '<buffer>'): FeedMessage {
  const bytes = buffer instanceof Uint8Array ? buffer : new Uint8Array(buffer);
  try {
    return GtfsRealtimeBindings.transit_realtime.FeedMessage.decode(bytes);
  } catch (error) {
    throw new DecodeError(`Malformed GTFS-Realtime payload from ${source}`, source, {
      cause: error,
    });
  }
}

/**
 * Service alerts from a realtime feed
 */
export function extractAlerts(feed: FeedMessage): Alert[] {
  const alerts: Alert[] = [];

  for (const entity of liveEntities(feed)) {
    const alert = entity.alert;
    if (!alert) continue;

    const routes = new Set<string>();
    const stops = new Set<string>();
    for (const informed of alert.informedEntity ?? []) {
      if (informed.routeId) routes.add(normalizeId(informed.routeId));
      if (informed.stopId) stops.add(informed.stopId);
    }

    const activePeriods: ActivePeriod[] = (alert.activePeriod ?? []).map((period) => ({
      start: formatBound(period.start),
      end: formatBound(period.end),
    }));

    alerts.push({
      header: joinTranslations(alert.headerText),
      description: joinTranslations(alert.descriptionText),
      activePeriods,
      routes,
      stops: [...stops],
    });
  }

  return alerts;
}

/**
 * One record per stop time update, in feed order
 */
export function extractTripUpdates(feed: FeedMessage): TripUpdateRecord[] {
  const records: TripUpdateRecord[] = [];

  for (const entity of liveEntities(feed)) {
    const update = entity.tripUpdate;
    if (!update) continue;

    const tripId = update.trip.tripId ?? '';
    const routeId = update.trip.routeId ?? '';
    for (const stu of update.stopTimeUpdate ?? []) {
      records.push({
        tripId,
        routeId,
        stopId: stu.stopId ?? '',
        stopSequence: stu.stopSequence ?? 0,
        arrivalTime: toSeconds(stu.arrival?.time),
        departureTime: toSeconds(stu.departure?.time),
      });
    }
  }

  return records;
}

/**
 * Vehicle positions that carry a location
 */
export function extractVehiclePositions(feed: FeedMessage): VehiclePosition[] {
  const vehicles: VehiclePosition[] = [];

  for (const entity of liveEntities(feed)) {
    const vehicle = entity.vehicle;
    if (!vehicle?.position) continue;

    vehicles.push({
      routeId: vehicle.trip?.routeId ?? '',
      tripId: vehicle.trip?.tripId ?? '',
      vehicleId: vehicle.vehicle?.id ?? '',
      label: vehicle.vehicle?.label ?? '',
      lat: vehicle.position.latitude,
      lon: vehicle.position.longitude,
      timestamp: toSeconds(vehicle.timestamp),
    });
  }

  return vehicles;
}

const defaultFetch: FetchLike = (url, init) => fetch(url, init);

/**
 * Fetches the three GTFS-Realtime endpoints of one agency.
 *
 * Every fetch is a single GET with no retry. Failures never throw: they come
 * back as `{ ok: false, records: [] }` and are logged as warnings.
 */
export class RealtimeFeedClient {
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly urls: Readonly<FeedUrls>,
    options: RealtimeFeedClientOptions = {}
  ) {
    this.fetchImpl = options.fetch ?? defaultFetch;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.logger = options.logger ?? silentLogger;
  }

  fetchAlerts(): Promise<FeedResult<Alert>> {
    return this.collect('alerts', this.urls.alertsUrl, extractAlerts);
  }

  fetchTripUpdates(): Promise<FeedResult<TripUpdateRecord>> {
    return this.collect('trip updates', this.urls.tripUpdatesUrl, extractTripUpdates);
  }

  fetchVehiclePositions(): Promise<FeedResult<VehiclePosition>> {
    return this.collect('vehicle positions', this.urls.vehiclePositionsUrl, extractVehiclePositions);
  }

  /**
   * Fetch GTFS-Realtime feed from URL
   */
  async fetchFeed(url: string): Promise<FeedMessage> {
    let response: FeedResponse;
    try {
      response = await this.fetchImpl(url, {
        signal: AbortSignal.timeout(this.timeoutMs),
        headers: { Accept: 'application/x-protobuf' },
      });
    } catch (error) {
      throw new TransportError(`Request to ${url} failed`, url, undefined, { cause: error });
    }

    if (!response.ok) {
      throw new TransportError(
        `Failed to fetch realtime feed: ${response.status} ${response.statusText}`.trim(),
        url,
        response.status
      );
    }

    let buffer: ArrayBuffer;
    try {
      buffer = await response.arrayBuffer();
    } catch (error) {
      throw new TransportError(`Reading response from ${url} failed`, url, response.status, {
        cause: error,
      });
    }

    this.logger.debug(`Received ${buffer.byteLength} bytes from ${url}`);
    return decodeFeed(buffer, url);
  }

  private async collect<T>(
    kind: string,
    url: string,
    extract: (feed: FeedMessage) => T[]
  ): Promise<FeedResult<T>> {
    try {
      const records = extract(await this.fetchFeed(url));
      this.logger.debug(`Parsed ${records.length} ${kind} record(s)`);
      return { ok: true, records };
    } catch (error) {
      const feedError: FeedError =
        error instanceof TransportError || error instanceof DecodeError
          ? error
          : new DecodeError(`Unexpected ${kind} feed content from ${url}`, url, { cause: error });
      this.logger.warn(`Error fetching ${kind}: ${feedError.message}`);
      return { ok: false, records: [], error: feedError };
    }
  }
}
