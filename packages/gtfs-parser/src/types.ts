/**
 * GTFS data type definitions
 * Based on the GTFS specification: https://gtfs.org/reference/static
 * and https://gtfs.org/realtime/reference/
 */

// Core GTFS Static Types
// Stops are shared between the store's indices and every caller
export interface GTFSStop {
  readonly stop_id: string;
  readonly stop_name: string;
  readonly stop_lat: number;
  readonly stop_lon: number;
}

export interface GTFSTrip {
  trip_id: string;
  route_id: string;
}

export interface GTFSStopTime {
  trip_id: string;
  stop_id: string;
  stop_sequence: number;
}

// Every agency.txt column is optional here; a missing column reads as undefined.
export interface GTFSAgency {
  readonly agency_name?: string;
  readonly agency_url?: string;
  readonly agency_timezone?: string;
  readonly agency_lang?: string;
  readonly agency_phone?: string;
}

/** Sentinel that disables route filtering in correlation queries. */
export const ALL_ROUTES = 'all';
export type AllRoutes = typeof ALL_ROUTES;

/** Either a concrete route id or the `all` sentinel. */
export type RouteFilter = string;

/** Tracked routes, or `all` to match everything. */
export type TrackedRoutes = ReadonlySet<string> | AllRoutes;

// Records derived from GTFS-Realtime feeds

export interface ActivePeriod {
  /** Display form of the start bound, null when the feed leaves it open */
  start: string | null;
  end: string | null;
}

export interface Alert {
  header: string;
  description: string;
  activePeriods: readonly ActivePeriod[];
  /** Uppercased route ids named by the alert's informed entities */
  routes: ReadonlySet<string>;
  stops: readonly string[];
}

export interface TripUpdateRecord {
  tripId: string;
  routeId: string;
  stopId: string;
  stopSequence: number;
  /** Unix seconds, 0 when the feed carries no prediction */
  arrivalTime: number;
  departureTime: number;
}

export interface VehiclePosition {
  routeId: string;
  tripId: string;
  vehicleId: string;
  label: string;
  lat: number;
  lon: number;
  /** Unix seconds */
  timestamp: number;
}

export interface FeedUrls {
  alertsUrl: string;
  tripUpdatesUrl: string;
  vehiclePositionsUrl: string;
}

// Utility Types
export interface StopDistance {
  stop: GTFSStop;
  distanceKm: number;
}

/**
 * Minimal logging surface the library reports through.
 * The CLI passes its stderr logger; the default drops everything.
 */
export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
