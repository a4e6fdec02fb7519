import { ALL_ROUTES } from './types.js';
import type {
  Alert,
  GTFSStop,
  RouteFilter,
  StopDistance,
  TrackedRoutes,
  TripUpdateRecord,
  VehiclePosition,
} from './types.js';
import { calculateDistance, normalizeId, parseCoordinate } from './utils.js';

function isAll(filter: string): boolean {
  return filter.trim().toLowerCase() === ALL_ROUTES;
}

function normalizeTracked(tracked: ReadonlySet<string>): Set<string> {
  return new Set([...tracked].map(normalizeId));
}

/**
 * Query utilities joining realtime records with static GTFS data.
 * Every sort here is stable: ties keep feed or file order.
 */
export class GTFSQuery {
  /**
   * Predicted arrivals at a stop, earliest first.
   * `routeFilter` is a route id or "all".
   */
  static arrivalsFor(
    records: readonly TripUpdateRecord[],
    stopId: string,
    routeFilter: RouteFilter
  ): TripUpdateRecord[] {
    const stop = normalizeId(stopId);
    const route = isAll(routeFilter) ? null : normalizeId(routeFilter);

    return records
      .filter((record) => normalizeId(record.stopId) === stop)
      .filter((record) => route === null || normalizeId(record.routeId) === route)
      .sort((a, b) => a.arrivalTime - b.arrivalTime);
  }

  /**
   * Alerts touching at least one tracked route, or all of them for "all"
   */
  static alertsMatching(alerts: readonly Alert[], tracked: TrackedRoutes): Alert[] {
    if (tracked === ALL_ROUTES) return [...alerts];

    const wanted = normalizeTracked(tracked);
    return alerts.filter((alert) => [...alert.routes].some((route) => wanted.has(normalizeId(route))));
  }

  /**
   * Vehicles running on a tracked route, or every vehicle for "all"
   */
  static vehiclesOnRoutes(vehicles: readonly VehiclePosition[], tracked: TrackedRoutes): VehiclePosition[] {
    if (tracked === ALL_ROUTES) return [...vehicles];

    const wanted = normalizeTracked(tracked);
    return vehicles.filter((vehicle) => wanted.has(normalizeId(vehicle.routeId)));
  }

  /**
   * The k stops closest to a point, by great-circle distance.
   * Coordinates may be raw user input; they are validated before any distance is computed.
   */
  static nearestStops(
    stops: readonly GTFSStop[],
    lat: number | string,
    lon: number | string,
    k = 3
  ): StopDistance[] {
    const latitude = parseCoordinate(lat, 'latitude');
    const longitude = parseCoordinate(lon, 'longitude');

    return stops
      .map((stop) => ({
        stop,
        distanceKm: calculateDistance(latitude, longitude, stop.stop_lat, stop.stop_lon),
      }))
      .sort((a, b) => a.distanceKm - b.distanceKm)
      .slice(0, Math.max(0, k));
  }
}
