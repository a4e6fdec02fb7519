import { compareIds, formatTimestamp } from '@transit-console/gtfs-parser';
import type {
  Alert,
  GTFSAgency,
  GTFSStop,
  StopDistance,
  TripUpdateRecord,
  VehiclePosition,
} from '@transit-console/gtfs-parser';
import type { GeocodeResult } from './geocoder.js';

/*
 * Pure text formatters for everything the console prints.
 * Each returns the full block; the caller decides where it goes.
 */

const RULE = '-'.repeat(30);

function displayTime(seconds: number): string {
  return seconds === 0 ? 'unknown' : formatTimestamp(seconds);
}

export function renderRouteList(routes: readonly string[]): string {
  return `Currently tracking: ${routes.length > 0 ? routes.join(', ') : 'None'}`;
}

export function renderAlert(alert: Alert): string {
  const lines = ['----- ALERT -----', `Header: ${alert.header}`, `Description: ${alert.description}`];

  for (const period of alert.activePeriods) {
    lines.push(`Start: ${period.start ?? '(open)'}`);
    lines.push(`End:   ${period.end ?? '(open)'}`);
  }
  if (alert.routes.size > 0) {
    lines.push(`Routes affected: ${[...alert.routes].sort(compareIds).join(', ')}`);
  }
  if (alert.stops.length > 0) {
    lines.push('Stops affected:');
    for (const stopId of alert.stops) lines.push(`  - Stop ID: ${stopId}`);
  }

  return lines.join('\n');
}

/**
 * @param fetched - how many alerts the feed returned before filtering
 */
export function renderAlerts(alerts: readonly Alert[], fetched: number): string {
  if (fetched === 0) return 'No current alerts.';
  if (alerts.length === 0) return 'No alerts affecting your selected routes.';
  return alerts.map(renderAlert).join('\n\n');
}

export function renderArrivals(records: readonly TripUpdateRecord[], stopId: string): string {
  if (records.length === 0) return 'No upcoming arrivals for that stop and route.';

  return records
    .map((record) =>
      [
        `→ Route ${record.routeId || '(unknown)'} @ Stop ${stopId}`,
        `   Stop Seq: ${record.stopSequence}`,
        `   Arrival: ${displayTime(record.arrivalTime)}`,
        `   Departure: ${displayTime(record.departureTime)}`,
        RULE,
      ].join('\n')
    )
    .join('\n');
}

export interface LocatedVehicle {
  vehicle: VehiclePosition;
  /** null when reverse geocoding is switched off */
  location: GeocodeResult | null;
}

function describeLocation({ vehicle, location }: LocatedVehicle): string {
  const coordinates = `Lat: ${vehicle.lat.toFixed(4)}, Lon: ${vehicle.lon.toFixed(4)}`;
  if (location === null) return coordinates;
  if (location.ok) return `${location.address} (${coordinates})`;
  return `(geocoding failed: ${location.reason}) (${coordinates})`;
}

export function renderVehicles(vehicles: readonly LocatedVehicle[]): string {
  if (vehicles.length === 0) return 'No vehicles found on the tracked routes.';

  return vehicles
    .map((entry) => {
      const { vehicle } = entry;
      const lines = ['--- Vehicle Update ---', `Route: ${vehicle.routeId}`];
      const name = vehicle.label || vehicle.vehicleId;
      if (name) lines.push(`Vehicle: ${name}`);
      lines.push(`Location: ${describeLocation(entry)}`);
      lines.push(`Timestamp: ${displayTime(vehicle.timestamp)}`);
      return lines.join('\n');
    })
    .join('\n\n');
}

export function renderStops(stops: readonly GTFSStop[], emptyMessage = 'No stops found.'): string {
  if (stops.length === 0) return emptyMessage;
  return stops.map((stop) => `${stop.stop_id} → ${stop.stop_name}`).join('\n');
}

export function renderNearestStops(nearest: readonly StopDistance[]): string {
  if (nearest.length === 0) return 'No stops found.';
  return nearest
    .map(({ stop, distanceKm }) => `${stop.stop_id} → ${stop.stop_name} (${distanceKm.toFixed(2)} km)`)
    .join('\n');
}

export function renderStopRoutes(routes: readonly string[]): string {
  return routes.length > 0 ? `Routes at stop: ${routes.join(', ')}` : 'No routes found for that stop.';
}

const AGENCY_FIELDS: readonly (keyof GTFSAgency)[] = [
  'agency_name',
  'agency_url',
  'agency_timezone',
  'agency_lang',
  'agency_phone',
];

/**
 * The first agency in the feed, one `field: value` line per column present
 */
export function renderAgency(agencies: readonly GTFSAgency[]): string {
  const [agency] = agencies;
  if (!agency) return 'No agency info found.';

  const lines = ['=== Agency Information ==='];
  for (const field of AGENCY_FIELDS) {
    const value = agency[field];
    if (value !== undefined) lines.push(`${field}: ${value}`);
  }
  return lines.join('\n');
}
