import { GTFSArchive } from './archive.js';
import { GTFSParser } from './parser.js';
import { normalizeId, compareIds } from './utils.js';
import type { GTFSStop, GTFSAgency } from './types.js';

interface StopIndex {
  stops: GTFSStop[];
  byId: Map<string, GTFSStop>;
}

interface ServiceIndex {
  tripToRoute: Map<string, string>;
  /** Uppercased route id -> trip ids */
  routeTrips: Map<string, Set<string>>;
  /** trip id -> uppercased stop ids, first visit order */
  tripStops: Map<string, Set<string>>;
  /** Uppercased stop id -> trip ids, stop_times order */
  stopTrips: Map<string, Set<string>>;
}

function addTo<K, V>(map: Map<K, Set<V>>, key: K, value: V): void {
  let values = map.get(key);
  if (!values) {
    values = new Set();
    map.set(key, values);
  }
  values.add(value);
}

/**
 * Lookup and join queries over one GTFS static archive.
 *
 * Tables are parsed the first time a query needs them; the indices built from
 * them live as long as the store, so repeated queries never rescan the archive.
 */
export class StaticScheduleStore {
  private stopIndex: StopIndex | null = null;
  private serviceIndex: ServiceIndex | null = null;
  private agencies: GTFSAgency[] | null = null;

  constructor(private readonly archive: GTFSArchive) {}

  static async open(path: string): Promise<StaticScheduleStore> {
    return new StaticScheduleStore(await GTFSArchive.open(path));
  }

  static fromBuffer(data: Uint8Array, source?: string): StaticScheduleStore {
    return new StaticScheduleStore(GTFSArchive.fromBuffer(data, source));
  }

  get source(): string {
    return this.archive.source;
  }

  /**
   * All stops, in stops.txt order
   */
  loadStops(): GTFSStop[] {
    return [...this.stops().stops];
  }

  findStop(stopId: string): GTFSStop | undefined {
    return this.stops().byId.get(normalizeId(stopId));
  }

  /**
   * Search stops by name (case-insensitive substring)
   */
  searchStopsByName(keyword: string): GTFSStop[] {
    const needle = keyword.trim().toLowerCase();
    return this.stops().stops.filter((stop) => stop.stop_name.toLowerCase().includes(needle));
  }

  /**
   * Sorted, de-duplicated route ids of every trip calling at the stop
   */
  routesForStop(stopId: string): string[] {
    const { stopTrips, tripToRoute } = this.service();
    const routes = new Set<string>();

    for (const tripId of stopTrips.get(normalizeId(stopId)) ?? []) {
      const routeId = tripToRoute.get(tripId);
      if (routeId) routes.add(routeId);
    }

    return [...routes].sort(compareIds);
  }

  /**
   * Stops visited by any trip of the route, in stops.txt order.
   * Stop ids absent from stops.txt are dropped.
   */
  stopsForRoute(routeId: string): GTFSStop[] {
    const { routeTrips, tripStops } = this.service();
    const visited = new Set<string>();

    for (const tripId of routeTrips.get(normalizeId(routeId)) ?? []) {
      for (const stopId of tripStops.get(tripId) ?? []) {
        visited.add(stopId);
      }
    }

    return this.stops().stops.filter((stop) => visited.has(normalizeId(stop.stop_id)));
  }

  agencyInfo(): GTFSAgency[] {
    if (!this.agencies) {
      this.agencies = GTFSParser.parseAgencies(this.archive.readText('agency.txt'));
    }
    return [...this.agencies];
  }

  private stops(): StopIndex {
    if (!this.stopIndex) {
      const stops = GTFSParser.parseStops(this.archive.readText('stops.txt'));
      const byId = new Map<string, GTFSStop>();
      for (const stop of stops) {
        const key = normalizeId(stop.stop_id);
        // First row wins for duplicate ids
        if (!byId.has(key)) byId.set(key, stop);
      }
      this.stopIndex = { stops, byId };
    }
    return this.stopIndex;
  }

  private service(): ServiceIndex {
    if (!this.serviceIndex) {
      const trips = GTFSParser.parseTrips(this.archive.readText('trips.txt'));
      const stopTimes = GTFSParser.parseStopTimes(this.archive.readText('stop_times.txt'));

      const tripToRoute = new Map<string, string>();
      const routeTrips = new Map<string, Set<string>>();
      for (const trip of trips) {
        // A repeated trip_id keeps the route of its last row
        tripToRoute.set(trip.trip_id, trip.route_id);
        addTo(routeTrips, normalizeId(trip.route_id), trip.trip_id);
      }

      const tripStops = new Map<string, Set<string>>();
      const stopTrips = new Map<string, Set<string>>();
      for (const stopTime of stopTimes) {
        const stopId = normalizeId(stopTime.stop_id);
        addTo(tripStops, stopTime.trip_id, stopId);
        addTo(stopTrips, stopId, stopTime.trip_id);
      }

      this.serviceIndex = { tripToRoute, routeTrips, tripStops, stopTrips };
    }
    return this.serviceIndex;
  }
}
