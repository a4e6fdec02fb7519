import { describe, test, expect, vi } from 'vitest';
import { strToU8, zipSync } from 'fflate';
import { StaticScheduleStore, TransportError, silentLogger } from '@transit-console/gtfs-parser';
import type { Alert, TripUpdateRecord, VehiclePosition } from '@transit-console/gtfs-parser';
import type { AppContext, FeedSource } from './dispatcher.js';
import type { ReverseGeocoder } from './geocoder.js';
import { runConsole } from './menus.js';
import { ScriptedPrompt } from './prompt.js';
import { renderAlert, renderAlerts, renderArrivals, renderVehicles } from './render.js';
import { addRoute, createSession, listRoutes } from './session.js';

const TABLES: Record<string, string> = {
  'stops.txt': `stop_id,stop_name,stop_lat,stop_lon
1001,Main St,44.64,-63.57
1002,Oak Ave,44.65,-63.58
1003,Scotia Square,44.6493,-63.5752
1004,Bridge Terminal,44.6668,-63.5668`,
  'trips.txt': `route_id,service_id,trip_id
10,WKDY,t1
9A,WKDY,t3`,
  'stop_times.txt': `trip_id,arrival_time,departure_time,stop_id,stop_sequence
t1,08:00:00,08:00:00,1003,1
t1,08:10:00,08:10:00,1001,2
t3,08:05:00,08:05:00,1003,1
t3,08:20:00,08:20:00,1004,2`,
  'agency.txt': `agency_name,agency_url,agency_timezone
Harbour Transit,https://example.org,America/Halifax`,
};

function buildStore(omit: string[] = []): StaticScheduleStore {
  const files: Record<string, Uint8Array> = {};
  for (const [name, text] of Object.entries(TABLES)) {
    if (!omit.includes(name)) files[name] = strToU8(text);
  }
  return StaticScheduleStore.fromBuffer(zipSync(files), 'fixture.zip');
}

const detour: Alert = {
  header: 'Detour',
  description: 'Use Barrington St',
  activePeriods: [],
  routes: new Set(['10', '20']),
  stops: [],
};

const closure: Alert = {
  header: 'Stop closed',
  description: '',
  activePeriods: [],
  routes: new Set(['30']),
  stops: ['1004'],
};

const updates: TripUpdateRecord[] = [
  { tripId: 't1', routeId: '10', stopId: '1001', stopSequence: 2, arrivalTime: 1716840930, departureTime: 1716840960 },
  { tripId: 't2', routeId: '20', stopId: '1001', stopSequence: 5, arrivalTime: 1716840000, departureTime: 0 },
  { tripId: 't3', routeId: '10', stopId: '1002', stopSequence: 1, arrivalTime: 1716839000, departureTime: 0 },
];

const bus10: VehiclePosition = {
  routeId: '10',
  tripId: 't1',
  vehicleId: 'bus-1',
  label: '1201',
  lat: 44.65,
  lon: -63.58,
  timestamp: 1716840930,
};
const bus20: VehiclePosition = { ...bus10, routeId: '20', tripId: 't2', vehicleId: 'bus-2', label: '' };

function fakeFeeds(overrides: Partial<FeedSource> = {}): FeedSource {
  return {
    fetchAlerts: async () => ({ ok: true, records: [detour, closure] }),
    fetchTripUpdates: async () => ({ ok: true, records: updates }),
    fetchVehiclePositions: async () => ({ ok: true, records: [bus10, bus20] }),
    ...overrides,
  };
}

function context(lines: string[], overrides: Partial<AppContext> = {}): AppContext & { prompt: ScriptedPrompt } {
  return {
    store: buildStore(),
    feeds: fakeFeeds(),
    geocoder: null,
    logger: silentLogger,
    ...overrides,
    prompt: new ScriptedPrompt(lines),
  };
}

describe('runConsole', () => {
  test('should stop on quit', async () => {
    const ctx = context(['q']);

    await runConsole(ctx);

    expect(ctx.prompt.output.at(-1)).toBe('Exiting...');
  });

  test('should stop when input ends', async () => {
    const ctx = context([]);

    await runConsole(ctx);

    expect(ctx.prompt.output.at(-1)).toBe('Exiting...');
  });

  test('should quit from a nested menu', async () => {
    const ctx = context(['3', 'find', 'QUIT', '5']);

    await runConsole(ctx);

    expect(ctx.prompt.output.filter((line) => line.startsWith('Select an option: '))).toHaveLength(1);
    expect(ctx.prompt.output).not.toContain('=== Agency Information ===\nagency_name: Harbour Transit');
  });

  test('should hint at unknown input', async () => {
    const ctx = context(['9', 'q']);

    await runConsole(ctx);

    expect(ctx.prompt.output).toContain('Invalid choice. Try again.');
  });

  test('should show agency info', async () => {
    const ctx = context(['5', 'q']);

    await runConsole(ctx);

    expect(ctx.prompt.output).toContain(
      '=== Agency Information ===\nagency_name: Harbour Transit\nagency_url: https://example.org\nagency_timezone: America/Halifax'
    );
  });

  test('should report static data errors and carry on', async () => {
    const ctx = context(['5', 'h', 'q'], { store: buildStore(['agency.txt']) });

    await runConsole(ctx);

    expect(ctx.prompt.output).toContain('Error: agency.txt not found in fixture.zip');
    expect(ctx.prompt.output.filter((line) => line.startsWith('Select an option: '))).toHaveLength(3);
  });
});

describe('route manager', () => {
  test('should add, refuse, list and remove routes', async () => {
    const ctx = context(['4', 'add 10', 'ADD 9a', 'add 10', 'remove 20', 'remove 9A', 'list', 'add', 'back', 'q']);

    const session = await runConsole(ctx);

    const printed = ctx.prompt.output;
    expect(printed).toContain('Tracking 10.');
    expect(printed).toContain('Tracking 9A.');
    expect(printed).toContain('10 is already tracked.');
    expect(printed).toContain('20 is not being tracked.');
    expect(printed).toContain('Stopped tracking 9A.');
    expect(printed).toContain('Currently tracking: 10');
    expect(printed).toContain('Usage: add <ROUTE>');
    expect(listRoutes(session)).toEqual(['10']);
  });
});

describe('alerts menu', () => {
  test('should filter by tracked routes, then show everything', async () => {
    const ctx = context(['1', 'add 10', 'show', 'all', 'show', 'back', 'q']);

    await runConsole(ctx);

    const printed = ctx.prompt.output;
    expect(printed).toContain(renderAlert(detour));
    expect(printed).toContain(renderAlerts([detour, closure], 2));
    expect(printed).toContain('Returning to main menu.');
  });

  test('should say when no alert touches the tracked routes', async () => {
    const session = createSession();
    addRoute(session, '99');
    const ctx = context(['1', 'show', 'q']);

    await runConsole(ctx, session);

    expect(ctx.prompt.output).toContain('No alerts affecting your selected routes.');
  });

  test('should report a feed failure', async () => {
    const failing = new TransportError(
      'Failed to fetch realtime feed: 503 Service Unavailable',
      'http://feeds.test/alerts.pb',
      503
    );
    const ctx = context(['1', 'show', 'q'], {
      feeds: fakeFeeds({ fetchAlerts: async () => ({ ok: false, records: [], error: failing }) }),
    });

    await runConsole(ctx);

    expect(ctx.prompt.output).toContain(
      'Could not fetch alerts: Failed to fetch realtime feed: 503 Service Unavailable'
    );
  });
});

describe('vehicles menu', () => {
  test('should locate vehicles on tracked routes', async () => {
    const geocoder: ReverseGeocoder = {
      reverse: vi.fn(async () => ({ ok: true as const, address: '1 Main St' })),
    };
    const ctx = context(['2', 'show', 'add 10', 'routes', 'show', 'back', 'q'], { geocoder });

    await runConsole(ctx);

    const printed = ctx.prompt.output;
    expect(printed).toContain("No routes tracked yet. Use 'add <ROUTE>' first.");
    expect(printed).toContain('Currently tracking: 10');
    expect(printed).toContain(renderVehicles([{ vehicle: bus10, location: { ok: true, address: '1 Main St' } }]));
    expect(geocoder.reverse).toHaveBeenCalledTimes(1);
    expect(geocoder.reverse).toHaveBeenCalledWith(44.65, -63.58);
  });
});

describe('arrivals menu', () => {
  test('should validate the stop, then list arrivals', async () => {
    const ctx = context(['3', 'stop 12', 'route 10', 'stop 1001', 'route 10', 'all', 'routes', 'clear', 'all', 'back', 'q']);

    await runConsole(ctx);

    const printed = ctx.prompt.output;
    expect(printed).toContain('Invalid stop ID. Must be a 4-digit number.');
    expect(printed.filter((line) => line === 'Please enter a stop ID first (use: stop <STOP_ID>)')).toHaveLength(2);
    expect(printed).toContain('Stop set to 1001 (Main St).');
    expect(printed).toContain(renderArrivals([updates[0]], '1001'));
    expect(printed).toContain(renderArrivals([updates[1], updates[0]], '1001'));
    expect(printed).toContain('Routes at stop: 10');
    expect(printed).toContain("Cleared stop ID. Use 'stop <STOP_ID>' to set a new one.");
  });

  test('should find stops by name, position and route', async () => {
    const ctx = context([
      '3',
      'find',
      '1',
      'square',
      '2',
      'abc',
      '-63.57',
      '2',
      '44.64',
      '-63.57',
      '3',
      '9a',
      '3',
      '77',
      'b',
      'back',
      'q',
    ]);

    await runConsole(ctx);

    const printed = ctx.prompt.output;
    expect(printed).toContain('1003 → Scotia Square');
    expect(printed).toContain('Invalid latitude: "abc"');
    const nearest = printed.find((line) => line.startsWith('1001 → Main St (0.00 km)'));
    expect(nearest?.split('\n').map((line) => line.split(' ')[0])).toEqual(['1001', '1003', '1002']);
    expect(printed).toContain('1003 → Scotia Square\n1004 → Bridge Terminal');
    expect(printed).toContain('No stops found for that route.');
  });
});
