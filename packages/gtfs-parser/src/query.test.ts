import { describe, test, expect } from 'vitest';
import { GTFSQuery } from './query.js';
import { InvalidInputError } from './errors.js';
import type { Alert, GTFSStop, TripUpdateRecord, VehiclePosition } from './types.js';

const mockStops: GTFSStop[] = [
  { stop_id: '1001', stop_name: 'Main St', stop_lat: 44.64, stop_lon: -63.57 },
  { stop_id: '1002', stop_name: 'Oak Ave', stop_lat: 44.65, stop_lon: -63.58 },
  { stop_id: '1003', stop_name: 'Scotia Square', stop_lat: 44.6493, stop_lon: -63.5752 },
  { stop_id: '1004', stop_name: 'Bridge Terminal', stop_lat: 44.6668, stop_lon: -63.5668 },
];

function record(overrides: Partial<TripUpdateRecord>): TripUpdateRecord {
  return {
    tripId: 't1',
    routeId: '10',
    stopId: '1001',
    stopSequence: 1,
    arrivalTime: 0,
    departureTime: 0,
    ...overrides,
  };
}

function alert(header: string, routes: string[]): Alert {
  return { header, description: '', activePeriods: [], routes: new Set(routes), stops: [] };
}

function vehicle(routeId: string, vehicleId: string): VehiclePosition {
  return { routeId, tripId: '', vehicleId, label: '', lat: 44.65, lon: -63.58, timestamp: 0 };
}

describe('GTFSQuery', () => {
  describe('arrivalsFor', () => {
    const records: TripUpdateRecord[] = [
      record({ tripId: 'a', routeId: '10', stopId: '1001', arrivalTime: 1_700_000_300 }),
      record({ tripId: 'b', routeId: '9a', stopId: '1001', arrivalTime: 1_700_000_100 }),
      record({ tripId: 'c', routeId: '10', stopId: '1002', arrivalTime: 1_700_000_050 }),
      record({ tripId: 'd', routeId: '10', stopId: '1001', arrivalTime: 1_700_000_200 }),
      record({ tripId: 'e', routeId: '20', stopId: '1001', arrivalTime: 1_700_000_200 }),
    ];

    test('should sort every arrival at the stop for "all"', () => {
      const results = GTFSQuery.arrivalsFor(records, '1001', 'all');

      expect(results.map((r) => r.tripId)).toEqual(['b', 'd', 'e', 'a']);
    });

    test('should keep feed order for equal arrival times', () => {
      const results = GTFSQuery.arrivalsFor(records, '1001', 'ALL');

      const tied = results.filter((r) => r.arrivalTime === 1_700_000_200);
      expect(tied.map((r) => r.tripId)).toEqual(['d', 'e']);
    });

    test('should filter by route case-insensitively', () => {
      expect(GTFSQuery.arrivalsFor(records, '1001', '10').map((r) => r.tripId)).toEqual(['d', 'a']);
      expect(GTFSQuery.arrivalsFor(records, '1001', '9A').map((r) => r.tripId)).toEqual(['b']);
    });

    test('should return an empty list for a stop with no updates', () => {
      expect(GTFSQuery.arrivalsFor(records, '9999', 'all')).toEqual([]);
    });

    test('should not reorder the input', () => {
      GTFSQuery.arrivalsFor(records, '1001', 'all');

      expect(records.map((r) => r.tripId)).toEqual(['a', 'b', 'c', 'd', 'e']);
    });
  });

  describe('alertsMatching', () => {
    const alerts = [alert('Detour on 10', ['10', '20']), alert('Stop closed', ['30'])];

    test('should keep alerts sharing a tracked route', () => {
      const results = GTFSQuery.alertsMatching(alerts, new Set(['10']));

      expect(results.map((a) => a.header)).toEqual(['Detour on 10']);
    });

    test('should compare tracked routes case-insensitively', () => {
      const withLetters = [alert('Ferry delay', ['FERRY'])];

      expect(GTFSQuery.alertsMatching(withLetters, new Set(['ferry']))).toHaveLength(1);
    });

    test('should return every alert for "all"', () => {
      expect(GTFSQuery.alertsMatching(alerts, 'all')).toHaveLength(2);
    });

    test('should return nothing for an empty tracked set', () => {
      expect(GTFSQuery.alertsMatching(alerts, new Set())).toEqual([]);
    });
  });

  describe('vehiclesOnRoutes', () => {
    const vehicles = [vehicle('10', 'bus-1'), vehicle('20', 'bus-2'), vehicle('10', 'bus-3')];

    test('should keep vehicles on tracked routes in feed order', () => {
      const results = GTFSQuery.vehiclesOnRoutes(vehicles, new Set(['10']));

      expect(results.map((v) => v.vehicleId)).toEqual(['bus-1', 'bus-3']);
    });

    test('should keep every vehicle for "all"', () => {
      expect(GTFSQuery.vehiclesOnRoutes(vehicles, 'all')).toHaveLength(3);
    });
  });

  describe('nearestStops', () => {
    test('should return three stops, closest first', () => {
      const results = GTFSQuery.nearestStops(mockStops, 44.65, -63.58);

      expect(results).toHaveLength(3);
      expect(results[0].stop.stop_id).toBe('1002');
      expect(results[0].distanceKm).toBe(0);
      for (let i = 1; i < results.length; i++) {
        expect(results[i].distanceKm).toBeGreaterThanOrEqual(results[i - 1].distanceKm);
      }
    });

    test('should measure great-circle distance in kilometres', () => {
      const equator: GTFSStop[] = [{ stop_id: '0001', stop_name: 'Null Island East', stop_lat: 0, stop_lon: 1 }];

      const [result] = GTFSQuery.nearestStops(equator, 0, 0);

      expect(result.distanceKm).toBeCloseTo(111.195, 3);
    });

    test('should return every stop when there are fewer than k', () => {
      expect(GTFSQuery.nearestStops(mockStops.slice(0, 2), 44.64, -63.57)).toHaveLength(2);
    });

    test('should respect k', () => {
      expect(GTFSQuery.nearestStops(mockStops, 44.64, -63.57, 1)).toHaveLength(1);
    });

    test('should keep input order for equal distances', () => {
      const twins: GTFSStop[] = [
        { stop_id: '2001', stop_name: 'North side', stop_lat: 44.7, stop_lon: -63.6 },
        { stop_id: '2002', stop_name: 'South side', stop_lat: 44.7, stop_lon: -63.6 },
      ];

      const results = GTFSQuery.nearestStops(twins, 44.6, -63.6, 2);

      expect(results.map((r) => r.stop.stop_id)).toEqual(['2001', '2002']);
    });

    test('should accept coordinates typed as text', () => {
      const results = GTFSQuery.nearestStops(mockStops, ' 44.64 ', '-63.57');

      expect(results[0].stop.stop_id).toBe('1001');
    });

    test('should reject a non-numeric latitude', () => {
      expect(() => GTFSQuery.nearestStops(mockStops, 'abc', '-63.57')).toThrow(InvalidInputError);
      expect(() => GTFSQuery.nearestStops(mockStops, 'abc', '-63.57')).toThrow('Invalid latitude: "abc"');
    });

    test('should reject empty and non-finite input', () => {
      expect(() => GTFSQuery.nearestStops(mockStops, '', '-63.57')).toThrow(InvalidInputError);
      expect(() => GTFSQuery.nearestStops(mockStops, 44.64, Number.NaN)).toThrow(InvalidInputError);
      expect(() => GTFSQuery.nearestStops(mockStops, '44.64', 'Infinity')).toThrow(InvalidInputError);
    });

    test('should reject a hex latitude', () => {
      expect(() => GTFSQuery.nearestStops(mockStops, '0x2C', '-63.57')).toThrow('Invalid latitude: "0x2C"');
    });
  });
});
