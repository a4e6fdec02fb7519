import { parse } from 'csv-parse/sync';
import { DataFormatError } from './errors.js';
import type { GTFSStop, GTFSTrip, GTFSStopTime, GTFSAgency } from './types.js';

interface CsvTable {
  name: string;
  header: string[];
  rows: string[][];
}

function isRowList(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'))
  );
}

/**
 * Read a GTFS table: header row, comma separated rows, quoted fields allowed.
 */
function readTable(name: string, csv: string): CsvTable {
  let records: unknown;
  try {
    records = parse(csv, {
      bom: true,
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new DataFormatError(`${name} is not valid CSV`, name, { cause: error });
  }

  if (!isRowList(records)) {
    throw new DataFormatError(`${name} did not parse into rows`, name);
  }

  const [header = [], ...rows] = records;
  return { name, header, rows };
}

function requireColumns<K extends string>(
  table: CsvTable,
  columns: readonly K[]
): (column: K) => number {
  const missing = columns.filter((column) => !table.header.includes(column));
  if (missing.length > 0) {
    throw new DataFormatError(
      `${table.name} is missing required column(s): ${missing.join(', ')}`,
      table.name
    );
  }

  const indices = new Map<string, number>(columns.map((column) => [column, table.header.indexOf(column)]));
  return (column) => indices.get(column) ?? -1;
}

function cell(row: string[], index: number): string {
  return row[index] ?? '';
}

function numericCell(table: CsvTable, row: string[], index: number, line: number): number {
  const raw = cell(row, index);
  const value = Number(raw);
  if (raw === '' || !Number.isFinite(value)) {
    throw new DataFormatError(
      `${table.name} row ${line}: ${table.header[index]} "${raw}" is not a number`,
      table.name
    );
  }
  return value;
}

/**
 * Parse GTFS CSV tables into typed records.
 * Row numbers in errors count the header as row 1.
 */
export class GTFSParser {
  /**
   * Parse stops.txt content
   */
  static parseStops(csv: string): GTFSStop[] {
    const table = readTable('stops.txt', csv);
    const col = requireColumns(table, ['stop_id', 'stop_name', 'stop_lat', 'stop_lon']);

    return table.rows.map((row, i) => ({
      stop_id: cell(row, col('stop_id')),
      stop_name: cell(row, col('stop_name')),
      stop_lat: numericCell(table, row, col('stop_lat'), i + 2),
      stop_lon: numericCell(table, row, col('stop_lon'), i + 2),
    }));
  }

  /**
   * Parse trips.txt content
   */
  static parseTrips(csv: string): GTFSTrip[] {
    const table = readTable('trips.txt', csv);
    const col = requireColumns(table, ['trip_id', 'route_id']);

    return table.rows.map((row) => ({
      trip_id: cell(row, col('trip_id')),
      route_id: cell(row, col('route_id')),
    }));
  }

  /**
   * Parse stop_times.txt content
   * This is typically the largest file in GTFS feeds
   */
  static parseStopTimes(csv: string): GTFSStopTime[] {
    const table = readTable('stop_times.txt', csv);
    const col = requireColumns(table, ['trip_id', 'stop_id', 'stop_sequence']);

    return table.rows.map((row, i) => ({
      trip_id: cell(row, col('trip_id')),
      stop_id: cell(row, col('stop_id')),
      stop_sequence: numericCell(table, row, col('stop_sequence'), i + 2),
    }));
  }

  /**
   * Parse agency.txt content. No column is required.
   */
  static parseAgencies(csv: string): GTFSAgency[] {
    const table = readTable('agency.txt', csv);
    const optional = (row: string[], column: keyof GTFSAgency): string | undefined => {
      const index = table.header.indexOf(column);
      return index === -1 ? undefined : cell(row, index);
    };

    return table.rows.map((row) => ({
      agency_name: optional(row, 'agency_name'),
      agency_url: optional(row, 'agency_url'),
      agency_timezone: optional(row, 'agency_timezone'),
      agency_lang: optional(row, 'agency_lang'),
      agency_phone: optional(row, 'agency_phone'),
    }));
  }
}
