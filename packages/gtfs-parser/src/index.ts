/**
 * GTFS parser and realtime correlation for a single transit agency
 *
 * This package provides:
 * - A static schedule store over a zipped GTFS archive, indexed on first use
 * - A GTFS-Realtime client for alerts, trip updates and vehicle positions
 * - Queries joining realtime records with the static schedule
 * - Geo and time utilities shared with the console client
 */

export * from './types.js';
export * from './errors.js';
export * from './parser.js';
export * from './archive.js';
export * from './store.js';
export * from './query.js';
export * from './realtime.js';
export * from './utils.js';
