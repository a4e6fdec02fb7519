import { z } from 'zod';
import { describeError, silentLogger } from '@transit-console/gtfs-parser';
import type { Logger } from '@transit-console/gtfs-parser';

export type GeocodeResult = { ok: true; address: string } | { ok: false; reason: string };

export interface ReverseGeocoder {
  reverse(lat: number, lon: number): Promise<GeocodeResult>;
}

export interface GeocoderResponse {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
}

export type GeocoderFetch = (
  url: string,
  init: { signal: AbortSignal; headers: Record<string, string> }
) => Promise<GeocoderResponse>;

export interface NominatimOptions {
  url: string;
  userAgent: string;
  timeoutMs?: number;
  fetch?: GeocoderFetch;
  logger?: Logger;
}

const nominatimReply = z.union([
  z.object({ display_name: z.string() }),
  z.object({ error: z.string() }),
]);

const defaultFetch: GeocoderFetch = (url, init) => fetch(url, init);

/**
 * Reverse geocoding against a Nominatim `/reverse` endpoint.
 * Never throws; every failure is returned with its reason.
 */
export class NominatimGeocoder implements ReverseGeocoder {
  private readonly fetchImpl: GeocoderFetch;
  private readonly logger: Logger;

  constructor(private readonly options: NominatimOptions) {
    this.fetchImpl = options.fetch ?? defaultFetch;
    this.logger = options.logger ?? silentLogger;
  }

  async reverse(lat: number, lon: number): Promise<GeocodeResult> {
    const url = new URL(this.options.url);
    url.searchParams.set('format', 'jsonv2');
    url.searchParams.set('lat', String(lat));
    url.searchParams.set('lon', String(lon));

    try {
      const response = await this.fetchImpl(url.toString(), {
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 10_000),
        headers: { 'User-Agent': this.options.userAgent, Accept: 'application/json' },
      });
      if (!response.ok) {
        return this.fail(`geocoder answered ${response.status} ${response.statusText}`.trim());
      }

      const reply = nominatimReply.safeParse(await response.json());
      if (!reply.success) return this.fail('unexpected geocoder response');
      if ('error' in reply.data) return this.fail(reply.data.error);

      return { ok: true, address: reply.data.display_name };
    } catch (error) {
      return this.fail(describeError(error));
    }
  }

  private fail(reason: string): GeocodeResult {
    this.logger.debug(`Reverse geocoding failed: ${reason}`);
    return { ok: false, reason };
  }
}
