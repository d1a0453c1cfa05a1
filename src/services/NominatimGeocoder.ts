import axios from 'axios';
import type { LocationStore } from '../db/LocationStore';
import type { Bounds, GeocodedPlace } from '../types/Location';
import { errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

/**
 * Reverse geocoding for timeline stops via OpenStreetMap Nominatim.
 * https://nominatim.org/release-docs/develop/api/Reverse/
 */

export interface LatLon {
  lat: number;
  lon: number;
}

/**
 * Resolves coordinates to place names. Points that cannot be resolved are
 * left out of the result map (keyed by input index).
 */
export interface PlaceResolver {
  reverseGeocodeBatch(points: LatLon[]): Promise<Map<number, GeocodedPlace>>;
}

// =============================================================================
// Types
// =============================================================================

interface NominatimAddress {
  amenity?: string;
  shop?: string;
  tourism?: string;
  leisure?: string;
  building?: string;
  house_number?: string;
  road?: string;
  neighbourhood?: string;
  suburb?: string;
  city?: string;
  town?: string;
  village?: string;
  state?: string;
  country?: string;
}

export interface NominatimResponse {
  place_id?: number;
  lat?: string;
  lon?: string;
  name?: string;
  display_name?: string;
  type?: string;
  category?: string;
  boundingbox?: string[]; // [minLat, maxLat, minLon, maxLon]
  address?: NominatimAddress;
  error?: string;
}

export interface NominatimGeocoderOptions {
  baseUrl?: string;
  minIntervalMs?: number;
  userAgent?: string;
}

/**
 * Pick the most specific useful name from a Nominatim result
 */
export function extractPlaceName(response: NominatimResponse): string {
  if (response.name) return response.name;

  const addr = response.address ?? {};
  const named = addr.amenity || addr.shop || addr.tourism || addr.leisure;
  if (named) return named;
  if (addr.building && addr.building !== 'yes') return addr.building;

  if (addr.road) {
    return addr.house_number ? `${addr.house_number} ${addr.road}` : addr.road;
  }

  return addr.neighbourhood || addr.suburb || addr.city || addr.town || addr.village || '';
}

function parseBoundingBox(box: string[] | undefined, lat: number, lon: number): Bounds | undefined {
  if (!box || box.length !== 4) return undefined;

  const [minLat, maxLat, minLon, maxLon] = box.map((v) => parseFloat(v));
  if ([minLat, maxLat, minLon, maxLon].some((v) => Number.isNaN(v))) return undefined;

  // Widen to include the query point so the same lookup hits the cache
  return {
    minLat: Math.min(minLat, lat),
    maxLat: Math.max(maxLat, lat),
    minLon: Math.min(minLon, lon),
    maxLon: Math.max(maxLon, lon),
  };
}

// =============================================================================
// Geocoder
// =============================================================================

export class NominatimGeocoder implements PlaceResolver {
  private readonly logger = createLogger({ component: 'NominatimGeocoder' });
  private readonly baseUrl: string;
  private readonly minIntervalMs: number;
  private readonly userAgent: string;
  private nextRequestAt = 0;

  constructor(private readonly store: LocationStore, options: NominatimGeocoderOptions = {}) {
    this.baseUrl = (options.baseUrl ?? 'https://nominatim.openstreetmap.org').replace(/\/+$/, '');
    this.minIntervalMs = options.minIntervalMs ?? 1000; // Nominatim usage policy: 1 req/s
    this.userAgent = options.userAgent ?? 'Wayline/0.1 (location-history)';
  }

  async reverseGeocodeBatch(points: LatLon[]): Promise<Map<number, GeocodedPlace>> {
    const results = new Map<number, GeocodedPlace>();

    for (const [index, point] of points.entries()) {
      const cached = this.store.lookupPlace(point.lat, point.lon);
      if (cached) {
        results.set(index, cached);
        continue;
      }

      try {
        const place = await this.fetchPlace(point.lat, point.lon);
        if (place) {
          results.set(index, place);
        }
      } catch (error) {
        this.logger.warn({
          lat: point.lat,
          lon: point.lon,
          error: errorMessage(error),
          status: axios.isAxiosError(error) ? error.response?.status : undefined,
        }, 'Reverse geocoding failed, skipping point');
      }
    }

    return results;
  }

  /**
   * Reserve the next request slot. Reservations are made synchronously so
   * concurrent batches still respect the upstream rate limit.
   */
  private async waitForSlot(): Promise<void> {
    const now = Date.now();
    const slot = Math.max(now, this.nextRequestAt);
    this.nextRequestAt = slot + this.minIntervalMs;

    if (slot > now) {
      await new Promise((resolve) => setTimeout(resolve, slot - now));
    }
  }

  private async fetchPlace(lat: number, lon: number): Promise<GeocodedPlace | undefined> {
    await this.waitForSlot();

    const response = await axios.get<NominatimResponse>(`${this.baseUrl}/reverse`, {
      params: {
        lat: lat.toFixed(6),
        lon: lon.toFixed(6),
        format: 'jsonv2',
        zoom: 18,
        addressdetails: 1,
      },
      headers: { 'User-Agent': this.userAgent },
      timeout: 30000,
    });

    const data = response.data;
    const placeName = data ? extractPlaceName(data) : '';
    if (!placeName) {
      this.logger.debug({ lat, lon }, 'No usable place name');
      return undefined;
    }

    const place: GeocodedPlace = { placeName, lat, lon };
    if (data.type) place.placeType = data.type;
    if (data.display_name) place.displayName = data.display_name;

    const bounds = parseBoundingBox(data.boundingbox, lat, lon);
    if (bounds) {
      this.store.cachePlace(bounds, place);
    }

    this.logger.debug({ lat, lon, placeName }, 'Resolved place');
    return place;
  }
}
