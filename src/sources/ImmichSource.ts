import axios from 'axios';
import type { AssetPage, AssetSearchOptions, AssetSource, SourceAsset } from './AssetSource';
import { deviceIdFromMakeModel, filenameFromPath } from './AssetSource';
import { createLogger } from '../utils/logger';

/**
 * Immich photo library
 * Pages through assets with EXIF via the metadata search endpoint
 * https://immich.app/docs/api/search-assets
 */

// =============================================================================
// Types
// =============================================================================

interface ImmichExifInfo {
  latitude?: number | null;
  longitude?: number | null;
  dateTimeOriginal?: string | null;
  make?: string | null;
  model?: string | null;
}

export interface ImmichAsset {
  id: string;
  deviceId?: string;
  fileCreatedAt: string;
  originalPath?: string;
  exifInfo?: ImmichExifInfo | null;
}

export interface ImmichSearchResponse {
  assets: {
    items: ImmichAsset[];
    nextPage?: string | null;
  };
}

export interface Thumbnail {
  data: Buffer;
  contentType: string;
}

function toUnixSeconds(value: string | null | undefined): number | undefined {
  if (!value) return undefined;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? undefined : Math.floor(ms / 1000);
}

function toIsoString(unixSeconds: number): string {
  return new Date(unixSeconds * 1000).toISOString();
}

// =============================================================================
// Immich Source Implementation
// =============================================================================

export class ImmichSource implements AssetSource {
  private readonly logger = createLogger({ component: 'ImmichSource' });
  private readonly baseUrl: string;

  constructor(baseUrl: string, private readonly apiKey: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  webUrl(assetId: string): string {
    return `${this.baseUrl}/photos/${assetId}`;
  }

  async searchAssets(options: AssetSearchOptions): Promise<AssetPage> {
    const body: Record<string, unknown> = {
      page: options.page,
      size: options.pageSize,
      withExif: true,
      order: 'asc', // oldest first keeps page numbers stable
    };
    if (options.after !== undefined) body.takenAfter = toIsoString(options.after);
    if (options.before !== undefined) body.takenBefore = toIsoString(options.before);

    try {
      const response = await axios.post<ImmichSearchResponse>(
        `${this.baseUrl}/api/search/metadata`,
        body,
        {
          headers: { 'x-api-key': this.apiKey },
          timeout: 30000,
        }
      );

      const items = response.data?.assets?.items ?? [];
      const hasMore = response.data?.assets?.nextPage != null;

      this.logger.debug({ page: options.page, count: items.length, hasMore }, 'Fetched asset page');

      return {
        assets: items.map((asset) => this.toSourceAsset(asset)),
        hasMore,
      };
    } catch (error) {
      if (axios.isAxiosError(error)) {
        this.logger.error({
          error: error.message,
          status: error.response?.status,
          page: options.page,
        }, 'Immich search failed');
      } else {
        this.logger.error({ error, page: options.page }, 'Error searching Immich assets');
      }
      throw error;
    }
  }

  /**
   * Check that the key can read assets with a one-item search
   */
  async validateConnection(): Promise<void> {
    await this.searchAssets({ page: 1, pageSize: 1 });
  }

  async getThumbnail(assetId: string): Promise<Thumbnail> {
    const response = await axios.get<ArrayBuffer>(
      `${this.baseUrl}/api/assets/${encodeURIComponent(assetId)}/thumbnail`,
      {
        headers: { 'x-api-key': this.apiKey },
        responseType: 'arraybuffer',
        timeout: 30000,
      }
    );

    const contentType = response.headers['content-type'];
    return {
      data: Buffer.from(response.data),
      contentType: typeof contentType === 'string' && contentType ? contentType : 'image/jpeg',
    };
  }

  toSourceAsset(asset: ImmichAsset): SourceAsset {
    const exif = asset.exifInfo ?? undefined;
    const timestamp = toUnixSeconds(exif?.dateTimeOriginal) ?? toUnixSeconds(asset.fileCreatedAt) ?? 0;

    const result: SourceAsset = {
      id: asset.id,
      timestamp,
      deviceId: deviceIdFromMakeModel(exif?.make, exif?.model),
      filename: filenameFromPath(asset.originalPath),
      webUrl: this.webUrl(asset.id),
    };

    if (typeof exif?.latitude === 'number' && typeof exif.longitude === 'number') {
      result.lat = exif.latitude;
      result.lon = exif.longitude;
    }
    if (exif?.make) result.make = exif.make;
    if (exif?.model) result.model = exif.model;

    return result;
  }
}
