/**
 * Contract for an external photo library that can be paged through
 * in capture order
 */

export interface SourceAsset {
  id: string;
  timestamp: number; // capture time, unix seconds
  lat?: number;
  lon?: number;
  deviceId: string;
  filename: string;
  webUrl: string;
  make?: string;
  model?: string;
}

export type GeotaggedAsset = SourceAsset & { lat: number; lon: number };

export interface AssetSearchOptions {
  after?: number;
  before?: number;
  page: number; // 1-based
  pageSize: number;
}

export interface AssetPage {
  assets: SourceAsset[];
  hasMore: boolean;
}

export interface AssetSource {
  searchAssets(options: AssetSearchOptions): Promise<AssetPage>;
}

export function hasGps(asset: SourceAsset): asset is GeotaggedAsset {
  return asset.lat !== undefined && asset.lon !== undefined;
}

/**
 * Camera identity from EXIF make/model, avoiding "Apple Apple iPhone"
 * style duplication
 */
export function deviceIdFromMakeModel(make?: string | null, model?: string | null): string {
  const m = make?.trim() ?? '';
  const mdl = model?.trim() ?? '';

  if (!m && !mdl) return 'immich-unknown';
  if (!m) return mdl;
  if (!mdl) return m;

  if (mdl.toLowerCase().startsWith(m.toLowerCase())) {
    return mdl;
  }
  return `${m} ${mdl}`;
}

export function filenameFromPath(path?: string | null): string {
  if (!path) return '';
  const parts = path.split('/');
  return parts[parts.length - 1];
}
