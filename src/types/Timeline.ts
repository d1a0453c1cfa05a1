export type TimelineEntryType = 'stop' | 'travel';

export interface TimelinePhoto {
  sourceId: string;
  thumbnailUrl: string;
  filename?: string;
}

/**
 * A single stop or travel segment. Derived per query, never stored.
 */
export interface TimelineEntry {
  type: TimelineEntryType;
  timestamp: number;
  endTimestamp: number;
  lat: number;
  lon: number;
  endLat?: number; // travel destination
  endLon?: number;
  durationSeconds: number;
  distanceMeters?: number; // travel only
  placeName?: string; // stops only
  photos?: TimelinePhoto[];
}

export interface Timeline {
  date: string;
  entries: TimelineEntry[];
}
