/**
 * Import job state, persisted so jobs survive restarts
 */

export type ImportJobStatus =
  | 'pending'
  | 'running'
  | 'completed'
  | 'failed'
  | 'cancelled'
  | 'interrupted';

export interface ImportConfig {
  userId: string;
  after?: number; // unix seconds
  before?: number;
  cameras?: string[]; // device allow-list, empty means all
}

export interface ImportJob {
  id: string;
  status: ImportJobStatus;
  startedAt: number;
  completedAt?: number;
  total?: number;
  processed: number;
  imported: number;
  skipped: number;
  errors: number;
  lastPage: number; // checkpoint: last fully processed page
  config: ImportConfig;
  lastError?: string;
}

export interface ImportProgress {
  jobId: string;
  status: ImportJobStatus;
  total: number;
  processed: number;
  imported: number;
  skipped: number;
  errors: number;
  percent: number;
  error?: string;
}

export interface CameraPreview {
  deviceId: string;
  count: number;
  earliest: number;
  latest: number;
}

export interface PreviewProgress {
  scanned: number;
  totalEstimated: number;
  percent: number;
  photosWithGps: number;
  cameras: CameraPreview[];
  complete: boolean;
  error?: string;
}
