import crypto from 'crypto';
import type { LocationStore } from '../db/LocationStore';
import type { AssetPage, AssetSource, GeotaggedAsset } from '../sources/AssetSource';
import { hasGps } from '../sources/AssetSource';
import type { CameraPreview, ImportConfig, ImportJob, ImportProgress, PreviewProgress } from '../types/ImportJob';
import type { LocationSource, Sample } from '../types/Location';
import { BackfillError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import type { PathIndexer } from './PathIndexer';
import { ProgressChannel } from './ProgressChannel';

export const PAGE_SIZE = 200;
export const CHANNEL_CAPACITY = 10;
export const JOB_LIST_LIMIT = 50;
export const RESTART_ERROR = 'server restarted';
const SHUTDOWN_REASON = 'shutdown';

export interface Subscription {
  channel: ProgressChannel<ImportProgress>;
  unsubscribe: () => void;
}

export type PreviewCallback = (progress: PreviewProgress) => void;

const now = () => Math.floor(Date.now() / 1000);

export function toProgress(job: ImportJob): ImportProgress {
  const known = job.total !== undefined && job.total > 0;
  const total = known && job.total !== undefined ? job.total : job.processed;

  const progress: ImportProgress = {
    jobId: job.id,
    status: job.status,
    total,
    processed: job.processed,
    imported: job.imported,
    skipped: job.skipped,
    errors: job.errors,
    percent: known ? (job.processed / total) * 100 : 0,
  };
  if (job.lastError) progress.error = job.lastError;
  return progress;
}

export function assetToSample(asset: GeotaggedAsset, userId: string): { sample: Sample; source: LocationSource } {
  const sample: Sample = {
    timestamp: asset.timestamp,
    userId,
    deviceId: asset.deviceId,
    lat: asset.lat,
    lon: asset.lon,
    source: 'immich',
  };

  const source: LocationSource = {
    timestamp: asset.timestamp,
    deviceId: asset.deviceId,
    sourceType: 'immich',
    sourceId: asset.id,
    metadata: {
      webUrl: asset.webUrl,
      filename: asset.filename,
    },
  };
  if (asset.make) source.metadata.make = asset.make;
  if (asset.model) source.metadata.model = asset.model;

  return { sample, source };
}

/**
 * Runs resumable bulk imports from an asset source.
 *
 * Each job has one worker that pages through the source, checkpoints
 * after every page and fans progress out to subscribers. Jobs found
 * running at startup were cut off by a restart and become interrupted.
 */
export class BackfillJobManager {
  private readonly logger = createLogger({ component: 'BackfillJobManager' });
  private readonly cancellers = new Map<string, AbortController>();
  private readonly tasks = new Map<string, Promise<void>>();
  private readonly subscribers = new Map<string, Set<ProgressChannel<ImportProgress>>>();

  constructor(
    private readonly store: LocationStore,
    private readonly indexer: PathIndexer,
    private readonly source?: AssetSource
  ) {}

  /**
   * Mark jobs left running by a previous process as interrupted
   */
  initialize(): number {
    const stale = this.store.listJobsByStatus('running');

    for (const job of stale) {
      job.status = 'interrupted';
      job.lastError = RESTART_ERROR;
      this.store.updateJob(job);
    }

    if (stale.length > 0) {
      this.logger.warn({ count: stale.length }, 'Marked running jobs as interrupted');
    }
    return stale.length;
  }

  isConfigured(): boolean {
    return this.source !== undefined;
  }

  private requireSource(): AssetSource {
    if (!this.source) {
      throw new BackfillError('SOURCE_NOT_CONFIGURED', 'Immich is not configured');
    }
    return this.source;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  startImport(config: ImportConfig): string {
    const source = this.requireSource();

    const job: ImportJob = {
      id: crypto.randomUUID(),
      status: 'running',
      startedAt: now(),
      processed: 0,
      imported: 0,
      skipped: 0,
      errors: 0,
      lastPage: 0,
      config: { ...config },
    };
    this.store.createJob(job);

    this.logger.info({ jobId: job.id, config }, 'Starting import');
    this.launch(job, source, 1);
    return job.id;
  }

  resumeImport(jobId: string): void {
    const source = this.requireSource();

    const job = this.store.getJob(jobId);
    if (!job) {
      throw new BackfillError('JOB_NOT_FOUND', `Job ${jobId} not found`);
    }
    if (job.status !== 'interrupted' && job.status !== 'failed') {
      throw new BackfillError('JOB_NOT_RESUMABLE', `Job ${jobId} is ${job.status} and cannot be resumed`);
    }

    job.status = 'running';
    job.lastError = undefined;
    job.completedAt = undefined;
    this.store.updateJob(job);

    this.logger.info({ jobId, fromPage: job.lastPage + 1 }, 'Resuming import');
    this.launch(job, source, job.lastPage + 1);
  }

  /**
   * Signal the worker to stop. The worker records the cancelled state
   * at its next page boundary.
   */
  cancelImport(jobId: string): void {
    const controller = this.cancellers.get(jobId);
    if (!controller) {
      throw new BackfillError('JOB_NOT_FOUND', `No active import for job ${jobId}`);
    }

    controller.abort();
    this.cancellers.delete(jobId);
    this.logger.info({ jobId }, 'Import cancellation requested');
  }

  private launch(job: ImportJob, source: AssetSource, startPage: number): void {
    const jobId = job.id;
    const controller = new AbortController();
    this.cancellers.set(jobId, controller);

    const task = this.runImport(job, source, startPage, controller.signal)
      .catch((error) => {
        this.logger.error({ jobId, error: errorMessage(error) }, 'Import worker crashed');
      })
      .finally(() => {
        if (this.cancellers.get(jobId) === controller) {
          this.cancellers.delete(jobId);
        }
        this.tasks.delete(jobId);
        this.closeStreams(jobId);
      });

    this.tasks.set(jobId, task);
  }

  /**
   * Worker body. Any error, including a failed store write, ends the job
   * as failed.
   */
  private async runImport(job: ImportJob, source: AssetSource, startPage: number, signal: AbortSignal): Promise<void> {
    try {
      await this.importPages(job, source, startPage, signal);
    } catch (error) {
      this.failJob(job, error);
    }
  }

  private async importPages(job: ImportJob, source: AssetSource, startPage: number, signal: AbortSignal): Promise<void> {
    const { config } = job;
    const allowed = new Set(config.cameras ?? []);

    for (let page = startPage; ; page++) {
      if (signal.aborted) {
        if (signal.reason === SHUTDOWN_REASON) {
          // Left running at its checkpoint; the next startup marks it interrupted
          this.logger.info({ jobId: job.id, lastPage: job.lastPage }, 'Import paused for shutdown');
          return;
        }
        job.status = 'cancelled';
        job.completedAt = now();
        this.store.updateJob(job);
        this.broadcast(job);
        this.logger.info({ jobId: job.id, page }, 'Import cancelled');
        return;
      }

      const result = await source.searchAssets({
        after: config.after,
        before: config.before,
        page,
        pageSize: PAGE_SIZE,
      });

      for (const asset of result.assets) {
        job.processed++;

        if (!hasGps(asset)) continue;
        if (allowed.size > 0 && !allowed.has(asset.deviceId)) continue;

        const { sample, source: provenance } = assetToSample(asset, config.userId);
        try {
          if (this.store.insertSampleWithSource(sample, provenance)) {
            job.imported++;
          } else {
            job.skipped++;
          }
        } catch (error) {
          job.errors++;
          this.logger.warn({ jobId: job.id, assetId: asset.id, error: errorMessage(error) }, 'Failed to insert location');
        }
      }

      job.lastPage = page;
      this.store.updateJob(job);
      this.broadcast(job);

      if (!result.hasMore) break;
    }

    job.status = 'completed';
    job.completedAt = now();
    this.store.updateJob(job);
    this.broadcast(job);

    if (job.imported > 0) {
      try {
        this.indexer.rebuildAll();
      } catch (error) {
        this.logger.error({ jobId: job.id, error: errorMessage(error) }, 'Path rebuild after import failed');
      }
    }

    this.logger.info({
      jobId: job.id,
      imported: job.imported,
      skipped: job.skipped,
      errors: job.errors,
    }, 'Import completed');
  }

  /**
   * Record a fatal worker error. The job keeps its last checkpoint and can
   * be resumed.
   */
  private failJob(job: ImportJob, error: unknown): void {
    job.status = 'failed';
    job.lastError = errorMessage(error);
    job.completedAt = now();
    this.logger.error({ jobId: job.id, lastPage: job.lastPage, error: job.lastError }, 'Import failed');

    try {
      this.store.updateJob(job);
    } catch (persistError) {
      this.logger.error({ jobId: job.id, error: errorMessage(persistError) }, 'Could not record import failure');
    }
    this.broadcast(job);
  }

  // ===========================================================================
  // Preview
  // ===========================================================================

  /**
   * Scan the source without writing anything, reporting cameras and
   * GPS coverage after each page
   */
  async preview(config: ImportConfig, onProgress: PreviewCallback, signal?: AbortSignal): Promise<void> {
    const source = this.requireSource();

    const cameras = new Map<string, CameraPreview>();
    let scanned = 0;
    let photosWithGps = 0;

    for (let page = 1; ; page++) {
      if (signal?.aborted) return;

      let result: AssetPage;
      try {
        result = await source.searchAssets({
          after: config.after,
          before: config.before,
          page,
          pageSize: PAGE_SIZE,
        });
      } catch (error) {
        onProgress({
          scanned,
          totalEstimated: scanned,
          percent: 0,
          photosWithGps,
          cameras: [...cameras.values()],
          complete: false,
          error: errorMessage(error),
        });
        return;
      }

      for (const asset of result.assets) {
        scanned++;
        if (!hasGps(asset)) continue;
        photosWithGps++;

        const camera = cameras.get(asset.deviceId);
        if (camera) {
          camera.count++;
          camera.earliest = Math.min(camera.earliest, asset.timestamp);
          camera.latest = Math.max(camera.latest, asset.timestamp);
        } else {
          cameras.set(asset.deviceId, {
            deviceId: asset.deviceId,
            count: 1,
            earliest: asset.timestamp,
            latest: asset.timestamp,
          });
        }
      }

      // Assume the remaining pages are about as dense as those seen so far
      const totalEstimated = result.hasMore ? Math.max(scanned + PAGE_SIZE, scanned * 2) : scanned;

      onProgress({
        scanned,
        totalEstimated,
        percent: totalEstimated > 0 ? (scanned / totalEstimated) * 100 : 0,
        photosWithGps,
        cameras: [...cameras.values()].map((c) => ({ ...c })),
        complete: !result.hasMore,
      });

      if (!result.hasMore) return;
    }
  }

  // ===========================================================================
  // Progress fan-out
  // ===========================================================================

  /**
   * Subscribe to a job's progress. The channel closes when the worker
   * ends, or immediately when no worker is running.
   */
  subscribe(jobId: string): Subscription {
    const channel = new ProgressChannel<ImportProgress>(CHANNEL_CAPACITY);

    if (!this.tasks.has(jobId)) {
      channel.close();
      return { channel, unsubscribe: () => undefined };
    }

    let channels = this.subscribers.get(jobId);
    if (!channels) {
      channels = new Set();
      this.subscribers.set(jobId, channels);
    }
    channels.add(channel);

    const unsubscribe = () => {
      const current = this.subscribers.get(jobId);
      if (current?.delete(channel)) {
        channel.close();
        if (current.size === 0) this.subscribers.delete(jobId);
      }
    };

    return { channel, unsubscribe };
  }

  private broadcast(job: ImportJob): void {
    const channels = this.subscribers.get(job.id);
    if (!channels) return;

    const progress = toProgress(job);
    for (const channel of channels) {
      if (!channel.offer(progress)) {
        this.logger.debug({ jobId: job.id }, 'Subscriber queue full, dropping update');
      }
    }
  }

  private closeStreams(jobId: string): void {
    const channels = this.subscribers.get(jobId);
    if (!channels) return;

    for (const channel of channels) {
      channel.close();
    }
    this.subscribers.delete(jobId);
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  getJob(jobId: string): ImportJob | undefined {
    return this.store.getJob(jobId);
  }

  listJobs(limit = JOB_LIST_LIMIT): ImportJob[] {
    return this.store.listJobs(limit);
  }

  getJobProgress(jobId: string): ImportProgress {
    const job = this.store.getJob(jobId);
    if (!job) {
      throw new BackfillError('JOB_NOT_FOUND', `Job ${jobId} not found`);
    }
    return toProgress(job);
  }

  isRunning(jobId: string): boolean {
    return this.tasks.has(jobId);
  }

  activeJobIds(): string[] {
    return [...this.tasks.keys()];
  }

  /**
   * Resolves once the job's worker has finished (immediately if none)
   */
  async waitForJob(jobId: string): Promise<void> {
    await this.tasks.get(jobId);
  }

  /**
   * Stop every running worker at its next page boundary and wait for them
   * to settle. Stopped jobs keep their checkpoint and can be resumed.
   */
  async shutdown(): Promise<void> {
    for (const [jobId, controller] of this.cancellers) {
      controller.abort(SHUTDOWN_REASON);
      this.logger.info({ jobId }, 'Stopping import for shutdown');
    }
    this.cancellers.clear();

    await Promise.all(this.tasks.values());
  }
}
