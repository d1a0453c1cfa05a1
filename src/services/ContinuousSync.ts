import type { LocationStore } from '../db/LocationStore';
import type { ImportConfig } from '../types/ImportJob';
import { errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import type { BackfillJobManager } from './BackfillJobManager';

export interface SyncStatus {
  enabled: boolean;
  running: boolean;
  intervalMs: number;
  lastSync?: number;
  lastJobId?: string;
}

/**
 * Periodically starts incremental imports covering photos taken since
 * the previous sync
 */
export class ContinuousSync {
  private readonly logger = createLogger({ component: 'ContinuousSync' });
  private syncTimer?: NodeJS.Timeout;
  private lastJobId?: string;

  constructor(
    private readonly store: LocationStore,
    private readonly manager: BackfillJobManager,
    private readonly userId: string,
    private readonly intervalMs: number
  ) {}

  /**
   * Start an import from the last sync point and advance it to now.
   * Skipped while the previous sync job is still running.
   */
  syncNow(userId: string = this.userId): string | undefined {
    if (this.lastJobId && this.manager.isRunning(this.lastJobId)) {
      this.logger.debug({ jobId: this.lastJobId }, 'Previous sync still running, skipping');
      return undefined;
    }

    const config: ImportConfig = { userId };
    const lastSync = this.store.getLastSyncTimestamp();
    if (lastSync !== undefined) {
      config.after = lastSync;
    }

    const syncedAt = Math.floor(Date.now() / 1000);
    const jobId = this.manager.startImport(config);
    this.store.setLastSyncTimestamp(syncedAt);
    this.lastJobId = jobId;

    this.logger.info({ jobId, after: config.after }, 'Sync import started');
    return jobId;
  }

  getStatus(): SyncStatus {
    return {
      enabled: this.manager.isConfigured(),
      running: this.syncTimer !== undefined,
      intervalMs: this.intervalMs,
      lastSync: this.store.getLastSyncTimestamp(),
      lastJobId: this.lastJobId,
    };
  }

  start(): void {
    if (this.syncTimer) {
      this.logger.warn('Continuous sync already running');
      return;
    }

    this.logger.info({ intervalMs: this.intervalMs }, 'Starting continuous sync');

    this.syncTimer = setInterval(() => {
      try {
        this.syncNow();
      } catch (error) {
        this.logger.error({ error: errorMessage(error) }, 'Error during scheduled sync');
      }
    }, this.intervalMs);
  }

  stop(): void {
    if (this.syncTimer) {
      this.logger.info('Stopping continuous sync');
      clearInterval(this.syncTimer);
      this.syncTimer = undefined;
    }
  }

  isRunning(): boolean {
    return this.syncTimer !== undefined;
  }
}
