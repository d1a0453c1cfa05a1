import express, { Request, Response } from 'express';
import cors from 'cors';
import type { LocationStore } from '../db/LocationStore';
import type { BackfillJobManager } from '../services/BackfillJobManager';
import type { ContinuousSync } from '../services/ContinuousSync';
import type { PathIndexer } from '../services/PathIndexer';
import type { PathSimplifier } from '../services/PathSimplifier';
import type { TimelineBuilder } from '../services/TimelineBuilder';
import type { TimelineImporter } from '../services/TimelineImporter';
import type { ImmichSource } from '../sources/ImmichSource';
import type { ImportConfig, ImportProgress } from '../types/ImportJob';
import type { PathPoint, Sample } from '../types/Location';
import { BackfillError, type BackfillErrorCode, ValidationError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { clusterPhotos, clusterRadius } from '../utils/photoClusters';
import { parseImportConfig } from '../utils/validation';
import {
  parseBBox,
  parseDate,
  parseLoggerPosition,
  parseLoggerTime,
  parseMeters,
  parseOptionalTimestamp,
  parseOwnTracks,
  parseRequiredTimestamp,
  parseStageOrder,
  parseTimestamp,
  queryString,
} from './params';

export interface ServerDependencies {
  store: LocationStore;
  indexer: PathIndexer;
  simplifier: PathSimplifier;
  timeline: TimelineBuilder;
  timelineImporter: TimelineImporter;
  jobs: BackfillJobManager;
  immich?: ImmichSource;
  sync?: ContinuousSync;
  defaultUser: string;
}

const HEARTBEAT_INTERVAL_MS = 30000;

const STATUS_BY_CODE: Record<BackfillErrorCode, number> = {
  JOB_NOT_FOUND: 404,
  JOB_NOT_RESUMABLE: 409,
  SOURCE_NOT_CONFIGURED: 503,
};

export function createServer(deps: ServerDependencies) {
  const { store, indexer, simplifier, timeline, timelineImporter, jobs, immich, sync, defaultUser } = deps;
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '100mb' })); // timeline exports are large

  /**
   * Store samples then bring their paths up to date. The samples are
   * already saved, so an index failure is only logged.
   */
  const ingest = (samples: Sample[]) => {
    for (const sample of samples) {
      store.insertSample(sample);
    }
    try {
      indexer.updateForSamples(samples);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Path index update failed after ingest');
    }
  };

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  // ===========================================================================
  // Ingestion
  // ===========================================================================

  // OwnTracks HTTP mode
  app.post('/owntracks', (req: Request, res: Response) => {
    try {
      const message = parseOwnTracks(req.body);
      if (message.type === 'location') {
        const userId = queryString(req.header('X-Limit-U')) ?? defaultUser;
        ingest([{ ...message.sample, userId }]);
      }
      res.json({});
    } catch (error) {
      sendError(res, error, 'Failed to store location');
    }
  });

  // GPSLogger custom URL: /gpslogger?lat=%LAT&lon=%LON&time=%TIMESTAMP
  app.get('/gpslogger', (req: Request, res: Response) => {
    try {
      const { lat, lon } = parseLoggerPosition(req.query.lat, req.query.lon);

      ingest([{
        timestamp: parseLoggerTime(req.query.time),
        userId: defaultUser,
        deviceId: 'gpslogger',
        lat,
        lon,
        source: 'gpslogger',
      }]);
      res.type('text/plain').send('OK');
    } catch (error) {
      sendError(res, error, 'Failed to store location');
    }
  });

  // Google Timeline export upload
  app.post('/api/import/timeline', (req: Request, res: Response) => {
    try {
      const userId = queryString(req.query.user) ?? defaultUser;
      const deviceId = queryString(req.query.device);
      const stats = timelineImporter.importExport(req.body, userId, deviceId);
      res.json({
        success: true,
        stats,
      });
    } catch (error) {
      sendError(res, error, 'Failed to import timeline');
    }
  });

  // ===========================================================================
  // Paths and timeline
  // ===========================================================================

  app.get('/api/paths', (req: Request, res: Response) => {
    try {
      const bbox = parseBBox(req.query.bbox);
      const start = parseOptionalTimestamp(req.query.start, 'start');
      const end = parseOptionalTimestamp(req.query.end, 'end');

      const { paths, removed } = simplifier.queryPaths(bbox, {
        start,
        end,
        pruneMeters: parseMeters(req.query.prune, 'prune'),
        spikeMeters: parseMeters(req.query.spikes, 'spikes'),
        order: parseStageOrder(req.query.order),
      });

      // Latest location, only when it falls inside the requested range
      let current: PathPoint | null = null;
      const latest = store.latestSample();
      if (
        latest &&
        (start === undefined || latest.timestamp >= start) &&
        (end === undefined || latest.timestamp <= end)
      ) {
        current = { lat: latest.lat, lon: latest.lon, timestamp: latest.timestamp };
      }

      res.json({
        success: true,
        count: paths.length,
        paths,
        current,
        removed,
      });
    } catch (error) {
      sendError(res, error, 'Failed to query paths');
    }
  });

  app.post('/api/paths/rebuild', (_req: Request, res: Response) => {
    try {
      const count = indexer.rebuildAll();
      res.json({
        success: true,
        paths: count,
      });
    } catch (error) {
      sendError(res, error, 'Failed to rebuild paths');
    }
  });

  app.get('/api/bounds', (req: Request, res: Response) => {
    try {
      const start = parseRequiredTimestamp(req.query.start, 'start');
      const end = parseRequiredTimestamp(req.query.end, 'end');
      res.json({
        success: true,
        bounds: store.boundsForRange(start, end) ?? null,
      });
    } catch (error) {
      sendError(res, error, 'Failed to compute bounds');
    }
  });

  app.get('/api/latest', (_req: Request, res: Response) => {
    try {
      res.json({
        success: true,
        location: store.latestSample() ?? null,
      });
    } catch (error) {
      sendError(res, error, 'Failed to get latest location');
    }
  });

  // Photo markers clustered for the current viewport
  app.get('/api/photos', (req: Request, res: Response) => {
    try {
      const start = parseRequiredTimestamp(req.query.start, 'start');
      const end = parseRequiredTimestamp(req.query.end, 'end');
      const bbox = parseBBox(req.query.bbox);

      const clusters = clusterPhotos(store.queryPhotoLocations(start, end), clusterRadius(bbox));
      res.json({
        success: true,
        count: clusters.length,
        clusters,
      });
    } catch (error) {
      sendError(res, error, 'Failed to query photos');
    }
  });

  // Provenance of one sample; null when it was not imported from a photo
  app.get('/api/location/source', (req: Request, res: Response) => {
    try {
      const timestamp = parseTimestamp(req.query.timestamp);
      const deviceId = queryString(req.query.device_id);
      res.json({
        success: true,
        source: store.getLocationSource(timestamp, deviceId) ?? null,
      });
    } catch (error) {
      sendError(res, error, 'Failed to get location source');
    }
  });

  app.get('/api/timeline', async (req: Request, res: Response) => {
    try {
      const date = parseDate(req.query.date);
      const userId = queryString(req.query.user) ?? defaultUser;
      const result = await timeline.build(userId, date);
      res.json({
        success: true,
        ...result,
      });
    } catch (error) {
      sendError(res, error, 'Failed to build timeline');
    }
  });

  // ===========================================================================
  // Immich imports
  // ===========================================================================

  app.get('/api/immich/status', async (_req: Request, res: Response) => {
    if (!immich) {
      res.json({ success: true, configured: false });
      return;
    }

    try {
      await immich.validateConnection();
      res.json({ success: true, configured: true, connected: true, url: immich.getBaseUrl() });
    } catch (error) {
      res.json({
        success: true,
        configured: true,
        connected: false,
        url: immich.getBaseUrl(),
        error: errorMessage(error),
      });
    }
  });

  // Preview streams one event per scanned page
  app.get('/api/immich/preview', async (req: Request, res: Response) => {
    let config: ImportConfig;
    try {
      config = parseImportConfig({
        after: parseOptionalTimestamp(req.query.after, 'after'),
        before: parseOptionalTimestamp(req.query.before, 'before'),
      }, defaultUser);
      if (!jobs.isConfigured()) {
        throw new BackfillError('SOURCE_NOT_CONFIGURED', 'Immich is not configured');
      }
    } catch (error) {
      sendError(res, error, 'Failed to start preview');
      return;
    }

    const stream = openEventStream(res);
    const controller = new AbortController();
    res.on('close', () => controller.abort());

    try {
      await jobs.preview(config, (progress) => stream.send(progress), controller.signal);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Preview failed');
      stream.send({ error: errorMessage(error), complete: true });
    } finally {
      stream.end();
    }
  });

  app.post('/api/immich/import', (req: Request, res: Response) => {
    try {
      const config = parseImportConfig(req.body ?? {}, defaultUser);
      const jobId = jobs.startImport(config);
      res.status(202).json({
        success: true,
        jobId,
      });
    } catch (error) {
      sendError(res, error, 'Failed to start import');
    }
  });

  app.get('/api/immich/jobs', (_req: Request, res: Response) => {
    try {
      const list = jobs.listJobs();
      res.json({
        success: true,
        count: list.length,
        jobs: list,
      });
    } catch (error) {
      sendError(res, error, 'Failed to list jobs');
    }
  });

  app.get('/api/immich/jobs/:id', (req: Request, res: Response) => {
    try {
      const job = jobs.getJob(req.params.id);
      if (!job) {
        throw new BackfillError('JOB_NOT_FOUND', `Job ${req.params.id} not found`);
      }
      res.json({
        success: true,
        job,
        progress: jobs.getJobProgress(job.id),
        active: jobs.isRunning(job.id),
      });
    } catch (error) {
      sendError(res, error, 'Failed to get job');
    }
  });

  app.post('/api/immich/jobs/:id/resume', (req: Request, res: Response) => {
    try {
      jobs.resumeImport(req.params.id);
      res.json({ success: true, jobId: req.params.id });
    } catch (error) {
      sendError(res, error, 'Failed to resume job');
    }
  });

  app.post('/api/immich/jobs/:id/cancel', (req: Request, res: Response) => {
    try {
      jobs.cancelImport(req.params.id);
      res.json({ success: true, jobId: req.params.id });
    } catch (error) {
      sendError(res, error, 'Failed to cancel job');
    }
  });

  // Server-Sent Events (SSE) for a job's progress
  app.get('/api/immich/jobs/:id/stream', async (req: Request, res: Response) => {
    let initial: ImportProgress;
    try {
      initial = jobs.getJobProgress(req.params.id);
    } catch (error) {
      sendError(res, error, 'Failed to open job stream');
      return;
    }

    const stream = openEventStream(res);
    const { channel, unsubscribe } = jobs.subscribe(req.params.id);
    res.on('close', unsubscribe);

    stream.send(initial);
    logger.info({ jobId: req.params.id }, 'Job stream client connected');

    for await (const progress of channel) {
      stream.send(progress);
    }

    unsubscribe();
    stream.end();
  });

  app.get('/api/immich/assets/:id/thumbnail', async (req: Request, res: Response) => {
    if (!immich) {
      sendError(res, new BackfillError('SOURCE_NOT_CONFIGURED', 'Immich is not configured'), 'Immich is not configured');
      return;
    }

    try {
      const thumbnail = await immich.getThumbnail(req.params.id);
      res.setHeader('Cache-Control', 'public, max-age=86400');
      res.type(thumbnail.contentType).send(thumbnail.data);
    } catch (error) {
      logger.warn({ assetId: req.params.id, error: errorMessage(error) }, 'Thumbnail fetch failed');
      res.status(502).json({
        success: false,
        error: 'Failed to fetch thumbnail',
      });
    }
  });

  app.post('/api/immich/sync', (_req: Request, res: Response) => {
    try {
      if (!sync) {
        throw new BackfillError('SOURCE_NOT_CONFIGURED', 'Immich is not configured');
      }
      const jobId = sync.syncNow();
      res.json({
        success: true,
        started: jobId !== undefined,
        jobId: jobId ?? null,
      });
    } catch (error) {
      sendError(res, error, 'Failed to start sync');
    }
  });

  app.get('/api/immich/sync/status', (_req: Request, res: Response) => {
    res.json({
      success: true,
      ...(sync?.getStatus() ?? { enabled: false, running: false }),
    });
  });

  return app;
}

interface EventStream {
  send: (data: unknown) => void;
  end: () => void;
}

/**
 * Switch the response to text/event-stream with a heartbeat
 */
function openEventStream(res: Response): EventStream {
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.setHeader('X-Accel-Buffering', 'no'); // Disable buffering in nginx
  res.flushHeaders();

  let open = true;
  const write = (data: unknown) => {
    if (open) res.write(`data: ${JSON.stringify(data)}\n\n`);
  };

  // Send heartbeat every 30 seconds to keep connection alive
  const heartbeat = setInterval(() => {
    write({ type: 'heartbeat', timestamp: new Date() });
  }, HEARTBEAT_INTERVAL_MS);

  const end = () => {
    clearInterval(heartbeat);
    if (open) {
      open = false;
      res.end();
    }
  };
  // Client disconnect
  res.on('close', end);

  return { send: write, end };
}

function sendError(res: Response, error: unknown, fallback: string): void {
  if (error instanceof ValidationError) {
    res.status(400).json({ success: false, error: error.message });
    return;
  }

  if (error instanceof BackfillError) {
    res.status(STATUS_BY_CODE[error.code]).json({ success: false, error: error.message, code: error.code });
    return;
  }

  logger.error({ error: errorMessage(error) }, fallback);
  res.status(500).json({
    success: false,
    error: fallback,
  });
}
