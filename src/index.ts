import { createServer } from './api/server';
import { SqliteLocationStore } from './db/SqliteLocationStore';
import { BackfillJobManager } from './services/BackfillJobManager';
import { ContinuousSync } from './services/ContinuousSync';
import { NominatimGeocoder } from './services/NominatimGeocoder';
import { PathIndexer } from './services/PathIndexer';
import { PathSimplifier } from './services/PathSimplifier';
import { TimelineBuilder } from './services/TimelineBuilder';
import { TimelineImporter } from './services/TimelineImporter';
import { ImmichSource } from './sources/ImmichSource';
import { loadConfigFromEnvironment } from './utils/config';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logger';

const config = loadConfigFromEnvironment();

logger.info('Starting Wayline...');

const store = await SqliteLocationStore.open(config.dbPath);
logger.info({ dbPath: config.dbPath }, 'Database ready');

const indexer = new PathIndexer(store);
const simplifier = new PathSimplifier(store);

const geocoder = config.geocoding.enabled
  ? new NominatimGeocoder(store, { baseUrl: config.geocoding.baseUrl })
  : undefined;
const timeline = new TimelineBuilder(store, geocoder);
const timelineImporter = new TimelineImporter(store, indexer);

let immich: ImmichSource | undefined;
if (config.immich) {
  logger.info({ url: config.immich.url }, 'Enabling Immich photo import');
  immich = new ImmichSource(config.immich.url, config.immich.apiKey);
} else {
  logger.info('Immich not configured (set IMMICH_URL and IMMICH_API_KEY to enable imports)');
}

const jobs = new BackfillJobManager(store, indexer, immich);
jobs.initialize();

const sync = immich ? new ContinuousSync(store, jobs, config.defaultUser, config.sync.intervalMs) : undefined;

const app = createServer({
  store,
  indexer,
  simplifier,
  timeline,
  timelineImporter,
  jobs,
  immich,
  sync,
  defaultUser: config.defaultUser,
});

const server = app.listen(config.port, () => {
  logger.info({ port: config.port }, `Server running on http://localhost:${config.port}`);
});

if (sync && config.sync.enabled) {
  try {
    sync.syncNow();
  } catch (error) {
    logger.error({ error: errorMessage(error) }, 'Initial sync failed');
  }
  sync.start();
}

// Graceful shutdown
const shutdown = async () => {
  logger.info('Shutting down gracefully...');
  sync?.stop();
  await jobs.shutdown();
  server.close(() => {
    store.close();
    logger.info('Server closed');
    process.exit(0);
  });
};

const onSignal = () => {
  shutdown().catch((error) => {
    logger.error({ error: errorMessage(error) }, 'Error during shutdown');
    process.exit(1);
  });
};

process.on('SIGTERM', onSignal);
process.on('SIGINT', onSignal);
