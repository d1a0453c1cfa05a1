import initSqlJs, { type Database, type SqlValue } from 'sql.js';
import { existsSync, mkdirSync, readdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { LocationStore, PathRecord } from './LocationStore';
import type {
  BBox,
  Bounds,
  GeocodedPlace,
  InsertResult,
  LocationSource,
  LocationSourceDetails,
  Path,
  PathPoint,
  PhotoLocation,
  Sample,
  TimeRange,
} from '../types/Location';
import type { ImportJob, ImportJobStatus } from '../types/ImportJob';
import { localDateFromTimestamp, utcMidnight } from '../utils/localDate';
import { parseImportConfig } from '../utils/validation';
import { errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

const MIGRATIONS_DIR = fileURLToPath(new URL('./migrations/', import.meta.url));
const SYNC_STATE_ID = 'immich';
const MEMORY = ':memory:';

// Writes are batched into one file flush per window
export const FLUSH_DELAY_MS = 1000;

let sqlJs: ReturnType<typeof initSqlJs> | undefined;

function loadSqlJs(): ReturnType<typeof initSqlJs> {
  sqlJs ??= initSqlJs();
  return sqlJs;
}

// =============================================================================
// Rows
// =============================================================================

type Row = Record<string, SqlValue>;

function num(row: Row, column: string): number {
  const value = row[column];
  if (typeof value !== 'number') {
    throw new Error(`Expected a number in column ${column}`);
  }
  return value;
}

function optNum(row: Row, column: string): number | undefined {
  const value = row[column];
  return value === null || value === undefined ? undefined : num(row, column);
}

function str(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new Error(`Expected text in column ${column}`);
  }
  return value;
}

function optStr(row: Row, column: string): string | undefined {
  const value = row[column];
  return value === null || value === undefined ? undefined : str(row, column);
}

const LOCATION_COLUMNS = 'timestamp, user_id, device_id, lat, lon, altitude_m, accuracy_m, speed_kmh, source';
const PATH_COLUMNS = 'id, user_id, date, start_ts, end_ts, min_lat, max_lat, min_lon, max_lon, point_count';
const JOB_COLUMNS =
  'id, status, started_at, completed_at, total_assets, processed, imported, skipped, errors, last_page, config_json, last_error';

const JOB_STATUSES: readonly ImportJobStatus[] = ['pending', 'running', 'completed', 'failed', 'cancelled', 'interrupted'];

const SourceMetadataSchema = z.object({
  webUrl: z.string().optional().catch(undefined),
  filename: z.string().optional().catch(undefined),
  make: z.string().optional().catch(undefined),
  model: z.string().optional().catch(undefined),
});

type SourceMetadata = z.infer<typeof SourceMetadataSchema>;

function toSample(row: Row): Sample {
  const sample: Sample = {
    timestamp: num(row, 'timestamp'),
    userId: str(row, 'user_id'),
    deviceId: str(row, 'device_id'),
    lat: num(row, 'lat'),
    lon: num(row, 'lon'),
  };
  const altitude = optNum(row, 'altitude_m');
  const accuracy = optNum(row, 'accuracy_m');
  const speed = optNum(row, 'speed_kmh');
  const source = optStr(row, 'source');
  if (altitude !== undefined) sample.altitudeMeters = altitude;
  if (accuracy !== undefined) sample.accuracyMeters = accuracy;
  if (speed !== undefined) sample.speedKmh = speed;
  if (source !== undefined) sample.source = source;
  return sample;
}

function toPathRecord(row: Row): PathRecord {
  return {
    id: num(row, 'id'),
    userId: str(row, 'user_id'),
    date: str(row, 'date'),
    startTs: num(row, 'start_ts'),
    endTs: num(row, 'end_ts'),
    minLat: num(row, 'min_lat'),
    maxLat: num(row, 'max_lat'),
    minLon: num(row, 'min_lon'),
    maxLon: num(row, 'max_lon'),
    pointCount: num(row, 'point_count'),
  };
}

function toJobStatus(status: string): ImportJobStatus {
  const known = JOB_STATUSES.find((s) => s === status);
  if (!known) {
    throw new Error(`Unknown import job status: ${status}`);
  }
  return known;
}

function toJob(row: Row): ImportJob {
  const job: ImportJob = {
    id: str(row, 'id'),
    status: toJobStatus(str(row, 'status')),
    startedAt: num(row, 'started_at'),
    processed: num(row, 'processed'),
    imported: num(row, 'imported'),
    skipped: num(row, 'skipped'),
    errors: num(row, 'errors'),
    lastPage: num(row, 'last_page'),
    config: parseImportConfig(JSON.parse(str(row, 'config_json'))),
  };
  const completedAt = optNum(row, 'completed_at');
  const total = optNum(row, 'total_assets');
  const lastError = optStr(row, 'last_error');
  if (completedAt !== undefined) job.completedAt = completedAt;
  if (total !== undefined) job.total = total;
  if (lastError !== undefined) job.lastError = lastError;
  return job;
}

function sampleParams(sample: Sample): SqlValue[] {
  return [
    sample.timestamp,
    sample.userId,
    sample.deviceId,
    sample.lat,
    sample.lon,
    sample.altitudeMeters ?? null,
    sample.accuracyMeters ?? null,
    sample.speedKmh ?? null,
    sample.source ?? null,
  ];
}

/**
 * SQLite-backed store running on sql.js (SQLite compiled to WebAssembly).
 *
 * The database lives in memory and is written back to `filename` shortly
 * after each change and on close. Pass ':memory:' to never touch disk.
 */
export class SqliteLocationStore implements LocationStore {
  private readonly logger = createLogger({ component: 'SqliteLocationStore' });
  private dirty = false;
  private flushTimer: NodeJS.Timeout | undefined;

  private constructor(
    private readonly db: Database,
    private readonly filename: string
  ) {
    this.db.run('PRAGMA foreign_keys = ON');
    this.runMigrations();
  }

  static async open(filename: string): Promise<SqliteLocationStore> {
    const SQL = await loadSqlJs();

    if (filename === MEMORY) {
      return new SqliteLocationStore(new SQL.Database(), filename);
    }

    mkdirSync(path.dirname(filename), { recursive: true });
    const data = existsSync(filename) ? readFileSync(filename) : undefined;
    return new SqliteLocationStore(new SQL.Database(data), filename);
  }

  // ===========================================================================
  // Statement helpers
  // ===========================================================================

  private all(sql: string, params: SqlValue[] = []): Row[] {
    const stmt = this.db.prepare(sql);
    try {
      stmt.bind(params);
      const rows: Row[] = [];
      while (stmt.step()) {
        rows.push(stmt.getAsObject());
      }
      return rows;
    } finally {
      stmt.free();
    }
  }

  private get(sql: string, params: SqlValue[] = []): Row | undefined {
    return this.all(sql, params)[0];
  }

  /**
   * Execute a write and return the number of changed rows
   */
  private run(sql: string, params: SqlValue[] = []): number {
    this.db.run(sql, params);
    this.markDirty();
    return this.db.getRowsModified();
  }

  private lastInsertId(): number {
    const row = this.get('SELECT last_insert_rowid() AS id');
    if (!row) {
      throw new Error('No row id after insert');
    }
    return num(row, 'id');
  }

  /**
   * Run fn inside BEGIN/COMMIT; any error rolls back and is rethrown
   */
  private transaction<T>(fn: () => T): T {
    this.db.run('BEGIN');
    try {
      const result = fn();
      this.db.run('COMMIT');
      return result;
    } catch (error) {
      this.db.run('ROLLBACK');
      throw error;
    }
  }

  private runMigrations(): void {
    this.db.run(`CREATE TABLE IF NOT EXISTS schema_migrations (
      version    TEXT PRIMARY KEY,
      applied_at INTEGER NOT NULL
    )`);

    const applied = new Set(this.all('SELECT version FROM schema_migrations').map((row) => str(row, 'version')));

    const files = readdirSync(MIGRATIONS_DIR)
      .filter((file) => file.endsWith('.sql'))
      .sort();

    for (const file of files) {
      if (applied.has(file)) continue;

      const sql = readFileSync(path.join(MIGRATIONS_DIR, file), 'utf8');
      this.transaction(() => {
        this.db.exec(sql);
        this.run('INSERT INTO schema_migrations (version, applied_at) VALUES (?, ?)', [
          file,
          Math.floor(Date.now() / 1000),
        ]);
      });
      this.logger.debug({ migration: file }, 'Applied migration');
    }
  }

  // ===========================================================================
  // Persistence
  // ===========================================================================

  private markDirty(): void {
    if (this.filename === MEMORY) return;
    this.dirty = true;
    if (this.flushTimer) return;

    this.flushTimer = setTimeout(() => {
      this.flushTimer = undefined;
      try {
        this.flush();
      } catch (error) {
        this.logger.error({ error: errorMessage(error), file: this.filename }, 'Failed to write database file');
      }
    }, FLUSH_DELAY_MS);
    this.flushTimer.unref();
  }

  /**
   * Write the database to disk through a temp file so readers never see a
   * half-written file
   */
  flush(): void {
    if (this.filename === MEMORY || !this.dirty) return;

    const data = this.db.export();
    // export() resets connection pragmas
    this.db.run('PRAGMA foreign_keys = ON');

    const tmp = `${this.filename}.tmp`;
    writeFileSync(tmp, data);
    renameSync(tmp, this.filename);
    this.dirty = false;
  }

  // ===========================================================================
  // Samples
  // ===========================================================================

  private insertLocation(sample: Sample): boolean {
    return (
      this.run(`INSERT OR IGNORE INTO locations (${LOCATION_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`, sampleParams(sample)) > 0
    );
  }

  insertSample(sample: Sample): boolean {
    return this.insertLocation(sample);
  }

  insertSamples(samples: Sample[]): InsertResult {
    return this.transaction(() => {
      let inserted = 0;
      let skipped = 0;
      for (const sample of samples) {
        if (this.insertLocation(sample)) {
          inserted++;
        } else {
          skipped++;
        }
      }
      return { inserted, skipped };
    });
  }

  insertSampleWithSource(sample: Sample, source: LocationSource): boolean {
    return this.transaction(() => {
      if (!this.insertLocation(sample)) {
        return false;
      }
      this.run(
        `INSERT OR REPLACE INTO location_sources (timestamp, device_id, source_type, source_id, metadata)
         VALUES (?, ?, ?, ?, ?)`,
        [source.timestamp, source.deviceId, source.sourceType, source.sourceId, JSON.stringify(source.metadata)]
      );
      return true;
    });
  }

  /**
   * Samples whose own local date equals `date`. Candidates are read from a
   * window wide enough to cover every UTC offset, then filtered.
   */
  querySamplesForUserDate(userId: string, date: string): Sample[] {
    const midnight = utcMidnight(date);
    if (Number.isNaN(midnight)) return [];

    const rows = this.all(
      `SELECT ${LOCATION_COLUMNS} FROM locations
       WHERE user_id = ? AND timestamp >= ? AND timestamp <= ?
       ORDER BY timestamp`,
      [userId, midnight - 36 * 3600, midnight + 48 * 3600]
    );

    return rows.map(toSample).filter((sample) => localDateFromTimestamp(sample.timestamp, sample.lon) === date);
  }

  queryAllSamples(): Sample[] {
    return this.all(`SELECT ${LOCATION_COLUMNS} FROM locations ORDER BY timestamp`).map(toSample);
  }

  latestSample(): Sample | undefined {
    const row = this.get(`SELECT ${LOCATION_COLUMNS} FROM locations ORDER BY timestamp DESC LIMIT 1`);
    return row ? toSample(row) : undefined;
  }

  boundsForRange(start: number, end: number): Bounds | undefined {
    const row = this.get(
      `SELECT MIN(lat) AS min_lat, MAX(lat) AS max_lat, MIN(lon) AS min_lon, MAX(lon) AS max_lon
       FROM locations WHERE timestamp >= ? AND timestamp <= ?`,
      [start, end]
    );
    if (!row) return undefined;

    const minLat = optNum(row, 'min_lat');
    const maxLat = optNum(row, 'max_lat');
    const minLon = optNum(row, 'min_lon');
    const maxLon = optNum(row, 'max_lon');
    if (minLat === undefined || maxLat === undefined || minLon === undefined || maxLon === undefined) {
      return undefined;
    }
    return { minLat, maxLat, minLon, maxLon };
  }

  queryPhotoLocations(start: number, end: number): PhotoLocation[] {
    const rows = this.all(
      `SELECT l.timestamp, l.lat, l.lon, ls.source_id, ls.metadata
       FROM locations l
       JOIN location_sources ls ON l.timestamp = ls.timestamp AND l.device_id = ls.device_id
       WHERE l.timestamp >= ? AND l.timestamp <= ?
       ORDER BY l.timestamp`,
      [start, end]
    );

    return rows.map((row) => {
      const photo: PhotoLocation = {
        timestamp: num(row, 'timestamp'),
        lat: num(row, 'lat'),
        lon: num(row, 'lon'),
        sourceId: str(row, 'source_id'),
      };
      const metadata = this.parseSourceMetadata(optStr(row, 'metadata'));
      if (metadata.webUrl) photo.webUrl = metadata.webUrl;
      if (metadata.filename) photo.filename = metadata.filename;
      return photo;
    });
  }

  getLocationSource(timestamp: number, deviceId?: string): LocationSourceDetails | undefined {
    const row =
      deviceId === undefined
        ? this.get('SELECT source_type, source_id, metadata FROM location_sources WHERE timestamp = ? LIMIT 1', [timestamp])
        : this.get('SELECT source_type, source_id, metadata FROM location_sources WHERE timestamp = ? AND device_id = ?', [
            timestamp,
            deviceId,
          ]);
    if (!row) return undefined;

    const details: LocationSourceDetails = {
      sourceType: str(row, 'source_type'),
      sourceId: str(row, 'source_id'),
    };
    const metadata = this.parseSourceMetadata(optStr(row, 'metadata'));
    if (metadata.webUrl) details.webUrl = metadata.webUrl;
    if (metadata.filename) details.filename = metadata.filename;
    if (metadata.make) details.make = metadata.make;
    if (metadata.model) details.model = metadata.model;
    return details;
  }

  private parseSourceMetadata(raw: string | undefined): SourceMetadata {
    if (!raw) return {};
    try {
      const parsed = SourceMetadataSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : {};
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Unreadable location source metadata');
      return {};
    }
  }

  // ===========================================================================
  // Paths
  // ===========================================================================

  queryPathsIntersecting(bbox: BBox, range: TimeRange = {}): PathRecord[] {
    let query = `SELECT ${PATH_COLUMNS} FROM paths
                 WHERE max_lat >= ? AND min_lat <= ? AND max_lon >= ? AND min_lon <= ?`;
    const args: SqlValue[] = [bbox.swLat, bbox.neLat, bbox.swLon, bbox.neLon];

    if (range.start !== undefined) {
      query += ' AND end_ts >= ?';
      args.push(range.start);
    }
    if (range.end !== undefined) {
      query += ' AND start_ts <= ?';
      args.push(range.end);
    }
    query += ' ORDER BY start_ts';

    return this.all(query, args).map(toPathRecord);
  }

  getPathPoints(pathId: number): PathPoint[] {
    return this.all('SELECT lat, lon, timestamp FROM path_points WHERE path_id = ? ORDER BY seq', [pathId]).map(
      (row) => ({ lat: num(row, 'lat'), lon: num(row, 'lon'), timestamp: num(row, 'timestamp') })
    );
  }

  upsertPath(p: Path): number {
    return this.transaction(() => this.writePath(p));
  }

  /**
   * Insert or replace a path; callers hold a transaction so metadata and
   * points never diverge
   */
  private writePath(p: Path): number {
    const existing = this.get('SELECT id FROM paths WHERE user_id = ? AND date = ?', [p.userId, p.date]);

    let pathId: number;
    if (existing) {
      pathId = num(existing, 'id');
      this.run(
        `UPDATE paths SET start_ts = ?, end_ts = ?, min_lat = ?, max_lat = ?, min_lon = ?, max_lon = ?, point_count = ?
         WHERE id = ?`,
        [p.startTs, p.endTs, p.minLat, p.maxLat, p.minLon, p.maxLon, p.pointCount, pathId]
      );
      this.run('DELETE FROM path_points WHERE path_id = ?', [pathId]);
    } else {
      this.run(
        `INSERT INTO paths (user_id, date, start_ts, end_ts, min_lat, max_lat, min_lon, max_lon, point_count)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [p.userId, p.date, p.startTs, p.endTs, p.minLat, p.maxLat, p.minLon, p.maxLon, p.pointCount]
      );
      pathId = this.lastInsertId();
    }

    const insertPoint = this.db.prepare('INSERT INTO path_points (path_id, seq, timestamp, lat, lon) VALUES (?, ?, ?, ?, ?)');
    try {
      p.points.forEach((point, seq) => {
        insertPoint.run([pathId, seq, point.timestamp, point.lat, point.lon]);
      });
    } finally {
      insertPoint.free();
    }
    this.markDirty();

    return pathId;
  }

  private clearPaths(): void {
    this.run('DELETE FROM path_points');
    this.run('DELETE FROM paths');
  }

  deleteAllPathsAndPoints(): void {
    this.transaction(() => this.clearPaths());
  }

  /**
   * Swap the whole path table in one transaction; a failure part way keeps
   * the previous paths
   */
  replaceAllPaths(paths: Path[]): void {
    this.transaction(() => {
      this.clearPaths();
      for (const p of paths) {
        this.writePath(p);
      }
    });
  }

  // ===========================================================================
  // Import jobs
  // ===========================================================================

  createJob(job: ImportJob): void {
    this.run(
      `INSERT INTO import_jobs (id, status, started_at, total_assets, processed, imported, skipped, errors, last_page, config_json)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        job.id,
        job.status,
        job.startedAt,
        job.total ?? null,
        job.processed,
        job.imported,
        job.skipped,
        job.errors,
        job.lastPage,
        JSON.stringify(job.config),
      ]
    );
  }

  getJob(id: string): ImportJob | undefined {
    const row = this.get(`SELECT ${JOB_COLUMNS} FROM import_jobs WHERE id = ?`, [id]);
    return row ? toJob(row) : undefined;
  }

  updateJob(job: ImportJob): void {
    this.run(
      `UPDATE import_jobs
       SET status = ?, completed_at = ?, total_assets = ?, processed = ?, imported = ?, skipped = ?, errors = ?,
           last_page = ?, last_error = ?
       WHERE id = ?`,
      [
        job.status,
        job.completedAt ?? null,
        job.total ?? null,
        job.processed,
        job.imported,
        job.skipped,
        job.errors,
        job.lastPage,
        job.lastError ?? null,
        job.id,
      ]
    );
  }

  listJobs(limit = 50): ImportJob[] {
    return this.all(`SELECT ${JOB_COLUMNS} FROM import_jobs ORDER BY started_at DESC, rowid DESC LIMIT ?`, [limit]).map(
      toJob
    );
  }

  listJobsByStatus(status: ImportJobStatus): ImportJob[] {
    return this.all(`SELECT ${JOB_COLUMNS} FROM import_jobs WHERE status = ? ORDER BY started_at`, [status]).map(toJob);
  }

  getLastSyncTimestamp(): number | undefined {
    const row = this.get('SELECT last_sync FROM sync_state WHERE id = ?', [SYNC_STATE_ID]);
    return row ? num(row, 'last_sync') : undefined;
  }

  setLastSyncTimestamp(timestamp: number): void {
    this.run('INSERT OR REPLACE INTO sync_state (id, last_sync) VALUES (?, ?)', [SYNC_STATE_ID, timestamp]);
  }

  // ===========================================================================
  // Geocache
  // ===========================================================================

  lookupPlace(lat: number, lon: number): GeocodedPlace | undefined {
    const row = this.get(
      `SELECT place_name, place_type, display_name FROM geocache
       WHERE ? >= min_lat AND ? <= max_lat AND ? >= min_lon AND ? <= max_lon
       LIMIT 1`,
      [lat, lat, lon, lon]
    );
    if (!row) return undefined;

    const place: GeocodedPlace = { placeName: str(row, 'place_name'), lat, lon };
    const placeType = optStr(row, 'place_type');
    const displayName = optStr(row, 'display_name');
    if (placeType !== undefined) place.placeType = placeType;
    if (displayName !== undefined) place.displayName = displayName;
    return place;
  }

  cachePlace(bounds: Bounds, place: GeocodedPlace): void {
    this.run(
      `INSERT OR IGNORE INTO geocache (min_lat, max_lat, min_lon, max_lon, place_name, place_type, display_name, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        bounds.minLat,
        bounds.maxLat,
        bounds.minLon,
        bounds.maxLon,
        place.placeName,
        place.placeType ?? null,
        place.displayName ?? null,
        Math.floor(Date.now() / 1000),
      ]
    );
  }

  close(): void {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = undefined;
    }
    this.flush();
    this.db.close();
  }
}
