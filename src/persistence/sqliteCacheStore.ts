import Database from 'better-sqlite3';
import type { Database as DatabaseType, Statement } from 'better-sqlite3';
import {
  CacheRecord,
  CacheStore,
  CachedFile,
  EventId,
  Fingerprint,
  ParameterizedProperty,
  PlannerEvent,
  PreservedEventData,
} from '../types';
import { instantFromMs } from '../utils/temporal';
import { logger } from '../utils/logger';

// bumped whenever SCHEMA changes; older caches are dropped and rebuilt from the files
const SCHEMA_VERSION = 2;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS files (
    path          TEXT PRIMARY KEY,
    mtime_ms      REAL NOT NULL,
    size          INTEGER NOT NULL,
    content_hash  TEXT,
    calendar_name TEXT NOT NULL,
    extra_lines   TEXT NOT NULL DEFAULT '[]'
  );

  CREATE TABLE IF NOT EXISTS cache_records (
    path         TEXT NOT NULL REFERENCES files(path) ON DELETE CASCADE,
    event_id     TEXT NOT NULL,
    title        TEXT NOT NULL,
    notes        TEXT,
    begin_ms     INTEGER NOT NULL,
    end_ms       INTEGER NOT NULL,
    group_name   TEXT NOT NULL,
    completed    INTEGER NOT NULL,
    created_ms   INTEGER NOT NULL,
    modified_ms  INTEGER NOT NULL,
    status       TEXT,
    stamp_ms     INTEGER,
    extra_lines  TEXT NOT NULL DEFAULT '[]',
    params       TEXT NOT NULL DEFAULT '{}',
    position     INTEGER NOT NULL,
    PRIMARY KEY (path, event_id)
  );

  CREATE INDEX IF NOT EXISTS idx_cache_records_event_id
    ON cache_records(event_id);
`;

interface FileRow {
  path: string;
  mtime_ms: number;
  size: number;
  content_hash: string | null;
  calendar_name: string;
  extra_lines: string;
}

interface RecordRow {
  path: string;
  event_id: string;
  title: string;
  notes: string | null;
  begin_ms: number;
  end_ms: number;
  group_name: string;
  completed: number;
  created_ms: number;
  modified_ms: number;
  status: string | null;
  stamp_ms: number | null;
  extra_lines: string;
  params: string;
  position: number;
  // joined from files
  mtime_ms: number;
  size: number;
  content_hash: string | null;
}

type RecordParams = Omit<RecordRow, 'mtime_ms' | 'size' | 'content_hash'>;

const RECORD_SELECT = `
  SELECT r.*, f.mtime_ms, f.size, f.content_hash
  FROM cache_records r JOIN files f ON f.path = r.path
`;

function parseLines(text: string): string[] {
  const parsed: unknown = JSON.parse(text);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((line): line is string => typeof line === 'string');
}

const PARAMETERIZED: readonly ParameterizedProperty[] = ['SUMMARY', 'DESCRIPTION', 'STATUS'];

function parseParams(text: string): PreservedEventData['params'] {
  const parsed: unknown = JSON.parse(text);
  const params: PreservedEventData['params'] = {};
  if (typeof parsed !== 'object' || parsed === null) return params;
  for (const [key, value] of Object.entries(parsed)) {
    const name = PARAMETERIZED.find(candidate => candidate === key);
    if (name && typeof value === 'string') params[name] = value;
  }
  return params;
}

function fingerprintOf(row: {
  mtime_ms: number;
  size: number;
  content_hash: string | null;
}): Fingerprint {
  return { mtimeMs: row.mtime_ms, size: row.size, hash: row.content_hash };
}

function toCachedFile(row: FileRow): CachedFile {
  return {
    path: row.path,
    fingerprint: fingerprintOf(row),
    calendarName: row.calendar_name,
    extraLines: parseLines(row.extra_lines),
  };
}

function toCacheRecord(row: RecordRow): CacheRecord {
  const base: PlannerEvent = {
    id: row.event_id,
    title: row.title,
    begin: instantFromMs(row.begin_ms),
    end: instantFromMs(row.end_ms),
    group: row.group_name,
    completed: row.completed === 1,
    createdAt: instantFromMs(row.created_ms),
    modifiedAt: instantFromMs(row.modified_ms),
  };
  return {
    path: row.path,
    fingerprint: fingerprintOf(row),
    event: row.notes === null ? base : { ...base, notes: row.notes },
    preserved: {
      extraLines: parseLines(row.extra_lines),
      params: parseParams(row.params),
      status: row.status,
      stamp: row.stamp_ms === null ? null : instantFromMs(row.stamp_ms),
    },
  };
}

function toRecordParams(record: CacheRecord, position: number): RecordParams {
  const { event, preserved } = record;
  return {
    path: record.path,
    event_id: event.id,
    title: event.title,
    notes: event.notes ?? null,
    begin_ms: event.begin.epochMilliseconds,
    end_ms: event.end.epochMilliseconds,
    group_name: event.group,
    completed: event.completed ? 1 : 0,
    created_ms: event.createdAt.epochMilliseconds,
    modified_ms: event.modifiedAt.epochMilliseconds,
    status: preserved.status,
    stamp_ms: preserved.stamp ? preserved.stamp.epochMilliseconds : null,
    extra_lines: JSON.stringify(preserved.extraLines),
    params: JSON.stringify(preserved.params),
    position,
  };
}

/**
 * Cache store on an embedded SQLite database. Each file's rows are replaced
 * in one transaction, so a crash never leaves half a file cached.
 */
export class SqliteCacheStore implements CacheStore {
  private readonly db: DatabaseType;
  private readonly statements: {
    getFile: Statement<[string], FileRow>;
    listFiles: Statement<[], FileRow>;
    recordsForPath: Statement<[string], RecordRow>;
    recordById: Statement<[string], RecordRow>;
    allRecords: Statement<[], RecordRow>;
    upsertFile: Statement<[FileRow], unknown>;
    deleteRecords: Statement<[string], unknown>;
    insertRecord: Statement<[RecordParams], unknown>;
    deleteFile: Statement<[string], unknown>;
  };

  constructor(filename = ':memory:') {
    this.db = new Database(filename);
    if (filename !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('foreign_keys = ON');
    if (this.db.pragma('user_version', { simple: true }) !== SCHEMA_VERSION) {
      this.db.exec('DROP TABLE IF EXISTS cache_records; DROP TABLE IF EXISTS files;');
      this.db.pragma(`user_version = ${SCHEMA_VERSION}`);
    }
    this.db.exec(SCHEMA);

    this.statements = {
      getFile: this.db.prepare<[string], FileRow>('SELECT * FROM files WHERE path = ?'),
      listFiles: this.db.prepare<[], FileRow>('SELECT * FROM files ORDER BY path'),
      recordsForPath: this.db.prepare<[string], RecordRow>(
        `${RECORD_SELECT} WHERE r.path = ? ORDER BY r.position`
      ),
      recordById: this.db.prepare<[string], RecordRow>(
        `${RECORD_SELECT} WHERE r.event_id = ? ORDER BY r.path LIMIT 1`
      ),
      allRecords: this.db.prepare<[], RecordRow>(
        `${RECORD_SELECT} ORDER BY r.path, r.position`
      ),
      upsertFile: this.db.prepare<[FileRow], unknown>(`
        INSERT INTO files (path, mtime_ms, size, content_hash, calendar_name, extra_lines)
        VALUES (@path, @mtime_ms, @size, @content_hash, @calendar_name, @extra_lines)
        ON CONFLICT(path) DO UPDATE SET
          mtime_ms = excluded.mtime_ms,
          size = excluded.size,
          content_hash = excluded.content_hash,
          calendar_name = excluded.calendar_name,
          extra_lines = excluded.extra_lines
      `),
      deleteRecords: this.db.prepare<[string], unknown>(
        'DELETE FROM cache_records WHERE path = ?'
      ),
      insertRecord: this.db.prepare<[RecordParams], unknown>(`
        INSERT INTO cache_records (
          path, event_id, title, notes, begin_ms, end_ms, group_name, completed,
          created_ms, modified_ms, status, stamp_ms, extra_lines, params, position
        ) VALUES (
          @path, @event_id, @title, @notes, @begin_ms, @end_ms, @group_name, @completed,
          @created_ms, @modified_ms, @status, @stamp_ms, @extra_lines, @params, @position
        )
      `),
      deleteFile: this.db.prepare<[string], unknown>('DELETE FROM files WHERE path = ?'),
    };

    logger.debug(`Cache store opened at ${filename}`);
  }

  getFile(path: string): CachedFile | undefined {
    const row = this.statements.getFile.get(path);
    return row ? toCachedFile(row) : undefined;
  }

  listFiles(): CachedFile[] {
    return this.statements.listFiles.all().map(toCachedFile);
  }

  recordsForPath(path: string): CacheRecord[] {
    return this.statements.recordsForPath.all(path).map(toCacheRecord);
  }

  recordById(id: EventId): CacheRecord | undefined {
    const row = this.statements.recordById.get(id);
    return row ? toCacheRecord(row) : undefined;
  }

  allRecords(): CacheRecord[] {
    return this.statements.allRecords.all().map(toCacheRecord);
  }

  /**
   * Atomically replace a file's fingerprint and all of its records
   */
  replaceFile(file: CachedFile, records: CacheRecord[]): void {
    const replace = this.db.transaction(() => {
      this.statements.upsertFile.run({
        path: file.path,
        mtime_ms: file.fingerprint.mtimeMs,
        size: file.fingerprint.size,
        content_hash: file.fingerprint.hash,
        calendar_name: file.calendarName,
        extra_lines: JSON.stringify(file.extraLines),
      });
      this.statements.deleteRecords.run(file.path);
      records.forEach((record, position) => {
        this.statements.insertRecord.run(
          toRecordParams({ ...record, path: file.path }, position)
        );
      });
    });
    replace();
  }

  /**
   * Drop a file and its records, returning the number of records removed
   */
  purgeFile(path: string): number {
    const purge = this.db.transaction((target: string) => {
      const removed = this.statements.deleteRecords.run(target).changes;
      this.statements.deleteFile.run(target);
      return removed;
    });
    return purge(path);
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
