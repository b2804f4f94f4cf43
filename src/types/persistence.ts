// Persistence related type definitions
import { Temporal } from 'temporal-polyfill';
import { EventId, PlannerEvent } from './event';
import { ModelChange } from './command';
import type {
  CacheUpdateFailedError,
  ParseFailedError,
  PersistenceWriteFailedError,
} from '../core/errors';

/**
 * Staleness signal for a calendar file.
 * hash is only filled in when content hashing is enabled.
 */
export interface Fingerprint {
  mtimeMs: number;
  size: number;
  hash: string | null;
}

// properties the planner rewrites but whose parameters it keeps
export type ParameterizedProperty = 'SUMMARY' | 'DESCRIPTION' | 'STATUS';

/**
 * Calendar data the planner does not interpret but must write back.
 * Lines are unfolded iCalendar content lines, kept in original order.
 */
export interface PreservedEventData {
  extraLines: string[];
  // parameter text as written, e.g. { SUMMARY: ';LANGUAGE=de' }
  params: Partial<Record<ParameterizedProperty, string>>;
  // original STATUS value when it is not COMPLETED
  status: string | null;
  stamp: Temporal.Instant | null;
}

export interface EventBlock {
  event: PlannerEvent;
  preserved: PreservedEventData;
}

export interface CalendarDocument {
  name: string;
  // unknown calendar properties and components (VTIMEZONE, VTODO, ...)
  extraLines: string[];
  events: EventBlock[];
}

export interface CachedFile {
  path: string;
  fingerprint: Fingerprint;
  calendarName: string;
  extraLines: string[];
}

export interface CacheRecord {
  path: string;
  fingerprint: Fingerprint;
  event: PlannerEvent;
  preserved: PreservedEventData;
}

/**
 * Query cache mirroring the calendar files, keyed by (path, event id)
 */
export interface CacheStore {
  getFile(path: string): CachedFile | undefined;
  listFiles(): CachedFile[];
  recordsForPath(path: string): CacheRecord[];
  recordById(id: EventId): CacheRecord | undefined;
  allRecords(): CacheRecord[];
  replaceFile(file: CachedFile, records: CacheRecord[]): void;
  purgeFile(path: string): number;
  close(): void;
}

export interface FlushOutcome {
  // every file write succeeded
  ok: boolean;
  written: string[];
  failures: PersistenceWriteFailedError[];
  // files written whose cache rows could not be replaced
  cacheFailures: CacheUpdateFailedError[];
}

export interface LoadReport {
  events: PlannerEvent[];
  fromCache: string[];
  reparsed: string[];
  purged: string[];
  failures: ParseFailedError[];
}

export interface StorageDiff {
  upserts: PlannerEvent[];
  removedIds: EventId[];
  report: LoadReport;
}

/**
 * Receives committed model changes for write-through
 */
export interface PersistenceSink {
  persist(changes: readonly ModelChange[]): Promise<FlushOutcome>;
}

export type FingerprintMode = 'metadata' | 'content-hash';

export interface PersistenceConfig {
  calendarDir: string | null;
  cachePath: string;
  fingerprint: FingerprintMode;
}
