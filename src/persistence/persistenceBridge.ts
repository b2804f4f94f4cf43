/**
 * Persistence bridge
 *
 * Keeps a directory of calendar files, an embedded cache store and the
 * in-memory event set in step:
 * - open/refresh reconcile the directory against the cache using file
 *   fingerprints, re-parsing only files that changed;
 * - persist writes committed changes through to the files, then the cache.
 *
 * Failures never reject: parse problems come back in LoadReport.failures,
 * write problems in FlushOutcome.failures (cache-only problems in
 * cacheFailures), and failed paths wait for retryFailed().
 */

import {
  CacheStore,
  CachedFile,
  CalendarDocument,
  Clock,
  EventBlock,
  EventId,
  FingerprintMode,
  FlushOutcome,
  LoadReport,
  ModelChange,
  PersistenceSink,
  PlannerEvent,
  StorageDiff,
} from '../types';
import {
  CacheUpdateFailedError,
  ParseFailedError,
  PersistenceWriteFailedError,
  describeCause,
  isPlannerError,
} from '../core/errors';
import { logger } from '../utils/logger';
import { nowInstant } from '../utils/temporal';
import { CalendarDirectory, sameFingerprint } from './calendarDirectory';
import { emptyPreserved, parseCalendar, serializeCalendar } from './icalCodec';
import { KeyedWriteQueue } from './writeQueue';

export interface PersistenceBridgeOptions {
  calendarDir: string;
  cache: CacheStore;
  // zone for floating times in files
  timeZone: string;
  fingerprint?: FingerprintMode;
  clock?: Clock;
  // false when the caller owns the cache and closes it
  closeCache?: boolean;
}

export function sameEvent(a: PlannerEvent, b: PlannerEvent): boolean {
  return (
    a.id === b.id &&
    a.title === b.title &&
    a.notes === b.notes &&
    a.group === b.group &&
    a.completed === b.completed &&
    a.begin.equals(b.begin) &&
    a.end.equals(b.end) &&
    a.createdAt.equals(b.createdAt) &&
    a.modifiedAt.equals(b.modifiedAt)
  );
}

function documentFromCache(file: CachedFile, cache: CacheStore): CalendarDocument {
  return {
    name: file.calendarName,
    extraLines: file.extraLines,
    events: cache
      .recordsForPath(file.path)
      .map(record => ({ event: record.event, preserved: record.preserved })),
  };
}

function emptyReport(): LoadReport {
  return { events: [], fromCache: [], reparsed: [], purged: [], failures: [] };
}

export class PersistenceBridge implements PersistenceSink {
  private readonly directory: CalendarDirectory;
  private readonly cache: CacheStore;
  private readonly timeZone: string;
  private readonly clock: Clock;
  private readonly closeCache: boolean;
  private readonly queue = new KeyedWriteQueue();

  private documents = new Map<string, CalendarDocument>();
  private eventPaths = new Map<EventId, string>();
  private groupPaths = new Map<string, string>();
  // files whose last parse failed; writing them would lose their content
  private unreadable = new Map<string, ParseFailedError>();
  private failed = new Map<string, PersistenceWriteFailedError>();
  private touchedDuringScan: Set<string> | null = null;

  constructor(options: PersistenceBridgeOptions) {
    this.directory = new CalendarDirectory(
      options.calendarDir,
      options.fingerprint ?? 'metadata'
    );
    this.cache = options.cache;
    this.timeZone = options.timeZone;
    this.clock = options.clock ?? nowInstant;
    this.closeCache = options.closeCache ?? true;
  }

  // ============ Loading ============

  /**
   * Load every calendar file, from cache where the fingerprint is unchanged
   */
  async open(): Promise<LoadReport> {
    const report = await this.reconcile();
    logger.log(
      `Opened ${this.directory.dir}: ${report.events.length} events, ` +
        `${report.fromCache.length} files from cache, ${report.reparsed.length} parsed, ` +
        `${report.purged.length} purged, ${report.failures.length} failed`
    );
    return report;
  }

  /**
   * Pick up changes other programs made to the directory since the last scan
   */
  async refresh(): Promise<StorageDiff> {
    await this.queue.idle();

    const before = new Map<EventId, PlannerEvent>();
    for (const document of this.documents.values()) {
      for (const { event } of document.events) before.set(event.id, event);
    }

    const report = await this.reconcile();
    const after = new Set(report.events.map(event => event.id));

    const upserts = report.events.filter(event => {
      const previous = before.get(event.id);
      return !previous || !sameEvent(previous, event);
    });
    const removedIds = [...before.keys()].filter(id => !after.has(id));

    if (upserts.length > 0 || removedIds.length > 0) {
      logger.log(
        `Calendar refresh: ${upserts.length} changed, ${removedIds.length} removed`
      );
    }
    return { upserts, removedIds, report };
  }

  private async reconcile(): Promise<LoadReport> {
    const report = emptyReport();
    const next = new Map<string, CalendarDocument>();
    this.touchedDuringScan = new Set();

    const retainPrior = (path: string): void => {
      const prior = this.documents.get(path);
      if (prior) {
        next.set(path, prior);
        return;
      }
      const cached = this.cache.getFile(path);
      if (cached) next.set(path, documentFromCache(cached, this.cache));
    };

    let listed: string[] | null = null;
    try {
      await this.directory.ensureExists();
      listed = await this.directory.list();
    } catch (error) {
      report.failures.push(
        new ParseFailedError(this.directory.dir, 'cannot list calendar directory', null, error)
      );
      logger.error(`Cannot list ${this.directory.dir}`, error);
    }

    for (const path of listed ?? this.cache.listFiles().map(file => file.path)) {
      if (!listed) {
        retainPrior(path);
        continue;
      }
      await this.loadFile(path, report, next, retainPrior);
    }

    if (listed) {
      const present = new Set(listed);
      for (const cached of this.cache.listFiles()) {
        if (present.has(cached.path) || this.failed.has(cached.path)) continue;
        const removed = this.cache.purgeFile(cached.path);
        this.unreadable.delete(cached.path);
        report.purged.push(cached.path);
        logger.debug(`Purged ${removed} cached events of vanished ${cached.path}`);
      }
      // created in memory, first write still pending retry
      for (const path of this.failed.keys()) {
        const document = this.documents.get(path);
        if (!present.has(path) && document) next.set(path, document);
      }
    }

    for (const path of this.touchedDuringScan) {
      const document = this.documents.get(path);
      if (document) next.set(path, document);
    }
    this.touchedDuringScan = null;

    this.install(next, report);
    return report;
  }

  private async loadFile(
    path: string,
    report: LoadReport,
    next: Map<string, CalendarDocument>,
    retainPrior: (path: string) => void
  ): Promise<void> {
    try {
      const snapshot = await this.directory.snapshot(path);
      const cached = this.cache.getFile(path);

      if (cached && sameFingerprint(cached.fingerprint, snapshot.fingerprint)) {
        next.set(path, this.documents.get(path) ?? documentFromCache(cached, this.cache));
        report.fromCache.push(path);
        return;
      }

      const content = snapshot.content ?? (await this.directory.read(path));
      const document = parseCalendar(content, {
        path,
        timeZone: this.timeZone,
        fallbackName: this.directory.groupForPath(path),
        now: this.clock(),
      });
      next.set(path, document);
      this.unreadable.delete(path);
      report.reparsed.push(path);
      logger.debug(`Parsed ${path}: ${document.events.length} events`);

      try {
        this.writeCache(path, document, snapshot.fingerprint);
      } catch (cacheError) {
        // file is parsed again on the next scan
        logger.error(`Cache update for ${path} failed`, cacheError);
      }
    } catch (error) {
      const failure = isPlannerError(error, 'ParseFailed')
        ? error
        : new ParseFailedError(path, describeCause(error), null, error);
      this.unreadable.set(path, failure);
      report.failures.push(failure);
      logger.warn(failure.message);
      retainPrior(path);
    }
  }

  private writeCache(
    path: string,
    document: CalendarDocument,
    fingerprint: CachedFile['fingerprint']
  ): void {
    this.cache.replaceFile(
      { path, fingerprint, calendarName: document.name, extraLines: document.extraLines },
      document.events.map(block => ({ path, fingerprint, ...block }))
    );
  }

  private install(next: Map<string, CalendarDocument>, report: LoadReport): void {
    const eventPaths = new Map<EventId, string>();
    const groupPaths = new Map<string, string>();

    for (const [path, document] of next) {
      if (!groupPaths.has(document.name)) groupPaths.set(document.name, path);
      for (const { event } of document.events) {
        const existing = eventPaths.get(event.id);
        if (existing) {
          logger.warn(`Event ${event.id} appears in ${existing} and ${path}; keeping the first`);
          continue;
        }
        eventPaths.set(event.id, path);
        report.events.push(event);
      }
    }

    this.documents = next;
    this.eventPaths = eventPaths;
    this.groupPaths = groupPaths;
  }

  // ============ Writing ============

  /**
   * Write committed changes through to their calendar files and the cache
   */
  persist(changes: readonly ModelChange[]): Promise<FlushOutcome> {
    const touched = new Set<string>();
    for (const change of changes) {
      this.applyChange(change, touched);
    }
    return this.flushPaths([...touched]);
  }

  /**
   * Re-flush every path whose last write failed
   */
  retryFailed(): Promise<FlushOutcome> {
    const paths = [...this.failed.keys()];
    if (paths.length > 0) {
      logger.log(`Retrying ${paths.length} failed calendar writes`);
    }
    return this.flushPaths(paths);
  }

  pendingRetries(): string[] {
    return [...this.failed.keys()];
  }

  pathOf(id: EventId): string | undefined {
    return this.eventPaths.get(id);
  }

  whenIdle(): Promise<void> {
    return this.queue.idle();
  }

  async close(): Promise<void> {
    await this.queue.idle();
    if (this.closeCache) this.cache.close();
  }

  private pathForGroup(group: string): string {
    return this.groupPaths.get(group) ?? this.directory.pathForGroup(group);
  }

  private documentAt(path: string, group: string): CalendarDocument {
    const existing = this.documents.get(path);
    if (existing) return existing;
    const created: CalendarDocument = { name: group, extraLines: [], events: [] };
    this.documents.set(path, created);
    this.groupPaths.set(group, path);
    return created;
  }

  private applyChange(change: ModelChange, touched: Set<string>): void {
    const currentPath = this.eventPaths.get(change.eventId);
    const targetPath = change.after ? this.pathForGroup(change.after.group) : null;

    let carried: EventBlock['preserved'] | null = null;
    if (currentPath) {
      const document = this.documents.get(currentPath);
      const position = document
        ? document.events.findIndex(block => block.event.id === change.eventId)
        : -1;
      const block = document?.events[position];
      if (document && block) {
        carried = block.preserved;
        if (currentPath !== targetPath) {
          document.events.splice(position, 1);
          this.eventPaths.delete(change.eventId);
          touched.add(currentPath);
        }
      }
    }

    if (change.after && targetPath) {
      const document = this.documentAt(targetPath, change.after.group);
      const block: EventBlock = {
        event: change.after,
        preserved: carried ?? emptyPreserved(),
      };
      const position = document.events.findIndex(
        existing => existing.event.id === change.eventId
      );
      if (position === -1) {
        document.events.push(block);
      } else {
        document.events[position] = block;
      }
      this.eventPaths.set(change.eventId, targetPath);
      touched.add(targetPath);
    }

    for (const path of touched) {
      this.touchedDuringScan?.add(path);
    }
  }

  private async flushPaths(paths: string[]): Promise<FlushOutcome> {
    const results = await Promise.all(
      paths.map(path => this.queue.run(path, () => this.writePath(path)))
    );

    const outcome: FlushOutcome = { ok: true, written: [], failures: [], cacheFailures: [] };
    results.forEach((result, i) => {
      const path = paths[i];
      if (path === undefined) return;
      if (result instanceof PersistenceWriteFailedError) {
        outcome.failures.push(result);
        return;
      }
      outcome.written.push(path);
      if (result) outcome.cacheFailures.push(result);
    });
    outcome.ok = outcome.failures.length === 0;
    return outcome;
  }

  /**
   * Write one file, then its cache rows. A cache failure does not undo or
   * queue the file write: the stale cache fingerprint makes the next scan
   * re-read the file.
   */
  private async writePath(
    path: string
  ): Promise<PersistenceWriteFailedError | CacheUpdateFailedError | null> {
    const document = this.documents.get(path);
    if (!document) {
      this.failed.delete(path);
      return null;
    }

    const unreadable = this.unreadable.get(path);
    if (unreadable) {
      return this.recordFailure(path, unreadable);
    }

    let fingerprint: CachedFile['fingerprint'];
    try {
      fingerprint = await this.directory.write(path, serializeCalendar(document));
    } catch (error) {
      return this.recordFailure(path, error);
    }

    if (this.failed.delete(path)) {
      logger.log(`Calendar write to ${path} succeeded after retry`);
    }

    try {
      this.writeCache(path, document, fingerprint);
    } catch (error) {
      const failure = new CacheUpdateFailedError(path, error);
      logger.error(failure.message);
      return failure;
    }
    return null;
  }

  private recordFailure(path: string, cause: unknown): PersistenceWriteFailedError {
    const failure = new PersistenceWriteFailedError(path, cause);
    this.failed.set(path, failure);
    logger.error(failure.message);
    return failure;
  }
}
