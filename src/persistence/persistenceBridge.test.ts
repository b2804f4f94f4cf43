import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, readFile, rm, rmdir, unlink, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Temporal } from 'temporal-polyfill';
import { FingerprintMode, ModelChange, PlannerEvent } from '../types';
import { EventModel, buildEvent } from '../core/eventModel';
import { PersistenceBridge, sameEvent } from './persistenceBridge';
import { SqliteCacheStore } from './sqliteCacheStore';

const CLOCK = Temporal.Instant.from('2024-04-01T12:00:00Z');

class FailingCacheStore extends SqliteCacheStore {
  replaceFile(): void {
    throw new Error('disk full');
  }
}

const ics = (...lines: string[]): string => lines.join('\r\n') + '\r\n';

const standup = buildEvent(
  'Standup',
  Temporal.Instant.from('2024-04-02T09:00:00Z'),
  Temporal.Instant.from('2024-04-02T09:15:00Z'),
  'work',
  { id: 'standup', createdAt: CLOCK }
);

const created = (event: PlannerEvent): ModelChange => ({
  eventId: event.id,
  before: null,
  after: event,
});

const updated = (before: PlannerEvent, after: PlannerEvent): ModelChange => ({
  eventId: before.id,
  before,
  after,
});

const fileLines = async (path: string): Promise<string[]> =>
  (await readFile(path, 'utf8')).split('\r\n');

describe('PersistenceBridge', () => {
  let root: string;
  let calendarDir: string;
  let cachePath: string;
  const bridges: PersistenceBridge[] = [];

  function bridge(fingerprint: FingerprintMode = 'metadata'): PersistenceBridge {
    const instance = new PersistenceBridge({
      calendarDir,
      cache: new SqliteCacheStore(cachePath),
      timeZone: 'UTC',
      fingerprint,
      clock: () => CLOCK,
    });
    bridges.push(instance);
    return instance;
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'planner-bridge-'));
    calendarDir = join(root, 'calendars');
    cachePath = join(root, 'cache.db');
  });

  afterEach(async () => {
    for (const instance of bridges.splice(0)) {
      await instance.close();
    }
    await rm(root, { recursive: true, force: true });
  });

  it('creates the directory and opens empty', async () => {
    const report = await bridge().open();
    expect(report).toEqual({ events: [], fromCache: [], reparsed: [], purged: [], failures: [] });
  });

  it('writes a new event to its group file and the cache', async () => {
    const b = bridge();
    await b.open();

    const outcome = await b.persist([created(standup)]);
    const path = join(calendarDir, 'work.ics');

    expect(outcome).toEqual({ ok: true, written: [path], failures: [], cacheFailures: [] });
    expect(b.pathOf('standup')).toBe(path);
    const lines = await fileLines(path);
    expect(lines).toContain('X-WR-CALNAME:work');
    expect(lines).toContain('UID:standup');
    expect(lines).toContain('DTSTART:20240402T090000Z');
  });

  it('serves an unchanged file from the cache on the next open', async () => {
    const first = bridge();
    await first.open();
    await first.persist([created(standup)]);
    await first.close();

    const report = await bridge().open();
    expect(report.fromCache).toEqual([join(calendarDir, 'work.ics')]);
    expect(report.reparsed).toEqual([]);
    expect(report.events).toHaveLength(1);
    expect(sameEvent(report.events[0] ?? standup, standup)).toBe(true);
  });

  it('re-parses files changed by another program', async () => {
    const b = bridge('content-hash');
    await b.open();
    await b.persist([created(standup)]);

    await writeFile(
      join(calendarDir, 'work.ics'),
      ics('BEGIN:VCALENDAR', 'X-WR-CALNAME:work', 'END:VCALENDAR')
    );
    await writeFile(
      join(calendarDir, 'family.ics'),
      ics(
        'BEGIN:VCALENDAR',
        'BEGIN:VEVENT',
        'UID:dinner',
        'DTSTART:20240402T180000Z',
        'DTEND:20240402T190000Z',
        'SUMMARY:Dinner',
        'END:VEVENT',
        'END:VCALENDAR'
      )
    );

    const diff = await b.refresh();
    expect(diff.upserts.map(event => [event.id, event.group])).toEqual([['dinner', 'family']]);
    expect(diff.removedIds).toEqual(['standup']);
    expect(diff.report.reparsed).toEqual([
      join(calendarDir, 'family.ics'),
      join(calendarDir, 'work.ics'),
    ]);
  });

  it('reports nothing when a refresh finds no change', async () => {
    const b = bridge();
    await b.open();
    await b.persist([created(standup)]);

    const diff = await b.refresh();
    expect(diff.upserts).toEqual([]);
    expect(diff.removedIds).toEqual([]);
    expect(diff.report.fromCache).toEqual([join(calendarDir, 'work.ics')]);
  });

  it('purges cached events of a deleted file', async () => {
    const b = bridge();
    await b.open();
    await b.persist([created(standup)]);
    await unlink(join(calendarDir, 'work.ics'));

    const diff = await b.refresh();
    expect(diff.removedIds).toEqual(['standup']);
    expect(diff.report.purged).toEqual([join(calendarDir, 'work.ics')]);
  });

  it('keeps the last good events of a file that no longer parses and refuses to overwrite it', async () => {
    const b = bridge();
    await b.open();
    await b.persist([created(standup)]);
    const path = join(calendarDir, 'work.ics');
    await writeFile(path, 'garbage');

    const diff = await b.refresh();
    expect(diff.removedIds).toEqual([]);
    expect(diff.report.events.map(event => event.id)).toEqual(['standup']);
    expect(diff.report.failures.map(failure => failure.message)).toEqual([
      `Failed parsing ${path}: malformed content line 1: "garbage"`,
    ]);

    const retitled = { ...standup, title: 'Daily standup' };
    const outcome = await b.persist([updated(standup, retitled)]);
    expect(outcome.ok).toBe(false);
    expect(outcome.failures.map(failure => failure.message)).toEqual([
      `Failed writing ${path}: Failed parsing ${path}: malformed content line 1: "garbage"`,
    ]);
    expect(await readFile(path, 'utf8')).toBe('garbage');
    expect(b.pendingRetries()).toEqual([path]);
  });

  it('carries unknown properties when an event changes group', async () => {
    await mkdir(calendarDir, { recursive: true });
    await writeFile(
      join(calendarDir, 'work.ics'),
      ics(
        'BEGIN:VCALENDAR',
        'BEGIN:VEVENT',
        'UID:review',
        'DTSTART:20240402T140000Z',
        'DTEND:20240402T150000Z',
        'SUMMARY:Review',
        'LOCATION:Room 4',
        'END:VEVENT',
        'END:VCALENDAR'
      )
    );

    const b = bridge();
    const report = await b.open();
    const review = report.events[0];
    if (!review) throw new Error('review not loaded');

    const outcome = await b.persist([updated(review, { ...review, group: 'personal' })]);
    const workPath = join(calendarDir, 'work.ics');
    const personalPath = join(calendarDir, 'personal.ics');

    expect(outcome.written).toEqual([workPath, personalPath]);
    expect(await fileLines(workPath)).not.toContain('UID:review');
    const personal = await fileLines(personalPath);
    expect(personal).toContain('UID:review');
    expect(personal).toContain('LOCATION:Room 4');
    expect(b.pathOf('review')).toBe(personalPath);
  });

  it('deletes an event from its file', async () => {
    const b = bridge();
    await b.open();
    await b.persist([created(standup)]);

    const outcome = await b.persist([{ eventId: 'standup', before: standup, after: null }]);
    expect(outcome.ok).toBe(true);
    expect(await fileLines(join(calendarDir, 'work.ics'))).not.toContain('UID:standup');
    expect(b.pathOf('standup')).toBeUndefined();
  });

  it('queues a failed write for retry and keeps it across refreshes', async () => {
    const b = bridge();
    await b.open();
    const path = join(calendarDir, 'work.ics');
    // a directory in the way makes the rename fail
    await mkdir(path);

    const outcome = await b.persist([created(standup)]);
    expect(outcome.ok).toBe(false);
    expect(outcome.failures[0]?.path).toBe(path);
    expect(b.pendingRetries()).toEqual([path]);

    const diff = await b.refresh();
    expect(diff.removedIds).toEqual([]);
    expect(diff.report.events.map(event => event.id)).toEqual(['standup']);

    await rmdir(path);
    const retried = await b.retryFailed();
    expect(retried).toEqual({ ok: true, written: [path], failures: [], cacheFailures: [] });
    expect(b.pendingRetries()).toEqual([]);
    expect(await fileLines(path)).toContain('UID:standup');
  });

  it('rewrites a file holding two blocks with one UID', async () => {
    await mkdir(calendarDir, { recursive: true });
    const path = join(calendarDir, 'work.ics');
    await writeFile(
      path,
      ics(
        'BEGIN:VCALENDAR',
        'BEGIN:VEVENT',
        'UID:dup',
        'DTSTART:20240402T090000Z',
        'DTEND:20240402T100000Z',
        'SUMMARY:First',
        'END:VEVENT',
        'BEGIN:VEVENT',
        'UID:dup',
        'DTSTART:20240403T090000Z',
        'DTEND:20240403T100000Z',
        'SUMMARY:Copy',
        'END:VEVENT',
        'BEGIN:VEVENT',
        'UID:other',
        'DTSTART:20240402T120000Z',
        'DTEND:20240402T130000Z',
        'SUMMARY:Other',
        'END:VEVENT',
        'END:VCALENDAR'
      )
    );

    const b = bridge();
    const report = await b.open();
    expect(report.failures).toEqual([]);
    expect(report.events.map(event => event.id).sort()).toEqual(['dup', 'other']);

    const other = report.events.find(event => event.id === 'other');
    if (!other) throw new Error('other not loaded');
    const outcome = await b.persist([updated(other, { ...other, title: 'renamed' })]);

    expect(outcome).toEqual({ ok: true, written: [path], failures: [], cacheFailures: [] });
    expect(b.pendingRetries()).toEqual([]);
    const lines = await fileLines(path);
    expect(lines).toContain('SUMMARY:renamed');
    expect(lines).toContain('SUMMARY:Copy');
  });

  it('reports a cache failure apart from write failures', async () => {
    const b = new PersistenceBridge({
      calendarDir,
      cache: new FailingCacheStore(cachePath),
      timeZone: 'UTC',
      fingerprint: 'metadata',
      clock: () => CLOCK,
    });
    bridges.push(b);
    await b.open();
    const path = join(calendarDir, 'work.ics');

    const outcome = await b.persist([created(standup)]);
    expect(outcome.ok).toBe(true);
    expect(outcome.written).toEqual([path]);
    expect(outcome.failures).toEqual([]);
    expect(outcome.cacheFailures.map(failure => failure.message)).toEqual([
      `Failed updating cache for ${path}: disk full`,
    ]);
    expect(b.pendingRetries()).toEqual([]);
    expect(await fileLines(path)).toContain('UID:standup');
  });

  it('reads back the times it stores for sub-second input', async () => {
    const model = new EventModel(() => CLOCK);
    const precise = model.create(
      'Precise',
      Temporal.Instant.from('2024-04-02T09:07:30.875Z'),
      Temporal.Instant.from('2024-04-02T10:07:30.875Z'),
      'work'
    );

    const first = bridge();
    await first.open();
    await first.persist([created(precise)]);
    await first.close();

    const reopened = new PersistenceBridge({
      calendarDir,
      cache: new SqliteCacheStore(),
      timeZone: 'UTC',
      fingerprint: 'metadata',
      clock: () => CLOCK,
    });
    bridges.push(reopened);
    const report = await reopened.open();
    const [event] = report.events;

    expect(report.reparsed).toEqual([join(calendarDir, 'work.ics')]);
    expect(event?.begin.equals(precise.begin)).toBe(true);
    expect(event?.end.equals(precise.end)).toBe(true);
    expect(event && sameEvent(event, precise)).toBe(true);
  });
});
