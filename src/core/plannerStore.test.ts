import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Temporal } from 'temporal-polyfill';
import { PlannerPlugin } from '../types';
import { createPlannerStore } from './plannerStore';
import { SqliteCacheStore } from '../persistence/sqliteCacheStore';
import { InvalidConfigError, NotFoundError, NothingToUndoError } from './errors';

const at = (time: string): Temporal.Instant =>
  Temporal.Instant.from(`2024-05-06T${time}:00Z`);

const CLOCK = Temporal.Instant.from('2024-05-01T07:00:00Z');
const DAY = { begin: at('00:00'), end: Temporal.Instant.from('2024-05-07T00:00:00Z') };

const memoryStore = (plugins: PlannerPlugin[] = []) =>
  createPlannerStore({ timeZone: 'UTC', defaultGroup: 'work' }, { clock: () => CLOCK, plugins });

describe('createPlannerStore', () => {
  it('rejects invalid configuration', () => {
    expect(() => createPlannerStore({ timeZone: 'Not/AZone' })).toThrow(InvalidConfigError);
  });

  describe('editing', () => {
    it('creates events in the default group and tracks undo state', () => {
      const store = memoryStore();
      const { changes } = store.getState().createEvent({
        title: 'Focus time',
        begin: at('09:00'),
        end: at('11:00'),
      });
      const created = changes[0]?.after;

      expect(created?.group).toBe('work');
      expect(created?.createdAt.equals(CLOCK)).toBe(true);
      expect(store.getState().canUndo).toBe(true);
      expect(store.getState().canRedo).toBe(false);
      expect(store.getState().revision).toBe(1);
      expect(store.getState().getAllEvents()).toHaveLength(1);
    });

    it('undoes and redoes through the store', () => {
      const store = memoryStore();
      const { changes } = store.getState().createEvent({
        title: 'Gym',
        begin: at('18:00'),
        end: at('19:00'),
        group: 'personal',
      });
      const id = changes[0]?.eventId ?? '';

      store.getState().moveEvent(id, { begin: at('19:00'), end: at('20:00') });
      store.getState().retitleEvent(id, 'Swim');
      store.getState().markComplete(id);
      store.getState().updateDetails(id, { notes: 'pool B' });

      expect(store.getState().getEvent(id)).toMatchObject({
        title: 'Swim',
        completed: true,
        notes: 'pool B',
        group: 'personal',
      });

      store.getState().undo();
      store.getState().undo();
      store.getState().undo();
      expect(store.getState().getEvent(id)?.title).toBe('Gym');
      expect(store.getState().getEvent(id)?.begin.equals(at('19:00'))).toBe(true);
      expect(store.getState().canRedo).toBe(true);

      store.getState().redo();
      expect(store.getState().getEvent(id)?.title).toBe('Swim');

      store.getState().deleteEvent(id);
      expect(store.getState().getEvent(id)).toBeUndefined();
      expect(store.getState().canRedo).toBe(false);
    });

    it('surfaces typed errors', () => {
      const store = memoryStore();
      expect(() => store.getState().undo()).toThrow(NothingToUndoError);
      expect(() => store.getState().deleteEvent('missing')).toThrow(NotFoundError);
    });

    it('notifies selector subscribers on every change', () => {
      const store = memoryStore();
      const listener = vi.fn();
      store.subscribe(state => state.canUndo, listener);

      store.getState().createEvent({ title: 'A', begin: at('09:00'), end: at('10:00') });
      store.getState().undo();
      expect(listener.mock.calls.map(call => call[0])).toEqual([true, false]);
    });

    it('clears canUndo when the last command turns out to be stale', () => {
      const store = memoryStore();
      const { changes } = store.getState().createEvent({
        title: 'A',
        begin: at('09:00'),
        end: at('10:00'),
      });
      const id = changes[0]?.eventId ?? '';
      store.getState().moveEvent(id, { begin: at('10:00'), end: at('11:00') });
      store.getState()._history.applyExternalChanges([], [id]);
      expect(store.getState().canUndo).toBe(true);

      expect(() => store.getState().undo()).toThrow(NotFoundError);
      expect(store.getState().canUndo).toBe(true);
      expect(() => store.getState().undo()).toThrow(NotFoundError);
      expect(store.getState().canUndo).toBe(false);
      expect(store.getState().canRedo).toBe(false);
    });
  });

  describe('configuration', () => {
    it('applies a smaller history depth at once', () => {
      const store = memoryStore();
      const state = store.getState();
      state.createEvent({ title: 'A', begin: at('09:00'), end: at('10:00') });
      state.createEvent({ title: 'B', begin: at('10:00'), end: at('11:00') });

      state.updateConfig({ history: { maxDepth: 1 } });
      state.undo();
      expect(store.getState().canUndo).toBe(false);
      expect(state.getAllEvents().map(event => event.title)).toEqual(['A']);
    });

    it('tells plugins about changes and hands them the clock', () => {
      const seen: string[] = [];
      const plugin: PlannerPlugin = {
        name: 'watcher',
        install: app => {
          seen.push(app.clock().toString());
          app.onConfigChange((next, previous) => {
            seen.push(`${previous.notifications.enabled} -> ${next.notifications.enabled}`);
          });
        },
      };

      const store = memoryStore([plugin]);
      store.getState().updateConfig({ notifications: { enabled: false } });
      expect(seen).toEqual(['2024-05-01T07:00:00Z', 'true -> false']);
    });

    it('rejects an invalid update without telling plugins', () => {
      const listener = vi.fn();
      const store = memoryStore([
        {
          name: 'watcher',
          install: app => {
            app.onConfigChange(listener);
          },
        },
      ]);
      expect(() => store.getState().updateConfig({ notifications: { maxSleepMs: 0 } })).toThrow(
        InvalidConfigError
      );
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('queries', () => {
    it('lays out the events of a window', () => {
      const store = memoryStore();
      const state = store.getState();
      const a = state.createEvent({ title: 'A', begin: at('09:00'), end: at('10:00') });
      const b = state.createEvent({ title: 'B', begin: at('09:30'), end: at('10:30') });
      const aId = a.changes[0]?.eventId ?? '';
      const bId = b.changes[0]?.eventId ?? '';

      expect(
        state.eventsInRange(DAY).map(item => [item.event.title, item.column, item.columnCount])
      ).toEqual([
        ['A', 0, 2],
        ['B', 1, 2],
      ]);
      expect(state.conflictsFor(aId).map(event => event.id)).toEqual([bId]);

      state.deleteEvent(aId);
      expect(state.eventsInRange(DAY).map(item => [item.event.title, item.columnCount])).toEqual([
        ['B', 1],
      ]);
    });

    it('follows a time zone change', () => {
      const store = memoryStore();
      store.getState().createEvent({ title: 'Late call', begin: at('23:00'), end: at('23:30') });

      store.getState().updateConfig({ timeZone: 'Asia/Tokyo' });
      const laidOut = store.getState().eventsInRange(DAY);
      expect(laidOut.map(item => item.day.toString())).toEqual(['2024-05-07']);
    });
  });

  describe('dragging', () => {
    it('proposes and commits a snapped move', () => {
      const store = memoryStore();
      const state = store.getState();
      const { changes } = state.createEvent({ title: 'Review', begin: at('09:00'), end: at('10:00') });
      const id = changes[0]?.eventId ?? '';

      const proposal = state.proposeDrag(id, at('13:07'), { kind: 'move', precision: 'snap' });
      expect(proposal.begin.toString()).toBe('2024-05-06T13:00:00Z');
      expect(proposal.end.toString()).toBe('2024-05-06T14:00:00Z');
      expect(proposal.valid).toBe(true);

      const session = state.beginDrag(id, 'move', at('09:00'));
      const result = state.commitDrag(session, session.propose(at('13:07')));
      expect(result?.command.kind).toBe('move');
      expect(state.getEvent(id)?.begin.toString()).toBe('2024-05-06T13:00:00Z');
    });

    it('ignores a drag that ends where it began', () => {
      const store = memoryStore();
      const state = store.getState();
      const { changes } = state.createEvent({ title: 'Review', begin: at('09:00'), end: at('10:00') });
      const id = changes[0]?.eventId ?? '';

      const session = state.beginDrag(id, 'move', at('09:10'));
      expect(state.commitDrag(session, session.propose(at('09:12')))).toBeNull();
      expect(store.getState().revision).toBe(1);
    });

    it('uses the updated grid for new drags', () => {
      const store = memoryStore();
      const state = store.getState();
      const { changes } = state.createEvent({ title: 'Review', begin: at('09:00'), end: at('10:00') });
      const id = changes[0]?.eventId ?? '';

      state.updateConfig({ drag: { granularityMinutes: 30 } });
      const proposal = state.proposeDrag(id, at('13:14'), { kind: 'move', precision: 'snap' });
      expect(proposal.begin.toString()).toBe('2024-05-06T13:00:00Z');
    });
  });

  describe('plugins', () => {
    it('installs each plugin once and uninstalls on close', async () => {
      const install = vi.fn();
      const uninstall = vi.fn();
      const plugin: PlannerPlugin = { name: 'sample', config: { level: 2 }, install, uninstall };

      const store = memoryStore([plugin, { ...plugin }]);
      expect(install).toHaveBeenCalledTimes(1);
      expect(store.getState().hasPlugin('sample')).toBe(true);
      expect(store.getState().getPlugin('sample')).toBe(plugin);
      expect(store.getState().getPluginConfig('sample')).toEqual({ level: 2 });
      expect(store.getState().getPluginConfig('absent')).toEqual({});

      await store.getState().close();
      expect(uninstall).toHaveBeenCalledTimes(1);
    });

    it('lets plugins observe model changes', () => {
      const seen: string[] = [];
      const plugin: PlannerPlugin = {
        name: 'observer',
        install: app => {
          app.onModelChange((changes, source) => {
            for (const change of changes) {
              seen.push(`${source}:${app.getEvent(change.eventId)?.title ?? '-'}`);
            }
          });
        },
      };

      const store = memoryStore([plugin]);
      store.getState().createEvent({ title: 'Lunch', begin: at('12:00'), end: at('13:00') });
      store.getState().undo();
      expect(seen).toEqual(['commit:Lunch', 'undo:-']);
    });
  });

  describe('with a calendar directory', () => {
    let root: string;

    beforeEach(async () => {
      root = await mkdtemp(join(tmpdir(), 'planner-store-'));
    });

    afterEach(async () => {
      await rm(root, { recursive: true, force: true });
    });

    const fileStore = () =>
      createPlannerStore(
        { timeZone: 'UTC', defaultGroup: 'work', persistence: { calendarDir: root } },
        { clock: () => CLOCK }
      );

    it('opens in memory when no directory is configured', async () => {
      const report = await memoryStore().getState().open();
      expect(report.events).toEqual([]);
    });

    it('loads files, writes edits through and clears history on open', async () => {
      await writeFile(
        join(root, 'work.ics'),
        [
          'BEGIN:VCALENDAR',
          'BEGIN:VEVENT',
          'UID:kickoff',
          'DTSTART:20240506T090000Z',
          'DTEND:20240506T100000Z',
          'SUMMARY:Kickoff',
          'END:VEVENT',
          'END:VCALENDAR',
          '',
        ].join('\r\n')
      );

      const store = fileStore();
      const report = await store.getState().open();
      expect(report.events.map(event => event.id)).toEqual(['kickoff']);
      expect(store.getState().isOpen).toBe(true);
      expect(store.getState().canUndo).toBe(false);

      const result = store.getState().retitleEvent('kickoff', 'Project kickoff');
      const outcome = await result.durable;
      expect(outcome.ok).toBe(true);
      expect((await readFile(join(root, 'work.ics'), 'utf8')).split('\r\n')).toContain(
        'SUMMARY:Project kickoff'
      );
      expect(store.getState().pendingRetries).toEqual([]);

      await store.getState().close();
      expect(store.getState().isOpen).toBe(false);
    });

    it('picks up edits made by other programs on refresh', async () => {
      const store = fileStore();
      await store.getState().open();
      expect(store.getState().getAllEvents()).toEqual([]);

      await writeFile(
        join(root, 'family.ics'),
        [
          'BEGIN:VCALENDAR',
          'BEGIN:VEVENT',
          'UID:picnic',
          'DTSTART:20240506T120000Z',
          'DTEND:20240506T150000Z',
          'SUMMARY:Picnic',
          'END:VEVENT',
          'END:VCALENDAR',
          '',
        ].join('\r\n')
      );

      const diff = await store.getState().refresh();
      expect(diff?.upserts.map(event => event.id)).toEqual(['picnic']);
      expect(store.getState().getEvent('picnic')?.group).toBe('family');
      expect(store.getState().canUndo).toBe(false);

      await store.getState().close();
    });

    it('refuses persistence changes while open and takes them once closed', async () => {
      const store = fileStore();
      await store.getState().open();
      expect(() =>
        store.getState().updateConfig({ persistence: { fingerprint: 'content-hash' } })
      ).toThrow(InvalidConfigError);

      await store.getState().close();
      store.getState().updateConfig({ persistence: { fingerprint: 'content-hash' } });
      expect(store.getState().getConfig().persistence.fingerprint).toBe('content-hash');
    });

    it('opens again after close with an injected cache', async () => {
      const cache = new SqliteCacheStore();
      const store = createPlannerStore(
        { timeZone: 'UTC', defaultGroup: 'work', persistence: { calendarDir: root } },
        { clock: () => CLOCK, cache }
      );
      await store.getState().open();
      const { durable } = store.getState().createEvent({
        title: 'Kept',
        begin: at('09:00'),
        end: at('10:00'),
      });
      await durable;
      await store.getState().close();

      const report = await store.getState().open();
      expect(report.fromCache).toEqual([join(root, 'work.ics')]);
      expect(report.events.map(event => event.title)).toEqual(['Kept']);
      expect(store.getState().isOpen).toBe(true);

      await store.getState().close();
      cache.close();
    });

    it('reports parse failures without dropping the rest', async () => {
      await writeFile(join(root, 'broken.ics'), 'not a calendar');
      const store = fileStore();

      const report = await store.getState().open();
      expect(report.failures).toHaveLength(1);
      expect(store.getState().lastFailure?.kind).toBe('ParseFailed');

      await store.getState().close();
    });
  });
});
