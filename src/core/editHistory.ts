import { Temporal } from 'temporal-polyfill';
import {
  ChangeSource,
  EditCommand,
  EventId,
  FlushOutcome,
  LaidOutEvent,
  ModelChange,
  ModelChangeListener,
  NotificationSource,
  PersistenceSink,
  PlannerEvent,
  TimeRange,
} from '../types';
import { EventModel } from './eventModel';
import { IntervalIndex } from './intervalIndex';
import { EventLayoutCalculator } from './layout';
import { applyToModel, describeCommand, invertCommand } from './commands';
import {
  NothingToRedoError,
  NothingToUndoError,
  PersistenceWriteFailedError,
  isPlannerError,
} from './errors';
import { logger } from '../utils/logger';
import { nowInstant } from '../utils/temporal';

export interface CommitResult {
  command: EditCommand;
  changes: ModelChange[];
  // settles once the change is written (or failed to be written) to storage
  durable: Promise<FlushOutcome>;
}

export interface EditHistoryOptions {
  clock?: () => Temporal.Instant;
  sink?: PersistenceSink | null;
  maxDepth?: number;
}

const DEFAULT_MAX_DEPTH = 200;

const NOTHING_TO_FLUSH: FlushOutcome = {
  ok: true,
  written: [],
  failures: [],
  cacheFailures: [],
};

/**
 * Sole owner of the event model and its interval index.
 *
 * Every mutation is a command applied here; model, index and the
 * persistence hand-off change together. Two stacks, most recent last:
 * commit pushes onto undo and clears redo, undo moves the top command to
 * redo, redo moves it back.
 */
export class EditHistory implements NotificationSource {
  private readonly model: EventModel;
  private readonly index = new IntervalIndex();
  private readonly undoStack: EditCommand[] = [];
  private readonly redoStack: EditCommand[] = [];
  private readonly listeners = new Set<ModelChangeListener>();
  private sink: PersistenceSink | null;
  private maxDepth: number;

  constructor(options: EditHistoryOptions = {}) {
    this.model = new EventModel(options.clock ?? nowInstant);
    this.sink = options.sink ?? null;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  setSink(sink: PersistenceSink | null): void {
    this.sink = sink;
  }

  // a lower depth drops the oldest undo commands at once
  setMaxDepth(maxDepth: number): void {
    this.maxDepth = maxDepth;
    if (this.undoStack.length > maxDepth) {
      this.undoStack.splice(0, this.undoStack.length - maxDepth);
    }
  }

  // ============ Mutation ============

  commit(command: EditCommand): CommitResult {
    const result = this.execute(command, 'commit');
    this.undoStack.push(command);
    if (this.undoStack.length > this.maxDepth) {
      this.undoStack.shift();
    }
    this.redoStack.length = 0;
    this.emit(result.changes, 'commit');
    return result;
  }

  /**
   * A command whose event was removed (or whose id was re-used) outside the
   * history can never apply again; it is dropped from the stack and the
   * error is rethrown so the next call reaches the older commands.
   */
  undo(): CommitResult {
    const command = this.peekUndo();
    if (!command) {
      throw new NothingToUndoError();
    }
    const result = this.attempt(this.undoStack, command, () =>
      this.execute(invertCommand(command), 'undo')
    );
    this.undoStack.pop();
    this.redoStack.push(command);
    this.emit(result.changes, 'undo');
    return { ...result, command };
  }

  redo(): CommitResult {
    const command = this.peekRedo();
    if (!command) {
      throw new NothingToRedoError();
    }
    const result = this.attempt(this.redoStack, command, () =>
      this.execute(command, 'redo')
    );
    this.redoStack.pop();
    this.undoStack.push(command);
    this.emit(result.changes, 'redo');
    return result;
  }

  clear(): void {
    this.undoStack.length = 0;
    this.redoStack.length = 0;
  }

  /**
   * Replace the whole event set with what storage holds. Stacks are kept:
   * commands carry their own state and stay invertible.
   */
  loadSnapshot(events: PlannerEvent[]): ModelChange[] {
    const incoming = new Map(events.map(event => [event.id, event]));
    const changes: ModelChange[] = [];

    for (const existing of this.model.all()) {
      if (!incoming.has(existing.id)) {
        changes.push({ eventId: existing.id, before: existing, after: null });
      }
    }
    const before = new Map(this.model.all().map(event => [event.id, event]));
    this.model.clear();
    for (const event of incoming.values()) {
      changes.push({
        eventId: event.id,
        before: before.get(event.id) ?? null,
        after: this.model.restore(event),
      });
    }
    this.index.rebuild(this.model.all());

    this.emit(changes, 'load');
    return changes;
  }

  /**
   * Merge events changed on disk by another program
   */
  applyExternalChanges(upserts: PlannerEvent[], removedIds: EventId[]): ModelChange[] {
    const changes: ModelChange[] = [];

    for (const id of removedIds) {
      const existing = this.model.get(id);
      if (!existing) continue;
      this.model.delete(id);
      this.index.remove(id);
      changes.push({ eventId: id, before: existing, after: null });
    }

    for (const event of upserts) {
      const before = this.model.get(event.id) ?? null;
      const after = this.model.restore(event);
      this.index.upsert(after);
      changes.push({ eventId: event.id, before, after });
    }

    if (changes.length > 0) {
      this.emit(changes, 'refresh');
    }
    return changes;
  }

  // ============ Queries ============

  get(id: EventId): PlannerEvent | undefined {
    return this.model.get(id);
  }

  all(): PlannerEvent[] {
    return this.index.all();
  }

  get size(): number {
    return this.model.size;
  }

  overlapping(range: TimeRange): PlannerEvent[] {
    return this.index.overlapping(range);
  }

  at(instant: Temporal.Instant): PlannerEvent[] {
    return this.index.at(instant);
  }

  conflictsFor(id: EventId): PlannerEvent[] {
    return this.index.conflictsFor(id);
  }

  layoutWindow(window: TimeRange, timeZone: string): LaidOutEvent[] {
    return EventLayoutCalculator.layoutWindow(this.index, window, timeZone);
  }

  beginningBetween(after: Temporal.Instant, until: Temporal.Instant): PlannerEvent[] {
    return this.index.beginningBetween(after, until);
  }

  beginningAfter(after: Temporal.Instant): Iterable<PlannerEvent> {
    return this.index.beginningAfter(after);
  }

  get canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  get undoDepth(): number {
    return this.undoStack.length;
  }

  get redoDepth(): number {
    return this.redoStack.length;
  }

  peekUndo(): EditCommand | undefined {
    return this.undoStack[this.undoStack.length - 1];
  }

  peekRedo(): EditCommand | undefined {
    return this.redoStack[this.redoStack.length - 1];
  }

  subscribe(listener: ModelChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ============ Internals ============

  private execute(command: EditCommand, source: ChangeSource): CommitResult {
    // throws before any mutation on NotFound / InvalidRange
    const change = applyToModel(this.model, command);

    if (change.after) {
      this.index.upsert(change.after);
    } else {
      this.index.remove(change.eventId);
    }

    logger.debug(`Applied ${describeCommand(command)} (${source})`);

    const changes = [change];
    return { command, changes, durable: this.flush(changes) };
  }

  private attempt(
    stack: EditCommand[],
    command: EditCommand,
    run: () => CommitResult
  ): CommitResult {
    try {
      return run();
    } catch (error) {
      if (isPlannerError(error, 'NotFound') || isPlannerError(error, 'DuplicateId')) {
        stack.pop();
        logger.warn(`Dropped stale ${describeCommand(command)} from history: ${error.message}`);
      }
      throw error;
    }
  }

  private flush(changes: ModelChange[]): Promise<FlushOutcome> {
    if (!this.sink) {
      return Promise.resolve(NOTHING_TO_FLUSH);
    }
    return this.sink.persist(changes).catch(
      (error: unknown): FlushOutcome => ({
        ok: false,
        written: [],
        cacheFailures: [],
        failures: [new PersistenceWriteFailedError('(unknown)', error)],
      })
    );
  }

  private emit(changes: ModelChange[], source: ChangeSource): void {
    for (const listener of this.listeners) {
      try {
        listener(changes, source);
      } catch (error) {
        logger.error('Model change listener failed', error);
      }
    }
  }
}
