import { Temporal } from 'temporal-polyfill';
import { EventId } from '../types/event';

export type PlannerErrorKind =
  | 'InvalidRange'
  | 'NotFound'
  | 'DuplicateId'
  | 'NothingToUndo'
  | 'NothingToRedo'
  | 'PersistenceWriteFailed'
  | 'CacheUpdateFailed'
  | 'ParseFailed'
  | 'ClockAnomaly'
  | 'InvalidConfig';

export abstract class PlannerError extends Error {
  abstract readonly kind: PlannerErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidRangeError extends PlannerError {
  readonly kind = 'InvalidRange' as const;

  constructor(
    readonly begin: Temporal.Instant,
    readonly end: Temporal.Instant
  ) {
    super(`Event end ${end.toString()} is before begin ${begin.toString()}`);
  }
}

export class NotFoundError extends PlannerError {
  readonly kind = 'NotFound' as const;

  constructor(readonly eventId: EventId) {
    super(`Event with id ${eventId} not found`);
  }
}

export class DuplicateIdError extends PlannerError {
  readonly kind = 'DuplicateId' as const;

  constructor(readonly eventId: EventId) {
    super(`Event with id ${eventId} already exists`);
  }
}

export class NothingToUndoError extends PlannerError {
  readonly kind = 'NothingToUndo' as const;

  constructor() {
    super('Nothing to undo');
  }
}

export class NothingToRedoError extends PlannerError {
  readonly kind = 'NothingToRedo' as const;

  constructor() {
    super('Nothing to redo');
  }
}

export class PersistenceWriteFailedError extends PlannerError {
  readonly kind = 'PersistenceWriteFailed' as const;

  constructor(
    readonly path: string,
    cause: unknown
  ) {
    super(`Failed writing ${path}: ${describeCause(cause)}`, { cause });
  }
}

/**
 * The calendar file was written but its cache rows were not; the next scan
 * sees a changed fingerprint and re-reads the file.
 */
export class CacheUpdateFailedError extends PlannerError {
  readonly kind = 'CacheUpdateFailed' as const;

  constructor(
    readonly path: string,
    cause: unknown
  ) {
    super(`Failed updating cache for ${path}: ${describeCause(cause)}`, { cause });
  }
}

export class ParseFailedError extends PlannerError {
  readonly kind = 'ParseFailed' as const;

  constructor(
    readonly path: string,
    detail: string,
    readonly line: number | null = null,
    cause?: unknown
  ) {
    super(
      line === null
        ? `Failed parsing ${path}: ${detail}`
        : `Failed parsing ${path} (line ${line}): ${detail}`,
      { cause }
    );
  }
}

export class ClockAnomalyError extends PlannerError {
  readonly kind = 'ClockAnomaly' as const;

  constructor(
    readonly expected: Temporal.Instant,
    readonly actual: Temporal.Instant
  ) {
    const driftMs = actual.epochMilliseconds - expected.epochMilliseconds;
    super(
      `Scheduler woke at ${actual.toString()}, expected ${expected.toString()} (drift ${driftMs}ms)`
    );
  }

  get driftMs(): number {
    return this.actual.epochMilliseconds - this.expected.epochMilliseconds;
  }
}

export class InvalidConfigError extends PlannerError {
  readonly kind = 'InvalidConfig' as const;

  constructor(readonly problems: string[]) {
    super(`Configuration validation failed: ${problems.join(', ')}`);
  }
}

export type PlannerErrorOf<K extends PlannerErrorKind> = Extract<
  | InvalidRangeError
  | NotFoundError
  | DuplicateIdError
  | NothingToUndoError
  | NothingToRedoError
  | PersistenceWriteFailedError
  | CacheUpdateFailedError
  | ParseFailedError
  | ClockAnomalyError
  | InvalidConfigError,
  { kind: K }
>;

export function isPlannerError(value: unknown): value is PlannerError;
export function isPlannerError<K extends PlannerErrorKind>(
  value: unknown,
  kind: K
): value is PlannerErrorOf<K>;
export function isPlannerError(
  value: unknown,
  kind?: PlannerErrorKind
): boolean {
  if (!(value instanceof PlannerError)) return false;
  return kind === undefined || value.kind === kind;
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
