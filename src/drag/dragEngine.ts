/**
 * Snap/drag engine
 *
 * Turns a continuous pointer time into a proposed (begin, end) pair. The
 * engine never renders and never mutates the model: a finished drag is
 * handed back as an edit command for the history to commit.
 */

import { Temporal } from 'temporal-polyfill';
import {
  DragConfig,
  DragKind,
  DragPrecision,
  DragProposal,
  EditCommand,
  PlannerEvent,
  TimeRange,
} from '../types';
import {
  EventReader,
  createCommand,
  moveCommand,
  resizeCommand,
} from '../core/commands';
import { buildEvent } from '../core/eventModel';
import {
  MS_PER_MINUTE,
  addMs,
  durationMs,
  instantFromMs,
  nowInstant,
  spansSingleDay,
  toStoredPrecision,
} from '../utils/temporal';
import { snapInstant } from './snap';

export class DragSession {
  private readonly grabOffsetMs: number;

  constructor(
    readonly event: PlannerEvent,
    readonly kind: DragKind,
    grabTime: Temporal.Instant,
    private readonly config: DragConfig,
    private readonly timeZone: string,
    private readonly clock: () => Temporal.Instant = nowInstant
  ) {
    this.grabOffsetMs =
      grabTime.epochMilliseconds - event.begin.epochMilliseconds;
  }

  /**
   * Proposed range for the current pointer position
   */
  propose(
    pointerTime: Temporal.Instant,
    precision: DragPrecision = 'snap'
  ): DragProposal {
    const range = this.proposeRange(pointerTime, precision);
    return { ...range, valid: this.isValid(range) };
  }

  /**
   * Command committing a proposal, or null when the proposal is not valid.
   * Duplicates become a create command for a fresh event.
   */
  toCommand(proposal: DragProposal, model: EventReader): EditCommand | null {
    if (!proposal.valid) return null;

    const to: TimeRange = { begin: proposal.begin, end: proposal.end };
    switch (this.kind) {
      case 'move':
        return moveCommand(model, this.event.id, to);
      case 'resize-begin':
      case 'resize-end':
        return resizeCommand(model, this.event.id, to);
      case 'duplicate':
        return createCommand(
          buildEvent(this.event.title, to.begin, to.end, this.event.group, {
            notes: this.event.notes,
            createdAt: this.clock(),
          })
        );
    }
  }

  private quantize(instant: Temporal.Instant, precision: DragPrecision): Temporal.Instant {
    return precision === 'snap'
      ? snapInstant(instant, this.config.granularityMinutes, this.timeZone)
      : toStoredPrecision(instant);
  }

  private quantumMs(precision: DragPrecision): number {
    return precision === 'snap'
      ? this.config.granularityMinutes * MS_PER_MINUTE
      : this.config.precisionQuantumMs;
  }

  private proposeRange(pointerTime: Temporal.Instant, precision: DragPrecision): TimeRange {
    const { begin, end } = this.event;

    switch (this.kind) {
      case 'move':
      case 'duplicate': {
        const rawBegin = instantFromMs(
          pointerTime.epochMilliseconds - this.grabOffsetMs
        );
        const newBegin = this.quantize(rawBegin, precision);
        return { begin: newBegin, end: addMs(newBegin, durationMs(this.event)) };
      }
      case 'resize-begin': {
        const latest = end.epochMilliseconds - this.quantumMs(precision);
        const proposed = this.quantize(pointerTime, precision);
        return {
          begin:
            proposed.epochMilliseconds > latest ? instantFromMs(latest) : proposed,
          end,
        };
      }
      case 'resize-end': {
        const earliest = begin.epochMilliseconds + this.quantumMs(precision);
        const proposed = this.quantize(pointerTime, precision);
        return {
          begin,
          end:
            proposed.epochMilliseconds < earliest ? instantFromMs(earliest) : proposed,
        };
      }
    }
  }

  private isValid(range: TimeRange): boolean {
    if (this.config.confineToDay && !spansSingleDay(range, this.timeZone)) {
      return false;
    }
    if (this.kind === 'duplicate') return true;
    return !(
      range.begin.equals(this.event.begin) && range.end.equals(this.event.end)
    );
  }
}

export class DragEngine {
  constructor(
    private config: DragConfig,
    private timeZone: string,
    private readonly clock: () => Temporal.Instant = nowInstant
  ) {}

  updateConfig(config: DragConfig, timeZone: string): void {
    this.config = config;
    this.timeZone = timeZone;
  }

  /**
   * Start dragging an event. grabTime is the pointer time at mouse down;
   * moves keep the offset between it and the event's begin.
   */
  begin(event: PlannerEvent, kind: DragKind, grabTime: Temporal.Instant): DragSession {
    return new DragSession(
      event,
      kind,
      grabTime,
      { ...this.config },
      this.timeZone,
      this.clock
    );
  }
}
