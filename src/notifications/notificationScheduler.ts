/**
 * Notification scheduler
 *
 * Sleeps until the earliest begin time among events not yet notified, then
 * fires every event that became due since the previous check. The target is
 * always re-derived from the wall clock, never from elapsed time, so clock
 * jumps cost at most one extra recheck.
 */

import { Temporal } from 'temporal-polyfill';
import {
  Clock,
  FiredNotification,
  NotificationSource,
  Notifier,
  PlannerEvent,
} from '../types';
import { ClockAnomalyError } from '../core/errors';
import { logger } from '../utils/logger';
import { MAX_TIMER_DELAY_MS, instantFromMs, nowInstant } from '../utils/temporal';
import { renderNotification } from './messages';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface NotificationSchedulerOptions {
  timeZone: string;
  clock?: Clock;
  enabled?: boolean;
  // upper bound on one sleep
  maxSleepMs?: number;
  anomalyToleranceMs?: number;
  onAnomaly?: (anomaly: ClockAnomalyError) => void;
}

export type SchedulerSettings = Pick<
  NotificationSchedulerOptions,
  'timeZone' | 'enabled' | 'maxSleepMs' | 'anomalyToleranceMs'
>;

// an event moved to a new begin time is notified again
const notifiedKey = (event: PlannerEvent): string =>
  `${event.id}@${event.begin.epochMilliseconds}`;

export class NotificationScheduler {
  private readonly clock: Clock;
  private maxSleepMs: number;
  private anomalyToleranceMs: number;
  private readonly onAnomaly?: (anomaly: ClockAnomalyError) => void;
  private enabled: boolean;
  private timeZone: string;

  private lastCheck: Temporal.Instant;
  // key -> begin ms
  private notified = new Map<string, number>();
  private timer: ReturnType<typeof setTimeout> | null = null;
  private expectedWake: Temporal.Instant | null = null;
  private running = false;

  constructor(
    private readonly source: NotificationSource,
    private readonly notifier: Notifier,
    options: NotificationSchedulerOptions
  ) {
    this.clock = options.clock ?? nowInstant;
    this.timeZone = options.timeZone;
    this.enabled = options.enabled ?? true;
    this.maxSleepMs = options.maxSleepMs ?? 60 * 60 * 1000;
    this.anomalyToleranceMs = options.anomalyToleranceMs ?? 2 * 60 * 1000;
    this.onAnomaly = options.onAnomaly;
    // events already in the past at startup are not announced
    this.lastCheck = this.clock();
  }

  get isRunning(): boolean {
    return this.running;
  }

  get pendingWakeAt(): Temporal.Instant | null {
    return this.expectedWake;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  /**
   * Apply changed settings; a running loop re-plans its sleep with them
   */
  configure(settings: SchedulerSettings): void {
    this.timeZone = settings.timeZone;
    this.enabled = settings.enabled ?? this.enabled;
    this.maxSleepMs = settings.maxSleepMs ?? this.maxSleepMs;
    this.anomalyToleranceMs = settings.anomalyToleranceMs ?? this.anomalyToleranceMs;
    this.wake();
  }

  /**
   * Fire every event with lastCheck < begin <= now that has not been
   * notified yet. Calling it again without a clock advance fires nothing.
   */
  recheck(now: Temporal.Instant = this.clock()): FiredNotification[] {
    if (Temporal.Instant.compare(now, this.lastCheck) <= 0) {
      // clock stood still or went back; notified keys prevent repeats
      this.lastCheck = now;
      return [];
    }

    const fired: FiredNotification[] = [];
    for (const event of this.source.beginningBetween(this.lastCheck, now)) {
      const key = notifiedKey(event);
      if (this.notified.has(key)) continue;
      this.notified.set(key, event.begin.epochMilliseconds);

      if (!this.enabled) continue;

      const { title, body } = renderNotification(event, this.timeZone);
      const notification = { eventId: event.id, title, body, fireTime: now };
      try {
        this.notifier.notify(title, body, now);
      } catch (error) {
        logger.error(`Notifier failed for event ${event.id}`, error);
      }
      logger.debug(`Notified ${event.id} (${title})`);
      fired.push(notification);
    }

    this.lastCheck = now;
    this.prune(now);
    return fired;
  }

  /**
   * Earliest begin after now among events not notified yet
   */
  nextWakeAt(now: Temporal.Instant = this.clock()): Temporal.Instant | null {
    for (const event of this.source.beginningAfter(now)) {
      if (!this.notified.has(notifiedKey(event))) {
        return event.begin;
      }
    }
    return null;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    logger.debug('Notification scheduler started');
    this.cycle();
  }

  stop(): void {
    this.running = false;
    this.clearTimer();
    this.expectedWake = null;
  }

  /**
   * Cut the current sleep short; called after any model change
   */
  wake(): void {
    if (!this.running) return;
    this.clearTimer();
    this.cycle();
  }

  private cycle(): void {
    const now = this.clock();
    this.recheck(now);

    const next = this.nextWakeAt(now);
    if (!next) {
      // nothing upcoming: sleep until woken
      this.expectedWake = null;
      logger.debug('No upcoming events, waiting for changes');
      return;
    }

    const delay = Math.min(
      Math.max(0, next.epochMilliseconds - now.epochMilliseconds),
      this.maxSleepMs,
      MAX_TIMER_DELAY_MS
    );
    this.expectedWake = instantFromMs(now.epochMilliseconds + delay);
    logger.debug(`Next notification check at ${this.expectedWake.toString()}`);

    this.timer = setTimeout(() => {
      this.timer = null;
      this.checkDrift();
      if (this.running) this.cycle();
    }, delay);
  }

  private checkDrift(): void {
    const expected = this.expectedWake;
    if (!expected) return;

    const actual = this.clock();
    const drift = actual.epochMilliseconds - expected.epochMilliseconds;
    if (Math.abs(drift) <= this.anomalyToleranceMs) return;

    const anomaly = new ClockAnomalyError(expected, actual);
    logger.warn(anomaly.message);
    try {
      this.onAnomaly?.(anomaly);
    } catch (error) {
      logger.error('Clock anomaly handler failed', error);
    }
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private prune(now: Temporal.Instant): void {
    const horizon = now.epochMilliseconds - DAY_MS;
    for (const [key, beginMs] of this.notified) {
      if (beginMs < horizon) this.notified.delete(key);
    }
  }
}
