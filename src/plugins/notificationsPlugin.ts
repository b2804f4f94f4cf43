// Notification plugin: drives a NotificationScheduler from model changes
import { Temporal } from 'temporal-polyfill';
import {
  Clock,
  FiredNotification,
  Notifier,
  PlannerPlugin,
} from '../types';
import { ClockAnomalyError } from '../core/errors';
import { NotificationScheduler } from '../notifications/notificationScheduler';
import { logger } from '../utils/logger';

export interface NotificationsPluginConfig {
  notifier: Notifier;
  // defaults to the planner's clock
  clock?: Clock;
  // start the background loop at install time
  autoStart?: boolean;
  onAnomaly?: (anomaly: ClockAnomalyError) => void;
}

export interface NotificationsService {
  recheck: () => FiredNotification[];
  nextWakeAt: () => Temporal.Instant | null;
  start: () => void;
  stop: () => void;
  setEnabled: (enabled: boolean) => void;
  isRunning: () => boolean;
}

export const NOTIFICATIONS_PLUGIN = 'notifications';

export function createNotificationsPlugin(
  config: NotificationsPluginConfig
): PlannerPlugin<NotificationsService> {
  let scheduler: NotificationScheduler | null = null;
  let unsubscribes: Array<() => void> = [];

  const requireScheduler = (): NotificationScheduler => {
    if (!scheduler) {
      throw new Error('Notifications plugin is not installed');
    }
    return scheduler;
  };

  const service: NotificationsService = {
    recheck: () => requireScheduler().recheck(),
    nextWakeAt: () => requireScheduler().nextWakeAt(),
    start: () => requireScheduler().start(),
    stop: () => requireScheduler().stop(),
    setEnabled: (enabled: boolean) => requireScheduler().setEnabled(enabled),
    isRunning: () => scheduler?.isRunning ?? false,
  };

  return {
    name: NOTIFICATIONS_PLUGIN,
    config: { autoStart: config.autoStart ?? true },
    install: app => {
      const { timeZone, notifications } = app.getConfig();
      const installed = new NotificationScheduler(app.notificationSource(), config.notifier, {
        timeZone,
        clock: config.clock ?? app.clock,
        enabled: notifications.enabled,
        maxSleepMs: notifications.maxSleepMs,
        anomalyToleranceMs: notifications.anomalyToleranceMs,
        onAnomaly: config.onAnomaly,
      });
      scheduler = installed;

      unsubscribes = [
        // any insert, delete or time change may move the next wake time
        app.onModelChange(() => installed.wake()),
        app.onConfigChange(next =>
          installed.configure({ timeZone: next.timeZone, ...next.notifications })
        ),
      ];

      if (config.autoStart ?? true) {
        installed.start();
      }
      logger.log('Notifications plugin installed');
    },
    uninstall: () => {
      for (const unsubscribe of unsubscribes.splice(0)) unsubscribe();
      scheduler?.stop();
    },
    api: service,
  };
}

// Type guard
export function isNotificationsService(obj: unknown): obj is NotificationsService {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'recheck' in obj &&
    'nextWakeAt' in obj &&
    'setEnabled' in obj
  );
}
