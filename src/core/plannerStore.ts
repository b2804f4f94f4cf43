/**
 * Zustand store for the planner
 * Reactive state is small (revision counters and flags); the event set
 * itself lives in the edit history and is read through query actions.
 */
import { createStore } from 'zustand/vanilla';
import type { Mutate, StoreApi } from 'zustand/vanilla';
import { subscribeWithSelector } from 'zustand/middleware';
import { Temporal } from 'temporal-polyfill';
import {
  CacheStore,
  Clock,
  ConfigChangeListener,
  DeepPartial,
  DragKind,
  DragMode,
  DragProposal,
  EditCommand,
  EventDetails,
  EventId,
  FlushOutcome,
  LaidOutEvent,
  LoadReport,
  PlannerApp,
  PlannerConfig,
  PlannerEvent,
  PlannerPlugin,
  StorageDiff,
  TimeRange,
} from '../types';
import { ConfigManager } from './config';
import { EditHistory, CommitResult } from './editHistory';
import { buildEvent } from './eventModel';
import {
  createCommand,
  deleteCommand,
  markCompleteCommand,
  moveCommand,
  resizeCommand,
  retitleCommand,
  updateCommand,
} from './commands';
import { InvalidConfigError, NotFoundError, PlannerError } from './errors';
import { DragEngine, DragSession } from '../drag/dragEngine';
import { PersistenceBridge } from '../persistence/persistenceBridge';
import { SqliteCacheStore } from '../persistence/sqliteCacheStore';
import { logger } from '../utils/logger';
import { nowInstant } from '../utils/temporal';

// ============ Store Types ============

export interface PlannerStoreState {
  // Reactive state
  revision: number;
  canUndo: boolean;
  canRedo: boolean;
  isOpen: boolean;
  pendingRetries: string[];
  lastFailure: PlannerError | null;
  lastLoad: LoadReport | null;

  // Internal state (accessed via actions, not subscribed directly)
  _config: ConfigManager;
  _history: EditHistory;
  _drag: DragEngine;
  _bridge: PersistenceBridge | null;
  _plugins: Map<string, PlannerPlugin>;
}

export interface NewEventInput {
  title: string;
  begin: Temporal.Instant;
  end: Temporal.Instant;
  group?: string;
  notes?: string;
}

export interface PlannerStoreActions {
  // Storage
  open: () => Promise<LoadReport>;
  refresh: () => Promise<StorageDiff | null>;
  retryFailed: () => Promise<FlushOutcome>;
  close: () => Promise<void>;

  // Queries
  eventsInRange: (window: TimeRange) => LaidOutEvent[];
  getEvent: (id: EventId) => PlannerEvent | undefined;
  getAllEvents: () => PlannerEvent[];
  conflictsFor: (id: EventId) => PlannerEvent[];

  // Drag
  beginDrag: (id: EventId, kind: DragKind, grabTime: Temporal.Instant) => DragSession;
  proposeDrag: (
    id: EventId,
    pointerTime: Temporal.Instant,
    mode: DragMode,
    grabTime?: Temporal.Instant
  ) => DragProposal;
  commitDrag: (session: DragSession, proposal: DragProposal) => CommitResult | null;

  // Mutations
  commit: (command: EditCommand) => CommitResult;
  createEvent: (input: NewEventInput) => CommitResult;
  deleteEvent: (id: EventId) => CommitResult;
  moveEvent: (id: EventId, to: TimeRange) => CommitResult;
  resizeEvent: (id: EventId, to: TimeRange) => CommitResult;
  retitleEvent: (id: EventId, title: string) => CommitResult;
  markComplete: (id: EventId, completed?: boolean) => CommitResult;
  updateDetails: (id: EventId, details: Partial<EventDetails>) => CommitResult;
  undo: () => CommitResult;
  redo: () => CommitResult;

  // Config and plugins
  getConfig: () => PlannerConfig;
  updateConfig: (updates: DeepPartial<PlannerConfig>) => void;
  getPlugin: (name: string) => PlannerPlugin | undefined;
  hasPlugin: (name: string) => boolean;
  getPluginConfig: (name: string) => Record<string, unknown>;
}

export type PlannerStore = PlannerStoreState & PlannerStoreActions;

export type PlannerStoreApi = Mutate<
  StoreApi<PlannerStore>,
  [['zustand/subscribeWithSelector', never]]
>;

export interface PlannerStoreDeps {
  plugins?: PlannerPlugin[];
  clock?: Clock;
  // defaults to a SQLite store at persistence.cachePath; an injected cache
  // stays open after close() so the store can be opened again
  cache?: CacheStore;
}

const hasDefinedKey = (section: object | undefined): boolean =>
  section !== undefined && Object.values(section).some(value => value !== undefined);

// ============ Store Factory ============

export function createPlannerStore(
  config: DeepPartial<PlannerConfig> = {},
  deps: PlannerStoreDeps = {}
): PlannerStoreApi {
  const configManager = new ConfigManager(config);
  const initialConfig = configManager.getConfig();
  const clock = deps.clock ?? nowInstant;

  const history = new EditHistory({
    clock,
    maxDepth: initialConfig.history.maxDepth,
  });
  const drag = new DragEngine(initialConfig.drag, initialConfig.timeZone, clock);

  return createStore<PlannerStore>()(
    subscribeWithSelector((set, get) => {
      const track = (result: CommitResult): CommitResult => {
        void result.durable.then(outcome => {
          const bridge = get()._bridge;
          set({
            pendingRetries: bridge ? bridge.pendingRetries() : [],
            ...(outcome.ok ? {} : { lastFailure: outcome.failures[0] ?? null }),
          });
        });
        return result;
      };

      const requireEvent = (id: EventId): PlannerEvent => {
        const event = history.get(id);
        if (!event) throw new NotFoundError(id);
        return event;
      };

      const configListeners = new Set<ConfigChangeListener>();

      // a command dropped as stale emits nothing, so flags are read back here
      const syncStacks = (): void => {
        set({ canUndo: history.canUndo, canRedo: history.canRedo });
      };

      history.subscribe(() => {
        set(state => ({
          revision: state.revision + 1,
          canUndo: history.canUndo,
          canRedo: history.canRedo,
        }));
      });

      const store: PlannerStore = {
        // ============ Initial State ============
        revision: 0,
        canUndo: false,
        canRedo: false,
        isOpen: false,
        pendingRetries: [],
        lastFailure: null,
        lastLoad: null,

        _config: configManager,
        _history: history,
        _drag: drag,
        _bridge: null,
        _plugins: new Map(),

        // ============ Storage ============
        open: async () => {
          const state = get();
          const { persistence, timeZone } = state._config.getConfig();

          if (!persistence.calendarDir) {
            const report: LoadReport = {
              events: history.all(),
              fromCache: [],
              reparsed: [],
              purged: [],
              failures: [],
            };
            set({ isOpen: true, lastLoad: report });
            return report;
          }

          const bridge =
            state._bridge ??
            new PersistenceBridge({
              calendarDir: persistence.calendarDir,
              cache: deps.cache ?? new SqliteCacheStore(persistence.cachePath),
              timeZone,
              fingerprint: persistence.fingerprint,
              clock,
              closeCache: deps.cache === undefined,
            });
          history.setSink(bridge);

          const report = await bridge.open();
          history.loadSnapshot(report.events);
          history.clear();
          set({
            _bridge: bridge,
            isOpen: true,
            lastLoad: report,
            canUndo: false,
            canRedo: false,
            pendingRetries: bridge.pendingRetries(),
            lastFailure: report.failures[0] ?? null,
          });
          return report;
        },

        refresh: async () => {
          const bridge = get()._bridge;
          if (!bridge) return null;
          const diff = await bridge.refresh();
          history.applyExternalChanges(diff.upserts, diff.removedIds);
          set({
            lastLoad: diff.report,
            ...(diff.report.failures.length > 0
              ? { lastFailure: diff.report.failures[0] ?? null }
              : {}),
          });
          return diff;
        },

        retryFailed: async () => {
          const bridge = get()._bridge;
          if (!bridge) return { ok: true, written: [], failures: [], cacheFailures: [] };
          const outcome = await bridge.retryFailed();
          set({
            pendingRetries: bridge.pendingRetries(),
            lastFailure: outcome.failures[0] ?? null,
          });
          return outcome;
        },

        close: async () => {
          const state = get();
          for (const plugin of state._plugins.values()) {
            await plugin.uninstall?.();
          }
          if (state._bridge) {
            await state._bridge.close();
          }
          history.setSink(null);
          set({ isOpen: false, _bridge: null });
          logger.log('Planner closed');
        },

        // ============ Queries ============
        eventsInRange: (window: TimeRange) =>
          history.layoutWindow(window, get()._config.getConfig().timeZone),

        getEvent: (id: EventId) => history.get(id),

        getAllEvents: () => history.all(),

        conflictsFor: (id: EventId) => history.conflictsFor(id),

        // ============ Drag ============
        beginDrag: (id: EventId, kind: DragKind, grabTime: Temporal.Instant) =>
          get()._drag.begin(requireEvent(id), kind, grabTime),

        proposeDrag: (
          id: EventId,
          pointerTime: Temporal.Instant,
          mode: DragMode,
          grabTime?: Temporal.Instant
        ) => {
          const event = requireEvent(id);
          return get()
            ._drag.begin(event, mode.kind, grabTime ?? event.begin)
            .propose(pointerTime, mode.precision);
        },

        commitDrag: (session: DragSession, proposal: DragProposal) => {
          const command = session.toCommand(proposal, history);
          return command ? get().commit(command) : null;
        },

        // ============ Mutations ============
        commit: (command: EditCommand) => track(history.commit(command)),

        createEvent: (input: NewEventInput) => {
          const event = buildEvent(
            input.title,
            input.begin,
            input.end,
            input.group ?? get()._config.getConfig().defaultGroup,
            { notes: input.notes, createdAt: clock() }
          );
          return get().commit(createCommand(event));
        },

        deleteEvent: (id: EventId) => get().commit(deleteCommand(history, id)),

        moveEvent: (id: EventId, to: TimeRange) =>
          get().commit(moveCommand(history, id, to)),

        resizeEvent: (id: EventId, to: TimeRange) =>
          get().commit(resizeCommand(history, id, to)),

        retitleEvent: (id: EventId, title: string) =>
          get().commit(retitleCommand(history, id, title)),

        markComplete: (id: EventId, completed = true) =>
          get().commit(markCompleteCommand(history, id, completed)),

        updateDetails: (id: EventId, details: Partial<EventDetails>) =>
          get().commit(updateCommand(history, id, details)),

        undo: () => {
          try {
            return track(history.undo());
          } finally {
            syncStacks();
          }
        },

        redo: () => {
          try {
            return track(history.redo());
          } finally {
            syncStacks();
          }
        },

        // ============ Config and Plugins ============
        getConfig: () => get()._config.getConfig(),

        updateConfig: (updates: DeepPartial<PlannerConfig>) => {
          const { _config, _drag, _bridge } = get();
          if (_bridge && hasDefinedKey(updates.persistence)) {
            throw new InvalidConfigError([
              'persistence settings cannot change while the planner is open',
            ]);
          }
          const previous = _config.getConfig();
          _config.updateConfig(updates);
          const next = _config.getConfig();

          // sessions already in progress keep their settings
          _drag.updateConfig(_config.getDragConfig(), next.timeZone);
          history.setMaxDepth(next.history.maxDepth);
          syncStacks();
          set(state => ({ revision: state.revision + 1 }));

          for (const listener of configListeners) {
            try {
              listener(next, previous);
            } catch (error) {
              logger.error('Config change listener failed', error);
            }
          }
        },

        getPlugin: (name: string) => get()._plugins.get(name),

        hasPlugin: (name: string) => get()._plugins.has(name),

        getPluginConfig: (name: string) => get()._plugins.get(name)?.config ?? {},
      };

      // Install plugins after store is created
      const app: PlannerApp = {
        getConfig: () => configManager.getConfig(),
        onConfigChange: listener => {
          configListeners.add(listener);
          return () => {
            configListeners.delete(listener);
          };
        },
        clock,
        getEvent: (id: EventId) => history.get(id),
        onModelChange: listener => history.subscribe(listener),
        notificationSource: () => history,
      };
      deps.plugins?.forEach(plugin => {
        if (!store._plugins.has(plugin.name)) {
          store._plugins.set(plugin.name, plugin);
          plugin.install(app);
        }
      });

      logger.log(`Planner store created (time zone ${initialConfig.timeZone})`);
      return store;
    })
  );
}
