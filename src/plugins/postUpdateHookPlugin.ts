/**
 * Post-update hook plugin
 *
 * Runs a configured command (for example a calendar sync tool) once local
 * edits have been quiet for a while. Every new edit restarts the delay.
 */
import { spawn } from 'node:child_process';
import { ChangeSource, PlannerConfig, PlannerPlugin } from '../types';
import { logger } from '../utils/logger';

/**
 * Runs the command, resolving with its exit code
 */
export type CommandRunner = (command: string, args: string[]) => Promise<number | null>;

export interface PostUpdateHookPluginConfig {
  // override hooks.postUpdate and hooks.postUpdateDelayMs, which are
  // otherwise read again on every config change
  command?: string[] | null;
  delayMs?: number;
  runner?: CommandRunner;
}

export interface PostUpdateHookService {
  isPending: () => boolean;
  // run a pending hook immediately
  flush: () => Promise<number | null>;
  cancel: () => void;
}

export const POST_UPDATE_HOOK_PLUGIN = 'post-update-hook';

const LOCAL_EDITS: ReadonlySet<ChangeSource> = new Set(['commit', 'undo', 'redo']);

export const spawnCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: 'ignore' });
    child.once('error', reject);
    child.once('exit', code => resolve(code));
  });

export function createPostUpdateHookPlugin(
  config: PostUpdateHookPluginConfig = {}
): PlannerPlugin<PostUpdateHookService> {
  const runner = config.runner ?? spawnCommand;
  let command: string[] | null = null;
  let delayMs = 0;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let unsubscribes: Array<() => void> = [];

  const cancel = (): void => {
    if (timer) {
      clearTimeout(timer);
      timer = null;
    }
  };

  const applyHooks = (hooks: PlannerConfig['hooks']): void => {
    command = config.command === undefined ? hooks.postUpdate : config.command;
    delayMs = config.delayMs ?? hooks.postUpdateDelayMs;
    // a pending run without a command left has nothing to run
    if (!command) cancel();
  };

  const execute = async (): Promise<number | null> => {
    const [program, ...args] = command ?? [];
    if (!program) return null;

    try {
      const code = await runner(program, args);
      if (code === 0) {
        logger.debug(`Post-update hook ${program} finished`);
      } else {
        logger.warn(`Post-update hook ${program} exited with code ${String(code)}`);
      }
      return code;
    } catch (error) {
      logger.error(`Post-update hook ${program} failed to start`, error);
      return null;
    }
  };

  const schedule = (): void => {
    if (!command) return;
    cancel();
    timer = setTimeout(() => {
      timer = null;
      void execute();
    }, delayMs);
  };

  const service: PostUpdateHookService = {
    isPending: () => timer !== null,
    flush: () => {
      if (!timer) return Promise.resolve(null);
      cancel();
      return execute();
    },
    cancel,
  };

  return {
    name: POST_UPDATE_HOOK_PLUGIN,
    install: app => {
      applyHooks(app.getConfig().hooks);

      unsubscribes = [
        app.onModelChange((_changes, source) => {
          if (LOCAL_EDITS.has(source)) schedule();
        }),
        // a pending run keeps its timer; the next edit uses the new delay
        app.onConfigChange(next => applyHooks(next.hooks)),
      ];
      logger.log(
        command
          ? `Post-update hook installed: ${command.join(' ')} after ${delayMs}ms`
          : 'Post-update hook installed without a command'
      );
    },
    uninstall: () => {
      for (const unsubscribe of unsubscribes.splice(0)) unsubscribe();
      cancel();
    },
    api: service,
  };
}
