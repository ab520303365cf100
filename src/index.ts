/**
 * index.ts
 *
 * Public surface. createScheduler() wires the pieces in order:
 *   1. Resolve config (defaults, config/scheduler.json, env, overrides)
 *   2. Initialise the logger
 *   3. Pick the native store for the platform
 *   4. Wrap it in the platform backend and hand that to the facade
 */

import { loadSchedulerConfig, LoadConfigOptions } from './core/config';
import { initLogger, scopedLogger } from './core/logger';
import { createBackend } from './core/backend';
import { Scheduler } from './core/scheduler';
import { NativeStore, SchedulerConfig } from './core/types';
import { CrontabStore } from './stores/crontab_store';
import { FileStore } from './stores/file_store';
import { TaskSchedulerStore } from './stores/task_scheduler_store';

export function createStore(config: SchedulerConfig): NativeStore {
  if (config.platform === 'windows') {
    return new TaskSchedulerStore({ folder: config.taskFolder, timeoutMs: config.commandTimeoutMs });
  }
  if (config.crontabFile) {
    return new FileStore(config.crontabFile);
  }
  return new CrontabStore({ user: config.crontabUser, timeoutMs: config.commandTimeoutMs });
}

export function createScheduler(options: LoadConfigOptions = {}): Scheduler {
  const config = loadSchedulerConfig(options);
  initLogger(config);

  const store = createStore(config);
  scopedLogger('index').debug({ platform: config.platform, store: store.name }, 'Scheduler created');

  return new Scheduler(createBackend(config.platform, { store, folder: config.taskFolder }));
}

export { Scheduler } from './core/scheduler';
export { CronEntry } from './core/entry';
export { IdentifierAllocator } from './core/identifier';
export { normalizeInterval, isValidInterval, parseInterval } from './core/interval';
export { Backend, CodecBackend, UnixBackend, WindowsBackend, createBackend } from './core/backend';
export { loadSchedulerConfig, LoadConfigOptions } from './core/config';
export { initLogger } from './core/logger';
export {
  SchedulerError,
  ValidationError,
  NotFoundError,
  FormatError,
  StoreIOError
} from './core/errors';
export { UnixCodec } from './codecs/unix_codec';
export { WindowsCodec } from './codecs/windows_codec';
export { CrontabStore } from './stores/crontab_store';
export { FileStore } from './stores/file_store';
export { TaskSchedulerStore } from './stores/task_scheduler_store';
export * from './core/types';
