/**
 * core/backend.ts
 *
 * A backend pairs one codec with one native store. The facade only ever
 * sees load() and save(); which scheduler sits underneath is decided once,
 * at construction.
 */

import { FormatCodec, NativeStore, Platform, StoreRecord } from './types';
import { scopedLogger } from './logger';
import { UnixCodec } from '../codecs/unix_codec';
import { WindowsCodec } from '../codecs/windows_codec';
import { CrontabStore } from '../stores/crontab_store';
import { TaskSchedulerStore } from '../stores/task_scheduler_store';

const log = scopedLogger('core/backend');

export interface Backend {
  readonly platform: Platform;
  load(): StoreRecord[];
  save(records: readonly StoreRecord[]): void;
}

export class CodecBackend implements Backend {
  constructor(
    protected readonly codec: FormatCodec,
    protected readonly store: NativeStore
  ) {}

  get platform(): Platform {
    return this.codec.platform;
  }

  load(): StoreRecord[] {
    const raw = this.store.readRaw();
    const records = this.codec.parse(raw);
    log.debug(
      { store: this.store.name, bytes: raw.length, records: records.length },
      'Loaded native store'
    );
    return records;
  }

  save(records: readonly StoreRecord[]): void {
    const raw = this.codec.serialize(records);
    this.store.writeRaw(raw);
    log.debug(
      { store: this.store.name, bytes: raw.length, records: records.length },
      'Saved native store'
    );
  }
}

export class UnixBackend extends CodecBackend {
  constructor(store: NativeStore = new CrontabStore()) {
    super(new UnixCodec(), store);
  }
}

export class WindowsBackend extends CodecBackend {
  /** `folder` must match the folder the store manages; it names tasks in the document. */
  constructor(store?: NativeStore, options: { folder?: string } = {}) {
    super(
      new WindowsCodec({ folder: options.folder }),
      store ?? new TaskSchedulerStore({ folder: options.folder })
    );
  }
}

export interface BackendOptions {
  store?: NativeStore;
  folder?: string;          // Windows only
}

export function createBackend(platform: Platform, options: BackendOptions = {}): Backend {
  switch (platform) {
    case 'unix':
      return new UnixBackend(options.store);
    case 'windows':
      return new WindowsBackend(options.store, { folder: options.folder });
  }
}
