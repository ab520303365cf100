import { StoreIOError } from '../../core/errors';
import { NativeStore } from '../../core/types';

/** In-process stand-in for crontab / Task Scheduler. */
export class MemoryStore implements NativeStore {
  readonly name = 'memory';
  reads = 0;
  writes = 0;
  failWrites = false;

  constructor(public content = '') {}

  readRaw(): string {
    this.reads++;
    return this.content;
  }

  writeRaw(raw: string): void {
    if (this.failWrites) throw new StoreIOError(this.name, 'write', 'disk full');
    this.writes++;
    this.content = raw;
  }
}
