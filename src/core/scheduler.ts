/**
 * core/scheduler.ts
 *
 * The public API. Every operation is one load -> transform -> save cycle
 * against the backend; no state is kept between calls, so what a query
 * returns is always what the native store holds right now.
 *
 * Inputs are validated before the store is touched. Operations whose
 * result equals what was loaded skip the save.
 */

import { Backend } from './backend';
import {
  CronEntry,
  validateCommand,
  validateInterval,
  validateMetadata
} from './entry';
import { NotFoundError, ValidationError } from './errors';
import { IdentifierAllocator } from './identifier';
import { scopedLogger } from './logger';
import {
  EntryMetadata,
  EntryPatch,
  ForeignRecord,
  ManagedRecord,
  Platform,
  StoreRecord,
  isForeign,
  managedEntries
} from './types';

const log = scopedLogger('core/scheduler');

function sameRecords(before: readonly StoreRecord[], after: readonly StoreRecord[]): boolean {
  if (before.length !== after.length) return false;
  return before.every((a, i) => {
    const b = after[i];
    if (a === b) return true;
    return a.kind === 'managed' && b.kind === 'managed' && a.entry.equals(b.entry);
  });
}

export class Scheduler {
  constructor(private readonly backend: Backend) {}

  get platform(): Platform {
    return this.backend.platform;
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  /** Managed entries in store order. */
  getAll(): CronEntry[] {
    return managedEntries(this.backend.load());
  }

  getById(id: string): CronEntry | undefined {
    return this.getAll().find(entry => entry.id === id);
  }

  exists(id: string): boolean {
    return this.getById(id) !== undefined;
  }

  getByCommand(command: string): CronEntry[] {
    const wanted = command.trim();
    return this.getAll().filter(entry => entry.command === wanted);
  }

  /** Compared after normalization; a malformed interval matches nothing. */
  getByInterval(interval: string): CronEntry[] {
    const wanted = this.storedInterval(interval);
    if (wanted === null) return [];
    return this.getAll().filter(entry => entry.interval === wanted);
  }

  count(): number {
    return this.getAll().length;
  }

  /** Native records this library does not manage, in store order. */
  getForeign(): ForeignRecord[] {
    return this.backend.load().filter(isForeign);
  }

  /** True when `interval` is well formed and this platform can schedule it. */
  isValidInterval(interval: string): boolean {
    return this.storedInterval(interval) !== null;
  }

  // -------------------------------------------------------------------------
  // Mutations
  // -------------------------------------------------------------------------

  add(command: string, interval: string, metadata: EntryMetadata = {}): CronEntry {
    const fields = {
      command: validateCommand(command, this.platform),
      interval: validateInterval(interval, this.platform),
      metadata: validateMetadata(metadata)
    };

    const records = this.backend.load();
    const allocator = new IdentifierAllocator(managedEntries(records).map(e => e.id));
    const entry = CronEntry.create({ id: allocator.fresh(), ...fields }, this.platform);

    this.commit(records, [...records, { kind: 'managed', entry }]);
    log.info({ id: entry.id, interval: entry.interval }, 'Entry added');
    return entry;
  }

  updateCommand(id: string, command: string): CronEntry {
    const checked = validateCommand(command, this.platform);
    return this.replace(id, entry => entry.withCommand(checked), 'Command updated');
  }

  updateInterval(id: string, interval: string): CronEntry {
    const checked = validateInterval(interval, this.platform);
    return this.replace(id, entry => entry.withInterval(checked), 'Interval updated');
  }

  /** Replaces the whole metadata map. */
  updateMetadata(id: string, metadata: EntryMetadata): CronEntry {
    const checked = validateMetadata(metadata);
    return this.replace(id, entry => entry.withMetadata(checked), 'Metadata updated');
  }

  /** Applies several field changes in a single save. Absent fields are left alone. */
  edit(id: string, patch: EntryPatch): CronEntry {
    const command = patch.command === undefined ? undefined : validateCommand(patch.command, this.platform);
    const interval = patch.interval === undefined ? undefined : validateInterval(patch.interval, this.platform);
    const metadata = patch.metadata === undefined ? undefined : validateMetadata(patch.metadata);

    return this.replace(id, entry => {
      let next = entry;
      if (command !== undefined) next = next.withCommand(command);
      if (interval !== undefined) next = next.withInterval(interval);
      if (metadata !== undefined) next = next.withMetadata(metadata);
      return next;
    }, 'Entry edited');
  }

  /** A copy of `id` under a new id and interval. The source is not modified. */
  duplicate(id: string, interval: string): CronEntry {
    const checked = validateInterval(interval, this.platform);

    const records = this.backend.load();
    const entries = managedEntries(records);
    const source = entries.find(entry => entry.id === id);
    if (!source) throw new NotFoundError(id);

    const allocator = new IdentifierAllocator(entries.map(e => e.id));
    const copy = source.withId(allocator.fresh()).withInterval(checked);

    this.commit(records, [...records, { kind: 'managed', entry: copy }]);
    log.info({ source: id, id: copy.id, interval: copy.interval }, 'Entry duplicated');
    return copy;
  }

  /** Number of entries removed; zero is not an error. */
  delete(id: string): number {
    return this.removeWhere(entry => entry.id === id, { id });
  }

  deleteByCommand(command: string): number {
    const wanted = command.trim();
    return this.removeWhere(entry => entry.command === wanted, { command: wanted });
  }

  deleteByInterval(interval: string): number {
    const wanted = this.storedInterval(interval);
    if (wanted === null) return 0;
    return this.removeWhere(entry => entry.interval === wanted, { interval: wanted });
  }

  /** Removes every managed entry. Foreign records stay. */
  clearAll(): number {
    return this.removeWhere(() => true, { all: true });
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /** The interval as this platform stores it, or null when it cannot hold it. */
  private storedInterval(interval: string): string | null {
    try {
      return validateInterval(interval, this.platform);
    } catch (e) {
      if (e instanceof ValidationError) return null;
      throw e;
    }
  }

  private replace(id: string, update: (entry: CronEntry) => CronEntry, message: string): CronEntry {
    const records = this.backend.load();
    const index = records.findIndex(record => record.kind === 'managed' && record.entry.id === id);
    const target = records[index];
    if (target === undefined || target.kind !== 'managed') throw new NotFoundError(id);

    const updated = update(target.entry);
    const replacement: ManagedRecord = { ...target, entry: updated };
    const next = [...records];
    next[index] = replacement;

    this.commit(records, next);
    log.info({ id }, message);
    return updated;
  }

  private removeWhere(match: (entry: CronEntry) => boolean, context: Record<string, unknown>): number {
    const records = this.backend.load();
    const kept = records.filter(record => record.kind !== 'managed' || !match(record.entry));
    const removed = records.length - kept.length;

    if (removed > 0) {
      this.commit(records, kept);
      log.info({ ...context, removed }, 'Entries deleted');
    }
    return removed;
  }

  private commit(before: readonly StoreRecord[], after: readonly StoreRecord[]): void {
    if (sameRecords(before, after)) {
      log.debug({ records: after.length }, 'Nothing changed, skipping save');
      return;
    }
    this.backend.save(after);
  }
}
