/**
 * core/types.ts
 *
 * Single source of truth for every shared type in the project.
 * All modules import from here. Nothing defines its own DTOs.
 */

import { CronEntry } from './entry';

// ---------------------------------------------------------------------------
// Platform & logging
// ---------------------------------------------------------------------------

export type Platform = 'unix' | 'windows';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

// ---------------------------------------------------------------------------
// Entry model
// ---------------------------------------------------------------------------

export type MetadataValue = string | number | boolean | null;

export type EntryMetadata = Record<string, MetadataValue>;

/** Structural form of a CronEntry, as exchanged by toDict()/fromDict(). */
export interface CronEntryDict {
  id: string;
  command: string;
  interval: string;
  metadata: EntryMetadata;
}

/** Fields edit() may replace in one save. */
export interface EntryPatch {
  command?: string;
  interval?: string;
  metadata?: EntryMetadata;
}

// ---------------------------------------------------------------------------
// Store records: the tagged variant every codec emits
// ---------------------------------------------------------------------------

/** The native text a managed record was parsed from, plus the entry as parsed. */
export interface RecordSource {
  raw: string;
  parsed: CronEntry;
}

export interface ManagedRecord {
  kind: 'managed';
  entry: CronEntry;
  source?: RecordSource;         // absent for records created in memory
}

/** A native record not attributable to us. Re-emitted byte-for-byte. */
export interface ForeignRecord {
  kind: 'foreign';
  raw: string;
  reason: string;
}

export type StoreRecord = ManagedRecord | ForeignRecord;

export function isForeign(record: StoreRecord): record is ForeignRecord {
  return record.kind === 'foreign';
}

export function managedEntries(records: readonly StoreRecord[]): CronEntry[] {
  const entries: CronEntry[] = [];
  for (const record of records) {
    if (record.kind === 'managed') entries.push(record.entry);
  }
  return entries;
}

// ---------------------------------------------------------------------------
// Collaborator contracts
// ---------------------------------------------------------------------------

/** The platform scheduler's persisted state as one opaque text blob. */
export interface NativeStore {
  readonly name: string;
  readRaw(): string;
  /** All-or-nothing: on failure the previous content stays in place. */
  writeRaw(raw: string): void;
}

export interface FormatCodec {
  readonly platform: Platform;
  parse(raw: string): StoreRecord[];
  serialize(records: readonly StoreRecord[]): string;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface SchedulerConfig {
  platform: Platform;
  logLevel: LogLevel;
  taskFolder: string;                    // Task Scheduler folder, e.g. \crossched\
  crontabFile?: string;                  // manage a cron.d-style file instead of the user crontab
  crontabUser?: string;                  // crontab -u <user>
  commandTimeoutMs: number;              // per native command (crontab, powershell)
}
