/**
 * core/entry.ts
 *
 * CronEntry, the unit of scheduling. An immutable value object:
 * every constructor path validates, and the with*() helpers return
 * validated copies instead of mutating.
 */

import Ajv from 'ajv';
import { CronEntryDict, EntryMetadata, MetadataValue, Platform } from './types';
import { ValidationError } from './errors';
import { normalizeInterval } from './interval';
import { windowsInterval } from '../codecs/windows_triggers';

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

export const ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

interface EntryFields {
  id: string;
  command: string;
  interval: string;
  metadata?: Record<string, MetadataValue>;
}

const validateDict = ajv.compile<EntryFields>({
  type: 'object',
  properties: {
    id:       { type: 'string' },
    command:  { type: 'string' },
    interval: { type: 'string' },
    metadata: {
      type: 'object',
      additionalProperties: { type: ['string', 'number', 'boolean', 'null'] }
    }
  },
  required: ['id', 'command', 'interval']
});

// ---------------------------------------------------------------------------
// Field rules
// ---------------------------------------------------------------------------

export function validateId(id: string): string {
  if (!ID_PATTERN.test(id)) {
    throw new ValidationError(`Invalid entry id "${id}"`, { id });
  }
  return id;
}

/** Returns the trimmed logical command; native escaping happens in the codecs. */
export function validateCommand(command: string, platform: Platform): string {
  const trimmed = command.trim();
  if (trimmed === '') {
    throw new ValidationError('Command must not be empty', { command });
  }
  // Both native formats are record-per-line at some layer
  if (/[\r\n\0]/.test(command)) {
    throw new ValidationError(`Command contains a line break or NUL, which ${platform} cannot store`, { command });
  }
  return trimmed;
}

/**
 * Normalizes the interval and checks the platform can represent it. On
 * windows the result is the spelling Task Scheduler reads back.
 */
export function validateInterval(interval: string, platform: Platform): string {
  const normalized = normalizeInterval(interval);
  return platform === 'windows' ? windowsInterval(normalized) : normalized;
}

export function validateMetadata(metadata: Record<string, MetadataValue>): EntryMetadata {
  const entries = Object.entries(metadata);
  for (const [key, value] of entries) {
    if (typeof value === 'number' && !Number.isFinite(value)) {
      throw new ValidationError(`Metadata "${key}" must be a finite number`, { key });
    }
  }
  // fromEntries defines own keys, so "__proto__" stays an ordinary key
  return Object.freeze(Object.fromEntries(entries));
}

// ---------------------------------------------------------------------------
// CronEntry
// ---------------------------------------------------------------------------

export class CronEntry {
  private constructor(
    readonly id: string,
    readonly command: string,
    readonly interval: string,
    readonly metadata: Readonly<EntryMetadata>,
    readonly platform: Platform
  ) {}

  static create(fields: EntryFields, platform: Platform): CronEntry {
    return new CronEntry(
      validateId(fields.id),
      validateCommand(fields.command, platform),
      validateInterval(fields.interval, platform),
      validateMetadata(fields.metadata ?? {}),
      platform
    );
  }

  /** Inverse of toDict(). Missing metadata defaults to {}. */
  static fromDict(value: unknown, platform: Platform = 'unix'): CronEntry {
    if (!validateDict(value)) {
      throw new ValidationError('Malformed entry dict', { violations: validateDict.errors ?? [] });
    }
    return CronEntry.create(value, platform);
  }

  toDict(): CronEntryDict {
    return {
      id: this.id,
      command: this.command,
      interval: this.interval,
      metadata: { ...this.metadata }
    };
  }

  withId(id: string): CronEntry {
    return new CronEntry(validateId(id), this.command, this.interval, this.metadata, this.platform);
  }

  withCommand(command: string): CronEntry {
    return new CronEntry(this.id, validateCommand(command, this.platform), this.interval, this.metadata, this.platform);
  }

  withInterval(interval: string): CronEntry {
    return new CronEntry(this.id, this.command, validateInterval(interval, this.platform), this.metadata, this.platform);
  }

  withMetadata(metadata: Record<string, MetadataValue>): CronEntry {
    return new CronEntry(this.id, this.command, this.interval, validateMetadata(metadata), this.platform);
  }

  /** Entries are looked up by id. */
  sameId(other: CronEntry): boolean {
    return this.id === other.id;
  }

  /** Field-by-field comparison; metadata key order is irrelevant. */
  equals(other: CronEntry): boolean {
    if (this.id !== other.id || this.command !== other.command || this.interval !== other.interval) {
      return false;
    }
    const keys = Object.keys(this.metadata);
    if (keys.length !== Object.keys(other.metadata).length) return false;
    return keys.every(k => Object.prototype.hasOwnProperty.call(other.metadata, k) && other.metadata[k] === this.metadata[k]);
  }
}
