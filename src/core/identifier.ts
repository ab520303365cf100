/**
 * core/identifier.ts
 *
 * Assigns ids to entries that arrive without one.
 *
 * Parsed entries get a content-derived id (hash of command + interval)
 * so re-parsing an unchanged store yields the same ids. Collisions,
 * e.g. two identical untagged lines, are disambiguated with a counter in
 * load order. Entries created through the API get a random id instead.
 *
 * An allocator lives for one load: codecs must reserve() every id read
 * from a tag before they derive() any, or derived ids would depend on
 * where the tagged lines sit in the file.
 */

import { createHash, randomBytes } from 'crypto';
import { isValidInterval, normalizeInterval } from './interval';

const MAX_SUFFIX = 1000;

export class IdentifierAllocator {
  private readonly known = new Set<string>();

  constructor(existing: Iterable<string> = []) {
    for (const id of existing) this.known.add(id);
  }

  /** Registers an id read from the store. False if it was already taken. */
  reserve(id: string): boolean {
    if (this.known.has(id)) return false;
    this.known.add(id);
    return true;
  }

  has(id: string): boolean {
    return this.known.has(id);
  }

  /** Stable id for a parsed entry. Never throws. */
  derive(command: string, interval: string): string {
    const seed = IdentifierAllocator.seed(command, interval);
    if (this.reserve(seed)) return seed;

    for (let n = 1; n <= MAX_SUFFIX; n++) {
      const candidate = `${seed}-${n}`;
      if (this.reserve(candidate)) return candidate;
    }
    return this.fresh();
  }

  /** Random unused id, for entries created by add() and duplicate(). */
  fresh(): string {
    let id = randomBytes(6).toString('hex');
    while (!this.reserve(id)) {
      id = randomBytes(6).toString('hex');
    }
    return id;
  }

  static seed(command: string, interval: string): string {
    // seeds for unparsable intervals only need to be deterministic
    const normalized = isValidInterval(interval) ? normalizeInterval(interval) : interval.trim();
    const digest = createHash('sha256')
      .update(`${command.trim()}\n${normalized}`)
      .digest('hex');
    return `c${digest.slice(0, 10)}`;
  }
}
