/**
 * codecs/unix_codec.ts
 *
 * crontab text <-> StoreRecord[].
 *
 * Entries we write carry a tag comment on the line above them:
 *
 *     # crossched:id=3f9a0c1b22de meta={"owner":"ops"}
 *     0 2 * * * /usr/local/bin/backup.sh
 *
 * Untagged schedule lines are adopted with a content-derived id and
 * written back untouched until they change. Everything else (comments,
 * blank lines, environment assignments, @nicknames, malformed lines) is
 * kept as a foreign record and re-emitted byte-for-byte.
 */

import { CronEntry, ID_PATTERN } from '../core/entry';
import { ValidationError } from '../core/errors';
import { IdentifierAllocator } from '../core/identifier';
import { normalizeInterval } from '../core/interval';
import { scopedLogger } from '../core/logger';
import { EntryMetadata, FormatCodec, MetadataValue, StoreRecord } from '../core/types';

const log = scopedLogger('codecs/unix_codec');

export const TAG_PREFIX = '# crossched:';

const TAG_LINE = /^#\s*crossched:id=(\S*)(?:\s+meta=(.*?))?\s*$/;
const SCHEDULE_LINE = /^\s*(\S+)\s+(\S+)\s+(\S+)\s+(\S+)\s+(\S+)\s+(.*?)\s*$/;
const ENV_LINE = /^\s*[A-Za-z_][A-Za-z0-9_]*\s*=/;

// ---------------------------------------------------------------------------
// Line decoding
// ---------------------------------------------------------------------------

type Tag = { ok: true; id: string; metadata: EntryMetadata } | { ok: false; reason: string };

type Schedule = { ok: true; interval: string; command: string } | { ok: false; reason: string };

function decodeMetadata(json: string | undefined): EntryMetadata | null {
  if (json === undefined || json === '') return {};
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch {
    return null;
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null;

  const entries: [string, MetadataValue][] = [];
  for (const [key, v] of Object.entries(value)) {
    if (v !== null && typeof v !== 'string' && typeof v !== 'number' && typeof v !== 'boolean') return null;
    entries.push([key, v]);
  }
  return Object.fromEntries(entries);
}

/** null when the line is not a tag at all. */
function decodeTag(line: string): Tag | null {
  const m = TAG_LINE.exec(line);
  if (!m) return null;
  const [, id, json] = m;
  if (!ID_PATTERN.test(id)) return { ok: false, reason: `malformed tag id "${id}"` };
  const metadata = decodeMetadata(json);
  if (metadata === null) return { ok: false, reason: 'malformed tag metadata' };
  return { ok: true, id, metadata };
}

/** `\%` is a literal percent; a bare `%` starts cron's stdin section, which we cannot model. */
export function unescapeCommand(raw: string): string | null {
  let out = '';
  for (let i = 0; i < raw.length; i++) {
    const c = raw[i];
    if (c === '\\' && raw[i + 1] === '%') {
      out += '%';
      i++;
    } else if (c === '%') {
      return null;
    } else {
      out += c;
    }
  }
  return out;
}

export function escapeCommand(command: string): string {
  return command.replace(/%/g, '\\%');
}

function decodeSchedule(line: string): Schedule {
  const trimmed = line.trim();
  if (trimmed === '') return { ok: false, reason: 'blank line' };
  if (trimmed.startsWith('#')) return { ok: false, reason: 'comment' };
  if (trimmed.startsWith('@')) return { ok: false, reason: 'nickname schedule' };
  if (ENV_LINE.test(trimmed)) return { ok: false, reason: 'environment assignment' };

  const m = SCHEDULE_LINE.exec(line);
  if (!m || m[6] === '') return { ok: false, reason: 'expected five schedule fields and a command' };

  let interval: string;
  try {
    interval = normalizeInterval(m.slice(1, 6).join(' '));
  } catch (e) {
    if (e instanceof ValidationError) return { ok: false, reason: e.message };
    throw e;
  }

  const command = unescapeCommand(m[6]);
  if (command === null) return { ok: false, reason: 'command uses an unescaped % (stdin section)' };
  return { ok: true, interval, command };
}

/** Degraded input we did not write ourselves deserves a warning; plain comments do not. */
function isNoteworthy(reason: string): boolean {
  return reason !== 'blank line' && reason !== 'comment' && reason !== 'environment assignment';
}

// ---------------------------------------------------------------------------
// Codec
// ---------------------------------------------------------------------------

interface Candidate {
  raw: string;
  tag?: { id: string; metadata: EntryMetadata };
  interval: string;
  command: string;
}

export class UnixCodec implements FormatCodec {
  readonly platform = 'unix' as const;

  parse(raw: string): StoreRecord[] {
    if (raw === '') return [];
    const lines = raw.split('\n');
    if (lines[lines.length - 1] === '') lines.pop();

    const items: (Candidate | StoreRecord)[] = [];
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];
      const tag = decodeTag(line);

      if (tag !== null) {
        const next = i + 1 < lines.length ? decodeSchedule(lines[i + 1]) : null;
        if (tag.ok && next !== null && next.ok) {
          items.push({ raw: `${line}\n${lines[i + 1]}`, tag, interval: next.interval, command: next.command });
          i++;
        } else {
          const reason = tag.ok ? 'tag without a schedule line' : tag.reason;
          log.warn({ line: i + 1, reason }, 'Keeping unusable tag line as foreign');
          items.push({ kind: 'foreign', raw: line, reason });
        }
        continue;
      }

      const schedule = decodeSchedule(line);
      if (schedule.ok) {
        items.push({ raw: line, interval: schedule.interval, command: schedule.command });
      } else {
        if (isNoteworthy(schedule.reason)) {
          log.warn({ line: i + 1, reason: schedule.reason }, 'Keeping unparsable crontab line as foreign');
        }
        items.push({ kind: 'foreign', raw: line, reason: schedule.reason });
      }
    }

    // Reserve every tagged id before deriving any
    const allocator = new IdentifierAllocator();
    const recovered = items.map(item => {
      if ('kind' in item || !item.tag) return null;
      if (allocator.reserve(item.tag.id)) return item.tag.id;
      log.warn({ id: item.tag.id }, 'Duplicate crontab tag, assigning a new id');
      return null;
    });

    return items.map((item, i): StoreRecord => {
      if ('kind' in item) return item;

      const tagId = recovered[i];
      const id = tagId ?? allocator.derive(item.command, item.interval);
      // Re-emit verbatim only when the next parse is guaranteed to land on the same id
      const stable = tagId !== null || (!item.tag && id === IdentifierAllocator.seed(item.command, item.interval));

      try {
        const entry = CronEntry.create(
          { id, command: item.command, interval: item.interval, metadata: item.tag?.metadata },
          'unix'
        );
        return stable
          ? { kind: 'managed', entry, source: { raw: item.raw, parsed: entry } }
          : { kind: 'managed', entry };
      } catch (e) {
        if (!(e instanceof ValidationError)) throw e;
        log.warn({ reason: e.message }, 'Keeping crontab entry with invalid fields as foreign');
        return { kind: 'foreign', raw: item.raw, reason: e.message };
      }
    });
  }

  serialize(records: readonly StoreRecord[]): string {
    let out = '';
    for (const record of records) {
      if (record.kind === 'foreign') {
        out += `${record.raw}\n`;
      } else if (record.source && record.source.parsed.equals(record.entry)) {
        out += `${record.source.raw}\n`;
      } else {
        out += `${UnixCodec.renderEntry(record.entry)}\n`;
      }
    }
    return out;
  }

  static renderTag(entry: CronEntry): string {
    const meta = Object.keys(entry.metadata).length > 0 ? ` meta=${JSON.stringify(entry.metadata)}` : '';
    return `${TAG_PREFIX}id=${entry.id}${meta}`;
  }

  static renderEntry(entry: CronEntry): string {
    return `${UnixCodec.renderTag(entry)}\n${entry.interval} ${escapeCommand(entry.command)}`;
  }
}
