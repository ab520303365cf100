/**
 * codecs/windows_codec.ts
 *
 * Task Scheduler document set <-> StoreRecord[].
 *
 * The native store hands us one <Tasks> document holding every task of
 * our folder, each <Task> preceded by a `<!-- \folder\name -->` comment,
 * which is the shape `schtasks /query /xml ONE` prints.
 *
 * Unlike crontab text, a document that is not well-formed is rejected
 * as a whole (FormatError): there is no trustworthy partial reading of
 * broken XML. Well-formed tasks we cannot translate are kept as foreign
 * records and written back untouched.
 */

import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { CronEntry, ID_PATTERN } from '../core/entry';
import { FormatError, ValidationError } from '../core/errors';
import { IdentifierAllocator } from '../core/identifier';
import { scopedLogger } from '../core/logger';
import { EntryMetadata, FormatCodec, MetadataValue, StoreRecord } from '../core/types';
import { scanDocument } from './xml_scan';
import {
  CalendarTrigger,
  DAY_NAMES,
  DayRule,
  MONTH_NAMES,
  TimeSlot,
  WEEK_NAMES,
  formatDuration,
  formatStartBoundary,
  intervalToTriggers,
  parseDuration,
  parseStartBoundary,
  triggersToInterval
} from './windows_triggers';

const log = scopedLogger('codecs/windows_codec');

export const TASK_NAMESPACE = 'http://schemas.microsoft.com/windows/2004/02/mit/task';
export const DEFAULT_TASK_FOLDER = '\\crossched\\';

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-16"?>';

type XmlNode = Record<string, unknown>;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  // Every element becomes an array so single and repeated children read the same way
  isArray: (_name: string, _jpath: string, _isLeaf: boolean, isAttribute: boolean) => !isAttribute
});

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true
});

// ---------------------------------------------------------------------------
// Untyped XML tree helpers
// ---------------------------------------------------------------------------

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function elements(node: unknown, name: string): unknown[] {
  if (!isNode(node)) return [];
  const value = node[name];
  return Array.isArray(value) ? value : value === undefined ? [] : [value];
}

function first(node: unknown, name: string): unknown {
  return elements(node, name)[0];
}

function text(node: unknown): string | undefined {
  if (typeof node === 'string') return node;
  if (isNode(node) && typeof node['#text'] === 'string') return node['#text'];
  if (isNode(node)) return '';
  return undefined;
}

function childText(node: unknown, name: string): string | undefined {
  const child = first(node, name);
  return child === undefined ? undefined : text(child);
}

/** Names of the child elements present, e.g. the <Monday/> flags under <DaysOfWeek>. */
function childNames(node: unknown): string[] {
  return isNode(node) ? Object.keys(node).filter(k => !k.startsWith('@_') && k !== '#text') : [];
}

// ---------------------------------------------------------------------------
// <Task> -> entry fields
// ---------------------------------------------------------------------------

interface DecodedTask {
  name?: string;
  command: string;
  interval: string;
  metadata: EntryMetadata;
}

type Decoded = { ok: true; task: DecodedTask } | { ok: false; reason: string };

const CMD_SHELL = /^(?:cmd|cmd\.exe|%comspec%|.*\\cmd\.exe)$/i;

export function decodeCommand(command: string, args: string | undefined): string {
  if (CMD_SHELL.test(command) && args !== undefined && /^\/c /i.test(args)) {
    return args.slice(3);
  }
  const program = command.includes(' ') ? `"${command}"` : command;
  return args ? `${program} ${args}` : program;
}

function decodeMetadata(documentation: string | undefined): EntryMetadata {
  if (documentation === undefined || documentation === '') return {};
  try {
    const value: unknown = JSON.parse(documentation);
    if (isNode(value)) {
      const entries: [string, MetadataValue][] = [];
      for (const [key, v] of Object.entries(value)) {
        if (v !== null && typeof v !== 'string' && typeof v !== 'number' && typeof v !== 'boolean') {
          return { documentation };
        }
        entries.push([key, v]);
      }
      return Object.fromEntries(entries);
    }
  } catch (e) {
    log.debug({ error: e instanceof Error ? e.message : String(e) }, 'Documentation is not JSON metadata');
  }
  return { documentation };
}

function decodeRule(trigger: unknown): DayRule | null {
  const byDay = first(trigger, 'ScheduleByDay');
  const byWeek = first(trigger, 'ScheduleByWeek');
  const byMonth = first(trigger, 'ScheduleByMonth');
  const byMonthDow = first(trigger, 'ScheduleByMonthDayOfWeek');
  const present = [byDay, byWeek, byMonth, byMonthDow].filter(x => x !== undefined);
  if (present.length !== 1) return null;

  const indexes = (node: unknown, names: readonly string[], offset: number): number[] | null => {
    const out: number[] = [];
    for (const n of childNames(node)) {
      const idx = names.indexOf(n);
      if (idx === -1) return null;
      out.push(idx + offset);
    }
    return out.sort((a, b) => a - b);
  };

  if (byDay !== undefined) {
    return (childText(byDay, 'DaysInterval') ?? '1') === '1' ? { kind: 'byDay' } : null;
  }
  if (byWeek !== undefined) {
    if ((childText(byWeek, 'WeeksInterval') ?? '1') !== '1') return null;
    const daysOfWeek = indexes(first(byWeek, 'DaysOfWeek'), DAY_NAMES, 0);
    return daysOfWeek ? { kind: 'byWeek', daysOfWeek } : null;
  }
  if (byMonth !== undefined) {
    const days = elements(first(byMonth, 'DaysOfMonth'), 'Day').map(d => Number(text(d)));
    if (days.some(d => !Number.isInteger(d) || d < 1 || d > 31)) return null;
    const months = indexes(first(byMonth, 'Months'), MONTH_NAMES, 1);
    return months ? { kind: 'byMonth', daysOfMonth: Array.from(new Set(days)).sort((a, b) => a - b), months } : null;
  }

  const weeks = elements(first(byMonthDow, 'Weeks'), 'Week').map(w => text(w));
  if (!WEEK_NAMES.every(w => weeks.includes(w))) return null; // only "every week of the month" maps to cron
  const daysOfWeek = indexes(first(byMonthDow, 'DaysOfWeek'), DAY_NAMES, 0);
  const months = indexes(first(byMonthDow, 'Months'), MONTH_NAMES, 1);
  return daysOfWeek && months ? { kind: 'byMonthDayOfWeek', daysOfWeek, months } : null;
}

function decodeSlot(trigger: unknown): TimeSlot | null {
  const start = parseStartBoundary(childText(trigger, 'StartBoundary') ?? '');
  if (start === null) return null;

  const repetition = first(trigger, 'Repetition');
  if (repetition === undefined) return { start };

  const every = parseDuration(childText(repetition, 'Interval') ?? '');
  const span = parseDuration(childText(repetition, 'Duration') ?? '');
  if (every === null || span === null) return null; // no Duration means "indefinitely"
  return { start, repeat: { every, span } };
}

function decodeTask(taskXml: string): Decoded {
  const doc: unknown = parser.parse(taskXml);
  const task = first(doc, 'Task');

  const triggersNode = first(task, 'Triggers');
  const triggerKinds = childNames(triggersNode);
  if (triggerKinds.length === 0) return { ok: false, reason: 'task has no triggers' };
  if (triggerKinds.some(k => k !== 'CalendarTrigger')) {
    return { ok: false, reason: `unsupported trigger types: ${triggerKinds.join(', ')}` };
  }

  const triggers: CalendarTrigger[] = [];
  for (const t of elements(triggersNode, 'CalendarTrigger')) {
    if (childText(t, 'Enabled') === 'false' || first(t, 'EndBoundary') !== undefined) {
      return { ok: false, reason: 'trigger is disabled or bounded' };
    }
    const rule = decodeRule(t);
    const slot = decodeSlot(t);
    if (!rule || !slot) return { ok: false, reason: 'calendar trigger has no five-field equivalent' };
    triggers.push({ rule, slot });
  }

  const interval = triggersToInterval(triggers);
  if (interval === null) return { ok: false, reason: 'trigger set has no five-field equivalent' };

  const actions = first(task, 'Actions');
  const actionKinds = childNames(actions);
  const execs = elements(actions, 'Exec');
  if (actionKinds.length !== 1 || execs.length !== 1) {
    return { ok: false, reason: 'task must have exactly one Exec action' };
  }
  const program = childText(execs[0], 'Command') ?? '';
  if (program === '') return { ok: false, reason: 'Exec action has no command' };

  const registration = first(task, 'RegistrationInfo');
  const uri = childText(registration, 'URI');

  return {
    ok: true,
    task: {
      name: uri ? uri.slice(uri.lastIndexOf('\\') + 1) : undefined,
      command: decodeCommand(program, childText(execs[0], 'Arguments')),
      interval,
      metadata: decodeMetadata(childText(registration, 'Documentation'))
    }
  };
}

// ---------------------------------------------------------------------------
// entry -> <Task>
// ---------------------------------------------------------------------------

function flags(values: readonly number[], names: readonly string[], offset: number): XmlNode {
  const out: XmlNode = {};
  for (const v of values) out[names[v - offset]] = '';
  return out;
}

function encodeTrigger(trigger: CalendarTrigger): XmlNode {
  const node: XmlNode = { StartBoundary: formatStartBoundary(trigger.slot.start) };
  if (trigger.slot.repeat) {
    node.Repetition = {
      Interval: formatDuration(trigger.slot.repeat.every),
      Duration: formatDuration(trigger.slot.repeat.span),
      StopAtDurationEnd: 'false'
    };
  }
  const rule = trigger.rule;
  switch (rule.kind) {
    case 'byDay':
      node.ScheduleByDay = { DaysInterval: '1' };
      break;
    case 'byWeek':
      node.ScheduleByWeek = { DaysOfWeek: flags(rule.daysOfWeek, DAY_NAMES, 0), WeeksInterval: '1' };
      break;
    case 'byMonth':
      node.ScheduleByMonth = {
        DaysOfMonth: { Day: rule.daysOfMonth.map(String) },
        Months: flags(rule.months, MONTH_NAMES, 1)
      };
      break;
    case 'byMonthDayOfWeek':
      node.ScheduleByMonthDayOfWeek = {
        Weeks: { Week: [...WEEK_NAMES] },
        DaysOfWeek: flags(rule.daysOfWeek, DAY_NAMES, 0),
        Months: flags(rule.months, MONTH_NAMES, 1)
      };
      break;
  }
  return node;
}

// ---------------------------------------------------------------------------
// Codec
// ---------------------------------------------------------------------------

export interface WindowsCodecOptions {
  folder?: string;
}

export function normalizeFolder(folder: string): string {
  const trimmed = folder.replace(/^\\+|\\+$/g, '');
  return trimmed === '' ? '\\' : `\\${trimmed}\\`;
}

interface Candidate {
  raw: string;
  taskXml?: string;
  commentName?: string;
}

export class WindowsCodec implements FormatCodec {
  readonly platform = 'windows' as const;
  readonly folder: string;

  constructor(options: WindowsCodecOptions = {}) {
    this.folder = normalizeFolder(options.folder ?? DEFAULT_TASK_FOLDER);
  }

  parse(raw: string): StoreRecord[] {
    if (raw.trim() === '') return [];

    const valid = XMLValidator.validate(raw);
    if (valid !== true) {
      throw new FormatError(`Task document is not well-formed XML: ${valid.err.msg}`, {
        line: valid.err.line,
        col: valid.err.col
      });
    }

    const doc = scanDocument(raw);
    if (doc.rootName !== 'Tasks') {
      throw new FormatError(`Expected a <Tasks> document, found <${doc.rootName}>`, { root: doc.rootName });
    }

    // Attach each comment to the <Task> right after it
    const candidates: Candidate[] = [];
    let pending: { raw: string; start: number } | null = null;
    for (const chunk of doc.children) {
      if (chunk.kind === 'text' && chunk.raw.trim() === '') {
        if (pending) pending.raw += chunk.raw;
        continue;
      }
      if (chunk.kind === 'comment') {
        if (pending) candidates.push({ raw: pending.raw.slice(0, pending.start) });
        pending = { raw: chunk.raw, start: chunk.raw.length };
        continue;
      }
      if (chunk.kind === 'element' && chunk.name === 'Task') {
        const commentName = pending ? this.nameFromComment(pending.raw.slice(0, pending.start)) : undefined;
        candidates.push({ raw: (pending ? pending.raw : '') + chunk.raw, taskXml: chunk.raw, commentName });
        pending = null;
        continue;
      }
      if (pending) candidates.push({ raw: pending.raw.slice(0, pending.start) });
      pending = null;
      candidates.push({ raw: chunk.raw });
    }
    if (pending) candidates.push({ raw: pending.raw.slice(0, pending.start) });

    const decoded = candidates.map(c => (c.taskXml === undefined ? null : decodeTask(c.taskXml)));

    // Reserve every recoverable id before deriving any
    const allocator = new IdentifierAllocator();
    const duplicates = new Set<number>();
    const ids: (string | null)[] = decoded.map((d, i) => {
      if (!d || !d.ok) return null;
      const name = d.task.name ?? candidates[i].commentName;
      if (name === undefined || !ID_PATTERN.test(name)) return null;
      if (allocator.reserve(name)) return name;
      log.warn({ id: name }, 'Duplicate task id in folder, assigning a new one');
      duplicates.add(i);
      return null;
    });

    return candidates.map((candidate, i): StoreRecord => {
      const d = decoded[i];
      if (d === null) return { kind: 'foreign', raw: candidate.raw, reason: 'not a task definition' };
      if (!d.ok) {
        log.warn({ reason: d.reason }, 'Keeping untranslatable task as foreign');
        return { kind: 'foreign', raw: candidate.raw, reason: d.reason };
      }

      const recovered = ids[i];
      const id = recovered ?? allocator.derive(d.task.command, d.task.interval);
      // Re-emit verbatim only when the next parse is guaranteed to land on the same id
      const stable = recovered !== null
        || (!duplicates.has(i) && id === IdentifierAllocator.seed(d.task.command, d.task.interval));
      try {
        const entry = CronEntry.create(
          { id, command: d.task.command, interval: d.task.interval, metadata: d.task.metadata },
          'windows'
        );
        return stable
          ? { kind: 'managed', entry, source: { raw: candidate.raw, parsed: entry } }
          : { kind: 'managed', entry };
      } catch (e) {
        if (!(e instanceof ValidationError)) throw e;
        log.warn({ reason: e.message }, 'Keeping task with invalid fields as foreign');
        return { kind: 'foreign', raw: candidate.raw, reason: e.message };
      }
    });
  }

  serialize(records: readonly StoreRecord[]): string {
    const parts = [XML_DECLARATION, '<Tasks>'];
    for (const record of records) {
      if (record.kind === 'foreign') {
        parts.push(record.raw);
      } else if (record.source && record.source.parsed.equals(record.entry)) {
        parts.push(record.source.raw);
      } else {
        parts.push(this.renderTask(record.entry));
      }
    }
    parts.push('</Tasks>');
    return parts.join('\n') + '\n';
  }

  renderTask(entry: CronEntry): string {
    const uri = `${this.folder}${entry.id}`;
    const registration: XmlNode = { URI: uri };
    if (Object.keys(entry.metadata).length > 0) {
      registration.Documentation = JSON.stringify(entry.metadata);
    }

    const task = {
      Task: {
        '@_version': '1.2',
        '@_xmlns': TASK_NAMESPACE,
        RegistrationInfo: registration,
        Triggers: { CalendarTrigger: intervalToTriggers(entry.interval).map(encodeTrigger) },
        Settings: {
          MultipleInstancesPolicy: 'IgnoreNew',
          DisallowStartIfOnBatteries: 'false',
          StopIfGoingOnBatteries: 'false',
          StartWhenAvailable: 'false',
          Enabled: 'true'
        },
        Actions: {
          '@_Context': 'Author',
          Exec: { Command: 'cmd.exe', Arguments: `/c ${entry.command}` }
        }
      }
    };

    return `<!-- ${uri} -->\n${String(builder.build(task)).trim()}`;
  }

  private nameFromComment(comment: string): string | undefined {
    const m = /^<!--\s*(.*?)\s*-->$/s.exec(comment.trim());
    if (!m) return undefined;
    return m[1].slice(m[1].lastIndexOf('\\') + 1);
  }
}
