/**
 * codecs/windows_triggers.ts
 *
 * Translation between a normalized five-field interval and the
 * CalendarTrigger set Task Scheduler understands.
 *
 * A cron schedule is "day rule × time of day". Day rules map onto the
 * four ScheduleBy* elements; times of day map onto a start time plus an
 * optional Repetition. When cron runs on days matching either day field
 * and both are restricted, one rule is emitted for each side. Days that
 * must match both restricted fields have no Task Scheduler equivalent.
 *
 * The inverse only accepts trigger sets this module could have produced
 * (up to regrouping); anything else is reported as untranslatable.
 */

import { ValidationError } from '../core/errors';
import {
  FIELD_SPECS,
  ParsedInterval,
  dayJoin,
  hasStarForm,
  isFullField,
  parseInterval,
  renderInterval
} from '../core/interval';

/** Task Scheduler refuses definitions with more triggers than this. */
export const MAX_TRIGGERS = 48;

const MINUTES_PER_DAY = 24 * 60;

export const DAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

export const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December'
];

export const WEEK_NAMES = ['1', '2', '3', '4', 'Last'];

// ---------------------------------------------------------------------------
// Structured recurrence
// ---------------------------------------------------------------------------

export type DayRule =
  | { kind: 'byDay' }
  | { kind: 'byWeek'; daysOfWeek: number[] }
  | { kind: 'byMonth'; daysOfMonth: number[]; months: number[] }
  | { kind: 'byMonthDayOfWeek'; daysOfWeek: number[]; months: number[] };

/** A start time (minute of day), optionally repeated every `every` minutes for `span` minutes. */
export interface TimeSlot {
  start: number;
  repeat?: { every: number; span: number };
}

export interface CalendarTrigger {
  rule: DayRule;
  slot: TimeSlot;
}

// ---------------------------------------------------------------------------
// Forward: interval → triggers
// ---------------------------------------------------------------------------

function arithmeticStep(values: readonly number[]): number | null {
  if (values.length < 2) return null;
  const step = values[1] - values[0];
  for (let i = 2; i < values.length; i++) {
    if (values[i] - values[i - 1] !== step) return null;
  }
  return step;
}

function progression(start: number, values: readonly number[]): TimeSlot {
  const step = arithmeticStep(values);
  if (step === null) return { start };
  return { start, repeat: { every: step, span: step * (values.length - 1) } };
}

export function timeSlots(hours: readonly number[], minutes: readonly number[]): TimeSlot[] {
  const times: number[] = [];
  for (const h of hours) {
    for (const m of minutes) times.push(h * 60 + m);
  }

  if (times.length === 1 || arithmeticStep(times) !== null) {
    return [progression(times[0], times)];
  }

  // One trigger per hour, repeating across the minutes when they are evenly spaced
  const perHour: TimeSlot[] = [];
  const minuteStep = arithmeticStep(minutes);
  for (const h of hours) {
    if (minuteStep !== null) {
      perHour.push(progression(h * 60 + minutes[0], minutes));
    } else {
      for (const m of minutes) perHour.push({ start: h * 60 + m });
    }
  }

  // One trigger per minute value, repeating across evenly spaced hours
  if (hours.length > 1 && arithmeticStep(hours) !== null && minutes.length < perHour.length) {
    return minutes.map(m => progression(hours[0] * 60 + m, hours.map(h => h * 60 + m)));
  }
  return perHour;
}

function range(min: number, max: number): number[] {
  const out: number[] = [];
  for (let v = min; v <= max; v++) out.push(v);
  return out;
}

export function dayRules(parsed: ParsedInterval): DayRule[] {
  const [, , domSpec, monthSpec, dowSpec] = FIELD_SPECS;
  const domFull = isFullField(parsed.dayOfMonth, domSpec);
  const dowFull = isFullField(parsed.dayOfWeek, dowSpec);
  const monthFull = isFullField(parsed.month, monthSpec);
  const months = [...parsed.month];

  let useDom = !domFull;
  let useDow = !dowFull;
  if (dayJoin(parsed) === 'either') {
    // A full field on either side admits every day
    if (domFull || dowFull) useDom = useDow = false;
  } else if (useDom && useDow) {
    const interval = renderInterval(parsed);
    throw new ValidationError(
      `Interval "${interval}" runs only on days matching both day-of-month and day-of-week, which Task Scheduler cannot express`,
      { interval }
    );
  }

  if (!useDom && !useDow) {
    return monthFull
      ? [{ kind: 'byDay' }]
      : [{ kind: 'byMonth', daysOfMonth: range(domSpec.min, domSpec.max), months }];
  }

  const rules: DayRule[] = [];
  if (useDom) {
    rules.push({ kind: 'byMonth', daysOfMonth: [...parsed.dayOfMonth], months });
  }
  if (useDow) {
    rules.push(monthFull
      ? { kind: 'byWeek', daysOfWeek: [...parsed.dayOfWeek] }
      : { kind: 'byMonthDayOfWeek', daysOfWeek: [...parsed.dayOfWeek], months });
  }
  return rules;
}

export function intervalToTriggers(interval: string): CalendarTrigger[] {
  const parsed = parseInterval(interval);
  const rules = dayRules(parsed);
  const slots = timeSlots(parsed.hour, parsed.minute);
  const triggers: CalendarTrigger[] = [];
  for (const rule of rules) {
    for (const slot of slots) triggers.push({ rule, slot });
  }
  return triggers;
}

export function assertExpressibleOnWindows(interval: string): void {
  const count = intervalToTriggers(interval).length;
  if (count > MAX_TRIGGERS) {
    throw new ValidationError(
      `Interval "${interval}" needs ${count} Task Scheduler triggers (limit ${MAX_TRIGGERS})`,
      { interval, triggers: count }
    );
  }
}

/**
 * The spelling Task Scheduler reads back for `interval`, so a stored
 * entry compares equal to its next load. Throws ValidationError when the
 * interval cannot be scheduled there.
 */
export function windowsInterval(interval: string): string {
  assertExpressibleOnWindows(interval);
  const stored = triggersToInterval(intervalToTriggers(interval));
  if (stored === null) {
    throw new ValidationError(`Interval "${interval}" has no Task Scheduler equivalent`, { interval });
  }
  return stored;
}

// ---------------------------------------------------------------------------
// Inverse: triggers → interval
// ---------------------------------------------------------------------------

function expandSlot(slot: TimeSlot): number[] | null {
  if (!slot.repeat) return [slot.start];
  const { every, span } = slot.repeat;
  if (every < 1 || span < 0 || span % every !== 0) return null;

  const times: number[] = [];
  for (let t = slot.start; t <= slot.start + span; t += every) {
    if (t >= MINUTES_PER_DAY) return null;
    times.push(t);
  }
  return times;
}

function sameSet(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

function sorted(values: Iterable<number>): number[] {
  return Array.from(new Set(values)).sort((a, b) => a - b);
}

/** Splits a set of minute-of-day values into hours × minutes, if it is such a product. */
function factorTimes(times: readonly number[]): { hour: number[]; minute: number[] } | null {
  const hour = sorted(times.map(t => Math.floor(t / 60)));
  const minute = sorted(times.map(t => t % 60));
  return hour.length * minute.length === times.length ? { hour, minute } : null;
}

function ruleKey(rule: DayRule): string {
  return JSON.stringify(rule);
}

/** Returns the normalized interval, or null when the triggers have no five-field equivalent. */
export function triggersToInterval(triggers: readonly CalendarTrigger[]): string | null {
  if (triggers.length === 0) return null;

  const groups = new Map<string, { rule: DayRule; times: number[] }>();
  for (const trigger of triggers) {
    const times = expandSlot(trigger.slot);
    if (times === null) return null;
    const key = ruleKey(trigger.rule);
    const group = groups.get(key);
    if (group) group.times.push(...times);
    else groups.set(key, { rule: trigger.rule, times: [...times] });
  }

  const [first, ...rest] = Array.from(groups.values());
  const times = sorted(first.times);
  if (rest.some(g => !sameSet(sorted(g.times), times))) return null;

  const clock = factorTimes(times);
  if (clock === null) return null;

  const days = combineRules(Array.from(groups.values(), g => g.rule));
  if (days === null) return null;

  return renderInterval({ ...clock, ...days });
}

type DaySets = Pick<ParsedInterval, 'dayOfMonth' | 'month' | 'dayOfWeek' | 'dayOfMonthStar' | 'dayOfWeekStar'>;

function combineRules(rules: readonly DayRule[]): DaySets | null {
  const [, , domSpec, monthSpec, dowSpec] = FIELD_SPECS;
  const allDays = range(domSpec.min, domSpec.max);
  const allMonths = range(monthSpec.min, monthSpec.max);
  const allWeekdays = range(dowSpec.min, dowSpec.max);

  const domSide = rules.filter(r => r.kind === 'byDay' || r.kind === 'byMonth');
  const dowSide = rules.filter(r => r.kind === 'byWeek' || r.kind === 'byMonthDayOfWeek');
  if (domSide.length > 1 || dowSide.length > 1) return null;

  const dom = domSide[0];
  const dow = dowSide[0];
  for (const rule of rules) {
    if (rule.kind !== 'byDay' && 'months' in rule && rule.months.length === 0) return null;
    if ((rule.kind === 'byWeek' || rule.kind === 'byMonthDayOfWeek') && rule.daysOfWeek.length === 0) return null;
    if (rule.kind === 'byMonth' && rule.daysOfMonth.length === 0) return null;
  }

  // A lone rule pairs with a `*` on the other side, so both fields must match
  if (dow === undefined) {
    if (dom === undefined) return null;
    if (dom.kind === 'byDay') {
      return { dayOfMonth: allDays, month: allMonths, dayOfWeek: allWeekdays, dayOfMonthStar: true, dayOfWeekStar: true };
    }
    if (dom.kind === 'byMonth') {
      return {
        dayOfMonth: dom.daysOfMonth,
        month: dom.months,
        dayOfWeek: allWeekdays,
        dayOfMonthStar: hasStarForm(dom.daysOfMonth, domSpec),
        dayOfWeekStar: true
      };
    }
    return null;
  }

  const dowMonths = dow.kind === 'byMonthDayOfWeek' ? dow.months : allMonths;
  const dowDays = dow.kind === 'byWeek' || dow.kind === 'byMonthDayOfWeek' ? dow.daysOfWeek : [];

  if (dom === undefined) {
    return {
      dayOfMonth: allDays,
      month: dowMonths,
      dayOfWeek: dowDays,
      dayOfMonthStar: true,
      dayOfWeekStar: hasStarForm(dowDays, dowSpec)
    };
  }

  // Two rules are cron's "either day field" form, which needs both sides restricted
  if (dom.kind !== 'byMonth') return null;
  if (isFullField(dom.daysOfMonth, domSpec) || isFullField(dowDays, dowSpec)) return null;
  if (!sameSet(dom.months, dowMonths)) return null;
  return { dayOfMonth: dom.daysOfMonth, month: dom.months, dayOfWeek: dowDays, dayOfMonthStar: false, dayOfWeekStar: false };
}

// ---------------------------------------------------------------------------
// ISO-8601 helpers for StartBoundary / Repetition
// ---------------------------------------------------------------------------

export function formatDuration(minutes: number): string {
  if (minutes === 0) return 'PT0M';
  const h = Math.floor(minutes / 60);
  const m = minutes % 60;
  return `PT${h > 0 ? `${h}H` : ''}${m > 0 ? `${m}M` : ''}`;
}

/** Minutes in an ISO-8601 duration; null for anything not a whole number of minutes. */
export function parseDuration(text: string): number | null {
  const m = /^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/.exec(text.trim());
  if (!m || text.trim() === 'P' || text.trim().endsWith('T')) return null;
  const [, d, h, min, s] = m;
  if (s !== undefined && Number(s) % 60 !== 0) return null;
  return Number(d ?? 0) * MINUTES_PER_DAY + Number(h ?? 0) * 60 + Number(min ?? 0) + Number(s ?? 0) / 60;
}

export function formatStartBoundary(minuteOfDay: number): string {
  const hh = String(Math.floor(minuteOfDay / 60)).padStart(2, '0');
  const mm = String(minuteOfDay % 60).padStart(2, '0');
  return `2000-01-01T${hh}:${mm}:00`;
}

/** Minute of day of a StartBoundary; null when it carries seconds. */
export function parseStartBoundary(text: string): number | null {
  const m = /T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?/.exec(text);
  if (!m) return null;
  const [, hh, mm, ss] = m;
  if (ss !== undefined && Number(ss) !== 0) return null;
  const h = Number(hh);
  const min = Number(mm);
  if (h > 23 || min > 59) return null;
  return h * 60 + min;
}
