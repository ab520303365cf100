/**
 * core/interval.ts
 *
 * The five-field schedule grammar shared by both platforms:
 *
 *     minute hour day-of-month month day-of-week
 *
 * Each field is a comma list of `*`, `*\/n`, `a`, `a-b` or `a-b/n`.
 * Intervals are stored in normalized form (see renderField), so two
 * spellings of the same schedule compare equal as strings.
 *
 * The two day fields interact: when either is written starting with `*`
 * a job runs on days matching both, otherwise on days matching either.
 * Normalization keeps that leading `*` (or its absence) on both of them.
 */

import { ValidationError } from './errors';

export interface FieldSpec {
  name: 'minute' | 'hour' | 'dayOfMonth' | 'month' | 'dayOfWeek';
  min: number;
  max: number;
}

export const FIELD_SPECS: readonly FieldSpec[] = [
  { name: 'minute',     min: 0, max: 59 },
  { name: 'hour',       min: 0, max: 23 },
  { name: 'dayOfMonth', min: 1, max: 31 },
  { name: 'month',      min: 1, max: 12 },
  { name: 'dayOfWeek',  min: 0, max: 6 }   // 7 is accepted on input and folded into 0
];

/** Expanded value sets, each sorted ascending without duplicates. */
export interface ParsedInterval {
  minute: number[];
  hour: number[];
  dayOfMonth: number[];
  month: number[];
  dayOfWeek: number[];
  /** Day-of-month was written starting with `*`. */
  dayOfMonthStar: boolean;
  /** Day-of-week was written starting with `*`. */
  dayOfWeekStar: boolean;
}

export type DayJoin = 'both' | 'either';

const TOKEN = /^(?:(\*)|(\d+)(?:-(\d+))?)(?:\/(\d+))?$/;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function fail(expr: string, reason: string): never {
  throw new ValidationError(`Invalid interval "${expr}": ${reason}`, { interval: expr });
}

function parseField(expr: string, text: string, spec: FieldSpec): number[] {
  // day-of-week accepts 7 as an alias for Sunday
  const upper = spec.name === 'dayOfWeek' ? 7 : spec.max;
  const values = new Set<number>();

  for (const token of text.split(',')) {
    const m = TOKEN.exec(token);
    if (!m) fail(expr, `bad ${spec.name} token "${token}"`);

    const [, star, startText, endText, stepText] = m;
    const step = stepText === undefined ? 1 : Number(stepText);
    if (step < 1) fail(expr, `${spec.name} step must be at least 1`);

    let start: number;
    let end: number;
    if (star) {
      start = spec.min;
      end = spec.max;
    } else {
      start = Number(startText);
      end = endText === undefined ? start : Number(endText);
      if (endText === undefined && stepText !== undefined) {
        fail(expr, `${spec.name} step needs a range or "*"`);
      }
    }

    if (start < spec.min || end > upper || start > upper) {
      fail(expr, `${spec.name} value out of range ${spec.min}-${spec.max}`);
    }
    if (start > end) fail(expr, `${spec.name} range ${start}-${end} is reversed`);

    for (let v = start; v <= end; v += step) {
      values.add(spec.name === 'dayOfWeek' && v === 7 ? 0 : v);
    }
  }

  return Array.from(values).sort((a, b) => a - b);
}

export function parseInterval(expr: string): ParsedInterval {
  const fields = expr.trim().split(/\s+/);
  if (fields.length !== FIELD_SPECS.length || fields[0] === '') {
    fail(expr, `expected ${FIELD_SPECS.length} fields, got ${fields[0] === '' ? 0 : fields.length}`);
  }

  return {
    minute:     parseField(expr, fields[0], FIELD_SPECS[0]),
    hour:       parseField(expr, fields[1], FIELD_SPECS[1]),
    dayOfMonth: parseField(expr, fields[2], FIELD_SPECS[2]),
    month:      parseField(expr, fields[3], FIELD_SPECS[3]),
    dayOfWeek:  parseField(expr, fields[4], FIELD_SPECS[4]),
    dayOfMonthStar: fields[2].startsWith('*'),
    dayOfWeekStar:  fields[4].startsWith('*')
  };
}

/** How cron combines the day-of-month and day-of-week fields. */
export function dayJoin(parsed: ParsedInterval): DayJoin {
  return parsed.dayOfMonthStar || parsed.dayOfWeekStar ? 'both' : 'either';
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export function isFullField(values: readonly number[], spec: FieldSpec): boolean {
  return values.length === spec.max - spec.min + 1;
}

/** Step s when values are exactly min, min+s, min+2s … up to the field max. */
function starStep(values: readonly number[], spec: FieldSpec): number | null {
  if (values.length < 2 || values[0] !== spec.min) return null;
  const step = values[1] - values[0];
  if (step < 2) return null;
  for (let i = 1; i < values.length; i++) {
    if (values[i] - values[i - 1] !== step) return null;
  }
  return values[values.length - 1] + step > spec.max ? step : null;
}

/** True when the values can be spelled starting with `*` (the whole field or `*\/s`). */
export function hasStarForm(values: readonly number[], spec: FieldSpec): boolean {
  return isFullField(values, spec) || starStep(values, spec) !== null;
}

function renderRuns(values: readonly number[]): string[] {
  const parts: string[] = [];
  let runStart = values[0];
  for (let i = 1; i <= values.length; i++) {
    if (i < values.length && values[i] === values[i - 1] + 1) continue;
    const runEnd = values[i - 1];
    parts.push(runStart === runEnd ? String(runStart) : `${runStart}-${runEnd}`);
    runStart = values[i];
  }
  return parts;
}

/**
 * `star` pins whether a day field starts with `*`; other fields leave it
 * undefined and take the shortest spelling. Star tokens always include
 * the field minimum, so a star field that is neither full nor a plain
 * step renders as `*\/span` (the minimum alone) plus the other values.
 */
export function renderField(values: readonly number[], spec: FieldSpec, star?: boolean): string {
  const step = starStep(values, spec);
  if (star !== false) {
    if (isFullField(values, spec)) return '*';
    if (step !== null) return `*/${step}`;
    if (star === undefined) return renderRuns(values).join(',');
    return [`*/${spec.max - spec.min + 1}`, ...renderRuns(values.slice(1))].join(',');
  }

  if (isFullField(values, spec)) return `${spec.min}-${spec.max}`;
  if (step !== null) return `${spec.min}-${spec.max}/${step}`;
  return renderRuns(values).join(',');
}

export function renderInterval(parsed: ParsedInterval): string {
  return [
    renderField(parsed.minute, FIELD_SPECS[0]),
    renderField(parsed.hour, FIELD_SPECS[1]),
    renderField(parsed.dayOfMonth, FIELD_SPECS[2], parsed.dayOfMonthStar),
    renderField(parsed.month, FIELD_SPECS[3]),
    renderField(parsed.dayOfWeek, FIELD_SPECS[4], parsed.dayOfWeekStar)
  ].join(' ');
}

/** Canonical spelling. Throws ValidationError on malformed input. */
export function normalizeInterval(expr: string): string {
  return renderInterval(parseInterval(expr));
}

export function isValidInterval(expr: string): boolean {
  try {
    parseInterval(expr);
    return true;
  } catch (e) {
    if (e instanceof ValidationError) return false;
    throw e;
  }
}
