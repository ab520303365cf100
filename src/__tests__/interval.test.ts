import { dayJoin, isValidInterval, normalizeInterval, parseInterval } from '../core/interval';
import { ValidationError } from '../core/errors';

describe('Interval grammar', () => {
  describe('normalizeInterval', () => {
    it.each([
      ['0 2 * * *', '0 2 * * *'],
      ['1 * * * 1,2', '1 * * * 1-2'],
      ['0,30 * * * *', '*/30 * * * *'],
      ['*/20 * * * *', '*/20 * * * *'],
      ['0 */7 * * *', '0 */7 * * *'],
      ['0 0 * * 7', '0 0 * * 0'],
      ['0-59 0-23 1-31 1-12 0-7', '* * 1-31 * 0-6'],
      ['5 1-10/3 * * *', '5 1,4,7,10 * * *'],
      ['1,2,3,5 * * * *', '1-3,5 * * * *'],
      ['  0   2 * * *  ', '0 2 * * *'],
      ['*/1 * * * *', '* * * * *']
    ])('%s -> %s', (input, expected) => {
      expect(normalizeInterval(input)).toBe(expected);
    });

    it.each([
      ['0 0 1-31 * 1', '0 0 1-31 * 1'],
      ['0 0 1 * 0-6', '0 0 1 * 0-6'],
      ['0 0 1 * 1-7', '0 0 1 * 0-6'],
      ['0 0 1 * */2', '0 0 1 * */2'],
      ['0 0 1-31/2 * 1', '0 0 1-31/2 * 1'],
      ['0 0 */10,5 * 1', '0 0 */31,5,11,21,31 * 1'],
      ['0 0 */1 * 0-6', '0 0 * * 0-6']
    ])('keeps whether a day field starts with "*": %s -> %s', (input, expected) => {
      expect(normalizeInterval(input)).toBe(expected);
      expect(parseInterval(expected)).toEqual(parseInterval(input));
    });
  });

  describe('dayJoin', () => {
    it.each([
      ['0 0 * * 1', 'both'],
      ['0 0 1 * *', 'both'],
      ['0 0 1 * */2', 'both'],
      ['0 0 */2 * 1', 'both'],
      ['0 0 1 * 1', 'either'],
      ['0 0 1-31 * 1', 'either'],
      ['0 0 1 * 0-6', 'either']
    ])('%s matches days on %s field(s)', (input, join) => {
      expect(dayJoin(parseInterval(input))).toBe(join);
    });
  });

  it('expands every field into a sorted value set', () => {
    const parsed = parseInterval('15,5 9-11 1 */6 1-5');
    expect(parsed.minute).toEqual([5, 15]);
    expect(parsed.hour).toEqual([9, 10, 11]);
    expect(parsed.dayOfMonth).toEqual([1]);
    expect(parsed.month).toEqual([1, 7]);
    expect(parsed.dayOfWeek).toEqual([1, 2, 3, 4, 5]);
    expect(parsed.dayOfMonthStar).toBe(false);
    expect(parsed.dayOfWeekStar).toBe(false);
    expect(parseInterval('0 0 */2 * *').dayOfMonthStar).toBe(true);
  });

  it.each([
    '',
    '0 2 * *',
    '0 2 * * * *',
    '60 * * * *',
    '* 24 * * *',
    '0 0 0 * *',
    '0 0 * 13 *',
    '0 0 * * 8',
    '5-1 * * * *',
    '*/0 * * * *',
    '5/2 * * * *',
    'a * * * *',
    '@daily'
  ])('rejects "%s"', input => {
    expect(() => parseInterval(input)).toThrow(ValidationError);
    expect(isValidInterval(input)).toBe(false);
  });

  it('names the offending interval in the error', () => {
    expect(() => parseInterval('60 * * * *')).toThrow('Invalid interval "60 * * * *": minute value out of range 0-59');
  });
});
