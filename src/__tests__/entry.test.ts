import { CronEntry } from '../core/entry';
import { ValidationError } from '../core/errors';

describe('CronEntry', () => {
  it('trims the command and normalizes the interval', () => {
    const entry = CronEntry.create({ id: 'job_1', command: '  backup.sh  ', interval: '0,30 * * * *' }, 'unix');
    expect(entry.command).toBe('backup.sh');
    expect(entry.interval).toBe('*/30 * * * *');
    expect(entry.metadata).toEqual({});
  });

  it.each([
    ['an id with spaces', { id: 'bad id', command: 'x', interval: '* * * * *' }],
    ['an empty id', { id: '', command: 'x', interval: '* * * * *' }],
    ['a blank command', { id: 'a', command: '   ', interval: '* * * * *' }],
    ['a multi-line command', { id: 'a', command: 'echo one\necho two', interval: '* * * * *' }],
    ['a NUL in the command', { id: 'a', command: 'echo \0', interval: '* * * * *' }],
    ['a bad interval', { id: 'a', command: 'x', interval: '* * *' }]
  ])('rejects %s', (_label, fields) => {
    expect(() => CronEntry.create(fields, 'unix')).toThrow(ValidationError);
  });

  it('rejects non-finite metadata numbers', () => {
    expect(() =>
      CronEntry.create({ id: 'a', command: 'x', interval: '* * * * *', metadata: { n: Number.NaN } }, 'unix')
    ).toThrow(ValidationError);
  });

  it('rejects intervals Task Scheduler cannot hold only on windows', () => {
    const tooMany = { id: 'a', command: 'x', interval: '0,1,3 0,1,3,5-23 * * *' };
    expect(CronEntry.create(tooMany, 'unix').interval).toBe('0-1,3 0-1,3,5-23 * * *');
    expect(() => CronEntry.create(tooMany, 'windows')).toThrow(ValidationError);

    const bothDays = { id: 'a', command: 'x', interval: '0 0 1 * */2' };
    expect(CronEntry.create(bothDays, 'unix').interval).toBe('0 0 1 * */2');
    expect(() => CronEntry.create(bothDays, 'windows')).toThrow(ValidationError);
  });

  it('stores the interval Task Scheduler reads back on windows', () => {
    const fields = { id: 'a', command: 'x', interval: '0 0 1 * 0-6' };
    expect(CronEntry.create(fields, 'unix').interval).toBe('0 0 1 * 0-6');
    expect(CronEntry.create(fields, 'windows').interval).toBe('0 0 * * *');
  });

  describe('toDict / fromDict', () => {
    it('round-trips every field', () => {
      const entry = CronEntry.create(
        { id: 'nightly', command: 'backup.sh', interval: '0 2 * * *', metadata: { owner: 'ops', retries: 2 } },
        'unix'
      );
      const restored = CronEntry.fromDict(entry.toDict());
      expect(restored.equals(entry)).toBe(true);
    });

    it('defaults missing metadata to an empty map', () => {
      const entry = CronEntry.fromDict({ id: 'a', command: 'x', interval: '0 2 * * *' });
      expect(entry.metadata).toEqual({});
    });

    it.each([
      ['a missing command', { id: 'a', interval: '0 2 * * *' }],
      ['a numeric id', { id: 7, command: 'x', interval: '0 2 * * *' }],
      ['nested metadata', { id: 'a', command: 'x', interval: '0 2 * * *', metadata: { deep: {} } }],
      ['a non-object', 'nope'],
      ['null', null]
    ])('rejects %s', (_label, value) => {
      expect(() => CronEntry.fromDict(value)).toThrow(ValidationError);
    });

    it('keeps a metadata key named __proto__ as data', () => {
      const value: unknown = JSON.parse('{"id":"a","command":"x","interval":"0 2 * * *","metadata":{"__proto__":"v","b":1}}');
      const entry = CronEntry.fromDict(value);
      expect(Object.keys(entry.metadata)).toEqual(['__proto__', 'b']);
      expect(Object.getPrototypeOf(entry.metadata)).toBe(Object.prototype);
      expect(JSON.stringify(entry.toDict().metadata)).toBe('{"__proto__":"v","b":1}');
      expect(CronEntry.fromDict(entry.toDict()).equals(entry)).toBe(true);
    });

    it('hands out a copy of the metadata', () => {
      const entry = CronEntry.create({ id: 'a', command: 'x', interval: '* * * * *', metadata: { k: 'v' } }, 'unix');
      const dict = entry.toDict();
      dict.metadata.k = 'changed';
      expect(entry.metadata.k).toBe('v');
    });
  });

  describe('copies and comparison', () => {
    const base = CronEntry.create({ id: 'a', command: 'x', interval: '0 1 * * *', metadata: { p: 1, q: 2 } }, 'unix');

    it('with*() returns a validated copy and leaves the source entry alone', () => {
      const changed = base.withCommand(' y ');
      expect(changed.command).toBe('y');
      expect(base.command).toBe('x');
      expect(() => base.withInterval('nope')).toThrow(ValidationError);
      expect(() => base.withId('no/slash')).toThrow(ValidationError);
    });

    it('sameId compares identity only', () => {
      expect(base.sameId(base.withCommand('other'))).toBe(true);
      expect(base.sameId(base.withId('b'))).toBe(false);
    });

    it('equals ignores metadata key order', () => {
      expect(base.equals(base.withMetadata({ q: 2, p: 1 }))).toBe(true);
      expect(base.equals(base.withMetadata({ p: 1 }))).toBe(false);
      expect(base.equals(base.withInterval('0 2 * * *'))).toBe(false);
    });
  });
});
