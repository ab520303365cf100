import { UnixCodec, escapeCommand, unescapeCommand } from '../codecs/unix_codec';
import { CronEntry } from '../core/entry';
import { IdentifierAllocator } from '../core/identifier';
import { ManagedRecord, StoreRecord, managedEntries } from '../core/types';

const CRONTAB = [
  'SHELL=/bin/bash',
  '# nightly jobs',
  '0 2 * * * /usr/local/bin/backup.sh',
  '# crossched:id=report meta={"owner":"ops"}',
  '*/15 * * * * /opt/report.sh --fast',
  '@reboot /opt/start.sh',
  '61 * * * * /bad/minute.sh',
  ''
].join('\n');

function managed(entry: CronEntry): ManagedRecord {
  return { kind: 'managed', entry };
}

describe('UnixCodec', () => {
  const codec = new UnixCodec();

  it('reads an empty crontab as no records', () => {
    expect(codec.parse('')).toEqual([]);
    expect(codec.serialize([])).toBe('');
  });

  describe('parse', () => {
    const records = codec.parse(CRONTAB);

    it('keeps one record per logical entry, in file order', () => {
      expect(records.map(r => r.kind)).toEqual(['foreign', 'foreign', 'managed', 'managed', 'foreign', 'foreign']);
    });

    it('classifies what it cannot manage', () => {
      const reasons = records.flatMap(r => (r.kind === 'foreign' ? [r.reason] : []));
      expect(reasons).toEqual([
        'environment assignment',
        'comment',
        'nickname schedule',
        'Invalid interval "61 * * * *": minute value out of range 0-59'
      ]);
    });

    it('recovers id and metadata from a tag line', () => {
      const [, report] = managedEntries(records);
      expect(report.toDict()).toEqual({
        id: 'report',
        command: '/opt/report.sh --fast',
        interval: '*/15 * * * *',
        metadata: { owner: 'ops' }
      });
    });

    it('reads a tag metadata key named __proto__ as data', () => {
      const [entry] = managedEntries(codec.parse('# crossched:id=odd meta={"__proto__":"v","b":1}\n0 2 * * * x\n'));
      expect(Object.keys(entry.metadata)).toEqual(['__proto__', 'b']);
      expect(UnixCodec.renderTag(entry)).toBe('# crossched:id=odd meta={"__proto__":"v","b":1}');
    });

    it('adopts an untagged line under its content-derived id', () => {
      const [backup] = managedEntries(records);
      expect(backup.id).toBe(IdentifierAllocator.seed('/usr/local/bin/backup.sh', '0 2 * * *'));
      expect(backup.command).toBe('/usr/local/bin/backup.sh');
    });

    it('assigns the same ids on every parse', () => {
      const again = managedEntries(codec.parse(CRONTAB)).map(e => e.id);
      expect(again).toEqual(managedEntries(records).map(e => e.id));
    });
  });

  describe('serialize', () => {
    it('reproduces an untouched crontab byte for byte', () => {
      expect(codec.serialize(codec.parse(CRONTAB))).toBe(CRONTAB);
    });

    it('writes new entries with a tag line', () => {
      const entry = CronEntry.create(
        { id: 'weekly', command: 'echo hi', interval: '0 3 * * 1', metadata: { team: 'core' } },
        'unix'
      );
      expect(codec.serialize([managed(entry)])).toBe(
        '# crossched:id=weekly meta={"team":"core"}\n0 3 * * 1 echo hi\n'
      );
    });

    it('keeps a full day range written without "*" when an adopted line changes', () => {
      const [record] = codec.parse('0 0 1-31 * 1 /bin/old\n');
      if (record.kind !== 'managed') throw new Error('expected a managed record');

      const changed: StoreRecord = { ...record, entry: record.entry.withCommand('/bin/new') };
      expect(codec.serialize([changed])).toBe(`# crossched:id=${record.entry.id}\n0 0 1-31 * 1 /bin/new\n`);
    });

    it('re-renders an adopted line once it changes', () => {
      const records = codec.parse('0 2 * * * backup.sh\n');
      const [record] = records;
      if (record.kind !== 'managed') throw new Error('expected a managed record');

      const changed: StoreRecord = { ...record, entry: record.entry.withInterval('0 4 * * *') };
      expect(codec.serialize([changed])).toBe(
        `# crossched:id=${record.entry.id}\n0 4 * * * backup.sh\n`
      );
    });

    it('keeps foreign records in place around managed ones', () => {
      const records = codec.parse('# keep me\n');
      const entry = CronEntry.create({ id: 'x1', command: 'true', interval: '* * * * *' }, 'unix');
      expect(codec.serialize([...records, managed(entry)])).toBe(
        '# keep me\n# crossched:id=x1\n* * * * * true\n'
      );
    });
  });

  it('round-trips entries it wrote itself', () => {
    const entries = [
      CronEntry.create({ id: 'a', command: 'date +%Y-%m-%d > /tmp/day', interval: '0 0 * * *' }, 'unix'),
      CronEntry.create({ id: 'b', command: 'run.sh', interval: '*/5 9-17 * * 1-5', metadata: { on: true, n: null } }, 'unix'),
      CronEntry.create({ id: 'c', command: 'run.sh', interval: '*/5 9-17 * * 1-5' }, 'unix')
    ];
    const parsed = managedEntries(codec.parse(codec.serialize(entries.map(managed))));
    expect(parsed).toHaveLength(3);
    parsed.forEach((entry, i) => expect(entry.equals(entries[i])).toBe(true));
  });

  describe('percent signs', () => {
    it('escapes % on write and unescapes on read', () => {
      expect(escapeCommand('date +%Y')).toBe('date +\\%Y');
      expect(unescapeCommand('date +\\%Y')).toBe('date +%Y');
    });

    it('keeps a line with a bare % as foreign', () => {
      const [record] = codec.parse('0 1 * * * echo 100%\n');
      expect(record).toEqual({
        kind: 'foreign',
        raw: '0 1 * * * echo 100%',
        reason: 'command uses an unescaped % (stdin section)'
      });
    });
  });

  describe('tags', () => {
    it('keeps a tag with no schedule line after it as foreign', () => {
      const records = codec.parse('# crossched:id=lonely\n# just a comment\n');
      expect(records).toEqual([
        { kind: 'foreign', raw: '# crossched:id=lonely', reason: 'tag without a schedule line' },
        { kind: 'foreign', raw: '# just a comment', reason: 'comment' }
      ]);
    });

    it('adopts the schedule line under a tag with broken metadata', () => {
      const text = '# crossched:id=x meta={oops\n0 6 * * * wake.sh\n';
      const records = codec.parse(text);
      expect(records[0]).toEqual({
        kind: 'foreign',
        raw: '# crossched:id=x meta={oops',
        reason: 'malformed tag metadata'
      });
      expect(records[1].kind).toBe('managed');
      expect(codec.serialize(records)).toBe(text);
    });

    it('gives the second of two identical tags a new id', () => {
      const text = '# crossched:id=same\n0 1 * * * a.sh\n# crossched:id=same\n0 2 * * * b.sh\n';
      const records = codec.parse(text);
      const ids = managedEntries(records).map(e => e.id);
      const derived = IdentifierAllocator.seed('b.sh', '0 2 * * *');
      expect(ids).toEqual(['same', derived]);
      expect(codec.serialize(records)).toBe(
        `# crossched:id=same\n0 1 * * * a.sh\n# crossched:id=${derived}\n0 2 * * * b.sh\n`
      );
    });

    it('keeps derived ids stable when identical untagged lines are saved', () => {
      const records = codec.parse('0 5 * * * same.sh\n0 5 * * * same.sh\n');
      const ids = managedEntries(records).map(e => e.id);
      const seed = IdentifierAllocator.seed('same.sh', '0 5 * * *');
      expect(ids).toEqual([seed, `${seed}-1`]);

      const saved = codec.serialize(records);
      expect(saved).toBe(`0 5 * * * same.sh\n# crossched:id=${seed}-1\n0 5 * * * same.sh\n`);
      expect(managedEntries(codec.parse(saved)).map(e => e.id)).toEqual(ids);
    });
  });
});
