import { IdentifierAllocator } from '../core/identifier';

describe('IdentifierAllocator', () => {
  it('derives a short hex seed from command and normalized interval', () => {
    const seed = IdentifierAllocator.seed('backup.sh', '0,30 * * * *');
    expect(seed).toMatch(/^c[0-9a-f]{10}$/);
    expect(IdentifierAllocator.seed('  backup.sh ', '*/30 * * * *')).toBe(seed);
    expect(IdentifierAllocator.seed('backup.sh', '0 2 * * *')).not.toBe(seed);
  });

  it('does not throw on an unparsable interval', () => {
    expect(IdentifierAllocator.seed('x', 'not an interval')).toMatch(/^c[0-9a-f]{10}$/);
  });

  it('suffixes colliding derivations in call order', () => {
    const allocator = new IdentifierAllocator();
    const seed = IdentifierAllocator.seed('same.sh', '0 5 * * *');
    expect(allocator.derive('same.sh', '0 5 * * *')).toBe(seed);
    expect(allocator.derive('same.sh', '0 5 * * *')).toBe(`${seed}-1`);
    expect(allocator.derive('same.sh', '0 5 * * *')).toBe(`${seed}-2`);
  });

  it('skips ids that were reserved first', () => {
    const seed = IdentifierAllocator.seed('same.sh', '0 5 * * *');
    const allocator = new IdentifierAllocator([seed]);
    expect(allocator.reserve(`${seed}-1`)).toBe(true);
    expect(allocator.derive('same.sh', '0 5 * * *')).toBe(`${seed}-2`);
  });

  it('reports a duplicate reservation', () => {
    const allocator = new IdentifierAllocator();
    expect(allocator.reserve('nightly')).toBe(true);
    expect(allocator.reserve('nightly')).toBe(false);
    expect(allocator.has('nightly')).toBe(true);
  });

  it('falls back to a random token once the suffixes run out', () => {
    const seed = IdentifierAllocator.seed('same.sh', '0 5 * * *');
    const taken = [seed];
    for (let n = 1; n <= 1000; n++) taken.push(`${seed}-${n}`);
    const allocator = new IdentifierAllocator(taken);

    const id = allocator.derive('same.sh', '0 5 * * *');
    expect(id).toMatch(/^[0-9a-f]{12}$/);
    expect(allocator.has(id)).toBe(true);
  });

  it('hands out fresh ids that are not already known', () => {
    const allocator = new IdentifierAllocator(['existing']);
    const a = allocator.fresh();
    const b = allocator.fresh();
    expect(a).toMatch(/^[0-9a-f]{12}$/);
    expect(b).not.toBe(a);
    expect(allocator.has(a) && allocator.has(b)).toBe(true);
  });
});
