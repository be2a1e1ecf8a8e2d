import { describe, it, expect } from 'vitest';
import { compareCanonicalOrder, resolveDuplicates } from './duplicate-resolver.js';
import { FileRecord } from './types.js';

function record(name: string, mtimeMs: number, digest?: string): FileRecord {
  const dot = name.lastIndexOf('.');
  return {
    path: `/downloads/${name}`,
    name,
    size: 10,
    mtimeMs,
    extension: dot > 0 ? name.slice(dot) : '',
    category: 'Other',
    digest
  };
}

describe('resolveDuplicates', () => {
  it('treats same content under different names and extensions as duplicates', () => {
    const photo = record('photo.jpg', 100, 'd1');
    const copy = record('copy.pdf', 200, 'd1');

    const groups = resolveDuplicates([copy, photo]);

    expect(groups).toHaveLength(1);
    expect(groups[0].digest).toBe('d1');
    expect(groups[0].canonical).toBe(photo);
    expect(groups[0].duplicates).toEqual([copy]);
    expect(copy.duplicateOf).toBe('/downloads/photo.jpg');
    expect(photo.duplicateOf).toBeUndefined();
  });

  it('breaks modification-time ties by file name', () => {
    const beta = record('beta.txt', 100, 'd1');
    const alpha = record('alpha.txt', 100, 'd1');
    const gamma = record('gamma.txt', 100, 'd1');

    const [group] = resolveDuplicates([gamma, beta, alpha]);

    expect(group.canonical.name).toBe('alpha.txt');
    expect(group.duplicates.map(file => file.name)).toEqual(['beta.txt', 'gamma.txt']);
  });

  it('chooses the same canonical file whatever the input order', () => {
    const files = () => [record('b.jpg', 50, 'x'), record('a.jpg', 70, 'x'), record('c.jpg', 50, 'x')];
    const forward = resolveDuplicates(files());
    const reversed = resolveDuplicates(files().reverse());

    expect(forward[0].canonical.name).toBe('b.jpg');
    expect(reversed[0].canonical.name).toBe('b.jpg');
  });

  it('ignores unique digests and records without a digest', () => {
    const unhashed = record('unhashed.txt', 1);
    const lonely = record('lonely.txt', 1, 'only-one');

    expect(resolveDuplicates([unhashed, lonely])).toEqual([]);
    expect(unhashed.duplicateOf).toBeUndefined();
    expect(lonely.duplicateOf).toBeUndefined();
  });

  it('returns groups ordered by their canonical file', () => {
    const groups = resolveDuplicates([
      record('z-new.txt', 500, 'late'),
      record('z-old.txt', 400, 'late'),
      record('m-new.txt', 300, 'early'),
      record('m-old.txt', 10, 'early')
    ]);

    expect(groups.map(group => group.canonical.name)).toEqual(['m-old.txt', 'z-old.txt']);
  });
});

describe('compareCanonicalOrder', () => {
  it('falls back to the full path when name and time match', () => {
    const left = { ...record('same.txt', 1), path: '/a/same.txt' };
    const right = { ...record('same.txt', 1), path: '/b/same.txt' };

    expect(compareCanonicalOrder(left, right)).toBeLessThan(0);
    expect(compareCanonicalOrder(right, left)).toBeGreaterThan(0);
    expect(compareCanonicalOrder(left, left)).toBe(0);
  });
});
