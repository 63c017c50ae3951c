import { describe, expect, it } from 'vitest';
import { diffListings, isModified, summarizeDiff } from '../../../src/core/diff-engine.js';
import type { SnapshotEntry } from '../../../src/types/index.js';
import { directory, file } from '../../helpers/fixtures.js';

describe('diffListings', () => {
  it('should classify added, removed, modified and unchanged paths', () => {
    const before = [file('a.txt', 10), file('gone.txt', 5), directory('docs')];
    const after = [file('a.txt', 20), file('b.txt', 1), directory('docs')];

    const result = diffListings(before, after);

    expect(result.map((entry) => [entry.path, entry.classification])).toEqual([
      ['a.txt', 'modified'],
      ['b.txt', 'added'],
      ['docs', 'unchanged'],
      ['gone.txt', 'removed'],
    ]);
    expect(result[0]?.before?.size).toBe(10);
    expect(result[0]?.after?.size).toBe(20);
    expect(result[1]?.before).toBeUndefined();
  });

  it('should report everything unchanged when comparing a listing with itself', () => {
    const listing = [file('a.txt', 10), directory('docs'), file('z.bin', 0)];
    const result = diffListings(listing, listing);
    expect(result).toHaveLength(3);
    expect(result.every((entry) => entry.classification === 'unchanged')).toBe(true);
  });

  it('should order output byte-wise by path', () => {
    const result = diffListings([file('b', 1), file('B', 1)], [file('a', 1), file('é', 1)]);
    expect(result.map((entry) => entry.path)).toEqual(['B', 'a', 'b', 'é']);
  });

  it('should keep the first entry when a listing repeats a path', () => {
    const result = diffListings([file('a.txt', 10), file('a.txt', 99)], [file('a.txt', 10)]);
    expect(result).toHaveLength(1);
    expect(result[0]?.classification).toBe('unchanged');
  });

  it('should compare directories by presence only', () => {
    const older: SnapshotEntry = { ...directory('docs'), modifiedAt: 1 };
    const newer: SnapshotEntry = { ...directory('docs'), modifiedAt: 2 };
    expect(diffListings([older], [newer])[0]?.classification).toBe('unchanged');
  });

  it('should handle empty listings', () => {
    expect(diffListings([], [])).toEqual([]);
    expect(diffListings([], [file('a', 1)])[0]?.classification).toBe('added');
  });
});

describe('isModified', () => {
  it('should flag a change of kind', () => {
    expect(isModified(file('x', 0), directory('x'))).toBe(true);
  });

  it('should flag a changed modification time with equal size', () => {
    expect(isModified(file('x', 10, 1000), file('x', 10, 2000))).toBe(true);
  });

  it('should ignore attributes only one side reports', () => {
    expect(isModified(file('x', 10, null), file('x', 10, 2000))).toBe(false);
    expect(isModified({ ...file('x', 10), checksum: 'abc' }, file('x', 10))).toBe(false);
  });

  it('should compare checksums when both sides have one', () => {
    expect(isModified({ ...file('x', 10), checksum: 'abc' }, { ...file('x', 10), checksum: 'def' })).toBe(true);
  });
});

describe('summarizeDiff', () => {
  it('should count each classification', () => {
    const result = diffListings([file('a', 1), file('b', 1), file('c', 1)], [file('a', 2), file('b', 1), file('d', 1)]);
    expect(summarizeDiff(result)).toEqual({ added: 1, removed: 1, modified: 1, unchanged: 1 });
  });
});
