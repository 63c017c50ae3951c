/**
 * Path-keyed comparison of two snapshot listings
 */

import type { DiffEntry, DiffResult, DiffSummary, SnapshotEntry } from '../types/index.js';

function comparePaths(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

/**
 * Index by path, keeping the first occurrence of a duplicated path, ordered byte-wise
 */
function orderedByPath(entries: readonly SnapshotEntry[]): SnapshotEntry[] {
  const byPath = new Map<string, SnapshotEntry>();
  for (const entry of entries) {
    if (!byPath.has(entry.path)) {
      byPath.set(entry.path, entry);
    }
  }
  return [...byPath.values()].sort((a, b) => comparePaths(a.path, b.path));
}

function sameAttribute<T>(before: T | null | undefined, after: T | null | undefined): boolean {
  // Attributes only one side reports are not compared
  if (before === null || before === undefined || after === null || after === undefined) {
    return true;
  }
  return before === after;
}

export function isModified(before: SnapshotEntry, after: SnapshotEntry): boolean {
  if (before.kind !== after.kind) {
    return true;
  }
  if (before.kind === 'directory') {
    return false;
  }
  return !(
    sameAttribute(before.size, after.size) &&
    sameAttribute(before.modifiedAt, after.modifiedAt) &&
    sameAttribute(before.checksum, after.checksum)
  );
}

/**
 * Classify every path present in either listing. `before` is the older snapshot.
 *
 * Output is sorted by path and holds exactly one entry per distinct path.
 */
export function diffListings(
  before: readonly SnapshotEntry[],
  after: readonly SnapshotEntry[]
): DiffResult {
  const left = orderedByPath(before);
  const right = orderedByPath(after);
  const result: DiffEntry[] = [];

  let i = 0;
  let j = 0;
  while (i < left.length || j < right.length) {
    const a = left[i];
    const b = right[j];

    if (a && (!b || comparePaths(a.path, b.path) < 0)) {
      result.push({ path: a.path, classification: 'removed', before: a });
      i++;
    } else if (b && (!a || comparePaths(a.path, b.path) > 0)) {
      result.push({ path: b.path, classification: 'added', after: b });
      j++;
    } else if (a && b) {
      result.push({
        path: a.path,
        classification: isModified(a, b) ? 'modified' : 'unchanged',
        before: a,
        after: b,
      });
      i++;
      j++;
    }
  }

  return result;
}

export function summarizeDiff(diff: DiffResult): DiffSummary {
  const summary: DiffSummary = { added: 0, removed: 0, modified: 0, unchanged: 0 };
  for (const entry of diff) {
    summary[entry.classification]++;
  }
  return summary;
}
