/**
 * Converts backend listing output into canonical `SnapshotEntry` values.
 *
 * Rows that cannot be represented safely (unknown kind, names with separators, `..`) are
 * dropped rather than passed upward.
 */

import path from 'node:path';
import { isSafeRelativePath } from '../path-validator.js';
import type { EntryKind, SnapshotEntry } from '../types/index.js';
import { getLogger } from '../utils/structured-logger.js';
import { BackendError } from '../utils/error-utils.js';
import { isRecord, readNumber, readString } from '../utils/type-guards.js';

const logger = getLogger('EntryNormalizer');

const MIDDLEWARE_KINDS: Record<string, EntryKind> = {
  FILE: 'file',
  DIRECTORY: 'directory',
  SYMLINK: 'symlink',
};

// `find -printf %y` type letters
const FIND_KINDS: Record<string, EntryKind> = {
  f: 'file',
  d: 'directory',
  l: 'symlink',
};

function joinEntryPath(parentPath: string, child: string): string | null {
  const joined = parentPath ? path.posix.join(parentPath, child) : child;
  return isSafeRelativePath(joined) ? joined : null;
}

function buildEntry(
  parentPath: string,
  relativeName: string,
  kind: EntryKind,
  size: number | null,
  modifiedAt: number | null,
  checksum?: string
): SnapshotEntry | null {
  const entryPath = joinEntryPath(parentPath, relativeName);
  if (!entryPath) {
    return null;
  }
  const entry: SnapshotEntry = {
    path: entryPath,
    name: path.posix.basename(entryPath),
    kind,
    size: kind === 'directory' ? null : size,
    modifiedAt,
  };
  return checksum ? { ...entry, checksum } : entry;
}

/**
 * Normalize a `filesystem.listdir` result. `parentPath` is the snapshot-relative directory listed.
 */
export function normalizeMiddlewareEntries(raw: unknown, parentPath: string): SnapshotEntry[] {
  if (!Array.isArray(raw)) {
    throw new BackendError(`Unexpected directory listing result: ${JSON.stringify(raw)}`);
  }

  const entries: SnapshotEntry[] = [];
  let dropped = 0;

  for (const row of raw) {
    if (!isRecord(row)) {
      dropped++;
      continue;
    }
    const name = readString(row, 'name');
    const kind = MIDDLEWARE_KINDS[(readString(row, 'type') ?? '').toUpperCase()];
    if (!name || !kind || name.includes('/')) {
      dropped++;
      continue;
    }

    // stat-style mtime is in seconds
    const mtime = readNumber(row, 'mtime');
    const entry = buildEntry(
      parentPath,
      name,
      kind,
      readNumber(row, 'size') ?? null,
      mtime === undefined ? null : Math.trunc(mtime * 1000),
      readString(row, 'checksum')
    );
    if (entry) {
      entries.push(entry);
    } else {
      dropped++;
    }
  }

  if (dropped > 0) {
    logger.debug('Dropped unusable listing rows', { dropped, parent_path: parentPath });
  }
  return entries;
}

/**
 * Parse `find -printf '%y\t%s\t%T@\t%P\n'` output, one entry per line
 */
export function parseFindOutput(stdout: string, parentPath: string): SnapshotEntry[] {
  const entries: SnapshotEntry[] = [];
  let dropped = 0;

  for (const line of stdout.split('\n')) {
    if (line.length === 0) {
      continue;
    }
    const fields = line.split('\t');
    if (fields.length < 4) {
      dropped++;
      continue;
    }
    const [type = '', sizeField = '', mtimeField = ''] = fields;
    // Names may legitimately contain tabs; everything after the third tab is the path
    const relativeName = fields.slice(3).join('\t');
    const kind = FIND_KINDS[type];
    const size = Number(sizeField);
    const mtimeSeconds = Number(mtimeField);

    if (!kind || relativeName.includes('/')) {
      dropped++;
      continue;
    }

    const entry = buildEntry(
      parentPath,
      relativeName,
      kind,
      Number.isFinite(size) ? size : null,
      Number.isFinite(mtimeSeconds) ? Math.trunc(mtimeSeconds * 1000) : null
    );
    if (entry) {
      entries.push(entry);
    } else {
      dropped++;
    }
  }

  if (dropped > 0) {
    logger.debug('Dropped unparseable listing lines', { dropped, parent_path: parentPath });
  }
  return entries;
}

/**
 * Display order: directories first, then case-insensitive name
 */
export function sortForDisplay(entries: readonly SnapshotEntry[]): SnapshotEntry[] {
  return [...entries].sort((a, b) => {
    const aDir = a.kind === 'directory' ? 0 : 1;
    const bDir = b.kind === 'directory' ? 0 : 1;
    if (aDir !== bDir) {
      return aDir - bDir;
    }
    const byName = a.name.toLowerCase().localeCompare(b.name.toLowerCase());
    return byName !== 0 ? byName : a.name.localeCompare(b.name);
  });
}
