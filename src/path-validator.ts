import path from 'node:path';
import type { Dataset } from './types/index.js';
import { ValidationError } from './utils/error-utils.js';

/** Directory under every mount root that exposes read-only snapshot views */
export const SNAPSHOT_CONTROL_DIR = '.zfs';

export type PathAccess = 'read' | 'write';

const posix = path.posix;

/**
 * Validate a requested path against a root and return its canonical absolute form.
 *
 * `write` access (restore destinations) requires a strict descendant of `root` outside the
 * snapshot-control namespace. `read` access (listing, restore sources) anchors a leading `/`
 * at `root` and accepts the root itself.
 *
 * Pure string operation: symlinks are not followed.
 */
export function validatePath(root: string, requestedPath: string, access: PathAccess = 'write'): string {
  if (!posix.isAbsolute(root)) {
    throw new ValidationError(`Dataset root must be an absolute path: ${root}`, requestedPath);
  }
  if (requestedPath.includes('\0')) {
    throw new ValidationError('Path contains a NUL byte', requestedPath);
  }
  if (access === 'write' && requestedPath.trim().length === 0) {
    throw new ValidationError('Destination path is empty', requestedPath);
  }

  // Any `..` segment is refused, including ones that normalize away inside the root
  if (requestedPath.split('/').includes('..')) {
    throw new ValidationError(`Path must not contain '..' segments: ${requestedPath}`, requestedPath);
  }

  const anchored = access === 'read' ? requestedPath.replace(/^\/+/, '') || '.' : requestedPath;
  const normalized = posix.normalize(anchored);

  const canonicalRoot = posix.resolve(root);
  const resolved = posix.resolve(canonicalRoot, normalized);
  const relative = posix.relative(canonicalRoot, resolved);

  if (relative === '..' || relative.startsWith('../') || posix.isAbsolute(relative)) {
    throw new ValidationError(`Path resolves outside ${canonicalRoot}: ${requestedPath}`, requestedPath);
  }

  if (access === 'read') {
    return resolved;
  }

  if (relative === '') {
    throw new ValidationError(`Destination must be inside ${canonicalRoot}, not the root itself`, requestedPath);
  }
  if (relative.split('/').includes(SNAPSHOT_CONTROL_DIR)) {
    throw new ValidationError(
      `Destination must not be inside the ${SNAPSHOT_CONTROL_DIR} snapshot namespace: ${requestedPath}`,
      requestedPath
    );
  }

  return resolved;
}

export function assertSnapshotName(name: string): void {
  if (
    name.length === 0 ||
    name === '.' ||
    name === '..' ||
    name.includes('/') ||
    name.includes('@') ||
    name.includes('\0')
  ) {
    throw new ValidationError(`Invalid snapshot name: ${JSON.stringify(name)}`, name);
  }
}

/**
 * Absolute directory exposing `snapshot` of `dataset`
 */
export function snapshotRoot(dataset: Dataset, snapshot: string): string {
  assertSnapshotName(snapshot);
  return posix.join(dataset.mountRoot, SNAPSHOT_CONTROL_DIR, 'snapshot', snapshot);
}

/**
 * Root-relative form of a path already returned by `validatePath`; `''` for the root itself
 */
export function toRelativePath(root: string, canonicalPath: string): string {
  return posix.relative(posix.resolve(root), canonicalPath);
}

export function isSafeRelativePath(candidate: string): boolean {
  if (candidate.length === 0 || candidate.includes('\0') || posix.isAbsolute(candidate)) {
    return false;
  }
  return candidate.split('/').every((segment) => segment !== '' && segment !== '.' && segment !== '..');
}
