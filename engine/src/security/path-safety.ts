import path from 'path';

const WINDOWS_DRIVE_PREFIX = /^[a-zA-Z]:[\\/]/;
const UNC_PREFIX = /^\\\\/;

export class UnsafePathError extends Error {
  readonly code = 'UNSAFE_PATH';

  constructor(message: string) {
    super(message);
    this.name = 'UnsafePathError';
  }
}

export function toPosixPath(input: string): string {
  return input.replace(/\\/g, '/');
}

export function isAbsoluteLike(input: string): boolean {
  return input.startsWith('/') || WINDOWS_DRIVE_PREFIX.test(input) || UNC_PREFIX.test(input);
}

/**
 * Normalize a path that must stay inside a workspace (patch targets, MRE entries).
 */
export function normalizeWorkspaceRelativePath(rawPath: string): string {
  const trimmed = (rawPath || '').trim();
  if (!trimmed) {
    throw new UnsafePathError('Path must not be empty');
  }

  const posixInput = toPosixPath(trimmed);
  if (isAbsoluteLike(posixInput)) {
    throw new UnsafePathError(`Absolute paths are not allowed: ${trimmed}`);
  }

  const normalized = path.posix.normalize(posixInput);
  if (normalized === '.' || normalized === '..' || normalized.startsWith('../')) {
    throw new UnsafePathError(`Path traversal is not allowed: ${trimmed}`);
  }

  if (normalized.includes('/../') || normalized.includes('\0')) {
    throw new UnsafePathError(`Invalid path: ${trimmed}`);
  }

  return normalized.replace(/^\.\/+/, '');
}

export function resolvePathWithinBase(baseDir: string, relativePath: string): string {
  const safeRelativePath = normalizeWorkspaceRelativePath(relativePath);
  const resolvedBase = path.resolve(baseDir);
  const resolvedTarget = path.resolve(resolvedBase, safeRelativePath);

  if (relativeWithinBase(resolvedBase, resolvedTarget) === null) {
    throw new UnsafePathError(`Resolved path escapes base directory: ${relativePath}`);
  }

  return resolvedTarget;
}

/**
 * Posix-style path of `target` relative to `baseDir`, or null when it lies outside.
 */
export function relativeWithinBase(baseDir: string, target: string): string | null {
  const relative = path.relative(path.resolve(baseDir), path.resolve(baseDir, target));
  if (
    relative === '' ||
    relative === '..' ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  ) {
    return null;
  }
  return toPosixPath(relative);
}
