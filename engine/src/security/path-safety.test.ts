import path from 'path';
import { describe, expect, it } from 'vitest';
import {
  UnsafePathError,
  normalizeWorkspaceRelativePath,
  relativeWithinBase,
  resolvePathWithinBase,
} from './path-safety';

describe('path-safety', () => {
  it('normalizes relative paths', () => {
    expect(normalizeWorkspaceRelativePath('./src//app.py')).toBe('src/app.py');
    expect(normalizeWorkspaceRelativePath('src\\pkg\\mod.py')).toBe('src/pkg/mod.py');
  });

  it('rejects absolute and escaping paths', () => {
    expect(() => normalizeWorkspaceRelativePath('/etc/passwd')).toThrow(UnsafePathError);
    expect(() => normalizeWorkspaceRelativePath('C:\\Windows')).toThrow(UnsafePathError);
    expect(() => normalizeWorkspaceRelativePath('../outside.py')).toThrow(UnsafePathError);
    expect(() => normalizeWorkspaceRelativePath('a/../../b')).toThrow(UnsafePathError);
    expect(() => normalizeWorkspaceRelativePath('  ')).toThrow('Path must not be empty');
  });

  it('resolves inside the base directory', () => {
    const base = path.resolve('/tmp/workspace');
    expect(resolvePathWithinBase(base, 'src/a.py')).toBe(path.join(base, 'src', 'a.py'));
  });

  it('reports paths relative to a base, or null outside it', () => {
    const base = path.resolve('/tmp/workspace');
    expect(relativeWithinBase(base, path.join(base, 'pkg', 'b.py'))).toBe('pkg/b.py');
    expect(relativeWithinBase(base, 'pkg/c.py')).toBe('pkg/c.py');
    expect(relativeWithinBase(base, '/usr/lib/python3/os.py')).toBeNull();
    expect(relativeWithinBase(base, base)).toBeNull();
  });
});
