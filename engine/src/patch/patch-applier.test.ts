import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { ProposedPatch } from '@repairgate/shared-types';
import { cleanGeneratedContent } from './content-cleaner';
import { PatchApplyError, applyProposedPatch } from './patch-applier';
import { parseUnifiedDiff } from './unified-diff';

function patchOf(diff: string, files: Record<string, string> = {}): ProposedPatch {
  return { diff, files, analysis: '', explanation: '', regressionRisk: 'low' };
}

const CALC = ['def add(a, b):', '    return a - b', '', '', 'def sub(a, b):', '    return a - b', ''].join('\n');

describe('applyProposedPatch', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'repairgate-patch-'));
    await fs.writeFile(path.join(root, 'calc.py'), CALC, 'utf-8');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  const read = (relativePath: string) => fs.readFile(path.join(root, relativePath), 'utf-8');

  it('applies a git-style hunk', async () => {
    const diff = [
      'diff --git a/calc.py b/calc.py',
      '--- a/calc.py',
      '+++ b/calc.py',
      '@@ -1,2 +1,2 @@',
      ' def add(a, b):',
      '-    return a - b',
      '+    return a + b',
    ].join('\n');

    const result = await applyProposedPatch(root, patchOf(diff));

    expect(result).toEqual({ changedFiles: ['calc.py'], hunksApplied: 1, normalizedHunks: 0, fullFiles: 0 });
    expect(await read('calc.py')).toBe(CALC.replace('    return a - b', '    return a + b'));
  });

  it('picks the match nearest the hunk header when context repeats', async () => {
    const diff = ['--- calc.py', '+++ calc.py', '@@ -6,1 +6,1 @@', '-    return a - b', '+    return b - a'].join(
      '\n'
    );

    await applyProposedPatch(root, patchOf(diff));

    const lines = (await read('calc.py')).split('\n');
    expect(lines[1]).toBe('    return a - b');
    expect(lines[5]).toBe('    return b - a');
  });

  it('falls back to whitespace-normalized matching', async () => {
    const diff = ['--- a/calc.py', '+++ b/calc.py', '@@ -1,2 +1,2 @@', ' def add(a,  b):', '-  return a - b', '+    return a + b'].join(
      '\n'
    );

    const result = await applyProposedPatch(root, patchOf(diff));

    expect(result.normalizedHunks).toBe(1);
    expect((await read('calc.py')).split('\n').slice(0, 2)).toEqual(['def add(a,  b):', '    return a + b']);
  });

  it('creates and deletes files through /dev/null headers', async () => {
    await fs.writeFile(path.join(root, 'old.py'), 'x = 1\n', 'utf-8');
    const diff = [
      '--- /dev/null',
      '+++ b/pkg/new.py',
      '@@ -0,0 +1,2 @@',
      '+def new():',
      '+    return 1',
      '--- a/old.py',
      '+++ /dev/null',
      '@@ -1 +0,0 @@',
      '-x = 1',
    ].join('\n');

    const result = await applyProposedPatch(root, patchOf(diff));

    expect(result.changedFiles).toEqual(['old.py', 'pkg/new.py']);
    expect(await read('pkg/new.py')).toBe('def new():\n    return 1\n');
    await expect(fs.access(path.join(root, 'old.py'))).rejects.toThrow();
  });

  it('lets full-file content win over the diff', async () => {
    const diff = ['--- a/calc.py', '+++ b/calc.py', '@@ -1,2 +1,2 @@', ' def add(a, b):', '-    return a - b', '+    return 0'].join(
      '\n'
    );
    const files = { 'calc.py': '```python\ndef add(a, b):\n    return a + b\n```' };

    const result = await applyProposedPatch(root, patchOf(diff, files));

    expect(result.fullFiles).toBe(1);
    expect(await read('calc.py')).toBe('def add(a, b):\n    return a + b\n');
  });

  it('rejects a hunk that matches nowhere and leaves the workspace untouched', async () => {
    const diff = [
      '--- a/calc.py',
      '+++ b/calc.py',
      '@@ -1,1 +1,1 @@',
      '-def mul(a, b):',
      '+def mul(x, y):',
      '--- /dev/null',
      '+++ b/extra.py',
      '@@ -0,0 +1 @@',
      '+y = 2',
    ].join('\n');

    const error = await applyProposedPatch(root, patchOf(diff)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PatchApplyError);
    if (!(error instanceof PatchApplyError)) return;
    expect(error.code).toBe('PATCH_REJECTED');
    expect(error.reason).toBe('HUNK_NO_MATCH');
    expect(error.diagnostics.filePath).toBe('calc.py');
    expect(error.diagnostics.hunkIndex).toBe(1);
    expect(error.diagnostics.candidateHints?.[0]?.lineStart).toBe(1);
    expect(await read('calc.py')).toBe(CALC);
  });

  it.each([
    ['an empty patch', patchOf('  '), 'EMPTY_PATCH'],
    ['text without hunks', patchOf('just change the minus to a plus'), 'INVALID_DIFF'],
    ['a missing target', patchOf('--- a/none.py\n+++ b/none.py\n@@ -1 +1 @@\n-a\n+b'), 'FILE_NOT_FOUND'],
    ['a path escaping the workspace', patchOf('', { '../escape.py': 'x = 1' }), 'UNSAFE_PATH'],
    ['a file below the engine directory', patchOf('', { '.repairgate/sandbox.json': '{}' }), 'UNSAFE_PATH'],
    [
      'a diff into the engine directory',
      patchOf('--- /dev/null\n+++ b/.repairgate/error.txt\n@@ -0,0 +1 @@\n+fake'),
      'UNSAFE_PATH',
    ],
    ['an unparsable JSON file', patchOf('', { 'config.json': '{"debug": true,}' }), 'INVALID_CONTENT'],
    ['an empty source file', patchOf('', { 'calc.py': '   ' }), 'INVALID_CONTENT'],
  ])('rejects %s', async (_label, patch, reason) => {
    await expect(applyProposedPatch(root, patch)).rejects.toMatchObject({ reason });
  });

  it('rejects truncated full-file content before writing anything', async () => {
    const files = { 'notes.md': 'kept out', 'calc.py': 'def add(a, b:\n    return a + b\n' };

    const error = await applyProposedPatch(root, patchOf('', files)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PatchApplyError);
    if (!(error instanceof PatchApplyError)) return;
    expect(error.reason).toBe('INVALID_CONTENT');
    expect(error.message).toBe("Rejected content for calc.py: unclosed '(' from line 1");
    expect(await read('calc.py')).toBe(CALC);
    await expect(fs.access(path.join(root, 'notes.md'))).rejects.toThrow();
  });

  it('accepts an empty package marker', async () => {
    const result = await applyProposedPatch(root, patchOf('', { 'pkg/__init__.py': '' }));

    expect(result.changedFiles).toEqual(['pkg/__init__.py']);
    expect(await read('pkg/__init__.py')).toBe('');
  });
});

describe('parseUnifiedDiff', () => {
  it('strips a markdown fence and ignores trailing blank lines', () => {
    const files = parseUnifiedDiff('```diff\n--- a/x.ts\n+++ b/x.ts\n@@ -3,2 +3,3 @@\n a\n+b\n c\n\n```');

    expect(files).toEqual([
      {
        oldPath: 'x.ts',
        newPath: 'x.ts',
        hunks: [{ oldStart: 3, oldLines: 2, newStart: 3, newLines: 3, lines: [' a', '+b', ' c'] }],
      },
    ]);
  });
});

describe('cleanGeneratedContent', () => {
  it('removes trailing whitespace and collapses blank runs', () => {
    expect(cleanGeneratedContent('a = 1   \n\n\n\nb = 2')).toBe('a = 1\n\nb = 2\n');
  });

  it('returns empty for blank content', () => {
    expect(cleanGeneratedContent('  \n ')).toBe('');
  });
});
