/**
 * Unified diff parser
 *
 * Tolerant of what generation models emit: a surrounding ```diff fence, wrong
 * hunk line counts, `diff --git` / `index` preamble and context lines that
 * lost their leading space.
 */

import { stripWrappingFence } from './content-cleaner';

export interface DiffHunk {
  oldStart: number;
  oldLines: number;
  newStart: number;
  newLines: number;
  /** Body lines with their ' ', '-' or '+' prefix */
  lines: string[];
}

export interface FileDiff {
  /** null for /dev/null (file creation) */
  oldPath: string | null;
  /** null for /dev/null (file deletion) */
  newPath: string | null;
  hunks: DiffHunk[];
}

const HUNK_HEADER = /^@@+ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@+/;
const DEV_NULL = '/dev/null';

function headerPath(line: string): string {
  // drop the marker and any trailing tab-separated timestamp
  return line.slice(4).split('\t')[0]?.trim() ?? '';
}

function stripGitPrefixes(oldRaw: string, newRaw: string): { oldPath: string | null; newPath: string | null } {
  const gitStyle =
    (oldRaw === DEV_NULL || oldRaw.startsWith('a/')) && (newRaw === DEV_NULL || newRaw.startsWith('b/'));
  const clean = (raw: string): string | null => {
    if (raw === DEV_NULL) return null;
    return gitStyle ? raw.slice(2) : raw;
  };
  return { oldPath: clean(oldRaw), newPath: clean(newRaw) };
}

function isHunkLine(line: string): boolean {
  return line === '' || line.startsWith(' ') || line.startsWith('+') || line.startsWith('-') || line.startsWith('\\');
}

function isFileHeader(lines: string[], index: number): boolean {
  return (lines[index] ?? '').startsWith('--- ') && (lines[index + 1] ?? '').startsWith('+++ ');
}

/**
 * Lines removed (' ' and '-') and added (' ' and '+') by a hunk
 */
export function hunkSides(hunk: DiffHunk): { before: string[]; after: string[] } {
  const before: string[] = [];
  const after: string[] = [];
  for (const line of hunk.lines) {
    const marker = line[0];
    const text = line.slice(1);
    if (marker === '-') {
      before.push(text);
    } else if (marker === '+') {
      after.push(text);
    } else {
      before.push(text);
      after.push(text);
    }
  }
  return { before, after };
}

export function parseUnifiedDiff(diff: string): FileDiff[] {
  const lines = stripWrappingFence(diff).replace(/\r\n/g, '\n').split('\n');
  const files: FileDiff[] = [];
  let current: FileDiff | null = null;
  let index = 0;

  while (index < lines.length) {
    if (isFileHeader(lines, index)) {
      current = {
        ...stripGitPrefixes(headerPath(lines[index] ?? ''), headerPath(lines[index + 1] ?? '')),
        hunks: [],
      };
      files.push(current);
      index += 2;
      continue;
    }

    const header = HUNK_HEADER.exec(lines[index] ?? '');
    if (header && current) {
      const hunk: DiffHunk = {
        oldStart: Number(header[1]),
        oldLines: header[2] === undefined ? 1 : Number(header[2]),
        newStart: Number(header[3]),
        newLines: header[4] === undefined ? 1 : Number(header[4]),
        lines: [],
      };
      index += 1;
      while (index < lines.length && !isFileHeader(lines, index) && !HUNK_HEADER.test(lines[index] ?? '')) {
        const line = lines[index] ?? '';
        if (!isHunkLine(line)) break;
        if (!line.startsWith('\\')) {
          hunk.lines.push(line === '' ? ' ' : line);
        }
        index += 1;
      }
      // blank lines between hunks or at the end of the diff are not context
      while (hunk.lines.length > 0 && hunk.lines[hunk.lines.length - 1] === ' ') {
        hunk.lines.pop();
      }
      current.hunks.push(hunk);
      continue;
    }

    index += 1;
  }

  return files;
}
