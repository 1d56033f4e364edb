/**
 * Patch Applier
 *
 * Applies a ProposedPatch to a workspace:
 * - unified-diff hunks are matched strictly first, then with whitespace
 *   normalized; among several matches the one nearest the hunk header's line
 *   number wins
 * - `/dev/null` headers create or delete files
 * - full-file replacements are cleaned, checked with `validateFileContent`
 *   and written after the diff, so they win
 * - nothing may be written below the engine's `.repairgate/` directory
 *
 * All changes are computed in memory and written only when every hunk applied.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { RepairGateError, type ProposedPatch } from '@repairgate/shared-types';
import { createLogger } from '../logging/log';
import { SANDBOX_META_DIR } from '../mre/sandbox-descriptor';
import { UnsafePathError, normalizeWorkspaceRelativePath, resolvePathWithinBase } from '../security/path-safety';
import { cleanGeneratedContent } from './content-cleaner';
import { validateFileContent } from './content-validator';
import { hunkSides, parseUnifiedDiff, type DiffHunk } from './unified-diff';

const log = createLogger('patch');

const DEV_NULL_LABEL = '/dev/null';

export type PatchRejectReason =
  | 'INVALID_DIFF'
  | 'HUNK_NO_MATCH'
  | 'FILE_NOT_FOUND'
  | 'UNSAFE_PATH'
  | 'EMPTY_PATCH'
  | 'INVALID_CONTENT';

export interface NoMatchHint {
  lineStart: number;
  lineEnd: number;
  snippet: string;
}

export interface PatchDiagnostics {
  filePath?: string;
  hunkIndex?: number;
  hunkPreview?: string;
  candidateHints?: NoMatchHint[];
}

export class PatchApplyError extends RepairGateError {
  constructor(
    public readonly reason: PatchRejectReason,
    message: string,
    public readonly diagnostics: PatchDiagnostics = {}
  ) {
    super('PATCH_REJECTED', message, { reason, ...diagnostics });
    this.name = 'PatchApplyError';
  }
}

export interface PatchApplyResult {
  /** Relative paths written or deleted, sorted */
  changedFiles: string[];
  hunksApplied: number;
  normalizedHunks: number;
  fullFiles: number;
}

interface FileText {
  lines: string[];
  eol: string;
  trailingNewline: boolean;
}

function splitText(content: string): FileText {
  const eol = content.includes('\r\n') ? '\r\n' : '\n';
  const normalized = content.replace(/\r\n/g, '\n');
  const trailingNewline = normalized.endsWith('\n');
  const body = trailingNewline ? normalized.slice(0, -1) : normalized;
  return { lines: body === '' ? [] : body.split('\n'), eol, trailingNewline };
}

function joinText(text: FileText): string {
  const body = text.lines.join(text.eol);
  return text.trailingNewline && text.lines.length > 0 ? `${body}${text.eol}` : body;
}

function normalizeLineWhitespace(input: string): string {
  return input.replace(/\s+/g, ' ').trim();
}

function findMatches(lines: string[], block: string[], normalize: boolean): number[] {
  const compare = normalize ? normalizeLineWhitespace : (line: string) => line;
  const target = block.map(compare);
  const matches: number[] = [];
  for (let start = 0; start <= lines.length - block.length; start++) {
    let matched = true;
    for (let offset = 0; offset < target.length; offset++) {
      if (compare(lines[start + offset] ?? '') !== target[offset]) {
        matched = false;
        break;
      }
    }
    if (matched) matches.push(start);
  }
  return matches;
}

function nearest(matches: number[], expected: number): number | undefined {
  return [...matches].sort((a, b) => Math.abs(a - expected) - Math.abs(b - expected) || a - b)[0];
}

function tokenize(input: string): Set<string> {
  return new Set(
    input
      .toLowerCase()
      .split(/[^a-z0-9_$]+/g)
      .filter(Boolean)
  );
}

function buildNoMatchHints(lines: string[], block: string[], maxHints = 3): NoMatchHint[] {
  if (lines.length === 0) return [];
  const wanted = tokenize(block.join('\n'));
  const windowSize = Math.max(1, Math.min(block.length || 4, 12, lines.length));

  const ranked = Array.from({ length: Math.max(lines.length - windowSize + 1, 1) }, (_, start) => {
    const window = tokenize(lines.slice(start, start + windowSize).join('\n'));
    let score = 0;
    wanted.forEach(token => {
      if (window.has(token)) score += 1;
    });
    return { start, score };
  }).sort((left, right) => right.score - left.score || left.start - right.start);

  return ranked.slice(0, maxHints).map(({ start }) => {
    const end = Math.min(lines.length, start + windowSize);
    return {
      lineStart: start + 1,
      lineEnd: end,
      snippet: lines
        .slice(start, end)
        .map((line, offset) => `${start + offset + 1} | ${line}`)
        .join('\n'),
    };
  });
}

/**
 * Apply hunks in order to the lines of one file. Returns how many needed the
 * whitespace-normalized pass.
 */
function applyHunks(text: FileText, hunks: DiffHunk[], filePath: string): number {
  let delta = 0;
  let normalizedCount = 0;

  hunks.forEach((hunk, hunkIndex) => {
    const { before, after } = hunkSides(hunk);
    const expected = Math.max(0, hunk.oldStart - 1 + delta);

    let start: number | undefined;
    if (before.length === 0) {
      // pure insertion: "-N,0" inserts after line N
      start = Math.min(hunk.oldLines === 0 ? hunk.oldStart + delta : expected, text.lines.length);
    } else {
      start = nearest(findMatches(text.lines, before, false), expected);
      if (start === undefined) {
        start = nearest(findMatches(text.lines, before, true), expected);
        if (start !== undefined) normalizedCount += 1;
      }
    }

    if (start === undefined) {
      throw new PatchApplyError('HUNK_NO_MATCH', `Hunk ${hunkIndex + 1} does not match ${filePath}`, {
        filePath,
        hunkIndex: hunkIndex + 1,
        hunkPreview: hunk.lines.join('\n').slice(0, 240),
        candidateHints: buildNoMatchHints(text.lines, before),
      });
    }

    text.lines.splice(start, before.length, ...after);
    delta += after.length - before.length;
  });

  return normalizedCount;
}

function safeRelative(rawPath: string): string {
  let relativePath: string;
  try {
    relativePath = normalizeWorkspaceRelativePath(rawPath);
  } catch (error) {
    if (error instanceof UnsafePathError) {
      throw new PatchApplyError('UNSAFE_PATH', error.message, { filePath: rawPath });
    }
    throw error;
  }
  if (relativePath === SANDBOX_META_DIR || relativePath.startsWith(`${SANDBOX_META_DIR}/`)) {
    throw new PatchApplyError('UNSAFE_PATH', `Path is reserved for the engine: ${rawPath}`, { filePath: rawPath });
  }
  return relativePath;
}

async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Apply `patch` below `root`. Throws PatchApplyError without touching the
 * workspace when any part of the patch is rejected.
 */
export async function applyProposedPatch(root: string, patch: ProposedPatch): Promise<PatchApplyResult> {
  const fullFiles = Object.entries(patch.files);
  if (!patch.diff.trim() && fullFiles.length === 0) {
    throw new PatchApplyError('EMPTY_PATCH', 'Patch contains neither a diff nor file contents');
  }

  // relative path -> new content, null for deletion
  const pending = new Map<string, string | null>();
  const current = async (relativePath: string): Promise<string | null> => {
    const staged = pending.get(relativePath);
    if (staged !== undefined) return staged;
    return readIfExists(resolvePathWithinBase(root, relativePath));
  };

  let hunksApplied = 0;
  let normalizedHunks = 0;

  if (patch.diff.trim()) {
    const fileDiffs = parseUnifiedDiff(patch.diff);
    if (fileDiffs.length === 0 || fileDiffs.every(file => file.hunks.length === 0)) {
      throw new PatchApplyError('INVALID_DIFF', 'Diff contains no file headers or hunks');
    }

    for (const fileDiff of fileDiffs) {
      const oldPath = fileDiff.oldPath === null ? null : safeRelative(fileDiff.oldPath);
      const newPath = fileDiff.newPath === null ? null : safeRelative(fileDiff.newPath);

      if (newPath === null) {
        if (oldPath === null || (await current(oldPath)) === null) {
          throw new PatchApplyError('FILE_NOT_FOUND', `Cannot delete missing file ${oldPath ?? DEV_NULL_LABEL}`, {
            filePath: oldPath ?? undefined,
          });
        }
        pending.set(oldPath, null);
        hunksApplied += fileDiff.hunks.length;
        continue;
      }

      let text: FileText;
      if (oldPath === null) {
        text = { lines: [], eol: '\n', trailingNewline: true };
      } else {
        const existing = await current(oldPath);
        if (existing === null) {
          throw new PatchApplyError('FILE_NOT_FOUND', `File not found: ${oldPath}`, { filePath: oldPath });
        }
        text = splitText(existing);
      }

      normalizedHunks += applyHunks(text, fileDiff.hunks, newPath);
      hunksApplied += fileDiff.hunks.length;
      if (oldPath !== null && oldPath !== newPath) {
        pending.set(oldPath, null);
      }
      pending.set(newPath, joinText(text));
    }
  }

  for (const [rawPath, content] of fullFiles) {
    const relativePath = safeRelative(rawPath);
    const cleaned = cleanGeneratedContent(content);
    const problem = validateFileContent(relativePath, cleaned);
    if (problem) {
      throw new PatchApplyError('INVALID_CONTENT', `Rejected content for ${relativePath}: ${problem}`, {
        filePath: relativePath,
      });
    }
    pending.set(relativePath, cleaned);
  }

  for (const [relativePath, content] of pending) {
    const target = resolvePathWithinBase(root, relativePath);
    if (content === null) {
      await fs.rm(target, { force: true });
    } else {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, content, 'utf-8');
    }
  }

  const result: PatchApplyResult = {
    changedFiles: Array.from(pending.keys()).sort(),
    hunksApplied,
    normalizedHunks,
    fullFiles: fullFiles.length,
  };
  log.debug('Patch applied', { root, ...result });
  return result;
}
