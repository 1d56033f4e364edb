/**
 * Error Classifier - Parse and classify raw error reports
 *
 * Extracts stack frames (Python tracebacks, V8 stacks, tsc diagnostics and
 * generic `file:line` references), the source paths they point at, the
 * implicated symbols and a problem category from a fixed taxonomy.
 */

import path from 'path';
import { ProblemCategory, type ErrorReport, type StackFrame } from '@repairgate/shared-types';
import { isAbsoluteLike, relativeWithinBase, toPosixPath } from '../security/path-safety';

/**
 * Ordered category patterns; the first matching category wins.
 */
const CATEGORY_PATTERNS: Array<[ProblemCategory, RegExp[]]> = [
  [
    ProblemCategory.TIMEOUT,
    [/\bTimeoutError\b/, /\btimed out\b/i, /\bTimeout of \d+ms exceeded/i, /\bdeadline exceeded\b/i],
  ],
  [
    ProblemCategory.DEPENDENCY_CONFLICT,
    [
      /\bERESOLVE\b/,
      /\bResolutionImpossible\b/,
      /conflicting (peer )?dependenc/i,
      /\bversion conflict\b/i,
      /Could not find a version that satisfies/i,
      /\bpeer dep(endency)? .*(conflict|required)/i,
    ],
  ],
  [
    ProblemCategory.IMPORT_ERROR,
    [
      /\bModuleNotFoundError\b/,
      /\bImportError\b/,
      /No module named/,
      /Cannot find module/,
      /cannot import name/,
      /\bERR_MODULE_NOT_FOUND\b/,
      /Module not found/,
      /error TS2307\b/,
    ],
  ],
  [
    ProblemCategory.SYNTAX_ERROR,
    [
      /\bSyntaxError\b/,
      /\bIndentationError\b/,
      /\bTabError\b/,
      /invalid syntax/,
      /Unexpected token/,
      /Unexpected end of input/,
      /error TS1\d{3}\b/,
    ],
  ],
  [
    ProblemCategory.TYPE_ERROR,
    [
      /\bTypeError\b/,
      /\bAttributeError\b/,
      /is not assignable to/,
      /error TS2\d{3}\b/,
      /is not a function/,
      /has no attribute/,
    ],
  ],
  [
    ProblemCategory.TEST_FAILURE,
    [
      /\bAssertionError\b/,
      /\bFAILED\b/,
      /\btests? failed\b/i,
      /\bexpect(ed)?\(.*\)\.to/,
      /^\s*Expected:/m,
      /^\s*E\s+assert\b/m,
    ],
  ],
  [
    ProblemCategory.RUNTIME_EXCEPTION,
    [
      /Traceback \(most recent call last\)/,
      /\b\w+(Error|Exception):/,
      /(^|\s)Error:/m,
      /\bpanic:/,
      /Segmentation fault/,
      /Uncaught\b/,
    ],
  ],
];

const PYTHON_FRAME = /File "([^"]+)", line (\d+)(?:, in (\S+))?/;
const V8_FRAME = /^\s*at\s+(?:(.+?)\s+\()?(.+?):(\d+):(\d+)\)?\s*$/;
const TSC_DIAGNOSTIC = /^(.+?\.[cm]?[jt]sx?)\((\d+),(\d+)\):\s+error\b/;
const GENERIC_REFERENCE =
  /((?:[A-Za-z]:)?[\w./\\-]*[\w-]\.(?:py|pyi|js|jsx|mjs|cjs|ts|tsx|mts|cts|go|rb|rs|java|php|cs|kt)):(\d+)(?::(\d+))?/g;
const QUOTED_IDENTIFIER = /['"`]([A-Za-z_$][\w$]*)['"`]/g;

const IGNORED_PATH_PARTS = ['/node_modules/', '/site-packages/', '/dist-packages/', '/lib/python'];
const IGNORED_SYMBOLS = new Set(['<module>', '<anonymous>', 'new', 'async', 'Module._compile']);

/**
 * ErrorClassifier namespace
 */
export namespace ErrorClassifier {
  /**
   * Classify error text into the problem taxonomy
   */
  export function categorize(text: string): ProblemCategory {
    for (const [category, patterns] of CATEGORY_PATTERNS) {
      if (patterns.some(pattern => pattern.test(text))) {
        return category;
      }
    }
    return ProblemCategory.UNKNOWN;
  }

  /**
   * Extract stack frames from raw error text
   */
  export function parseFrames(raw: string): StackFrame[] {
    const frames: StackFrame[] = [];

    for (const line of raw.split(/\r?\n/)) {
      const python = line.match(PYTHON_FRAME);
      if (python) {
        frames.push({ file: python[1], line: Number(python[2]), symbol: python[3] });
        continue;
      }

      const v8 = line.match(V8_FRAME);
      if (v8) {
        frames.push({
          file: v8[2].replace(/^file:\/\//, ''),
          line: Number(v8[3]),
          column: Number(v8[4]),
          symbol: v8[1],
        });
        continue;
      }

      const tsc = line.trim().match(TSC_DIAGNOSTIC);
      if (tsc) {
        frames.push({ file: tsc[1], line: Number(tsc[2]), column: Number(tsc[3]) });
        continue;
      }

      for (const match of line.matchAll(GENERIC_REFERENCE)) {
        frames.push({
          file: match[1],
          line: Number(match[2]),
          column: match[3] ? Number(match[3]) : undefined,
        });
      }
    }

    return frames.filter(frame => !isIgnoredPath(frame.file));
  }

  /**
   * Parse a raw error report. Absolute paths inside `sourceRoot` are made relative.
   */
  export function parseErrorReport(raw: string, sourceRoot?: string): ErrorReport {
    const frames = parseFrames(raw).map(frame => ({
      ...frame,
      file: normalizeFramePath(frame.file, sourceRoot),
    }));

    return {
      raw,
      referencedPaths: unique(frames.map(frame => frame.file)),
      category: categorize(raw),
      symbols: extractSymbols(raw, frames),
      frames,
    };
  }

  /**
   * Identifiers implicated by the error: frame functions first, then quoted names
   */
  export function extractSymbols(raw: string, frames: StackFrame[]): string[] {
    const symbols: string[] = [];

    for (const frame of frames) {
      if (!frame.symbol || IGNORED_SYMBOLS.has(frame.symbol)) continue;
      const last = frame.symbol.split('.').pop() ?? '';
      if (/^[A-Za-z_$][\w$]*$/.test(last)) {
        symbols.push(last);
      }
    }

    for (const match of raw.matchAll(QUOTED_IDENTIFIER)) {
      symbols.push(match[1]);
    }

    return unique(symbols);
  }
}

function isIgnoredPath(file: string): boolean {
  const posix = toPosixPath(file);
  if (posix.startsWith('<') || posix.startsWith('node:') || posix.startsWith('internal/')) {
    return true;
  }
  return IGNORED_PATH_PARTS.some(part => posix.includes(part));
}

function normalizeFramePath(file: string, sourceRoot?: string): string {
  const posix = toPosixPath(file).replace(/^\.\/+/, '');
  if (sourceRoot && isAbsoluteLike(posix)) {
    return relativeWithinBase(sourceRoot, path.resolve(file)) ?? posix;
  }
  return posix;
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}
